import { Field } from './fields';

export type ConcurrencySpec =
  | { kind: 'range'; start: number; end: number }
  | { kind: 'list'; values: readonly number[] };

export interface ConcurrencyFields {
  [Field.ConcStart]?: number;
  [Field.ConcEnd]?: number;
  [Field.ConcList]?: number[];
}

/**
 * Read a point's concurrency spec. An explicit `conc-list` wins over a range.
 * Validated config always has one of the two forms.
 */
export function concurrencySpecOf(point: ConcurrencyFields): ConcurrencySpec {
  const list = point[Field.ConcList];
  if (list !== undefined && list.length > 0) {
    return { kind: 'list', values: list };
  }
  const start = point[Field.ConcStart];
  const end = point[Field.ConcEnd];
  if (start === undefined || end === undefined) {
    throw new Error(
      `Search-space point has neither ${Field.ConcList} nor ${Field.ConcStart}/${Field.ConcEnd}`,
    );
  }
  return { kind: 'range', start, end };
}

/**
 * Geometric expansion of a concurrency range.
 *
 *   expandConcurrencyRange(1, 100, 2) → [1, 2, 4, 8, 16, 32, 64, 100]
 *
 * Multiplies by `step` until the next value would pass `end`, which is then
 * emitted as-is, so the last value is always exactly `end`.
 */
export function expandConcurrencyRange(start: number, end: number, step: number): number[] {
  if (!(step > 1)) {
    throw new RangeError(`Concurrency step must be greater than 1, got ${step}`);
  }
  if (!(start >= 1)) {
    throw new RangeError(`Concurrency range must start at 1 or more, got ${start}`);
  }

  const values: number[] = [];
  let conc = start;
  while (conc <= end) {
    values.push(conc);
    if (conc === end) break;
    conc *= step;
    if (conc > end) conc = end;
  }
  return values;
}

/** Concrete values for a spec; lists are returned as a copy. */
export function expandConcurrency(spec: ConcurrencySpec, step: number): number[] {
  return spec.kind === 'list' ? [...spec.values] : expandConcurrencyRange(spec.start, spec.end, step);
}
