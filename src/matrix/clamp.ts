/**
 * Bounds applied by `full-sweep` filters.
 *
 * Each parameter has its own rule:
 *   - TP/EP clamp to a positive bound.
 *   - Single-node concurrency ranges narrow, or collapse to `max_conc`.
 *   - Concrete concurrency lists are filtered.
 * In every case a non-positive bound drops the point. Every function here
 * returns `null` to mean "drop the point".
 */

export interface ParallelismBounds {
  maxTp?: number;
  maxEp?: number;
}

export interface ConcurrencyBounds {
  minConc?: number;
  maxConc?: number;
}

export interface Parallelism {
  tp: number;
  ep: number | undefined;
}

function isNonPositive(bound: number | undefined): boolean {
  return bound !== undefined && bound <= 0;
}

/** Clamp TP then EP. An absent EP stays absent; a non-positive bound drops the point either way. */
export function clampParallelism(
  parallelism: Parallelism,
  bounds: ParallelismBounds,
): Parallelism | null {
  let { tp, ep } = parallelism;

  if (bounds.maxTp !== undefined) {
    if (isNonPositive(bounds.maxTp)) return null;
    if (tp > bounds.maxTp) tp = bounds.maxTp;
  }

  if (bounds.maxEp !== undefined) {
    if (isNonPositive(bounds.maxEp)) return null;
    if (ep !== undefined && ep > bounds.maxEp) ep = bounds.maxEp;
  }

  return { tp, ep };
}

export interface ConcurrencyRange {
  start: number;
  end: number;
}

/**
 * Narrow a range before it is expanded.
 *
 * `minConc` raises the start, or drops the point when the whole range is below it.
 * `maxConc` then lowers the end, or collapses the range to `[maxConc, maxConc]`
 * when even the start is above it.
 */
export function narrowConcurrencyRange(
  range: ConcurrencyRange,
  bounds: ConcurrencyBounds,
): ConcurrencyRange | null {
  let { start, end } = range;

  if (bounds.minConc !== undefined) {
    if (isNonPositive(bounds.minConc)) return null;
    if (end < bounds.minConc) return null;
    start = Math.max(start, bounds.minConc);
  }

  if (bounds.maxConc !== undefined) {
    if (isNonPositive(bounds.maxConc)) return null;
    if (start > bounds.maxConc) {
      start = bounds.maxConc;
      end = bounds.maxConc;
    } else {
      end = Math.min(end, bounds.maxConc);
    }
  }

  return { start, end };
}

/** Keep values inside `[minConc, maxConc]`. An empty result drops the point. */
export function filterConcurrencyList(
  values: readonly number[],
  bounds: ConcurrencyBounds,
): number[] | null {
  let kept = [...values];

  if (bounds.minConc !== undefined) {
    if (isNonPositive(bounds.minConc)) return null;
    const minConc = bounds.minConc;
    kept = kept.filter((c) => c >= minConc);
    if (kept.length === 0) return null;
  }

  if (bounds.maxConc !== undefined) {
    if (isNonPositive(bounds.maxConc)) return null;
    const maxConc = bounds.maxConc;
    kept = kept.filter((c) => c <= maxConc);
    if (kept.length === 0) return null;
  }

  return kept;
}
