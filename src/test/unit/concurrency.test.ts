import { describe, it, expect } from 'vitest';
import {
  concurrencySpecOf,
  expandConcurrency,
  expandConcurrencyRange,
} from '../../matrix/concurrency';
import { Field } from '../../matrix/fields';

describe('expandConcurrencyRange', () => {
  it('multiplies by the step and always ends on the range end', () => {
    expect(expandConcurrencyRange(1, 100, 2)).toEqual([1, 2, 4, 8, 16, 32, 64, 100]);
  });

  it('does not repeat the end when a multiple lands on it', () => {
    expect(expandConcurrencyRange(4, 64, 2)).toEqual([4, 8, 16, 32, 64]);
  });

  it('honours larger steps', () => {
    expect(expandConcurrencyRange(1, 10, 3)).toEqual([1, 3, 9, 10]);
    expect(expandConcurrencyRange(4, 16, 4)).toEqual([4, 16]);
  });

  it('returns a single value when start equals end', () => {
    expect(expandConcurrencyRange(5, 5, 2)).toEqual([5]);
  });

  it('returns nothing when start exceeds end', () => {
    expect(expandConcurrencyRange(8, 4, 2)).toEqual([]);
  });

  it('rejects a start that would never grow', () => {
    expect(() => expandConcurrencyRange(0, 8, 2)).toThrow(
      'Concurrency range must start at 1 or more, got 0',
    );
    expect(() => expandConcurrencyRange(-2, 8, 2)).toThrow(RangeError);
  });

  it('rejects a step that would never grow', () => {
    expect(() => expandConcurrencyRange(1, 8, 1)).toThrow(RangeError);
    expect(() => expandConcurrencyRange(1, 8, 0.5)).toThrow(
      'Concurrency step must be greater than 1, got 0.5',
    );
  });
});

describe('concurrencySpecOf', () => {
  it('prefers an explicit list over a range', () => {
    const spec = concurrencySpecOf({
      [Field.ConcList]: [2, 4],
      [Field.ConcStart]: 1,
      [Field.ConcEnd]: 8,
    });
    expect(spec).toEqual({ kind: 'list', values: [2, 4] });
  });

  it('falls back to the range when the list is empty', () => {
    const spec = concurrencySpecOf({
      [Field.ConcList]: [],
      [Field.ConcStart]: 1,
      [Field.ConcEnd]: 8,
    });
    expect(spec).toEqual({ kind: 'range', start: 1, end: 8 });
  });

  it('throws when neither form is present', () => {
    expect(() => concurrencySpecOf({ [Field.ConcStart]: 4 })).toThrow(
      'Search-space point has neither conc-list nor conc-start/conc-end',
    );
  });
});

describe('expandConcurrency', () => {
  it('returns a copy of an explicit list', () => {
    const values = [3, 7, 11];
    const expanded = expandConcurrency({ kind: 'list', values }, 2);
    expect(expanded).toEqual([3, 7, 11]);
    expect(expanded).not.toBe(values);
  });

  it('expands a range with the given step', () => {
    expect(expandConcurrency({ kind: 'range', start: 2, end: 20 }, 3)).toEqual([2, 6, 18, 20]);
  });
});
