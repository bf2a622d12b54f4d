import { describe, it, expect } from 'vitest';
import { MatrixEntryValidationError } from '../../errors';
import {
  buildMultinodeEntry,
  buildSingleNodeEntry,
  entryContextOf,
  isSingleNodeEntry,
  validateMatrixEntry,
} from '../../matrix/entry';
import { Field } from '../../matrix/fields';
import { makeMultinodeConfig, makeSingleNodeConfig, makeWorker } from '../helpers';

const singleCtx = entryContextOf(makeSingleNodeConfig(), 1024, 1024, undefined);
const multiCtx = entryContextOf(makeMultinodeConfig(), 8192, 1024, 'mtp');

describe('entryContextOf', () => {
  it('defaults spec-decoding to none', () => {
    expect(singleCtx.specDecoding).toBe('none');
    expect(multiCtx.specDecoding).toBe('mtp');
  });
});

describe('validateMatrixEntry', () => {
  it('returns a valid entry unchanged', () => {
    const entry = buildSingleNodeEntry(singleCtx, {
      runner: 'h100',
      tp: 8,
      ep: 1,
      dpAttn: false,
      conc: 4,
    });
    expect(validateMatrixEntry(entry, false)).toBe(entry);
  });

  it('rejects a non-positive concurrency', () => {
    const entry = buildSingleNodeEntry(singleCtx, {
      runner: 'h100',
      tp: 8,
      ep: 1,
      dpAttn: false,
      conc: 0,
    });
    expect(() => validateMatrixEntry(entry, false)).toThrow(MatrixEntryValidationError);
    expect(() => validateMatrixEntry(entry, false)).toThrow(/^Invalid single-node matrix entry /);
  });

  it('rejects unknown fields', () => {
    const entry = {
      ...buildSingleNodeEntry(singleCtx, { runner: 'h100', tp: 8, ep: 1, dpAttn: false, conc: 4 }),
      extra: true,
    };
    expect(() => validateMatrixEntry(entry, false)).toThrow(
      "  (root): Unrecognized key(s) in object: 'extra'",
    );
  });

  it('rejects a multinode entry with an empty concurrency list', () => {
    const entry = buildMultinodeEntry(multiCtx, {
      runner: 'gb200',
      prefill: makeWorker(1, 4, 4, false),
      decode: makeWorker(1, 8, 8, false),
      conc: [],
    });
    let caught: unknown;
    try {
      validateMatrixEntry(entry, true);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MatrixEntryValidationError);
    if (caught instanceof MatrixEntryValidationError) {
      expect(caught.issues.map((issue) => issue.path)).toEqual([[Field.Conc]]);
      expect(caught.message).toMatch(/^Invalid multinode matrix entry /);
    }
  });
});

describe('isSingleNodeEntry', () => {
  it('tells entry shapes apart by top-level TP', () => {
    const single = buildSingleNodeEntry(singleCtx, {
      runner: 'h100',
      tp: 8,
      ep: 1,
      dpAttn: false,
      conc: 4,
    });
    const multi = buildMultinodeEntry(multiCtx, {
      runner: 'gb200',
      prefill: makeWorker(1, 4, 4, false),
      decode: makeWorker(1, 8, 8, false),
      conc: [4],
    });
    expect(isSingleNodeEntry(single)).toBe(true);
    expect(isSingleNodeEntry(multi)).toBe(false);
  });
});
