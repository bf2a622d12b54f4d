/**
 * Accuracy-eval selection.
 *
 * Only single-node entries at 1k8k are candidates. They are grouped by
 * (model, runner, framework, precision, isl, osl, spec-decoding) and, within
 * each group, the entries at the highest TP with that TP's highest
 * concurrency are marked. When the group also has a lower TP, the lowest TP's
 * highest-concurrency entries are marked too. Ties mark every tied entry.
 */

import { EVAL_SEQ_LEN } from '../config/defaults';
import { Field } from './fields';
import { isSingleNodeEntry, MatrixEntry, SingleNodeMatrixEntry } from './entry';
import { SEQ_LENS } from './seq-len';

interface Candidate {
  index: number;
  entry: SingleNodeMatrixEntry;
}

function groupKey(entry: SingleNodeMatrixEntry): string {
  return JSON.stringify([
    entry[Field.Model],
    entry[Field.Runner],
    entry[Field.Framework],
    entry[Field.Precision],
    entry[Field.Isl],
    entry[Field.Osl],
    entry[Field.SpecDecoding],
  ]);
}

/** Indices of the highest-concurrency entries among those at `tp`. */
function highestConcAtTp(candidates: readonly Candidate[], tp: number): number[] {
  const atTp = candidates.filter((c) => c.entry[Field.Tp] === tp);
  const maxConc = Math.max(...atTp.map((c) => c.entry[Field.Conc]));
  return atTp.filter((c) => c.entry[Field.Conc] === maxConc).map((c) => c.index);
}

/** Indices into `matrix` of the entries selected for evals. */
export function selectEvalIndices(matrix: readonly MatrixEntry[]): Set<number> {
  const target = SEQ_LENS[EVAL_SEQ_LEN];
  const groups = new Map<string, Candidate[]>();

  matrix.forEach((entry, index) => {
    if (!isSingleNodeEntry(entry)) return;
    if (entry[Field.Isl] !== target.isl || entry[Field.Osl] !== target.osl) return;

    const key = groupKey(entry);
    const group = groups.get(key);
    if (group) {
      group.push({ index, entry });
    } else {
      groups.set(key, [{ index, entry }]);
    }
  });

  const selected = new Set<number>();
  for (const candidates of groups.values()) {
    const tps = candidates.map((c) => c.entry[Field.Tp]);
    const minTp = Math.min(...tps);
    const maxTp = Math.max(...tps);

    for (const index of highestConcAtTp(candidates, maxTp)) selected.add(index);
    if (minTp !== maxTp) {
      for (const index of highestConcAtTp(candidates, minTp)) selected.add(index);
    }
  }
  return selected;
}

/** Copy of the matrix with `run-eval` set on every entry. */
export function markEvalEntries(matrix: readonly MatrixEntry[]): MatrixEntry[] {
  const selected = selectEvalIndices(matrix);
  return matrix.map((entry, index) => ({ ...entry, [Field.RunEval]: selected.has(index) }));
}

/** Entries already marked for evals. */
export function evalEntriesOnly(matrix: readonly MatrixEntry[]): MatrixEntry[] {
  return matrix.filter((entry) => entry[Field.RunEval]);
}
