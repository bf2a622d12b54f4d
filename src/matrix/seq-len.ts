import { MAX_MODEL_LEN_HEADROOM } from '../config/defaults';

export const SEQ_LEN_NAMES = ['1k1k', '1k8k', '8k1k'] as const;

export type SeqLenName = (typeof SEQ_LEN_NAMES)[number];

export interface SeqLen {
  readonly isl: number;
  readonly osl: number;
}

export const SEQ_LENS: Readonly<Record<SeqLenName, SeqLen>> = Object.freeze({
  '1k1k': Object.freeze({ isl: 1024, osl: 1024 }),
  '1k8k': Object.freeze({ isl: 1024, osl: 8192 }),
  '8k1k': Object.freeze({ isl: 8192, osl: 1024 }),
});

function seqLenKey(isl: number, osl: number): string {
  return `${isl}:${osl}`;
}

const NAME_BY_SEQ_LEN: ReadonlyMap<string, SeqLenName> = new Map(
  SEQ_LEN_NAMES.map((name) => [seqLenKey(SEQ_LENS[name].isl, SEQ_LENS[name].osl), name]),
);

/**
 * Short name for a profile, e.g. `1k8k`.
 * Profiles outside the table fall back to `{isl}_{osl}`.
 */
export function seqLenToName(isl: number, osl: number): string {
  return NAME_BY_SEQ_LEN.get(seqLenKey(isl, osl)) ?? `${isl}_${osl}`;
}

export function experimentName(modelPrefix: string, isl: number, osl: number): string {
  return `${modelPrefix}_${seqLenToName(isl, osl)}`;
}

export function maxModelLen(isl: number, osl: number): number {
  return isl + osl + MAX_MODEL_LEN_HEADROOM;
}
