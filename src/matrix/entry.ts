import { z } from 'zod';
import { DEFAULT_SPEC_DECODING } from '../config/defaults';
import { ConfigEntry, positiveInt, workerSchema, WorkerConfig } from '../config/schema';
import { MatrixEntryValidationError } from '../errors';
import { Field } from './fields';
import { experimentName, maxModelLen } from './seq-len';

const entryBaseShape = {
  [Field.Image]: z.string().min(1),
  [Field.Model]: z.string().min(1),
  [Field.ModelPrefix]: z.string().min(1),
  [Field.Precision]: z.string().min(1),
  [Field.Framework]: z.string().min(1),
  [Field.Runner]: z.string().min(1),
  [Field.Isl]: positiveInt,
  [Field.Osl]: positiveInt,
  [Field.SpecDecoding]: z.string().min(1),
  [Field.MaxModelLen]: positiveInt,
  [Field.ExpName]: z.string().min(1),
  [Field.Disagg]: z.boolean(),
  [Field.RunEval]: z.boolean(),
};

export const singleNodeEntrySchema = z
  .object({
    ...entryBaseShape,
    [Field.Tp]: positiveInt,
    [Field.Conc]: positiveInt,
    [Field.Ep]: positiveInt,
    [Field.DpAttn]: z.boolean(),
  })
  .strict();

export const multinodeEntrySchema = z
  .object({
    ...entryBaseShape,
    [Field.Prefill]: workerSchema,
    [Field.Decode]: workerSchema,
    [Field.Conc]: z.array(positiveInt).min(1),
  })
  .strict();

export type SingleNodeMatrixEntry = z.infer<typeof singleNodeEntrySchema>;
export type MultinodeMatrixEntry = z.infer<typeof multinodeEntrySchema>;
export type MatrixEntry = SingleNodeMatrixEntry | MultinodeMatrixEntry;

/** Single-node entries are the ones carrying a top-level TP. */
export function isSingleNodeEntry(entry: MatrixEntry): entry is SingleNodeMatrixEntry {
  return Field.Tp in entry;
}

/** Fields shared by every entry emitted for one (config, profile, point). */
export interface EntryContext {
  image: string;
  model: string;
  modelPrefix: string;
  precision: string;
  framework: string;
  isl: number;
  osl: number;
  specDecoding: string;
  disagg: boolean;
}

export function entryContextOf(
  config: ConfigEntry,
  isl: number,
  osl: number,
  specDecoding: string | undefined,
): EntryContext {
  return {
    image: config[Field.Image],
    model: config[Field.Model],
    modelPrefix: config[Field.ModelPrefix],
    precision: config[Field.Precision],
    framework: config[Field.Framework],
    isl,
    osl,
    specDecoding: specDecoding ?? DEFAULT_SPEC_DECODING,
    disagg: config[Field.Disagg],
  };
}

export interface SingleNodeParams {
  runner: string;
  tp: number;
  ep: number;
  dpAttn: boolean;
  conc: number;
}

export interface MultinodeParams {
  runner: string;
  prefill: WorkerConfig;
  decode: WorkerConfig;
  conc: number[];
}

export function buildSingleNodeEntry(
  ctx: EntryContext,
  params: SingleNodeParams,
): SingleNodeMatrixEntry {
  return {
    [Field.Image]: ctx.image,
    [Field.Model]: ctx.model,
    [Field.ModelPrefix]: ctx.modelPrefix,
    [Field.Precision]: ctx.precision,
    [Field.Framework]: ctx.framework,
    [Field.Runner]: params.runner,
    [Field.Isl]: ctx.isl,
    [Field.Osl]: ctx.osl,
    [Field.Tp]: params.tp,
    [Field.Conc]: params.conc,
    [Field.MaxModelLen]: maxModelLen(ctx.isl, ctx.osl),
    [Field.Ep]: params.ep,
    [Field.DpAttn]: params.dpAttn,
    [Field.SpecDecoding]: ctx.specDecoding,
    [Field.ExpName]: experimentName(ctx.modelPrefix, ctx.isl, ctx.osl),
    [Field.Disagg]: ctx.disagg,
    [Field.RunEval]: false,
  };
}

export function buildMultinodeEntry(
  ctx: EntryContext,
  params: MultinodeParams,
): MultinodeMatrixEntry {
  return {
    [Field.Image]: ctx.image,
    [Field.Model]: ctx.model,
    [Field.ModelPrefix]: ctx.modelPrefix,
    [Field.Precision]: ctx.precision,
    [Field.Framework]: ctx.framework,
    [Field.Runner]: params.runner,
    [Field.Isl]: ctx.isl,
    [Field.Osl]: ctx.osl,
    [Field.SpecDecoding]: ctx.specDecoding,
    [Field.Prefill]: params.prefill,
    [Field.Decode]: params.decode,
    [Field.Conc]: params.conc,
    [Field.MaxModelLen]: maxModelLen(ctx.isl, ctx.osl),
    [Field.ExpName]: experimentName(ctx.modelPrefix, ctx.isl, ctx.osl),
    [Field.Disagg]: ctx.disagg,
    [Field.RunEval]: false,
  };
}

/**
 * Schema check run on every entry before it joins the matrix.
 * Throws instead of dropping, so one bad entry fails the whole run.
 */
export function validateMatrixEntry<T extends MatrixEntry>(entry: T, isMultinode: boolean): T {
  const schema = isMultinode ? multinodeEntrySchema : singleNodeEntrySchema;
  const result = schema.safeParse(entry);
  if (!result.success) {
    throw new MatrixEntryValidationError(entry, result.error.issues, isMultinode);
  }
  return entry;
}
