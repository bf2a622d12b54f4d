/**
 * Schemas for the master config files and the runner inventory.
 *
 * Config files are YAML mappings of config key → config entry. Single-node and
 * multinode entries have different search-space shapes, so each has its own
 * schema; the loader picks one per entry from its `multinode` flag.
 */

import { z } from 'zod';
import type { ConcurrencyFields } from '../matrix/concurrency';
import { Field } from '../matrix/fields';

export const positiveInt = z.number().int().positive();

const concurrencyShape = {
  [Field.ConcStart]: positiveInt.optional(),
  [Field.ConcEnd]: positiveInt.optional(),
  [Field.ConcList]: z.array(positiveInt).min(1).optional(),
};

/** A point needs a non-empty `conc-list`, or both range bounds with start <= end. */
function checkConcurrency(point: ConcurrencyFields, ctx: z.RefinementCtx): void {
  if (point[Field.ConcList] !== undefined) return;

  const start = point[Field.ConcStart];
  const end = point[Field.ConcEnd];
  if (start === undefined || end === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `expected either ${Field.ConcList} or both ${Field.ConcStart} and ${Field.ConcEnd}`,
    });
    return;
  }
  if (start > end) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: [Field.ConcStart],
      message: `${Field.ConcStart} (${start}) exceeds ${Field.ConcEnd} (${end})`,
    });
  }
}

export const singleNodePointSchema = z
  .object({
    [Field.Tp]: positiveInt,
    [Field.Ep]: positiveInt.optional(),
    [Field.DpAttn]: z.boolean().optional(),
    [Field.SpecDecoding]: z.string().min(1).optional(),
    ...concurrencyShape,
  })
  .strict()
  .superRefine(checkConcurrency);

export const workerSchema = z
  .object({
    [Field.NumWorker]: positiveInt,
    [Field.Tp]: positiveInt,
    [Field.Ep]: positiveInt,
    [Field.DpAttn]: z.boolean(),
    [Field.AdditionalSettings]: z.array(z.string()).optional(),
  })
  .strict();

export const multinodePointSchema = z
  .object({
    [Field.Prefill]: workerSchema,
    [Field.Decode]: workerSchema,
    [Field.SpecDecoding]: z.string().min(1).optional(),
    ...concurrencyShape,
  })
  .strict()
  .superRefine(checkConcurrency);

function seqLenProfileSchema<P extends z.ZodTypeAny>(point: P) {
  return z
    .object({
      [Field.Isl]: positiveInt,
      [Field.Osl]: positiveInt,
      [Field.SearchSpace]: z.array(point).min(1),
    })
    .strict();
}

const configBaseShape = {
  [Field.Image]: z.string().min(1),
  [Field.Model]: z.string().min(1),
  [Field.ModelPrefix]: z.string().min(1),
  [Field.Precision]: z.string().min(1),
  [Field.Framework]: z.string().min(1),
  [Field.Runner]: z.string().min(1),
  [Field.Disagg]: z.boolean().default(false),
};

export const singleNodeConfigSchema = z
  .object({
    ...configBaseShape,
    [Field.Multinode]: z.literal(false).default(false),
    [Field.SeqLenConfigs]: z.array(seqLenProfileSchema(singleNodePointSchema)).min(1),
  })
  .strict();

export const multinodeConfigSchema = z
  .object({
    ...configBaseShape,
    [Field.Multinode]: z.literal(true),
    [Field.SeqLenConfigs]: z.array(seqLenProfileSchema(multinodePointSchema)).min(1),
  })
  .strict();

/** Raw file shape before per-entry validation. */
export const configFileSchema = z.record(z.string(), z.unknown());

export const runnerFileSchema = z.record(z.string(), z.array(z.string().min(1)));

export type SingleNodePoint = z.infer<typeof singleNodePointSchema>;
export type MultinodePoint = z.infer<typeof multinodePointSchema>;
export type WorkerConfig = z.infer<typeof workerSchema>;

export type SingleNodeConfigEntry = z.infer<typeof singleNodeConfigSchema>;
export type MultinodeConfigEntry = z.infer<typeof multinodeConfigSchema>;

/** Discriminated on `multinode`. */
export type ConfigEntry = SingleNodeConfigEntry | MultinodeConfigEntry;

/** Config key → entry, in file order. */
export type ConfigCatalog = ReadonlyMap<string, ConfigEntry>;

/** Runner type → physical node identifiers, in file order. */
export type RunnerCatalog = ReadonlyMap<string, readonly string[]>;

export function isMultinodeConfig(config: ConfigEntry): config is MultinodeConfigEntry {
  return config[Field.Multinode] === true;
}
