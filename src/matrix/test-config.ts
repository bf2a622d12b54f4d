import { TEST_CONFIG_STEP_SIZE } from '../config/defaults';
import { ConfigCatalog, ConfigEntry, isMultinodeConfig } from '../config/schema';
import { MissingConfigKeysError } from '../errors';
import { Logger } from '../utils/logger';
import { concurrencySpecOf, expandConcurrency } from './concurrency';
import {
  buildMultinodeEntry,
  buildSingleNodeEntry,
  entryContextOf,
  MatrixEntry,
  validateMatrixEntry,
} from './entry';
import { Field } from './fields';

export interface TestConfigOptions {
  configKeys: readonly string[];
  /** Keep only these concurrency values; a point left with none is dropped. */
  conc?: readonly number[];
}

/** Apply the allow-list; `null` means the point has nothing left to run. */
function allowedConcurrency(
  values: number[],
  allowList: readonly number[] | undefined,
): number[] | null {
  if (allowList === undefined || allowList.length === 0) return values;
  const kept = values.filter((c) => allowList.includes(c));
  return kept.length > 0 ? kept : null;
}

function expandConfig(config: ConfigEntry, allowList: readonly number[] | undefined): MatrixEntry[] {
  const entries: MatrixEntry[] = [];
  const runner = config[Field.Runner];

  if (isMultinodeConfig(config)) {
    for (const profile of config[Field.SeqLenConfigs]) {
      for (const point of profile[Field.SearchSpace]) {
        const expanded = expandConcurrency(concurrencySpecOf(point), TEST_CONFIG_STEP_SIZE);
        const conc = allowedConcurrency(expanded, allowList);
        if (conc === null) continue;

        const ctx = entryContextOf(
          config,
          profile[Field.Isl],
          profile[Field.Osl],
          point[Field.SpecDecoding],
        );
        const entry = buildMultinodeEntry(ctx, {
          runner,
          prefill: point[Field.Prefill],
          decode: point[Field.Decode],
          conc,
        });
        entries.push(validateMatrixEntry(entry, true));
      }
    }
    return entries;
  }

  for (const profile of config[Field.SeqLenConfigs]) {
    for (const point of profile[Field.SearchSpace]) {
      const expanded = expandConcurrency(concurrencySpecOf(point), TEST_CONFIG_STEP_SIZE);
      const concValues = allowedConcurrency(expanded, allowList);
      if (concValues === null) continue;

      const ctx = entryContextOf(
        config,
        profile[Field.Isl],
        profile[Field.Osl],
        point[Field.SpecDecoding],
      );
      for (const conc of concValues) {
        const entry = buildSingleNodeEntry(ctx, {
          runner,
          tp: point[Field.Tp],
          ep: point[Field.Ep] ?? 1,
          dpAttn: point[Field.DpAttn] ?? false,
          conc,
        });
        entries.push(validateMatrixEntry(entry, false));
      }
    }
  }
  return entries;
}

/**
 * `test-config`: expand the named configs in full, ignoring every sweep filter.
 * All keys are checked before anything is expanded.
 */
export function generateTestConfigSweep(
  catalog: ConfigCatalog,
  options: TestConfigOptions,
  logger?: Logger,
): MatrixEntry[] {
  const missing = options.configKeys.filter((key) => !catalog.has(key));
  if (missing.length > 0) {
    throw new MissingConfigKeysError(missing, [...catalog.keys()]);
  }

  const matrix: MatrixEntry[] = [];
  for (const key of options.configKeys) {
    const config = catalog.get(key);
    if (config === undefined) continue;
    const entries = expandConfig(config, options.conc);
    logger?.debug(`test-config: ${key} → ${entries.length} entries`);
    matrix.push(...entries);
  }
  return matrix;
}
