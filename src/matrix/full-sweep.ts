/**
 * `full-sweep`: expand every config that survives the filters into matrix entries.
 *
 * Single-node points emit one entry per concurrency value per runner node.
 * Multinode points emit one entry per runner node carrying the whole
 * concurrency list, since those values run together against one deployment.
 */

import { DEFAULT_STEP_SIZE } from '../config/defaults';
import {
  ConfigCatalog,
  isMultinodeConfig,
  MultinodeConfigEntry,
  RunnerCatalog,
  SingleNodeConfigEntry,
  SingleNodePoint,
} from '../config/schema';
import { Logger } from '../utils/logger';
import {
  clampParallelism,
  ConcurrencyBounds,
  filterConcurrencyList,
  narrowConcurrencyRange,
  ParallelismBounds,
} from './clamp';
import { concurrencySpecOf, expandConcurrency, expandConcurrencyRange } from './concurrency';
import {
  buildMultinodeEntry,
  buildSingleNodeEntry,
  entryContextOf,
  MatrixEntry,
  MultinodeMatrixEntry,
  SingleNodeMatrixEntry,
  validateMatrixEntry,
} from './entry';
import { Field } from './fields';
import {
  assertKnownRunnerTypes,
  CatalogFilters,
  filterCatalog,
  resolveRunnerNodes,
  seqLenPredicate,
} from './filters';
import { SeqLenName } from './seq-len';
import { NodeMode } from './types';

export interface FullSweepOptions extends CatalogFilters, ParallelismBounds, ConcurrencyBounds {
  nodeMode: NodeMode;
  seqLens?: readonly SeqLenName[];
  /** Concurrency multiplier for ranges. Defaults to 2. */
  stepSize?: number;
  /** Substring; fans each config out to every matching node of its runner type. */
  runnerNodeFilter?: string;
}

export interface ExpansionSettings {
  bounds: ParallelismBounds & ConcurrencyBounds;
  stepSize: number;
  seqLenMatches: (isl: number, osl: number) => boolean;
  logger?: Logger;
}

function describePoint(key: string, isl: number, osl: number, index: number): string {
  return `${key} ${isl}/${osl} point #${index}`;
}

/**
 * Concrete single-node concurrency values after `min_conc`/`max_conc`.
 * Ranges are narrowed before expansion; explicit lists are filtered.
 */
export function resolveSingleNodeConcurrency(
  point: SingleNodePoint,
  bounds: ConcurrencyBounds,
  stepSize: number,
): number[] | null {
  const spec = concurrencySpecOf(point);
  if (spec.kind === 'list') {
    return filterConcurrencyList(spec.values, bounds);
  }
  const range = narrowConcurrencyRange(spec, bounds);
  return range === null ? null : expandConcurrencyRange(range.start, range.end, stepSize);
}

export function expandSingleNodeConfig(
  key: string,
  config: SingleNodeConfigEntry,
  nodes: readonly string[],
  settings: ExpansionSettings,
): SingleNodeMatrixEntry[] {
  const entries: SingleNodeMatrixEntry[] = [];

  for (const profile of config[Field.SeqLenConfigs]) {
    const isl = profile[Field.Isl];
    const osl = profile[Field.Osl];
    if (!settings.seqLenMatches(isl, osl)) continue;

    profile[Field.SearchSpace].forEach((point, index) => {
      const parallelism = clampParallelism(
        { tp: point[Field.Tp], ep: point[Field.Ep] },
        settings.bounds,
      );
      const concValues =
        parallelism === null
          ? null
          : resolveSingleNodeConcurrency(point, settings.bounds, settings.stepSize);
      if (parallelism === null || concValues === null) {
        settings.logger?.debug(`full-sweep: dropped ${describePoint(key, isl, osl, index)} by bounds`);
        return;
      }

      const ctx = entryContextOf(config, isl, osl, point[Field.SpecDecoding]);
      for (const conc of concValues) {
        for (const runner of nodes) {
          const entry = buildSingleNodeEntry(ctx, {
            runner,
            tp: parallelism.tp,
            ep: parallelism.ep ?? 1,
            dpAttn: point[Field.DpAttn] ?? false,
            conc,
          });
          entries.push(validateMatrixEntry(entry, false));
        }
      }
    });
  }

  return entries;
}

/**
 * Multinode lists are expanded first and then filtered by `min_conc`/`max_conc`;
 * TP/EP bounds do not apply to prefill/decode workers.
 */
export function expandMultinodeConfig(
  key: string,
  config: MultinodeConfigEntry,
  nodes: readonly string[],
  settings: ExpansionSettings,
): MultinodeMatrixEntry[] {
  const entries: MultinodeMatrixEntry[] = [];

  for (const profile of config[Field.SeqLenConfigs]) {
    const isl = profile[Field.Isl];
    const osl = profile[Field.Osl];
    if (!settings.seqLenMatches(isl, osl)) continue;

    profile[Field.SearchSpace].forEach((point, index) => {
      const expanded = expandConcurrency(concurrencySpecOf(point), settings.stepSize);
      const conc = filterConcurrencyList(expanded, settings.bounds);
      if (conc === null) {
        settings.logger?.debug(`full-sweep: dropped ${describePoint(key, isl, osl, index)} by bounds`);
        return;
      }

      const ctx = entryContextOf(config, isl, osl, point[Field.SpecDecoding]);
      for (const runner of nodes) {
        const entry = buildMultinodeEntry(ctx, {
          runner,
          prefill: point[Field.Prefill],
          decode: point[Field.Decode],
          conc: [...conc],
        });
        entries.push(validateMatrixEntry(entry, true));
      }
    });
  }

  return entries;
}

export function generateFullSweep(
  catalog: ConfigCatalog,
  runners: RunnerCatalog,
  options: FullSweepOptions,
  logger?: Logger,
): MatrixEntry[] {
  assertKnownRunnerTypes(options.runnerType, runners);

  const settings: ExpansionSettings = {
    bounds: options,
    stepSize: options.stepSize ?? DEFAULT_STEP_SIZE,
    seqLenMatches: seqLenPredicate(options.seqLens),
    logger,
  };

  const matrix: MatrixEntry[] = [];
  for (const [key, config] of filterCatalog(catalog, options)) {
    const nodes = resolveRunnerNodes(config[Field.Runner], runners, options.runnerNodeFilter);
    if (nodes === null) {
      logger?.debug(
        `full-sweep: skipping ${key}, no ${config[Field.Runner]} node matches "${options.runnerNodeFilter}"`,
      );
      continue;
    }

    if (isMultinodeConfig(config)) {
      if (options.nodeMode !== 'multi-node') continue;
      matrix.push(...expandMultinodeConfig(key, config, nodes, settings));
    } else {
      if (options.nodeMode !== 'single-node') continue;
      matrix.push(...expandSingleNodeConfig(key, config, nodes, settings));
    }
  }

  logger?.debug(`full-sweep: ${matrix.length} entries from ${catalog.size} configs`);
  return matrix;
}
