/**
 * `runner-model-sweep`: check that every node of one runner type can serve
 * every config aimed at that type.
 *
 * Each matching config contributes one representative point from its 1k1k
 * profile, repeated once per node.
 */

import {
  ConfigCatalog,
  isMultinodeConfig,
  MultinodeConfigEntry,
  MultinodePoint,
  RunnerCatalog,
  SingleNodeConfigEntry,
  SingleNodePoint,
  WorkerConfig,
} from '../config/schema';
import { Logger } from '../utils/logger';
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
import { CatalogFilters, filterCatalog, requireRunnerNodes } from './filters';
import { SEQ_LENS, SeqLen, seqLenToName } from './seq-len';
import { NodeMode } from './types';

export interface RunnerModelSweepOptions extends Omit<CatalogFilters, 'runnerType'> {
  runnerType: string;
  nodeMode: NodeMode;
  /** Concurrency used for every entry instead of the one picked from the config. */
  conc?: number;
  runnerNodeFilter?: string;
}

function lowestConc(point: MultinodePoint): number {
  const list = point[Field.ConcList];
  return list !== undefined && list.length > 0 ? Math.min(...list) : Number.POSITIVE_INFINITY;
}

/** The point with the lowest concurrency; points without a list rank last, first wins ties. */
export function selectLowestConcPoint(points: readonly MultinodePoint[]): MultinodePoint | undefined {
  let best: MultinodePoint | undefined;
  for (const point of points) {
    if (best === undefined || lowestConc(point) < lowestConc(best)) best = point;
  }
  return best;
}

/** The point with the highest TP; first wins ties. */
export function selectHighestTpPoint(points: readonly SingleNodePoint[]): SingleNodePoint | undefined {
  let best: SingleNodePoint | undefined;
  for (const point of points) {
    if (best === undefined || point[Field.Tp] > best[Field.Tp]) best = point;
  }
  return best;
}

function multinodeConcurrency(point: MultinodePoint): number {
  const list = point[Field.ConcList];
  if (list !== undefined && list.length > 0) return Math.min(...list);
  return point[Field.ConcStart] ?? 1;
}

function singleNodeConcurrency(point: SingleNodePoint): number {
  const start = point[Field.ConcStart];
  if (start !== undefined && start > 0) return start;
  const list = point[Field.ConcList];
  return list !== undefined && list.length > 0 ? Math.min(...list) : 1;
}

function matchesProfile(
  profile: { [Field.Isl]: number; [Field.Osl]: number },
  target: SeqLen,
): boolean {
  return profile[Field.Isl] === target.isl && profile[Field.Osl] === target.osl;
}

function withSettingsDefault(worker: WorkerConfig): WorkerConfig {
  return { ...worker, [Field.AdditionalSettings]: worker[Field.AdditionalSettings] ?? [] };
}

function sweepMultinodeConfig(
  config: MultinodeConfigEntry,
  nodes: readonly string[],
  target: SeqLen,
  concOverride: number | undefined,
): MultinodeMatrixEntry[] | null {
  const profile = config[Field.SeqLenConfigs].find((p) => matchesProfile(p, target));
  const point = profile && selectLowestConcPoint(profile[Field.SearchSpace]);
  if (point === undefined) return null;

  const ctx = entryContextOf(config, target.isl, target.osl, point[Field.SpecDecoding]);
  const conc = concOverride ?? multinodeConcurrency(point);
  return nodes.map((runner) =>
    validateMatrixEntry(
      buildMultinodeEntry(ctx, {
        runner,
        prefill: withSettingsDefault(point[Field.Prefill]),
        decode: withSettingsDefault(point[Field.Decode]),
        conc: [conc],
      }),
      true,
    ),
  );
}

function sweepSingleNodeConfig(
  config: SingleNodeConfigEntry,
  nodes: readonly string[],
  target: SeqLen,
  concOverride: number | undefined,
): SingleNodeMatrixEntry[] | null {
  const profile = config[Field.SeqLenConfigs].find((p) => matchesProfile(p, target));
  const point = profile && selectHighestTpPoint(profile[Field.SearchSpace]);
  if (point === undefined) return null;

  const ctx = entryContextOf(config, target.isl, target.osl, point[Field.SpecDecoding]);
  const conc = concOverride ?? singleNodeConcurrency(point);
  return nodes.map((runner) =>
    validateMatrixEntry(
      buildSingleNodeEntry(ctx, {
        runner,
        tp: point[Field.Tp],
        ep: point[Field.Ep] ?? 1,
        dpAttn: point[Field.DpAttn] ?? false,
        conc,
      }),
      false,
    ),
  );
}

export function generateRunnerModelSweep(
  catalog: ConfigCatalog,
  runners: RunnerCatalog,
  options: RunnerModelSweepOptions,
  logger?: Logger,
): MatrixEntry[] {
  const nodes = requireRunnerNodes(options.runnerType, runners, options.runnerNodeFilter);
  const target = SEQ_LENS['1k1k'];

  const selected = filterCatalog(catalog, {
    modelPrefix: options.modelPrefix,
    precision: options.precision,
    framework: options.framework,
    runnerType: [options.runnerType],
  });

  const matrix: MatrixEntry[] = [];
  for (const [key, config] of selected) {
    let entries: MatrixEntry[] | null;
    if (isMultinodeConfig(config)) {
      if (options.nodeMode !== 'multi-node') continue;
      entries = sweepMultinodeConfig(config, nodes, target, options.conc);
    } else {
      if (options.nodeMode !== 'single-node') continue;
      entries = sweepSingleNodeConfig(config, nodes, target, options.conc);
    }

    if (entries === null) {
      const name = seqLenToName(target.isl, target.osl);
      logger?.debug(`runner-model-sweep: skipping ${key}, no ${name} profile`);
      continue;
    }
    matrix.push(...entries);
  }

  logger?.debug(
    `runner-model-sweep: ${matrix.length} entries across ${nodes.length} ${options.runnerType} nodes`,
  );
  return matrix;
}
