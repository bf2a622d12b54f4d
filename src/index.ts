export { loadConfigFiles, loadRunnerFile } from './config/loader';
export { isMultinodeConfig } from './config/schema';
export type {
  ConfigCatalog,
  ConfigEntry,
  MultinodeConfigEntry,
  MultinodePoint,
  RunnerCatalog,
  SingleNodeConfigEntry,
  SingleNodePoint,
  WorkerConfig,
} from './config/schema';
export * from './errors';
export { clampParallelism, filterConcurrencyList, narrowConcurrencyRange } from './matrix/clamp';
export type { ConcurrencyBounds, ParallelismBounds } from './matrix/clamp';
export { expandConcurrency, expandConcurrencyRange } from './matrix/concurrency';
export { isSingleNodeEntry, validateMatrixEntry } from './matrix/entry';
export type { MatrixEntry, MultinodeMatrixEntry, SingleNodeMatrixEntry } from './matrix/entry';
export { evalEntriesOnly, markEvalEntries, selectEvalIndices } from './matrix/evals';
export { Field } from './matrix/fields';
export type { CatalogFilters } from './matrix/filters';
export { generateFullSweep } from './matrix/full-sweep';
export type { FullSweepOptions } from './matrix/full-sweep';
export { generateRunnerModelSweep } from './matrix/runner-model-sweep';
export type { RunnerModelSweepOptions } from './matrix/runner-model-sweep';
export { experimentName, maxModelLen, SEQ_LENS, seqLenToName } from './matrix/seq-len';
export type { SeqLenName } from './matrix/seq-len';
export { generateTestConfigSweep } from './matrix/test-config';
export type { TestConfigOptions } from './matrix/test-config';
export type { NodeMode } from './matrix/types';
export { Logger } from './utils/logger';
export type { LogLevel } from './utils/logger';
