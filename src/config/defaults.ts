import type { SeqLenName } from '../matrix/seq-len';

/** Runner inventory read when `--runner-config` is not given. */
export const DEFAULT_RUNNER_CONFIG = '.github/configs/runners.yaml';

/** Concurrency multiplier for `full-sweep` when `--step-size` is not given. */
export const DEFAULT_STEP_SIZE = 2;

/** `test-config` always expands ranges with this step, whatever `--step-size` says. */
export const TEST_CONFIG_STEP_SIZE = 2;

/** Added to isl + osl to size the serving context window. */
export const MAX_MODEL_LEN_HEADROOM = 200;

/** Profile whose entries are candidates for accuracy evals. */
export const EVAL_SEQ_LEN: SeqLenName = '1k8k';

/** Spec-decoding mode assumed when a point does not name one. */
export const DEFAULT_SPEC_DECODING = 'none';

/** Environment variable consulted when `--log-level` is absent. */
export const LOG_LEVEL_ENV_VAR = 'SWEEP_LOG_LEVEL';
