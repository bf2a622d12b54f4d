import { LOG_LEVEL_ENV_VAR } from '../config/defaults';
import { isLogLevel, LogLevel } from './logger';

/**
 * Resolve the log level: explicit value first, then SWEEP_LOG_LEVEL, then `info`.
 * Unknown values are rejected rather than ignored.
 */
export function resolveLogLevel(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  const raw = (explicit ?? env[LOG_LEVEL_ENV_VAR] ?? '').trim().toLowerCase();
  if (raw === '') return 'info';
  if (!isLogLevel(raw)) {
    const source = explicit !== undefined ? '--log-level' : LOG_LEVEL_ENV_VAR;
    throw new Error(`Invalid ${source} "${raw}". Expected one of: info, debug, trace`);
  }
  return raw;
}
