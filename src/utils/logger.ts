export type LogLevel = 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['info', 'debug', 'trace'];

const LEVEL_RANK: Record<LogLevel, number> = { trace: 0, debug: 1, info: 2 };

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/** Anything with a `write`, e.g. `process.stderr`. */
export interface LogSink {
  write(chunk: string): unknown;
}

function ts(): string {
  return new Date().toISOString().slice(11, 23);
}

/**
 * Diagnostics go to stderr so stdout carries nothing but the JSON matrix.
 */
export class Logger {
  private readonly sink: LogSink;
  private level: LogLevel = 'info';

  constructor(sink: LogSink = process.stderr) {
    this.sink = sink;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private appendLine(line: string): void {
    this.sink.write(`${line}\n`);
  }

  // ─────────────────────────────────────────────────────────────────
  // Basic logging methods
  // ─────────────────────────────────────────────────────────────────

  info(msg: string): void {
    this.appendLine(`[INFO  ${ts()}] ${msg}`);
  }

  debug(msg: string): void {
    if (LEVEL_RANK[this.level] <= LEVEL_RANK.debug) {
      this.appendLine(`[DEBUG ${ts()}] ${msg}`);
    }
  }

  trace(msg: string): void {
    if (LEVEL_RANK[this.level] <= LEVEL_RANK.trace) {
      this.appendLine(`[TRACE ${ts()}] ${msg}`);
    }
  }

  error(msg: string, err?: unknown): void {
    const suffix = err instanceof Error ? `: ${err.message}` : err ? `: ${String(err)}` : '';
    this.appendLine(`[ERROR ${ts()}] ${msg}${suffix}`);
  }

  // ─────────────────────────────────────────────────────────────────
  // Trace content blocks (trace level only)
  // ─────────────────────────────────────────────────────────────────

  /** Log a labeled multi-line block, indented under its label. */
  traceBlock(label: string, content: string): void {
    if (LEVEL_RANK[this.level] > LEVEL_RANK.trace) { return; }

    const indented = content.split('\n').map(line => `          ${line}`).join('\n');
    this.appendLine(`[TRACE]   ${label}:`);
    this.appendLine(indented);
  }
}
