import type { ZodIssue } from 'zod';

/** Render schema issues as `path: message` lines. */
export function formatIssues(issues: readonly ZodIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `  ${path}: ${issue.message}`;
    })
    .join('\n');
}

export class ConfigValidationError extends Error {
  readonly filePath: string;

  constructor(filePath: string, detail: string) {
    super(`Invalid config file "${filePath}":\n${detail}`);
    this.name = 'ConfigValidationError';
    this.filePath = filePath;
  }
}

export class UnknownRunnerTypeError extends Error {
  readonly unknownTypes: string[];

  readonly validTypes: string[];

  constructor(unknownTypes: string[], validTypes: string[]) {
    const valid = [...validTypes].sort();
    super(
      `Invalid runner type(s): ${unknownTypes.join(', ')}. Valid runner types are: ${valid.join(', ')}`,
    );
    this.name = 'UnknownRunnerTypeError';
    this.unknownTypes = unknownTypes;
    this.validTypes = valid;
  }
}

export class RunnerNodeFilterError extends Error {
  readonly runnerType: string;

  readonly filter: string;

  constructor(runnerType: string, filter: string) {
    super(`No runner nodes found matching filter '${filter}' for runner type '${runnerType}'.`);
    this.name = 'RunnerNodeFilterError';
    this.runnerType = runnerType;
    this.filter = filter;
  }
}

export class MissingConfigKeysError extends Error {
  readonly missingKeys: string[];

  readonly availableKeys: string[];

  constructor(missingKeys: string[], availableKeys: string[]) {
    const available = [...availableKeys].sort();
    super(
      `Config key(s) not found: ${missingKeys.join(', ')}.\nAvailable keys: ${available.join(', ')}`,
    );
    this.name = 'MissingConfigKeysError';
    this.missingKeys = missingKeys;
    this.availableKeys = available;
  }
}

export class MatrixEntryValidationError extends Error {
  readonly entry: unknown;

  readonly issues: readonly ZodIssue[];

  constructor(entry: unknown, issues: readonly ZodIssue[], isMultinode: boolean) {
    const shape = isMultinode ? 'multinode' : 'single-node';
    super(
      `Invalid ${shape} matrix entry ${JSON.stringify(entry)}:\n${formatIssues(issues)}`,
    );
    this.name = 'MatrixEntryValidationError';
    this.entry = entry;
    this.issues = issues;
  }
}
