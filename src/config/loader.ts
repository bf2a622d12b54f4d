import * as fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { ZodType, ZodTypeDef } from 'zod';
import { ConfigValidationError, formatIssues } from '../errors';
import { Field } from '../matrix/fields';
import {
  ConfigCatalog,
  ConfigEntry,
  RunnerCatalog,
  configFileSchema,
  multinodeConfigSchema,
  runnerFileSchema,
  singleNodeConfigSchema,
} from './schema';

function readYamlFile(filePath: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigValidationError(filePath, `  could not read file: ${reason}`);
  }
  try {
    return parseYaml(text);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigValidationError(filePath, `  YAML syntax error: ${reason}`);
  }
}

function parseWith<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  value: unknown,
  filePath: string,
  prefix: string[] = [],
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      ...issue,
      path: [...prefix, ...issue.path],
    }));
    throw new ConfigValidationError(filePath, formatIssues(issues));
  }
  return result.data;
}

function isMultinodeRaw(value: unknown): boolean {
  return typeof value === 'object' && value !== null && Reflect.get(value, Field.Multinode) === true;
}

function parseConfigEntry(key: string, value: unknown, filePath: string): ConfigEntry {
  if (isMultinodeRaw(value)) {
    return parseWith(multinodeConfigSchema, value, filePath, [key]);
  }
  return parseWith(singleNodeConfigSchema, value, filePath, [key]);
}

/**
 * Load and validate one or more master config files into a single catalog.
 * Keys keep file order, files keep argument order. A key defined twice is an error.
 */
export function loadConfigFiles(filePaths: readonly string[]): ConfigCatalog {
  const catalog = new Map<string, ConfigEntry>();
  const origin = new Map<string, string>();

  for (const filePath of filePaths) {
    const raw = parseWith(configFileSchema, readYamlFile(filePath) ?? {}, filePath);
    for (const [key, value] of Object.entries(raw)) {
      const previous = origin.get(key);
      if (previous !== undefined) {
        throw new ConfigValidationError(
          filePath,
          `  ${key}: duplicate config key (already defined in "${previous}")`,
        );
      }
      catalog.set(key, parseConfigEntry(key, value, filePath));
      origin.set(key, filePath);
    }
  }

  return catalog;
}

/** Load the runner inventory: runner type → node identifiers. */
export function loadRunnerFile(filePath: string): RunnerCatalog {
  const raw = parseWith(runnerFileSchema, readYamlFile(filePath) ?? {}, filePath);
  return new Map(Object.entries(raw));
}
