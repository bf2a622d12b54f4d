import { ConfigCatalog, ConfigEntry, RunnerCatalog } from '../config/schema';
import { RunnerNodeFilterError, UnknownRunnerTypeError } from '../errors';
import { Field } from './fields';
import { SEQ_LENS, SeqLenName } from './seq-len';

/** Optional catalog predicates. Absent or empty means "match all". */
export interface CatalogFilters {
  modelPrefix?: readonly string[];
  precision?: readonly string[];
  framework?: readonly string[];
  runnerType?: readonly string[];
}

function isActive(values: readonly string[] | undefined): values is readonly string[] {
  return values !== undefined && values.length > 0;
}

/** Model-prefix matches the start of the catalog key, not the entry's model-prefix field. */
export function matchesCatalogFilters(
  key: string,
  config: ConfigEntry,
  filters: CatalogFilters,
): boolean {
  if (isActive(filters.modelPrefix) && !filters.modelPrefix.some((p) => key.startsWith(p))) {
    return false;
  }
  if (isActive(filters.precision) && !filters.precision.includes(config[Field.Precision])) {
    return false;
  }
  if (isActive(filters.framework) && !filters.framework.includes(config[Field.Framework])) {
    return false;
  }
  if (isActive(filters.runnerType) && !filters.runnerType.includes(config[Field.Runner])) {
    return false;
  }
  return true;
}

/** New catalog holding the matching entries, in their original order. */
export function filterCatalog(catalog: ConfigCatalog, filters: CatalogFilters): ConfigCatalog {
  const kept = new Map<string, ConfigEntry>();
  for (const [key, config] of catalog) {
    if (matchesCatalogFilters(key, config, filters)) kept.set(key, config);
  }
  return kept;
}

/** Predicate over `(isl, osl)`; no names means every profile passes. */
export function seqLenPredicate(
  names: readonly SeqLenName[] | undefined,
): (isl: number, osl: number) => boolean {
  if (names === undefined || names.length === 0) return () => true;
  const wanted = names.map((name) => SEQ_LENS[name]);
  return (isl, osl) => wanted.some((s) => s.isl === isl && s.osl === osl);
}

/** Fail before any expansion if a requested runner type is not in the inventory. */
export function assertKnownRunnerTypes(
  runnerTypes: readonly string[] | undefined,
  runners: RunnerCatalog,
): void {
  if (!isActive(runnerTypes)) return;
  const unknown = [...new Set(runnerTypes)].filter((type) => !runners.has(type));
  if (unknown.length > 0) {
    throw new UnknownRunnerTypeError(unknown, [...runners.keys()]);
  }
}

/**
 * Nodes a config runs on.
 *
 * Without a node filter the declared runner is used as-is. With one, the
 * runner type fans out to every inventory node containing the substring;
 * `null` means nothing matched and the config should be skipped.
 */
export function resolveRunnerNodes(
  runner: string,
  runners: RunnerCatalog,
  nodeFilter: string | undefined,
): string[] | null {
  if (nodeFilter === undefined || nodeFilter === '') return [runner];
  const nodes = (runners.get(runner) ?? []).filter((node) => node.includes(nodeFilter));
  return nodes.length > 0 ? nodes : null;
}

/**
 * Every node of one runner type, optionally narrowed by substring.
 * Unlike {@link resolveRunnerNodes}, an unknown type or an empty match is an error.
 */
export function requireRunnerNodes(
  runnerType: string,
  runners: RunnerCatalog,
  nodeFilter: string | undefined,
): string[] {
  const nodes = runners.get(runnerType);
  if (nodes === undefined || nodes.length === 0) {
    throw new UnknownRunnerTypeError([runnerType], [...runners.keys()]);
  }
  if (nodeFilter === undefined || nodeFilter === '') return [...nodes];

  const matched = nodes.filter((node) => node.includes(nodeFilter));
  if (matched.length === 0) {
    throw new RunnerNodeFilterError(runnerType, nodeFilter);
  }
  return matched;
}
