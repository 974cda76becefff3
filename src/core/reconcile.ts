import { CallGraphFacts, Component, Logger } from '../types';
import { consoleLogger, logVerbose } from '../utils/log';
import { callSiteKey } from './callgraph';
import { ComponentCatalog } from './catalog';
import { BUILTIN_CALLEE_PREFIX, PACKAGE_INIT_MODULE } from './constants';
import { ModuleIndex } from './modules';
import { SymbolOriginResolver } from './resolver';

/** Component ids indexed by their last one and last two dotted segments. */
export type SuffixIndex = Map<string, string[]>;

export interface ReconcileContext {
  catalog: ComponentCatalog;
  modules: ModuleIndex;
  resolver: SymbolOriginResolver;
  suffixIndex: SuffixIndex;
  caller: Component;
}

/** Maps a raw callee string to a catalog id, or gives up with `null`. */
export type ReconcileStrategy = (callee: string, context: ReconcileContext) => string | null;

export interface ReconcileOptions {
  modules: ModuleIndex;
  resolver: SymbolOriginResolver;
  strategies?: readonly ReconcileStrategy[];
  verbose?: boolean;
  logger?: Logger;
}

export interface ReconcileStats {
  callSites: number;
  unknownCallSites: number;
  linked: number;
  skippedBuiltins: number;
  unresolved: number;
}

export function normalizeSeparators(value: string): string {
  return value
    .replace(/[\\/]+/g, '.')
    .replace(/\.{2,}/g, '.')
    .replace(/^\.+|\.+$/g, '');
}

/**
 * Catalog id for a dotted path, also trying the spelling where a package's
 * `__init__` module sits between the package and the name.
 */
export function findComponentId(catalog: ComponentCatalog, dottedPath: string): string | null {
  if (!dottedPath) {
    return null;
  }
  if (catalog.has(dottedPath)) {
    return dottedPath;
  }
  const parts = dottedPath.split('.');
  for (let i = parts.length - 1; i >= 0; i -= 1) {
    const candidate = [...parts.slice(0, i), PACKAGE_INIT_MODULE, ...parts.slice(i)].join('.');
    if (catalog.has(candidate)) {
      return candidate;
    }
  }
  return null;
}

function stripRootPackage(dottedPath: string, rootPackage: string): string {
  return dottedPath.startsWith(`${rootPackage}.`) ? dottedPath.slice(rootPackage.length + 1) : dottedPath;
}

export function buildSuffixIndex(catalog: ComponentCatalog): SuffixIndex {
  const index: SuffixIndex = new Map();
  const add = (key: string, id: string): void => {
    const bucket = index.get(key);
    if (bucket) {
      bucket.push(id);
    } else {
      index.set(key, [id]);
    }
  };

  for (const id of catalog.ids()) {
    const parts = id.split('.');
    add(parts[parts.length - 1], id);
    if (parts.length >= 2) {
      add(parts.slice(-2).join('.'), id);
    }
  }
  return index;
}

/** Length of the longest common subsequence of two segment lists. */
export function lcsLength(a: readonly string[], b: readonly string[]): number {
  if (a.length === 0 || b.length === 0) {
    return 0;
  }
  let previous = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i += 1) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j += 1) {
      current[j] = a[i - 1] === b[j - 1] ? previous[j - 1] + 1 : Math.max(previous[j], current[j - 1]);
    }
    previous = current;
  }
  return previous[b.length];
}

export const matchNormalized: ReconcileStrategy = (callee, { catalog }) =>
  findComponentId(catalog, normalizeSeparators(callee));

export const matchRootPrefix: ReconcileStrategy = (callee, { catalog, modules }) => {
  const normalized = normalizeSeparators(callee);
  const root = modules.rootPackage;
  if (normalized.startsWith(`${root}.`)) {
    return findComponentId(catalog, normalized.slice(root.length + 1));
  }
  return findComponentId(catalog, `${root}.${normalized}`);
};

/** Reads the callee relative to each enclosing package of the caller, innermost first. */
export const matchCallerPackage: ReconcileStrategy = (callee, { catalog, modules, caller }) => {
  const normalized = stripRootPackage(normalizeSeparators(callee), modules.rootPackage);
  const parts = modules.importPathOf(caller.filePath).split('.').filter(Boolean);
  for (let i = parts.length; i >= 1; i -= 1) {
    const found = findComponentId(catalog, `${parts.slice(0, i).join('.')}.${normalized}`);
    if (found) {
      return found;
    }
  }
  return null;
};

function qualifierIsPlausible(qualifier: string[], context: ReconcileContext): boolean {
  if (qualifier.length === 0) {
    return true;
  }
  const head = qualifier[0];
  return context.modules.isRepoModule(head) || context.suffixIndex.has(head);
}

/**
 * Follows the callee's trailing segments through the caller's imports; if
 * that fails, picks among components sharing those segments the one whose
 * path best overlaps the callee and the caller's module.
 */
export const matchResolverSeeded: ReconcileStrategy = (callee, context) => {
  const { catalog, modules, resolver, suffixIndex, caller } = context;
  const parts = stripRootPackage(normalizeSeparators(callee), modules.rootPackage).split('.').filter(Boolean);
  if (parts.length === 0) {
    return null;
  }

  const keys = parts.length >= 2 ? [parts.slice(-2).join('.'), parts[parts.length - 1]] : [parts[0]];

  for (const key of keys) {
    const found = resolver.findTrueOrigin(caller.filePath, key);
    if (!found) {
      continue;
    }
    const id = findComponentId(catalog, resolver.toComponentId(found)) ?? findComponentId(catalog, resolver.toDottedPath(found));
    if (id) {
      return id;
    }
  }

  const qualifier = parts.slice(0, -1);
  if (!qualifierIsPlausible(qualifier, context)) {
    return null;
  }

  const callerModule = modules.importPathOf(caller.filePath).split('.').filter(Boolean);
  for (const key of keys) {
    const candidates = suffixIndex.get(key);
    if (!candidates || candidates.length === 0) {
      continue;
    }
    let best: { id: string; score: number } | null = null;
    for (const id of candidates) {
      const segments = id.split('.');
      const score = lcsLength(segments, qualifier) + lcsLength(segments, callerModule);
      if (
        !best ||
        score > best.score ||
        (score === best.score && (id.length < best.id.length || (id.length === best.id.length && id < best.id)))
      ) {
        best = { id, score };
      }
    }
    if (best) {
      return best.id;
    }
  }
  return null;
};

export const DEFAULT_STRATEGIES: readonly ReconcileStrategy[] = [
  matchNormalized,
  matchRootPrefix,
  matchCallerPackage,
  matchResolverSeeded,
];

export function reconcileCallee(
  callee: string,
  context: ReconcileContext,
  strategies: readonly ReconcileStrategy[] = DEFAULT_STRATEGIES,
): string | null {
  for (const strategy of strategies) {
    const id = strategy(callee, context);
    if (id) {
      return id;
    }
  }
  return null;
}

function callerIndex(catalog: ComponentCatalog): Map<string, string> {
  const byKey = new Map<string, string>();
  for (const component of catalog.values()) {
    byKey.set(callSiteKey(component), component.id);
  }
  return byKey;
}

/**
 * Turns call-graph facts into `dependsOn` edges. Callees that no strategy
 * can place in the catalog are dropped.
 */
export function reconcileCallGraph(
  catalog: ComponentCatalog,
  facts: CallGraphFacts,
  options: ReconcileOptions,
): ReconcileStats {
  const logger = options.logger ?? consoleLogger;
  const verbose = options.verbose ?? false;
  const strategies = options.strategies ?? DEFAULT_STRATEGIES;
  const suffixIndex = buildSuffixIndex(catalog);
  const byKey = callerIndex(catalog);
  const stats: ReconcileStats = { callSites: 0, unknownCallSites: 0, linked: 0, skippedBuiltins: 0, unresolved: 0 };

  for (const key of Object.keys(facts).sort((a, b) => a.localeCompare(b))) {
    stats.callSites += 1;
    const normalizedKey = stripRootPackage(normalizeSeparators(key), options.modules.rootPackage);
    const callerId = byKey.get(key) ?? findComponentId(catalog, normalizedKey);
    const caller = callerId ? catalog.get(callerId) : undefined;
    if (!caller) {
      // Module-level code and external callers have no component.
      stats.unknownCallSites += 1;
      continue;
    }

    const context: ReconcileContext = {
      catalog,
      modules: options.modules,
      resolver: options.resolver,
      suffixIndex,
      caller,
    };

    for (const callee of facts[key]) {
      if (callee.startsWith(BUILTIN_CALLEE_PREFIX)) {
        stats.skippedBuiltins += 1;
        continue;
      }
      const target = reconcileCallee(callee, context, strategies);
      if (!target) {
        stats.unresolved += 1;
        logVerbose(verbose, `[reconcile] ${caller.id}: no component for ${callee}`, logger);
        continue;
      }
      if (catalog.addDependency(caller.id, target)) {
        stats.linked += 1;
      }
    }
  }

  logVerbose(
    verbose,
    `[reconcile] ${stats.linked} edges from ${stats.callSites} call sites (${stats.unresolved} callees unresolved)`,
    logger,
  );
  return stats;
}
