import { beforeAll, describe, expect, test } from 'vitest';

import { ComponentCatalog } from '../core/catalog';
import { callSiteKey } from '../core/callgraph';
import { extractComponents } from '../core/extractor';
import {
  buildSuffixIndex,
  findComponentId,
  lcsLength,
  matchCallerPackage,
  matchNormalized,
  matchResolverSeeded,
  matchRootPrefix,
  normalizeSeparators,
  ReconcileContext,
  reconcileCallee,
  reconcileCallGraph,
} from '../core/reconcile';
import { SymbolOriginResolver } from '../core/resolver';
import { Component } from '../types';
import { captureLogger, makeTempRepo, py, repoFiles } from './fixtures';

const FILES: Record<string, string> = {
  'pkg/__init__.py': py('def setup():', '    return None'),
  'pkg/mod.py': py('def foo():', '    return 1', '', '', 'def bar():', '    return foo()'),
  'pkg/other.py': py('def foo():', '    return 2'),
  'pkg/service.py': py(
    'from .mod import foo as fetch',
    '',
    '',
    'class Service:',
    '    def run(self):',
    '        return fetch()',
    '',
    '    def stop(self):',
    '        return helper()',
    '',
    '',
    'def helper():',
    '    return None',
  ),
  'pkg/sub/__init__.py': '',
  'pkg/sub/worker.py': py('def work():', '    return 0'),
};

describe('call-graph reconciliation', () => {
  let catalog: ComponentCatalog;
  let makeContext: (callerId: string) => ReconcileContext;
  let reconcileOptions: () => Parameters<typeof reconcileCallGraph>[2];

  beforeAll(async () => {
    const root = makeTempRepo(FILES);
    const extraction = await extractComponents({ rootDir: root, files: repoFiles(root, FILES), logger: captureLogger() });
    catalog = new ComponentCatalog(extraction.components);
    const resolver = new SymbolOriginResolver({ modules: extraction.modules, cache: extraction.cache });
    const suffixIndex = buildSuffixIndex(catalog);

    makeContext = (callerId) => {
      const caller: Component | undefined = catalog.get(callerId);
      if (!caller) {
        throw new Error(`no component ${callerId}`);
      }
      return { catalog, modules: extraction.modules, resolver, suffixIndex, caller };
    };
    reconcileOptions = () => ({ modules: extraction.modules, resolver, logger: captureLogger() });
  });

  test('normalizes mixed separators', () => {
    expect(normalizeSeparators('pkg/mod\\foo')).toBe('pkg.mod.foo');
    expect(normalizeSeparators('/pkg//mod.foo.')).toBe('pkg.mod.foo');
  });

  test('finds ids of definitions made in a package __init__', () => {
    expect(findComponentId(catalog, 'pkg.setup')).toBe('pkg.__init__.setup');
    expect(findComponentId(catalog, 'pkg.mod.foo')).toBe('pkg.mod.foo');
    expect(findComponentId(catalog, 'pkg.missing')).toBeNull();
  });

  test('builds call-site keys from the file path and qualified name', () => {
    const run = catalog.get('pkg.service.Service.run');
    expect(run && callSiteKey(run)).toBe('pkg/service.Service.run');
  });

  test('each strategy handles its own spelling', () => {
    const bar = makeContext('pkg.mod.bar');
    expect(matchNormalized('pkg/mod.foo', bar)).toBe('pkg.mod.foo');
    expect(matchNormalized('repo_root.pkg.mod.foo', bar)).toBeNull();
    expect(matchRootPrefix('repo_root.pkg.mod.foo', bar)).toBe('pkg.mod.foo');

    const stop = makeContext('pkg.service.Service.stop');
    expect(matchCallerPackage('helper', stop)).toBe('pkg.service.helper');
    expect(matchCallerPackage('mod.foo', stop)).toBe('pkg.mod.foo');

    const run = makeContext('pkg.service.Service.run');
    expect(matchResolverSeeded('fetch', run)).toBe('pkg.mod.foo');
  });

  test('the seeded strategy breaks ties by the shortest id', () => {
    const work = makeContext('pkg.sub.worker.work');
    expect(reconcileCallee('pkg.foo', work)).toBe('pkg.mod.foo');
  });

  test('the seeded strategy ignores callees qualified by foreign modules', () => {
    const work = makeContext('pkg.sub.worker.work');
    expect(reconcileCallee('requests.api.foo', work)).toBeNull();
  });

  test('measures overlap as a longest common subsequence of segments', () => {
    expect(lcsLength(['pkg', 'mod', 'foo'], ['pkg', 'foo'])).toBe(2);
    expect(lcsLength(['a', 'b', 'c'], ['c', 'b', 'a'])).toBe(1);
    expect(lcsLength([], ['a'])).toBe(0);
  });

  test('adds edges for reconciled callees and drops the rest', () => {
    const stats = reconcileCallGraph(
      catalog,
      {
        'pkg/mod.bar': ['repo_root.pkg.mod.foo', '<builtin>.print', 'pkg/mod.bar'],
        'pkg/service': ['pkg.service.Service'],
        'pkg/service.Service.run': ['pkg.mod.foo'],
        'pkg/service.Service.stop': ['helper', 'external.lib.call'],
      },
      reconcileOptions(),
    );
    catalog.rebuildUsedBy();

    expect(stats).toEqual({ callSites: 4, unknownCallSites: 1, linked: 3, skippedBuiltins: 1, unresolved: 1 });
    expect(Array.from(catalog.get('pkg.mod.bar')?.dependsOn ?? [])).toEqual(['pkg.mod.foo']);
    expect(Array.from(catalog.get('pkg.service.Service.stop')?.dependsOn ?? [])).toEqual(['pkg.service.helper']);
    expect(Array.from(catalog.get('pkg.mod.foo')?.usedBy ?? []).sort()).toEqual([
      'pkg.mod.bar',
      'pkg.service.Service.run',
    ]);
    for (const component of catalog.values()) {
      expect(component.dependsOn.has(component.id)).toBe(false);
    }
  });
});
