import { describe, expect, test } from 'vitest';

import { ComponentCatalog, serializeComponent } from '../core/catalog';
import { extractComponents } from '../core/extractor';
import { SymbolOriginResolver } from '../core/resolver';
import { addClassMethodEdges, addDecoratorEdges, addInheritanceEdges } from '../core/structural';
import { captureLogger, makeTempRepo, py, repoFiles } from './fixtures';

const FILES: Record<string, string> = {
  'pkg/__init__.py': '',
  'pkg/decorators.py': py(
    'def register(fn):',
    '    return fn',
    '',
    '',
    'def traced(name):',
    '    def wrap(fn):',
    '        return fn',
    '    return wrap',
  ),
  'pkg/base.py': py('class Base:', '    def greet(self):', '        return "hi"'),
  'pkg/models.py': py(
    'from .base import Base',
    'from .decorators import register, traced',
    'import abc',
    '',
    '',
    'class Model(Base, abc.ABC):',
    '    def __init__(self):',
    '        self.ready = True',
    '',
    '    @traced("save")',
    '    def save(self):',
    '        return True',
    '',
    '    @property',
    '    def name(self):',
    '        return "model"',
    '',
    '',
    '@register',
    'def build():',
    '    return Model()',
  ),
};

async function buildCatalog(): Promise<{ catalog: ComponentCatalog; options: Parameters<typeof addInheritanceEdges>[1] }> {
  const root = makeTempRepo(FILES);
  const extraction = await extractComponents({ rootDir: root, files: repoFiles(root, FILES), logger: captureLogger() });
  const catalog = new ComponentCatalog(extraction.components);
  const resolver = new SymbolOriginResolver({ modules: extraction.modules, cache: extraction.cache });
  return { catalog, options: { resolver, cache: extraction.cache, logger: captureLogger() } };
}

function dependsOn(catalog: ComponentCatalog, id: string): string[] {
  return Array.from(catalog.get(id)?.dependsOn ?? []).sort();
}

describe('ComponentCatalog', () => {
  test('refuses self-loops and unknown ids', async () => {
    const { catalog } = await buildCatalog();

    expect(catalog.addDependency('pkg.models.build', 'pkg.models.build')).toBe(false);
    expect(catalog.addDependency('pkg.models.build', 'pkg.nowhere')).toBe(false);
    expect(catalog.addDependency('pkg.nowhere', 'pkg.models.build')).toBe(false);
    expect(catalog.addDependency('pkg.models.build', 'pkg.models.Model')).toBe(true);
    expect(catalog.addDependency('pkg.models.build', 'pkg.models.Model')).toBe(false);
    expect(catalog.toDependencyGraph().size).toBe(1);
  });

  test('serializes components with sorted id lists and without source', async () => {
    const { catalog } = await buildCatalog();
    catalog.addDependency('pkg.models.build', 'pkg.models.Model');
    catalog.addDependency('pkg.models.build', 'pkg.decorators.register');
    catalog.rebuildUsedBy();

    const build = catalog.get('pkg.models.build');
    const serialized = build && serializeComponent(build);
    expect(serialized?.dependsOn).toEqual(['pkg.decorators.register', 'pkg.models.Model']);
    expect(serialized?.usedBy).toEqual([]);
    expect(serialized && 'sourceCode' in serialized).toBe(false);
    expect(JSON.parse(JSON.stringify(serialized)).id).toBe('pkg.models.build');
  });
});

describe('structural passes', () => {
  test('link classes to methods, parents and decorators', async () => {
    const { catalog, options } = await buildCatalog();

    expect(addClassMethodEdges(catalog)).toBe(3);
    catalog.rebuildUsedBy();
    expect(addInheritanceEdges(catalog, options)).toBe(1);
    catalog.rebuildUsedBy();
    expect(addDecoratorEdges(catalog, options)).toBe(2);
    catalog.rebuildUsedBy();

    expect(dependsOn(catalog, 'pkg.models.Model')).toEqual([
      'pkg.base.Base',
      'pkg.models.Model.name',
      'pkg.models.Model.save',
    ]);
    expect(dependsOn(catalog, 'pkg.base.Base')).toEqual(['pkg.base.Base.greet']);
    expect(dependsOn(catalog, 'pkg.models.Model.save')).toEqual(['pkg.decorators.traced']);
    expect(dependsOn(catalog, 'pkg.models.Model.name')).toEqual([]);
    expect(dependsOn(catalog, 'pkg.models.build')).toEqual(['pkg.decorators.register']);
    expect(dependsOn(catalog, 'pkg.models.Model.__init__')).toEqual([]);
    expect(Array.from(catalog.get('pkg.base.Base')?.usedBy ?? [])).toEqual(['pkg.models.Model']);
  });

  test('keep dependsOn and usedBy exact inverses', async () => {
    const { catalog, options } = await buildCatalog();
    addClassMethodEdges(catalog);
    addInheritanceEdges(catalog, options);
    addDecoratorEdges(catalog, options);
    catalog.rebuildUsedBy();

    for (const component of catalog.values()) {
      expect(component.dependsOn.has(component.id)).toBe(false);
      for (const dependency of component.dependsOn) {
        expect(catalog.get(dependency)?.usedBy.has(component.id)).toBe(true);
      }
      for (const user of component.usedBy) {
        expect(catalog.get(user)?.dependsOn.has(component.id)).toBe(true);
      }
    }
  });

  test('export the catalog as a directed graph', async () => {
    const { catalog, options } = await buildCatalog();
    addClassMethodEdges(catalog);
    addInheritanceEdges(catalog, options);
    addDecoratorEdges(catalog, options);

    const graph = catalog.toDependencyGraph();
    expect(graph.order).toBe(9);
    expect(graph.size).toBe(6);
    expect(graph.hasDirectedEdge('pkg.models.Model', 'pkg.base.Base')).toBe(true);
    expect(graph.getNodeAttributes('pkg.models.Model.save')).toEqual({ kind: 'method', relativePath: 'pkg/models.py' });
  });
});
