import { Component, Logger } from '../types';
import { consoleLogger, logVerbose } from '../utils/log';
import { ComponentCatalog } from './catalog';
import { CONSTRUCTOR_NAME } from './constants';
import { SyntaxTreeCache } from './parser';
import { findComponentId } from './reconcile';
import { SymbolOriginResolver } from './resolver';
import {
  baseClassNames,
  classMethods,
  decoratorExpression,
  DefinitionNode,
  dottedNameOf,
  findTopLevelDefinition,
} from './syntax';

export interface StructuralOptions {
  resolver: SymbolOriginResolver;
  cache: SyntaxTreeCache;
  verbose?: boolean;
  logger?: Logger;
}

function localName(component: Component): string {
  const parts = component.id.split('.');
  return parts[parts.length - 1];
}

function classIdOf(method: Component): string {
  return method.id.split('.').slice(0, -1).join('.');
}

/** Re-locates the definition a component was extracted from. */
function definitionOf(component: Component, catalog: ComponentCatalog, cache: SyntaxTreeCache): DefinitionNode | null {
  const parsed = cache.get(component.filePath);
  if (!parsed) {
    return null;
  }
  if (component.kind !== 'method') {
    return findTopLevelDefinition(parsed.root, localName(component), component.kind);
  }

  const owner = catalog.get(classIdOf(component));
  if (!owner) {
    return null;
  }
  const classDef = findTopLevelDefinition(parsed.root, localName(owner), 'class');
  if (!classDef) {
    return null;
  }
  const name = localName(component);
  const matches = classMethods(classDef.node).filter((method) => method.name === name);
  return matches.length > 0 ? matches[matches.length - 1] : null;
}

/** A class depends on each of its methods, the constructor excepted. */
export function addClassMethodEdges(catalog: ComponentCatalog): number {
  let added = 0;
  for (const component of catalog.values()) {
    if (component.kind !== 'method' || localName(component) === CONSTRUCTOR_NAME) {
      continue;
    }
    if (catalog.addDependency(classIdOf(component), component.id)) {
      added += 1;
    }
  }
  return added;
}

/** A class depends on every base class defined in the repository. */
export function addInheritanceEdges(catalog: ComponentCatalog, options: StructuralOptions): number {
  const logger = options.logger ?? consoleLogger;
  const verbose = options.verbose ?? false;
  let added = 0;

  for (const component of catalog.values()) {
    if (component.kind !== 'class') {
      continue;
    }
    const definition = definitionOf(component, catalog, options.cache);
    if (!definition) {
      continue;
    }

    for (const base of baseClassNames(definition.node)) {
      const found = options.resolver.resolve(base, component.filePath);
      if (!found || found.kind !== 'class') {
        logVerbose(verbose, `[resolve] ${component.id}: base ${base} is not a repository class`, logger);
        continue;
      }
      const parentId = findComponentId(catalog, options.resolver.toComponentId(found));
      if (parentId && catalog.addDependency(component.id, parentId)) {
        added += 1;
      }
    }
  }
  return added;
}

/** A decorated component depends on each decorator defined in the repository. */
export function addDecoratorEdges(catalog: ComponentCatalog, options: StructuralOptions): number {
  const logger = options.logger ?? consoleLogger;
  const verbose = options.verbose ?? false;
  let added = 0;

  for (const component of catalog.values()) {
    const definition = definitionOf(component, catalog, options.cache);
    if (!definition || definition.decorators.length === 0) {
      continue;
    }

    for (const decorator of definition.decorators) {
      const name = dottedNameOf(decoratorExpression(decorator));
      if (!name) {
        continue;
      }
      const found = options.resolver.resolve(name, component.filePath);
      if (!found || found.kind === 'module' || found.kind === 'variable') {
        logVerbose(verbose, `[resolve] ${component.id}: decorator ${name} is not a repository component`, logger);
        continue;
      }
      const decoratorId = findComponentId(catalog, options.resolver.toComponentId(found));
      if (decoratorId && catalog.addDependency(component.id, decoratorId)) {
        added += 1;
      }
    }
  }
  return added;
}
