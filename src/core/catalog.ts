import { DirectedGraph } from 'graphology';

import { Component, DependencyEdgeAttributes, DependencyGraph, DependencyNodeAttributes, SerializedComponent } from '../types';

function sortedIds(ids: Iterable<string>): string[] {
  return Array.from(ids).sort((a, b) => a.localeCompare(b));
}

/**
 * Arena of components keyed by id. Dependencies are stored as id sets on the
 * components; `usedBy` is always derived from `dependsOn`.
 */
export class ComponentCatalog {
  private readonly components: Map<string, Component>;

  constructor(components: Map<string, Component>) {
    this.components = components;
  }

  get size(): number {
    return this.components.size;
  }

  has(id: string): boolean {
    return this.components.has(id);
  }

  get(id: string): Component | undefined {
    return this.components.get(id);
  }

  ids(): string[] {
    return sortedIds(this.components.keys());
  }

  values(): Component[] {
    return this.ids().flatMap((id) => {
      const component = this.components.get(id);
      return component ? [component] : [];
    });
  }

  toMap(): Map<string, Component> {
    return this.components;
  }

  /**
   * Records that `from` depends on `to`. Unknown ids and self-loops are
   * refused; the return value says whether a new edge was added.
   */
  addDependency(from: string, to: string): boolean {
    if (from === to) {
      return false;
    }
    const source = this.components.get(from);
    if (!source || !this.components.has(to) || source.dependsOn.has(to)) {
      return false;
    }
    source.dependsOn.add(to);
    return true;
  }

  rebuildUsedBy(): void {
    for (const component of this.components.values()) {
      component.usedBy.clear();
    }
    for (const component of this.components.values()) {
      for (const dependency of component.dependsOn) {
        this.components.get(dependency)?.usedBy.add(component.id);
      }
    }
  }

  /** Edge A→B means A depends on B. Nodes and edges are added in id order. */
  toDependencyGraph(): DependencyGraph {
    const graph = new DirectedGraph<DependencyNodeAttributes, DependencyEdgeAttributes>();
    const components = this.values();

    for (const component of components) {
      graph.addNode(component.id, { kind: component.kind, relativePath: component.relativePath });
    }
    for (const component of components) {
      for (const dependency of sortedIds(component.dependsOn)) {
        if (graph.hasNode(dependency) && !graph.hasDirectedEdge(component.id, dependency)) {
          graph.addDirectedEdge(component.id, dependency, { relation: 'depends_on' });
        }
      }
    }
    return graph;
  }
}

export function serializeComponent(component: Component): SerializedComponent {
  return {
    id: component.id,
    kind: component.kind,
    filePath: component.filePath,
    relativePath: component.relativePath,
    startLine: component.startLine,
    endLine: component.endLine,
    headerEndLine: component.headerEndLine,
    signature: component.signature,
    hasDocstring: component.hasDocstring,
    docstring: component.docstring,
    dependsOn: sortedIds(component.dependsOn),
    usedBy: sortedIds(component.usedBy),
  };
}
