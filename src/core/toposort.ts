import { DirectedGraph } from 'graphology';
import { stronglyConnectedComponents } from 'graphology-components';
import { hasCycle, topologicalSort } from 'graphology-dag';

import { Condensation, CondensationGroup, DependencyGraph } from '../types';
import { CondensationError } from './errors';

export type CondensationNodeAttributes = {
  members: string[];
};

/** One node per strongly connected group; edges run from dependency to dependent. */
export type CondensationGraph = DirectedGraph<CondensationNodeAttributes>;

export interface CondensedDependencies {
  condensation: Condensation;
  dag: CondensationGraph;
}

export interface DependencyOrder {
  order: string[];
  condensation: Condensation;
}

const GROUP_PREFIX = 'scc:';

function byId(a: string, b: string): number {
  return a.localeCompare(b);
}

/**
 * Collapses every strongly connected group of the dependency graph into one
 * node. Groups are numbered in the order of their smallest member.
 */
export function condenseGraph(graph: DependencyGraph): CondensedDependencies {
  const components = stronglyConnectedComponents(graph)
    .map((members) => [...members].sort(byId))
    .sort((a, b) => byId(a[0], b[0]));

  const groups: CondensationGroup[] = [];
  const groupOf = new Map<string, string>();
  const dag: CondensationGraph = new DirectedGraph<CondensationNodeAttributes>();

  components.forEach((members, index) => {
    const key = `${GROUP_PREFIX}${index}`;
    groups.push({ key, members });
    dag.addNode(key, { members });
    for (const member of members) {
      groupOf.set(member, key);
    }
  });

  const edges: Array<[string, string]> = [];
  graph.forEachEdge((_edge, _attributes, source, target) => {
    const dependent = groupOf.get(source);
    const dependency = groupOf.get(target);
    if (dependent && dependency && dependent !== dependency) {
      edges.push([dependency, dependent]);
    }
  });
  edges.sort((a, b) => byId(a[0], b[0]) || byId(a[1], b[1]));
  for (const [from, to] of edges) {
    if (!dag.hasDirectedEdge(from, to)) {
      dag.addDirectedEdge(from, to);
    }
  }

  return { condensation: { groups, groupOf }, dag };
}

/**
 * Linear order of a condensation: groups in topological order, each expanded
 * to its members. A graph that still has a cycle was not condensed and is
 * rejected.
 */
export function orderCondensation(dag: CondensationGraph): string[] {
  if (hasCycle(dag)) {
    throw new CondensationError('condensation graph contains a cycle; expected one node per strongly connected group');
  }
  return topologicalSort(dag).flatMap((key) => dag.getNodeAttribute(key, 'members'));
}

/** Every dependency comes before its dependents; cycle members stay together. */
export function topologicalOrder(graph: DependencyGraph): DependencyOrder {
  const { condensation, dag } = condenseGraph(graph);
  return { order: orderCondensation(dag), condensation };
}
