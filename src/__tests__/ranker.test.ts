import { DirectedGraph } from 'graphology';

import { describe, expect, test } from 'vitest';

import { computeImportance, rankComponents } from '../core/ranker';
import { DependencyEdgeAttributes, DependencyGraph, DependencyNodeAttributes } from '../types';
import { captureLogger } from './fixtures';

function makeGraph(nodes: string[], edges: Array<[string, string]>): DependencyGraph {
  const graph = new DirectedGraph<DependencyNodeAttributes, DependencyEdgeAttributes>();
  for (const node of nodes) {
    graph.addNode(node, { kind: 'function', relativePath: 'mod.py' });
  }
  for (const [from, to] of edges) {
    graph.addDirectedEdge(from, to, { relation: 'depends_on' });
  }
  return graph;
}

function total(scores: Record<string, number>): number {
  return Object.values(scores).reduce((sum, value) => sum + value, 0);
}

describe('computeImportance', () => {
  test('scores heavily used components highest', () => {
    const graph = makeGraph(['A', 'B', 'C', 'D'], [
      ['B', 'A'],
      ['C', 'A'],
      ['D', 'A'],
    ]);

    const result = computeImportance(graph, { logger: captureLogger() });
    expect(result.converged).toBe(true);
    expect(total(result.scores)).toBeCloseTo(1, 6);
    for (const score of Object.values(result.scores)) {
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(1);
    }
    expect(result.scores.A).toBeGreaterThan(result.scores.B);
    expect(result.scores.B).toBe(result.scores.C);
    expect(rankComponents(result)).toEqual(['A', 'B', 'C', 'D']);
  });

  test('a symmetric cycle stays uniform', () => {
    const result = computeImportance(makeGraph(['A', 'B'], [
      ['A', 'B'],
      ['B', 'A'],
    ]));

    expect(result.scores.A).toBeCloseTo(0.5, 9);
    expect(result.scores.B).toBeCloseTo(0.5, 9);
    expect(result.iterations).toBe(1);
  });

  test('returns the last scores when the iteration cap is reached', () => {
    const logger = captureLogger();
    const result = computeImportance(makeGraph(['A', 'B'], [['A', 'B']]), { maxIterations: 1, logger });

    expect(result.converged).toBe(false);
    expect(result.iterations).toBe(1);
    expect(result.scores.A).toBeCloseTo(0.2875, 9);
    expect(result.scores.B).toBeCloseTo(0.7125, 9);
    expect(logger.messages).toEqual([
      { level: 'warn', message: '[rank] pagerank did not converge within 1 iterations; using the last scores' },
    ]);
  });

  test('an empty graph has no scores', () => {
    expect(computeImportance(makeGraph([], []))).toEqual({ scores: {}, iterations: 0, converged: true });
  });

  test('rejects invalid settings', () => {
    const graph = makeGraph(['A'], []);
    expect(() => computeImportance(graph, { alpha: 2 })).toThrow(RangeError);
    expect(() => computeImportance(graph, { maxIterations: 0 })).toThrow(RangeError);
    expect(() => computeImportance(graph, { tolerance: 0 })).toThrow(RangeError);
  });
});
