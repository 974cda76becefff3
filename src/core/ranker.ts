import { DependencyGraph, ImportanceResult, Logger, PagerankOptions } from '../types';
import { consoleLogger, logVerbose, logWarn } from '../utils/log';
import { DEFAULT_PAGERANK } from './constants';

export interface ImportanceOptions extends Partial<PagerankOptions> {
  verbose?: boolean;
  logger?: Logger;
}

function validate(options: PagerankOptions): void {
  if (!(options.alpha >= 0 && options.alpha <= 1)) {
    throw new RangeError(`alpha must be within [0, 1], got ${options.alpha}`);
  }
  if (!Number.isInteger(options.maxIterations) || options.maxIterations < 1) {
    throw new RangeError(`maxIterations must be a positive integer, got ${options.maxIterations}`);
  }
  if (!(options.tolerance > 0)) {
    throw new RangeError(`tolerance must be positive, got ${options.tolerance}`);
  }
}

/**
 * PageRank over the dependency graph. An edge A→B (A depends on B) hands
 * part of A's score to B, so heavily used components rank high. Iteration
 * stops once the L1 change drops below `tolerance * n`; when the cap is hit
 * first, the last scores are returned with `converged: false`.
 */
export function computeImportance(graph: DependencyGraph, options: ImportanceOptions = {}): ImportanceResult {
  const logger = options.logger ?? consoleLogger;
  const settings: PagerankOptions = {
    alpha: options.alpha ?? DEFAULT_PAGERANK.alpha,
    maxIterations: options.maxIterations ?? DEFAULT_PAGERANK.maxIterations,
    tolerance: options.tolerance ?? DEFAULT_PAGERANK.tolerance,
  };
  validate(settings);

  const nodes = graph.nodes();
  const n = nodes.length;
  if (n === 0) {
    return { scores: {}, iterations: 0, converged: true };
  }

  const position = new Map<string, number>();
  nodes.forEach((node, index) => position.set(node, index));

  const outDegree = nodes.map((node) => graph.outDegree(node));
  const incoming: number[][] = nodes.map((node) =>
    graph.inNeighbors(node).flatMap((neighbor) => {
      const index = position.get(neighbor);
      return index === undefined ? [] : [index];
    }),
  );

  const { alpha, maxIterations, tolerance } = settings;
  let rank = new Array<number>(n).fill(1 / n);
  let iterations = 0;
  let converged = false;

  while (iterations < maxIterations) {
    iterations += 1;

    let danglingMass = 0;
    for (let i = 0; i < n; i += 1) {
      if (outDegree[i] === 0) {
        danglingMass += rank[i];
      }
    }

    const base = (1 - alpha) / n + (alpha * danglingMass) / n;
    const next = new Array<number>(n);
    let delta = 0;
    for (let i = 0; i < n; i += 1) {
      let flow = 0;
      for (const source of incoming[i]) {
        flow += rank[source] / outDegree[source];
      }
      next[i] = base + alpha * flow;
      delta += Math.abs(next[i] - rank[i]);
    }

    rank = next;
    if (delta < n * tolerance) {
      converged = true;
      break;
    }
  }

  if (converged) {
    logVerbose(options.verbose ?? false, `[rank] converged after ${iterations} iterations`, logger);
  } else {
    logWarn(`[rank] pagerank did not converge within ${maxIterations} iterations; using the last scores`, logger);
  }

  const scores: Record<string, number> = {};
  nodes.forEach((node, index) => {
    scores[node] = rank[index];
  });
  return { scores, iterations, converged };
}

/** Component ids by descending score; equal scores fall back to id order. */
export function rankComponents(importance: ImportanceResult): string[] {
  return Object.keys(importance.scores).sort((a, b) => {
    const diff = importance.scores[b] - importance.scores[a];
    return diff !== 0 ? diff : a.localeCompare(b);
  });
}
