/**
 * Weighted PageRank
 *
 * Power iteration over a sparse undirected graph. Each node spreads its score
 * to neighbours in proportion to edge weight; nodes without edges spread
 * theirs uniformly. Iteration stops when the L1 change drops below
 * `size × tolerance` or after `maxIterations`.
 */

import { SUMMARIZER_CONFIG } from '../config';
import type { SparseGraph } from './similarity-graph';

export interface PageRankOptions {
  readonly damping?: number;
  readonly maxIterations?: number;
  readonly tolerance?: number;
}

export interface PageRankResult {
  readonly scores: number[];
  readonly iterations: number;
  readonly converged: boolean;
}

export function pageRank(graph: SparseGraph, options: PageRankOptions = {}): PageRankResult {
  const damping = options.damping ?? SUMMARIZER_CONFIG.PAGERANK_DAMPING;
  const maxIterations = options.maxIterations ?? SUMMARIZER_CONFIG.PAGERANK_MAX_ITERATIONS;
  const tolerance = options.tolerance ?? SUMMARIZER_CONFIG.PAGERANK_TOLERANCE;
  const n = graph.size;
  if (n === 0) return { scores: [], iterations: 0, converged: true };

  const strength = Array.from({ length: n }, (_, i) => graph.strength(i));
  const base = (1 - damping) / n;
  let scores = new Array<number>(n).fill(1 / n);

  for (let iteration = 1; iteration <= maxIterations; iteration++) {
    const previous = scores;
    scores = new Array<number>(n).fill(0);

    let danglingMass = 0;
    for (let i = 0; i < n; i++) {
      const own = previous[i] ?? 0;
      const total = strength[i] ?? 0;
      if (total === 0) {
        danglingMass += own;
        continue;
      }
      for (const [j, weight] of graph.neighbors(i)) {
        scores[j] = (scores[j] ?? 0) + (damping * own * weight) / total;
      }
    }

    const spread = (damping * danglingMass) / n + base;
    let change = 0;
    for (let i = 0; i < n; i++) {
      const next = (scores[i] ?? 0) + spread;
      scores[i] = next;
      change += Math.abs(next - (previous[i] ?? 0));
    }

    if (change < n * tolerance) {
      return { scores, iterations: iteration, converged: true };
    }
  }

  return { scores, iterations: maxIterations, converged: false };
}
