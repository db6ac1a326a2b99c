/**
 * Similarity Graph
 *
 * Sparse, undirected, weighted sentence graph. Pairs are compared in
 * row/column blocks of sentence indices; blocks run through the task pool and
 * each joined batch is merged by the single writer, followed by a memory
 * check.
 */

import { SUMMARIZER_CONFIG } from '../config';
import { TaskPool } from '../utils/task-pool';
import { contentTokens, sentenceSimilarity, STOP_WORDS } from './lexical-similarity';
import { MemoryMonitor } from './memory-monitor';

// ============================================================================
// Types
// ============================================================================

export interface Edge {
  readonly i: number;
  readonly j: number;
  readonly weight: number;
}

/**
 * Half-open index ranges `[rowStart, rowEnd) × [colStart, colEnd)`.
 */
export interface Block {
  readonly rowStart: number;
  readonly rowEnd: number;
  readonly colStart: number;
  readonly colEnd: number;
}

export interface SimilarityGraphOptions {
  readonly blockSize?: number;
  readonly concurrency?: number;
  readonly minEdgeWeight?: number;
  readonly stopWords?: ReadonlySet<string>;
  readonly monitor?: MemoryMonitor;
}

// ============================================================================
// Sparse Graph
// ============================================================================

export class SparseGraph {
  private readonly adjacency: Map<number, number>[];
  private edges = 0;

  constructor(readonly size: number) {
    this.adjacency = Array.from({ length: size }, () => new Map<number, number>());
  }

  addEdge(i: number, j: number, weight: number): void {
    const row = this.adjacency[i];
    const col = this.adjacency[j];
    if (!row || !col || i === j) {
      throw new RangeError(`Invalid edge (${i}, ${j}) for graph of size ${this.size}`);
    }
    if (!row.has(j)) this.edges++;
    row.set(j, weight);
    col.set(i, weight);
  }

  neighbors(i: number): ReadonlyMap<number, number> {
    return this.adjacency[i] ?? new Map<number, number>();
  }

  weight(i: number, j: number): number {
    return this.adjacency[i]?.get(j) ?? 0;
  }

  /** Sum of edge weights at a node */
  strength(i: number): number {
    let total = 0;
    for (const w of this.neighbors(i).values()) total += w;
    return total;
  }

  get edgeCount(): number {
    return this.edges;
  }
}

// ============================================================================
// Blocking
// ============================================================================

/**
 * Upper-triangular block tiling (diagonal blocks included) covering every
 * pair i < j exactly once.
 */
export function* planBlocks(size: number, blockSize: number): Generator<Block> {
  for (let rowStart = 0; rowStart < size; rowStart += blockSize) {
    for (let colStart = rowStart; colStart < size; colStart += blockSize) {
      yield {
        rowStart,
        rowEnd: Math.min(rowStart + blockSize, size),
        colStart,
        colEnd: Math.min(colStart + blockSize, size),
      };
    }
  }
}

/**
 * Pure worker: edges at or above `minEdgeWeight` within one block.
 */
export function computeBlock(
  block: Block,
  sentences: readonly string[],
  tokens: readonly ReadonlySet<string>[],
  minEdgeWeight: number
): Edge[] {
  const edges: Edge[] = [];
  for (let i = block.rowStart; i < block.rowEnd; i++) {
    for (let j = Math.max(block.colStart, i + 1); j < block.colEnd; j++) {
      const weight = sentenceSimilarity(
        sentences[i] ?? '',
        sentences[j] ?? '',
        tokens[i] ?? new Set<string>(),
        tokens[j] ?? new Set<string>()
      );
      if (weight >= minEdgeWeight) edges.push({ i, j, weight });
    }
  }
  return edges;
}

// ============================================================================
// Build
// ============================================================================

export async function buildSimilarityGraph(
  sentences: readonly string[],
  options: SimilarityGraphOptions = {}
): Promise<SparseGraph> {
  const blockSize = options.blockSize ?? SUMMARIZER_CONFIG.BLOCK_SIZE;
  const minEdgeWeight = options.minEdgeWeight ?? SUMMARIZER_CONFIG.MIN_EDGE_WEIGHT;
  const stopWords = options.stopWords ?? STOP_WORDS;
  const monitor = options.monitor ?? new MemoryMonitor();
  const pool = new TaskPool(options.concurrency ?? SUMMARIZER_CONFIG.WORKER_CONCURRENCY);

  const tokens = sentences.map((sentence) => contentTokens(sentence, stopWords));
  const graph = new SparseGraph(sentences.length);

  await pool.forEachBatch(
    planBlocks(sentences.length, blockSize),
    async (block) => {
      // yield so large builds do not starve the event loop
      await new Promise<void>((resolve) => setImmediate(resolve));
      return computeBlock(block, sentences, tokens, minEdgeWeight);
    },
    async (results) => {
      for (const edges of results) {
        for (const edge of edges) graph.addEdge(edge.i, edge.j, edge.weight);
      }
      await monitor.relieve();
    }
  );

  return graph;
}
