import { describe, it, expect, vi } from 'vitest';

import { MemoryMonitor } from '../../../src/fusion/summarizer/memory-monitor';
import {
  SparseGraph,
  buildSimilarityGraph,
  computeBlock,
  planBlocks,
} from '../../../src/fusion/summarizer/similarity-graph';
import { silentLogger } from '../../../src/utils/logger';

describe('SparseGraph', () => {
  it('stores undirected edges once', () => {
    const graph = new SparseGraph(3);
    graph.addEdge(0, 2, 0.4);
    graph.addEdge(2, 0, 0.6);

    expect(graph.edgeCount).toBe(1);
    expect(graph.weight(0, 2)).toBe(0.6);
    expect(graph.weight(2, 0)).toBe(0.6);
    expect(graph.strength(2)).toBe(0.6);
    expect(graph.weight(0, 1)).toBe(0);
  });

  it('rejects self loops and out-of-range nodes', () => {
    const graph = new SparseGraph(2);

    expect(() => graph.addEdge(1, 1, 1)).toThrow(RangeError);
    expect(() => graph.addEdge(0, 5, 1)).toThrow('Invalid edge (0, 5) for graph of size 2');
  });
});

describe('planBlocks', () => {
  it('tiles the upper triangle including diagonal blocks', () => {
    expect([...planBlocks(5, 2)]).toEqual([
      { rowStart: 0, rowEnd: 2, colStart: 0, colEnd: 2 },
      { rowStart: 0, rowEnd: 2, colStart: 2, colEnd: 4 },
      { rowStart: 0, rowEnd: 2, colStart: 4, colEnd: 5 },
      { rowStart: 2, rowEnd: 4, colStart: 2, colEnd: 4 },
      { rowStart: 2, rowEnd: 4, colStart: 4, colEnd: 5 },
      { rowStart: 4, rowEnd: 5, colStart: 4, colEnd: 5 },
    ]);
  });

  it('covers every pair exactly once', () => {
    const sentences = Array.from({ length: 5 }, () => 'Same sentence.');
    const tokens = sentences.map(() => new Set<string>());

    const pairs = [...planBlocks(5, 2)].flatMap((block) =>
      computeBlock(block, sentences, tokens, 0).map((edge) => `${edge.i}-${edge.j}`)
    );

    expect(pairs).toHaveLength(10);
    expect(new Set(pairs).size).toBe(10);
  });
});

describe('buildSimilarityGraph', () => {
  const sentences = ['Senate passes budget.', 'Senate budget passes quickly.', 'Rain expected tomorrow.'];

  it('keeps edges at or above the minimum weight', async () => {
    const monitor = new MemoryMonitor({ probe: () => 0, logger: silentLogger });

    const graph = await buildSimilarityGraph(sentences, { blockSize: 1, concurrency: 2, monitor });

    expect(graph.size).toBe(3);
    expect(graph.edgeCount).toBe(1);
    expect(graph.weight(1, 0)).toBe(0.75);
  });

  it('checks memory after each joined batch', async () => {
    const monitor = new MemoryMonitor({ probe: () => 0, logger: silentLogger });
    const relieve = vi.spyOn(monitor, 'relieve');

    // blockSize 1 over 3 sentences plans 6 blocks, joined in batches of 4
    await buildSimilarityGraph(sentences, { blockSize: 1, concurrency: 4, monitor });

    expect(relieve).toHaveBeenCalledTimes(2);
  });

  it('reclaims when memory is critical and still builds the graph', async () => {
    const monitor = new MemoryMonitor({ probe: () => 0.99, threshold: 0.5, logger: silentLogger });

    const graph = await buildSimilarityGraph(sentences, { monitor });

    expect(graph.edgeCount).toBe(1);
    expect(monitor.reclaimCount).toBe(1);
  });
});
