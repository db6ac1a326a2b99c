/**
 * Extractive Summarizer
 *
 * Bounded-memory TextRank over lexical overlap. Stages:
 *
 *   INGEST → STREAM_TOKENIZE → SIMILARITY_BUILD → RANK → EXTRACT
 *
 * Input is spilled to a staging file and streamed back in fixed windows, the
 * sentence graph is sparse and built block by block, and the memory monitor
 * runs between windows and between similarity batches.
 *
 * `summarize` never rejects: an internal fault yields
 * `SUMMARIZER_CONFIG.FAILURE_MESSAGE`, and the staging file is released on
 * every path. Output is deterministic for a given input.
 */

import { SUMMARIZER_CONFIG } from '../config';
import { describeError } from '../errors';
import type { SentenceGraphNode } from '../types';
import { splitSentences, type SentenceSplitter } from '../utils/sentences';
import { ChunkedSequence } from './chunked-sequence';
import { MemoryMonitor } from './memory-monitor';
import { pageRank } from './pagerank';
import { tokenizeWindows } from './sentence-stream';
import { buildSimilarityGraph } from './similarity-graph';
import { withStagedText } from './staging-buffer';
import { createStructuredLogger, type StructuredLogger } from '../../utils/logger';

export { ChunkedSequence } from './chunked-sequence';
export { MemoryMonitor, heapUtilization, type MemoryProbe } from './memory-monitor';
export { pageRank } from './pagerank';
export { buildSimilarityGraph, SparseGraph } from './similarity-graph';

// ============================================================================
// Types
// ============================================================================

export type SummarizerStage = 'INGEST' | 'STREAM_TOKENIZE' | 'SIMILARITY_BUILD' | 'RANK' | 'EXTRACT';

export interface ExtractiveSummarizerDeps {
  readonly logger?: StructuredLogger;
  readonly monitor?: MemoryMonitor;
  readonly splitSentences?: SentenceSplitter;
}

export interface ExtractiveSummarizerOptions {
  readonly windowBytes?: number;
  readonly reclaimEveryWindows?: number;
  readonly blockSize?: number;
  readonly concurrency?: number;
  readonly minEdgeWeight?: number;
}

export interface SummarizeContentOptions {
  /** Titles keep at least one sentence, bodies at least three */
  readonly title?: boolean;
  readonly ratio?: number;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Number of sentences to extract.
 *
 * @example
 * extractionCount(10, 0.25, 3) // 3 (round(2.5) = 3)
 * extractionCount(40, 0.25, 3) // 10
 */
export function extractionCount(total: number, ratio: number, minLength: number): number {
  return Math.max(minLength, Math.round(total * ratio));
}

export function toGraphNodes(scores: readonly number[]): SentenceGraphNode[] {
  return scores.map((centralityScore, sentenceIndex) => ({ sentenceIndex, centralityScore }));
}

/**
 * The `count` most central nodes (ties by lower index), in document order.
 */
export function topNodesInOrder(nodes: readonly SentenceGraphNode[], count: number): SentenceGraphNode[] {
  return [...nodes]
    .sort((a, b) => b.centralityScore - a.centralityScore || a.sentenceIndex - b.sentenceIndex)
    .slice(0, count)
    .sort((a, b) => a.sentenceIndex - b.sentenceIndex);
}

// ============================================================================
// Summarizer
// ============================================================================

export class ExtractiveSummarizer {
  private readonly log: StructuredLogger;
  private readonly monitor: MemoryMonitor;
  private readonly split: SentenceSplitter;
  private readonly options: Required<ExtractiveSummarizerOptions>;

  constructor(deps: ExtractiveSummarizerDeps = {}, options: ExtractiveSummarizerOptions = {}) {
    this.log = deps.logger ?? createStructuredLogger('[Summarizer]');
    this.monitor = deps.monitor ?? new MemoryMonitor({ logger: this.log });
    this.split = deps.splitSentences ?? splitSentences;
    this.options = {
      windowBytes: options.windowBytes ?? SUMMARIZER_CONFIG.WINDOW_BYTES,
      reclaimEveryWindows: options.reclaimEveryWindows ?? SUMMARIZER_CONFIG.RECLAIM_EVERY_WINDOWS,
      blockSize: options.blockSize ?? SUMMARIZER_CONFIG.BLOCK_SIZE,
      concurrency: options.concurrency ?? SUMMARIZER_CONFIG.WORKER_CONCURRENCY,
      minEdgeWeight: options.minEdgeWeight ?? SUMMARIZER_CONFIG.MIN_EDGE_WEIGHT,
    };
  }

  /**
   * Extracts roughly `ratio` of the sentences (at least `minLength`).
   * Text with no more than `minLength` sentences is returned unchanged;
   * blank text yields "".
   */
  async summarize(
    text: string,
    ratio: number = SUMMARIZER_CONFIG.DEFAULT_RATIO,
    minLength: number = SUMMARIZER_CONFIG.DEFAULT_MIN_LENGTH
  ): Promise<string> {
    if (!text.trim()) return '';

    let stage: SummarizerStage = 'INGEST';
    try {
      if (!Number.isFinite(ratio) || ratio < 0 || !Number.isInteger(minLength) || minLength < 0) {
        throw new RangeError(`Invalid ratio ${ratio} or minLength ${minLength}`);
      }

      return await withStagedText(text, async (staged) => {
        this.log.structured('debug', { event: 'stage', stage, bytes: staged.byteLength });

        stage = 'STREAM_TOKENIZE';
        const { sentences, windows } = await tokenizeWindows(
          new ChunkedSequence(staged.path, this.options.windowBytes),
          {
            split: this.split,
            onWindow: async (index) => {
              if (index % this.options.reclaimEveryWindows === 0) await this.monitor.reclaim();
              else await this.monitor.relieve();
            },
          }
        );
        this.log.structured('debug', { event: 'stage', stage, windows, sentences: sentences.length });

        if (sentences.length <= minLength) {
          return text;
        }

        stage = 'SIMILARITY_BUILD';
        const graph = await buildSimilarityGraph(sentences, {
          blockSize: this.options.blockSize,
          concurrency: this.options.concurrency,
          minEdgeWeight: this.options.minEdgeWeight,
          monitor: this.monitor,
        });
        this.log.structured('debug', { event: 'stage', stage, edges: graph.edgeCount });

        stage = 'RANK';
        const ranked = pageRank(graph);
        if (!ranked.converged) {
          this.log.warn(`PageRank did not converge in ${ranked.iterations} iterations; using last iterate`);
        }
        const nodes = toGraphNodes(ranked.scores);

        stage = 'EXTRACT';
        const count = extractionCount(sentences.length, ratio, minLength);
        const summary = topNodesInOrder(nodes, count)
          .map((node) => sentences[node.sentenceIndex] ?? '')
          .join(' ');
        this.log.structured('info', {
          event: 'summary_complete',
          sentences: sentences.length,
          extracted: Math.min(count, sentences.length),
        });
        return summary;
      });
    } catch (error) {
      this.log.error(`Summarization failed during ${stage}: ${describeError(error)}`);
      return SUMMARIZER_CONFIG.FAILURE_MESSAGE;
    }
  }

  /**
   * Summarizes a collection of texts joined with ".", using the content
   * ratio and a minimum of one sentence for titles or three for bodies.
   */
  summarizeContent(texts: readonly string[], options: SummarizeContentOptions = {}): Promise<string> {
    const minLength = options.title ? SUMMARIZER_CONFIG.TITLE_MIN_LENGTH : SUMMARIZER_CONFIG.CONTENT_MIN_LENGTH;
    return this.summarize(texts.join('.'), options.ratio ?? SUMMARIZER_CONFIG.CONTENT_RATIO, minLength);
  }
}

// ============================================================================
// Convenience
// ============================================================================

export function summarize(text: string, ratio?: number, minLength?: number): Promise<string> {
  return new ExtractiveSummarizer().summarize(text, ratio, minLength);
}

export function summarizeContent(texts: readonly string[], options?: SummarizeContentOptions): Promise<string> {
  return new ExtractiveSummarizer().summarizeContent(texts, options);
}
