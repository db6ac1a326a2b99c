/**
 * Relevance Selector
 *
 * Filters a candidate text down to the sentences that are semantically close
 * to a reference text. Each sentence is embedded and scored by cosine
 * similarity against the reference; the cut-off adapts to the score
 * distribution (two-cluster split by default).
 *
 * A sentence whose embedding fails scores 0. If the reference itself cannot
 * be embedded, every sentence scores 0.
 */

import { RELEVANCE_CONFIG, type ThresholdMethod } from './config';
import { ProviderFailure } from './errors';
import { attempt } from './result';
import type { EmbeddingProvider, ScoredSentence, SimilarityStatistics } from './types';
import { hasAlphanumeric, splitSentences, type SentenceSplitter } from './utils/sentences';
import { mean, percentile, standardDeviation, twoMeansThreshold } from './utils/statistics';
import { TaskPool } from './utils/task-pool';
import { safeCosine } from './utils/vectors';
import { createPrefixedLogger, type Logger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface RelevanceSelectorDeps {
  readonly embedder: EmbeddingProvider;
  readonly logger?: Logger;
  /** Defaults to the compromise-based splitter */
  readonly splitSentences?: SentenceSplitter;
}

export interface RelevanceSelectorOptions {
  readonly thresholdMethod?: ThresholdMethod;
  readonly minSentenceLength?: number;
  readonly percentile?: number;
  readonly fixedThreshold?: number;
  readonly batchSize?: number;
}

export interface RelevanceSelection {
  /** Sentences above the threshold, highest score first */
  readonly selected: readonly ScoredSentence[];
  readonly statistics: SimilarityStatistics;
}

// ============================================================================
// Text Preparation
// ============================================================================

/**
 * Normalizes text before splitting: an ellipsis between two words becomes a
 * space, whitespace runs collapse, and anything other than letters, digits,
 * whitespace and `. , ! ? -` is removed.
 *
 * @example
 * preprocessText('Wait...what?  “Really”') // 'Wait what? Really'
 */
export function preprocessText(text: string): string {
  return text
    .replace(/(?<=[\p{L}\p{N}_])\.\.\.(?=[\p{L}\p{N}_])/gu, ' ')
    .replace(/\s+/g, ' ')
    .replace(/[^\p{L}\p{N}_\s.,!?-]/gu, '')
    .trim();
}

// ============================================================================
// Threshold
// ============================================================================

/**
 * Computes the selection cut-off for a score vector. An empty vector yields 0.
 */
export function calculateThreshold(
  scores: readonly number[],
  method: ThresholdMethod,
  options: { readonly percentile?: number; readonly fixedThreshold?: number } = {}
): number {
  if (scores.length === 0) return 0;
  switch (method) {
    case 'kmeans':
      return twoMeansThreshold(scores, RELEVANCE_CONFIG.KMEANS_MAX_ITERATIONS);
    case 'percentile':
      return percentile(scores, options.percentile ?? RELEVANCE_CONFIG.PERCENTILE);
    case 'fixed':
      return options.fixedThreshold ?? RELEVANCE_CONFIG.FIXED_THRESHOLD;
  }
}

// ============================================================================
// Relevance Selector
// ============================================================================

export class RelevanceSelector {
  private readonly embedder: EmbeddingProvider;
  private readonly log: Logger;
  private readonly split: SentenceSplitter;
  private readonly options: Required<RelevanceSelectorOptions>;

  constructor(deps: RelevanceSelectorDeps, options: RelevanceSelectorOptions = {}) {
    this.embedder = deps.embedder;
    this.log = deps.logger ?? createPrefixedLogger('[RelevanceSelector]');
    this.split = deps.splitSentences ?? splitSentences;
    this.options = {
      thresholdMethod: options.thresholdMethod ?? RELEVANCE_CONFIG.THRESHOLD_METHOD,
      minSentenceLength: options.minSentenceLength ?? RELEVANCE_CONFIG.MIN_SENTENCE_LENGTH,
      percentile: options.percentile ?? RELEVANCE_CONFIG.PERCENTILE,
      fixedThreshold: options.fixedThreshold ?? RELEVANCE_CONFIG.FIXED_THRESHOLD,
      batchSize: Math.max(1, options.batchSize ?? RELEVANCE_CONFIG.EMBED_BATCH_SIZE),
    };
  }

  /**
   * Sentences of `candidateText` relevant to `referenceText`, most relevant
   * first.
   */
  async select(referenceText: string, candidateText: string): Promise<string[]> {
    const { selected } = await this.selectWithScores(referenceText, candidateText);
    return selected.map((s) => s.sentence);
  }

  /**
   * Like `select`, but keeps the scores and reports statistics over every
   * scored sentence.
   */
  async selectWithScores(referenceText: string, candidateText: string): Promise<RelevanceSelection> {
    const sentences = this.extractSentences(candidateText);
    if (sentences.length === 0) {
      this.log.debug('No valid sentences in candidate text');
      return { selected: [], statistics: summarize([], 0) };
    }

    const scores = await this.scoreSentences(preprocessText(referenceText), sentences);
    const threshold = calculateThreshold(scores, this.options.thresholdMethod, this.options);

    const selected = sentences
      .map((sentence, index): ScoredSentence => ({ sentence, score: scores[index] ?? 0 }))
      .filter((s) => s.score > threshold)
      .sort((a, b) => b.score - a.score);

    this.log.info(
      `Selected ${selected.length}/${sentences.length} sentences ` +
        `(threshold ${threshold.toFixed(3)}, method ${this.options.thresholdMethod})`
    );
    return { selected, statistics: summarize(scores, threshold) };
  }

  private extractSentences(candidateText: string): string[] {
    const text = preprocessText(candidateText);
    if (!text) return [];
    return this.split(text).filter(
      (sentence) => sentence.length >= this.options.minSentenceLength && hasAlphanumeric(sentence)
    );
  }

  private async scoreSentences(reference: string, sentences: readonly string[]): Promise<number[]> {
    const referenceEmbedding = await attempt(
      () => this.embedder.embedText(reference),
      (cause) => new ProviderFailure('embedText(reference)', cause)
    );
    if (!referenceEmbedding.success) {
      this.log.warn(`${referenceEmbedding.error.message}; scoring all sentences 0`);
      return sentences.map(() => 0);
    }

    return new TaskPool(this.options.batchSize).map(sentences, async (sentence) => {
      const embedded = await attempt(
        () => this.embedder.embedText(sentence),
        (cause) => new ProviderFailure('embedText(sentence)', cause)
      );
      if (!embedded.success) {
        this.log.warn(embedded.error.message);
        return 0;
      }
      const similarity = safeCosine(referenceEmbedding.value, embedded.value);
      if (!similarity.success) {
        this.log.warn(similarity.error.message);
        return 0;
      }
      return similarity.value;
    });
  }
}

function summarize(scores: readonly number[], threshold: number): SimilarityStatistics {
  return {
    totalSentences: scores.length,
    mean: mean(scores),
    max: scores.length > 0 ? Math.max(...scores) : 0,
    min: scores.length > 0 ? Math.min(...scores) : 0,
    std: standardDeviation(scores),
    threshold,
  };
}
