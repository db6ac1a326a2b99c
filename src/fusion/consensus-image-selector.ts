/**
 * Consensus Image Selector
 *
 * Keeps the images that enough target texts agree on. Every (image, text)
 * pair is one vote: a match when the cosine similarity of their embeddings
 * exceeds the match threshold. An image is retained when its matches reach
 * the quorum `max(1, texts - tolerance)`, then retained images are ranked by
 * resolution and truncated.
 *
 * An image that cannot be embedded matches nothing. An image whose resolution
 * cannot be probed scores 0. Neither ever fails the selection.
 */

import { CONSENSUS_CONFIG } from './config';
import { ProviderFailure, describeError } from './errors';
import { attempt } from './result';
import { createImageQualityScorer } from './services/image-quality';
import type { ConsensusVote, EmbeddingProvider, ImageQualityScorer } from './types';
import { isNonContentImage } from './utils/image-filter';
import { TaskPool } from './utils/task-pool';
import { safeCosine } from './utils/vectors';
import { createPrefixedLogger, type Logger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface ConsensusImageSelectorDeps {
  readonly embedder: EmbeddingProvider;
  /** Defaults to the Sharp-based width × height scorer */
  readonly scoreQuality?: ImageQualityScorer;
  readonly logger?: Logger;
}

export interface ConsensusImageSelectorOptions {
  readonly matchThreshold?: number;
  readonly quorumTolerance?: number;
  readonly topN?: number;
  readonly concurrency?: number;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Number of matching texts an image needs.
 *
 * @example
 * quorumFor(3, 1) // 2
 * quorumFor(1, 1) // 1
 */
export function quorumFor(textCount: number, tolerance: number): number {
  return Math.max(1, textCount - tolerance);
}

/**
 * Trims, drops blanks and exact duplicates, and removes non-content URLs.
 * First occurrence wins.
 */
export function prepareCandidates(images: readonly string[]): string[] {
  const seen = new Set<string>();
  const candidates: string[] = [];
  for (const raw of images) {
    const url = raw.trim();
    if (!url || seen.has(url)) continue;
    seen.add(url);
    if (!isNonContentImage(url)) candidates.push(url);
  }
  return candidates;
}

// ============================================================================
// Consensus Image Selector
// ============================================================================

export class ConsensusImageSelector {
  private readonly embedder: EmbeddingProvider;
  private readonly scoreQuality: ImageQualityScorer;
  private readonly log: Logger;
  private readonly options: Required<ConsensusImageSelectorOptions>;
  private readonly pool: TaskPool;

  constructor(deps: ConsensusImageSelectorDeps, options: ConsensusImageSelectorOptions = {}) {
    this.embedder = deps.embedder;
    this.log = deps.logger ?? createPrefixedLogger('[ConsensusImages]');
    this.scoreQuality = deps.scoreQuality ?? createImageQualityScorer({ logger: this.log });
    this.options = {
      matchThreshold: options.matchThreshold ?? CONSENSUS_CONFIG.MATCH_THRESHOLD,
      quorumTolerance: options.quorumTolerance ?? CONSENSUS_CONFIG.QUORUM_TOLERANCE,
      topN: options.topN ?? CONSENSUS_CONFIG.TOP_N,
      concurrency: Math.max(1, options.concurrency ?? CONSENSUS_CONFIG.IMAGE_CONCURRENCY),
    };
    this.pool = new TaskPool(this.options.concurrency);
  }

  /**
   * Images that reach quorum against `texts`, best resolution first.
   */
  async select(images: readonly string[], texts: readonly string[]): Promise<string[]> {
    const targets = texts.map((t) => t.trim()).filter((t) => t.length > 0);
    const votes = await this.vote(images, targets);
    if (votes.length === 0) return [];

    const quorum = quorumFor(targets.length, this.options.quorumTolerance);
    const retained = votes.filter((v) => v.matches >= quorum).map((v) => v.image);
    this.log.info(`${retained.length}/${votes.length} image(s) reached quorum ${quorum} of ${targets.length}`);

    const ranked = await this.rank(retained);
    return ranked.slice(0, this.options.topN);
  }

  /**
   * Match count per candidate image, in candidate order.
   */
  async vote(images: readonly string[], texts: readonly string[]): Promise<ConsensusVote[]> {
    const candidates = prepareCandidates(images);
    if (candidates.length === 0 || texts.length === 0) return [];

    const textEmbeddings: number[][] = [];
    for (const text of texts) {
      const embedded = await attempt(
        () => this.embedder.embedText(text),
        (cause) => new ProviderFailure('embedText(target)', cause)
      );
      if (embedded.success) textEmbeddings.push(embedded.value);
      else this.log.warn(`${embedded.error.message}; no image can match this text`);
    }

    return this.pool.map(candidates, async (image) => {
      const embedded = await attempt(
        () => this.embedder.embedImage(image),
        (cause) => new ProviderFailure(`embedImage(${image})`, cause)
      );
      if (!embedded.success) {
        this.log.warn(embedded.error.message);
        return { image, matches: 0 };
      }

      let matches = 0;
      for (const textEmbedding of textEmbeddings) {
        const similarity = safeCosine(embedded.value, textEmbedding);
        if (similarity.success && similarity.value > this.options.matchThreshold) matches++;
      }
      return { image, matches };
    });
  }

  /**
   * Stable sort by quality score, descending.
   */
  private async rank(images: readonly string[]): Promise<string[]> {
    const scores = await this.pool.map(images, async (image) => {
      try {
        return await this.scoreQuality(image);
      } catch (error) {
        this.log.warn(`Quality probe failed for ${image}: ${describeError(error)}`);
        return 0;
      }
    });

    return images
      .map((image, index) => ({ image, score: scores[index] ?? 0 }))
      .sort((a, b) => b.score - a.score)
      .map((entry) => entry.image);
  }
}
