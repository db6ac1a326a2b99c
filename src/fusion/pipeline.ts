/**
 * Fusion Pipelines
 *
 * Orchestration of one article at a time:
 *
 *   processNewArticle: seed → pool → backfill → summarize → relevance filter
 *                      → consensus images → tags → build → upsert
 *   updateArticle:     stored record + crowd-sourced URLs → pool → rebuild
 *                      → merge → upsert
 *
 * Every call resolves to a terminal outcome. Failures below the item level
 * are contained by the components; anything that escapes them (persistence
 * included) becomes a `failed` outcome for this item only.
 */

import { randomUUID } from 'node:crypto';

import type { LanguageModel } from 'ai';

import type { ArticleStore } from '../persistence/article-store';
import { buildArticle, mergeArticles, unionDistinct } from './article-builder';
import { CONTENT_POOL_CONFIG, PIPELINE_CONFIG } from './config';
import { ConsensusImageSelector } from './consensus-image-selector';
import { ContentPool } from './content-pool';
import { AcquisitionFailure, FusionFailure, TerminalFailure } from './errors';
import { RelevanceSelector, preprocessText } from './relevance-selector';
import { attempt } from './result';
import { generateTags } from './tagger';
import { TextCleaner } from './text-cleaner';
import {
  isDiscard,
  type AcquisitionCollaborator,
  type DiscardReason,
  type EmbeddingProvider,
  type PoolSeed,
  type RawSourceItem,
  type StoredArticle,
} from './types';
import { splitSentences, type SentenceSplitter } from './utils/sentences';
import { TaskPool } from './utils/task-pool';
import { createPrefixedLogger, type Logger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

/**
 * A headline from the upstream news feed.
 */
export interface ArticleSeed {
  readonly url: string;
  readonly title?: string;
  readonly description?: string;
  readonly image?: string;
  readonly author?: string;
}

export type PipelineOutcome =
  | { readonly status: 'published'; readonly article: StoredArticle }
  | { readonly status: 'unchanged'; readonly id: string }
  | { readonly status: 'discarded'; readonly reason: DiscardReason; readonly id?: string }
  | { readonly status: 'failed'; readonly error: FusionFailure; readonly id?: string };

export interface FusionPipelineDeps {
  readonly acquisition: AcquisitionCollaborator;
  readonly store: ArticleStore;
  readonly embedder: EmbeddingProvider;
  /** Structured-output model for tagging; articles go untagged without one */
  readonly taggerModel?: LanguageModel;
  readonly cleaner?: TextCleaner;
  readonly relevance?: RelevanceSelector;
  readonly consensus?: ConsensusImageSelector;
  readonly splitSentences?: SentenceSplitter;
  readonly logger?: Logger;
  readonly now?: () => Date;
  readonly generateId?: () => string;
}

export interface FusionPipelineOptions {
  /** Paragraphs the pool is backfilled to (default: CONTENT_POOL_CONFIG.MIN_CONTENT_THRESHOLD) */
  readonly minParagraphs?: number;
  readonly batchConcurrency?: number;
  readonly fetchConcurrency?: number;
}

interface FusedContent {
  readonly title: string;
  readonly description: string;
  readonly images: string[];
  readonly tags: string[];
}

// ============================================================================
// Helpers
// ============================================================================

function toFailure(operation: string, error: unknown): FusionFailure {
  return error instanceof FusionFailure ? error : new TerminalFailure(operation, error);
}

/**
 * Orders selected sentences by where they occur in `text`.
 */
export function inDocumentOrder(sentences: readonly string[], text: string): string[] {
  const normalized = preprocessText(text);
  return sentences
    .map((sentence, rank) => ({ sentence, rank, position: normalized.indexOf(sentence) }))
    .sort((a, b) => a.position - b.position || a.rank - b.rank)
    .map((entry) => entry.sentence);
}

/**
 * Feed fields as pool material. The seed URL is left out so the fetched page
 * can still be added under it.
 */
function feedMaterial(seed: ArticleSeed): PoolSeed {
  return {
    titles: seed.title ? [seed.title] : [],
    paragraphs: seed.description ? [seed.description] : [],
    images: seed.image ? [seed.image] : [],
    authors: seed.author ? [seed.author] : [],
  };
}

function seedItem(seed: ArticleSeed): RawSourceItem {
  return {
    url: seed.url,
    title: seed.title ?? '',
    paragraphs: seed.description ? [seed.description] : [],
    images: seed.image ? [seed.image] : [],
    author: seed.author ?? '',
    domain: '',
  };
}

// ============================================================================
// Pipeline
// ============================================================================

export class FusionPipeline {
  private readonly deps: FusionPipelineDeps;
  private readonly cleaner: TextCleaner;
  private readonly relevance: RelevanceSelector;
  private readonly consensus: ConsensusImageSelector;
  private readonly split: SentenceSplitter;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly minParagraphs: number;
  private readonly batchConcurrency: number;
  private readonly fetchConcurrency: number;

  constructor(deps: FusionPipelineDeps, options: FusionPipelineOptions = {}) {
    this.deps = deps;
    this.log = deps.logger ?? createPrefixedLogger('[Pipeline]');
    this.split = deps.splitSentences ?? splitSentences;
    this.cleaner = deps.cleaner ?? new TextCleaner();
    this.relevance =
      deps.relevance ?? new RelevanceSelector({ embedder: deps.embedder, splitSentences: this.split });
    this.consensus = deps.consensus ?? new ConsensusImageSelector({ embedder: deps.embedder });
    this.now = deps.now ?? (() => new Date());
    this.generateId = deps.generateId ?? randomUUID;
    this.minParagraphs = options.minParagraphs ?? CONTENT_POOL_CONFIG.MIN_CONTENT_THRESHOLD;
    this.batchConcurrency = options.batchConcurrency ?? PIPELINE_CONFIG.BATCH_CONCURRENCY;
    this.fetchConcurrency = options.fetchConcurrency ?? CONTENT_POOL_CONFIG.FETCH_CONCURRENCY;
  }

  // ==========================================================================
  // New Articles
  // ==========================================================================

  async processNewArticle(seed: ArticleSeed): Promise<PipelineOutcome> {
    this.log.info(`Processing ${seed.url}`);
    try {
      const fetched = await attempt(
        () => this.deps.acquisition.fetch(seed.url),
        (cause) => new AcquisitionFailure(seed.url, cause)
      );
      const poolDeps = { acquisition: this.deps.acquisition, fetchConcurrency: this.fetchConcurrency };
      let pool: ContentPool;
      if (fetched.success) {
        pool = new ContentPool(poolDeps, feedMaterial(seed));
        pool.add(fetched.value);
      } else {
        this.log.warn(`${fetched.error.message}; using feed fields for the seed`);
        pool = new ContentPool(poolDeps);
        pool.add(seedItem(seed));
      }
      await pool.ensureSufficient('paragraphs', this.minParagraphs);

      const snapshot = pool.snapshot();
      const fused = await this.fuse(snapshot.titles, snapshot.paragraphs, snapshot.images);
      if (!fused) {
        return { status: 'discarded', reason: 'no_content' };
      }

      const images = unionDistinct(seed.image ? [seed.image] : [], fused.images);
      const built = buildArticle({ pool: snapshot, ...fused, images });
      if (isDiscard(built)) {
        this.log.info(`Discarded ${seed.url}: ${built.reason}`);
        return { status: 'discarded', reason: built.reason };
      }

      const timestamp = this.now().toISOString();
      const article: StoredArticle = {
        ...built,
        id: this.generateId(),
        publishedAt: timestamp,
        updatedAt: timestamp,
        crowdSourcedUrls: [],
      };
      await this.deps.store.upsert(article);
      this.log.info(`Published "${article.title}" from ${article.sources.length} source(s)`);
      return { status: 'published', article };
    } catch (error) {
      const failure = toFailure(`processNewArticle(${seed.url})`, error);
      this.log.error(failure.message);
      return { status: 'failed', error: failure };
    }
  }

  // ==========================================================================
  // Crowd-Sourced Updates
  // ==========================================================================

  async updateArticle(id: string): Promise<PipelineOutcome> {
    try {
      const existing = await this.deps.store.findById(id);
      if (!existing) {
        this.log.warn(`Article ${id} not found`);
        return { status: 'discarded', reason: 'not_found', id };
      }
      if (existing.crowdSourcedUrls.length === 0) {
        this.log.debug(`Article ${id} has no crowd-sourced URLs`);
        return { status: 'unchanged', id };
      }

      const pool = new ContentPool(
        { acquisition: this.deps.acquisition, fetchConcurrency: this.fetchConcurrency },
        {
          titles: [existing.title],
          paragraphs: [existing.description],
          images: existing.images,
          sources: existing.sources,
          authors: existing.authors,
        }
      );

      const results = await new TaskPool(Math.max(1, this.fetchConcurrency)).map(existing.crowdSourcedUrls, (url) =>
        attempt(
          () => this.deps.acquisition.fetch(url),
          (cause) => new AcquisitionFailure(url, cause)
        )
      );
      let added = 0;
      for (const result of results) {
        if (!result.success) {
          this.log.warn(result.error.message);
        } else if (pool.add(result.value) === 'added') {
          added++;
        }
      }
      this.log.info(`Article ${id}: ${added}/${existing.crowdSourcedUrls.length} crowd-sourced source(s) added`);

      const snapshot = pool.snapshot();
      const fused = await this.fuse(snapshot.titles, snapshot.paragraphs, snapshot.images);
      const update = buildArticle({
        pool: snapshot,
        title: fused?.title ?? existing.title,
        description: fused?.description ?? existing.description,
        images: unionDistinct(existing.images, fused?.images ?? []),
        tags: fused?.tags ?? [],
      });
      if (isDiscard(update)) {
        return { status: 'discarded', reason: update.reason, id };
      }

      const article: StoredArticle = {
        ...mergeArticles(existing, update),
        updatedAt: this.now().toISOString(),
        crowdSourcedUrls: [],
      };
      await this.deps.store.upsert(article);
      this.log.info(`Updated article ${id}`);
      return { status: 'published', article };
    } catch (error) {
      const failure = toFailure(`updateArticle(${id})`, error);
      this.log.error(failure.message);
      return { status: 'failed', error: failure, id };
    }
  }

  // ==========================================================================
  // Batches
  // ==========================================================================

  /**
   * Runs `process` over every item. A rejection becomes a `failed` outcome
   * and never stops the remaining items.
   */
  async runBatch<T>(items: readonly T[], process: (item: T) => Promise<PipelineOutcome>): Promise<PipelineOutcome[]> {
    const outcomes = await new TaskPool(Math.max(1, this.batchConcurrency)).map(items, async (item) => {
      try {
        return await process(item);
      } catch (error) {
        const failure = toFailure('runBatch', error);
        this.log.error(failure.message);
        const outcome: PipelineOutcome = { status: 'failed', error: failure };
        return outcome;
      }
    });

    const counts = new Map<PipelineOutcome['status'], number>();
    for (const outcome of outcomes) counts.set(outcome.status, (counts.get(outcome.status) ?? 0) + 1);
    this.log.info(
      `Batch of ${items.length}: ` +
        [...counts.entries()].map(([status, count]) => `${count} ${status}`).join(', ')
    );
    return outcomes;
  }

  processNewArticles(seeds: readonly ArticleSeed[]): Promise<PipelineOutcome[]> {
    return this.runBatch(seeds, (seed) => this.processNewArticle(seed));
  }

  /**
   * Applies pending crowd-sourced URLs to every stored article.
   */
  async updateAll(): Promise<PipelineOutcome[]> {
    const ids = await this.deps.store.listIds();
    return this.runBatch(ids, (id) => this.updateArticle(id));
  }

  // ==========================================================================
  // Fusion
  // ==========================================================================

  /**
   * Title, description, consensus images and tags from pooled material.
   * Resolves null when no usable title can be produced.
   */
  private async fuse(
    titles: readonly string[],
    paragraphs: readonly string[],
    images: readonly string[]
  ): Promise<FusedContent | null> {
    const title =
      (await this.cleaner.summarizeAndClean(titles, { title: true })) || this.cleaner.clean(titles[0] ?? '');
    if (!title) return null;

    let description = await this.cleaner.summarizeAndClean(paragraphs);
    if (this.split(description).length >= PIPELINE_CONFIG.MIN_SENTENCES_FOR_RELEVANCE) {
      const relevant = await this.relevance.select(title, description);
      if (relevant.length > 0) {
        description = inDocumentOrder(relevant, description).join(' ');
      }
    }

    const selected = await this.consensus.select(images, [title, description]);
    const tags = this.deps.taggerModel
      ? await generateTags(title, description, { model: this.deps.taggerModel })
      : [];

    return { title, description, images: selected, tags };
  }
}
