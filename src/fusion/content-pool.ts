/**
 * Content Pool
 *
 * Deduplicated aggregate of titles, paragraphs, images, sources and authors
 * gathered from many web sources. The pool is the single writer of its own
 * state; the backfill loop (`ensureSufficient`) grows it through the
 * acquisition collaborator until a field has enough material.
 *
 * Invariants:
 * - every field keeps first-seen order with no two entries sharing a
 *   trimmed, lower-cased key
 * - every source maps to a distinct normalized domain in `seenDomains`
 */

import { CONTENT_POOL_CONFIG } from './config';
import { AcquisitionFailure, describeError } from './errors';
import { attempt } from './result';
import type {
  AcquisitionCollaborator,
  ContentPoolSnapshot,
  PoolField,
  PoolSeed,
  RawSourceItem,
} from './types';
import { dedupKey, extractDomain, normalizeAuthor } from './utils/url-utils';
import { createPrefixedLogger, type Logger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface ContentPoolDeps {
  readonly acquisition: AcquisitionCollaborator;
  readonly logger?: Logger;
  /** Parallel fetches per backfill round (default: CONTENT_POOL_CONFIG.FETCH_CONCURRENCY) */
  readonly fetchConcurrency?: number;
  /** Query used when no title has been pooled yet */
  readonly fallbackSeed?: string;
}

/**
 * What happened to an item passed to `add()`.
 */
export type AddOutcome = 'added' | 'duplicate_source' | 'duplicate_domain';

export type BackfillStopReason = 'satisfied' | 'no_candidates' | 'budget_exhausted';

export interface BackfillReport {
  readonly field: PoolField;
  readonly threshold: number;
  /** Field size when the loop stopped */
  readonly count: number;
  readonly rounds: number;
  readonly fetched: number;
  readonly failed: number;
  readonly stopReason: BackfillStopReason;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Insertion-ordered list that drops entries whose key has been seen.
 */
class DedupList {
  private readonly items: string[] = [];
  private readonly keys = new Set<string>();

  push(value: string, key: string = dedupKey(value)): boolean {
    const trimmed = value.trim();
    if (!trimmed || this.keys.has(key)) return false;
    this.keys.add(key);
    this.items.push(trimmed);
    return true;
  }

  has(value: string): boolean {
    return this.keys.has(dedupKey(value));
  }

  get size(): number {
    return this.items.length;
  }

  toArray(): readonly string[] {
    return Object.freeze([...this.items]);
  }
}

function domainOf(item: RawSourceItem): string {
  const declared = item.domain.trim().toLowerCase().replace(/^www\./, '');
  return declared || extractDomain(item.url);
}

// ============================================================================
// Content Pool
// ============================================================================

/**
 * @example
 * const pool = new ContentPool({ acquisition }, { titles: [seed.title] });
 * pool.add(seedItem);
 * await pool.ensureSufficient('paragraphs');
 * const { paragraphs, images } = pool.snapshot();
 */
export class ContentPool {
  private readonly titles = new DedupList();
  private readonly paragraphs = new DedupList();
  private readonly images = new DedupList();
  private readonly sources = new DedupList();
  private readonly authors = new DedupList();
  private readonly seenDomains = new Set<string>();
  /** URLs already fetched or attempted, successful or not */
  private readonly attemptedUrls = new Set<string>();

  private readonly acquisition: AcquisitionCollaborator;
  private readonly log: Logger;
  private readonly fetchConcurrency: number;
  private readonly fallbackSeed: string;

  constructor(deps: ContentPoolDeps, seed: PoolSeed = {}) {
    this.acquisition = deps.acquisition;
    this.log = deps.logger ?? createPrefixedLogger('[ContentPool]');
    this.fetchConcurrency = Math.max(1, deps.fetchConcurrency ?? CONTENT_POOL_CONFIG.FETCH_CONCURRENCY);
    this.fallbackSeed = deps.fallbackSeed ?? CONTENT_POOL_CONFIG.FALLBACK_SEARCH_SEED;

    for (const title of seed.titles ?? []) this.titles.push(title);
    for (const paragraph of seed.paragraphs ?? []) this.paragraphs.push(paragraph);
    for (const image of seed.images ?? []) this.images.push(image);
    for (const author of seed.authors ?? []) this.pushAuthor(author);
    for (const source of seed.sources ?? []) {
      const domain = extractDomain(source);
      if (domain && this.seenDomains.has(domain)) continue;
      if (this.sources.push(source) && domain) this.seenDomains.add(domain);
      this.attemptedUrls.add(dedupKey(source));
    }
  }

  // ==========================================================================
  // Mutation
  // ==========================================================================

  /**
   * Merges a fetched item into the pool. An item from an already-seen domain
   * is skipped whole, so sources stay one per domain.
   */
  add(item: RawSourceItem): AddOutcome {
    this.attemptedUrls.add(dedupKey(item.url));

    if (this.sources.has(item.url)) {
      return 'duplicate_source';
    }
    const domain = domainOf(item);
    if (domain && this.seenDomains.has(domain)) {
      this.log.debug(`Skipping ${item.url}: domain ${domain} already pooled`);
      return 'duplicate_domain';
    }

    this.sources.push(item.url);
    if (domain) this.seenDomains.add(domain);
    this.titles.push(item.title);
    for (const paragraph of item.paragraphs) this.paragraphs.push(paragraph);
    for (const image of item.images) this.images.push(image);
    this.pushAuthor(item.author);
    return 'added';
  }

  private pushAuthor(author: string): void {
    const normalized = normalizeAuthor(author);
    if (normalized) this.authors.push(normalized);
  }

  // ==========================================================================
  // Backfill
  // ==========================================================================

  /**
   * Grows `field` until it holds `threshold` entries. Stops early when the
   * collaborator offers no novel candidates or when `threshold` search rounds
   * have run. A failed fetch is logged and skipped.
   */
  async ensureSufficient(
    field: PoolField,
    threshold: number = CONTENT_POOL_CONFIG.MIN_CONTENT_THRESHOLD
  ): Promise<BackfillReport> {
    let rounds = 0;
    let fetched = 0;
    let failed = 0;
    let stopReason: BackfillStopReason = 'satisfied';

    while (this.count(field) < threshold) {
      if (rounds >= threshold) {
        stopReason = 'budget_exhausted';
        break;
      }
      rounds++;

      const needed = threshold - this.count(field);
      const candidates = await this.findCandidates(needed);
      if (candidates.length === 0) {
        stopReason = 'no_candidates';
        break;
      }

      this.log.info(
        `Backfilling ${field} (${this.count(field)}/${threshold}), round ${rounds}: ${candidates.length} candidate(s)`
      );

      for (let i = 0; i < candidates.length; i += this.fetchConcurrency) {
        const batch = candidates.slice(i, i + this.fetchConcurrency);
        for (const url of batch) this.attemptedUrls.add(dedupKey(url));
        const results = await Promise.all(
          batch.map((url) =>
            attempt(
              () => this.acquisition.fetch(url),
              (cause) => new AcquisitionFailure(url, cause)
            )
          )
        );

        for (const result of results) {
          if (result.success) {
            fetched++;
            this.add(result.value);
          } else {
            failed++;
            this.log.warn(result.error.message);
          }
        }
      }
    }

    const count = this.count(field);
    if (stopReason !== 'satisfied') {
      this.log.warn(`Backfill of ${field} stopped at ${count}/${threshold} (${stopReason})`);
    }
    return { field, threshold, count, rounds, fetched, failed, stopReason };
  }

  /**
   * Asks the collaborator for URLs and keeps those not yet attempted and not
   * on an already-seen domain. A failed search yields no candidates.
   */
  private async findCandidates(count: number): Promise<string[]> {
    const seed = this.titles.toArray()[0] ?? this.fallbackSeed;
    const excluded = [...this.seenDomains];

    let urls: string[];
    try {
      urls = await this.acquisition.search(seed, excluded, count);
    } catch (error) {
      this.log.warn(`Search for "${seed}" failed: ${describeError(error)}`);
      return [];
    }

    const novel: string[] = [];
    const keys = new Set<string>();
    for (const url of urls) {
      const key = dedupKey(url);
      if (!key || keys.has(key) || this.attemptedUrls.has(key)) continue;
      const domain = extractDomain(url);
      if (domain && this.seenDomains.has(domain)) continue;
      keys.add(key);
      novel.push(url.trim());
    }
    return novel;
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  count(field: PoolField): number {
    return this[field].size;
  }

  snapshot(): ContentPoolSnapshot {
    return {
      titles: this.titles.toArray(),
      paragraphs: this.paragraphs.toArray(),
      images: this.images.toArray(),
      sources: this.sources.toArray(),
      authors: this.authors.toArray(),
      seenDomains: new Set(this.seenDomains),
    };
  }
}
