/**
 * Shared types for the fusion engine.
 */

// ============================================================================
// Acquired Content
// ============================================================================

/**
 * One fetched web source. Immutable once fetched.
 */
export interface RawSourceItem {
  readonly url: string;
  readonly title: string;
  readonly paragraphs: readonly string[];
  readonly images: readonly string[];
  /** Byline, or a profile URL that gets reduced to its domain */
  readonly author: string;
  /** Host of the page; derived from `url` when empty */
  readonly domain: string;
}

/**
 * Pool fields that can be backfilled.
 */
export type PoolField = 'titles' | 'paragraphs' | 'images' | 'sources' | 'authors';

/**
 * Initial material a pool starts from (e.g. an article being updated).
 */
export interface PoolSeed {
  readonly titles?: readonly string[];
  readonly paragraphs?: readonly string[];
  readonly images?: readonly string[];
  readonly sources?: readonly string[];
  readonly authors?: readonly string[];
}

/**
 * Read-only view of a content pool.
 */
export interface ContentPoolSnapshot {
  readonly titles: readonly string[];
  readonly paragraphs: readonly string[];
  readonly images: readonly string[];
  readonly sources: readonly string[];
  readonly authors: readonly string[];
  readonly seenDomains: ReadonlySet<string>;
}

// ============================================================================
// Canonical Article
// ============================================================================

/**
 * The publishable record assembled from a pool and selector outputs.
 * `images` is never empty; `sources` holds at most one URL per domain.
 */
export interface CanonicalArticle {
  readonly title: string;
  readonly description: string;
  readonly images: readonly string[];
  readonly sources: readonly string[];
  readonly authors: readonly string[];
  readonly tags: readonly string[];
}

/**
 * Signal that an article must not be published.
 */
export type DiscardReason = 'no_images' | 'no_content' | 'not_found';

export interface Discard {
  readonly discarded: true;
  readonly reason: DiscardReason;
}

export type BuildOutcome = CanonicalArticle | Discard;

export function isDiscard(outcome: BuildOutcome): outcome is Discard {
  return 'discarded' in outcome;
}

/**
 * A canonical article as stored by the persistence collaborator.
 */
export interface StoredArticle extends CanonicalArticle {
  readonly id: string;
  readonly publishedAt: string;
  readonly updatedAt: string;
  /** URLs submitted for this article since it was last rebuilt */
  readonly crowdSourcedUrls: readonly string[];
}

// ============================================================================
// Scoring
// ============================================================================

/**
 * A sentence with its similarity to a reference text.
 */
export interface ScoredSentence {
  readonly sentence: string;
  readonly score: number;
}

/**
 * Descriptive statistics over one selection call's similarity scores.
 */
export interface SimilarityStatistics {
  readonly totalSentences: number;
  readonly mean: number;
  readonly max: number;
  readonly min: number;
  readonly std: number;
  readonly threshold: number;
}

/**
 * How many target texts one image matched.
 */
export interface ConsensusVote {
  readonly image: string;
  readonly matches: number;
}

/**
 * A node of the sentence graph after ranking.
 */
export interface SentenceGraphNode {
  readonly sentenceIndex: number;
  readonly centralityScore: number;
}

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Search engine plus page fetcher.
 */
export interface AcquisitionCollaborator {
  /**
   * Candidate URLs for a query, excluding the given normalized domains.
   */
  search(seed: string, excludeDomains: readonly string[], count: number): Promise<string[]>;
  /**
   * Fetches and parses one page. Rejects on failure.
   */
  fetch(url: string): Promise<RawSourceItem>;
}

/**
 * Text and image embeddings in one shared vector space.
 */
export interface EmbeddingProvider {
  embedText(text: string): Promise<number[]>;
  embedImage(url: string): Promise<number[]>;
}

export interface GenerationOptions {
  readonly system?: string;
  readonly temperature?: number;
  readonly maxOutputTokens?: number;
  readonly signal?: AbortSignal;
}

/**
 * Free-text generation.
 */
export interface GenerationProvider {
  generate(text: string, options?: GenerationOptions): Promise<string>;
}

/**
 * Resolution-based quality score for an image (width × height). Implementations
 * never reject; an unreachable image scores 0.
 */
export type ImageQualityScorer = (url: string) => Promise<number>;
