/**
 * Fusion Engine Configuration
 *
 * Centralized configuration for the content pool, selectors, summarizer and
 * supporting services. All magic numbers and tuning parameters live here.
 */

// ============================================================================
// Configuration Validation
// ============================================================================

/**
 * Configuration validation error.
 * Thrown at module load time if configuration is inconsistent.
 */
export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(`Fusion config error: ${message}`);
    this.name = 'ConfigValidationError';
  }
}

function validateMinMax(minValue: number, maxValue: number, minName: string, maxName: string): void {
  if (minValue > maxValue) {
    throw new ConfigValidationError(
      `${minName} (${minValue}) cannot be greater than ${maxName} (${maxValue})`
    );
  }
}

function validatePositive(value: number, name: string): void {
  if (value <= 0) {
    throw new ConfigValidationError(`${name} must be positive (got ${value})`);
  }
}

function validateNonNegative(value: number, name: string): void {
  if (value < 0) {
    throw new ConfigValidationError(`${name} cannot be negative (got ${value})`);
  }
}

function validateFraction(value: number, name: string): void {
  if (value <= 0 || value > 1) {
    throw new ConfigValidationError(`${name} must be in (0, 1] (got ${value})`);
  }
}

// ============================================================================
// Content Pool
// ============================================================================

export const CONTENT_POOL_CONFIG = {
  /** Default sufficiency threshold for ensureSufficient() */
  MIN_CONTENT_THRESHOLD: 5,
  /** Query used when the pool has no title to search with */
  FALLBACK_SEARCH_SEED: 'current events',
  /** Parallel fetches per backfill round (1 = sequential) */
  FETCH_CONCURRENCY: 1,
} as const;

// ============================================================================
// Relevance Selector
// ============================================================================

export type ThresholdMethod = 'kmeans' | 'percentile' | 'fixed';

const DEFAULT_THRESHOLD_METHOD: ThresholdMethod = 'kmeans';

export const RELEVANCE_CONFIG = {
  THRESHOLD_METHOD: DEFAULT_THRESHOLD_METHOD,
  /** Sentences shorter than this (after trimming) are ignored */
  MIN_SENTENCE_LENGTH: 10,
  /** Percentile used by the 'percentile' method */
  PERCENTILE: 75,
  /** Threshold used by the 'fixed' method */
  FIXED_THRESHOLD: 0.5,
  /** Sentences embedded concurrently */
  EMBED_BATCH_SIZE: 32,
  /** Lloyd iterations cap for the two-cluster split */
  KMEANS_MAX_ITERATIONS: 100,
} as const;

// ============================================================================
// Consensus Image Selector
// ============================================================================

export const CONSENSUS_CONFIG = {
  /** Cosine similarity an (image, text) pair must exceed to count as a match */
  MATCH_THRESHOLD: 0,
  /** How many target texts may disagree; quorum = max(1, texts - tolerance) */
  QUORUM_TOLERANCE: 1,
  /** Maximum images returned */
  TOP_N: 5,
  /** Images embedded/probed concurrently */
  IMAGE_CONCURRENCY: 4,
} as const;

// ============================================================================
// Summarizer
// ============================================================================

export const SUMMARIZER_CONFIG = {
  DEFAULT_RATIO: 0.3,
  DEFAULT_MIN_LENGTH: 3,
  /** Staging buffer read window in bytes */
  WINDOW_BYTES: 1024 * 1024,
  /** Forced reclamation every K windows */
  RECLAIM_EVERY_WINDOWS: 10,
  /** Edges with lexical similarity below this are not stored */
  MIN_EDGE_WEIGHT: 0.1,
  /** Sentences per row/column block */
  BLOCK_SIZE: 1000,
  /** Blocks computed concurrently per batch */
  WORKER_CONCURRENCY: 4,
  /** Memory utilization fraction that triggers reclamation between batches */
  MEMORY_PRESSURE_FRACTION: 0.85,
  PAGERANK_DAMPING: 0.85,
  PAGERANK_MAX_ITERATIONS: 100,
  PAGERANK_TOLERANCE: 1e-4,
  FAILURE_MESSAGE: 'Error during summarization. Please try again with smaller input.',
  /** Ratio and minimum lengths used by summarizeContent() */
  CONTENT_RATIO: 0.25,
  CONTENT_MIN_LENGTH: 3,
  TITLE_MIN_LENGTH: 1,
} as const;

// ============================================================================
// Tagger
// ============================================================================

export const TAGGER_CONFIG = {
  LABELS: [
    'Politics',
    'Economy',
    'Technology',
    'Health',
    'Science',
    'Environment',
    'Education',
    'Sports',
    'Entertainment',
    'Culture',
    'Business',
    'Lifestyle',
    'Travel',
  ],
  MIN_TAGS: 2,
  MAX_TAGS: 5,
  TEMPERATURE: 0,
  TIMEOUT_MS: 30_000,
  /** Characters of description sent to the model */
  MAX_DESCRIPTION_CHARS: 4000,
} as const;

// ============================================================================
// Retry Configuration
// ============================================================================

export const RETRY_CONFIG = {
  MAX_RETRIES: 3,
  INITIAL_DELAY_MS: 1000,
  MAX_DELAY_MS: 10000,
  BACKOFF_MULTIPLIER: 2,
} as const;

// ============================================================================
// Image Services
// ============================================================================

export const IMAGE_DOWNLOADER_CONFIG = {
  TIMEOUT_MS: 10_000,
  MAX_SIZE_BYTES: 15 * 1024 * 1024,
  USER_AGENT: 'Mozilla/5.0 (compatible; ArticleFusion/1.0)',
} as const;

export const IMAGE_DIMENSION_CONFIG = {
  DIMENSION_PROBE_TIMEOUT_MS: 8_000,
  DIMENSION_PROBE_RETRIES: 1,
} as const;

export const IMAGE_FILTER_CONFIG = {
  /** Dimension query params (w=, h=) below this mark a thumbnail */
  MIN_URL_DIMENSION: 100,
} as const;

// ============================================================================
// Pipeline
// ============================================================================

export const PIPELINE_CONFIG = {
  /** Descriptions shorter than this many sentences are not relevance-filtered */
  MIN_SENTENCES_FOR_RELEVANCE: 3,
  /** Items processed concurrently by runBatch (1 = sequential) */
  BATCH_CONCURRENCY: 1,
} as const;

// ============================================================================
// Validation
// ============================================================================

function validateConfiguration(): void {
  validatePositive(CONTENT_POOL_CONFIG.MIN_CONTENT_THRESHOLD, 'CONTENT_POOL_CONFIG.MIN_CONTENT_THRESHOLD');
  validatePositive(CONTENT_POOL_CONFIG.FETCH_CONCURRENCY, 'CONTENT_POOL_CONFIG.FETCH_CONCURRENCY');

  validateNonNegative(RELEVANCE_CONFIG.MIN_SENTENCE_LENGTH, 'RELEVANCE_CONFIG.MIN_SENTENCE_LENGTH');
  validateMinMax(0, RELEVANCE_CONFIG.PERCENTILE, '0', 'RELEVANCE_CONFIG.PERCENTILE');
  validateMinMax(RELEVANCE_CONFIG.PERCENTILE, 100, 'RELEVANCE_CONFIG.PERCENTILE', '100');
  validatePositive(RELEVANCE_CONFIG.EMBED_BATCH_SIZE, 'RELEVANCE_CONFIG.EMBED_BATCH_SIZE');
  validatePositive(RELEVANCE_CONFIG.KMEANS_MAX_ITERATIONS, 'RELEVANCE_CONFIG.KMEANS_MAX_ITERATIONS');

  validateNonNegative(CONSENSUS_CONFIG.QUORUM_TOLERANCE, 'CONSENSUS_CONFIG.QUORUM_TOLERANCE');
  validatePositive(CONSENSUS_CONFIG.TOP_N, 'CONSENSUS_CONFIG.TOP_N');
  validatePositive(CONSENSUS_CONFIG.IMAGE_CONCURRENCY, 'CONSENSUS_CONFIG.IMAGE_CONCURRENCY');

  validateFraction(SUMMARIZER_CONFIG.DEFAULT_RATIO, 'SUMMARIZER_CONFIG.DEFAULT_RATIO');
  validateNonNegative(SUMMARIZER_CONFIG.DEFAULT_MIN_LENGTH, 'SUMMARIZER_CONFIG.DEFAULT_MIN_LENGTH');
  validatePositive(SUMMARIZER_CONFIG.WINDOW_BYTES, 'SUMMARIZER_CONFIG.WINDOW_BYTES');
  validatePositive(SUMMARIZER_CONFIG.RECLAIM_EVERY_WINDOWS, 'SUMMARIZER_CONFIG.RECLAIM_EVERY_WINDOWS');
  validateFraction(SUMMARIZER_CONFIG.MIN_EDGE_WEIGHT, 'SUMMARIZER_CONFIG.MIN_EDGE_WEIGHT');
  validatePositive(SUMMARIZER_CONFIG.BLOCK_SIZE, 'SUMMARIZER_CONFIG.BLOCK_SIZE');
  validatePositive(SUMMARIZER_CONFIG.WORKER_CONCURRENCY, 'SUMMARIZER_CONFIG.WORKER_CONCURRENCY');
  validateFraction(SUMMARIZER_CONFIG.MEMORY_PRESSURE_FRACTION, 'SUMMARIZER_CONFIG.MEMORY_PRESSURE_FRACTION');
  validateFraction(SUMMARIZER_CONFIG.PAGERANK_DAMPING, 'SUMMARIZER_CONFIG.PAGERANK_DAMPING');
  validatePositive(SUMMARIZER_CONFIG.PAGERANK_MAX_ITERATIONS, 'SUMMARIZER_CONFIG.PAGERANK_MAX_ITERATIONS');
  validatePositive(SUMMARIZER_CONFIG.PAGERANK_TOLERANCE, 'SUMMARIZER_CONFIG.PAGERANK_TOLERANCE');
  validateFraction(SUMMARIZER_CONFIG.CONTENT_RATIO, 'SUMMARIZER_CONFIG.CONTENT_RATIO');

  validateMinMax(TAGGER_CONFIG.MIN_TAGS, TAGGER_CONFIG.MAX_TAGS, 'TAGGER_CONFIG.MIN_TAGS', 'TAGGER_CONFIG.MAX_TAGS');
  validateMinMax(
    TAGGER_CONFIG.MAX_TAGS,
    TAGGER_CONFIG.LABELS.length,
    'TAGGER_CONFIG.MAX_TAGS',
    'TAGGER_CONFIG.LABELS.length'
  );

  validatePositive(RETRY_CONFIG.MAX_RETRIES, 'RETRY_CONFIG.MAX_RETRIES');
  validatePositive(RETRY_CONFIG.INITIAL_DELAY_MS, 'RETRY_CONFIG.INITIAL_DELAY_MS');
  validateMinMax(
    RETRY_CONFIG.INITIAL_DELAY_MS,
    RETRY_CONFIG.MAX_DELAY_MS,
    'RETRY_CONFIG.INITIAL_DELAY_MS',
    'RETRY_CONFIG.MAX_DELAY_MS'
  );
  validatePositive(RETRY_CONFIG.BACKOFF_MULTIPLIER, 'RETRY_CONFIG.BACKOFF_MULTIPLIER');

  validatePositive(IMAGE_DOWNLOADER_CONFIG.TIMEOUT_MS, 'IMAGE_DOWNLOADER_CONFIG.TIMEOUT_MS');
  validatePositive(IMAGE_DOWNLOADER_CONFIG.MAX_SIZE_BYTES, 'IMAGE_DOWNLOADER_CONFIG.MAX_SIZE_BYTES');
  validateNonNegative(IMAGE_DIMENSION_CONFIG.DIMENSION_PROBE_RETRIES, 'IMAGE_DIMENSION_CONFIG.DIMENSION_PROBE_RETRIES');

  validatePositive(PIPELINE_CONFIG.BATCH_CONCURRENCY, 'PIPELINE_CONFIG.BATCH_CONCURRENCY');
}

// Run validation at module load time
validateConfiguration();
