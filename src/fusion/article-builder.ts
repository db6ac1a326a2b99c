/**
 * Canonical Article Builder
 *
 * Assembles the publishable record from a pool snapshot and the selector
 * outputs. The publish gate lives here: without at least one selected image
 * the result is a `Discard` decision, never an article.
 */

import type { BuildOutcome, CanonicalArticle, ContentPoolSnapshot, Discard } from './types';
import { dedupKey, extractDomain } from './utils/url-utils';

// ============================================================================
// Types
// ============================================================================

export interface BuildArticleInput {
  readonly pool: ContentPoolSnapshot;
  readonly title: string;
  readonly description: string;
  readonly images: readonly string[];
  readonly tags: readonly string[];
}

// ============================================================================
// Unions
// ============================================================================

/**
 * Concatenates lists keeping the first entry per trimmed, case-insensitive
 * key.
 */
export function unionDistinct(...lists: readonly (readonly string[])[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of lists.flat()) {
    const trimmed = value.trim();
    const key = dedupKey(trimmed);
    if (!trimmed || seen.has(key)) continue;
    seen.add(key);
    out.push(trimmed);
  }
  return out;
}

/**
 * Concatenates source URL lists keeping the first URL per normalized domain.
 * URLs without a parseable host are deduplicated by their text.
 */
export function unionByDomain(...lists: readonly (readonly string[])[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of lists.flat()) {
    const url = value.trim();
    const key = extractDomain(url) || dedupKey(url);
    if (!url || seen.has(key)) continue;
    seen.add(key);
    out.push(url);
  }
  return out;
}

// ============================================================================
// Build
// ============================================================================

const NO_IMAGES: Discard = { discarded: true, reason: 'no_images' };

export function buildArticle(input: BuildArticleInput): BuildOutcome {
  const images = unionDistinct(input.images);
  if (images.length === 0) return NO_IMAGES;

  return {
    title: input.title.trim(),
    description: input.description.trim(),
    images,
    sources: unionByDomain(input.pool.sources),
    authors: unionDistinct(input.pool.authors),
    tags: unionDistinct(input.tags),
  };
}

/**
 * Folds a newly built article into an existing one. Text fields and tags come
 * from the update when it has them; images, sources (by domain) and authors
 * are unioned with existing entries first. Merging the same update twice
 * gives the same record.
 */
export function mergeArticles<T extends CanonicalArticle>(existing: T, update: CanonicalArticle): T {
  return {
    ...existing,
    title: update.title.trim() || existing.title,
    description: update.description.trim() || existing.description,
    images: unionDistinct(existing.images, update.images),
    sources: unionByDomain(existing.sources, update.sources),
    authors: unionDistinct(existing.authors, update.authors),
    tags: update.tags.length > 0 ? unionDistinct(update.tags) : existing.tags,
  };
}
