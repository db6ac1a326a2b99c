/**
 * Vector Helpers
 */

import { cosineSimilarity } from 'ai';

import { ProviderFailure } from '../errors';
import { err, ok, type Result } from '../result';

/**
 * Cosine similarity that reports a dimension mismatch as a failure instead of
 * throwing.
 */
export function safeCosine(a: readonly number[], b: readonly number[]): Result<number, ProviderFailure> {
  if (a.length === 0 || a.length !== b.length) {
    return err(new ProviderFailure('cosineSimilarity', `dimension mismatch (${a.length} vs ${b.length})`));
  }
  return ok(cosineSimilarity([...a], [...b]));
}
