/**
 * Lexical Similarity
 *
 * Jaccard overlap between the content-word sets of two sentences.
 */

import stopWordList from '../data/stop-words.json';

export const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

/**
 * Lower-cased alphanumeric tokens of a sentence, minus stop words.
 *
 * @example
 * contentTokens('The Senate passed the bill.') // Set { 'senate', 'passed', 'bill' }
 */
export function contentTokens(sentence: string, stopWords: ReadonlySet<string> = STOP_WORDS): ReadonlySet<string> {
  const tokens = new Set<string>();
  for (const token of sentence.toLowerCase().split(/[^\p{L}\p{N}]+/u)) {
    if (token && !stopWords.has(token)) tokens.add(token);
  }
  return tokens;
}

/**
 * |A ∩ B| / |A ∪ B|; 0 when either set is empty.
 */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let intersection = 0;
  for (const token of small) {
    if (large.has(token)) intersection++;
  }
  return intersection / (a.size + b.size - intersection);
}

/**
 * Similarity of two sentences given their precomputed token sets. Identical
 * sentences score 1.
 */
export function sentenceSimilarity(
  first: string,
  second: string,
  firstTokens: ReadonlySet<string>,
  secondTokens: ReadonlySet<string>
): number {
  if (first === second) return 1;
  return jaccard(firstTokens, secondTokens);
}
