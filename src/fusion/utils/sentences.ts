/**
 * Sentence Splitting
 */

import nlp from 'compromise';

export type SentenceSplitter = (text: string) => string[];

/**
 * Splits prose into trimmed, non-empty sentences.
 *
 * @example
 * splitSentences('The vote passed. Turnout was high.')
 * // ['The vote passed.', 'Turnout was high.']
 */
export const splitSentences: SentenceSplitter = (text) => {
  if (!text.trim()) return [];
  const raw: unknown[] = nlp(text).sentences().out('array');
  return raw
    .filter((sentence): sentence is string => typeof sentence === 'string')
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
};

/**
 * Whether a sentence closes with terminal punctuation, optionally followed by
 * closing quotes or brackets.
 */
export function endsWithTerminalPunctuation(text: string): boolean {
  return /[.!?]["'”’)\]]*\s*$/.test(text);
}

/**
 * Whether the text contains at least one letter or digit.
 */
export function hasAlphanumeric(text: string): boolean {
  return /[\p{L}\p{N}]/u.test(text);
}
