/**
 * Streaming Sentence Tokenizer
 *
 * Tokenizes a sequence of text windows into sentences. When a window does not
 * end on terminal punctuation its last sentence is incomplete: the raw tail is
 * carried into the next window instead of being emitted.
 */

import { endsWithTerminalPunctuation, splitSentences, type SentenceSplitter } from '../utils/sentences';

export interface SentenceStreamOptions {
  readonly split?: SentenceSplitter;
  /** Called after each window with its 1-based index */
  readonly onWindow?: (windowIndex: number) => Promise<void> | void;
}

export interface TokenizedStream {
  readonly sentences: string[];
  readonly windows: number;
}

/**
 * @example
 * const { sentences } = await tokenizeWindows(new ChunkedSequence(path, 1024 * 1024));
 */
export async function tokenizeWindows(
  windows: AsyncIterable<string>,
  options: SentenceStreamOptions = {}
): Promise<TokenizedStream> {
  const split = options.split ?? splitSentences;
  const sentences: string[] = [];
  let carry = '';
  let windowCount = 0;

  for await (const window of windows) {
    windowCount++;
    const text = carry + window;
    carry = '';

    const windowSentences = split(text);
    if (!endsWithTerminalPunctuation(text) && windowSentences.length > 0) {
      const last = windowSentences.pop() ?? '';
      const start = text.lastIndexOf(last);
      // keep the untrimmed tail so a word cut at the boundary rejoins cleanly
      carry = start >= 0 ? text.slice(start) : `${last} `;
    }
    sentences.push(...windowSentences);

    await options.onWindow?.(windowCount);
  }

  if (carry.trim()) {
    sentences.push(...split(carry));
  }
  return { sentences, windows: windowCount };
}
