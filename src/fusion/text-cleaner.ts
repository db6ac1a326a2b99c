/**
 * Text Cleaner
 *
 * Strips scraping residue from titles and descriptions: markup, links, outlet
 * attributions, wire-service prefixes, quotes, ellipses and recurring
 * boilerplate. Stages run in a fixed order; later stages assume the earlier
 * ones ran.
 */

import { SUMMARIZER_CONFIG } from './config';
import { describeError } from './errors';
import { ExtractiveSummarizer, type SummarizeContentOptions } from './summarizer';
import { createPrefixedLogger, type Logger } from '../utils/logger';

// ============================================================================
// Stages
// ============================================================================

type CleaningStage = (text: string) => string;

const CLEANING_STAGES: readonly CleaningStage[] = [
  // markup
  (t) => t.replace(/<[^>]+>/g, ''),
  // links
  (t) => t.replace(/https?:\/\/\S+|www\.\S+|\S+\.(?:com|org|net|edu)\S*/gi, ''),
  // outlet and social attributions ("... - CNN", "... - Reuters")
  (t) =>
    t.replace(
      /\s*-\s*(?:ABC|NBC|Fox|CNN|MSNBC|News|Twitter|X|Facebook|Reddit|Instagram|Yahoo|Reuters)\b.*$/i,
      ''
    ),
  // wire prefixes
  (t) => t.replace(/^\s*(?:Page\s*Unavailable\s*-?|BREAKING\s*:?|ALERT\s*:?)/i, ''),
  // double quotes, and single quotes that are not apostrophes inside a word
  (t) => t.replace(/["“”]/g, '').replace(/(?<![\p{L}\p{N}])['‘’]|['‘’](?![\p{L}\p{N}])/gu, ''),
  // ellipses
  (t) => t.replace(/\.{3,}|…/g, ''),
  (t) => t.replace(/^(?:No\s*Title\s*)+/i, ''),
  // recurring column and live-blog suffixes
  (t) =>
    t.replace(
      /\s*(?:My\s*first\s*bet|Game\s*Recap|Morning\s*Break|What\s*We\s*Learned|Live\s*updates\s*and\s*reaction).*$/i,
      ''
    ),
  // sports outlets
  (t) => t.replace(/\s*-\s*(?:ESPN|The\s*Athletic|X)\b.*$/i, ''),
  (t) => t.replace(/\s*is part of the\s*.*\s*family of brands/i, ''),
  // bylines
  (t) => t.replace(/\s*-\s*By\s*[A-Za-z]+.*$/i, ''),
  (t) => t.replace(/\s+/g, ' '),
  // trailing site names
  (t) => t.replace(/\s*\b(?:go\.com|news\.com|online)\s*$/i, ''),
  (t) => t.replace(/\s*originally\s*appeared\s*on.*$/i, ''),
  (t) => t.trim(),
];

/**
 * Runs every cleaning stage over `text`.
 *
 * @example
 * cleanText('<p>BREAKING: Senate passes "budget" bill...</p> - CNN')
 * // 'Senate passes budget bill'
 */
export function cleanText(text: string): string {
  return CLEANING_STAGES.reduce((current, stage) => stage(current), text);
}

// ============================================================================
// Text Cleaner
// ============================================================================

export interface TextCleanerDeps {
  readonly summarizer?: ExtractiveSummarizer;
  readonly logger?: Logger;
}

export class TextCleaner {
  private readonly summarizer: ExtractiveSummarizer;
  private readonly log: Logger;

  constructor(deps: TextCleanerDeps = {}) {
    this.summarizer = deps.summarizer ?? new ExtractiveSummarizer();
    this.log = deps.logger ?? createPrefixedLogger('[TextCleaner]');
  }

  /**
   * Cleans one string. If a stage throws, the trimmed input is returned.
   */
  clean(text: string): string {
    try {
      return cleanText(text);
    } catch (error) {
      this.log.error(`Cleaning failed: ${describeError(error)}`);
      return text.trim();
    }
  }

  cleanBatch(texts: readonly string[]): string[] {
    return texts.map((text) => this.clean(text));
  }

  /**
   * Summarizes a text collection, then cleans the summary. Yields "" when the
   * summarizer reports a failure.
   */
  async summarizeAndClean(texts: readonly string[], options: SummarizeContentOptions = {}): Promise<string> {
    const summary = await this.summarizer.summarizeContent(texts, options);
    if (summary === SUMMARIZER_CONFIG.FAILURE_MESSAGE) {
      this.log.warn(`Summarizer failed on ${texts.length} text(s)`);
      return '';
    }
    const cleaned = this.clean(summary);
    this.log.debug(`Summarized ${texts.length} text(s) into ${cleaned.length} characters`);
    return cleaned;
  }
}
