/**
 * Tagger
 *
 * Classifies an article into a closed set of topic labels with a structured
 * generation call. Tagging is best-effort: a provider failure yields no tags
 * rather than failing the article.
 */

import { generateObject, type LanguageModel } from 'ai';
import { z } from 'zod';

import { TAGGER_CONFIG } from './config';
import { ProviderFailure } from './errors';
import { attempt } from './result';
import { withRetry } from './retry';
import { createPrefixedLogger, type Logger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export type TopicLabel = (typeof TAGGER_CONFIG.LABELS)[number];

export const TagSelectionSchema = z.object({
  tags: z
    .array(z.enum(TAGGER_CONFIG.LABELS))
    .min(TAGGER_CONFIG.MIN_TAGS)
    .max(TAGGER_CONFIG.MAX_TAGS)
    .describe('Most relevant labels first'),
});

export interface TaggerDeps {
  readonly model: LanguageModel;
  readonly logger?: Logger;
  readonly signal?: AbortSignal;
  /** Retry attempts for transient failures (default: RETRY_CONFIG.MAX_RETRIES) */
  readonly maxRetries?: number;
}

// ============================================================================
// Prompts
// ============================================================================

function buildSystemPrompt(): string {
  return [
    'You classify news articles by topic.',
    `Choose between ${TAGGER_CONFIG.MIN_TAGS} and ${TAGGER_CONFIG.MAX_TAGS} labels from this list only:`,
    TAGGER_CONFIG.LABELS.join(', '),
    'Order them from most to least relevant.',
  ].join('\n');
}

export function buildTaggerPrompt(title: string, description: string): string {
  const body = description.slice(0, TAGGER_CONFIG.MAX_DESCRIPTION_CHARS);
  return `Title: ${title.trim()}\n\nDescription: ${body.trim()}`;
}

// ============================================================================
// Tagger
// ============================================================================

/**
 * Deduplicates while keeping model order, capped at MAX_TAGS.
 */
export function normalizeTags(tags: readonly TopicLabel[]): TopicLabel[] {
  return [...new Set(tags)].slice(0, TAGGER_CONFIG.MAX_TAGS);
}

/**
 * @returns Topic labels, or [] when classification fails
 */
export async function generateTags(title: string, description: string, deps: TaggerDeps): Promise<TopicLabel[]> {
  const log = deps.logger ?? createPrefixedLogger('[Tagger]');

  const createTimeoutSignal = (): AbortSignal => {
    const timeoutSignal = AbortSignal.timeout(TAGGER_CONFIG.TIMEOUT_MS);
    return deps.signal ? AbortSignal.any([deps.signal, timeoutSignal]) : timeoutSignal;
  };

  const result = await attempt(
    () =>
      withRetry(
        () =>
          generateObject({
            model: deps.model,
            schema: TagSelectionSchema,
            temperature: TAGGER_CONFIG.TEMPERATURE,
            system: buildSystemPrompt(),
            prompt: buildTaggerPrompt(title, description),
            abortSignal: createTimeoutSignal(),
          }),
        { context: 'Tag generation', signal: deps.signal, maxRetries: deps.maxRetries }
      ),
    (cause) => new ProviderFailure('generateTags', cause)
  );

  if (!result.success) {
    log.warn(`${result.error.message}; publishing without tags`);
    return [];
  }

  const tags = normalizeTags(result.value.object.tags);
  log.info(`Tagged "${title.slice(0, 60)}": ${tags.join(', ')}`);
  return tags;
}
