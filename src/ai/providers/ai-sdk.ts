/**
 * AI SDK Providers
 *
 * Embedding and generation providers backed by the Vercel AI SDK. The
 * OpenAI embedding variant is text-only: images are rejected with a
 * `ProviderFailure`, which the image selector treats as "no match".
 */

import { createOpenAI } from '@ai-sdk/openai';
import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import { embed, generateText, type EmbeddingModel, type LanguageModel } from 'ai';

import { ProviderFailure } from '../../fusion/errors';
import { withRetry } from '../../fusion/retry';
import type { GenerationOptions } from '../../fusion/types';
import { createPrefixedLogger, type Logger } from '../../utils/logger';
import type {
  GenerationKind,
  GenerationSettings,
  KindedEmbeddingProvider,
  ModelBackedGenerationProvider,
} from './types';

// ============================================================================
// Embeddings
// ============================================================================

export interface AiSdkEmbeddingProviderOptions {
  readonly model: EmbeddingModel<string>;
  readonly logger?: Logger;
}

export class AiSdkEmbeddingProvider implements KindedEmbeddingProvider {
  readonly kind = 'openai';
  private readonly model: EmbeddingModel<string>;
  private readonly log: Logger;

  constructor(options: AiSdkEmbeddingProviderOptions) {
    this.model = options.model;
    this.log = options.logger ?? createPrefixedLogger('[Embeddings]');
  }

  async embedText(text: string): Promise<number[]> {
    const { embedding } = await withRetry(() => embed({ model: this.model, value: text, maxRetries: 0 }), {
      context: 'embedText',
    });
    this.log.debug(`embedText → ${embedding.length} dims`);
    return embedding;
  }

  async embedImage(url: string): Promise<number[]> {
    throw new ProviderFailure('embedImage', new Error(`text-only embedding model cannot embed ${url}`));
  }
}

export function createOpenAIEmbeddingProvider(apiKey: string, model: string, logger?: Logger): AiSdkEmbeddingProvider {
  const openai = createOpenAI({ apiKey });
  return new AiSdkEmbeddingProvider({ model: openai.textEmbeddingModel(model), logger });
}

// ============================================================================
// Generation
// ============================================================================

export interface AiSdkGenerationProviderOptions {
  readonly kind: GenerationKind;
  readonly model: LanguageModel;
  readonly logger?: Logger;
}

export class AiSdkGenerationProvider implements ModelBackedGenerationProvider {
  readonly kind: GenerationKind;
  readonly model: LanguageModel;
  private readonly log: Logger;

  constructor(options: AiSdkGenerationProviderOptions) {
    this.kind = options.kind;
    this.model = options.model;
    this.log = options.logger ?? createPrefixedLogger(`[Generation:${options.kind}]`);
  }

  async generate(text: string, options: GenerationOptions = {}): Promise<string> {
    const result = await withRetry(
      () =>
        generateText({
          model: this.model,
          prompt: text,
          system: options.system,
          temperature: options.temperature,
          maxOutputTokens: options.maxOutputTokens,
          abortSignal: options.signal,
          maxRetries: 0,
        }),
      { context: `generate(${this.kind})`, signal: options.signal }
    );
    this.log.debug(`Generated ${result.text.length} characters`);
    return result.text.trim();
  }
}

/**
 * Builds the generation provider for one settings variant.
 */
export function createGenerationProvider(settings: GenerationSettings, logger?: Logger): AiSdkGenerationProvider {
  switch (settings.kind) {
    case 'openrouter': {
      const openrouter = createOpenRouter({ apiKey: settings.apiKey });
      return new AiSdkGenerationProvider({ kind: 'openrouter', model: openrouter(settings.model), logger });
    }
    case 'openai': {
      const openai = createOpenAI({ apiKey: settings.apiKey });
      return new AiSdkGenerationProvider({ kind: 'openai', model: openai(settings.model), logger });
    }
  }
}
