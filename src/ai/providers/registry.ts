/**
 * Provider Registry
 *
 * Resolves tagged provider settings to concrete providers exactly once.
 * Unknown variants are unrepresentable; adding one means extending the
 * settings union and the switch below.
 */

import type { Logger } from '../../utils/logger';
import { createGenerationProvider, createOpenAIEmbeddingProvider } from './ai-sdk';
import { JinaEmbeddingProvider } from './jina';
import type {
  EmbeddingSettings,
  GenerationSettings,
  KindedEmbeddingProvider,
  ModelBackedGenerationProvider,
} from './types';

export interface ProviderRegistry {
  readonly embedding: KindedEmbeddingProvider;
  readonly generation: ModelBackedGenerationProvider;
}

export function resolveEmbeddingProvider(settings: EmbeddingSettings, logger?: Logger): KindedEmbeddingProvider {
  switch (settings.kind) {
    case 'jina':
      return new JinaEmbeddingProvider({
        apiKey: settings.apiKey,
        model: settings.model,
        baseUrl: settings.baseUrl,
        logger,
      });
    case 'openai':
      return createOpenAIEmbeddingProvider(settings.apiKey, settings.model, logger);
  }
}

export function resolveGenerationProvider(
  settings: GenerationSettings,
  logger?: Logger
): ModelBackedGenerationProvider {
  return createGenerationProvider(settings, logger);
}

export function createProviderRegistry(
  settings: { readonly embedding: EmbeddingSettings; readonly generation: GenerationSettings },
  logger?: Logger
): ProviderRegistry {
  return {
    embedding: resolveEmbeddingProvider(settings.embedding, logger),
    generation: resolveGenerationProvider(settings.generation, logger),
  };
}
