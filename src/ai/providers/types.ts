/**
 * Provider Variants
 *
 * Closed set of provider implementations. Settings are tagged by `kind` and
 * resolved to concrete providers once, in the registry.
 */

import type { LanguageModel } from 'ai';

import type { EmbeddingProvider, GenerationProvider } from '../../fusion/types';

export type EmbeddingSettings =
  | { readonly kind: 'jina'; readonly apiKey: string; readonly model: string; readonly baseUrl?: string }
  | { readonly kind: 'openai'; readonly apiKey: string; readonly model: string };

export type GenerationSettings =
  | { readonly kind: 'openrouter'; readonly apiKey: string; readonly model: string }
  | { readonly kind: 'openai'; readonly apiKey: string; readonly model: string };

export type EmbeddingKind = EmbeddingSettings['kind'];
export type GenerationKind = GenerationSettings['kind'];

/**
 * A generation provider that also exposes its AI SDK model, so structured
 * calls (`generateObject`) can reuse the same configuration.
 */
export interface ModelBackedGenerationProvider extends GenerationProvider {
  readonly kind: GenerationKind;
  readonly model: LanguageModel;
}

export interface KindedEmbeddingProvider extends EmbeddingProvider {
  readonly kind: EmbeddingKind;
}
