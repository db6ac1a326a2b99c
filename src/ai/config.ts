/**
 * Provider Configuration
 *
 * Environment keys, default models and the typed settings every provider is
 * built from. `loadEnvironment()` reads `.env` through dotenv and validates
 * the result with zod; `parseEnvironment()` is the pure half used by tests.
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

import type { EmbeddingSettings, GenerationSettings } from './providers/types';

// ============================================================================
// Keys and Defaults
// ============================================================================

/**
 * Environment variable names. Model variables override AI_DEFAULT_MODELS.
 */
export const AI_ENV_KEYS = {
  EMBEDDING_PROVIDER: 'EMBEDDING_PROVIDER',
  GENERATION_PROVIDER: 'GENERATION_PROVIDER',
  EMBEDDING_MODEL: 'AI_MODEL_EMBEDDING',
  GENERATION_MODEL: 'AI_MODEL_GENERATION',
  JINA_API_KEY: 'JINA_API_KEY',
  OPENAI_API_KEY: 'OPENAI_API_KEY',
  OPENROUTER_API_KEY: 'OPENROUTER_API_KEY',
  EXA_API_KEY: 'EXA_API_KEY',
  DATABASE_FILE: 'DATABASE_FILE',
} as const;

/**
 * Default model per provider variant.
 *
 * Image consensus needs a shared text/image space, so only the Jina CLIP
 * model can embed images; the OpenAI variant is text-only.
 */
export const AI_DEFAULT_MODELS = {
  JINA_EMBEDDING: 'jina-clip-v2',
  OPENAI_EMBEDDING: 'text-embedding-3-small',
  OPENROUTER_GENERATION: 'deepseek/deepseek-v3.2',
  OPENAI_GENERATION: 'gpt-4o-mini',
} as const;

export const DEFAULT_DATABASE_FILE = './data/articles.sqlite';

// ============================================================================
// Settings
// ============================================================================

export interface ProviderSettings {
  readonly embedding: EmbeddingSettings;
  readonly generation: GenerationSettings;
  /** Absent when search/fetch is not configured */
  readonly exaApiKey?: string;
  readonly databaseFile: string;
}

export class EnvironmentError extends Error {
  constructor(message: string) {
    super(`Environment error: ${message}`);
    this.name = 'EnvironmentError';
  }
}

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const EnvironmentSchema = z.object({
  [AI_ENV_KEYS.EMBEDDING_PROVIDER]: z.enum(['jina', 'openai']).default('jina'),
  [AI_ENV_KEYS.GENERATION_PROVIDER]: z.enum(['openrouter', 'openai']).default('openrouter'),
  [AI_ENV_KEYS.EMBEDDING_MODEL]: optionalString,
  [AI_ENV_KEYS.GENERATION_MODEL]: optionalString,
  [AI_ENV_KEYS.JINA_API_KEY]: optionalString,
  [AI_ENV_KEYS.OPENAI_API_KEY]: optionalString,
  [AI_ENV_KEYS.OPENROUTER_API_KEY]: optionalString,
  [AI_ENV_KEYS.EXA_API_KEY]: optionalString,
  [AI_ENV_KEYS.DATABASE_FILE]: optionalString,
});

function requireKey(value: string | undefined, key: string, purpose: string): string {
  if (!value) {
    throw new EnvironmentError(`${key} is required for ${purpose}`);
  }
  return value;
}

/**
 * Builds provider settings from an environment map.
 *
 * @throws EnvironmentError when a variable is malformed or a selected
 * provider's key is missing
 */
export function parseEnvironment(env: Readonly<Record<string, string | undefined>>): ProviderSettings {
  const parsed = EnvironmentSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new EnvironmentError(issues.join('; '));
  }
  const values = parsed.data;

  const embeddingModel = values.AI_MODEL_EMBEDDING;
  const embedding: EmbeddingSettings =
    values.EMBEDDING_PROVIDER === 'jina'
      ? {
          kind: 'jina',
          apiKey: requireKey(values.JINA_API_KEY, AI_ENV_KEYS.JINA_API_KEY, 'jina embeddings'),
          model: embeddingModel ?? AI_DEFAULT_MODELS.JINA_EMBEDDING,
        }
      : {
          kind: 'openai',
          apiKey: requireKey(values.OPENAI_API_KEY, AI_ENV_KEYS.OPENAI_API_KEY, 'openai embeddings'),
          model: embeddingModel ?? AI_DEFAULT_MODELS.OPENAI_EMBEDDING,
        };

  const generationModel = values.AI_MODEL_GENERATION;
  const generation: GenerationSettings =
    values.GENERATION_PROVIDER === 'openrouter'
      ? {
          kind: 'openrouter',
          apiKey: requireKey(values.OPENROUTER_API_KEY, AI_ENV_KEYS.OPENROUTER_API_KEY, 'openrouter generation'),
          model: generationModel ?? AI_DEFAULT_MODELS.OPENROUTER_GENERATION,
        }
      : {
          kind: 'openai',
          apiKey: requireKey(values.OPENAI_API_KEY, AI_ENV_KEYS.OPENAI_API_KEY, 'openai generation'),
          model: generationModel ?? AI_DEFAULT_MODELS.OPENAI_GENERATION,
        };

  return {
    embedding,
    generation,
    ...(values.EXA_API_KEY ? { exaApiKey: values.EXA_API_KEY } : {}),
    databaseFile: values.DATABASE_FILE ?? DEFAULT_DATABASE_FILE,
  };
}

/**
 * Loads `.env` (existing variables win) and parses `process.env`.
 */
export function loadEnvironment(options: { readonly path?: string } = {}): ProviderSettings {
  loadDotenv(options.path ? { path: options.path } : {});
  return parseEnvironment(process.env);
}
