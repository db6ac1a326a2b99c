import { describe, it, expect } from 'vitest';

import { AiSdkEmbeddingProvider } from '../../../src/ai/providers/ai-sdk';
import { JinaEmbeddingProvider } from '../../../src/ai/providers/jina';
import {
  createProviderRegistry,
  resolveEmbeddingProvider,
  resolveGenerationProvider,
} from '../../../src/ai/providers/registry';
import { silentLogger } from '../../../src/utils/logger';

describe('provider registry', () => {
  it('resolves each embedding variant', () => {
    const jina = resolveEmbeddingProvider({ kind: 'jina', apiKey: 'test-secret', model: 'jina-clip-v2' });
    const openai = resolveEmbeddingProvider({
      kind: 'openai',
      apiKey: 'test-secret',
      model: 'text-embedding-3-small',
    });

    expect(jina).toBeInstanceOf(JinaEmbeddingProvider);
    expect(jina.kind).toBe('jina');
    expect(openai).toBeInstanceOf(AiSdkEmbeddingProvider);
    expect(openai.kind).toBe('openai');
  });

  it('resolves generation providers', () => {
    expect(resolveGenerationProvider({ kind: 'openai', apiKey: 'test-secret', model: 'gpt-4o-mini' }).kind).toBe(
      'openai'
    );
  });

  it('builds both providers from settings', () => {
    const registry = createProviderRegistry(
      {
        embedding: { kind: 'jina', apiKey: 'test-secret', model: 'jina-clip-v2' },
        generation: { kind: 'openrouter', apiKey: 'test-secret', model: 'deepseek/deepseek-v3.2' },
      },
      silentLogger
    );

    expect(registry.embedding.kind).toBe('jina');
    expect(registry.generation.kind).toBe('openrouter');
  });
});
