/**
 * Jina Embeddings
 *
 * Multimodal embedding provider: texts and image URLs are embedded by the
 * same CLIP model, so their vectors are directly comparable.
 *
 * @see https://jina.ai/embeddings
 */

import { z } from 'zod';

import { ProviderFailure } from '../../fusion/errors';
import { withRetry } from '../../fusion/retry';
import { createPrefixedLogger, type Logger } from '../../utils/logger';
import type { KindedEmbeddingProvider } from './types';

// ============================================================================
// Configuration
// ============================================================================

export const JINA_API_BASE_URL = 'https://api.jina.ai/v1';

const DEFAULT_TIMEOUT_MS = 20_000;

const EmbeddingResponseSchema = z.object({
  data: z.array(z.object({ index: z.number().optional(), embedding: z.array(z.number()) })).min(1),
});

type JinaInput = { readonly text: string } | { readonly image: string };

export interface JinaEmbeddingOptions {
  readonly apiKey: string;
  readonly model: string;
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
  readonly maxRetries?: number;
  readonly logger?: Logger;
}

/**
 * HTTP error carrying the status so `withRetry` can classify it.
 */
export class JinaHttpError extends Error {
  readonly name = 'JinaHttpError';

  constructor(
    readonly status: number,
    body: string
  ) {
    super(`Jina responded ${status}: ${body.slice(0, 200)}`);
  }
}

// ============================================================================
// Provider
// ============================================================================

export class JinaEmbeddingProvider implements KindedEmbeddingProvider {
  readonly kind = 'jina';
  private readonly options: JinaEmbeddingOptions;
  private readonly log: Logger;

  constructor(options: JinaEmbeddingOptions) {
    this.options = options;
    this.log = options.logger ?? createPrefixedLogger('[Jina]');
  }

  embedText(text: string): Promise<number[]> {
    return this.embed({ text }, 'embedText');
  }

  embedImage(url: string): Promise<number[]> {
    return this.embed({ image: url }, 'embedImage');
  }

  private async embed(input: JinaInput, operation: string): Promise<number[]> {
    const baseUrl = this.options.baseUrl ?? JINA_API_BASE_URL;
    const timeoutMs = this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

    const json = await withRetry(
      async () => {
        const res = await fetch(`${baseUrl}/embeddings`, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.options.apiKey}`,
          },
          body: JSON.stringify({ model: this.options.model, input: [input] }),
          signal: AbortSignal.timeout(timeoutMs),
        });
        if (!res.ok) {
          throw new JinaHttpError(res.status, await res.text());
        }
        const body: unknown = await res.json();
        return body;
      },
      { context: `Jina ${operation}`, maxRetries: this.options.maxRetries }
    );

    const parsed = EmbeddingResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProviderFailure(operation, new Error('Unexpected embedding response shape'));
    }
    const [first] = parsed.data.data;
    if (!first || first.embedding.length === 0) {
      throw new ProviderFailure(operation, new Error('Empty embedding'));
    }
    this.log.debug(`${operation} → ${first.embedding.length} dims`);
    return first.embedding;
  }
}
