/**
 * Exa Acquisition
 *
 * Search and page fetching through the Exa API. `search` returns candidate
 * URLs for the backfill loop; `fetch` retrieves one page's cleaned text,
 * title, byline and image links and shapes them into a `RawSourceItem`.
 *
 * Both calls reject on failure; the content pool decides what a failure
 * means.
 *
 * @see https://docs.exa.ai/reference/search
 * @see https://docs.exa.ai/reference/get-contents
 */

import { z } from 'zod';

import { withRetry } from '../fusion/retry';
import type { AcquisitionCollaborator, RawSourceItem } from '../fusion/types';
import { extractDomain } from '../fusion/utils/url-utils';
import { createPrefixedLogger, type Logger } from '../utils/logger';

// ============================================================================
// Configuration
// ============================================================================

export const EXA_API_BASE_URL = 'https://api.exa.ai';

const DEFAULT_TIMEOUT_MS = 20_000;
const MIN_RESULTS = 1;
const MAX_RESULTS = 25;
const DEFAULT_TEXT_MAX_CHARS = 20_000;
const DEFAULT_IMAGE_LINKS = 10;
const DEFAULT_LIVECRAWL_TIMEOUT_MS = 10_000;

export type ExaSearchType = 'auto' | 'neural' | 'keyword' | 'fast';

export interface ExaAcquisitionOptions {
  readonly apiKey: string;
  readonly baseUrl?: string;
  readonly searchType?: ExaSearchType;
  /** Restrict searches to news outlets (default: true) */
  readonly newsOnly?: boolean;
  readonly textMaxCharacters?: number;
  readonly imageLinks?: number;
  readonly timeoutMs?: number;
  readonly maxRetries?: number;
  readonly logger?: Logger;
}

export class ExaHttpError extends Error {
  readonly name = 'ExaHttpError';

  constructor(
    readonly status: number,
    endpoint: string
  ) {
    super(`Exa ${endpoint} responded ${status}`);
  }
}

// ============================================================================
// Response Parsing
// ============================================================================

const SearchResponseSchema = z.object({
  results: z.array(z.object({ url: z.string() }).passthrough()).default([]),
});

const ContentsResultSchema = z.object({
  url: z.string(),
  title: z.string().nullish(),
  author: z.string().nullish(),
  text: z.string().nullish(),
  image: z.string().nullish(),
  extras: z.object({ imageLinks: z.array(z.string()).nullish() }).nullish(),
});

const ContentsResponseSchema = z.object({
  results: z.array(ContentsResultSchema).default([]),
  statuses: z
    .array(z.object({ id: z.string(), status: z.string(), error: z.unknown().optional() }))
    .optional(),
});

export type ExaContentsResult = z.infer<typeof ContentsResultSchema>;

function clampInt(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, Math.trunc(value)));
}

/**
 * Splits page text into paragraphs on line breaks, dropping blank lines and
 * markdown heading markers.
 */
export function toParagraphs(text: string): string[] {
  return text
    .split(/\n+/)
    .map((line) => line.replace(/^#+\s*/, '').trim())
    .filter((line) => line.length > 0);
}

/**
 * Shapes one contents result. The page's lead image comes first.
 */
export function toRawSourceItem(requestedUrl: string, result: ExaContentsResult): RawSourceItem {
  const url = result.url.trim() || requestedUrl;
  const images = [result.image ?? '', ...(result.extras?.imageLinks ?? [])]
    .map((image) => image.trim())
    .filter((image, index, all) => image.length > 0 && all.indexOf(image) === index);

  return {
    url,
    title: result.title?.trim() ?? '',
    paragraphs: toParagraphs(result.text ?? ''),
    images,
    author: result.author?.trim() ?? '',
    domain: extractDomain(url),
  };
}

// ============================================================================
// Collaborator
// ============================================================================

export class ExaAcquisition implements AcquisitionCollaborator {
  private readonly options: ExaAcquisitionOptions;
  private readonly log: Logger;

  constructor(options: ExaAcquisitionOptions) {
    this.options = options;
    this.log = options.logger ?? createPrefixedLogger('[Exa]');
  }

  async search(seed: string, excludeDomains: readonly string[], count: number): Promise<string[]> {
    const query = seed.trim();
    if (query.length === 0 || count <= 0) return [];

    const body: Record<string, unknown> = {
      query,
      numResults: clampInt(count, MIN_RESULTS, MAX_RESULTS),
      type: this.options.searchType ?? 'auto',
    };
    if (this.options.newsOnly ?? true) {
      body.category = 'news';
    }
    if (excludeDomains.length > 0) {
      body.excludeDomains = [...excludeDomains];
    }

    const json = await this.post('/search', body);
    const parsed = SearchResponseSchema.parse(json);
    const urls = parsed.results.map((r) => r.url.trim()).filter((url) => url.length > 0);
    this.log.debug(`search("${query}") → ${urls.length} url(s)`);
    return urls;
  }

  async fetch(url: string): Promise<RawSourceItem> {
    const json = await this.post('/contents', {
      urls: [url],
      text: { maxCharacters: this.options.textMaxCharacters ?? DEFAULT_TEXT_MAX_CHARS },
      extras: { imageLinks: this.options.imageLinks ?? DEFAULT_IMAGE_LINKS },
      livecrawl: 'preferred',
      livecrawlTimeout: DEFAULT_LIVECRAWL_TIMEOUT_MS,
    });
    const parsed = ContentsResponseSchema.parse(json);

    const failedStatus = parsed.statuses?.find((s) => s.status === 'error');
    const [result] = parsed.results;
    if (!result) {
      throw new Error(failedStatus ? `Exa could not crawl ${url}` : `Exa returned no contents for ${url}`);
    }
    return toRawSourceItem(url, result);
  }

  private async post(endpoint: string, body: Record<string, unknown>): Promise<unknown> {
    const baseUrl = this.options.baseUrl ?? EXA_API_BASE_URL;
    const timeoutMs = this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

    return withRetry(
      async () => {
        const res = await fetch(`${baseUrl}${endpoint}`, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            'x-api-key': this.options.apiKey,
          },
          body: JSON.stringify(body),
          signal: AbortSignal.timeout(timeoutMs),
        });
        if (!res.ok) {
          throw new ExaHttpError(res.status, endpoint);
        }
        const json: unknown = await res.json();
        return json;
      },
      { context: `Exa ${endpoint}`, maxRetries: this.options.maxRetries }
    );
  }
}
