/**
 * Backoff for provider calls, searches and page fetches. Only errors that
 * look transient are retried; the rest propagate on the first attempt.
 */

import { createPrefixedLogger } from '../utils/logger';
import { RETRY_CONFIG } from './config';
import { describeError } from './errors';

export interface RetryOptions {
  readonly maxRetries?: number;
  readonly initialDelayMs?: number;
  readonly maxDelayMs?: number;
  /** Label used in log lines and the cancellation error */
  readonly context?: string;
  readonly shouldRetry?: (error: unknown) => boolean;
  readonly signal?: AbortSignal;
}

const TRANSIENT_MESSAGES: readonly RegExp[] = [
  /rate.?limit/i,
  /too.?many.?requests/i,
  /\b429\b/,
  /\b5\d{2}\b/,
  /fetch.*fail/i,
  /network/i,
  /ETIMEDOUT|ECONNRESET|ECONNREFUSED/,
  /socket.?hang.?up/i,
  /service.?unavailable|bad.?gateway|internal.?server.?error/i,
  /overloaded|capacity|temporarily/i,
  // a second sample of structured output may parse
  /did not match schema|no object generated|invalid json/i,
];

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) return undefined;
  const { status } = error;
  return typeof status === 'number' ? status : undefined;
}

export function isRetryableError(error: unknown): boolean {
  if (!error) return false;
  // timeouts are a budget problem
  if (error instanceof DOMException && error.name === 'TimeoutError') return false;

  if (TRANSIENT_MESSAGES.some((pattern) => pattern.test(describeError(error)))) return true;

  const status = statusOf(error);
  return status === 429 || (status !== undefined && status >= 500 && status < 600);
}

/** Exponential, capped, with ±25% jitter */
function backoffDelay(attempt: number, initialDelayMs: number, maxDelayMs: number): number {
  const capped = Math.min(initialDelayMs * RETRY_CONFIG.BACKOFF_MULTIPLIER ** attempt, maxDelayMs);
  return Math.round(capped * (1 + 0.25 * (Math.random() * 2 - 1)));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * @example
 * const urls = await withRetry(() => exa.search(seed, [], 5), { context: 'Exa search' });
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = options.maxRetries ?? RETRY_CONFIG.MAX_RETRIES;
  const initialDelayMs = options.initialDelayMs ?? RETRY_CONFIG.INITIAL_DELAY_MS;
  const maxDelayMs = options.maxDelayMs ?? RETRY_CONFIG.MAX_DELAY_MS;
  const context = options.context ?? 'operation';
  const shouldRetry = options.shouldRetry ?? isRetryableError;
  const { signal } = options;
  const log = createPrefixedLogger('[Retry]');

  for (let attempt = 0; ; attempt++) {
    if (signal?.aborted) throw new Error(`${context} was cancelled`);
    try {
      return await fn();
    } catch (error) {
      if (signal?.aborted) throw new Error(`${context} was cancelled`);
      if (!shouldRetry(error)) throw error;
      if (attempt >= maxRetries) {
        log.warn(`${context} gave up after ${attempt + 1} attempt(s): ${describeError(error)}`);
        throw error;
      }
      const delay = backoffDelay(attempt, initialDelayMs, maxDelayMs);
      log.info(
        `${context} attempt ${attempt + 1}/${maxRetries + 1} failed, ` +
          `retrying in ${delay}ms: ${describeError(error)}`
      );
      await sleep(delay);
    }
  }
}
