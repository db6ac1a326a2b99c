/**
 * Image Downloader Service
 *
 * Downloads images referenced by scraped pages:
 * - SSRF validation of the initial URL and of every redirect hop
 * - size limit from Content-Length and from the received body
 * - magic byte validation (JPEG, PNG, GIF, WebP)
 * - timeout combined with an optional caller AbortSignal
 */

import { IMAGE_DOWNLOADER_CONFIG } from '../config';
import { validateImageUrl } from './url-validator';
import type { Logger } from '../../utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface ImageDownloadOptions {
  readonly url: string;
  readonly logger?: Logger;
  /** Timeout in milliseconds (default: from config) */
  readonly timeoutMs?: number;
  /** Maximum body size in bytes (default: from config) */
  readonly maxSizeBytes?: number;
  readonly signal?: AbortSignal;
}

export interface ImageDownloadResult {
  readonly buffer: Buffer;
  /** MIME type detected from magic bytes */
  readonly mimeType: string;
  readonly size: number;
}

// ============================================================================
// Magic Byte Validation
// ============================================================================

interface ImageSignature {
  readonly mimeType: string;
  readonly offset: number;
  readonly bytes: readonly number[];
}

/** WebP is RIFF at 0 plus WEBP at 8; both are checked below */
const IMAGE_SIGNATURES: readonly ImageSignature[] = [
  { mimeType: 'image/jpeg', offset: 0, bytes: [0xff, 0xd8, 0xff] },
  { mimeType: 'image/png', offset: 0, bytes: [0x89, 0x50, 0x4e, 0x47] },
  { mimeType: 'image/gif', offset: 0, bytes: [0x47, 0x49, 0x46, 0x38] },
  { mimeType: 'image/webp', offset: 8, bytes: [0x57, 0x45, 0x42, 0x50] },
];

const RIFF = [0x52, 0x49, 0x46, 0x46] as const;

function matchesAt(buffer: Buffer, offset: number, bytes: readonly number[]): boolean {
  return bytes.every((byte, i) => buffer[offset + i] === byte);
}

/**
 * Detects the image type from the leading bytes.
 *
 * @returns MIME type, or null if the buffer is not a supported image
 */
export function detectImageMimeType(buffer: Buffer): string | null {
  if (buffer.length < 12) return null;

  for (const signature of IMAGE_SIGNATURES) {
    if (signature.mimeType === 'image/webp' && !matchesAt(buffer, 0, RIFF)) continue;
    if (matchesAt(buffer, signature.offset, signature.bytes)) return signature.mimeType;
  }
  return null;
}

// ============================================================================
// Download
// ============================================================================

const MAX_REDIRECTS = 5;

/**
 * Downloads an image with SSRF protection and validation.
 *
 * @throws SSRFError if any URL in the redirect chain is blocked
 * @throws Error if the download fails, times out, is too large or is not an image
 */
export async function downloadImage(options: ImageDownloadOptions): Promise<ImageDownloadResult> {
  const {
    url,
    logger,
    timeoutMs = IMAGE_DOWNLOADER_CONFIG.TIMEOUT_MS,
    maxSizeBytes = IMAGE_DOWNLOADER_CONFIG.MAX_SIZE_BYTES,
    signal: externalSignal,
  } = options;

  if (externalSignal?.aborted) {
    throw new Error('Download aborted');
  }
  validateImageUrl(url);

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const externalAbortHandler = (): void => controller.abort();
  externalSignal?.addEventListener('abort', externalAbortHandler);

  try {
    let currentUrl = url;
    let redirectCount = 0;
    let response = await fetchOnce(currentUrl, controller.signal);

    while (response.status >= 300 && response.status < 400) {
      const location = response.headers.get('location');
      if (!location) {
        throw new Error(`Redirect (${response.status}) without Location header`);
      }
      redirectCount++;
      if (redirectCount > MAX_REDIRECTS) {
        throw new Error(`Too many redirects (max: ${MAX_REDIRECTS})`);
      }

      currentUrl = new URL(location, currentUrl).toString();
      validateImageUrl(currentUrl);
      logger?.debug(`[ImageDownloader] Following redirect ${redirectCount}: ${currentUrl}`);
      response = await fetchOnce(currentUrl, controller.signal);
    }

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}: ${response.statusText}`);
    }

    const declaredSize = Number(response.headers.get('content-length') ?? NaN);
    if (Number.isFinite(declaredSize) && declaredSize > maxSizeBytes) {
      throw new Error(`Image too large: ${declaredSize} bytes (max: ${maxSizeBytes})`);
    }

    const buffer = Buffer.from(await response.arrayBuffer());
    if (buffer.length > maxSizeBytes) {
      throw new Error(`Image too large: ${buffer.length} bytes (max: ${maxSizeBytes})`);
    }

    const mimeType = detectImageMimeType(buffer);
    if (!mimeType) {
      throw new Error('Downloaded content is not a valid image (invalid magic bytes)');
    }

    logger?.debug(`[ImageDownloader] Downloaded ${buffer.length} bytes, type: ${mimeType}`);
    return { buffer, mimeType, size: buffer.length };
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new Error(
        externalSignal?.aborted ? 'Download aborted' : `Download timed out after ${timeoutMs}ms`
      );
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
    externalSignal?.removeEventListener('abort', externalAbortHandler);
  }
}

function fetchOnce(url: string, signal: AbortSignal): Promise<Response> {
  return fetch(url, {
    signal,
    redirect: 'manual',
    headers: {
      'User-Agent': IMAGE_DOWNLOADER_CONFIG.USER_AGENT,
      Accept: 'image/*',
    },
  });
}
