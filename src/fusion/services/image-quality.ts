/**
 * Image Quality Service
 *
 * Resolution probing for consensus ranking: downloads the image and reads
 * width and height with Sharp. The quality score is width × height; any
 * failure scores 0 so ranking never aborts selection.
 */

import sharp from 'sharp';

import { IMAGE_DIMENSION_CONFIG } from '../config';
import { describeError } from '../errors';
import type { ImageQualityScorer } from '../types';
import { downloadImage } from './image-downloader';
import { isSSRFError } from './url-validator';
import type { Logger } from '../../utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface ImageDimensions {
  readonly width: number;
  readonly height: number;
}

export interface ProbeDimensionsOptions {
  readonly logger?: Logger;
  readonly signal?: AbortSignal;
  /** Timeout per attempt in ms (defaults to config value) */
  readonly timeoutMs?: number;
  /** Retries after a failed probe (defaults to config value) */
  readonly retries?: number;
}

// ============================================================================
// Dimension Probing
// ============================================================================

/**
 * Reads the pixel dimensions of a downloaded image buffer.
 */
export async function readDimensions(buffer: Buffer): Promise<ImageDimensions | null> {
  const metadata = await sharp(buffer).metadata();
  if (!metadata.width || !metadata.height) return null;
  return { width: metadata.width, height: metadata.height };
}

/**
 * Downloads an image and probes its dimensions, retrying transient failures.
 * SSRF rejections are not retried.
 *
 * @returns Dimensions, or null if every attempt failed
 */
export async function probeImageDimensions(
  url: string,
  options: ProbeDimensionsOptions = {}
): Promise<ImageDimensions | null> {
  const {
    logger,
    signal,
    timeoutMs = IMAGE_DIMENSION_CONFIG.DIMENSION_PROBE_TIMEOUT_MS,
    retries = IMAGE_DIMENSION_CONFIG.DIMENSION_PROBE_RETRIES,
  } = options;

  const maxAttempts = retries + 1;
  let lastError = 'no attempt made';

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) return null;

    try {
      const { buffer } = await downloadImage({ url, logger, signal, timeoutMs });
      const dimensions = await readDimensions(buffer);
      if (!dimensions) {
        logger?.warn(`[ImageQuality] Sharp returned no dimensions for: ${url}`);
        return null;
      }
      logger?.debug(`[ImageQuality] ${url}: ${dimensions.width}x${dimensions.height}`);
      return dimensions;
    } catch (error) {
      lastError = describeError(error);
      if (isSSRFError(error) || signal?.aborted) break;
      if (attempt < maxAttempts) {
        logger?.debug(`[ImageQuality] Attempt ${attempt} failed for ${url}: ${lastError}`);
      }
    }
  }

  logger?.warn(`[ImageQuality] Failed to probe dimensions for ${url}: ${lastError}`);
  return null;
}

// ============================================================================
// Scorer
// ============================================================================

/**
 * Creates the resolution-based scorer used by the consensus image selector.
 *
 * @example
 * const score = createImageQualityScorer({ logger });
 * await score('https://cdn.example.com/photo.jpg'); // 1920 * 1080
 */
export function createImageQualityScorer(options: ProbeDimensionsOptions = {}): ImageQualityScorer {
  return async (url) => {
    const dimensions = await probeImageDimensions(url, options);
    return dimensions ? dimensions.width * dimensions.height : 0;
  };
}
