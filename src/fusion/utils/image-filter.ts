/**
 * Image URL Filtering
 *
 * Conservative URL heuristics that drop obvious non-content images (tracking
 * pixels, site chrome, avatars, thumbnails) before they cost an embedding
 * call.
 */

import { IMAGE_FILTER_CONFIG } from '../config';

const NON_CONTENT_MARKERS = [
  // tracking
  'pixel',
  'tracking',
  'beacon',
  '1x1',
  'spacer',
  '/ads/',
  // site chrome
  'favicon',
  'logo',
  '/icon',
  '/sprites/',
  '/badge',
  // people
  '/avatar',
  '/authors/',
  '/profile/',
  // thumbnails
  '/thumbs/',
  '_thumb.',
  '-thumb.',
] as const;

/**
 * Whether a `w=`/`width=` or `h=`/`height=` query parameter is below the
 * minimum. URLs without dimension parameters are never filtered here.
 *
 * @param url - lower-cased URL
 */
function hasSmallUrlDimensions(url: string): boolean {
  for (const pattern of [/[?&](?:w|width)=(\d+)(?:&|$)/, /[?&](?:h|height)=(\d+)(?:&|$)/]) {
    const match = url.match(pattern);
    if (match && Number(match[1]) < IMAGE_FILTER_CONFIG.MIN_URL_DIMENSION) return true;
  }
  return false;
}

/**
 * Whether an image URL is obviously not article content.
 *
 * @example
 * isNonContentImage('https://cdn.example.com/logo.png') // true
 * isNonContentImage('https://cdn.example.com/photos/rally.jpg?w=1200') // false
 */
export function isNonContentImage(url: string): boolean {
  const lowerUrl = url.trim().toLowerCase();
  if (!lowerUrl) return true;

  const path = lowerUrl.split('?')[0] ?? lowerUrl;
  if (path.endsWith('.svg') || path.endsWith('.gif')) return true;
  if (NON_CONTENT_MARKERS.some((marker) => lowerUrl.includes(marker))) return true;

  // /50x50/ or /16x16_ style size segments
  if (/\/\d{1,2}x\d{1,2}[._\-/]/.test(lowerUrl)) return true;

  return hasSmallUrlDimensions(lowerUrl);
}
