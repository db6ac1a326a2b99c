/**
 * URL Utilities
 *
 * Domain and author normalization shared by the content pool, the builder and
 * the acquisition adapter.
 */

/**
 * Extracts the normalized domain of a URL: lower-case host with a leading
 * `www.` removed.
 *
 * @returns Domain, or empty string if the URL cannot be parsed
 *
 * @example
 * extractDomain('https://WWW.Example.com/path') // 'example.com'
 * extractDomain('https://cdn.example.com/a.jpg') // 'cdn.example.com'
 */
export function extractDomain(url: string): string {
  try {
    return new URL(url.trim()).hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return '';
  }
}

/**
 * Normalizes a URL for deduplication. Drops the hash fragment.
 *
 * @returns Normalized URL or null if invalid/non-http(s)
 */
export function normalizeUrl(url: string): string | null {
  try {
    const u = new URL(url.trim());
    if (u.protocol !== 'http:' && u.protocol !== 'https:') return null;
    u.hash = '';
    return u.toString();
  } catch {
    return null;
  }
}

/**
 * Reduces an author given as a profile URL to its domain. Anything that is
 * not URL-shaped is kept as trimmed literal text.
 *
 * @example
 * normalizeAuthor('https://www.reuters.com/authors/jane') // 'reuters.com'
 * normalizeAuthor('  Jane Doe ') // 'Jane Doe'
 */
export function normalizeAuthor(author: string): string {
  const trimmed = author.trim();
  if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)) return trimmed;
  return extractDomain(trimmed) || trimmed;
}

/**
 * Case-insensitive dedup key for pooled strings.
 */
export function dedupKey(value: string): string {
  return value.trim().toLowerCase();
}
