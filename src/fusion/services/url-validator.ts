/**
 * URL Validator for SSRF Protection
 *
 * Image URLs come from scraped pages, so they are validated before every
 * request (including each redirect hop). Blocks localhost, private and
 * link-local ranges, cloud metadata endpoints and non-http(s) schemes.
 */

// ============================================================================
// Error Types
// ============================================================================

/**
 * Error thrown when a URL fails SSRF validation.
 */
export class SSRFError extends Error {
  readonly name = 'SSRFError';

  constructor(message: string) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SSRFError);
    }
  }
}

// ============================================================================
// Constants
// ============================================================================

const BLOCKED_HOSTNAMES = new Set(['localhost', 'metadata.google.internal', 'metadata']);

// ============================================================================
// Validation
// ============================================================================

/**
 * Returns a reason when the hostname is an IPv4 literal in a non-public range.
 */
function privateIPv4Reason(hostname: string): string | null {
  const match = hostname.match(/^(\d{1,3})\.(\d{1,3})\.\d{1,3}\.\d{1,3}$/);
  if (!match) return null;

  const a = Number(match[1]);
  const b = Number(match[2]);

  if (a === 10) return 'Private IP range (10.x.x.x)';
  if (a === 172 && b >= 16 && b <= 31) return 'Private IP range (172.16-31.x.x)';
  if (a === 192 && b === 168) return 'Private IP range (192.168.x.x)';
  if (a === 169 && b === 254) return 'Link-local IP range (169.254.x.x)';
  if (a === 127) return 'Loopback IP range (127.x.x.x)';
  if (a === 0) return 'Current network (0.x.x.x)';
  return null;
}

/**
 * Returns a reason when the hostname is a loopback, unique-local or
 * link-local IPv6 literal. `URL` keeps the brackets on IPv6 hosts.
 */
function privateIPv6Reason(hostname: string): string | null {
  if (!hostname.startsWith('[')) return null;
  const address = hostname.slice(1, -1).toLowerCase();

  if (address === '::1' || address === '::') return 'IPv6 loopback';
  if (/^f[cd][0-9a-f]{2}:/.test(address)) return 'IPv6 unique-local range (fc00::/7)';
  if (/^fe[89ab][0-9a-f]:/.test(address)) return 'IPv6 link-local range (fe80::/10)';
  // IPv4-mapped; URL serializes the embedded address as two hex groups
  const mapped = address.match(/^::ffff:([0-9a-f]{1,4}):([0-9a-f]{1,4})$/);
  if (mapped) {
    const high = parseInt(mapped[1] ?? '0', 16);
    const low = parseInt(mapped[2] ?? '0', 16);
    return privateIPv4Reason(`${high >> 8}.${high & 0xff}.${low >> 8}.${low & 0xff}`);
  }
  return null;
}

/**
 * Validates an image URL for SSRF vulnerabilities.
 *
 * @throws SSRFError if the URL is potentially malicious
 */
export function validateImageUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new SSRFError('Invalid URL format');
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new SSRFError(`Protocol not allowed: ${parsed.protocol}`);
  }

  const hostname = parsed.hostname.toLowerCase();
  if (BLOCKED_HOSTNAMES.has(hostname) || hostname.endsWith('.localhost')) {
    throw new SSRFError(`Host not allowed: ${hostname}`);
  }

  const reason = privateIPv4Reason(hostname) ?? privateIPv6Reason(hostname);
  if (reason) {
    throw new SSRFError(reason);
  }
}

export function isSSRFError(error: unknown): error is SSRFError {
  return error instanceof SSRFError;
}
