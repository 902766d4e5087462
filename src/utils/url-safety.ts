/**
 * URL Safety
 *
 * Scheme allow-listing for href/src values that survive sanitization.
 * A reference is safe when it is relative, or when its scheme is in the
 * allow-set. Browsers ignore ASCII tab/newline and leading control
 * characters when parsing a scheme ("java\tscript:"), so those are
 * removed before the scheme is read.
 */

export const DEFAULT_ALLOWED_SCHEMES: readonly string[] = ['http', 'https', 'mailto'];

export type UrlCheckResult =
  | { safe: true; kind: 'relative' | 'absolute'; url: string }
  | { safe: false; reason: 'disallowed-scheme' | 'empty'; scheme?: string };

/**
 * Characters browsers strip or ignore while reading a URL scheme.
 */
// eslint-disable-next-line no-control-regex
const IGNORED_URL_CHARS = /[\u0000- \u007f-\u009f]/g;

const SCHEME_PATTERN = /^([a-z][a-z0-9+.-]*):/i;

/**
 * Normalize a raw attribute value the way a browser would before
 * dispatching on its scheme.
 */
export function normalizeUrlValue(raw: string): string {
  return raw.replace(IGNORED_URL_CHARS, '');
}

/**
 * Extract the scheme of a URL reference, lowercased, or null if relative.
 */
export function getUrlScheme(raw: string): string | null {
  const match = normalizeUrlValue(raw).match(SCHEME_PATTERN);
  return match ? match[1].toLowerCase() : null;
}

/**
 * Check a URL reference against a scheme allow-set.
 */
export function checkUrl(
  raw: string,
  allowedSchemes: readonly string[] = DEFAULT_ALLOWED_SCHEMES
): UrlCheckResult {
  const normalized = normalizeUrlValue(raw);
  if (normalized.length === 0) {
    return { safe: false, reason: 'empty' };
  }

  const scheme = getUrlScheme(normalized);
  if (scheme === null) {
    return { safe: true, kind: 'relative', url: raw.trim() };
  }

  if (!allowedSchemes.includes(scheme)) {
    return { safe: false, reason: 'disallowed-scheme', scheme };
  }

  return { safe: true, kind: 'absolute', url: raw.trim() };
}

/**
 * Resolve a relative reference against a base URL.
 * Returns the reference unchanged when the base is missing or invalid.
 */
export function resolveUrl(reference: string, baseUrl: string | undefined): string {
  if (!baseUrl) return reference;
  try {
    return new URL(reference, baseUrl).toString();
  } catch {
    return reference;
  }
}

/**
 * Convenience predicate
 */
export function isSafeUrl(
  raw: string,
  allowedSchemes: readonly string[] = DEFAULT_ALLOWED_SCHEMES
): boolean {
  return checkUrl(raw, allowedSchemes).safe;
}
