/**
 * Canonical Request Building
 *
 * Functions for creating the canonical form of a request according to AWS
 * Signature Version 4.
 *
 * @see https://docs.aws.amazon.com/general/latest/gr/sigv4-create-canonical-request.html
 */

import { SigningError } from './error.js';

/**
 * Compare two strings by UTF-16 code units, the ordering AWS uses for
 * header names and query parameters.
 */
export function compareCodeUnits(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * URI encode a string for AWS Signature V4.
 *
 * Every byte is percent-encoded except the unreserved characters
 * `A-Z a-z 0-9 - _ . ~`; space becomes `%20`.
 *
 * @param input - String to encode
 * @param encodeSlash - Whether to encode forward slashes (default: true)
 *
 * @example
 * ```typescript
 * uriEncode('hello world', true); // 'hello%20world'
 * uriEncode('path/to/file', false); // 'path/to/file'
 * ```
 */
export function uriEncode(input: string, encodeSlash: boolean = true): string {
  const encoded = encodeURIComponent(input).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );
  return encodeSlash ? encoded : encoded.replace(/%2F/g, '/');
}

/**
 * Normalize a URI path for the canonical request.
 *
 * Redundant and relative segments are removed, each segment is URI-encoded
 * and a trailing slash is preserved.
 *
 * @example
 * ```typescript
 * normalizeUriPath(''); // '/'
 * normalizeUriPath('/path//to///resource'); // '/path/to/resource'
 * normalizeUriPath('/path/./to/../resource'); // '/path/resource'
 * ```
 */
export function normalizeUriPath(path: string): string {
  if (!path || path === '/') {
    return '/';
  }

  const normalized: string[] = [];

  for (const segment of path.split('/')) {
    if (segment === '' || segment === '.') {
      continue;
    }
    if (segment === '..') {
      normalized.pop();
      continue;
    }
    // URL.pathname arrives percent-encoded already
    normalized.push(uriEncode(safeDecode(segment), false));
  }

  let result = '/' + normalized.join('/');

  if (path.endsWith('/') && !result.endsWith('/')) {
    result += '/';
  }

  return result;
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    if (error instanceof URIError) {
      return segment;
    }
    throw error;
  }
}

/**
 * Create canonical query string from URL search parameters.
 *
 * Pairs are URI-encoded, then sorted by name and value.
 *
 * @example
 * ```typescript
 * canonicalQueryString(new URLSearchParams('foo=bar&baz=qux')); // 'baz=qux&foo=bar'
 * ```
 */
export function canonicalQueryString(params: URLSearchParams): string {
  const pairs: Array<[string, string]> = [];

  for (const [key, value] of params.entries()) {
    pairs.push([uriEncode(key, true), uriEncode(value, true)]);
  }

  pairs.sort((a, b) => compareCodeUnits(a[0], b[0]) || compareCodeUnits(a[1], b[1]));

  return pairs.map(([key, value]) => `${key}=${value}`).join('&');
}

/**
 * Header names that are always signed when present.
 */
const SIGNED_HEADERS = new Set(['host', 'content-type', 'date']);

/**
 * Header prefixes that are signed.
 */
const SIGNED_HEADER_PREFIXES = ['x-amz-'];

/**
 * Headers that are never signed; proxies and clients may rewrite them.
 */
const UNSIGNED_HEADERS = new Set(['authorization', 'user-agent', 'x-amzn-authorization', 'content-length']);

/**
 * Determine if a header should be included in the signature.
 *
 * @example
 * ```typescript
 * shouldSignHeader('Date'); // true
 * shouldSignHeader('x-amz-date'); // true
 * shouldSignHeader('authorization'); // false
 * ```
 */
export function shouldSignHeader(name: string): boolean {
  const lowerName = name.toLowerCase();

  if (UNSIGNED_HEADERS.has(lowerName)) {
    return false;
  }

  if (SIGNED_HEADERS.has(lowerName)) {
    return true;
  }

  return SIGNED_HEADER_PREFIXES.some((prefix) => lowerName.startsWith(prefix));
}

/**
 * Create canonical headers string and signed headers list.
 *
 * Names are lower-cased and sorted, values trimmed with inner whitespace
 * collapsed; duplicate names are joined with commas.
 *
 * @throws {SigningError} If the `host` header is missing
 *
 * @example
 * ```typescript
 * const result = canonicalHeaders({
 *   Host: 'email.us-east-1.amazonaws.com',
 *   'X-Amz-Date': '20261019T080509Z',
 * });
 * // result.canonical: 'host:email.us-east-1.amazonaws.com\nx-amz-date:20261019T080509Z\n'
 * // result.signed: 'host;x-amz-date'
 * ```
 */
export function canonicalHeaders(headers: Record<string, string>): { canonical: string; signed: string } {
  const headerMap = new Map<string, string>();

  for (const [name, value] of Object.entries(headers)) {
    if (!shouldSignHeader(name)) {
      continue;
    }
    const lowerName = name.toLowerCase();
    const normalizedValue = value.trim().replace(/\s+/g, ' ');
    const existing = headerMap.get(lowerName);
    headerMap.set(lowerName, existing === undefined ? normalizedValue : `${existing},${normalizedValue}`);
  }

  if (!headerMap.has('host')) {
    throw new SigningError('Missing required header: host', 'MISSING_HEADER');
  }

  const sortedHeaders = Array.from(headerMap.entries()).sort((a, b) => compareCodeUnits(a[0], b[0]));

  return {
    canonical: sortedHeaders.map(([name, value]) => `${name}:${value}`).join('\n') + '\n',
    signed: sortedHeaders.map(([name]) => name).join(';'),
  };
}
