/**
 * Date-based `AWS3-HTTPS` signing.
 *
 * The signature is an HMAC-SHA256 of the `Date` header value keyed with the
 * secret access key. It binds the request to its date but not to its body;
 * prefer {@link SignatureV4Signer} unless the endpoint only accepts this
 * scheme.
 */

import { createHmac } from 'crypto';
import { SigningError } from './error.js';
import { formatHttpDate } from './time.js';
import type { HttpRequest } from '../http/types.js';
import type { AwsCredentials, RequestSigner, SignedRequest } from './types.js';

/**
 * Scheme token at the start of the authorization header.
 */
export const V3_SCHEME = 'AWS3-HTTPS';

/**
 * Header carrying the date-based signature.
 */
export const V3_AUTHORIZATION_HEADER = 'x-amzn-authorization';

/**
 * Base64 HMAC-SHA256 of the date string.
 */
export function calculateDateSignature(secretAccessKey: string, dateHeader: string): string {
  return createHmac('sha256', secretAccessKey).update(dateHeader, 'utf8').digest('base64');
}

/**
 * Build the `X-Amzn-Authorization` header value.
 *
 * @example
 * ```typescript
 * buildV3AuthorizationHeader('test-access-key', 'c2lnbmF0dXJl');
 * // 'AWS3-HTTPS AWSAccessKeyId=test-access-key, Algorithm=HmacSHA256, Signature=c2lnbmF0dXJl'
 * ```
 */
export function buildV3AuthorizationHeader(accessKeyId: string, signature: string): string {
  return `${V3_SCHEME} AWSAccessKeyId=${accessKeyId}, Algorithm=HmacSHA256, Signature=${signature}`;
}

/**
 * Date-based signer bound to one set of credentials.
 */
export class DateHmacSigner implements RequestSigner {
  readonly version = 'v3' as const;

  constructor(private readonly credentials: AwsCredentials) {}

  /**
   * Sign a request, using its `date` header when present and the formatted
   * `date` argument otherwise.
   *
   * @throws {SigningError} If the date is invalid or the URL cannot be parsed
   */
  sign(request: HttpRequest, date: Date): SignedRequest {
    if (Number.isNaN(date.getTime())) {
      throw new SigningError('Signing date is not a valid date', 'INVALID_TIMESTAMP');
    }
    if (!URL.canParse(request.url)) {
      throw new SigningError(`Invalid request URL: ${request.url}`, 'INVALID_URL');
    }

    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(request.headers)) {
      headers[name.toLowerCase()] = value;
    }
    const dateHeader = headers['date'] ?? formatHttpDate(date);
    headers['date'] = dateHeader;

    const signature = calculateDateSignature(this.credentials.secretAccessKey, dateHeader);
    headers[V3_AUTHORIZATION_HEADER] = buildV3AuthorizationHeader(this.credentials.accessKeyId, signature);

    return {
      method: request.method,
      url: request.url,
      headers,
      body: request.body,
    };
  }
}
