/**
 * AWS Signature Version 4 (SigV4) Implementation
 *
 * Signs SES query requests with the scoped `AWS4-HMAC-SHA256` scheme. The
 * signature covers the method, path, query, the `content-type`, `date`,
 * `host` and `x-amz-date` headers and the SHA-256 of the body.
 *
 * @see https://docs.aws.amazon.com/general/latest/gr/signature-version-4.html
 */

import { createHash, createHmac } from 'crypto';
import {
  canonicalHeaders,
  canonicalQueryString,
  normalizeUriPath,
} from './canonical.js';
import { SigningKeyCache } from './cache.js';
import { SigningError } from './error.js';
import { formatDate, formatDateTime } from './time.js';
import type { HttpRequest } from '../http/types.js';
import type { CanonicalRequest, RequestSigner, SignedRequest, SigningParams } from './types.js';

/**
 * AWS Signature V4 algorithm identifier.
 */
export const ALGORITHM = 'AWS4-HMAC-SHA256';

/**
 * Termination string for signing key derivation.
 */
const AWS4_REQUEST = 'aws4_request';

/**
 * Hex-encoded SHA-256 of a UTF-8 string.
 */
export function sha256Hex(data: string): string {
  return createHash('sha256').update(data, 'utf8').digest('hex');
}

function hmacSha256(key: Buffer | string, data: string): Buffer {
  return createHmac('sha256', key).update(data, 'utf8').digest();
}

/**
 * Create the canonical request string.
 *
 * Format:
 * ```
 * HTTPMethod + '\n' +
 * CanonicalURI + '\n' +
 * CanonicalQueryString + '\n' +
 * CanonicalHeaders + '\n' +
 * SignedHeaders + '\n' +
 * HashedPayload
 * ```
 */
export function createCanonicalRequest(request: CanonicalRequest): string {
  return [
    request.method.toUpperCase(),
    normalizeUriPath(request.uri),
    request.query,
    request.headers,
    request.signedHeaders,
    request.payloadHash,
  ].join('\n');
}

/**
 * Create the string to sign.
 *
 * @param datetime - Request datetime in ISO 8601 basic format
 * @param scope - Credential scope (date/region/service/aws4_request)
 * @param canonicalRequestHash - Hex-encoded SHA-256 hash of canonical request
 */
export function createStringToSign(datetime: string, scope: string, canonicalRequestHash: string): string {
  return [ALGORITHM, datetime, scope, canonicalRequestHash].join('\n');
}

/**
 * Build the credential scope `<YYYYMMDD>/<region>/<service>/aws4_request`.
 */
export function credentialScope(date: string, region: string, service: string): string {
  return `${date}/${region}/${service}/${AWS4_REQUEST}`;
}

/**
 * Calculate the hex-encoded signature.
 */
export function calculateSignature(signingKey: Buffer, stringToSign: string): string {
  return hmacSha256(signingKey, stringToSign).toString('hex');
}

/**
 * Derive the signing key.
 *
 * 1. kDate = HMAC-SHA256("AWS4" + SecretAccessKey, Date)
 * 2. kRegion = HMAC-SHA256(kDate, Region)
 * 3. kService = HMAC-SHA256(kRegion, Service)
 * 4. kSigning = HMAC-SHA256(kService, "aws4_request")
 *
 * @param secret - AWS secret access key
 * @param date - Date in YYYYMMDD format
 */
export function deriveSigningKey(secret: string, date: string, region: string, service: string): Buffer {
  const kDate = hmacSha256(`AWS4${secret}`, date);
  const kRegion = hmacSha256(kDate, region);
  const kService = hmacSha256(kRegion, service);
  return hmacSha256(kService, AWS4_REQUEST);
}

/**
 * Build the Authorization header value.
 *
 * Format:
 * ```
 * AWS4-HMAC-SHA256 Credential=AccessKeyId/CredentialScope,
 * SignedHeaders=SignedHeaders, Signature=Signature
 * ```
 */
export function buildAuthorizationHeader(
  accessKeyId: string,
  scope: string,
  signedHeaders: string,
  signature: string
): string {
  return [
    `${ALGORITHM} Credential=${accessKeyId}/${scope}`,
    `SignedHeaders=${signedHeaders}`,
    `Signature=${signature}`,
  ].join(', ');
}

/**
 * Signature Version 4 signer bound to one set of credentials.
 *
 * @example
 * ```typescript
 * const signer = new SignatureV4Signer({
 *   region: 'us-east-1',
 *   service: 'email',
 *   credentials: { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' },
 * });
 *
 * const now = new Date();
 * const signed = signer.sign(
 *   {
 *     method: 'POST',
 *     url: 'https://email.us-east-1.amazonaws.com/',
 *     headers: {
 *       'content-type': 'application/x-www-form-urlencoded',
 *       date: formatHttpDate(now),
 *     },
 *     body: 'Action=SendRawEmail&...',
 *   },
 *   now
 * );
 * // signed.headers.authorization starts with 'AWS4-HMAC-SHA256 Credential=test-access-key/'
 * ```
 */
export class SignatureV4Signer implements RequestSigner {
  readonly version = 'v4' as const;

  private readonly params: SigningParams;
  private readonly cache: SigningKeyCache;
  private readonly identity: string;

  /**
   * @param cache - Signing key cache, may be shared between signers
   */
  constructor(params: SigningParams, cache: SigningKeyCache = new SigningKeyCache()) {
    this.params = params;
    this.cache = cache;
    this.identity = `${params.credentials.accessKeyId}:${sha256Hex(params.credentials.secretAccessKey)}`;
  }

  /**
   * Sign a request.
   *
   * Adds `host`, `x-amz-date` and `authorization` to a copy of the request.
   *
   * @throws {SigningError} If the URL is invalid, the date is invalid or a
   *   required header is missing
   */
  sign(request: HttpRequest, date: Date): SignedRequest {
    if (Number.isNaN(date.getTime())) {
      throw new SigningError('Signing date is not a valid date', 'INVALID_TIMESTAMP');
    }

    let url: URL;
    try {
      url = new URL(request.url);
    } catch (error) {
      throw new SigningError(`Invalid request URL: ${request.url}`, 'INVALID_URL', error);
    }

    const dateStr = formatDate(date);
    const datetime = formatDateTime(date);

    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(request.headers)) {
      headers[name.toLowerCase()] = value;
    }
    headers['host'] = url.host;
    headers['x-amz-date'] = datetime;

    const payloadHash = sha256Hex(request.body);
    const { canonical, signed } = canonicalHeaders(headers);

    const canonicalRequest = createCanonicalRequest({
      method: request.method,
      uri: url.pathname,
      query: canonicalQueryString(url.searchParams),
      headers: canonical,
      signedHeaders: signed,
      payloadHash,
    });

    const { region, service, credentials } = this.params;
    const scope = credentialScope(dateStr, region, service);
    const stringToSign = createStringToSign(datetime, scope, sha256Hex(canonicalRequest));
    const signature = calculateSignature(this.signingKey(dateStr), stringToSign);

    headers['authorization'] = buildAuthorizationHeader(credentials.accessKeyId, scope, signed, signature);

    return {
      method: request.method,
      url: url.toString(),
      headers,
      body: request.body,
    };
  }

  private signingKey(date: string): Buffer {
    const { region, service, credentials } = this.params;
    const cached = this.cache.get(this.identity, date, region, service);
    if (cached) {
      return cached;
    }

    this.cache.cleanup();
    const key = deriveSigningKey(credentials.secretAccessKey, date, region, service);
    this.cache.set(this.identity, date, region, service, key);
    return key;
  }
}
