/**
 * Request Signing Module
 *
 * Two schemes are available and are never mixed: the scoped SigV4
 * (`AWS4-HMAC-SHA256`, default) and the date-based `AWS3-HTTPS` HMAC. The
 * configuration's `signatureVersion` picks one through {@link createSigner}.
 *
 * @example
 * ```typescript
 * import { createSigner, formatHttpDate } from './signing/index.js';
 *
 * const signer = createSigner({
 *   signatureVersion: 'v4',
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
 *     headers: { 'content-type': 'application/x-www-form-urlencoded', date: formatHttpDate(now) },
 *     body: 'Action=SendEmail&...',
 *   },
 *   now
 * );
 * ```
 *
 * @module signing
 */

import { SignatureV4Signer } from './v4.js';
import { DateHmacSigner } from './v3.js';
import { SigningKeyCache } from './cache.js';
import type { RequestSigner, SignatureVersion, SigningParams } from './types.js';

/**
 * Create the signer selected by `signatureVersion`.
 */
export function createSigner(
  params: SigningParams & { signatureVersion: SignatureVersion },
  cache: SigningKeyCache = new SigningKeyCache()
): RequestSigner {
  switch (params.signatureVersion) {
    case 'v4':
      return new SignatureV4Signer(
        { region: params.region, service: params.service, credentials: params.credentials },
        cache
      );
    case 'v3':
      return new DateHmacSigner(params.credentials);
    default: {
      const unsupported: never = params.signatureVersion;
      throw new Error(`Unsupported signature version: ${String(unsupported)}`);
    }
  }
}

export {
  SignatureV4Signer,
  createCanonicalRequest,
  createStringToSign,
  credentialScope,
  calculateSignature,
  deriveSigningKey,
  buildAuthorizationHeader,
  sha256Hex,
  ALGORITHM,
} from './v4.js';

export {
  DateHmacSigner,
  calculateDateSignature,
  buildV3AuthorizationHeader,
  V3_SCHEME,
  V3_AUTHORIZATION_HEADER,
} from './v3.js';

export {
  uriEncode,
  normalizeUriPath,
  canonicalQueryString,
  canonicalHeaders,
  shouldSignHeader,
  compareCodeUnits,
} from './canonical.js';

export { formatDate, formatDateTime, formatHttpDate } from './time.js';

export { SigningKeyCache } from './cache.js';

export { SigningError, isSigningError } from './error.js';
export type { SigningFailureReason } from './error.js';

export type {
  AwsCredentials,
  SignatureVersion,
  SigningParams,
  SignedRequest,
  CanonicalRequest,
  RequestSigner,
  CacheEntry,
} from './types.js';
