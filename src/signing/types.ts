/**
 * Request Signing Types
 *
 * Type definitions for SES request signing.
 */

import type { HttpRequest } from '../http/types.js';

/**
 * AWS credentials for signing requests.
 */
export interface AwsCredentials {
  readonly accessKeyId: string;
  readonly secretAccessKey: string;
}

/**
 * Signing scheme selector.
 *
 * - `v4`: scoped AWS Signature Version 4 (`AWS4-HMAC-SHA256`)
 * - `v3`: date-based `AWS3-HTTPS` HMAC over the `Date` header
 */
export type SignatureVersion = 'v4' | 'v3';

/**
 * Parameters required for signing an SES request.
 */
export interface SigningParams {
  /** AWS region (e.g., "us-east-1") */
  region: string;
  /** Service identifier in the credential scope (e.g., "email") */
  service: string;
  /** AWS credentials */
  credentials: AwsCredentials;
}

/**
 * A signed request ready to be handed to a transport.
 */
export type SignedRequest = HttpRequest;

/**
 * Canonical request components.
 */
export interface CanonicalRequest {
  /** HTTP method */
  method: string;
  /** Canonical URI path */
  uri: string;
  /** Canonical query string */
  query: string;
  /** Canonical headers string */
  headers: string;
  /** Signed headers list */
  signedHeaders: string;
  /** Payload hash */
  payloadHash: string;
}

/**
 * Signs requests with a fixed set of credentials.
 */
export interface RequestSigner {
  /** Scheme implemented by this signer. */
  readonly version: SignatureVersion;

  /**
   * Sign a request.
   *
   * @param request - Request carrying every header to be sent, including `date`
   * @param date - Signing timestamp, the same instant as the `date` header
   * @returns A copy of the request with authentication headers added
   * @throws {SigningError} If the request cannot be signed
   */
  sign(request: HttpRequest, date: Date): SignedRequest;
}

/**
 * Signing key cache entry.
 */
export interface CacheEntry {
  /** Derived signing key */
  key: Buffer;
  /** Cache entry expiration time */
  expiresAt: number;
}
