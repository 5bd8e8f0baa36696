/**
 * HTTP types for SES query API communication.
 *
 * @module http/types
 */

/**
 * HTTP method of every SES query request.
 */
export type HttpMethod = 'POST';

/**
 * HTTP request structure.
 *
 * @example
 * ```typescript
 * const request: HttpRequest = {
 *   method: 'POST',
 *   url: 'https://email.us-east-1.amazonaws.com/',
 *   headers: {
 *     'content-type': 'application/x-www-form-urlencoded',
 *     'date': 'Mon, 19 Oct 2026 08:05:09 +0000',
 *     'authorization': 'AWS4-HMAC-SHA256 ...'
 *   },
 *   body: 'AWSAccessKeyId=...&Action=SendEmail&...'
 * };
 * ```
 */
export interface HttpRequest {
  /**
   * HTTP method.
   */
  method: HttpMethod;

  /**
   * Complete URL including protocol, host, path, and query string.
   */
  url: string;

  /**
   * HTTP headers, names in lower case.
   */
  headers: Record<string, string>;

  /**
   * Request body.
   */
  body: string;
}

/**
 * Response body handle.
 *
 * The body is read at most once through {@link ResponseBody.text}; whoever
 * receives the response must call {@link ResponseBody.close} afterwards,
 * whether or not the body was read.
 */
export interface ResponseBody {
  /**
   * Read the full body as UTF-8 text.
   */
  text(): Promise<string>;

  /**
   * Release the underlying resource. Safe to call after `text()` and more
   * than once.
   */
  close(): Promise<void>;
}

/**
 * HTTP response structure.
 */
export interface HttpResponse {
  /**
   * HTTP status code (e.g., 200, 400, 500).
   */
  status: number;

  /**
   * Response headers, names normalized to lower case.
   */
  headers: Record<string, string>;

  /**
   * Response body handle.
   */
  body: ResponseBody;
}

/**
 * Fetch transport configuration.
 *
 * @example
 * ```typescript
 * const config: HttpClientConfig = {
 *   timeout: 30000
 * };
 * ```
 */
export interface HttpClientConfig {
  /**
   * Time allowed until response headers arrive, in milliseconds.
   *
   * @default 30000 (30 seconds)
   */
  timeout?: number;
}

/**
 * Options for the pooled undici transport.
 *
 * @example
 * ```typescript
 * const poolOptions: PoolOptions = {
 *   connections: 10,
 *   keepAliveTimeout: 4000,
 *   headersTimeout: 30000
 * };
 * ```
 */
export interface PoolOptions {
  /**
   * Maximum number of connections kept to the endpoint.
   *
   * @default 10
   */
  connections?: number;

  /**
   * How long an idle connection stays open, in milliseconds.
   *
   * @default 4000
   */
  keepAliveTimeout?: number;

  /**
   * Time allowed until response headers arrive, in milliseconds.
   *
   * @default 30000
   */
  headersTimeout?: number;

  /**
   * Time allowed between body chunks, in milliseconds.
   *
   * @default 30000
   */
  bodyTimeout?: number;

  /**
   * TCP/TLS connection establishment timeout, in milliseconds.
   *
   * @default 10000
   */
  connectTimeout?: number;
}
