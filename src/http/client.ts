/**
 * SES HTTP Client
 *
 * Signs form-encoded SES query requests, hands them to the transport and
 * maps the outcome to a body string or an error.
 *
 * @module http/client
 */

import type { HttpRequest, HttpResponse } from './types.js';
import type { Transport } from './transport.js';
import { FormParams, FORM_CONTENT_TYPE } from './form.js';
import { extractRequestId, readBody } from './response.js';
import { configurationError, apiError, transportError, ApiError } from '../error/index.js';
import { SigningError, formatHttpDate, type RequestSigner, type SignedRequest } from '../signing/index.js';
import { createRequestContext, type Logger } from '../observability/index.js';

/**
 * Clock used to timestamp requests.
 */
export type Clock = () => Date;

/**
 * Settings of an {@link SesHttpClient}.
 */
export interface SesHttpClientOptions {
  /** Endpoint URL every request is posted to. */
  endpoint: string;
  /** Signer for the configured credentials. */
  signer: RequestSigner;
  /** Transport that performs the HTTP exchange. */
  transport: Transport;
  /** Logger for dispatch events. */
  logger: Logger;
  /** Value of the `user-agent` header, if any. */
  userAgent?: string;
  /** Source of the signing timestamp. */
  clock?: Clock;
}

/**
 * SES HTTP client for authenticated query API requests.
 *
 * Each call captures one timestamp, signs, calls the transport exactly once
 * and closes the response body before returning or throwing. Nothing is
 * retried.
 *
 * @example
 * ```typescript
 * const http = new SesHttpClient({
 *   endpoint: 'https://email.us-east-1.amazonaws.com',
 *   signer: createSigner({ signatureVersion: 'v4', region: 'us-east-1', service: 'email', credentials }),
 *   transport: new FetchTransport(),
 *   logger: new NoopLogger(),
 * });
 *
 * const xml = await http.post(new FormParams().set('Action', 'SendRawEmail').set('RawMessage.Data', data));
 * ```
 */
export class SesHttpClient {
  private readonly endpoint: string;
  private readonly signer: RequestSigner;
  private readonly transport: Transport;
  private readonly logger: Logger;
  private readonly userAgent?: string;
  private readonly clock: Clock;

  constructor(options: SesHttpClientOptions) {
    this.endpoint = options.endpoint;
    this.signer = options.signer;
    this.transport = options.transport;
    this.logger = options.logger;
    this.userAgent = options.userAgent;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Build the signed request for a set of form parameters without sending it.
   *
   * @throws {ConstructionError} If the endpoint URL is malformed, a parameter
   *   is not well-formed UTF-16 or signing fails
   */
  prepare(params: FormParams, date: Date = this.clock()): SignedRequest {
    let url: URL;
    try {
      url = new URL(this.endpoint);
    } catch (error) {
      throw configurationError(`Invalid endpoint URL: ${this.endpoint}`, error);
    }

    let body: string;
    try {
      body = params.encode();
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw configurationError(`Failed to encode request parameters: ${detail}`, error);
    }

    const headers: Record<string, string> = {
      'content-type': FORM_CONTENT_TYPE,
      date: formatHttpDate(date),
    };
    if (this.userAgent) {
      headers['user-agent'] = this.userAgent;
    }

    const request: HttpRequest = {
      method: 'POST',
      url: url.toString(),
      headers,
      body,
    };

    try {
      return this.signer.sign(request, date);
    } catch (error) {
      if (error instanceof SigningError) {
        throw error;
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new SigningError(`Failed to sign request: ${detail}`, 'SIGNING_FAILED', error);
    }
  }

  /**
   * Post form parameters to the endpoint.
   *
   * @returns The response body of an HTTP 200 answer
   * @throws {ConstructionError} Before any network activity
   * @throws {TransportError} If the transport fails or the body cannot be read
   * @throws {ApiError} For any status other than 200
   */
  async post(params: FormParams): Promise<string> {
    const action = params.get('Action') ?? 'Unknown';
    const logger = this.logger.withContext(createRequestContext(action));

    const signed = this.prepare(params);
    logger.debug('Dispatching SES request', { method: signed.method, url: signed.url });

    const startedAt = Date.now();
    let response: HttpResponse;
    try {
      response = await this.transport.send(signed);
    } catch (error) {
      throw transportError(error, 'SES request failed');
    }

    try {
      return await this.handleResponse(response, logger, Date.now() - startedAt);
    } finally {
      await this.release(response, logger);
    }
  }

  private async handleResponse(response: HttpResponse, logger: Logger, durationMs: number): Promise<string> {
    const requestId = extractRequestId(response.headers);

    if (response.status !== 200) {
      const { text, error } = await readBody(response.body);
      logger.warn('SES request rejected', { status: response.status, requestId, durationMs });
      if (error !== undefined) {
        throw new ApiError(response.status, text, requestId, error);
      }
      throw apiError(response.status, text, requestId);
    }

    let body: string;
    try {
      body = await response.body.text();
    } catch (error) {
      throw transportError(error, 'Failed to read SES response');
    }

    logger.debug('SES request succeeded', { status: response.status, requestId, durationMs });
    return body;
  }

  private async release(response: HttpResponse, logger: Logger): Promise<void> {
    try {
      await response.body.close();
    } catch (error) {
      logger.warn('Failed to close SES response body', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
