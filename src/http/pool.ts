/**
 * Pooled transport backed by undici.
 *
 * Keeps a pool of keep-alive connections to a single SES endpoint. Any undici
 * {@link Dispatcher} can be supplied instead of the default pool, e.g. a
 * `MockAgent` pool in tests or a proxy agent.
 *
 * @module http/pool
 */

import { Pool, type Dispatcher } from 'undici';
import { TransportError } from '../error/index.js';
import type { Transport } from './transport.js';
import type { HttpRequest, HttpResponse, PoolOptions, ResponseBody } from './types.js';

/**
 * Default pool options.
 */
const DEFAULT_POOL_OPTIONS: Required<PoolOptions> = {
  connections: 10,
  keepAliveTimeout: 4000,
  headersTimeout: 30000,
  bodyTimeout: 30000,
  connectTimeout: 10000,
};

/**
 * Transport that sends requests through an undici connection pool.
 *
 * @example
 * ```typescript
 * const transport = new PooledTransport('https://email.us-east-1.amazonaws.com', {
 *   connections: 20,
 *   keepAliveTimeout: 10000,
 * });
 *
 * try {
 *   const client = new SesClient(config, { transport });
 *   await client.sendRawEmail(message);
 * } finally {
 *   await transport.close();
 * }
 * ```
 */
export class PooledTransport implements Transport {
  private readonly origin: string;
  private readonly dispatcher: Dispatcher;
  private closed = false;

  /**
   * @param origin - Endpoint origin (protocol + host + port)
   * @param options - Pool options, ignored when `dispatcher` is given
   * @param dispatcher - Dispatcher to use instead of a new pool
   */
  constructor(origin: string, options: PoolOptions = {}, dispatcher?: Dispatcher) {
    this.origin = new URL(origin).origin;

    if (dispatcher) {
      this.dispatcher = dispatcher;
      return;
    }

    const resolved = { ...DEFAULT_POOL_OPTIONS, ...options };
    this.dispatcher = new Pool(this.origin, {
      connections: resolved.connections,
      pipelining: 1,
      keepAliveTimeout: resolved.keepAliveTimeout,
      headersTimeout: resolved.headersTimeout,
      bodyTimeout: resolved.bodyTimeout,
      connect: { timeout: resolved.connectTimeout },
    });
  }

  /**
   * Send a request through the pool.
   *
   * @throws {TransportError} If the pool is closed, the URL belongs to
   *   another origin or the request fails
   */
  async send(request: HttpRequest): Promise<HttpResponse> {
    if (this.closed) {
      throw new TransportError('Connection pool is closed', undefined, false);
    }

    const url = new URL(request.url);
    if (url.origin !== this.origin) {
      throw new TransportError(`Request origin ${url.origin} does not match pool origin ${this.origin}`, undefined, false);
    }

    let response: Dispatcher.ResponseData;
    try {
      response = await this.dispatcher.request({
        origin: this.origin,
        path: `${url.pathname}${url.search}`,
        method: request.method,
        headers: request.headers,
        body: request.body,
      });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Network error: ${detail}`, error);
    }

    return {
      status: response.statusCode,
      headers: normalizeHeaders(response.headers),
      body: undiciBody(response.body),
    };
  }

  /**
   * Close the pool, waiting for in-flight requests.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.dispatcher.close();
  }

  /**
   * Whether {@link close} has been called.
   */
  isClosed(): boolean {
    return this.closed;
  }
}

function normalizeHeaders(raw: Record<string, string | string[] | undefined>): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string') {
      headers[key.toLowerCase()] = value;
    } else if (Array.isArray(value)) {
      headers[key.toLowerCase()] = value.join(', ');
    }
  }
  return headers;
}

function undiciBody(body: Dispatcher.ResponseData['body']): ResponseBody {
  let consumed = false;
  return {
    text: () => {
      consumed = true;
      return body.text();
    },
    close: async () => {
      if (!consumed) {
        consumed = true;
        await body.dump();
      }
    },
  };
}
