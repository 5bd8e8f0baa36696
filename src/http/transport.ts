/**
 * Transport layer abstraction for HTTP communication.
 *
 * The dispatcher hands every signed request to a {@link Transport}; timeouts,
 * connection reuse and TLS live here, never in the dispatcher. The default
 * implementation uses the Fetch API built into Node.js.
 *
 * @module http/transport
 */

import { TransportError } from '../error/index.js';
import type { HttpClientConfig, HttpRequest, HttpResponse, ResponseBody } from './types.js';

/**
 * Transport interface for HTTP communication.
 *
 * @example
 * ```typescript
 * class RecordingTransport implements Transport {
 *   readonly requests: HttpRequest[] = [];
 *
 *   async send(request: HttpRequest): Promise<HttpResponse> {
 *     this.requests.push(request);
 *     return { status: 200, headers: {}, body: bufferedBody('<SendEmailResponse/>') };
 *   }
 * }
 * ```
 */
export interface Transport {
  /**
   * Send an HTTP request and return the response. The caller closes the
   * response body.
   *
   * @throws Error if the request cannot be sent or times out
   */
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Fetch-based HTTP transport implementation.
 *
 * @example
 * ```typescript
 * const transport = new FetchTransport({ timeout: 10000 });
 * const client = new SesClient(config, { transport });
 * ```
 */
export class FetchTransport implements Transport {
  private readonly config: Required<HttpClientConfig>;

  constructor(config?: HttpClientConfig) {
    this.config = {
      timeout: config?.timeout ?? 30000,
    };
  }

  /**
   * Send an HTTP request using the Fetch API.
   *
   * @throws {TransportError} On timeout or network failure
   */
  async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

    let response: Response;
    try {
      response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TransportError(`Request timeout after ${this.config.timeout}ms`, error);
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Network error: ${detail}`, error);
    } finally {
      clearTimeout(timeoutId);
    }

    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });

    return {
      status: response.status,
      headers,
      body: fetchBody(response),
    };
  }

  /**
   * Get the current transport configuration.
   */
  getConfig(): Readonly<HttpClientConfig> {
    return { ...this.config };
  }
}

function fetchBody(response: Response): ResponseBody {
  return {
    text: () => response.text(),
    close: async () => {
      if (!response.bodyUsed && response.body) {
        await response.body.cancel();
      }
    },
  };
}

/**
 * Create a default transport instance.
 */
export function createDefaultTransport(config?: HttpClientConfig): Transport {
  return new FetchTransport(config);
}
