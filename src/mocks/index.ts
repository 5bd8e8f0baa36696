/**
 * Mock implementations for testing.
 */

import type { Transport } from '../http/transport.js';
import type { HttpRequest, HttpResponse, ResponseBody } from '../http/types.js';

/**
 * Canned answer of a {@link MockTransport}.
 */
export interface MockResponse {
  /** HTTP status. */
  status: number;
  /** Body text. */
  body?: string;
  /** Response headers. */
  headers?: Record<string, string>;
  /** Error thrown by `body.text()` instead of returning the body. */
  readError?: Error;
  /** Error thrown by `body.close()`. */
  closeError?: Error;
}

/**
 * Mock transport configuration.
 */
export interface MockTransportConfig {
  /** Answer used when the queue is empty. */
  defaultResponse?: MockResponse;
  /** Error to throw on send. */
  sendError?: unknown;
}

/**
 * Response body that records how it was used.
 */
export class MockResponseBody implements ResponseBody {
  private reads = 0;
  private closes = 0;

  constructor(private readonly response: MockResponse) {}

  async text(): Promise<string> {
    this.reads++;
    if (this.response.readError) {
      throw this.response.readError;
    }
    return this.response.body ?? '';
  }

  async close(): Promise<void> {
    this.closes++;
    if (this.response.closeError) {
      throw this.response.closeError;
    }
  }

  /** Number of `text()` calls. */
  get readCount(): number {
    return this.reads;
  }

  /** Number of `close()` calls. */
  get closeCount(): number {
    return this.closes;
  }

  /** Whether `close()` was called at least once. */
  get closed(): boolean {
    return this.closes > 0;
  }
}

/**
 * In-process transport that records requests and replays canned responses.
 *
 * @example
 * ```typescript
 * const transport = new MockTransport().respondWith({ status: 200, body: '<SendEmailResponse/>' });
 * const client = new SesClient(config, { transport });
 *
 * await client.sendEmail(email);
 * expect(transport.requests).toHaveLength(1);
 * expect(transport.lastBody?.closed).toBe(true);
 * ```
 */
export class MockTransport implements Transport {
  private readonly config: MockTransportConfig;
  private readonly queue: MockResponse[] = [];
  private readonly recordedRequests: HttpRequest[] = [];
  private readonly bodies: MockResponseBody[] = [];

  constructor(config: MockTransportConfig = {}) {
    this.config = config;
  }

  /**
   * Queue a response for the next call.
   */
  respondWith(response: MockResponse): this {
    this.queue.push(response);
    return this;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.recordedRequests.push({ ...request, headers: { ...request.headers } });

    if (this.config.sendError !== undefined) {
      throw this.config.sendError;
    }

    const response = this.queue.shift() ?? this.config.defaultResponse ?? { status: 200, body: '' };
    const body = new MockResponseBody(response);
    this.bodies.push(body);

    return {
      status: response.status,
      headers: response.headers ?? {},
      body,
    };
  }

  /** Requests received, in order. */
  get requests(): readonly HttpRequest[] {
    return this.recordedRequests;
  }

  /** Most recent request. */
  get lastRequest(): HttpRequest | undefined {
    return this.recordedRequests[this.recordedRequests.length - 1];
  }

  /** Bodies handed out, in order. */
  get responseBodies(): readonly MockResponseBody[] {
    return this.bodies;
  }

  /** Most recent response body. */
  get lastBody(): MockResponseBody | undefined {
    return this.bodies[this.bodies.length - 1];
  }

  /**
   * Forget recorded requests and queued responses.
   */
  reset(): void {
    this.recordedRequests.length = 0;
    this.bodies.length = 0;
    this.queue.length = 0;
  }
}

/**
 * Clock that always returns the same instant.
 */
export function fixedClock(date: Date): () => Date {
  return () => new Date(date.getTime());
}
