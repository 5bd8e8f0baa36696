/**
 * SES Client
 *
 * Sends email through the SES query API. Every method resolves to the raw
 * response body of an HTTP 200 answer; use `parseSendResponse` to pull the
 * message ID out of it.
 *
 * @module client
 */

import { configBuilder, validateConfig, type SesConfig } from './config/index.js';
import { buildSendRequest } from './builders/index.js';
import { SesHttpClient, type Clock } from './http/client.js';
import { createDefaultTransport, type Transport } from './http/transport.js';
import { createSigner } from './signing/index.js';
import { NoopLogger, type Logger } from './observability/index.js';
import type { HtmlEmail, SendIntent, TextEmail } from './types/index.js';

/**
 * Collaborators of an {@link SesClient}.
 */
export interface SesClientOptions {
  /**
   * Transport for the HTTP exchange.
   *
   * @default FetchTransport
   */
  transport?: Transport;

  /**
   * Logger for dispatch events.
   *
   * @default NoopLogger
   */
  logger?: Logger;

  /**
   * Source of request timestamps.
   */
  clock?: Clock;
}

/**
 * SES query API client.
 *
 * @example
 * ```typescript
 * const client = SesClient.fromEnv();
 *
 * const xml = await client.sendEmail({
 *   from: 'sender@example.com',
 *   to: ['recipient@example.com'],
 *   subject: 'Hello!',
 *   body: 'This is a test email',
 * });
 * ```
 */
export class SesClient {
  private readonly _config: SesConfig;
  private readonly http: SesHttpClient;

  /**
   * @throws {ConstructionError} If the configuration is invalid
   */
  constructor(config: SesConfig, options: SesClientOptions = {}) {
    this._config = validateConfig(config);

    this.http = new SesHttpClient({
      endpoint: this._config.endpoint,
      signer: createSigner({
        signatureVersion: this._config.signatureVersion,
        region: this._config.region,
        service: this._config.service,
        credentials: this._config.credentials,
      }),
      transport: options.transport ?? createDefaultTransport(),
      logger: options.logger ?? new NoopLogger(),
      userAgent: this._config.userAgent,
      clock: options.clock,
    });
  }

  /**
   * Create a client configured from environment variables.
   *
   * @throws {ConstructionError} If required variables are missing
   */
  static fromEnv(options?: SesClientOptions, env?: NodeJS.ProcessEnv): SesClient {
    return new SesClient(configBuilder().fromEnv(env).build(), options);
  }

  /**
   * The validated configuration.
   */
  get config(): SesConfig {
    return this._config;
  }

  /**
   * Send any supported intent.
   */
  async send(intent: SendIntent): Promise<string> {
    return this.http.post(buildSendRequest(intent, this._config.credentials.accessKeyId));
  }

  /**
   * Send a plain text email (`SendEmail`).
   */
  async sendEmail(email: TextEmail): Promise<string> {
    return this.send({ ...email, kind: 'text' });
  }

  /**
   * Send an email with text and HTML bodies (`SendEmail`).
   */
  async sendEmailHtml(email: HtmlEmail): Promise<string> {
    return this.send({ ...email, kind: 'html' });
  }

  /**
   * Send a complete MIME message (`SendRawEmail`).
   */
  async sendRawEmail(message: Uint8Array): Promise<string> {
    return this.send({ kind: 'raw', message });
  }
}

/**
 * Create a client from a configuration.
 */
export function createClient(config: SesConfig, options?: SesClientOptions): SesClient {
  return new SesClient(config, options);
}

/**
 * Create a client from environment variables.
 */
export function createClientFromEnv(options?: SesClientOptions, env?: NodeJS.ProcessEnv): SesClient {
  return SesClient.fromEnv(options, env);
}
