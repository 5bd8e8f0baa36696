/**
 * SES Query Mailer
 *
 * Sends email through the Amazon SES query API (`SendEmail`, `SendRawEmail`).
 *
 * ## Quick Start
 *
 * ```typescript
 * import { SesClient, configBuilder } from 'ses-query-mailer';
 *
 * const client = new SesClient(
 *   configBuilder()
 *     .region('us-east-1')
 *     .credentials('test-access-key', 'test-secret')
 *     .build()
 * );
 *
 * const xml = await client.sendEmail({
 *   from: 'sender@example.com',
 *   to: ['recipient@example.com'],
 *   subject: 'Hello from SES!',
 *   body: 'This is a plain text email',
 * });
 * ```
 *
 * Failures surface as {@link SesError} subclasses: `ConstructionError` before
 * anything is sent, `TransportError` when the exchange fails, and `ApiError`
 * when SES answers with a status other than 200.
 *
 * @module ses-query-mailer
 */

export { SesClient, createClient, createClientFromEnv } from './client.js';
export type { SesClientOptions } from './client.js';

export {
  SesConfigBuilder,
  configBuilder,
  validateConfig,
  resolveEndpoint,
  buildUserAgent,
  DEFAULT_SERVICE,
  DEFAULT_SIGNATURE_VERSION,
  VERSION,
} from './config/index.js';
export type { SesConfig } from './config/index.js';

export {
  ACTION,
  buildSendRequest,
  encodeRawMessage,
  formatEmailAddress,
  EmailBuilder,
  emailBuilder,
} from './builders/index.js';

export type {
  Recipients,
  TextEmail,
  HtmlEmail,
  TextSendIntent,
  HtmlSendIntent,
  RawSendIntent,
  SendIntent,
  SesAction,
} from './types/index.js';

export {
  SesError,
  ConstructionError,
  TransportError,
  ApiError,
  configurationError,
  validationError,
  transportError,
  apiError,
  isSesError,
} from './error/index.js';
export type { SesErrorCode, ConstructionErrorCode } from './error/index.js';

export * from './http/index.js';
export * from './signing/index.js';

export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  createRequestContext,
} from './observability/index.js';
export type { Logger, LogEntry, LogSink, RequestContext } from './observability/index.js';
