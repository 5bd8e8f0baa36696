/**
 * HTTP module for the SES query API.
 *
 * ```text
 * ┌─────────────────┐
 * │  SesHttpClient  │  - Endpoint, date header, signing
 * │                 │  - Status mapping, body release
 * └────────┬────────┘
 *          │
 *          ▼
 * ┌─────────────────┐
 * │   Transport     │  - Fetch API (default)
 * │                 │  - Connection pooling (undici)
 * └─────────────────┘
 * ```
 *
 * @module http
 */

export { SesHttpClient } from './client.js';
export type { Clock, SesHttpClientOptions } from './client.js';

export { FetchTransport, createDefaultTransport } from './transport.js';
export type { Transport } from './transport.js';

export { PooledTransport } from './pool.js';

export { FormParams, formEncode, FORM_CONTENT_TYPE } from './form.js';

export {
  bufferedBody,
  readBody,
  extractRequestId,
  parseSendResponse,
  parseErrorResponse,
} from './response.js';
export type { SendResponseInfo, AwsErrorInfo } from './response.js';

export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  ResponseBody,
  HttpClientConfig,
  PoolOptions,
} from './types.js';
