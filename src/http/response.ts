/**
 * Response utilities for the SES query API.
 *
 * SES query actions answer with XML. The client returns that XML verbatim;
 * the parsers here are for callers that want the message ID or the error
 * code out of it.
 *
 * @module http/response
 */

import type { ResponseBody } from './types.js';

/**
 * Identifiers found in a successful send response.
 */
export interface SendResponseInfo {
  /** Message ID assigned by SES. */
  messageId?: string;
  /** Request ID from the response metadata. */
  requestId?: string;
}

/**
 * Error details found in an SES `<ErrorResponse>` document.
 */
export interface AwsErrorInfo {
  /** `Sender` or `Receiver`. */
  type?: string;
  /** Error code, e.g. `MessageRejected`. */
  code: string;
  /** Error message. */
  message: string;
  /** Request ID. */
  requestId?: string;
}

/**
 * Wrap an already-read body as a {@link ResponseBody}.
 *
 * @example
 * ```typescript
 * const response: HttpResponse = {
 *   status: 200,
 *   headers: {},
 *   body: bufferedBody('<SendEmailResponse>...</SendEmailResponse>'),
 * };
 * ```
 */
export function bufferedBody(text: string): ResponseBody {
  return {
    text: async () => text,
    close: async () => undefined,
  };
}

/**
 * Read a body, yielding `fallback` when reading fails.
 *
 * @returns The body text and the read error, if any
 */
export async function readBody(
  body: ResponseBody,
  fallback: string = ''
): Promise<{ text: string; error?: unknown }> {
  try {
    return { text: await body.text() };
  } catch (error) {
    return { text: fallback, error };
  }
}

/**
 * Extract the AWS request ID from response headers.
 */
export function extractRequestId(headers: Record<string, string>): string | undefined {
  return headers['x-amzn-requestid'] ?? headers['x-amz-request-id'];
}

/**
 * Text content of the first `<tagName>` element, entities decoded.
 */
function getTextContent(xml: string, tagName: string): string | undefined {
  const match = new RegExp(`<${tagName}>([^<]*)</${tagName}>`).exec(xml);
  return match ? decodeXmlEntities(match[1]) : undefined;
}

function decodeXmlEntities(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, '&');
}

/**
 * Parse a `SendEmailResponse` or `SendRawEmailResponse` document.
 *
 * @example
 * ```typescript
 * parseSendResponse(
 *   '<SendEmailResponse><SendEmailResult><MessageId>msg-1</MessageId></SendEmailResult>' +
 *   '<ResponseMetadata><RequestId>req-1</RequestId></ResponseMetadata></SendEmailResponse>'
 * );
 * // { messageId: 'msg-1', requestId: 'req-1' }
 * ```
 */
export function parseSendResponse(xml: string): SendResponseInfo {
  return {
    messageId: getTextContent(xml, 'MessageId'),
    requestId: getTextContent(xml, 'RequestId'),
  };
}

/**
 * Parse an SES `<ErrorResponse>` document.
 *
 * @returns The error details, or `undefined` when the body carries no error code
 */
export function parseErrorResponse(xml: string): AwsErrorInfo | undefined {
  const code = getTextContent(xml, 'Code');
  if (code === undefined) {
    return undefined;
  }

  return {
    type: getTextContent(xml, 'Type'),
    code,
    message: getTextContent(xml, 'Message') ?? code,
    requestId: getTextContent(xml, 'RequestId'),
  };
}
