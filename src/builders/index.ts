/**
 * SES Request Builders
 *
 * Turns a {@link SendIntent} into the form fields of an SES query action, and
 * offers a fluent {@link EmailBuilder} for structured emails.
 *
 * @module builders
 */

import { validationError } from '../error/index.js';
import { FormParams } from '../http/form.js';
import type {
  HtmlSendIntent,
  Recipients,
  SendIntent,
  SesAction,
  TextSendIntent,
} from '../types/index.js';

/**
 * SES action names.
 */
export const ACTION = {
  SEND_EMAIL: 'SendEmail',
  SEND_RAW_EMAIL: 'SendRawEmail',
} as const satisfies Record<string, SesAction>;

/**
 * Form field prefix of each recipient list, in emission order.
 */
const RECIPIENT_FIELDS = [
  ['to', 'Destination.ToAddresses.member'],
  ['cc', 'Destination.CcAddresses.member'],
  ['bcc', 'Destination.BccAddresses.member'],
] as const satisfies ReadonlyArray<readonly [keyof Recipients, string]>;

/**
 * Build the form fields for a send intent.
 *
 * Recipient lists are numbered from 1, each list on its own, in the order
 * given. Nothing is validated; SES judges the content.
 *
 * @param intent - What to send
 * @param accessKeyId - Sent as `AWSAccessKeyId`
 *
 * @example
 * ```typescript
 * const params = buildSendRequest(
 *   { kind: 'text', from: 'a@x.com', to: ['b@x.com'], subject: 'Hi', body: 'Hello' },
 *   'test-access-key'
 * );
 *
 * params.get('Destination.ToAddresses.member.1'); // 'b@x.com'
 * ```
 */
export function buildSendRequest(intent: SendIntent, accessKeyId: string): FormParams {
  const params = new FormParams();

  switch (intent.kind) {
    case 'text':
      params.set('Action', ACTION.SEND_EMAIL);
      setMessageFields(params, intent, intent.body);
      break;
    case 'html':
      params.set('Action', ACTION.SEND_EMAIL);
      setMessageFields(params, intent, intent.textBody);
      params.set('Message.Body.Html.Data', intent.htmlBody);
      break;
    case 'raw':
      params.set('Action', ACTION.SEND_RAW_EMAIL);
      params.set('RawMessage.Data', encodeRawMessage(intent.message));
      break;
    default: {
      const unknown: never = intent;
      throw validationError(`Unsupported send intent: ${JSON.stringify(unknown)}`);
    }
  }

  params.set('AWSAccessKeyId', accessKeyId);
  return params;
}

function setMessageFields(
  params: FormParams,
  intent: TextSendIntent | HtmlSendIntent,
  textBody: string
): void {
  params.set('Source', intent.from);

  for (const [list, prefix] of RECIPIENT_FIELDS) {
    const addresses = intent[list] ?? [];
    addresses.forEach((address, index) => {
      params.set(`${prefix}.${index + 1}`, address);
    });
  }

  params.set('Message.Subject.Data', intent.subject);
  params.set('Message.Body.Text.Data', textBody);
}

/**
 * Standard base64, padded, of a raw MIME message.
 */
export function encodeRawMessage(message: Uint8Array): string {
  return Buffer.from(message.buffer, message.byteOffset, message.byteLength).toString('base64');
}

/**
 * Format an address with an optional display name.
 *
 * @example
 * ```typescript
 * formatEmailAddress('jane@example.com', 'Jane "JD" Doe');
 * // '"Jane \"JD\" Doe" <jane@example.com>'
 * ```
 */
export function formatEmailAddress(email: string, name?: string): string {
  if (!name) {
    return email;
  }
  const escaped = name.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
  return `"${escaped}" <${email}>`;
}

/**
 * Fluent builder for text and HTML send intents.
 *
 * Setting an HTML body makes the result an `html` intent; otherwise it is a
 * `text` intent.
 *
 * @example
 * ```typescript
 * const intent = new EmailBuilder()
 *   .from('sender@example.com', 'Sender')
 *   .to('recipient@example.com')
 *   .subject('Hello!')
 *   .text('This is a test email')
 *   .html('<p>This is a test email</p>')
 *   .build();
 *
 * await client.send(intent);
 * ```
 */
export class EmailBuilder {
  private source?: string;
  private readonly toAddresses: string[] = [];
  private readonly ccAddresses: string[] = [];
  private readonly bccAddresses: string[] = [];
  private subjectLine = '';
  private textBody?: string;
  private htmlBody?: string;

  /**
   * Set the sender.
   */
  from(email: string, name?: string): this {
    this.source = formatEmailAddress(email, name);
    return this;
  }

  /**
   * Add a To: recipient. Can be called multiple times.
   */
  to(email: string, name?: string): this {
    this.toAddresses.push(formatEmailAddress(email, name));
    return this;
  }

  /**
   * Add a CC recipient.
   */
  cc(email: string, name?: string): this {
    this.ccAddresses.push(formatEmailAddress(email, name));
    return this;
  }

  /**
   * Add a BCC recipient.
   */
  bcc(email: string, name?: string): this {
    this.bccAddresses.push(formatEmailAddress(email, name));
    return this;
  }

  subject(subject: string): this {
    this.subjectLine = subject;
    return this;
  }

  /**
   * Set the plain text body.
   */
  text(body: string): this {
    this.textBody = body;
    return this;
  }

  /**
   * Set the HTML body.
   */
  html(body: string): this {
    this.htmlBody = body;
    return this;
  }

  /**
   * Build the send intent.
   *
   * @throws {SesError} With code `VALIDATION` if no sender was set
   */
  build(): TextSendIntent | HtmlSendIntent {
    if (!this.source) {
      throw validationError('Sender (from) is required');
    }

    const common = {
      from: this.source,
      to: [...this.toAddresses],
      cc: [...this.ccAddresses],
      bcc: [...this.bccAddresses],
      subject: this.subjectLine,
    };

    if (this.htmlBody !== undefined) {
      return {
        kind: 'html',
        ...common,
        textBody: this.textBody ?? '',
        htmlBody: this.htmlBody,
      };
    }

    return { kind: 'text', ...common, body: this.textBody ?? '' };
  }
}

/**
 * Create a new email builder.
 */
export function emailBuilder(): EmailBuilder {
  return new EmailBuilder();
}
