/**
 * SES Send Types
 *
 * What a caller can ask the client to send. Addresses are passed through as
 * given, display names included (`"Jane" <jane@example.com>`).
 *
 * @module types
 */

/**
 * Recipient lists of a structured email. A missing list is empty.
 */
export interface Recipients {
  /** Recipients on the To: line */
  to?: readonly string[];
  /** Recipients on the CC: line */
  cc?: readonly string[];
  /** Recipients on the BCC: line */
  bcc?: readonly string[];
}

/**
 * Plain text email.
 */
export interface TextEmail extends Recipients {
  /** Sender address, sent as `Source` */
  from: string;
  /** Subject line */
  subject: string;
  /** Plain text body */
  body: string;
}

/**
 * Email with a plain text and an HTML body.
 */
export interface HtmlEmail extends Recipients {
  /** Sender address, sent as `Source` */
  from: string;
  /** Subject line */
  subject: string;
  /** Plain text alternative */
  textBody: string;
  /** HTML body */
  htmlBody: string;
}

export interface TextSendIntent extends TextEmail {
  kind: 'text';
}

export interface HtmlSendIntent extends HtmlEmail {
  kind: 'html';
}

/**
 * A complete MIME message, sent without inspection.
 */
export interface RawSendIntent {
  kind: 'raw';
  /** Message bytes */
  message: Uint8Array;
}

/**
 * One send request, discriminated on `kind`.
 */
export type SendIntent = TextSendIntent | HtmlSendIntent | RawSendIntent;

/**
 * SES query actions issued by this client.
 */
export type SesAction = 'SendEmail' | 'SendRawEmail';
