/**
 * Form parameters for the SES query API.
 *
 * SES query actions take their arguments as an
 * `application/x-www-form-urlencoded` body. {@link FormParams} keeps the
 * fields in insertion order with unique names; {@link FormParams.encode}
 * writes them sorted by name.
 *
 * @module http/form
 */

import { compareCodeUnits } from '../signing/canonical.js';

/**
 * Content type of every SES query request body.
 */
export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

/**
 * Percent-encode a form name or value.
 *
 * Only `A-Z a-z 0-9 - _ . ~` pass through; space becomes `+`.
 *
 * @example
 * ```typescript
 * formEncode('a@x.com'); // 'a%40x.com'
 * formEncode('Hello world!'); // 'Hello+world%21'
 * ```
 */
export function formEncode(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()*]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%20/g, '+');
}

/**
 * Ordered set of form fields with unique names.
 *
 * @example
 * ```typescript
 * const params = new FormParams()
 *   .set('Action', 'SendEmail')
 *   .set('Source', 'a@x.com');
 *
 * params.encode(); // 'Action=SendEmail&Source=a%40x.com'
 * ```
 */
export class FormParams implements Iterable<[string, string]> {
  private readonly fields = new Map<string, string>();

  /**
   * Set a field, replacing any previous value under the same name.
   */
  set(name: string, value: string): this {
    this.fields.set(name, value);
    return this;
  }

  /**
   * Value of a field, or `undefined`.
   */
  get(name: string): string | undefined {
    return this.fields.get(name);
  }

  has(name: string): boolean {
    return this.fields.has(name);
  }

  /**
   * Field names in insertion order.
   */
  keys(): string[] {
    return Array.from(this.fields.keys());
  }

  /**
   * Fields in insertion order.
   */
  entries(): Array<[string, string]> {
    return Array.from(this.fields.entries());
  }

  [Symbol.iterator](): Iterator<[string, string]> {
    return this.fields.entries();
  }

  get size(): number {
    return this.fields.size;
  }

  /**
   * Serialize as `application/x-www-form-urlencoded`, fields sorted by name.
   */
  encode(): string {
    return this.entries()
      .sort((a, b) => compareCodeUnits(a[0], b[0]))
      .map(([name, value]) => `${formEncode(name)}=${formEncode(value)}`)
      .join('&');
  }

  /**
   * Plain object view, in insertion order.
   */
  toJSON(): Record<string, string> {
    return Object.fromEntries(this.fields);
  }
}
