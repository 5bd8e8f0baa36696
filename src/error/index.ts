/**
 * SES Error Types
 *
 * Error hierarchy for the SES query client. Every failure surfaced to a
 * caller is a {@link SesError}; the subclasses separate failures that happen
 * before any network activity ({@link ConstructionError}), failures of the
 * transport itself ({@link TransportError}) and non-200 answers from SES
 * ({@link ApiError}).
 *
 * @module error
 */

/**
 * SES error codes.
 */
export type SesErrorCode =
  | "CONFIGURATION" // Invalid configuration or endpoint
  | "SIGNING" // Request could not be signed
  | "VALIDATION" // Send intent rejected before encoding
  | "TRANSPORT" // Network/HTTP transport errors
  | "API"; // SES answered with a non-200 status

/**
 * Codes raised before a request reaches the transport.
 */
export type ConstructionErrorCode = Extract<SesErrorCode, "CONFIGURATION" | "SIGNING">;

/**
 * Longest body excerpt carried in an {@link ApiError} message.
 */
const MAX_MESSAGE_BODY_LENGTH = 200;

/**
 * Base SES error class.
 *
 * @example
 * ```typescript
 * try {
 *   await client.sendEmail(email);
 * } catch (error) {
 *   if (error instanceof SesError && error.retryable) {
 *     // schedule a retry
 *   }
 * }
 * ```
 */
export class SesError extends Error {
  /**
   * Error code identifying the error type.
   */
  public readonly code: SesErrorCode;

  /**
   * Whether repeating the same call may succeed.
   * Informational only; the client never retries on its own.
   */
  public readonly retryable: boolean;

  /**
   * AWS request ID, when the failure came from an SES response.
   */
  public readonly requestId?: string;

  /**
   * HTTP status code if the error came from an HTTP response.
   */
  public readonly statusCode?: number;

  /**
   * Create a new SES error.
   *
   * @param message - Human-readable error message
   * @param code - Error code
   * @param retryable - Whether the operation can be retried
   * @param requestId - AWS request ID
   * @param statusCode - HTTP status code
   * @param cause - Underlying error
   */
  constructor(
    message: string,
    code: SesErrorCode,
    retryable: boolean = false,
    requestId?: string,
    statusCode?: number,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "SesError";
    this.code = code;
    this.retryable = retryable;
    this.requestId = requestId;
    this.statusCode = statusCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Check if an unknown error is retryable.
   */
  static isRetryable(error: unknown): boolean {
    return error instanceof SesError ? error.retryable : false;
  }

  /**
   * Get the error code of an unknown error, if it is an SES error.
   */
  static getCode(error: unknown): SesErrorCode | undefined {
    return error instanceof SesError ? error.code : undefined;
  }

  /**
   * Convert error to a plain object for serialization.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      retryable: this.retryable,
      requestId: this.requestId,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Raised when configuration or request construction fails. Nothing has been
 * sent when this error is thrown.
 */
export class ConstructionError extends SesError {
  declare readonly code: ConstructionErrorCode;

  constructor(message: string, code: ConstructionErrorCode = "CONFIGURATION", cause?: unknown) {
    super(message, code, false, undefined, undefined, cause);
    this.name = "ConstructionError";
  }
}

/**
 * Raised when the transport could not deliver the request or read the
 * response. The original transport error is kept as `cause`.
 */
export class TransportError extends SesError {
  declare readonly code: "TRANSPORT";

  constructor(message: string, cause?: unknown, retryable: boolean = true) {
    super(message, "TRANSPORT", retryable, undefined, undefined, cause);
    this.name = "TransportError";
  }
}

/**
 * Raised when SES answers with any status other than 200. The response body
 * is carried verbatim.
 */
export class ApiError extends SesError {
  declare readonly code: "API";
  declare readonly statusCode: number;

  /**
   * Full response body as returned by SES.
   */
  public readonly body: string;

  constructor(statusCode: number, body: string, requestId?: string, cause?: unknown) {
    super(
      formatApiErrorMessage(statusCode, body),
      "API",
      statusCode === 429 || statusCode >= 500,
      requestId,
      statusCode,
      cause
    );
    this.name = "ApiError";
    this.body = body;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), body: this.body };
  }
}

function formatApiErrorMessage(statusCode: number, body: string): string {
  if (body.length === 0) {
    return `HTTP ${statusCode}`;
  }
  const excerpt =
    body.length > MAX_MESSAGE_BODY_LENGTH ? `${body.slice(0, MAX_MESSAGE_BODY_LENGTH)}...` : body;
  return `HTTP ${statusCode}: ${excerpt}`;
}

/**
 * Create a configuration error.
 */
export function configurationError(message: string, cause?: unknown): ConstructionError {
  return new ConstructionError(message, "CONFIGURATION", cause);
}

/**
 * Create a validation error.
 */
export function validationError(message: string): SesError {
  return new SesError(message, "VALIDATION", false);
}

/**
 * Create a transport error, passing an existing {@link TransportError}
 * through unchanged.
 *
 * @param error - Error thrown by the transport
 * @param context - Prefix for the message of a newly created error
 */
export function transportError(error: unknown, context: string = "Transport failure"): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new TransportError(`${context}: ${detail}`, error);
}

/**
 * Create an API error from a non-200 response.
 */
export function apiError(statusCode: number, body: string, requestId?: string): ApiError {
  return new ApiError(statusCode, body, requestId);
}

/**
 * Type guard for SES errors.
 */
export function isSesError(error: unknown): error is SesError {
  return error instanceof SesError;
}
