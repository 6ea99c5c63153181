/**
 * Error Module
 *
 * Provides a consistent error hierarchy for stack lifecycle operations.
 * All custom errors extend StackLifecycleError, and the outcomes a wait can
 * end in form the WaitFailure union, discriminated on `code`.
 */

/**
 * Error codes for categorizing error types
 */
export enum ErrorCode {
  // Configuration and input errors
  CONFIG_INVALID = 'CONFIG_INVALID',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  TEMPLATE_INVALID = 'TEMPLATE_INVALID',

  // Control plane errors
  TRANSPORT_ERROR = 'TRANSPORT_ERROR',
  PROVIDER_ERROR = 'PROVIDER_ERROR',
  STACK_NOT_FOUND = 'STACK_NOT_FOUND',

  // Wait outcomes
  WAIT_TIMEOUT = 'WAIT_TIMEOUT',
  WAIT_CANCELLED = 'WAIT_CANCELLED',
  COMPOSITE_FAILURE = 'COMPOSITE_FAILURE',
  STACK_STATUS = 'STACK_STATUS',

  // General errors
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

/**
 * Base error class for all stack lifecycle errors
 *
 * Provides consistent error structure with:
 * - Error codes for programmatic handling
 * - Cause chaining for error context preservation
 * - HTTP-like status codes for handler responses
 * - Serialization support for logging
 *
 * @example
 * ```typescript
 * try {
 *   await tracker.wait('my-stack', 600_000);
 * } catch (error) {
 *   if (error instanceof StackLifecycleError) {
 *     logger.error(`[${error.code}] ${error.message}`);
 *   }
 * }
 * ```
 */
export class StackLifecycleError extends Error {
  /**
   * @param message - Human-readable error description
   * @param code - Error code for categorization
   * @param statusCode - HTTP-like status code (4xx for client, 5xx for server errors)
   * @param cause - Underlying error that caused this error
   * @param isRetryable - Whether the operation can be retried
   */
  constructor(
    message: string,
    public readonly code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    public readonly statusCode: number = 500,
    public readonly cause?: Error,
    public readonly isRetryable: boolean = false
  ) {
    super(message);
    this.name = 'StackLifecycleError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StackLifecycleError);
    }
  }

  /**
   * Converts error to a plain object for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      isRetryable: this.isRetryable,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
      stack: this.stack,
    };
  }
}

/**
 * Configuration error - thrown when config is missing or invalid
 */
export class ConfigurationError extends StackLifecycleError {
  declare readonly code: ErrorCode.CONFIG_INVALID;

  constructor(message: string, cause?: Error) {
    super(message, ErrorCode.CONFIG_INVALID, 500, cause, false);
    this.name = 'ConfigurationError';
  }
}

/**
 * Validation error - thrown when input validation fails
 */
export class ValidationError extends StackLifecycleError {
  declare readonly code: ErrorCode.VALIDATION_ERROR;

  constructor(
    message: string,
    public readonly field?: string,
    cause?: Error
  ) {
    super(message, ErrorCode.VALIDATION_ERROR, 400, cause, false);
    this.name = 'ValidationError';
  }
}

/**
 * The request never got a usable answer: network failure, a response that
 * could not be read, or a client-side SDK failure.
 */
export class TransportError extends StackLifecycleError {
  declare readonly code: ErrorCode.TRANSPORT_ERROR;

  constructor(message: string, cause?: Error) {
    super(message, ErrorCode.TRANSPORT_ERROR, 502, cause, true);
    this.name = 'TransportError';
  }
}

/**
 * Details CloudFormation returned with a rejected request
 */
export interface ProviderErrorDetails {
  /** Error code from the response, e.g. `ValidationError` or `LimitExceededException` */
  errorCode: string;
  requestId?: string;
  httpStatusCode?: number;
}

/**
 * The request reached CloudFormation and was explicitly rejected
 */
export class ProviderError extends StackLifecycleError {
  declare readonly code: ErrorCode.PROVIDER_ERROR;
  public readonly errorCode: string;
  public readonly requestId?: string;
  public readonly httpStatusCode?: number;

  constructor(message: string, details: ProviderErrorDetails, cause?: Error) {
    const status = details.httpStatusCode !== undefined && details.httpStatusCode < 500 ? 400 : 502;
    super(message, ErrorCode.PROVIDER_ERROR, status, cause, false);
    this.name = 'ProviderError';
    this.errorCode = details.errorCode;
    this.requestId = details.requestId;
    this.httpStatusCode = details.httpStatusCode;
  }
}

/**
 * No stack with the given name or id is visible
 */
export class StackNotFoundError extends StackLifecycleError {
  declare readonly code: ErrorCode.STACK_NOT_FOUND;

  constructor(public readonly stackName: string) {
    super(`could not find stack: ${stackName}`, ErrorCode.STACK_NOT_FOUND, 404, undefined, false);
    this.name = 'StackNotFoundError';
  }
}

/**
 * The deadline passed while the stack was still not in a terminal state
 */
export class WaitTimeoutError extends StackLifecycleError {
  declare readonly code: ErrorCode.WAIT_TIMEOUT;

  constructor(
    public readonly stackName: string,
    public readonly timeoutMs: number,
    public readonly lastStatus?: string
  ) {
    super(
      `timeout waiting for stack '${stackName}' after ${timeoutMs}ms` +
        (lastStatus ? ` (last status ${lastStatus})` : ''),
      ErrorCode.WAIT_TIMEOUT,
      504,
      undefined,
      false
    );
    this.name = 'WaitTimeoutError';
  }
}

/**
 * The caller aborted the wait
 */
export class WaitCancelledError extends StackLifecycleError {
  declare readonly code: ErrorCode.WAIT_CANCELLED;

  constructor(public readonly stackName: string) {
    super(`wait for stack '${stackName}' was cancelled`, ErrorCode.WAIT_CANCELLED, 499, undefined, false);
    this.name = 'WaitCancelledError';
  }
}

/**
 * Resource failures collected from the stack's events, as "STATUS: REASON".
 *
 * `message` is the last entry of the list as retrieved. Events come back
 * oldest first, so that is the most recent failure; `rootCause` gives the
 * earliest one.
 */
export class CompositeFailureError extends StackLifecycleError {
  declare readonly code: ErrorCode.COMPOSITE_FAILURE;
  public readonly failures: readonly string[];

  constructor(
    public readonly stackName: string,
    failures: readonly string[]
  ) {
    const latest = failures[failures.length - 1];
    if (latest === undefined) {
      throw new RangeError('CompositeFailureError requires at least one failure');
    }
    super(latest, ErrorCode.COMPOSITE_FAILURE, 500, undefined, false);
    this.name = 'CompositeFailureError';
    this.failures = Object.freeze([...failures]);
  }

  /** Earliest failure recorded */
  get rootCause(): string {
    return this.failures[0] ?? this.message;
  }

  /** Most recent failure recorded */
  get latest(): string {
    return this.message;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), stackName: this.stackName, failures: [...this.failures] };
  }
}

/**
 * A failure-class status was observed but no failure events could be found;
 * the message is the raw "STATUS: REASON" pair.
 */
export class StackStatusError extends StackLifecycleError {
  declare readonly code: ErrorCode.STACK_STATUS;

  constructor(
    public readonly stackName: string,
    public readonly status: string,
    public readonly statusReason: string
  ) {
    super(`${status}: ${statusReason}`, ErrorCode.STACK_STATUS, 500, undefined, false);
    this.name = 'StackStatusError';
  }
}

/**
 * Every error a wait can end with
 */
export type WaitFailure =
  | TransportError
  | ProviderError
  | StackNotFoundError
  | WaitTimeoutError
  | WaitCancelledError
  | CompositeFailureError
  | StackStatusError;

const WAIT_FAILURE_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.TRANSPORT_ERROR,
  ErrorCode.PROVIDER_ERROR,
  ErrorCode.STACK_NOT_FOUND,
  ErrorCode.WAIT_TIMEOUT,
  ErrorCode.WAIT_CANCELLED,
  ErrorCode.COMPOSITE_FAILURE,
  ErrorCode.STACK_STATUS,
]);

/**
 * Narrows an unknown error to one of the wait outcomes
 */
export function isWaitFailure(error: unknown): error is WaitFailure {
  return error instanceof StackLifecycleError && WAIT_FAILURE_CODES.has(error.code);
}

/**
 * Normalizes anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Sleeps for the specified duration. An aborted signal ends the sleep early;
 * callers check the signal afterwards.
 *
 * @param ms - Duration in milliseconds
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
