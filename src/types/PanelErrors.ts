/**
 * Panel Errors - typed errors for retry decisions and caller-side matching
 *
 * Every failure raised by the core carries an error_class the caller can switch on,
 * an error_code for logs, and a retryable flag read by the HTTP client.
 */

export type PanelErrorClass =
  | 'VALIDATION'
  | 'AUTH'
  | 'TRANSIENT'
  | 'TIMEOUT'
  | 'CIRCUIT_OPEN'
  | 'HTTP_STATUS'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'ALREADY_EXISTS'
  | 'UPSTREAM_UNAVAILABLE'
  | 'INVALID_RESPONSE';

/**
 * Base error with error_class for retry and mapping decisions
 */
export class PanelError extends Error {
  constructor(
    message: string,
    public readonly error_class: PanelErrorClass,
    public readonly error_code: string,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Bad input (terminal, reported to caller verbatim)
 */
export class ValidationError extends PanelError {
  constructor(
    public readonly field: string,
    message: string,
    errorCode?: string
  ) {
    super(message, 'VALIDATION', errorCode || 'VALIDATION_FAILED', false);
  }
}

/**
 * Credential rejected by the panel, or rejected again right after a refresh
 */
export class AuthenticationError extends PanelError {
  constructor(message: string, errorCode?: string) {
    super(message, 'AUTH', errorCode || 'AUTH_FAILED', false);
  }
}

/**
 * Network failures and retryable HTTP statuses (retried with backoff unless the
 * retry policy excludes the error code)
 */
export class TransientNetworkError extends PanelError {
  constructor(
    message: string,
    public readonly status?: number,
    errorCode?: string,
    retryable: boolean = true
  ) {
    super(message, 'TRANSIENT', errorCode || 'TRANSIENT_NETWORK', retryable);
  }
}

/**
 * Timeouts: per-attempt (retryable) or the overall call deadline (terminal)
 */
export class TimeoutError extends PanelError {
  constructor(message: string, retryable: boolean = true) {
    super(message, 'TIMEOUT', retryable ? 'ATTEMPT_TIMEOUT' : 'DEADLINE_EXCEEDED', retryable);
  }
}

export class CircuitOpenError extends PanelError {
  constructor(public readonly retryAfterSeconds: number) {
    super(
      `Circuit breaker OPEN for panel API; failing fast. Retry after ${retryAfterSeconds}s.`,
      'CIRCUIT_OPEN',
      'CIRCUIT_OPEN',
      false
    );
  }
}

/**
 * Non-retryable HTTP status returned by the panel. Translated by the API client.
 */
export class HttpStatusError extends PanelError {
  constructor(
    public readonly status: number,
    public readonly responseBody: unknown,
    message?: string
  ) {
    super(message || `Panel responded with HTTP ${status}`, 'HTTP_STATUS', `HTTP_${status}`, false);
  }
}

export class NotFoundError extends PanelError {
  constructor(resource: string, id: string) {
    super(`${resource} not found: ${id}`, 'NOT_FOUND', 'NOT_FOUND', false);
  }
}

export class ConflictError extends PanelError {
  constructor(message: string) {
    super(message, 'CONFLICT', 'CONFLICT', false);
  }
}

export class AlreadyExistsError extends PanelError {
  constructor(userId: string, state: string) {
    super(`Subscription already exists for user ${userId} (state: ${state})`, 'ALREADY_EXISTS', 'ALREADY_EXISTS', false);
  }
}

/**
 * Circuit open, retries exhausted, deadline exceeded or credentials unusable
 */
export class UpstreamUnavailableError extends PanelError {
  constructor(message: string, cause?: Error) {
    super(message, 'UPSTREAM_UNAVAILABLE', 'UPSTREAM_UNAVAILABLE', false);
    if (cause) {
      this.cause = cause;
    }
  }
}

export class InvalidUpstreamResponseError extends PanelError {
  constructor(message: string) {
    super(message, 'INVALID_RESPONSE', 'INVALID_UPSTREAM_RESPONSE', false);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
