/**
 * Error kinds surfaced for failed Zammad API calls.
 * `kind` lets callers decide whether a retry makes sense without
 * matching on message text.
 */
export type RemoteErrorKind =
  | 'not_found'
  | 'auth'
  | 'permission'
  | 'timeout'
  | 'unavailable'
  | 'rejected';

/**
 * Base class for Zammad API errors.
 * Carries the HTTP status code (null when no response was received).
 */
export class ZammadApiError extends Error {
  public readonly statusCode: number | null;
  public readonly kind: RemoteErrorKind;

  constructor(statusCode: number | null, message: string, kind: RemoteErrorKind = 'rejected') {
    super(message);
    this.name = 'ZammadApiError';
    this.statusCode = statusCode;
    this.kind = kind;
  }
}

export class RemoteNotFoundError extends ZammadApiError {
  /** API path of the failed request, without query string */
  public readonly path: string | null;

  constructor(message: string, statusCode: number | null = 404, path: string | null = null) {
    super(statusCode, message, 'not_found');
    this.name = 'RemoteNotFoundError';
    this.path = path;
  }
}

export class RemoteAuthError extends ZammadApiError {
  constructor(message: string) {
    super(401, message, 'auth');
    this.name = 'RemoteAuthError';
  }
}

export class RemotePermissionError extends ZammadApiError {
  constructor(message: string) {
    super(403, message, 'permission');
    this.name = 'RemotePermissionError';
  }
}

export class RemoteTimeoutError extends ZammadApiError {
  public readonly timeoutMs: number | null;

  constructor(message: string, timeoutMs: number | null, statusCode: number | null = null) {
    super(statusCode, message, 'timeout');
    this.name = 'RemoteTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class RemoteUnavailableError extends ZammadApiError {
  constructor(message: string, statusCode: number | null = null) {
    super(statusCode, message, 'unavailable');
    this.name = 'RemoteUnavailableError';
  }
}
