export class MemphoraError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class ConfigError extends MemphoraError {}

/** Input rejected before any request was sent. */
export class ValidationError extends MemphoraError {}

export type ApiErrorCode =
  | 'AUTH_ERROR'
  | 'RATE_LIMITED'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'SERVER_ERROR'
  | 'CONNECTION_FAILED'
  | 'TIMEOUT'
  | 'SCHEMA_MISMATCH'
  | 'UNKNOWN';

export function classifyStatus(status: number): ApiErrorCode {
  if (status === 401 || status === 403) return 'AUTH_ERROR';
  if (status === 404) return 'NOT_FOUND';
  if (status === 400 || status === 422) return 'VALIDATION_ERROR';
  if (status === 429) return 'RATE_LIMITED';
  if (status >= 500) return 'SERVER_ERROR';
  return 'UNKNOWN';
}

/**
 * Failure reported by (or while talking to) the Memphora API.
 * `status` is 0 when no HTTP response was received.
 */
export class ApiError extends MemphoraError {
  readonly code: ApiErrorCode;

  constructor(
    message: string,
    public readonly status: number,
    public readonly body?: unknown,
    code?: ApiErrorCode,
    cause?: unknown,
  ) {
    super(message, cause);
    this.code = code ?? classifyStatus(status);
  }

  get isAuth(): boolean {
    return this.code === 'AUTH_ERROR';
  }

  get isRateLimit(): boolean {
    return this.code === 'RATE_LIMITED';
  }

  get isServerFault(): boolean {
    return this.code === 'SERVER_ERROR';
  }
}

export class AuthenticationError extends ApiError {}
export class NotFoundError extends ApiError {}
export class ApiValidationError extends ApiError {}
export class ServerError extends ApiError {}
export class ConnectionError extends ApiError {}
export class ResponseFormatError extends ApiError {}

export class RateLimitError extends ApiError {
  constructor(
    message: string,
    status: number,
    body?: unknown,
    public readonly retryAfterMs?: number,
  ) {
    super(message, status, body, 'RATE_LIMITED');
  }
}

/** Build the ApiError subclass matching an HTTP status. */
export function toApiError(
  status: number,
  message: string,
  body?: unknown,
  retryAfterMs?: number,
): ApiError {
  switch (classifyStatus(status)) {
    case 'AUTH_ERROR':
      return new AuthenticationError(message, status, body);
    case 'NOT_FOUND':
      return new NotFoundError(message, status, body);
    case 'VALIDATION_ERROR':
      return new ApiValidationError(message, status, body);
    case 'RATE_LIMITED':
      return new RateLimitError(message, status, body, retryAfterMs);
    case 'SERVER_ERROR':
      return new ServerError(message, status, body);
    default:
      return new ApiError(message, status, body);
  }
}
