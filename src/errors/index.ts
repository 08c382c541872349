/**
 * YouTrack error types and handling.
 *
 * Error hierarchy with proper categorization for retryable vs non-retryable errors.
 * Maps HTTP status codes to appropriate error types.
 */

/**
 * Error codes for YouTrack errors.
 */
export enum YouTrackErrorCode {
  // Configuration errors
  ConfigurationError = 'CONFIGURATION_ERROR',
  NoAuthentication = 'NO_AUTHENTICATION',

  // Authentication errors
  AuthenticationError = 'AUTHENTICATION_ERROR',

  // Access errors
  PermissionDenied = 'PERMISSION_DENIED',
  NotFound = 'NOT_FOUND',

  // Request errors
  BadRequest = 'BAD_REQUEST',
  Conflict = 'CONFLICT',
  ValidationError = 'VALIDATION_ERROR',
  UnexpectedResponse = 'UNEXPECTED_RESPONSE',

  // Rate limiting
  RateLimited = 'RATE_LIMITED',
  RateLimitTimeout = 'RATE_LIMIT_TIMEOUT',

  // Network/Server errors
  NetworkError = 'NETWORK_ERROR',
  TimeoutError = 'TIMEOUT_ERROR',
  ServerError = 'SERVER_ERROR',
  ServiceUnavailable = 'SERVICE_UNAVAILABLE',

  // Circuit breaker
  CircuitBreakerOpen = 'CIRCUIT_BREAKER_OPEN',
}

/**
 * YouTrack API error response structure.
 *
 * Hub-style OAuth errors carry `error` / `error_description`; REST errors
 * usually carry `error` and `error_description`, sometimes `message`.
 */
export interface YouTrackApiErrorResponse {
  error?: string;
  error_description?: string;
  error_developer_message?: string;
  message?: string;
  [key: string]: unknown;
}

/**
 * Prefix shared by every error produced from an API response.
 */
export const API_ERROR_PREFIX = 'YouTrack API error: ';

/**
 * Base YouTrack error class.
 */
export class YouTrackError extends Error {
  /** Error code */
  readonly code: YouTrackErrorCode;
  /** HTTP status code (if applicable) */
  readonly statusCode?: number;
  /** Whether this error is retryable */
  readonly retryable: boolean;
  /** Retry-after duration in milliseconds */
  readonly retryAfterMs?: number;
  /** Additional error details */
  readonly details?: Record<string, unknown>;

  constructor(options: {
    code: YouTrackErrorCode;
    message: string;
    statusCode?: number;
    retryable?: boolean;
    retryAfterMs?: number;
    details?: Record<string, unknown>;
    cause?: Error;
  }) {
    super(options.message, { cause: options.cause });
    this.name = 'YouTrackError';
    this.code = options.code;
    this.statusCode = options.statusCode;
    this.retryable = options.retryable ?? false;
    this.retryAfterMs = options.retryAfterMs;
    this.details = options.details;
  }

  /**
   * Creates a JSON representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      retryable: this.retryable,
      retryAfterMs: this.retryAfterMs,
      details: this.details,
    };
  }
}

// ============================================================================
// Configuration Errors (Non-Retryable)
// ============================================================================

/**
 * Configuration error.
 */
export class ConfigurationError extends YouTrackError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: YouTrackErrorCode.ConfigurationError,
      message: `Configuration error: ${message}`,
      retryable: false,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * No authentication configured.
 */
export class NoAuthenticationError extends YouTrackError {
  constructor() {
    super({
      code: YouTrackErrorCode.NoAuthentication,
      message: 'No authentication configured (a permanent token is required)',
      retryable: false,
    });
    this.name = 'NoAuthenticationError';
  }
}

// ============================================================================
// API Errors (Non-Retryable)
// ============================================================================

/**
 * Authentication failed (invalid or revoked token).
 */
export class AuthenticationError extends YouTrackError {
  constructor(detail: string = 'Authentication failed') {
    super({
      code: YouTrackErrorCode.AuthenticationError,
      message: `${API_ERROR_PREFIX}${detail}`,
      statusCode: 401,
      retryable: false,
    });
    this.name = 'AuthenticationError';
  }
}

/**
 * Permission denied.
 */
export class PermissionDeniedError extends YouTrackError {
  constructor(detail: string = 'Permission denied for this operation') {
    super({
      code: YouTrackErrorCode.PermissionDenied,
      message: `${API_ERROR_PREFIX}${detail}`,
      statusCode: 403,
      retryable: false,
    });
    this.name = 'PermissionDeniedError';
  }
}

/**
 * Entity or endpoint not found.
 */
export class NotFoundError extends YouTrackError {
  constructor(detail: string) {
    super({
      code: YouTrackErrorCode.NotFound,
      message: `${API_ERROR_PREFIX}${detail}`,
      statusCode: 404,
      retryable: false,
    });
    this.name = 'NotFoundError';
  }
}

/**
 * Request rejected by the server (400 and unmapped 4xx).
 */
export class BadRequestError extends YouTrackError {
  constructor(detail: string, statusCode: number = 400) {
    super({
      code: YouTrackErrorCode.BadRequest,
      message: `${API_ERROR_PREFIX}${detail}`,
      statusCode,
      retryable: false,
    });
    this.name = 'BadRequestError';
  }
}

/**
 * Conflicting update.
 */
export class ConflictError extends YouTrackError {
  constructor(detail: string) {
    super({
      code: YouTrackErrorCode.Conflict,
      message: `${API_ERROR_PREFIX}${detail}`,
      statusCode: 409,
      retryable: false,
    });
    this.name = 'ConflictError';
  }
}

/**
 * Client-side input validation failure; no request was sent.
 */
export class ValidationError extends YouTrackError {
  constructor(errors: string[]) {
    super({
      code: YouTrackErrorCode.ValidationError,
      message: `Validation failed: ${errors.join(', ')}`,
      retryable: false,
      details: { errors },
    });
    this.name = 'ValidationError';
  }
}

/**
 * Successful response whose body could not be used.
 */
export class UnexpectedResponseError extends YouTrackError {
  constructor(reason: string, statusCode?: number) {
    super({
      code: YouTrackErrorCode.UnexpectedResponse,
      message: `${API_ERROR_PREFIX}${reason}`,
      statusCode,
      retryable: false,
    });
    this.name = 'UnexpectedResponseError';
  }
}

// ============================================================================
// Rate Limiting Errors
// ============================================================================

/**
 * Rate limited by the YouTrack server.
 */
export class RateLimitedError extends YouTrackError {
  declare readonly retryAfterMs: number;

  constructor(retryAfterMs: number) {
    super({
      code: YouTrackErrorCode.RateLimited,
      message: `${API_ERROR_PREFIX}rate limited, retry after ${retryAfterMs}ms`,
      statusCode: 429,
      retryable: true,
      retryAfterMs,
    });
    this.name = 'RateLimitedError';
  }
}

/**
 * Rate limit wait time exceeded timeout.
 */
export class RateLimitTimeoutError extends YouTrackError {
  constructor(waitTime: number, maxWait: number) {
    super({
      code: YouTrackErrorCode.RateLimitTimeout,
      message: `Rate limit wait time (${waitTime}ms) exceeds maximum (${maxWait}ms)`,
      retryable: false,
      details: { waitTime, maxWait },
    });
    this.name = 'RateLimitTimeoutError';
  }
}

// ============================================================================
// Network/Server Errors (Retryable)
// ============================================================================

/**
 * Network error.
 */
export class NetworkError extends YouTrackError {
  constructor(message: string, cause?: Error) {
    super({
      code: YouTrackErrorCode.NetworkError,
      message: `Network error: ${message}`,
      retryable: true,
      cause,
    });
    this.name = 'NetworkError';
  }
}

/**
 * Request timeout.
 */
export class TimeoutError extends YouTrackError {
  constructor(timeoutMs: number) {
    super({
      code: YouTrackErrorCode.TimeoutError,
      message: `Request timed out after ${timeoutMs}ms`,
      retryable: true,
      details: { timeoutMs },
    });
    this.name = 'TimeoutError';
  }
}

/**
 * YouTrack server error.
 */
export class ServerError extends YouTrackError {
  constructor(statusCode: number, detail: string = 'server error') {
    super({
      code: YouTrackErrorCode.ServerError,
      message: `${API_ERROR_PREFIX}${detail}`,
      statusCode,
      retryable: true,
    });
    this.name = 'ServerError';
  }
}

/**
 * Service unavailable.
 */
export class ServiceUnavailableError extends YouTrackError {
  constructor(retryAfterMs?: number) {
    super({
      code: YouTrackErrorCode.ServiceUnavailable,
      message: `${API_ERROR_PREFIX}service is temporarily unavailable`,
      statusCode: 503,
      retryable: true,
      retryAfterMs,
    });
    this.name = 'ServiceUnavailableError';
  }
}

// ============================================================================
// Circuit Breaker Errors
// ============================================================================

/**
 * Circuit breaker is open.
 */
export class CircuitBreakerOpenError extends YouTrackError {
  constructor(resetTimeMs: number) {
    super({
      code: YouTrackErrorCode.CircuitBreakerOpen,
      message: 'Circuit breaker is open, rejecting requests',
      retryable: false,
      details: { resetTimeMs },
    });
    this.name = 'CircuitBreakerOpenError';
  }
}

// ============================================================================
// Error Parsing Utilities
// ============================================================================

/**
 * Picks the human-readable part of an error response.
 */
export function extractErrorDetail(
  statusCode: number,
  body: YouTrackApiErrorResponse | null,
  rawText?: string
): string {
  if (body) {
    const detail = body.error_description || body.message || body.error;
    if (typeof detail === 'string' && detail.length > 0) {
      return detail;
    }
    return JSON.stringify(body);
  }
  if (rawText && rawText.trim().length > 0) {
    return rawText.trim();
  }
  return `HTTP ${statusCode}`;
}

/**
 * Parses a Retry-After header given in seconds.
 */
function parseRetryAfter(header: string | undefined): number | undefined {
  if (!header) return undefined;
  const seconds = parseFloat(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

/**
 * Parses a YouTrack API error response into the appropriate error type.
 */
export function parseYouTrackApiError(
  statusCode: number,
  body: YouTrackApiErrorResponse | null,
  rawText?: string,
  retryAfterHeader?: string
): YouTrackError {
  const detail = extractErrorDetail(statusCode, body, rawText);

  switch (statusCode) {
    case 400:
      return new BadRequestError(detail);

    case 401:
      return new AuthenticationError(detail);

    case 403:
      return new PermissionDeniedError(detail);

    case 404:
      return new NotFoundError(detail);

    case 409:
      return new ConflictError(detail);

    case 429:
      return new RateLimitedError(parseRetryAfter(retryAfterHeader) ?? 60000);

    case 503:
      return new ServiceUnavailableError(parseRetryAfter(retryAfterHeader));

    default:
      if (statusCode >= 500) {
        return new ServerError(statusCode, detail);
      }
      return new BadRequestError(detail, statusCode);
  }
}

/**
 * Checks if an error is a YouTrack error.
 */
export function isYouTrackError(error: unknown): error is YouTrackError {
  return error instanceof YouTrackError;
}

/**
 * Checks if an error is retryable.
 */
export function isRetryableError(error: unknown): boolean {
  if (isYouTrackError(error)) {
    return error.retryable;
  }
  // Network errors from fetch are typically retryable
  if (error instanceof TypeError && error.message.includes('fetch')) {
    return true;
  }
  return false;
}

/**
 * Gets retry delay from error, if applicable.
 */
export function getRetryDelayMs(error: unknown): number | undefined {
  if (isYouTrackError(error)) {
    return error.retryAfterMs;
  }
  return undefined;
}
