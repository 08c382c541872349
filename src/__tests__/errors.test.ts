/**
 * Tests for error types and API error parsing.
 */

import { describe, it, expect } from 'vitest';
import {
  YouTrackErrorCode,
  AuthenticationError,
  BadRequestError,
  ConflictError,
  ConfigurationError,
  NetworkError,
  NotFoundError,
  PermissionDeniedError,
  RateLimitedError,
  ServerError,
  ServiceUnavailableError,
  TimeoutError,
  ValidationError,
  extractErrorDetail,
  getRetryDelayMs,
  isRetryableError,
  isYouTrackError,
  parseYouTrackApiError,
} from '../errors/index.js';

describe('parseYouTrackApiError', () => {
  it('maps status codes to error classes', () => {
    expect(parseYouTrackApiError(400, null)).toBeInstanceOf(BadRequestError);
    expect(parseYouTrackApiError(401, null)).toBeInstanceOf(AuthenticationError);
    expect(parseYouTrackApiError(403, null)).toBeInstanceOf(PermissionDeniedError);
    expect(parseYouTrackApiError(404, null)).toBeInstanceOf(NotFoundError);
    expect(parseYouTrackApiError(409, null)).toBeInstanceOf(ConflictError);
    expect(parseYouTrackApiError(429, null)).toBeInstanceOf(RateLimitedError);
    expect(parseYouTrackApiError(500, null)).toBeInstanceOf(ServerError);
    expect(parseYouTrackApiError(503, null)).toBeInstanceOf(ServiceUnavailableError);
  });

  it('uses error_description as the message detail', () => {
    const error = parseYouTrackApiError(404, {
      error: 'Not Found',
      error_description: 'Entity with id DEMO-999 not found',
    });

    expect(error.message).toBe('YouTrack API error: Entity with id DEMO-999 not found');
    expect(error.statusCode).toBe(404);
    expect(error.code).toBe(YouTrackErrorCode.NotFound);
  });

  it('keeps the status of unmapped client errors', () => {
    const error = parseYouTrackApiError(422, { message: 'Unprocessable' });

    expect(error).toBeInstanceOf(BadRequestError);
    expect(error.statusCode).toBe(422);
    expect(error.message).toBe('YouTrack API error: Unprocessable');
  });

  it('reads Retry-After seconds for 429', () => {
    const error = parseYouTrackApiError(429, null, '', '2');

    expect(error.retryAfterMs).toBe(2000);
    expect(error.message).toBe('YouTrack API error: rate limited, retry after 2000ms');
  });

  it('defaults 429 retry delay to 60 seconds', () => {
    expect(parseYouTrackApiError(429, null).retryAfterMs).toBe(60000);
  });

  it('treats other 5xx as retryable server errors', () => {
    const error = parseYouTrackApiError(502, null, 'Bad gateway');

    expect(error).toBeInstanceOf(ServerError);
    expect(error.retryable).toBe(true);
    expect(error.message).toBe('YouTrack API error: Bad gateway');
  });
});

describe('extractErrorDetail', () => {
  it('prefers error_description, then message, then error', () => {
    expect(extractErrorDetail(400, { error: 'a', message: 'b', error_description: 'c' })).toBe('c');
    expect(extractErrorDetail(400, { error: 'a', message: 'b' })).toBe('b');
    expect(extractErrorDetail(400, { error: 'a' })).toBe('a');
  });

  it('serialises bodies without a known field', () => {
    expect(extractErrorDetail(400, { value: 1 })).toBe('{"value":1}');
  });

  it('falls back to raw text and then the status', () => {
    expect(extractErrorDetail(500, null, '  upstream down \n')).toBe('upstream down');
    expect(extractErrorDetail(500, null, '')).toBe('HTTP 500');
  });
});

describe('error classes', () => {
  it('formats configuration errors', () => {
    const error = new ConfigurationError('Base URL is required');

    expect(error.message).toBe('Configuration error: Base URL is required');
    expect(error.retryable).toBe(false);
    expect(error.name).toBe('ConfigurationError');
  });

  it('joins validation messages', () => {
    const error = new ValidationError(['issueId must not be empty', 'limit must be a non-negative integer']);

    expect(error.message).toBe(
      'Validation failed: issueId must not be empty, limit must be a non-negative integer'
    );
    expect(error.details).toEqual({
      errors: ['issueId must not be empty', 'limit must be a non-negative integer'],
    });
  });

  it('keeps the cause of network errors', () => {
    const cause = new TypeError('fetch failed');
    const error = new NetworkError(cause.message, cause);

    expect(error.message).toBe('Network error: fetch failed');
    expect(error.cause).toBe(cause);
    expect(error.retryable).toBe(true);
  });

  it('serialises to JSON', () => {
    const error = new TimeoutError(5000);

    expect(error.toJSON()).toEqual({
      name: 'TimeoutError',
      code: YouTrackErrorCode.TimeoutError,
      message: 'Request timed out after 5000ms',
      statusCode: undefined,
      retryable: true,
      retryAfterMs: undefined,
      details: { timeoutMs: 5000 },
    });
  });
});

describe('error helpers', () => {
  it('identifies YouTrack errors', () => {
    expect(isYouTrackError(new NotFoundError('gone'))).toBe(true);
    expect(isYouTrackError(new Error('plain'))).toBe(false);
  });

  it('classifies retryable errors', () => {
    expect(isRetryableError(new ServerError(500))).toBe(true);
    expect(isRetryableError(new RateLimitedError(100))).toBe(true);
    expect(isRetryableError(new NotFoundError('gone'))).toBe(false);
    expect(isRetryableError(new TypeError('fetch failed'))).toBe(true);
    expect(isRetryableError(new Error('other'))).toBe(false);
  });

  it('returns the retry delay of rate limit errors', () => {
    expect(getRetryDelayMs(new RateLimitedError(1500))).toBe(1500);
    expect(getRetryDelayMs(new ServerError(500))).toBeUndefined();
    expect(getRetryDelayMs('not an error')).toBeUndefined();
  });
});
