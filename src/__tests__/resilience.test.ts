/**
 * Tests for rate limiting, circuit breaking and retries.
 */

import { describe, it, expect, vi } from 'vitest';
import { CircuitBreaker, RateLimiter, RequestPipeline, RetryPolicy } from '../resilience/index.js';
import {
  CircuitBreakerOpenError,
  NotFoundError,
  RateLimitTimeoutError,
  RateLimitedError,
  ServerError,
  ServiceUnavailableError,
  TimeoutError,
} from '../errors/index.js';
import {
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  DEFAULT_RATE_LIMIT_CONFIG,
  DEFAULT_RETRY_CONFIG,
} from '../config/index.js';

describe('RateLimiter', () => {
  it('hands out tokens up to the per-second limit', async () => {
    const limiter = new RateLimiter({ ...DEFAULT_RATE_LIMIT_CONFIG, requestsPerSecond: 2 });

    await limiter.acquire();
    await limiter.acquire();

    expect(limiter.stats().tokens).toBeLessThan(1);
  });

  it('rejects when the queue is full', async () => {
    const limiter = new RateLimiter({
      ...DEFAULT_RATE_LIMIT_CONFIG,
      requestsPerSecond: 1,
      maxQueueSize: 0,
    });

    await limiter.acquire();
    await expect(limiter.acquire()).rejects.toBeInstanceOf(RateLimitTimeoutError);
    expect(limiter.stats().waiting).toBe(0);
  });

  it('rejects when the wait would exceed the queue timeout', async () => {
    const limiter = new RateLimiter({
      ...DEFAULT_RATE_LIMIT_CONFIG,
      requestsPerSecond: 1,
      queueTimeout: 500,
    });

    await limiter.acquire();
    await expect(limiter.acquire()).rejects.toBeInstanceOf(RateLimitTimeoutError);
  });

  it('halves the rate on repeated 429 responses and recovers', () => {
    const limiter = new RateLimiter({ ...DEFAULT_RATE_LIMIT_CONFIG, requestsPerSecond: 8 });

    limiter.throttle();
    expect(limiter.stats().rate).toBe(4);
    limiter.throttle();
    expect(limiter.stats().rate).toBe(2);

    limiter.relax();
    expect(limiter.stats().rate).toBeCloseTo(2.2);
    expect(limiter.stats().throttled).toBe(1);
  });

  it('keeps the rate when adaptive limiting is off', () => {
    const limiter = new RateLimiter({
      ...DEFAULT_RATE_LIMIT_CONFIG,
      requestsPerSecond: 8,
      adaptiveRateLimit: false,
    });

    limiter.throttle();
    expect(limiter.stats().rate).toBe(8);
  });
});

describe('CircuitBreaker', () => {
  const config = { ...DEFAULT_CIRCUIT_BREAKER_CONFIG, failureThreshold: 2, resetTimeoutMs: 1000 };

  it('opens after the failure threshold', () => {
    const breaker = new CircuitBreaker(config);

    breaker.recordFailure();
    expect(breaker.stats().state).toBe('CLOSED');
    breaker.recordFailure();
    expect(breaker.stats().state).toBe('OPEN');

    expect(() => breaker.check()).toThrow(CircuitBreakerOpenError);
  });

  it('only counts consecutive failures', () => {
    const breaker = new CircuitBreaker(config);

    breaker.recordFailure();
    breaker.recordSuccess();
    breaker.recordFailure();

    expect(breaker.stats()).toEqual({ state: 'CLOSED', failures: 1 });
  });

  it('half-opens after the reset timeout and closes on successes', () => {
    vi.useFakeTimers();
    try {
      const breaker = new CircuitBreaker(config);
      breaker.recordFailure();
      breaker.recordFailure();

      vi.advanceTimersByTime(1000);
      expect(() => breaker.check()).not.toThrow();
      expect(breaker.stats().state).toBe('HALF_OPEN');

      breaker.recordSuccess();
      expect(breaker.stats().state).toBe('HALF_OPEN');
      breaker.recordSuccess();
      expect(breaker.stats()).toEqual({ state: 'CLOSED', failures: 0 });
    } finally {
      vi.useRealTimers();
    }
  });

  it('reopens when a trial request fails', () => {
    vi.useFakeTimers();
    try {
      const breaker = new CircuitBreaker(config);
      breaker.recordFailure();
      breaker.recordFailure();
      vi.advanceTimersByTime(1000);
      breaker.check();

      breaker.recordFailure();

      expect(breaker.stats().state).toBe('OPEN');
    } finally {
      vi.useRealTimers();
    }
  });

  it('lets everything through when disabled', () => {
    const breaker = new CircuitBreaker({ ...config, enabled: false });

    breaker.recordFailure();
    breaker.recordFailure();

    expect(() => breaker.check()).not.toThrow();
    expect(breaker.stats().state).toBe('CLOSED');
  });
});

describe('RetryPolicy', () => {
  const policy = new RetryPolicy({
    ...DEFAULT_RETRY_CONFIG,
    maxRetries: 2,
    maxRateLimitRetries: 1,
    initialBackoffMs: 1,
    jitterFactor: 0,
  });

  it('repeats reads and writes after server errors with exponential backoff', () => {
    expect(policy.decide(new ServerError(500), 'read', 1)).toEqual({ retry: true, delayMs: 1 });
    expect(policy.decide(new TimeoutError(100), 'write', 2)).toEqual({ retry: true, delayMs: 2 });
  });

  it('never repeats a creating request after a server error or timeout', () => {
    expect(policy.decide(new ServerError(500), 'create', 1)).toEqual({
      retry: false,
      exhausted: false,
    });
    expect(policy.decide(new ServiceUnavailableError(), 'create', 1)).toEqual({
      retry: false,
      exhausted: false,
    });
    expect(policy.decide(new TimeoutError(100), 'create', 1)).toEqual({
      retry: false,
      exhausted: false,
    });
  });

  it('repeats a creating request after a 429, using the server delay', () => {
    expect(policy.decide(new RateLimitedError(5), 'create', 1)).toEqual({
      retry: true,
      delayMs: 5,
    });
  });

  it('does not repeat client errors', () => {
    expect(policy.decide(new NotFoundError('gone'), 'read', 1)).toEqual({
      retry: false,
      exhausted: false,
    });
  });

  it('gives up once the budget for the error class is spent', () => {
    expect(policy.decide(new ServerError(502), 'read', 3)).toEqual({
      retry: false,
      exhausted: true,
    });
    expect(policy.decide(new RateLimitedError(5), 'read', 2)).toEqual({
      retry: false,
      exhausted: true,
    });
  });

  it('caps the backoff', () => {
    const capped = new RetryPolicy({
      ...DEFAULT_RETRY_CONFIG,
      maxRetries: 10,
      initialBackoffMs: 100,
      maxBackoffMs: 250,
      jitterFactor: 0,
    });

    expect(capped.decide(new ServerError(500), 'read', 3)).toEqual({ retry: true, delayMs: 250 });
  });
});

describe('RequestPipeline', () => {
  function pipeline(overrides: { failureThreshold?: number; maxRetries?: number } = {}) {
    return new RequestPipeline({
      rateLimitConfig: DEFAULT_RATE_LIMIT_CONFIG,
      circuitBreakerConfig: {
        ...DEFAULT_CIRCUIT_BREAKER_CONFIG,
        failureThreshold: overrides.failureThreshold ?? 5,
      },
      retryConfig: {
        ...DEFAULT_RETRY_CONFIG,
        maxRetries: overrides.maxRetries ?? 0,
        maxRateLimitRetries: 1,
        initialBackoffMs: 1,
        jitterFactor: 0,
      },
    });
  }

  it('retries a read and passes the attempt number', async () => {
    const attempt = vi
      .fn<[number], Promise<string>>()
      .mockRejectedValueOnce(new ServerError(500))
      .mockResolvedValueOnce('ok');

    await expect(pipeline({ maxRetries: 2 }).run('read', attempt)).resolves.toBe('ok');
    expect(attempt.mock.calls).toEqual([[1], [2]]);
  });

  it('sends a creating request once when the server fails', async () => {
    const attempt = vi
      .fn<[number], Promise<string>>()
      .mockRejectedValue(new ServiceUnavailableError());

    await expect(pipeline({ maxRetries: 2 }).run('create', attempt)).rejects.toBeInstanceOf(
      ServiceUnavailableError
    );
    expect(attempt).toHaveBeenCalledTimes(1);
  });

  it('reports retries and exhaustion to the listener', async () => {
    const onRetry = vi.fn();
    const onRetriesExhausted = vi.fn();
    const requests = new RequestPipeline(
      {
        rateLimitConfig: DEFAULT_RATE_LIMIT_CONFIG,
        circuitBreakerConfig: DEFAULT_CIRCUIT_BREAKER_CONFIG,
        retryConfig: { ...DEFAULT_RETRY_CONFIG, maxRetries: 1, initialBackoffMs: 1, jitterFactor: 0 },
      },
      { onRetry, onRetriesExhausted }
    );

    await expect(
      requests.run('write', () => Promise.reject(new ServerError(502)))
    ).rejects.toBeInstanceOf(ServerError);

    expect(onRetry).toHaveBeenCalledWith(1, expect.any(ServerError), 1, 'write');
    expect(onRetriesExhausted).toHaveBeenCalledWith(expect.any(ServerError), 2, 'write');
  });

  it('throttles the rate limiter on 429', async () => {
    const requests = pipeline();
    const attempt = vi
      .fn<[number], Promise<string>>()
      .mockRejectedValueOnce(new RateLimitedError(1))
      .mockResolvedValueOnce('ok');

    await expect(requests.run('create', attempt)).resolves.toBe('ok');
    expect(attempt).toHaveBeenCalledTimes(2);
    expect(requests.stats().rateLimiter.throttled).toBe(0);
  });

  it('does not count client errors against the circuit', async () => {
    const requests = pipeline({ failureThreshold: 1 });

    await expect(
      requests.run('read', () => Promise.reject(new NotFoundError('gone')))
    ).rejects.toBeInstanceOf(NotFoundError);

    expect(requests.stats().circuitBreaker.state).toBe('CLOSED');
  });

  it('opens the circuit on server failures', async () => {
    const requests = pipeline({ failureThreshold: 1 });

    await expect(
      requests.run('read', () => Promise.reject(new ServerError(500)))
    ).rejects.toBeInstanceOf(ServerError);
    await expect(requests.run('read', () => Promise.resolve('never'))).rejects.toBeInstanceOf(
      CircuitBreakerOpenError
    );

    requests.reset();
    await expect(requests.run('read', () => Promise.resolve('ok'))).resolves.toBe('ok');
  });
});
