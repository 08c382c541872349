/**
 * Rate limiting, retries and circuit breaking for YouTrack requests.
 *
 * Every request is tagged with a `RequestKind`. Reads and state-setting
 * writes are safe to repeat; creating requests (new issues, comments,
 * work items, commands, uploads) are only repeated after a 429, the one
 * answer that guarantees the server did nothing.
 */

import {
  RateLimitConfig,
  RetryConfig,
  CircuitBreakerConfig,
} from '../config/index.js';
import {
  YouTrackError,
  RateLimitedError,
  RateLimitTimeoutError,
  CircuitBreakerOpenError,
} from '../errors/index.js';

/**
 * How safe a request is to send twice.
 * - `read`: GET
 * - `write`: sets state to a given value (field updates, PUT, DELETE)
 * - `create`: adds something on every call
 */
export type RequestKind = 'read' | 'write' | 'create';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================================================
// Rate Limiter
// ============================================================================

export interface RateLimiterStats {
  tokens: number;
  rate: number;
  waiting: number;
  throttled: number;
}

/**
 * Token bucket where callers reserve a token up front and sleep off any debt.
 * Repeated 429s halve the refill rate; each success wins back 10%.
 */
export class RateLimiter {
  private tokens: number;
  private rate: number;
  private updatedAt = Date.now();
  private waiting = 0;
  private throttled = 0;

  constructor(private readonly config: RateLimitConfig) {
    this.tokens = config.requestsPerSecond;
    this.rate = config.requestsPerSecond;
  }

  /**
   * @throws RateLimitTimeoutError when the wait would exceed `queueTimeout`
   * or `maxQueueSize` callers are already waiting
   */
  async acquire(): Promise<void> {
    this.refill();
    this.tokens -= 1;
    if (this.tokens >= 0) return;

    const waitMs = Math.ceil((-this.tokens / this.rate) * 1000);
    if (this.waiting >= this.config.maxQueueSize || waitMs > this.config.queueTimeout) {
      this.tokens += 1;
      throw new RateLimitTimeoutError(waitMs, this.config.queueTimeout);
    }

    this.waiting += 1;
    try {
      await sleep(waitMs);
    } finally {
      this.waiting -= 1;
    }
  }

  throttle(): void {
    this.throttled += 1;
    if (this.config.adaptiveRateLimit) {
      this.rate = Math.max(1, this.config.requestsPerSecond / 2 ** this.throttled);
    }
  }

  relax(): void {
    if (this.throttled === 0 || !this.config.adaptiveRateLimit) return;
    this.throttled -= 1;
    this.rate = Math.min(this.config.requestsPerSecond, this.rate * 1.1);
  }

  stats(): RateLimiterStats {
    this.refill();
    return {
      tokens: this.tokens,
      rate: this.rate,
      waiting: this.waiting,
      throttled: this.throttled,
    };
  }

  reset(): void {
    this.tokens = this.config.requestsPerSecond;
    this.rate = this.config.requestsPerSecond;
    this.throttled = 0;
    this.updatedAt = Date.now();
  }

  private refill(): void {
    const now = Date.now();
    const earned = ((now - this.updatedAt) / 1000) * this.rate;
    this.tokens = Math.min(this.config.requestsPerSecond, this.tokens + earned);
    this.updatedAt = now;
  }
}

// ============================================================================
// Circuit Breaker
// ============================================================================

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerStats {
  state: CircuitState;
  failures: number;
}

/**
 * Opens after `failureThreshold` consecutive server-side failures and
 * lets trial requests through once `resetTimeoutMs` has passed.
 */
export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failures = 0;
  private trialSuccesses = 0;
  private openedAt = 0;

  constructor(private readonly config: CircuitBreakerConfig) {}

  /**
   * @throws CircuitBreakerOpenError while open
   */
  check(): void {
    if (!this.config.enabled || this.state !== 'OPEN') return;

    const elapsed = Date.now() - this.openedAt;
    if (elapsed < this.config.resetTimeoutMs) {
      throw new CircuitBreakerOpenError(this.config.resetTimeoutMs - elapsed);
    }
    this.state = 'HALF_OPEN';
    this.trialSuccesses = 0;
  }

  recordSuccess(): void {
    if (!this.config.enabled) return;

    if (this.state === 'HALF_OPEN') {
      this.trialSuccesses += 1;
      if (this.trialSuccesses < this.config.successThreshold) return;
      this.state = 'CLOSED';
    }
    this.failures = 0;
  }

  recordFailure(): void {
    if (!this.config.enabled) return;

    this.failures += 1;
    if (this.state === 'HALF_OPEN' || this.failures >= this.config.failureThreshold) {
      this.state = 'OPEN';
      this.openedAt = Date.now();
    }
  }

  stats(): CircuitBreakerStats {
    return { state: this.state, failures: this.failures };
  }

  reset(): void {
    this.state = 'CLOSED';
    this.failures = 0;
    this.trialSuccesses = 0;
  }
}

// ============================================================================
// Retry Policy
// ============================================================================

export type RetryDecision =
  | { retry: true; delayMs: number }
  | { retry: false; exhausted: boolean };

/**
 * Decides whether a failed attempt is repeated, and after how long.
 */
export class RetryPolicy {
  constructor(private readonly config: RetryConfig) {}

  /**
   * @param attempt - 1 for the first attempt
   */
  decide(error: unknown, kind: RequestKind, attempt: number): RetryDecision {
    if (!(error instanceof YouTrackError) || !error.retryable) {
      return { retry: false, exhausted: false };
    }
    const rateLimited = error instanceof RateLimitedError;
    if (kind === 'create' && !rateLimited) {
      return { retry: false, exhausted: false };
    }

    const budget = rateLimited ? this.config.maxRateLimitRetries : this.config.maxRetries;
    if (attempt > budget) {
      return { retry: false, exhausted: attempt > 1 };
    }
    return { retry: true, delayMs: this.delayFor(attempt, error) };
  }

  private delayFor(attempt: number, error: YouTrackError): number {
    if (error.retryAfterMs !== undefined) {
      return error.retryAfterMs;
    }
    const base = this.config.initialBackoffMs * this.config.backoffMultiplier ** (attempt - 1);
    const jitter = 1 + (Math.random() * 2 - 1) * this.config.jitterFactor;
    return Math.min(base * jitter, this.config.maxBackoffMs);
  }
}

// ============================================================================
// Request Pipeline
// ============================================================================

export interface RetryListener {
  onRetry?(attempt: number, error: YouTrackError, delayMs: number, kind: RequestKind): void;
  onRetriesExhausted?(error: YouTrackError, attempts: number, kind: RequestKind): void;
}

export interface PipelineStats {
  rateLimiter: RateLimiterStats;
  circuitBreaker: CircuitBreakerStats;
}

/**
 * Circuit check, one rate-limit token, then attempts under the retry policy.
 * Only retryable failures count against the circuit.
 */
export class RequestPipeline {
  private readonly limiter: RateLimiter;
  private readonly breaker: CircuitBreaker;
  private readonly policy: RetryPolicy;

  constructor(
    config: {
      rateLimitConfig: RateLimitConfig;
      retryConfig: RetryConfig;
      circuitBreakerConfig: CircuitBreakerConfig;
    },
    private readonly listener: RetryListener = {}
  ) {
    this.limiter = new RateLimiter(config.rateLimitConfig);
    this.breaker = new CircuitBreaker(config.circuitBreakerConfig);
    this.policy = new RetryPolicy(config.retryConfig);
  }

  async run<T>(kind: RequestKind, attemptRequest: (attempt: number) => Promise<T>): Promise<T> {
    this.breaker.check();
    await this.limiter.acquire();

    for (let attempt = 1; ; attempt += 1) {
      try {
        const result = await attemptRequest(attempt);
        this.breaker.recordSuccess();
        this.limiter.relax();
        return result;
      } catch (error) {
        if (error instanceof YouTrackError && error.retryable) {
          this.breaker.recordFailure();
        }
        if (error instanceof RateLimitedError) {
          this.limiter.throttle();
        }

        const decision = this.policy.decide(error, kind, attempt);
        if (!decision.retry) {
          if (decision.exhausted && error instanceof YouTrackError) {
            this.listener.onRetriesExhausted?.(error, attempt, kind);
          }
          throw error;
        }
        if (error instanceof YouTrackError) {
          this.listener.onRetry?.(attempt, error, decision.delayMs, kind);
        }
        await sleep(decision.delayMs);
      }
    }
  }

  stats(): PipelineStats {
    return {
      rateLimiter: this.limiter.stats(),
      circuitBreaker: this.breaker.stats(),
    };
  }

  reset(): void {
    this.limiter.reset();
    this.breaker.reset();
  }
}
