/**
 * YouTrack client configuration and builder.
 *
 * Configuration comes from explicit builder calls, environment variables,
 * or the `[youtrack]` table of a TOML file (`~/.youtrack.toml` by default).
 */

import { readFile } from 'fs/promises';
import { homedir } from 'os';
import { join } from 'path';
import { parse as parseToml } from 'smol-toml';
import { z } from 'zod';
import { ConfigurationError, NoAuthenticationError } from '../errors/index.js';

// ============================================================================
// Rate Limit Configuration
// ============================================================================

/**
 * Rate limit configuration.
 */
export interface RateLimitConfig {
  /** Requests per second limit. Default: 10 */
  requestsPerSecond: number;
  /** Maximum time to wait in queue (ms). Default: 30000 */
  queueTimeout: number;
  /** Maximum pending requests in queue. Default: 100 */
  maxQueueSize: number;
  /** Whether to adapt rate based on 429 responses. Default: true */
  adaptiveRateLimit: boolean;
}

// ============================================================================
// Retry Configuration
// ============================================================================

/**
 * Retry configuration.
 */
export interface RetryConfig {
  /** Maximum retry attempts. Default: 3 */
  maxRetries: number;
  /** Maximum retries for rate limit errors. Default: 5 */
  maxRateLimitRetries: number;
  /** Initial backoff delay (ms). Default: 1000 */
  initialBackoffMs: number;
  /** Maximum backoff delay (ms). Default: 60000 */
  maxBackoffMs: number;
  /** Backoff multiplier. Default: 2 */
  backoffMultiplier: number;
  /** Jitter factor (0-1). Default: 0.1 */
  jitterFactor: number;
}

// ============================================================================
// Circuit Breaker Configuration
// ============================================================================

/**
 * Circuit breaker configuration.
 */
export interface CircuitBreakerConfig {
  /** Failure threshold before opening circuit. Default: 5 */
  failureThreshold: number;
  /** Success threshold to close circuit. Default: 2 */
  successThreshold: number;
  /** Reset timeout (ms). Default: 30000 */
  resetTimeoutMs: number;
  /** Enable circuit breaker. Default: true */
  enabled: boolean;
}

// ============================================================================
// Authentication Types
// ============================================================================

/**
 * Authentication method types.
 *
 * YouTrack permanent tokens look like `perm:<base64 login>.<name>.<secret>`.
 */
export type AuthMethod = { type: 'permanent_token'; token: string };

// ============================================================================
// Main Configuration Interface
// ============================================================================

/**
 * YouTrack client configuration.
 */
export interface YouTrackConfig {
  /** YouTrack instance URL (e.g., "https://example.youtrack.cloud") */
  baseUrl: string;
  /** Authentication method */
  auth: AuthMethod;
  /** Rate limit configuration */
  rateLimitConfig: RateLimitConfig;
  /** Retry configuration */
  retryConfig: RetryConfig;
  /** Circuit breaker configuration */
  circuitBreakerConfig: CircuitBreakerConfig;
  /** Request timeout in milliseconds. Default: 30000 */
  requestTimeoutMs: number;
  /** User agent string */
  userAgent: string;
}

// ============================================================================
// Default Configurations
// ============================================================================

export const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = {
  requestsPerSecond: 10,
  queueTimeout: 30000,
  maxQueueSize: 100,
  adaptiveRateLimit: true,
};

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  maxRateLimitRetries: 5,
  initialBackoffMs: 1000,
  maxBackoffMs: 60000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
};

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  successThreshold: 2,
  resetTimeoutMs: 30000,
  enabled: true,
};

export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

export const DEFAULT_USER_AGENT = 'youtrack-integration/1.0.0';

/**
 * REST API path appended to the instance URL.
 */
export const YOUTRACK_API_PATH = '/api';

/**
 * File name of the per-user configuration file.
 */
export const CONFIG_FILE_NAME = '.youtrack.toml';

/**
 * Resolves the configuration file path: `YOUTRACK_CONFIG`, else `~/.youtrack.toml`.
 */
export function defaultConfigPath(): string {
  return process.env.YOUTRACK_CONFIG ?? join(homedir(), CONFIG_FILE_NAME);
}

// ============================================================================
// Configuration File Schema
// ============================================================================

/**
 * Schema of the TOML configuration file.
 *
 * ```toml
 * [youtrack]
 * token = "perm:..."
 * base_url = "https://example.youtrack.cloud"
 * ```
 */
export const ConfigFileSchema = z.object({
  youtrack: z.object({
    token: z.string().trim().min(1, 'token must not be empty'),
    base_url: z.string().url('base_url must be a valid URL'),
    timeout_seconds: z.number().int().positive().optional(),
    max_retries: z.number().int().nonnegative().optional(),
  }),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

const blankToUndefined = (value: unknown): unknown => (value === '' ? undefined : value);

function envNumber(schema: z.ZodNumber) {
  return z.preprocess(blankToUndefined, schema.optional());
}

/**
 * Schema of the `YOUTRACK_*` environment variables. Unset and empty
 * variables are ignored.
 */
export const EnvSchema = z.object({
  YOUTRACK_BASE_URL: z.preprocess(blankToUndefined, z.string().optional()),
  YOUTRACK_TOKEN: z.preprocess(blankToUndefined, z.string().optional()),
  YOUTRACK_TIMEOUT_SECONDS: envNumber(z.coerce.number().int().positive()),
  YOUTRACK_RATE_LIMIT_RPS: envNumber(z.coerce.number().int().positive()),
  YOUTRACK_MAX_RETRIES: envNumber(z.coerce.number().int().nonnegative()),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

function parseEnv(env: NodeJS.ProcessEnv): EnvConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(
      issue => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid environment: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

function requireNumber(value: number | undefined, name: string, min: number, integer: boolean): void {
  if (value === undefined) return;
  if (!Number.isFinite(value) || value < min || (integer && !Number.isInteger(value))) {
    const kind = integer ? 'an integer' : 'a number';
    throw new ConfigurationError(`${name} must be ${kind} of at least ${min}, got ${value}`);
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parses and validates the text of a configuration file.
 * @param source - Path used in error messages
 */
export function parseConfigFile(content: string, source: string): ConfigFile {
  let document: unknown;
  try {
    document = parseToml(content);
  } catch (error) {
    throw new ConfigurationError(`Invalid TOML in ${source}: ${errorMessage(error)}`, {
      path: source,
    });
  }

  const result = ConfigFileSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues.map(
      issue => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid configuration in ${source}: ${issues.join('; ')}`, {
      path: source,
      issues,
    });
  }
  return result.data;
}

/**
 * Reads and validates a configuration file.
 */
export async function loadConfigFile(path: string = defaultConfigPath()): Promise<ConfigFile> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read configuration file ${path}: ${errorMessage(error)}`,
      { path }
    );
  }
  return parseConfigFile(content, path);
}

// ============================================================================
// SecretString
// ============================================================================

/**
 * SecretString wrapper to prevent accidental logging of sensitive values.
 * The value is only accessible via the expose() method.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value. Use with caution.
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return '[REDACTED]';
  }

  toJSON(): string {
    return '[REDACTED]';
  }
}

// ============================================================================
// Configuration Builder
// ============================================================================

/**
 * Builder for YouTrack client configuration.
 */
export class YouTrackConfigBuilder {
  private baseUrl?: string;
  private auth?: AuthMethod;
  private rateLimitConfig: RateLimitConfig = { ...DEFAULT_RATE_LIMIT_CONFIG };
  private retryConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG };
  private circuitBreakerConfig: CircuitBreakerConfig = { ...DEFAULT_CIRCUIT_BREAKER_CONFIG };
  private requestTimeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS;
  private userAgent: string = DEFAULT_USER_AGENT;

  /**
   * Sets the YouTrack instance URL.
   * @param url - e.g. "https://example.youtrack.cloud" or "https://host/youtrack"
   */
  withBaseUrl(url: string): this {
    if (!url || url.trim().length === 0) {
      throw new ConfigurationError('Base URL cannot be empty');
    }
    let parsed: URL;
    try {
      parsed = new URL(url.trim());
    } catch {
      throw new ConfigurationError(`Invalid base URL format: ${url}`);
    }
    if (!['https:', 'http:'].includes(parsed.protocol)) {
      throw new ConfigurationError('Base URL must use HTTP or HTTPS protocol');
    }
    this.baseUrl = url.trim().replace(/\/+$/, '');
    return this;
  }

  /**
   * Sets permanent token authentication.
   */
  withToken(token: string): this {
    if (!token || token.trim().length === 0) {
      throw new ConfigurationError('Token cannot be empty');
    }
    this.auth = { type: 'permanent_token', token: token.trim() };
    return this;
  }

  withRateLimitConfig(config: Partial<RateLimitConfig>): this {
    const rps = config.requestsPerSecond;
    if (rps !== undefined && (!Number.isFinite(rps) || rps <= 0)) {
      throw new ConfigurationError('Requests per second must be positive');
    }
    requireNumber(config.queueTimeout, 'queueTimeout', 0, false);
    requireNumber(config.maxQueueSize, 'maxQueueSize', 0, true);
    this.rateLimitConfig = { ...this.rateLimitConfig, ...config };
    return this;
  }

  withRetryConfig(config: Partial<RetryConfig>): this {
    if (config.maxRetries !== undefined && config.maxRetries < 0) {
      throw new ConfigurationError('Max retries cannot be negative');
    }
    requireNumber(config.maxRetries, 'maxRetries', 0, true);
    requireNumber(config.maxRateLimitRetries, 'maxRateLimitRetries', 0, true);
    requireNumber(config.initialBackoffMs, 'initialBackoffMs', 0, false);
    requireNumber(config.maxBackoffMs, 'maxBackoffMs', 0, false);
    requireNumber(config.backoffMultiplier, 'backoffMultiplier', 1, false);
    requireNumber(config.jitterFactor, 'jitterFactor', 0, false);
    this.retryConfig = { ...this.retryConfig, ...config };
    return this;
  }

  withCircuitBreakerConfig(config: Partial<CircuitBreakerConfig>): this {
    this.circuitBreakerConfig = { ...this.circuitBreakerConfig, ...config };
    return this;
  }

  /**
   * Sets the request timeout.
   * @param timeoutMs - Timeout in milliseconds
   */
  withRequestTimeout(timeoutMs: number): this {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigurationError('Request timeout must be positive');
    }
    this.requestTimeoutMs = timeoutMs;
    return this;
  }

  withUserAgent(userAgent: string): this {
    this.userAgent = userAgent;
    return this;
  }

  /**
   * Creates a builder from environment variables.
   *
   * Environment variables:
   * - YOUTRACK_BASE_URL: Instance URL
   * - YOUTRACK_TOKEN: Permanent token
   * - YOUTRACK_TIMEOUT_SECONDS: Request timeout in seconds
   * - YOUTRACK_RATE_LIMIT_RPS: Rate limit requests per second
   * - YOUTRACK_MAX_RETRIES: Maximum retry attempts
   *
   * @throws ConfigurationError when a numeric variable is not a valid number
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): YouTrackConfigBuilder {
    const vars = parseEnv(env);
    const builder = new YouTrackConfigBuilder();

    if (vars.YOUTRACK_BASE_URL !== undefined) {
      builder.withBaseUrl(vars.YOUTRACK_BASE_URL);
    }
    if (vars.YOUTRACK_TOKEN !== undefined) {
      builder.withToken(vars.YOUTRACK_TOKEN);
    }
    if (vars.YOUTRACK_TIMEOUT_SECONDS !== undefined) {
      builder.withRequestTimeout(vars.YOUTRACK_TIMEOUT_SECONDS * 1000);
    }
    if (vars.YOUTRACK_RATE_LIMIT_RPS !== undefined) {
      builder.withRateLimitConfig({ requestsPerSecond: vars.YOUTRACK_RATE_LIMIT_RPS });
    }
    if (vars.YOUTRACK_MAX_RETRIES !== undefined) {
      builder.withRetryConfig({ maxRetries: vars.YOUTRACK_MAX_RETRIES });
    }

    return builder;
  }

  /**
   * Creates a builder from a parsed configuration file.
   */
  static fromConfigFile(file: ConfigFile): YouTrackConfigBuilder {
    const section = file.youtrack;
    const builder = new YouTrackConfigBuilder()
      .withBaseUrl(section.base_url)
      .withToken(section.token);

    if (section.timeout_seconds !== undefined) {
      builder.withRequestTimeout(section.timeout_seconds * 1000);
    }
    if (section.max_retries !== undefined) {
      builder.withRetryConfig({ maxRetries: section.max_retries });
    }
    return builder;
  }

  /**
   * Creates a builder from a TOML configuration file.
   * @param path - Defaults to `YOUTRACK_CONFIG` or `~/.youtrack.toml`
   */
  static async fromFile(path?: string): Promise<YouTrackConfigBuilder> {
    const file = await loadConfigFile(path);
    return YouTrackConfigBuilder.fromConfigFile(file);
  }

  /**
   * Builds the YouTrack configuration.
   * @throws ConfigurationError if required fields are missing
   */
  build(): YouTrackConfig {
    if (!this.baseUrl) {
      throw new ConfigurationError('Base URL is required');
    }
    if (!this.auth) {
      throw new NoAuthenticationError();
    }

    return {
      baseUrl: this.baseUrl,
      auth: this.auth,
      rateLimitConfig: { ...this.rateLimitConfig },
      retryConfig: { ...this.retryConfig },
      circuitBreakerConfig: { ...this.circuitBreakerConfig },
      requestTimeoutMs: this.requestTimeoutMs,
      userAgent: this.userAgent,
    };
  }
}
