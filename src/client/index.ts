/**
 * YouTrack client core.
 *
 * Provides HTTP execution with authentication, rate limiting, circuit breaking,
 * and retry logic orchestration.
 */

import { YouTrackConfig, YouTrackConfigBuilder, YOUTRACK_API_PATH } from '../config/index.js';
import {
  YouTrackError,
  YouTrackApiErrorResponse,
  parseYouTrackApiError,
  NetworkError,
  TimeoutError,
  UnexpectedResponseError,
} from '../errors/index.js';
import { AuthProvider, createAuthProvider } from '../auth/index.js';
import { PipelineStats, RequestKind, RequestPipeline } from '../resilience/index.js';
import {
  Observability,
  createNoopObservability,
  MetricNames,
  Logger,
  MetricsCollector,
  Tracer,
} from '../observability/index.js';

// ============================================================================
// HTTP Request/Response Types
// ============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Query parameter values; `undefined` entries are dropped.
 */
export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * Request options.
 */
export interface RequestOptions {
  /** HTTP method */
  method: HttpMethod;
  /** Request path (relative to `<baseUrl>/api`) */
  path: string;
  /** Query parameters */
  query?: QueryParams;
  /** JSON request body */
  body?: unknown;
  /** Multipart request body; takes precedence over `body` */
  form?: FormData;
  /** Additional headers */
  headers?: Record<string, string>;
  /** Retry class. Default: `read` for GET, `create` for POST, `write` otherwise */
  kind?: RequestKind;
}

function defaultKind(method: HttpMethod): RequestKind {
  switch (method) {
    case 'GET':
      return 'read';
    case 'POST':
      return 'create';
    case 'PUT':
    case 'DELETE':
      return 'write';
  }
}

/**
 * Response wrapper. `data` is undefined when the server sent no JSON body.
 */
export interface Response<T> {
  data: T | undefined;
  status: number;
  headers: Record<string, string>;
}

// ============================================================================
// YouTrack Client
// ============================================================================

/**
 * YouTrack REST API client with resilience and observability.
 */
export class YouTrackClient {
  private readonly config: YouTrackConfig;
  private readonly authProvider: AuthProvider;
  private readonly pipeline: RequestPipeline;
  private readonly observability: Observability;

  constructor(config: YouTrackConfig, observability?: Observability) {
    this.config = config;
    this.observability = observability ?? createNoopObservability();
    this.authProvider = createAuthProvider(config.auth, this.observability.logger);
    this.pipeline = new RequestPipeline(config, {
      onRetry: (attempt, error, delayMs, kind) => {
        this.observability.metrics.increment(MetricNames.RETRIES_TOTAL, 1, { kind });
        this.observability.logger.warn('Retrying YouTrack request', {
          attempt,
          kind,
          error: error.message,
          delayMs,
        });
      },
      onRetriesExhausted: (error, attempts, kind) => {
        this.observability.logger.error('YouTrack request failed after retries', {
          attempts,
          kind,
          error: error.message,
        });
      },
    });
  }

  get logger(): Logger {
    return this.observability.logger;
  }

  get metrics(): MetricsCollector {
    return this.observability.metrics;
  }

  get tracer(): Tracer {
    return this.observability.tracer;
  }

  get configuration(): YouTrackConfig {
    return this.config;
  }

  /**
   * Gets the base URL for API requests.
   */
  get baseUrl(): string {
    return `${this.config.baseUrl}${YOUTRACK_API_PATH}`;
  }

  /**
   * Executes an HTTP request.
   */
  async request<T>(options: RequestOptions): Promise<Response<T>> {
    const startTime = Date.now();
    const kind = options.kind ?? defaultKind(options.method);
    const labels = { method: options.method, kind };

    return this.observability.tracer.withSpan(
      'youtrack.request',
      async (span) => {
        let attempts = 0;
        try {
          const response = await this.pipeline.run(kind, (attempt) => {
            attempts = attempt;
            return this.executeRequest<T>(options);
          });

          this.observability.metrics.increment(MetricNames.REQUESTS_TOTAL, 1, {
            ...labels,
            status: 'success',
          });
          this.observability.metrics.timing(
            MetricNames.REQUEST_LATENCY,
            Date.now() - startTime,
            labels
          );
          span.setAttribute('http.status_code', response.status);

          return response;
        } catch (error) {
          this.observability.metrics.increment(MetricNames.ERRORS_TOTAL, 1, {
            ...labels,
            error_type: error instanceof YouTrackError ? error.code : 'unknown',
          });
          if (error instanceof YouTrackError && error.statusCode === 429) {
            this.observability.metrics.increment(MetricNames.RATE_LIMITS_HIT);
          }

          span.recordException(error instanceof Error ? error : new Error(String(error)));
          throw error;
        } finally {
          span.setAttribute('youtrack.attempts', attempts);
        }
      },
      {
        'http.method': options.method,
        'http.path': options.path,
        'youtrack.request_kind': kind,
      }
    );
  }

  /**
   * Executes the actual HTTP request.
   */
  private async executeRequest<T>(options: RequestOptions): Promise<Response<T>> {
    const url = this.buildUrl(options.path, options.query);
    const authHeaders = await this.authProvider.getAuthHeaders();

    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': this.config.userAgent,
      ...authHeaders,
      ...options.headers,
    };

    const fetchOptions: RequestInit = {
      method: options.method,
      headers,
    };

    if (options.form !== undefined) {
      // fetch sets the multipart boundary itself
      fetchOptions.body = options.form;
    } else if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      fetchOptions.body = JSON.stringify(options.body);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(
      () => controller.abort(),
      this.config.requestTimeoutMs
    );
    fetchOptions.signal = controller.signal;

    this.observability.logger.debug('Sending request', {
      method: options.method,
      url,
    });

    try {
      const response = await fetch(url, fetchOptions);

      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        responseHeaders[key.toLowerCase()] = value;
      });

      const text = await response.text();
      clearTimeout(timeoutId);

      if (!response.ok) {
        throw parseYouTrackApiError(
          response.status,
          parseErrorBody(text),
          text,
          responseHeaders['retry-after']
        );
      }

      let data: T | undefined;
      if (text.trim().length > 0) {
        try {
          data = JSON.parse(text) as T;
        } catch {
          throw new UnexpectedResponseError(
            `expected JSON from ${options.method} ${options.path}`,
            response.status
          );
        }
      }

      return {
        data,
        status: response.status,
        headers: responseHeaders,
      };
    } catch (error) {
      clearTimeout(timeoutId);

      if (error instanceof YouTrackError) {
        throw error;
      }

      if (error instanceof Error && error.name === 'AbortError') {
        throw new TimeoutError(this.config.requestTimeoutMs);
      }

      const cause = error instanceof Error ? error : new Error(String(error));
      throw new NetworkError(cause.message, cause);
    }
  }

  /**
   * Builds the full URL with query parameters.
   */
  buildUrl(path: string, query?: QueryParams): string {
    const url = new URL(`${this.baseUrl}${path}`);

    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }

    return url.toString();
  }

  // ============================================================================
  // Convenience Methods
  // ============================================================================

  /**
   * GET that must return JSON.
   */
  async get<T>(path: string, query?: QueryParams): Promise<T> {
    const response = await this.request<T>({ method: 'GET', path, query });
    return requireData(response, 'GET', path);
  }

  /**
   * POST that creates something and must return JSON. Not repeated on
   * server errors, only on 429.
   */
  async post<T>(path: string, body?: unknown, query?: QueryParams): Promise<T> {
    const response = await this.request<T>({ method: 'POST', path, body, query });
    return requireData(response, 'POST', path);
  }

  /**
   * POST that sets fields of an existing entity; repeating it is harmless.
   */
  async update<T>(path: string, body: unknown, query?: QueryParams): Promise<T> {
    const response = await this.request<T>({ method: 'POST', path, body, query, kind: 'write' });
    return requireData(response, 'POST', path);
  }

  /**
   * Creating POST whose response body may be empty (commands, reports).
   */
  async send<T>(path: string, body?: unknown, query?: QueryParams): Promise<T | undefined> {
    const response = await this.request<T>({ method: 'POST', path, body, query });
    return response.data;
  }

  /**
   * PUT; YouTrack often answers these with an empty body.
   */
  async put<T>(path: string, body?: unknown, query?: QueryParams): Promise<T | undefined> {
    const response = await this.request<T>({ method: 'PUT', path, body, query });
    return response.data;
  }

  async delete<T = void>(path: string): Promise<T | undefined> {
    const response = await this.request<T>({ method: 'DELETE', path });
    return response.data;
  }

  /**
   * Uploads multipart form data. A creating request, like `post`.
   */
  async postMultipart<T>(path: string, form: FormData, query?: QueryParams): Promise<T> {
    const response = await this.request<T>({ method: 'POST', path, form, query });
    return requireData(response, 'POST', path);
  }

  getResilienceStats(): PipelineStats {
    return this.pipeline.stats();
  }

  /**
   * Clears rate-limit debt and closes the circuit.
   */
  resetResilience(): void {
    this.pipeline.reset();
  }
}

function isErrorBody(value: unknown): value is YouTrackApiErrorResponse {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseErrorBody(text: string): YouTrackApiErrorResponse | null {
  if (text.trim().length === 0) return null;
  try {
    const parsed: unknown = JSON.parse(text);
    if (isErrorBody(parsed)) {
      return parsed;
    }
  } catch {
    // Not JSON; the raw text becomes the error detail
  }
  return null;
}

function requireData<T>(response: Response<T>, method: HttpMethod, path: string): T {
  if (response.data === undefined) {
    throw new UnexpectedResponseError(`empty response from ${method} ${path}`, response.status);
  }
  return response.data;
}

// ============================================================================
// Client Factory
// ============================================================================

export function createYouTrackClient(config: YouTrackConfig, observability?: Observability): YouTrackClient {
  return new YouTrackClient(config, observability);
}

/**
 * Creates a YouTrack client from environment variables.
 */
export function createYouTrackClientFromEnv(observability?: Observability): YouTrackClient {
  const config = YouTrackConfigBuilder.fromEnv().build();
  return new YouTrackClient(config, observability);
}
