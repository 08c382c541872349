/**
 * Logging, metrics and tracing for the YouTrack client.
 *
 * The client and services only see the `Logger`, `MetricsCollector` and
 * `Tracer` interfaces; pick console, in-memory or no-op implementations
 * through the `create*Observability` factories.
 */

// ============================================================================
// Logging
// ============================================================================

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context: Record<string, unknown>;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Level filtering and context merging shared by the concrete loggers.
 */
abstract class LevelLogger implements Logger {
  protected constructor(
    private readonly minLevel: LogLevel,
    private readonly baseContext: Record<string, unknown>
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.WARN, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.ERROR, message, context);
  }

  protected abstract write(entry: LogEntry): void;

  private emit(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.minLevel) return;
    this.write({
      level,
      message,
      timestamp: new Date(),
      context: { ...this.baseContext, ...context },
    });
  }
}

/**
 * Where console log lines go.
 */
export type LogOutput = 'stdout' | 'stderr';

/**
 * Keys whose values never reach the console.
 */
const SECRET_KEYS = ['token', 'authorization', 'secret', 'password'];

export interface ConsoleLoggerOptions {
  /** Default: INFO */
  level?: LogLevel;
  context?: Record<string, unknown>;
  /** Default: stdout, with warnings and errors on stderr */
  output?: LogOutput;
}

/**
 * One JSON line per entry; token-like keys are masked at any depth.
 */
export class ConsoleLogger extends LevelLogger {
  private readonly output: LogOutput;

  constructor(options: ConsoleLoggerOptions = {}) {
    super(options.level ?? LogLevel.INFO, options.context ?? {});
    this.output = options.output ?? 'stdout';
  }

  protected write(entry: LogEntry): void {
    const context = mask(entry.context);
    const line = JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      level: LogLevel[entry.level],
      message: entry.message,
      ...(Object.keys(context).length > 0 ? { context } : {}),
    });

    if (this.output === 'stderr' || entry.level === LogLevel.ERROR) {
      console.error(line);
    } else if (entry.level === LogLevel.WARN) {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mask(context: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(context).map(([key, value]) => {
      if (SECRET_KEYS.includes(key.toLowerCase())) return [key, '[REDACTED]'];
      return [key, isRecord(value) ? mask(value) : value];
    })
  );
}

/**
 * Keeps every entry for assertions.
 */
export class InMemoryLogger extends LevelLogger {
  private readonly entries: LogEntry[] = [];

  constructor(context: Record<string, unknown> = {}) {
    super(LogLevel.DEBUG, context);
  }

  protected write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  getMessages(): string[] {
    return this.entries.map((entry) => entry.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

// ============================================================================
// Metrics
// ============================================================================

/**
 * Counter and timing names. Request metrics carry `method` and `kind`
 * labels; see `RequestKind` in the resilience module.
 */
export const MetricNames = {
  REQUESTS_TOTAL: 'youtrack_requests_total',
  REQUEST_LATENCY: 'youtrack_request_latency_ms',
  ERRORS_TOTAL: 'youtrack_errors_total',
  RETRIES_TOTAL: 'youtrack_retries_total',
  RATE_LIMITS_HIT: 'youtrack_rate_limits_hit_total',

  ISSUES_CREATED: 'youtrack_issues_created_total',
  ISSUES_UPDATED: 'youtrack_issues_updated_total',
  COMMENTS_ADDED: 'youtrack_comments_added_total',
  WORK_ITEMS_ADDED: 'youtrack_work_items_added_total',
  ATTACHMENTS_UPLOADED: 'youtrack_attachments_uploaded_total',
  COMMANDS_EXECUTED: 'youtrack_commands_executed_total',

  SEARCH_QUERIES_TOTAL: 'youtrack_search_queries_total',
  SEARCH_RESULTS_TOTAL: 'youtrack_search_results_total',
} as const;

export type MetricLabels = Record<string, string>;

export interface MetricsCollector {
  increment(name: string, value?: number, labels?: MetricLabels): void;
  timing(name: string, durationMs: number, labels?: MetricLabels): void;
}

export class NoopMetricsCollector implements MetricsCollector {
  increment(): void {}
  timing(): void {}
}

/**
 * Series key: `name{a=1,b=2}` with labels sorted, or the bare name.
 */
function seriesKey(name: string, labels: MetricLabels = {}): string {
  const pairs = Object.keys(labels)
    .sort()
    .map((key) => `${key}=${labels[key]}`);
  return pairs.length > 0 ? `${name}{${pairs.join(',')}}` : name;
}

export class InMemoryMetricsCollector implements MetricsCollector {
  private readonly counters = new Map<string, number>();
  private readonly timings = new Map<string, number[]>();

  increment(name: string, value: number = 1, labels?: MetricLabels): void {
    const key = seriesKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  timing(name: string, durationMs: number, labels?: MetricLabels): void {
    const key = seriesKey(name, labels);
    this.timings.set(key, [...(this.timings.get(key) ?? []), durationMs]);
  }

  /**
   * Counter value for exactly this label set.
   */
  getCounter(name: string, labels?: MetricLabels): number {
    return this.counters.get(seriesKey(name, labels)) ?? 0;
  }

  getTimings(name: string, labels?: MetricLabels): number[] {
    return [...(this.timings.get(seriesKey(name, labels)) ?? [])];
  }

  clear(): void {
    this.counters.clear();
    this.timings.clear();
  }
}

// ============================================================================
// Tracing
// ============================================================================

export type SpanAttributeValue = string | number | boolean;

export interface SpanContext {
  setAttribute(key: string, value: SpanAttributeValue): void;
  recordException(error: Error): void;
}

export interface Tracer {
  /**
   * Runs `fn` inside a span named after the YouTrack operation
   * (`youtrack.issue.create`, `youtrack.request`, ...).
   */
  withSpan<T>(
    name: string,
    fn: (span: SpanContext) => Promise<T>,
    attributes?: Record<string, SpanAttributeValue>
  ): Promise<T>;
}

export class NoopTracer implements Tracer {
  async withSpan<T>(_name: string, fn: (span: SpanContext) => Promise<T>): Promise<T> {
    return fn({ setAttribute: () => {}, recordException: () => {} });
  }
}

/**
 * A finished or running span kept by the in-memory tracer.
 */
export interface RecordedSpan {
  name: string;
  attributes: Record<string, SpanAttributeValue>;
  status: 'OK' | 'ERROR';
  exception?: Error;
  startedAt: number;
  durationMs?: number;
}

export class InMemoryTracer implements Tracer {
  private readonly spans: RecordedSpan[] = [];

  async withSpan<T>(
    name: string,
    fn: (span: SpanContext) => Promise<T>,
    attributes: Record<string, SpanAttributeValue> = {}
  ): Promise<T> {
    const span: RecordedSpan = {
      name,
      attributes: { ...attributes },
      status: 'OK',
      startedAt: Date.now(),
    };
    this.spans.push(span);

    try {
      return await fn({
        setAttribute: (key, value) => {
          span.attributes[key] = value;
        },
        recordException: (error) => {
          span.status = 'ERROR';
          span.exception = error;
        },
      });
    } catch (error) {
      span.status = 'ERROR';
      span.exception ??= error instanceof Error ? error : new Error(String(error));
      throw error;
    } finally {
      span.durationMs = Date.now() - span.startedAt;
    }
  }

  getSpans(): RecordedSpan[] {
    return [...this.spans];
  }

  getSpansByName(name: string): RecordedSpan[] {
    return this.spans.filter((span) => span.name === name);
  }

  clear(): void {
    this.spans.length = 0;
  }
}

// ============================================================================
// Observability Container
// ============================================================================

export interface Observability {
  logger: Logger;
  metrics: MetricsCollector;
  tracer: Tracer;
}

export function createNoopObservability(): Observability {
  return {
    logger: new NoopLogger(),
    metrics: new NoopMetricsCollector(),
    tracer: new NoopTracer(),
  };
}

/**
 * In-memory implementations, typed so tests can read them back.
 */
export function createInMemoryObservability(): {
  logger: InMemoryLogger;
  metrics: InMemoryMetricsCollector;
  tracer: InMemoryTracer;
} {
  return {
    logger: new InMemoryLogger(),
    metrics: new InMemoryMetricsCollector(),
    tracer: new InMemoryTracer(),
  };
}

/**
 * Console logging only; the CLI's `--verbose` uses DEBUG on stderr.
 */
export function createConsoleObservability(
  level: LogLevel = LogLevel.INFO,
  output: LogOutput = 'stdout'
): Observability {
  return {
    logger: new ConsoleLogger({ level, output }),
    metrics: new NoopMetricsCollector(),
    tracer: new NoopTracer(),
  };
}
