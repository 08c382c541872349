/**
 * YouTrack Integration Module
 *
 * Provides YouTrack REST API integration including:
 * - Issue CRUD, search, state transitions and attachments
 * - Comments and time tracking
 * - Agile boards, sprints and user stories
 * - Issue links, raw queries and commands
 * - Project, user, workflow and report administration
 *
 * @module youtrack-integration
 * @version 1.0.0
 */

// ============================================================================
// Configuration
// ============================================================================

export type {
  YouTrackConfig,
  AuthMethod,
  RateLimitConfig,
  RetryConfig,
  CircuitBreakerConfig,
  ConfigFile,
  EnvConfig,
} from './config/index.js';
export {
  YouTrackConfigBuilder,
  SecretString,
  ConfigFileSchema,
  EnvSchema,
  parseConfigFile,
  loadConfigFile,
  defaultConfigPath,
  DEFAULT_RATE_LIMIT_CONFIG,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  YOUTRACK_API_PATH,
  CONFIG_FILE_NAME,
} from './config/index.js';

// ============================================================================
// Types
// ============================================================================

export type {
  EntityId,
  YouTrackEntity,
  YouTrackUser,
  YouTrackProject,
  IssueCustomField,
  YouTrackIssue,
  IssueComment,
  IssueAttachment,
  ActivityItem,
  ActivityCategory,
  DurationValue,
  WorkItemType,
  WorkItem,
  ProjectCustomField,
  Workflow,
  DeadlineCalendar,
  AgileBoard,
  Sprint,
  IssueLinkType,
  LinkDirection,
  IssueLink,
  CustomFieldValues,
  CreateIssueOptions,
  UpdateIssueInput,
  PageOptions,
} from './types/index.js';
export {
  DEFAULT_PAGE_LIMIT,
  STORY_POINTS_FIELD,
  toCustomFieldList,
  withStoryPoints,
  durationMinutes,
} from './types/index.js';

// ============================================================================
// Errors
// ============================================================================

export type { YouTrackApiErrorResponse } from './errors/index.js';
export {
  YouTrackErrorCode,
  YouTrackError,
  ConfigurationError,
  NoAuthenticationError,
  AuthenticationError,
  PermissionDeniedError,
  NotFoundError,
  BadRequestError,
  ConflictError,
  ValidationError,
  UnexpectedResponseError,
  RateLimitedError,
  RateLimitTimeoutError,
  NetworkError,
  TimeoutError,
  ServerError,
  ServiceUnavailableError,
  CircuitBreakerOpenError,
  parseYouTrackApiError,
  isYouTrackError,
  isRetryableError,
  getRetryDelayMs,
} from './errors/index.js';

// ============================================================================
// Authentication
// ============================================================================

export type { AuthProvider, Headers } from './auth/index.js';
export {
  PermanentTokenAuthProvider,
  PERMANENT_TOKEN_PREFIX,
  createAuthProvider,
} from './auth/index.js';

// ============================================================================
// Client
// ============================================================================

export type { HttpMethod, QueryParams, RequestOptions, Response } from './client/index.js';
export {
  YouTrackClient,
  createYouTrackClient,
  createYouTrackClientFromEnv,
} from './client/index.js';

// ============================================================================
// Resilience
// ============================================================================

export type {
  RequestKind,
  RateLimiterStats,
  CircuitState,
  CircuitBreakerStats,
  RetryDecision,
  RetryListener,
  PipelineStats,
} from './resilience/index.js';
export {
  RateLimiter,
  CircuitBreaker,
  RetryPolicy,
  RequestPipeline,
} from './resilience/index.js';

// ============================================================================
// Observability
// ============================================================================

export type {
  Logger,
  LogEntry,
  LogOutput,
  ConsoleLoggerOptions,
  MetricLabels,
  MetricsCollector,
  SpanAttributeValue,
  SpanContext,
  RecordedSpan,
  Tracer,
  Observability,
} from './observability/index.js';
export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  MetricNames,
  NoopMetricsCollector,
  InMemoryMetricsCollector,
  NoopTracer,
  InMemoryTracer,
  createNoopObservability,
  createInMemoryObservability,
  createConsoleObservability,
} from './observability/index.js';

// ============================================================================
// Services
// ============================================================================

export type {
  IssueService,
  ListIssuesOptions,
  SearchIssuesOptions,
  SearchAllOptions,
  IssueHistoryOptions,
  CommentService,
  TimeTrackingService,
  AdminService,
  ListUsersOptions,
  AgileService,
  LinkService,
  QueryService,
  RunQueryOptions,
} from './services/index.js';
export {
  IssueServiceImpl,
  createIssueService,
  CommentServiceImpl,
  createCommentService,
  TimeTrackingServiceImpl,
  createTimeTrackingService,
  AdminServiceImpl,
  createAdminService,
  AgileServiceImpl,
  createAgileService,
  LinkServiceImpl,
  createLinkService,
  QueryServiceImpl,
  createQueryService,
} from './services/index.js';

// ============================================================================
// Convenience Factory
// ============================================================================

import { YouTrackClient, createYouTrackClient } from './client/index.js';
import { YouTrackConfig, YouTrackConfigBuilder } from './config/index.js';
import { Observability, createNoopObservability } from './observability/index.js';
import {
  IssueService,
  createIssueService,
  CommentService,
  createCommentService,
  TimeTrackingService,
  createTimeTrackingService,
  AdminService,
  createAdminService,
  AgileService,
  createAgileService,
  LinkService,
  createLinkService,
  QueryService,
  createQueryService,
} from './services/index.js';

/**
 * Complete YouTrack integration client with all services.
 */
export interface YouTrackIntegration {
  /** Core API client */
  client: YouTrackClient;
  /** Issue operations */
  issues: IssueService;
  /** Comment operations */
  comments: CommentService;
  /** Work items and spent time */
  timeTracking: TimeTrackingService;
  /** Projects, users, workflows, reports */
  admin: AdminService;
  /** Boards and sprints */
  agile: AgileService;
  /** Issue links */
  links: LinkService;
  /** Raw queries and commands */
  queries: QueryService;
}

export interface YouTrackIntegrationOptions {
  observability?: Observability;
}

/**
 * Creates a complete YouTrack integration with all services.
 */
export function createYouTrackIntegration(
  config: YouTrackConfig,
  options?: YouTrackIntegrationOptions
): YouTrackIntegration {
  const observability = options?.observability ?? createNoopObservability();
  const client = createYouTrackClient(config, observability);

  return {
    client,
    issues: createIssueService(client),
    comments: createCommentService(client),
    timeTracking: createTimeTrackingService(client),
    admin: createAdminService(client),
    agile: createAgileService(client),
    links: createLinkService(client),
    queries: createQueryService(client),
  };
}

/**
 * Creates a YouTrack integration for a server URL and permanent token.
 */
export function createYouTrackIntegrationFromToken(
  baseUrl: string,
  token: string,
  options?: YouTrackIntegrationOptions
): YouTrackIntegration {
  const config = new YouTrackConfigBuilder().withBaseUrl(baseUrl).withToken(token).build();
  return createYouTrackIntegration(config, options);
}

/**
 * Creates a YouTrack integration from a TOML configuration file
 * (default `~/.youtrack.toml`).
 */
export async function createYouTrackIntegrationFromConfig(
  path?: string,
  options?: YouTrackIntegrationOptions
): Promise<YouTrackIntegration> {
  const builder = await YouTrackConfigBuilder.fromFile(path);
  return createYouTrackIntegration(builder.build(), options);
}

/**
 * Creates a YouTrack integration from environment variables.
 */
export function createYouTrackIntegrationFromEnv(
  options?: YouTrackIntegrationOptions
): YouTrackIntegration {
  const config = YouTrackConfigBuilder.fromEnv().build();
  return createYouTrackIntegration(config, options);
}
