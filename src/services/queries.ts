/**
 * Query and command service implementation.
 *
 * Runs raw issue queries with a caller-chosen field list and applies
 * YouTrack commands (the same language as the command dialog) to an issue.
 */

import { YouTrackClient } from '../client/index.js';
import { MetricNames } from '../observability/index.js';
import {
  PageOptions,
  YouTrackEntity,
  YouTrackIssue,
  assertValid,
  pageParams,
  validateId,
  validatePage,
} from '../types/index.js';
import { ISSUE_FIELDS } from './issues.js';

/** Database ids such as `2-15`; anything else is sent as a readable id (`DEMO-1`). */
const DATABASE_ID = /^\d+-\d+$/;

// ============================================================================
// Query Service Interface
// ============================================================================

export interface RunQueryOptions extends PageOptions {
  /** Field list requested from the server. Default: id,summary,description */
  fields?: string;
}

/**
 * Query service interface.
 */
export interface QueryService {
  runQuery(query: string, options?: RunQueryOptions): Promise<YouTrackIssue[]>;
  /**
   * Apply a command such as "State Fixed" to an issue, with an optional comment.
   * Accepts a database id (`2-15`) or a readable id (`DEMO-1`).
   */
  runCommand(issueId: string, command: string, comment?: string): Promise<YouTrackEntity | undefined>;
}

// ============================================================================
// Query Service Implementation
// ============================================================================

export class QueryServiceImpl implements QueryService {
  private readonly client: YouTrackClient;

  constructor(client: YouTrackClient) {
    this.client = client;
  }

  async runQuery(query: string, options: RunQueryOptions = {}): Promise<YouTrackIssue[]> {
    return this.client.tracer.withSpan(
      'youtrack.query.run',
      async () => {
        assertValid(validatePage(options));

        const issues = await this.client.get<YouTrackIssue[]>('/issues', {
          fields: options.fields ?? ISSUE_FIELDS,
          query,
          ...pageParams(options),
        });

        this.client.metrics.increment(MetricNames.SEARCH_QUERIES_TOTAL);
        this.client.metrics.increment(MetricNames.SEARCH_RESULTS_TOTAL, issues.length);

        return issues;
      },
      { operation: 'runQuery' }
    );
  }

  async runCommand(
    issueId: string,
    command: string,
    comment?: string
  ): Promise<YouTrackEntity | undefined> {
    return this.client.tracer.withSpan(
      'youtrack.command.run',
      async (span) => {
        span.setAttribute('issue', issueId);

        assertValid([...validateId('issueId', issueId), ...validateId('command', command)]);

        const id = issueId.trim();
        const body: Record<string, unknown> = {
          query: command,
          issues: [DATABASE_ID.test(id) ? { id } : { idReadable: id }],
        };
        if (comment) {
          body.comment = comment;
        }

        const result = await this.client.send<YouTrackEntity>('/commands', body);

        this.client.logger.info('Command applied', { issue: id, command });
        this.client.metrics.increment(MetricNames.COMMANDS_EXECUTED);

        return result;
      },
      { operation: 'runCommand' }
    );
  }
}

/**
 * Creates a query service instance.
 */
export function createQueryService(client: YouTrackClient): QueryService {
  return new QueryServiceImpl(client);
}
