/**
 * Issue service implementation.
 *
 * Creates, reads, updates and searches issues, moves them between states,
 * uploads attachments and reads their activity history.
 */

import { readFile } from 'fs/promises';
import { basename } from 'path';
import { YouTrackClient } from '../client/index.js';
import { ValidationError } from '../errors/index.js';
import { MetricNames } from '../observability/index.js';
import {
  ActivityCategory,
  ActivityItem,
  CreateIssueOptions,
  IssueAttachment,
  IssueCustomField,
  PageOptions,
  UpdateIssueInput,
  YouTrackIssue,
  assertValid,
  pageParams,
  pathSegment,
  toCustomFieldList,
  validateId,
  validatePage,
  withStoryPoints,
} from '../types/index.js';

export const ISSUE_FIELDS = 'id,summary,description';
export const ISSUE_DETAIL_FIELDS = 'id,summary,description,project(id,name)';
export const ACTIVITY_FIELDS = 'id,timestamp,author,added,removed';
export const ATTACHMENT_FIELDS = 'id,name';

// ============================================================================
// Issue Service Interface
// ============================================================================

export interface ListIssuesOptions extends PageOptions {
  /** Extra query text appended after the project filter */
  query?: string;
}

export interface SearchIssuesOptions extends PageOptions {
  /** Field list requested from the server. Default: id,summary,description */
  fields?: string;
}

export interface SearchAllOptions {
  /** Issues fetched per request. Default: 100 */
  pageSize?: number;
  fields?: string;
}

export interface IssueHistoryOptions {
  /** Restrict to these activity categories */
  categories?: ActivityCategory[];
}

/**
 * Issue service interface.
 */
export interface IssueService {
  /** Create an issue in a project */
  create(projectId: string, summary: string, options?: CreateIssueOptions): Promise<YouTrackIssue>;
  /** Get a single issue with its project */
  get(issueId: string): Promise<YouTrackIssue>;
  /** Update summary, description or custom fields */
  update(issueId: string, input: UpdateIssueInput): Promise<YouTrackIssue>;
  /** List issues of a project */
  list(projectId: string, options?: ListIssuesOptions): Promise<YouTrackIssue[]>;
  /** Search issues with a YouTrack query */
  search(query: string, options?: SearchIssuesOptions): Promise<YouTrackIssue[]>;
  /** Fetch every page of a search */
  searchAll(query: string, options?: SearchAllOptions): Promise<YouTrackIssue[]>;
  /** Set a state-like custom field to a named value */
  transition(issueId: string, fieldName: string, newState: string): Promise<IssueCustomField>;
  /** Upload a local file as an attachment */
  attachFile(issueId: string, filePath: string): Promise<IssueAttachment[]>;
  /** Read the activity history */
  getHistory(issueId: string, options?: IssueHistoryOptions): Promise<ActivityItem[]>;
}

// ============================================================================
// Issue Service Implementation
// ============================================================================

export class IssueServiceImpl implements IssueService {
  private readonly client: YouTrackClient;

  constructor(client: YouTrackClient) {
    this.client = client;
  }

  async create(
    projectId: string,
    summary: string,
    options: CreateIssueOptions = {}
  ): Promise<YouTrackIssue> {
    return this.client.tracer.withSpan(
      'youtrack.issue.create',
      async (span) => {
        span.setAttribute('project', projectId);

        assertValid([
          ...validateId('projectId', projectId),
          ...(summary.trim().length === 0 ? ['summary must not be empty'] : []),
        ]);
        const project = projectId.trim();

        const body: Record<string, unknown> = {
          project: { id: project },
          summary,
          description: options.description ?? '',
        };

        const customFields = withStoryPoints(options.customFields, options.storyPoints);
        if (Object.keys(customFields).length > 0) {
          body.customFields = toCustomFieldList(customFields);
        }

        const issue = await this.client.post<YouTrackIssue>('/issues', body, {
          fields: ISSUE_FIELDS,
        });

        this.client.logger.info('Issue created', { id: issue.id, project });
        this.client.metrics.increment(MetricNames.ISSUES_CREATED, 1, { project });

        return issue;
      },
      { operation: 'createIssue' }
    );
  }

  async get(issueId: string): Promise<YouTrackIssue> {
    return this.client.tracer.withSpan(
      'youtrack.issue.get',
      async (span) => {
        span.setAttribute('issue', issueId);
        assertValid(validateId('issueId', issueId));

        return this.client.get<YouTrackIssue>(`/issues/${pathSegment(issueId)}`, {
          fields: ISSUE_DETAIL_FIELDS,
        });
      },
      { operation: 'getIssue' }
    );
  }

  async update(issueId: string, input: UpdateIssueInput): Promise<YouTrackIssue> {
    return this.client.tracer.withSpan(
      'youtrack.issue.update',
      async (span) => {
        span.setAttribute('issue', issueId);

        const errors = validateId('issueId', issueId);
        if (input.summary !== undefined && input.summary.trim().length === 0) {
          errors.push('summary must not be empty');
        }

        const body: Record<string, unknown> = {};
        if (input.summary !== undefined) {
          body.summary = input.summary;
        }
        if (input.description !== undefined) {
          body.description = input.description;
        }
        const customFields = withStoryPoints(input.customFields, input.storyPoints);
        if (Object.keys(customFields).length > 0) {
          body.customFields = toCustomFieldList(customFields);
        }

        if (Object.keys(body).length === 0) {
          errors.push('nothing to update');
        }
        assertValid(errors);

        const issue = await this.client.update<YouTrackIssue>(
          `/issues/${pathSegment(issueId)}`,
          body,
          { fields: ISSUE_FIELDS }
        );

        this.client.logger.info('Issue updated', {
          id: issueId,
          fields: Object.keys(body),
        });
        this.client.metrics.increment(MetricNames.ISSUES_UPDATED);

        return issue;
      },
      { operation: 'updateIssue' }
    );
  }

  async list(projectId: string, options: ListIssuesOptions = {}): Promise<YouTrackIssue[]> {
    assertValid([...validateId('projectId', projectId), ...validatePage(options)]);

    const query = `project:${projectId.trim()} ${options.query ?? ''}`.trim();
    return this.runSearch('youtrack.issue.list', query, ISSUE_FIELDS, options);
  }

  async search(query: string, options: SearchIssuesOptions = {}): Promise<YouTrackIssue[]> {
    assertValid(validatePage(options));
    return this.runSearch('youtrack.issue.search', query, options.fields ?? ISSUE_FIELDS, options);
  }

  async searchAll(query: string, options: SearchAllOptions = {}): Promise<YouTrackIssue[]> {
    const pageSize = options.pageSize ?? 100;
    if (!Number.isInteger(pageSize) || pageSize <= 0) {
      throw new ValidationError(['pageSize must be a positive integer']);
    }

    const issues: YouTrackIssue[] = [];
    let skip = 0;

    for (;;) {
      const page = await this.search(query, { fields: options.fields, limit: pageSize, skip });
      issues.push(...page);

      if (page.length < pageSize) {
        break;
      }
      skip += pageSize;
    }

    this.client.logger.debug('Search exhausted', { query, total: issues.length });
    return issues;
  }

  async transition(
    issueId: string,
    fieldName: string,
    newState: string
  ): Promise<IssueCustomField> {
    return this.client.tracer.withSpan(
      'youtrack.issue.transition',
      async (span) => {
        span.setAttribute('issue', issueId);
        span.setAttribute('field', fieldName);

        assertValid([
          ...validateId('issueId', issueId),
          ...validateId('fieldName', fieldName),
          ...validateId('newState', newState),
        ]);

        const name = fieldName.trim();
        const state = newState.trim();

        const field = await this.client.update<IssueCustomField>(
          `/issues/${pathSegment(issueId)}/fields/${pathSegment(name)}`,
          { name, value: { name: state } }
        );

        this.client.logger.info('Issue transitioned', { id: issueId, field: name, state });
        this.client.metrics.increment(MetricNames.ISSUES_UPDATED, 1, { kind: 'transition' });

        return field;
      },
      { operation: 'transitionIssue' }
    );
  }

  async attachFile(issueId: string, filePath: string): Promise<IssueAttachment[]> {
    return this.client.tracer.withSpan(
      'youtrack.issue.attach',
      async (span) => {
        span.setAttribute('issue', issueId);

        assertValid([...validateId('issueId', issueId), ...validateId('filePath', filePath)]);

        let content: Buffer;
        try {
          content = await readFile(filePath);
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          throw new ValidationError([`cannot read ${filePath}: ${reason}`]);
        }

        const form = new FormData();
        form.append('file', new Blob([new Uint8Array(content)]), basename(filePath));

        const attachments = await this.client.postMultipart<IssueAttachment[]>(
          `/issues/${pathSegment(issueId)}/attachments`,
          form,
          { fields: ATTACHMENT_FIELDS }
        );

        this.client.logger.info('File attached', {
          id: issueId,
          file: basename(filePath),
          bytes: content.length,
        });
        this.client.metrics.increment(MetricNames.ATTACHMENTS_UPLOADED);

        return attachments;
      },
      { operation: 'attachFile' }
    );
  }

  async getHistory(issueId: string, options: IssueHistoryOptions = {}): Promise<ActivityItem[]> {
    return this.client.tracer.withSpan(
      'youtrack.issue.history',
      async (span) => {
        span.setAttribute('issue', issueId);
        assertValid(validateId('issueId', issueId));

        return this.client.get<ActivityItem[]>(`/issues/${pathSegment(issueId)}/activities`, {
          fields: ACTIVITY_FIELDS,
          categories: options.categories?.length ? options.categories.join(',') : undefined,
        });
      },
      { operation: 'getIssueHistory' }
    );
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  private async runSearch(
    spanName: string,
    query: string,
    fields: string,
    page: PageOptions
  ): Promise<YouTrackIssue[]> {
    return this.client.tracer.withSpan(
      spanName,
      async () => {
        const issues = await this.client.get<YouTrackIssue[]>('/issues', {
          fields,
          query,
          ...pageParams(page),
        });

        this.client.metrics.increment(MetricNames.SEARCH_QUERIES_TOTAL);
        this.client.metrics.increment(MetricNames.SEARCH_RESULTS_TOTAL, issues.length);

        return issues;
      },
      { operation: 'searchIssues' }
    );
  }
}

/**
 * Creates an issue service instance.
 */
export function createIssueService(client: YouTrackClient): IssueService {
  return new IssueServiceImpl(client);
}
