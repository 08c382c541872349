/**
 * Comment service implementation.
 */

import { YouTrackClient } from '../client/index.js';
import { MetricNames } from '../observability/index.js';
import {
  IssueComment,
  PageOptions,
  assertValid,
  pageParams,
  pathSegment,
  validateId,
  validatePage,
} from '../types/index.js';

export const COMMENT_FIELDS = 'id,text,author';
export const COMMENT_LIST_FIELDS = 'id,text,author(login,name),created';

// ============================================================================
// Comment Service Interface
// ============================================================================

/**
 * Comment service interface.
 */
export interface CommentService {
  /** Add a comment to an issue */
  add(issueId: string, text: string): Promise<IssueComment>;
  /** List comments of an issue, oldest first */
  list(issueId: string, options?: PageOptions): Promise<IssueComment[]>;
}

// ============================================================================
// Comment Service Implementation
// ============================================================================

export class CommentServiceImpl implements CommentService {
  private readonly client: YouTrackClient;

  constructor(client: YouTrackClient) {
    this.client = client;
  }

  async add(issueId: string, text: string): Promise<IssueComment> {
    return this.client.tracer.withSpan(
      'youtrack.comment.add',
      async (span) => {
        span.setAttribute('issue', issueId);

        assertValid([
          ...validateId('issueId', issueId),
          ...(text.trim().length === 0 ? ['comment text must not be empty'] : []),
        ]);

        const comment = await this.client.post<IssueComment>(
          `/issues/${pathSegment(issueId)}/comments`,
          { text },
          { fields: COMMENT_FIELDS }
        );

        this.client.logger.info('Comment added', { issue: issueId, commentId: comment.id });
        this.client.metrics.increment(MetricNames.COMMENTS_ADDED);

        return comment;
      },
      { operation: 'addComment' }
    );
  }

  async list(issueId: string, options: PageOptions = {}): Promise<IssueComment[]> {
    return this.client.tracer.withSpan(
      'youtrack.comment.list',
      async (span) => {
        span.setAttribute('issue', issueId);
        assertValid([...validateId('issueId', issueId), ...validatePage(options)]);

        return this.client.get<IssueComment[]>(`/issues/${pathSegment(issueId)}/comments`, {
          fields: COMMENT_LIST_FIELDS,
          ...pageParams(options),
        });
      },
      { operation: 'listComments' }
    );
  }
}

/**
 * Creates a comment service instance.
 */
export function createCommentService(client: YouTrackClient): CommentService {
  return new CommentServiceImpl(client);
}
