/**
 * Issue link service implementation.
 */

import { YouTrackClient } from '../client/index.js';
import {
  IssueLink,
  IssueLinkType,
  YouTrackEntity,
  assertValid,
  pathSegment,
  validateId,
} from '../types/index.js';

export const LINK_FIELDS = 'id,direction,linkType(id,name,directed),issues(id,summary)';
export const LINK_TYPE_FIELDS = 'id,name,directed';

// ============================================================================
// Link Service Interface
// ============================================================================

/**
 * Link service interface.
 */
export interface LinkService {
  getIssueLinks(issueId: string): Promise<IssueLink[]>;
  /** Every link type defined on the server */
  listLinkTypes(): Promise<IssueLinkType[]>;
  listLinkTypesForIssue(issueId: string): Promise<IssueLinkType[]>;
  listLinkTypesForProject(projectId: string): Promise<IssueLinkType[]>;
  /** Link `sourceIssueId` to `targetIssueId` with the given link type */
  addLink(
    sourceIssueId: string,
    targetIssueId: string,
    linkTypeId: string
  ): Promise<YouTrackEntity | undefined>;
}

// ============================================================================
// Link Service Implementation
// ============================================================================

export class LinkServiceImpl implements LinkService {
  private readonly client: YouTrackClient;

  constructor(client: YouTrackClient) {
    this.client = client;
  }

  async getIssueLinks(issueId: string): Promise<IssueLink[]> {
    return this.client.tracer.withSpan(
      'youtrack.link.list',
      async (span) => {
        span.setAttribute('issue', issueId);
        assertValid(validateId('issueId', issueId));

        return this.client.get<IssueLink[]>(`/issues/${pathSegment(issueId)}/links`, {
          fields: LINK_FIELDS,
        });
      },
      { operation: 'getIssueLinks' }
    );
  }

  async listLinkTypes(): Promise<IssueLinkType[]> {
    return this.client.tracer.withSpan(
      'youtrack.link.types',
      async () => this.client.get<IssueLinkType[]>('/issueLinkTypes', { fields: LINK_TYPE_FIELDS }),
      { operation: 'listLinkTypes' }
    );
  }

  async listLinkTypesForIssue(issueId: string): Promise<IssueLinkType[]> {
    return this.client.tracer.withSpan(
      'youtrack.link.types_for_issue',
      async (span) => {
        span.setAttribute('issue', issueId);
        assertValid(validateId('issueId', issueId));

        return this.client.get<IssueLinkType[]>(`/issues/${pathSegment(issueId)}/links/types`, {
          fields: LINK_TYPE_FIELDS,
        });
      },
      { operation: 'listLinkTypesForIssue' }
    );
  }

  async listLinkTypesForProject(projectId: string): Promise<IssueLinkType[]> {
    return this.client.tracer.withSpan(
      'youtrack.link.types_for_project',
      async (span) => {
        span.setAttribute('project', projectId);
        assertValid(validateId('projectId', projectId));

        return this.client.get<IssueLinkType[]>(
          `/admin/projects/${pathSegment(projectId)}/issueLinkTypes`,
          { fields: LINK_TYPE_FIELDS }
        );
      },
      { operation: 'listLinkTypesForProject' }
    );
  }

  async addLink(
    sourceIssueId: string,
    targetIssueId: string,
    linkTypeId: string
  ): Promise<YouTrackEntity | undefined> {
    return this.client.tracer.withSpan(
      'youtrack.link.add',
      async (span) => {
        span.setAttribute('source', sourceIssueId);
        span.setAttribute('target', targetIssueId);

        assertValid([
          ...validateId('sourceIssueId', sourceIssueId),
          ...validateId('targetIssueId', targetIssueId),
          ...validateId('linkTypeId', linkTypeId),
        ]);

        const result = await this.client.put<YouTrackEntity>(
          `/issues/${pathSegment(sourceIssueId)}/links/${pathSegment(linkTypeId)}/${pathSegment(targetIssueId)}`
        );

        this.client.logger.info('Issues linked', {
          source: sourceIssueId,
          target: targetIssueId,
          linkType: linkTypeId,
        });

        return result;
      },
      { operation: 'addLink' }
    );
  }
}

/**
 * Creates a link service instance.
 */
export function createLinkService(client: YouTrackClient): LinkService {
  return new LinkServiceImpl(client);
}
