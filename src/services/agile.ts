/**
 * Agile board service implementation.
 *
 * Boards, sprints and user stories; the add operations are idempotent PUTs
 * that YouTrack may answer with an empty body.
 */

import { YouTrackClient } from '../client/index.js';
import {
  AgileBoard,
  Sprint,
  YouTrackEntity,
  YouTrackIssue,
  assertValid,
  pathSegment,
  validateId,
} from '../types/index.js';

export const BOARD_FIELDS = 'id,name,projects(id,name)';
export const SPRINT_FIELDS = 'id,name,start,finish,isArchived';
export const USER_STORY_FIELDS = 'id,summary,customFields(id,name,value(name))';

// ============================================================================
// Agile Service Interface
// ============================================================================

/**
 * Agile service interface.
 */
export interface AgileService {
  /** List boards, optionally only those attached to a project */
  listBoards(projectId?: string): Promise<AgileBoard[]>;
  listSprints(boardId: string): Promise<Sprint[]>;
  /** List board issues, optionally within one sprint */
  listUserStories(boardId: string, sprintId?: string): Promise<YouTrackIssue[]>;
  addIssueToSprint(
    boardId: string,
    sprintId: string,
    issueId: string
  ): Promise<YouTrackEntity | undefined>;
  addIssueToUserStory(
    boardId: string,
    userStoryId: string,
    issueId: string
  ): Promise<YouTrackEntity | undefined>;
  addUserStoryToSprint(
    boardId: string,
    sprintId: string,
    userStoryId: string
  ): Promise<YouTrackEntity | undefined>;
}

// ============================================================================
// Agile Service Implementation
// ============================================================================

export class AgileServiceImpl implements AgileService {
  private readonly client: YouTrackClient;

  constructor(client: YouTrackClient) {
    this.client = client;
  }

  async listBoards(projectId?: string): Promise<AgileBoard[]> {
    return this.client.tracer.withSpan(
      'youtrack.agile.boards',
      async () => {
        const boards = await this.client.get<AgileBoard[]>('/agiles', { fields: BOARD_FIELDS });

        if (projectId === undefined) {
          return boards;
        }
        return boards.filter((board) =>
          (board.projects ?? []).some((project) => project.id === projectId)
        );
      },
      { operation: 'listBoards' }
    );
  }

  async listSprints(boardId: string): Promise<Sprint[]> {
    return this.client.tracer.withSpan(
      'youtrack.agile.sprints',
      async (span) => {
        span.setAttribute('board', boardId);
        assertValid(validateId('boardId', boardId));

        return this.client.get<Sprint[]>(`/agiles/${pathSegment(boardId)}/sprints`, {
          fields: SPRINT_FIELDS,
        });
      },
      { operation: 'listSprints' }
    );
  }

  async listUserStories(boardId: string, sprintId?: string): Promise<YouTrackIssue[]> {
    return this.client.tracer.withSpan(
      'youtrack.agile.user_stories',
      async (span) => {
        span.setAttribute('board', boardId);
        assertValid(validateId('boardId', boardId));

        return this.client.get<YouTrackIssue[]>(`/agiles/${pathSegment(boardId)}/issues`, {
          fields: USER_STORY_FIELDS,
          sprint: sprintId || undefined,
        });
      },
      { operation: 'listUserStories' }
    );
  }

  async addIssueToSprint(
    boardId: string,
    sprintId: string,
    issueId: string
  ): Promise<YouTrackEntity | undefined> {
    assertValid([
      ...validateId('boardId', boardId),
      ...validateId('sprintId', sprintId),
      ...validateId('issueId', issueId),
    ]);

    return this.placeOnBoard(
      'youtrack.agile.add_to_sprint',
      `/agiles/${pathSegment(boardId)}/sprints/${pathSegment(sprintId)}/issues/${pathSegment(issueId)}`,
      { board: boardId, sprint: sprintId, issue: issueId }
    );
  }

  async addIssueToUserStory(
    boardId: string,
    userStoryId: string,
    issueId: string
  ): Promise<YouTrackEntity | undefined> {
    assertValid([
      ...validateId('boardId', boardId),
      ...validateId('userStoryId', userStoryId),
      ...validateId('issueId', issueId),
    ]);

    return this.placeOnBoard(
      'youtrack.agile.add_subtask',
      `/agiles/${pathSegment(boardId)}/issues/${pathSegment(userStoryId)}/subtasks/${pathSegment(issueId)}`,
      { board: boardId, userStory: userStoryId, issue: issueId }
    );
  }

  async addUserStoryToSprint(
    boardId: string,
    sprintId: string,
    userStoryId: string
  ): Promise<YouTrackEntity | undefined> {
    assertValid([
      ...validateId('boardId', boardId),
      ...validateId('sprintId', sprintId),
      ...validateId('userStoryId', userStoryId),
    ]);

    return this.placeOnBoard(
      'youtrack.agile.add_story_to_sprint',
      `/agiles/${pathSegment(boardId)}/sprints/${pathSegment(sprintId)}/issues/${pathSegment(userStoryId)}`,
      { board: boardId, sprint: sprintId, userStory: userStoryId }
    );
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  private async placeOnBoard(
    spanName: string,
    path: string,
    context: Record<string, string>
  ): Promise<YouTrackEntity | undefined> {
    return this.client.tracer.withSpan(
      spanName,
      async () => {
        const result = await this.client.put<YouTrackEntity>(path);
        this.client.logger.info('Board updated', context);
        return result;
      },
      context
    );
  }
}

/**
 * Creates an agile service instance.
 */
export function createAgileService(client: YouTrackClient): AgileService {
  return new AgileServiceImpl(client);
}
