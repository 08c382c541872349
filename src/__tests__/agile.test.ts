/**
 * Tests for the agile board service.
 */

import { describe, it, expect } from 'vitest';
import { createTestIntegration, requestUrl } from '../__mocks__/integration.js';

const boards = [
  { id: '108-1', name: 'Demo board', projects: [{ id: '0-0', name: 'Demo' }] },
  { id: '108-2', name: 'Ops board', projects: [{ id: '0-1', name: 'Ops' }] },
  { id: '108-3', name: 'Unscoped' },
];

describe('AgileService', () => {
  it('lists every board', async () => {
    const { youtrack, mockFetch } = createTestIntegration();
    mockFetch.enqueueJsonResponse(200, boards);

    const result = await youtrack.agile.listBoards();

    expect(result).toHaveLength(3);
    const url = requestUrl(mockFetch);
    expect(url.pathname).toBe('/api/agiles');
    expect(url.searchParams.get('fields')).toBe('id,name,projects(id,name)');
  });

  it('keeps only boards attached to the project', async () => {
    const { youtrack, mockFetch } = createTestIntegration();
    mockFetch.enqueueJsonResponse(200, boards);

    const result = await youtrack.agile.listBoards('0-1');

    expect(result.map((board) => board.id)).toEqual(['108-2']);
  });

  it('lists sprints of a board', async () => {
    const { youtrack, mockFetch } = createTestIntegration();
    mockFetch.enqueueJsonResponse(200, [{ id: '109-1', name: 'Sprint 1' }]);

    await youtrack.agile.listSprints('108-1');

    const url = requestUrl(mockFetch);
    expect(url.pathname).toBe('/api/agiles/108-1/sprints');
    expect(url.searchParams.get('fields')).toBe('id,name,start,finish,isArchived');
  });

  it('lists user stories, optionally within a sprint', async () => {
    const { youtrack, mockFetch } = createTestIntegration();
    mockFetch.enqueueJsonResponse(200, []).enqueueJsonResponse(200, []);

    await youtrack.agile.listUserStories('108-1');
    await youtrack.agile.listUserStories('108-1', '109-1');

    expect(requestUrl(mockFetch, 0).pathname).toBe('/api/agiles/108-1/issues');
    expect(requestUrl(mockFetch, 0).searchParams.has('sprint')).toBe(false);
    expect(requestUrl(mockFetch, 1).searchParams.get('sprint')).toBe('109-1');
  });

  it('adds an issue to a sprint', async () => {
    const { youtrack, mockFetch, observability } = createTestIntegration();
    mockFetch.enqueueEmptyResponse(200);

    await expect(
      youtrack.agile.addIssueToSprint('108-1', '109-1', 'DEMO-1')
    ).resolves.toBeUndefined();

    expect(mockFetch.getLastRequest()?.method).toBe('PUT');
    expect(requestUrl(mockFetch).pathname).toBe('/api/agiles/108-1/sprints/109-1/issues/DEMO-1');
    expect(observability.logger.getEntries().map((entry) => entry.message)).toContain(
      'Board updated'
    );
  });

  it('adds a subtask to a user story', async () => {
    const { youtrack, mockFetch } = createTestIntegration();
    mockFetch.enqueueJsonResponse(200, { id: '2-9' });

    const result = await youtrack.agile.addIssueToUserStory('108-1', 'DEMO-5', 'DEMO-6');

    expect(result).toEqual({ id: '2-9' });
    expect(requestUrl(mockFetch).pathname).toBe(
      '/api/agiles/108-1/issues/DEMO-5/subtasks/DEMO-6'
    );
  });

  it('adds a user story to a sprint', async () => {
    const { youtrack, mockFetch } = createTestIntegration();
    mockFetch.enqueueEmptyResponse(200);

    await youtrack.agile.addUserStoryToSprint('108-1', '109-2', 'DEMO-5');

    expect(requestUrl(mockFetch).pathname).toBe('/api/agiles/108-1/sprints/109-2/issues/DEMO-5');
  });

  it('rejects blank identifiers', async () => {
    const { youtrack } = createTestIntegration();

    await expect(youtrack.agile.addIssueToSprint('', '109-1', '')).rejects.toThrow(
      'Validation failed: boardId must not be empty, issueId must not be empty'
    );
  });
});
