/**
 * Tests for the comment service.
 */

import { describe, it, expect } from 'vitest';
import { createTestIntegration, requestUrl } from '../__mocks__/integration.js';
import { MetricNames } from '../observability/index.js';

describe('CommentService', () => {
  it('adds a comment', async () => {
    const { youtrack, mockFetch, observability } = createTestIntegration();
    mockFetch.enqueueJsonResponse(200, { id: '4-1', text: 'Reproduced on main' });

    const comment = await youtrack.comments.add('DEMO-1', 'Reproduced on main');

    expect(comment.id).toBe('4-1');
    const url = requestUrl(mockFetch);
    expect(url.pathname).toBe('/api/issues/DEMO-1/comments');
    expect(url.searchParams.get('fields')).toBe('id,text,author');
    expect(mockFetch.getJsonBody()).toEqual({ text: 'Reproduced on main' });
    expect(observability.metrics.getCounter(MetricNames.COMMENTS_ADDED)).toBe(1);
  });

  it('rejects blank text', async () => {
    const { youtrack, mockFetch } = createTestIntegration();

    await expect(youtrack.comments.add('DEMO-1', '   ')).rejects.toThrow(
      'Validation failed: comment text must not be empty'
    );
    expect(mockFetch.getRequests()).toHaveLength(0);
  });

  it('lists comments a page at a time', async () => {
    const { youtrack, mockFetch } = createTestIntegration();
    mockFetch.enqueueJsonResponse(200, [
      { id: '4-1', text: 'first', author: { login: 'jane', name: 'Jane' }, created: 1700000000000 },
    ]);

    const comments = await youtrack.comments.list('DEMO-1', { limit: 10, skip: 10 });

    expect(comments[0]?.author).toEqual({ login: 'jane', name: 'Jane' });
    const url = requestUrl(mockFetch);
    expect(url.searchParams.get('fields')).toBe('id,text,author(login,name),created');
    expect(url.searchParams.get('$top')).toBe('10');
    expect(url.searchParams.get('$skip')).toBe('10');
  });
});
