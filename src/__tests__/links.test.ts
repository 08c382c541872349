/**
 * Tests for the issue link service.
 */

import { describe, it, expect } from 'vitest';
import { createTestIntegration, requestUrl } from '../__mocks__/integration.js';

describe('LinkService', () => {
  it('reads the links of an issue', async () => {
    const { youtrack, mockFetch } = createTestIntegration();
    mockFetch.enqueueJsonResponse(200, [
      { id: '2-1s', direction: 'OUTWARD', linkType: { name: 'Depend' }, issues: [] },
    ]);

    const links = await youtrack.links.getIssueLinks('DEMO-1');

    expect(links[0]?.direction).toBe('OUTWARD');
    const url = requestUrl(mockFetch);
    expect(url.pathname).toBe('/api/issues/DEMO-1/links');
    expect(url.searchParams.get('fields')).toBe(
      'id,direction,linkType(id,name,directed),issues(id,summary)'
    );
  });

  it('lists link types globally, per issue and per project', async () => {
    const { youtrack, mockFetch } = createTestIntegration();
    mockFetch
      .enqueueJsonResponse(200, [{ id: '106-0', name: 'Relates', directed: false }])
      .enqueueJsonResponse(200, [])
      .enqueueJsonResponse(200, []);

    await youtrack.links.listLinkTypes();
    await youtrack.links.listLinkTypesForIssue('DEMO-1');
    await youtrack.links.listLinkTypesForProject('0-0');

    expect(requestUrl(mockFetch, 0).pathname).toBe('/api/issueLinkTypes');
    expect(requestUrl(mockFetch, 0).searchParams.get('fields')).toBe('id,name,directed');
    expect(requestUrl(mockFetch, 1).pathname).toBe('/api/issues/DEMO-1/links/types');
    expect(requestUrl(mockFetch, 2).pathname).toBe('/api/admin/projects/0-0/issueLinkTypes');
  });

  it('links two issues', async () => {
    const { youtrack, mockFetch } = createTestIntegration();
    mockFetch.enqueueEmptyResponse(200);

    await youtrack.links.addLink('DEMO-1', 'DEMO-2', '106-1');

    expect(mockFetch.getLastRequest()?.method).toBe('PUT');
    expect(requestUrl(mockFetch).pathname).toBe('/api/issues/DEMO-1/links/106-1/DEMO-2');
  });

  it('rejects a missing link type', async () => {
    const { youtrack, mockFetch } = createTestIntegration();

    await expect(youtrack.links.addLink('DEMO-1', 'DEMO-2', ' ')).rejects.toThrow(
      'Validation failed: linkTypeId must not be empty'
    );
    expect(mockFetch.getRequests()).toHaveLength(0);
  });
});
