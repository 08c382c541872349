/**
 * Tests for queries and commands.
 */

import { describe, it, expect } from 'vitest';
import { createTestIntegration, requestUrl } from '../__mocks__/integration.js';
import { MetricNames } from '../observability/index.js';

describe('QueryService', () => {
  it('runs a query with the requested fields', async () => {
    const { youtrack, mockFetch } = createTestIntegration();
    mockFetch.enqueueJsonResponse(200, [{ id: '2-1', idReadable: 'DEMO-1' }]);

    const issues = await youtrack.queries.runQuery('State: Open', {
      fields: 'id,idReadable',
      limit: 3,
    });

    expect(issues).toEqual([{ id: '2-1', idReadable: 'DEMO-1' }]);
    const url = requestUrl(mockFetch);
    expect(url.pathname).toBe('/api/issues');
    expect(url.searchParams.get('query')).toBe('State: Open');
    expect(url.searchParams.get('fields')).toBe('id,idReadable');
    expect(url.searchParams.get('$top')).toBe('3');
    expect(url.searchParams.get('$skip')).toBe('0');
  });

  it('applies a command to an issue', async () => {
    const { youtrack, mockFetch, observability } = createTestIntegration();
    mockFetch.enqueueEmptyResponse(200);

    await expect(youtrack.queries.runCommand('DEMO-1', 'State Fixed')).resolves.toBeUndefined();

    expect(requestUrl(mockFetch).pathname).toBe('/api/commands');
    expect(mockFetch.getJsonBody()).toEqual({
      query: 'State Fixed',
      issues: [{ idReadable: 'DEMO-1' }],
    });
    expect(observability.metrics.getCounter(MetricNames.COMMANDS_EXECUTED)).toBe(1);
  });

  it('addresses a database id by id', async () => {
    const { youtrack, mockFetch } = createTestIntegration();
    mockFetch.enqueueEmptyResponse(200);

    await youtrack.queries.runCommand(' 2-15 ', 'State Fixed');

    expect(mockFetch.getJsonBody()).toEqual({
      query: 'State Fixed',
      issues: [{ id: '2-15' }],
    });
  });

  it('addresses anything else by readable id', async () => {
    const { youtrack, mockFetch } = createTestIntegration();
    mockFetch.enqueueEmptyResponse(200);

    await youtrack.queries.runCommand('ABC2-15', 'State Fixed');

    expect(mockFetch.getJsonBody()).toEqual({
      query: 'State Fixed',
      issues: [{ idReadable: 'ABC2-15' }],
    });
  });

  it('sends the comment along with the command', async () => {
    const { youtrack, mockFetch } = createTestIntegration();
    mockFetch.enqueueEmptyResponse(200);

    await youtrack.queries.runCommand('DEMO-1', 'tag regression', 'Seen again');

    expect(mockFetch.getJsonBody()).toEqual({
      query: 'tag regression',
      issues: [{ idReadable: 'DEMO-1' }],
      comment: 'Seen again',
    });
  });

  it('rejects an empty command', async () => {
    const { youtrack } = createTestIntegration();

    await expect(youtrack.queries.runCommand('DEMO-1', '')).rejects.toThrow(
      'Validation failed: command must not be empty'
    );
  });
});
