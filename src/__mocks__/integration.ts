/**
 * Integration wired to a MockFetch for service and CLI tests.
 */

import { vi } from 'vitest';
import { YouTrackConfig, YouTrackConfigBuilder } from '../config/index.js';
import { createInMemoryObservability } from '../observability/index.js';
import { YouTrackIntegration, createYouTrackIntegration } from '../index.js';
import { MockFetch } from './fetch.js';

export const TEST_BASE_URL = 'https://youtrack.example.com';
export const TEST_TOKEN = 'perm:test-token';

/**
 * Config with retries off and room for bursts of requests.
 */
export function createTestConfig(configure?: (builder: YouTrackConfigBuilder) => void): YouTrackConfig {
  const builder = new YouTrackConfigBuilder()
    .withBaseUrl(TEST_BASE_URL)
    .withToken(TEST_TOKEN)
    .withRetryConfig({ maxRetries: 0, maxRateLimitRetries: 0, initialBackoffMs: 1 })
    .withRateLimitConfig({ requestsPerSecond: 1000 });
  configure?.(builder);
  return builder.build();
}

export function createTestIntegration(configure?: (builder: YouTrackConfigBuilder) => void): {
  youtrack: YouTrackIntegration;
  mockFetch: MockFetch;
  observability: ReturnType<typeof createInMemoryObservability>;
} {
  const mockFetch = new MockFetch();
  vi.stubGlobal('fetch', mockFetch.fetch);

  const observability = createInMemoryObservability();
  const youtrack = createYouTrackIntegration(createTestConfig(configure), { observability });

  return { youtrack, mockFetch, observability };
}

/**
 * Parsed URL of a recorded request.
 */
export function requestUrl(mockFetch: MockFetch, index?: number): URL {
  const requests = mockFetch.getRequests();
  const request = requests[index ?? requests.length - 1];
  if (!request) {
    throw new Error('No request recorded');
  }
  return new URL(request.url);
}
