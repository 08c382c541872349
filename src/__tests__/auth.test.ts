/**
 * Tests for authentication providers.
 */

import { describe, it, expect } from 'vitest';
import { PermanentTokenAuthProvider, createAuthProvider } from '../auth/index.js';
import { InMemoryLogger, LogLevel } from '../observability/index.js';

describe('PermanentTokenAuthProvider', () => {
  it('sends the token as a bearer credential', async () => {
    const provider = new PermanentTokenAuthProvider('perm:test-token');

    await expect(provider.getAuthHeaders()).resolves.toEqual({
      Authorization: 'Bearer perm:test-token',
    });
    expect(provider.isValid()).toBe(true);
  });

  it('only notes tokens without the permanent prefix', async () => {
    const logger = new InMemoryLogger();
    const provider = new PermanentTokenAuthProvider('test-secret', logger);

    await expect(provider.getAuthHeaders()).resolves.toEqual({
      Authorization: 'Bearer test-secret',
    });
    const [entry] = logger.getEntriesAtLevel(LogLevel.DEBUG);
    expect(entry?.message).toBe('Token does not use the permanent token prefix');
  });

  it('stays quiet for permanent tokens', () => {
    const logger = new InMemoryLogger();

    new PermanentTokenAuthProvider('perm:test-token', logger);

    expect(logger.getEntries()).toHaveLength(0);
  });
});

describe('createAuthProvider', () => {
  it('builds a provider from the configured method', async () => {
    const provider = createAuthProvider({ type: 'permanent_token', token: 'perm:test-token' });

    expect(provider).toBeInstanceOf(PermanentTokenAuthProvider);
    await expect(provider.getAuthHeaders()).resolves.toEqual({
      Authorization: 'Bearer perm:test-token',
    });
  });
});
