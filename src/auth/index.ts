/**
 * Authentication providers for the YouTrack client.
 *
 * YouTrack accepts permanent tokens as bearer credentials.
 */

import { AuthMethod, SecretString } from '../config/index.js';
import { Logger, NoopLogger } from '../observability/index.js';

/**
 * Request headers type.
 */
export type Headers = Record<string, string>;

/**
 * Auth provider interface.
 */
export interface AuthProvider {
  /** Get authentication headers for a request */
  getAuthHeaders(): Promise<Headers>;
  /** Check if credentials are valid/not expired */
  isValid(): boolean;
}

/**
 * Prefix YouTrack puts on permanent tokens.
 */
export const PERMANENT_TOKEN_PREFIX = 'perm:';

/**
 * Permanent token authentication provider using Bearer auth.
 */
export class PermanentTokenAuthProvider implements AuthProvider {
  private readonly token: SecretString;

  constructor(token: string, logger: Logger = new NoopLogger()) {
    this.token = new SecretString(token);
    if (!token.startsWith(PERMANENT_TOKEN_PREFIX)) {
      // Hub OAuth access tokens work too, so this is only a hint.
      logger.debug('Token does not use the permanent token prefix', {
        prefix: PERMANENT_TOKEN_PREFIX,
      });
    }
  }

  async getAuthHeaders(): Promise<Headers> {
    return {
      Authorization: `Bearer ${this.token.expose()}`,
    };
  }

  isValid(): boolean {
    return true; // Permanent tokens don't expire client-side
  }
}

/**
 * Creates an auth provider for the configured method.
 */
export function createAuthProvider(auth: AuthMethod, logger?: Logger): AuthProvider {
  switch (auth.type) {
    case 'permanent_token':
      return new PermanentTokenAuthProvider(auth.token, logger);
  }
}
