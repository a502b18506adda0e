/**
 * Authentication for the transfer service.
 */

import type { Credentials } from '../config/index.js';

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
}

/**
 * HTTP Basic authentication with a user name and API token.
 */
export class BasicAuthProvider implements AuthProvider {
  private readonly header: string;

  constructor(credentials: Credentials) {
    const encoded = Buffer.from(`${credentials.username}:${credentials.token.expose()}`).toString('base64');
    this.header = `Basic ${encoded}`;
  }

  async getAuthHeaders(): Promise<Headers> {
    return {
      Authorization: this.header,
    };
  }
}

/**
 * Creates the auth provider for a set of credentials.
 */
export function createAuthProvider(credentials: Credentials): AuthProvider {
  return new BasicAuthProvider(credentials);
}
