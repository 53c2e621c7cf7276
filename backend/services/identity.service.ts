import { ScimUser } from '../types';
import { DatabricksClient } from '../utils/databricksClient';
import { logger } from '../utils/logger';

export interface IdentityLookup {
  me(signal?: AbortSignal): Promise<ScimUser>;
}

/**
 * Resolves the identity behind the configured token. Every reconciliation
 * asks again; nothing is cached between requests.
 */
export class IdentityService implements IdentityLookup {
  private client: DatabricksClient;

  constructor(client: DatabricksClient) {
    this.client = client;
  }

  async me(signal?: AbortSignal): Promise<ScimUser> {
    const user = await this.client.get<ScimUser>('/preview/scim/v2/Me', { signal });
    logger.debug('Resolved caller identity', { userName: user.userName });
    return user;
  }
}
