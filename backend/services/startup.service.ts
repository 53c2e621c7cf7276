import { ScimUser } from '../types';
import { logger } from '../utils/logger';
import { IdentityLookup } from './identity.service';

export class StartupService {
  private identity: IdentityLookup;

  constructor(identity: IdentityLookup) {
    this.identity = identity;
  }

  /**
   * Check that the configured token works before accepting requests
   */
  async validateAndInitialize(): Promise<ScimUser> {
    logger.info('Starting application initialization');

    try {
      logger.debug('Validating workspace credentials');
      const user = await this.identity.me();

      logger.info('Workspace identity validated', { userName: user.userName });
      return user;
    } catch (error) {
      logger.error('Application initialization failed:', error);
      throw error;
    }
  }
}
