import dotenv from 'dotenv';
import path from 'path';
import { createApp } from './app';
import { IdentityService } from './services/identity.service';
import { PermissionsService } from './services/permissions.service';
import { StartupService } from './services/startup.service';
import { createDatabricksClient } from './utils/databricksClient';
import { getDatabricksConfig } from './utils/databricksConfig';
import { logger } from './utils/logger';

// When running with tsx (dev), __dirname is backend/
// When running compiled JS, __dirname is dist/backend/
const envPath = __dirname.includes('dist')
  ? path.resolve(__dirname, '../../.env')
  : path.resolve(__dirname, '../.env');
const result = dotenv.config({ path: envPath });
if (result.error) {
  logger.debug('No .env file loaded', { envPath });
}

const PORT = process.env.PORT || 4000;

const startServer = async () => {
  try {
    const config = getDatabricksConfig();
    const client = createDatabricksClient(config);

    // Run startup checks
    const startupService = new StartupService(new IdentityService(client));
    await startupService.validateAndInitialize();

    const app = createApp(new PermissionsService(client));
    app.listen(PORT, () => {
      logger.info('Permissions server started', {
        port: PORT,
        environment: process.env.NODE_ENV,
        host: config.host,
      });
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
};

void startServer();
