import express from 'express';
import { createRouter } from './routes';
import { errorHandler } from './middleware/errorHandler';
import { requestContext } from './middleware/requestContext';
import { PermissionsService } from './services/permissions.service';

export function createApp(permissionsService: PermissionsService): express.Express {
  const app = express();

  app.use(express.json());
  app.use(requestContext);

  app.use('/api', createRouter(permissionsService));

  // Health check
  app.get('/health', (_req: express.Request, res: express.Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Error handling
  app.use(errorHandler);

  return app;
}
