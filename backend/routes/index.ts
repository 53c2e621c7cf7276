import { Router } from 'express';
import { PermissionsService } from '../services/permissions.service';
import { createPermissionsRoutes } from './permissions.routes';

export function createRouter(permissionsService: PermissionsService): Router {
  const router = Router();

  router.use('/permissions', createPermissionsRoutes(permissionsService));

  // Root endpoint
  router.get('/', (_req, res) => {
    res.json({
      message: 'Workspace Permissions API',
      endpoints: {
        permissions: '/api/permissions/:objectPath',
      },
    });
  });

  return router;
}
