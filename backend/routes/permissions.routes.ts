import { Request, Response, Router } from 'express';
import { PermissionsService } from '../services/permissions.service';
import { objectTypeForPath } from '../services/permissions/ObjectTypeRegistry';
import { DeclaredAccessControl, DeclaredPermissions, IDENTIFIER_FIELDS, ObjectTypeName } from '../types';
import { annotateRequest } from '../middleware/requestContext';
import { asyncHandler } from '../utils/asyncHandler';
import { ClassificationError, ValidationError } from '../utils/errors';

// Any canonical object path below the mount point, e.g. /clusters/abc
const OBJECT_PATH = /^\/.+$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function parseAccessControl(value: unknown): DeclaredAccessControl[] | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  return value.filter(isRecord).map(entry => ({
    user_name: optionalString(entry.user_name),
    group_name: optionalString(entry.group_name),
    service_principal_name: optionalString(entry.service_principal_name),
    permission_level: optionalString(entry.permission_level),
  }));
}

export function parseDeclaredPermissions(body: unknown): DeclaredPermissions {
  const source = isRecord(body) ? body : {};
  const declared: DeclaredPermissions = {
    access_control: parseAccessControl(source.access_control),
  };
  for (const field of IDENTIFIER_FIELDS) {
    const value = source[field];
    if (typeof value === 'string' || typeof value === 'number') {
      declared[field] = value;
    }
  }
  return declared;
}

function objectTypeOf(res: Response, objectPath: string): ObjectTypeName {
  try {
    const objectType = objectTypeForPath(objectPath);
    annotateRequest(res, { objectType, objectPath });
    return objectType;
  } catch (error) {
    if (error instanceof ClassificationError) {
      throw new ValidationError([{ field: 'path', message: `${objectPath} is not a permissions object path` }]);
    }
    throw error;
  }
}

/**
 * Abort the reconciliation when the client goes away mid-request
 */
function requestSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

export function createPermissionsRoutes(permissionsService: PermissionsService): Router {
  const router = Router();

  // POST /api/permissions - apply a declared configuration
  router.post('/', asyncHandler(async (req: Request, res: Response) => {
    const declared = parseDeclaredPermissions(req.body);
    const id = await permissionsService.create(declared, requestSignal(res));
    annotateRequest(res, { objectType: objectTypeForPath(id), objectPath: id });

    res.status(201).json({
      success: true,
      data: { id },
    });
  }));

  // GET /api/permissions/<object path>
  router.get(OBJECT_PATH, asyncHandler(async (req: Request, res: Response) => {
    const objectPath = req.path;
    const entity = await permissionsService.read(objectTypeOf(res, objectPath), objectPath, requestSignal(res));

    if (!entity) {
      return res.status(404).json({
        success: false,
        error: 'Permissions not found',
      });
    }

    res.json({
      success: true,
      data: { id: objectPath, ...entity },
    });
  }));

  // PUT /api/permissions/<object path>
  router.put(OBJECT_PATH, asyncHandler(async (req: Request, res: Response) => {
    const objectPath = req.path;
    const desired = isRecord(req.body) ? parseAccessControl(req.body.access_control) : undefined;
    await permissionsService.update(objectTypeOf(res, objectPath), objectPath, desired ?? [], requestSignal(res));

    res.json({
      success: true,
      data: { id: objectPath },
    });
  }));

  // DELETE /api/permissions/<object path>
  router.delete(OBJECT_PATH, asyncHandler(async (req: Request, res: Response) => {
    const objectPath = req.path;
    await permissionsService.delete(objectTypeOf(res, objectPath), objectPath, requestSignal(res));

    res.json({ success: true });
  }));

  return router;
}
