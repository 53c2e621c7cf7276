import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { ObjectTypeName } from '../types';
import { logger } from '../utils/logger';

export interface PermissionsRequestInfo {
  objectType?: ObjectTypeName;
  objectPath?: string;
}

const requestInfo = new WeakMap<Response, PermissionsRequestInfo>();

/**
 * Record which workspace object a request acts on. Shows up in every later
 * log line of the request and in its completion log.
 */
export function annotateRequest(res: Response, info: PermissionsRequestInfo): void {
  requestInfo.set(res, { ...requestInfo.get(res), ...info });
  logger.addContext({ ...info });
}

export function requestInfoOf(res: Response): PermissionsRequestInfo {
  return requestInfo.get(res) ?? {};
}

/**
 * Correlation id per request, plus one completion line naming the object
 * and the time the reconciliation took.
 */
export const requestContext = (req: Request, res: Response, next: NextFunction) => {
  const requestId = req.header('x-request-id') || randomUUID();
  const startedAt = Date.now();
  res.setHeader('X-Request-Id', requestId);

  logger.addContext({ requestId, method: req.method, path: req.path });

  res.on('finish', () => {
    if (req.path === '/health') {
      return;
    }
    const { objectType, objectPath } = requestInfoOf(res);
    logger.info(objectPath ? `${req.method} permissions of ${objectPath}` : `${req.method} ${req.path}`, {
      requestId,
      objectType,
      objectPath,
      statusCode: res.statusCode,
      duration: Date.now() - startedAt,
    });
  });

  next();
};
