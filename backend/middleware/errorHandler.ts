import { NextFunction, Request, Response } from 'express';
import {
  ApiError,
  CancelledError,
  ClassificationError,
  PermissionsError,
  ResolutionError,
  ValidationError,
} from '../utils/errors';
import { logger } from '../utils/logger';

export function statusFor(err: unknown): number {
  if (err instanceof ValidationError) return 400;
  if (err instanceof ApiError) return err.statusCode;
  if (err instanceof ResolutionError) return 422;
  if (err instanceof CancelledError) return 499;
  if (err instanceof ClassificationError) return 502;
  return 500;
}

export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  const status = statusFor(err);
  if (status >= 500) {
    logger.error('Error:', err);
  } else {
    logger.warn(err instanceof Error ? err.message : 'Request failed', { statusCode: status });
  }

  if (err instanceof ApiError) {
    return res.status(status).json({
      success: false,
      error: err.errorCode,
      message: err.message,
    });
  }

  if (err instanceof PermissionsError) {
    return res.status(status).json({
      success: false,
      error: err.code,
      message: err.message,
    });
  }

  // Default error
  res.status(status).json({
    success: false,
    error: err instanceof Error ? err.message : 'Internal server error',
    ...(process.env.NODE_ENV === 'development' && err instanceof Error ? { stack: err.stack } : {}),
  });
};
