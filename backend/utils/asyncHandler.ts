import { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Forward rejections from async route handlers to the error middleware
 */
export const asyncHandler = (
  handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
): RequestHandler => (req, res, next) => {
  handler(req, res, next).catch(next);
};
