import type { NextFunction, RequestHandler, Response } from 'express';
import type { AuthRequest } from './auth.js';

/**
 * Wrap an async Express handler so it returns void (no-misused-promises)
 * and forwards errors to next(). The handler sees the request as an
 * AuthRequest so it can read the authenticated caller.
 */
export function asyncHandler(
  fn: (req: AuthRequest, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    void fn(req, res, next).catch(next);
  };
}
