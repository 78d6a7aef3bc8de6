import { NextFunction, Request, Response } from 'express';
import { errorHandler as handler } from '../../../shared/errors';

/**
 * Centralized error handling middleware. Responds with the error's API body,
 * never with a stack trace.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const error = handler.handleError(err, {
    operation: `${req.method} ${req.path}`,
    metadata: { query: req.query },
  });

  res.status(error.statusCode).json(error.toApiResponse());
}

/**
 * Async handler wrapper to catch errors in async route handlers
 */
export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<void>) {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res, next).catch(next);
  };
}
