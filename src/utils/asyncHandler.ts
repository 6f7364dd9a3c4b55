import { Request, Response, NextFunction, RequestHandler } from 'express';
import { RouteHandler } from '../types';

/**
 * Wraps a route handler so that a thrown error or a rejected promise
 * reaches the Express error handler
 */
export const asyncHandler =
  (fn: RouteHandler): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve()
      .then(() => fn(req, res, next))
      .catch(next);
  };

export default asyncHandler;
