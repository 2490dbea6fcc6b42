import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Forwards errors thrown (or rejected) by a route handler to the Express
 * error middleware
 *
 * Usage:
 * ```typescript
 * router.get('/sample', asyncHandler(async (_req, res) => {
 *   res.json(createSuccessResponse(allocationService.allocateSample()));
 * }));
 * ```
 */
export const asyncHandler = (fn: RequestHandler): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve()
      .then(() => fn(req, res, next))
      .catch(next);
  };
};
