import { Request, Response, NextFunction } from 'express';
import { AnyZodObject, ZodError } from 'zod';
import { createErrorResponse } from '../utils/response-factory';
import { ErrorCode } from '../types/error.types';

/**
 * Validation middleware factory
 *
 * Validates request data (body, params, query) against a Zod schema.
 * The parsed body replaces req.body so handlers only see validated data.
 *
 * Usage:
 * ```typescript
 * router.post('/allocations', validate(createAllocationSchema), controller.createAllocation);
 * ```
 */
export const validate = (schema: AnyZodObject) => {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const parsed = await schema.parseAsync({
        body: req.body,
        params: req.params,
        query: req.query,
      });
      if ('body' in parsed) {
        req.body = parsed['body'];
      }
      next();
      return;
    } catch (error) {
      if (error instanceof ZodError) {
        const errorDetails = error.errors.map((err) => ({
          field: err.path.join('.'),
          message: err.message,
        }));

        res.status(400).json(
          createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Validation failed', {
            errors: errorDetails,
          })
        );
        return;
      }
      next(error);
      return;
    }
  };
};
