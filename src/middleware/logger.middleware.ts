import { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger';

/**
 * Number of designs in an allocation request body, if it carries any
 */
export const countDesigns = (body: unknown): number | undefined =>
  typeof body === 'object' && body !== null && 'designs' in body && Array.isArray(body.designs)
    ? body.designs.length
    : undefined;

/**
 * Request logging middleware
 *
 * Runs after body parsing, so allocation requests log how many designs they carry
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const startTime = Date.now();
  const designs = countDesigns(req.body);

  logger.info('Incoming request', {
    method: req.method,
    path: req.path,
    ...(designs === undefined ? {} : { designs }),
  });

  res.on('finish', () => {
    logger.info('Request completed', {
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      durationMs: Date.now() - startTime,
      ...(designs === undefined ? {} : { designs }),
    });
  });

  next();
};
