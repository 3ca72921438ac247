/**
 * Global error-handling middleware.
 *
 * Returns a generic message to avoid leaking implementation details to clients.
 * Misconfigured correlation (unknown format, blank generated ids) ends up here
 * as well: it is logged at error level and never retried.
 */
import { Request, Response, NextFunction } from 'express';
import { getCorrelationInfo } from '../correlation/correlation-scope';
import { CorrelationConfigurationError } from '../correlation/errors';
import { logger } from '../infra/logger';
import { captureWithCorrelation } from '../infra/observability';

export const errorMiddleware = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction,
): void => {
  const correlation = getCorrelationInfo();
  captureWithCorrelation(err, correlation);

  logger.error(err instanceof CorrelationConfigurationError ? 'HTTP correlation misconfigured' : 'Unhandled error', {
    message: err.message,
    stack: err.stack,
    method: req.method,
    path: req.originalUrl,
  });

  res.status(500).json({
    success: false,
    error: {
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    },
  });
};
