import { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';

import { LogContext, runWithContext } from './log-context';
import { logger } from './logger';

const headerValue = (value: string | string[] | undefined): string | undefined => {
  if (Array.isArray(value)) return value[0];
  return value || undefined;
};

/**
 * Correlation ID middleware
 * - Extracts or generates a correlation ID for each request
 * - Stores it in AsyncLocalStorage for the rest of the request lifecycle
 * - Echoes it back in the x-correlation-id response header
 */
export const correlationMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const correlationId =
    headerValue(req.headers['x-correlation-id']) ||
    headerValue(req.headers['x-request-id']) ||
    uuid();

  res.setHeader('x-correlation-id', correlationId);

  const context: LogContext = {
    correlationId,
  };

  runWithContext(context, () => {
    logger.debug(
      {
        correlationId,
        method: req.method,
        path: req.path,
      },
      'Request started'
    );

    res.on('finish', () => {
      logger.info(
        {
          correlationId,
          method: req.method,
          path: req.path,
          statusCode: res.statusCode,
        },
        'Request completed'
      );
    });

    next();
  });
};
