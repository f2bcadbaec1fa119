/**
 * Request Logger Middleware
 *
 * Assigns every request a correlation id, echoes it in the response
 * header and logs request start and completion.
 *
 * @module middleware/requestLogger
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { Logger } from '../logging/index.js';

export const CORRELATION_HEADER = 'x-correlation-id';

function getOrCreateCorrelationId(req: Request): string {
  const existing = req.get(CORRELATION_HEADER);
  if (existing !== undefined && existing.length > 0) return existing;
  return uuidv4();
}

/**
 * Read the correlation id assigned by {@link requestLogger}.
 */
export function correlationIdOf(res: Response): string | undefined {
  const value = res.getHeader(CORRELATION_HEADER);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Request-scoped logger carrying the correlation id, if one was assigned.
 */
export function requestLoggerFor(logger: Logger, res: Response): Logger {
  const correlationId = correlationIdOf(res);
  return correlationId ? logger.child({ correlationId }) : logger;
}

/**
 * Logs incoming requests and outgoing responses with correlation ID.
 */
export function requestLogger(logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const correlationId = getOrCreateCorrelationId(req);
    res.setHeader(CORRELATION_HEADER, correlationId);

    const start = Date.now();
    const method = req.method;
    const url = req.originalUrl;

    const child = logger.child({ correlationId });
    child.debug('request started', { method, url });

    res.on('finish', () => {
      child.debug('request completed', {
        method,
        url,
        statusCode: res.statusCode,
        durationMs: Date.now() - start,
      });
    });

    next();
  };
}
