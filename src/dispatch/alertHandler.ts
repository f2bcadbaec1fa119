/**
 * POST /alert route handlers.
 *
 * Feeds the request body to the dispatcher, writes the envelope and counts
 * the request once the response is finalized. Aborts the tracker call if
 * the client disconnects first.
 *
 * @module dispatch/alertHandler
 */

import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { writeEnvelope } from '../http/responses.js';
import type { Logger } from '../logging/index.js';
import type { DispatchMetrics } from '../metrics/index.js';
import { requestLoggerFor } from '../middleware/requestLogger.js';
import { UNKNOWN_RECEIVER } from '../types/index.js';
import { dispatchAlerts, rejectRequest, type DispatchDependencies, type DispatchResult } from './dispatcher.js';

export interface AlertHandlerDependencies extends DispatchDependencies {
  metrics: DispatchMetrics;
}

function bodyText(body: unknown): string {
  if (typeof body === 'string') return body;
  if (Buffer.isBuffer(body)) return body.toString('utf8');
  return '';
}

function respond(res: Response, result: DispatchResult, metrics: DispatchMetrics): void {
  writeEnvelope(res, result.envelope);
  metrics.recordRequest(result.receiver, result.envelope.status);
}

/**
 * Handler for POST /alert. Expects the body already read as text.
 */
export function createAlertHandler(deps: AlertHandlerDependencies): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const logger: Logger = requestLoggerFor(deps.logger, res);
      const result = await dispatchAlerts(bodyText(req.body), { ...deps, logger }, controller.signal);
      respond(res, result, deps.metrics);
    } catch (err) {
      next(err);
    }
  };
}

/**
 * Error handler for the body reader on POST /alert: an unreadable body is a
 * decode failure.
 */
export function createAlertBodyErrorHandler(deps: AlertHandlerDependencies): ErrorRequestHandler {
  return (err: unknown, _req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const reason = err instanceof Error ? err.message : String(err);
    const result = rejectRequest(
      requestLoggerFor(deps.logger, res),
      { kind: 'decode', message: `cannot read request body: ${reason}`, groupLabels: {} },
      UNKNOWN_RECEIVER,
      {},
    );
    respond(res, result, deps.metrics);
  };
}
