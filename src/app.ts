/**
 * Express application factory with dependency injection.
 *
 * Routes:
 * - POST /alert    Alertmanager webhook, dispatched to the matching receiver
 * - GET  /         home page
 * - GET  /config   loaded configuration, secrets masked
 * - GET  /healthz  liveness probe
 * - GET  /metrics  Prometheus exposition
 *
 * @module app
 */

import express from 'express';
import type { Request, Response, NextFunction } from 'express';

import { createReceiverRouter, type ConfigStore } from './config/index.js';
import { createAlertBodyErrorHandler, createAlertHandler } from './dispatch/index.js';
import { buildEnvelope, writeEnvelope } from './http/responses.js';
import type { Logger } from './logging/index.js';
import { createDispatchMetrics, createMetricsEndpoint, type MetricsCollector } from './metrics/index.js';
import { requestLogger, requestLoggerFor } from './middleware/requestLogger.js';
import { createNotifierGateway, type HttpTransport } from './notify/index.js';
import { createPagesRouter } from './pages/index.js';

// ─── Dependency Types ────────────────────────────────────────────────────────

/** All dependencies required to create the Express application. */
export interface AppDependencies {
  /** Current receiver configuration snapshot. */
  configStore: ConfigStore;

  /** Process-wide metrics collector, shared with GET /metrics. */
  metricsCollector: MetricsCollector;

  /** Transport used by the tracker notifiers. */
  transport: HttpTransport;

  logger: Logger;

  /** Upper bound for one tracker call, in milliseconds. */
  notifyTimeoutMs: number;

  /** Maximum accepted webhook body size (bytes or a size string like "1mb"). */
  bodyLimit: string | number;
}

// ─── Application Factory ────────────────────────────────────────────────────

/**
 * Create a configured Express application.
 *
 * @param deps - All injected dependencies
 */
export function createApp(deps: AppDependencies): express.Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(requestLogger(deps.logger));

  // ── Webhook ───────────────────────────────────────────────────────────

  const alertDeps = {
    router: createReceiverRouter(deps.configStore),
    gateway: createNotifierGateway({
      transport: deps.transport,
      timeoutMs: deps.notifyTimeoutMs,
      logger: deps.logger,
    }),
    logger: deps.logger,
    metrics: createDispatchMetrics(deps.metricsCollector),
  };

  app.post(
    '/alert',
    express.text({ type: () => true, limit: deps.bodyLimit }),
    createAlertBodyErrorHandler(alertDeps),
    createAlertHandler(alertDeps),
  );

  // ── Informational & Operational Routes ────────────────────────────────

  app.use(createPagesRouter(deps.configStore));

  app.get('/healthz', (_req: Request, res: Response) => {
    res.type('text/plain').status(200).send('OK');
  });

  app.use(createMetricsEndpoint({ collector: deps.metricsCollector, logger: deps.logger }));

  // ── Global Error Handler ──────────────────────────────────────────────

  app.use((err: Error, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    requestLoggerFor(deps.logger, res).error('unhandled error', err);
    writeEnvelope(res, buildEnvelope(500, 'internal server error'));
  });

  return app;
}
