/**
 * GET /metrics: the dispatch counters in Prometheus text exposition
 * format. A registry failure is logged and answered with 500; it never
 * affects alert dispatch.
 *
 * @module metrics/metricsEndpoint
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { Logger } from '../logging/index.js';
import { requestLoggerFor } from '../middleware/requestLogger.js';
import type { MetricsCollector } from './collector.js';

export const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

export const METRICS_PATH = '/metrics';

export interface MetricsEndpointOptions {
  collector: MetricsCollector;
  logger: Logger;
}

export function createMetricsEndpoint(options: MetricsEndpointOptions): Router {
  const { collector, logger } = options;
  const router = Router();

  router.get(METRICS_PATH, async (_req: Request, res: Response) => {
    let exposition: string;
    try {
      exposition = await collector.getMetricsOutput();
    } catch (err: unknown) {
      requestLoggerFor(logger, res).error(
        'error rendering metrics',
        err instanceof Error ? err : new Error(String(err)),
      );
      res.status(500).type('text/plain').send('# Error collecting metrics\n');
      return;
    }
    res.set('Content-Type', PROMETHEUS_CONTENT_TYPE).status(200).send(exposition);
  });

  return router;
}
