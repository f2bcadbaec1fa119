/**
 * Dispatch Metrics
 *
 * Counts webhook requests by receiver and response status.
 */

import type { Counter, MetricsCollector } from './collector.js';

export interface DispatchMetrics {
  /** Record one completed /alert request. */
  recordRequest(receiver: string, statusCode: number): void;
  getRequestCounter(): Counter;
}

export function createDispatchMetrics(collector: MetricsCollector): DispatchMetrics {
  const requestCounter = collector.counter(
    'requests_total',
    'Requests processed, by receiver and status code.',
    ['receiver', 'status'],
  );

  return {
    recordRequest(receiver: string, statusCode: number): void {
      requestCounter.inc(1, { receiver, status: String(statusCode) });
    },

    getRequestCounter(): Counter {
      return requestCounter;
    },
  };
}
