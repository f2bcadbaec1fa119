/**
 * Metrics Module
 *
 * Prometheus-compatible request counters and their scrape endpoint.
 */

export {
  type PrometheusConfig,
  type MetricDefinition,
  type Labels,
  type MetricsRegistry,
  type CounterMetric,
  loadPrometheusConfig,
  createMetricsRegistry,
  escapeLabelValue,
} from './prometheusConfig.js';

export { type MetricsCollector, type Counter, createMetricsCollector } from './collector.js';

export { type DispatchMetrics, createDispatchMetrics } from './dispatchMetrics.js';

export {
  type MetricsEndpointOptions,
  METRICS_PATH,
  PROMETHEUS_CONTENT_TYPE,
  createMetricsEndpoint,
} from './metricsEndpoint.js';
