/**
 * Metrics Collector
 *
 * Process-wide collector handing out named counters backed by a
 * MetricsRegistry. Created once at startup, before the listener opens.
 */

import {
  type MetricsRegistry,
  type Labels,
  type PrometheusConfig,
  createMetricsRegistry,
  loadPrometheusConfig,
} from './prometheusConfig.js';

export type { Labels } from './prometheusConfig.js';

export interface Counter {
  inc(value?: number, labels?: Labels): void;
}

export interface MetricsCollector {
  counter(name: string, help: string, labelNames?: string[]): Counter;
  getMetricsOutput(): Promise<string>;
  /** Zero every series. Counters already handed out stay registered. */
  reset(): void;
}

/**
 * Creates a MetricsCollector backed by an in-memory MetricsRegistry.
 * Caches counters by name so repeated calls return the same metric.
 */
export function createMetricsCollector(config?: PrometheusConfig): MetricsCollector {
  const resolvedConfig = config ?? loadPrometheusConfig();
  const registry: MetricsRegistry = createMetricsRegistry(resolvedConfig);

  const counters = new Map<string, Counter>();

  return {
    counter(name: string, help: string, labelNames: string[] = []): Counter {
      const existing = counters.get(name);
      if (existing) return existing;

      const raw = registry.registerCounter({ name, help, type: 'counter', labelNames });

      const counter: Counter = {
        inc(value = 1, labels?: Labels) {
          raw.inc(labels, value);
        },
      };

      counters.set(name, counter);
      return counter;
    },

    async getMetricsOutput(): Promise<string> {
      return registry.getMetricsOutput();
    },

    reset() {
      registry.reset();
    },
  };
}
