/**
 * Prometheus Registry Configuration
 *
 * In-process, Prometheus-compatible counter registry rendering the text
 * exposition format. Configurable via environment variables.
 */

export interface PrometheusConfig {
  /** Prepended to every metric name. */
  prefix: string;
  /** Labels added to every sample. Sample labels win on conflict. */
  defaultLabels: Record<string, string>;
}

export function loadPrometheusConfig(env: NodeJS.ProcessEnv = process.env): PrometheusConfig {
  const defaultLabelsEnv = env['PROMETHEUS_DEFAULT_LABELS'] ?? '';
  const defaultLabels: Record<string, string> = {};

  if (defaultLabelsEnv) {
    for (const pair of defaultLabelsEnv.split(',')) {
      const [key, value] = pair.split('=');
      if (key && value) {
        defaultLabels[key.trim()] = value.trim();
      }
    }
  }

  return {
    prefix: env['PROMETHEUS_PREFIX'] ?? 'alertbridge_',
    defaultLabels,
  };
}

export type Labels = Record<string, string>;

export interface MetricDefinition {
  name: string;
  help: string;
  type: 'counter';
  labelNames: string[];
}

/**
 * Abstraction over a Prometheus-compatible metrics registry.
 */
export interface MetricsRegistry {
  registerCounter(def: MetricDefinition): CounterMetric;
  getMetricsOutput(): Promise<string>;
  /** Drop every sample; registered metrics and their handles stay valid. */
  reset(): void;
}

export interface CounterMetric {
  inc(labels?: Labels, value?: number): void;
}

/** Escape a label value for the text exposition format. */
export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

/**
 * Create the in-memory registry. Increments are synchronous map updates,
 * so concurrent requests on the event loop never lose one.
 */
export function createMetricsRegistry(config: PrometheusConfig): MetricsRegistry {
  const metrics = new Map<string, { def: MetricDefinition; values: Map<string, number> }>();

  function labelsKey(labels?: Labels): string {
    const merged = { ...config.defaultLabels, ...labels };
    return Object.entries(merged)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}="${escapeLabelValue(v)}"`)
      .join(',');
  }

  return {
    registerCounter(def: MetricDefinition): CounterMetric {
      const existing = metrics.get(def.name);
      const entry = existing ?? { def, values: new Map<string, number>() };
      metrics.set(def.name, entry);
      return {
        inc(labels?: Labels, value = 1) {
          if (value < 0) {
            throw new RangeError(`counter ${def.name} cannot be decreased`);
          }
          const key = labelsKey(labels);
          entry.values.set(key, (entry.values.get(key) ?? 0) + value);
        },
      };
    },

    async getMetricsOutput(): Promise<string> {
      const lines: string[] = [];
      for (const [name, entry] of metrics) {
        lines.push(`# HELP ${config.prefix}${name} ${entry.def.help}`);
        lines.push(`# TYPE ${config.prefix}${name} ${entry.def.type}`);
        for (const [labelKey, value] of entry.values) {
          if (labelKey === '') {
            lines.push(`${config.prefix}${name} ${value}`);
          } else {
            lines.push(`${config.prefix}${name}{${labelKey}} ${value}`);
          }
        }
      }
      return lines.length > 0 ? lines.join('\n') + '\n' : '';
    },

    reset() {
      for (const entry of metrics.values()) {
        entry.values.clear();
      }
    },
  };
}
