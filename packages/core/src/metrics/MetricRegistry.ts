import { RegistryConflictError } from '@diskpulse/shared';

/** A pull-based metric: evaluated each time a reader asks for it. */
export interface Gauge {
  read(): number;
}

export interface MetricRegistry {
  getMetrics(): ReadonlyMap<string, Gauge>;
  /** Throws RegistryConflictError when the key is already taken. */
  register(key: string, gauge: Gauge): void;
}

/**
 * Build a dotted metric key from its parts, skipping empty ones.
 * `metricName('linuxstats.diskstats', 'sda', 'iops')` → `linuxstats.diskstats.sda.iops`
 */
export function metricName(...parts: (string | null | undefined)[]): string {
  return parts.filter((part): part is string => typeof part === 'string' && part.length > 0).join('.');
}

export class InMemoryMetricRegistry implements MetricRegistry {
  private metrics: Map<string, Gauge> = new Map();

  getMetrics(): ReadonlyMap<string, Gauge> {
    return this.metrics;
  }

  register(key: string, gauge: Gauge): void {
    if (this.metrics.has(key)) {
      throw new RegistryConflictError(key);
    }
    this.metrics.set(key, gauge);
  }

  /** Evaluate every gauge, sorted by key. */
  readAll(): Record<string, number> {
    const values: Record<string, number> = {};
    for (const key of [...this.metrics.keys()].sort()) {
      const gauge = this.metrics.get(key);
      if (gauge) values[key] = gauge.read();
    }
    return values;
  }
}

let defaultRegistry: InMemoryMetricRegistry | null = null;

export function getMetricRegistry(): InMemoryMetricRegistry {
  if (!defaultRegistry) {
    defaultRegistry = new InMemoryMetricRegistry();
  }
  return defaultRegistry;
}
