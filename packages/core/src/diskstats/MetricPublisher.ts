import { COUNTER_NAMES, DERIVED_METRIC_NAMES, DEFAULT_METRIC_PREFIX } from '@diskpulse/shared';
import type { CounterName, DerivedMetricName } from '@diskpulse/shared';
import type { Gauge, MetricRegistry } from '../metrics/MetricRegistry.js';
import { metricName } from '../metrics/MetricRegistry.js';
import type { DeviceState } from './DeviceState.js';
import { DERIVED_METRICS, toCompletePair } from './derived.js';

export function counterGauge(state: DeviceState, counter: CounterName): Gauge {
  return {
    read: () => state.current.counters[counter],
  };
}

export function derivedGauge(state: DeviceState, metric: DerivedMetricName): Gauge {
  const compute = DERIVED_METRICS[metric];
  return {
    read: () => compute(toCompletePair(state.snapshot())),
  };
}

/**
 * Registers gauges for a device as soon as they can be evaluated: the eleven raw counters
 * on first sight, the derived rates once a second snapshot exists.
 */
export class MetricPublisher {
  private registry: MetricRegistry;
  private prefix: string;

  constructor(registry: MetricRegistry, prefix: string = DEFAULT_METRIC_PREFIX) {
    this.registry = registry;
    this.prefix = prefix;
  }

  keyFor(deviceName: string, metric: CounterName | DerivedMetricName): string {
    return metricName(this.prefix, deviceName, metric);
  }

  ensureRegistered(state: DeviceState): void {
    if (!state.absoluteRegistered) {
      for (const counter of COUNTER_NAMES) {
        this.registerAbsent(this.keyFor(state.deviceName, counter), counterGauge(state, counter));
      }
      state.absoluteRegistered = true;
    }

    if (!state.derivedRegistered && state.hasPrevious()) {
      for (const metric of DERIVED_METRIC_NAMES) {
        this.registerAbsent(this.keyFor(state.deviceName, metric), derivedGauge(state, metric));
      }
      state.derivedRegistered = true;
    }
  }

  private registerAbsent(key: string, gauge: Gauge): void {
    if (this.registry.getMetrics().has(key)) return;
    this.registry.register(key, gauge);
  }
}
