import { describe, it, expect } from 'vitest';
import { RegistryConflictError } from '@diskpulse/shared';
import { InMemoryMetricRegistry, getMetricRegistry, metricName } from '../metrics/MetricRegistry.js';

describe('metricName', () => {
  it('should join parts with dots', () => {
    expect(metricName('linuxstats.diskstats', 'sda', 'iops')).toBe('linuxstats.diskstats.sda.iops');
  });

  it('should skip empty and missing parts', () => {
    expect(metricName('', 'sda', undefined, null, 'bytesRead')).toBe('sda.bytesRead');
  });
});

describe('InMemoryMetricRegistry', () => {
  it('should register and look up gauges', () => {
    const registry = new InMemoryMetricRegistry();
    registry.register('a.b', { read: () => 3 });

    expect(registry.getMetrics().size).toBe(1);
    expect(registry.getMetrics().get('a.b')?.read()).toBe(3);
  });

  it('should reject a duplicate key', () => {
    const registry = new InMemoryMetricRegistry();
    registry.register('a.b', { read: () => 3 });

    expect(() => registry.register('a.b', { read: () => 4 })).toThrow(RegistryConflictError);
    expect(registry.getMetrics().get('a.b')?.read()).toBe(3);
  });

  it('should evaluate every gauge sorted by key', () => {
    const registry = new InMemoryMetricRegistry();
    let value = 1;
    registry.register('z.last', { read: () => value });
    registry.register('a.first', { read: () => 10 });

    expect(registry.readAll()).toEqual({ 'a.first': 10, 'z.last': 1 });
    expect(Object.keys(registry.readAll())).toEqual(['a.first', 'z.last']);

    value = 2;
    expect(registry.readAll()['z.last']).toBe(2);
  });
});

describe('getMetricRegistry', () => {
  it('should return the same process-wide instance', () => {
    expect(getMetricRegistry()).toBe(getMetricRegistry());
  });
});
