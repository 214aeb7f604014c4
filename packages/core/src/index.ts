// Disk stats engine
export { DiskStatsEngine } from './diskstats/DiskStatsEngine.js';
export type { DiskStatsEngineOptions } from './diskstats/DiskStatsEngine.js';
export { DeviceState } from './diskstats/DeviceState.js';
export { MetricPublisher, counterGauge, derivedGauge } from './diskstats/MetricPublisher.js';
export { parseDiskStatsLine, tokenize, zeroCounters } from './diskstats/parser.js';
export {
  DERIVED_METRICS,
  toCompletePair,
  elapsedMillis,
  elapsedSeconds,
  newReads,
  newWrites,
  newReadBytes,
  newWriteBytes,
  iops,
  readThroughput,
  writeThroughput,
  mergedReadFraction,
  mergedWriteFraction,
  ioReadTimeFraction,
  ioWriteTimeFraction,
} from './diskstats/derived.js';
export type { CompletePair } from './diskstats/derived.js';

// Metrics
export { InMemoryMetricRegistry, getMetricRegistry, metricName } from './metrics/MetricRegistry.js';
export type { Gauge, MetricRegistry } from './metrics/MetricRegistry.js';
export { DiskStatsCollector } from './metrics/DiskStatsCollector.js';
export type { DiskStatsCollectorOptions } from './metrics/DiskStatsCollector.js';

// Events
export { EventBus, getEventBus } from './events/EventBus.js';
export type { EventName } from './events/EventBus.js';

// Daemon
export { DiskPulseDaemon } from './daemon/Daemon.js';
export type { DiskPulseDaemonOptions } from './daemon/Daemon.js';
