export type {
  CounterName,
  DerivedMetricName,
  DiskCounters,
  StatRecord,
  SnapshotPair,
  IngestionFailure,
  IngestionSummary,
} from './diskstats.js';

export { COUNTER_NAMES, DERIVED_METRIC_NAMES } from './diskstats.js';

export type {
  EventBusMessage,
  DiskStatsRefreshEvent,
  DiskStatsMalformedEvent,
  DiskStatsErrorEvent,
} from './events.js';
