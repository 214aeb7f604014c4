// Types
export type {
  CounterName,
  DerivedMetricName,
  DiskCounters,
  StatRecord,
  SnapshotPair,
  IngestionFailure,
  IngestionSummary,
  EventBusMessage,
  DiskStatsRefreshEvent,
  DiskStatsMalformedEvent,
  DiskStatsErrorEvent,
} from './types/index.js';

export { COUNTER_NAMES, DERIVED_METRIC_NAMES } from './types/index.js';

// Constants
export {
  DEFAULT_DISKSTATS_SOURCE,
  DEFAULT_METRIC_PREFIX,
  DEFAULT_REFRESH_INTERVAL,
  TOTAL_DEVICE_NAME,
  SECTOR_SIZE_BYTES,
  DISKSTATS_HEADER_FIELDS,
  MAX_REFRESH_INTERVAL,
} from './constants.js';

// Schemas
export {
  collectorConfigSchema,
  logLevelSchema,
} from './schemas/config.schema.js';

export type { CollectorConfigInput } from './schemas/config.schema.js';

// Utilities
export { resolveCollectorConfig, configFromEnv } from './utils/config.js';
export type { CollectorConfig } from './utils/config.js';

export { createLogger, getLogger, setDefaultLogger, setLogLevel } from './utils/logger.js';
export type { LogLevel, CreateLoggerOptions } from './utils/logger.js';

export {
  DiskPulseError,
  MalformedRecordError,
  AggregatedIngestionError,
  SourceUnavailableError,
  RegistryConflictError,
  ConfigValidationError,
} from './utils/errors.js';
