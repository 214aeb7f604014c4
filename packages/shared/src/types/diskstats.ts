/**
 * Counter columns of /proc/diskstats after the major, minor and device-name columns,
 * in source order. `bytesRead` and `bytesWritten` are sector counts in the source.
 *
 * See https://www.kernel.org/doc/Documentation/ABI/testing/procfs-diskstats
 */
export const COUNTER_NAMES = [
  'successfulReads',
  'mergedReads',
  'bytesRead',
  'readTimeMillis',
  'successfulWrites',
  'mergedWrites',
  'bytesWritten',
  'writeTimeMillis',
  'inProgressIOPS',
  'totalIOMillis',
  'weightedIOMillis',
] as const;

export type CounterName = (typeof COUNTER_NAMES)[number];

export const DERIVED_METRIC_NAMES = [
  'iops',
  'readThroughput',
  'writeThroughput',
  'mergedReadFraction',
  'mergedWriteFraction',
  'ioReadTimeFraction',
  'ioWriteTimeFraction',
] as const;

export type DerivedMetricName = (typeof DERIVED_METRIC_NAMES)[number];

export type DiskCounters = Record<CounterName, number>;

export interface StatRecord {
  deviceName: string;
  counters: Readonly<DiskCounters>;
  capturedAtMillis: number;
}

export interface SnapshotPair {
  current: StatRecord;
  previous: StatRecord | null;
}

export interface IngestionFailure {
  lineNumber: number;
  line: string;
  reason: string;
}

export interface IngestionSummary {
  timestamp: number;
  devices: string[];
  failures: IngestionFailure[];
}
