import type { DerivedMetricName, SnapshotPair, StatRecord } from '@diskpulse/shared';

/** A snapshot pair with both sides present. */
export interface CompletePair {
  current: StatRecord;
  previous: StatRecord;
}

export function toCompletePair(pair: Readonly<SnapshotPair>): CompletePair {
  if (pair.previous === null) {
    throw new Error(`Derived metrics for ${pair.current.deviceName} need two snapshots`);
  }
  return { current: pair.current, previous: pair.previous };
}

export function elapsedMillis({ current, previous }: CompletePair): number {
  return current.capturedAtMillis - previous.capturedAtMillis;
}

export function elapsedSeconds(pair: CompletePair): number {
  return elapsedMillis(pair) / 1000.0;
}

export function newReads({ current, previous }: CompletePair): number {
  return current.counters.successfulReads - previous.counters.successfulReads;
}

export function newWrites({ current, previous }: CompletePair): number {
  return current.counters.successfulWrites - previous.counters.successfulWrites;
}

export function newReadBytes({ current, previous }: CompletePair): number {
  return current.counters.bytesRead - previous.counters.bytesRead;
}

export function newWriteBytes({ current, previous }: CompletePair): number {
  return current.counters.bytesWritten - previous.counters.bytesWritten;
}

export function iops(pair: CompletePair): number {
  return (newReads(pair) + newWrites(pair)) / elapsedSeconds(pair);
}

/** B/s */
export function readThroughput(pair: CompletePair): number {
  return newReadBytes(pair) / elapsedSeconds(pair);
}

/** B/s */
export function writeThroughput(pair: CompletePair): number {
  return newWriteBytes(pair) / elapsedSeconds(pair);
}

/** 0 when there were no new reads. */
export function mergedReadFraction(pair: CompletePair): number {
  const reads = newReads(pair);
  if (reads === 0) return 0.0;
  return (pair.current.counters.mergedReads - pair.previous.counters.mergedReads) / reads;
}

/** 0 when there were no new writes. */
export function mergedWriteFraction(pair: CompletePair): number {
  const writes = newWrites(pair);
  if (writes === 0) return 0.0;
  return (pair.current.counters.mergedWrites - pair.previous.counters.mergedWrites) / writes;
}

// Time fractions are left unguarded: equal timestamps give NaN or Infinity.
export function ioReadTimeFraction(pair: CompletePair): number {
  return (pair.current.counters.readTimeMillis - pair.previous.counters.readTimeMillis) / elapsedMillis(pair);
}

export function ioWriteTimeFraction(pair: CompletePair): number {
  return (pair.current.counters.writeTimeMillis - pair.previous.counters.writeTimeMillis) / elapsedMillis(pair);
}

export const DERIVED_METRICS: Readonly<Record<DerivedMetricName, (pair: CompletePair) => number>> = {
  iops,
  readThroughput,
  writeThroughput,
  mergedReadFraction,
  mergedWriteFraction,
  ioReadTimeFraction,
  ioWriteTimeFraction,
};
