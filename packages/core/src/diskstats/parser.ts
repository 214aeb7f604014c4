import {
  COUNTER_NAMES,
  DISKSTATS_HEADER_FIELDS,
  MalformedRecordError,
  SECTOR_SIZE_BYTES,
} from '@diskpulse/shared';
import type { CounterName, DiskCounters, StatRecord } from '@diskpulse/shared';

const WHITESPACE = /\s+/;
const UNSIGNED_DECIMAL = /^\d+$/;

/** Columns reported in 512-byte sectors that are published as bytes. */
const SECTOR_COUNTERS: ReadonlySet<CounterName> = new Set<CounterName>(['bytesRead', 'bytesWritten']);

export function zeroCounters(): DiskCounters {
  return {
    successfulReads: 0,
    mergedReads: 0,
    bytesRead: 0,
    readTimeMillis: 0,
    successfulWrites: 0,
    mergedWrites: 0,
    bytesWritten: 0,
    writeTimeMillis: 0,
    inProgressIOPS: 0,
    totalIOMillis: 0,
    weightedIOMillis: 0,
  };
}

export function tokenize(line: string): string[] {
  return line.split(WHITESPACE).filter((token) => token.length > 0);
}

/**
 * Parse one /proc/diskstats line. Major and minor numbers are dropped and any columns
 * after the eleven classic counters (discard and flush stats on newer kernels) are ignored.
 */
export function parseDiskStatsLine(line: string, capturedAtMillis: number): StatRecord {
  const tokens = tokenize(line);

  if (tokens.length < DISKSTATS_HEADER_FIELDS) {
    throw new MalformedRecordError(
      line,
      `expected major, minor and device name, found ${tokens.length} field(s)`,
    );
  }

  const deviceName = tokens[DISKSTATS_HEADER_FIELDS - 1];
  const available = tokens.length - DISKSTATS_HEADER_FIELDS;
  if (available < COUNTER_NAMES.length) {
    throw new MalformedRecordError(
      line,
      `expected ${COUNTER_NAMES.length} counters for ${deviceName}, found ${available}`,
    );
  }

  const counters = zeroCounters();
  COUNTER_NAMES.forEach((name, index) => {
    const token = tokens[DISKSTATS_HEADER_FIELDS + index];
    if (!UNSIGNED_DECIMAL.test(token)) {
      throw new MalformedRecordError(line, `${name} of ${deviceName} is not an unsigned integer: "${token}"`);
    }

    let value = Number(token);
    if (SECTOR_COUNTERS.has(name)) {
      value *= SECTOR_SIZE_BYTES;
    }
    if (!Number.isSafeInteger(value)) {
      throw new MalformedRecordError(line, `${name} of ${deviceName} exceeds the safe integer range`);
    }
    counters[name] = value;
  });

  return { deviceName, counters, capturedAtMillis };
}
