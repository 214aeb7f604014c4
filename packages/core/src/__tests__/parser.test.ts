import { describe, it, expect } from 'vitest';
import { COUNTER_NAMES, MalformedRecordError } from '@diskpulse/shared';
import { parseDiskStatsLine, tokenize, zeroCounters } from '../diskstats/parser.js';
import { VDA_LINE } from './fixtures/diskstats.js';

function reasonOf(line: string): string {
  try {
    parseDiskStatsLine(line, 0);
  } catch (err) {
    if (err instanceof MalformedRecordError) return err.reason;
    throw err;
  }
  throw new Error('expected parse to fail');
}

describe('tokenize', () => {
  it('should split on runs of whitespace and drop empty tokens', () => {
    expect(tokenize('  253\t 0   vda  ')).toEqual(['253', '0', 'vda']);
  });

  it('should return no tokens for a blank line', () => {
    expect(tokenize('   ')).toEqual([]);
  });
});

describe('zeroCounters', () => {
  it('should contain every counter set to zero', () => {
    const counters = zeroCounters();
    expect(Object.keys(counters)).toEqual([...COUNTER_NAMES]);
    expect(Object.values(counters).every((value) => value === 0)).toBe(true);
  });
});

describe('parseDiskStatsLine', () => {
  it('should read the device name and all eleven counters', () => {
    const record = parseDiskStatsLine(VDA_LINE, 1_700_000_000_000);

    expect(record.deviceName).toBe('vda');
    expect(record.capturedAtMillis).toBe(1_700_000_000_000);
    expect(record.counters).toEqual({
      successfulReads: 6162,
      mergedReads: 28,
      bytesRead: 31337472,
      readTimeMillis: 2628,
      successfulWrites: 2741,
      mergedWrites: 1788,
      bytesWritten: 48783360,
      writeTimeMillis: 12848,
      inProgressIOPS: 0,
      totalIOMillis: 3400,
      weightedIOMillis: 15464,
    });
  });

  it('should convert sector columns to bytes', () => {
    const record = parseDiskStatsLine('8 0 sda 0 0 1 0 0 0 2 0 0 0 0', 0);
    expect(record.counters.bytesRead).toBe(512);
    expect(record.counters.bytesWritten).toBe(1024);
  });

  it('should ignore discard and flush columns reported by newer kernels', () => {
    const record = parseDiskStatsLine(
      '   8       0 sda 100 2 800 40 50 3 400 20 0 60 60 7 0 16 1 9 2',
      0,
    );
    expect(record.counters.successfulReads).toBe(100);
    expect(record.counters.weightedIOMillis).toBe(60);
  });

  it('should accept tabs between columns', () => {
    const record = parseDiskStatsLine('8\t16\tsdb\t1\t0\t8\t1\t0\t0\t0\t0\t0\t1\t1', 0);
    expect(record.deviceName).toBe('sdb');
    expect(record.counters.bytesRead).toBe(4096);
  });

  it('should fail when the device header is incomplete', () => {
    expect(() => parseDiskStatsLine('8 0', 0)).toThrow(MalformedRecordError);
    expect(reasonOf('8 0')).toBe('expected major, minor and device name, found 2 field(s)');
  });

  it('should fail when fewer than eleven counters follow the device name', () => {
    expect(reasonOf('8 0 sda 1 2 3')).toBe('expected 11 counters for sda, found 3');
  });

  it('should fail on a non-numeric counter', () => {
    expect(reasonOf('8 0 sda 1 2 x 4 5 6 7 8 9 10 11')).toBe(
      'bytesRead of sda is not an unsigned integer: "x"',
    );
  });

  it('should fail on a negative counter', () => {
    expect(reasonOf('8 0 sda -1 2 3 4 5 6 7 8 9 10 11')).toBe(
      'successfulReads of sda is not an unsigned integer: "-1"',
    );
  });

  it('should fail on a hexadecimal counter', () => {
    expect(reasonOf('8 0 sda 0x1f 2 3 4 5 6 7 8 9 10 11')).toBe(
      'successfulReads of sda is not an unsigned integer: "0x1f"',
    );
  });

  it('should fail when the byte conversion leaves the safe integer range', () => {
    expect(reasonOf('8 0 sda 1 2 9007199254740991 4 5 6 7 8 9 10 11')).toBe(
      'bytesRead of sda exceeds the safe integer range',
    );
  });

  it('should keep the offending line on the error', () => {
    try {
      parseDiskStatsLine('8 0 sda 1', 0);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedRecordError);
      if (err instanceof MalformedRecordError) {
        expect(err.line).toBe('8 0 sda 1');
        expect(err.code).toBe('MALFORMED_RECORD');
      }
    }
  });
});
