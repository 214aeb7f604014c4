import {
  COUNTER_NAMES,
  DEFAULT_METRIC_PREFIX,
  TOTAL_DEVICE_NAME,
  AggregatedIngestionError,
  MalformedRecordError,
  getLogger,
} from '@diskpulse/shared';
import type { IngestionFailure, IngestionSummary, StatRecord } from '@diskpulse/shared';
import type { MetricRegistry } from '../metrics/MetricRegistry.js';
import { DeviceState } from './DeviceState.js';
import { MetricPublisher } from './MetricPublisher.js';
import { parseDiskStatsLine, zeroCounters } from './parser.js';

const logger = getLogger('diskstats-engine');

export interface DiskStatsEngineOptions {
  registry: MetricRegistry;
  prefix?: string;
}

/**
 * Folds successive /proc/diskstats snapshots into per-device state and keeps the registry's
 * gauges in step with the devices seen so far.
 */
export class DiskStatsEngine {
  private devices: Map<string, DeviceState> = new Map();
  private publisher: MetricPublisher;

  constructor(options: DiskStatsEngineOptions) {
    this.publisher = new MetricPublisher(options.registry, options.prefix ?? DEFAULT_METRIC_PREFIX);
  }

  /**
   * Apply one snapshot of the stats source taken at `now` (epoch ms).
   *
   * Malformed lines, and lines that would push a `total` counter past the safe integer range,
   * are skipped; once every other line and the `total` device have been
   * applied, an AggregatedIngestionError lists them. Any other error is unexpected and
   * propagates immediately.
   */
  ingestSnapshot(lines: readonly string[], now: number): IngestionSummary {
    const totals = zeroCounters();
    const devices: string[] = [];
    const failures: IngestionFailure[] = [];

    lines.forEach((line, index) => {
      if (line.trim().length === 0) return;

      let record: StatRecord;
      try {
        record = parseDiskStatsLine(line, now);
      } catch (err) {
        if (!(err instanceof MalformedRecordError)) throw err;
        failures.push({ lineNumber: index + 1, line, reason: err.reason });
        return;
      }

      const overflow = COUNTER_NAMES.find(
        (counter) => !Number.isSafeInteger(totals[counter] + record.counters[counter]),
      );
      if (overflow) {
        failures.push({
          lineNumber: index + 1,
          line,
          reason: `${overflow} total exceeds the safe integer range at ${record.deviceName}`,
        });
        return;
      }

      for (const counter of COUNTER_NAMES) {
        totals[counter] += record.counters[counter];
      }
      this.apply(record);
      devices.push(record.deviceName);
    });

    this.apply({ deviceName: TOTAL_DEVICE_NAME, counters: totals, capturedAtMillis: now });

    const summary: IngestionSummary = { timestamp: now, devices, failures };
    logger.trace({ devices: devices.length, failures: failures.length }, 'Disk stats ingested');

    if (failures.length > 0) {
      throw new AggregatedIngestionError(summary);
    }
    return summary;
  }

  getDevice(deviceName: string): DeviceState | undefined {
    return this.devices.get(deviceName);
  }

  getDeviceNames(): string[] {
    return Array.from(this.devices.keys());
  }

  private apply(record: StatRecord): void {
    let state = this.devices.get(record.deviceName);
    if (state) {
      state.applySnapshot(record);
    } else {
      state = new DeviceState(record);
      this.devices.set(record.deviceName, state);
    }
    this.publisher.ensureRegistered(state);
  }
}
