import type { SnapshotPair, StatRecord } from '@diskpulse/shared';

function freezeRecord(record: StatRecord): StatRecord {
  return Object.freeze({
    deviceName: record.deviceName,
    counters: Object.freeze({ ...record.counters }),
    capturedAtMillis: record.capturedAtMillis,
  });
}

/**
 * Latest and previous snapshot of one device.
 *
 * The pair is replaced as a single frozen object on every update, so anything holding
 * the result of {@link snapshot} keeps a consistent (current, previous) view even while
 * newer snapshots are applied.
 */
export class DeviceState {
  readonly deviceName: string;
  absoluteRegistered: boolean = false;
  derivedRegistered: boolean = false;
  private pair: Readonly<SnapshotPair>;

  constructor(record: StatRecord) {
    this.deviceName = record.deviceName;
    this.pair = Object.freeze({ current: freezeRecord(record), previous: null });
  }

  get current(): StatRecord {
    return this.pair.current;
  }

  get previous(): StatRecord | null {
    return this.pair.previous;
  }

  hasPrevious(): boolean {
    return this.pair.previous !== null;
  }

  snapshot(): Readonly<SnapshotPair> {
    return this.pair;
  }

  applySnapshot(record: StatRecord): void {
    if (record.deviceName !== this.deviceName) {
      throw new Error(
        `Snapshot for ${record.deviceName} applied to device state of ${this.deviceName}`,
      );
    }
    this.pair = Object.freeze({ current: freezeRecord(record), previous: this.pair.current });
  }
}
