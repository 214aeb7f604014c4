import { describe, it, expect } from 'vitest';
import type { StatRecord } from '@diskpulse/shared';
import { DeviceState } from '../diskstats/DeviceState.js';
import { zeroCounters } from '../diskstats/parser.js';

function record(deviceName: string, successfulReads: number, capturedAtMillis: number): StatRecord {
  return {
    deviceName,
    counters: { ...zeroCounters(), successfulReads },
    capturedAtMillis,
  };
}

describe('DeviceState', () => {
  it('should start with no previous snapshot', () => {
    const state = new DeviceState(record('sda', 10, 1000));

    expect(state.deviceName).toBe('sda');
    expect(state.current.counters.successfulReads).toBe(10);
    expect(state.previous).toBeNull();
    expect(state.hasPrevious()).toBe(false);
    expect(state.absoluteRegistered).toBe(false);
    expect(state.derivedRegistered).toBe(false);
  });

  it('should shift current into previous on each snapshot', () => {
    const state = new DeviceState(record('sda', 10, 1000));

    state.applySnapshot(record('sda', 20, 2000));
    expect(state.previous?.counters.successfulReads).toBe(10);
    expect(state.current.counters.successfulReads).toBe(20);

    state.applySnapshot(record('sda', 35, 3000));
    expect(state.previous?.counters.successfulReads).toBe(20);
    expect(state.previous?.capturedAtMillis).toBe(2000);
    expect(state.current.counters.successfulReads).toBe(35);
    expect(state.current.capturedAtMillis).toBe(3000);
  });

  it('should leave a pair taken earlier untouched by later snapshots', () => {
    const state = new DeviceState(record('sda', 10, 1000));
    state.applySnapshot(record('sda', 20, 2000));

    const held = state.snapshot();
    state.applySnapshot(record('sda', 30, 3000));

    expect(held.previous?.counters.successfulReads).toBe(10);
    expect(held.current.counters.successfulReads).toBe(20);
    expect(state.snapshot()).not.toBe(held);
  });

  it('should copy counters so later changes to the input do not leak in', () => {
    const input = { ...zeroCounters(), successfulReads: 5 };
    const state = new DeviceState({ deviceName: 'sda', counters: input, capturedAtMillis: 0 });

    input.successfulReads = 500;

    expect(state.current.counters.successfulReads).toBe(5);
    expect(Object.isFrozen(state.current.counters)).toBe(true);
    expect(Object.isFrozen(state.snapshot())).toBe(true);
  });

  it('should reject a snapshot for another device', () => {
    const state = new DeviceState(record('sda', 10, 1000));
    expect(() => state.applySnapshot(record('sdb', 10, 2000))).toThrow(
      'Snapshot for sdb applied to device state of sda',
    );
    expect(state.previous).toBeNull();
  });
});
