import { describe, it, expect } from 'vitest';
import { acknowledgeInterrupt, IDLE_INTERRUPT, synchronize, wakeInFlight } from '../interrupt';

describe('8008 interrupt synchronizer', () => {
  it('latches a held request on the second clock', () => {
    const first = synchronize(IDLE_INTERRUPT, true);
    expect(first.latched).toBe(false);
    const second = synchronize(first, true);
    expect(second.latched).toBe(true);
  });

  it('latches a request seen at a single clock edge', () => {
    const pulse = synchronize(IDLE_INTERRUPT, true);
    expect(synchronize(pulse, false).latched).toBe(true);
  });

  it('ignores an idle line', () => {
    let sync = IDLE_INTERRUPT;
    for (let i = 0; i < 4; i++) sync = synchronize(sync, false);
    expect(sync).toEqual(IDLE_INTERRUPT);
  });

  it('holds the latch until acknowledged', () => {
    let sync = synchronize(synchronize(IDLE_INTERRUPT, true), false);
    sync = synchronize(sync, false);
    sync = synchronize(sync, false);
    expect(sync.latched).toBe(true);
    expect(acknowledgeInterrupt(sync).latched).toBe(false);
  });

  it('does not relatch a level that stays high after acknowledge', () => {
    let sync = synchronize(synchronize(IDLE_INTERRUPT, true), true);
    sync = acknowledgeInterrupt(sync);
    sync = synchronize(sync, true);
    sync = synchronize(sync, true);
    expect(sync.latched).toBe(false);
  });

  it('latches again on a fresh rising edge', () => {
    let sync = acknowledgeInterrupt(synchronize(synchronize(IDLE_INTERRUPT, true), true));
    sync = synchronize(sync, false);
    sync = synchronize(sync, false);
    sync = synchronize(sync, true);
    sync = synchronize(sync, true);
    expect(sync.latched).toBe(true);
  });

  it('reports a wake-up in flight from the first sampled edge until acknowledge', () => {
    expect(wakeInFlight(IDLE_INTERRUPT)).toBe(false);
    const sampled = synchronize(IDLE_INTERRUPT, true);
    expect(sampled.latched).toBe(false);
    expect(wakeInFlight(sampled)).toBe(true);
    const latched = synchronize(sampled, true);
    expect(wakeInFlight(latched)).toBe(true);
    expect(wakeInFlight(acknowledgeInterrupt(latched))).toBe(false);
  });
});
