/**
 * Bounded per-tick state trace, the software counterpart of a logic
 * analyzer on S2..S0, SYNC and D7..D0.
 */

import { CYCLE_TYPE_NAMES, type TickOutputs } from '@/cpu/i8008';

export interface TraceEntry extends TickOutputs {
  tick: number;
  /** PC at the start of the tick. */
  pc: number;
}

export class StateTrace {
  private buffer: TraceEntry[] = [];

  constructor(readonly capacity: number) {}

  push(entry: TraceEntry): void {
    if (this.capacity === 0) return;
    if (this.buffer.length === this.capacity) this.buffer.shift();
    this.buffer.push(entry);
  }

  entries(): readonly TraceEntry[] {
    return this.buffer;
  }

  clear(): void {
    this.buffer = [];
  }
}

/** `   42 T1I     PCI bus=0x59 drv=cpu       pc=0x0059` */
export function formatTraceEntry(entry: TraceEntry): string {
  const cycle = entry.cycleType === null ? '---' : CYCLE_TYPE_NAMES[entry.cycleType];
  const bus = entry.bus === null ? '----' : `0x${entry.bus.toString(16).toUpperCase().padStart(2, '0')}`;
  const pc = `0x${entry.pc.toString(16).toUpperCase().padStart(4, '0')}`;
  return `${String(entry.tick).padStart(5)} ${entry.state.padEnd(7)} ${cycle} bus=${bus} drv=${entry.driver.padEnd(9)} pc=${pc}`;
}
