/**
 * Checkpoint port.
 *
 * Test programs write a checkpoint number to a dedicated output port
 * (`MVI A,n` / `OUT 31`); the board captures the register file at that
 * moment so a test can assert on it afterwards.
 */

import type { ConditionFlags, I8008State } from '@/cpu/i8008';

export interface CheckpointRecord {
  id: number;
  pc: number;
  a: number;
  b: number;
  c: number;
  d: number;
  e: number;
  h: number;
  l: number;
  flags: ConditionFlags;
}

function hex(value: number, digits: number): string {
  return `0x${value.toString(16).toUpperCase().padStart(digits, '0')}`;
}

const bit = (flag: boolean): string => (flag ? '1' : '0');

/**
 * `CHECKPOINT: ID=3 PC=0x0105 A=0x03 B=0x01 C=0x00 D=0xAA E=0x00 H=0x00 L=0x00 CY=0 Z=0 S=0 P=1`
 */
export function formatCheckpoint(record: CheckpointRecord): string {
  const { id, pc, a, b, c, d, e, h, l, flags } = record;
  return [
    `CHECKPOINT: ID=${id}`,
    `PC=${hex(pc, 4)}`,
    `A=${hex(a, 2)}`,
    `B=${hex(b, 2)}`,
    `C=${hex(c, 2)}`,
    `D=${hex(d, 2)}`,
    `E=${hex(e, 2)}`,
    `H=${hex(h, 2)}`,
    `L=${hex(l, 2)}`,
    `CY=${bit(flags.carry)}`,
    `Z=${bit(flags.zero)}`,
    `S=${bit(flags.sign)}`,
    `P=${bit(flags.parity)}`,
  ].join(' ');
}

export class CheckpointMonitor {
  private records: CheckpointRecord[] = [];

  record(id: number, state: I8008State): CheckpointRecord {
    const { pc, a, b, c, d, e, h, l, flags } = state;
    const record: CheckpointRecord = { id, pc, a, b, c, d, e, h, l, flags: { ...flags } };
    this.records.push(record);
    return record;
  }

  /** First record with this id, as the checkpoint scripts match the first line. */
  get(id: number): CheckpointRecord | undefined {
    return this.records.find((r) => r.id === id);
  }

  all(): readonly CheckpointRecord[] {
    return this.records;
  }

  clear(): void {
    this.records = [];
  }
}
