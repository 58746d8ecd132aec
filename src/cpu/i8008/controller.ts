/**
 * Machine-cycle controller.
 *
 * A `CycleControl` is the control descriptor for one machine cycle: its
 * type (what goes out on bus[7:6] at T2), what happens on the bus at T3,
 * and the optional execute phase run at T5. The decoder emits a list of
 * these per instruction; the datapath only ever looks at descriptors.
 */

import { conditionHolds, type AluOp, type RotateOp } from './alu';
import { addressPointer } from './registers';
import { ADDRESS_MASK, CycleType, type Condition, type ConditionFlags, type Register, type RegisterFile } from './types';

/** What the T3 data-transfer state does with the bus. */
export type Transfer =
  | 'opcode' // memory (or interrupting device) drives; latched into IR
  | 'low'    // responder drives; latched into the low temp register
  | 'high'   // responder drives; latched into the high temp register
  | 'store'  // CPU drives the low temp register; memory accepts it
  | 'input'  // I/O responder drives; latched into the low temp register
  | 'output'; // CPU drives the accumulator; I/O responder latches it

/** Datapath operation for the T4/T5 execute phase. */
export type ExecuteOp =
  | { kind: 'move'; dst: Register; src: Register | 'temp' }
  | { kind: 'hold'; src: Register }
  | { kind: 'alu'; op: AluOp; operand: Register | 'temp' }
  | { kind: 'step'; reg: Register; delta: 1 | -1 }
  | { kind: 'rotate'; op: RotateOp }
  | { kind: 'jump' }
  | { kind: 'call' }
  | { kind: 'return' }
  | { kind: 'restart'; vector: number }
  | { kind: 'idle' };

export interface CycleControl {
  type: CycleType;
  transfer: Transfer;
  execute: ExecuteOp | null;
  /** When set, the execute phase (and with it T4/T5) only runs if this holds. */
  condition: Condition | null;
}

export interface InstructionControl {
  cycles: readonly CycleControl[];
  /** HLT: the sequencer stops after the last cycle. */
  halts: boolean;
}

/** Control for a cycle-0 fetch before the opcode is known. */
export const OPCODE_FETCH: CycleControl = {
  type: CycleType.Fetch,
  transfer: 'opcode',
  execute: null,
  condition: null,
};

export type CycleLength = 3 | 5;

export const CYCLE_TYPE_NAMES: Readonly<Record<CycleType, string>> = {
  [CycleType.Fetch]: 'PCI',
  [CycleType.Read]: 'PCR',
  [CycleType.Write]: 'PCW',
  [CycleType.Io]: 'PCC',
};

/** Decided at T3, once the opcode and the flags it tests are stable. */
export function cycleLength(control: CycleControl, flags: ConditionFlags): CycleLength {
  if (control.execute === null) return 3;
  if (control.condition !== null && !conditionHolds(flags, control.condition)) return 3;
  return 5;
}

export interface AddressContext {
  pc: number;
  registers: RegisterFile;
  ir: number;
}

/** Memory address for FETCH/READ/WRITE cycles. */
export function cycleAddress(type: CycleType, ctx: AddressContext): number {
  return type === CycleType.Fetch ? ctx.pc & ADDRESS_MASK : addressPointer(ctx.registers);
}

/** Byte the CPU drives during T1/T1I. IO cycles send the accumulator. */
export function t1BusValue(type: CycleType, ctx: AddressContext): number {
  if (type === CycleType.Io) return ctx.registers.a;
  return cycleAddress(type, ctx) & 0xff;
}

/**
 * Byte the CPU drives during T2: cycle type in bits 7..6; the high address
 * bits, or for IO the instruction's bits 5..0 (port number in bits 5..1).
 */
export function t2BusValue(type: CycleType, ctx: AddressContext): number {
  const low6 = type === CycleType.Io ? ctx.ir & 0x3f : (cycleAddress(type, ctx) >> 8) & 0x3f;
  return (type << 6) | low6;
}

export function cycleTypeFromBus(value: number): CycleType {
  switch ((value >> 6) & 0b11) {
    case 0b00: return CycleType.Fetch;
    case 0b01: return CycleType.Read;
    case 0b10: return CycleType.Write;
    default: return CycleType.Io;
  }
}

/** Port number carried in the T2 byte of an IO cycle. */
export function portFromBus(value: number): number {
  return (value >> 1) & 0x1f;
}
