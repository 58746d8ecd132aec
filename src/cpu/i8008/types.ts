/**
 * Intel 8008 CPU Types
 *
 * The 8008 has:
 * - Scratchpad registers: A (accumulator), B, C, D, E, H, L
 * - H:L doubles as the 14-bit memory pointer (pseudo-register M)
 * - Flags: carry, zero, sign, parity (no aux carry, no flag register byte)
 * - 14-bit program counter and an 8-level on-chip address stack
 * - T-states T1, T1I, T2, WAIT, T3, T4, T5 and STOPPED
 */

/** Memory/I/O interfaces shared with the bus layer. */
export {
  CycleType,
  type Memory,
  type IOBus,
  type InterruptResponder,
  NullIOBus,
  RestartResponder,
  restartOpcode,
} from '@/cpu/types';

export const ADDRESS_MASK = 0x3fff;
export const ADDRESS_SPACE = 0x4000; // 16K
export const STACK_DEPTH = 8;

export enum TState {
  Stopped = 'STOPPED',
  Wait = 'WAIT',
  T1 = 'T1',
  T1I = 'T1I',
  T2 = 'T2',
  T3 = 'T3',
  T4 = 'T4',
  T5 = 'T5',
}

/** S2 S1 S0 output encoding of each state. */
export const STATE_CODES: Readonly<Record<TState, number>> = {
  [TState.T1]: 0b010,
  [TState.T1I]: 0b110,
  [TState.T2]: 0b100,
  [TState.Wait]: 0b000,
  [TState.T3]: 0b001,
  [TState.Stopped]: 0b011,
  [TState.T4]: 0b111,
  [TState.T5]: 0b101,
};

/** Scratchpad register names, in opcode field order (000 = A ... 110 = L). */
export type Register = 'a' | 'b' | 'c' | 'd' | 'e' | 'h' | 'l';

/** A 3-bit register field: a scratchpad register or M (111). */
export type Operand = Register | 'm';

export const SCRATCHPAD_REGISTERS: readonly Register[] = ['a', 'b', 'c', 'd', 'e', 'h', 'l'];

export const REGISTER_FIELD: readonly Operand[] = [...SCRATCHPAD_REGISTERS, 'm'];

export type RegisterFile = Readonly<Record<Register, number>>;

export interface ConditionFlags {
  carry: boolean;
  zero: boolean;
  sign: boolean;
  parity: boolean;
}

export type FlagName = keyof ConditionFlags;

/** Flag tested by a condition field: 00 carry, 01 zero, 10 sign, 11 parity. */
export const CONDITION_FLAGS: readonly FlagName[] = ['carry', 'zero', 'sign', 'parity'];

/** Jcc/Ccc/Rcc condition: jump when `flag` equals `whenSet`. */
export interface Condition {
  flag: FlagName;
  whenSet: boolean;
}

export interface AddressStack {
  readonly slots: readonly number[];
  readonly pointer: number;
}

/** Snapshot of all 8008 programmer-visible state. */
export interface I8008State {
  a: number;
  b: number;
  c: number;
  d: number;
  e: number;
  h: number;
  l: number;
  pc: number;
  flags: ConditionFlags;
  stack: AddressStack;

  // Sequencer state
  state: TState;
  ir: number;
  ticks: number;
  halted: boolean;
  interruptLatched: boolean;
}

/** External inputs sampled once per tick. */
export interface TickInputs {
  ready: boolean;
  interruptRequest: boolean;
}
