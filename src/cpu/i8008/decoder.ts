/**
 * Intel 8008 instruction decoder
 *
 * Opcode layout: cc ddd sss
 *   00  register-immediate, INR/DCR, rotates, RST, Rcc/RET, HLT
 *   01  JMP/Jcc, CALL/Ccc, INP/OUT
 *   10  ALU with register or memory operand
 *   11  MOV (11 111 111 is HLT)
 *
 * Bits an instruction does not use are don't-cares, so several opcodes
 * decode identically (eight RET, eight JMP, eight CALL, HLT at 00/01/FF).
 *
 * Six opcodes have no defined meaning: 0x22, 0x2A, 0x32, 0x3A (rotate
 * slots with bit 5 set) and 0x38, 0x39 (INR/DCR M). They decode to
 * UNDEFINED, which runs as a single 3-state fetch cycle: PC advances past
 * the opcode and nothing else changes.
 */

import type { AluOp, RotateOp } from './alu';
import type { CycleControl, ExecuteOp, InstructionControl } from './controller';
import { OPCODE_FETCH } from './controller';
import {
  CONDITION_FLAGS,
  CycleType,
  REGISTER_FIELD,
  SCRATCHPAD_REGISTERS,
  type Condition,
  type Operand,
  type Register,
} from './types';

export type Instruction =
  | { kind: 'HLT' }
  | { kind: 'UNDEFINED' }
  | { kind: 'MOV'; dst: Operand; src: Operand }
  | { kind: 'MVI'; dst: Operand }
  | { kind: 'INR'; reg: Register }
  | { kind: 'DCR'; reg: Register }
  | { kind: 'ALU'; op: AluOp; src: Operand }
  | { kind: 'ALUI'; op: AluOp }
  | { kind: 'ROTATE'; op: RotateOp }
  | { kind: 'JMP' }
  | { kind: 'JCC'; condition: Condition }
  | { kind: 'CALL' }
  | { kind: 'CCC'; condition: Condition }
  | { kind: 'RET' }
  | { kind: 'RCC'; condition: Condition }
  | { kind: 'RST'; vector: number }
  | { kind: 'INP'; port: number }
  | { kind: 'OUT'; port: number };

export type InstructionKind = Instruction['kind'];

function operand(field: number): Operand {
  return REGISTER_FIELD[field & 7];
}

/** Condition field: bits 4..3 select the flag, bit 5 the polarity. */
function condition(op: number): Condition {
  return {
    flag: CONDITION_FLAGS[(op >> 3) & 3],
    whenSet: (op & 0x20) !== 0,
  };
}

function decodeGroup0(op: number): Instruction {
  const ddd = (op >> 3) & 7;
  switch (op & 7) {
    case 0:
    case 1:
      if (ddd === 0) return { kind: 'HLT' };
      if (ddd === 7) return { kind: 'UNDEFINED' };
      return (op & 1) === 0
        ? { kind: 'INR', reg: SCRATCHPAD_REGISTERS[ddd] }
        : { kind: 'DCR', reg: SCRATCHPAD_REGISTERS[ddd] };
    case 2:
      if (ddd > 3) return { kind: 'UNDEFINED' };
      return { kind: 'ROTATE', op: ddd };
    case 3:
      return { kind: 'RCC', condition: condition(op) };
    case 4:
      return { kind: 'ALUI', op: ddd };
    case 5:
      return { kind: 'RST', vector: ddd };
    case 6:
      return { kind: 'MVI', dst: operand(ddd) };
    default:
      return { kind: 'RET' };
  }
}

function decodeGroup1(op: number): Instruction {
  if ((op & 1) === 1) {
    const port = (op >> 1) & 0x1f;
    return port < 8 ? { kind: 'INP', port } : { kind: 'OUT', port };
  }
  switch (op & 6) {
    case 0: return { kind: 'JCC', condition: condition(op) };
    case 2: return { kind: 'CCC', condition: condition(op) };
    case 4: return { kind: 'JMP' };
    default: return { kind: 'CALL' };
  }
}

export function decode(opcode: number): Instruction {
  const op = opcode & 0xff;
  switch (op >> 6) {
    case 0:
      return decodeGroup0(op);
    case 1:
      return decodeGroup1(op);
    case 2:
      return { kind: 'ALU', op: (op >> 3) & 7, src: operand(op) };
    default:
      if (op === 0xff) return { kind: 'HLT' };
      return { kind: 'MOV', dst: operand(op >> 3), src: operand(op) };
  }
}

/** Total bytes: opcode plus immediate or address operands. */
export function instructionLength(instr: Instruction): 1 | 2 | 3 {
  switch (instr.kind) {
    case 'MVI':
    case 'ALUI':
      return 2;
    case 'JMP':
    case 'JCC':
    case 'CALL':
    case 'CCC':
      return 3;
    default:
      return 1;
  }
}

// --- Control descriptors ---

function fetchCycle(execute: ExecuteOp | null, condition: Condition | null = null): CycleControl {
  return { ...OPCODE_FETCH, execute, condition };
}

function cycle(type: CycleType, transfer: CycleControl['transfer'], execute: ExecuteOp | null = null, cond: Condition | null = null): CycleControl {
  return { type, transfer, execute, condition: cond };
}

/** Opcode fetch, low address byte, then high address byte with `execute`. */
function addressed(execute: ExecuteOp, cond: Condition | null): CycleControl[] {
  return [
    fetchCycle(null),
    cycle(CycleType.Fetch, 'low'),
    cycle(CycleType.Fetch, 'high', execute, cond),
  ];
}

/** The machine cycles an instruction runs, in order. Cycle 0 is always the opcode fetch. */
export function instructionControl(instr: Instruction): InstructionControl {
  switch (instr.kind) {
    case 'HLT':
      return { cycles: [fetchCycle(null)], halts: true };

    case 'UNDEFINED':
      return { cycles: [fetchCycle(null)], halts: false };

    case 'MOV': {
      const { dst, src } = instr;
      if (src === 'm' && dst !== 'm') {
        return {
          cycles: [fetchCycle(null), cycle(CycleType.Read, 'low', { kind: 'move', dst, src: 'temp' })],
          halts: false,
        };
      }
      if (dst === 'm' && src !== 'm') {
        return {
          cycles: [fetchCycle({ kind: 'hold', src }), cycle(CycleType.Write, 'store')],
          halts: false,
        };
      }
      // 11 111 111 never gets here; decode() maps it to HLT
      if (dst === 'm' || src === 'm') return { cycles: [fetchCycle(null)], halts: true };
      return { cycles: [fetchCycle({ kind: 'move', dst, src })], halts: false };
    }

    case 'MVI': {
      const { dst } = instr;
      if (dst === 'm') {
        return {
          cycles: [fetchCycle(null), cycle(CycleType.Fetch, 'low'), cycle(CycleType.Write, 'store')],
          halts: false,
        };
      }
      return {
        cycles: [fetchCycle(null), cycle(CycleType.Fetch, 'low', { kind: 'move', dst, src: 'temp' })],
        halts: false,
      };
    }

    case 'INR':
      return { cycles: [fetchCycle({ kind: 'step', reg: instr.reg, delta: 1 })], halts: false };

    case 'DCR':
      return { cycles: [fetchCycle({ kind: 'step', reg: instr.reg, delta: -1 })], halts: false };

    case 'ALU': {
      const { op, src } = instr;
      if (src === 'm') {
        return {
          cycles: [fetchCycle(null), cycle(CycleType.Read, 'low', { kind: 'alu', op, operand: 'temp' })],
          halts: false,
        };
      }
      return { cycles: [fetchCycle({ kind: 'alu', op, operand: src })], halts: false };
    }

    case 'ALUI':
      return {
        cycles: [fetchCycle(null), cycle(CycleType.Fetch, 'low', { kind: 'alu', op: instr.op, operand: 'temp' })],
        halts: false,
      };

    case 'ROTATE':
      return { cycles: [fetchCycle({ kind: 'rotate', op: instr.op })], halts: false };

    case 'JMP':
      return { cycles: addressed({ kind: 'jump' }, null), halts: false };

    case 'JCC':
      return { cycles: addressed({ kind: 'jump' }, instr.condition), halts: false };

    case 'CALL':
      return { cycles: addressed({ kind: 'call' }, null), halts: false };

    case 'CCC':
      return { cycles: addressed({ kind: 'call' }, instr.condition), halts: false };

    case 'RET':
      return { cycles: [fetchCycle({ kind: 'return' })], halts: false };

    case 'RCC':
      return { cycles: [fetchCycle({ kind: 'return' }, instr.condition)], halts: false };

    case 'RST':
      return { cycles: [fetchCycle({ kind: 'restart', vector: instr.vector })], halts: false };

    case 'INP':
      return {
        cycles: [fetchCycle(null), cycle(CycleType.Io, 'input', { kind: 'move', dst: 'a', src: 'temp' })],
        halts: false,
      };

    case 'OUT':
      return {
        cycles: [fetchCycle(null), cycle(CycleType.Io, 'output', { kind: 'idle' })],
        halts: false,
      };
  }
}

// Every opcode's descriptor, built once at load.
const DECODE_TABLE: readonly Instruction[] = Array.from({ length: 256 }, (_, op) => decode(op));
const CONTROL_TABLE: readonly InstructionControl[] = DECODE_TABLE.map(instructionControl);

export function decodeCached(opcode: number): { instruction: Instruction; control: InstructionControl } {
  const op = opcode & 0xff;
  return { instruction: DECODE_TABLE[op], control: CONTROL_TABLE[op] };
}
