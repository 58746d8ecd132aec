/**
 * 8008 disassembler ("new" mnemonics: MOV/MVI/ADD/JMP/...).
 */

import { decode, instructionLength, type Instruction } from './decoder';
import { ADDRESS_MASK, type Condition, type FlagName, type Operand } from './types';

const ALU_NAMES = ['ADD', 'ADC', 'SUB', 'SBB', 'ANA', 'XRA', 'ORA', 'CMP'] as const;
const ALU_IMMEDIATE_NAMES = ['ADI', 'ACI', 'SUI', 'SBI', 'ANI', 'XRI', 'ORI', 'CPI'] as const;
const ROTATE_NAMES = ['RLC', 'RRC', 'RAL', 'RAR'] as const;

// [when clear, when set]
const CONDITION_SUFFIX: Readonly<Record<FlagName, readonly [string, string]>> = {
  carry: ['NC', 'C'],
  zero: ['NZ', 'Z'],
  sign: ['P', 'M'],
  parity: ['PO', 'PE'],
};

function hexByte(value: number): string {
  return `${(value & 0xff).toString(16).toUpperCase().padStart(2, '0')}h`;
}

function hexWord(value: number): string {
  return `${(value & ADDRESS_MASK).toString(16).toUpperCase().padStart(4, '0')}h`;
}

function reg(op: Operand): string {
  return op.toUpperCase();
}

function suffix(condition: Condition): string {
  return CONDITION_SUFFIX[condition.flag][condition.whenSet ? 1 : 0];
}

/**
 * Text for a decoded instruction. `operands` holds the bytes after the
 * opcode (immediate, or address low/high); missing bytes read as zero.
 */
export function formatInstruction(instr: Instruction, operands: readonly number[] = [], opcode = 0): string {
  const imm = operands[0] ?? 0;
  const address = ((operands[1] ?? 0) << 8) | imm;

  switch (instr.kind) {
    case 'HLT': return 'HLT';
    case 'UNDEFINED': return `DB ${hexByte(opcode)}`;
    case 'MOV': return `MOV ${reg(instr.dst)},${reg(instr.src)}`;
    case 'MVI': return `MVI ${reg(instr.dst)},${hexByte(imm)}`;
    case 'INR': return `INR ${reg(instr.reg)}`;
    case 'DCR': return `DCR ${reg(instr.reg)}`;
    case 'ALU': return `${ALU_NAMES[instr.op]} ${reg(instr.src)}`;
    case 'ALUI': return `${ALU_IMMEDIATE_NAMES[instr.op]} ${hexByte(imm)}`;
    case 'ROTATE': return ROTATE_NAMES[instr.op];
    case 'JMP': return `JMP ${hexWord(address)}`;
    case 'JCC': return `J${suffix(instr.condition)} ${hexWord(address)}`;
    case 'CALL': return `CALL ${hexWord(address)}`;
    case 'CCC': return `C${suffix(instr.condition)} ${hexWord(address)}`;
    case 'RET': return 'RET';
    case 'RCC': return `R${suffix(instr.condition)}`;
    case 'RST': return `RST ${instr.vector}`;
    case 'INP': return `IN ${instr.port}`;
    case 'OUT': return `OUT ${instr.port}`;
  }
}

export interface Disassembly {
  address: number;
  bytes: number[];
  text: string;
}

/** Disassemble the instruction at `address` using a side-effect-free reader. */
export function disassemble(peek: (address: number) => number, address: number): Disassembly {
  const opcode = peek(address & ADDRESS_MASK) & 0xff;
  const instr = decode(opcode);
  const bytes = [opcode];
  for (let i = 1; i < instructionLength(instr); i++) {
    bytes.push(peek((address + i) & ADDRESS_MASK) & 0xff);
  }
  return {
    address: address & ADDRESS_MASK,
    bytes,
    text: formatInstruction(instr, bytes.slice(1), opcode),
  };
}
