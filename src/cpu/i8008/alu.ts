/**
 * 8008 ALU and condition flags.
 *
 * Pure functions of (operation, accumulator, operand, flags). The ALU has no
 * idea which instruction asked for the operation; the decoder picks the
 * operation code and the datapath supplies the operand.
 */

import type { Condition, ConditionFlags } from './types';

/** ALU operation field (bits 5..3 of ALU and immediate opcodes). */
export enum AluOp {
  Add = 0,
  AddWithCarry = 1,
  Subtract = 2,
  SubtractWithBorrow = 3,
  And = 4,
  Xor = 5,
  Or = 6,
  Compare = 7,
}

/** Rotate field (bits 4..3 of 00 0rr 010). */
export enum RotateOp {
  LeftCircular = 0,  // RLC
  RightCircular = 1, // RRC
  LeftThroughCarry = 2,  // RAL
  RightThroughCarry = 3, // RAR
}

export interface AluResult {
  value: number;
  flags: ConditionFlags;
  /** False for CMP: flags only, accumulator untouched. */
  writeBack: boolean;
}

// Precomputed parity table: 1 if byte has even number of 1-bits
const PARITY_EVEN: Uint8Array = (() => {
  const table = new Uint8Array(256);
  for (let i = 0; i < 256; i++) {
    let bits = i;
    let count = 0;
    while (bits) {
      count += bits & 1;
      bits >>= 1;
    }
    table[i] = (count & 1) === 0 ? 1 : 0;
  }
  return table;
})();

export const INITIAL_FLAGS: Readonly<ConditionFlags> = {
  carry: false,
  zero: false,
  sign: false,
  parity: false,
};

/**
 * Carry vector of a `width`-bit block: bit i holds the carry into bit i,
 * bit `width` the carry out. Each carry is the lookahead sum-of-products
 * over generate/propagate terms, not a ripple of the previous carry.
 */
function lookaheadCarries(generate: number, propagate: number, carryIn: number, width: number): number {
  let carries = carryIn;
  for (let i = 1; i <= width; i++) {
    let carry = 0;
    let chain = 1;
    for (let j = i - 1; j >= 0; j--) {
      carry |= chain & ((generate >> j) & 1);
      chain &= (propagate >> j) & 1;
    }
    carry |= chain & carryIn;
    carries |= carry << i;
  }
  return carries;
}

/**
 * 8-bit carry-lookahead adder built from two 4-bit lookahead blocks; the
 * high block's carry-in comes from the low block's group generate/propagate.
 */
export function carryLookaheadAdd(a: number, b: number, carryIn: boolean): { sum: number; carryOut: boolean } {
  const generate = a & b & 0xff;
  const propagate = (a ^ b) & 0xff;
  const c0 = carryIn ? 1 : 0;

  const lowGenerate = lookaheadCarries(generate & 0x0f, propagate & 0x0f, 0, 4) >> 4;
  const lowPropagate = (propagate & 0x0f) === 0x0f ? 1 : 0;
  const c4 = lowGenerate | (lowPropagate & c0);

  const lowCarries = lookaheadCarries(generate & 0x0f, propagate & 0x0f, c0, 4) & 0x0f;
  const highCarries = lookaheadCarries(generate >> 4, propagate >> 4, c4, 4);
  const carries = lowCarries | (highCarries << 4);

  return {
    sum: (propagate ^ carries) & 0xff,
    carryOut: ((carries >> 8) & 1) === 1,
  };
}

export function isEvenParity(value: number): boolean {
  return PARITY_EVEN[value & 0xff] === 1;
}

/** Zero/sign/parity of a result with an explicit carry. */
export function resultFlags(value: number, carry: boolean): ConditionFlags {
  const v = value & 0xff;
  return {
    carry,
    zero: v === 0,
    sign: (v & 0x80) !== 0,
    parity: isEvenParity(v),
  };
}

function subtract(accumulator: number, operand: number, borrowIn: boolean): { sum: number; borrow: boolean } {
  // A - B - borrow == A + ~B + !borrow; the carry flag holds the borrow
  const { sum, carryOut } = carryLookaheadAdd(accumulator, ~operand & 0xff, !borrowIn);
  return { sum, borrow: !carryOut };
}

export function aluOperate(op: AluOp, accumulator: number, operand: number, flags: ConditionFlags): AluResult {
  const a = accumulator & 0xff;
  const b = operand & 0xff;

  switch (op) {
    case AluOp.Add: {
      const { sum, carryOut } = carryLookaheadAdd(a, b, false);
      return { value: sum, flags: resultFlags(sum, carryOut), writeBack: true };
    }
    case AluOp.AddWithCarry: {
      const { sum, carryOut } = carryLookaheadAdd(a, b, flags.carry);
      return { value: sum, flags: resultFlags(sum, carryOut), writeBack: true };
    }
    case AluOp.Subtract: {
      const { sum, borrow } = subtract(a, b, false);
      return { value: sum, flags: resultFlags(sum, borrow), writeBack: true };
    }
    case AluOp.SubtractWithBorrow: {
      const { sum, borrow } = subtract(a, b, flags.carry);
      return { value: sum, flags: resultFlags(sum, borrow), writeBack: true };
    }
    case AluOp.And: {
      const value = a & b;
      return { value, flags: resultFlags(value, false), writeBack: true };
    }
    case AluOp.Xor: {
      const value = a ^ b;
      return { value, flags: resultFlags(value, false), writeBack: true };
    }
    case AluOp.Or: {
      const value = a | b;
      return { value, flags: resultFlags(value, false), writeBack: true };
    }
    case AluOp.Compare: {
      const { sum, borrow } = subtract(a, b, false);
      return { value: a, flags: resultFlags(sum, borrow), writeBack: false };
    }
  }
}

/** INR/DCR: zero, sign and parity follow the result; carry is preserved. */
export function incrementDecrement(value: number, delta: 1 | -1, flags: ConditionFlags): { value: number; flags: ConditionFlags } {
  const result = (value + delta) & 0xff;
  return { value: result, flags: resultFlags(result, flags.carry) };
}

/** Rotates touch only the carry flag. */
export function rotate(op: RotateOp, accumulator: number, flags: ConditionFlags): { value: number; flags: ConditionFlags } {
  const a = accumulator & 0xff;
  const bit7 = (a >> 7) & 1;
  const bit0 = a & 1;
  const carryIn = flags.carry ? 1 : 0;

  switch (op) {
    case RotateOp.LeftCircular:
      return { value: ((a << 1) | bit7) & 0xff, flags: { ...flags, carry: bit7 === 1 } };
    case RotateOp.RightCircular:
      return { value: (a >> 1) | (bit0 << 7), flags: { ...flags, carry: bit0 === 1 } };
    case RotateOp.LeftThroughCarry:
      return { value: ((a << 1) | carryIn) & 0xff, flags: { ...flags, carry: bit7 === 1 } };
    case RotateOp.RightThroughCarry:
      return { value: (a >> 1) | (carryIn << 7), flags: { ...flags, carry: bit0 === 1 } };
  }
}

export function conditionHolds(flags: ConditionFlags, condition: Condition): boolean {
  return flags[condition.flag] === condition.whenSet;
}
