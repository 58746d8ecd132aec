/**
 * Scratchpad register file and H:L address pointer.
 *
 * The file is an immutable record; writes return a new record. Field 111
 * (M) is not a register: the datapath routes it to a memory cycle at
 * `addressPointer()`.
 */

import { ADDRESS_MASK, type Register, type RegisterFile } from './types';

export const EMPTY_REGISTERS: RegisterFile = { a: 0, b: 0, c: 0, d: 0, e: 0, h: 0, l: 0 };

export function writeRegister(file: RegisterFile, reg: Register, value: number): RegisterFile {
  return { ...file, [reg]: value & 0xff };
}

/** H[5:0]:L. The top two bits of H are don't-cares. */
export function addressPointer(file: RegisterFile): number {
  return ((file.h << 8) | file.l) & ADDRESS_MASK;
}
