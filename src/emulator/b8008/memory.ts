/**
 * 8008 board memory
 *
 * Flat RAM on the 14-bit address bus. A board with less than 16K decodes
 * only the low address lines, so the RAM repeats through the address space.
 *
 * Implements the Memory interface required by the I8008 class.
 */

import { ADDRESS_SPACE, type CycleType, type Memory } from '@/cpu/i8008';

export class B8008Memory implements Memory {
  private ram: Uint8Array;
  private readonly mask: number;

  constructor(size: number = ADDRESS_SPACE) {
    this.ram = new Uint8Array(size);
    this.mask = size - 1;
  }

  get size(): number {
    return this.ram.length;
  }

  read(address: number, _cycle?: CycleType): number {
    return this.ram[address & this.mask];
  }

  write(address: number, value: number): void {
    this.ram[address & this.mask] = value & 0xff;
  }

  /** Load a block of bytes at the given address. */
  loadBytes(startAddress: number, data: ArrayLike<number>): void {
    if (startAddress < 0 || startAddress + data.length > this.ram.length) {
      throw new RangeError(
        `Program of ${data.length} bytes at 0x${startAddress.toString(16)} does not fit in ${this.ram.length} bytes of RAM`,
      );
    }
    for (let i = 0; i < data.length; i++) {
      this.ram[startAddress + i] = data[i] & 0xff;
    }
  }

  /** Clear all RAM to zero. */
  clear(): void {
    this.ram.fill(0);
  }

  /** Direct RAM read for test inspection. */
  peek(address: number): number {
    return this.ram[address & this.mask];
  }

  /** Direct RAM write for test setup. */
  poke(address: number, value: number): void {
    this.ram[address & this.mask] = value & 0xff;
  }
}
