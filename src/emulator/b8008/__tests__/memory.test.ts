import { describe, it, expect, beforeEach } from 'vitest';
import { B8008Memory } from '../memory';
import { CycleType } from '@/cpu/i8008';

describe('B8008Memory', () => {
  let memory: B8008Memory;

  beforeEach(() => {
    memory = new B8008Memory();
  });

  describe('basic read/write', () => {
    it('should default to the full 16K address space', () => {
      expect(memory.size).toBe(0x4000);
    });

    it('should initialize to all zeros', () => {
      expect(memory.read(0x0000, CycleType.Read)).toBe(0);
      expect(memory.read(0x3fff, CycleType.Fetch)).toBe(0);
    });

    it('should read back written values', () => {
      memory.write(0x0800, 0x42);
      memory.write(0x3fff, 0xab);
      expect(memory.read(0x0800, CycleType.Read)).toBe(0x42);
      expect(memory.read(0x3fff, CycleType.Read)).toBe(0xab);
    });

    it('should mask value to 8 bits', () => {
      memory.write(0x0000, 0x1ff);
      expect(memory.peek(0x0000)).toBe(0xff);
    });

    it('should wrap addresses above 14 bits', () => {
      memory.write(0x4042, 0x55);
      expect(memory.peek(0x0042)).toBe(0x55);
    });
  });

  describe('smaller RAM', () => {
    it('should mirror through the address space', () => {
      const small = new B8008Memory(0x0400);
      small.write(0x0010, 0x77);
      expect(small.read(0x0410, CycleType.Read)).toBe(0x77);
      expect(small.read(0x3c10, CycleType.Read)).toBe(0x77);
    });
  });

  describe('loadBytes', () => {
    it('should load a program at an address', () => {
      memory.loadBytes(0x0100, [0x06, 0x05, 0x00]);
      expect(memory.peek(0x0100)).toBe(0x06);
      expect(memory.peek(0x0101)).toBe(0x05);
      expect(memory.peek(0x0102)).toBe(0x00);
    });

    it('should accept typed arrays', () => {
      memory.loadBytes(0, new Uint8Array([0x44, 0x59, 0x00]));
      expect(memory.peek(1)).toBe(0x59);
    });

    it('should reject a program that runs past the end of RAM', () => {
      const small = new B8008Memory(0x100);
      expect(() => small.loadBytes(0xff, [0x00, 0x00])).toThrow(RangeError);
    });

    it('should reject a negative address', () => {
      expect(() => memory.loadBytes(-1, [0x00])).toThrow(RangeError);
    });
  });

  describe('clear and poke', () => {
    it('should clear all RAM', () => {
      memory.poke(0x1234, 0x99);
      memory.clear();
      expect(memory.peek(0x1234)).toBe(0);
    });
  });
});
