import { describe, it, expect } from 'vitest';
import { disassemble, formatInstruction } from '../disassembler';
import { decode } from '../decoder';

function reader(bytes: number[]): (address: number) => number {
  return (address) => bytes[address] ?? 0;
}

describe('8008 disassembler', () => {
  it('formats immediates and addresses in hex', () => {
    expect(disassemble(reader([0x06, 0x05]), 0)).toEqual({ address: 0, bytes: [0x06, 0x05], text: 'MVI A,05h' });
    expect(disassemble(reader([0x44, 0x59, 0x00]), 0).text).toBe('JMP 0059h');
    expect(disassemble(reader([0x46, 0x00, 0x01]), 0).text).toBe('CALL 0100h');
    expect(disassemble(reader([0x2c, 0xff]), 0).text).toBe('XRI FFh');
  });

  it('names conditional transfers by flag and polarity', () => {
    expect(disassemble(reader([0x68, 0x34, 0x12]), 0).text).toBe('JZ 1234h');
    expect(disassemble(reader([0x40, 0x00, 0x00]), 0).text).toBe('JNC 0000h');
    expect(formatInstruction(decode(0x23))).toBe('RC');
    expect(formatInstruction(decode(0x3b))).toBe('RPE');
    expect(formatInstruction(decode(0x52), [0x10, 0x00])).toBe('CP 0010h');
    expect(formatInstruction(decode(0x72), [0x10, 0x00])).toBe('CM 0010h');
  });

  it('formats register, memory and single-byte instructions', () => {
    expect(formatInstruction(decode(0xc7))).toBe('MOV A,M');
    expect(formatInstruction(decode(0xf8))).toBe('MOV M,A');
    expect(formatInstruction(decode(0x87))).toBe('ADD M');
    expect(formatInstruction(decode(0x09))).toBe('DCR B');
    expect(formatInstruction(decode(0x12))).toBe('RAL');
    expect(formatInstruction(decode(0x0d))).toBe('RST 1');
    expect(formatInstruction(decode(0x07))).toBe('RET');
    expect(formatInstruction(decode(0xff))).toBe('HLT');
  });

  it('formats I/O ports in decimal', () => {
    expect(formatInstruction(decode(0x41))).toBe('IN 0');
    expect(formatInstruction(decode(0x51))).toBe('OUT 8');
    expect(formatInstruction(decode(0x7f))).toBe('OUT 31');
  });

  it('shows undefined opcodes as data bytes', () => {
    expect(disassemble(reader([0x22]), 0)).toEqual({ address: 0, bytes: [0x22], text: 'DB 22h' });
  });

  it('wraps at the top of the address space', () => {
    const bytes: number[] = [];
    bytes[0x3fff] = 0x06;
    bytes[0x0000] = 0x42;
    expect(disassemble(reader(bytes), 0x3fff)).toEqual({ address: 0x3fff, bytes: [0x06, 0x42], text: 'MVI A,42h' });
  });
});
