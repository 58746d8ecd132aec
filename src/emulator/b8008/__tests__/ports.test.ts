import { describe, it, expect, beforeEach, vi } from 'vitest';
import { B8008Ports } from '../ports';

describe('B8008Ports', () => {
  let ports: B8008Ports;

  beforeEach(() => {
    ports = new B8008Ports();
  });

  describe('input ports', () => {
    it('should read zero before anything is set', () => {
      expect(ports.in(0)).toBe(0);
    });

    it('should return the value set by the host', () => {
      ports.setInput(5, 0x1a5);
      expect(ports.in(5)).toBe(0xa5);
    });

    it('should take presets from the constructor', () => {
      const preset = new B8008Ports([0x11, 0x22]);
      expect(preset.in(0)).toBe(0x11);
      expect(preset.in(1)).toBe(0x22);
    });

    it('should count reads per port', () => {
      ports.in(2);
      ports.in(2);
      ports.in(3);
      expect(ports.getReadCount(2)).toBe(2);
      expect(ports.getReadCount(3)).toBe(1);
      expect(ports.getReadCount(4)).toBe(0);
    });

    it('should reject ports outside 0-7', () => {
      expect(() => ports.setInput(8, 0)).toThrow(RangeError);
      expect(() => ports.setInput(-1, 0)).toThrow(RangeError);
      expect(() => ports.getReadCount(8)).toThrow(RangeError);
      expect(() => ports.getReadCount(1.5)).toThrow(RangeError);
    });
  });

  describe('output ports', () => {
    it('should latch written values', () => {
      ports.out(8, 0x42);
      ports.out(31, 0x1ff);
      expect(ports.getOutput(8)).toBe(0x42);
      expect(ports.getOutput(31)).toBe(0xff);
    });

    it('should notify the output callback', () => {
      const cb = vi.fn();
      ports.setOutputCallback(cb);
      ports.out(12, 0x34);
      expect(cb).toHaveBeenCalledWith(12, 0x34);
    });

    it('should reject ports outside 8-31', () => {
      expect(() => ports.getOutput(7)).toThrow(RangeError);
      expect(() => ports.getOutput(32)).toThrow(RangeError);
    });
  });

  describe('reset', () => {
    it('should clear outputs and counters but keep inputs', () => {
      ports.setInput(1, 0x55);
      ports.in(1);
      ports.out(9, 0x66);
      ports.reset();
      expect(ports.getOutput(9)).toBe(0);
      expect(ports.getReadCount(1)).toBe(0);
      expect(ports.in(1)).toBe(0x55);
    });
  });
});
