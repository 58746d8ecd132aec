/**
 * 8008 I/O port board
 *
 *   INP 0-7:  eight input registers, set by the host
 *   OUT 8-31: twenty-four output latches; each write also fires the
 *             output callback
 *
 * Implements the IOBus interface.
 */

import type { IOBus } from '@/cpu/i8008';

export const INPUT_PORTS = 8;
export const FIRST_OUTPUT_PORT = 8;
export const LAST_OUTPUT_PORT = 31;

/** Callback for every OUT instruction. */
export type PortOutputCallback = (port: number, value: number) => void;

export class B8008Ports implements IOBus {
  private inputs = new Uint8Array(INPUT_PORTS);
  private outputs = new Uint8Array(LAST_OUTPUT_PORT + 1);
  private outputCallback: PortOutputCallback | null = null;

  /** INP reads seen per port. */
  private readCounts = new Uint32Array(INPUT_PORTS);

  constructor(presets: readonly number[] = []) {
    presets.forEach((value, port) => this.setInput(port, value));
  }

  setOutputCallback(cb: PortOutputCallback | null): void {
    this.outputCallback = cb;
  }

  setInput(port: number, value: number): void {
    if (!Number.isInteger(port) || port < 0 || port >= INPUT_PORTS) {
      throw new RangeError(`Input port must be 0-7, got ${port}`);
    }
    this.inputs[port] = value & 0xff;
  }

  getOutput(port: number): number {
    if (!Number.isInteger(port) || port < FIRST_OUTPUT_PORT || port > LAST_OUTPUT_PORT) {
      throw new RangeError(`Output port must be 8-31, got ${port}`);
    }
    return this.outputs[port];
  }

  /** Number of INP reads seen on a port. */
  getReadCount(port: number): number {
    if (!Number.isInteger(port) || port < 0 || port >= INPUT_PORTS) {
      throw new RangeError(`Input port must be 0-7, got ${port}`);
    }
    return this.readCounts[port];
  }

  in(port: number): number {
    const p = port & 7;
    this.readCounts[p]++;
    return this.inputs[p];
  }

  out(port: number, value: number): void {
    const p = port & 0x1f;
    this.outputs[p] = value & 0xff;
    this.outputCallback?.(p, value & 0xff);
  }

  /** Clear output latches and read counters; input registers keep their values. */
  reset(): void {
    this.outputs.fill(0);
    this.readCounts.fill(0);
  }
}
