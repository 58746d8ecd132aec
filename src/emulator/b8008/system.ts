/**
 * 8008 Board System Integration
 *
 * Wires the cycle-accurate 8008 to RAM, the I/O port board, the interrupt
 * controller and the checkpoint port, and clocks them together one T-state
 * at a time.
 *
 * Like the real chip, the CPU powers up STOPPED: `boot()` raises an
 * interrupt that jams `RST bootVector` to start it.
 */

import {
  I8008,
  TState,
  disassemble,
  type I8008State,
  type TickOutputs,
} from '@/cpu/i8008';
import { resolveConfig, type B8008Config } from './config';
import { B8008Memory } from './memory';
import { B8008Ports, type PortOutputCallback } from './ports';
import { InterruptController } from './interrupts';
import { CheckpointMonitor, formatCheckpoint } from './checkpoint';
import { StateTrace } from './trace';

/** Receives one formatted line per board event (checkpoint, halt, undefined opcode). */
export type LogCallback = (line: string) => void;

function hex4(value: number): string {
  return `0x${value.toString(16).toUpperCase().padStart(4, '0')}`;
}

function hex2(value: number): string {
  return `0x${value.toString(16).toUpperCase().padStart(2, '0')}`;
}

export class B8008System {
  readonly config: B8008Config;
  readonly cpu: I8008;
  readonly memory: B8008Memory;
  readonly ports: B8008Ports;
  readonly interrupts: InterruptController;
  readonly checkpoints: CheckpointMonitor;
  readonly trace: StateTrace;

  private ready = true;
  private logCallback: LogCallback | null = null;
  private outputCallback: PortOutputCallback | null = null;

  constructor(config: Partial<B8008Config> = {}) {
    this.config = resolveConfig(config);
    this.memory = new B8008Memory(this.config.memorySize);
    this.ports = new B8008Ports(this.config.inputPorts);
    this.interrupts = new InterruptController();
    this.checkpoints = new CheckpointMonitor();
    this.trace = new StateTrace(this.config.traceCapacity);
    this.cpu = new I8008(this.memory, this.ports, this.interrupts);
    this.ports.setOutputCallback((port, value) => this.handleOutput(port, value));
  }

  /** Power-on reset of the CPU and devices. RAM and input registers are kept. */
  reset(): void {
    this.cpu.reset();
    this.ports.reset();
    this.interrupts.reset();
    this.checkpoints.clear();
    this.trace.clear();
    this.ready = true;
  }

  /** Register a callback for board log lines. */
  setLogCallback(cb: LogCallback | null): void {
    this.logCallback = cb;
  }

  /** Register a callback for OUT writes (checkpoint writes included). */
  setOutputCallback(cb: PortOutputCallback | null): void {
    this.outputCallback = cb;
  }

  /** Drive the READY input; while false the CPU waits after T2. */
  setReady(ready: boolean): void {
    this.ready = ready;
  }

  load(address: number, bytes: ArrayLike<number>): void {
    this.memory.loadBytes(address, bytes);
  }

  /** Start a STOPPED CPU with the configured boot restart. */
  boot(): void {
    this.interrupts.requestRestart(this.config.bootVector);
  }

  /** Raise an interrupt that jams `RST vector`. */
  interrupt(vector: number): void {
    this.interrupts.requestRestart(vector);
  }

  /** Advance the whole board one T-state. */
  tick(): TickOutputs {
    const pc = this.cpu.pc;
    const fetchingOpcode = this.cpu.cycleIndex === 0;
    const wasStopped: boolean = this.cpu.state === TState.Stopped;

    const outputs = this.cpu.tick({
      ready: this.ready,
      interruptRequest: this.interrupts.requestLine,
    });
    this.interrupts.observe(outputs);
    this.trace.push({ ...outputs, tick: this.cpu.ticks - 1, pc });

    if (outputs.state === TState.T3 && fetchingOpcode && this.cpu.instruction.kind === 'UNDEFINED') {
      this.log(`UNDEFINED OPCODE ${hex2(this.cpu.ir)} at ${hex4(pc)} (no operation)`);
    }
    if (!wasStopped && this.cpu.state === TState.Stopped) {
      this.log(`HLT at PC=${hex4(this.cpu.pc)}`);
    }
    return outputs;
  }

  /** Tick until the next instruction boundary. Returns ticks consumed. */
  stepInstruction(): number {
    let ticks = 0;
    do {
      this.tick();
      ticks++;
    } while (!this.cpu.atInstructionBoundary());
    return ticks;
  }

  /**
   * Tick until the CPU is stopped with nothing left to wake it, or until
   * `maxTicks`. Returns ticks consumed.
   */
  run(maxTicks: number): number {
    let ticks = 0;
    while (ticks < maxTicks) {
      if (this.isIdle()) break;
      this.tick();
      ticks++;
    }
    return ticks;
  }

  /** Tick until `predicate` holds (checked after each tick). False if `maxTicks` ran out first. */
  runUntil(predicate: (system: B8008System) => boolean, maxTicks: number): boolean {
    for (let ticks = 0; ticks < maxTicks; ticks++) {
      this.tick();
      if (predicate(this)) return true;
    }
    return false;
  }

  /** Stopped, with no interrupt on the way. */
  isIdle(): boolean {
    return this.cpu.halted && !this.interrupts.requestLine;
  }

  snapshot(): I8008State {
    return this.cpu.snapshot();
  }

  /** Disassembly of the instruction at `address` (defaults to PC). */
  disassembleAt(address: number = this.cpu.pc): string {
    return disassemble((a) => this.memory.peek(a), address).text;
  }

  private handleOutput(port: number, value: number): void {
    if (port === this.config.checkpointPort) {
      const record = this.checkpoints.record(value, this.cpu.snapshot());
      this.log(formatCheckpoint(record));
    }
    this.outputCallback?.(port, value);
  }

  private log(line: string): void {
    this.logCallback?.(line);
  }
}
