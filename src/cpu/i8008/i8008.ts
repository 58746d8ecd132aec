/**
 * Intel 8008 CPU, cycle-accurate model
 *
 * The 8008 runs every instruction as one to three machine cycles of three
 * or five T-states:
 * - T1 / T1I: low address byte out (T1I replaces T1 when an interrupt is acknowledged)
 * - T2:       cycle type in bits 7..6, high address bits in 5..0
 * - WAIT:     held here between T2 and T3 while READY is low
 * - T3:       data transfer with memory or I/O
 * - T4, T5:   execute phase, only when the cycle's control asks for it
 *
 * `tick()` advances exactly one T-state. All programmer-visible state lives
 * in one `CpuState` value that every tick threads through the sequencer,
 * the controller and the datapath units.
 */

import { aluOperate, incrementDecrement, INITIAL_FLAGS, rotate } from './alu';
import { arbitrate, BusDriver, FLOATING, sampleBus, type BusGrant, type BusRequest } from './bus';
import {
  cycleAddress,
  cycleLength,
  OPCODE_FETCH,
  t1BusValue,
  t2BusValue,
  portFromBus,
  type AddressContext,
  type CycleControl,
  type ExecuteOp,
  type InstructionControl,
} from './controller';
import { decodeCached, type Instruction } from './decoder';
import { acknowledgeInterrupt, IDLE_INTERRUPT, synchronize, wakeInFlight, type InterruptSync } from './interrupt';
import { EMPTY_REGISTERS, writeRegister } from './registers';
import { isCycleStart, nextState } from './sequencer';
import { EMPTY_STACK, popAddress, pushAddress } from './stack';
import {
  ADDRESS_MASK,
  CycleType,
  NullIOBus,
  RestartResponder,
  STATE_CODES,
  TState,
  type AddressStack,
  type ConditionFlags,
  type I8008State,
  type InterruptResponder,
  type IOBus,
  type Memory,
  type Register,
  type RegisterFile,
  type TickInputs,
} from './types';

/** Everything the chip remembers between ticks. */
export interface CpuState {
  registers: RegisterFile;
  flags: ConditionFlags;
  pc: number;
  stack: AddressStack;
  ir: number;
  instruction: Instruction;
  control: InstructionControl;
  /** Internal temporaries: immediate/memory operand and jump target high byte. */
  tempLow: number;
  tempHigh: number;

  state: TState;
  cycleIndex: number;
  executePhase: boolean;
  /** The current cycle was opened by T1I; PC is frozen. */
  acknowledging: boolean;
  /** Sampled at T3 of the final FETCH cycle: next instruction starts with T1I. */
  interruptPending: boolean;
  interrupt: InterruptSync;

  ticks: number;
}

/** Signals the chip presents to the outside world for one tick. */
export interface TickOutputs {
  state: TState;
  /** S2 S1 S0 */
  stateCode: number;
  /** Cycle-boundary marker: high during T1 and T1I. */
  sync: boolean;
  cycleType: CycleType | null;
  bus: number | null;
  driver: BusDriver;
}

const BOUNDARY_CONTROL: InstructionControl = { cycles: [OPCODE_FETCH], halts: false };

export function powerOnState(): CpuState {
  const { instruction } = decodeCached(0x00);
  return {
    registers: EMPTY_REGISTERS,
    flags: { ...INITIAL_FLAGS },
    pc: 0,
    stack: EMPTY_STACK,
    ir: 0,
    instruction,
    control: BOUNDARY_CONTROL,
    tempLow: 0,
    tempHigh: 0,
    state: TState.Stopped,
    cycleIndex: 0,
    executePhase: false,
    acknowledging: false,
    interruptPending: false,
    interrupt: IDLE_INTERRUPT,
    ticks: 0,
  };
}

export class I8008 {
  private s: CpuState = powerOnState();

  private memory: Memory;
  private io: IOBus;
  private interrupts: InterruptResponder;

  constructor(memory: Memory, io?: IOBus, interrupts?: InterruptResponder) {
    this.memory = memory;
    this.io = io ?? new NullIOBus();
    this.interrupts = interrupts ?? new RestartResponder(0);
  }

  // --- Register accessors ---
  get a(): number { return this.s.registers.a; }
  set a(v: number) { this.setRegister('a', v); }

  get b(): number { return this.s.registers.b; }
  set b(v: number) { this.setRegister('b', v); }

  get c(): number { return this.s.registers.c; }
  set c(v: number) { this.setRegister('c', v); }

  get d(): number { return this.s.registers.d; }
  set d(v: number) { this.setRegister('d', v); }

  get e(): number { return this.s.registers.e; }
  set e(v: number) { this.setRegister('e', v); }

  get h(): number { return this.s.registers.h; }
  set h(v: number) { this.setRegister('h', v); }

  get l(): number { return this.s.registers.l; }
  set l(v: number) { this.setRegister('l', v); }

  get pc(): number { return this.s.pc; }
  set pc(v: number) { this.s.pc = v & ADDRESS_MASK; }

  get flags(): ConditionFlags { return { ...this.s.flags }; }
  set flags(v: ConditionFlags) { this.s.flags = { ...v }; }

  get stack(): AddressStack { return this.s.stack; }
  get registers(): RegisterFile { return this.s.registers; }

  get state(): TState { return this.s.state; }
  get ir(): number { return this.s.ir; }
  get instruction(): Instruction { return this.s.instruction; }
  get cycleIndex(): number { return this.s.cycleIndex; }
  get cycleType(): CycleType | null {
    return this.s.state === TState.Stopped ? null : this.currentCycle().type;
  }
  /** STOPPED with no interrupt edge on its way to wake it. */
  get halted(): boolean {
    return this.s.state === TState.Stopped && !wakeInFlight(this.s.interrupt);
  }
  get ticks(): number { return this.s.ticks; }
  get interruptLatched(): boolean { return this.s.interrupt.latched; }

  private setRegister(reg: Register, value: number): void {
    this.s.registers = writeRegister(this.s.registers, reg, value);
  }

  /** Power-on clear: registers, flags, stack and PC to zero; STOPPED. */
  reset(): void {
    this.s = powerOnState();
  }

  snapshot(): I8008State {
    const { registers, pc, flags, stack, state, ir, ticks, interrupt } = this.s;
    return {
      ...registers,
      pc,
      flags: { ...flags },
      stack: { slots: stack.slots.slice(), pointer: stack.pointer },
      state,
      ir,
      ticks,
      halted: this.halted,
      interruptLatched: interrupt.latched,
    };
  }

  /** At the start of an instruction (or stopped). */
  atInstructionBoundary(): boolean {
    return this.s.state === TState.Stopped || (isCycleStart(this.s.state) && this.s.cycleIndex === 0);
  }

  // --- Clocking ---

  /** Advance one T-state. */
  tick(inputs: Partial<TickInputs> = {}): TickOutputs {
    const { ready = true, interruptRequest = false } = inputs;
    const s = this.s;
    s.interrupt = synchronize(s.interrupt, interruptRequest);

    const state = s.state;
    const control = this.currentCycle();
    const cycleType = state === TState.Stopped ? null : control.type;
    let grant: BusGrant = FLOATING;

    switch (state) {
      case TState.T1:
      case TState.T1I:
        grant = arbitrate([{ driver: BusDriver.Cpu, value: t1BusValue(control.type, this.addressContext()) }]);
        break;
      case TState.T2:
        grant = arbitrate([{ driver: BusDriver.Cpu, value: t2BusValue(control.type, this.addressContext()) }]);
        break;
      case TState.T3:
        grant = this.transfer(control);
        this.decideCycle();
        break;
      case TState.T5:
        this.executeCycle();
        break;
      case TState.Stopped:
      case TState.Wait:
      case TState.T4:
        break;
    }

    const cycles = s.control.cycles;
    const next = nextState(state, {
      ready,
      executePhase: s.executePhase,
      moreCycles: s.cycleIndex + 1 < cycles.length,
      halt: s.control.halts,
      acknowledge: s.interruptPending,
      interruptLatched: s.interrupt.latched,
    });
    this.enter(state, next);
    s.ticks++;

    return {
      state,
      stateCode: STATE_CODES[state],
      sync: isCycleStart(state),
      cycleType,
      bus: grant.value,
      driver: grant.driver,
    };
  }

  /**
   * Execute until the next instruction boundary. Returns ticks consumed.
   * From STOPPED this is a single tick. A READY held low stalls here for
   * good, as it stalls the chip.
   */
  step(inputs: Partial<TickInputs> = {}): number {
    const start = this.s.ticks;
    if (this.s.state === TState.Stopped) {
      this.tick(inputs);
      return this.s.ticks - start;
    }
    do {
      this.tick(inputs);
    } while (!this.atInstructionBoundary());
    return this.s.ticks - start;
  }

  /** Tick until STOPPED or `maxTicks` elapse. Returns ticks consumed. */
  run(maxTicks: number, inputs: Partial<TickInputs> = {}): number {
    const start = this.s.ticks;
    while (this.s.ticks - start < maxTicks && this.s.state !== TState.Stopped) {
      this.tick(inputs);
    }
    return this.s.ticks - start;
  }

  // --- Machine-cycle control ---

  private currentCycle(): CycleControl {
    return this.s.control.cycles[this.s.cycleIndex];
  }

  private addressContext(): AddressContext {
    return { pc: this.s.pc, registers: this.s.registers, ir: this.s.ir };
  }

  /** T3: cycle length, and the single interrupt sampling point. */
  private decideCycle(): void {
    const s = this.s;
    const control = this.currentCycle();
    s.executePhase = cycleLength(control, s.flags) === 5;

    const finalCycle = s.cycleIndex === s.control.cycles.length - 1;
    if (control.type === CycleType.Fetch && finalCycle && s.interrupt.latched) {
      s.interruptPending = true;
    }
  }

  /** Bookkeeping on the way into `next`. */
  private enter(current: TState, next: TState): void {
    const s = this.s;
    const leavingCycle = current === TState.T5 || (current === TState.T3 && next !== TState.T4);

    if (leavingCycle) {
      s.executePhase = false;
      if (s.cycleIndex + 1 < s.control.cycles.length) {
        s.cycleIndex++;
      } else {
        s.cycleIndex = 0;
        s.control = BOUNDARY_CONTROL;
      }
      if (next === TState.Stopped) s.interruptPending = false;
    }

    if (next === TState.T1I) {
      s.interrupt = acknowledgeInterrupt(s.interrupt);
      s.interruptPending = false;
      s.acknowledging = true;
    } else if (next === TState.T1) {
      s.acknowledging = false;
    }

    s.state = next;
  }

  // --- T3 data transfer ---

  private transfer(control: CycleControl): BusGrant {
    const s = this.s;
    const ctx = this.addressContext();

    switch (control.transfer) {
      case 'opcode': {
        const request: BusRequest = s.acknowledging
          ? { driver: BusDriver.Interrupt, value: this.interrupts.acknowledge() }
          : { driver: BusDriver.Memory, value: this.memory.read(cycleAddress(control.type, ctx), control.type) };
        const grant = arbitrate([request]);
        s.ir = sampleBus(grant);
        const { instruction, control: decoded } = decodeCached(s.ir);
        s.instruction = instruction;
        s.control = decoded;
        this.advancePc();
        return grant;
      }

      case 'low':
      case 'high': {
        const grant = arbitrate([
          { driver: BusDriver.Memory, value: this.memory.read(cycleAddress(control.type, ctx), control.type) },
        ]);
        if (control.transfer === 'low') s.tempLow = sampleBus(grant);
        else s.tempHigh = sampleBus(grant);
        if (control.type === CycleType.Fetch) this.advancePc();
        return grant;
      }

      case 'store': {
        const grant = arbitrate([{ driver: BusDriver.Cpu, value: s.tempLow }]);
        this.memory.write(cycleAddress(control.type, ctx), sampleBus(grant));
        return grant;
      }

      case 'input': {
        const port = portFromBus(t2BusValue(CycleType.Io, ctx));
        const grant = arbitrate([{ driver: BusDriver.Io, value: this.io.in(port) }]);
        s.tempLow = sampleBus(grant);
        return grant;
      }

      case 'output': {
        const port = portFromBus(t2BusValue(CycleType.Io, ctx));
        const grant = arbitrate([{ driver: BusDriver.Cpu, value: s.registers.a }]);
        this.io.out(port, sampleBus(grant));
        return grant;
      }
    }
  }

  /** PC is frozen for the whole of an acknowledge cycle. */
  private advancePc(): void {
    if (!this.s.acknowledging) {
      this.s.pc = (this.s.pc + 1) & ADDRESS_MASK;
    }
  }

  // --- T5 execute phase ---

  private executeCycle(): void {
    const op = this.currentCycle().execute;
    if (op !== null) this.execute(op);
  }

  private execute(op: ExecuteOp): void {
    const s = this.s;
    const regs = s.registers;

    switch (op.kind) {
      case 'move': {
        const value = op.src === 'temp' ? s.tempLow : regs[op.src];
        s.registers = writeRegister(regs, op.dst, value);
        break;
      }
      case 'hold':
        s.tempLow = regs[op.src];
        break;
      case 'alu': {
        const operand = op.operand === 'temp' ? s.tempLow : regs[op.operand];
        const result = aluOperate(op.op, regs.a, operand, s.flags);
        s.flags = result.flags;
        if (result.writeBack) s.registers = writeRegister(regs, 'a', result.value);
        break;
      }
      case 'step': {
        const result = incrementDecrement(regs[op.reg], op.delta, s.flags);
        s.flags = result.flags;
        s.registers = writeRegister(regs, op.reg, result.value);
        break;
      }
      case 'rotate': {
        const result = rotate(op.op, regs.a, s.flags);
        s.flags = result.flags;
        s.registers = writeRegister(regs, 'a', result.value);
        break;
      }
      case 'jump':
        s.pc = this.tempAddress();
        break;
      case 'call':
        s.stack = pushAddress(s.stack, s.pc);
        s.pc = this.tempAddress();
        break;
      case 'return': {
        const popped = popAddress(s.stack);
        s.stack = popped.stack;
        s.pc = popped.address;
        break;
      }
      case 'restart':
        s.stack = pushAddress(s.stack, s.pc);
        s.pc = (op.vector & 7) << 3;
        break;
      case 'idle':
        break;
    }
  }

  private tempAddress(): number {
    return ((this.s.tempHigh << 8) | this.s.tempLow) & ADDRESS_MASK;
  }
}
