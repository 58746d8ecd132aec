export { I8008, powerOnState } from './i8008';
export type { CpuState, TickOutputs } from './i8008';
export * from './types';
export { AluOp, RotateOp, aluOperate, carryLookaheadAdd, conditionHolds, isEvenParity } from './alu';
export { BusDriver, arbitrate } from './bus';
export type { BusGrant, BusRequest } from './bus';
export { CYCLE_TYPE_NAMES, cycleTypeFromBus, portFromBus } from './controller';
export type { CycleControl, ExecuteOp, InstructionControl } from './controller';
export { decode, instructionControl, instructionLength } from './decoder';
export type { Instruction, InstructionKind } from './decoder';
export { disassemble, formatInstruction } from './disassembler';
export type { Disassembly } from './disassembler';
