/**
 * State & timing sequencer.
 *
 * Pure next-state function over the T-state enum, evaluated once per tick.
 * Cycle length is not known here; the controller decides it at T3 and
 * passes it in as `executePhase`.
 */

import { TState } from './types';

export interface SequencerSignals {
  /** READY input, sampled at T2 and while waiting. */
  ready: boolean;
  /** T3 decision: run T4/T5 for this cycle. */
  executePhase: boolean;
  /** The current instruction has another machine cycle to run. */
  moreCycles: boolean;
  /** The instruction just completed is HLT. */
  halt: boolean;
  /** An interrupt was sampled during this instruction's final FETCH cycle. */
  acknowledge: boolean;
  /** Synchronized interrupt latch, used to leave STOPPED. */
  interruptLatched: boolean;
}

function endOfCycle(signals: SequencerSignals): TState {
  if (signals.moreCycles) return TState.T1;
  if (signals.halt) return TState.Stopped;
  return signals.acknowledge ? TState.T1I : TState.T1;
}

export function nextState(current: TState, signals: SequencerSignals): TState {
  switch (current) {
    case TState.Stopped:
      return signals.interruptLatched ? TState.T1I : TState.Stopped;
    case TState.T1:
    case TState.T1I:
      return TState.T2;
    case TState.T2:
    case TState.Wait:
      return signals.ready ? TState.T3 : TState.Wait;
    case TState.T3:
      return signals.executePhase ? TState.T4 : endOfCycle(signals);
    case TState.T4:
      return TState.T5;
    case TState.T5:
      return endOfCycle(signals);
  }
}

/** True for the states that open a machine cycle (SYNC marker). */
export function isCycleStart(state: TState): boolean {
  return state === TState.T1 || state === TState.T1I;
}
