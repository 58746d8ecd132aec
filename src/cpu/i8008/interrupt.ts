/**
 * Interrupt synchronizer and latch.
 *
 * The request line passes through two flip-flops before it is looked at,
 * so a request must be held across a clock edge to be seen. A rising edge
 * out of the second stage sets the latch; the latch stays set (and further
 * edges are ignored) until the sequencer enters T1I.
 */

export interface InterruptSync {
  readonly stage1: boolean;
  readonly stage2: boolean;
  readonly latched: boolean;
}

export const IDLE_INTERRUPT: InterruptSync = { stage1: false, stage2: false, latched: false };

/** Clock the request line into the synchronizer. */
export function synchronize(sync: InterruptSync, request: boolean): InterruptSync {
  const rising = sync.stage1 && !sync.stage2;
  return {
    stage1: request,
    stage2: sync.stage1,
    latched: sync.latched || rising,
  };
}

/** A request edge is in the synchronizer or already latched. */
export function wakeInFlight(sync: InterruptSync): boolean {
  return sync.latched || (sync.stage1 && !sync.stage2);
}

/** Entry to T1I clears the latch. */
export function acknowledgeInterrupt(sync: InterruptSync): InterruptSync {
  return { ...sync, latched: false };
}
