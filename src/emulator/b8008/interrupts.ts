/**
 * Interrupt controller for the 8008 board.
 *
 * Raises the CPU's INTERRUPT line and keeps it up until the CPU shows T1I
 * on its state outputs, then drops it. During T3 of that acknowledge cycle
 * the CPU asks for an instruction byte and the controller jams the one it
 * was given, normally an RST.
 */

import { restartOpcode, TState, type InterruptResponder, type TickOutputs } from '@/cpu/i8008';

export class InterruptController implements InterruptResponder {
  private line = false;
  private jammed: number = restartOpcode(0);
  private acknowledgeCount = 0;

  /** Level presented on the CPU's interrupt input. */
  get requestLine(): boolean {
    return this.line;
  }

  get acknowledged(): number {
    return this.acknowledgeCount;
  }

  /** Request an interrupt that jams `RST vector`. */
  requestRestart(vector: number): void {
    this.request(restartOpcode(vector));
  }

  /** Request an interrupt that jams an arbitrary instruction byte. */
  request(opcode: number): void {
    this.jammed = opcode & 0xff;
    this.line = true;
  }

  acknowledge(): number {
    this.acknowledgeCount++;
    return this.jammed;
  }

  /** Drop the line once the CPU has entered the acknowledge cycle. */
  observe(outputs: TickOutputs): void {
    if (outputs.state === TState.T1I) {
      this.line = false;
    }
  }

  reset(): void {
    this.line = false;
    this.jammed = restartOpcode(0);
    this.acknowledgeCount = 0;
  }
}
