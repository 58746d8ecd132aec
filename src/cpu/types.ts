/**
 * Shared bus-side interfaces for the CPU models.
 *
 * The CPU never owns memory or devices; it talks to responders that
 * answer when the bus protocol hands them a turn.
 */

/** Machine-cycle type, as broadcast on bus[7:6] during T2. */
export enum CycleType {
  Fetch = 0b00, // PCI
  Read = 0b01,  // PCR
  Write = 0b10, // PCW
  Io = 0b11,    // PCC
}

/** Memory interface, addressed with the 14-bit address from T1/T2. */
export interface Memory {
  read(address: number, cycle: CycleType): number;
  write(address: number, value: number): void;
}

/** I/O port interface. INP reads ports 0-7, OUT writes ports 8-31. */
export interface IOBus {
  in(port: number): number;
  out(port: number, value: number): void;
}

/** Device that supplies the instruction byte during an interrupt acknowledge. */
export interface InterruptResponder {
  acknowledge(): number;
}

/** No-op I/O bus for testing. Returns 0xFF on all reads. */
export class NullIOBus implements IOBus {
  in(_port: number): number {
    return 0xff;
  }
  out(_port: number, _value: number): void {
    // no-op
  }
}

/** Encode `RST vector` (00 vvv 101). */
export function restartOpcode(vector: number): number {
  if (!Number.isInteger(vector) || vector < 0 || vector > 7) {
    throw new RangeError(`RST vector must be 0-7, got ${vector}`);
  }
  return 0x05 | (vector << 3);
}

/** Jams `RST vector` on every acknowledge. */
export class RestartResponder implements InterruptResponder {
  private readonly opcode: number;

  constructor(vector = 0) {
    this.opcode = restartOpcode(vector);
  }

  acknowledge(): number {
    return this.opcode;
  }
}
