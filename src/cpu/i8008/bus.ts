/**
 * Shared 8-bit data bus.
 *
 * Every would-be driver files a request for the current tick and a fixed
 * priority picks exactly one: interrupt injection, then CPU, then memory,
 * then I/O. No request means the bus floats.
 */

export enum BusDriver {
  None = 'none',
  Interrupt = 'interrupt',
  Cpu = 'cpu',
  Memory = 'memory',
  Io = 'io',
}

export const BUS_PRIORITY: readonly BusDriver[] = [
  BusDriver.Interrupt,
  BusDriver.Cpu,
  BusDriver.Memory,
  BusDriver.Io,
];

/** A floating bus reads as all ones. */
export const FLOATING_BUS_VALUE = 0xff;

export interface BusRequest {
  driver: BusDriver;
  value: number;
}

export interface BusGrant {
  driver: BusDriver;
  value: number | null;
}

export const FLOATING: BusGrant = { driver: BusDriver.None, value: null };

export function arbitrate(requests: readonly BusRequest[]): BusGrant {
  for (const driver of BUS_PRIORITY) {
    const request = requests.find((r) => r.driver === driver);
    if (request) return { driver, value: request.value & 0xff };
  }
  return FLOATING;
}

/** What a receiver latches from the bus this tick. */
export function sampleBus(grant: BusGrant): number {
  return grant.value ?? FLOATING_BUS_VALUE;
}
