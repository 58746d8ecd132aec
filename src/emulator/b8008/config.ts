/**
 * Board configuration. Every field has a default; callers pass overrides.
 */

import { ADDRESS_SPACE } from '@/cpu/i8008';

export interface B8008Config {
  /** RAM size in bytes: a power of two from 256 to 16K. Smaller RAM mirrors. */
  memorySize: number;
  /** Output port that records a checkpoint (8-31), or null for none. */
  checkpointPort: number | null;
  /** RST vector jammed by `boot()`. */
  bootVector: number;
  /** Ticks kept by the state trace; 0 disables tracing. */
  traceCapacity: number;
  /** Initial values for input ports 0-7. */
  inputPorts: readonly number[];
}

export const DEFAULT_B8008_CONFIG: Readonly<B8008Config> = {
  memorySize: ADDRESS_SPACE,
  checkpointPort: 31,
  bootVector: 0,
  traceCapacity: 0,
  inputPorts: [],
};

function isPowerOfTwo(n: number): boolean {
  return Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0;
}

export function resolveConfig(overrides: Partial<B8008Config> = {}): B8008Config {
  const config: B8008Config = { ...DEFAULT_B8008_CONFIG, ...overrides };

  if (!isPowerOfTwo(config.memorySize) || config.memorySize < 0x100 || config.memorySize > ADDRESS_SPACE) {
    throw new RangeError(`memorySize must be a power of two between 256 and ${ADDRESS_SPACE}, got ${config.memorySize}`);
  }
  if (config.checkpointPort !== null && (config.checkpointPort < 8 || config.checkpointPort > 31)) {
    throw new RangeError(`checkpointPort must be an output port (8-31), got ${config.checkpointPort}`);
  }
  if (!Number.isInteger(config.bootVector) || config.bootVector < 0 || config.bootVector > 7) {
    throw new RangeError(`bootVector must be 0-7, got ${config.bootVector}`);
  }
  if (!Number.isInteger(config.traceCapacity) || config.traceCapacity < 0) {
    throw new RangeError(`traceCapacity must be a non-negative integer, got ${config.traceCapacity}`);
  }
  if (config.inputPorts.length > 8) {
    throw new RangeError(`inputPorts has ${config.inputPorts.length} entries; the 8008 has 8 input ports`);
  }
  return config;
}
