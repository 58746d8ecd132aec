export { B8008System } from './system';
export type { LogCallback } from './system';
export { B8008Memory } from './memory';
export { B8008Ports, INPUT_PORTS, FIRST_OUTPUT_PORT, LAST_OUTPUT_PORT } from './ports';
export type { PortOutputCallback } from './ports';
export { InterruptController } from './interrupts';
export { CheckpointMonitor, formatCheckpoint } from './checkpoint';
export type { CheckpointRecord } from './checkpoint';
export { StateTrace, formatTraceEntry } from './trace';
export type { TraceEntry } from './trace';
export { DEFAULT_B8008_CONFIG, resolveConfig } from './config';
export type { B8008Config } from './config';
