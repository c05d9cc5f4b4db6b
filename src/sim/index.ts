export {
  BlockAddressIndex,
  type SharingStats,
} from "./block-index";
export {
  type CaptureMode,
  configFromEnv,
  DEFAULT_BLOCK_SIZE_BYTES,
  DEFAULT_RAM_SIZE_BYTES,
  resolveConfig,
  type SimulatorConfig,
  type SimulatorOptions,
} from "./config";
export { ConfigError, TraceFormatError } from "./errors";
export {
  EventLog,
  type MemoryEvent,
  type MemoryEventType,
  splitPrimary,
} from "./events";
export {
  formatBytes,
  formatEventLog,
  formatReport,
  printReport,
} from "./report";
export { ResidentCache, type ResidentBlock } from "./resident-cache";
export {
  type MemoryState,
  MemorySimulator,
  type ResidentBlockInfo,
} from "./simulator";
export {
  computeHitRatios,
  createStats,
  type HitRatios,
  type SimStats,
} from "./stats";
export { type SweepRow, sweepRamSizes } from "./sweep";
