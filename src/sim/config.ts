import { ConfigError } from "./errors";

/**
 * Default paging granularity (4 KiB pages).
 */
export const DEFAULT_BLOCK_SIZE_BYTES = 4096;

/**
 * RAM budget the CLI falls back to when none is given (4 GiB).
 */
export const DEFAULT_RAM_SIZE_BYTES = 4 * 1024 * 1024 * 1024;

export interface SimulatorOptions {
  /** Total simulated memory budget. */
  ramSizeBytes: number;
  /** Paging granularity, conventionally a power of two. */
  blockSizeBytes?: number;
  /** Retain the full event log. Disable for very long traces. */
  captureEvents?: boolean;
  /** Print one line per block load. */
  verbose?: boolean;
}

/**
 * Event capture mode. "stats-only" keeps counters but no event log.
 */
export type CaptureMode = { kind: "full" } | { kind: "stats-only" };

export interface SimulatorConfig {
  ramSizeBytes: number;
  blockSizeBytes: number;
  capacity: number; // blocks
  capture: CaptureMode;
  verbose: boolean;
}

function envFlag(name: string): boolean {
  return typeof process !== "undefined" && process.env?.[name] === "1";
}

function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Validate options and derive the block capacity.
 * @throws ConfigError on non-positive sizes or a budget smaller than one block
 */
export function resolveConfig(options: SimulatorOptions): SimulatorConfig {
  const blockSizeBytes = options.blockSizeBytes ?? DEFAULT_BLOCK_SIZE_BYTES;
  requirePositiveInteger("ramSizeBytes", options.ramSizeBytes);
  requirePositiveInteger("blockSizeBytes", blockSizeBytes);
  if (options.ramSizeBytes < blockSizeBytes) {
    throw new ConfigError(
      `ramSizeBytes (${options.ramSizeBytes}) is smaller than blockSizeBytes ` +
        `(${blockSizeBytes}); capacity would be zero blocks`,
    );
  }

  return {
    ramSizeBytes: options.ramSizeBytes,
    blockSizeBytes,
    capacity: Math.floor(options.ramSizeBytes / blockSizeBytes),
    capture:
      options.captureEvents === false ? { kind: "stats-only" } : { kind: "full" },
    verbose: options.verbose ?? envFlag("TENSORSIM_VERBOSE"),
  };
}

function parseIntegerVar(
  env: Readonly<Record<string, string | undefined>>,
  name: string,
): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === "") return undefined;
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

/**
 * Read simulator options from TENSORSIM_* environment variables.
 */
export function configFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
): SimulatorOptions {
  return {
    ramSizeBytes:
      parseIntegerVar(env, "TENSORSIM_RAM_BYTES") ?? DEFAULT_RAM_SIZE_BYTES,
    blockSizeBytes:
      parseIntegerVar(env, "TENSORSIM_BLOCK_BYTES") ?? DEFAULT_BLOCK_SIZE_BYTES,
    captureEvents: env.TENSORSIM_CAPTURE_EVENTS !== "0",
    verbose: env.TENSORSIM_VERBOSE === "1",
  };
}
