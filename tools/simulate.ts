#!/usr/bin/env node
/**
 * Replay a trace dump against a block-paged RAM budget and print the report.
 *
 *   tsx tools/simulate.ts trace.json
 *   TENSORSIM_RAM_BYTES=1073741824 TENSORSIM_BLOCK_BYTES=65536 tsx tools/simulate.ts trace.json
 *   TENSORSIM_SWEEP_MB=64,128,256 tsx tools/simulate.ts trace.json
 */

import path from "node:path";
import { performance } from "node:perf_hooks";

import {
  ConfigError,
  configFromEnv,
  formatBytes,
  loadTraceFile,
  MemorySimulator,
  printReport,
  sweepRamSizes,
  TraceFormatError,
} from "../src";

function padR(s: string, len: number): string {
  return s.length >= len ? s : s + " ".repeat(len - s.length);
}

function padL(s: string, len: number): string {
  return s.length >= len ? s : " ".repeat(len - s.length) + s;
}

function main(): void {
  const file = process.argv[2];
  if (!file) {
    console.error("Usage: tsx tools/simulate.ts <trace.json>");
    process.exitCode = 1;
    return;
  }

  const options = configFromEnv();
  const { tensors, plan } = loadTraceFile(path.resolve(file));
  console.log(
    `[tensorsim] loaded ${tensors.size} tensors, ${plan.length} plan nodes from ${file}`,
  );

  const sweep = process.env.TENSORSIM_SWEEP_MB;
  if (sweep) {
    const ramSizes = sweep
      .split(",")
      .map((mb) => Number.parseInt(mb.trim(), 10) * 1024 * 1024);
    const rows = sweepRamSizes(tensors, plan, ramSizes, {
      blockSizeBytes: options.blockSizeBytes,
    });
    console.log(
      `${padR("RAM", 12)} ${padL("Misses", 10)} ${padL("Evictions", 10)} ${padL("Total I/O", 12)} ${padL("Peak", 12)} ${padL("Hit ratio", 10)}`,
    );
    console.log("─".repeat(71));
    for (const row of rows) {
      console.log(
        `${padR(formatBytes(row.ramSizeBytes), 12)} ${padL(String(row.stats.blockMisses), 10)} ${padL(String(row.stats.blockEvictions), 10)} ${padL(formatBytes(row.stats.totalIo), 12)} ${padL(formatBytes(row.stats.peakMemory), 12)} ${padL(row.ratios.blockHitRatio.toFixed(4), 10)}`,
      );
    }
    return;
  }

  const sim = new MemorySimulator(options, tensors);
  const start = performance.now();
  sim.simulate(plan);
  const elapsed = performance.now() - start;
  printReport(sim);
  console.log(`\n[tensorsim] simulated in ${elapsed.toFixed(1)}ms`);
}

try {
  main();
} catch (err) {
  if (err instanceof ConfigError || err instanceof TraceFormatError) {
    console.error(`[tensorsim] ${err.name}: ${err.message}`);
    process.exitCode = 1;
  } else {
    throw err;
  }
}
