import type { MemoryEvent } from "./events";
import type { MemorySimulator } from "./simulator";

// ---------------------------------------------------------------------------
// Formatting helpers
// ---------------------------------------------------------------------------

export function formatBytes(bytes: number): string {
  if (bytes >= 1024 * 1024 * 1024) {
    return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)}GB`;
  }
  if (bytes >= 1024 * 1024) {
    return `${(bytes / (1024 * 1024)).toFixed(2)}MB`;
  }
  if (bytes >= 1024) {
    return `${(bytes / 1024).toFixed(2)}KB`;
  }
  return `${bytes}B`;
}

function hex(address: number): string {
  return `0x${address.toString(16)}`;
}

function padR(s: string, len: number): string {
  return s.length >= len ? s : s + " ".repeat(len - s.length);
}

function row(label: string, value: string | number): string {
  return `  ${padR(`${label}:`, 32)} ${value}`;
}

// ---------------------------------------------------------------------------
// Report
// ---------------------------------------------------------------------------

/**
 * Text report of the simulator's current state and counters.
 * Resident-set sections describe the cache as left by the last run.
 */
export function formatReport(sim: MemorySimulator): string[] {
  const { config, index } = sim;
  const stats = sim.getStats();
  const ratios = sim.hitRatios();
  const resident = sim.residentBlocks();
  const tensorIds = index.tensorIds();
  const misaligned = index.misalignedTensors();

  const lines: string[] = [];
  lines.push("=== Memory Simulation Report ===");
  lines.push("Configuration:");
  lines.push(row("RAM size", `${config.ramSizeBytes} bytes`));
  lines.push(row("Block size", `${config.blockSizeBytes} bytes`));
  lines.push(row("Total blocks", config.capacity));
  lines.push("");

  lines.push("Block Alignment:");
  lines.push(
    row(
      "Block-aligned tensors",
      `${tensorIds.length - misaligned.length}/${tensorIds.length}`,
    ),
  );
  if (misaligned.length > 0) {
    lines.push(row("Misaligned tensors", misaligned.join(", ")));
  }
  lines.push("");

  lines.push("Sharing:");
  lines.push(row("Memory saved through sharing", `${stats.memorySavedSharing} bytes`));
  lines.push(row("Shared access ratio", ratios.sharedAccessRatio.toFixed(4)));
  lines.push(row("Resident blocks", resident.length));
  lines.push("");

  lines.push("Performance:");
  lines.push(row("Block hit ratio", ratios.blockHitRatio.toFixed(4)));
  lines.push(row("Tensor hit ratio", ratios.tensorHitRatio.toFixed(4)));
  lines.push(row("Peak memory", `${stats.peakMemory} bytes (${formatBytes(stats.peakMemory)})`));
  lines.push(row("Total I/O", `${stats.totalIo} bytes (${formatBytes(stats.totalIo)})`));
  lines.push("");

  lines.push("Counters:");
  lines.push(row("Block hits", stats.blockHits));
  lines.push(row("Block misses", stats.blockMisses));
  lines.push(row("Block evictions", stats.blockEvictions));
  lines.push(row("Dirty evictions", stats.dirtyEvictions));
  lines.push(row("Tensor hits", stats.tensorHits));
  lines.push(row("Tensor misses", stats.tensorMisses));
  lines.push(row("Shared block accesses", stats.sharedBlockAccesses));
  lines.push(row("Skipped accesses", stats.skippedAccesses));

  const histogram = new Map<number, number>();
  for (const block of resident) {
    const n = block.tensorIds.length;
    histogram.set(n, (histogram.get(n) ?? 0) + 1);
  }
  if (histogram.size > 0) {
    lines.push("");
    lines.push("Resident blocks by tensor count:");
    for (const [n, count] of [...histogram].sort((a, b) => a[0] - b[0])) {
      lines.push(row(`Blocks with ${n} tensors`, count));
    }
  }

  const shared = resident
    .filter((b) => b.tensorIds.length > 1)
    .sort((a, b) => a.startAddress - b.startAddress);
  if (shared.length > 0) {
    lines.push("");
    lines.push("Shared resident blocks:");
    for (const block of shared) {
      lines.push(`  Block ${hex(block.startAddress)}:`);
      for (const id of block.tensorIds) {
        const info = index.tensor(id);
        if (!info) continue;
        lines.push(
          `    Tensor ${id}: offset ${info.address - block.startAddress} bytes, size ${info.size} bytes`,
        );
      }
    }
  }

  return lines;
}

/**
 * Chronological event log, grouped by step.
 */
export function formatEventLog(events: readonly MemoryEvent[]): string[] {
  const lines: string[] = ["=== Memory Event Log ==="];
  let currentStep = -1;
  for (const event of events) {
    if (event.step !== currentStep) {
      currentStep = event.step;
      lines.push(`Step ${currentStep}:`);
    }
    const shared =
      event.sharedTensorIds.length > 0
        ? ` (shared with tensors ${event.sharedTensorIds.join(", ")})`
        : "";
    const mode =
      event.type === "access" ? ` (${event.isWrite ? "write" : "read"})` : "";
    const writeBack = event.type === "evict" && event.isWrite ? " (write-back)" : "";
    lines.push(
      `  Node ${event.nodeIndex}: ${event.type} - Tensor ${event.primaryTensorId}${shared}${mode}${writeBack} [block ${hex(event.blockAddress)}, size ${event.blockSize}]`,
    );
  }
  return lines;
}

export function printReport(sim: MemorySimulator): void {
  console.log(formatReport(sim).join("\n"));
  if (sim.config.capture.kind === "full") {
    console.log();
    console.log(formatEventLog(sim.events).join("\n"));
  }
}
