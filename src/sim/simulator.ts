/**
 * Memory Simulator
 *
 * Replays an execution plan against a block-paged RAM of fixed size:
 * - Demand loading of every block a tensor spans
 * - Strict LRU eviction over blocks (not tensors)
 * - Dirty tracking with write-back cost on eviction
 * - Shared blocks (allocator reuse) counted once in I/O and residency
 *
 * The simulator is a deterministic function of its config, the tensor table
 * and the plan. Inputs are never mutated.
 */

import type {
  ExecutionPlan,
  TensorId,
  TensorTable,
} from "../core/tensor-table";
import { BlockAddressIndex } from "./block-index";
import {
  resolveConfig,
  type SimulatorConfig,
  type SimulatorOptions,
} from "./config";
import { EventLog, type MemoryEvent, splitPrimary } from "./events";
import { ResidentCache, type ResidentBlock } from "./resident-cache";
import {
  computeHitRatios,
  createStats,
  type HitRatios,
  type SimStats,
} from "./stats";

/**
 * Resident block together with the tensors it serves.
 */
export interface ResidentBlockInfo extends ResidentBlock {
  tensorIds: readonly TensorId[];
}

export interface MemoryState {
  residentBytes: number;
  ramSizeBytes: number;
  usagePercent: number;
  loadedBlocks: number;
  capacity: number;
  avgTensorsPerBlock: number;
  sharedBlocks: ResidentBlockInfo[];
}

export class MemorySimulator {
  readonly config: SimulatorConfig;
  readonly index: BlockAddressIndex;

  private readonly cache: ResidentCache;
  private readonly log: EventLog;
  private stats: SimStats;
  private readonly warnedTensors = new Set<TensorId>();

  /**
   * @throws ConfigError when the RAM or block size is invalid
   */
  constructor(options: SimulatorOptions, tensors: TensorTable) {
    this.config = resolveConfig(options);
    this.index = new BlockAddressIndex(tensors, this.config.blockSizeBytes);
    this.cache = new ResidentCache(this.config.capacity);
    this.log = new EventLog(this.config.capture);
    this.stats = createStats(this.index.sharingStats().memorySaved);
  }

  get capacity(): number {
    return this.config.capacity;
  }

  get residentBytes(): number {
    return this.cache.size * this.config.blockSizeBytes;
  }

  /** Chronological event log; empty in stats-only mode. */
  get events(): MemoryEvent[] {
    return this.log.snapshot();
  }

  getStats(): SimStats {
    return { ...this.stats };
  }

  hitRatios(): HitRatios {
    return computeHitRatios(this.stats);
  }

  /**
   * Clear resident blocks, counters and events.
   */
  reset(): void {
    this.cache.clear();
    this.log.clear();
    this.warnedTensors.clear();
    this.stats = createStats(this.index.sharingStats().memorySaved);
  }

  /**
   * Replay a plan from a cold cache. Each node reads its inputs, then writes
   * its outputs, in listed order. The step is the node's position in the plan.
   */
  simulate(plan: ExecutionPlan): SimStats {
    this.reset();
    if (this.config.verbose) {
      console.log(
        `[tensorsim] RAM ${this.config.ramSizeBytes} bytes, block ${this.config.blockSizeBytes} bytes, ${this.config.capacity} blocks`,
      );
    }

    plan.forEach((node, step) => {
      if (this.config.verbose) {
        console.log(
          `[tensorsim] step ${step}: node ${node.nodeIndex} (${node.operator})`,
        );
      }
      for (const tensorId of node.inputs) {
        this.accessTensor(tensorId, step, node.nodeIndex, false);
      }
      for (const tensorId of node.outputs) {
        this.accessTensor(tensorId, step, node.nodeIndex, true);
      }
    });

    return this.getStats();
  }

  /**
   * Access every block of one tensor. Unknown tensors are skipped.
   */
  accessTensor(
    tensorId: TensorId,
    step: number,
    nodeIndex: number,
    isWrite: boolean,
  ): void {
    const blocks = this.index.blocksForTensor(tensorId);
    if (blocks === undefined) {
      this.stats.skippedAccesses++;
      if (!this.warnedTensors.has(tensorId)) {
        this.warnedTensors.add(tensorId);
        console.warn(
          `[tensorsim] tensor ${tensorId} (node ${nodeIndex}, step ${step}) is not in the tensor table; skipping its accesses`,
        );
      }
      return;
    }

    let fullyResident = true;
    for (const blockAddress of blocks) {
      const tensorIds = this.index.tensorsInBlock(blockAddress);
      if (tensorIds.length > 1) {
        this.stats.sharedBlockAccesses++;
      }

      if (this.cache.touch(blockAddress, step, isWrite)) {
        this.stats.blockHits++;
        this.log.record({
          step,
          nodeIndex,
          type: "access",
          primaryTensorId: tensorId,
          blockAddress,
          blockSize: this.config.blockSizeBytes,
          sharedTensorIds: tensorIds.filter((id) => id !== tensorId),
          isWrite,
        });
      } else {
        fullyResident = false;
        this.loadBlock(blockAddress, tensorIds, step, nodeIndex, isWrite);
      }
    }

    if (fullyResident) {
      this.stats.tensorHits++;
    } else {
      this.stats.tensorMisses++;
    }
    this.stats.peakMemory = Math.max(this.stats.peakMemory, this.residentBytes);
  }

  /**
   * Resident blocks from least- to most-recently-used.
   */
  residentBlocks(): ResidentBlockInfo[] {
    return this.cache.blocks().map((block) => ({
      ...block,
      tensorIds: this.index.tensorsInBlock(block.startAddress),
    }));
  }

  /**
   * Blocks of one tensor currently resident, ascending by address.
   */
  residentBlocksForTensor(tensorId: TensorId): ResidentBlock[] {
    const resident: ResidentBlock[] = [];
    for (const address of this.index.blocksForTensor(tensorId) ?? []) {
      const block = this.cache.peek(address);
      if (block) resident.push(block);
    }
    return resident;
  }

  memoryState(): MemoryState {
    const blocks = this.residentBlocks();
    const tensorRefs = blocks.reduce((n, b) => n + b.tensorIds.length, 0);
    return {
      residentBytes: this.residentBytes,
      ramSizeBytes: this.config.ramSizeBytes,
      usagePercent: (this.residentBytes / this.config.ramSizeBytes) * 100,
      loadedBlocks: blocks.length,
      capacity: this.config.capacity,
      avgTensorsPerBlock: blocks.length > 0 ? tensorRefs / blocks.length : 0,
      sharedBlocks: blocks.filter((b) => b.tensorIds.length > 1),
    };
  }

  private loadBlock(
    blockAddress: number,
    tensorIds: readonly TensorId[],
    step: number,
    nodeIndex: number,
    isWrite: boolean,
  ): void {
    if (this.cache.isFull()) {
      this.evictLru(step, nodeIndex);
    }

    const blockSize = this.config.blockSizeBytes;
    this.cache.insert(blockAddress, step, isWrite);
    this.stats.totalIo += blockSize;
    this.stats.blockMisses++;

    const { primary, shared } = splitPrimary(tensorIds);
    this.log.record({
      step,
      nodeIndex,
      type: "load",
      primaryTensorId: primary,
      blockAddress,
      blockSize,
      sharedTensorIds: shared,
      isWrite,
    });

    if (this.config.verbose) {
      console.log(
        `[tensorsim]   load block 0x${blockAddress.toString(16)} (${blockSize} bytes) for tensors ${tensorIds.join(", ")}`,
      );
    }
  }

  private evictLru(step: number, nodeIndex: number): void {
    const victim = this.cache.evictLru();
    if (!victim) return;

    const blockSize = this.config.blockSizeBytes;
    if (victim.dirty) {
      this.stats.totalIo += blockSize;
      this.stats.dirtyEvictions++;
    }
    this.stats.blockEvictions++;

    const { primary, shared } = splitPrimary(
      this.index.tensorsInBlock(victim.startAddress),
    );
    this.log.record({
      step,
      nodeIndex,
      type: "evict",
      primaryTensorId: primary,
      blockAddress: victim.startAddress,
      blockSize,
      sharedTensorIds: shared,
      isWrite: victim.dirty,
    });
  }
}
