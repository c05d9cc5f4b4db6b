import { afterEach, describe, expect, it, vi } from "vitest";

import { ConfigError, MemorySimulator } from "../src";
import {
  BLOCK,
  makeTable,
  readNode,
  threeBlockTable,
  writeNode,
} from "./helpers/tables";

describe("MemorySimulator", () => {
  describe("configuration", () => {
    it("derives capacity from the RAM budget", () => {
      const sim = new MemorySimulator({ ramSizeBytes: 10_000 }, threeBlockTable());
      expect(sim.capacity).toBe(2);
      expect(sim.config.blockSizeBytes).toBe(BLOCK);
    });

    it("rejects invalid budgets before simulating", () => {
      const table = threeBlockTable();
      expect(() => new MemorySimulator({ ramSizeBytes: 0 }, table)).toThrow(ConfigError);
      expect(
        () => new MemorySimulator({ ramSizeBytes: 8192, blockSizeBytes: -1 }, table),
      ).toThrow(ConfigError);
      expect(() => new MemorySimulator({ ramSizeBytes: 1000 }, table)).toThrow(
        "ramSizeBytes (1000) is smaller than blockSizeBytes (4096); capacity would be zero blocks",
      );
    });
  });

  describe("end-to-end replay", () => {
    const plan = [readNode(0, 1), readNode(1, 2), readNode(2, 3), readNode(3, 1)];

    it("evicts under a two-block budget", () => {
      const sim = new MemorySimulator({ ramSizeBytes: 8192 }, threeBlockTable());
      const stats = sim.simulate(plan);

      expect(stats).toEqual({
        blockHits: 0,
        blockMisses: 4,
        blockEvictions: 2,
        tensorHits: 0,
        tensorMisses: 4,
        totalIo: 4 * BLOCK,
        peakMemory: 8192,
        sharedBlockAccesses: 0,
        memorySavedSharing: 0,
        dirtyEvictions: 0,
        skippedAccesses: 0,
      });
      expect(sim.residentBlocks().map((b) => b.startAddress)).toEqual([2 * BLOCK, 0]);
    });

    it("records load and evict events in order", () => {
      const sim = new MemorySimulator({ ramSizeBytes: 8192 }, threeBlockTable());
      sim.simulate(plan);

      expect(
        sim.events.map((e) => [e.step, e.type, e.primaryTensorId, e.blockAddress]),
      ).toEqual([
        [0, "load", 1, 0],
        [1, "load", 2, BLOCK],
        [2, "evict", 1, 0],
        [2, "load", 3, 2 * BLOCK],
        [3, "evict", 2, BLOCK],
        [3, "load", 1, 0],
      ]);
    });

    it("hits when the budget covers the working set", () => {
      const sim = new MemorySimulator({ ramSizeBytes: 3 * BLOCK }, threeBlockTable());
      const stats = sim.simulate(plan);
      expect(stats.blockMisses).toBe(3);
      expect(stats.blockHits).toBe(1);
      expect(stats.blockEvictions).toBe(0);
      expect(stats.tensorHits).toBe(1);
      expect(stats.peakMemory).toBe(3 * BLOCK);
    });

    it("is deterministic across runs and instances", () => {
      const sim = new MemorySimulator({ ramSizeBytes: 8192 }, threeBlockTable());
      const first = sim.simulate(plan);
      const firstEvents = sim.events;
      const second = sim.simulate(plan);

      expect(second).toEqual(first);
      expect(sim.events).toEqual(firstEvents);

      const other = new MemorySimulator({ ramSizeBytes: 8192 }, threeBlockTable());
      expect(other.simulate(plan)).toEqual(first);
      expect(other.events).toEqual(firstEvents);
    });

    it("keeps counters but no events in stats-only mode", () => {
      const full = new MemorySimulator({ ramSizeBytes: 8192 }, threeBlockTable());
      const statsOnly = new MemorySimulator(
        { ramSizeBytes: 8192, captureEvents: false },
        threeBlockTable(),
      );
      expect(statsOnly.simulate(plan)).toEqual(full.simulate(plan));
      expect(statsOnly.events).toEqual([]);
      expect(statsOnly.config.capture).toEqual({ kind: "stats-only" });
    });
  });

  describe("LRU order", () => {
    it("evicts the least-recently-used block", () => {
      const sim = new MemorySimulator({ ramSizeBytes: 8192 }, threeBlockTable());
      sim.accessTensor(1, 0, 0, false);
      sim.accessTensor(2, 1, 1, false);
      sim.accessTensor(3, 2, 2, false);

      expect(sim.residentBlocksForTensor(1)).toEqual([]);
      expect(sim.residentBlocksForTensor(2)).toEqual([
        { startAddress: BLOCK, lastAccessStep: 1, dirty: false },
      ]);
      expect(sim.residentBlocks().map((b) => b.startAddress)).toEqual([BLOCK, 2 * BLOCK]);
    });

    it("refreshes recency on a hit", () => {
      const sim = new MemorySimulator({ ramSizeBytes: 8192 }, threeBlockTable());
      sim.simulate([readNode(0, 1), readNode(1, 2), readNode(2, 1), readNode(3, 3)]);
      expect(sim.residentBlocks().map((b) => b.startAddress)).toEqual([0, 2 * BLOCK]);
      expect(sim.getStats().blockHits).toBe(1);
    });
  });

  describe("shared blocks", () => {
    const table = makeTable([
      [1, 0, 100],
      [2, 2048, 100],
    ]);

    it("serves a co-resident tensor without extra I/O", () => {
      const sim = new MemorySimulator({ ramSizeBytes: 8192 }, table);
      const stats = sim.simulate([readNode(10, 1), readNode(11, 2)]);

      expect(stats.blockMisses).toBe(1);
      expect(stats.blockHits).toBe(1);
      expect(stats.totalIo).toBe(BLOCK);
      expect(stats.sharedBlockAccesses).toBe(2);
      expect(stats.tensorMisses).toBe(1);
      expect(stats.tensorHits).toBe(1);
      expect(stats.peakMemory).toBe(BLOCK);
      expect(stats.memorySavedSharing).toBe(200 - BLOCK);
    });

    it("lists sharers on load and access events", () => {
      const sim = new MemorySimulator({ ramSizeBytes: 8192 }, table);
      sim.simulate([readNode(10, 1), readNode(11, 2)]);
      expect(sim.events).toEqual([
        {
          step: 0,
          nodeIndex: 10,
          type: "load",
          primaryTensorId: 1,
          blockAddress: 0,
          blockSize: BLOCK,
          sharedTensorIds: [2],
          isWrite: false,
        },
        {
          step: 1,
          nodeIndex: 11,
          type: "access",
          primaryTensorId: 2,
          blockAddress: 0,
          blockSize: BLOCK,
          sharedTensorIds: [1],
          isWrite: false,
        },
      ]);
    });

    it("reports hit ratios", () => {
      const sim = new MemorySimulator({ ramSizeBytes: 8192 }, table);
      expect(sim.hitRatios()).toEqual({
        blockHitRatio: 0,
        tensorHitRatio: 0,
        sharedAccessRatio: 0,
      });
      sim.simulate([readNode(10, 1), readNode(11, 2)]);
      expect(sim.hitRatios()).toEqual({
        blockHitRatio: 0.5,
        tensorHitRatio: 0.5,
        sharedAccessRatio: 1,
      });
    });

    it("summarises the resident set", () => {
      const sim = new MemorySimulator({ ramSizeBytes: 8192 }, table);
      sim.simulate([readNode(10, 1)]);
      const state = sim.memoryState();
      expect(state.residentBytes).toBe(BLOCK);
      expect(state.usagePercent).toBe(50);
      expect(state.loadedBlocks).toBe(1);
      expect(state.avgTensorsPerBlock).toBe(2);
      expect(state.sharedBlocks.map((b) => b.tensorIds)).toEqual([[1, 2]]);
    });
  });

  describe("dirty blocks", () => {
    const table = makeTable([
      [1, 0, BLOCK],
      [2, BLOCK, BLOCK],
    ]);

    it("charges a write-back only for dirty evictions", () => {
      const sim = new MemorySimulator({ ramSizeBytes: BLOCK }, table);
      const stats = sim.simulate([writeNode(0, 1), readNode(1, 2), readNode(2, 1)]);

      expect(stats.blockMisses).toBe(3);
      expect(stats.blockEvictions).toBe(2);
      expect(stats.dirtyEvictions).toBe(1);
      expect(stats.totalIo).toBe(3 * BLOCK + BLOCK);
      expect(stats.peakMemory).toBe(BLOCK);
      expect(
        sim.events.filter((e) => e.type === "evict").map((e) => e.isWrite),
      ).toEqual([true, false]);
    });

    it("marks a resident block dirty on a write hit", () => {
      const sim = new MemorySimulator({ ramSizeBytes: 2 * BLOCK }, table);
      sim.accessTensor(1, 0, 0, false);
      expect(sim.residentBlocksForTensor(1)[0].dirty).toBe(false);
      sim.accessTensor(1, 1, 1, true);
      expect(sim.residentBlocksForTensor(1)[0].dirty).toBe(true);
      expect(sim.getStats().totalIo).toBe(BLOCK);
    });

    it("reads inputs before writing outputs within a node", () => {
      const sim = new MemorySimulator({ ramSizeBytes: 2 * BLOCK }, table);
      sim.simulate([{ nodeIndex: 7, operator: "ADD", inputs: [1], outputs: [2] }]);
      expect(sim.events.map((e) => [e.primaryTensorId, e.isWrite])).toEqual([
        [1, false],
        [2, true],
      ]);
    });
  });

  describe("tensor spans", () => {
    it("loads every block of a multi-block tensor", () => {
      const table = makeTable([[1, 2048, BLOCK]]);
      const sim = new MemorySimulator({ ramSizeBytes: 2 * BLOCK }, table);
      const stats = sim.simulate([readNode(0, 1), readNode(1, 1)]);
      expect(stats.blockMisses).toBe(2);
      expect(stats.blockHits).toBe(2);
      expect(stats.tensorMisses).toBe(1);
      expect(stats.tensorHits).toBe(1);
      expect(stats.totalIo).toBe(2 * BLOCK);
    });

    it("thrashes a tensor larger than the budget", () => {
      const table = makeTable([[1, 2048, BLOCK]]);
      const sim = new MemorySimulator({ ramSizeBytes: BLOCK }, table);
      const stats = sim.simulate([readNode(0, 1)]);
      expect(stats.blockMisses).toBe(2);
      expect(stats.blockEvictions).toBe(1);
      expect(stats.peakMemory).toBe(BLOCK);
    });

    it("counts a zero-size tensor as a hit without touching blocks", () => {
      const sim = new MemorySimulator({ ramSizeBytes: BLOCK }, makeTable([[1, 0, 0]]));
      const stats = sim.simulate([readNode(0, 1)]);
      expect(stats.tensorHits).toBe(1);
      expect(stats.blockHits + stats.blockMisses).toBe(0);
    });
  });

  describe("unknown tensors", () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it("skips them with a single warning per tensor", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const sim = new MemorySimulator({ ramSizeBytes: 8192 }, threeBlockTable());
      const stats = sim.simulate([readNode(0, 1, 42), readNode(1, 42), readNode(2, 2)]);

      expect(stats.skippedAccesses).toBe(2);
      expect(stats.blockMisses).toBe(2);
      expect(stats.tensorMisses).toBe(2);
      expect(sim.events.some((e) => e.primaryTensorId === 42)).toBe(false);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(
        "[tensorsim] tensor 42 (node 0, step 0) is not in the tensor table; skipping its accesses",
      );
    });

    it("warns again on a fresh run", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const sim = new MemorySimulator({ ramSizeBytes: 8192 }, threeBlockTable());
      sim.simulate([readNode(0, 42)]);
      sim.simulate([readNode(0, 42)]);
      expect(warn).toHaveBeenCalledTimes(2);
    });
  });

  describe("verbose mode", () => {
    it("prints each block load", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      try {
        const sim = new MemorySimulator(
          { ramSizeBytes: 8192, verbose: true },
          threeBlockTable(),
        );
        sim.simulate([readNode(5, 2)]);
        expect(log).toHaveBeenCalledWith(
          "[tensorsim] RAM 8192 bytes, block 4096 bytes, 2 blocks",
        );
        expect(log).toHaveBeenCalledWith("[tensorsim] step 0: node 5 (READ)");
        expect(log).toHaveBeenCalledWith(
          "[tensorsim]   load block 0x1000 (4096 bytes) for tensors 2",
        );
      } finally {
        log.mockRestore();
      }
    });
  });
});
