import type { ExecutionPlan, TensorTable } from "../core/tensor-table";
import type { SimulatorOptions } from "./config";
import { MemorySimulator } from "./simulator";
import type { HitRatios, SimStats } from "./stats";

export interface SweepRow {
  ramSizeBytes: number;
  capacity: number;
  stats: SimStats;
  ratios: HitRatios;
}

/**
 * Replay one plan under several RAM budgets, stats only, in the given order.
 * The block address index is rebuilt per budget; each run is independent.
 */
export function sweepRamSizes(
  tensors: TensorTable,
  plan: ExecutionPlan,
  ramSizes: readonly number[],
  options: Omit<SimulatorOptions, "ramSizeBytes" | "captureEvents"> = {},
): SweepRow[] {
  return ramSizes.map((ramSizeBytes) => {
    const sim = new MemorySimulator(
      { ...options, ramSizeBytes, captureEvents: false },
      tensors,
    );
    const stats = sim.simulate(plan);
    return {
      ramSizeBytes,
      capacity: sim.capacity,
      stats,
      ratios: sim.hitRatios(),
    };
  });
}
