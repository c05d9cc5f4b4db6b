/**
 * Input structures handed to the simulator. Both are produced outside the
 * core (from allocator logs or JSON dumps) and treated as read-only.
 */

export type TensorId = number;

/**
 * Static placement of one tensor in the simulated address space.
 */
export interface TensorInfo {
  address: number;
  size: number; // bytes
  dataType: string;
  usageCount: number;
  usedByNodes: readonly number[];
}

export type TensorTable = ReadonlyMap<TensorId, TensorInfo>;

/**
 * One scheduled node. Inputs are replayed as reads, outputs as writes.
 */
export interface PlanNode {
  nodeIndex: number;
  operator: string;
  inputs: readonly TensorId[];
  outputs: readonly TensorId[];
}

export type ExecutionPlan = readonly PlanNode[];

/**
 * Build a tensor table from a record keyed by decimal tensor id.
 * Keys other than canonical non-negative decimal integers are ignored.
 */
export function tensorTableFromRecord(
  record: Readonly<Record<string, TensorInfo>>,
): TensorTable {
  const table = new Map<TensorId, TensorInfo>();
  for (const [key, info] of Object.entries(record)) {
    if (!/^(0|[1-9]\d*)$/.test(key)) continue;
    const id = Number(key);
    if (!Number.isSafeInteger(id)) continue;
    table.set(id, info);
  }
  return table;
}

/**
 * Byte range end (exclusive) of a tensor.
 */
export function tensorEnd(info: TensorInfo): number {
  return info.address + info.size;
}
