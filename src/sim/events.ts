import type { TensorId } from "../core/tensor-table";
import type { CaptureMode } from "./config";

export type MemoryEventType = "load" | "evict" | "access";

/**
 * One entry of the chronological memory event log.
 *
 * For "access" the primary tensor is the one being accessed; for "load" and
 * "evict" it is the lowest id served by the block. `isWrite` on an eviction
 * means the block was dirty and written back.
 */
export interface MemoryEvent {
  readonly step: number;
  readonly nodeIndex: number;
  readonly type: MemoryEventType;
  readonly primaryTensorId: TensorId;
  readonly blockAddress: number;
  readonly blockSize: number;
  readonly sharedTensorIds: readonly TensorId[];
  readonly isWrite: boolean;
}

export class EventLog {
  private readonly events: MemoryEvent[] = [];

  constructor(private readonly mode: CaptureMode) {}

  record(event: MemoryEvent): void {
    if (this.mode.kind === "stats-only") return;
    this.events.push(Object.freeze(event));
  }

  snapshot(): MemoryEvent[] {
    return this.events.slice();
  }

  clear(): void {
    this.events.length = 0;
  }
}

/**
 * Split a block's tensor ids into the primary (lowest) id and the rest.
 */
export function splitPrimary(
  tensorIds: readonly TensorId[],
): { primary: TensorId; shared: TensorId[] } {
  let primary = tensorIds[0];
  for (const id of tensorIds) {
    if (id < primary) primary = id;
  }
  return {
    primary,
    shared: tensorIds.filter((id) => id !== primary),
  };
}
