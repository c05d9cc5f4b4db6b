import type { TensorId, TensorInfo, TensorTable } from "../core/tensor-table";
import { tensorEnd } from "../core/tensor-table";

const EMPTY: readonly TensorId[] = [];

/**
 * Structural sharing figures, independent of any access pattern.
 */
export interface SharingStats {
  totalTensorBytes: number;
  uniqueBlocks: number;
  uniqueBlockBytes: number;
  /** totalTensorBytes - uniqueBlockBytes. Negative when padding dominates. */
  memorySaved: number;
}

/**
 * Immutable mapping from block-aligned addresses to the tensors overlapping
 * them. Built once from the tensor table; all lists are ascending.
 */
export class BlockAddressIndex {
  readonly blockSize: number;
  private readonly table: TensorTable;
  private readonly sortedIds: TensorId[];
  private readonly entries: Array<[TensorId, TensorInfo]>;
  private readonly blockTensors = new Map<number, TensorId[]>();
  private readonly sharing: SharingStats;

  constructor(table: TensorTable, blockSize: number) {
    this.table = table;
    this.blockSize = blockSize;
    this.entries = Array.from(table.entries()).sort((a, b) => a[0] - b[0]);
    this.sortedIds = this.entries.map(([id]) => id);

    let totalTensorBytes = 0;
    for (const [id, info] of this.entries) {
      if (
        !Number.isSafeInteger(info.address) ||
        !Number.isSafeInteger(info.size) ||
        info.address < 0 ||
        info.size < 0 ||
        tensorEnd(info) > Number.MAX_SAFE_INTEGER
      ) {
        throw new RangeError(
          `Tensor ${id} range [${info.address}, +${info.size}) is not a non-negative safe integer range`,
        );
      }
      totalTensorBytes += info.size;
      for (const start of this.spanOf(info)) {
        const ids = this.blockTensors.get(start);
        if (ids) {
          ids.push(id);
        } else {
          this.blockTensors.set(start, [id]);
        }
      }
    }

    const uniqueBlocks = this.blockTensors.size;
    this.sharing = {
      totalTensorBytes,
      uniqueBlocks,
      uniqueBlockBytes: uniqueBlocks * blockSize,
      memorySaved: totalTensorBytes - uniqueBlocks * blockSize,
    };
  }

  /**
   * Align an address down to its block start.
   */
  alignDown(address: number): number {
    return Math.floor(address / this.blockSize) * this.blockSize;
  }

  has(tensorId: TensorId): boolean {
    return this.table.has(tensorId);
  }

  tensor(tensorId: TensorId): TensorInfo | undefined {
    return this.table.get(tensorId);
  }

  /** Tensor ids in ascending order. */
  tensorIds(): readonly TensorId[] {
    return this.sortedIds;
  }

  /**
   * Block start addresses a tensor spans, ascending.
   * Returns undefined for a tensor missing from the table.
   */
  blocksForTensor(tensorId: TensorId): number[] | undefined {
    const info = this.table.get(tensorId);
    if (!info) return undefined;
    return this.spanOf(info);
  }

  /**
   * Tensors whose byte range intersects [blockStart, blockEnd).
   */
  tensorsOverlapping(blockStart: number, blockEnd: number): TensorId[] {
    if (
      blockEnd - blockStart === this.blockSize &&
      blockStart === this.alignDown(blockStart)
    ) {
      return this.tensorsInBlock(blockStart).slice();
    }
    const ids: TensorId[] = [];
    for (const [id, info] of this.entries) {
      if (info.size <= 0) continue;
      if (tensorEnd(info) > blockStart && info.address < blockEnd) {
        ids.push(id);
      }
    }
    return ids;
  }

  /**
   * Precomputed tensors for an aligned block. Empty for untouched blocks.
   */
  tensorsInBlock(blockStart: number): readonly TensorId[] {
    return this.blockTensors.get(blockStart) ?? EMPTY;
  }

  sharingStats(): SharingStats {
    return { ...this.sharing };
  }

  /** Tensors whose address is not a multiple of the block size. */
  misalignedTensors(): TensorId[] {
    return this.entries
      .filter(([, info]) => info.address % this.blockSize !== 0)
      .map(([id]) => id);
  }

  /** Blocks overlapped by more than one tensor, ascending. */
  sharedBlocks(): number[] {
    const shared: number[] = [];
    for (const [start, ids] of this.blockTensors) {
      if (ids.length > 1) shared.push(start);
    }
    return shared.sort((a, b) => a - b);
  }

  private spanOf(info: TensorInfo): number[] {
    if (info.size <= 0) return [];
    const first = this.alignDown(info.address);
    const last = this.alignDown(tensorEnd(info) - 1);
    const blocks: number[] = [];
    for (let start = first; start <= last; start += this.blockSize) {
      blocks.push(start);
    }
    return blocks;
  }
}
