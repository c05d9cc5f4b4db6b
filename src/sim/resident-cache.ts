/**
 * Resident Cache — bounded set of loaded blocks in recency order.
 *
 * Blocks live in slot arrays (an arena) and are threaded onto an intrusive
 * doubly-linked list by slot index: head is least-recently-used, tail is
 * most-recently-used. A map from block address to slot gives O(1) lookup,
 * touch and eviction. Freed slots are recycled through a free list.
 */

const NIL = -1;

/**
 * Snapshot of one resident block.
 */
export interface ResidentBlock {
  startAddress: number;
  lastAccessStep: number;
  dirty: boolean;
}

export class ResidentCache {
  readonly capacity: number;

  private readonly slotByAddress = new Map<number, number>();
  private readonly address: number[] = [];
  private readonly lastAccess: number[] = [];
  private readonly dirty: boolean[] = [];
  private readonly prev: number[] = [];
  private readonly next: number[] = [];
  private readonly freeSlots: number[] = [];
  private head = NIL;
  private tail = NIL;

  constructor(capacity: number) {
    if (!Number.isSafeInteger(capacity) || capacity <= 0) {
      throw new Error(`ResidentCache capacity must be positive, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.slotByAddress.size;
  }

  isFull(): boolean {
    return this.slotByAddress.size >= this.capacity;
  }

  has(address: number): boolean {
    return this.slotByAddress.has(address);
  }

  /**
   * Mark a resident block most-recently-used. Returns false if not resident.
   */
  touch(address: number, step: number, isWrite: boolean): boolean {
    const slot = this.slotByAddress.get(address);
    if (slot === undefined) return false;
    this.lastAccess[slot] = step;
    if (isWrite) this.dirty[slot] = true;
    if (slot !== this.tail) {
      this.unlink(slot);
      this.linkTail(slot);
    }
    return true;
  }

  /**
   * Insert a non-resident block as most-recently-used.
   * The caller evicts first when the cache is full.
   */
  insert(address: number, step: number, dirty: boolean): void {
    if (this.slotByAddress.has(address)) {
      throw new Error(`Block 0x${address.toString(16)} is already resident`);
    }
    if (this.isFull()) {
      throw new Error(
        `ResidentCache is full (${this.capacity} blocks); evict before insert`,
      );
    }
    const slot = this.freeSlots.pop() ?? this.address.length;
    this.address[slot] = address;
    this.lastAccess[slot] = step;
    this.dirty[slot] = dirty;
    this.prev[slot] = NIL;
    this.next[slot] = NIL;
    this.linkTail(slot);
    this.slotByAddress.set(address, slot);
  }

  /**
   * Remove and return the least-recently-used block, or null when empty.
   */
  evictLru(): ResidentBlock | null {
    const slot = this.head;
    if (slot === NIL) return null;
    const evicted = this.snapshot(slot);
    this.unlink(slot);
    this.slotByAddress.delete(evicted.startAddress);
    this.freeSlots.push(slot);
    return evicted;
  }

  /**
   * Look up a resident block without changing its recency.
   */
  peek(address: number): ResidentBlock | undefined {
    const slot = this.slotByAddress.get(address);
    return slot === undefined ? undefined : this.snapshot(slot);
  }

  /**
   * Resident blocks from least- to most-recently-used.
   */
  blocks(): ResidentBlock[] {
    const out: ResidentBlock[] = [];
    for (let slot = this.head; slot !== NIL; slot = this.next[slot]) {
      out.push(this.snapshot(slot));
    }
    return out;
  }

  clear(): void {
    this.slotByAddress.clear();
    this.address.length = 0;
    this.lastAccess.length = 0;
    this.dirty.length = 0;
    this.prev.length = 0;
    this.next.length = 0;
    this.freeSlots.length = 0;
    this.head = NIL;
    this.tail = NIL;
  }

  private snapshot(slot: number): ResidentBlock {
    return {
      startAddress: this.address[slot],
      lastAccessStep: this.lastAccess[slot],
      dirty: this.dirty[slot],
    };
  }

  private linkTail(slot: number): void {
    this.prev[slot] = this.tail;
    this.next[slot] = NIL;
    if (this.tail === NIL) {
      this.head = slot;
    } else {
      this.next[this.tail] = slot;
    }
    this.tail = slot;
  }

  private unlink(slot: number): void {
    const before = this.prev[slot];
    const after = this.next[slot];
    if (before === NIL) {
      this.head = after;
    } else {
      this.next[before] = after;
    }
    if (after === NIL) {
      this.tail = before;
    } else {
      this.prev[after] = before;
    }
    this.prev[slot] = NIL;
    this.next[slot] = NIL;
  }
}
