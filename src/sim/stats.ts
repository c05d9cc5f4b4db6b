/**
 * Counters accumulated over one simulation run. All byte figures are bytes.
 */
export interface SimStats {
  blockHits: number;
  blockMisses: number;
  blockEvictions: number;
  tensorHits: number;
  tensorMisses: number;
  /** Bytes loaded plus bytes written back on dirty evictions. */
  totalIo: number;
  peakMemory: number;
  sharedBlockAccesses: number;
  /** Static: tensor bytes minus bytes of unique covering blocks. */
  memorySavedSharing: number;
  dirtyEvictions: number;
  skippedAccesses: number;
}

export interface HitRatios {
  blockHitRatio: number;
  tensorHitRatio: number;
  sharedAccessRatio: number;
}

export function createStats(memorySavedSharing = 0): SimStats {
  return {
    blockHits: 0,
    blockMisses: 0,
    blockEvictions: 0,
    tensorHits: 0,
    tensorMisses: 0,
    totalIo: 0,
    peakMemory: 0,
    sharedBlockAccesses: 0,
    memorySavedSharing,
    dirtyEvictions: 0,
    skippedAccesses: 0,
  };
}

export function computeHitRatios(stats: SimStats): HitRatios {
  const blockAccesses = stats.blockHits + stats.blockMisses;
  const tensorAccesses = stats.tensorHits + stats.tensorMisses;
  return {
    blockHitRatio: blockAccesses > 0 ? stats.blockHits / blockAccesses : 0,
    tensorHitRatio: tensorAccesses > 0 ? stats.tensorHits / tensorAccesses : 0,
    sharedAccessRatio: stats.sharedBlockAccesses / Math.max(1, blockAccesses),
  };
}
