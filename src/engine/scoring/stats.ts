import { PIECE_KINDS, type PieceKind, type PieceStats } from "../types";

// Count one more spawn of `kind`; hold retrievals never come through here
export function recordSpawn(stats: PieceStats, kind: PieceKind): PieceStats {
  return { ...stats, [kind]: stats[kind] + 1 };
}

export function totalSpawned(stats: PieceStats): number {
  return PIECE_KINDS.reduce((sum, k) => sum + stats[k], 0);
}

/**
 * Share of spawns per kind in [0, 1]; all zeros before the first spawn.
 */
export function spawnShares(stats: PieceStats): PieceStats {
  const total = totalSpawned(stats);
  const share = (k: PieceKind): number => (total > 0 ? stats[k] / total : 0);
  return {
    I: share("I"),
    J: share("J"),
    L: share("L"),
    O: share("O"),
    S: share("S"),
    T: share("T"),
    Z: share("Z"),
  };
}
