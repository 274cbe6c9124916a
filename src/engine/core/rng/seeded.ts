import { type PieceKind, PIECE_KINDS } from "../types";

import { type PieceRandomGenerator } from "./interface";

// 32-bit FNV-1a, so any string works as a seed
function hashSeed(seed: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < seed.length; i++) {
    h ^= seed.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

// Numerical Recipes LCG constants
function lcg(state: number): number {
  return (Math.imul(state, 1664525) + 1013904223) >>> 0;
}

/**
 * Uniform draw over the seven kinds. There is no bag, so the same kind may
 * come up any number of times in a row.
 */
export class UniformRng implements PieceRandomGenerator {
  constructor(private readonly state: number) {}

  getNextPiece(): { piece: PieceKind; newRng: PieceRandomGenerator } {
    const state = lcg(this.state);
    // high bits scaled into [0, 7)
    const piece = PIECE_KINDS[Math.floor((state / 2 ** 32) * PIECE_KINDS.length)];
    if (piece === undefined) throw new Error("Random index out of range");
    return { newRng: new UniformRng(state), piece };
  }
}

export function createUniformRng(seed = "default"): PieceRandomGenerator {
  return new UniformRng(hashSeed(seed));
}
