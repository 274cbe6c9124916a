// Tests for @/engine/core/rng/sequence.ts
import { SequenceRng } from "@/engine/core/rng/sequence";
import { type PieceKind } from "@/engine/core/types";

import type { PieceRandomGenerator } from "@/engine/core/rng/interface";

describe("@/engine/core/rng/sequence — cycling sequence", () => {
  test("Throws on empty sequence", () => {
    expect(() => new SequenceRng([])).toThrow("Sequence must not be empty");
  });

  test("Yields the sequence in order, then wraps around", () => {
    let rng: PieceRandomGenerator = new SequenceRng(["I", "O", "T"]);
    const actual: Array<PieceKind> = [];

    for (let i = 0; i < 6; i++) {
      const result = rng.getNextPiece();
      actual.push(result.piece);
      rng = result.newRng;
    }

    expect(actual).toEqual(["I", "O", "T", "I", "O", "T"]);
  });

  test("Each draw leaves the source generator untouched", () => {
    const rng = new SequenceRng(["S", "Z"]);
    const first = rng.getNextPiece();
    expect(first.piece).toBe("S");
    expect(rng.getNextPiece().piece).toBe("S");
    expect(first.newRng.getNextPiece().piece).toBe("Z");
  });
});
