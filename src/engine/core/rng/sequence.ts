import { type PieceKind } from "../types";

import { type PieceRandomGenerator } from "./interface";

/**
 * Deterministic generator for tests and replays: yields `sequence` in order
 * and starts over at the end.
 */
export class SequenceRng implements PieceRandomGenerator {
  constructor(
    private readonly sequence: ReadonlyArray<PieceKind>,
    private readonly position = 0,
  ) {
    if (sequence.length === 0) throw new Error("Sequence must not be empty");
  }

  getNextPiece(): { piece: PieceKind; newRng: PieceRandomGenerator } {
    const piece = this.sequence[this.position % this.sequence.length];
    if (piece === undefined) throw new Error("Sequence position out of range");
    return {
      newRng: new SequenceRng(this.sequence, (this.position + 1) % this.sequence.length),
      piece,
    };
  }
}
