import { type PieceKind } from "../types";

/**
 * Source of upcoming pieces. Drawing never mutates: each draw hands back the
 * generator to use for the following one.
 */
export type PieceRandomGenerator = {
  getNextPiece(): { piece: PieceKind; newRng: PieceRandomGenerator };
};
