import { canPlacePiece } from "./board";
import { PIECES } from "./pieces";
import {
  type ActivePiece,
  type Board,
  type PieceKind,
  SPAWN_X,
  SPAWN_Y,
} from "./types";

/**
 * Create a new active piece at the canonical spawn position in its catalog shape
 */
export function createActivePiece(kind: PieceKind): ActivePiece {
  const def = PIECES[kind];
  return {
    color: def.color,
    kind,
    shape: def.cells,
    x: SPAWN_X,
    y: SPAWN_Y,
  };
}

/**
 * Check if a piece can spawn at its default position
 */
export function canSpawnPiece(board: Board, kind: PieceKind): boolean {
  return canPlacePiece(board, createActivePiece(kind));
}

/**
 * Check if the game is topped out (can't spawn this piece)
 */
export function isTopOut(board: Board, kind: PieceKind): boolean {
  return !canSpawnPiece(board, kind);
}
