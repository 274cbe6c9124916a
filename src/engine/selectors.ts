import { cellAt, dropToBottom } from "./core/board";
import { BONUS_COLORS, bonusKindOf } from "./core/pieces";
import { createActivePiece } from "./core/spawning";
import { effectCovers, SQUARE_SIZE } from "./scoring/bonus-squares";
import { clearProgress } from "./scoring/line-clear";

import type {
  ActivePiece,
  BoardCell,
  GameState,
  PieceStats,
  SquareEffect,
} from "./types";

// Run flags for UI branching
export const selectIsStarted = (s: GameState): boolean => s.run.started;
export const selectIsPaused = (s: GameState): boolean => s.run.paused;
export const selectIsGameOver = (s: GameState): boolean => s.run.gameOver;
export const selectIsPanic = (s: GameState): boolean => s.run.panic;

// Score and counters
export const selectScore = (s: GameState): number => s.score;
export const selectLinesCleared = (s: GameState): number => s.linesCleared;
export const selectPieceStats = (s: GameState): PieceStats => s.stats;

// Piece slots
export const selectActive = (s: GameState): ActivePiece | null => s.piece;
export const selectNext = (s: GameState): ActivePiece | null =>
  s.next === null ? null : createActivePiece(s.next);
export const selectHeld = (s: GameState): ActivePiece | null =>
  s.hold.piece === null ? null : createActivePiece(s.hold.piece);
export const selectCanHold = (s: GameState): boolean =>
  s.piece !== null && !s.hold.usedThisTurn;

// Ghost piece (for rendering overlays)
export function selectGhostPiece(s: GameState): ActivePiece | null {
  return s.piece ? dropToBottom(s.board, s.piece) : null;
}

// Line clear staging
export const selectClearingRows = (s: GameState): ReadonlyArray<number> =>
  s.lineClear?.rows ?? [];

export function selectClearProgress(s: GameState): number {
  if (s.lineClear === null) return 0;
  return clearProgress(s.lineClear.remainingMs, s.cfg.lineClearDelayMs);
}

export const selectSquareEffects = (
  s: GameState,
): ReadonlyArray<SquareEffect> => s.effects;

// Board contents, row-major from the top row
export function selectBoardCells(
  s: GameState,
): ReadonlyArray<ReadonlyArray<BoardCell | null>> {
  const rows: Array<Array<BoardCell | null>> = [];
  for (let y = 0; y < s.board.height; y++) {
    const row: Array<BoardCell | null> = [];
    for (let x = 0; x < s.board.width; x++) row.push(cellAt(s.board, x, y));
    rows.push(row);
  }
  return rows;
}

/**
 * Color of each locked cell as it should be drawn. Inside a blinking square
 * the tier color shows while the flash is on and the pre-conversion color
 * while it is off.
 */
export function selectDisplayColors(
  s: GameState,
): ReadonlyArray<ReadonlyArray<string | null>> {
  return selectBoardCells(s).map((row, y) =>
    row.map((cell, x) => {
      if (cell === null) return null;
      const e = s.effects.find((eff) => effectCovers(eff, x, y));
      if (e === undefined) return cell.color;
      if (e.flashOn) return BONUS_COLORS[bonusKindOf(e.tier)];
      return e.original[(y - e.y) * SQUARE_SIZE + (x - e.x)] ?? cell.color;
    }),
  );
}
