import { isRowFull } from "../core/board";
import { codeOf, idx } from "../core/types";

import type { Board, EngineConfig } from "../types";

export type FullRowScan = {
  rows: ReadonlyArray<number>;
  bonus: number;
};

const GOLD_CODE = codeOf("BonusGold");
const SILVER_CODE = codeOf("BonusSilver");

/**
 * Points a full row is worth: gold if it holds any gold cell, else silver if
 * it holds any silver cell, else nothing.
 */
export function rowBonus(board: Board, y: number, cfg: EngineConfig): number {
  let silver = false;
  for (let x = 0; x < board.width; x++) {
    const code = board.cells[idx(board, x, y)] ?? 0;
    if (code === GOLD_CODE) return cfg.goldPoints;
    if (code === SILVER_CODE) silver = true;
  }
  return silver ? cfg.silverPoints : 0;
}

// Full rows top to bottom, with the bonus summed over them
export function scanFullRows(board: Board, cfg: EngineConfig): FullRowScan {
  const rows: Array<number> = [];
  let bonus = 0;
  for (let y = 0; y < board.height; y++) {
    if (!isRowFull(board, y)) continue;
    rows.push(y);
    bonus += rowBonus(board, y, cfg);
  }
  return { bonus, rows };
}

/**
 * Fraction of the pending clear delay already elapsed, in [0, 1].
 */
export function clearProgress(remainingMs: number, delayMs: number): number {
  if (delayMs <= 0) return 1;
  return Math.min(1, Math.max(0, 1 - remainingMs / delayMs));
}
