import { tryMove } from "../core/board";

import type { GameState } from "../types";

export function fallIntervalMs(state: GameState): number {
  const speed = state.input.softDropOn
    ? state.cfg.softDropSpeed
    : state.cfg.fallSpeed;
  return 1000 / speed;
}

/**
 * Accumulate elapsed time and step the piece down once per full interval.
 * A blocked step requests a lock and ends the loop, so a tick locks at most
 * once. This function does not emit events; it only updates state.
 */
export function gravityStep(
  state: GameState,
  dtMs: number,
): { state: GameState; cellsMoved: number; lockNow: boolean } {
  if (!state.piece) return { cellsMoved: 0, lockNow: false, state };

  const interval = fallIntervalMs(state);
  let accum = state.physics.fallAccumMs + dtMs;
  let piece = state.piece;
  let cellsMoved = 0;
  let lockNow = false;

  while (accum >= interval) {
    accum -= interval;
    const moved = tryMove(state.board, piece, 0, 1);
    if (moved === null) {
      lockNow = true;
      break;
    }
    piece = moved;
    cellsMoved++;
  }

  return {
    cellsMoved,
    lockNow,
    state: { ...state, physics: { ...state.physics, fallAccumMs: accum }, piece },
  };
}
