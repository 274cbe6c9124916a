import { clearLines } from "../core/board";
import { placeActivePiece, spawnPiece } from "../gameplay/spawn";
import {
  applyBonusSquares,
  shiftEffectsAfterClear,
} from "../scoring/bonus-squares";
import { scanFullRows } from "../scoring/line-clear";

import type { DomainEvent } from "../events";
import type { PhysicsSideEffects } from "./advance-physics";
import type { GameState } from "../types";

type TransitionResult = { state: GameState; events: Array<DomainEvent> };

/**
 * Lock the active piece: write it, run the bonus detector, then either stage
 * a line clear or spawn the next piece.
 */
function handleLocking(
  state: GameState,
  physFx: PhysicsSideEffects,
): TransitionResult {
  const events: Array<DomainEvent> = [];
  if (!state.piece || !physFx.lockNow) {
    return { events, state };
  }

  const justLocked = state.piece;
  const placed = placeActivePiece(state);
  let s = placed.state;
  if (placed.uid === null) {
    // placeActivePiece only returns null without an active piece
    throw new Error("Unexpected: placeActivePiece returned no uid");
  }
  events.push({
    kind: "PieceLocked",
    piece: justLocked,
    source: physFx.hardDropped ? "hardDrop" : "gravity",
    tick: s.tick,
    uid: placed.uid,
  });

  const squares = applyBonusSquares(s);
  s = squares.state;
  events.push(...squares.events);

  const full = scanFullRows(s.board, s.cfg);
  if (full.rows.length > 0) {
    s = {
      ...s,
      lineClear: {
        bonus: full.bonus,
        remainingMs: s.cfg.lineClearDelayMs,
        rows: full.rows,
      },
    };
    events.push({ kind: "LinesClearingStarted", rows: full.rows, tick: s.tick });
    return { events, state: s };
  }

  const sp = spawnPiece(s);
  events.push(...sp.events);
  return { events, state: sp.state };
}

export function resolveTransitions(
  state: GameState,
  physFx: PhysicsSideEffects,
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  return handleLocking(state, physFx);
}

/**
 * Collapse the pending rows, credit lines and bonus, then spawn the next
 * piece. The detector runs again on the collapsed board.
 */
export function completeLineClear(state: GameState): {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
} {
  const pending = state.lineClear;
  if (pending === null) return { events: [], state };

  const events: Array<DomainEvent> = [
    {
      bonus: pending.bonus,
      count: pending.rows.length,
      kind: "LinesCleared",
      rows: pending.rows,
      tick: state.tick,
    },
  ];

  let s: GameState = {
    ...state,
    board: clearLines(state.board, pending.rows),
    effects: shiftEffectsAfterClear(state.effects, pending.rows),
    lineClear: null,
    linesCleared: state.linesCleared + pending.rows.length,
    score: state.score + pending.bonus,
  };

  const sp = spawnPiece(s);
  s = sp.state;
  events.push(...sp.events);
  if (s.run.gameOver) return { events, state: s };

  const squares = applyBonusSquares(s);
  events.push(...squares.events);
  return { events, state: squares.state };
}

/**
 * Count the pending clear down by dt and collapse once it runs out.
 */
export function advanceLineClear(
  state: GameState,
  dtMs: number,
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  const pending = state.lineClear;
  if (pending === null) return { events: [], state };

  const remainingMs = pending.remainingMs - dtMs;
  if (remainingMs > 0) {
    return { events: [], state: { ...state, lineClear: { ...pending, remainingMs } } };
  }
  return completeLineClear(state);
}
