import { lockPiece } from "../core/board";
import { createActivePiece, isTopOut } from "../core/spawning";
import { nextPieceUid, type PieceUid } from "../../types/brands";
import { recordSpawn } from "../scoring/stats";

import type { DomainEvent } from "../events";
import type { GameState, PieceKind } from "../types";

/**
 * Write the active piece into the board under a fresh piece id. The active
 * slot empties and hold becomes available again.
 */
export function placeActivePiece(state: GameState): {
  state: GameState;
  uid: PieceUid | null;
} {
  if (!state.piece) {
    return { state, uid: null };
  }

  const uid = state.nextPieceUid;
  const newState: GameState = {
    ...state,
    board: lockPiece(state.board, state.piece, uid),
    hold: { ...state.hold, usedThisTurn: false },
    nextPieceUid: nextPieceUid(uid),
    piece: null,
  };

  return { state: newState, uid };
}

export function endGame(state: GameState): {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
} {
  return {
    events: [
      {
        kind: "GameOver",
        linesCleared: state.linesCleared,
        score: state.score,
        tick: state.tick,
      },
    ],
    state: {
      ...state,
      piece: null,
      run: { ...state.run, gameOver: true, started: false },
    },
  };
}

/**
 * Promote the next piece to active and draw a new next piece. A next piece
 * that collides at the spawn position ends the game instead.
 */
export function spawnPiece(state: GameState): {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
} {
  let rng = state.rng;
  let kind: PieceKind;
  if (state.next !== null) {
    kind = state.next;
  } else {
    const drawn = rng.getNextPiece();
    kind = drawn.piece;
    rng = drawn.newRng;
  }

  if (isTopOut(state.board, kind)) {
    return endGame({ ...state, next: kind, rng });
  }

  const upcoming = rng.getNextPiece();
  const newState: GameState = {
    ...state,
    next: upcoming.piece,
    physics: { ...state.physics, fallAccumMs: 0 },
    piece: createActivePiece(kind),
    rng: upcoming.newRng,
    stats: recordSpawn(state.stats, kind),
  };

  return {
    events: [{ kind: "PieceSpawned", piece: kind, tick: state.tick }],
    state: newState,
  };
}
