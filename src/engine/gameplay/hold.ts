import { collides } from "../core/board";
import { createActivePiece } from "../core/spawning";

import { spawnPiece } from "./spawn";

import type { DomainEvent } from "../events";
import type { GameState } from "../types";

/**
 * Hold, once per spawned piece. An empty slot stores the current kind and
 * spawns the next piece; an occupied slot swaps the held kind in at the spawn
 * position. A swap that would collide changes nothing.
 */
export function tryHold(state: GameState): {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
} {
  if (!state.piece || state.hold.usedThisTurn) {
    return { events: [], state };
  }

  const currentKind = state.piece.kind;
  const heldKind = state.hold.piece;

  if (heldKind === null) {
    const stored: GameState = {
      ...state,
      hold: { piece: currentKind, usedThisTurn: true },
      piece: null,
    };
    const sp = spawnPiece(stored);
    return {
      events: [{ kind: "Held", swapped: false, tick: state.tick }, ...sp.events],
      state: sp.state,
    };
  }

  const incoming = createActivePiece(heldKind);
  if (collides(state.board, incoming.shape, incoming.x, incoming.y)) {
    return { events: [], state };
  }

  return {
    events: [{ kind: "Held", swapped: true, tick: state.tick }],
    state: {
      ...state,
      hold: { piece: currentKind, usedThisTurn: true },
      piece: incoming,
    },
  };
}
