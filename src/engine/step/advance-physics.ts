import { gravityStep } from "../physics/gravity";

import type { DomainEvent } from "../events";
import type { CommandSideEffects } from "./apply-commands";
import type { GameState } from "../types";

export type PhysicsSideEffects = {
  hardDropped: boolean;
  lockNow: boolean;
};

export function advancePhysics(
  state: GameState,
  cmdFx: CommandSideEffects,
  dtMs: number,
): {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
  sideEffects: PhysicsSideEffects;
} {
  // Hard drop locks this tick; gravity does not run
  if (cmdFx.hardDropped) {
    return {
      events: [],
      sideEffects: { hardDropped: true, lockNow: true },
      state,
    };
  }

  const g = gravityStep(state, dtMs);
  const events: Array<DomainEvent> = [];
  if (g.state.input.softDropOn) {
    for (let i = 0; i < g.cellsMoved; i++) {
      events.push({
        dir: "Down",
        kind: "PieceMoved",
        source: "softDrop",
        tick: state.tick,
      });
    }
  }

  return {
    events,
    sideEffects: { hardDropped: false, lockNow: g.lockNow },
    state: g.state,
  };
}
