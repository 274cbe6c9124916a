import type { Keymap } from "./default-keymaps";
import type { GameKey, InputSnapshot, KeyState } from "../control/types";

export type EdgeState = Readonly<{
  down: Readonly<Record<GameKey, boolean>>;
}>;

export type EdgeComputationResult = Readonly<{
  snapshot: InputSnapshot;
  nextEdgeState: EdgeState;
}>;

function record<T>(f: (k: GameKey) => T): Readonly<Record<GameKey, T>> {
  return {
    down: f("down"),
    hold: f("hold"),
    left: f("left"),
    mute: f("mute"),
    nextSong: f("nextSong"),
    pause: f("pause"),
    right: f("right"),
    rotateCcw: f("rotateCcw"),
    rotateCw: f("rotateCw"),
    up: f("up"),
  };
}

export function makeInitialEdgeState(): EdgeState {
  return { down: record(() => false) };
}

/** Helper: check if ANY binding entry maps to this key and is currently down. */
function isKeyDown(
  map: Keymap,
  key: GameKey,
  codesDown: ReadonlySet<string>,
): boolean {
  for (const [code, mapped] of map.entries()) {
    if (codesDown.has(code) && mapped.includes(key)) {
      return true;
    }
  }
  return false;
}

/**
 * Pure function turning the physical codes down this tick into the
 * pressed/held snapshot, diffing against the previous tick.
 */
export function computeEdges(
  prevEdgeState: EdgeState,
  codesDown: ReadonlySet<string>,
  keymap: Keymap,
): EdgeComputationResult {
  const downNow = record((k) => isKeyDown(keymap, k, codesDown));
  const snapshot: InputSnapshot = record(
    (k): KeyState => ({
      held: downNow[k],
      pressed: downNow[k] && !prevEdgeState.down[k],
    }),
  );
  return { nextEdgeState: { down: downNow }, snapshot };
}
