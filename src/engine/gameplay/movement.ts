import { collides, dropToBottom, tryMove } from "../core/board";
import { rotateShape } from "../core/rotation";

import type { GameState, InputState, RotationDir } from "../types";

type ShiftResult = {
  state: GameState;
  moved: boolean;
};

type RotateResult = {
  state: GameState;
  rotated: boolean;
};

const TIMER_KEY = {
  Left: "leftTimerMs",
  Right: "rightTimerMs",
} as const satisfies Record<"Left" | "Right", keyof InputState>;

function withTimer(
  state: GameState,
  dir: "Left" | "Right",
  ms: number,
): GameState {
  const input: InputState =
    dir === "Left"
      ? { ...state.input, leftTimerMs: ms }
      : { ...state.input, rightTimerMs: ms };
  return { ...state, input };
}

/**
 * Horizontal move with auto-repeat. A tap moves at once and arms the initial
 * delay; a held key counts the timer down and moves each time it expires,
 * re-arming the repeat delay. A blocked repeat leaves the timer expired.
 */
export function tryShift(
  state: GameState,
  dir: "Left" | "Right",
  source: "tap" | "repeat",
  dtMs: number,
): ShiftResult {
  if (!state.piece) return { moved: false, state };
  const dx = dir === "Left" ? -1 : 1;

  if (source === "tap") {
    const moved = tryMove(state.board, state.piece, dx, 0);
    if (moved === null) return { moved: false, state };
    return {
      moved: true,
      state: withTimer(
        { ...state, piece: moved },
        dir,
        state.cfg.initialHorizontalDelayMs,
      ),
    };
  }

  const timer = state.input[TIMER_KEY[dir]] - dtMs;
  if (timer > 0) return { moved: false, state: withTimer(state, dir, timer) };

  const moved = tryMove(state.board, state.piece, dx, 0);
  if (moved === null) {
    return { moved: false, state: withTimer(state, dir, timer) };
  }
  return {
    moved: true,
    state: withTimer(
      { ...state, piece: moved },
      dir,
      state.cfg.horizontalRepeatDelayMs,
    ),
  };
}

// Release: the next press starts a fresh tap
export function releaseShift(state: GameState, dir: "Left" | "Right"): GameState {
  return state.input[TIMER_KEY[dir]] === 0 ? state : withTimer(state, dir, 0);
}

/**
 * Rotate about the kind's pivot in place. No kicks: a colliding result is
 * rejected. Non-rotating kinds never report a rotation.
 */
export function tryRotate(state: GameState, dir: RotationDir): RotateResult {
  if (!state.piece) return { rotated: false, state };
  const p = state.piece;
  const shape = rotateShape(p.shape, p.kind, dir);
  if (shape === p.shape) return { rotated: false, state };
  if (collides(state.board, shape, p.x, p.y)) return { rotated: false, state };
  return { rotated: true, state: { ...state, piece: { ...p, shape } } };
}

export function tryHardDrop(state: GameState): {
  state: GameState;
  hardDropped: boolean;
} {
  if (!state.piece) return { hardDropped: false, state };

  // Only move the piece to the bottom; locking happens in resolveTransitions
  return {
    hardDropped: true,
    state: { ...state, piece: dropToBottom(state.board, state.piece) },
  };
}
