import type { Command } from "../engine/commands";

export type GameKey =
  | "left"
  | "right"
  | "up" // hard drop
  | "down" // soft drop
  | "rotateCw"
  | "rotateCcw"
  | "hold"
  | "pause"
  | "mute"
  | "nextSong";

/**
 * `pressed` is true only on the tick the key went down; `held` stays true
 * for as long as it is down, the pressing tick included.
 */
export type KeyState = Readonly<{ pressed: boolean; held: boolean }>;

export type InputSnapshot = Readonly<Record<GameKey, KeyState>>;

export type ControlResult = {
  commands: ReadonlyArray<Command>;
};
