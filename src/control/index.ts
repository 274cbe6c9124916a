import type { ControlResult, GameKey, InputSnapshot, KeyState } from "./types";
import type { Command } from "../engine/commands";

const RELEASED: KeyState = { held: false, pressed: false };

export function emptyInput(): InputSnapshot {
  return toSnapshot(new Map());
}

function toSnapshot(states: ReadonlyMap<GameKey, KeyState>): InputSnapshot {
  const get = (k: GameKey): KeyState => states.get(k) ?? RELEASED;
  return {
    down: get("down"),
    hold: get("hold"),
    left: get("left"),
    mute: get("mute"),
    nextSong: get("nextSong"),
    pause: get("pause"),
    right: get("right"),
    rotateCcw: get("rotateCcw"),
    rotateCw: get("rotateCw"),
    up: get("up"),
  };
}

/**
 * Build a snapshot from the keys pressed and held this tick. A pressed key
 * counts as held.
 */
export function makeInput(
  pressed: ReadonlyArray<GameKey>,
  held: ReadonlyArray<GameKey> = [],
): InputSnapshot {
  const states = new Map<GameKey, KeyState>();
  for (const k of held) states.set(k, { held: true, pressed: false });
  for (const k of pressed) states.set(k, { held: true, pressed: true });
  return toSnapshot(states);
}

function horizontal(
  key: KeyState,
  kind: "MoveLeft" | "MoveRight",
  commands: Array<Command>,
): void {
  if (key.pressed) {
    commands.push({ kind, source: "tap" });
  } else if (key.held) {
    commands.push({ kind, source: "repeat" });
  }
}

/**
 * Pure input transducer. Commands come out in the order the engine resolves
 * them: pause, hard drop, left, right, rotate CCW, rotate CW, soft drop,
 * hold. Mute and song keys are audio concerns and produce nothing here.
 */
export function controlStep(input: InputSnapshot): ControlResult {
  const commands: Array<Command> = [];

  if (input.pause.pressed) commands.push({ kind: "TogglePause" });
  if (input.up.pressed) commands.push({ kind: "HardDrop" });
  horizontal(input.left, "MoveLeft", commands);
  horizontal(input.right, "MoveRight", commands);
  if (input.rotateCcw.pressed) commands.push({ kind: "RotateCCW" });
  if (input.rotateCw.pressed) commands.push({ kind: "RotateCW" });
  commands.push({ kind: input.down.held ? "SoftDropOn" : "SoftDropOff" });
  if (input.hold.pressed) commands.push({ kind: "Hold" });

  return { commands };
}
