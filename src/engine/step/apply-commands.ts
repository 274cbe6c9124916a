import { tryHold } from "../gameplay/hold";
import {
  releaseShift,
  tryHardDrop,
  tryRotate,
  tryShift,
} from "../gameplay/movement";

import type { Command } from "../commands";
import type { DomainEvent } from "../events";
import type { GameState } from "../types";

export type CommandSideEffects = {
  hardDropped: boolean;
};

type CommandResult = {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
  hardDropped: boolean;
};

/**
 * Helper function to create CommandResult objects more ergonomically
 */
function createCommandResult(opts: {
  state: GameState;
  events?: ReadonlyArray<DomainEvent>;
  hardDropped?: boolean;
}): CommandResult {
  return {
    events: opts.events ?? [],
    hardDropped: opts.hardDropped ?? false,
    state: opts.state,
  };
}

/**
 * Handles MoveLeft and MoveRight commands
 */
function handleShift(
  state: GameState,
  dir: "Left" | "Right",
  source: "tap" | "repeat",
  dtMs: number,
): CommandResult {
  const r = tryShift(state, dir, source, dtMs);
  if (r.moved) {
    return createCommandResult({
      events: [{ dir, kind: "PieceMoved", source, tick: state.tick }],
      state: r.state,
    });
  }
  return createCommandResult({ state: r.state });
}

/**
 * Handles rotation commands
 */
function handleRotation(
  state: GameState,
  direction: "CW" | "CCW",
): CommandResult {
  const r = tryRotate(state, direction);
  if (r.rotated) {
    return createCommandResult({
      events: [{ dir: direction, kind: "PieceRotated", tick: state.tick }],
      state: r.state,
    });
  }
  return createCommandResult({ state });
}

/**
 * Handles soft drop commands
 */
function handleSoftDrop(state: GameState, on: boolean): CommandResult {
  if (state.input.softDropOn !== on) {
    return createCommandResult({
      state: { ...state, input: { ...state.input, softDropOn: on } },
    });
  }
  return createCommandResult({ state });
}

/**
 * Handles hard drop command
 */
function handleHardDrop(state: GameState): CommandResult {
  const r = tryHardDrop(state);
  return createCommandResult({
    hardDropped: r.hardDropped,
    state: r.state,
  });
}

/**
 * Handles hold command
 */
function handleHold(state: GameState): CommandResult {
  const r = tryHold(state);
  return createCommandResult({ events: r.events, state: r.state });
}

/**
 * Maps commands to their appropriate handlers
 */
function getCommandHandler(
  cmd: Command,
  state: GameState,
  dtMs: number,
): CommandResult {
  switch (cmd.kind) {
    case "MoveLeft":
      return handleShift(state, "Left", cmd.source, dtMs);
    case "MoveRight":
      return handleShift(state, "Right", cmd.source, dtMs);
    case "RotateCW":
      return handleRotation(state, "CW");
    case "RotateCCW":
      return handleRotation(state, "CCW");
    case "SoftDropOn":
      return handleSoftDrop(state, true);
    case "SoftDropOff":
      return handleSoftDrop(state, false);
    case "HardDrop":
      return handleHardDrop(state);
    case "Hold":
      return handleHold(state);
    case "TogglePause":
      // Pause is resolved by step() before any gameplay command runs
      return createCommandResult({ state });
  }
}

/**
 * Apply one tick's commands in order. A hard drop ends command processing
 * for the tick. A direction with no move command this tick is released.
 */
export function applyCommands(
  state: GameState,
  cmds: ReadonlyArray<Command>,
  dtMs: number,
): {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
  sideEffects: CommandSideEffects;
} {
  let s = state;
  const events: Array<DomainEvent> = [];

  for (const cmd of cmds) {
    const result = getCommandHandler(cmd, s, dtMs);
    s = result.state;
    events.push(...result.events);
    if (result.hardDropped) {
      return { events, sideEffects: { hardDropped: true }, state: s };
    }
    if (s.run.gameOver) break;
  }

  if (!cmds.some((c) => c.kind === "MoveLeft")) s = releaseShift(s, "Left");
  if (!cmds.some((c) => c.kind === "MoveRight")) s = releaseShift(s, "Right");

  return { events, sideEffects: { hardDropped: false }, state: s };
}
