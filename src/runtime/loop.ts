import { controlStep } from "../control/index";
import { step as engineStep } from "../engine/index";

import type { InputSnapshot } from "../control/types";
import type { Command } from "../engine/commands";
import type { DomainEvent } from "../engine/events";
import type { GameState } from "../engine/types";

export type RuntimeTickOutput = Readonly<{
  /** Engine domain events produced this tick. */
  events: ReadonlyArray<DomainEvent>;
  /** Commands that actually hit the engine this tick (for debugging/recording). */
  commands: ReadonlyArray<Command>;
}>;

/**
 * One pure runtime tick:
 *  - turns the input snapshot into Commands,
 *  - steps the engine by the elapsed time,
 *  - returns the new engine state and outputs.
 */
export function runtimeStep(
  engine: GameState,
  elapsedMs: number,
  input: InputSnapshot,
): { state: GameState; out: RuntimeTickOutput } {
  const c = controlStep(input);
  const r = engineStep(engine, elapsedMs, c.commands);
  return { out: { commands: c.commands, events: r.events }, state: r.state };
}
