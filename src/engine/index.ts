import { stackHeight } from "./core/board";
import { spawnPiece } from "./gameplay/spawn";
import { advanceSquareEffects } from "./scoring/bonus-squares";
import { advancePhysics } from "./step/advance-physics";
import { applyCommands } from "./step/apply-commands";
import {
  advanceLineClear,
  resolveTransitions,
} from "./step/resolve-transitions";
import {
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_SESSION_META,
  mkInitialState,
} from "./types";
import { incrementTick } from "./utils/tick";

import type { Command } from "./commands";
import type { DomainEvent } from "./events";
import type {
  EngineConfig,
  GameState,
  RNGState,
  SessionMeta,
} from "./types";

type StepResult = { state: GameState; events: ReadonlyArray<DomainEvent> };

/**
 * Reset to a fresh board and spawn the first piece. Configuration, session
 * metadata and the generator carry over.
 */
export function startGame(state: GameState): StepResult {
  const base = mkInitialState(state.cfg, state.meta, state.rng);
  const primed: GameState = {
    ...base,
    run: { ...base.run, started: true },
    tick: state.tick,
  };
  return spawnPiece(primed);
}

/**
 * Construct and start a game in one call.
 */
export function newGame(
  cfg: EngineConfig = DEFAULT_ENGINE_CONFIG,
  meta: SessionMeta = DEFAULT_SESSION_META,
  rng?: RNGState,
): StepResult {
  return startGame(mkInitialState(cfg, meta, rng));
}

function togglePause(state: GameState): StepResult {
  if (state.run.gameOver) return { events: [], state };
  const paused = !state.run.paused;
  return {
    events: [{ kind: "PauseToggled", paused, tick: state.tick }],
    state: { ...state, run: { ...state.run, paused } },
  };
}

function updatePanic(state: GameState): StepResult {
  const panic = stackHeight(state.board) >= state.cfg.panicThreshold;
  if (panic === state.run.panic) return { events: [], state };
  return {
    events: [{ kind: "PanicToggled", panic, tick: state.tick }],
    state: { ...state, run: { ...state.run, panic } },
  };
}

function finish(state: GameState, events: ReadonlyArray<DomainEvent>): StepResult {
  return { events, state: { ...state, tick: incrementTick(state.tick) } };
}

/**
 * One deterministic tick of `elapsedMs`. Pause resolves first; a paused,
 * idle or finished game does nothing else, and a pending line clear only
 * counts down. Otherwise commands, gravity and transitions run, then square
 * effects advance and panic is re-evaluated.
 */
export function step(
  state: GameState,
  elapsedMs: number,
  cmds: ReadonlyArray<Command>,
): StepResult {
  let s = state;
  const events: Array<DomainEvent> = [];

  if (cmds.some((c) => c.kind === "TogglePause")) {
    const p = togglePause(s);
    s = p.state;
    events.push(...p.events);
  }

  if (s.run.paused || !s.run.started || s.run.gameOver) {
    return finish(s, events);
  }

  if (s.lineClear !== null) {
    const lc = advanceLineClear(s, elapsedMs);
    return finish(lc.state, [...events, ...lc.events]);
  }

  const a = applyCommands(s, cmds, elapsedMs);
  const b = advancePhysics(a.state, a.sideEffects, elapsedMs);
  const c = resolveTransitions(b.state, b.sideEffects);
  events.push(...a.events, ...b.events, ...c.events);
  s = c.state;

  s = {
    ...s,
    effects: advanceSquareEffects(s.effects, elapsedMs, s.cfg.bonusPhaseMs),
  };

  // Panic is frozen once the run is over
  if (s.run.gameOver) return finish(s, events);

  const p = updatePanic(s);
  events.push(...p.events);

  return finish(p.state, events);
}

/**
 * Advance multiple ticks of equal length with per-tick command buckets.
 */
export function stepN(
  state: GameState,
  elapsedMs: number,
  byTick: ReadonlyArray<ReadonlyArray<Command>>,
): StepResult {
  let s = state;
  const all: Array<DomainEvent> = [];
  for (const cmds of byTick) {
    const r = step(s, elapsedMs, cmds);
    s = r.state;
    all.push(...r.events);
  }
  return { events: all, state: s };
}
