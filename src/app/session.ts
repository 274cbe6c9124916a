/*
 * Session lifecycle on a robot3 machine: menu → playing → gameOver → menu.
 *
 * The machine owns the phase and the slow-changing context (menu selections
 * and the player profile). The engine state changes every frame, so the
 * GameSession class holds it outside the machine and steps it directly.
 * Events sent in the wrong phase have no transition and are ignored.
 */

import {
  createMachine,
  state,
  transition,
  reduce,
  interpret,
} from "robot3";

import { newGame } from "../engine/index";
import {
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_SESSION_META,
  type EngineConfig,
  type GameState,
  type PieceRandomGenerator,
  type SessionMeta,
} from "../engine/types";
import { runtimeStep } from "../runtime/loop";
import { debugLog, debugTable } from "../utils/debug";

import { routeAudio, type AudioCollaborator } from "./audio";
import {
  DEFAULT_CONFIG_PATH,
  loadConfig,
  recordResult,
  saveConfig,
  type GameResult,
  type PlayerConfig,
} from "./config";

import type { InputSnapshot } from "../control/types";
import type { DomainEvent } from "../engine/events";
import type { MachineState, MachineStates, Machine, Service } from "robot3";

export type SessionPhase = "menu" | "playing" | "gameOver";

export type SessionContext = {
  meta: SessionMeta;
  profile: PlayerConfig;
};

export type SessionEvent =
  | { type: "START"; meta: SessionMeta }
  | { type: "GAME_OVER" }
  | { type: "CONFIRM"; result: GameResult };

const startRun = (ctx: SessionContext, event: SessionEvent): SessionContext =>
  event.type === "START" ? { ...ctx, meta: event.meta } : ctx;

const recordRun = (ctx: SessionContext, event: SessionEvent): SessionContext =>
  event.type === "CONFIRM"
    ? { ...ctx, profile: recordResult(ctx.profile, event.result) }
    : ctx;

type SessionEventType = SessionEvent["type"];
type SessionStatesObject = Record<SessionPhase, MachineState<SessionEventType>>;
export type SessionMachine = Machine<
  SessionStatesObject,
  SessionContext,
  SessionPhase,
  SessionEventType
>;

export const createSessionMachine = (
  initialContext: SessionContext,
): SessionMachine => {
  const states = {
    gameOver: state(transition("CONFIRM", "menu", reduce(recordRun))),
    menu: state(transition("START", "playing", reduce(startRun))),
    playing: state(transition("GAME_OVER", "gameOver")),
  } as const;

  // robot3 widens the event type to string; cast back to the typed machine
  return createMachine(
    "menu" as const,
    states as unknown as MachineStates<SessionStatesObject, SessionEventType>,
    (_ctx: SessionContext): SessionContext => initialContext,
  ) as unknown as SessionMachine;
};

export type GameSessionOptions = {
  audio: AudioCollaborator;
  configPath?: string;
  engineConfig?: EngineConfig;
  /** Generator factory per run; the engine's seeded default otherwise. */
  createRng?: () => PieceRandomGenerator;
};

/**
 * Thin wrapper tying the lifecycle machine to the engine, the audio
 * collaborator and the profile file.
 */
export class GameSession {
  private service: Service<SessionMachine>;
  private currentPhase: SessionPhase = "menu";
  private game: GameState | null = null;
  private songIndex = 0;
  private readonly audio: AudioCollaborator;
  private readonly configPath: string;
  private readonly engineConfig: EngineConfig;
  private readonly createRng: (() => PieceRandomGenerator) | undefined;

  constructor(opts: GameSessionOptions) {
    this.audio = opts.audio;
    this.configPath = opts.configPath ?? DEFAULT_CONFIG_PATH;
    this.engineConfig = opts.engineConfig ?? DEFAULT_ENGINE_CONFIG;
    this.createRng = opts.createRng;

    const profile = loadConfig(this.configPath);
    const machine = createSessionMachine({
      meta: { ...DEFAULT_SESSION_META, playerName: profile.playerName },
      profile,
    });
    this.service = interpret(machine, (service) => {
      this.currentPhase = service.machine.state.name;
    });
  }

  get phase(): SessionPhase {
    return this.currentPhase;
  }

  get state(): GameState | null {
    return this.game;
  }

  get profile(): PlayerConfig {
    return this.service.context.profile;
  }

  get meta(): SessionMeta {
    return this.service.context.meta;
  }

  /**
   * Leave the menu with the given selections and begin a run.
   */
  start(meta: Partial<SessionMeta> = {}): ReadonlyArray<DomainEvent> {
    if (this.currentPhase !== "menu") return [];
    this.service.send({ meta: { ...this.meta, ...meta }, type: "START" });

    const r = newGame(this.engineConfig, this.meta, this.createRng?.());
    this.game = r.state;
    this.songIndex = this.meta.musicIndex;
    this.audio.reset();
    this.audio.playSong(this.songIndex);
    debugLog("session", "run started", this.meta);
    return r.events;
  }

  /**
   * Advance one frame. While playing this steps the engine; on the game over
   * screen a pause press confirms and returns to the menu.
   */
  frame(elapsedMs: number, input: InputSnapshot): ReadonlyArray<DomainEvent> {
    if (this.currentPhase === "gameOver") {
      if (input.pause.pressed) this.confirm();
      return [];
    }
    if (this.currentPhase !== "playing" || this.game === null) return [];

    if (input.mute.pressed) this.audio.toggleMute();
    if (input.nextSong.pressed) {
      this.songIndex++;
      this.audio.playSong(this.songIndex);
    }

    const r = runtimeStep(this.game, elapsedMs, input);
    this.game = r.state;
    routeAudio(r.out.events, this.audio);

    if (r.state.run.gameOver) {
      this.service.send({ type: "GAME_OVER" });
      debugTable("session", "game over", {
        lines: r.state.linesCleared,
        score: r.state.score,
        stats: r.state.stats,
      });
    }
    return r.out.events;
  }

  /**
   * Fold the finished run into the profile, save it and return to the menu.
   */
  confirm(): void {
    if (this.currentPhase !== "gameOver" || this.game === null) return;
    const result: GameResult = {
      gameMode: this.meta.gameMode,
      linesCleared: this.game.linesCleared,
      musicIndex: this.songIndex,
      playerName: this.meta.playerName,
      score: this.game.score,
    };
    this.service.send({ result, type: "CONFIRM" });
    this.audio.reset();
    if (!saveConfig(this.profile, this.configPath)) {
      debugLog("session", "profile not saved", this.configPath);
    }
    this.game = null;
  }
}
