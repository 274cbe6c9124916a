import { type PieceRandomGenerator } from "./core/rng/interface";
import { createUniformRng } from "./core/rng/seeded";
import { createEmptyBoard } from "./core/board";
import {
  type ActivePiece,
  type BonusTier,
  type Board,
  type PieceKind,
} from "./core/types";
import { asTick } from "./utils/tick";
import {
  createDurationMs,
  FILLER_UID,
  nextPieceUid,
  type DurationMs,
  type PieceUid,
} from "../types/brands";

export * from "./core/types";
export type Tick = number & { readonly brand: "Tick" };

export { type PieceRandomGenerator } from "./core/rng/interface";
export { createUniformRng } from "./core/rng/seeded";

export type RNGState = PieceRandomGenerator;

export type Difficulty = "Easy" | "Normal" | "Hard";
export type GameMode = "Classic" | "Timed" | "Endless";

export const GAME_MODES: ReadonlyArray<GameMode> = [
  "Classic",
  "Timed",
  "Endless",
] as const;

export function isGameMode(u: unknown): u is GameMode {
  return typeof u === "string" && GAME_MODES.some((m) => m === u);
}

export type EngineConfig = Readonly<{
  width: 10;
  height: 20;
  fallSpeed: number; // cells per second
  softDropSpeed: number; // cells per second while soft drop is held
  initialHorizontalDelayMs: DurationMs;
  horizontalRepeatDelayMs: DurationMs;
  lineClearDelayMs: DurationMs;
  bonusPhaseMs: DurationMs;
  bonusBlinkCycles: number;
  panicThreshold: number; // stack height in rows
  goldPoints: number;
  silverPoints: number;
  rngSeed: number;
}>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  bonusBlinkCycles: 6,
  bonusPhaseMs: createDurationMs(300),
  fallSpeed: 3,
  goldPoints: 500,
  height: 20,
  horizontalRepeatDelayMs: createDurationMs(100),
  initialHorizontalDelayMs: createDurationMs(200),
  lineClearDelayMs: createDurationMs(270),
  panicThreshold: 12,
  rngSeed: 0,
  silverPoints: 200,
  softDropSpeed: 15,
  width: 10,
};

// Menu selections carried into a run; the rules never read them
export type SessionMeta = Readonly<{
  playerName: string;
  difficulty: Difficulty;
  gameMode: GameMode;
  musicIndex: number;
}>;

export const DEFAULT_SESSION_META: SessionMeta = {
  difficulty: "Normal",
  gameMode: "Classic",
  musicIndex: 0,
  playerName: "Player",
};

export type SquareEffect = Readonly<{
  x: number; // top-left column of the 4×4 region
  y: number; // top-left row
  tier: BonusTier;
  timerMs: number;
  flashOn: boolean;
  blinksRemaining: number;
  original: ReadonlyArray<string>; // 16 colors, row-major, before conversion
}>;

export type PendingLineClear = Readonly<{
  rows: ReadonlyArray<number>;
  remainingMs: number;
  bonus: number;
}>;

export type RunFlags = Readonly<{
  started: boolean;
  paused: boolean;
  panic: boolean;
  gameOver: boolean;
}>;

// Auto-repeat countdowns may go negative while a held move stays blocked
export type InputState = Readonly<{
  leftTimerMs: number;
  rightTimerMs: number;
  softDropOn: boolean;
}>;

export type PhysicsState = Readonly<{
  fallAccumMs: number;
}>;

export type PieceStats = Readonly<Record<PieceKind, number>>;

export type GameState = {
  readonly cfg: EngineConfig;
  readonly meta: SessionMeta;
  readonly tick: Tick;
  readonly board: Board;
  readonly piece: ActivePiece | null;
  readonly next: PieceKind | null;
  readonly hold: { piece: PieceKind | null; usedThisTurn: boolean };
  readonly run: RunFlags;
  readonly score: number;
  readonly linesCleared: number;
  readonly input: InputState;
  readonly physics: PhysicsState;
  readonly lineClear: PendingLineClear | null;
  readonly effects: ReadonlyArray<SquareEffect>;
  readonly nextPieceUid: PieceUid;
  readonly stats: PieceStats;
  readonly rng: RNGState;
};

export function createEmptyStats(): PieceStats {
  return { I: 0, J: 0, L: 0, O: 0, S: 0, T: 0, Z: 0 };
}

/**
 * Fresh, not-yet-started state. Nothing is drawn from the generator until
 * the game starts.
 */
export function mkInitialState(
  cfg: EngineConfig = DEFAULT_ENGINE_CONFIG,
  meta: SessionMeta = DEFAULT_SESSION_META,
  rng: RNGState = createUniformRng(cfg.rngSeed.toString()),
): GameState {
  return {
    board: createEmptyBoard(),
    cfg,
    effects: [],
    hold: { piece: null, usedThisTurn: false },
    input: { leftTimerMs: 0, rightTimerMs: 0, softDropOn: false },
    lineClear: null,
    linesCleared: 0,
    meta,
    next: null,
    nextPieceUid: nextPieceUid(FILLER_UID),
    physics: { fallAccumMs: 0 },
    piece: null,
    rng,
    run: { gameOver: false, panic: false, paused: false, started: false },
    score: 0,
    stats: createEmptyStats(),
    tick: asTick(0),
  };
}
