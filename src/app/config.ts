// Player profile persistence: load/save + (private) serialization helpers
// Concerned only with the on-disk JSON shape and conversion to/from PlayerConfig

import { readFileSync, writeFileSync } from "node:fs";

import { isGameMode, type GameMode } from "../engine/types";
import { debugLog } from "../utils/debug";

export const DEFAULT_CONFIG_PATH = "config.json" as const;

export type PlayerConfig = Readonly<{
  playerName: string;
  lastSong: number;
  highScore: number;
  lineCount: number;
  gameMode: GameMode;
}>;

export const DEFAULT_PLAYER_CONFIG: PlayerConfig = {
  gameMode: "Classic",
  highScore: 0,
  lastSong: 0,
  lineCount: 0,
  playerName: "Player",
};

// On-disk field names
type SerializedConfig = {
  player_name: string;
  last_song: number;
  high_score: number;
  line_count: number;
  game_mode: string;
};

export type GameResult = Readonly<{
  playerName: string;
  musicIndex: number;
  score: number;
  linesCleared: number;
  gameMode: GameMode;
}>;

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isCount(x: unknown): x is number {
  return typeof x === "number" && Number.isInteger(x) && x >= 0;
}

function isString(x: unknown): x is string {
  return typeof x === "string";
}

/**
 * Convert parsed JSON into a PlayerConfig. Each field that is missing or of
 * the wrong type falls back to its default independently.
 */
export function parseConfig(raw: unknown): PlayerConfig {
  if (!isRecord(raw)) return DEFAULT_PLAYER_CONFIG;
  const d = DEFAULT_PLAYER_CONFIG;
  const name = raw["player_name"];
  const song = raw["last_song"];
  const high = raw["high_score"];
  const lines = raw["line_count"];
  const mode = raw["game_mode"];
  return {
    gameMode: isGameMode(mode) ? mode : d.gameMode,
    highScore: isCount(high) ? high : d.highScore,
    lastSong: isCount(song) ? song : d.lastSong,
    lineCount: isCount(lines) ? lines : d.lineCount,
    playerName: isString(name) ? name : d.playerName,
  };
}

export function serializeConfig(cfg: PlayerConfig): string {
  const out: SerializedConfig = {
    game_mode: cfg.gameMode,
    high_score: cfg.highScore,
    last_song: cfg.lastSong,
    line_count: cfg.lineCount,
    player_name: cfg.playerName,
  };
  return `${JSON.stringify(out, null, 2)}\n`;
}

/**
 * Read the profile at `path`. Never throws: an unreadable or malformed file
 * yields the defaults.
 */
export function loadConfig(path: string = DEFAULT_CONFIG_PATH): PlayerConfig {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (error) {
    debugLog("config", `no readable config at ${path}, using defaults`, error);
    return DEFAULT_PLAYER_CONFIG;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parseConfig(parsed);
  } catch (error) {
    debugLog("config", `invalid JSON in ${path}, using defaults`, error);
    return DEFAULT_PLAYER_CONFIG;
  }
}

/**
 * Write the profile to `path`. Returns false when the write fails.
 */
export function saveConfig(
  cfg: PlayerConfig,
  path: string = DEFAULT_CONFIG_PATH,
): boolean {
  try {
    writeFileSync(path, serializeConfig(cfg), "utf8");
    return true;
  } catch (error) {
    debugLog("config", `failed to write ${path}`, error);
    return false;
  }
}

/**
 * Fold a finished run into the profile. The name and song always update; a
 * new high score also records its line count and game mode.
 */
export function recordResult(cfg: PlayerConfig, result: GameResult): PlayerConfig {
  const base: PlayerConfig = {
    ...cfg,
    lastSong: result.musicIndex,
    playerName: result.playerName,
  };
  if (result.score <= cfg.highScore) return base;
  return {
    ...base,
    gameMode: result.gameMode,
    highScore: result.score,
    lineCount: result.linesCleared,
  };
}
