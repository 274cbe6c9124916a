import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, test } from "@jest/globals";

import {
  DEFAULT_PLAYER_CONFIG,
  loadConfig,
  parseConfig,
  recordResult,
  saveConfig,
  serializeConfig,
  type GameResult,
  type PlayerConfig,
} from "@/app/config";

const PROFILE: PlayerConfig = {
  gameMode: "Timed",
  highScore: 1200,
  lastSong: 3,
  lineCount: 14,
  playerName: "Tester",
};

describe("@/app/config — parsing", () => {
  test("snake_case fields map onto the profile", () => {
    expect(
      parseConfig({
        game_mode: "Endless",
        high_score: 500,
        last_song: 1,
        line_count: 9,
        player_name: "Ada",
      }),
    ).toEqual({
      gameMode: "Endless",
      highScore: 500,
      lastSong: 1,
      lineCount: 9,
      playerName: "Ada",
    });
  });

  test("bad fields fall back one at a time", () => {
    expect(
      parseConfig({
        game_mode: "Arcade",
        high_score: -5,
        last_song: 2.5,
        player_name: "Ada",
      }),
    ).toEqual({ ...DEFAULT_PLAYER_CONFIG, playerName: "Ada" });
  });

  test("non-object input yields the defaults", () => {
    expect(parseConfig(null)).toEqual(DEFAULT_PLAYER_CONFIG);
    expect(parseConfig([1, 2])).toEqual(DEFAULT_PLAYER_CONFIG);
    expect(parseConfig("config")).toEqual(DEFAULT_PLAYER_CONFIG);
  });

  test("serialization writes the on-disk field names", () => {
    expect(serializeConfig(PROFILE)).toBe(
      [
        "{",
        '  "game_mode": "Timed",',
        '  "high_score": 1200,',
        '  "last_song": 3,',
        '  "line_count": 14,',
        '  "player_name": "Tester"',
        "}",
        "",
      ].join("\n"),
    );
  });
});

describe("@/app/config — files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "squarefall-config-"));
  });

  afterEach(() => {
    rmSync(dir, { force: true, recursive: true });
  });

  test("missing file loads the defaults", () => {
    expect(loadConfig(join(dir, "absent.json"))).toEqual(DEFAULT_PLAYER_CONFIG);
  });

  test("malformed JSON loads the defaults", () => {
    const path = join(dir, "config.json");
    writeFileSync(path, "{ not json", "utf8");
    expect(loadConfig(path)).toEqual(DEFAULT_PLAYER_CONFIG);
  });

  test("saved profile loads back unchanged", () => {
    const path = join(dir, "config.json");
    expect(saveConfig(PROFILE, path)).toBe(true);
    expect(JSON.parse(readFileSync(path, "utf8"))).toEqual({
      game_mode: "Timed",
      high_score: 1200,
      last_song: 3,
      line_count: 14,
      player_name: "Tester",
    });
    expect(loadConfig(path)).toEqual(PROFILE);
  });

  test("unwritable path reports failure", () => {
    expect(saveConfig(PROFILE, join(dir, "missing", "config.json"))).toBe(false);
  });
});

describe("@/app/config — recordResult", () => {
  const result = (score: number): GameResult => ({
    gameMode: "Classic",
    linesCleared: 30,
    musicIndex: 5,
    playerName: "Bee",
    score,
  });

  test("a lower score updates only the name and song", () => {
    expect(recordResult(PROFILE, result(800))).toEqual({
      ...PROFILE,
      lastSong: 5,
      playerName: "Bee",
    });
  });

  test("an equal score is not a new high score", () => {
    expect(recordResult(PROFILE, result(1200)).highScore).toBe(1200);
  });

  test("a new high score records its lines and mode", () => {
    expect(recordResult(PROFILE, result(1500))).toEqual({
      gameMode: "Classic",
      highScore: 1500,
      lastSong: 5,
      lineCount: 30,
      playerName: "Bee",
    });
  });
});
