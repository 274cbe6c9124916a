/**
 * @fileoverview Shared test helper functions for squarefall tests
 *
 * This module consolidates commonly used test helper functions from across
 * the test suite to reduce duplication and provide consistent test utilities.
 */

import { type Command } from "@/engine/commands";
import { cloneBoard, lockPiece } from "@/engine/core/board";
import { SequenceRng } from "@/engine/core/rng/sequence";
import { createActivePiece } from "@/engine/core/spawning";
import {
  type ActivePiece,
  type Board,
  type CellKind,
  type PieceKind,
  codeOf,
  idx,
} from "@/engine/core/types";
import { type DomainEvent } from "@/engine/events";
import {
  DEFAULT_ENGINE_CONFIG,
  mkInitialState,
  type EngineConfig,
  type GameState,
} from "@/engine/types";
import { createPieceUid } from "@/types/brands";

/**
 * Creates a test EngineConfig from the defaults.
 *
 * @example
 * ```typescript
 * const config = createTestConfig({ lineClearDelayMs: createDurationMs(0) });
 * ```
 */
export function createTestConfig(
  overrides: Partial<EngineConfig> = {},
): EngineConfig {
  return { ...DEFAULT_ENGINE_CONFIG, ...overrides };
}

/**
 * Creates a started GameState with no active piece and a deterministic
 * generator. Nested objects are merged so partial overrides stay valid.
 *
 * @example
 * ```typescript
 * const state = createTestGameState({ piece: createTestPiece("T") });
 * const held = createTestGameState({ hold: { piece: "I", usedThisTurn: true } });
 * ```
 */
export function createTestGameState(
  overrides: Partial<GameState> = {},
  sequence: ReadonlyArray<PieceKind> = ["T", "I", "O"],
): GameState {
  const baseState = mkInitialState(
    overrides.cfg ?? createTestConfig(),
    undefined,
    new SequenceRng(sequence),
  );

  return {
    ...baseState,
    next: "O",
    ...overrides,
    // Properly merge nested objects
    hold: { ...baseState.hold, ...(overrides.hold ?? {}) },
    input: { ...baseState.input, ...(overrides.input ?? {}) },
    physics: { ...baseState.physics, ...(overrides.physics ?? {}) },
    run: { ...baseState.run, started: true, ...(overrides.run ?? {}) },
  };
}

/**
 * Creates an ActivePiece of `kind` in its spawn shape at (x, y).
 *
 * @example
 * ```typescript
 * const tPiece = createTestPiece("T"); // T piece at the spawn anchor (3, 0)
 * const low = createTestPiece("I", 0, 19);
 * ```
 */
export function createTestPiece(
  kind: PieceKind = "T",
  x = 3,
  y = 0,
): ActivePiece {
  return { ...createActivePiece(kind), x, y };
}

/**
 * Sets an individual cell to `kind` with the given owner id.
 * Returns a new board with the cell modified, preserving immutability.
 */
export function setBoardCell(
  board: Board,
  x: number,
  y: number,
  kind: CellKind = "I",
  owner = 0,
): Board {
  const next = cloneBoard(board);
  const i = idx(board, x, y);
  next.cells[i] = codeOf(kind);
  next.owners[i] = owner;
  return next;
}

/**
 * Fills an entire row, skipping the listed columns. Every filled cell shares
 * one owner so the row never forms part of a bonus square.
 *
 * @example
 * ```typescript
 * let board = fillBoardRow(createEmptyBoard(), 19); // full floor row
 * board = fillBoardRow(board, 18, "Z", [4]); // row 18 with a hole at x=4
 * ```
 */
export function fillBoardRow(
  board: Board,
  y: number,
  kind: CellKind = "I",
  holes: ReadonlyArray<number> = [],
): Board {
  const next = cloneBoard(board);
  for (let x = 0; x < board.width; x++) {
    if (holes.includes(x)) continue;
    const i = idx(board, x, y);
    next.cells[i] = codeOf(kind);
    next.owners[i] = 900 + y;
  }
  return next;
}

/**
 * Lock a piece of `kind` in spawn shape at (x, y) with owner `uid`.
 */
export function placePiece(
  board: Board,
  kind: PieceKind,
  x: number,
  y: number,
  uid: number,
): Board {
  return lockPiece(board, createTestPiece(kind, x, y), createPieceUid(uid));
}

/**
 * Four O pieces tiling the 4×4 window at (x, y), owners uid..uid+3.
 */
export function placeOSquare(
  board: Board,
  x: number,
  y: number,
  uid = 1,
  kinds: ReadonlyArray<PieceKind> = ["O", "O", "O", "O"],
): Board {
  let b = board;
  const corners: ReadonlyArray<readonly [number, number]> = [
    [x, y],
    [x + 2, y],
    [x, y + 2],
    [x + 2, y + 2],
  ];
  corners.forEach(([cx, cy], n) => {
    const kind = kinds[n] ?? "O";
    for (const [dx, dy] of [
      [0, 0],
      [1, 0],
      [0, 1],
      [1, 1],
    ] as const) {
      b = setBoardCell(b, cx + dx, cy + dy, kind, uid + n);
    }
  });
  return b;
}

// Column indices of occupied cells in row y
export function occupiedColumns(board: Board, y: number): Array<number> {
  const out: Array<number> = [];
  for (let x = 0; x < board.width; x++) {
    if ((board.cells[idx(board, x, y)] ?? 0) !== 0) out.push(x);
  }
  return out;
}

/**
 * Finds the first event of a specific kind in an event array.
 */
export function findEvent<K extends DomainEvent["kind"]>(
  events: ReadonlyArray<DomainEvent>,
  kind: K,
): Extract<DomainEvent, { kind: K }> | undefined {
  return events.find((e): e is Extract<DomainEvent, { kind: K }> => e.kind === kind);
}

/**
 * Finds all events of a specific kind in an event array.
 */
export function findEvents<K extends DomainEvent["kind"]>(
  events: ReadonlyArray<DomainEvent>,
  kind: K,
): Array<Extract<DomainEvent, { kind: K }>> {
  return events.filter((e): e is Extract<DomainEvent, { kind: K }> => e.kind === kind);
}

/**
 * Creates a command sequence for multi-tick testing.
 *
 * @example
 * ```typescript
 * const cmds = createCommandSequence([{ kind: "HardDrop" }], [], [{ kind: "Hold" }]);
 * ```
 */
export function createCommandSequence(
  ...tickCommands: Array<ReadonlyArray<Command>>
): ReadonlyArray<ReadonlyArray<Command>> {
  return tickCommands;
}
