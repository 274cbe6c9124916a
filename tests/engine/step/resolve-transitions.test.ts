import { cellAt, createEmptyBoard } from "@/engine/core/board";
import {
  advanceLineClear,
  completeLineClear,
  resolveTransitions,
} from "@/engine/step/resolve-transitions";

import {
  createTestGameState,
  createTestPiece,
  fillBoardRow,
  occupiedColumns,
  placeOSquare,
  setBoardCell,
} from "../../test-helpers";

const LOCK = { hardDropped: false, lockNow: true };

describe("@/engine/step/resolve-transitions — locking", () => {
  test("no lock request leaves state alone", () => {
    const state = createTestGameState({ piece: createTestPiece("T", 3, 5) });
    const r = resolveTransitions(state, { hardDropped: false, lockNow: false });
    expect(r.state).toBe(state);
    expect(r.events).toEqual([]);
  });

  test("lock without full rows spawns the next piece", () => {
    const piece = createTestPiece("T", 3, 18);
    const state = createTestGameState({ piece });

    const r = resolveTransitions(state, LOCK);

    expect(r.events).toEqual([
      { kind: "PieceLocked", piece, source: "gravity", tick: 0, uid: 1 },
      { kind: "PieceSpawned", piece: "O", tick: 0 },
    ]);
    expect(occupiedColumns(r.state.board, 19)).toEqual([3, 4, 5]);
    expect(r.state.nextPieceUid).toBe(2);
  });

  test("completing a row stages the clear instead of spawning", () => {
    const state = createTestGameState({
      board: fillBoardRow(createEmptyBoard(), 19, "Z", [0, 1, 2, 3]),
      piece: createTestPiece("I", 0, 19),
    });

    const r = resolveTransitions(state, { hardDropped: true, lockNow: true });

    expect(r.events.map((e) => e.kind)).toEqual([
      "PieceLocked",
      "LinesClearingStarted",
    ]);
    expect(r.state.lineClear).toEqual({ bonus: 0, remainingMs: 270, rows: [19] });
    expect(r.state.piece).toBeNull();
  });
});

describe("@/engine/step/resolve-transitions — line clear countdown", () => {
  const pending = createTestGameState({
    board: fillBoardRow(fillBoardRow(createEmptyBoard(), 19), 18, "S", [5]),
    lineClear: { bonus: 200, remainingMs: 270, rows: [19] },
  });

  test("counts down while time remains", () => {
    const r = advanceLineClear(pending, 100);
    expect(r.state.lineClear?.remainingMs).toBe(170);
    expect(r.events).toEqual([]);
  });

  test("collapses when the delay runs out", () => {
    const r = advanceLineClear(pending, 270);

    expect(r.events).toEqual([
      { bonus: 200, count: 1, kind: "LinesCleared", rows: [19], tick: 0 },
      { kind: "PieceSpawned", piece: "O", tick: 0 },
    ]);
    expect(r.state.score).toBe(200);
    expect(r.state.linesCleared).toBe(1);
    expect(r.state.lineClear).toBeNull();
    expect(occupiedColumns(r.state.board, 19)).toEqual([0, 1, 2, 3, 4, 6, 7, 8, 9]);
  });

  test("a blocked spawn after the collapse ends the game without detecting", () => {
    // (4,0) drops to (4,1) under the O spawn; the intact square would qualify
    let board = fillBoardRow(createEmptyBoard(), 19);
    board = setBoardCell(board, 4, 0, "J", 50);
    board = placeOSquare(board, 0, 12);
    const state = createTestGameState({
      board,
      lineClear: { bonus: 0, remainingMs: 0, rows: [19] },
    });

    const r = completeLineClear(state);

    expect(r.events).toEqual([
      { bonus: 0, count: 1, kind: "LinesCleared", rows: [19], tick: 0 },
      { kind: "GameOver", linesCleared: 1, score: 0, tick: 0 },
    ]);
    expect(r.state.run).toMatchObject({ gameOver: true, started: false });
    expect(r.state.effects).toEqual([]);
    expect(cellAt(r.state.board, 0, 13)?.kind).toBe("O");
  });

  test("completeLineClear without a pending clear is a no-op", () => {
    const state = createTestGameState();
    expect(completeLineClear(state)).toEqual({ events: [], state });
  });
});
