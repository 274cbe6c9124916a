import { describe, expect, test } from "@jest/globals";

import { fallIntervalMs, gravityStep } from "@/engine/physics/gravity";

import { createTestGameState, createTestPiece } from "../../test-helpers";

const FALL_MS = 1000 / 3;
const SOFT_MS = 1000 / 15;

describe("@/engine/physics/gravity — accumulator", () => {
  test("interval follows the soft drop flag", () => {
    const normal = createTestGameState();
    const soft = createTestGameState({
      input: { leftTimerMs: 0, rightTimerMs: 0, softDropOn: true },
    });
    expect(fallIntervalMs(normal)).toBe(FALL_MS);
    expect(fallIntervalMs(soft)).toBe(SOFT_MS);
  });

  test("partial interval only accumulates", () => {
    const state = createTestGameState({ piece: createTestPiece("T", 3, 5) });
    const r = gravityStep(state, 100);
    expect(r.cellsMoved).toBe(0);
    expect(r.lockNow).toBe(false);
    expect(r.state.piece?.y).toBe(5);
    expect(r.state.physics.fallAccumMs).toBe(100);
  });

  test("a full interval moves one cell", () => {
    const state = createTestGameState({ piece: createTestPiece("T", 3, 5) });
    const r = gravityStep(state, FALL_MS);
    expect(r.cellsMoved).toBe(1);
    expect(r.state.piece?.y).toBe(6);
    expect(r.state.physics.fallAccumMs).toBe(0);
  });

  test("soft drop falls at the faster speed", () => {
    const state = createTestGameState({
      input: { leftTimerMs: 0, rightTimerMs: 0, softDropOn: true },
      piece: createTestPiece("T", 3, 5),
    });
    const r = gravityStep(state, SOFT_MS);
    expect(r.cellsMoved).toBe(1);
    expect(r.state.piece?.y).toBe(6);
  });

  test("a blocked step requests a lock", () => {
    const state = createTestGameState({ piece: createTestPiece("T", 3, 18) });
    const r = gravityStep(state, FALL_MS);
    expect(r.cellsMoved).toBe(0);
    expect(r.lockNow).toBe(true);
    expect(r.state.piece?.y).toBe(18);
  });

  test("no active piece is a no-op", () => {
    const state = createTestGameState();
    expect(gravityStep(state, FALL_MS)).toEqual({
      cellsMoved: 0,
      lockNow: false,
      state,
    });
  });
});
