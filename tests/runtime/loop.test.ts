import { makeInput } from "@/control/index";
import { runtimeStep } from "@/runtime/loop";

import { createTestGameState, createTestPiece } from "../test-helpers";

describe("@/runtime/loop — runtimeStep", () => {
  test("translates input into commands and steps the engine", () => {
    const engine = createTestGameState({ piece: createTestPiece("T", 3, 5) });

    const { out, state } = runtimeStep(engine, 16, makeInput(["right"]));

    expect(out.commands).toEqual([
      { kind: "MoveRight", source: "tap" },
      { kind: "SoftDropOff" },
    ]);
    expect(out.events).toEqual([
      { dir: "Right", kind: "PieceMoved", source: "tap", tick: 0 },
    ]);
    expect(state.piece?.x).toBe(4);
    expect(state.tick).toBe(1);
  });

  test("hard drop input locks the piece in one tick", () => {
    const engine = createTestGameState({ piece: createTestPiece("O", 0, 0) });
    const { out } = runtimeStep(engine, 16, makeInput(["up"]));
    expect(out.events.map((e) => e.kind)).toEqual(["PieceLocked", "PieceSpawned"]);
  });
});
