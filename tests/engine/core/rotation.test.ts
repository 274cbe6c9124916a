import { PIECES } from "@/engine/core/pieces";
import { canRotate, rotateShape } from "@/engine/core/rotation";
import { type Shape } from "@/engine/core/types";

describe("@/engine/core/rotation — pivot rotation", () => {
  test("T clockwise maps (x, y) to (y, -x) about the pivot", () => {
    expect(rotateShape(PIECES.T.cells, "T", "CW")).toEqual([
      [0, 1],
      [1, 2],
      [1, 1],
      [1, 0],
    ]);
  });

  test("T counter-clockwise maps (x, y) to (-y, x) about the pivot", () => {
    expect(rotateShape(PIECES.T.cells, "T", "CCW")).toEqual([
      [2, 1],
      [1, 0],
      [1, 1],
      [1, 2],
    ]);
  });

  test("I clockwise turns the bar vertical through its pivot column", () => {
    expect(rotateShape(PIECES.I.cells, "I", "CW")).toEqual([
      [1, 1],
      [1, 0],
      [1, -1],
      [1, -2],
    ]);
  });

  test("CW then CCW restores the shape", () => {
    for (const kind of ["I", "T", "S", "Z", "J", "L"] as const) {
      const cw = rotateShape(PIECES[kind].cells, kind, "CW");
      expect(rotateShape(cw, kind, "CCW")).toEqual(PIECES[kind].cells);
    }
  });

  test("four clockwise turns are the identity", () => {
    let shape: Shape = PIECES.L.cells;
    for (let i = 0; i < 4; i++) shape = rotateShape(shape, "L", "CW");
    expect(shape).toEqual(PIECES.L.cells);
  });

  test("O returns its input unchanged", () => {
    const shape = PIECES.O.cells;
    expect(rotateShape(shape, "O", "CW")).toBe(shape);
    expect(canRotate("O")).toBe(false);
    expect(canRotate("Z")).toBe(true);
  });
});
