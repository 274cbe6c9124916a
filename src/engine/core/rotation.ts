import { PIECES } from "./pieces";

import type { Offset, PieceKind, RotationDir, Shape } from "./types";

function rotateOffset(
  [x, y]: Offset,
  [px, py]: Offset,
  dir: RotationDir,
): Offset {
  const rx = x - px;
  const ry = y - py;
  // CW: (x, y) -> (y, -x); CCW: (x, y) -> (-y, x), both about the pivot
  return dir === "CW" ? [px + ry, py - rx] : [px - ry, py + rx];
}

/**
 * Rotate a shape 90° about its kind's pivot. Pure; collision is the caller's
 * concern and there is no kick search. Non-rotating kinds return the input.
 */
export function rotateShape(
  shape: Shape,
  kind: PieceKind,
  dir: RotationDir,
): Shape {
  const { pivot, rotates } = PIECES[kind];
  if (!rotates) return shape;
  return [
    rotateOffset(shape[0], pivot, dir),
    rotateOffset(shape[1], pivot, dir),
    rotateOffset(shape[2], pivot, dir),
    rotateOffset(shape[3], pivot, dir),
  ];
}

export function canRotate(kind: PieceKind): boolean {
  return PIECES[kind].rotates;
}
