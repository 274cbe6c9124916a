import { createPieceUid, type PieceUid } from "../../types/brands";

import { colorOf } from "./pieces";
import {
  type ActivePiece,
  type Board,
  type BoardCell,
  type Shape,
  BOARD_SIZE,
  codeOf,
  createBoardCells,
  createBoardOwners,
  idx,
  isCellBlocked,
  kindOfCode,
} from "./types";

export function createEmptyBoard(): Board {
  return {
    cells: createBoardCells(),
    height: 20,
    owners: createBoardOwners(),
    width: 10,
  };
}

// Copy both storage arrays so callers can write without touching the source
export function cloneBoard(board: Board): Board {
  const cells = createBoardCells();
  const owners = createBoardOwners();
  cells.set(board.cells);
  owners.set(board.owners);
  return { ...board, cells, owners };
}

export function cellAt(board: Board, x: number, y: number): BoardCell | null {
  const i = idx(board, x, y);
  const kind = kindOfCode(board.cells[i] ?? 0);
  if (kind === null) return null;
  return {
    color: colorOf(kind),
    kind,
    owner: createPieceUid(board.owners[i] ?? 0),
  };
}

export function isOccupied(board: Board, x: number, y: number): boolean {
  return (board.cells[idx(board, x, y)] ?? 0) !== 0;
}

/**
 * True if any cell of `shape` anchored at (x, y) leaves the board or lands on
 * an occupied cell. Never mutates.
 */
export function collides(
  board: Board,
  shape: Shape,
  x: number,
  y: number,
): boolean {
  for (const [dx, dy] of shape) {
    if (isCellBlocked(board, x + dx, y + dy)) return true;
  }
  return false;
}

export function canPlacePiece(board: Board, piece: ActivePiece): boolean {
  return !collides(board, piece.shape, piece.x, piece.y);
}

// Return a new position if valid; otherwise null. Keeps callers pure and branchy.
export function tryMove(
  board: Board,
  piece: ActivePiece,
  dx: number,
  dy: number,
): ActivePiece | null {
  if (collides(board, piece.shape, piece.x + dx, piece.y + dy)) return null;
  return { ...piece, x: piece.x + dx, y: piece.y + dy };
}

export function isAtBottom(board: Board, piece: ActivePiece): boolean {
  return collides(board, piece.shape, piece.x, piece.y + 1);
}

// Drop piece to bottom (hard drop and ghost position)
export function dropToBottom(board: Board, piece: ActivePiece): ActivePiece {
  let current = piece;
  let next = tryMove(board, current, 0, 1);
  while (next !== null) {
    current = next;
    next = tryMove(board, current, 0, 1);
  }
  return current;
}

export function pieceCells(piece: ActivePiece): ReadonlyArray<readonly [number, number]> {
  return piece.shape.map(([dx, dy]) => [piece.x + dx, piece.y + dy] as const);
}

// Write the piece into a copy of the board, every cell tagged with `uid`
export function lockPiece(
  board: Board,
  piece: ActivePiece,
  uid: PieceUid,
): Board {
  const next = cloneBoard(board);
  const code = codeOf(piece.kind);
  for (const [x, y] of pieceCells(piece)) {
    if (x < 0 || x >= board.width || y < 0 || y >= board.height) continue;
    const i = idx(board, x, y);
    next.cells[i] = code;
    next.owners[i] = uid;
  }
  return next;
}

export function isRowFull(board: Board, y: number): boolean {
  for (let x = 0; x < board.width; x++) {
    if (!isOccupied(board, x, y)) return false;
  }
  return true;
}

export function getCompletedLines(board: Board): ReadonlyArray<number> {
  const completed: Array<number> = [];
  for (let y = 0; y < board.height; y++) {
    if (isRowFull(board, y)) completed.push(y);
  }
  return completed;
}

/**
 * Remove the given rows. Rows above a cleared row drop by the number of
 * cleared rows below them; empty rows fill in from the top.
 */
export function clearLines(
  board: Board,
  toClear: ReadonlyArray<number>,
): Board {
  if (toClear.length === 0) return board;

  const next = createEmptyBoard();
  const clearedSet = new Set(toClear);

  let dstY = board.height - 1;
  for (let y = board.height - 1; y >= 0; y--) {
    if (clearedSet.has(y)) continue;
    const src = idx(board, 0, y);
    const dst = idx(board, 0, dstY);
    next.cells.set(board.cells.subarray(src, src + board.width), dst);
    next.owners.set(board.owners.subarray(src, src + board.width), dst);
    dstY--;
  }

  return next;
}

/**
 * Rows from the topmost occupied row down to the floor; 0 on an empty board.
 */
export function stackHeight(board: Board): number {
  for (let i = 0; i < BOARD_SIZE; i++) {
    if ((board.cells[i] ?? 0) !== 0) {
      return board.height - Math.floor(i / board.width);
    }
  }
  return 0;
}
