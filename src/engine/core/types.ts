import type { PieceUid } from "../../types/brands";

// Board dimensions
export const BOARD_WIDTH = 10 as const;
export const BOARD_HEIGHT = 20 as const; // rows 0 (top) .. 19 (floor)
export const BOARD_SIZE = 200 as const; // BOARD_WIDTH × BOARD_HEIGHT

// Canonical spawn anchor: centered, top row
export const SPAWN_X = BOARD_WIDTH / 2 - 2;
export const SPAWN_Y = 0;

// Pieces and cell kinds
export type PieceKind = "I" | "O" | "T" | "S" | "Z" | "J" | "L";
export type BonusKind = "BonusGold" | "BonusSilver";
export type CellKind = PieceKind | BonusKind;
export type BonusTier = "gold" | "silver";

export const PIECE_KINDS: ReadonlyArray<PieceKind> = [
  "I",
  "O",
  "T",
  "S",
  "Z",
  "J",
  "L",
] as const;

export function isPieceKind(u: unknown): u is PieceKind {
  return typeof u === "string" && PIECE_KINDS.some((k) => k === u);
}

export function isBonusKind(kind: CellKind): kind is BonusKind {
  return kind === "BonusGold" || kind === "BonusSilver";
}

// Cell codes stored in the board - 0=empty, 1-7=tetrominos, 8=gold, 9=silver
export type CellCode = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

const KIND_BY_CODE: ReadonlyArray<CellKind | null> = [
  null,
  "I",
  "O",
  "T",
  "S",
  "Z",
  "J",
  "L",
  "BonusGold",
  "BonusSilver",
];

const CODE_BY_KIND: Readonly<Record<CellKind, CellCode>> = {
  BonusGold: 8,
  BonusSilver: 9,
  I: 1,
  J: 6,
  L: 7,
  O: 2,
  S: 4,
  T: 3,
  Z: 5,
};

export function codeOf(kind: CellKind): CellCode {
  return CODE_BY_KIND[kind];
}

export function kindOfCode(code: number): CellKind | null {
  if (!Number.isInteger(code) || code < 0 || code >= KIND_BY_CODE.length) {
    throw new Error(`Unknown cell code ${String(code)}`);
  }
  return KIND_BY_CODE[code] ?? null;
}

export function isBonusCode(code: number): boolean {
  return code === CODE_BY_KIND.BonusGold || code === CODE_BY_KIND.BonusSilver;
}

// Board representation with enforced dimensions
declare const BoardCellsBrand: unique symbol;
export type BoardCells = Uint8Array & { readonly length: 200 } & {
  readonly [BoardCellsBrand]: true;
};

declare const BoardOwnersBrand: unique symbol;
export type BoardOwners = Uint32Array & { readonly length: 200 } & {
  readonly [BoardOwnersBrand]: true;
};

export function createBoardCells(): BoardCells {
  return new Uint8Array(BOARD_SIZE) as BoardCells;
}

export function createBoardOwners(): BoardOwners {
  return new Uint32Array(BOARD_SIZE) as BoardOwners;
}

export type Board = {
  readonly width: 10;
  readonly height: 20;
  readonly cells: BoardCells; // cell codes, row-major from the top row
  readonly owners: BoardOwners; // PieceUid per cell, 0 for empty or filler
};

// Decoded view of one occupied cell
export type BoardCell = Readonly<{
  kind: CellKind;
  color: string;
  owner: PieceUid;
}>;

export function idx(board: Board, x: number, y: number): number {
  return y * board.width + x;
}

export function inBounds(board: Board, x: number, y: number): boolean {
  return x >= 0 && x < board.width && y >= 0 && y < board.height;
}

// Out-of-bounds counts as blocked: walls, floor and the ceiling
export function isCellBlocked(board: Board, x: number, y: number): boolean {
  if (!inBounds(board, x, y)) return true;
  return (board.cells[idx(board, x, y)] ?? 0) !== 0;
}

// Piece geometry
export type Offset = readonly [number, number];
export type Shape = readonly [Offset, Offset, Offset, Offset];
export type RotationDir = "CW" | "CCW";

export type TetrominoShape = Readonly<{
  id: PieceKind;
  cells: Shape;
  pivot: Offset;
  rotates: boolean;
  color: string;
}>;

export type ActivePiece = Readonly<{
  kind: PieceKind;
  shape: Shape;
  x: number;
  y: number;
  color: string;
}>;
