import {
  type BonusKind,
  type BonusTier,
  type CellKind,
  type PieceKind,
  type TetrominoShape,
} from "./types";

// Spawn shapes are written as (x, y) offsets from the anchor, y growing downward
export const PIECES: Readonly<Record<PieceKind, TetrominoShape>> = {
  I: {
    cells: [
      [0, 0],
      [1, 0],
      [2, 0],
      [3, 0],
    ],
    color: "#00FFFF",
    id: "I",
    pivot: [1, 0],
    rotates: true,
  },
  J: {
    cells: [
      [0, 0],
      [0, 1],
      [1, 1],
      [2, 1],
    ],
    color: "#0000FF",
    id: "J",
    pivot: [1, 1],
    rotates: true,
  },
  L: {
    cells: [
      [0, 0],
      [1, 0],
      [2, 0],
      [0, 1],
    ],
    color: "#FF5500",
    id: "L",
    pivot: [1, 1],
    rotates: true,
  },
  O: {
    cells: [
      [0, 0],
      [1, 0],
      [0, 1],
      [1, 1],
    ],
    color: "#FFFF00",
    id: "O",
    pivot: [0, 0],
    rotates: false, // square: every rotation is the same footprint
  },
  S: {
    cells: [
      [1, 0],
      [2, 0],
      [0, 1],
      [1, 1],
    ],
    color: "#00FF00",
    id: "S",
    pivot: [1, 1],
    rotates: true,
  },
  T: {
    cells: [
      [1, 0],
      [0, 1],
      [1, 1],
      [2, 1],
    ],
    color: "#AA00FF",
    id: "T",
    pivot: [1, 1],
    rotates: true,
  },
  Z: {
    cells: [
      [0, 0],
      [1, 0],
      [1, 1],
      [2, 1],
    ],
    color: "#FF0000",
    id: "Z",
    pivot: [1, 1],
    rotates: true,
  },
};

export const BONUS_COLORS: Readonly<Record<BonusKind, string>> = {
  BonusGold: "#FFD700",
  BonusSilver: "#C0C0C0",
};

export function bonusKindOf(tier: BonusTier): BonusKind {
  return tier === "gold" ? "BonusGold" : "BonusSilver";
}

export function colorOf(kind: CellKind): string {
  switch (kind) {
    case "BonusGold":
    case "BonusSilver":
      return BONUS_COLORS[kind];
    default:
      return PIECES[kind].color;
  }
}
