import type { PieceUid } from "../types/brands";
import type { ActivePiece, BonusTier, PieceKind, Tick } from "./types";

export type DomainEvent =
  | { kind: "PieceSpawned"; piece: PieceKind; tick: Tick }
  | {
      kind: "PieceMoved";
      dir: "Left" | "Right" | "Down";
      source: "tap" | "repeat" | "softDrop";
      tick: Tick;
    }
  | { kind: "PieceRotated"; dir: "CW" | "CCW"; tick: Tick }
  | {
      kind: "PieceLocked";
      piece: ActivePiece;
      uid: PieceUid;
      source: "gravity" | "hardDrop";
      tick: Tick;
    }
  | { kind: "Held"; swapped: boolean; tick: Tick }
  | { kind: "LinesClearingStarted"; rows: ReadonlyArray<number>; tick: Tick }
  | {
      kind: "LinesCleared";
      count: number;
      bonus: number;
      rows: ReadonlyArray<number>;
      tick: Tick;
    }
  | { kind: "BonusSquareFormed"; tier: BonusTier; x: number; y: number; tick: Tick }
  | { kind: "PauseToggled"; paused: boolean; tick: Tick }
  | { kind: "PanicToggled"; panic: boolean; tick: Tick }
  | { kind: "GameOver"; score: number; linesCleared: number; tick: Tick };
