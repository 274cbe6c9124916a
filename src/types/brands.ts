// Branded primitive types for type safety and domain modeling

// Duration in milliseconds - for time intervals/deltas
declare const DurationMsBrand: unique symbol;
export type DurationMs = number & { readonly [DurationMsBrand]: true };

// Locked-piece identity stamped into board cells (0 = bonus filler, no origin)
declare const PieceUidBrand: unique symbol;
export type PieceUid = number & { readonly [PieceUidBrand]: true };

// DurationMs constructors and guards
export function createDurationMs(value: number): DurationMs {
  if (value < 0 || !Number.isFinite(value)) {
    throw new Error("DurationMs must be a non-negative finite number");
  }
  return value as DurationMs;
}

export function isDurationMs(n: unknown): n is DurationMs {
  return typeof n === "number" && n >= 0 && Number.isFinite(n);
}

// PieceUid constructors and guards
export function createPieceUid(value: number): PieceUid {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error("PieceUid must be a non-negative integer");
  }
  return value as PieceUid;
}

export function isPieceUid(n: unknown): n is PieceUid {
  return typeof n === "number" && Number.isInteger(n) && n >= 0;
}

export const FILLER_UID: PieceUid = createPieceUid(0);

export function nextPieceUid(uid: PieceUid): PieceUid {
  return createPieceUid(uid + 1);
}
