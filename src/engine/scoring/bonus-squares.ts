import { cloneBoard } from "../core/board";
import { bonusKindOf, colorOf } from "../core/pieces";
import {
  codeOf,
  idx,
  isBonusCode,
  kindOfCode,
  type BonusTier,
  type Board,
  type CellKind,
} from "../core/types";
import { FILLER_UID } from "../../types/brands";

import type { DomainEvent } from "../events";
import type { EngineConfig, GameState, SquareEffect } from "../types";

export const SQUARE_SIZE = 4;
const PIECE_CELLS = 4;

export type FormedSquare = Readonly<{
  x: number;
  y: number;
  tier: BonusTier;
  original: ReadonlyArray<string>;
}>;

function countOwners(board: Board): Map<number, number> {
  const counts = new Map<number, number>();
  for (let i = 0; i < board.cells.length; i++) {
    if ((board.cells[i] ?? 0) === 0) continue;
    const owner = board.owners[i] ?? 0;
    counts.set(owner, (counts.get(owner) ?? 0) + 1);
  }
  return counts;
}

/**
 * Classify the window at (x, y), or null when it does not qualify: every cell
 * occupied, none a bonus cell, and exactly four whole pieces inside it.
 */
function classifyWindow(
  board: Board,
  x: number,
  y: number,
  ownerTotals: ReadonlyMap<number, number>,
): { tier: BonusTier; original: Array<string> } | null {
  const inside = new Map<number, number>();
  const kinds = new Set<CellKind>();
  const original: Array<string> = [];

  for (let dy = 0; dy < SQUARE_SIZE; dy++) {
    for (let dx = 0; dx < SQUARE_SIZE; dx++) {
      const i = idx(board, x + dx, y + dy);
      const code = board.cells[i] ?? 0;
      if (code === 0 || isBonusCode(code)) return null;
      const kind = kindOfCode(code);
      if (kind === null) return null;
      kinds.add(kind);
      original.push(colorOf(kind));
      const owner = board.owners[i] ?? 0;
      inside.set(owner, (inside.get(owner) ?? 0) + 1);
    }
  }

  // Only intact pieces count: four cells, all of them inside the window
  for (const [owner, n] of inside) {
    if (n !== PIECE_CELLS || ownerTotals.get(owner) !== PIECE_CELLS) return null;
  }

  return { original, tier: kinds.size === 1 ? "gold" : "silver" };
}

function convertWindow(board: Board, x: number, y: number, tier: BonusTier): void {
  const code = codeOf(bonusKindOf(tier));
  for (let dy = 0; dy < SQUARE_SIZE; dy++) {
    for (let dx = 0; dx < SQUARE_SIZE; dx++) {
      const i = idx(board, x + dx, y + dy);
      board.cells[i] = code;
      board.owners[i] = FILLER_UID;
    }
  }
}

/**
 * Scan every 4×4 window row by row and convert the qualifying ones. Each
 * conversion is visible to the windows scanned after it. Origins that already
 * carry an effect are skipped.
 */
export function detectBonusSquares(
  board: Board,
  effects: ReadonlyArray<SquareEffect>,
): { board: Board; formed: ReadonlyArray<FormedSquare> } {
  const taken = new Set(effects.map((e) => idx(board, e.x, e.y)));
  const ownerTotals = countOwners(board);
  const formed: Array<FormedSquare> = [];
  let next: Board | null = null;

  for (let y = 0; y <= board.height - SQUARE_SIZE; y++) {
    for (let x = 0; x <= board.width - SQUARE_SIZE; x++) {
      if (taken.has(idx(board, x, y))) continue;
      const current = next ?? board;
      const hit = classifyWindow(current, x, y, ownerTotals);
      if (hit === null) continue;
      if (next === null) next = cloneBoard(board);
      convertWindow(next, x, y, hit.tier);
      formed.push({ original: hit.original, tier: hit.tier, x, y });
    }
  }

  return { board: next ?? board, formed };
}

export function createSquareEffect(
  square: FormedSquare,
  cfg: EngineConfig,
): SquareEffect {
  return {
    blinksRemaining: cfg.bonusBlinkCycles,
    flashOn: true,
    original: square.original,
    tier: square.tier,
    timerMs: cfg.bonusPhaseMs,
    x: square.x,
    y: square.y,
  };
}

/**
 * Run the detector against the state's board and register an effect per
 * square formed.
 */
export function applyBonusSquares(state: GameState): {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
} {
  const { board, formed } = detectBonusSquares(state.board, state.effects);
  if (formed.length === 0) return { events: [], state };

  const events: Array<DomainEvent> = formed.map((sq) => ({
    kind: "BonusSquareFormed" as const,
    tick: state.tick,
    tier: sq.tier,
    x: sq.x,
    y: sq.y,
  }));

  return {
    events,
    state: {
      ...state,
      board,
      effects: [
        ...state.effects,
        ...formed.map((sq) => createSquareEffect(sq, state.cfg)),
      ],
    },
  };
}

/**
 * Advance blink timers by dt. Each expiry re-arms the phase and toggles the
 * flash; turning off consumes a cycle. Spent effects are dropped.
 */
export function advanceSquareEffects(
  effects: ReadonlyArray<SquareEffect>,
  dtMs: number,
  phaseMs: number,
): ReadonlyArray<SquareEffect> {
  if (effects.length === 0) return effects;
  return effects
    .map((e) => {
      const timerMs = e.timerMs - dtMs;
      if (timerMs > 0) return { ...e, timerMs };
      const flashOn = !e.flashOn;
      const blinksRemaining =
        !flashOn && e.blinksRemaining > 0
          ? e.blinksRemaining - 1
          : e.blinksRemaining;
      return { ...e, blinksRemaining, flashOn, timerMs: phaseMs };
    })
    .filter((e) => e.blinksRemaining > 0);
}

/**
 * Effects whose rows were removed go away; the rest drop by the number of
 * cleared rows beneath them.
 */
export function shiftEffectsAfterClear(
  effects: ReadonlyArray<SquareEffect>,
  rows: ReadonlyArray<number>,
): ReadonlyArray<SquareEffect> {
  const bottom = (e: SquareEffect): number => e.y + SQUARE_SIZE - 1;
  return effects
    .filter((e) => !rows.some((r) => r >= e.y && r <= bottom(e)))
    .map((e) => {
      const shift = rows.filter((r) => r > bottom(e)).length;
      return shift === 0 ? e : { ...e, y: e.y + shift };
    });
}

// Whether (x, y) falls inside the effect's 4×4 region
export function effectCovers(e: SquareEffect, x: number, y: number): boolean {
  return x >= e.x && x < e.x + SQUARE_SIZE && y >= e.y && y < e.y + SQUARE_SIZE;
}
