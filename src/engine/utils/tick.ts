import type { Tick } from "../types";

/**
 * Type-safe utilities for working with branded Tick types.
 * These are the only allowed operations on Tick values.
 */

/**
 * Increments a tick by 1. Used for advancing time in the engine.
 */
export function incrementTick(tick: Tick): Tick {
  return (tick + 1) as Tick;
}

/**
 * Converts a raw number to a branded Tick type.
 * Should only be used at system boundaries (initialization, parsing).
 */
export function asTick(n: number): Tick {
  return n as Tick;
}
