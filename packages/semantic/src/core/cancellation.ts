import type { Cancelled } from "./model.js";

/**
 * Cooperative cancellation: long operations poll `isCancelled` at
 * checkpoints and unwind with `Cancelled`.
 */
export interface CancellationToken {
  isCancelled(): boolean;
}

export type CancellationCheck = () => boolean;

/**
 * Token that trips once the workspace generation differs from the one
 * captured, or when the optional external check says so.
 */
export function generationToken(
  captured: number,
  current: () => number,
  external?: CancellationCheck
): CancellationToken {
  return {
    isCancelled: () => current() !== captured || (external?.() ?? false),
  };
}

export function cancelled(generation: number): Cancelled {
  return { kind: "Cancelled", generation };
}
