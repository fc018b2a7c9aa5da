// File: src/core/Validation.ts (relative to project root)
import type { AllocationMatrix, InstanceShape, ValuationMatrix } from "./types";
import { DomainError, ShapeError } from "./errors";

export const SHARE_TOLERANCE = 1e-9;
export const COLUMN_SUM_TOLERANCE = 1e-6;

/**
 * Check that both matrices are players × items with the same dimensions,
 * every valuation is a finite positive number and every share lies in [0,1].
 *
 * Column sums are not enforced; an item that is not fully distributed is only logged.
 */
export function validateInstance(valuations: ValuationMatrix, allocations: AllocationMatrix): InstanceShape {
  const fn = "validateInstance";
  const players = valuations.length;
  if (allocations.length !== players) {
    throw new ShapeError(
      `allocations has ${allocations.length} rows but valuations has ${players}`,
      players,
      allocations.length
    );
  }
  const items = players > 0 ? valuations[0].length : 0;

  for (let i = 0; i < players; i++) {
    if (valuations[i].length !== items) {
      throw new ShapeError(`valuations row ${i} has ${valuations[i].length} entries, expected ${items}`, items, valuations[i].length);
    }
    if (allocations[i].length !== items) {
      throw new ShapeError(`allocations row ${i} has ${allocations[i].length} entries, expected ${items}`, items, allocations[i].length);
    }
    for (let k = 0; k < items; k++) {
      assertValuation(valuations[i][k], i, k);
      const share = allocations[i][k];
      if (!Number.isFinite(share) || share < 0 || share > 1 + SHARE_TOLERANCE) {
        throw new DomainError(`allocation of item ${k} to player ${i} must lie in [0,1], got ${share}`, i, k);
      }
    }
  }

  for (let k = 0; k < items; k++) {
    let total = 0;
    for (let i = 0; i < players; i++) total += allocations[i][k];
    if (Math.abs(total - 1) > COLUMN_SUM_TOLERANCE) {
      console.log("src/core/Validation.ts:%s - WARNING item %d is distributed %s, expected 1", fn, k, total.toFixed(6));
    }
  }

  return { players, items };
}

export function assertValuation(value: number, player: number, item: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new DomainError(`valuation of item ${item} by player ${player} must be positive, got ${value}`, player, item);
  }
}
