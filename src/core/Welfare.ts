// File: src/core/Welfare.ts (relative to project root)
import type { AllocationMatrix, Matrix, ValuationMatrix } from "./types";

/** Additive utility of one player: sum_k A[player][k] * V[player][k]. */
export function playerUtility(valuations: ValuationMatrix, allocations: AllocationMatrix, player: number): number {
  let total = 0;
  for (let k = 0; k < valuations[player].length; k++) {
    total += allocations[player][k] * valuations[player][k];
  }
  return total;
}

export function utilities(valuations: ValuationMatrix, allocations: AllocationMatrix): number[] {
  return valuations.map((_, player) => playerUtility(valuations, allocations, player));
}

export function columnSums(allocations: AllocationMatrix): number[] {
  const items = allocations.length > 0 ? allocations[0].length : 0;
  const sums = new Array<number>(items).fill(0);
  for (const row of allocations) {
    row.forEach((share, k) => {
      sums[k] += share;
    });
  }
  return sums;
}

/** True when every item's total share is unchanged within `tolerance`. */
export function isConserved(before: AllocationMatrix, after: AllocationMatrix, tolerance = 1e-6): boolean {
  const a = columnSums(before);
  const b = columnSums(after);
  return a.length === b.length && a.every((sum, k) => Math.abs(sum - b[k]) <= tolerance);
}

export function cloneMatrix(matrix: Matrix): Matrix {
  return matrix.map((row) => [...row]);
}
