// File: src/core/Efficiency.ts (relative to project root)
import type { AllocationMatrix, ValuationMatrix } from "./types";
import { validateInstance } from "./Validation";
import { buildExchangeGraph } from "./ExchangeGraph";
import { DEFAULT_CYCLE_TOLERANCE, hasNegativeCycle } from "../solver/NegativeCycleDetector";

export interface EfficiencyOptions {
  tolerance?: number;
}

/**
 * An allocation is Pareto efficient iff its exchange graph has no negative-weight cycle,
 * i.e. no cycle of trades whose marginal-value ratios multiply to less than 1.
 * Read-only: neither matrix is modified.
 */
export function isParetoEfficient(
  valuations: ValuationMatrix,
  allocations: AllocationMatrix,
  options: EfficiencyOptions = {}
): boolean {
  const fn = "isParetoEfficient";
  const { players, items } = validateInstance(valuations, allocations);
  const graph = buildExchangeGraph(valuations, allocations);
  const inefficient = hasNegativeCycle(graph, options.tolerance ?? DEFAULT_CYCLE_TOLERANCE);

  console.log(
    "src/core/Efficiency.ts:%s - %d players x %d items: %s",
    fn,
    players,
    items,
    inefficient ? "INEFFICIENT (profitable cycle exists)" : "efficient"
  );
  return !inefficient;
}
