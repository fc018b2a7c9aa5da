// File: src/core/CycleImprover.ts (relative to project root)
import type {
  AllocationMatrix,
  ExchangeEdge,
  ExchangeGraph,
  ImprovementOutcome,
  Transfer,
  TransferRuleName,
  ValuationMatrix,
} from "./types";
import { validateInstance } from "./Validation";
import { buildExchangeGraph, getEdge } from "./ExchangeGraph";
import { NoCycleFound } from "./errors";
import { DEFAULT_CYCLE_TOLERANCE, findNegativeCycle } from "../solver/NegativeCycleDetector";
import { createTransferRule } from "../strategy";

export const DEFAULT_STEP_SIZE = 0.001;
export const DEFAULT_TRANSFER_RULE: TransferRuleName = "value-preserving";

export interface ImproveOptions {
  stepSize?: number;
  transferRule?: TransferRuleName;
  tolerance?: number;
}

/**
 * One cycle-canceling step.
 *
 * Returns `true` when the allocation is already efficient (nothing is touched); otherwise
 * mutates `allocations` in place along one profitable cycle and returns it.
 */
export function checkAndImprove(
  valuations: ValuationMatrix,
  allocations: AllocationMatrix,
  options: ImproveOptions = {}
): true | AllocationMatrix {
  const outcome = improveAllocation(valuations, allocations, options);
  return outcome.efficient ? true : outcome.allocations;
}

/** Same as checkAndImprove, but reports the cycle and the transfers that were applied. */
export function improveAllocation(
  valuations: ValuationMatrix,
  allocations: AllocationMatrix,
  options: ImproveOptions = {}
): ImprovementOutcome {
  const fn = "improveAllocation";
  const stepSize = options.stepSize ?? DEFAULT_STEP_SIZE;
  if (!Number.isFinite(stepSize) || stepSize <= 0) {
    throw new RangeError(`step size must be a positive number, got ${stepSize}`);
  }
  const rule = createTransferRule(options.transferRule ?? DEFAULT_TRANSFER_RULE);

  validateInstance(valuations, allocations);
  const graph = buildExchangeGraph(valuations, allocations);
  if (graph.edges.length === 0) {
    console.log("src/core/CycleImprover.ts:%s - no exchange edges, allocation is efficient", fn);
    return { efficient: true };
  }

  let cycle: number[];
  try {
    cycle = findNegativeCycle(graph, graph.edges[0].from, options.tolerance ?? DEFAULT_CYCLE_TOLERANCE);
  } catch (err) {
    if (err instanceof NoCycleFound) {
      console.log("src/core/CycleImprover.ts:%s - no profitable cycle, allocation is efficient", fn);
      return { efficient: true };
    }
    throw err;
  }

  const hops = cycleEdges(graph, cycle);
  const planned = rule.planTransfers(hops, valuations, stepSize);
  const { transfers, scale } = applyTransfers(allocations, planned);

  console.log(
    "src/core/CycleImprover.ts:%s - %s step along [%s], %d transfers, scale=%s",
    fn,
    rule.name,
    cycle.join(" -> "),
    transfers.length,
    scale.toFixed(6)
  );
  return { efficient: false, allocations, cycle, transfers, scale, rule: rule.name };
}

function cycleEdges(graph: ExchangeGraph, cycle: number[]): ExchangeEdge[] {
  const hops: ExchangeEdge[] = [];
  for (let i = 0; i < cycle.length - 1; i++) {
    const edge = getEdge(graph, cycle[i], cycle[i + 1]);
    if (!edge) {
      throw new Error(`cycle uses missing edge ${cycle[i]} -> ${cycle[i + 1]}`);
    }
    hops.push(edge);
  }
  return hops;
}

/**
 * Apply planned transfers in cycle order.
 *
 * If a hop would take more than its giver holds, all amounts shrink by one common factor
 * so that the binding hop empties the giver's share exactly.
 */
export function applyTransfers(
  allocations: AllocationMatrix,
  planned: Transfer[]
): { transfers: Transfer[]; scale: number } {
  let scale = 1;
  let binding = -1;
  let bindingHeld = 0;
  planned.forEach((t, index) => {
    const held = allocations[t.from][t.item];
    if (t.amount * scale > held) {
      scale = held / t.amount;
      binding = index;
      bindingHeld = held;
    }
  });

  const transfers = planned.map((t, index) => {
    const amount = index === binding ? bindingHeld : t.amount * scale;
    allocations[t.to][t.item] += amount;
    allocations[t.from][t.item] -= amount;
    return { ...t, amount };
  });
  return { transfers, scale };
}
