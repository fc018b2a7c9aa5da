// File: src/strategy/TransferRule.ts (relative to project root)
import type { ExchangeEdge, Transfer, TransferRuleName, ValuationMatrix } from "../core/types";

/**
 * Decides how much of each hop's critical item moves along a profitable cycle.
 * `hops` are the cycle's edges in traversal order; `stepSize` is the nominal epsilon of the first hop.
 */
export interface TransferRule {
  readonly name: TransferRuleName;
  planTransfers(hops: ExchangeEdge[], valuations: ValuationMatrix, stepSize: number): Transfer[];
}
