// File: src/strategy/RatioCompounding.ts (relative to project root)
import type { ExchangeEdge, Transfer, ValuationMatrix } from "../core/types";
import type { TransferRule } from "./TransferRule";

/**
 * Compounds the local marginal-value ratio into epsilon at every hop:
 *
 *   amount  = eps * V[v][item] / V[u][item]
 *   eps    *= V[u][item] / V[v][item]
 *
 * Kept for compatibility with previously published reference allocations.
 * It does not guarantee that every player on the cycle is better off; see ValuePreserving.
 */
export class RatioCompounding implements TransferRule {
  readonly name = "ratio-compounding" as const;

  planTransfers(hops: ExchangeEdge[], valuations: ValuationMatrix, stepSize: number): Transfer[] {
    let epsilon = stepSize;
    const transfers: Transfer[] = [];
    for (const hop of hops) {
      const { from: u, to: v, criticalItem: item } = hop;
      transfers.push({ from: u, to: v, item, amount: epsilon * valuations[v][item] / valuations[u][item] });
      epsilon *= valuations[u][item] / valuations[v][item];
    }
    return transfers;
  }
}
