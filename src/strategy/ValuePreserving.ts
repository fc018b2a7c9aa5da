// File: src/strategy/ValuePreserving.ts (relative to project root)
import type { ExchangeEdge, Transfer, ValuationMatrix } from "../core/types";
import type { TransferRule } from "./TransferRule";

/**
 * Epsilon is a utility amount: the value handed over on the current hop, measured by the giver.
 *
 *   amount  = eps / V[u][item]
 *   eps    *= V[v][item] / V[u][item]   (what v received, in v's own valuation)
 *
 * Every player in the middle of the cycle passes on exactly the utility it received.
 * The first player gives up `stepSize` and gets back stepSize / prod(V[u]/V[v]) > stepSize,
 * since the cycle is negative in log weight.
 */
export class ValuePreserving implements TransferRule {
  readonly name = "value-preserving" as const;

  planTransfers(hops: ExchangeEdge[], valuations: ValuationMatrix, stepSize: number): Transfer[] {
    let eps = stepSize;
    return hops.map(({ from, to, criticalItem: item }) => {
      const amount = eps / valuations[from][item];
      eps = eps * valuations[to][item] / valuations[from][item];
      return { from, to, item, amount };
    });
  }
}
