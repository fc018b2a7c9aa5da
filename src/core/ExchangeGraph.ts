// File: src/core/ExchangeGraph.ts (relative to project root)
import type { AllocationMatrix, ExchangeEdge, ExchangeGraph, ValuationMatrix } from "./types";
import { assertValuation } from "./Validation";

/**
 * Exchange graph over players.
 *
 * Edge (i, j) exists iff player i holds a non-zero share of some item. Its weight is
 *   w(i,j) = min_k ln(V[i][k] / V[j][k])   over the items k that i holds,
 * and the minimizing item (lowest index on ties) is kept as the edge's critical item.
 *
 * A trade cycle is profitable iff the product of these ratios around it is < 1,
 * i.e. iff the sum of the log weights is negative.
 */
export function buildExchangeGraph(valuations: ValuationMatrix, allocations: AllocationMatrix): ExchangeGraph {
  const fn = "buildExchangeGraph";
  const players = valuations.length;
  const items = players > 0 ? valuations[0].length : 0;
  const edges: ExchangeEdge[] = [];
  const edgeByPair = new Map<string, ExchangeEdge>();

  for (let i = 0; i < players; i++) {
    const held: number[] = [];
    for (let k = 0; k < items; k++) {
      if (allocations[i][k] !== 0) held.push(k);
    }
    if (held.length === 0) continue; // nothing to offer, no outgoing edges

    for (let j = 0; j < players; j++) {
      if (i === j) continue;
      let criticalItem = held[0];
      let weight = logRatio(valuations, i, j, criticalItem);
      for (const k of held.slice(1)) {
        const w = logRatio(valuations, i, j, k);
        if (w < weight) {
          weight = w;
          criticalItem = k;
        }
      }
      const edge: ExchangeEdge = { from: i, to: j, weight, criticalItem };
      edges.push(edge);
      edgeByPair.set(pairKey(i, j), edge);
    }
  }

  console.log("src/core/ExchangeGraph.ts:%s - built graph with %d players and %d edges", fn, players, edges.length);
  return { nodeCount: players, edges, edgeByPair };
}

export function pairKey(from: number, to: number): string {
  return `${from}->${to}`;
}

export function getEdge(graph: ExchangeGraph, from: number, to: number): ExchangeEdge | undefined {
  return graph.edgeByPair.get(pairKey(from, to));
}

/** ln(V[i][k] / V[j][k]); both valuations must be positive. */
export function logRatio(valuations: ValuationMatrix, i: number, j: number, k: number): number {
  assertValuation(valuations[i][k], i, k);
  assertValuation(valuations[j][k], j, k);
  return Math.log(valuations[i][k] / valuations[j][k]);
}
