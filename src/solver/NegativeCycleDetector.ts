// File: src/solver/NegativeCycleDetector.ts (relative to project root)
import type { WeightedDigraph, WeightedEdge } from "../core/types";
import { NoCycleFound } from "../core/errors";

/** A relaxation must improve a distance by more than this to count. */
export const DEFAULT_CYCLE_TOLERANCE = 1e-12;

/**
 * Result of a negative-cycle search
 */
export interface CycleSearchResult {
  found: boolean;
  cycle: number[]; // closed: first node repeated at the end; empty when not found
  cycleWeight: number; // 0 when not found

  // Diagnostic information
  source: number | null; // null = every node used as a source
  rounds: number;
  relaxations: number;
  solveTimeMs: number;
}

/**
 * Interface for negative-cycle detectors
 */
export interface INegativeCycleDetector {
  detect(graph: WeightedDigraph, source?: number): CycleSearchResult;
  getName(): string;
}

/**
 * Bellman–Ford negative-cycle detection
 *
 * With a source: single-source relaxation, so only cycles reachable from the source are found.
 * Without one: every node starts at distance 0, as if a virtual source had a zero-weight edge
 * into every node, so any negative cycle in the graph is found.
 *
 * After |V|-1 rounds, an edge that still relaxes proves a negative cycle; walking the
 * predecessor edges back from its endpoint until a node repeats lands on that cycle.
 */
export class BellmanFordDetector implements INegativeCycleDetector {
  constructor(private readonly tolerance: number = DEFAULT_CYCLE_TOLERANCE) {}

  getName(): string {
    return "BellmanFord";
  }

  detect(graph: WeightedDigraph, source?: number): CycleSearchResult {
    const fn = "detect";
    const startTime = Date.now();
    const n = graph.nodeCount;
    const origin = source ?? null;

    if (graph.edges.length === 0) {
      console.log("src/solver/NegativeCycleDetector.ts:%s - graph has no edges, no cycle", fn);
      return this.createNotFound(origin, 0, 0, startTime);
    }
    if (origin !== null && (origin < 0 || origin >= n)) {
      throw new RangeError(`source ${origin} is not a node of a graph with ${n} nodes`);
    }

    const dist = new Array<number>(n).fill(origin === null ? 0 : Number.POSITIVE_INFINITY);
    if (origin !== null) dist[origin] = 0;
    const predEdge = new Array<WeightedEdge | undefined>(n).fill(undefined);

    let rounds = 0;
    let relaxations = 0;
    for (let round = 1; round < n; round++) {
      rounds = round;
      let changed = false;
      for (const edge of graph.edges) {
        if (this.relaxes(dist, edge)) {
          dist[edge.to] = dist[edge.from] + edge.weight;
          predEdge[edge.to] = edge;
          relaxations++;
          changed = true;
        }
      }
      if (!changed) {
        console.log("src/solver/NegativeCycleDetector.ts:%s - converged after %d rounds, no cycle", fn, rounds);
        return this.createNotFound(origin, rounds, relaxations, startTime);
      }
    }

    const witness = graph.edges.find((edge) => this.relaxes(dist, edge));
    if (!witness) {
      console.log("src/solver/NegativeCycleDetector.ts:%s - no edge relaxes on the extra pass, no cycle", fn);
      return this.createNotFound(origin, rounds, relaxations, startTime);
    }
    predEdge[witness.to] = witness;
    relaxations++;

    const cycleEdges = tracePredecessorCycle(predEdge, witness.to);
    if (!cycleEdges) {
      console.log("src/solver/NegativeCycleDetector.ts:%s - WARNING predecessor chain from %d ends without a cycle", fn, witness.to);
      return this.createNotFound(origin, rounds, relaxations, startTime);
    }
    let cycle = [...cycleEdges.map((edge) => edge.from), cycleEdges[0].from];
    if (origin !== null && cycle.includes(origin)) {
      cycle = rotateCycle(cycle, origin);
    }
    const cycleWeight = cycleEdges.reduce((total, edge) => total + edge.weight, 0);

    console.log(
      "src/solver/NegativeCycleDetector.ts:%s - negative cycle [%s] weight=%s after %d rounds",
      fn,
      cycle.join(" -> "),
      cycleWeight.toFixed(6),
      rounds
    );

    return {
      found: true,
      cycle,
      cycleWeight,
      source: origin,
      rounds,
      relaxations,
      solveTimeMs: Date.now() - startTime,
    };
  }

  private relaxes(dist: number[], edge: WeightedEdge): boolean {
    const from = dist[edge.from];
    return from !== Number.POSITIVE_INFINITY && from + edge.weight < dist[edge.to] - this.tolerance;
  }

  private createNotFound(source: number | null, rounds: number, relaxations: number, startTime: number): CycleSearchResult {
    return {
      found: false,
      cycle: [],
      cycleWeight: 0,
      source,
      rounds,
      relaxations,
      solveTimeMs: Date.now() - startTime,
    };
  }
}

/**
 * Walk predecessor edges back from `start` until a node repeats and return that cycle's edges
 * in forward order, or null when the chain reaches a node with no predecessor first.
 */
export function tracePredecessorCycle(predEdge: Array<WeightedEdge | undefined>, start: number): WeightedEdge[] | null {
  const seen = new Set<number>();
  let node = start;
  while (!seen.has(node)) {
    seen.add(node);
    const edge = predEdge[node];
    if (!edge) return null;
    node = edge.from;
  }

  const repeated = node;
  const backward: WeightedEdge[] = [];
  do {
    const edge = predEdge[node];
    if (!edge) return null;
    backward.push(edge);
    node = edge.from;
  } while (node !== repeated);
  return backward.reverse();
}

/** Rotate a closed cycle [n0, ..., n0] so it starts and ends at `start`. */
export function rotateCycle(cycle: number[], start: number): number[] {
  const open = cycle.slice(0, -1);
  const at = open.indexOf(start);
  if (at < 0) return cycle;
  const rotated = [...open.slice(at), ...open.slice(0, at)];
  return [...rotated, start];
}

/** The cycle reachable from `source`, or NoCycleFound. */
export function findNegativeCycle(
  graph: WeightedDigraph,
  source: number,
  tolerance: number = DEFAULT_CYCLE_TOLERANCE
): number[] {
  const result = new BellmanFordDetector(tolerance).detect(graph, source);
  if (!result.found) {
    throw new NoCycleFound(source);
  }
  return result.cycle;
}

export function hasNegativeCycle(graph: WeightedDigraph, tolerance: number = DEFAULT_CYCLE_TOLERANCE): boolean {
  return new BellmanFordDetector(tolerance).detect(graph).found;
}
