// File: src/core/types.ts (relative to project root)
export type Matrix = number[][];

/** players × items, every entry > 0: the value a player puts on one full unit of an item. */
export type ValuationMatrix = Matrix;

/** players × items, entries in [0,1]: the share of each item a player holds. */
export type AllocationMatrix = Matrix;

export interface AllocationInstance {
  name?: string;
  valuations: ValuationMatrix;
  allocations: AllocationMatrix;
}

export interface InstanceShape {
  players: number;
  items: number;
}

export interface WeightedEdge {
  from: number;
  to: number;
  weight: number;
}

export interface WeightedDigraph<E extends WeightedEdge = WeightedEdge> {
  nodeCount: number;
  edges: E[];
}

export interface ExchangeEdge extends WeightedEdge {
  criticalItem: number; // item achieving min ln(V[from][k] / V[to][k])
}

export interface ExchangeGraph extends WeightedDigraph<ExchangeEdge> {
  edgeByPair: Map<string, ExchangeEdge>;
}

export interface Transfer {
  from: number;
  to: number;
  item: number;
  amount: number;
}

export type TransferRuleName = "value-preserving" | "ratio-compounding";

export type ImprovementOutcome =
  | { efficient: true }
  | {
      efficient: false;
      allocations: AllocationMatrix;
      cycle: number[];
      transfers: Transfer[];
      scale: number;
      rule: TransferRuleName;
    };

// --- HTTP wire types ---

export interface StepOptions {
  stepSize?: number;
  transferRule?: TransferRuleName;
}

export interface InstanceRequest extends AllocationInstance, StepOptions {
  maxSteps?: number; // /optimize only
}

export interface EfficiencyResponse {
  efficient: boolean;
}

export type ImproveResponse =
  | { efficient: true }
  | { efficient: false; allocations: AllocationMatrix; cycle: number[]; transfers: Transfer[]; scale: number };

export interface OptimizeResponse {
  efficient: boolean;
  steps: number;
  allocations: AllocationMatrix;
  initialUtilities: number[];
  finalUtilities: number[];
}

export interface ApiErrorBody {
  error: "ShapeError" | "DomainError" | "InternalError" | "NotFound";
  message: string;
}
