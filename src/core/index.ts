// File: src/core/index.ts (relative to project root)
export * from "./types";
export { AllocationError, DomainError, NoCycleFound, ShapeError } from "./errors";
export { validateInstance } from "./Validation";
export { buildExchangeGraph, getEdge } from "./ExchangeGraph";
export { isParetoEfficient } from "./Efficiency";
export type { EfficiencyOptions } from "./Efficiency";
export { checkAndImprove, improveAllocation, DEFAULT_STEP_SIZE, DEFAULT_TRANSFER_RULE } from "./CycleImprover";
export type { ImproveOptions } from "./CycleImprover";
export { improveUntilEfficient } from "./ImprovementLoop";
export type { LoopOptions, LoopResult, StepRecord } from "./ImprovementLoop";
export { columnSums, isConserved, playerUtility, utilities } from "./Welfare";
export { BellmanFordDetector, findNegativeCycle, hasNegativeCycle } from "../solver/NegativeCycleDetector";
export type { CycleSearchResult, INegativeCycleDetector } from "../solver/NegativeCycleDetector";
