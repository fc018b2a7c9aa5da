// File: src/core/ImprovementLoop.ts (relative to project root)
import type { AllocationMatrix, Transfer, ValuationMatrix } from "./types";
import type { ImproveOptions } from "./CycleImprover";
import { improveAllocation } from "./CycleImprover";
import { isParetoEfficient } from "./Efficiency";
import { cloneMatrix, utilities } from "./Welfare";

export const DEFAULT_MAX_STEPS = 1000;

export interface StepRecord {
  step: number; // 1-based
  cycle: number[];
  transfers: Transfer[];
  scale: number;
  utilities: number[];
}

export interface LoopOptions extends ImproveOptions {
  maxSteps?: number;
  onStep?: (record: StepRecord) => void;
}

export interface LoopResult {
  efficient: boolean; // false when a profitable cycle is left after maxSteps, or maxSteps is 0
  steps: number;
  allocations: AllocationMatrix;
  initialUtilities: number[];
  finalUtilities: number[];
}

/**
 * Repeat single cycle-canceling steps on a copy of `allocations` until no profitable
 * cycle is left or `maxSteps` steps have been applied. The caller's matrix is not modified.
 */
export function improveUntilEfficient(
  valuations: ValuationMatrix,
  allocations: AllocationMatrix,
  options: LoopOptions = {}
): LoopResult {
  const fn = "improveUntilEfficient";
  const { maxSteps = DEFAULT_MAX_STEPS, onStep, ...improveOptions } = options;
  const working = cloneMatrix(allocations);
  const initialUtilities = utilities(valuations, working);

  let steps = 0;
  let efficient = false;
  while (steps < maxSteps) {
    const outcome = improveAllocation(valuations, working, improveOptions);
    if (outcome.efficient) {
      efficient = true;
      break;
    }
    steps++;
    onStep?.({
      step: steps,
      cycle: outcome.cycle,
      transfers: outcome.transfers,
      scale: outcome.scale,
      utilities: utilities(valuations, working),
    });
  }

  // the last allowed step may itself have removed the final profitable cycle
  if (!efficient && steps > 0) {
    efficient = isParetoEfficient(valuations, working, { tolerance: improveOptions.tolerance });
  }

  console.log(
    "src/core/ImprovementLoop.ts:%s - stopped after %d steps (%s)",
    fn,
    steps,
    efficient ? "efficient" : "step limit reached"
  );
  return {
    efficient,
    steps,
    allocations: working,
    initialUtilities,
    finalUtilities: utilities(valuations, working),
  };
}
