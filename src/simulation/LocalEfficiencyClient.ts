// File: src/simulation/LocalEfficiencyClient.ts (relative to project root)
import type { EfficiencyService } from "../api/EfficiencyService";
import type { AllocationInstance, ImproveResponse, OptimizeResponse, StepOptions } from "../core/types";
import { isParetoEfficient } from "../core/Efficiency";
import { improveAllocation } from "../core/CycleImprover";
import { improveUntilEfficient } from "../core/ImprovementLoop";
import { cloneMatrix } from "../core/Welfare";

/**
 * Drop-in replacement for EfficiencyClient that runs the checker in-process
 * instead of making HTTP requests to the efficiency API.
 */
export class LocalEfficiencyClient implements EfficiencyService {
  constructor(private readonly tolerance?: number) {
    console.log("src/simulation/LocalEfficiencyClient.ts:constructor - initialized local client");
  }

  async isParetoEfficient(instance: AllocationInstance): Promise<boolean> {
    return isParetoEfficient(instance.valuations, instance.allocations, { tolerance: this.tolerance });
  }

  /** Works on a copy so it behaves like the HTTP client: the caller's matrix stays as it was. */
  async improve(instance: AllocationInstance, options: StepOptions = {}): Promise<ImproveResponse> {
    const fn = "improve";
    const working = cloneMatrix(instance.allocations);
    const outcome = improveAllocation(instance.valuations, working, { ...options, tolerance: this.tolerance });
    if (outcome.efficient) {
      return { efficient: true };
    }
    console.log("src/simulation/LocalEfficiencyClient.ts:%s - applied %d transfers", fn, outcome.transfers.length);
    return {
      efficient: false,
      allocations: outcome.allocations,
      cycle: outcome.cycle,
      transfers: outcome.transfers,
      scale: outcome.scale,
    };
  }

  async optimize(instance: AllocationInstance, options: StepOptions & { maxSteps?: number } = {}): Promise<OptimizeResponse> {
    return improveUntilEfficient(instance.valuations, instance.allocations, { ...options, tolerance: this.tolerance });
  }
}
