// File: src/api/ServiceImprovementLoop.ts (relative to project root)
import type { AllocationInstance, StepOptions } from "../core/types";
import type { LoopResult, StepRecord } from "../core/ImprovementLoop";
import { cloneMatrix, utilities } from "../core/Welfare";
import type { EfficiencyService } from "./EfficiencyService";

export interface ServiceLoopOptions extends StepOptions {
  maxSteps: number;
  onStep?: (record: StepRecord) => void;
}

/**
 * improveUntilEfficient against an EfficiencyService, one request per step.
 * The instance passed in is not modified.
 */
export async function improveViaService(
  api: EfficiencyService,
  instance: AllocationInstance,
  options: ServiceLoopOptions
): Promise<LoopResult> {
  const fn = "improveViaService";
  const { maxSteps, onStep, ...stepOptions } = options;
  const initialUtilities = utilities(instance.valuations, instance.allocations);
  const current: AllocationInstance = { ...instance, allocations: cloneMatrix(instance.allocations) };

  let efficient = await api.isParetoEfficient(current);
  console.log("src/api/ServiceImprovementLoop.ts:%s - initial allocation is %s", fn, efficient ? "EFFICIENT" : "INEFFICIENT");

  let steps = 0;
  while (!efficient && steps < maxSteps) {
    const res = await api.improve(current, stepOptions);
    if (res.efficient) {
      efficient = true;
      break;
    }
    steps++;
    current.allocations = res.allocations;

    const stepUtilities = utilities(instance.valuations, current.allocations);
    onStep?.({ step: steps, cycle: res.cycle, transfers: res.transfers, scale: res.scale, utilities: stepUtilities });

    // Progress ping every 100 steps
    if (steps % 100 === 0) {
      console.log(
        "src/api/ServiceImprovementLoop.ts:%s - PROGRESS step=%d cycle=[%s] welfare=%s",
        fn,
        steps,
        res.cycle.join(" -> "),
        stepUtilities.reduce((a, b) => a + b, 0).toFixed(4)
      );
    }
  }

  // the last allowed step may itself have removed the final profitable cycle
  if (!efficient && steps > 0) {
    efficient = await api.isParetoEfficient(current);
  }
  if (!efficient) {
    console.log("src/api/ServiceImprovementLoop.ts:%s - LIMIT REACHED after %d steps", fn, steps);
  }

  return {
    efficient,
    steps,
    allocations: current.allocations,
    initialUtilities,
    finalUtilities: utilities(instance.valuations, current.allocations),
  };
}
