// File: src/api/EfficiencyService.ts (relative to project root)
import type { AllocationInstance, ImproveResponse, OptimizeResponse, StepOptions } from "../core/types";

/** What the runner needs from an efficiency backend, local or over HTTP. */
export interface EfficiencyService {
  isParetoEfficient(instance: AllocationInstance): Promise<boolean>;
  improve(instance: AllocationInstance, options?: StepOptions): Promise<ImproveResponse>;
  optimize(instance: AllocationInstance, options?: StepOptions & { maxSteps?: number }): Promise<OptimizeResponse>;
}
