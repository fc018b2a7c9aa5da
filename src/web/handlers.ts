// File: src/web/handlers.ts (relative to project root)
import { randomUUID } from "crypto";
import type {
  AllocationInstance,
  ApiErrorBody,
  EfficiencyResponse,
  ImproveResponse,
  OptimizeResponse,
  StepOptions,
} from "../core/types";
import { DomainError, ShapeError } from "../core/errors";
import { isParetoEfficient } from "../core/Efficiency";
import { improveAllocation } from "../core/CycleImprover";
import { improveUntilEfficient } from "../core/ImprovementLoop";
import { InstanceRequestSchema, parseOrThrow } from "../core/schemas";
import type { ScenarioLibrary } from "../simulation/ScenarioLibrary";
import { config } from "../config/defaults";
import { dashboardEvents } from "./DashboardEvents";

export interface HandlerResult<T> {
  status: number;
  body: T | ApiErrorBody;
}

interface ParsedRequest {
  instance: AllocationInstance;
  options: StepOptions;
  maxSteps: number;
}

/** Express-independent request handling, so routes stay thin and the logic is testable as plain functions. */
export function parseRequest(body: unknown): ParsedRequest {
  const request = parseOrThrow(InstanceRequestSchema, body, "request");
  // capped at the configured step limit
  if (request.maxSteps !== undefined && request.maxSteps > config.MAX_IMPROVEMENT_STEPS) {
    throw new DomainError(`request invalid: maxSteps: must not exceed ${config.MAX_IMPROVEMENT_STEPS}`);
  }
  return {
    instance: { name: request.name ?? "request", valuations: request.valuations, allocations: request.allocations },
    options: {
      stepSize: request.stepSize ?? config.STEP_SIZE,
      transferRule: request.transferRule ?? config.TRANSFER_RULE,
    },
    maxSteps: request.maxSteps ?? config.MAX_IMPROVEMENT_STEPS,
  };
}

export function handleEfficiency(body: unknown): HandlerResult<EfficiencyResponse> {
  const fn = "handleEfficiency";
  try {
    const { instance } = parseRequest(body);
    const efficient = isParetoEfficient(instance.valuations, instance.allocations, { tolerance: config.CYCLE_TOLERANCE });
    return { status: 200, body: { efficient } };
  } catch (err) {
    return toErrorResult(fn, err);
  }
}

export function handleImprove(body: unknown): HandlerResult<ImproveResponse> {
  const fn = "handleImprove";
  try {
    const { instance, options } = parseRequest(body);
    const outcome = improveAllocation(instance.valuations, instance.allocations, {
      ...options,
      tolerance: config.CYCLE_TOLERANCE,
    });
    if (outcome.efficient) {
      return { status: 200, body: { efficient: true } };
    }
    return {
      status: 200,
      body: {
        efficient: false,
        allocations: outcome.allocations,
        cycle: outcome.cycle,
        transfers: outcome.transfers,
        scale: outcome.scale,
      },
    };
  } catch (err) {
    return toErrorResult(fn, err);
  }
}

/** Runs improvement to the end (or maxSteps), forwarding every step to the dashboard. */
export function handleOptimize(body: unknown): HandlerResult<OptimizeResponse> {
  const fn = "handleOptimize";
  try {
    const { instance, options, maxSteps } = parseRequest(body);
    const runId = randomUUID();
    dashboardEvents.emitRunStarted({
      runId,
      instance,
      transferRule: options.transferRule ?? config.TRANSFER_RULE,
      stepSize: options.stepSize ?? config.STEP_SIZE,
    });
    const result = improveUntilEfficient(instance.valuations, instance.allocations, {
      ...options,
      tolerance: config.CYCLE_TOLERANCE,
      maxSteps,
      onStep: (record) => dashboardEvents.emitStepApplied({ ...record, runId, timestamp: Date.now() }),
    });
    dashboardEvents.emitRunCompleted({
      runId,
      efficient: result.efficient,
      steps: result.steps,
      allocations: result.allocations,
      finalUtilities: result.finalUtilities,
    });
    return { status: 200, body: result };
  } catch (err) {
    return toErrorResult(fn, err);
  }
}

export function handleScenarioList(library: ScenarioLibrary): HandlerResult<{ scenarios: string[] }> {
  return { status: 200, body: { scenarios: library.names() } };
}

export function handleScenario(library: ScenarioLibrary, name: string): HandlerResult<AllocationInstance> {
  const fn = "handleScenario";
  if (!library.names().includes(name)) {
    console.log("src/web/handlers.ts:%s - unknown scenario %s", fn, name);
    return { status: 404, body: { error: "NotFound", message: `Unknown scenario "${name}"` } };
  }
  return { status: 200, body: library.get(name) };
}

export function toErrorResult(fn: string, err: unknown): HandlerResult<never> {
  if (err instanceof ShapeError || err instanceof DomainError) {
    console.log("src/web/handlers.ts:%s - rejected request: %s", fn, err.message);
    return { status: 400, body: { error: err instanceof ShapeError ? "ShapeError" : "DomainError", message: err.message } };
  }
  console.error("src/web/handlers.ts:%s - unexpected error:", fn, err);
  const message = err instanceof Error ? err.message : String(err);
  return { status: 500, body: { error: "InternalError", message } };
}
