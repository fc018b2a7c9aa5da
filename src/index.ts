// File: src/index.ts (relative to project root)
import { randomUUID } from "crypto";
import { EfficiencyClient } from "./api/EfficiencyClient";
import type { EfficiencyService } from "./api/EfficiencyService";
import { improveViaService } from "./api/ServiceImprovementLoop";
import { LocalEfficiencyClient } from "./simulation/LocalEfficiencyClient";
import { ScenarioLibrary, loadInstanceFile } from "./simulation/ScenarioLibrary";
import { generateInstance } from "./simulation/InstanceGenerator";
import { config } from "./config/defaults";
import type { AllocationInstance } from "./core/types";
import type { LoopResult } from "./core/ImprovementLoop";
import { logInstanceIntro, logFinalSummary } from "./logging/Reporter";
import { reportRunComplete } from "./reporting/ResultsReporter";
import { dashboardEvents } from "./web/DashboardEvents";

function loadInstance(): AllocationInstance {
  if (config.SCENARIO_FILE) {
    return loadInstanceFile(config.SCENARIO_FILE);
  }
  if (config.SCENARIO === "random") {
    return generateInstance();
  }
  return new ScenarioLibrary().get(config.SCENARIO);
}

async function runOnce(): Promise<LoopResult> {
  const fn = "runOnce";
  const instance = loadInstance();
  console.log("src/index.ts:%s - starting run (instance=%s)", fn, instance.name ?? "unnamed");

  const api: EfficiencyService = config.SIMULATION
    ? new LocalEfficiencyClient(config.CYCLE_TOLERANCE)
    : new EfficiencyClient();

  console.log("src/index.ts:%s - using %s client", fn, config.SIMULATION ? "LOCAL" : "HTTP");

  logInstanceIntro(instance);

  const runId = randomUUID();
  dashboardEvents.emitRunStarted({
    runId,
    instance,
    transferRule: config.TRANSFER_RULE,
    stepSize: config.STEP_SIZE,
  });

  const result = await improveViaService(api, instance, {
    maxSteps: config.MAX_IMPROVEMENT_STEPS,
    stepSize: config.STEP_SIZE,
    transferRule: config.TRANSFER_RULE,
    onStep: (record) => dashboardEvents.emitStepApplied({ ...record, runId, timestamp: Date.now() }),
  });
  logFinalSummary(result);

  dashboardEvents.emitRunCompleted({
    runId,
    efficient: result.efficient,
    steps: result.steps,
    allocations: result.allocations,
    finalUtilities: result.finalUtilities,
  });

  await reportRunComplete(result, {
    instance: instance.name ?? "unnamed",
    transferRule: config.TRANSFER_RULE,
    stepSize: config.STEP_SIZE,
  });

  return result;
}

runOnce().catch((err) => {
  console.error("src/index.ts:runOnce - Unhandled error:", err);
  process.exit(1);
});
