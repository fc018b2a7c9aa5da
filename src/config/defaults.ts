// File: src/config/defaults.ts (relative to project root)
import * as dotenv from "dotenv";
import type { TransferRuleName } from "../core/types";
import { isTransferRuleName } from "../strategy";
dotenv.config();

function env(name: string, fallback?: string): string {
  const v = process.env[name] ?? fallback;
  if (v === undefined) {
    throw new Error(`Missing required env var: ${name}`);
  }
  return v;
}

function envNumber(name: string, fallback: string): number {
  const raw = env(name, fallback);
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    throw new Error(`Env var ${name} must be a number, got "${raw}"`);
  }
  return n;
}

function envTransferRule(name: string, fallback: TransferRuleName): TransferRuleName {
  const raw = env(name, fallback);
  if (!isTransferRuleName(raw)) {
    throw new Error(`Env var ${name} must be "value-preserving" or "ratio-compounding", got "${raw}"`);
  }
  return raw;
}

export const config = {
  STEP_SIZE: envNumber("STEP_SIZE", "0.001"),
  TRANSFER_RULE: envTransferRule("TRANSFER_RULE", "value-preserving"),
  CYCLE_TOLERANCE: envNumber("CYCLE_TOLERANCE", "1e-12"),
  MAX_IMPROVEMENT_STEPS: envNumber("MAX_IMPROVEMENT_STEPS", "1000"),
  SCENARIO: env("SCENARIO", "two-player-swap"),
  SCENARIO_FILE: process.env.SCENARIO_FILE,
  SIMULATION: env("SIMULATION", "true") !== "false",
  API_BASE_URL: env("API_BASE_URL", "http://localhost:3001/api"),
  WEB_PORT: envNumber("WEB_PORT", "3001"),
  RESULTS_WEBHOOK_URL: process.env.RESULTS_WEBHOOK_URL,
};
