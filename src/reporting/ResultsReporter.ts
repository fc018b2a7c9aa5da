// File: src/reporting/ResultsReporter.ts (relative to project root)
import axios from "axios";
import type { TransferRuleName } from "../core/types";
import type { LoopResult } from "../core/ImprovementLoop";
import { columnSums } from "../core/Welfare";
import { config } from "../config/defaults";

/** Interface for results payload sent to the webhook */
export interface RunResultsPayload {
  instance: string;
  efficient: boolean;
  steps: number;
  transferRule: TransferRuleName;
  stepSize: number;
  players: Array<{
    player: number;
    utilityBefore: number;
    utilityAfter: number;
    gain: number;
  }>;
  summary: {
    totalGain: number;
    playersBetterOff: number;
    playersWorseOff: number;
    maxItemImbalance: number; // max |column sum - 1|
    completionTime: string;
  };
}

export interface RunDescription {
  instance: string;
  transferRule: TransferRuleName;
  stepSize: number;
}

/**
 * Report a finished run to the results webhook, when one is configured.
 * Never throws: a reporting failure must not fail the run.
 */
export async function reportRunComplete(
  result: LoopResult,
  run: RunDescription,
  webhookUrl: string | undefined = config.RESULTS_WEBHOOK_URL
): Promise<void> {
  const fn = "reportRunComplete";

  if (!webhookUrl) {
    console.log("src/reporting/ResultsReporter.ts:%s - results webhook not configured, skipping", fn);
    return;
  }

  console.log("src/reporting/ResultsReporter.ts:%s - reporting %s efficient=%s steps=%d", fn, run.instance, result.efficient, result.steps);

  try {
    const payload = formatResultsPayload(result, run);
    await sendResults(webhookUrl, payload);
    console.log("src/reporting/ResultsReporter.ts:%s - successfully sent results", fn);
  } catch (error) {
    console.error("src/reporting/ResultsReporter.ts:%s - failed to send results:", fn, error);
  }
}

/** Formats a run into the webhook payload. Utilities are rounded to 6 decimals. */
export function formatResultsPayload(result: LoopResult, run: RunDescription, now: Date = new Date()): RunResultsPayload {
  const players = result.initialUtilities.map((before, player) => {
    const after = result.finalUtilities[player];
    return {
      player,
      utilityBefore: round6(before),
      utilityAfter: round6(after),
      gain: round6(after - before),
    };
  });

  const imbalance = columnSums(result.allocations).reduce((worst, sum) => Math.max(worst, Math.abs(sum - 1)), 0);

  return {
    instance: run.instance,
    efficient: result.efficient,
    steps: result.steps,
    transferRule: run.transferRule,
    stepSize: run.stepSize,
    players,
    summary: {
      totalGain: round6(players.reduce((total, p) => total + p.gain, 0)),
      playersBetterOff: players.filter((p) => p.gain > 0).length,
      playersWorseOff: players.filter((p) => p.gain < 0).length,
      maxItemImbalance: imbalance,
      completionTime: now.toISOString(),
    },
  };
}

/** Sends the formatted results payload via HTTP POST */
export async function sendResults(webhookUrl: string, payload: RunResultsPayload): Promise<void> {
  const fn = "sendResults";
  console.log("src/reporting/ResultsReporter.ts:%s - sending to %s", fn, webhookUrl);

  try {
    const response = await axios.post(webhookUrl, payload, {
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': 'allocation-efficiency-results-reporter'
      },
      timeout: 10000
    });
    console.log("src/reporting/ResultsReporter.ts:%s - webhook responded with status %d", fn, response.status);
  } catch (error: unknown) {
    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNREFUSED') {
        console.error("src/reporting/ResultsReporter.ts:%s - webhook not reachable at %s", fn, webhookUrl);
      } else if (error.response) {
        console.error("src/reporting/ResultsReporter.ts:%s - webhook returned error %d: %s",
          fn, error.response.status, error.response.statusText);
      } else {
        console.error("src/reporting/ResultsReporter.ts:%s - network error:", fn, error.message);
      }
    } else {
      console.error("src/reporting/ResultsReporter.ts:%s - unexpected error:", fn, error);
    }
    throw error;
  }
}

function round6(x: number): number {
  return Math.round(x * 1e6) / 1e6;
}
