// File: src/logging/Reporter.ts (relative to project root)
import type { AllocationInstance, AllocationMatrix } from "../core/types";
import type { LoopResult } from "../core/ImprovementLoop";
import { columnSums } from "../core/Welfare";

/** Pretty-print valuations and the starting allocation at the start of a run. */
export function logInstanceIntro(instance: AllocationInstance): void {
  const fn = "logInstanceIntro";
  const players = instance.valuations.length;
  const items = players > 0 ? instance.valuations[0].length : 0;
  console.log("src/logging/Reporter.ts:%s - --- INSTANCE %s ---", fn, instance.name ?? "(unnamed)");
  console.log("src/logging/Reporter.ts:%s - %d players, %d items", fn, players, items);

  console.log("src/logging/Reporter.ts:%s - Valuations (player → per-item value):", fn);
  instance.valuations.forEach((row, i) => {
    console.log("src/logging/Reporter.ts:%s -   P%d: %s", fn, i, row.join("  "));
  });

  console.log("src/logging/Reporter.ts:%s - Allocation (player → share per item):", fn);
  logMatrix(fn, instance.allocations);
}

/** Final recap: efficiency, step count, utilities before/after and item totals. */
export function logFinalSummary(result: LoopResult): void {
  const fn = "logFinalSummary";
  console.log("src/logging/Reporter.ts:%s - --- FINAL SUMMARY ---", fn);
  console.log(
    "src/logging/Reporter.ts:%s - efficient=%s steps=%d",
    fn,
    result.efficient ? "YES" : "NO (step limit reached)",
    result.steps
  );

  console.log("src/logging/Reporter.ts:%s - Utilities (before → after):", fn);
  result.initialUtilities.forEach((before, i) => {
    const after = result.finalUtilities[i];
    console.log(
      "src/logging/Reporter.ts:%s -   P%d: %s → %s (%s)",
      fn,
      i,
      before.toFixed(4),
      after.toFixed(4),
      formatDelta(after - before)
    );
  });

  console.log("src/logging/Reporter.ts:%s - Final allocation:", fn);
  logMatrix(fn, result.allocations);

  const sums = columnSums(result.allocations).map((s) => s.toFixed(6));
  console.log("src/logging/Reporter.ts:%s - Item totals: %s", fn, sums.join("  "));
}

function logMatrix(fn: string, matrix: AllocationMatrix): void {
  matrix.forEach((row, i) => {
    console.log("src/logging/Reporter.ts:%s -   P%d: %s", fn, i, row.map((x) => formatShare(x)).join("  "));
  });
}

function formatShare(x: number): string {
  return x.toFixed(4);
}

function formatDelta(d: number): string {
  return `${d >= 0 ? "+" : ""}${d.toFixed(4)}`;
}
