// File: src/simulation/InstanceGenerator.ts (relative to project root)
import type { AllocationInstance } from "../core/types";

export interface GeneratorConfig {
  players: number;
  items: number;
  minValue: number;
  maxValue: number;
  wholeItemProbability: number; // chance an item goes entirely to one player instead of being split
}

export const DEFAULT_GENERATOR_CONFIG: GeneratorConfig = {
  players: 3,
  items: 4,
  minValue: 1,
  maxValue: 100,
  wholeItemProbability: 0.5,
};

/**
 * Random valuations with integer values in [minValue, maxValue] and a random complete
 * allocation: every item's column sums to 1.
 */
export function generateInstance(
  overrides: Partial<GeneratorConfig> = {},
  random: () => number = Math.random
): AllocationInstance {
  const fn = "generateInstance";
  const cfg = { ...DEFAULT_GENERATOR_CONFIG, ...overrides };
  if (cfg.players < 1 || cfg.items < 1) {
    throw new RangeError(`need at least one player and one item, got ${cfg.players}x${cfg.items}`);
  }
  if (cfg.minValue <= 0 || cfg.maxValue < cfg.minValue) {
    throw new RangeError(`value range [${cfg.minValue}, ${cfg.maxValue}] must be positive and non-empty`);
  }

  const valuations = Array.from({ length: cfg.players }, () =>
    Array.from({ length: cfg.items }, () => cfg.minValue + Math.floor(random() * (cfg.maxValue - cfg.minValue + 1)))
  );
  const allocations = Array.from({ length: cfg.players }, () => new Array<number>(cfg.items).fill(0));

  for (let k = 0; k < cfg.items; k++) {
    if (random() < cfg.wholeItemProbability) {
      allocations[Math.min(cfg.players - 1, Math.floor(random() * cfg.players))][k] = 1;
      continue;
    }
    const weights = allocations.map(() => random());
    const total = weights.reduce((a, b) => a + b, 0);
    if (total === 0) {
      allocations[0][k] = 1;
      continue;
    }
    let assigned = 0;
    for (let i = 0; i < cfg.players - 1; i++) {
      allocations[i][k] = weights[i] / total;
      assigned += allocations[i][k];
    }
    allocations[cfg.players - 1][k] = Math.max(0, 1 - assigned);
  }

  console.log("src/simulation/InstanceGenerator.ts:%s - generated %dx%d instance", fn, cfg.players, cfg.items);
  return { name: `random-${cfg.players}x${cfg.items}`, valuations, allocations };
}
