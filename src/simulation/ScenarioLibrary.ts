// File: src/simulation/ScenarioLibrary.ts (relative to project root)
import fs from "fs";
import path from "path";
import type { AllocationInstance } from "../core/types";
import { InstanceSchema, ScenarioFileSchema, parseOrThrow } from "../core/schemas";

const SCENARIO_FILE = path.join(__dirname, "../../data/scenarios.json");

/**
 * Named allocation instances shipped with the project, plus instance files supplied by the user.
 */
export class ScenarioLibrary {
  private scenarios: Map<string, AllocationInstance>;

  constructor(file: string = SCENARIO_FILE) {
    const entries = parseOrThrow(ScenarioFileSchema, readJson(file), `scenario library ${file}`);
    this.scenarios = new Map(Object.entries(entries).map(([name, parsed]) => [name, { ...parsed, name }]));
    console.log("src/simulation/ScenarioLibrary.ts:constructor - loaded %d scenarios from %s", this.scenarios.size, file);
  }

  names(): string[] {
    return [...this.scenarios.keys()];
  }

  /** A fresh copy, so callers may mutate the allocation. */
  get(name: string): AllocationInstance {
    const scenario = this.scenarios.get(name);
    if (!scenario) {
      throw new Error(`Unknown scenario "${name}" (known: ${this.names().join(", ")})`);
    }
    return {
      name,
      valuations: scenario.valuations.map((row) => [...row]),
      allocations: scenario.allocations.map((row) => [...row]),
    };
  }
}

/** Load a single `{ valuations, allocations }` JSON file. */
export function loadInstanceFile(file: string): AllocationInstance {
  const fn = "loadInstanceFile";
  console.log("src/simulation/ScenarioLibrary.ts:%s - reading %s", fn, file);
  return parseInstance(readJson(file), path.basename(file, ".json"));
}

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, "utf8"));
}

/** Structural check of untrusted JSON: two arrays of arrays of numbers. Values are validated by the core. */
export function parseInstance(raw: unknown, name?: string): AllocationInstance {
  const parsed = parseOrThrow(InstanceSchema, raw, name ? `instance ${name}` : "instance");
  return { name: parsed.name ?? name, valuations: parsed.valuations, allocations: parsed.allocations };
}
