import { afterEach, describe, expect, test } from '@jest/globals';
import {
    handleEfficiency,
    handleImprove,
    handleOptimize,
    handleScenario,
    handleScenarioList,
    parseRequest,
    toErrorResult,
} from './handlers';
import { dashboardEvents } from './DashboardEvents';
import { DomainError, ShapeError } from '../core/errors';
import { ScenarioLibrary } from '../simulation/ScenarioLibrary';
import { config } from '../config/defaults';

const swap = { valuations: [[50, 1], [1, 100]], allocations: [[0, 1], [1, 0]] };

afterEach(() => {
    dashboardEvents.removeAllListeners();
});

describe('parseRequest', () => {
    test("explicit options win over configured defaults", () => {
        const parsed = parseRequest({ ...swap, stepSize: 0.25, transferRule: "ratio-compounding", maxSteps: 0 });
        expect(parsed.options).toEqual({ stepSize: 0.25, transferRule: "ratio-compounding" });
        expect(parsed.maxSteps).toBe(0);
        expect(parsed.instance).toEqual({ name: "request", ...swap });
    });

    test("rejects bad options", () => {
        expect(() => parseRequest({ ...swap, stepSize: 0 })).toThrow("request invalid: stepSize: must be a positive number");
        expect(() => parseRequest({ ...swap, stepSize: "1" })).toThrow(DomainError);
        expect(() => parseRequest({ ...swap, maxSteps: 1.5 })).toThrow("request invalid: maxSteps: must be a non-negative integer");
    });

    test("maxSteps is capped by the configured step limit", () => {
        expect(parseRequest({ ...swap, maxSteps: config.MAX_IMPROVEMENT_STEPS }).maxSteps).toBe(config.MAX_IMPROVEMENT_STEPS);
        expect(() => parseRequest({ ...swap, maxSteps: config.MAX_IMPROVEMENT_STEPS + 1 })).toThrow(
            `request invalid: maxSteps: must not exceed ${config.MAX_IMPROVEMENT_STEPS}`,
        );
        expect(handleOptimize({ ...swap, maxSteps: 1e9 }).status).toBe(400);
    });

    test("structural problems are ShapeErrors", () => {
        expect(() => parseRequest({ ...swap, allocations: [[0, 1], [1, "0"]] })).toThrow(ShapeError);
        expect(() => parseRequest({ ...swap, allocations: [[0, 1], [1, "0"]] })).toThrow(
            "request invalid: allocations.1.1: Expected number, received string",
        );
    });
});

describe('handleEfficiency', () => {
    test("reports inefficient and efficient allocations", () => {
        expect(handleEfficiency(swap)).toEqual({ status: 200, body: { efficient: false } });
        expect(handleEfficiency({ ...swap, allocations: [[1, 0], [0, 1]] })).toEqual({ status: 200, body: { efficient: true } });
    });

    test("malformed body is a ShapeError", () => {
        expect(handleEfficiency({ valuations: "nope", allocations: [] })).toEqual({
            status: 400,
            body: { error: "ShapeError", message: "request invalid: valuations: Expected array, received string" },
        });
        expect(handleEfficiency(null)).toEqual({
            status: 400,
            body: { error: "ShapeError", message: "request invalid: (root): Expected object, received null" },
        });
    });

    test("zero valuation is a DomainError", () => {
        expect(handleEfficiency({ valuations: [[0, 1], [1, 1]], allocations: [[1, 0], [0, 1]] })).toEqual({
            status: 400,
            body: { error: "DomainError", message: "valuation of item 0 by player 0 must be positive, got 0" },
        });
    });
});

describe('handleImprove', () => {
    test("applies one step", () => {
        const result = handleImprove({ ...swap, stepSize: 0.5 });
        expect(result.status).toBe(200);
        const body = result.body;
        if (!("efficient" in body) || body.efficient) {
            throw new Error("expected an improvement step");
        }
        expect(body.cycle).toEqual([0, 1, 0]);
        expect(body.scale).toBeCloseTo(0.02, 12);
        expect(body.allocations[0][0]).toBe(1);
        expect(body.allocations[1][0]).toBe(0);
    });

    test("unknown transfer rule", () => {
        expect(handleImprove({ ...swap, transferRule: "greedy" })).toEqual({
            status: 400,
            body: { error: "DomainError", message: 'request invalid: transferRule: must be "value-preserving" or "ratio-compounding"' },
        });
    });
});

describe('handleOptimize', () => {
    test("runs to the end and streams one run to the dashboard", () => {
        const runIds: string[] = [];
        const steps: number[] = [];
        dashboardEvents.onRunStarted(e => runIds.push(e.runId));
        dashboardEvents.onStepApplied(e => {
            runIds.push(e.runId);
            steps.push(e.step);
        });
        dashboardEvents.onRunCompleted(e => runIds.push(e.runId));

        const result = handleOptimize({ ...swap, stepSize: 0.5, maxSteps: 10 });
        expect(result.status).toBe(200);
        expect(result.body).toMatchObject({ efficient: true, steps: 1, initialUtilities: [1, 1] });
        expect(steps).toEqual([1]);
        expect(runIds).toHaveLength(3);
        expect(new Set(runIds).size).toBe(1);
        expect(dashboardEvents.getLastRunStarted()?.runId).toBe(runIds[0]);
    });

    test("efficient when the last allowed step finishes the job", () => {
        const result = handleOptimize({ ...swap, stepSize: 0.5, maxSteps: 1 });
        expect(result.body).toMatchObject({ efficient: true, steps: 1 });
    });

    test("maxSteps 0 applies nothing", () => {
        const result = handleOptimize({ ...swap, maxSteps: 0 });
        expect(result.body).toMatchObject({ efficient: false, steps: 0, allocations: swap.allocations });
    });
});

describe('scenario handlers', () => {
    const library = new ScenarioLibrary();

    test("lists the bundled scenarios", () => {
        const result = handleScenarioList(library);
        expect(result.status).toBe(200);
        expect(result.body).toEqual({ scenarios: library.names() });
    });

    test("returns a known scenario", () => {
        expect(handleScenario(library, "two-player-swap")).toEqual({
            status: 200,
            body: { name: "two-player-swap", ...swap },
        });
    });

    test("unknown scenario is a 404", () => {
        expect(handleScenario(library, "no-such-market")).toEqual({
            status: 404,
            body: { error: "NotFound", message: 'Unknown scenario "no-such-market"' },
        });
    });
});

describe('toErrorResult', () => {
    test("unexpected errors are internal", () => {
        expect(toErrorResult("test", new Error("boom"))).toEqual({
            status: 500,
            body: { error: "InternalError", message: "boom" },
        });
    });
});
