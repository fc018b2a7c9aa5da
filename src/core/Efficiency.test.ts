import { describe, expect, test } from '@jest/globals';
import { isParetoEfficient } from './Efficiency';
import { buildExchangeGraph } from './ExchangeGraph';
import { DomainError, ShapeError } from './errors';
import { generateInstance } from '../simulation/InstanceGenerator';
import { seededRandom } from './testing';
import type { WeightedDigraph } from './types';

// Independent all-pairs check: a negative cycle exists iff some node reaches itself at negative cost.
function floydWarshallHasNegativeCycle(graph: WeightedDigraph): boolean {
    const n = graph.nodeCount;
    const dist = Array.from({ length: n }, (_, i) => Array.from({ length: n }, (_, j) => (i === j ? 0 : Infinity)));
    for (const e of graph.edges) {
        dist[e.from][e.to] = Math.min(dist[e.from][e.to], e.weight);
    }
    for (let k = 0; k < n; k++) {
        for (let i = 0; i < n; i++) {
            for (let j = 0; j < n; j++) {
                if (dist[i][k] + dist[k][j] < dist[i][j]) {
                    dist[i][j] = dist[i][k] + dist[k][j];
                }
            }
        }
    }
    return dist.some((row, i) => row[i] < -1e-10);
}

describe('isParetoEfficient', () => {
    test("each player holds what the other wants", () => {
        expect(isParetoEfficient([[50, 1], [1, 100]], [[0, 1], [1, 0]])).toBe(false);
    });

    test("best-fit allocation", () => {
        expect(isParetoEfficient([[50, 1], [1, 100]], [[1, 0], [0, 1]])).toBe(true);
    });

    test("opposed tastes", () => {
        const valuations = [[10, 20, 30, 40], [40, 30, 20, 10]];
        expect(isParetoEfficient(valuations, [[1, 1, 1, 1], [0, 0, 0, 0]])).toBe(true);
        expect(isParetoEfficient(valuations, [[0, 0.6, 1, 0.9], [1, 0.4, 0, 0.1]])).toBe(false);
        expect(isParetoEfficient(valuations, [[1, 0.7, 1, 0], [0, 0.3, 0, 0]])).toBe(false);
    });

    test("single player is always efficient", () => {
        expect(isParetoEfficient([[3, 5, 7]], [[1, 1, 1]])).toBe(true);
        expect(isParetoEfficient([[3, 5, 7]], [[0.2, 0, 1]])).toBe(true);
    });

    test("no players", () => {
        expect(isParetoEfficient([], [])).toBe(true);
    });

    test("identical valuations leave nothing to trade", () => {
        expect(isParetoEfficient([[1, 3, 7], [1, 3, 7], [1, 3, 7]], [[0.5, 0, 0.2], [0.5, 0.5, 0.3], [0, 0.5, 0.5]])).toBe(true);
    });

    test("does not modify its inputs", () => {
        const valuations = [[50, 1], [1, 100]];
        const allocations = [[0, 1], [1, 0]];
        isParetoEfficient(valuations, allocations);
        expect(valuations).toEqual([[50, 1], [1, 100]]);
        expect(allocations).toEqual([[0, 1], [1, 0]]);
    });

    test("errors", () => {
        expect(() => isParetoEfficient([[1, 2], [3, 4]], [[1, 0]])).toThrow(ShapeError);
        expect(() => isParetoEfficient([[1, 2], [3, 0]], [[1, 0], [0, 1]])).toThrow(DomainError);
    });

    test("agrees with an all-pairs negative cycle check", () => {
        const random = seededRandom(20240611);
        let inefficientSeen = 0;
        for (let round = 0; round < 40; round++) {
            const instance = generateInstance({ players: 3, items: 3, minValue: 1, maxValue: 20 }, random);
            const expected = !floydWarshallHasNegativeCycle(buildExchangeGraph(instance.valuations, instance.allocations));
            expect(isParetoEfficient(instance.valuations, instance.allocations)).toBe(expected);
            if (!expected) inefficientSeen++;
        }
        expect(inefficientSeen).toBeGreaterThan(0);
    });
});
