import { describe, expect, test } from '@jest/globals';
import { cloneMatrix, columnSums, isConserved, playerUtility, utilities } from './Welfare';

describe('welfare helpers', () => {
    const valuations = [[10, 20, 30, 40], [40, 30, 20, 10]];
    const allocations = [[0, 0.5, 1, 0.75], [1, 0.5, 0, 0.25]];

    test("utilities", () => {
        expect(playerUtility(valuations, allocations, 0)).toBe(70);
        expect(utilities(valuations, allocations)).toEqual([70, 57.5]);
    });

    test("columnSums", () => {
        expect(columnSums(allocations)).toEqual([1, 1, 1, 1]);
        expect(columnSums([])).toEqual([]);
    });

    test("isConserved", () => {
        const moved = [[0.25, 0.5, 1, 0.75], [0.75, 0.5, 0, 0.25]];
        expect(isConserved(allocations, moved)).toBe(true);
        expect(isConserved(allocations, [[0, 0.5, 1, 0.75], [1, 0.5, 0, 0.5]])).toBe(false);
        expect(isConserved(allocations, [[0, 0.5, 1], [1, 0.5, 0]])).toBe(false);
    });

    test("cloneMatrix copies rows", () => {
        const copy = cloneMatrix(allocations);
        copy[0][0] = 0.5;
        expect(allocations[0][0]).toBe(0);
    });
});
