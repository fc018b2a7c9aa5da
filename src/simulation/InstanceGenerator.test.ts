import { describe, expect, test } from '@jest/globals';
import { generateInstance } from './InstanceGenerator';
import { seededRandom } from '../core/testing';
import { columnSums } from '../core/Welfare';
import { validateInstance } from '../core/Validation';

describe('generateInstance', () => {
    test("complete allocation over integer valuations", () => {
        const instance = generateInstance({ players: 4, items: 5, minValue: 2, maxValue: 9 }, seededRandom(11));

        expect(instance.name).toBe("random-4x5");
        expect(validateInstance(instance.valuations, instance.allocations)).toEqual({ players: 4, items: 5 });
        for (const row of instance.valuations) {
            for (const v of row) {
                expect(Number.isInteger(v)).toBe(true);
                expect(v).toBeGreaterThanOrEqual(2);
                expect(v).toBeLessThanOrEqual(9);
            }
        }
        for (const sum of columnSums(instance.allocations)) {
            expect(sum).toBeCloseTo(1, 12);
        }
    });

    test("same seed, same instance", () => {
        expect(generateInstance({}, seededRandom(5))).toEqual(generateInstance({}, seededRandom(5)));
    });

    test("whole items only", () => {
        const instance = generateInstance({ wholeItemProbability: 1 }, seededRandom(3));
        for (let k = 0; k < 4; k++) {
            const column = instance.allocations.map(row => row[k]);
            expect(column.filter(x => x === 1)).toHaveLength(1);
            expect(column.filter(x => x === 0)).toHaveLength(2);
        }
    });

    test("rejects impossible settings", () => {
        expect(() => generateInstance({ players: 0 })).toThrow(RangeError);
        expect(() => generateInstance({ minValue: 0 })).toThrow("value range [0, 100] must be positive and non-empty");
    });
});
