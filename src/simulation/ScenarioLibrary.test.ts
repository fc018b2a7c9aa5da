import { afterAll, describe, expect, test } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ScenarioLibrary, loadInstanceFile, parseInstance } from './ScenarioLibrary';
import { ShapeError } from '../core/errors';

const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'scenarios-'));

afterAll(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
});

describe('ScenarioLibrary', () => {
    test("ships the bundled scenarios", () => {
        const library = new ScenarioLibrary();
        expect(library.names()).toEqual([
            "two-player-swap",
            "two-player-best-fit",
            "opposed-tastes-split",
            "opposed-tastes-dictator",
            "three-player-ring",
            "single-player",
        ]);
        expect(library.get("two-player-swap")).toEqual({
            name: "two-player-swap",
            valuations: [[50, 1], [1, 100]],
            allocations: [[0, 1], [1, 0]],
        });
    });

    test("get returns an independent copy", () => {
        const library = new ScenarioLibrary();
        library.get("two-player-swap").allocations[0][0] = 0.5;
        expect(library.get("two-player-swap").allocations[0][0]).toBe(0);
    });

    test("unknown scenario", () => {
        const file = path.join(tmp, 'one.json');
        fs.writeFileSync(file, JSON.stringify({ tiny: { valuations: [[1]], allocations: [[1]] } }));
        expect(() => new ScenarioLibrary(file).get("huge")).toThrow('Unknown scenario "huge" (known: tiny)');
    });

    test("library file must hold an object", () => {
        const file = path.join(tmp, 'list.json');
        fs.writeFileSync(file, "[]");
        expect(() => new ScenarioLibrary(file)).toThrow(ShapeError);
    });

    test("every entry must be an instance", () => {
        const file = path.join(tmp, 'broken.json');
        fs.writeFileSync(file, JSON.stringify({ ok: { valuations: [[1]], allocations: [[1]] }, broken: { valuations: [[1]] } }));
        expect(() => new ScenarioLibrary(file)).toThrow(`scenario library ${file} invalid: broken.allocations: Required`);
    });
});

describe('loadInstanceFile', () => {
    test("names the instance after the file", () => {
        const file = path.join(tmp, 'market.json');
        fs.writeFileSync(file, JSON.stringify({ valuations: [[2, 3]], allocations: [[1, 1]] }));
        expect(loadInstanceFile(file)).toEqual({ name: "market", valuations: [[2, 3]], allocations: [[1, 1]] });
    });
});

describe('parseInstance', () => {
    test("an explicit name wins", () => {
        expect(parseInstance({ name: "given", valuations: [], allocations: [] }, "fallback").name).toBe("given");
    });

    test("structural errors", () => {
        expect(() => parseInstance(42)).toThrow("instance invalid: (root): Expected object, received number");
        expect(() => parseInstance({ valuations: [[1]], allocations: [[1, "x"]] }, "bad")).toThrow(
            "instance bad invalid: allocations.0.1: Expected number, received string",
        );
        expect(() => parseInstance({ valuations: {}, allocations: [] })).toThrow(ShapeError);
    });
});
