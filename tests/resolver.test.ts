import { describe, it, expect } from "vitest";
import { compareTrees, resolveDirection } from "../src/sync/resolver.js";
import type { TreeSnapshot, Verdict } from "../src/sync/types.js";
import { T, snapshot } from "./helpers.js";

const MIRRORED: Record<Verdict, Verdict> = {
    "left-newer": "right-newer",
    "right-newer": "left-newer",
    equal: "equal",
    conflict: "conflict",
};

/**
 * Every pair of trees over three paths where each path is absent, at T, or
 * at T+10 on each side.
 */
function allTreePairs(): Array<[TreeSnapshot, TreeSnapshot]> {
    const states: Array<number | null> = [null, T, T + 10];
    const paths = ["a.sav", "b.sav", "c.sav"];
    const trees: Array<Record<string, number>> = [];
    for (const s0 of states) {
        for (const s1 of states) {
            for (const s2 of states) {
                const files: Record<string, number> = {};
                [s0, s1, s2].forEach((state, i) => {
                    if (state !== null) files[paths[i]] = state;
                });
                trees.push(files);
            }
        }
    }
    const pairs: Array<[TreeSnapshot, TreeSnapshot]> = [];
    for (const left of trees) {
        for (const right of trees) {
            pairs.push([snapshot("local", left), snapshot("mirror", right)]);
        }
    }
    return pairs;
}

describe("resolveDirection", () => {
    it("should pick the mirror when its only shared file is newer", () => {
        const left = snapshot("local", { "save.dat": T });
        const right = snapshot("mirror", { "save.dat": T + 10 });
        expect(resolveDirection(left, right)).toBe("right-newer");
    });

    it("should report a conflict when each side has a newer file", () => {
        const left = snapshot("local", { "a.sav": T, "b.sav": T });
        const right = snapshot("mirror", { "a.sav": T + 10, "b.sav": T - 10 });
        expect(resolveDirection(left, right)).toBe("conflict");
    });

    it("should pick the side holding a strict superset of files", () => {
        const left = snapshot("local", { "a.sav": T, "b.sav": T });
        const right = snapshot("mirror", { "a.sav": T });
        expect(resolveDirection(left, right)).toBe("left-newer");
    });

    it("should treat two empty trees as equal", () => {
        expect(resolveDirection(snapshot("local", {}), snapshot("mirror", {}))).toBe("equal");
    });

    it("should treat timestamps within the tolerance as equal", () => {
        const left = snapshot("local", { "a.sav": T, "b.sav": T + 2 });
        const right = snapshot("mirror", { "a.sav": T + 1, "b.sav": T });
        expect(resolveDirection(left, right)).toBe("equal");
    });

    it("should let a newer side win even if the other has extra files", () => {
        const left = snapshot("local", { "a.sav": T + 10 });
        const right = snapshot("mirror", { "a.sav": T, "c.sav": T });
        expect(resolveDirection(left, right)).toBe("left-newer");
    });

    it("should report a conflict when both sides have files the other lacks", () => {
        const left = snapshot("local", { "shared.sav": T, "left.sav": T });
        const right = snapshot("mirror", { "shared.sav": T, "right.sav": T });
        expect(resolveDirection(left, right)).toBe("conflict");
    });

    it("should report a conflict when each side leads on a different file, whatever the extras", () => {
        const left = snapshot("local", { "a.sav": T + 10, "b.sav": T });
        const right = snapshot("mirror", { "a.sav": T, "b.sav": T + 10, "c.sav": T });
        expect(resolveDirection(left, right)).toBe("conflict");
    });

    it("should pick the non-empty side when the other is empty", () => {
        expect(resolveDirection(snapshot("local", {}), snapshot("mirror", { "a.sav": T }))).toBe("right-newer");
    });

    it("should use the given tolerance", () => {
        const left = snapshot("local", { "a.sav": T });
        const right = snapshot("mirror", { "a.sav": T + 1 });
        expect(resolveDirection(left, right, 0)).toBe("right-newer");
    });

    it("should be symmetric for every pair of trees", () => {
        for (const [left, right] of allTreePairs()) {
            const forward = resolveDirection(left, right);
            const backward = resolveDirection(right, left);
            expect(backward).toBe(MIRRORED[forward]);
        }
    });

    it("should call any tree equal to itself", () => {
        for (const [left] of allTreePairs()) {
            expect(resolveDirection(left, left)).toBe("equal");
        }
    });

    it("should never pick a side that lags on a shared file", () => {
        for (const [left, right] of allTreePairs()) {
            const verdict = resolveDirection(left, right);
            const comparison = compareTrees(left, right);
            if (verdict === "left-newer") {
                expect(comparison.newerOnRight).toEqual([]);
            }
            if (verdict === "right-newer") {
                expect(comparison.newerOnLeft).toEqual([]);
            }
            if (verdict === "equal") {
                expect(comparison.onlyLeft).toEqual([]);
                expect(comparison.onlyRight).toEqual([]);
                expect(comparison.newerOnLeft).toEqual([]);
                expect(comparison.newerOnRight).toEqual([]);
            }
        }
    });
});

describe("compareTrees", () => {
    it("should classify every path", () => {
        const left = snapshot("local", { "a.sav": T + 10, "b.sav": T, "c.sav": T, "only-left.sav": T });
        const right = snapshot("mirror", { "a.sav": T, "b.sav": T + 10, "c.sav": T + 1, "only-right.sav": T });

        expect(compareTrees(left, right)).toEqual({
            newerOnLeft: ["a.sav"],
            newerOnRight: ["b.sav"],
            onlyLeft: ["only-left.sav"],
            onlyRight: ["only-right.sav"],
            same: ["c.sav"],
        });
    });
});
