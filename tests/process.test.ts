import { describe, it, expect } from "vitest";
import * as path from "node:path";
import { filterProcessesUnder, listProcesses, selfAndAncestors } from "../src/play/processes.js";

describe("Process Discovery", () => {
    describe("listProcesses", () => {
        it("should return objects with pid and commandLine", () => {
            const procs = listProcesses();
            expect(Array.isArray(procs)).toBe(true);
            for (const proc of procs) {
                expect(typeof proc.pid).toBe("number");
                expect(typeof proc.ppid).toBe("number");
                expect(typeof proc.commandLine).toBe("string");
            }
        });
    });

    describe("filterProcessesUnder", () => {
        const root = path.resolve("/opt/games/one");

        it("should keep processes whose command line mentions the root", () => {
            const procs = [
                { pid: 10, ppid: 1, commandLine: `${path.join(root, "launcher")} --silent` },
                { pid: 11, ppid: 10, commandLine: `/usr/bin/wine ${path.join(root, "bin", "game.exe")}` },
                { pid: 12, ppid: 1, commandLine: "/usr/bin/editor notes.txt" },
            ];
            expect(filterProcessesUnder(procs, root, 99999).map((p) => p.pid)).toEqual([10, 11]);
        });

        it("should not include the current process", () => {
            const procs = [{ pid: process.pid, ppid: 1, commandLine: path.join(root, "self") }];
            expect(filterProcessesUnder(procs, root)).toEqual([]);
        });

        it("should not include the wrapper script that started this process", () => {
            const procs = [{ pid: process.ppid, ppid: 1, commandLine: `/bin/bash ${path.join(root, "play.sh")}` }];
            expect(filterProcessesUnder(procs, root)).toEqual([]);
        });

        it("should skip every ancestor but keep their other children", () => {
            const procs = [
                { pid: 500, ppid: 400, commandLine: `node ${path.join(root, "mirrorsync.js")} play one` },
                { pid: 400, ppid: 300, commandLine: `/bin/bash ${path.join(root, "play.sh")}` },
                { pid: 300, ppid: 1, commandLine: `${path.join(root, "launcher")}` },
                { pid: 600, ppid: 400, commandLine: `${path.join(root, "game.bin")}` },
            ];
            expect(filterProcessesUnder(procs, root, 500).map((p) => p.pid)).toEqual([600]);
        });
    });

    describe("selfAndAncestors", () => {
        it("should follow parent ids up the listing", () => {
            const procs = [
                { pid: 30, ppid: 20, commandLine: "c" },
                { pid: 20, ppid: 10, commandLine: "b" },
                { pid: 10, ppid: 0, commandLine: "a" },
                { pid: 40, ppid: 20, commandLine: "sibling" },
            ];
            expect([...selfAndAncestors(procs, 30)]).toEqual([30, 20, 10]);
        });

        it("should stop on a parent loop", () => {
            const procs = [
                { pid: 2, ppid: 3, commandLine: "x" },
                { pid: 3, ppid: 2, commandLine: "y" },
            ];
            expect([...selfAndAncestors(procs, 2)]).toEqual([2, 3]);
        });

        it("should use the known parent of this process when the listing lacks it", () => {
            expect(selfAndAncestors([]).has(process.ppid)).toBe(true);
        });
    });
});
