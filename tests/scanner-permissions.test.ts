import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type * as nodeFs from "node:fs";
import * as path from "node:path";
import { scanTree } from "../src/sync/scanner.js";
import { IOError } from "../src/errors.js";
import { cleanupDir, createTempDir, writeFile } from "./helpers.js";

const denied = vi.hoisted(() => new Set<string>());

// Paths in `denied` fail the way an unreadable entry does, even when running as root
vi.mock("node:fs", async (importOriginal) => {
    const actual = await importOriginal<typeof nodeFs>();
    const deny = (p: nodeFs.PathLike, syscall: string): void => {
        const target = String(p);
        if (denied.has(target)) {
            throw Object.assign(new Error(`EACCES: permission denied, ${syscall} '${target}'`), { code: "EACCES" });
        }
    };
    return {
        ...actual,
        readdirSync: (dirPath: nodeFs.PathLike, options: { withFileTypes: true }) => {
            deny(dirPath, "scandir");
            return actual.readdirSync(dirPath, options);
        },
        accessSync: (filePath: nodeFs.PathLike, mode?: number) => {
            deny(filePath, "access");
            actual.accessSync(filePath, mode);
        },
    };
});

describe("scanTree with unreadable entries", () => {
    let root: string;

    beforeEach(() => {
        root = createTempDir();
    });

    afterEach(() => {
        denied.clear();
        cleanupDir(root);
    });

    it("should skip an unreadable directory and file with a warning each and keep scanning", () => {
        writeFile(root, "a.sav", "a");
        writeFile(root, "locked/inner.sav", "i");
        writeFile(root, "open/b.sav", "b");
        writeFile(root, "secret.sav", "s");
        const lockedDir = path.join(root, "locked");
        const secretFile = path.join(root, "secret.sav");
        denied.add(lockedDir);
        denied.add(secretFile);

        const snap = scanTree(root, "local");

        expect([...snap.files.keys()]).toEqual(["a.sav", "open/b.sav"]);
        expect([...snap.warnings].sort()).toEqual([
            `Skipped unreadable directory ${lockedDir}: EACCES: permission denied, scandir '${lockedDir}'`,
            `Skipped unreadable file ${secretFile}: EACCES: permission denied, access '${secretFile}'`,
        ]);
    });

    it("should fail when the root itself cannot be listed", () => {
        writeFile(root, "a.sav", "a");
        denied.add(root);

        expect(() => scanTree(root, "mirror")).toThrow(IOError);
        expect(() => scanTree(root, "mirror")).toThrow(
            `Cannot read mirror root ${root}: EACCES: permission denied, scandir '${root}'`,
        );
    });
});
