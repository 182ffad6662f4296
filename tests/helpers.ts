import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import type { AppEntry } from "../src/config/types.js";
import type { Log } from "../src/logger.js";
import type { ConflictDecision, ConflictPrompt, ConflictRequest } from "../src/sync/prompt.js";
import type { FileRecord, TreeSide, TreeSnapshot } from "../src/sync/types.js";

/** A fixed base time, in seconds since epoch */
export const T = 1_700_000_000;

export function createTempDir(prefix = "mirrorsync-test-"): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanupDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Write a file under `root` and set its modification time (seconds).
 */
export function writeFile(root: string, relativePath: string, content: string, mtimeSec: number = T): string {
    const filePath = path.join(root, ...relativePath.split("/"));
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    fs.utimesSync(filePath, mtimeSec, mtimeSec);
    return filePath;
}

export function readFile(root: string, relativePath: string): string {
    return fs.readFileSync(path.join(root, ...relativePath.split("/")), "utf-8");
}

export function mtimeOf(root: string, relativePath: string): number {
    return fs.statSync(path.join(root, ...relativePath.split("/"))).mtimeMs;
}

/**
 * Build an in-memory snapshot from path → mtime (seconds). Sizes are all 1.
 */
export function snapshot(side: TreeSide, files: Record<string, number>, root = `/virtual/${side}`): TreeSnapshot {
    const map = new Map<string, FileRecord>();
    for (const relativePath of Object.keys(files).sort()) {
        map.set(relativePath, { relativePath, mtimeMs: files[relativePath] * 1000, size: 1 });
    }
    return { root, side, files: map, partialFiles: [], warnings: [] };
}

export function makeEntry(name: string, localPath: string, mirrorPath: string, extra: Partial<AppEntry> = {}): AppEntry {
    return { name, localPath, mirrorPath, disabled: false, ...extra };
}

export class MemoryLog implements Log {
    readonly infos: string[] = [];
    readonly warnings: string[] = [];
    readonly errors: string[] = [];

    info(message: string): void {
        this.infos.push(message);
    }

    warn(message: string): void {
        this.warnings.push(message);
    }

    error(message: string): void {
        this.errors.push(message);
    }
}

/**
 * Answers conflicts from a fixed script, then aborts.
 */
export class ScriptedPrompt implements ConflictPrompt {
    readonly requests: ConflictRequest[] = [];
    private decisions: ConflictDecision[];

    constructor(decisions: ConflictDecision[] = []) {
        this.decisions = [...decisions];
    }

    async ask(request: ConflictRequest): Promise<ConflictDecision> {
        this.requests.push(request);
        return this.decisions.shift() ?? "abort";
    }
}
