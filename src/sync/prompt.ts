import { createInterface } from "node:readline/promises";
import type { TreeComparison, TreeSide, TreeSnapshot } from "./types.js";

export type ConflictDecision = "keep-left" | "keep-right" | "abort";

/**
 * What one side of a conflict looks like, for a human to choose between.
 */
export interface TreeSummary {
    side: TreeSide;
    root: string;
    fileCount: number;
    /** Most recent modification time in the tree, null when empty */
    newestMtimeMs: number | null;
    /** Shared files that are newer on this side */
    newerFiles: string[];
    /** Files only this side has */
    extraFiles: string[];
}

export interface ConflictRequest {
    appName: string;
    left: TreeSummary;
    right: TreeSummary;
}

/**
 * Asks someone which tree to keep when neither is clearly newer.
 * The engine changes nothing until this resolves.
 */
export interface ConflictPrompt {
    ask(request: ConflictRequest): Promise<ConflictDecision>;
}

const QUESTION = "Keep [l]ocal, keep [m]irror, or [a]bort? ";

/** How many file names to list per category before eliding the rest */
const MAX_LISTED_FILES = 10;

function newestMtime(snapshot: TreeSnapshot): number | null {
    let newest: number | null = null;
    for (const record of snapshot.files.values()) {
        if (newest === null || record.mtimeMs > newest) {
            newest = record.mtimeMs;
        }
    }
    return newest;
}

export function summarizeConflict(
    appName: string,
    left: TreeSnapshot,
    right: TreeSnapshot,
    comparison: TreeComparison,
): ConflictRequest {
    return {
        appName,
        left: {
            side: left.side,
            root: left.root,
            fileCount: left.files.size,
            newestMtimeMs: newestMtime(left),
            newerFiles: comparison.newerOnLeft,
            extraFiles: comparison.onlyLeft,
        },
        right: {
            side: right.side,
            root: right.root,
            fileCount: right.files.size,
            newestMtimeMs: newestMtime(right),
            newerFiles: comparison.newerOnRight,
            extraFiles: comparison.onlyRight,
        },
    };
}

function listFiles(label: string, files: string[]): string[] {
    if (files.length === 0) return [];
    const lines = [`    ${label} (${files.length}):`];
    for (const file of files.slice(0, MAX_LISTED_FILES)) {
        lines.push(`      ${file}`);
    }
    if (files.length > MAX_LISTED_FILES) {
        lines.push(`      ... and ${files.length - MAX_LISTED_FILES} more`);
    }
    return lines;
}

export function formatTreeSummary(summary: TreeSummary): string[] {
    const newest = summary.newestMtimeMs === null ? "never" : new Date(summary.newestMtimeMs).toLocaleString();
    return [
        `  ${summary.side}: ${summary.root}`,
        `    ${summary.fileCount} file(s), last modified ${newest}`,
        ...listFiles("newer here", summary.newerFiles),
        ...listFiles("only here", summary.extraFiles),
    ];
}

/**
 * Parse a reply to the conflict question. Accepts any word starting with
 * l (local), m (mirror) or a (abort), in any case.
 */
export function parseConflictReply(reply: string): ConflictDecision | null {
    const lower = reply.trim().toLowerCase();
    if (lower.startsWith("l")) return "keep-left";
    if (lower.startsWith("m")) return "keep-right";
    if (lower.startsWith("a")) return "abort";
    return null;
}

export interface ConsolePromptOptions {
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
}

/**
 * Interactive prompt on the terminal. Asks again until the reply parses;
 * end of input counts as abort.
 */
export class ConsolePrompt implements ConflictPrompt {
    private input: NodeJS.ReadableStream;
    private output: NodeJS.WritableStream;

    constructor(options: ConsolePromptOptions = {}) {
        this.input = options.input ?? process.stdin;
        this.output = options.output ?? process.stdout;
    }

    async ask(request: ConflictRequest): Promise<ConflictDecision> {
        const lines = [
            "",
            `Conflict in "${request.appName}": neither side is strictly newer.`,
            ...formatTreeSummary(request.left),
            ...formatTreeSummary(request.right),
            "",
        ];
        this.output.write(lines.join("\n") + "\n");

        const rl = createInterface({ input: this.input, terminal: false });
        try {
            this.output.write(QUESTION);
            for await (const line of rl) {
                const decision = parseConflictReply(line);
                if (decision) return decision;
                this.output.write(QUESTION);
            }
            return "abort";
        } finally {
            rl.close();
        }
    }
}

/** Used when nobody is there to answer: conflicts are left alone. */
export class AbortingPrompt implements ConflictPrompt {
    async ask(): Promise<ConflictDecision> {
        return "abort";
    }
}
