import type { AppEntry } from "../config/types.js";
import { ConflictUnresolved, errorMessage } from "../errors.js";
import type { FileOperations } from "../utils/fileops.js";
import { applyVerdict, type DirectedVerdict } from "./executor.js";
import { summarizeConflict, type ConflictDecision, type ConflictPrompt } from "./prompt.js";
import { compareTrees, verdictFromComparison } from "./resolver.js";
import { scanTree } from "./scanner.js";
import { TIMESTAMP_TOLERANCE_MS } from "./timestamps.js";
import type { SyncAction, TreeComparison, TreeSnapshot, Verdict } from "./types.js";

/**
 * How a pass over one entry ended.
 * - `synced`: one tree was copied onto the other
 * - `unchanged`: the trees were already equal
 * - `unresolved`: a conflict was left alone
 * - `failed`: a scan, copy or delete error stopped the pass
 */
export type SyncStatus = "synced" | "unchanged" | "unresolved" | "failed";

export interface SyncResult {
    appName: string;
    status: SyncStatus;
    /** Null when scanning failed before a verdict was reached */
    verdict: Verdict | null;
    /** The human decision, when the verdict was a conflict */
    decision?: ConflictDecision;
    filesAdded: number;
    filesModified: number;
    filesDeleted: number;
    actions: SyncAction[];
    warnings: string[];
    error?: string;
}

export interface SyncEngineOptions {
    /** Asked when neither tree is clearly newer */
    prompt: ConflictPrompt;
    toleranceMs?: number;
    fileOps?: FileOperations;
}

/**
 * Both snapshots of an entry and what the resolver makes of them.
 */
export interface Inspection {
    left: TreeSnapshot;
    right: TreeSnapshot;
    comparison: TreeComparison;
    verdict: Verdict;
}

const DECISION_VERDICTS: Record<Exclude<ConflictDecision, "abort">, DirectedVerdict> = {
    "keep-left": "left-newer",
    "keep-right": "right-newer",
};

/**
 * Core sync engine. Runs one pass over one app entry at a time:
 * scan both roots, resolve a direction, then copy or ask.
 */
export class SyncEngine {
    private prompt: ConflictPrompt;
    private toleranceMs: number;
    private fileOps?: FileOperations;

    constructor(options: SyncEngineOptions) {
        this.prompt = options.prompt;
        this.toleranceMs = options.toleranceMs ?? TIMESTAMP_TOLERANCE_MS;
        this.fileOps = options.fileOps;
    }

    /**
     * Scan and classify an entry without touching either tree.
     * @throws IOError if either root cannot be scanned
     */
    inspect(entry: AppEntry): Inspection {
        const left = scanTree(entry.localPath, "local", entry.includeOnly);
        const right = scanTree(entry.mirrorPath, "mirror", entry.includeOnly);
        const comparison = compareTrees(left, right, this.toleranceMs);
        return { left, right, comparison, verdict: verdictFromComparison(comparison) };
    }

    /**
     * Synchronise one entry. Errors are caught and reported in the result so
     * that one entry can never stop the others.
     */
    async syncApp(entry: AppEntry): Promise<SyncResult> {
        const result: SyncResult = {
            appName: entry.name,
            status: "failed",
            verdict: null,
            filesAdded: 0,
            filesModified: 0,
            filesDeleted: 0,
            actions: [],
            warnings: [],
        };

        try {
            const { left, right, comparison, verdict } = this.inspect(entry);
            result.verdict = verdict;
            result.warnings.push(...left.warnings, ...right.warnings);

            let direction: DirectedVerdict;
            if (verdict === "conflict") {
                const decision = await this.prompt.ask(summarizeConflict(entry.name, left, right, comparison));
                result.decision = decision;
                if (decision === "abort") {
                    throw new ConflictUnresolved(entry.name);
                }
                direction = DECISION_VERDICTS[decision];
            } else {
                direction = verdict;
            }

            // Actions are recorded as they happen so a failed pass still
            // reports what it managed to copy.
            await applyVerdict(direction, left, right, {
                toleranceMs: this.toleranceMs,
                fileOps: this.fileOps,
                onAction: (action) => result.actions.push(action),
            });
            result.status = result.actions.length === 0 ? "unchanged" : "synced";
        } catch (err) {
            result.status = err instanceof ConflictUnresolved ? "unresolved" : "failed";
            result.error = errorMessage(err);
        }

        for (const action of result.actions) {
            if (action.type === "added") result.filesAdded++;
            else if (action.type === "modified") result.filesModified++;
            else result.filesDeleted++;
        }
        return result;
    }
}
