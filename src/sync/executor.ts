import * as path from "node:path";
import { nodeFileOperations, type FileOperations } from "../utils/fileops.js";
import { compareTimestamps, TIMESTAMP_TOLERANCE_MS } from "./timestamps.js";
import type { FileRecord, SyncAction, TreeSnapshot, Verdict } from "./types.js";

/** A verdict the executor can act on without asking anyone */
export type DirectedVerdict = Exclude<Verdict, "conflict">;

export interface ApplyOptions {
    toleranceMs?: number;
    fileOps?: FileOperations;
    /** Called after each completed copy or delete */
    onAction?: (action: SyncAction) => void;
}

export interface ApplyReport {
    filesAdded: number;
    filesModified: number;
    filesDeleted: number;
    filesUnchanged: number;
    actions: SyncAction[];
}

function isUpToDate(source: FileRecord, dest: FileRecord | undefined, toleranceMs: number): boolean {
    return (
        dest !== undefined &&
        dest.size === source.size &&
        compareTimestamps(source.mtimeMs, dest.mtimeMs, toleranceMs) === "same"
    );
}

function toNative(root: string, relativePath: string): string {
    return path.join(root, ...relativePath.split("/"));
}

/**
 * Make the losing tree an exact copy of the winning one.
 *
 * Every copy finishes before the first deletion, so stopping half-way only
 * ever leaves extra files behind. A failed copy throws IOError and nothing
 * is deleted. Leftover partial copies in the losing tree are removed last.
 */
export async function applyVerdict(
    verdict: DirectedVerdict,
    left: TreeSnapshot,
    right: TreeSnapshot,
    options: ApplyOptions = {},
): Promise<ApplyReport> {
    const report: ApplyReport = {
        filesAdded: 0,
        filesModified: 0,
        filesDeleted: 0,
        filesUnchanged: 0,
        actions: [],
    };

    if (verdict === "equal") {
        report.filesUnchanged = left.files.size;
        return report;
    }

    const toleranceMs = options.toleranceMs ?? TIMESTAMP_TOLERANCE_MS;
    const fileOps = options.fileOps ?? nodeFileOperations;
    const [source, dest] = verdict === "left-newer" ? [left, right] : [right, left];
    const recordAction = (action: SyncAction): void => {
        report.actions.push(action);
        options.onAction?.(action);
    };

    for (const [relativePath, record] of source.files) {
        const existing = dest.files.get(relativePath);
        if (isUpToDate(record, existing, toleranceMs)) {
            report.filesUnchanged++;
            continue;
        }

        const srcPath = toNative(source.root, relativePath);
        const destPath = toNative(dest.root, relativePath);
        await fileOps.copy(srcPath, destPath);

        if (existing) {
            report.filesModified++;
            recordAction({ type: "modified", sourcePath: srcPath, destPath });
        } else {
            report.filesAdded++;
            recordAction({ type: "added", sourcePath: srcPath, destPath });
        }
    }

    const sourceByFoldedPath = new Map<string, string>();
    for (const relativePath of source.files.keys()) {
        sourceByFoldedPath.set(relativePath.toLowerCase(), relativePath);
    }

    for (const relativePath of dest.files.keys()) {
        if (source.files.has(relativePath)) continue;

        const filePath = toNative(dest.root, relativePath);
        // Where the filesystem ignores case, the copy above already replaced this file
        const caseVariant = sourceByFoldedPath.get(relativePath.toLowerCase());
        if (caseVariant !== undefined && fileOps.sameFile(filePath, toNative(dest.root, caseVariant))) {
            continue;
        }

        fileOps.remove(dest.root, filePath);
        report.filesDeleted++;
        recordAction({ type: "deleted", sourcePath: filePath });
    }

    for (const relativePath of dest.partialFiles) {
        fileOps.remove(dest.root, toNative(dest.root, relativePath));
    }

    return report;
}
