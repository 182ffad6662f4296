import * as fs from "node:fs";
import * as path from "node:path";
import { pipeline } from "node:stream/promises";
import { IOError, errnoCode, errorMessage } from "../errors.js";

/** Threshold above which we use streaming copy (10 MB) */
const STREAMING_THRESHOLD = 10 * 1024 * 1024;

/**
 * Suffix of the temporary file a copy is written to before it replaces the
 * destination. Scans ignore such files.
 */
export const PARTIAL_SUFFIX = ".mirrorsync-partial";

/**
 * The filesystem calls the executor makes. Swappable so tests can observe
 * ordering or inject failures.
 */
export interface FileOperations {
    /** Copy a file over `destPath`, creating parent directories and keeping the source mtime */
    copy(srcPath: string, destPath: string): Promise<void>;
    /** Delete a file, then prune directories it leaves empty up to (not including) `root` */
    remove(root: string, filePath: string): void;
    /** Whether two paths name the same file, as they do on a case-insensitive filesystem */
    sameFile(a: string, b: string): boolean;
}

function describeFailure(err: unknown, filePath: string): string {
    switch (errnoCode(err)) {
        case "EACCES":
        case "EPERM":
            return `Permission denied: ${filePath}`;
        case "EBUSY":
            return `File locked/in use: ${filePath}`;
        case "ENOSPC":
            return `No space left on device writing ${filePath}`;
        default:
            return `${filePath}: ${errorMessage(err)}`;
    }
}

/**
 * Copy a file, using streaming for large files.
 * The data lands in a temporary sibling first and is renamed into place, so
 * an interrupted copy never leaves a truncated destination.
 */
export async function copyFilePreservingMtime(srcPath: string, destPath: string): Promise<void> {
    const partialPath = destPath + PARTIAL_SUFFIX;
    try {
        fs.mkdirSync(path.dirname(destPath), { recursive: true });

        const stat = fs.statSync(srcPath);
        if (stat.size > STREAMING_THRESHOLD) {
            await pipeline(fs.createReadStream(srcPath), fs.createWriteStream(partialPath));
        } else {
            fs.copyFileSync(srcPath, partialPath);
        }

        fs.utimesSync(partialPath, stat.atimeMs / 1000, stat.mtimeMs / 1000);
        fs.renameSync(partialPath, destPath);
    } catch (err) {
        fs.rmSync(partialPath, { force: true });
        throw new IOError(`Copy failed (${describeFailure(err, destPath)})`, destPath, err);
    }
}

/**
 * Delete a file and clean up the empty parent directories it leaves behind.
 */
export function removeFileAndPrune(root: string, filePath: string): void {
    try {
        fs.rmSync(filePath, { force: true });
    } catch (err) {
        throw new IOError(`Delete failed (${describeFailure(err, filePath)})`, filePath, err);
    }

    let parent = path.resolve(path.dirname(filePath));
    const stop = path.resolve(root);
    while (parent !== stop && parent.startsWith(stop + path.sep)) {
        try {
            if (fs.readdirSync(parent).length > 0) break;
            fs.rmdirSync(parent);
        } catch {
            break; // Can't read/remove parent, stop cleanup
        }
        parent = path.dirname(parent);
    }
}

/**
 * Compare device and inode of two paths. A missing path is never the same file.
 */
export function isSameFile(a: string, b: string): boolean {
    let statA: fs.Stats;
    let statB: fs.Stats;
    try {
        statA = fs.statSync(a);
        statB = fs.statSync(b);
    } catch (err) {
        if (errnoCode(err) === "ENOENT") return false;
        throw new IOError(`Cannot compare ${a} and ${b}: ${errorMessage(err)}`, a, err);
    }
    return statA.dev === statB.dev && statA.ino === statB.ino;
}

export const nodeFileOperations: FileOperations = {
    copy: copyFilePreservingMtime,
    remove: removeFileAndPrune,
    sameFile: isSameFile,
};
