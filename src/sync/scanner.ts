import * as fs from "node:fs";
import * as path from "node:path";
import { minimatch } from "minimatch";
import { IOError, errorMessage } from "../errors.js";
import { PARTIAL_SUFFIX } from "../utils/fileops.js";
import type { FileRecord, TreeSide, TreeSnapshot } from "./types.js";

/**
 * Whether a file takes part in syncing. The glob is matched against the
 * base name only, so "*.sav" picks up saves in any sub-directory.
 */
export function isIncluded(relativePath: string, includeOnly?: string): boolean {
    if (includeOnly === undefined) return true;
    return minimatch(path.posix.basename(relativePath), includeOnly, { dot: true });
}

/** Whether a file is the temporary target of a copy that never finished */
export function isPartialFile(relativePath: string): boolean {
    return relativePath.endsWith(PARTIAL_SUFFIX);
}

/**
 * Recursively walk a root and record every included file.
 * Symlinks are followed, but a directory already visited through another
 * link is not entered again.
 * @throws IOError if the root is missing, not a directory, or unreadable
 */
export function scanTree(root: string, side: TreeSide, includeOnly?: string): TreeSnapshot {
    let rootStat: fs.Stats;
    try {
        rootStat = fs.statSync(root);
    } catch (err) {
        throw new IOError(`Cannot read ${side} root ${root}: ${errorMessage(err)}`, root, err);
    }
    if (!rootStat.isDirectory()) {
        throw new IOError(`The ${side} root is not a directory: ${root}`, root);
    }

    const records: FileRecord[] = [];
    const partialFiles: string[] = [];
    const warnings: string[] = [];
    const visited = new Set<string>([fs.realpathSync(root)]);

    function readDir(dirPath: string): fs.Dirent[] | null {
        try {
            return fs.readdirSync(dirPath, { withFileTypes: true });
        } catch (err) {
            if (dirPath === root) {
                throw new IOError(`Cannot read ${side} root ${root}: ${errorMessage(err)}`, root, err);
            }
            warnings.push(`Skipped unreadable directory ${dirPath}: ${errorMessage(err)}`);
            return null;
        }
    }

    function walk(dirPath: string, prefix: string): void {
        const entries = readDir(dirPath);
        if (!entries) return;

        for (const entry of entries) {
            const fullPath = path.join(dirPath, entry.name);
            const relativePath = prefix === "" ? entry.name : `${prefix}/${entry.name}`;

            let isDirectory = entry.isDirectory();
            let isFile = entry.isFile();
            if (entry.isSymbolicLink()) {
                try {
                    const target = fs.statSync(fullPath);
                    isDirectory = target.isDirectory();
                    isFile = target.isFile();
                } catch (err) {
                    warnings.push(`Skipped broken link ${fullPath}: ${errorMessage(err)}`);
                    continue;
                }
            }

            if (isDirectory) {
                let realPath: string;
                try {
                    realPath = fs.realpathSync(fullPath);
                } catch (err) {
                    warnings.push(`Skipped unresolvable directory ${fullPath}: ${errorMessage(err)}`);
                    continue;
                }
                if (visited.has(realPath)) {
                    warnings.push(`Skipped already visited directory ${fullPath}`);
                    continue;
                }
                visited.add(realPath);
                walk(fullPath, relativePath);
            } else if (isFile) {
                if (isPartialFile(relativePath)) {
                    partialFiles.push(relativePath);
                    continue;
                }
                if (!isIncluded(relativePath, includeOnly)) continue;
                try {
                    fs.accessSync(fullPath, fs.constants.R_OK);
                    const stat = fs.statSync(fullPath);
                    records.push({ relativePath, mtimeMs: stat.mtimeMs, size: stat.size });
                } catch (err) {
                    warnings.push(`Skipped unreadable file ${fullPath}: ${errorMessage(err)}`);
                }
            }
        }
    }

    walk(root, "");

    records.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));
    const files = new Map<string, FileRecord>();
    for (const record of records) {
        files.set(record.relativePath, record);
    }

    partialFiles.sort();
    return { root, side, files, partialFiles, warnings };
}
