/** Which root a snapshot was taken of. Local is always "left", mirror "right". */
export type TreeSide = "local" | "mirror";

/**
 * One file under a scanned root. Directories are never recorded.
 */
export interface FileRecord {
    /** Path from the root, always with "/" separators */
    relativePath: string;
    /** Last modified time (ms since epoch) */
    mtimeMs: number;
    /** File size in bytes, only used as a cheap equality check */
    size: number;
}

/**
 * The files of one root at one moment. Rebuilt for every pass, never persisted.
 */
export interface TreeSnapshot {
    root: string;
    side: TreeSide;
    /** Relative path → record, inserted in sorted path order */
    files: Map<string, FileRecord>;
    /** Leftovers of interrupted copies, kept out of `files` and removed on the next copy into this root */
    partialFiles: string[];
    /** Files or directories that were skipped while scanning */
    warnings: string[];
}

/**
 * Which tree should win. Derived from two snapshots, never stored.
 */
export type Verdict = "left-newer" | "right-newer" | "equal" | "conflict";

/**
 * Per-path classification of two snapshots.
 */
export interface TreeComparison {
    /** Common paths whose left copy is newer */
    newerOnLeft: string[];
    /** Common paths whose right copy is newer */
    newerOnRight: string[];
    /** Paths only the left tree has */
    onlyLeft: string[];
    /** Paths only the right tree has */
    onlyRight: string[];
    /** Common paths with matching timestamps */
    same: string[];
}

/**
 * A per-file action taken while applying a verdict, for logging.
 */
export interface SyncAction {
    type: "added" | "modified" | "deleted";
    /** Absolute source path (or the path removed, for deletes) */
    sourcePath: string;
    /** Absolute destination path (absent for deletes) */
    destPath?: string;
}
