import * as fs from "node:fs";
import * as path from "node:path";
import { filterProcessesUnder, listProcesses, type ProcessInfo } from "./processes.js";

/**
 * Tells the orchestrator whether a watched application still seems busy.
 */
export interface ActivityProbe {
    /** Record the current state as the baseline for later checks */
    reset(): void;
    /** True when something changed since the last check (or baseline) */
    check(): boolean;
}

export interface DirectoryActivityProbeOptions {
    /** Directories whose files are watched for changes */
    dirs: string[];
    /** Directory whose processes count as activity (the play root) */
    processRoot?: string;
    /** Process lister, replaceable in tests */
    listProcesses?: () => ProcessInfo[];
}

type Snapshot = Map<string, string>;

/**
 * Take a snapshot of all files under a directory (path → "mtime:size").
 */
function takeSnapshot(dirPath: string, snapshot: Snapshot): void {
    let entries: fs.Dirent[];
    try {
        entries = fs.readdirSync(dirPath, { withFileTypes: true });
    } catch {
        // Directory may not exist (yet) or be inaccessible
        return;
    }
    for (const entry of entries) {
        const fullPath = path.join(dirPath, entry.name);
        if (entry.isDirectory()) {
            takeSnapshot(fullPath, snapshot);
        } else if (entry.isFile()) {
            try {
                const stat = fs.statSync(fullPath);
                snapshot.set(fullPath, `${stat.mtimeMs}:${stat.size}`);
            } catch {
                // File may have been deleted between readdir and stat
            }
        }
    }
}

function snapshotsDiffer(a: Snapshot, b: Snapshot): boolean {
    if (a.size !== b.size) return true;
    for (const [filePath, state] of a) {
        if (b.get(filePath) !== state) return true;
    }
    return false;
}

/**
 * Activity is any file added, removed or rewritten under the watched
 * directories, or any live process started from the process root.
 */
export class DirectoryActivityProbe implements ActivityProbe {
    private options: DirectoryActivityProbeOptions;
    private previous: Snapshot = new Map();
    private lister: () => ProcessInfo[];

    constructor(options: DirectoryActivityProbeOptions) {
        this.options = options;
        this.lister = options.listProcesses ?? listProcesses;
    }

    reset(): void {
        this.previous = this.snapshot();
    }

    check(): boolean {
        const current = this.snapshot();
        const changed = snapshotsDiffer(this.previous, current);
        this.previous = current;
        if (changed) return true;

        if (this.options.processRoot === undefined) return false;
        return filterProcessesUnder(this.lister(), this.options.processRoot).length > 0;
    }

    private snapshot(): Snapshot {
        const snapshot: Snapshot = new Map();
        for (const dir of this.options.dirs) {
            takeSnapshot(dir, snapshot);
        }
        return snapshot;
    }
}
