import type { AppEntry, MirrorSyncConfig } from "./config/types.js";
import { ExitCodes, MirrorSyncError, UsageError } from "./errors.js";
import type { Log } from "./logger.js";
import { runAndWait, type PlayOptions, type PlayOutcome } from "./play/orchestrator.js";
import type { SyncEngine, SyncResult } from "./sync/engine.js";
import type { Verdict } from "./sync/types.js";

export interface RunSummary {
    results: SyncResult[];
    /** Names of entries whose pass failed */
    failed: string[];
    /** Names of entries left unsynchronised after a conflict */
    unresolved: string[];
}

export interface PlayReport {
    preSync: SyncResult;
    outcome: PlayOutcome;
    postSync: SyncResult;
}

/** Orchestrator settings a caller may override (tests shrink the timings) */
export type PlayOverrides = Pick<PlayOptions, "args" | "quiescenceWindowMs" | "pollIntervalMs" | "probe">;

const VERDICT_LABELS: Record<Verdict, string> = {
    "left-newer": "local is newer",
    "right-newer": "mirror is newer",
    equal: "already in sync",
    conflict: "conflict",
};

export function describeVerdict(verdict: Verdict): string {
    return VERDICT_LABELS[verdict];
}

/**
 * Log each per-file action and the outcome of one entry's pass.
 */
export function logSyncResult(log: Log, result: SyncResult): void {
    for (const warning of result.warnings) {
        log.warn(`  ${warning}`);
    }
    for (const action of result.actions) {
        switch (action.type) {
            case "added":
                log.info(`  + ${action.sourcePath} → ${action.destPath ?? "?"} (added)`);
                break;
            case "modified":
                log.info(`  ~ ${action.sourcePath} → ${action.destPath ?? "?"} (modified)`);
                break;
            case "deleted":
                log.info(`  - ${action.sourcePath} (deleted)`);
                break;
        }
    }

    const label = `"${result.appName}"`;
    const counts = `+${result.filesAdded} -${result.filesDeleted} ~${result.filesModified}`;
    switch (result.status) {
        case "synced":
            log.info(`Sync ${label} complete (${describeVerdict(result.verdict ?? "equal")}): ${counts}`);
            break;
        case "unchanged":
            log.info(`Sync ${label}: already in sync`);
            break;
        case "unresolved":
            log.info(`Sync ${label} skipped: ${result.error ?? "conflict left unresolved"}`);
            break;
        case "failed":
            log.error(`Sync ${label} failed: ${result.error ?? "unknown error"} (${counts} before the failure)`);
            break;
    }
}

/**
 * Run one pass over every entry, one at a time, in alphabetical order.
 * A failing entry is reported and the next one still runs.
 */
export async function syncAll(apps: AppEntry[], engine: SyncEngine, log: Log): Promise<RunSummary> {
    const ordered = [...apps].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    const summary: RunSummary = { results: [], failed: [], unresolved: [] };

    for (const entry of ordered) {
        log.info(`Syncing "${entry.name}"...`);
        const result = await engine.syncApp(entry);
        logSyncResult(log, result);
        summary.results.push(result);
        if (result.status === "failed") summary.failed.push(entry.name);
        if (result.status === "unresolved") summary.unresolved.push(entry.name);
    }

    return summary;
}

/**
 * Look up an enabled entry by name for a command that targets one entry.
 * @throws UsageError for unknown or disabled names
 */
export function findApp(config: MirrorSyncConfig, name: string): AppEntry {
    const entry = config.apps.find((app) => app.name === name);
    if (entry) return entry;

    if (config.disabled.includes(name)) {
        throw new UsageError(`App "${name}" is disabled on this host`);
    }
    const problem = config.problems.find((p) => p.appName === name);
    if (problem) {
        throw new UsageError(`App "${name}" is misconfigured: ${problem.message}`);
    }
    const known = config.apps.map((app) => app.name).join(", ") || "none";
    throw new UsageError(`Unknown app "${name}" (configured: ${known})`);
}

/**
 * Sync an entry, run its application until it has finished, then sync back.
 * The application is not started unless the first pass left both trees
 * consistent.
 */
export async function playApp(
    entry: AppEntry,
    engine: SyncEngine,
    log: Log,
    overrides: PlayOverrides = {},
): Promise<PlayReport> {
    const { playPath } = entry;
    if (playPath === undefined) {
        throw new UsageError(`App "${entry.name}" has no play_path configured`);
    }

    log.info(`Syncing "${entry.name}" before play...`);
    const preSync = await engine.syncApp(entry);
    logSyncResult(log, preSync);
    if (preSync.status === "failed") {
        throw new MirrorSyncError(`Not launching "${entry.name}": the pre-play sync did not complete`);
    }
    if (preSync.status === "unresolved") {
        throw new MirrorSyncError(
            `Not launching "${entry.name}": the conflict was left unresolved`,
            ExitCodes.Success,
        );
    }

    const outcome = await runAndWait({
        ...overrides,
        playPath,
        playRootPath: entry.playRootPath,
        localRoot: entry.localPath,
        log,
    });

    log.info(`Syncing "${entry.name}" after play...`);
    const postSync = await engine.syncApp(entry);
    logSyncResult(log, postSync);

    return { preSync, outcome, postSync };
}
