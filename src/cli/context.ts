import * as os from "node:os";
import * as path from "node:path";
import { getDefaultSyncRoot, loadConfig } from "../config/loader.js";
import type { MirrorSyncConfig } from "../config/types.js";
import { ExitCodes, MirrorSyncError, errorMessage } from "../errors.js";
import { Logger } from "../logger.js";
import { SyncEngine } from "../sync/engine.js";
import { AbortingPrompt, ConsolePrompt, type ConflictPrompt } from "../sync/prompt.js";

/** Options accepted by every command */
export interface GlobalOptions {
    syncRoot?: string;
    host?: string;
    nonInteractive?: boolean;
}

export interface CliContext {
    syncRoot: string;
    hostname: string;
    config: MirrorSyncConfig;
    log: Logger;
    engine: SyncEngine;
}

export function resolveSyncRoot(options: GlobalOptions): string {
    return options.syncRoot !== undefined ? path.resolve(options.syncRoot) : getDefaultSyncRoot();
}

/**
 * Load the configuration and build the logger and engine a command needs.
 * Entries that fail to resolve are reported here and left out.
 */
export function createContext(options: GlobalOptions): CliContext {
    const syncRoot = resolveSyncRoot(options);
    const hostname = options.host ?? os.hostname();
    const config = loadConfig(syncRoot, hostname);

    const log = new Logger({
        maxLogSizeMB: config.maxLogSizeMB,
        maxLogFiles: config.maxLogFiles,
    });
    for (const problem of config.problems) {
        log.error(problem.message);
    }

    let prompt: ConflictPrompt;
    if (options.nonInteractive || !process.stdin.isTTY) {
        prompt = new AbortingPrompt();
    } else {
        prompt = new ConsolePrompt();
    }

    return { syncRoot, hostname, config, log, engine: new SyncEngine({ prompt }) };
}

/**
 * Report an error that ended a command and set the exit code for it.
 */
export function handleCommandError(err: unknown): void {
    if (err instanceof MirrorSyncError && err.exitCode === ExitCodes.Success) {
        console.log(err.message);
        process.exitCode = ExitCodes.Success;
        return;
    }
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = err instanceof MirrorSyncError ? err.exitCode : ExitCodes.Failure;
}
