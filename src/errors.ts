export const ExitCodes = {
    Success: 0,
    Failure: 1,
    Usage: 2,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Base class for every error mirrorsync raises on purpose.
 * Anything else reaching the CLI is an unexpected failure.
 */
export class MirrorSyncError extends Error {
    public readonly exitCode: ExitCode;

    constructor(message: string, exitCode: ExitCode = ExitCodes.Failure, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.exitCode = exitCode;
    }
}

/** Bad or missing configuration data. */
export class ConfigError extends MirrorSyncError {
    /** Name of the app entry at fault, when the problem is local to one entry */
    public readonly appName?: string;

    constructor(message: string, appName?: string) {
        super(message);
        this.appName = appName;
    }
}

/** A scan, copy or delete failed. Fatal to the current entry's pass only. */
export class IOError extends MirrorSyncError {
    public readonly path: string;

    constructor(message: string, path: string, cause?: unknown) {
        super(message, ExitCodes.Failure, { cause });
        this.path = path;
    }
}

/** The configured executable could not be started. */
export class LaunchError extends MirrorSyncError {
    public readonly executable: string;

    constructor(message: string, executable: string, cause?: unknown) {
        super(message, ExitCodes.Failure, { cause });
        this.executable = executable;
    }
}

/** The user declined to pick a side in a conflict. Informational, not a failure. */
export class ConflictUnresolved extends MirrorSyncError {
    public readonly appName: string;

    constructor(appName: string) {
        super(`Conflict for "${appName}" left unresolved; nothing was changed`, ExitCodes.Success);
        this.appName = appName;
    }
}

/** Bad command-line input: unknown entry, missing play_path and so on. */
export class UsageError extends MirrorSyncError {
    constructor(message: string) {
        super(message, ExitCodes.Usage);
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Extract the errno code (ENOENT, EACCES, ...) from a thrown value, if any.
 */
export function errnoCode(err: unknown): string | undefined {
    if (err instanceof Error && "code" in err && typeof err.code === "string") {
        return err.code;
    }
    return undefined;
}
