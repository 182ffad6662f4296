import type { ConfigError } from "../errors.js";

/**
 * A configured application whose data folder is mirrored into the sync root.
 * Fully resolved: host overrides applied, paths absolute.
 */
export interface AppEntry {
    /** Entry name, as keyed in the config file */
    readonly name: string;
    /** Local data directory (the "left" side of every comparison) */
    readonly localPath: string;
    /** Mirror directory inside the sync root (the "right" side) */
    readonly mirrorPath: string;
    /** Only files whose base name matches this glob take part in syncing */
    readonly includeOnly?: string;
    /** Disabled entries are listed but never synced */
    readonly disabled: boolean;
    /** Executable launched by `play` */
    readonly playPath?: string;
    /** Directory watched for activity after the launched process exits */
    readonly playRootPath?: string;
}

/**
 * Top-level mirrorsync configuration after resolution for one host.
 */
export interface MirrorSyncConfig {
    /** Maximum size of a single log file in MB before rotation (default: 10) */
    maxLogSizeMB: number;
    /** Maximum number of rotated log files to keep (default: 5) */
    maxLogFiles: number;
    /** Enabled entries, sorted by name */
    apps: AppEntry[];
    /** Names of entries disabled for this host */
    disabled: string[];
    /** Entries that could not be resolved; the rest of the run goes ahead without them */
    problems: ConfigError[];
}

/**
 * Values the resolver needs from the environment. Read once by the CLI.
 */
export interface ResolveContext {
    /** Hostname used to select per-host overrides */
    hostname: string;
    /** Passively-synchronised folder that mirror paths are relative to */
    syncRoot: string;
}

/** Keys an app entry (or a host override) may set */
export const APP_KEYS = [
    "path",
    "dropbox_path",
    "disabled",
    "include_only",
    "play_path",
    "play_root_path",
] as const;

export type AppKey = (typeof APP_KEYS)[number];

/** Default configuration values */
export const CONFIG_DEFAULTS = {
    maxLogSizeMB: 10,
    maxLogFiles: 5,
    configFileName: "mirrorsync.yml",
    syncRootDirName: "Dropbox",
    syncRootEnvVar: "MIRRORSYNC_SYNC_ROOT",
    homeDirName: ".mirrorsync",
} as const;
