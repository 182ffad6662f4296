import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import * as yaml from "yaml";
import { ConfigError, errorMessage } from "../errors.js";
import type { AppEntry, AppKey, MirrorSyncConfig, ResolveContext } from "./types.js";
import { APP_KEYS, CONFIG_DEFAULTS } from "./types.js";

type RawTable = Record<string, unknown>;

/**
 * Returns the mirrorsync home directory: ~/.mirrorsync
 * Holds per-machine state that must not travel with the sync root (logs).
 */
export function getStateHome(): string {
    return path.join(os.homedir(), CONFIG_DEFAULTS.homeDirName);
}

/**
 * The sync root to use when none is given on the command line:
 * $MIRRORSYNC_SYNC_ROOT, else ~/Dropbox.
 */
export function getDefaultSyncRoot(env: NodeJS.ProcessEnv = process.env): string {
    const fromEnv = env[CONFIG_DEFAULTS.syncRootEnvVar];
    if (fromEnv !== undefined && fromEnv.trim() !== "") {
        return path.resolve(fromEnv);
    }
    return path.join(os.homedir(), CONFIG_DEFAULTS.syncRootDirName);
}

export function getConfigPath(syncRoot: string): string {
    return path.join(syncRoot, CONFIG_DEFAULTS.configFileName);
}

function isTable(value: unknown): value is RawTable {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeSlashes(value: string): string {
    return value.replace(/\\/g, "/");
}

function compareNames(a: AppEntry, b: AppEntry): number {
    if (a.name < b.name) return -1;
    if (a.name > b.name) return 1;
    return 0;
}

/**
 * Split an entry's table into its own settings and its host override tables,
 * then shallow-merge the override for `hostname` over the settings.
 */
export function mergeHostOverrides(table: RawTable, hostname: string): Partial<Record<AppKey, unknown>> {
    const defaults: Partial<Record<AppKey, unknown>> = {};
    let override: RawTable | undefined;
    const wanted = hostname.toLowerCase();

    for (const [key, value] of Object.entries(table)) {
        if (isTable(value)) {
            if (key.toLowerCase() === wanted) {
                override = value;
            }
            continue;
        }
        const appKey = APP_KEYS.find((k) => k === key);
        if (appKey) {
            defaults[appKey] = value;
        }
    }

    if (!override) return defaults;

    const merged = { ...defaults };
    for (const appKey of APP_KEYS) {
        if (appKey in override) {
            merged[appKey] = override[appKey];
        }
    }
    return merged;
}

function requireString(values: Partial<Record<AppKey, unknown>>, key: AppKey, name: string, hostname: string): string {
    const value = values[key];
    if (typeof value !== "string" || value.trim() === "") {
        throw new ConfigError(`Unable to find config key "${key}" for app "${name}" on host "${hostname}"`, name);
    }
    return value.trim();
}

function optionalString(values: Partial<Record<AppKey, unknown>>, key: AppKey, name: string): string | undefined {
    const value = values[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== "string" || value.trim() === "") {
        throw new ConfigError(`apps.${name}.${key} must be a non-empty string`, name);
    }
    return value.trim();
}

/**
 * Resolve one app entry for the given host. Throws ConfigError on bad data.
 */
export function resolveAppEntry(name: string, raw: unknown, context: ResolveContext): AppEntry {
    if (!isTable(raw)) {
        throw new ConfigError(`apps.${name} must be a mapping`, name);
    }

    const values = mergeHostOverrides(raw, context.hostname);

    const localPath = requireString(values, "path", name, context.hostname);
    if (!path.isAbsolute(localPath)) {
        throw new ConfigError(`apps.${name}.path must be an absolute path: ${localPath}`, name);
    }

    const relMirrorPath = normalizeSlashes(requireString(values, "dropbox_path", name, context.hostname));
    if (path.isAbsolute(relMirrorPath)) {
        throw new ConfigError(`apps.${name}.dropbox_path must be relative to the sync root: ${relMirrorPath}`, name);
    }
    const syncRoot = path.resolve(context.syncRoot);
    const mirrorPath = path.resolve(syncRoot, relMirrorPath);
    const fromRoot = path.relative(syncRoot, mirrorPath);
    if (fromRoot === "" || fromRoot.startsWith("..") || path.isAbsolute(fromRoot)) {
        throw new ConfigError(`apps.${name}.dropbox_path must point inside the sync root: ${relMirrorPath}`, name);
    }

    const disabledValue = values.disabled ?? false;
    if (typeof disabledValue !== "boolean") {
        throw new ConfigError(`apps.${name}.disabled must be true or false`, name);
    }

    const includeOnly = optionalString(values, "include_only", name);

    const playRootPath = optionalString(values, "play_root_path", name);
    if (playRootPath !== undefined && !path.isAbsolute(playRootPath)) {
        throw new ConfigError(`apps.${name}.play_root_path must be an absolute path: ${playRootPath}`, name);
    }

    // A relative play_path lives under play_root_path; without one it is left
    // as written so a bare command name is looked up on PATH.
    const rawPlayPath = optionalString(values, "play_path", name);
    let playPath: string | undefined;
    if (rawPlayPath !== undefined) {
        const normalized = normalizeSlashes(rawPlayPath);
        playPath = playRootPath !== undefined ? path.resolve(playRootPath, normalized) : normalized;
    }

    return {
        name,
        localPath: path.resolve(localPath),
        mirrorPath,
        includeOnly,
        disabled: disabledValue,
        playPath,
        playRootPath: playRootPath !== undefined ? path.resolve(playRootPath) : undefined,
    };
}

/**
 * Validate a parsed configuration document and resolve it for one host.
 * A malformed document throws; a malformed entry is reported in `problems`.
 */
export function resolveConfig(config: unknown, context: ResolveContext): MirrorSyncConfig {
    if (!isTable(config)) {
        throw new ConfigError("Configuration must be a YAML mapping");
    }

    const maxLogSizeMB =
        typeof config.maxLogSizeMB === "number" ? config.maxLogSizeMB : CONFIG_DEFAULTS.maxLogSizeMB;
    if (maxLogSizeMB <= 0) {
        throw new ConfigError("maxLogSizeMB must be a positive number");
    }

    const maxLogFiles =
        typeof config.maxLogFiles === "number" ? config.maxLogFiles : CONFIG_DEFAULTS.maxLogFiles;
    if (maxLogFiles <= 0 || !Number.isInteger(maxLogFiles)) {
        throw new ConfigError("maxLogFiles must be a positive integer");
    }

    // null means "apps:" with only commented examples below it
    if (!("apps" in config)) {
        throw new ConfigError("apps must be a mapping of app names to settings");
    }
    const rawApps = config.apps ?? {};
    if (!isTable(rawApps)) {
        throw new ConfigError("apps must be a mapping of app names to settings");
    }

    const apps: AppEntry[] = [];
    const disabled: string[] = [];
    const problems: ConfigError[] = [];

    for (const [name, raw] of Object.entries(rawApps)) {
        try {
            const entry = resolveAppEntry(name, raw, context);
            if (entry.disabled) {
                disabled.push(name);
            } else {
                apps.push(entry);
            }
        } catch (err) {
            problems.push(err instanceof ConfigError ? err : new ConfigError(errorMessage(err), name));
        }
    }

    apps.sort(compareNames);
    disabled.sort();

    return { maxLogSizeMB, maxLogFiles, apps, disabled, problems };
}

/**
 * Load `mirrorsync.yml` from the sync root and resolve it for `hostname`.
 */
export function loadConfig(syncRoot: string, hostname: string): MirrorSyncConfig {
    const configPath = getConfigPath(syncRoot);

    if (!fs.existsSync(configPath)) {
        throw new ConfigError(`Config file not found: ${configPath}`);
    }

    let parsed: unknown;
    try {
        parsed = yaml.parse(fs.readFileSync(configPath, "utf-8"));
    } catch (err) {
        throw new ConfigError(`Cannot parse ${configPath}: ${errorMessage(err)}`);
    }
    return resolveConfig(parsed, { hostname, syncRoot });
}

/**
 * Write a default mirrorsync.yml into the sync root.
 * @returns The path of the created file
 */
export function writeDefaultConfig(syncRoot: string): string {
    const configPath = getConfigPath(syncRoot);

    if (!fs.existsSync(syncRoot)) {
        throw new ConfigError(`Sync root does not exist: ${syncRoot}`);
    }
    if (fs.existsSync(configPath)) {
        throw new ConfigError(`Config file already exists: ${configPath}`);
    }

    const template = [
        "# mirrorsync configuration",
        "# This file lives in the sync root so that every machine reads the same settings.",
        "",
        "# Log rotation settings (optional)",
        "# maxLogSizeMB: 10    # Max log file size in MB before rotation (default: 10)",
        "# maxLogFiles: 5      # Max number of rotated log files to keep (default: 5)",
        "",
        "# One entry per application. Entries are synced in alphabetical order.",
        "#   path            local data directory (absolute)",
        "#   dropbox_path    mirror directory, relative to this folder",
        "#   include_only    optional glob matched against file names",
        "#   disabled        optional, skip this entry",
        "#   play_path       optional executable for 'mirrorsync play <name>'",
        "#   play_root_path  optional install directory watched until the app goes quiet",
        "# A nested mapping named after a host overrides any of these on that machine.",
        "apps:",
        "# saves:",
        "#   path: /home/user/.local/share/my-game/saves",
        "#   dropbox_path: AppData/my-game",
        "#   include_only: \"*.sav\"",
        "#   play_root_path: /home/user/games/my-game",
        "#   play_path: start.sh",
        "#   my-laptop:",
        "#     path: /mnt/data/my-game/saves",
    ].join("\n") + "\n";

    fs.writeFileSync(configPath, template, "utf-8");
    return configPath;
}
