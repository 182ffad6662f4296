export * from "./config/index.js";
export * from "./sync/index.js";
export * from "./play/index.js";
export { syncAll, playApp, findApp, logSyncResult, describeVerdict } from "./runner.js";
export type { RunSummary, PlayReport, PlayOverrides } from "./runner.js";
export { Logger, type Log, type LoggerOptions } from "./logger.js";
export {
    ExitCodes,
    MirrorSyncError,
    ConfigError,
    IOError,
    LaunchError,
    ConflictUnresolved,
    UsageError,
    type ExitCode,
} from "./errors.js";
