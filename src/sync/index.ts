export { SyncEngine, type SyncResult, type SyncStatus, type Inspection } from "./engine.js";
export { scanTree, isIncluded, isPartialFile } from "./scanner.js";
export { compareTrees, resolveDirection, verdictFromComparison } from "./resolver.js";
export { applyVerdict, type DirectedVerdict, type ApplyReport } from "./executor.js";
export { compareTimestamps, TIMESTAMP_TOLERANCE_MS, type AgeRelation } from "./timestamps.js";
export {
    ConsolePrompt,
    AbortingPrompt,
    parseConflictReply,
    summarizeConflict,
    type ConflictPrompt,
    type ConflictDecision,
    type ConflictRequest,
    type TreeSummary,
} from "./prompt.js";
export type { FileRecord, TreeSnapshot, TreeSide, TreeComparison, Verdict, SyncAction } from "./types.js";
