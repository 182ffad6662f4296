export {
    PlaySession,
    runAndWait,
    QUIESCENCE_WINDOW_MS,
    POLL_INTERVAL_MS,
    type PlayState,
    type PlayOptions,
    type PlayOutcome,
} from "./orchestrator.js";
export { DirectoryActivityProbe, type ActivityProbe } from "./activity.js";
export { listProcesses, filterProcessesUnder, selfAndAncestors, type ProcessInfo } from "./processes.js";
