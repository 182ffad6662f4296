export {
    loadConfig,
    resolveConfig,
    resolveAppEntry,
    mergeHostOverrides,
    writeDefaultConfig,
    getConfigPath,
    getDefaultSyncRoot,
    getStateHome,
} from "./loader.js";
export type { AppEntry, MirrorSyncConfig, ResolveContext, AppKey } from "./types.js";
export { CONFIG_DEFAULTS, APP_KEYS } from "./types.js";
