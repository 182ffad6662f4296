import { findApp } from "../../runner.js";
import { openInFileManager } from "../../utils/platform.js";
import { createContext, handleCommandError, type GlobalOptions } from "../context.js";

export async function openCommand(name: string, options: GlobalOptions): Promise<void> {
    try {
        const { config, log } = createContext(options);
        const entry = findApp(config, name);
        for (const dir of [entry.localPath, entry.mirrorPath]) {
            log.info(`Opening ${dir}.`);
            await openInFileManager(dir);
        }
    } catch (err) {
        handleCommandError(err);
    }
}
