import { ExitCodes } from "../../errors.js";
import { findApp, playApp } from "../../runner.js";
import { createContext, handleCommandError, type GlobalOptions } from "../context.js";

export async function playCommand(name: string, options: GlobalOptions): Promise<void> {
    try {
        const { config, log, engine } = createContext(options);
        const entry = findApp(config, name);

        const report = await playApp(entry, engine, log);
        if (report.postSync.status === "failed") {
            process.exitCode = ExitCodes.Failure;
        }
    } catch (err) {
        handleCommandError(err);
    }
}
