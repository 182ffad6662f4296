import { ExitCodes } from "../../errors.js";
import { syncAll } from "../../runner.js";
import { createContext, handleCommandError, type GlobalOptions } from "../context.js";

export async function syncCommand(options: GlobalOptions): Promise<void> {
    try {
        const { config, log, engine, hostname } = createContext(options);
        log.info(`Syncing ${config.apps.length} app(s) on host ${hostname}.`);

        const summary = await syncAll(config.apps, engine, log);
        const synced = summary.results.filter((r) => r.status === "synced").length;
        const unchanged = summary.results.filter((r) => r.status === "unchanged").length;
        log.info(
            `Done: ${synced} synced, ${unchanged} unchanged, ` +
            `${summary.unresolved.length} unresolved, ${summary.failed.length} failed.`,
        );

        if (summary.failed.length > 0 || config.problems.length > 0) {
            process.exitCode = ExitCodes.Failure;
        }
    } catch (err) {
        handleCommandError(err);
    }
}
