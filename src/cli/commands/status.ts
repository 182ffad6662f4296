import type { AppEntry } from "../../config/types.js";
import { errorMessage } from "../../errors.js";
import { describeVerdict } from "../../runner.js";
import type { Inspection } from "../../sync/engine.js";
import { createContext, handleCommandError, type GlobalOptions } from "../context.js";

/**
 * Lines describing one entry's state, without changing anything.
 */
export function formatInspection(entry: AppEntry, inspection: Inspection): string[] {
    const { left, right, comparison, verdict } = inspection;
    const lines = [
        `  ${entry.name}: ${describeVerdict(verdict)}`,
        `    local:  ${entry.localPath} (${left.files.size} file(s))`,
        `    mirror: ${entry.mirrorPath} (${right.files.size} file(s))`,
    ];
    if (entry.includeOnly !== undefined) {
        lines.push(`    include only: ${entry.includeOnly}`);
    }
    if (verdict !== "equal") {
        lines.push(
            `    newer locally: ${comparison.newerOnLeft.length}, newer in mirror: ${comparison.newerOnRight.length}, ` +
            `only local: ${comparison.onlyLeft.length}, only mirror: ${comparison.onlyRight.length}`,
        );
    }
    return lines;
}

export function statusCommand(options: GlobalOptions): void {
    try {
        const { config, engine, hostname, syncRoot } = createContext(options);

        console.log("=== mirrorsync status ===\n");
        console.log(`Host: ${hostname}`);
        console.log(`Sync root: ${syncRoot}`);
        console.log();

        console.log("Apps:");
        for (const entry of config.apps) {
            try {
                for (const line of formatInspection(entry, engine.inspect(entry))) {
                    console.log(line);
                }
            } catch (err) {
                console.log(`  ${entry.name}: ✗ ${errorMessage(err)}`);
            }
        }
        for (const name of config.disabled) {
            console.log(`  ${name}: disabled`);
        }
        for (const problem of config.problems) {
            console.log(`  ${problem.appName ?? "?"}: ✗ ${problem.message}`);
        }
    } catch (err) {
        handleCommandError(err);
    }
}
