import { writeDefaultConfig } from "../../config/loader.js";
import { handleCommandError, resolveSyncRoot, type GlobalOptions } from "../context.js";

export function initCommand(options: GlobalOptions): void {
    try {
        const configPath = writeDefaultConfig(resolveSyncRoot(options));
        console.log(`Created configuration file: ${configPath}`);
        console.log("Edit the file to add your apps, then run 'mirrorsync'.");
    } catch (err) {
        handleCommandError(err);
    }
}
