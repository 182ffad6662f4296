import { Command } from "commander";
import { ExitCodes } from "../errors.js";
import type { GlobalOptions } from "./context.js";
import { initCommand } from "./commands/init.js";
import { openCommand } from "./commands/open.js";
import { playCommand } from "./commands/play.js";
import { statusCommand } from "./commands/status.js";
import { syncCommand } from "./commands/sync.js";

/**
 * Build the command tree. Running with no command syncs every app, so
 * leftover words (a mistyped command name) are a usage error rather than
 * a full sync.
 */
export function createProgram(): Command {
    const program = new Command();

    program
        .name("mirrorsync")
        .description("Keep application data folders in step with a mirror inside a synced folder")
        .version("0.1.0")
        .option("--sync-root <dir>", "Synced folder holding the mirrors and mirrorsync.yml (defaults to ~/Dropbox)")
        .option("--host <name>", "Hostname used to pick per-host overrides (defaults to this machine's)")
        .option("--non-interactive", "Leave conflicts unresolved instead of asking")
        .allowExcessArguments(false)
        .exitOverride((err) => {
            process.exit(err.exitCode === ExitCodes.Success ? ExitCodes.Success : ExitCodes.Usage);
        })
        .action(() => syncCommand(program.opts<GlobalOptions>()));

    program
        .command("play")
        .description("Sync an app, run it until it has finished, then sync it back")
        .argument("<name>", "App entry to play")
        .action((name: string) => playCommand(name, program.opts<GlobalOptions>()));

    program
        .command("status")
        .description("Show what a sync would do for each app, without changing anything")
        .action(() => statusCommand(program.opts<GlobalOptions>()));

    program
        .command("init")
        .description("Create a mirrorsync.yml configuration file in the sync root")
        .action(() => initCommand(program.opts<GlobalOptions>()));

    program
        .command("open")
        .description("Open an app's local and mirror directories in the file manager")
        .argument("<name>", "App entry to open")
        .action((name: string) => openCommand(name, program.opts<GlobalOptions>()));

    return program;
}
