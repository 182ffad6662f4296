import * as child_process from "node:child_process";
import * as path from "node:path";
import { LaunchError, errorMessage } from "../errors.js";
import type { Log } from "../logger.js";
import { DirectoryActivityProbe, type ActivityProbe } from "./activity.js";

/** How long the watched directories must stay quiet before the app counts as finished */
export const QUIESCENCE_WINDOW_MS = 5000;
/** How often the watched directories are checked while waiting */
export const POLL_INTERVAL_MS = 1000;

/**
 * Lifecycle of one play session. Moves forward only; `finished` is terminal.
 */
export type PlayState = "not-started" | "running" | "waiting-for-quiescence" | "finished";

const NEXT_STATES: Record<PlayState, PlayState[]> = {
    "not-started": ["running"],
    running: ["waiting-for-quiescence", "finished"],
    "waiting-for-quiescence": ["finished"],
    finished: [],
};

export interface PlayOptions {
    /** Executable to launch */
    playPath: string;
    /** Install directory; when set, activity under it is waited out after exit */
    playRootPath?: string;
    /** Local data root, also watched for late writes */
    localRoot: string;
    args?: string[];
    quiescenceWindowMs?: number;
    pollIntervalMs?: number;
    /** Replaces the default file and process probe */
    probe?: ActivityProbe;
    log?: Log;
}

export interface PlayOutcome {
    exitCode: number | null;
    signal: NodeJS.Signals | null;
    /** Whether the session waited for the play root to go quiet */
    waitedForQuiescence: boolean;
}

interface ExitStatus {
    code: number | null;
    signal: NodeJS.Signals | null;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Runs an application and waits until it, and anything it handed off to,
 * is done.
 */
export class PlaySession {
    private options: PlayOptions;
    private currentState: PlayState = "not-started";
    private started = false;

    constructor(options: PlayOptions) {
        this.options = options;
    }

    get state(): PlayState {
        return this.currentState;
    }

    /**
     * Launch the executable and resolve once the session is finished.
     * @throws LaunchError if the executable cannot be started
     */
    async run(): Promise<PlayOutcome> {
        if (this.started) {
            throw new Error("A play session can only be run once");
        }
        this.started = true;

        const { playPath, playRootPath, log } = this.options;
        const { child, exited } = await this.launch();
        this.transition("running");
        log?.info(`Launched ${playPath} (PID: ${child.pid ?? "unknown"})`);

        const status = await exited;
        if (status.signal !== null) {
            log?.warn(`${playPath} was terminated by ${status.signal}`);
        } else if (status.code !== 0) {
            log?.warn(`${playPath} exited with code ${status.code}`);
        } else {
            log?.info(`${playPath} exited`);
        }

        if (playRootPath === undefined) {
            this.transition("finished");
            return { exitCode: status.code, signal: status.signal, waitedForQuiescence: false };
        }

        this.transition("waiting-for-quiescence");
        await this.waitForQuiescence(playRootPath);
        this.transition("finished");
        return { exitCode: status.code, signal: status.signal, waitedForQuiescence: true };
    }

    private transition(next: PlayState): void {
        if (!NEXT_STATES[this.currentState].includes(next)) {
            throw new Error(`Invalid play state transition: ${this.currentState} -> ${next}`);
        }
        this.currentState = next;
    }

    private workingDirectory(): string | undefined {
        const { playPath, playRootPath } = this.options;
        if (playRootPath !== undefined) return playRootPath;
        return path.isAbsolute(playPath) ? path.dirname(playPath) : undefined;
    }

    private launch(): Promise<{ child: child_process.ChildProcess; exited: Promise<ExitStatus> }> {
        const { playPath, args = [] } = this.options;

        return new Promise((resolve, reject) => {
            let child: child_process.ChildProcess;
            try {
                child = child_process.spawn(playPath, args, {
                    cwd: this.workingDirectory(),
                    stdio: "ignore",
                });
            } catch (err) {
                reject(new LaunchError(`Cannot launch ${playPath}: ${errorMessage(err)}`, playPath, err));
                return;
            }

            const exited = new Promise<ExitStatus>((resolveExit) => {
                child.once("exit", (code, signal) => resolveExit({ code, signal }));
            });
            child.once("spawn", () => resolve({ child, exited }));
            child.once("error", (err) => {
                reject(new LaunchError(`Cannot launch ${playPath}: ${err.message}`, playPath, err));
            });
        });
    }

    private async waitForQuiescence(playRootPath: string): Promise<void> {
        const { localRoot, log } = this.options;
        const windowMs = this.options.quiescenceWindowMs ?? QUIESCENCE_WINDOW_MS;
        const pollMs = this.options.pollIntervalMs ?? POLL_INTERVAL_MS;
        const probe =
            this.options.probe ??
            new DirectoryActivityProbe({ dirs: [playRootPath, localRoot], processRoot: playRootPath });

        log?.info(`Waiting for activity under ${playRootPath} to stop...`);
        probe.reset();
        let quietSince = Date.now();
        while (Date.now() - quietSince < windowMs) {
            await sleep(pollMs);
            if (probe.check()) {
                quietSince = Date.now();
            }
        }
        log?.info(`No activity under ${playRootPath} for ${windowMs}ms`);
    }
}

/**
 * Run an application and wait for it to finish.
 */
export function runAndWait(options: PlayOptions): Promise<PlayOutcome> {
    return new PlaySession(options).run();
}
