import * as fs from "node:fs";
import * as path from "node:path";
import { getStateHome } from "./config/loader.js";
import { CONFIG_DEFAULTS } from "./config/types.js";

/**
 * Where progress and problems are reported. The engine only depends on this,
 * so tests can collect messages in memory.
 */
export interface Log {
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export interface LoggerOptions {
    logDir?: string;
    maxLogSizeMB?: number;
    maxLogFiles?: number;
    /** Echo messages to the terminal as well (default: true) */
    console?: boolean;
}

/**
 * Appends timestamped lines to ~/.mirrorsync/logs/mirrorsync.log, rotating
 * by size, and echoes them to the terminal.
 */
export class Logger implements Log {
    private logDir: string;
    private logFile: string;
    private maxLogSize: number;
    private maxLogFiles: number;
    private echo: boolean;

    constructor(options: LoggerOptions = {}) {
        this.logDir = options.logDir ?? path.join(getStateHome(), "logs");
        this.maxLogSize = (options.maxLogSizeMB ?? CONFIG_DEFAULTS.maxLogSizeMB) * 1024 * 1024;
        this.maxLogFiles = options.maxLogFiles ?? CONFIG_DEFAULTS.maxLogFiles;
        this.echo = options.console ?? true;
        this.logFile = path.join(this.logDir, "mirrorsync.log");
        fs.mkdirSync(this.logDir, { recursive: true });
    }

    /**
     * Get the path to the current log file.
     */
    getLogFilePath(): string {
        return this.logFile;
    }

    info(message: string): void {
        this.write("INFO", message);
        if (this.echo) console.log(message);
    }

    warn(message: string): void {
        this.write("WARN", message);
        if (this.echo) console.warn(`Warning: ${message}`);
    }

    error(message: string): void {
        this.write("ERROR", message);
        if (this.echo) console.error(`Error: ${message}`);
    }

    private write(level: string, message: string): void {
        const timestamp = new Date().toISOString();
        const line = `[${timestamp}] [${level}] ${message}\n`;

        this.rotateIfNeeded();
        fs.appendFileSync(this.logFile, line, "utf-8");
    }

    private rotateIfNeeded(): void {
        try {
            if (!fs.existsSync(this.logFile)) return;

            const stat = fs.statSync(this.logFile);
            if (stat.size < this.maxLogSize) return;

            // Rotate: shift existing numbered logs
            for (let i = this.maxLogFiles - 1; i > 0; i--) {
                const from = path.join(this.logDir, `mirrorsync.${i}.log`);
                const to = path.join(this.logDir, `mirrorsync.${i + 1}.log`);
                if (fs.existsSync(from)) {
                    if (i + 1 >= this.maxLogFiles) {
                        fs.unlinkSync(from);
                    } else {
                        fs.renameSync(from, to);
                    }
                }
            }

            fs.renameSync(this.logFile, path.join(this.logDir, "mirrorsync.1.log"));
        } catch {
            // If rotation fails, continue writing to current log
        }
    }
}
