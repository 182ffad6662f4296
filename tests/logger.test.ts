import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import { Logger } from "../src/logger.js";
import { cleanupDir, createTempDir } from "./helpers.js";

describe("Logger", () => {
    let logDir: string;

    beforeEach(() => {
        logDir = createTempDir();
    });

    afterEach(() => {
        cleanupDir(logDir);
    });

    it("should append timestamped lines with their level", () => {
        const logger = new Logger({ logDir, console: false });
        logger.info("starting");
        logger.warn("careful");
        logger.error("broken");

        expect(logger.getLogFilePath()).toBe(path.join(logDir, "mirrorsync.log"));
        const lines = fs.readFileSync(logger.getLogFilePath(), "utf-8").trimEnd().split("\n");
        expect(lines).toHaveLength(3);
        expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] starting$/);
        expect(lines[1]).toMatch(/\[WARN\] careful$/);
        expect(lines[2]).toMatch(/\[ERROR\] broken$/);
    });

    it("should rotate once the log reaches the size limit", () => {
        // ~100 bytes per file
        const logger = new Logger({ logDir, console: false, maxLogSizeMB: 100 / (1024 * 1024), maxLogFiles: 3 });
        for (let i = 0; i < 20; i++) {
            logger.info(`message number ${i} with some padding to fill the file`);
        }

        const files = fs.readdirSync(logDir).sort();
        expect(files).toEqual(["mirrorsync.1.log", "mirrorsync.2.log", "mirrorsync.log"]);
        expect(fs.readFileSync(path.join(logDir, "mirrorsync.log"), "utf-8")).toContain("message number 19 ");
    });

    it("should create the log directory", () => {
        const nested = path.join(logDir, "a", "b");
        new Logger({ logDir: nested, console: false }).info("hello");
        expect(fs.existsSync(path.join(nested, "mirrorsync.log"))).toBe(true);
    });
});
