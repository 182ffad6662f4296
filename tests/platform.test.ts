import { describe, it, expect } from "vitest";
import { detectPlatform, fileManagerCommand } from "../src/utils/platform.js";

describe("Platform", () => {
    it("should detect the current platform", () => {
        expect(detectPlatform()).toBe(process.platform);
    });

    it("should pick the file manager for each platform", () => {
        expect(fileManagerCommand("win32")).toBe("explorer");
        expect(fileManagerCommand("darwin")).toBe("open");
        expect(fileManagerCommand("linux")).toBe("xdg-open");
    });
});
