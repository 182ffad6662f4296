import * as child_process from "node:child_process";
import * as os from "node:os";

export type Platform = "linux" | "darwin" | "win32";

/**
 * Detect the current platform.
 */
export function detectPlatform(): Platform {
    const platform = os.platform();
    if (platform === "linux" || platform === "darwin" || platform === "win32") {
        return platform;
    }
    throw new Error(`Unsupported platform: ${platform}`);
}

/**
 * The command that opens a directory in the desktop file manager.
 */
export function fileManagerCommand(platform: Platform): string {
    switch (platform) {
        case "win32":
            return "explorer";
        case "darwin":
            return "open";
        case "linux":
            return "xdg-open";
    }
}

/**
 * Open a directory in the file manager without waiting for it.
 * Resolves once the viewer has been started.
 */
export function openInFileManager(dirPath: string, platform: Platform = detectPlatform()): Promise<void> {
    return new Promise((resolve, reject) => {
        const child = child_process.spawn(fileManagerCommand(platform), [dirPath], {
            detached: true,
            stdio: "ignore",
        });
        child.once("error", reject);
        child.once("spawn", () => {
            child.unref();
            resolve();
        });
    });
}
