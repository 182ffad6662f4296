/**
 * Platform-specific process listing.
 *
 * Used to tell whether anything is still running out of an application's
 * install directory after the launcher we started has exited.
 */
import * as child_process from "node:child_process";
import * as path from "node:path";

export interface ProcessInfo {
    pid: number;
    /** Parent process id, 0 when unknown */
    ppid: number;
    commandLine: string;
}

/**
 * List running processes with their full command lines.
 * Returns an empty list when the platform tools are unavailable.
 */
export function listProcesses(): ProcessInfo[] {
    try {
        if (process.platform === "win32") {
            return listProcessesWindows();
        }
        return listProcessesUnix();
    } catch {
        // Missing ps/wmic or no permission: fall back to file activity alone
        return [];
    }
}

function listProcessesWindows(): ProcessInfo[] {
    // wmic is gone from some Windows 11 builds; PowerShell is the fallback
    try {
        return listProcessesWmic();
    } catch {
        return listProcessesPowerShell();
    }
}

function listProcessesWmic(): ProcessInfo[] {
    const output = child_process.execSync("wmic process get processid,parentprocessid,commandline /format:list", {
        encoding: "utf-8",
        timeout: 5000,
        windowsHide: true,
    });

    const results: ProcessInfo[] = [];
    let currentCommandLine = "";
    let currentPpid = 0;

    // /format:list prints the fields of each process in alphabetical order
    for (const line of output.split("\n")) {
        const trimmed = line.trim();
        if (trimmed.startsWith("CommandLine=")) {
            currentCommandLine = trimmed.slice("CommandLine=".length);
        } else if (trimmed.startsWith("ParentProcessId=")) {
            currentPpid = parseInt(trimmed.slice("ParentProcessId=".length), 10) || 0;
        } else if (trimmed.startsWith("ProcessId=")) {
            const pid = parseInt(trimmed.slice("ProcessId=".length), 10);
            if (currentCommandLine && !isNaN(pid)) {
                results.push({ pid, ppid: currentPpid, commandLine: currentCommandLine });
            }
            currentCommandLine = "";
            currentPpid = 0;
        }
    }

    return results;
}

function listProcessesPowerShell(): ProcessInfo[] {
    const output = child_process.execSync(
        "powershell -NoProfile -Command \"Get-CimInstance Win32_Process | ForEach-Object { $_.ProcessId.ToString() + '|' + $_.ParentProcessId.ToString() + '|' + $_.CommandLine }\"",
        { encoding: "utf-8", timeout: 10000, windowsHide: true },
    );

    const results: ProcessInfo[] = [];
    for (const line of output.split("\n")) {
        const match = line.trim().match(/^(\d+)\|(\d+)\|(.+)$/);
        if (match) {
            results.push({ pid: parseInt(match[1], 10), ppid: parseInt(match[2], 10), commandLine: match[3] });
        }
    }

    return results;
}

function listProcessesUnix(): ProcessInfo[] {
    const output = child_process.execSync("ps -eo pid,ppid,args", { encoding: "utf-8", timeout: 5000 });

    const results: ProcessInfo[] = [];
    for (const line of output.split("\n")) {
        const match = line.trim().match(/^(\d+)\s+(\d+)\s+(.+)$/);
        if (match) {
            results.push({ pid: parseInt(match[1], 10), ppid: parseInt(match[2], 10), commandLine: match[3] });
        }
    }

    return results;
}

/**
 * `self` and every process it descends from, following parent ids through
 * the listing. Falls back to `process.ppid` when this process is missing
 * from it.
 */
export function selfAndAncestors(processes: ProcessInfo[], self: number = process.pid): Set<number> {
    const parents = new Map<number, number>();
    for (const p of processes) {
        parents.set(p.pid, p.ppid);
    }
    if (self === process.pid && !parents.has(self)) {
        parents.set(self, process.ppid);
    }

    const chain = new Set<number>();
    let current: number | undefined = self;
    while (current !== undefined && current > 0 && !chain.has(current)) {
        chain.add(current);
        current = parents.get(current);
    }
    return chain;
}

/**
 * Processes whose command line mentions `root`, i.e. that were most likely
 * started from inside it. This process and its ancestors are left out.
 */
export function filterProcessesUnder(
    processes: ProcessInfo[],
    root: string,
    self: number = process.pid,
): ProcessInfo[] {
    const excluded = selfAndAncestors(processes, self);
    const caseInsensitive = process.platform === "win32";
    const needle = caseInsensitive ? path.resolve(root).toLowerCase() : path.resolve(root);
    return processes.filter((p) => {
        if (excluded.has(p.pid)) return false;
        const haystack = caseInsensitive ? p.commandLine.toLowerCase() : p.commandLine;
        return haystack.includes(needle);
    });
}
