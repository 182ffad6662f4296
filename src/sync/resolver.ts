import { compareTimestamps, TIMESTAMP_TOLERANCE_MS } from "./timestamps.js";
import type { TreeComparison, TreeSnapshot, Verdict } from "./types.js";

/**
 * Classify every path of two snapshots: newer on one side, the same, or
 * present on one side only. Output lists are in path order.
 */
export function compareTrees(
    left: TreeSnapshot,
    right: TreeSnapshot,
    toleranceMs: number = TIMESTAMP_TOLERANCE_MS,
): TreeComparison {
    const comparison: TreeComparison = {
        newerOnLeft: [],
        newerOnRight: [],
        onlyLeft: [],
        onlyRight: [],
        same: [],
    };

    for (const [relativePath, leftRecord] of left.files) {
        const rightRecord = right.files.get(relativePath);
        if (!rightRecord) {
            comparison.onlyLeft.push(relativePath);
            continue;
        }
        switch (compareTimestamps(leftRecord.mtimeMs, rightRecord.mtimeMs, toleranceMs)) {
            case "newer":
                comparison.newerOnLeft.push(relativePath);
                break;
            case "older":
                comparison.newerOnRight.push(relativePath);
                break;
            case "same":
                comparison.same.push(relativePath);
                break;
        }
    }

    for (const relativePath of right.files.keys()) {
        if (!left.files.has(relativePath)) {
            comparison.onlyRight.push(relativePath);
        }
    }

    return comparison;
}

/**
 * A side may win only if none of its shared files lags behind the other
 * side, and it has something the other lacks: a newer shared file, or extra
 * files while the other side has none of its own.
 */
function isCandidateWinner(
    newerOnThisSide: string[],
    newerOnOtherSide: string[],
    onlyThisSide: string[],
    onlyOtherSide: string[],
): boolean {
    if (newerOnOtherSide.length > 0) return false;
    if (newerOnThisSide.length > 0) return true;
    return onlyThisSide.length > 0 && onlyOtherSide.length === 0;
}

/**
 * Decide which of two trees is authoritative. Anything ambiguous is a
 * conflict; unique files alone never make a side "older".
 */
export function verdictFromComparison(comparison: TreeComparison): Verdict {
    const { newerOnLeft, newerOnRight, onlyLeft, onlyRight } = comparison;

    if (
        newerOnLeft.length === 0 &&
        newerOnRight.length === 0 &&
        onlyLeft.length === 0 &&
        onlyRight.length === 0
    ) {
        return "equal";
    }

    const leftWins = isCandidateWinner(newerOnLeft, newerOnRight, onlyLeft, onlyRight);
    const rightWins = isCandidateWinner(newerOnRight, newerOnLeft, onlyRight, onlyLeft);

    if (leftWins && !rightWins) return "left-newer";
    if (rightWins && !leftWins) return "right-newer";
    return "conflict";
}

/**
 * Resolve the sync direction for a pair of snapshots.
 */
export function resolveDirection(
    left: TreeSnapshot,
    right: TreeSnapshot,
    toleranceMs: number = TIMESTAMP_TOLERANCE_MS,
): Verdict {
    return verdictFromComparison(compareTrees(left, right, toleranceMs));
}
