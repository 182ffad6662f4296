/**
 * Largest modification-time difference still treated as "the same".
 * FAT-formatted sticks and some network shares store mtimes at 2 s resolution.
 */
export const TIMESTAMP_TOLERANCE_MS = 2000;

/** Age of the first timestamp relative to the second */
export type AgeRelation = "older" | "same" | "newer";

/**
 * Compare two modification times (ms since epoch).
 */
export function compareTimestamps(
    a: number,
    b: number,
    toleranceMs: number = TIMESTAMP_TOLERANCE_MS,
): AgeRelation {
    if (Math.abs(a - b) <= toleranceMs) return "same";
    return a < b ? "older" : "newer";
}
