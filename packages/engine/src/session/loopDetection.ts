/**
 * @fileoverview Loop detection over a session's text history.
 *
 * Three independent patterns, any of which means the run is cycling:
 * - oscillation: A → B → A → B (period 2, needs four entries)
 * - no_change: the last two entries are identical
 * - exact_repeat: the latest text already occurred earlier
 *
 * Cycles of period three or more are caught by exact_repeat once a text
 * recurs, never by the oscillation check.
 *
 * @module @unravel/engine/session/loopDetection
 */

export type LoopKind = "oscillation" | "no_change" | "exact_repeat";

/**
 * Detect a loop at the end of a history.
 *
 * @param history - Texts in the order they were produced
 * @returns The first matching pattern (checked in the order above), or null
 *
 * @example
 * ```typescript
 * detectLoop(["A", "B", "A", "B"]); // "oscillation"
 * detectLoop(["A", "B", "C", "D"]); // null
 * ```
 */
export function detectLoop(history: readonly string[]): LoopKind | null {
    const n = history.length;
    if (n < 2) {
        return null;
    }

    if (n >= 4 && history[n - 1] === history[n - 3] && history[n - 2] === history[n - 4]) {
        return "oscillation";
    }

    const latest = history[n - 1];

    if (latest === history[n - 2]) {
        return "no_change";
    }

    if (history.slice(0, n - 1).includes(latest)) {
        return "exact_repeat";
    }

    return null;
}
