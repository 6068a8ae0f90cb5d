/**
 * @fileoverview Result summary
 *
 * Human-readable report of a finished decode run.
 *
 * @module report/formatSummary
 */

import type { DecodeResult } from "@unravel/engine";

export const kRULE_WIDTH = 70;

/**
 * Characters of original / final text shown before truncating.
 */
export const kSUMMARY_PREVIEW_LENGTH = 100;

/**
 * Cut text to a number of code points, marking the cut with "...".
 */
export function truncate(text: string, max: number): string {
    const chars = Array.from(text);
    return chars.length > max ? `${chars.slice(0, max).join("")}...` : text;
}

/**
 * Format the result as a boxed summary.
 *
 * @param result - Result of a decode call
 * @param maxIterations - Limit the run was given
 *
 * @example
 * ```typescript
 * console.log(formatResultSummary(engine.decode("SGVsbG8gV29ybGQ="), 10));
 * ```
 */
export function formatResultSummary(result: DecodeResult, maxIterations: number): string {
    const rule = "=".repeat(kRULE_WIDTH);
    const originalLength = Array.from(result.originalText).length;
    const finalLength = Array.from(result.finalText).length;

    const chain = result.encodingChain.length > 0 ? result.encodingChain.join(" → ") : "None";
    const scores = result.confidenceScores.length > 0
        ? result.confidenceScores.map((score) => score.toFixed(2)).join(", ")
        : "None";

    return [
        rule,
        "DECODING RESULT SUMMARY",
        rule,
        `Status: ${result.success ? "COMPLETE ✓" : `INCOMPLETE (${result.status})`}`,
        `Reason: ${result.reason}`,
        `Iterations: ${result.iterations}/${maxIterations}`,
        "",
        `Original Text (${originalLength} chars):`,
        `  ${truncate(result.originalText, kSUMMARY_PREVIEW_LENGTH)}`,
        "",
        `Final Text (${finalLength} chars):`,
        `  ${truncate(result.finalText, kSUMMARY_PREVIEW_LENGTH)}`,
        "",
        `Encoding Chain: ${chain}`,
        `Confidence Scores: ${scores}`,
        rule,
    ].join("\n");
}
