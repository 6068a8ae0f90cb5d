/**
 * @fileoverview Analysis report
 *
 * Table of the features the engine sees for a single string (--analyze).
 *
 * @module report/formatAnalysis
 */

import { ENCODING_PRIORITY, type ConfidenceMap, type TextAnalysis } from "@unravel/engine";
import { kRULE_WIDTH, truncate } from "./formatSummary.js";

export const kANALYSIS_PREVIEW_LENGTH = 60;

/**
 * Format an analysis, optionally followed by the per-encoding scores.
 *
 * @param analysis - Output of the text analyzer
 * @param confidences - Classifier scores for the same text
 */
export function formatAnalysis(analysis: TextAnalysis, confidences?: ConfidenceMap): string {
    const rule = "=".repeat(kRULE_WIDTH);

    const lines = [
        rule,
        "TEXT ANALYSIS",
        rule,
        `Text: ${truncate(analysis.text, kANALYSIS_PREVIEW_LENGTH)}`,
        `Length: ${analysis.length} characters`,
        `Character Set: ${analysis.charsetClass}`,
        `Printable Ratio: ${(analysis.printableRatio * 100).toFixed(2)}%`,
        `Entropy: ${analysis.entropy.toFixed(2)} bits/char`,
        `Has Padding (=): ${analysis.hasPadding}`,
        `Contains URL: ${analysis.containsUrl}`,
        `Contains Flag: ${analysis.containsFlag}`,
        `Hash Type: ${analysis.hashType ?? "None"}`,
    ];

    if (confidences) {
        lines.push("", "Likely Encodings:");
        for (const name of ENCODING_PRIORITY) {
            lines.push(`  ${name.padEnd(7)}${confidences[name].toFixed(2)}`);
        }
    }

    lines.push(rule);
    return lines.join("\n");
}
