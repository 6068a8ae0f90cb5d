/**
 * @fileoverview Built-in validators
 *
 * The default validator chain, in priority order:
 *
 * 1. no-change         → FAILED   0.00
 * 2. flag              → COMPLETE 0.99
 * 3. url               → COMPLETE 0.85
 * 4. hash              → COMPLETE 0.80
 * 5. natural-language  → COMPLETE 0.90
 * 6. still-encoded     → PARTIAL  0.60
 * 7. improved-readability → PARTIAL 0.50
 * 8. default           → PARTIAL  0.45 (always matches)
 *
 * @module @unravel/engine/validators/builtin
 */

import type { TextAnalysis } from "../contracts/TextAnalysis.js";
import { createValidationResult, type Validator } from "../contracts/Validation.js";

const kENTROPY_HIGH   = 5.5;
const kENTROPY_LOW    = 4.5;
const kPRINTABLE_HIGH = 0.95;
const kPRINTABLE_LOW  = 0.80;

/**
 * Whether the text carries one of the two strongest encoding signals:
 * even-length hex or padded Base64. Such text is an intermediate layer
 * even when it reads as low-entropy printable ASCII.
 */
export function carriesEncodingSignal(analysis: TextAnalysis): boolean {
    if (analysis.charsetClass === "hex") {
        return analysis.length % 2 === 0;
    }
    return analysis.charsetClass === "base64" && analysis.hasPadding;
}

export const noChangeValidator: Validator = {
    id         : "no-change",
    description: "Decoded text is identical to its input",
    validate(original, analysis) {
        return original === analysis.text
            ? createValidationResult("FAILED", "No change after decoding", 0.0, this.id)
            : null;
    },
};

export const flagValidator: Validator = {
    id: "flag",
    validate(_original, analysis) {
        return analysis.containsFlag
            ? createValidationResult("COMPLETE", "Flag format detected", 0.99, this.id)
            : null;
    },
};

export const urlValidator: Validator = {
    id: "url",
    validate(_original, analysis) {
        return analysis.containsUrl
            ? createValidationResult("COMPLETE", "URL detected", 0.85, this.id)
            : null;
    },
};

export const hashValidator: Validator = {
    id: "hash",
    validate(_original, analysis) {
        return analysis.hashType
            ? createValidationResult("COMPLETE", `${analysis.hashType} hash detected`, 0.80, this.id)
            : null;
    },
};

export const naturalLanguageValidator: Validator = {
    id         : "natural-language",
    description: "High printable ratio, low entropy, no remaining encoding signal",
    validate(_original, analysis) {
        if (
            analysis.printableRatio > kPRINTABLE_HIGH &&
            analysis.entropy < kENTROPY_LOW &&
            !carriesEncodingSignal(analysis)
        ) {
            return createValidationResult(
                "COMPLETE",
                "Natural language detected (high printable ratio, low entropy)",
                0.90,
                this.id
            );
        }
        return null;
    },
};

export const stillEncodedValidator: Validator = {
    id: "still-encoded",
    validate(_original, analysis) {
        if (analysis.printableRatio < kPRINTABLE_LOW || analysis.entropy > kENTROPY_HIGH) {
            return createValidationResult(
                "PARTIAL",
                `Still appears encoded (printable=${analysis.printableRatio.toFixed(2)}, entropy=${analysis.entropy.toFixed(2)})`,
                0.60,
                this.id
            );
        }
        return null;
    },
};

export const improvedReadabilityValidator: Validator = {
    id: "improved-readability",
    validate(_original, analysis) {
        return analysis.printableRatio > kPRINTABLE_LOW
            ? createValidationResult("PARTIAL", "Improved readability but still ambiguous", 0.50, this.id)
            : null;
    },
};

/**
 * Terminal validator. Always returns a result.
 */
export const defaultValidator: Validator = {
    id: "default",
    validate() {
        return createValidationResult("PARTIAL", "Ambiguous result", 0.45, this.id);
    },
};

/**
 * Build the default chain, optionally with custom validators placed
 * right after the no-change check.
 *
 * @param custom - Validators that take priority over the built-in rules
 * @returns Frozen, ordered validator list
 */
export function createDefaultValidators(custom: readonly Validator[] = []): readonly Validator[] {
    return Object.freeze([
        noChangeValidator,
        ...custom,
        flagValidator,
        urlValidator,
        hashValidator,
        naturalLanguageValidator,
        stillEncodedValidator,
        improvedReadabilityValidator,
        defaultValidator,
    ]);
}
