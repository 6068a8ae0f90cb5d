/**
 * Validation Contract
 *
 * Validators judge the outcome of one decode step. The engine runs them
 * in order and the first non-null result wins, so list order is priority.
 *
 * Design principles:
 * - Pure: no side effects, no access to the session
 * - Ordered: the list is built explicitly and injected into the engine
 * - Total: a chain always ends with a validator that matches everything
 */

import type { TextAnalysis } from "./TextAnalysis.js";

/**
 * Outcome of a decode step.
 * - COMPLETE: the text is recognised as finished
 * - PARTIAL: progress was made, keep decoding
 * - FAILED: no progress
 */
export type ValidationStatus = "COMPLETE" | "PARTIAL" | "FAILED";

/**
 * Result produced by a validator.
 */
export interface ValidationResult {
    /** Outcome of the step */
    readonly status: ValidationStatus;

    /** Human-readable explanation */
    readonly reason: string;

    /** Confidence in the outcome, 0.0 - 1.0 */
    readonly confidence: number;

    /** Identifier of the validator that produced this result */
    readonly validatorId: string;
}

/**
 * Validator interface.
 *
 * @example
 * ```typescript
 * const pemValidator: Validator = {
 *     id: "pem-block",
 *     validate(original, analysis) {
 *         if (analysis.text.includes("-----BEGIN ")) {
 *             return createValidationResult("COMPLETE", "PEM block detected", 0.95, this.id);
 *         }
 *         return null;
 *     },
 * };
 * ```
 */
export interface Validator {
    /** Unique identifier, reported in results and logs */
    readonly id: string;

    /** Optional description of the rule */
    readonly description?: string;

    /**
     * Judge a decode step.
     *
     * @param original - The text before the decode step
     * @param analysis - Analysis of the text after the decode step
     * @returns A result, or null to defer to the next validator
     */
    validate(original: string, analysis: TextAnalysis): ValidationResult | null;
}

/**
 * Factory function to create a ValidationResult.
 * Ensures the object is frozen (immutable).
 */
export function createValidationResult(
    status: ValidationStatus,
    reason: string,
    confidence: number,
    validatorId: string
): ValidationResult {
    return Object.freeze({
        status,
        reason,
        confidence,
        validatorId,
    });
}
