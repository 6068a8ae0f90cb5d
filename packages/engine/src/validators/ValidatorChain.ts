/**
 * @fileoverview Validator Chain
 *
 * Runs an ordered validator list against a decode step. Unlike the
 * classifier, this is chain-of-responsibility: the first validator with
 * an opinion decides.
 *
 * @module @unravel/engine/validators/ValidatorChain
 */

import type { TextAnalysis } from "../contracts/TextAnalysis.js";
import {
    createValidationResult,
    type ValidationResult,
    type Validator,
} from "../contracts/Validation.js";
import { analyze } from "../analysis/TextAnalyzer.js";
import { createDefaultValidators, defaultValidator } from "./builtin.js";

/**
 * ValidatorChain - ordered, immutable list of validators.
 *
 * @example
 * ```typescript
 * const chain = new ValidatorChain();
 * chain.validate("ZmxhZ3t0ZXN0fQ==", "flag{test}");
 * // { status: "COMPLETE", reason: "Flag format detected", confidence: 0.99, validatorId: "flag" }
 * ```
 */
export class ValidatorChain {
    readonly validators: readonly Validator[];

    /**
     * @param validators - Ordered list. When every entry declines, evaluate()
     *   returns the built-in default result.
     * @throws Error if the list is empty
     */
    constructor(validators: readonly Validator[] = createDefaultValidators()) {
        if (validators.length === 0) {
            throw new Error("Validator chain requires at least one validator");
        }
        this.validators = Object.freeze([...validators]);
    }

    /**
     * Judge an already-analyzed decode step.
     *
     * @param original - Text before the step
     * @param analysis - Analysis of the text after the step
     */
    evaluate(original: string, analysis: TextAnalysis): ValidationResult {
        for (const validator of this.validators) {
            const result = validator.validate(original, analysis);
            if (result) {
                return result;
            }
        }

        // Every validator declined
        return defaultValidator.validate(original, analysis)
            ?? createValidationResult("PARTIAL", "Ambiguous result", 0.45, defaultValidator.id);
    }

    /**
     * Analyze the decoded text with the default flag patterns and judge it.
     *
     * @param original - Text before the step
     * @param decoded - Text after the step
     */
    validate(original: string, decoded: string): ValidationResult {
        return this.evaluate(original, analyze(decoded));
    }
}
