/**
 * @fileoverview Session projections
 *
 * Turns a snapshot into the caller-facing result and into a
 * JSON-serializable export. The export keeps every history entry but
 * reduces attempted pairs to short snippets.
 *
 * @module @unravel/engine/session/exportSession
 */

import type { DecodeResult, SessionExport, SessionSnapshot } from "../contracts/Session.js";

/**
 * Characters of text kept per attempted pair in an export.
 */
export const kATTEMPT_SNIPPET_LENGTH = 50;

/**
 * Project a snapshot into the result of a decode call.
 */
export function toDecodeResult(snapshot: SessionSnapshot): DecodeResult {
    return Object.freeze({
        success         : snapshot.status === "COMPLETE",
        status          : snapshot.status,
        originalText    : snapshot.originalText,
        finalText       : snapshot.currentText,
        encodingChain   : snapshot.encodingChain,
        iterations      : snapshot.iterationCount,
        reason          : snapshot.completionReason,
        confidenceScores: snapshot.confidenceScores,
        history         : snapshot.textHistory,
    });
}

/**
 * Project a snapshot into a plain, JSON-serializable record.
 *
 * @example
 * ```typescript
 * const json = JSON.stringify(exportSession(engine.run(text)), null, 2);
 * ```
 */
export function exportSession(snapshot: SessionSnapshot): SessionExport {
    return {
        id                : snapshot.id,
        originalText      : snapshot.originalText,
        finalText         : snapshot.currentText,
        encodingChain     : [...snapshot.encodingChain],
        iterations        : snapshot.iterationCount,
        maxIterations     : snapshot.maxIterations,
        status            : snapshot.status,
        complete          : snapshot.status === "COMPLETE",
        reason            : snapshot.completionReason,
        history           : [...snapshot.textHistory],
        confidenceScores  : [...snapshot.confidenceScores],
        steps             : snapshot.steps.map((step) => ({
            iteration           : step.iteration,
            decoder             : step.decoder,
            confidence          : step.confidence,
            fallback            : step.fallback,
            status              : step.validation.status,
            reason              : step.validation.reason,
            validationConfidence: step.validation.confidence,
            validatorId         : step.validation.validatorId,
        })),
        attemptedDecodings: snapshot.attemptedPairs.map((pair) => ({
            textSnippet: Array.from(pair.text).slice(0, kATTEMPT_SNIPPET_LENGTH).join(""),
            decoder    : pair.decoder,
        })),
    };
}
