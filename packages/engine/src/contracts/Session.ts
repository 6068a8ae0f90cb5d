/**
 * Session Contract
 *
 * The record of one decode run and the shapes it is projected into:
 * the immutable snapshot, the caller-facing result and the JSON export.
 *
 * A session is created at the start of a decode call, mutated only by the
 * engine through a SessionBuilder, and handed back frozen.
 */

import type { ChainEntry, EncodingName } from "./Decoder.js";
import type { ValidationResult } from "./Validation.js";

/**
 * Lifecycle status. RUNNING is the only non-terminal state.
 */
export type SessionStatus =
    | "RUNNING"
    | "COMPLETE"
    | "FAILED"
    | "STOPPED_MAX_ITER"
    | "STOPPED_LOOP";

/**
 * Statuses a session can finish in.
 */
export type TerminalStatus = Exclude<SessionStatus, "RUNNING">;

/**
 * Completion reasons set by the engine itself (validators supply their own).
 */
export const CompletionReason = {
    MAX_ITERATIONS: "max_iterations_reached",
    LOOP_DETECTED : "loop_detected",
    EMPTY_INPUT   : "empty_input",
} as const;

/**
 * A (text, decoder) pair the engine has already tried.
 */
export interface AttemptedPair {
    readonly text: string;
    readonly decoder: EncodingName;
}

/**
 * One recorded iteration.
 */
export interface IterationRecord {
    /** 1-based iteration number */
    readonly iteration: number;

    /** Decoder applied, or "none" when nothing made progress */
    readonly decoder: ChainEntry;

    /** Selection confidence of the decoder (0.7 for fallback picks) */
    readonly confidence: number;

    /** Whether the decoder was picked by the fallback strategy */
    readonly fallback: boolean;

    /** How the validator chain judged the step */
    readonly validation: ValidationResult;
}

/**
 * Immutable view of a session.
 */
export interface SessionSnapshot {
    /** Trace identifier of the run */
    readonly id: string;

    readonly originalText: string;

    /** Latest decoded value (always the last history entry) */
    readonly currentText: string;

    /** All texts seen, starting with the original */
    readonly textHistory: readonly string[];

    /** Decoders applied, in the order they were undone */
    readonly encodingChain: readonly ChainEntry[];

    /** Selection confidence per chain entry */
    readonly confidenceScores: readonly number[];

    readonly attemptedPairs: readonly AttemptedPair[];

    readonly steps: readonly IterationRecord[];

    readonly iterationCount: number;

    readonly maxIterations: number;

    readonly status: SessionStatus;

    readonly completionReason: string;
}

/**
 * Result of a top-level decode call.
 */
export interface DecodeResult {
    /** True only when the session finished COMPLETE */
    readonly success: boolean;

    readonly status: SessionStatus;

    readonly originalText: string;

    readonly finalText: string;

    readonly encodingChain: readonly ChainEntry[];

    readonly iterations: number;

    readonly reason: string;

    readonly confidenceScores: readonly number[];

    /** Every intermediate text, original and final included */
    readonly history: readonly string[];
}

/**
 * Summary of an attempted pair in an export.
 */
export interface AttemptSummary {
    /** First characters of the text the decoder was tried on */
    readonly textSnippet: string;
    readonly decoder: EncodingName;
}

/**
 * JSON-serializable projection of a session.
 */
export interface SessionExport {
    readonly id: string;
    readonly originalText: string;
    readonly finalText: string;
    readonly encodingChain: ChainEntry[];
    readonly iterations: number;
    readonly maxIterations: number;
    readonly status: SessionStatus;
    readonly complete: boolean;
    readonly reason: string;
    readonly history: string[];
    readonly confidenceScores: number[];
    readonly steps: Array<{
        readonly iteration: number;
        readonly decoder: ChainEntry;
        readonly confidence: number;
        readonly fallback: boolean;
        readonly status: ValidationResult["status"];
        readonly reason: string;
        readonly validationConfidence: number;
        readonly validatorId: string;
    }>;
    readonly attemptedDecodings: AttemptSummary[];
}
