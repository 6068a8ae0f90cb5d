/**
 * @fileoverview Session Builder
 *
 * The only mutable state of a decode run. The engine owns one builder per
 * call, appends to it once per iteration, finishes it once, and hands out
 * frozen snapshots. History, chain and confidence arrays are private and
 * grow together, so their lengths cannot drift apart.
 *
 * @module @unravel/engine/session/SessionBuilder
 */

import type { ChainEntry, EncodingName } from "../contracts/Decoder.js";
import type {
    AttemptedPair,
    IterationRecord,
    SessionSnapshot,
    SessionStatus,
    TerminalStatus,
} from "../contracts/Session.js";
import type { ValidationResult } from "../contracts/Validation.js";
import { detectLoop, type LoopKind } from "./loopDetection.js";

/**
 * One iteration to append.
 */
export interface IterationInput {
    readonly decoder: ChainEntry;
    readonly text: string;
    readonly confidence: number;
    readonly fallback: boolean;
    readonly validation: ValidationResult;
}

/**
 * Generate a trace ID for a session.
 */
export function generateSessionId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `ses_${timestamp}_${random}`;
}

function pairKey(text: string, decoder: EncodingName): string {
    return `${decoder}\u0000${text}`;
}

/**
 * SessionBuilder - append-only record of one decode run.
 *
 * @example
 * ```typescript
 * const session = new SessionBuilder("SGk=", 10);
 * session.markAttempted("SGk=", "base64");
 * session.record({ decoder: "base64", text: "Hi", confidence: 0.95, fallback: false, validation });
 * session.finish("COMPLETE", validation.reason);
 * const snapshot = session.snapshot();
 * ```
 */
export class SessionBuilder {
    readonly id: string;
    readonly originalText: string;
    readonly maxIterations: number;

    private readonly history: string[];
    private readonly chain: ChainEntry[] = [];
    private readonly confidences: number[] = [];
    private readonly steps: IterationRecord[] = [];
    private readonly attempted = new Map<string, AttemptedPair>();

    private currentStatus: SessionStatus = "RUNNING";
    private reason = "";

    /**
     * @param originalText - Text the run starts from
     * @param maxIterations - Iteration cap, a positive integer
     * @param id - Optional trace ID (generated when omitted)
     * @throws Error if maxIterations is not a positive integer
     */
    constructor(originalText: string, maxIterations: number, id: string = generateSessionId()) {
        if (!Number.isInteger(maxIterations) || maxIterations <= 0) {
            throw new Error(`maxIterations must be a positive integer, got ${maxIterations}`);
        }

        this.id = id;
        this.originalText = originalText;
        this.maxIterations = maxIterations;
        this.history = [originalText];
    }

    get currentText(): string {
        return this.history[this.history.length - 1];
    }

    get iterationCount(): number {
        return this.chain.length;
    }

    get status(): SessionStatus {
        return this.currentStatus;
    }

    get completionReason(): string {
        return this.reason;
    }

    get isFinished(): boolean {
        return this.currentStatus !== "RUNNING";
    }

    get limitReached(): boolean {
        return this.iterationCount >= this.maxIterations;
    }

    /**
     * Whether the decoder was already tried on this exact text.
     */
    hasAttempted(text: string, decoder: EncodingName): boolean {
        return this.attempted.has(pairKey(text, decoder));
    }

    /**
     * Remember that a decoder was tried on a text, whatever the outcome.
     */
    markAttempted(text: string, decoder: EncodingName): void {
        this.assertRunning();
        this.attempted.set(pairKey(text, decoder), { text, decoder });
    }

    /**
     * Append one iteration.
     *
     * @throws Error if the session is already finished
     */
    record(input: IterationInput): IterationRecord {
        this.assertRunning();

        const step: IterationRecord = Object.freeze({
            iteration : this.chain.length + 1,
            decoder   : input.decoder,
            confidence: input.confidence,
            fallback  : input.fallback,
            validation: input.validation,
        });

        this.history.push(input.text);
        this.chain.push(input.decoder);
        this.confidences.push(input.confidence);
        this.steps.push(step);

        return step;
    }

    /**
     * Check the history for a loop.
     */
    detectLoop(): LoopKind | null {
        return detectLoop(this.history);
    }

    /**
     * Move to a terminal status. The session is frozen afterwards.
     *
     * @throws Error if the session is already finished
     */
    finish(status: TerminalStatus, reason: string): void {
        this.assertRunning();
        this.currentStatus = status;
        this.reason = reason;
    }

    /**
     * Frozen copy of the current state.
     */
    snapshot(): SessionSnapshot {
        return Object.freeze({
            id              : this.id,
            originalText    : this.originalText,
            currentText     : this.currentText,
            textHistory     : Object.freeze([...this.history]),
            encodingChain   : Object.freeze([...this.chain]),
            confidenceScores: Object.freeze([...this.confidences]),
            attemptedPairs  : Object.freeze([...this.attempted.values()]),
            steps           : Object.freeze([...this.steps]),
            iterationCount  : this.iterationCount,
            maxIterations   : this.maxIterations,
            status          : this.currentStatus,
            completionReason: this.reason,
        });
    }

    private assertRunning(): void {
        if (this.isFinished) {
            throw new Error(`Session ${this.id} is already finished (${this.currentStatus})`);
        }
    }
}
