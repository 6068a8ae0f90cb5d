/**
 * @fileoverview DecoderEngine
 *
 * The iteration controller. Owns one session per call and drives it
 * through the state machine until a terminal status:
 *
 * 1. Analyze the current text
 * 2. Score each encoding
 * 3. Select a decoder (fallback when none qualifies or none progresses)
 * 4. Apply it
 * 5. Validate the output against the previous text
 * 6. Append the iteration to the session
 * 7. Evaluate termination
 *
 * Termination priority: COMPLETE, FAILED, iteration limit, loop.
 *
 * Design principles:
 * - Pure collaborators: analyzer, classifier, decoders and validators hold no state
 * - Observable: emits events at each lifecycle stage
 * - Total: decode() never throws; unexpected errors end the run as FAILED,
 *   and a throwing event bus or logger is contained
 *
 * @module @unravel/engine/engine/DecoderEngine
 */

import {
    ENCODING_PRIORITY,
    NO_DECODER,
    type ChainEntry,
    type DecoderSet,
    type EncodingName,
} from "../contracts/Decoder.js";
import {
    CompletionReason,
    type DecodeResult,
    type SessionSnapshot,
} from "../contracts/Session.js";
import type { Validator } from "../contracts/Validation.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { createConsoleLogger, errorMessage } from "../contracts/Logger.js";
import type { EventBus, EventPayload } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import { createTextAnalyzer, type TextAnalyzer } from "../analysis/TextAnalyzer.js";
import { identifyLikelyEncoding, type ConfidenceMap } from "../analysis/EncodingClassifier.js";
import { createDefaultDecoders } from "../decoders/index.js";
import { ValidatorChain } from "../validators/ValidatorChain.js";
import { createDefaultValidators } from "../validators/builtin.js";
import { SessionBuilder } from "../session/SessionBuilder.js";
import { toDecodeResult } from "../session/exportSession.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";

/**
 * Selection confidence must be strictly above this to be considered.
 */
export const kSELECTION_THRESHOLD = 0.3;

/**
 * Confidence recorded for a decoder picked by the fallback strategy.
 */
export const kFALLBACK_CONFIDENCE = 0.7;

export const kDEFAULT_MAX_ITERATIONS = 10;

/**
 * Engine configuration options.
 */
export interface EngineConfig {
    /** Iteration cap per run (default: 10) */
    readonly maxIterations?: number;

    /** Log step-by-step progress (default: false) */
    readonly verbose?: boolean;

    /** Logger for engine operations */
    readonly logger?: EngineLogger;

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Decoder per encoding (default: the built-in set) */
    readonly decoders?: DecoderSet;

    /**
     * Full, ordered validator list. Replaces the default chain.
     * Mutually exclusive in effect with customValidators.
     */
    readonly validators?: readonly Validator[];

    /** Validators placed after the no-change check of the default chain */
    readonly customValidators?: readonly Validator[];

    /** Flag prefixes recognised in addition to the defaults */
    readonly flagPrefixes?: readonly string[];
}

/**
 * Per-call overrides.
 */
export interface DecodeOptions {
    readonly maxIterations?: number;
    readonly verbose?: boolean;
}

/**
 * A decoder chosen by confidence.
 */
export interface DecoderSelection {
    readonly name: EncodingName;
    readonly confidence: number;
}

/**
 * What one iteration produced before validation.
 */
interface StepOutcome {
    readonly decoder: ChainEntry;
    readonly text: string;
    readonly confidence: number;
    readonly fallback: boolean;
}

/**
 * Pick the decoder with the highest confidence above the threshold.
 * Ties go to the earlier entry of ENCODING_PRIORITY.
 *
 * @param confidences - Score per encoding
 * @param isExcluded - Decoders to skip (already attempted on this text)
 * @returns The selection, or null if nothing qualifies
 *
 * @example
 * ```typescript
 * selectDecoder({ base64: 0.85, hex: 0.95, rot13: 0.7, url: 0 });
 * // { name: "hex", confidence: 0.95 }
 * ```
 */
export function selectDecoder(
    confidences: ConfidenceMap,
    isExcluded: (name: EncodingName) => boolean = () => false
): DecoderSelection | null {
    let best: DecoderSelection | null = null;

    for (const name of ENCODING_PRIORITY) {
        const confidence = confidences[name];
        if (confidence <= kSELECTION_THRESHOLD || isExcluded(name)) {
            continue;
        }
        if (!best || confidence > best.confidence) {
            best = { name, confidence };
        }
    }

    return best;
}

function validateMaxIterations(value: number): number {
    if (!Number.isInteger(value) || value <= 0) {
        throw new Error(`maxIterations must be a positive integer, got ${value}`);
    }
    return value;
}

/**
 * DecoderEngine - iterative multi-layer decoder.
 *
 * @example
 * ```typescript
 * const engine = new DecoderEngine({ maxIterations: 5 });
 *
 * engine.eventBus.subscribe("decode:iteration", (event) => {
 *     console.log("Step:", event.data);
 * });
 *
 * const result = engine.decode("NDg2NTZjNmM2Zg==");
 * // result.encodingChain → ["base64", "hex"], result.finalText → "Hello"
 * ```
 */
export class DecoderEngine {
    private readonly maxIterations: number;
    private readonly verbose: boolean;
    private readonly logger: EngineLogger;
    private readonly decoders: DecoderSet;
    private readonly analyzer: TextAnalyzer;
    private readonly validatorChain: ValidatorChain;

    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    /**
     * @throws Error if maxIterations is not a positive integer
     */
    constructor(config: EngineConfig = {}) {
        this.maxIterations = validateMaxIterations(config.maxIterations ?? kDEFAULT_MAX_ITERATIONS);
        this.verbose = config.verbose ?? false;
        this.logger = config.logger ?? createConsoleLogger();
        this.eventBus = config.eventBus ?? new InMemoryEventBus({ logger: this.logger });
        this.decoders = config.decoders ?? createDefaultDecoders();
        this.analyzer = createTextAnalyzer({ flagPrefixes: config.flagPrefixes });
        this.validatorChain = new ValidatorChain(
            config.validators ?? createDefaultValidators(config.customValidators)
        );
    }

    /**
     * Decode the text through as many layers as it takes.
     *
     * Never throws: errors during the run end it as FAILED with reason
     * "error: <message>". Invalid options still throw before the run starts.
     *
     * @param text - Possibly multi-layer encoded text
     * @param options - Per-call overrides of maxIterations and verbose
     */
    decode(text: string, options: DecodeOptions = {}): DecodeResult {
        return toDecodeResult(this.run(text, options));
    }

    /**
     * Same as decode(), returning the full session snapshot.
     *
     * @throws Error if options.maxIterations is not a positive integer
     */
    run(text: string, options: DecodeOptions = {}): SessionSnapshot {
        const maxIterations = options.maxIterations === undefined
            ? this.maxIterations
            : validateMaxIterations(options.maxIterations);
        const verbose = options.verbose ?? this.verbose;

        const session = new SessionBuilder(text, maxIterations);
        const traceId = session.id;

        const progress = (message: string, data?: Record<string, unknown>): void => {
            if (verbose) {
                this.log("info", message, { ...data, traceId });
            }
        };

        try {
            this.emit(createEvent("decode:started", {
                length: Array.from(text).length,
                maxIterations,
            }, traceId));
            progress("Decode started", { text, maxIterations });

            if (text.length === 0) {
                session.finish("FAILED", CompletionReason.EMPTY_INPUT);
            }

            while (!session.isFinished) {
                this.step(session, progress);
            }
        }
        catch (error) {
            const message = errorMessage(error);

            this.log("error", "Decode error", {
                traceId,
                iteration: session.iterationCount,
                error    : message,
            });
            this.emit(createEvent("decode:error", {
                iteration: session.iterationCount,
                error    : message,
            }, traceId));

            if (!session.isFinished) {
                session.finish("FAILED", `error: ${message}`);
            }
        }

        const snapshot = session.snapshot();

        this.emit(createEvent("decode:finished", {
            status    : snapshot.status,
            reason    : snapshot.completionReason,
            iterations: snapshot.iterationCount,
            chain     : [...snapshot.encodingChain],
        }, traceId));
        progress("Decode finished", {
            status    : snapshot.status,
            reason    : snapshot.completionReason,
            iterations: snapshot.iterationCount,
        });

        return snapshot;
    }

    /**
     * Run one iteration and evaluate termination.
     */
    private step(
        session: SessionBuilder,
        progress: (message: string, data?: Record<string, unknown>) => void
    ): void {
        const previous = session.currentText;
        const analysis = this.analyzer.analyze(previous);
        const confidences = identifyLikelyEncoding(analysis);

        progress("Analyzed", {
            iteration     : session.iterationCount + 1,
            charsetClass  : analysis.charsetClass,
            entropy       : analysis.entropy,
            printableRatio: analysis.printableRatio,
            confidences,
        });

        const outcome: StepOutcome = this.applySelected(session, previous, confidences, progress)
            ?? this.applyFallback(session, previous, progress)
            ?? { decoder: NO_DECODER, text: previous, confidence: 0.0, fallback: false };

        const validation = this.validatorChain.evaluate(previous, this.analyzer.analyze(outcome.text));

        const record = session.record({ ...outcome, validation });

        this.emit(createEvent("decode:iteration", {
            iteration  : record.iteration,
            decoder    : record.decoder,
            confidence : record.confidence,
            fallback   : record.fallback,
            status     : validation.status,
            reason     : validation.reason,
            validatorId: validation.validatorId,
        }, session.id));
        progress("Validated", {
            iteration : record.iteration,
            decoder   : record.decoder,
            status    : validation.status,
            reason    : validation.reason,
            confidence: validation.confidence,
        });

        if (validation.status === "COMPLETE") {
            session.finish("COMPLETE", validation.reason);
        }
        else if (validation.status === "FAILED") {
            session.finish("FAILED", validation.reason);
        }
        else if (session.limitReached) {
            session.finish("STOPPED_MAX_ITER", CompletionReason.MAX_ITERATIONS);
        }
        else {
            const loop = session.detectLoop();
            if (loop) {
                progress("Loop detected", { kind: loop });
                session.finish("STOPPED_LOOP", CompletionReason.LOOP_DETECTED);
            }
        }
    }

    /**
     * Apply the decoder chosen by confidence. Returns null when nothing
     * qualifies, the decoder fails, or its output equals its input.
     */
    private applySelected(
        session: SessionBuilder,
        text: string,
        confidences: ConfidenceMap,
        progress: (message: string, data?: Record<string, unknown>) => void
    ): StepOutcome | null {
        const selection = selectDecoder(confidences, (name) => session.hasAttempted(text, name));
        if (!selection) {
            progress("No decoder above threshold", { threshold: kSELECTION_THRESHOLD });
            return null;
        }

        session.markAttempted(text, selection.name);
        const attempt = this.decoders[selection.name].decode(text);

        if (!attempt.ok) {
            progress("Decoder failed", { decoder: selection.name, reason: attempt.reason });
            return null;
        }
        if (attempt.text === text) {
            progress("Decoder made no change", { decoder: selection.name });
            return null;
        }

        return {
            decoder   : selection.name,
            text      : attempt.text,
            confidence: selection.confidence,
            fallback  : false,
        };
    }

    /**
     * Try every decoder in priority order; the first that changes the
     * text wins with the fallback confidence.
     */
    private applyFallback(
        session: SessionBuilder,
        text: string,
        progress: (message: string, data?: Record<string, unknown>) => void
    ): StepOutcome | null {
        for (const name of ENCODING_PRIORITY) {
            if (session.hasAttempted(text, name)) {
                continue;
            }

            session.markAttempted(text, name);
            const attempt = this.decoders[name].decode(text);

            if (attempt.ok && attempt.text !== text) {
                this.emit(createEvent("decode:fallback", {
                    iteration: session.iterationCount + 1,
                    decoder  : name,
                }, session.id));
                progress("Fallback decoder succeeded", { decoder: name });

                return {
                    decoder   : name,
                    text      : attempt.text,
                    confidence: kFALLBACK_CONFIDENCE,
                    fallback  : true,
                };
            }
        }

        progress("No decoder made progress");
        return null;
    }

    /**
     * Emit an event to the event bus. A bus that throws is logged and the
     * run carries on.
     */
    private emit(event: EventPayload): void {
        try {
            this.eventBus.emit(event);
        }
        catch (error) {
            this.log("error", "Event bus emit failed", {
                eventType: event.type,
                traceId  : event.traceId,
                error    : errorMessage(error),
            });
        }
    }

    /**
     * Write to the injected logger, falling back to the console when the
     * logger itself throws.
     */
    private log(level: keyof EngineLogger, message: string, data: Record<string, unknown>): void {
        try {
            this.logger[level](message, data);
        }
        catch (error) {
            console.error(`[ERROR] Logger failed: ${message}`, {
                ...data,
                level,
                loggerError: errorMessage(error),
            });
        }
    }
}

/**
 * One-shot convenience wrapper around a fresh DecoderEngine.
 *
 * @example
 * ```typescript
 * iterativeDecode("ZmxhZ3t0ZXN0fQ==").finalText; // "flag{test}"
 * ```
 */
export function iterativeDecode(text: string, options: EngineConfig = {}): DecodeResult {
    return new DecoderEngine(options).decode(text);
}
