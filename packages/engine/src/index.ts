/**
 * @fileoverview Unravel Engine
 *
 * Iterative multi-layer decoder.
 *
 * The engine provides:
 * - Text analysis and per-encoding confidence scoring
 * - Decoder selection with a fallback sweep
 * - An ordered validator chain deciding when the text is finished
 * - Session history with loop detection
 *
 * @module @unravel/engine
 * @example
 * ```typescript
 * import { DecoderEngine, exportSession } from "@unravel/engine";
 *
 * const engine = new DecoderEngine({ maxIterations: 10 });
 * const result = engine.decode("ZmxhZ3t0ZXN0fQ==");
 * // result.finalText → "flag{test}"
 *
 * const json = exportSession(engine.run("SGVsbG8gV29ybGQ="));
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

// Decoder
export type {
    EncodingName,
    ChainEntry,
    DecodingSuccess,
    DecodingFailure,
    DecodeAttempt,
    Decoder,
    DecoderSet,
} from "./contracts/index.js";
export {
    ENCODING_PRIORITY,
    NO_DECODER,
    decodingSuccess,
    decodingFailure,
} from "./contracts/index.js";

// Text analysis
export type {
    CharsetClass,
    HashType,
    TextAnalysis,
} from "./contracts/index.js";

// Validation
export type {
    ValidationStatus,
    ValidationResult,
    Validator,
} from "./contracts/index.js";
export {
    createValidationResult,
} from "./contracts/index.js";

// Session
export type {
    SessionStatus,
    TerminalStatus,
    AttemptedPair,
    IterationRecord,
    SessionSnapshot,
    DecodeResult,
    AttemptSummary,
    SessionExport,
} from "./contracts/index.js";
export { CompletionReason } from "./contracts/index.js";

// Logger
export type { EngineLogger } from "./contracts/index.js";
export { createConsoleLogger, errorMessage } from "./contracts/index.js";

// EventBus
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    DecodeEventType,
    Subscription,
} from "./contracts/index.js";
export { createEvent } from "./contracts/index.js";

// ============================================================================
// Component exports
// ============================================================================

export * from "./analysis/index.js";
export * from "./decoders/index.js";
export * from "./validators/index.js";
export * from "./session/index.js";
export * from "./plugins/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export { InMemoryEventBus, type InMemoryEventBusOptions } from "./impl/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export * from "./engine/index.js";
