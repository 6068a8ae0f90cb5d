/**
 * @fileoverview Contract barrel exports
 *
 * Interfaces and types that define the decoder engine contract.
 *
 * @module @unravel/engine/contracts
 */

// Decoder contract
export type {
    EncodingName,
    ChainEntry,
    DecodingSuccess,
    DecodingFailure,
    DecodeAttempt,
    Decoder,
    DecoderSet,
} from "./Decoder.js";
export {
    ENCODING_PRIORITY,
    NO_DECODER,
    decodingSuccess,
    decodingFailure,
} from "./Decoder.js";

// Text analysis
export type {
    CharsetClass,
    HashType,
    TextAnalysis,
} from "./TextAnalysis.js";

// Validation contract
export type {
    ValidationStatus,
    ValidationResult,
    Validator,
} from "./Validation.js";
export {
    createValidationResult,
} from "./Validation.js";

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
} from "./Session.js";
export { CompletionReason } from "./Session.js";

// Logger
export type { EngineLogger } from "./Logger.js";
export { createConsoleLogger, errorMessage } from "./Logger.js";

// EventBus contract
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    DecodeEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
