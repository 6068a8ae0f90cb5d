/**
 * @fileoverview Engine barrel exports
 *
 * @module @unravel/engine/engine
 */

export {
    DecoderEngine,
    iterativeDecode,
    selectDecoder,
    kSELECTION_THRESHOLD,
    kFALLBACK_CONFIDENCE,
    kDEFAULT_MAX_ITERATIONS,
    type EngineConfig,
    type DecodeOptions,
    type DecoderSelection,
} from "./DecoderEngine.js";
