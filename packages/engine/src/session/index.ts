/**
 * @fileoverview Session barrel exports
 *
 * @module @unravel/engine/session
 */

export {
    SessionBuilder,
    generateSessionId,
    type IterationInput,
} from "./SessionBuilder.js";
export { detectLoop, type LoopKind } from "./loopDetection.js";
export {
    exportSession,
    toDecodeResult,
    kATTEMPT_SNIPPET_LENGTH,
} from "./exportSession.js";
