/**
 * Decoder Contract
 *
 * A decoder undoes one encoding. Decoders never throw for malformed input:
 * they return a DecodingFailure describing why the text is not well-formed
 * for their encoding, and the engine falls back to the next candidate.
 *
 * Design principles:
 * - Pure: same input produces the same attempt
 * - Explicit: failure is a value, not an exception
 * - Closed: the set of encodings is fixed at compile time
 */

/**
 * Encodings the engine knows how to undo, in tie-break priority order.
 */
export const ENCODING_PRIORITY = ["base64", "hex", "rot13", "url"] as const;

/**
 * Name of a known encoding.
 */
export type EncodingName = (typeof ENCODING_PRIORITY)[number];

/**
 * Chain entry recorded for an iteration in which no decoder made progress.
 */
export const NO_DECODER = "none";

/**
 * One entry of a session's encoding chain.
 */
export type ChainEntry = EncodingName | typeof NO_DECODER;

/**
 * A decode that produced output.
 */
export interface DecodingSuccess {
    readonly ok: true;
    readonly text: string;
}

/**
 * A decode rejected because the input is not well-formed for the encoding.
 */
export interface DecodingFailure {
    readonly ok: false;
    readonly reason: string;
}

/**
 * Outcome of a single decoder invocation.
 */
export type DecodeAttempt = DecodingSuccess | DecodingFailure;

/**
 * Decoder interface.
 *
 * @example
 * ```typescript
 * const reverse: Decoder = {
 *     name: "rot13",
 *     decode(text) {
 *         return text.length > 0
 *             ? decodingSuccess([...text].reverse().join(""))
 *             : decodingFailure("Nothing to decode");
 *     },
 * };
 * ```
 */
export interface Decoder {
    /** Encoding this decoder undoes */
    readonly name: EncodingName;

    /**
     * Attempt to decode the text.
     *
     * @param text - Text believed to be encoded with this decoder's encoding
     * @returns The decoded text, or a failure with a descriptive reason
     */
    decode(text: string): DecodeAttempt;
}

/**
 * Decoders keyed by the encoding they undo.
 * Built once when the engine is constructed.
 */
export type DecoderSet = Readonly<Record<EncodingName, Decoder>>;

export function decodingSuccess(text: string): DecodingSuccess {
    return { ok: true, text };
}

export function decodingFailure(reason: string): DecodingFailure {
    return { ok: false, reason };
}
