/**
 * @fileoverview Default decoder set
 *
 * @module @unravel/engine/decoders
 */

import type { DecoderSet } from "../contracts/Decoder.js";
import { base64Decoder } from "./Base64Decoder.js";
import { hexDecoder } from "./HexDecoder.js";
import { rot13Decoder } from "./Rot13Decoder.js";
import { urlDecoder } from "./UrlDecoder.js";

export { base64Decoder, hexDecoder, rot13Decoder, urlDecoder };

/**
 * Build the decoder set used when the caller does not supply one.
 *
 * @param overrides - Replacement decoders for individual encodings
 */
export function createDefaultDecoders(overrides: Partial<DecoderSet> = {}): DecoderSet {
    return Object.freeze({
        base64: overrides.base64 ?? base64Decoder,
        hex   : overrides.hex ?? hexDecoder,
        rot13 : overrides.rot13 ?? rot13Decoder,
        url   : overrides.url ?? urlDecoder,
    });
}
