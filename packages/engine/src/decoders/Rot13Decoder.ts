/**
 * @fileoverview ROT13 decoder
 *
 * Rotates ASCII letters by 13 places; everything else passes through.
 * ROT13 is its own inverse, so this never fails.
 *
 * @module @unravel/engine/decoders/Rot13Decoder
 */

import { decodingSuccess, type DecodeAttempt, type Decoder } from "../contracts/Decoder.js";

function rotate(char: string): string {
    const code = char.charCodeAt(0);
    const base = code >= 97 ? 97 : 65;
    return String.fromCharCode(((code - base + 13) % 26) + base);
}

export const rot13Decoder: Decoder = {
    name: "rot13",

    decode(text: string): DecodeAttempt {
        return decodingSuccess(text.replace(/[A-Za-z]/g, rotate));
    },
};
