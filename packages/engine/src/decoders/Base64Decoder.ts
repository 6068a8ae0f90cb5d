/**
 * @fileoverview Base64 decoder
 *
 * Strict standard-alphabet Base64. Whitespace is ignored; the remaining
 * text must be a multiple of four characters with at most two trailing `=`.
 * Bytes that are not valid UTF-8 come back as lowercase hex so the next
 * iteration can keep working on text.
 *
 * @module @unravel/engine/decoders/Base64Decoder
 */

import {
    decodingFailure,
    decodingSuccess,
    type DecodeAttempt,
    type Decoder,
} from "../contracts/Decoder.js";
import { toSafeUtf8 } from "./bytes.js";

const BASE64_BODY = /^[A-Za-z0-9+/]*={0,2}$/;

export const base64Decoder: Decoder = {
    name: "base64",

    decode(text: string): DecodeAttempt {
        const cleaned = text.replace(/\s+/g, "");

        if (cleaned.length === 0) {
            return decodingFailure("Failed to decode Base64: empty input");
        }

        if (!BASE64_BODY.test(cleaned)) {
            return decodingFailure("Failed to decode Base64: invalid characters");
        }

        if (cleaned.length % 4 !== 0) {
            return decodingFailure("Failed to decode Base64: incorrect padding");
        }

        const bytes = Buffer.from(cleaned, "base64");
        return decodingSuccess(toSafeUtf8(bytes) ?? bytes.toString("hex"));
    },
};
