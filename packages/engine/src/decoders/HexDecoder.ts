/**
 * @fileoverview Hex decoder
 *
 * Spaces, tabs and newlines between digits are ignored. Bytes that are not
 * valid UTF-8 come back as Base64.
 *
 * @module @unravel/engine/decoders/HexDecoder
 */

import {
    decodingFailure,
    decodingSuccess,
    type DecodeAttempt,
    type Decoder,
} from "../contracts/Decoder.js";
import { toSafeUtf8 } from "./bytes.js";

export const hexDecoder: Decoder = {
    name: "hex",

    decode(text: string): DecodeAttempt {
        const cleaned = text.replace(/[ \t\n]/g, "");

        if (!/^[0-9a-fA-F]*$/.test(cleaned)) {
            return decodingFailure("Text contains non-hexadecimal characters");
        }

        if (cleaned.length % 2 !== 0) {
            return decodingFailure("Hexadecimal string has odd length");
        }

        if (cleaned.length === 0) {
            return decodingFailure("Failed to decode hexadecimal: empty input");
        }

        const bytes = Buffer.from(cleaned, "hex");
        return decodingSuccess(toSafeUtf8(bytes) ?? bytes.toString("base64"));
    },
};
