/**
 * @fileoverview Percent-encoding decoder
 *
 * Each run of `%XX` escapes is decoded as one UTF-8 byte sequence; invalid
 * sequences become U+FFFD and malformed escapes are left as they are.
 * `+` is not treated as a space.
 *
 * @module @unravel/engine/decoders/UrlDecoder
 */

import {
    decodingFailure,
    decodingSuccess,
    type DecodeAttempt,
    type Decoder,
} from "../contracts/Decoder.js";

const ESCAPE_RUN = /(?:%[0-9a-fA-F]{2})+/g;

export const urlDecoder: Decoder = {
    name: "url",

    decode(text: string): DecodeAttempt {
        if (!text.includes("%")) {
            return decodingFailure("Text does not appear to be URL encoded (no % found)");
        }

        const decoded = text.replace(ESCAPE_RUN, (run) =>
            Buffer.from(run.replace(/%/g, ""), "hex").toString("utf8")
        );

        if (decoded === text) {
            return decodingFailure("URL decoding resulted in no change");
        }

        return decodingSuccess(decoded);
    },
};
