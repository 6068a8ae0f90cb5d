/**
 * @fileoverview Encoding Classifier
 *
 * Maps a TextAnalysis to a confidence per known encoding. Scores are
 * independent, not a distribution: a string can score for several
 * encodings at once.
 *
 * @module @unravel/engine/analysis/EncodingClassifier
 */

import type { EncodingName } from "../contracts/Decoder.js";
import type { TextAnalysis } from "../contracts/TextAnalysis.js";

/**
 * Confidence per encoding, each in [0, 1].
 */
export type ConfidenceMap = Readonly<Record<EncodingName, number>>;

export const kCONFIDENCE_BASE64_WITH_PADDING = 0.95;
export const kCONFIDENCE_BASE64_CHARSET      = 0.85;
export const kCONFIDENCE_HEX_EVEN_LENGTH     = 0.95;
export const kCONFIDENCE_ROT13_ALPHABETIC    = 0.70;
export const kCONFIDENCE_URL_PERCENT         = 0.90;

/**
 * Score each encoding from the analysis.
 *
 * | Encoding | Condition                          | Confidence |
 * |----------|------------------------------------|------------|
 * | base64   | base64 charset, padded             | 0.95       |
 * | base64   | base64 charset, unpadded           | 0.85       |
 * | hex      | hex charset, even length           | 0.95       |
 * | rot13    | alphabetic charset                 | 0.70       |
 * | url      | `%` anywhere                       | 0.90       |
 *
 * Odd-length hex scores 0.0: it cannot be decoded.
 *
 * @example
 * ```typescript
 * identifyLikelyEncoding(analyze("SGVsbG8="));
 * // { base64: 0.95, hex: 0, rot13: 0, url: 0 }
 * ```
 */
export function identifyLikelyEncoding(analysis: TextAnalysis): ConfidenceMap {
    let base64 = 0.0;
    let hex = 0.0;

    if (analysis.charsetClass === "base64") {
        base64 = analysis.hasPadding ? kCONFIDENCE_BASE64_WITH_PADDING : kCONFIDENCE_BASE64_CHARSET;
    }

    if (analysis.charsetClass === "hex" && analysis.length % 2 === 0) {
        hex = kCONFIDENCE_HEX_EVEN_LENGTH;
    }

    return Object.freeze({
        base64,
        hex,
        rot13: analysis.charsetClass === "alphabetic" ? kCONFIDENCE_ROT13_ALPHABETIC : 0.0,
        url  : analysis.text.includes("%") ? kCONFIDENCE_URL_PERCENT : 0.0,
    });
}
