/**
 * @fileoverview Unit tests for EncodingClassifier
 *
 * @module @unravel/engine/__tests__/EncodingClassifier
 */

import { describe, it, expect } from "vitest";
import { identifyLikelyEncoding } from "../analysis/EncodingClassifier.js";
import { analyze } from "../analysis/TextAnalyzer.js";

function classify(text: string) {
    return identifyLikelyEncoding(analyze(text));
}

describe("identifyLikelyEncoding", () => {
    it("should score padded base64 at 0.95", () => {
        expect(classify("SGVsbG8gV29ybGQ=")).toEqual({ base64: 0.95, hex: 0, rot13: 0, url: 0 });
    });

    it("should score unpadded base64 at 0.85", () => {
        expect(classify("QUNNRXthYmN9")).toEqual({ base64: 0.85, hex: 0, rot13: 0, url: 0 });
    });

    it("should score even-length hex at 0.95", () => {
        expect(classify("48656c6c6f")).toEqual({ base64: 0, hex: 0.95, rot13: 0, url: 0 });
    });

    // Scenario: Odd-length hex cannot be decoded
    it("should score odd-length hex at 0", () => {
        expect(classify("abc")).toEqual({ base64: 0, hex: 0, rot13: 0, url: 0 });
    });

    it("should score alphabetic text for rot13", () => {
        expect(classify("Uryyb Jbeyq")).toEqual({ base64: 0, hex: 0, rot13: 0.7, url: 0 });
    });

    // Scenario: Scores are independent, not a distribution
    it("should score several encodings at once", () => {
        expect(classify("Uryyb%20Jbeyq")).toEqual({ base64: 0, hex: 0, rot13: 0.7, url: 0.9 });
    });

    it("should score nothing for punctuation", () => {
        expect(classify("!@#$^&*()")).toEqual({ base64: 0, hex: 0, rot13: 0, url: 0 });
    });

    it("should score nothing for empty text", () => {
        expect(classify("")).toEqual({ base64: 0, hex: 0, rot13: 0, url: 0 });
    });

    it("should score nothing for binary text", () => {
        expect(classify("\u0000\u0001\u00ff")).toEqual({ base64: 0, hex: 0, rot13: 0, url: 0 });
    });

    it.each([
        "",
        "\u0000\u0001\u00ff",
        "😀%F0%9F%98%80",
        "SGVsbG8gV29ybGQ=",
        "48656c6c6f",
        "Uryyb%20Jbeyq",
        "a".repeat(500),
    ])("should keep every score within [0, 1] for %j", (text) => {
        for (const score of Object.values(classify(text))) {
            expect(score).toBeGreaterThanOrEqual(0);
            expect(score).toBeLessThanOrEqual(1);
        }
    });
});
