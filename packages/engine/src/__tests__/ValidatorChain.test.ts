/**
 * @fileoverview Unit tests for ValidatorChain and the built-in validators
 *
 * Tests cover:
 * - Each built-in rule and the priority order between them
 * - Intermediate layers that must not complete the run
 * - Custom validators and chains without a terminal validator
 *
 * @module @unravel/engine/__tests__/ValidatorChain
 */

import { describe, it, expect } from "vitest";
import { ValidatorChain } from "../validators/ValidatorChain.js";
import {
    carriesEncodingSignal,
    createDefaultValidators,
    flagValidator,
} from "../validators/builtin.js";
import { analyze } from "../analysis/TextAnalyzer.js";
import { createValidationResult, type Validator } from "../contracts/Validation.js";

describe("ValidatorChain", () => {
    const chain = new ValidatorChain();

    describe("built-in rules", () => {
        // Scenario: Decoder produced its input
        it("should fail when nothing changed", () => {
            expect(chain.validate("abc", "abc")).toEqual({
                status     : "FAILED",
                reason     : "No change after decoding",
                confidence : 0,
                validatorId: "no-change",
            });
        });

        it("should complete on a flag", () => {
            expect(chain.validate("ZmxhZ3t0ZXN0fQ==", "flag{test}")).toEqual({
                status     : "COMPLETE",
                reason     : "Flag format detected",
                confidence : 0.99,
                validatorId: "flag",
            });
        });

        it("should complete on a URL", () => {
            expect(chain.validate("x", "https://example.com/a")).toEqual({
                status     : "COMPLETE",
                reason     : "URL detected",
                confidence : 0.85,
                validatorId: "url",
            });
        });

        it("should complete on a hash", () => {
            expect(chain.validate("x", "5d41402abc4b2a76b9719d911017c592")).toEqual({
                status     : "COMPLETE",
                reason     : "MD5 hash detected",
                confidence : 0.8,
                validatorId: "hash",
            });
        });

        it("should complete on natural language", () => {
            expect(chain.validate("SGVsbG8gV29ybGQ=", "Hello World")).toEqual({
                status     : "COMPLETE",
                reason     : "Natural language detected (high printable ratio, low entropy)",
                confidence : 0.9,
                validatorId: "natural-language",
            });
        });

        // Scenario: Low printable ratio
        it("should report text that still looks encoded", () => {
            expect(chain.validate("x", "\u0001\u0002\u0003abc")).toEqual({
                status     : "PARTIAL",
                reason     : "Still appears encoded (printable=0.50, entropy=2.58)",
                confidence : 0.6,
                validatorId: "still-encoded",
            });
        });

        // Scenario: Printable but entropy too high for natural language
        it("should report improved but ambiguous text", () => {
            expect(chain.validate("abcdefghijklm nopqrstuvwxyz", "nopqrstuvwxyz abcdefghijklm")).toEqual({
                status     : "PARTIAL",
                reason     : "Improved readability but still ambiguous",
                confidence : 0.5,
                validatorId: "improved-readability",
            });
        });

        // Scenario: Printable ratio exactly 0.8 matches no rule
        it("should fall back to the default result", () => {
            expect(chain.validate("x", "abcd\u0001")).toEqual({
                status     : "PARTIAL",
                reason     : "Ambiguous result",
                confidence : 0.45,
                validatorId: "default",
            });
        });

        // Scenario: Flag beats URL when both are present
        it("should apply rules in priority order", () => {
            expect(chain.validate("x", "https://example.com/flag{a}").validatorId).toBe("flag");
        });
    });

    describe("intermediate layers", () => {
        // Scenario: Hex of "Hello" reads as low-entropy ASCII
        it("should not complete on even-length hex", () => {
            expect(chain.validate("NDg2NTZjNmM2Zg==", "48656c6c6f")).toEqual({
                status     : "PARTIAL",
                reason     : "Improved readability but still ambiguous",
                confidence : 0.5,
                validatorId: "improved-readability",
            });
        });

        it("should not complete on padded Base64", () => {
            expect(chain.validate("x", "SGVsbG8=").validatorId).toBe("improved-readability");
        });

        it("should identify the encoding signals", () => {
            expect(carriesEncodingSignal(analyze("48656c6c6f"))).toBe(true);
            expect(carriesEncodingSignal(analyze("abc"))).toBe(false);
            expect(carriesEncodingSignal(analyze("SGVsbG8="))).toBe(true);
            expect(carriesEncodingSignal(analyze("Hello"))).toBe(false);
        });
    });

    describe("custom validators", () => {
        const pem: Validator = {
            id: "pem",
            validate(_original, analysis) {
                return analysis.text.startsWith("-----BEGIN")
                    ? createValidationResult("COMPLETE", "PEM block", 0.9, this.id)
                    : null;
            },
        };

        // Scenario: Custom rules run after no-change, before the built-ins
        it("should place custom validators after the no-change check", () => {
            const ids = createDefaultValidators([pem]).map((validator) => validator.id);

            expect(ids).toEqual([
                "no-change",
                "pem",
                "flag",
                "url",
                "hash",
                "natural-language",
                "still-encoded",
                "improved-readability",
                "default",
            ]);
        });

        it("should let a custom validator decide", () => {
            const custom = new ValidatorChain(createDefaultValidators([pem]));

            expect(custom.validate("x", "-----BEGIN KEY-----")).toEqual({
                status     : "COMPLETE",
                reason     : "PEM block",
                confidence : 0.9,
                validatorId: "pem",
            });
        });

        // Scenario: Every validator in a custom chain declines
        it("should return the default result when no validator matches", () => {
            const partial = new ValidatorChain([flagValidator]);

            expect(partial.validate("x", "plain")).toEqual({
                status     : "PARTIAL",
                reason     : "Ambiguous result",
                confidence : 0.45,
                validatorId: "default",
            });
        });

        it("should reject an empty chain", () => {
            expect(() => new ValidatorChain([])).toThrow("Validator chain requires at least one validator");
        });
    });
});
