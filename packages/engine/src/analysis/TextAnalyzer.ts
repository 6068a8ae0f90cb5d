/**
 * @fileoverview Text Analyzer
 *
 * Computes the observable features of a string that the classifier and the
 * validator chain reason about: charset class, Shannon entropy, printable
 * ratio, Base64 padding, and URL / flag / hash pattern hits.
 *
 * Every function here is pure. Lengths and frequencies are counted in code
 * points, so a surrogate pair is one character.
 *
 * @module @unravel/engine/analysis/TextAnalyzer
 */

import type { CharsetClass, HashType, TextAnalysis } from "../contracts/TextAnalysis.js";

/**
 * Share of letters at or above which a string is classed as alphabetic.
 */
const kALPHABETIC_THRESHOLD = 0.7;

/**
 * Hash families by exact hex length.
 */
const kHASH_LENGTHS: ReadonlyMap<number, HashType> = new Map([
    [32, "MD5"],
    [40, "SHA1"],
    [64, "SHA256"],
]);

/**
 * Flag prefixes recognised out of the box. Matching is case-insensitive,
 * so "flag" also covers "FLAG" and "Flag".
 */
export const DEFAULT_FLAG_PREFIXES: readonly string[] = Object.freeze([
    "flag",
    "flg",
    "HTB",
    "CTF",
    "picoCTF",
]);

const HEX_PATTERN       = /^[0-9a-fA-F]+$/;
const BASE64_PATTERN    = /^[A-Za-z0-9+/=]+$/;
const URL_PATTERN       = /https?:\/\/\S+/i;
const LETTER_PATTERN    = /^\p{L}$/u;
const PRINTABLE_CONTROL = new Set(["\t", "\n", "\r", "\v", "\f"]);

/**
 * Options for building an analyzer.
 */
export interface TextAnalyzerOptions {
    /**
     * Extra flag prefixes (e.g. "DUCTF"). They extend the defaults.
     */
    readonly flagPrefixes?: readonly string[];
}

/**
 * An analyzer bound to a fixed set of flag patterns.
 */
export interface TextAnalyzer {
    /** Flag patterns this analyzer matches */
    readonly flagPatterns: readonly RegExp[];

    analyze(text: string): TextAnalysis;
}

/**
 * Check whether a character belongs to printable ASCII
 * (space through tilde, plus the whitespace controls).
 */
export function isPrintableChar(char: string): boolean {
    if (PRINTABLE_CONTROL.has(char)) {
        return true;
    }

    const code = char.codePointAt(0) ?? 0;
    return code >= 0x20 && code <= 0x7e;
}

/**
 * Identify the character set class of the text.
 *
 * First match wins: empty, hex, base64, alphabetic (>= 70% letters),
 * printable (all printable ASCII), binary.
 *
 * @example
 * ```typescript
 * identifyCharset("48656c6c6f"); // "hex"
 * identifyCharset("SGVsbG8=");   // "base64"
 * identifyCharset("Hello World"); // "alphabetic"
 * ```
 */
export function identifyCharset(text: string): CharsetClass {
    if (text.length === 0) {
        return "empty";
    }

    if (HEX_PATTERN.test(text)) {
        return "hex";
    }

    if (BASE64_PATTERN.test(text)) {
        return "base64";
    }

    const chars = Array.from(text);
    const letters = chars.filter((char) => LETTER_PATTERN.test(char)).length;

    if (letters / chars.length >= kALPHABETIC_THRESHOLD) {
        return "alphabetic";
    }

    if (chars.every(isPrintableChar)) {
        return "printable";
    }

    return "binary";
}

/**
 * Ceiling on entropy: a uniform distribution over byte values.
 */
const kMAX_ENTROPY = 8.0;

/**
 * Calculate the Shannon entropy of the text in bits per character.
 *
 * Symbols are code points. Text with more than 256 distinct code points is
 * capped at 8 bits, so the result stays within log2(min(256, length)).
 *
 * Natural English sits around 4.1 - 4.5; random data approaches
 * log2 of the alphabet size. Returns 0.0 for empty input.
 */
export function calculateEntropy(text: string): number {
    if (text.length === 0) {
        return 0.0;
    }

    const counts = new Map<string, number>();
    let total = 0;

    for (const char of text) {
        counts.set(char, (counts.get(char) ?? 0) + 1);
        total++;
    }

    let entropy = 0.0;
    for (const count of counts.values()) {
        const probability = count / total;
        entropy -= probability * Math.log2(probability);
    }

    return Math.min(entropy, kMAX_ENTROPY);
}

/**
 * Fraction of printable ASCII characters. Returns 0.0 for empty input.
 */
export function calculatePrintableRatio(text: string): number {
    if (text.length === 0) {
        return 0.0;
    }

    const chars = Array.from(text);
    return chars.filter(isPrintableChar).length / chars.length;
}

/**
 * Whether the text, right-trimmed, ends with Base64 padding.
 */
export function hasPadding(text: string): boolean {
    return text.trimEnd().endsWith("=");
}

export function containsUrl(text: string): boolean {
    return URL_PATTERN.test(text);
}

/**
 * Build case-insensitive `prefix{...}` patterns.
 *
 * @param prefixes - Flag prefixes such as "flag" or "picoCTF"
 */
export function buildFlagPatterns(prefixes: readonly string[]): RegExp[] {
    return prefixes.map((prefix) => {
        const escaped = prefix.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
        return new RegExp(`${escaped}\\{[^}]+\\}`, "i");
    });
}

const DEFAULT_FLAG_PATTERNS = buildFlagPatterns(DEFAULT_FLAG_PREFIXES);

/**
 * Check for a bracketed flag. Returns on the first matching pattern.
 *
 * @param text - The text to search
 * @param patterns - Flag patterns (defaults to the built-in set)
 */
export function containsFlag(text: string, patterns: readonly RegExp[] = DEFAULT_FLAG_PATTERNS): boolean {
    return patterns.some((pattern) => pattern.test(text));
}

/**
 * Identify a hex digest by exact length. Partial lengths never match.
 *
 * @example
 * ```typescript
 * detectHashType("5d41402abc4b2a76b9719d911017c592"); // "MD5"
 * detectHashType("5d41402abc");                       // null
 * ```
 */
export function detectHashType(text: string): HashType | null {
    const trimmed = text.trim();

    if (!HEX_PATTERN.test(trimmed)) {
        return null;
    }

    return kHASH_LENGTHS.get(trimmed.length) ?? null;
}

/**
 * Analyze a string against the given flag patterns.
 *
 * @param text - The text to analyze
 * @param flagPatterns - Flag patterns (defaults to the built-in set)
 * @returns Frozen TextAnalysis
 */
export function analyze(text: string, flagPatterns: readonly RegExp[] = DEFAULT_FLAG_PATTERNS): TextAnalysis {
    return Object.freeze({
        text,
        length        : Array.from(text).length,
        charsetClass  : identifyCharset(text),
        entropy       : calculateEntropy(text),
        printableRatio: calculatePrintableRatio(text),
        hasPadding    : hasPadding(text),
        containsUrl   : containsUrl(text),
        containsFlag  : containsFlag(text, flagPatterns),
        hashType      : detectHashType(text),
    });
}

/**
 * Create an analyzer bound to the default flag prefixes plus any extras.
 *
 * @example
 * ```typescript
 * const analyzer = createTextAnalyzer({ flagPrefixes: ["DUCTF"] });
 * analyzer.analyze("DUCTF{x}").containsFlag; // true
 * ```
 */
export function createTextAnalyzer(options: TextAnalyzerOptions = {}): TextAnalyzer {
    const extra = options.flagPrefixes ?? [];
    const flagPatterns = extra.length > 0
        ? buildFlagPatterns([...DEFAULT_FLAG_PREFIXES, ...extra])
        : DEFAULT_FLAG_PATTERNS;

    return {
        flagPatterns,
        analyze: (text) => analyze(text, flagPatterns),
    };
}
