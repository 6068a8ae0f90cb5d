/**
 * Text Analysis Contract
 *
 * Observable features of a string, recomputed on every iteration.
 * This is pure data - the analyzer produces it, everything else reads it.
 */

/**
 * Coarse classification of a string's character composition.
 * Mutually exclusive; assigned by fixed priority in the analyzer.
 */
export type CharsetClass =
    | "empty"
    | "hex"
    | "base64"
    | "alphabetic"
    | "printable"
    | "binary";

/**
 * Hash family recognised from length and hex content.
 */
export type HashType = "MD5" | "SHA1" | "SHA256";

/**
 * Immutable analysis of one string.
 */
export interface TextAnalysis {
    /** The analyzed text */
    readonly text: string;

    /** Number of characters (code points) */
    readonly length: number;

    /** Character set class */
    readonly charsetClass: CharsetClass;

    /** Shannon entropy in bits per character (0.0 for empty input) */
    readonly entropy: number;

    /** Fraction of printable ASCII characters, 0.0 - 1.0 */
    readonly printableRatio: number;

    /** Whether the trimmed text ends with `=` or `==` */
    readonly hasPadding: boolean;

    /** Whether an http(s) URL occurs in the text */
    readonly containsUrl: boolean;

    /** Whether a bracketed flag (flag{...}, CTF{...}, ...) occurs in the text */
    readonly containsFlag: boolean;

    /** Hash family, or null when the text is not a hash */
    readonly hashType: HashType | null;
}
