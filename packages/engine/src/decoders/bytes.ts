/**
 * @fileoverview Byte helpers shared by the binary decoders.
 *
 * @module @unravel/engine/decoders/bytes
 */

// ignoreBOM keeps a leading U+FEFF in the output instead of stripping it
const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Decode bytes as UTF-8, or return null when they are not valid UTF-8.
 * An encoded U+FFFD (EF BF BD) is valid and comes back as text.
 */
export function toSafeUtf8(buffer: Buffer): string | null {
    try {
        return utf8.decode(buffer);
    }
    catch {
        return null;
    }
}
