/**
 * Shared utility functions used across the codebase
 */

import * as path from "path";
import type { VerseReference } from "../types";

// =============================================================================
// Text decoding
// =============================================================================

/**
 * Strict UTF-8 decoder. A byte order mark stays in the string as U+FEFF so
 * that re-encoding reproduces the original bytes.
 */
const utf8Decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Decode UTF-8 bytes; throws a TypeError on malformed input
 */
export function decodeUtf8(bytes: Uint8Array): string {
    return utf8Decoder.decode(bytes);
}

export function encodeUtf8(text: string): Uint8Array {
    return Buffer.from(text, "utf8");
}

// =============================================================================
// Sorting utilities
// =============================================================================

/**
 * Compare by UTF-16 code units, independent of locale
 */
export function compareCodeUnits(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

// =============================================================================
// String utilities
// =============================================================================

/**
 * Path shown to the user: relative to the scanned root, with forward slashes
 */
export function displayPath(root: string, file: string): string {
    return path.relative(root, file).split(path.sep).join("/");
}

/**
 * "Genesis 1:6"
 */
export function formatReference(reference: VerseReference): string {
    return `${reference.book} ${reference.chapter}:${reference.verse}`;
}
