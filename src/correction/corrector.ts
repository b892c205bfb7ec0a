/**
 * Whole-word spelling correction across every file that contains a word.
 *
 * Each file is re-read from disk, rewritten in memory with the same boundary
 * rule the index uses, and replaced atomically. A failure on one file is
 * recorded in its result and the batch moves on.
 */

import * as fs from "fs/promises";
import type { CorrectionResult, FileScan, FileWarning, ProgressListener, WordIndex } from "../types";
import { EncodingError, FileWriteError, InvalidReplacementError, WordNotFoundError } from "../errors";
import { findWord, isSingleWord } from "../preprocessing/tokenize";
import { filesContaining, replaceFileScans } from "../indexing/word-index";
import { scanFile } from "../indexing/scanner";
import { writeFileAtomic } from "../utils/atomic-write";
import { decodeUtf8, encodeUtf8 } from "../utils/shared";

export interface CorrectionOptions {
    /** Count what would change without writing anything */
    dryRun?: boolean;
    contextRadius?: number;
    onProgress?: ProgressListener;
}

export interface CorrectionOutcome {
    word: string;
    replacement: string;
    dryRun: boolean;
    results: CorrectionResult[];
    /** Index with the affected files re-scanned (the input index on a dry run) */
    index: WordIndex;
}

const FORBIDDEN_IN_REPLACEMENT = /[\\|\r\n]/;

/**
 * Throws InvalidReplacementError when `replacement` cannot stand in for `target`
 */
export function validateReplacement(target: string, replacement: string): void {
    if (replacement.length === 0) {
        throw new InvalidReplacementError(replacement, "replacement is empty");
    }
    if (replacement === target) {
        throw new InvalidReplacementError(replacement, "replacement is the same as the word");
    }
    if (FORBIDDEN_IN_REPLACEMENT.test(replacement)) {
        throw new InvalidReplacementError(replacement, "backslashes, '|' and line breaks would change the USFM markup");
    }
    // Must re-tokenize as exactly one word
    if (!isSingleWord(replacement)) {
        throw new InvalidReplacementError(replacement, "replacement must be a single word");
    }
}

/**
 * Replace every whole-word match of `target` in `text`. Everything outside the
 * matched spans is returned unchanged.
 */
export function replaceWord(text: string, target: string, replacement: string): { text: string; replacements: number } {
    const matches = findWord(text, target);
    if (matches.length === 0) {
        return { text, replacements: 0 };
    }

    const parts: string[] = [];
    let cursor = 0;
    for (const match of matches) {
        parts.push(text.slice(cursor, match.start), replacement);
        cursor = match.end;
    }
    parts.push(text.slice(cursor));

    return { text: parts.join(""), replacements: matches.length };
}

async function correctFile(file: string, target: string, replacement: string, dryRun: boolean): Promise<CorrectionResult> {
    let bytes: Uint8Array;
    try {
        bytes = await fs.readFile(file);
    } catch (err) {
        return { file, replacements: 0, error: new FileWriteError(file, "read", err) };
    }

    let original: string;
    try {
        original = decodeUtf8(bytes);
    } catch (err) {
        return { file, replacements: 0, error: new EncodingError(file, err) };
    }

    const corrected = replaceWord(original, target, replacement);
    if (corrected.replacements === 0 || dryRun) {
        return { file, replacements: corrected.replacements };
    }

    try {
        await writeFileAtomic(file, encodeUtf8(corrected.text));
    } catch (err) {
        return { file, replacements: 0, error: new FileWriteError(file, "write", err) };
    }
    return { file, replacements: corrected.replacements };
}

/**
 * Replace `target` with `replacement` in every file the index lists for it.
 *
 * Throws WordNotFoundError or InvalidReplacementError before touching any
 * file. Otherwise every affected file gets a result, and the returned index
 * has those files re-scanned.
 */
export async function correctWord(
    index: WordIndex,
    target: string,
    replacement: string,
    options: CorrectionOptions = {}
): Promise<CorrectionOutcome> {
    const { dryRun = false, contextRadius, onProgress } = options;

    // Validating
    const files = filesContaining(index, target);
    if (files.length === 0) {
        throw new WordNotFoundError(target);
    }
    validateReplacement(target, replacement);

    // Rewriting
    onProgress?.({ type: "correct:start", word: target, replacement, fileCount: files.length });
    const results: CorrectionResult[] = [];
    for (const file of files) {
        const result = await correctFile(file, target, replacement, dryRun);
        results.push(result);
        onProgress?.({
            type: "correct:file",
            file,
            done: results.length,
            total: files.length,
            replacements: result.replacements,
            ...(result.error !== undefined && { error: result.error.message }),
        });
    }

    // Reporting
    const replacements = results.reduce((sum, r) => sum + r.replacements, 0);
    const failures = results.filter(r => r.error !== undefined).length;
    onProgress?.({ type: "correct:done", word: target, replacements, failures });

    if (dryRun) {
        return { word: target, replacement, dryRun, results, index };
    }

    const rescanned: FileScan[] = [];
    const warnings: FileWarning[] = [];
    for (const file of files) {
        const outcome = await scanFile(file, contextRadius);
        if (outcome.ok) {
            rescanned.push(outcome.scan);
        } else {
            warnings.push(outcome.warning);
        }
    }

    return {
        word: target,
        replacement,
        dryRun,
        results,
        index: replaceFileScans(index, rescanned, warnings),
    };
}
