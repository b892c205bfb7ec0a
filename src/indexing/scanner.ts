/**
 * Index builder: walks a directory of USFM files and collects every word
 * occurrence with its position, surrounding text and verse reference.
 */

import * as fs from "fs/promises";
import type { Dirent, Stats } from "fs";
import * as path from "path";
import type { FileScan, FileWarning, Occurrence, ProgressListener, VerseReference, WordIndex } from "../types";
import { EncodingError, FileReadError, ScanCancelledError, ScanError, describeError, errnoCode } from "../errors";
import { lineStarts, restOfLine, tokenize } from "../preprocessing/tokenize";
import { createIndex } from "./word-index";
import { compareCodeUnits, decodeUtf8 } from "../utils/shared";

export interface ScanOptions {
    /** File extensions to include, compared case-insensitively */
    extensions?: readonly string[];
    /** Characters of context kept on each side of a word */
    contextRadius?: number;
    signal?: AbortSignal;
    onProgress?: ProgressListener;
}

export const DEFAULT_SCAN_OPTIONS = {
    extensions: [".usfm"],
    contextRadius: 40,
} as const;

export type FileScanOutcome =
    | { ok: true; scan: FileScan }
    | { ok: false; warning: FileWarning };

interface ReferenceState {
    bookCode: string;
    heading: string;
    chapter: number | null;
    verse: number | null;
}

function parseNumber(argument: string): number | null {
    const value = parseInt(argument, 10);
    return Number.isNaN(value) ? null : value;
}

function currentReference(state: ReferenceState, fallbackBook: string): VerseReference | null {
    if (state.chapter === null || state.verse === null) return null;
    return {
        book: state.heading || state.bookCode || fallbackBook,
        chapter: state.chapter,
        verse: state.verse,
    };
}

/**
 * Window of the word's line around [start, end), trimmed, with "..." where the
 * line was cut
 */
function captureContext(
    text: string,
    lineStart: number,
    lineEnd: number,
    start: number,
    end: number,
    radius: number
): { context: string; contextOffset: number } {
    const from = Math.max(lineStart, start - radius);
    const to = Math.min(lineEnd, end + radius);
    const raw = text.slice(from, to);
    const leading = raw.length - raw.trimStart().length;
    const prefix = from > lineStart ? "..." : "";
    const suffix = to < lineEnd ? "..." : "";
    return {
        context: prefix + raw.trim() + suffix,
        contextOffset: prefix.length + (start - from - leading),
    };
}

/**
 * Collect the occurrences in one file's text
 */
export function scanText(file: string, text: string, contextRadius: number = DEFAULT_SCAN_OPTIONS.contextRadius): FileScan {
    const starts = lineStarts(text);
    const fallbackBook = path.basename(file, path.extname(file));
    const state: ReferenceState = { bookCode: "", heading: "", chapter: null, verse: null };
    const occurrences: Occurrence[] = [];

    for (const token of tokenize(text)) {
        if (token.kind === "marker") {
            if (token.closing) continue;
            switch (token.marker) {
                case "id":
                    state.bookCode = token.argument.split(/\s+/)[0] ?? "";
                    break;
                case "h":
                    state.heading = restOfLine(text, token.end);
                    break;
                case "c":
                    state.chapter = parseNumber(token.argument);
                    state.verse = null;
                    break;
                case "v":
                    state.verse = parseNumber(token.argument);
                    break;
            }
            continue;
        }

        const lineStart = starts[token.line - 1] ?? 0;
        let lineEnd = starts[token.line] ?? text.length;
        while (lineEnd > lineStart && (text[lineEnd - 1] === "\n" || text[lineEnd - 1] === "\r")) {
            lineEnd--;
        }

        occurrences.push({
            word: token.word,
            file,
            offset: token.start,
            line: token.line,
            column: token.column,
            ...captureContext(text, lineStart, lineEnd, token.start, token.end, contextRadius),
            reference: currentReference(state, fallbackBook),
        });
    }

    return { file, occurrences };
}

/**
 * Read, decode and scan one file. Read and decode failures come back as a
 * warning instead of being thrown.
 */
export async function scanFile(file: string, contextRadius?: number): Promise<FileScanOutcome> {
    let bytes: Uint8Array;
    try {
        bytes = await fs.readFile(file);
    } catch (err) {
        return { ok: false, warning: { file, error: new FileReadError(file, err) } };
    }

    let text: string;
    try {
        text = decodeUtf8(bytes);
    } catch (err) {
        return { ok: false, warning: { file, error: new EncodingError(file, err) } };
    }

    return { ok: true, scan: scanText(file, text, contextRadius) };
}

function matchesExtension(name: string, extensions: readonly string[]): boolean {
    const lower = name.toLowerCase();
    return extensions.some(ext => lower.endsWith(ext.toLowerCase()));
}

/**
 * Recursively list matching files under `root`, sorted by relative path.
 * Hidden entries (.git and friends) and symbolic links are skipped.
 */
export async function listUsfmFiles(
    root: string,
    extensions: readonly string[] = DEFAULT_SCAN_OPTIONS.extensions
): Promise<{ files: string[]; warnings: FileWarning[] }> {
    const resolved = path.resolve(root);

    let stat: Stats;
    try {
        stat = await fs.stat(resolved);
    } catch (err) {
        const reason = errnoCode(err) === "ENOENT" ? "directory does not exist" : describeError(err);
        throw new ScanError(resolved, reason, err);
    }
    if (!stat.isDirectory()) {
        throw new ScanError(resolved, "not a directory");
    }

    let rootEntries: Dirent[];
    try {
        rootEntries = await fs.readdir(resolved, { withFileTypes: true });
    } catch (err) {
        throw new ScanError(resolved, `directory is not readable (${describeError(err)})`, err);
    }

    const files: string[] = [];
    const warnings: FileWarning[] = [];

    const visit = async (dir: string, entries: Dirent[]): Promise<void> => {
        for (const entry of entries) {
            if (entry.name.startsWith(".")) continue;
            const fullPath = path.join(dir, entry.name);

            if (entry.isDirectory()) {
                let children: Dirent[];
                try {
                    children = await fs.readdir(fullPath, { withFileTypes: true });
                } catch (err) {
                    warnings.push({ file: fullPath, error: new FileReadError(fullPath, err) });
                    continue;
                }
                await visit(fullPath, children);
            } else if (entry.isFile() && matchesExtension(entry.name, extensions)) {
                files.push(fullPath);
            }
        }
    };

    await visit(resolved, rootEntries);

    files.sort((a, b) => compareCodeUnits(path.relative(resolved, a), path.relative(resolved, b)));
    return { files, warnings };
}

/**
 * Build a fresh index of `directory`.
 *
 * Throws ScanError when the directory cannot be scanned at all, and
 * ScanCancelledError when `signal` aborts; in both cases no index is produced.
 * Files that cannot be read or decoded are left out and reported in
 * `index.warnings`.
 */
export async function buildIndex(directory: string, options: ScanOptions = {}): Promise<WordIndex> {
    const {
        extensions = DEFAULT_SCAN_OPTIONS.extensions,
        contextRadius = DEFAULT_SCAN_OPTIONS.contextRadius,
        signal,
        onProgress,
    } = options;
    const root = path.resolve(directory);

    const listing = await listUsfmFiles(root, extensions);
    const warnings: FileWarning[] = [...listing.warnings];
    const scans: FileScan[] = [];

    onProgress?.({ type: "scan:start", directory: root, fileCount: listing.files.length });
    for (const warning of listing.warnings) {
        onProgress?.({ type: "scan:warning", file: warning.file, message: warning.error.message });
    }

    let done = 0;
    for (const file of listing.files) {
        if (signal?.aborted) {
            throw new ScanCancelledError(root);
        }

        const outcome = await scanFile(file, contextRadius);
        done++;
        if (outcome.ok) {
            scans.push(outcome.scan);
            onProgress?.({ type: "scan:file", file, done, total: listing.files.length, words: outcome.scan.occurrences.length });
        } else {
            warnings.push(outcome.warning);
            onProgress?.({ type: "scan:warning", file, message: outcome.warning.error.message });
        }
    }

    if (signal?.aborted) {
        throw new ScanCancelledError(root);
    }

    const index = createIndex(root, scans, warnings);
    onProgress?.({
        type: "scan:done",
        directory: root,
        files: scans.length,
        words: index.entries.size,
        occurrences: scans.reduce((sum, s) => sum + s.occurrences.length, 0),
    });
    return index;
}
