import type { FileError, RepositoryStep } from "./errors";

export interface VerseReference {
    book: string;
    chapter: number;
    verse: number;
}

export interface Occurrence {
    word: string;
    file: string;
    offset: number; // UTF-16 code unit index of the first character
    line: number; // 1-based
    column: number; // 1-based
    context: string;
    contextOffset: number; // where `word` starts inside `context`
    reference: VerseReference | null;
}

export interface WordEntry {
    word: string;
    occurrences: readonly Occurrence[];
}

/** Occurrences found in one file, in file order */
export interface FileScan {
    file: string;
    occurrences: readonly Occurrence[];
}

export interface FileWarning {
    file: string;
    error: FileError;
}

/**
 * Snapshot of the words on disk when the scan completed.
 * Never mutated; operations that change it return a new index.
 */
export interface WordIndex {
    root: string;
    files: readonly FileScan[]; // sorted by path relative to root
    entries: ReadonlyMap<string, WordEntry>;
    warnings: readonly FileWarning[];
    builtAt: Date;
}

export interface CorrectionResult {
    file: string;
    replacements: number;
    error?: FileError;
}

export type ProgressEvent =
    | { type: "scan:start"; directory: string; fileCount: number }
    | { type: "scan:file"; file: string; done: number; total: number; words: number }
    | { type: "scan:warning"; file: string; message: string }
    | { type: "scan:done"; directory: string; files: number; words: number; occurrences: number }
    | { type: "correct:start"; word: string; replacement: string; fileCount: number }
    | { type: "correct:file"; file: string; done: number; total: number; replacements: number; error?: string }
    | { type: "correct:done"; word: string; replacements: number; failures: number }
    | { type: "publish:step"; step: RepositoryStep; success: boolean; message: string };

export type ProgressListener = (event: ProgressEvent) => void;
