import * as path from "path";
import type { FileScan, FileWarning, Occurrence, WordEntry, WordIndex } from "../types";
import { compareCodeUnits } from "../utils/shared";

function byRelativePath(root: string) {
    return (a: { file: string }, b: { file: string }): number =>
        compareCodeUnits(path.relative(root, a.file), path.relative(root, b.file));
}

/**
 * Assemble an index from per-file scans. Files are ordered by path relative to
 * the root, so every entry lists its occurrences in directory order, then in
 * file order.
 */
export function createIndex(
    root: string,
    files: readonly FileScan[],
    warnings: readonly FileWarning[] = []
): WordIndex {
    const sortedFiles = [...files].sort(byRelativePath(root));
    const grouped = new Map<string, Occurrence[]>();

    for (const scan of sortedFiles) {
        for (const occurrence of scan.occurrences) {
            const list = grouped.get(occurrence.word);
            if (list) {
                list.push(occurrence);
            } else {
                grouped.set(occurrence.word, [occurrence]);
            }
        }
    }

    const entries = new Map<string, WordEntry>();
    for (const [word, occurrences] of grouped) {
        entries.set(word, { word, occurrences });
    }

    return {
        root,
        files: sortedFiles,
        entries,
        warnings: [...warnings].sort(byRelativePath(root)),
        builtAt: new Date(),
    };
}

/**
 * Every occurrence of `word` (exact case), in scan order; empty when absent
 */
export function occurrencesOf(index: WordIndex, word: string): readonly Occurrence[] {
    return index.entries.get(word)?.occurrences ?? [];
}

/**
 * Distinct files that contain `word`, in scan order
 */
export function filesContaining(index: WordIndex, word: string): string[] {
    const files: string[] = [];
    for (const occurrence of occurrencesOf(index, word)) {
        if (files[files.length - 1] !== occurrence.file) {
            files.push(occurrence.file);
        }
    }
    return files;
}

/**
 * New index in which the scans of the given files are replaced by fresh ones.
 * Files named in `warnings` could not be re-scanned: they leave the index and
 * the warning is kept instead.
 */
export function replaceFileScans(
    index: WordIndex,
    updated: readonly FileScan[],
    warnings: readonly FileWarning[]
): WordIndex {
    const touched = new Set([...updated.map(s => s.file), ...warnings.map(w => w.file)]);
    const keptFiles = index.files.filter(scan => !touched.has(scan.file));
    const keptWarnings = index.warnings.filter(w => !touched.has(w.file));
    return createIndex(index.root, [...keptFiles, ...updated], [...keptWarnings, ...warnings]);
}

export interface IndexStats {
    files: number;
    words: number;
    occurrences: number;
}

export function indexStats(index: WordIndex): IndexStats {
    let occurrences = 0;
    for (const scan of index.files) {
        occurrences += scan.occurrences.length;
    }
    return { files: index.files.length, words: index.entries.size, occurrences };
}
