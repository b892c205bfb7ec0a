import type { WordIndex } from "../types";
import { compareCodeUnits } from "../utils/shared";

export type WordListSort = "count" | "word";

export interface WordListOptions {
    /** Case-insensitive substring the word must contain */
    filter?: string;
    sort?: WordListSort;
    limit?: number;
}

export interface WordListRow {
    word: string;
    count: number;
    files: number;
}

/**
 * Frequency view of the index. Sorted by count descending with ties broken
 * alphabetically, or purely alphabetically with `sort: "word"`.
 */
export function buildWordList(index: WordIndex, options: WordListOptions = {}): WordListRow[] {
    const { filter = "", sort = "count", limit } = options;
    const needle = filter.toLowerCase();

    const rows: WordListRow[] = [];
    for (const entry of index.entries.values()) {
        if (needle && !entry.word.toLowerCase().includes(needle)) continue;
        const files = new Set(entry.occurrences.map(o => o.file));
        rows.push({ word: entry.word, count: entry.occurrences.length, files: files.size });
    }

    rows.sort((a, b) => {
        if (sort === "count") {
            const countDiff = b.count - a.count;
            if (countDiff !== 0) return countDiff;
        }
        return compareCodeUnits(a.word, b.word);
    });

    return limit !== undefined && limit >= 0 ? rows.slice(0, limit) : rows;
}

/**
 * Two aligned columns: count, then word
 */
export function formatWordList(rows: readonly WordListRow[]): string {
    if (rows.length === 0) return "(no words)";
    const width = Math.max(...rows.map(r => String(r.count).length));
    return rows.map(r => `${String(r.count).padStart(width)}  ${r.word}`).join("\n");
}

function csvField(value: string): string {
    return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * "Word,Count" CSV in alphabetical order
 */
export function toCsv(rows: readonly WordListRow[]): string {
    const sorted = [...rows].sort((a, b) => compareCodeUnits(a.word, b.word));
    const lines = ["Word,Count", ...sorted.map(r => `${csvField(r.word)},${r.count}`)];
    return lines.join("\n") + "\n";
}
