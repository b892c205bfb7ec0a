import * as cheerio from "cheerio";
import { Text } from "domhandler";
import type { Occurrence, WordIndex } from "../types";
import { occurrencesOf } from "../indexing/word-index";
import { displayPath, formatReference } from "../utils/shared";

/**
 * Split an occurrence's context around the word
 */
export function splitContext(occurrence: Occurrence): { before: string; word: string; after: string } {
    const start = occurrence.contextOffset;
    const end = start + occurrence.word.length;
    return {
        before: occurrence.context.slice(0, start),
        word: occurrence.context.slice(start, end),
        after: occurrence.context.slice(end),
    };
}

/**
 * "Genesis 1:6" when the verse is known, else "path:line:column"
 */
export function occurrenceLabel(root: string, occurrence: Occurrence): string {
    const location = `${displayPath(root, occurrence.file)}:${occurrence.line}:${occurrence.column}`;
    return occurrence.reference ? `${formatReference(occurrence.reference)} (${location})` : location;
}

/**
 * One line per occurrence, the word wrapped in [brackets]
 */
export function formatOccurrences(index: WordIndex, word: string): string {
    const occurrences = occurrencesOf(index, word);
    if (occurrences.length === 0) {
        return `No occurrences of "${word}"`;
    }

    const lines = [`${occurrences.length} occurrence(s) of "${word}":`];
    for (const occurrence of occurrences) {
        const { before, word: matched, after } = splitContext(occurrence);
        lines.push(`  ${occurrenceLabel(index.root, occurrence)}: ${before}[${matched}]${after}`);
    }
    return lines.join("\n");
}

/**
 * Standalone HTML page listing the occurrences, each under its reference with
 * the word in <mark>
 */
export function renderOccurrencesHtml(index: WordIndex, word: string): string {
    const $ = cheerio.load('<!DOCTYPE html><html><head><meta charset="utf-8"><title></title></head><body></body></html>');
    const occurrences = occurrencesOf(index, word);

    $("title").text(`Occurrences of ${word}`);
    const body = $("body");
    body.append($("<h1>").text(`${occurrences.length} occurrence(s) of "${word}"`));

    for (const occurrence of occurrences) {
        const { before, word: matched, after } = splitContext(occurrence);
        const paragraph = $("<p>");
        paragraph.append(new Text(before));
        paragraph.append($("<mark>").text(matched));
        paragraph.append(new Text(after));
        body.append($("<h4>").text(occurrenceLabel(index.root, occurrence)));
        body.append(paragraph);
    }

    return $.html();
}
