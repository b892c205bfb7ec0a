/**
 * USFM tokenizer.
 *
 * A word is a maximal run that starts with a Unicode letter and continues over
 * letters, combining marks and the zero-width joiners. Everything else is a
 * boundary: digits, punctuation, whitespace, hyphens and apostrophes
 * ("crystal-clear" is two words, "don't" is "don" + "t").
 *
 * Markers (`\v`, `\c`, `\f*`, `\+nd`, `\q1`) are never words. A marker swallows
 * the numerals that follow it (`\v 3-4`, `\c 12`, `\v 1a`), identification
 * markers swallow the rest of their line, and a `|` attribute list runs up to
 * the next backslash or line break.
 *
 * Offsets are JavaScript string indices (UTF-16 code units).
 */

export interface WordToken {
    kind: "word";
    word: string;
    start: number;
    end: number;
    line: number; // 1-based
    column: number; // 1-based
}

export interface MarkerToken {
    kind: "marker";
    marker: string; // name without backslash, "+" or "*"
    closing: boolean;
    argument: string;
    start: number;
    end: number;
    line: number;
    column: number;
}

export type UsfmToken = WordToken | MarkerToken;

/** Markers whose whole line is metadata rather than scripture text */
const IDENTIFICATION_MARKERS = new Set(["id", "ide", "usfm", "sts", "rem"]);

const MARKER_PATTERN = /\\(\+?)([A-Za-z0-9]*)(\*?)/y;
const NUMERAL_ARGUMENT_PATTERN = /[ \t]+(\d+[a-z]?(?:[-,\u2013]\d+[a-z]?)*)(?!\p{L})/uy;
const REST_OF_LINE_PATTERN = /[^\r\n]*/y;
const ATTRIBUTE_PATTERN = /\|[^\\\r\n]*/y;
const WORD_PATTERN = /\p{L}[\p{L}\p{M}\u200C\u200D]*/uy;

/**
 * Offsets at which each line starts. Handles \n, \r\n and lone \r.
 */
export function lineStarts(text: string): number[] {
    const starts = [0];
    for (let i = 0; i < text.length; i++) {
        const ch = text[i];
        if (ch === "\r") {
            if (text[i + 1] === "\n") i++;
            starts.push(i + 1);
        } else if (ch === "\n") {
            starts.push(i + 1);
        }
    }
    return starts;
}

/**
 * Text from `offset` to the end of its line, trimmed
 */
export function restOfLine(text: string, offset: number): string {
    REST_OF_LINE_PATTERN.lastIndex = offset;
    const match = REST_OF_LINE_PATTERN.exec(text);
    return match ? match[0].trim() : "";
}

function* scan(text: string): Generator<UsfmToken> {
    const starts = lineStarts(text);
    let lineIndex = 0;

    // Tokens come out in ascending offset order, so the line pointer only moves forward
    const position = (offset: number): { line: number; column: number } => {
        while (lineIndex + 1 < starts.length && (starts[lineIndex + 1] ?? Infinity) <= offset) {
            lineIndex++;
        }
        return { line: lineIndex + 1, column: offset - (starts[lineIndex] ?? 0) + 1 };
    };

    let i = 0;
    while (i < text.length) {
        const ch = text[i];

        if (ch === "\\") {
            MARKER_PATTERN.lastIndex = i;
            const marker = MARKER_PATTERN.exec(text);
            if (marker) {
                const name = marker[2] ?? "";
                const closing = marker[3] === "*";
                let end = MARKER_PATTERN.lastIndex;
                let argument = "";

                if (IDENTIFICATION_MARKERS.has(name) && !closing) {
                    REST_OF_LINE_PATTERN.lastIndex = end;
                    const rest = REST_OF_LINE_PATTERN.exec(text);
                    if (rest) {
                        argument = rest[0].trim();
                        end = REST_OF_LINE_PATTERN.lastIndex;
                    }
                } else if (!closing) {
                    NUMERAL_ARGUMENT_PATTERN.lastIndex = end;
                    const numerals = NUMERAL_ARGUMENT_PATTERN.exec(text);
                    if (numerals) {
                        argument = numerals[1] ?? "";
                        end = NUMERAL_ARGUMENT_PATTERN.lastIndex;
                    }
                }

                yield { kind: "marker", marker: name, closing, argument, start: i, end, ...position(i) };
                i = Math.max(end, i + 1);
                continue;
            }
        }

        if (ch === "|") {
            ATTRIBUTE_PATTERN.lastIndex = i;
            if (ATTRIBUTE_PATTERN.exec(text)) {
                i = Math.max(ATTRIBUTE_PATTERN.lastIndex, i + 1);
                continue;
            }
        }

        WORD_PATTERN.lastIndex = i;
        const word = WORD_PATTERN.exec(text);
        if (word) {
            const end = WORD_PATTERN.lastIndex;
            yield { kind: "word", word: word[0], start: i, end, ...position(i) };
            i = end;
            continue;
        }

        // Step over the whole code point so a surrogate pair is never split
        const codePoint = text.codePointAt(i) ?? 0;
        i += codePoint > 0xffff ? 2 : 1;
    }
}

/**
 * Tokenize USFM text. The result is lazy and restartable: every iteration
 * scans the text again from the start.
 */
export function tokenize(text: string): Iterable<UsfmToken> {
    return { [Symbol.iterator]: () => scan(text) };
}

/**
 * Word tokens only
 */
export function words(text: string): Iterable<WordToken> {
    return {
        *[Symbol.iterator]() {
            for (const token of scan(text)) {
                if (token.kind === "word") yield token;
            }
        },
    };
}

/**
 * Whole-word, exact-case matches of `target`, using the same boundary rule as
 * the index so that what the index reports is exactly what gets matched
 */
export function findWord(text: string, target: string): WordToken[] {
    const matches: WordToken[] = [];
    for (const token of words(text)) {
        if (token.word === target) {
            matches.push(token);
        }
    }
    return matches;
}

/**
 * Count of each distinct word in the text
 */
export function countWords(text: string): Map<string, number> {
    const counts = new Map<string, number>();
    for (const token of words(text)) {
        counts.set(token.word, (counts.get(token.word) ?? 0) + 1);
    }
    return counts;
}

/**
 * True when `candidate` is exactly one word under the tokenizer's rule
 */
export function isSingleWord(candidate: string): boolean {
    const iterator = words(candidate)[Symbol.iterator]();
    const first = iterator.next();
    if (first.done) return false;
    return first.value.start === 0 && first.value.end === candidate.length && iterator.next().done === true;
}
