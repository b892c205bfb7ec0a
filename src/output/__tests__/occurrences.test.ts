import { describe, it, expect } from "vitest";
import { formatOccurrences, occurrenceLabel, renderOccurrencesHtml, splitContext } from "../occurrences";
import { createIndex } from "../../indexing/word-index";
import { scanText } from "../../indexing/scanner";

const genesis = createIndex("/r", [scanText("/r/01-GEN.usfm", "\\c 1\n\\v 1 In the beginning")]);

describe("splitContext", () => {
    it("splits around the word", () => {
        const occurrence = genesis.entries.get("the")?.occurrences[0];

        expect(occurrence && splitContext(occurrence)).toEqual({ before: "\\v 1 In ", word: "the", after: " beginning" });
    });
});

describe("occurrenceLabel", () => {
    it("falls back to the location when there is no verse", () => {
        const index = createIndex("/r", [scanText("/r/sub/a.usfm", "plain the")]);
        const occurrence = index.entries.get("the")?.occurrences[0];

        expect(occurrence && occurrenceLabel("/r", occurrence)).toBe("sub/a.usfm:1:7");
    });
});

describe("formatOccurrences", () => {
    it("lists each occurrence with its reference and the word in brackets", () => {
        expect(formatOccurrences(genesis, "the")).toBe(
            '1 occurrence(s) of "the":\n  01-GEN 1:1 (01-GEN.usfm:2:9): \\v 1 In [the] beginning'
        );
    });

    it("reports a missing word", () => {
        expect(formatOccurrences(genesis, "xyz")).toBe('No occurrences of "xyz"');
    });
});

describe("renderOccurrencesHtml", () => {
    it("marks the word under its reference", () => {
        const html = renderOccurrencesHtml(genesis, "the");

        expect(html).toContain("<title>Occurrences of the</title>");
        expect(html).toContain("<h4>01-GEN 1:1 (01-GEN.usfm:2:9)</h4>");
        expect(html).toContain("<p>\\v 1 In <mark>the</mark> beginning</p>");
    });

    it("escapes the surrounding text", () => {
        const index = createIndex("/r", [scanText("/r/a.usfm", "a<b the")]);

        const html = renderOccurrencesHtml(index, "the");

        expect(html).toContain("<p>a&lt;b <mark>the</mark></p>");
    });
});
