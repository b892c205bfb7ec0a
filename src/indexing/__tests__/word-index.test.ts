import { describe, it, expect } from "vitest";
import { createIndex, filesContaining, indexStats, occurrencesOf, replaceFileScans } from "../word-index";
import { scanText } from "../scanner";
import { FileReadError } from "../../errors";

const root = "/bible";

describe("createIndex", () => {
    it("orders occurrences by file path, then by position", () => {
        const index = createIndex(root, [
            scanText("/bible/b.usfm", "the end"),
            scanText("/bible/a.usfm", "the the"),
        ]);

        expect(occurrencesOf(index, "the").map(o => [o.file, o.offset])).toEqual([
            ["/bible/a.usfm", 0],
            ["/bible/a.usfm", 4],
            ["/bible/b.usfm", 0],
        ]);
        expect(filesContaining(index, "the")).toEqual(["/bible/a.usfm", "/bible/b.usfm"]);
    });

    it("returns nothing for an absent word", () => {
        const index = createIndex(root, [scanText("/bible/a.usfm", "word")]);

        expect(occurrencesOf(index, "missing")).toEqual([]);
        expect(filesContaining(index, "missing")).toEqual([]);
    });

    it("reports totals", () => {
        const index = createIndex(root, [
            scanText("/bible/a.usfm", "the the cat"),
            scanText("/bible/b.usfm", "dog"),
        ]);

        expect(indexStats(index)).toEqual({ files: 2, words: 3, occurrences: 4 });
    });
});

describe("replaceFileScans", () => {
    it("swaps in fresh scans and leaves the input index untouched", () => {
        const original = createIndex(root, [
            scanText("/bible/a.usfm", "teh cat"),
            scanText("/bible/b.usfm", "teh dog"),
        ]);

        const updated = replaceFileScans(original, [scanText("/bible/a.usfm", "the cat")], []);

        expect(filesContaining(updated, "teh")).toEqual(["/bible/b.usfm"]);
        expect(filesContaining(updated, "the")).toEqual(["/bible/a.usfm"]);
        expect(filesContaining(original, "teh")).toEqual(["/bible/a.usfm", "/bible/b.usfm"]);
    });

    it("drops files that could not be re-scanned and keeps the warning", () => {
        const original = createIndex(root, [
            scanText("/bible/a.usfm", "teh"),
            scanText("/bible/b.usfm", "teh"),
        ]);
        const warning = { file: "/bible/b.usfm", error: new FileReadError("/bible/b.usfm", new Error("gone")) };

        const updated = replaceFileScans(original, [], [warning]);

        expect(updated.files.map(f => f.file)).toEqual(["/bible/a.usfm"]);
        expect(updated.warnings).toEqual([warning]);
    });
});
