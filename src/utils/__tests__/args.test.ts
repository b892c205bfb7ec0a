import { describe, it, expect } from "vitest";
import { parseArgs } from "../args";

describe("parseArgs", () => {
    it("separates command, positionals, options and flags", () => {
        const args = parseArgs(["fix", "teh", "the", "--dir", "/bible", "--dry-run", "-t"]);

        expect(args.command).toBe("fix");
        expect(args.positionals).toEqual(["teh", "the"]);
        expect(args.values.get("--dir")).toBe("/bible");
        expect([...args.flags]).toEqual(["--dry-run", "--timing"]);
    });

    it("ignores a bare double dash", () => {
        const args = parseArgs(["--", "words", "--limit", "5"]);

        expect(args.command).toBe("words");
        expect(args.values.get("--limit")).toBe("5");
    });

    it("maps -h to --help and allows no command", () => {
        const args = parseArgs(["-h"]);

        expect(args.command).toBeUndefined();
        expect(args.flags.has("--help")).toBe(true);
    });

    it("requires a value for valued options", () => {
        expect(() => parseArgs(["words", "--filter"])).toThrow("--filter requires a value");
    });
});
