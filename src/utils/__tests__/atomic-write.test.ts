import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { syncDirectory, writeFileAtomic } from "../atomic-write";
import { makeTempDir, readText, removeDir, writeFiles } from "../../__tests__/helpers/fixtures";

describe("writeFileAtomic", () => {
    let dir: string;

    beforeEach(() => {
        dir = makeTempDir();
    });

    afterEach(() => {
        removeDir(dir);
    });

    it("creates a new file", async () => {
        const file = path.join(dir, "new.usfm");

        await writeFileAtomic(file, "\\v 1 text");

        expect(readText(file)).toBe("\\v 1 text");
        expect(fs.readdirSync(dir)).toEqual(["new.usfm"]);
    });

    it("replaces an existing file and keeps its permissions", async () => {
        const [file] = writeFiles(dir, { "a.usfm": "old" });
        fs.chmodSync(file ?? "", 0o640);

        await writeFileAtomic(file ?? "", new Uint8Array([0x6e, 0x65, 0x77]));

        expect(readText(file ?? "")).toBe("new");
        expect(fs.statSync(file ?? "").mode & 0o777).toBe(0o640);
        expect(fs.readdirSync(dir)).toEqual(["a.usfm"]);
    });

    it("fails when the directory does not exist", async () => {
        await expect(writeFileAtomic(path.join(dir, "missing", "a.usfm"), "x")).rejects.toThrow();
    });
});

describe("syncDirectory", () => {
    let dir: string;

    beforeEach(() => {
        dir = makeTempDir();
    });

    afterEach(() => {
        removeDir(dir);
    });

    it("flushes an existing directory", async () => {
        await expect(syncDirectory(dir)).resolves.toBeUndefined();
    });

    it.skipIf(process.platform === "win32")("fails for a directory that does not exist", async () => {
        await expect(syncDirectory(path.join(dir, "missing"))).rejects.toMatchObject({ code: "ENOENT" });
    });
});
