import * as fs from "fs";
import * as os from "os";
import * as path from "path";

/**
 * Fresh temporary directory for a test
 */
export function makeTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), "usfm-speller-"));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Write files relative to `root`, creating directories as needed.
 * Returns the absolute paths in the order given.
 */
export function writeFiles(root: string, files: Record<string, string | Uint8Array>): string[] {
    return Object.entries(files).map(([name, content]) => {
        const fullPath = path.join(root, name);
        fs.mkdirSync(path.dirname(fullPath), { recursive: true });
        fs.writeFileSync(fullPath, content);
        return fullPath;
    });
}

export function readText(file: string): string {
    return fs.readFileSync(file, "utf8");
}
