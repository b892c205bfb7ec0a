import * as fs from "fs/promises";
import * as path from "path";
import { randomBytes } from "crypto";
import { errnoCode } from "../errors";

/**
 * Replace `filePath` with `data` so that readers see either the old or the new
 * content, never a partial file. The data goes to a temporary file in the same
 * directory (same file system, so the rename is atomic), is flushed to disk,
 * and is then renamed over the original; the directory is flushed last so the
 * rename itself is durable. The original's permission bits carry
 * over when it exists.
 */
export async function writeFileAtomic(filePath: string, data: string | Uint8Array): Promise<void> {
    const dir = path.dirname(filePath);
    const tempPath = path.join(dir, `.${path.basename(filePath)}.${randomBytes(6).toString("hex")}.tmp`);

    let mode: number | undefined;
    try {
        mode = (await fs.stat(filePath)).mode & 0o7777;
    } catch (err) {
        // New file: default permissions
        if (errnoCode(err) !== "ENOENT") throw err;
    }

    try {
        const handle = await fs.open(tempPath, "wx", mode);
        try {
            // The umask may have narrowed the mode given to open
            if (mode !== undefined) await handle.chmod(mode);
            await handle.writeFile(data);
            await handle.sync();
        } finally {
            await handle.close();
        }
        await fs.rename(tempPath, filePath);
    } catch (err) {
        // Clean up temp file on error
        await fs.rm(tempPath, { force: true });
        throw err;
    }

    await syncDirectory(dir);
}

/** Errors from platforms and file systems that cannot fsync a directory */
const DIRECTORY_SYNC_UNSUPPORTED = new Set(["EISDIR", "EPERM", "EINVAL", "ENOTSUP", "EACCES"]);

/**
 * Flush a directory entry so a rename inside it survives a crash. Windows
 * cannot open a directory for syncing, so there it is a no-op.
 */
export async function syncDirectory(dir: string): Promise<void> {
    if (process.platform === "win32") return;

    let handle: fs.FileHandle;
    try {
        handle = await fs.open(dir, "r");
    } catch (err) {
        if (DIRECTORY_SYNC_UNSUPPORTED.has(errnoCode(err) ?? "")) return;
        throw err;
    }

    try {
        await handle.sync();
    } catch (err) {
        if (!DIRECTORY_SYNC_UNSUPPORTED.has(errnoCode(err) ?? "")) throw err;
    } finally {
        await handle.close();
    }
}
