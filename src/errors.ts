/**
 * Error taxonomy for scanning, correcting and publishing.
 *
 * Directory-level and precondition errors are thrown and abort an operation
 * before any work begins. File-level errors are never thrown out of a batch:
 * they are attached to the scan warnings or to the per-file correction results.
 */

export type SpellerErrorCode =
    | "SCAN_FAILED"
    | "SCAN_CANCELLED"
    | "FILE_READ_FAILED"
    | "FILE_WRITE_FAILED"
    | "ENCODING_INVALID"
    | "WORD_NOT_FOUND"
    | "INVALID_REPLACEMENT"
    | "REPOSITORY_FAILED"
    | "SETTINGS_INVALID"
    | "SESSION_STATE";

export class SpellerError extends Error {
    public readonly code: SpellerErrorCode;

    constructor(message: string, code: SpellerErrorCode, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = "SpellerError";
        this.code = code;
        // This is needed in TypeScript when extending built-in classes
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/** Root directory missing, not a directory, or unreadable */
export class ScanError extends SpellerError {
    constructor(public readonly directory: string, reason: string, cause?: unknown) {
        super(`Cannot scan ${directory}: ${reason}`, "SCAN_FAILED", cause);
        this.name = "ScanError";
    }
}

export class ScanCancelledError extends SpellerError {
    constructor(public readonly directory: string) {
        super(`Scan of ${directory} was cancelled`, "SCAN_CANCELLED");
        this.name = "ScanCancelledError";
    }
}

export class FileReadError extends SpellerError {
    constructor(public readonly file: string, cause: unknown) {
        super(`Failed to read ${file}: ${describeError(cause)}`, "FILE_READ_FAILED", cause);
        this.name = "FileReadError";
    }
}

export type WritePhase = "read" | "write";

export class FileWriteError extends SpellerError {
    constructor(
        public readonly file: string,
        public readonly phase: WritePhase,
        cause: unknown
    ) {
        const action = phase === "read" ? "re-read before rewrite" : "rewrite";
        super(`Failed to ${action} ${file}: ${describeError(cause)}`, "FILE_WRITE_FAILED", cause);
        this.name = "FileWriteError";
    }
}

export class EncodingError extends SpellerError {
    constructor(public readonly file: string, cause?: unknown) {
        super(`${file} is not valid UTF-8`, "ENCODING_INVALID", cause);
        this.name = "EncodingError";
    }
}

export class WordNotFoundError extends SpellerError {
    constructor(public readonly word: string) {
        super(`"${word}" does not occur in the current index`, "WORD_NOT_FOUND");
        this.name = "WordNotFoundError";
    }
}

export class InvalidReplacementError extends SpellerError {
    constructor(public readonly replacement: string, reason: string) {
        super(`Invalid replacement "${replacement}": ${reason}`, "INVALID_REPLACEMENT");
        this.name = "InvalidReplacementError";
    }
}

export type RepositoryStep = "stage" | "commit" | "push";

/** Git failure, message relayed verbatim from the git process */
export class RepositoryError extends SpellerError {
    constructor(public readonly step: RepositoryStep, message: string, cause?: unknown) {
        super(message, "REPOSITORY_FAILED", cause);
        this.name = "RepositoryError";
    }
}

export class SettingsError extends SpellerError {
    constructor(public readonly file: string, reason: string, cause?: unknown) {
        super(`Invalid settings in ${file}: ${reason}`, "SETTINGS_INVALID", cause);
        this.name = "SettingsError";
    }
}

export class SessionStateError extends SpellerError {
    constructor(message: string) {
        super(message, "SESSION_STATE");
        this.name = "SessionStateError";
    }
}

/** Errors that belong to a single file and are reported rather than thrown */
export type FileError = FileReadError | FileWriteError | EncodingError;

export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/** Node's errno code (ENOENT, EACCES, ...) when the value carries one */
export function errnoCode(err: unknown): string | undefined {
    if (err instanceof Error && "code" in err && typeof err.code === "string") {
        return err.code;
    }
    return undefined;
}
