/**
 * Public API: scan a USFM directory, inspect words, correct them in place and
 * publish the changes.
 */

export type {
    CorrectionResult,
    FileScan,
    FileWarning,
    Occurrence,
    ProgressEvent,
    ProgressListener,
    VerseReference,
    WordEntry,
    WordIndex,
} from "./types";

export {
    SpellerError,
    ScanError,
    ScanCancelledError,
    FileReadError,
    FileWriteError,
    EncodingError,
    WordNotFoundError,
    InvalidReplacementError,
    RepositoryError,
    SettingsError,
    SessionStateError,
    describeError,
} from "./errors";
export type { FileError, RepositoryStep, SpellerErrorCode, WritePhase } from "./errors";

export { tokenize, words, findWord, countWords, isSingleWord } from "./preprocessing/tokenize";
export type { MarkerToken, UsfmToken, WordToken } from "./preprocessing/tokenize";

export { buildIndex, listUsfmFiles, scanFile, scanText, DEFAULT_SCAN_OPTIONS } from "./indexing/scanner";
export type { ScanOptions } from "./indexing/scanner";
export { createIndex, occurrencesOf, filesContaining, indexStats } from "./indexing/word-index";
export type { IndexStats } from "./indexing/word-index";

export { correctWord, replaceWord, validateReplacement } from "./correction/corrector";
export type { CorrectionOptions, CorrectionOutcome } from "./correction/corrector";

export { buildWordList, formatWordList, toCsv } from "./output/word-list";
export type { WordListOptions, WordListRow, WordListSort } from "./output/word-list";
export { formatOccurrences, renderOccurrencesHtml } from "./output/occurrences";

export { GitRepository } from "./repository/git";
export type { CommitAuthor, Credentials, GitRunner, RepositoryClient } from "./repository/git";
export { publishChanges } from "./repository/publish";
export type { PublishOptions, PublishResult, PublishStep } from "./repository/publish";

export { Session } from "./session";
export type { RepositoryFactory, SessionOptions } from "./session";

export { loadSettings, saveSettings, defaultSettings } from "./config/settings";
export type { Settings } from "./config/settings";
