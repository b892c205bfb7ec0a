/**
 * One user's working session: the open directory, the current index and the
 * files corrected since the last publish.
 *
 * Scans, corrections and publishes run one at a time. The index is replaced
 * as a whole when an operation completes, so callers holding a previous
 * snapshot never see it change under them.
 */

import { Mutex } from "async-mutex";
import * as path from "path";
import type { Occurrence, ProgressListener, WordIndex } from "./types";
import { SessionStateError } from "./errors";
import { buildIndex } from "./indexing/scanner";
import { indexStats, occurrencesOf } from "./indexing/word-index";
import type { IndexStats } from "./indexing/word-index";
import { correctWord } from "./correction/corrector";
import type { CorrectionOutcome } from "./correction/corrector";
import { buildWordList } from "./output/word-list";
import type { WordListOptions, WordListRow } from "./output/word-list";
import { GitRepository } from "./repository/git";
import type { RepositoryClient } from "./repository/git";
import { missingPublishFields, publishChanges } from "./repository/publish";
import type { PublishResult } from "./repository/publish";
import { defaultSettings } from "./config/settings";
import type { Settings } from "./config/settings";
import { compareCodeUnits } from "./utils/shared";

export type RepositoryFactory = (directory: string, settings: Settings) => RepositoryClient;

export interface SessionOptions {
    settings?: Settings;
    repositoryFactory?: RepositoryFactory;
    onProgress?: ProgressListener;
}

const defaultRepositoryFactory: RepositoryFactory = (directory, settings) =>
    new GitRepository(directory, { remote: settings.remote, branch: settings.branch });

export class Session {
    private index: WordIndex | null = null;
    private readonly mutex = new Mutex();
    private readonly corrected = new Set<string>();
    private scanController: AbortController | null = null;
    private readonly settings: Settings;
    private readonly repositoryFactory: RepositoryFactory;
    private readonly onProgress: ProgressListener | undefined;

    constructor(options: SessionOptions = {}) {
        this.settings = options.settings ?? defaultSettings();
        this.repositoryFactory = options.repositoryFactory ?? defaultRepositoryFactory;
        this.onProgress = options.onProgress;
    }

    /** Current snapshot, or null before the first completed scan */
    public get current(): WordIndex | null {
        return this.index;
    }

    public get directory(): string | null {
        return this.index?.root ?? null;
    }

    private requireIndex(): WordIndex {
        if (!this.index) {
            throw new SessionStateError("No directory has been scanned yet");
        }
        return this.index;
    }

    /**
     * Scan `directory` and make the result the current index. On failure or
     * cancellation the previous index stays in effect.
     */
    public async scan(directory: string, signal?: AbortSignal): Promise<WordIndex> {
        return this.mutex.runExclusive(async () => {
            const controller = new AbortController();
            const forwardAbort = (): void => controller.abort();
            if (signal?.aborted) controller.abort();
            signal?.addEventListener("abort", forwardAbort, { once: true });
            this.scanController = controller;

            try {
                const index = await buildIndex(directory, {
                    extensions: this.settings.extensions,
                    contextRadius: this.settings.contextRadius,
                    signal: controller.signal,
                    ...(this.onProgress !== undefined && { onProgress: this.onProgress }),
                });
                if (this.index?.root !== index.root) {
                    this.corrected.clear();
                }
                this.index = index;
                return index;
            } finally {
                signal?.removeEventListener("abort", forwardAbort);
                this.scanController = null;
            }
        });
    }

    /**
     * Cancel the scan in progress, if any
     */
    public cancelScan(): boolean {
        if (!this.scanController) return false;
        this.scanController.abort();
        return true;
    }

    public stats(): IndexStats {
        return indexStats(this.requireIndex());
    }

    public occurrencesOf(word: string): readonly Occurrence[] {
        return occurrencesOf(this.requireIndex(), word);
    }

    public wordList(options: WordListOptions = {}): WordListRow[] {
        return buildWordList(this.requireIndex(), options);
    }

    /**
     * Correct `word` everywhere and adopt the updated index
     */
    public async correct(word: string, replacement: string, options: { dryRun?: boolean } = {}): Promise<CorrectionOutcome> {
        return this.mutex.runExclusive(async () => {
            const outcome = await correctWord(this.requireIndex(), word, replacement, {
                dryRun: options.dryRun ?? false,
                contextRadius: this.settings.contextRadius,
                ...(this.onProgress !== undefined && { onProgress: this.onProgress }),
            });
            if (!outcome.dryRun) {
                this.index = outcome.index;
                for (const result of outcome.results) {
                    if (!result.error && result.replacements > 0) {
                        this.corrected.add(result.file);
                    }
                }
            }
            return outcome;
        });
    }

    /** Files rewritten since the last successful publish */
    public correctedFiles(): string[] {
        return [...this.corrected].sort(compareCodeUnits);
    }

    /**
     * Stage, commit and push the corrected files. When nothing was corrected
     * in this session, the modified files git reports are published instead
     * (corrections made by an earlier run), and commits left behind by a failed
     * push are pushed.
     */
    public async publish(password: string, message?: string): Promise<PublishResult> {
        return this.mutex.runExclusive(async () => {
            const index = this.requireIndex();
            const options = {
                message: message ?? this.settings.commitMessage,
                author: { name: this.settings.userName, email: this.settings.email },
                credentials: { username: this.settings.remoteUser, password },
            };
            const missing = missingPublishFields(options);
            if (missing.length > 0) {
                throw new SessionStateError(`Cannot publish, missing: ${missing.join(", ")}`);
            }

            const repository = this.repositoryFactory(index.root, this.settings);
            let files = this.correctedFiles();
            if (files.length === 0) {
                const extensions = this.settings.extensions.map(ext => ext.toLowerCase());
                files = (await repository.changedFiles())
                    .filter(file => extensions.includes(path.extname(file).toLowerCase()))
                    .sort(compareCodeUnits);
            }

            const result = await publishChanges(repository, files, options, step =>
                this.onProgress?.({ type: "publish:step", ...step })
            );
            if (result.success) {
                this.corrected.clear();
            }
            return result;
        });
    }
}
