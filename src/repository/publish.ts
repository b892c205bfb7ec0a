import type { CommitAuthor, Credentials, RepositoryClient } from "./git";
import { describeError } from "../errors";
import type { RepositoryStep } from "../errors";

export interface PublishOptions {
    message: string;
    author: CommitAuthor;
    credentials: Credentials;
}

export interface PublishStep {
    step: RepositoryStep;
    success: boolean;
    message: string;
}

export interface PublishResult {
    success: boolean;
    steps: PublishStep[];
    files: string[];
    commit?: string;
}

/**
 * Names of the fields that must be filled in before anything is sent to git
 */
export function missingPublishFields(options: PublishOptions): string[] {
    const missing: string[] = [];
    if (!options.author.name.trim()) missing.push("author name");
    if (!options.author.email.trim()) missing.push("author email");
    if (!options.credentials.username.trim()) missing.push("remote user");
    if (!options.credentials.password) missing.push("password");
    return missing;
}

/**
 * Stage, commit and push the given files. Stops at the first failing step and
 * reports git's message for it unchanged.
 *
 * A retry after a failed push finds the files already committed: the commit
 * step is then skipped and the earlier commit is pushed. With no files at all,
 * the branch is still pushed when it is ahead of its remote.
 */
export async function publishChanges(
    repository: RepositoryClient,
    files: readonly string[],
    options: PublishOptions,
    onStep?: (step: PublishStep) => void
): Promise<PublishResult> {
    const steps: PublishStep[] = [];
    const record = (step: PublishStep): void => {
        steps.push(step);
        onStep?.(step);
    };
    const fail = (step: RepositoryStep, err: unknown): PublishResult => {
        record({ step, success: false, message: describeError(err) });
        return { success: false, steps, files: [...files] };
    };

    let commit: string | undefined;

    if (files.length > 0) {
        try {
            await repository.stage(files);
            record({ step: "stage", success: true, message: `Staged ${files.length} file(s)` });
        } catch (err) {
            return fail("stage", err);
        }

        try {
            if (await repository.hasStagedChanges(files)) {
                commit = await repository.commit(options.message, options.author, files);
                record({ step: "commit", success: true, message: `Created commit ${commit.slice(0, 7)}` });
            } else {
                record({ step: "commit", success: true, message: "Already committed" });
            }
        } catch (err) {
            return fail("commit", err);
        }
    }

    try {
        if (files.length === 0 && !(await repository.isAheadOfRemote())) {
            return { success: true, steps, files: [] };
        }
        await repository.push(options.credentials);
        record({ step: "push", success: true, message: "Pushed to remote" });
    } catch (err) {
        return { ...fail("push", err), ...(commit !== undefined && { commit }) };
    }

    return { success: true, steps, files: [...files], ...(commit !== undefined && { commit }) };
}
