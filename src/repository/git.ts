import { execFile } from "child_process";
import { promisify } from "util";
import * as path from "path";
import { RepositoryError, describeError } from "../errors";
import type { RepositoryStep } from "../errors";

const execFileAsync = promisify(execFile);

export interface CommitAuthor {
    name: string;
    email: string;
}

export interface Credentials {
    username: string;
    password: string;
}

/**
 * What the correction workflow needs from version control
 */
export interface RepositoryClient {
    /** Modified tracked files, as absolute paths */
    changedFiles(): Promise<string[]>;
    stage(files: readonly string[]): Promise<void>;
    /** True when the index holds changes to any of `files` */
    hasStagedChanges(files: readonly string[]): Promise<boolean>;
    /** Commit exactly `files`; returns the new commit id */
    commit(message: string, author: CommitAuthor, files: readonly string[]): Promise<string>;
    /** True when the branch has commits its remote has not received */
    isAheadOfRemote(): Promise<boolean>;
    push(credentials: Credentials): Promise<void>;
}

export interface GitRunOptions {
    cwd: string;
    env?: NodeJS.ProcessEnv;
}

export type GitRunner = (args: string[], options: GitRunOptions) => Promise<{ stdout: string; stderr: string }>;

/**
 * Run the git executable
 */
export const runGit: GitRunner = async (args, options) => {
    const { stdout, stderr } = await execFileAsync("git", args, {
        cwd: options.cwd,
        env: options.env ?? process.env,
        maxBuffer: 16 * 1024 * 1024,
        windowsHide: true,
    });
    return { stdout, stderr };
};

function outputOf(err: unknown, stream: "stdout" | "stderr"): string {
    if (err instanceof Error && stream in err) {
        const value: unknown = Reflect.get(err, stream);
        if (typeof value === "string") return value.trim();
    }
    return "";
}

/**
 * Git's own message when there is one: stderr of the failed process, else
 * stdout ("nothing to commit" goes there)
 */
export function gitMessage(err: unknown): string {
    return outputOf(err, "stderr") || outputOf(err, "stdout") || describeError(err);
}

/** Exit status of a failed git process */
function exitCode(err: unknown): number | undefined {
    if (err instanceof Error && "code" in err && typeof err.code === "number") {
        return err.code;
    }
    return undefined;
}

export interface GitRepositoryOptions {
    remote?: string;
    branch?: string;
    runner?: GitRunner;
}

export class GitRepository implements RepositoryClient {
    private readonly remote: string;
    private readonly branch: string;
    private readonly run: GitRunner;

    constructor(private readonly dir: string, options: GitRepositoryOptions = {}) {
        this.remote = options.remote ?? "origin";
        this.branch = options.branch ?? "master";
        this.run = options.runner ?? runGit;
    }

    private async git(step: RepositoryStep, args: string[], env?: NodeJS.ProcessEnv): Promise<string> {
        try {
            const { stdout } = await this.run(args, { cwd: this.dir, ...(env !== undefined && { env }) });
            return stdout;
        } catch (err) {
            throw new RepositoryError(step, gitMessage(err), err);
        }
    }

    /**
     * Run a git command whose exit status 1 means "no" rather than failure
     */
    private async check(step: RepositoryStep, args: string[]): Promise<boolean> {
        try {
            await this.run(args, { cwd: this.dir });
            return true;
        } catch (err) {
            if (exitCode(err) === 1) return false;
            throw new RepositoryError(step, gitMessage(err), err);
        }
    }

    private relative(files: readonly string[]): string[] {
        return files.map(file => path.relative(this.dir, file));
    }

    public async changedFiles(): Promise<string[]> {
        const stdout = await this.git("stage", ["diff", "--name-only", "--relative", "-z"]);
        return stdout
            .split("\0")
            .filter(name => name.length > 0)
            .map(name => path.resolve(this.dir, name));
    }

    public async stage(files: readonly string[]): Promise<void> {
        if (files.length === 0) return;
        await this.git("stage", ["add", "--", ...this.relative(files)]);
    }

    public async hasStagedChanges(files: readonly string[]): Promise<boolean> {
        if (files.length === 0) return false;
        const clean = await this.check("commit", ["diff", "--cached", "--quiet", "--", ...this.relative(files)]);
        return !clean;
    }

    /**
     * Commit the given paths only; anything else staged stays staged
     */
    public async commit(message: string, author: CommitAuthor, files: readonly string[]): Promise<string> {
        await this.git("commit", [
            "-c", `user.name=${author.name}`,
            "-c", `user.email=${author.email}`,
            "commit",
            "-m", message,
            "--", ...this.relative(files),
        ]);
        const head = await this.git("commit", ["rev-parse", "HEAD"]);
        return head.trim();
    }

    /**
     * Compared with the remote-tracking branch. Without one (never pushed, or
     * the remote was added later) every local commit counts as unpushed.
     */
    public async isAheadOfRemote(): Promise<boolean> {
        const tracking = `refs/remotes/${this.remote}/${this.branch}`;
        const tracked = await this.check("push", ["rev-parse", "--verify", "--quiet", tracking]);
        if (!tracked) return true;
        const count = await this.git("push", ["rev-list", "--count", `${tracking}..refs/heads/${this.branch}`]);
        return parseInt(count.trim(), 10) > 0;
    }

    /**
     * Push the branch. The credentials travel as an HTTP basic authorization
     * header set through git's environment configuration, so they never show
     * up in the process arguments and never reach a credential helper.
     */
    public async push(credentials: Credentials): Promise<void> {
        const token = Buffer.from(`${credentials.username}:${credentials.password}`, "utf8").toString("base64");
        const env: NodeJS.ProcessEnv = {
            ...process.env,
            GIT_TERMINAL_PROMPT: "0",
            GIT_CONFIG_COUNT: "1",
            GIT_CONFIG_KEY_0: "http.extraHeader",
            GIT_CONFIG_VALUE_0: `Authorization: Basic ${token}`,
        };
        const refspec = `refs/heads/${this.branch}:refs/heads/${this.branch}`;
        await this.git("push", ["push", this.remote, refspec], env);
    }
}
