import { describe, it, expect } from "vitest";
import { GitRepository, gitMessage } from "../git";
import type { GitRunOptions, GitRunner } from "../git";
import { RepositoryError } from "../../errors";

interface Call {
    args: string[];
    options: GitRunOptions;
}

function recordingRunner(outputs: Record<string, string> = {}): { runner: GitRunner; calls: Call[] } {
    const calls: Call[] = [];
    const runner: GitRunner = async (args, options) => {
        calls.push({ args, options });
        return { stdout: outputs[args[0] ?? ""] ?? "", stderr: "" };
    };
    return { runner, calls };
}

describe("GitRepository", () => {
    it("lists changed files as absolute paths", async () => {
        const { runner, calls } = recordingRunner({ diff: "a.usfm\0sub/b.usfm\0" });
        const repo = new GitRepository("/repo", { runner });

        const files = await repo.changedFiles();

        expect(files).toEqual(["/repo/a.usfm", "/repo/sub/b.usfm"]);
        expect(calls[0]?.args).toEqual(["diff", "--name-only", "--relative", "-z"]);
        expect(calls[0]?.options.cwd).toBe("/repo");
    });

    it("stages files relative to the repository", async () => {
        const { runner, calls } = recordingRunner();
        const repo = new GitRepository("/repo", { runner });

        await repo.stage(["/repo/a.usfm", "/repo/sub/b.usfm"]);

        expect(calls.map(c => c.args)).toEqual([["add", "--", "a.usfm", "sub/b.usfm"]]);
    });

    it("does nothing when there is nothing to stage", async () => {
        const { runner, calls } = recordingRunner();

        await new GitRepository("/repo", { runner }).stage([]);

        expect(calls).toEqual([]);
    });

    it("commits with the given author and returns the new commit id", async () => {
        const { runner, calls } = recordingRunner({ "rev-parse": "abc1234def\n" });
        const repo = new GitRepository("/repo", { runner });

        const commit = await repo.commit("Correct spelling", { name: "Test User", email: "test@example.org" }, [
            "/repo/a.usfm",
            "/repo/sub/b.usfm",
        ]);

        expect(commit).toBe("abc1234def");
        expect(calls.map(c => c.args)).toEqual([
            [
                "-c", "user.name=Test User",
                "-c", "user.email=test@example.org",
                "commit", "-m", "Correct spelling",
                "--", "a.usfm", "sub/b.usfm",
            ],
            ["rev-parse", "HEAD"],
        ]);
    });

    it("sees staged changes when git diff --cached exits with 1", async () => {
        const calls: string[][] = [];
        const runner: GitRunner = async args => {
            calls.push(args);
            throw Object.assign(new Error("Command failed: git diff"), { code: 1, stdout: "", stderr: "" });
        };
        const repo = new GitRepository("/repo", { runner });

        expect(await repo.hasStagedChanges(["/repo/a.usfm"])).toBe(true);
        expect(calls).toEqual([["diff", "--cached", "--quiet", "--", "a.usfm"]]);
    });

    it("sees nothing staged when git diff --cached succeeds", async () => {
        const { runner } = recordingRunner();

        expect(await new GitRepository("/repo", { runner }).hasStagedChanges(["/repo/a.usfm"])).toBe(false);
    });

    it("treats other git failures while checking as errors", async () => {
        const runner: GitRunner = async () => {
            throw Object.assign(new Error("Command failed: git diff"), { code: 128, stderr: "fatal: not a git repository\n" });
        };
        const repo = new GitRepository("/repo", { runner });

        await expect(repo.hasStagedChanges(["/repo/a.usfm"])).rejects.toThrow("fatal: not a git repository");
    });

    it("counts every commit as unpushed when there is no remote-tracking branch", async () => {
        const runner: GitRunner = async () => {
            throw Object.assign(new Error("Command failed: git rev-parse"), { code: 1, stdout: "", stderr: "" });
        };

        expect(await new GitRepository("/repo", { runner }).isAheadOfRemote()).toBe(true);
    });

    it("compares the branch with its remote-tracking branch", async () => {
        const behind = recordingRunner({ "rev-list": "0\n" });
        const ahead = recordingRunner({ "rev-list": "2\n" });

        expect(await new GitRepository("/repo", { runner: behind.runner }).isAheadOfRemote()).toBe(false);
        expect(await new GitRepository("/repo", { runner: ahead.runner }).isAheadOfRemote()).toBe(true);
        expect(behind.calls.map(c => c.args)).toEqual([
            ["rev-parse", "--verify", "--quiet", "refs/remotes/origin/master"],
            ["rev-list", "--count", "refs/remotes/origin/master..refs/heads/master"],
        ]);
    });

    it("pushes the branch with credentials in the environment only", async () => {
        const { runner, calls } = recordingRunner();
        const repo = new GitRepository("/repo", { remote: "upstream", branch: "main", runner });

        await repo.push({ username: "translator", password: "test-secret" });

        const call = calls[0];
        expect(call?.args).toEqual(["push", "upstream", "refs/heads/main:refs/heads/main"]);
        expect(call?.options.env?.["GIT_TERMINAL_PROMPT"]).toBe("0");
        expect(call?.options.env?.["GIT_CONFIG_KEY_0"]).toBe("http.extraHeader");
        expect(call?.options.env?.["GIT_CONFIG_VALUE_0"]).toBe(
            `Authorization: Basic ${Buffer.from("translator:test-secret").toString("base64")}`
        );
    });

    it("reports git's own message when a step fails", async () => {
        const runner: GitRunner = async () => {
            throw Object.assign(new Error("Command failed: git push"), { stderr: "fatal: Authentication failed\n" });
        };
        const repo = new GitRepository("/repo", { runner });

        const error = await repo.push({ username: "translator", password: "test-secret" }).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(RepositoryError);
        expect(error).toMatchObject({ step: "push" });
        expect(error instanceof Error ? error.message : "").toBe("fatal: Authentication failed");
    });
});

describe("gitMessage", () => {
    it("prefers stderr", () => {
        const err = Object.assign(new Error("Command failed"), { stdout: "out", stderr: "fatal: bad\n" });

        expect(gitMessage(err)).toBe("fatal: bad");
    });

    it("falls back to stdout when stderr is empty", () => {
        const err = Object.assign(new Error("Command failed: git commit"), {
            stdout: "On branch master\nnothing to commit, working tree clean\n",
            stderr: "",
        });

        expect(gitMessage(err)).toBe("On branch master\nnothing to commit, working tree clean");
    });

    it("uses the error message when git printed nothing", () => {
        expect(gitMessage(new Error("spawn git ENOENT"))).toBe("spawn git ENOENT");
    });
});
