import { describe, it, expect } from "vitest";
import { missingPublishFields, publishChanges } from "../publish";
import type { PublishOptions, PublishStep } from "../publish";
import { FakeRepository } from "../../__tests__/helpers/fake-repository";

const options: PublishOptions = {
    message: "Correct spelling",
    author: { name: "Test User", email: "test@example.org" },
    credentials: { username: "translator", password: "test-secret" },
};

describe("publishChanges", () => {
    it("stages, commits and pushes", async () => {
        const repo = new FakeRepository();
        const seen: PublishStep[] = [];

        const result = await publishChanges(repo, ["/repo/a.usfm"], options, step => seen.push(step));

        expect(result).toEqual({
            success: true,
            files: ["/repo/a.usfm"],
            commit: "0123456789abcdef",
            steps: [
                { step: "stage", success: true, message: "Staged 1 file(s)" },
                { step: "commit", success: true, message: "Created commit 0123456" },
                { step: "push", success: true, message: "Pushed to remote" },
            ],
        });
        expect(seen).toEqual(result.steps);
        expect(repo.staged).toEqual([["/repo/a.usfm"]]);
        expect(repo.commits[0]?.files).toEqual(["/repo/a.usfm"]);
        expect(repo.pushes).toEqual([options.credentials]);
    });

    it("does nothing without files", async () => {
        const repo = new FakeRepository();

        const result = await publishChanges(repo, [], options);

        expect(result).toEqual({ success: true, steps: [], files: [] });
        expect(repo.staged).toEqual([]);
        expect(repo.pushes).toEqual([]);
    });

    it("stops at the first failing step", async () => {
        const repo = new FakeRepository([], "commit");

        const result = await publishChanges(repo, ["/repo/a.usfm"], options);

        expect(result.success).toBe(false);
        expect(result.steps.at(-1)).toEqual({ step: "commit", success: false, message: "commit rejected" });
        expect(repo.pushes).toEqual([]);
    });

    it("keeps the commit id when only the push fails", async () => {
        const repo = new FakeRepository([], "push");

        const result = await publishChanges(repo, ["/repo/a.usfm"], options);

        expect(result.success).toBe(false);
        expect(result.commit).toBe("0123456789abcdef");
        expect(result.steps.map(s => s.success)).toEqual([true, true, false]);
    });
});

describe("publishChanges after a failed push", () => {
    it("pushes the existing commit instead of committing again", async () => {
        const repo = new FakeRepository([], "push");
        const first = await publishChanges(repo, ["/repo/a.usfm"], options);
        repo.failAt = undefined;

        const second = await publishChanges(repo, ["/repo/a.usfm"], options);

        expect(first.success).toBe(false);
        expect(second).toEqual({
            success: true,
            files: ["/repo/a.usfm"],
            steps: [
                { step: "stage", success: true, message: "Staged 1 file(s)" },
                { step: "commit", success: true, message: "Already committed" },
                { step: "push", success: true, message: "Pushed to remote" },
            ],
        });
        expect(repo.commits).toHaveLength(1);
        expect(repo.pushes).toHaveLength(1);
    });

    it("pushes unpushed commits when there are no files", async () => {
        const repo = new FakeRepository([], "push");
        await publishChanges(repo, ["/repo/a.usfm"], options);
        repo.failAt = undefined;

        const retry = await publishChanges(repo, [], options);

        expect(retry).toEqual({
            success: true,
            files: [],
            steps: [{ step: "push", success: true, message: "Pushed to remote" }],
        });
        expect(repo.pushes).toEqual([options.credentials]);
    });
});

describe("missingPublishFields", () => {
    it("names every empty field", () => {
        const missing = missingPublishFields({
            message: "x",
            author: { name: " ", email: "" },
            credentials: { username: "", password: "" },
        });

        expect(missing).toEqual(["author name", "author email", "remote user", "password"]);
    });

    it("is empty when everything is present", () => {
        expect(missingPublishFields(options)).toEqual([]);
    });
});
