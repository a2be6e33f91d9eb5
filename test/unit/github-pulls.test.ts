import { describe, it, expect } from "vitest";
import { fetchPRFiles, fetchPullRequest } from "../../src/github/pulls.js";
import { createFakeGitHub } from "../fixtures/fake-github.js";

const ctx = { owner: "acme", repo: "widgets", pullNumber: 7 };

describe("fetchPullRequest", () => {
  it("returns the number and draft flag", async () => {
    const github = createFakeGitHub({ draft: true, files: [] });

    expect(await fetchPullRequest(github.octokit, ctx)).toEqual({ number: 7, draft: true });
  });
});

describe("fetchPRFiles", () => {
  it("keeps only the filename and patch of each file", async () => {
    const github = createFakeGitHub({
      files: [{ filename: "a.ts", patch: "@@ -1 +1 @@\n+x" }, { filename: "logo.png" }],
    });

    expect(await fetchPRFiles(github.octokit, ctx)).toEqual([
      { filename: "a.ts", patch: "@@ -1 +1 @@\n+x" },
      { filename: "logo.png" },
    ]);
  });
});
