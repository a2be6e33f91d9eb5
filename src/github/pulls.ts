import type { Octokit } from "@octokit/rest";
import { withRetry } from "../utils/retry.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "github-pulls" });

export interface PRContext {
  owner: string;
  repo: string;
  pullNumber: number;
}

export interface PRFile {
  filename: string;
  patch?: string;
}

export interface PullRequestInfo {
  number: number;
  draft: boolean;
}

/** Splits "owner/name"; returns undefined for anything else */
export function parseRepoSlug(
  slug: string
): { owner: string; repo: string } | undefined {
  const match = slug.trim().match(/^([\w.-]+)\/([\w.-]+)$/);
  if (!match) return undefined;
  return { owner: match[1], repo: match[2] };
}

export async function fetchPullRequest(
  octokit: Octokit,
  ctx: PRContext
): Promise<PullRequestInfo> {
  const { data } = await withRetry(
    () =>
      octokit.pulls.get({
        owner: ctx.owner,
        repo: ctx.repo,
        pull_number: ctx.pullNumber,
      }),
    { label: "pulls.get" }
  );
  return { number: data.number, draft: data.draft ?? false };
}

export async function fetchPRFiles(
  octokit: Octokit,
  ctx: PRContext
): Promise<PRFile[]> {
  const files: PRFile[] = [];
  let page = 1;

  while (true) {
    const { data } = await withRetry(
      () =>
        octokit.pulls.listFiles({
          owner: ctx.owner,
          repo: ctx.repo,
          pull_number: ctx.pullNumber,
          per_page: 100,
          page,
        }),
      { label: "pulls.listFiles" }
    );

    files.push(
      ...data.map((f) => ({
        filename: f.filename,
        patch: f.patch,
      }))
    );

    if (data.length < 100) break;
    page++;
  }

  log.info(
    { owner: ctx.owner, repo: ctx.repo, pr: ctx.pullNumber, fileCount: files.length },
    "Fetched PR files"
  );
  return files;
}
