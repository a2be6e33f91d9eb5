import type { Octokit } from "@octokit/rest";
import type { PRContext } from "./pulls.js";
import type { ExistingState, InlineCandidate } from "../review/types.js";
import { withRetry } from "../utils/retry.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "github-reviews" });

/** Every inline comment and review body already on the pull request */
export async function fetchExistingState(
  octokit: Octokit,
  ctx: PRContext
): Promise<ExistingState> {
  const params = {
    owner: ctx.owner,
    repo: ctx.repo,
    pull_number: ctx.pullNumber,
    per_page: 100,
  };

  const comments = await withRetry(
    () => octokit.paginate(octokit.pulls.listReviewComments, params),
    { label: "pulls.listReviewComments" }
  );
  const reviews = await withRetry(
    () => octokit.paginate(octokit.pulls.listReviews, params),
    { label: "pulls.listReviews" }
  );

  log.debug(
    { pr: ctx.pullNumber, comments: comments.length, reviews: reviews.length },
    "Fetched existing review state"
  );

  return {
    inlineComments: comments.map((c) => ({
      path: c.path,
      position: c.position,
      line: c.line,
      body: c.body,
    })),
    reviewBodies: reviews.map((r) => r.body),
  };
}

/** Posts inline comments as COMMENT reviews of at most `batchSize` comments */
export async function postInlineComments(
  octokit: Octokit,
  ctx: PRContext,
  candidates: InlineCandidate[],
  batchSize: number
): Promise<number> {
  let posted = 0;
  for (let i = 0; i < candidates.length; i += batchSize) {
    const batch = candidates.slice(i, i + batchSize);
    const { data } = await withRetry(
      () =>
        octokit.pulls.createReview({
          owner: ctx.owner,
          repo: ctx.repo,
          pull_number: ctx.pullNumber,
          event: "COMMENT",
          body: "",
          comments: batch.map((c) => ({
            path: c.path,
            position: c.position,
            body: c.body,
          })),
        }),
      { label: "pulls.createReview" }
    );
    posted += batch.length;
    log.info(
      { pr: ctx.pullNumber, reviewId: data.id, commentCount: batch.length },
      "Posted inline comment batch"
    );
  }
  return posted;
}

export async function postReviewBody(
  octokit: Octokit,
  ctx: PRContext,
  body: string
): Promise<number> {
  const { data } = await withRetry(
    () =>
      octokit.pulls.createReview({
        owner: ctx.owner,
        repo: ctx.repo,
        pull_number: ctx.pullNumber,
        event: "COMMENT",
        body,
      }),
    { label: "pulls.createReview" }
  );
  log.info({ pr: ctx.pullNumber, reviewId: data.id }, "Posted review body");
  return data.id;
}
