import type { Octokit } from "@octokit/rest";
import { fetchPRFiles, fetchPullRequest, type PRContext } from "../github/pulls.js";
import {
  fetchExistingState,
  postInlineComments,
  postReviewBody,
} from "../github/reviews.js";
import type { ReviewConfig } from "../config-loader/schema.js";
import { buildPrompt } from "../llm/prompts.js";
import { parseFindingsFromText } from "../llm/parser.js";
import { requestReviewText, type MessagesClient } from "../llm/reviewer.js";
import { filterFiles } from "./filter.js";
import { planComments } from "./placement.js";
import { dedupExisting } from "./dedup.js";
import {
  buildNoFilesBody,
  buildNoFindingsBody,
  buildSummaryBody,
} from "./body-builder.js";
import { shouldFailJob } from "./severity.js";
import type { ReviewOutcome } from "./types.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "orchestrator" });

export interface OrchestrateOptions {
  octokit: Octokit;
  config: ReviewConfig;
  userPrompt?: string;
  llmClient?: MessagesClient;
}

export async function orchestrateReview(
  ctx: PRContext,
  options: OrchestrateOptions
): Promise<ReviewOutcome> {
  const { octokit, config } = options;
  const startTime = Date.now();

  // 1. Drafts are not reviewed
  const pr = await fetchPullRequest(octokit, ctx);
  if (pr.draft) {
    log.info({ pr: ctx.pullNumber }, "Skipping draft PR");
    return outcome("skipped-draft");
  }

  // 2. Fetch and filter changed files
  const allFiles = await fetchPRFiles(octokit, ctx);
  const files = filterFiles(allFiles, config.filters);
  if (files.length === 0) {
    log.info({ pr: ctx.pullNumber }, "No reviewable files in PR");
    await postOnce(octokit, ctx, buildNoFilesBody());
    return outcome("no-files");
  }
  log.info(
    { reviewable: files.length, fetched: allFiles.length, maxFiles: config.filters.maxFiles },
    "Selected files for review"
  );

  // 3. Ask the model
  const prompt = buildPrompt(files, {
    userPrompt: options.userPrompt,
    maxDiffChars: config.review.maxDiffChars,
    style: config.llm.style?.trim() || undefined,
  });
  const rawText = await requestReviewText(
    prompt,
    {
      model: config.llm.model,
      maxTokens: config.llm.maxTokens,
      systemPrompt: config.llm.systemPrompt?.trim() || undefined,
    },
    options.llmClient
  );

  // 4. Parse findings
  const { findings, parsed } = parseFindingsFromText(rawText, config.review.maxFindings);
  if (parsed) {
    log.info({ findings: findings.length }, "Parsed model findings");
  } else {
    log.warn({ snippet: snippet(rawText) }, "No JSON found in model output");
  }

  if (findings.length === 0) {
    const posted = await postOnce(octokit, ctx, buildNoFindingsBody(rawText, parsed));
    log.info({ parsed, posted }, "No findings to post");
    return outcome("no-findings");
  }

  // 5. Place, dedup, post
  let inlinePosted = 0;
  let fallbackPosted = false;

  if (config.review.enableInline) {
    const existing = await fetchExistingState(octokit, ctx);
    const plan = planComments({
      files,
      findings,
      existingInlineComments: existing.inlineComments,
      existingReviewBodies: existing.reviewBodies,
      snapRadius: config.review.snapRadius,
    });

    inlinePosted = await postInlineComments(
      octokit,
      ctx,
      plan.inlineCandidates,
      config.review.batchSize
    );
    if (plan.fallbackBody) {
      await postReviewBody(octokit, ctx, plan.fallbackBody);
      fallbackPosted = true;
    }
  } else {
    fallbackPosted = await postOnce(octokit, ctx, buildSummaryBody(findings));
  }

  const failed = shouldFailJob(findings, config.review.failLevel);

  log.info(
    {
      pr: ctx.pullNumber,
      findings: findings.length,
      inlinePosted,
      fallbackPosted,
      failed,
      durationMs: Date.now() - startTime,
    },
    "Review complete"
  );

  return { status: "posted", findings, inlinePosted, fallbackPosted, failed };
}

/** Posts a review body unless an identical one is already on the PR */
async function postOnce(
  octokit: Octokit,
  ctx: PRContext,
  body: string
): Promise<boolean> {
  const existing = await fetchExistingState(octokit, ctx);
  const { fallback } = dedupExisting(existing, [], [body]);
  if (fallback.length === 0) {
    log.info({ pr: ctx.pullNumber }, "Identical review body already posted");
    return false;
  }
  await postReviewBody(octokit, ctx, body);
  return true;
}

function outcome(status: ReviewOutcome["status"]): ReviewOutcome {
  return { status, findings: [], inlinePosted: 0, fallbackPosted: false, failed: false };
}

function snippet(text: string): string {
  return text.length > 300 ? `${text.slice(0, 300)}…` : text || "(empty)";
}
