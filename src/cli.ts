import { parseArgs } from "util";
import { loadEnv } from "./config/env.js";
import { loadReviewConfig } from "./config-loader/loader.js";
import { getOctokit } from "./github/client.js";
import { parseRepoSlug, type PRContext } from "./github/pulls.js";
import { orchestrateReview } from "./review/orchestrator.js";
import { getLogger } from "./utils/logger.js";

export const USAGE = `pinpoint-review --repo <owner/name> --pr <number> [options]

Options:
  --repo <owner/name>   Repository that holds the pull request
  --pr <number>         Pull request number
  --prompt <text>       Extra instructions appended to the review prompt
  --config <path>       Config file (default: $PINPOINT_CONFIG or pinpoint.yml)
  -h, --help            Show this help`;

export interface CliArgs {
  ctx: PRContext;
  prompt: string;
  configPath?: string;
}

export type ParsedArgs =
  | { ok: true; args: CliArgs }
  | { ok: false; help: boolean; error?: string };

function readOptions(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      repo: { type: "string" },
      pr: { type: "string" },
      prompt: { type: "string", default: "" },
      config: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
    allowPositionals: false,
  }).values;
}

export function parseCliArgs(argv: string[]): ParsedArgs {
  let values: ReturnType<typeof readOptions>;
  try {
    values = readOptions(argv);
  } catch (err) {
    return { ok: false, help: false, error: err instanceof Error ? err.message : String(err) };
  }

  if (values.help) return { ok: false, help: true };

  if (!values.repo) return { ok: false, help: false, error: "--repo is required" };
  const slug = parseRepoSlug(values.repo);
  if (!slug) {
    return { ok: false, help: false, error: `--repo must look like owner/name, got "${values.repo}"` };
  }

  if (!values.pr) return { ok: false, help: false, error: "--pr is required" };
  const pullNumber = Number(values.pr);
  if (!Number.isInteger(pullNumber) || pullNumber <= 0) {
    return { ok: false, help: false, error: `--pr must be a positive integer, got "${values.pr}"` };
  }

  return {
    ok: true,
    args: {
      ctx: { ...slug, pullNumber },
      prompt: values.prompt ?? "",
      configPath: values.config,
    },
  };
}

/**
 * Runs one review pass. Resolves to the process exit code:
 * 0 on success, 1 when the findings reach the fail level or the run
 * errored, 2 on bad arguments.
 */
export async function runCli(argv: string[] = process.argv.slice(2)): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (!parsed.ok) {
    if (parsed.error) process.stderr.write(`error: ${parsed.error}\n\n`);
    process.stdout.write(`${USAGE}\n`);
    return parsed.help ? 0 : 2;
  }

  const log = getLogger();
  const { ctx, prompt, configPath } = parsed.args;

  try {
    const env = loadEnv();
    const config = await loadReviewConfig(configPath ?? env.PINPOINT_CONFIG);
    log.info({ repo: `${ctx.owner}/${ctx.repo}`, pr: ctx.pullNumber }, "Starting review");

    const result = await orchestrateReview(ctx, {
      octokit: getOctokit(),
      config,
      userPrompt: prompt,
    });
    if (result.failed) {
      log.warn({ failLevel: config.review.failLevel }, "Findings reached the fail level");
      return 1;
    }
    return 0;
  } catch (err) {
    log.error({ err }, "Review failed");
    return 1;
  }
}
