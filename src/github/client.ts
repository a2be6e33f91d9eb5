import { Octokit } from "@octokit/rest";
import { loadEnv } from "../config/env.js";

let _octokit: Octokit | null = null;

/** Octokit authenticated with the GITHUB_TOKEN from the environment */
export function getOctokit(): Octokit {
  if (_octokit) return _octokit;
  const env = loadEnv();
  _octokit = new Octokit({
    auth: env.GITHUB_TOKEN,
    userAgent: "pinpoint-review",
  });
  return _octokit;
}
