import { readFile } from "fs/promises";
import yaml from "js-yaml";
import { safeParseReviewConfig, type ReviewConfig } from "./schema.js";
import { DEFAULT_CONFIG } from "../config/defaults.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "config-loader" });

const ENV_REF = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g;

/**
 * Substitutes `${VAR}` and `$VAR` with values from `vars`.
 * References to unset variables are left as written.
 */
export function expandEnvVars(
  text: string,
  vars: Record<string, string | undefined> = process.env
): string {
  return text.replace(ENV_REF, (match, braced?: string, bare?: string) => {
    const name = braced ?? bare ?? "";
    const value = vars[name];
    return value === undefined ? match : value;
  });
}

export function parseConfigText(
  text: string,
  source: string,
  vars: Record<string, string | undefined> = process.env
): ReviewConfig {
  const raw = yaml.load(expandEnvVars(text, vars));
  const result = safeParseReviewConfig(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid config file ${source}:\n${issues}`);
  }
  return result.data;
}

/** Reads the review config file; a missing file means defaults */
export async function loadReviewConfig(path: string): Promise<ReviewConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      log.debug({ path }, "No config file found, using defaults");
      return DEFAULT_CONFIG;
    }
    throw err;
  }

  const config = parseConfigText(text, path);
  log.debug({ path, model: config.llm.model }, "Loaded config");
  return config;
}

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}
