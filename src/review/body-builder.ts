import type { Finding } from "./types.js";
import { formatFallbackEntry } from "./inline-formatter.js";

export const REVIEW_TAG = "<!-- pinpoint-review -->";
export const REVIEW_HEADER = "### 🤖 Pinpoint Review";

/**
 * Review body for findings that could not be pinned to a diff position.
 * Reruns produce the same text for the same findings, so dedup can match it.
 */
export function buildFallbackBody(entries: string[]): string {
  return [
    REVIEW_TAG,
    `${REVIEW_HEADER} (findings without a diff position)`,
    "",
    entries.join("\n") || "No details.",
  ].join("\n");
}

/** Review body listing every finding, used when inline comments are disabled */
export function buildSummaryBody(findings: Finding[]): string {
  return [
    REVIEW_TAG,
    REVIEW_HEADER,
    "",
    findings.map(formatFallbackEntry).join("\n"),
  ].join("\n");
}

export function buildNoFindingsBody(rawText: string, parsed: boolean): string {
  const header = [REVIEW_TAG, REVIEW_HEADER, ""].join("\n");
  if (parsed) {
    return `${header}\nLGTM! 🎉 No issues found.`;
  }
  const message =
    rawText.trim() ||
    "Could not generate a review (the model returned no usable response).";
  return `${header}\n${message}`;
}

export function buildNoFilesBody(): string {
  return [REVIEW_TAG, REVIEW_HEADER, "", "No reviewable files in this pull request."].join("\n");
}
