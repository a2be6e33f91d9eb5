import type { Finding, Severity } from "./types.js";

export const SEVERITY_EMOJI: Record<Severity, string> = {
  CRITICAL: "🔴",
  MAJOR: "🟠",
  MINOR: "🟡",
  SUGGESTION: "🟢",
};

/**
 * Formats a Finding into an inline review comment body:
 * severity header, detail, and the suggested fix when there is one.
 */
export function formatInlineComment(finding: Finding): string {
  const parts = [
    `${SEVERITY_EMOJI[finding.severity]} **${finding.severity}** — ${finding.title}`,
    finding.detail,
    finding.fix ? `**Suggested fix:** ${finding.fix}` : "",
  ];
  return parts.filter(Boolean).join("\n\n").trim();
}

/** One markdown bullet for a finding that is listed in a review body */
export function formatFallbackEntry(finding: Finding): string {
  const where = `\`${finding.file}\`` + (finding.line ? ` L${finding.line}` : "");
  let entry = `- ${SEVERITY_EMOJI[finding.severity]} **${finding.severity}** ${where} — ${finding.title}\n  ${finding.detail}`;
  if (finding.fix) {
    entry += `\n  **Suggested fix:** ${finding.fix}`;
  }
  return entry;
}
