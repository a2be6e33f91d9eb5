import { SEVERITIES, type Finding, type Severity } from "./types.js";

export function isSeverity(value: string): value is Severity {
  return SEVERITIES.some((s) => s === value);
}

export function severityRank(s: Severity): number {
  return SEVERITIES.indexOf(s);
}

/** Highest severity among the findings; SUGGESTION when there are none */
export function worstSeverity(findings: Finding[]): Severity {
  let worst: Severity = "SUGGESTION";
  for (const f of findings) {
    if (severityRank(f.severity) > severityRank(worst)) worst = f.severity;
  }
  return worst;
}

/**
 * True when the worst finding reaches `failLevel`. An absent or unknown
 * level never fails the job.
 */
export function shouldFailJob(
  findings: Finding[],
  failLevel: string | undefined
): boolean {
  if (!failLevel) return false;
  const level = failLevel.trim().toUpperCase();
  if (!isSeverity(level)) return false;
  return severityRank(worstSeverity(findings)) >= severityRank(level);
}
