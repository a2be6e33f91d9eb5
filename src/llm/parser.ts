import { z } from "zod";
import { SEVERITIES, type Finding } from "../review/types.js";

const JSON_FENCE = /```json\s*([\s\S]+?)\s*```/i;

/**
 * One finding as the model reports it. Each field falls back on its own,
 * so a bad value never costs the rest of the finding.
 */
const findingSchema = z.object({
  severity: z
    .preprocess(
      (v) => (typeof v === "string" ? v.trim().toUpperCase() : v),
      z.enum(SEVERITIES)
    )
    .catch("SUGGESTION"),
  file: z.string().min(1).catch("-"),
  line: z
    .preprocess(toLineNumber, z.number().int().positive().optional())
    .catch(undefined),
  title: z.string().trim().min(1).catch("(untitled)"),
  detail: z.string().trim().catch(""),
  fix: z
    .string()
    .trim()
    .transform((s) => s || undefined)
    .optional()
    .catch(undefined),
});

export function extractJsonBlock(text: string): string | undefined {
  return text.match(JSON_FENCE)?.[1];
}

/**
 * Normalizes whatever JSON the model produced into Findings.
 * A single object counts as a one-element list, non-objects are skipped,
 * and at most `maxFindings` entries are read.
 */
export function normalizeFindings(data: unknown, maxFindings: number): Finding[] {
  const items = Array.isArray(data) ? data : isPlainObject(data) ? [data] : [];
  const findings: Finding[] = [];

  for (const item of items.slice(0, maxFindings)) {
    if (!isPlainObject(item)) continue;
    const parsed = findingSchema.safeParse(item);
    if (parsed.success) findings.push(parsed.data);
  }
  return findings;
}

/**
 * Reads findings from the model's text: the first ```json fence if there is
 * one, otherwise the whole text. `parsed` is false when no JSON was readable.
 */
export function parseFindingsFromText(
  text: string,
  maxFindings: number
): { findings: Finding[]; parsed: boolean } {
  const candidate = extractJsonBlock(text) ?? text.trim();
  if (!candidate) return { findings: [], parsed: false };

  let data: unknown;
  try {
    data = JSON.parse(candidate);
  } catch {
    return { findings: [], parsed: false };
  }
  return { findings: normalizeFindings(data, maxFindings), parsed: true };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toLineNumber(value: unknown): unknown {
  if (value === null || value === undefined || value === "" || value === 0) {
    return undefined;
  }
  const n = typeof value === "string" ? Number(value.trim()) : value;
  return typeof n === "number" && Number.isFinite(n) ? Math.trunc(n) : n;
}
