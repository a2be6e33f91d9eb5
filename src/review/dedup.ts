import type { ExistingState, InlineCandidate } from "./types.js";

export interface DedupResult {
  inline: InlineCandidate[];
  fallback: string[];
}

/**
 * Drops candidates that were already posted on the pull request.
 *
 * Inline comments match on (path, address, trimmed body), where an existing
 * comment's address is its diff position when it has one and its line
 * otherwise. Review bodies match on trimmed text. Exact and case-sensitive.
 */
export function dedupExisting(
  existing: ExistingState,
  inlineCandidates: InlineCandidate[],
  fallbackBodies: string[]
): DedupResult {
  const postedInline = new Set<string>();
  for (const c of existing.inlineComments) {
    postedInline.add(inlineKey(c.path, c.position || c.line, c.body));
  }

  const postedBodies = new Set<string>();
  for (const body of existing.reviewBodies) {
    const trimmed = (body ?? "").trim();
    if (trimmed) postedBodies.add(trimmed);
  }

  const inline = inlineCandidates.filter(
    (c) => !postedInline.has(inlineKey(c.path, c.position, c.body))
  );
  const fallback = fallbackBodies.filter((b) => !postedBodies.has(b.trim()));

  return { inline, fallback };
}

function inlineKey(
  path: string,
  address: number | null | undefined,
  body: string | null | undefined
): string {
  return JSON.stringify([path, address ?? null, (body ?? "").trim()]);
}
