import { minimatch } from "minimatch";
import type { ReviewConfig } from "../config-loader/schema.js";
import type { PRFile } from "../github/pulls.js";

/**
 * Selects the files worth sending to the model.
 *
 *  - include globs (when any are set) must match
 *  - exclude globs must not match
 *  - files without patch text (binary, too large) are skipped
 *  - capped at filters.maxFiles, in the host's order
 */
export function filterFiles<T extends Pick<PRFile, "filename" | "patch">>(
  files: T[],
  filters: ReviewConfig["filters"]
): T[] {
  const result: T[] = [];
  for (const f of files) {
    if (
      filters.includeGlobs.length > 0 &&
      !filters.includeGlobs.some((p) => matchGlob(f.filename, p))
    ) {
      continue;
    }
    if (filters.excludeGlobs.some((p) => matchGlob(f.filename, p))) continue;
    if (f.patch === undefined) continue;

    result.push(f);
    if (result.length >= filters.maxFiles) break;
  }
  return result;
}

export function matchGlob(path: string, pattern: string): boolean {
  return minimatch(path, pattern, { dot: true, matchBase: true });
}
