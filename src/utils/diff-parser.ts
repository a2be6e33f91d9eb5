/** Right-hand (post-change) line number -> 1-based position within the patch text */
export type PositionMap = ReadonlyMap<number, number>;

/** Filename -> PositionMap, only for files with at least one added line */
export type PositionMaps = ReadonlyMap<string, PositionMap>;

export interface PatchFile {
  filename: string;
  patch?: string | null;
}

export const DEFAULT_SNAP_RADIUS = 3;

const HUNK_HEADER = /^@@\s+-\d+(?:,\d+)?\s+\+(\d+)(?:,(\d+))?\s+@@/;

/**
 * Maps every added line of a unified-diff patch to its review-comment
 * position. Position counts every physical line of the patch, hunk headers
 * included, starting at 1. Context and deleted lines are never keys.
 *
 * A hunk header without a readable `+start` makes the lines after it
 * unaddressable until the next valid header. Malformed input never throws;
 * it only leaves keys out.
 */
export function buildPositionMap(patch?: string | null): PositionMap {
  const mapping = new Map<number, number>();
  if (!patch) return mapping;

  let position = 0;
  let rightLine = 0;

  for (const line of patch.split("\n")) {
    position++;

    if (line.startsWith("@@")) {
      const hunkMatch = line.match(HUNK_HEADER);
      rightLine = hunkMatch ? parseInt(hunkMatch[1], 10) : 0;
      continue;
    }

    // Until a valid hunk header is seen nothing on the right side is addressable
    if (rightLine === 0) continue;

    if (line.startsWith("+")) {
      mapping.set(rightLine, position);
      rightLine++;
    } else if (line.startsWith("-")) {
      // left side only
    } else if (line.startsWith("\\")) {
      // "\ No newline at end of file" is not a file line; treating it as
      // context would shift every following added line down by one
    } else {
      rightLine++;
    }
  }

  return mapping;
}

/** Build one PositionMap per file; files with nothing addressable are left out */
export function buildPositionMaps(files: PatchFile[]): PositionMaps {
  const maps = new Map<string, PositionMap>();
  for (const file of files) {
    if (!file.patch) continue;
    const mapping = buildPositionMap(file.patch);
    if (mapping.size > 0) maps.set(file.filename, mapping);
  }
  return maps;
}

/**
 * Resolves a right-hand line to a diff position. An exact match wins;
 * otherwise the neighbours are tried in the order line-1, line+1, line-2,
 * line+2, ... up to `snapRadius`, and the first hit is returned.
 */
export function findPosition(
  maps: PositionMaps,
  path: string,
  line: number | null | undefined,
  snapRadius: number = DEFAULT_SNAP_RADIUS
): number | undefined {
  if (line === null || line === undefined) return undefined;
  const mapping = maps.get(path);
  if (!mapping || mapping.size === 0) return undefined;

  const exact = mapping.get(line);
  if (exact !== undefined) return exact;

  for (let d = 1; d <= snapRadius; d++) {
    const before = mapping.get(line - d);
    if (before !== undefined) return before;
    const after = mapping.get(line + d);
    if (after !== undefined) return after;
  }
  return undefined;
}
