import {
  buildPositionMaps,
  findPosition,
  DEFAULT_SNAP_RADIUS,
  type PatchFile,
} from "../utils/diff-parser.js";
import { createChildLogger } from "../utils/logger.js";
import { buildFallbackBody } from "./body-builder.js";
import { dedupExisting } from "./dedup.js";
import { formatFallbackEntry, formatInlineComment } from "./inline-formatter.js";
import type {
  CommentPlan,
  CommentPlanInput,
  Finding,
  InlineCandidate,
} from "./types.js";

const log = createChildLogger({ module: "placement" });

export interface PlacementOptions {
  snapRadius?: number;
}

export interface PlacementResult {
  inline: InlineCandidate[];
  unresolved: Finding[];
  fallbackBody?: string;
}

/**
 * Pins each finding to a diff position. Findings on files outside the
 * change set, without a line, or with no added line within the snap radius
 * are collected into a single fallback body instead.
 */
export function placeFindings(
  files: PatchFile[],
  findings: Finding[],
  options: PlacementOptions = {}
): PlacementResult {
  const snapRadius = options.snapRadius ?? DEFAULT_SNAP_RADIUS;
  const changedPaths = new Set(files.map((f) => f.filename));
  const maps = buildPositionMaps(files);

  const inline: InlineCandidate[] = [];
  const unresolved: Finding[] = [];

  for (const f of findings) {
    const position = changedPaths.has(f.file)
      ? findPosition(maps, f.file, f.line, snapRadius)
      : undefined;

    if (position !== undefined) {
      inline.push({ path: f.file, position, body: formatInlineComment(f) });
    } else {
      unresolved.push(f);
    }
  }

  const fallbackBody =
    unresolved.length > 0
      ? buildFallbackBody(unresolved.map(formatFallbackEntry))
      : undefined;

  return { inline, unresolved, fallbackBody };
}

/**
 * Places findings and filters the whole candidate set against what the
 * pull request already carries. Nothing is returned before dedup has run.
 */
export function planComments(input: CommentPlanInput): CommentPlan {
  const placed = placeFindings(input.files, input.findings, {
    snapRadius: input.snapRadius,
  });

  for (const f of placed.unresolved) {
    log.info(
      { file: f.file, line: f.line, severity: f.severity },
      "Finding has no diff position, moving to summary"
    );
  }

  const { inline, fallback } = dedupExisting(
    {
      inlineComments: input.existingInlineComments,
      reviewBodies: input.existingReviewBodies,
    },
    placed.inline,
    placed.fallbackBody ? [placed.fallbackBody] : []
  );

  log.debug(
    {
      placed: placed.inline.length,
      kept: inline.length,
      fallbackKept: fallback.length > 0,
    },
    "Deduplicated against existing comments"
  );

  return { inlineCandidates: inline, fallbackBody: fallback[0] };
}
