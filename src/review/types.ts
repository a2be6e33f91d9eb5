import type { PatchFile } from "../utils/diff-parser.js";

/** Ordered from least to most severe */
export const SEVERITIES = ["SUGGESTION", "MINOR", "MAJOR", "CRITICAL"] as const;

export type Severity = (typeof SEVERITIES)[number];

/** A normalized finding from the model's output */
export interface Finding {
  severity: Severity;
  file: string;
  line?: number;
  title: string;
  detail: string;
  fix?: string;
}

/** An inline comment ready for the review API, addressed by diff position */
export interface InlineCandidate {
  path: string;
  position: number;
  body: string;
}

/** A review comment already present on the pull request */
export interface ExistingComment {
  path: string;
  position?: number | null;
  line?: number | null;
  body?: string | null;
}

export interface ExistingState {
  inlineComments: ExistingComment[];
  reviewBodies: Array<string | null | undefined>;
}

export interface CommentPlanInput {
  files: PatchFile[];
  findings: Finding[];
  existingInlineComments: ExistingComment[];
  existingReviewBodies: Array<string | null | undefined>;
  snapRadius?: number;
}

/** Deduplicated output of a review pass, ready for posting */
export interface CommentPlan {
  inlineCandidates: InlineCandidate[];
  fallbackBody?: string;
}

export interface ReviewOutcome {
  status: "skipped-draft" | "no-files" | "no-findings" | "posted";
  findings: Finding[];
  inlinePosted: number;
  fallbackPosted: boolean;
  failed: boolean;
}
