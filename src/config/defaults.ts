import type { ReviewConfig } from "../config-loader/schema.js";

export const DEFAULT_CONFIG: ReviewConfig = {
  llm: {
    model: "claude-sonnet-4-20250514",
    maxTokens: 4096,
  },
  filters: {
    includeGlobs: [],
    excludeGlobs: [],
    maxFiles: 200,
  },
  review: {
    enableInline: true,
    maxDiffChars: 8000,
    maxFindings: 50,
    batchSize: 20,
    snapRadius: 3,
  },
};
