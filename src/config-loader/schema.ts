import { z } from "zod";

const reviewConfigSchema = z.object({
  llm: z
    .object({
      model: z.string().default("claude-sonnet-4-20250514"),
      maxTokens: z.number().int().positive().default(4096),
      systemPrompt: z.string().optional(),
      style: z.string().optional(),
    })
    .default({}),
  filters: z
    .object({
      includeGlobs: z.array(z.string()).default([]),
      excludeGlobs: z.array(z.string()).default([]),
      maxFiles: z.number().int().positive().default(200),
    })
    .default({}),
  review: z
    .object({
      enableInline: z.boolean().default(true),
      // Worst severity that fails the job; unknown values never fail
      failLevel: z.string().optional(),
      maxDiffChars: z.number().int().positive().default(8000),
      maxFindings: z.number().int().positive().default(50),
      batchSize: z.number().int().positive().default(20),
      snapRadius: z.number().int().min(0).default(3),
    })
    .default({}),
});

export type ReviewConfig = z.infer<typeof reviewConfigSchema>;

/** Parses a loaded YAML document; an empty document yields the defaults */
export function parseReviewConfig(raw: unknown): ReviewConfig {
  return reviewConfigSchema.parse(raw ?? {});
}

export function safeParseReviewConfig(raw: unknown) {
  return reviewConfigSchema.safeParse(raw ?? {});
}
