import type { PatchFile } from "../utils/diff-parser.js";

export interface PromptOptions {
  userPrompt?: string;
  maxDiffChars: number;
  style?: string;
}

export const NO_DIFF_PLACEHOLDER = "(no diff available)";

/**
 * Concatenates `=== <file> ===` patch blocks until `maxDiffChars` is used up.
 * The block that crosses the limit is cut to fit and nothing follows it.
 */
export function buildDiffSnippet(files: PatchFile[], maxDiffChars: number): string {
  const blocks: string[] = [];
  let used = 0;

  for (const f of files) {
    const block = `\n\n=== ${f.filename} ===\n${f.patch ?? ""}`;
    if (used + block.length > maxDiffChars) {
      const remaining = maxDiffChars - used;
      if (remaining > 0) {
        blocks.push(block.slice(0, remaining));
        used += remaining;
      }
      break;
    }
    blocks.push(block);
    used += block.length;
  }

  return blocks.length > 0 ? blocks.join("") : NO_DIFF_PLACEHOLDER;
}

export function buildPrompt(files: PatchFile[], options: PromptOptions): string {
  const fileList = files.map((f) => `- ${f.filename}`).join("\n");
  const diff = buildDiffSnippet(files, options.maxDiffChars);
  const styleDirective = options.style ? `\nUse a ${options.style} tone.` : "";
  const extra = options.userPrompt?.trim() || "(none)";

  return `You are an experienced engineer reviewing the pull request diff below.${styleDirective}
Reply with a JSON array only, inside a \`\`\`json code fence.

Schema:
[
  {
    "severity": "CRITICAL" | "MAJOR" | "MINOR" | "SUGGESTION",
    "file": "relative path, e.g. src/main.ts",
    "line": 123,
    "title": "short headline",
    "detail": "reasoning, briefly",
    "fix": "concrete fix (optional)"
  }
]

Rules:
- "line" is a line number in the NEW version of the file (right side of the diff)
- Prefer lines that were added in this diff

## Changed files
${fileList}

## Diff (at most ${options.maxDiffChars} characters)
${diff}

## Additional instructions
${extra}`;
}
