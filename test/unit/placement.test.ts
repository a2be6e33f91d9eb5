import { describe, it, expect } from "vitest";
import { placeFindings, planComments } from "../../src/review/placement.js";
import type { Finding } from "../../src/review/types.js";
import { END_TO_END_PATCH, MULTI_HUNK_PATCH } from "../fixtures/sample-patch.js";

function makeFinding(overrides: Partial<Finding>): Finding {
  return {
    severity: "MAJOR",
    file: "f.py",
    line: 2,
    title: "Off by one",
    detail: "Loop skips the last item.",
    ...overrides,
  };
}

const files = [{ filename: "f.py", patch: END_TO_END_PATCH }];

const INLINE_BODY = "🟠 **MAJOR** — Off by one\n\nLoop skips the last item.";

const FALLBACK_99 = [
  "<!-- pinpoint-review -->",
  "### 🤖 Pinpoint Review (findings without a diff position)",
  "",
  "- 🟠 **MAJOR** `f.py` L99 — Off by one\n  Loop skips the last item.",
].join("\n");

describe("placeFindings", () => {
  it("places a finding on the added line's position", () => {
    const result = placeFindings(files, [makeFinding({ line: 2 })]);

    expect(result.inline).toEqual([{ path: "f.py", position: 3, body: INLINE_BODY }]);
    expect(result.unresolved).toEqual([]);
    expect(result.fallbackBody).toBeUndefined();
  });

  it("sends a far-away line to the fallback body", () => {
    const result = placeFindings(files, [makeFinding({ line: 99 })]);

    expect(result.inline).toEqual([]);
    expect(result.unresolved).toHaveLength(1);
    expect(result.fallbackBody).toBe(FALLBACK_99);
  });

  it("snaps a context line next to an added line", () => {
    const result = placeFindings(files, [makeFinding({ line: 3 })]);

    expect(result.inline.map((c) => c.position)).toEqual([3]);
  });

  it("honours a custom snap radius", () => {
    const multi = [{ filename: "utils.ts", patch: MULTI_HUNK_PATCH }];
    const finding = makeFinding({ file: "utils.ts", line: 15 });

    expect(placeFindings(multi, [finding], { snapRadius: 3 }).inline).toHaveLength(1);
    expect(placeFindings(multi, [finding], { snapRadius: 2 }).inline).toHaveLength(0);
  });

  it("sends findings on unchanged files or without a line to the fallback", () => {
    const result = placeFindings(files, [
      makeFinding({ file: "other.py", line: 2 }),
      makeFinding({ line: undefined, title: "General" }),
    ]);

    expect(result.inline).toEqual([]);
    expect(result.unresolved.map((f) => f.title)).toEqual(["Off by one", "General"]);
    expect(result.fallbackBody).toContain("- 🟠 **MAJOR** `other.py` L2 — Off by one");
    expect(result.fallbackBody).toContain("- 🟠 **MAJOR** `f.py` — General");
  });

  it("sends every finding on a file without patch text to the fallback", () => {
    const result = placeFindings([{ filename: "logo.png" }], [makeFinding({ file: "logo.png", line: 1 })]);

    expect(result.inline).toEqual([]);
    expect(result.unresolved).toHaveLength(1);
  });
});

describe("planComments", () => {
  it("produces one inline candidate and no fallback for a resolvable finding", () => {
    const plan = planComments({
      files,
      findings: [makeFinding({ line: 2 })],
      existingInlineComments: [],
      existingReviewBodies: [],
    });

    expect(plan).toEqual({
      inlineCandidates: [{ path: "f.py", position: 3, body: INLINE_BODY }],
      fallbackBody: undefined,
    });
  });

  it("produces no inline candidate and one fallback body for an unresolvable finding", () => {
    const plan = planComments({
      files,
      findings: [makeFinding({ line: 99 })],
      existingInlineComments: [],
      existingReviewBodies: [],
    });

    expect(plan.inlineCandidates).toEqual([]);
    expect(plan.fallbackBody).toBe(FALLBACK_99);
  });

  it("drops what a previous run already posted", () => {
    const findings = [makeFinding({ line: 2 }), makeFinding({ line: 99 })];
    const plan = planComments({
      files,
      findings,
      existingInlineComments: [{ path: "f.py", position: 3, line: 2, body: INLINE_BODY }],
      existingReviewBodies: [`${FALLBACK_99}\n`],
    });

    expect(plan).toEqual({ inlineCandidates: [], fallbackBody: undefined });
  });

  it("passes the snap radius through", () => {
    const plan = planComments({
      files,
      findings: [makeFinding({ line: 4 })],
      existingInlineComments: [],
      existingReviewBodies: [],
      snapRadius: 1,
    });

    expect(plan.inlineCandidates).toEqual([]);
    expect(plan.fallbackBody).toContain("`f.py` L4");
  });
});
