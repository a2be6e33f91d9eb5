import { describe, it, expect } from "vitest";
import {
  extractJsonBlock,
  normalizeFindings,
  parseFindingsFromText,
} from "../../src/llm/parser.js";

describe("extractJsonBlock", () => {
  it("returns the contents of a json fence", () => {
    const text = 'Here you go:\n```json\n[{"title": "a"}]\n```\nThanks';

    expect(extractJsonBlock(text)).toBe('[{"title": "a"}]');
  });

  it("matches the fence label case-insensitively", () => {
    expect(extractJsonBlock("```JSON\n[]\n```")).toBe("[]");
  });

  it("returns undefined without a fence", () => {
    expect(extractJsonBlock("no json here")).toBeUndefined();
  });
});

describe("normalizeFindings", () => {
  it("normalizes a well-formed finding", () => {
    const findings = normalizeFindings(
      [
        {
          severity: " major ",
          file: "src/app.ts",
          line: 12,
          title: "  Leak  ",
          detail: " Handle is never closed. ",
          fix: " close it ",
        },
      ],
      10
    );

    expect(findings).toEqual([
      {
        severity: "MAJOR",
        file: "src/app.ts",
        line: 12,
        title: "Leak",
        detail: "Handle is never closed.",
        fix: "close it",
      },
    ]);
  });

  it("fills defaults for missing or invalid fields", () => {
    const [finding] = normalizeFindings([{ severity: "blocker", line: "abc" }], 10);

    expect(finding.severity).toBe("SUGGESTION");
    expect(finding.file).toBe("-");
    expect(finding.line).toBeUndefined();
    expect(finding.title).toBe("(untitled)");
    expect(finding.detail).toBe("");
    expect(finding.fix).toBeUndefined();
  });

  it("coerces numeric strings and drops non-positive lines", () => {
    const findings = normalizeFindings(
      [{ line: "42" }, { line: 7.9 }, { line: 0 }, { line: -3 }, { line: null }],
      10
    );

    expect(findings.map((f) => f.line)).toEqual([42, 7, undefined, undefined, undefined]);
  });

  it("treats a blank fix as absent", () => {
    const [finding] = normalizeFindings([{ title: "t", fix: "   " }], 10);

    expect(finding.fix).toBeUndefined();
  });

  it("wraps a single object in a list", () => {
    expect(normalizeFindings({ title: "only" }, 10).map((f) => f.title)).toEqual(["only"]);
  });

  it("returns nothing for non-list, non-object data", () => {
    expect(normalizeFindings("text", 10)).toEqual([]);
    expect(normalizeFindings(null, 10)).toEqual([]);
    expect(normalizeFindings(3, 10)).toEqual([]);
  });

  it("skips non-object items and reads at most maxFindings entries", () => {
    const findings = normalizeFindings(
      [{ title: "one" }, "junk", { title: "two" }, { title: "three" }],
      3
    );

    expect(findings.map((f) => f.title)).toEqual(["one", "two"]);
  });
});

describe("parseFindingsFromText", () => {
  it("parses a plain JSON string", () => {
    const raw = JSON.stringify([
      { severity: "major", file: "foo.py", line: 10, title: "Issue", detail: "Fix it" },
    ]);

    const { findings, parsed } = parseFindingsFromText(raw, 5);

    expect(parsed).toBe(true);
    expect(findings).toHaveLength(1);
    expect(findings[0].severity).toBe("MAJOR");
  });

  it("prefers the fenced block over surrounding prose", () => {
    const text = 'Review:\n```json\n[{"severity": "CRITICAL", "file": "a.ts", "title": "SQL injection"}]\n```';

    const { findings, parsed } = parseFindingsFromText(text, 5);

    expect(parsed).toBe(true);
    expect(findings.map((f) => [f.severity, f.title])).toEqual([["CRITICAL", "SQL injection"]]);
  });

  it("reports an empty JSON list as parsed with no findings", () => {
    expect(parseFindingsFromText("```json\n[]\n```", 5)).toEqual({ findings: [], parsed: true });
  });

  it("returns parsed false when there is no JSON", () => {
    expect(parseFindingsFromText("plain text", 5)).toEqual({ findings: [], parsed: false });
    expect(parseFindingsFromText("   ", 5)).toEqual({ findings: [], parsed: false });
  });

  it("returns parsed false for a broken fenced block", () => {
    expect(parseFindingsFromText("```json\n[{oops\n```", 5)).toEqual({
      findings: [],
      parsed: false,
    });
  });
});
