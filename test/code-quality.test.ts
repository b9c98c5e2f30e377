import { describe, it, expect } from "vitest";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { analyzeScriptAst, detectMutableDefaults } from "../src/code-quality/ast-checks.js";
import { detectDeepNesting, detectLongLines, indentDepth } from "../src/code-quality/line-checks.js";
import { loadQualityPatterns } from "../src/code-quality/patterns.js";
import {
  calculateQualityScore,
  checkCodeQuality,
  checkSource,
  gradeFor,
  qualityExitCode,
  qualityRecommendations,
  resolveLanguageFilter,
  type FileCheckSettings,
} from "../src/code-quality/checker.js";
import { formatQualityCsv, formatQualityText } from "../src/code-quality/format.js";
import type { FindingSeverity, QualityFinding } from "../src/code-quality/types.js";
import { ValidationError } from "../src/errors.js";
import type { Warning } from "../src/types.js";

const CODE = resolve(dirname(fileURLToPath(import.meta.url)), "fixtures", "code");
const NOW = new Date("2025-06-01T09:30:00Z");

const settings: FileCheckSettings = {
  patterns: loadQualityPatterns(),
  maxLineLength: 120,
  maxNestingDepth: 4,
};

function ids(findings: readonly QualityFinding[]): [string, number][] {
  return findings.map((f): [string, number] => [f.patternId, f.line]);
}

function finding(patternId: string, severity: FindingSeverity): QualityFinding {
  return {
    file: "a.ts",
    line: 1,
    severity,
    category: "code-smell",
    patternId,
    message: "",
    suggestion: "",
    lineContent: "",
  };
}

describe("pattern catalog", () => {
  it("loads every entry without warnings", () => {
    const warnings: Warning[] = [];
    const patterns = loadQualityPatterns(warnings);
    expect(warnings).toEqual([]);
    expect(patterns.find((p) => p.id === "PY-003")?.scope).toBe("content");
    expect(patterns.filter((p) => p.category === "security").every((p) => p.regex.flags.includes("i"))).toBe(true);
  });

  it("tells loose equality and props mutation from their strict forms", () => {
    const src = "if (a == b) {}\nif (a === b) {}\nprops.value = 1;\nif (props.value === 1) {}\n";
    expect(ids(checkSource(src, "a.ts", "typescript", settings))).toEqual([
      ["TS-005", 1],
      ["TS-007", 3],
    ]);
  });

  it("matches security patterns regardless of case", () => {
    expect(ids(checkSource('PASSWORD = "test-secret"\n', "a.py", "python", settings))).toEqual([["SEC-003", 1]]);
  });

  it("flags four-digit literals but not version suffixes", () => {
    const src = 'const timeout = 30000;\nconst version = "v1.2345";\n';
    expect(ids(checkSource(src, "a.ts", "typescript", settings))).toEqual([["GEN-002", 1]]);
  });

  it("reports except/pass across lines on the except line", () => {
    const src = "try:\n    run()\nexcept ValueError:\n    pass\n";
    const found = checkSource(src, "a.py", "python", settings);
    expect(ids(found)).toEqual([
      ["PY-003", 3],
    ]);
    expect(found[0].lineContent).toBe("except ValueError:");
  });

  it("applies language-specific patterns only to their language", () => {
    expect(checkSource("let x: any = 1;\n", "a.ts", "typescript", settings).map((f) => f.patternId)).toEqual(["TS-001"]);
    expect(checkSource("let x: any = 1;\n", "a.go", "go", settings)).toEqual([]);
  });
});

describe("syntax-aware checks", () => {
  it("finds empty catch blocks spanning several lines", () => {
    const src = ["try {", "  run();", "} catch {", "", "}", "try { run(); } catch (e) { /* ignored */ }"].join("\n");
    const found = analyzeScriptAst(src, "a.ts", src.split("\n"));
    expect(ids(found)).toEqual([["TS-003", 3]]);
    expect(found[0].lineContent).toBe("} catch {");
  });

  it("names functions with long parameter lists", () => {
    const src = [
      "const handler = (a, b, c, d, e, f) => a;",
      "class Box {",
      "  fill(a, b, c, d, e, f) { return a; }",
      "  ok(a, b, c, d, e) { return a; }",
      "}",
    ].join("\n");
    const found = analyzeScriptAst(src, "a.js", src.split("\n"));
    expect(found.map((f) => [f.line, f.message])).toEqual([
      [1, "Function 'handler' has 6 parameters (max 5)"],
      [3, "Function 'fill' has 6 parameters (max 5)"],
    ]);
  });

  it("finds mutable defaults in Python signatures", () => {
    const src = "def ok(a, b=None):\n    pass\n\nasync def bad(a, *, opts={}):\n    pass\n\ndef multi(\n    a,\n    b=[],\n):\n    pass\n";
    expect(detectMutableDefaults(src, "a.py").map((f) => [f.line, f.message])).toEqual([
      [4, "Mutable default argument in function 'bad'"],
      [7, "Mutable default argument in function 'multi'"],
    ]);
  });
});

describe("line checks", () => {
  it("reports lines over the limit", () => {
    const found = detectLongLines(["x".repeat(121), "y".repeat(120)], "a.ts", 120);
    expect(found).toHaveLength(1);
    expect(found[0].message).toBe("Line exceeds 120 characters (121 chars)");
    expect(found[0].lineContent).toBe("Line length: 121 chars");
  });

  it("measures depth in tabs or groups of four spaces", () => {
    expect(indentDepth("\t\t\t\tx")).toBe(4);
    expect(indentDepth(" ".repeat(16) + "x")).toBe(4);
    expect(indentDepth(" ".repeat(15) + "x")).toBe(3);
    expect(indentDepth("\t  x")).toBe(1);
  });

  it("skips blank lines when checking nesting", () => {
    const found = detectDeepNesting(["\t\t\t\t", "\t\t\t\treturn x;"], "a.ts", 4);
    expect(found.map((f) => [f.line, f.message, f.lineContent])).toEqual([
      [2, "Deep nesting detected (level 4)", "return x;"],
    ]);
  });
});

describe("scoring", () => {
  it("maps scores to grades", () => {
    expect([90, 89, 80, 79, 70, 60, 59].map(gradeFor)).toEqual(["A", "B", "B", "C", "C", "D", "F"]);
  });

  it("weights severities and clamps at zero", () => {
    const q = calculateQualityScore([finding("A", "CRITICAL"), finding("B", "MEDIUM"), finding("C", "LOW")]);
    expect(q).toEqual({ score: 76, grade: "C", breakdown: { critical: 1, high: 0, medium: 1, low: 1 } });
    expect(calculateQualityScore(Array.from({ length: 6 }, () => finding("A", "CRITICAL"))).score).toBe(0);
  });

  it("recommends bulk fixes for repeated patterns", () => {
    const findings = [finding("GEN-001", "LOW"), finding("GEN-001", "LOW"), finding("GEN-001", "LOW")];
    expect(qualityRecommendations(findings, calculateQualityScore(findings))).toEqual([
      "Found 3 instances of GEN-001 - consider a bulk fix",
    ]);
    expect(qualityRecommendations([], calculateQualityScore([]))).toEqual([
      "Code quality is excellent! No critical issues found.",
    ]);
  });

  it("keeps at most five recommendations", () => {
    const findings = [finding("X", "CRITICAL"), finding("Y", "HIGH")];
    for (const id of ["P1", "P2", "P3", "P4"]) {
      findings.push(finding(id, "LOW"), finding(id, "LOW"), finding(id, "LOW"));
    }
    const recs = qualityRecommendations(findings, calculateQualityScore(findings));
    expect(recs).toHaveLength(5);
    expect(recs[4]).toBe("Found 3 instances of P3 - consider a bulk fix");
  });
});

describe("resolveLanguageFilter", () => {
  it("accepts known languages in any case", () => {
    expect(resolveLanguageFilter(undefined)).toBeUndefined();
    expect(resolveLanguageFilter("all")).toBeUndefined();
    expect(resolveLanguageFilter("Python")).toBe("python");
    expect(() => resolveLanguageFilter("cobol")).toThrow(ValidationError);
  });
});

describe("checkCodeQuality", () => {
  it("scans the fixture tree", () => {
    const report = checkCodeQuality(CODE, { now: NOW });

    expect(report.filesAnalyzed).toBe(2);
    expect(report.findings.map((f) => [f.severity, f.patternId, `${f.file}:${f.line}`])).toEqual([
      ["CRITICAL", "SEC-004", "src/app.ts:13"],
      ["HIGH", "TS-003", "src/app.ts:4"],
      ["HIGH", "PY-001", "src/util.py:4"],
      ["HIGH", "PY-002", "src/util.py:7"],
      ["HIGH", "PY-003", "src/util.py:7"],
      ["MEDIUM", "TS-008", "src/app.ts:9"],
      ["LOW", "TS-006", "src/app.ts:14"],
      ["LOW", "PY-007", "src/util.py:9"],
    ]);
    expect(report.qualityScore).toEqual({
      score: 35,
      grade: "F",
      breakdown: { critical: 1, high: 4, medium: 1, low: 2 },
    });
    expect(report.recommendations).toEqual([
      "URGENT: Fix 1 critical security issue(s) before merging",
      "Address 4 high-severity issue(s) before merging",
    ]);
    expect(qualityExitCode(report)).toBe(1);
  });

  it("filters by language", () => {
    const report = checkCodeQuality(CODE, { now: NOW, language: "python" });
    expect(report.filesAnalyzed).toBe(1);
    expect(report.qualityScore.score).toBe(69);
    expect(report.qualityScore.grade).toBe("D");
    expect(qualityExitCode(report)).toBe(0);
  });

  it("drops findings below the severity floor", () => {
    const report = checkCodeQuality(CODE, { now: NOW, minSeverity: "HIGH" });
    expect(report.findings.map((f) => f.patternId)).toEqual(["SEC-004", "TS-003", "PY-001", "PY-002", "PY-003"]);
    expect(report.qualityScore.score).toBe(40);
  });

  it("honours exclude globs", () => {
    const report = checkCodeQuality(CODE, { now: NOW, exclude: ["**/*.py"] });
    expect(report.filesAnalyzed).toBe(1);
    expect(new Set(report.findings.map((f) => f.file))).toEqual(new Set(["src/app.ts"]));
  });

  it("renders the text and CSV reports", () => {
    const report = checkCodeQuality(CODE, { now: NOW });
    const text = formatQualityText(report).split("\n");
    expect(text[3]).toBe(`Target: ${CODE}`);
    expect(text.slice(4, 19)).toEqual([
      "Files Analyzed: 2",
      "Analyzed At: 2025-06-01T09:30:00.000Z",
      "",
      "Quality Score: 35/100 (Grade: F)",
      "  Critical: 1",
      "  High:     4",
      "  Medium:   1",
      "  Low:      2",
      "",
      "Findings (8 total):",
      "-".repeat(40),
      "[CRITICAL] SEC-004: src/app.ts:13",
      "  Hardcoded API key detected",
      "  Fix: Use environment variables or secure secrets management",
      "",
    ]);
    expect(text[text.length - 1]).toBe("=".repeat(60));

    const csv = formatQualityCsv(report).split("\n");
    expect(csv[0]).toBe("file,line,severity,category,pattern_id,message,suggestion");
    expect(csv[1]).toBe(
      "src/app.ts,13,CRITICAL,security,SEC-004,Hardcoded API key detected,Use environment variables or secure secrets management",
    );
  });
});
