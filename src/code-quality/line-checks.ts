// src/code-quality/line-checks.ts — Long lines and deep indentation

import type { QualityFinding } from "./types.js";

/** Lines longer than `maxLength` characters (GEN-004). */
export function detectLongLines(lines: readonly string[], file: string, maxLength: number): QualityFinding[] {
  const findings: QualityFinding[] = [];
  lines.forEach((line, index) => {
    const length = [...line].length;
    if (length <= maxLength) return;
    findings.push({
      file,
      line: index + 1,
      severity: "LOW",
      category: "style",
      patternId: "GEN-004",
      message: `Line exceeds ${maxLength} characters (${length} chars)`,
      suggestion: `Break line to stay under ${maxLength} characters`,
      lineContent: `Line length: ${length} chars`,
    });
  });
  return findings;
}

/**
 * Nesting level from leading whitespace: one level per tab when the indent
 * contains a tab, else one per four spaces.
 */
export function indentDepth(line: string): number {
  const indent = /^[ \t]*/.exec(line)?.[0] ?? "";
  if (indent.includes("\t")) return indent.split("\t").length - 1;
  return Math.floor(indent.length / 4);
}

/** Non-blank lines at `maxDepth` levels of indentation or deeper (GEN-005). */
export function detectDeepNesting(lines: readonly string[], file: string, maxDepth: number): QualityFinding[] {
  const findings: QualityFinding[] = [];
  lines.forEach((line, index) => {
    if (line.trim() === "") return;
    const depth = indentDepth(line);
    if (depth < maxDepth) return;
    findings.push({
      file,
      line: index + 1,
      severity: "MEDIUM",
      category: "complexity",
      patternId: "GEN-005",
      message: `Deep nesting detected (level ${depth})`,
      suggestion: "Refactor to reduce nesting: extract methods, use early returns",
      lineContent: line.trimStart().slice(0, 80),
    });
  });
  return findings;
}
