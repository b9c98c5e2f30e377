// src/code-quality/format.ts — Code quality report renderers

import { toCsv, type CsvCell } from "../csv.js";
import { toJson } from "../output.js";
import type { CodeQualityReport } from "./types.js";

export const QUALITY_FORMATS = ["text", "json", "csv"] as const;
export type QualityFormat = (typeof QUALITY_FORMATS)[number];

/** Findings listed in the text report; the rest are counted. */
const TEXT_FINDINGS_LIMIT = 20;

export function formatQualityText(report: CodeQualityReport): string {
  const out: string[] = [];
  out.push("=".repeat(60), "CODE QUALITY REPORT", "=".repeat(60));
  out.push(`Target: ${report.target}`);
  out.push(`Files Analyzed: ${report.filesAnalyzed}`);
  out.push(`Analyzed At: ${report.analyzedAt}`);
  out.push("");

  const { score, grade, breakdown } = report.qualityScore;
  out.push(`Quality Score: ${score}/100 (Grade: ${grade})`);
  out.push(`  Critical: ${breakdown.critical}`);
  out.push(`  High:     ${breakdown.high}`);
  out.push(`  Medium:   ${breakdown.medium}`);
  out.push(`  Low:      ${breakdown.low}`);
  out.push("");

  const { findings } = report;
  if (findings.length > 0) {
    out.push(`Findings (${findings.length} total):`, "-".repeat(40));
    for (const f of findings.slice(0, TEXT_FINDINGS_LIMIT)) {
      out.push(`[${f.severity}] ${f.patternId}: ${f.file}:${f.line}`);
      out.push(`  ${f.message}`);
      out.push(`  Fix: ${f.suggestion}`);
      out.push("");
    }
    if (findings.length > TEXT_FINDINGS_LIMIT) {
      out.push(`... and ${findings.length - TEXT_FINDINGS_LIMIT} more findings`, "");
    }
  }

  if (report.recommendations.length > 0) {
    out.push("Recommendations:", "-".repeat(40));
    report.recommendations.forEach((rec, i) => out.push(`${i + 1}. ${rec}`));
  }

  out.push("=".repeat(60));
  return out.join("\n");
}

export function formatQualityCsv(report: CodeQualityReport): string {
  const rows: CsvCell[][] = [["file", "line", "severity", "category", "pattern_id", "message", "suggestion"]];
  for (const f of report.findings) {
    rows.push([f.file, f.line, f.severity, f.category, f.patternId, f.message, f.suggestion]);
  }
  return toCsv(rows);
}

export function formatQualityReport(report: CodeQualityReport, format: QualityFormat): string {
  switch (format) {
    case "json":
      return toJson(report);
    case "csv":
      return formatQualityCsv(report);
    case "text":
      return formatQualityText(report);
  }
}
