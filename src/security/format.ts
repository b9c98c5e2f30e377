// src/security/format.ts — Security audit renderers

import { toCsv, type CsvCell } from "../csv.js";
import { toJson } from "../output.js";
import type { SecurityAuditResult } from "./types.js";

export const SECURITY_FORMATS = ["text", "json", "csv"] as const;
export type SecurityFormat = (typeof SECURITY_FORMATS)[number];

const TEXT_FINDINGS_LIMIT = 50;
const RULE = "=".repeat(80);
const SUBRULE = "-".repeat(80);

export function formatSecurityText(result: SecurityAuditResult): string {
  const out: string[] = [RULE, "SECURITY AUDIT REPORT", RULE];
  out.push(`Timestamp: ${result.timestamp}`);
  out.push(`Target: ${result.target}`);
  out.push(`Files Audited: ${result.auditStats.filesAudited}`);
  out.push(`Lines Audited: ${result.auditStats.linesAudited}`);
  out.push("");

  const { summary } = result;
  out.push("SUMMARY", SUBRULE);
  out.push(`Security Score: ${summary.auditScore}/100`);
  out.push(`Total Findings: ${summary.totalFindings}`);
  out.push(`  Critical: ${summary.critical}`);
  out.push(`  High: ${summary.high}`);
  out.push(`  Medium: ${summary.medium}`);
  out.push(`  Low: ${summary.low}`);
  out.push("");

  out.push("BY CATEGORY", SUBRULE);
  for (const [category, count] of Object.entries(result.byCategory)) {
    if (count > 0) out.push(`  ${category}: ${count}`);
  }
  out.push("");

  if (result.findings.length > 0) {
    out.push("FINDINGS", SUBRULE);
    for (const f of result.findings.slice(0, TEXT_FINDINGS_LIMIT)) {
      out.push(`[${f.severity}] ${f.checkId}: ${f.name}`);
      out.push(`  File: ${f.file}:${f.line}`);
      out.push(`  Recommendation: ${f.recommendation}`);
      out.push("");
    }
  }

  out.push("RECOMMENDATIONS", SUBRULE);
  result.recommendations.forEach((rec, i) => out.push(`${i + 1}. ${rec}`));
  out.push(RULE);
  return out.join("\n");
}

export function formatSecurityCsv(result: SecurityAuditResult): string {
  const rows: CsvCell[][] = [
    ["check_id", "category", "name", "severity", "file", "line", "description", "recommendation", "cwe"],
  ];
  for (const f of result.findings) {
    rows.push([f.checkId, f.category, f.name, f.severity, f.file, f.line, f.description, f.recommendation, f.cwe ?? ""]);
  }
  return toCsv(rows);
}

export function formatSecurityReport(result: SecurityAuditResult, format: SecurityFormat): string {
  switch (format) {
    case "json":
      return toJson(result);
    case "csv":
      return formatSecurityCsv(result);
    case "text":
      return formatSecurityText(result);
  }
}
