// src/raci/format.ts — RACI matrix renderers (Markdown, JSON, CSV, HTML)

import { toCsv, type CsvCell } from "../csv.js";
import { toJson } from "../output.js";
import { ISSUE_SEVERITIES } from "../types.js";
import { countIssues } from "./generator.js";
import { isRaciCode, type RaciIssue, type RaciMatrix } from "./types.js";

export const RACI_FORMATS = ["markdown", "json", "csv", "html"] as const;
export type RaciFormat = (typeof RACI_FORMATS)[number];

const LEGEND: readonly [string, string][] = [
  ["R (Responsible)", "Does the work to complete the task"],
  ["A (Accountable)", "Ultimately answerable for the task (only ONE per task)"],
  ["C (Consulted)", "Provides input and expertise (two-way communication)"],
  ["I (Informed)", "Kept up-to-date on progress (one-way communication)"],
];

const SEVERITY_HEADINGS = {
  critical: "Critical",
  high: "High",
  medium: "Medium",
  low: "Low",
} as const;

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}

/** Keep a value inside its Markdown table cell. */
function cell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

// ─── Markdown ───────────────────────────────────────────────────────────────

function markdownIssues(issues: readonly RaciIssue[]): string[] {
  const lines: string[] = [];
  for (const severity of ISSUE_SEVERITIES) {
    const matching = issues.filter((i) => i.severity === severity);
    if (matching.length === 0) continue;
    lines.push(`### ${SEVERITY_HEADINGS[severity]} Priority`, "");
    for (const issue of matching) {
      lines.push(`- **${issue.activity ?? issue.role ?? "General"}**: ${issue.issue}`);
      lines.push(`  - *Recommendation:* ${issue.recommendation}`, "");
    }
  }
  return lines;
}

export function formatRaciMarkdown(result: RaciMatrix): string {
  const lines: string[] = [`# RACI Matrix: ${result.processName}`, ""];
  if (result.processDescription) lines.push(`**Description:** ${result.processDescription}`, "");
  lines.push(`**Generated:** ${result.generatedAt}`, "", "---", "");

  lines.push("## RACI Legend", "");
  for (const [term, meaning] of LEGEND) lines.push(`- **${term}:** ${meaning}`);
  lines.push("", "---", "");

  lines.push("## RACI Matrix", "");
  lines.push(`| Activity | ${result.roles.map(cell).join(" | ")} |`);
  lines.push(`|${"---|".repeat(result.roles.length + 1)}`);
  for (const entry of result.raciMatrix) {
    const codes = result.roles.map((role) => entry.roles[role] ?? "-");
    lines.push(`| ${cell(entry.activity)} | ${codes.join(" | ")} |`);
  }
  lines.push("", "---", "");

  lines.push("## Role Summary", "");
  lines.push("| Role | Responsible | Accountable | Consulted | Informed | Total |");
  lines.push("|------|-------------|-------------|-----------|----------|-------|");
  for (const role of result.roles) {
    const s = result.roleSummary[role];
    lines.push(`| ${cell(role)} | ${s.R} | ${s.A} | ${s.C} | ${s.I} | ${s.total} |`);
  }

  if (result.validationIssues.length > 0) {
    lines.push("", "---", "", "## Validation Issues", "");
    lines.push(...markdownIssues(result.validationIssues));
  }
  return lines.join("\n");
}

// ─── CSV ────────────────────────────────────────────────────────────────────

export function formatRaciCsv(result: RaciMatrix): string {
  const rows: CsvCell[][] = [["Activity", ...result.roles]];
  for (const entry of result.raciMatrix) {
    rows.push([entry.activity, ...result.roles.map((role) => entry.roles[role] ?? "")]);
  }
  return toCsv(rows);
}

// ─── HTML ───────────────────────────────────────────────────────────────────

const STYLES = [
  "body { font-family: Arial, sans-serif; margin: 20px; }",
  "h1 { color: #333; }",
  "table { border-collapse: collapse; width: 100%; margin: 20px 0; }",
  "th, td { border: 1px solid #ddd; padding: 12px; text-align: center; }",
  "th { background-color: #4CAF50; color: white; }",
  "tr:nth-child(even) { background-color: #f2f2f2; }",
  ".legend { margin: 20px 0; padding: 10px; background: #f9f9f9; border-left: 4px solid #4CAF50; }",
  ".R { background-color: #4CAF50; color: white; font-weight: bold; }",
  ".A { background-color: #2196F3; color: white; font-weight: bold; }",
  ".C { background-color: #FF9800; color: white; font-weight: bold; }",
  ".I { background-color: #9E9E9E; color: white; font-weight: bold; }",
];

export function formatRaciHtml(result: RaciMatrix): string {
  const name = escapeHtml(result.processName);
  const lines: string[] = [
    "<!DOCTYPE html>",
    "<html lang='en'>",
    "<head>",
    "<meta charset='UTF-8'>",
    `<title>RACI Matrix: ${name}</title>`,
    "<style>",
    ...STYLES,
    "</style>",
    "</head>",
    "<body>",
    `<h1>RACI Matrix: ${name}</h1>`,
  ];
  if (result.processDescription) {
    lines.push(`<p><strong>Description:</strong> ${escapeHtml(result.processDescription)}</p>`);
  }
  lines.push(`<p><strong>Generated:</strong> ${escapeHtml(result.generatedAt)}</p>`);

  lines.push("<div class='legend'>", "<h3>RACI Legend</h3>", "<ul>");
  for (const [term, meaning] of LEGEND) lines.push(`<li><strong>${term}:</strong> ${meaning}</li>`);
  lines.push("</ul>", "</div>");

  lines.push("<table>", "<thead><tr>", "<th>Activity</th>");
  for (const role of result.roles) lines.push(`<th>${escapeHtml(role)}</th>`);
  lines.push("</tr></thead>", "<tbody>");
  for (const entry of result.raciMatrix) {
    lines.push("<tr>", `<td style='text-align: left;'>${escapeHtml(entry.activity)}</td>`);
    for (const role of result.roles) {
      const code = entry.roles[role] ?? "-";
      lines.push(`<td class='${isRaciCode(code) ? code : ""}'>${code}</td>`);
    }
    lines.push("</tr>");
  }
  lines.push("</tbody>", "</table>", "</body>", "</html>");
  return lines.join("\n");
}

// ─── Dispatch ───────────────────────────────────────────────────────────────

export function formatRaciReport(result: RaciMatrix, format: RaciFormat): string {
  switch (format) {
    case "json":
      return toJson(result);
    case "csv":
      return formatRaciCsv(result);
    case "html":
      return formatRaciHtml(result);
    case "markdown":
      return formatRaciMarkdown(result);
  }
}

/** Issues only, for --validate-only. HTML falls back to Markdown. */
export function formatRaciValidation(result: RaciMatrix, format: RaciFormat): string {
  switch (format) {
    case "json":
      return toJson({
        processName: result.processName,
        activities: result.raciMatrix.length,
        roles: result.roles.length,
        issueCounts: countIssues(result.validationIssues),
        validationIssues: result.validationIssues,
      });
    case "csv": {
      const rows: CsvCell[][] = [["severity", "subject", "issue", "recommendation"]];
      for (const issue of result.validationIssues) {
        rows.push([issue.severity, issue.activity ?? issue.role ?? "", issue.issue, issue.recommendation]);
      }
      return toCsv(rows);
    }
    case "html":
    case "markdown": {
      const lines = [`# RACI Validation: ${result.processName}`, ""];
      lines.push(`**Activities:** ${result.raciMatrix.length}  `);
      lines.push(`**Roles:** ${result.roles.length}`, "");
      if (result.validationIssues.length === 0) {
        lines.push("No validation issues found.");
      } else {
        lines.push(...markdownIssues(result.validationIssues));
      }
      return lines.join("\n");
    }
  }
}
