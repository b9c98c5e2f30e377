// src/seo/format.ts — SEO audit renderers

import { toCsv, type CsvCell } from "../csv.js";
import { toJson } from "../output.js";
import type { CategorizedIssue, SeoAuditResult } from "./types.js";

export const SEO_FORMATS = ["text", "json", "csv"] as const;
export type SeoFormat = (typeof SEO_FORMATS)[number];

export function formatSeoText(result: SeoAuditResult): string {
  const out: string[] = [];
  const { summary } = result;

  out.push("=".repeat(60), "TECHNICAL SEO AUDIT REPORT", "=".repeat(60), "");

  out.push("SUMMARY", "-".repeat(40));
  out.push(`SEO Score: ${summary.seoScore}/100`);
  out.push(`Pages Audited: ${summary.pagesAudited}`);
  out.push(`Total Issues: ${summary.totalIssues}`);
  out.push(`  Critical: ${summary.criticalIssues}`);
  out.push(`  High: ${summary.highIssues}`);
  out.push(`  Medium: ${summary.mediumIssues}`);
  out.push(`  Low: ${summary.lowIssues}`);
  out.push(`Audit Date: ${result.auditDate.slice(0, 10)}`);
  out.push("");

  if (result.robotsTxt) {
    const robots = result.robotsTxt;
    out.push("ROBOTS.TXT", "-".repeat(40));
    out.push(`Status: ${robots.exists ? "Found" : "NOT FOUND"}`);
    if (robots.directives.sitemaps.length > 0) {
      out.push(`Sitemaps: ${robots.directives.sitemaps.join(", ")}`);
    }
    for (const issue of robots.issues) out.push(`  [${issue.severity.toUpperCase()}] ${issue.message}`);
    out.push("");
  }

  if (result.sitemap) {
    const sitemap = result.sitemap;
    out.push("SITEMAP.XML", "-".repeat(40));
    out.push(`Status: ${sitemap.exists ? "Found" : "NOT FOUND"}`);
    if (sitemap.urlCount > 0) out.push(`URLs: ${sitemap.urlCount}`);
    for (const issue of sitemap.issues) out.push(`  [${issue.severity.toUpperCase()}] ${issue.message}`);
    out.push("");
  }

  const categories = Object.entries(result.issuesByCategory).filter(
    (entry): entry is [string, CategorizedIssue[]] => entry[1] !== undefined,
  );
  if (categories.length > 0) {
    out.push("ISSUES BY CATEGORY", "-".repeat(40));
    for (const [category, issues] of categories) {
      out.push("", `${category.toUpperCase()} (${issues.length} issues)`);
      for (const issue of issues.slice(0, 5)) {
        out.push(`  [${issue.severity.toUpperCase()}] ${issue.message}`);
        out.push(`    File: ${issue.file}`);
      }
    }
    out.push("");
  }

  if (result.recommendations.length > 0) {
    out.push("RECOMMENDATIONS", "-".repeat(40));
    result.recommendations.forEach((rec, i) => out.push(`${i + 1}. ${rec}`));
    out.push("");
  }

  return out.join("\n");
}

/** One row per issue; robots.txt and sitemap.xml issues are filed under crawlability. */
export function formatSeoCsv(result: SeoAuditResult): string {
  const rows: CsvCell[][] = [["file", "severity", "category", "message", "recommendation"]];
  for (const page of result.pages) {
    for (const issue of page.issues) {
      rows.push([page.file, issue.severity, issue.category, issue.message, issue.recommendation]);
    }
  }
  for (const issue of result.robotsTxt?.issues ?? []) {
    rows.push(["robots.txt", issue.severity, "crawlability", issue.message, ""]);
  }
  for (const issue of result.sitemap?.issues ?? []) {
    rows.push(["sitemap.xml", issue.severity, "crawlability", issue.message, ""]);
  }
  return toCsv(rows);
}

export function formatSeoReport(result: SeoAuditResult, format: SeoFormat): string {
  switch (format) {
    case "json":
      return toJson(result);
    case "csv":
      return formatSeoCsv(result);
    case "text":
      return formatSeoText(result);
  }
}
