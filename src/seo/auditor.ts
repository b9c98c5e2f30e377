// src/seo/auditor.ts — Site-wide technical SEO audit
//
// Pipeline: crawl files (robots.txt, sitemap.xml) → per-page extraction and rules
// → severity counts → score → recommendations.

import { readFileSync } from "node:fs";
import { discoverFiles, displayPath } from "../file-discovery.js";
import { errorMessage } from "../errors.js";
import { vlog } from "../output.js";
import type { IssueSeverity, Warning } from "../types.js";
import { checkRobotsTxt, checkSitemap } from "./crawl-files.js";
import { parsePage } from "./html-parser.js";
import { analyzePageIssues } from "./page-issues.js";
import {
  SEO_CATEGORIES,
  type CategorizedIssue,
  type CrawlIssue,
  type RobotsTxtResult,
  type SeoAuditResult,
  type SeoCategory,
  type SeoIssue,
  type SeoSummary,
  type SitemapResult,
} from "./types.js";

export interface SeoAuditOptions {
  /** Check names from `--checks`; all checks when empty. */
  checks?: readonly string[];
  maxFiles?: number;
  internalHosts?: readonly string[];
  now?: Date;
  verbose?: boolean;
}

const HTML_EXTENSIONS: ReadonlySet<string> = new Set([".html", ".htm"]);

/** Skip only tooling directories: exported sites often live under dist/ or build/. */
const SITE_SKIP_DIRS = ["node_modules", ".git", ".svn", ".hg"];

const CHECK_ALIASES = new Map<string, readonly SeoCategory[]>([
  ["all", SEO_CATEGORIES],
  ["structure", ["content", "linking"]],
]);

const PAGE_ISSUE_WEIGHTS: Record<IssueSeverity, number> = {
  critical: 5,
  high: 3,
  medium: 1,
  low: 0.5,
};

/**
 * Turn `--checks` names into categories. Unknown names are reported and ignored.
 */
export function resolveSeoChecks(checks: readonly string[] | undefined, warnings: Warning[] = []): Set<SeoCategory> {
  const names = (checks ?? []).map((c) => c.trim().toLowerCase()).filter((c) => c.length > 0);
  if (names.length === 0) return new Set(SEO_CATEGORIES);

  const selected = new Set<SeoCategory>();
  for (const name of names) {
    const alias = CHECK_ALIASES.get(name);
    const category = SEO_CATEGORIES.find((c) => c === name);
    if (alias) alias.forEach((c) => selected.add(c));
    else if (category) selected.add(category);
    else {
      warnings.push({
        level: "warn",
        module: "seo-audit",
        message: `Unknown check "${name}". Available: ${[...CHECK_ALIASES.keys(), ...SEO_CATEGORIES].join(", ")}`,
      });
    }
  }
  return selected;
}

/**
 * Score out of 100: deductions for missing crawl files and their issues, plus
 * the average page-issue weight per page, truncated and capped at 50.
 */
export function calculateSeoScore(
  pageIssues: readonly SeoIssue[],
  pageCount: number,
  robots: RobotsTxtResult | null,
  sitemap: SitemapResult | null,
): number {
  let score = 100;

  if (robots) {
    if (!robots.exists) score -= 10;
    for (const issue of robots.issues) {
      if (issue.severity === "critical") score -= 20;
      else if (issue.severity === "high") score -= 10;
    }
  }

  if (sitemap) {
    if (!sitemap.exists) score -= 10;
    for (const issue of sitemap.issues) {
      if (issue.severity === "high") score -= 5;
    }
  }

  if (pageCount > 0) {
    const total = pageIssues.reduce((sum, issue) => sum + PAGE_ISSUE_WEIGHTS[issue.severity], 0);
    score -= Math.trunc(Math.min(total / pageCount, 50));
  }

  return Math.max(0, Math.min(100, score));
}

export function seoRecommendations(result: SeoAuditResult): string[] {
  const recommendations: string[] = [];
  const { summary, issuesByCategory } = result;

  if (summary.criticalIssues > 0) {
    recommendations.push(`URGENT: Fix ${summary.criticalIssues} critical issues immediately`);
  }
  if (result.robotsTxt && !result.robotsTxt.exists) {
    recommendations.push("Create robots.txt file with sitemap reference");
  }
  if (result.sitemap && !result.sitemap.exists) {
    recommendations.push("Create XML sitemap and submit to search engines");
  }

  const count = (category: SeoCategory): number => issuesByCategory[category]?.length ?? 0;
  if (count("meta") > summary.pagesAudited * 0.3) {
    recommendations.push("Many pages have meta tag issues - prioritize title and description optimization");
  }
  if (count("content") > summary.pagesAudited * 0.3) {
    recommendations.push("Content structure issues common - review heading hierarchy site-wide");
  }
  if (count("accessibility") > 0) {
    recommendations.push("Add missing alt text to images for accessibility and SEO");
  }
  if (count("indexation") > 0) {
    recommendations.push("Review indexation directives - ensure important pages are indexable");
  }

  const score = summary.seoScore;
  if (score < 50) {
    recommendations.push("Low SEO score - comprehensive technical SEO overhaul needed");
  } else if (score < 70) {
    recommendations.push("Moderate SEO score - address high-priority issues for quick wins");
  } else if (score < 90) {
    recommendations.push("Good SEO foundation - focus on optimization refinements");
  }

  return recommendations;
}

function countSeverity(summary: SeoSummary, issues: readonly { severity: IssueSeverity }[]): void {
  for (const issue of issues) {
    summary.totalIssues++;
    switch (issue.severity) {
      case "critical":
        summary.criticalIssues++;
        break;
      case "high":
        summary.highIssues++;
        break;
      case "medium":
        summary.mediumIssues++;
        break;
      case "low":
        summary.lowIssues++;
        break;
    }
  }
}

/**
 * Audit an exported site: a directory of HTML files with robots.txt and
 * sitemap.xml at its root. A single HTML file is audited with its directory
 * as the site root.
 */
export function auditSite(sitePath: string, options: SeoAuditOptions = {}, warnings: Warning[] = []): SeoAuditResult {
  const verbose = options.verbose ?? false;
  const categories = resolveSeoChecks(options.checks, warnings);

  const { root, files } = discoverFiles(
    sitePath,
    { extensions: HTML_EXTENSIONS, skipDirs: SITE_SKIP_DIRS, maxFiles: options.maxFiles ?? 100 },
    warnings,
  );
  vlog(verbose, `Found ${files.length} HTML files under ${root}`);

  const crawl = categories.has("crawlability");
  const robotsTxt: RobotsTxtResult | null = crawl ? checkRobotsTxt(root) : null;
  const sitemap: SitemapResult | null = crawl ? checkSitemap(root) : null;

  const result: SeoAuditResult = {
    auditDate: (options.now ?? new Date()).toISOString(),
    sitePath: root,
    summary: {
      pagesAudited: 0,
      totalIssues: 0,
      criticalIssues: 0,
      highIssues: 0,
      mediumIssues: 0,
      lowIssues: 0,
      seoScore: 0,
    },
    robotsTxt,
    sitemap,
    pages: [],
    issuesByCategory: {},
    recommendations: [],
  };

  const allPageIssues: SeoIssue[] = [];
  for (const file of files) {
    let html: string;
    try {
      html = readFileSync(file, "utf-8");
    } catch (err: unknown) {
      warnings.push({ level: "warn", module: "seo-audit", message: `Cannot read ${file}: ${errorMessage(err)}`, file });
      continue;
    }

    const rel = displayPath(root, file);
    const page = parsePage(html, rel, { internalHosts: options.internalHosts });
    const issues = analyzePageIssues(page, categories);
    allPageIssues.push(...issues);

    for (const issue of issues) {
      const bucket: CategorizedIssue[] = result.issuesByCategory[issue.category] ?? [];
      bucket.push({ file: rel, ...issue });
      result.issuesByCategory[issue.category] = bucket;
    }
    result.pages.push({ file: rel, title: page.title, issuesCount: issues.length, issues });
  }

  result.summary.pagesAudited = result.pages.length;
  countSeverity(result.summary, allPageIssues);
  const crawlIssues: CrawlIssue[] = [...(robotsTxt?.issues ?? []), ...(sitemap?.issues ?? [])];
  countSeverity(result.summary, crawlIssues);

  result.summary.seoScore = calculateSeoScore(allPageIssues, result.pages.length, robotsTxt, sitemap);
  result.recommendations = seoRecommendations(result);
  vlog(verbose, `SEO score ${result.summary.seoScore}/100 across ${result.summary.pagesAudited} pages`);
  return result;
}

/** 2 below 50, 1 below 70, else 0. */
export function seoExitCode(score: number): number {
  if (score < 50) return 2;
  if (score < 70) return 1;
  return 0;
}
