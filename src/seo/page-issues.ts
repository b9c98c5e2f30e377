// src/seo/page-issues.ts — Per-page SEO rules

import type { PageData, SeoCategory, SeoIssue } from "./types.js";

export const PAGE_THRESHOLDS = {
  titleLength: [30, 60],
  metaDescriptionLength: [120, 160],
  /** Largest tolerated share of images without an alt attribute. */
  imagesWithoutAltPct: 0.1,
  internalLinksMin: 3,
} as const;

/**
 * Check one page against the rule set. Only issues whose category is in
 * `categories` are returned (all of them when omitted).
 */
export function analyzePageIssues(page: PageData, categories?: ReadonlySet<SeoCategory>): SeoIssue[] {
  const issues: SeoIssue[] = [];
  const [titleMin, titleMax] = PAGE_THRESHOLDS.titleLength;
  const [descMin, descMax] = PAGE_THRESHOLDS.metaDescriptionLength;

  // Title
  if (page.titleLength === 0) {
    issues.push({
      severity: "critical",
      category: "meta",
      message: "Missing title tag",
      recommendation: "Add a unique, descriptive title tag (30-60 characters)",
    });
  } else if (page.titleLength < titleMin) {
    issues.push({
      severity: "medium",
      category: "meta",
      message: `Title too short (${page.titleLength} characters)`,
      recommendation: "Expand title to 30-60 characters with target keyword",
    });
  } else if (page.titleLength > titleMax) {
    issues.push({
      severity: "low",
      category: "meta",
      message: `Title may be truncated (${page.titleLength} characters)`,
      recommendation: "Consider shortening to under 60 characters",
    });
  }

  // Meta description
  if (page.metaDescriptionLength === 0) {
    issues.push({
      severity: "high",
      category: "meta",
      message: "Missing meta description",
      recommendation: "Add meta description (120-160 characters) with call-to-action",
    });
  } else if (page.metaDescriptionLength < descMin) {
    issues.push({
      severity: "low",
      category: "meta",
      message: `Meta description short (${page.metaDescriptionLength} characters)`,
      recommendation: "Expand to 120-160 characters for better SERP display",
    });
  } else if (page.metaDescriptionLength > descMax) {
    issues.push({
      severity: "low",
      category: "meta",
      message: `Meta description may be truncated (${page.metaDescriptionLength} characters)`,
      recommendation: "Consider shortening to under 160 characters",
    });
  }

  // Headings
  const h1 = page.headings.h1;
  if (h1 === 0) {
    issues.push({
      severity: "high",
      category: "content",
      message: "Missing H1 heading",
      recommendation: "Add exactly one H1 heading with primary keyword",
    });
  } else if (h1 > 1) {
    issues.push({
      severity: "medium",
      category: "content",
      message: `Multiple H1 headings (${h1})`,
      recommendation: "Use only one H1 per page; convert others to H2",
    });
  }
  if (page.headings.h3 > 0 && page.headings.h2 === 0) {
    issues.push({
      severity: "medium",
      category: "content",
      message: "H3 used without H2 (broken hierarchy)",
      recommendation: "Maintain proper heading hierarchy: H1 > H2 > H3",
    });
  }

  // Images
  const { total, withoutAlt } = page.images;
  if (total > 0 && withoutAlt / total > PAGE_THRESHOLDS.imagesWithoutAltPct) {
    issues.push({
      severity: "medium",
      category: "accessibility",
      message: `${withoutAlt} of ${total} images missing alt text`,
      recommendation: "Add descriptive alt text to all images",
    });
  }

  // Internal linking
  if (page.links.internalCount < PAGE_THRESHOLDS.internalLinksMin) {
    issues.push({
      severity: "low",
      category: "linking",
      message: `Few internal links (${page.links.internalCount})`,
      recommendation: "Add more internal links to related content",
    });
  }

  if (!page.canonical) {
    issues.push({
      severity: "medium",
      category: "indexation",
      message: "Missing canonical tag",
      recommendation: "Add self-referencing canonical tag",
    });
  }

  if (!page.structuredData) {
    issues.push({
      severity: "low",
      category: "rich_results",
      message: "No structured data detected",
      recommendation: "Add JSON-LD structured data for rich results eligibility",
    });
  }

  if (!page.ogTags) {
    issues.push({
      severity: "low",
      category: "social",
      message: "Missing Open Graph tags",
      recommendation: "Add og:title, og:description, og:image for social sharing",
    });
  }

  if (page.metaRobots.toLowerCase().includes("noindex")) {
    issues.push({
      severity: "high",
      category: "indexation",
      message: "Page has noindex directive",
      recommendation: "Remove noindex if page should be indexed",
    });
  }

  return categories ? issues.filter((i) => categories.has(i.category)) : issues;
}
