// src/seo/types.ts — Technical SEO audit types

import type { IssueSeverity } from "../types.js";

export const SEO_CATEGORIES = [
  "crawlability",
  "meta",
  "content",
  "accessibility",
  "linking",
  "indexation",
  "rich_results",
  "social",
] as const;
export type SeoCategory = (typeof SEO_CATEGORIES)[number];

export const HEADING_TAGS = ["h1", "h2", "h3", "h4", "h5", "h6"] as const;
export type HeadingTag = (typeof HEADING_TAGS)[number];

export interface ImageInfo {
  src: string;
  alt: string;
  hasAlt: boolean;
}

/** Everything the auditor extracts from one HTML page. */
export interface PageData {
  file: string;
  fileSizeBytes: number;
  title: string;
  titleLength: number;
  metaDescription: string;
  metaDescriptionLength: number;
  metaRobots: string;
  canonical: string;
  headings: Record<HeadingTag, number>;
  headingTexts: Record<HeadingTag, string[]>;
  links: {
    internalCount: number;
    externalCount: number;
    /** First 20 only. */
    internal: string[];
    external: string[];
  };
  images: {
    total: number;
    withoutAlt: number;
    /** First 10 only. */
    details: ImageInfo[];
  };
  resources: {
    scripts: number;
    stylesheets: number;
  };
  structuredData: boolean;
  ogTags: boolean;
  twitterCards: boolean;
}

export interface SeoIssue {
  severity: IssueSeverity;
  category: SeoCategory;
  message: string;
  recommendation: string;
}

/** robots.txt / sitemap.xml findings carry no category or recommendation. */
export interface CrawlIssue {
  severity: IssueSeverity;
  message: string;
}

export interface RobotsTxtResult {
  exists: boolean;
  content: string;
  issues: CrawlIssue[];
  directives: {
    userAgents: string[];
    disallows: string[];
    allows: string[];
    sitemaps: string[];
  };
}

export interface SitemapResult {
  exists: boolean;
  urlCount: number;
  issues: CrawlIssue[];
  /** First 50 only. */
  urls: string[];
}

export interface PageReport {
  file: string;
  title: string;
  issuesCount: number;
  issues: SeoIssue[];
}

export interface CategorizedIssue extends SeoIssue {
  file: string;
}

export interface SeoSummary {
  pagesAudited: number;
  totalIssues: number;
  criticalIssues: number;
  highIssues: number;
  mediumIssues: number;
  lowIssues: number;
  seoScore: number;
}

export interface SeoAuditResult {
  auditDate: string;
  sitePath: string;
  summary: SeoSummary;
  /** null when crawlability checks were not selected. */
  robotsTxt: RobotsTxtResult | null;
  sitemap: SitemapResult | null;
  pages: PageReport[];
  issuesByCategory: Partial<Record<SeoCategory, CategorizedIssue[]>>;
  recommendations: string[];
}
