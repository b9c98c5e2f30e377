// src/seo/crawl-files.ts — robots.txt and sitemap.xml checks

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { errorMessage } from "../errors.js";
import type { RobotsTxtResult, SitemapResult } from "./types.js";

const SITEMAP_URL_LIMIT = 50_000;

/**
 * Parse robots.txt directives. Directive names are case-insensitive;
 * values are kept as written.
 */
export function parseRobotsTxt(content: string): RobotsTxtResult {
  const result: RobotsTxtResult = {
    exists: true,
    content,
    issues: [],
    directives: { userAgents: [], disallows: [], allows: [], sitemaps: [] },
  };

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, "").trim();
    const colon = line.indexOf(":");
    if (colon === -1) continue;
    const directive = line.slice(0, colon).trim().toLowerCase();
    const value = line.slice(colon + 1).trim();

    switch (directive) {
      case "user-agent":
        result.directives.userAgents.push(value);
        break;
      case "disallow":
        result.directives.disallows.push(value);
        if (value === "/") {
          result.issues.push({ severity: "critical", message: "robots.txt blocks all crawlers with Disallow: /" });
        }
        break;
      case "allow":
        result.directives.allows.push(value);
        break;
      case "sitemap":
        result.directives.sitemaps.push(value);
        break;
    }
  }

  if (result.directives.sitemaps.length === 0) {
    result.issues.push({ severity: "medium", message: "No sitemap reference in robots.txt" });
  }
  return result;
}

export function checkRobotsTxt(siteDir: string): RobotsTxtResult {
  const robotsPath = join(siteDir, "robots.txt");
  if (!existsSync(robotsPath)) {
    return {
      exists: false,
      content: "",
      issues: [{ severity: "high", message: "robots.txt file not found" }],
      directives: { userAgents: [], disallows: [], allows: [], sitemaps: [] },
    };
  }
  try {
    return parseRobotsTxt(readFileSync(robotsPath, "utf-8"));
  } catch (err: unknown) {
    return {
      exists: true,
      content: "",
      issues: [{ severity: "high", message: `Error parsing robots.txt: ${errorMessage(err)}` }],
      directives: { userAgents: [], disallows: [], allows: [], sitemaps: [] },
    };
  }
}

/** Count `<loc>` entries; keeps the first 50 URLs. */
export function parseSitemap(content: string): SitemapResult {
  const urls = [...content.matchAll(/<loc>\s*(.*?)\s*<\/loc>/gis)].map((m) => m[1]);
  const result: SitemapResult = { exists: true, urlCount: urls.length, issues: [], urls: urls.slice(0, 50) };

  if (urls.length === 0) {
    result.issues.push({ severity: "high", message: "Sitemap contains no URLs" });
  } else if (urls.length > SITEMAP_URL_LIMIT) {
    result.issues.push({
      severity: "medium",
      message: `Sitemap exceeds 50,000 URLs (${urls.length}). Consider splitting.`,
    });
  }
  return result;
}

export function checkSitemap(siteDir: string): SitemapResult {
  const sitemapPath = join(siteDir, "sitemap.xml");
  if (!existsSync(sitemapPath)) {
    return {
      exists: false,
      urlCount: 0,
      issues: [{ severity: "high", message: "sitemap.xml file not found" }],
      urls: [],
    };
  }
  try {
    return parseSitemap(readFileSync(sitemapPath, "utf-8"));
  } catch (err: unknown) {
    return {
      exists: true,
      urlCount: 0,
      issues: [{ severity: "high", message: `Error parsing sitemap.xml: ${errorMessage(err)}` }],
      urls: [],
    };
  }
}
