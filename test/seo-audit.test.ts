import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { resolve, dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { isExternalLink, parsePage } from "../src/seo/html-parser.js";
import { parseRobotsTxt, parseSitemap } from "../src/seo/crawl-files.js";
import { analyzePageIssues } from "../src/seo/page-issues.js";
import { auditSite, calculateSeoScore, resolveSeoChecks, seoExitCode } from "../src/seo/auditor.js";
import { formatSeoCsv, formatSeoText } from "../src/seo/format.js";
import { InputNotFoundError } from "../src/errors.js";
import type { Warning } from "../src/types.js";

const SITE = resolve(dirname(fileURLToPath(import.meta.url)), "fixtures", "site");
const NOW = new Date("2025-06-01T09:30:00Z");

describe("parsePage", () => {
  it("extracts meta tags, headings, links and resources", () => {
    const html = `
      <title> Hello </title>
      <meta name="Description" content="Short one">
      <meta property="og:image" content="x.png">
      <link rel="alternate canonical" href="/a">
      <link rel="stylesheet" href="a.css"><link rel="stylesheet" href="b.css">
      <h1>One</h1><h2></h2><h2>Two</h2>
      <a href="/x">x</a><a href="//cdn.example.org/y">y</a><a href="javascript:void(0)">z</a>
      <script src="a.js"></script><script>var a = 1;</script>`;
    const page = parsePage(html, "page.html");
    expect(page.title).toBe("Hello");
    expect(page.titleLength).toBe(5);
    expect(page.metaDescription).toBe("Short one");
    expect(page.ogTags).toBe(true);
    expect(page.twitterCards).toBe(false);
    expect(page.canonical).toBe("/a");
    expect(page.resources).toEqual({ scripts: 1, stylesheets: 2 });
    expect(page.headings).toEqual({ h1: 1, h2: 1, h3: 0, h4: 0, h5: 0, h6: 0 });
    expect(page.headingTexts.h2).toEqual(["Two"]);
    expect(page.links.internal).toEqual(["/x"]);
    expect(page.links.external).toEqual(["//cdn.example.org/y"]);
    expect(page.structuredData).toBe(false);
  });

  it("detects JSON-LD by type or by @context content", () => {
    expect(parsePage('<script type="application/ld+json">{}</script>', "a").structuredData).toBe(true);
    expect(parsePage('<script>window.data = {"@context": "https://schema.org"}</script>', "a").structuredData).toBe(true);
  });

  it("counts images without an alt attribute", () => {
    const page = parsePage('<img src="a.png" alt=""><img src="b.png"><img src="c.png" alt="C">', "a");
    expect(page.images.total).toBe(3);
    expect(page.images.withoutAlt).toBe(1);
    expect(page.images.details[1]).toEqual({ src: "b.png", alt: "", hasAlt: false });
  });
});

describe("isExternalLink", () => {
  it("treats relative links as internal", () => {
    expect(isExternalLink("/about", [])).toBe(false);
    expect(isExternalLink("about.html", [])).toBe(false);
  });

  it("checks absolute links against the internal hosts", () => {
    expect(isExternalLink("https://example.com/contact", [])).toBe(true);
    expect(isExternalLink("https://example.com/contact", ["example.com"])).toBe(false);
    expect(isExternalLink("https://www.example.com/", ["example.com"])).toBe(false);
    expect(isExternalLink("https://shop.example.com/", ["example.com"])).toBe(true);
  });
});

describe("robots.txt and sitemap", () => {
  it("flags Disallow: / and a missing sitemap reference", () => {
    const robots = parseRobotsTxt("User-agent: *\nDisallow: /\n");
    expect(robots.directives.userAgents).toEqual(["*"]);
    expect(robots.issues).toEqual([
      { severity: "critical", message: "robots.txt blocks all crawlers with Disallow: /" },
      { severity: "medium", message: "No sitemap reference in robots.txt" },
    ]);
  });

  it("keeps directive values as written and ignores comments", () => {
    const robots = parseRobotsTxt("# hi\nUSER-AGENT: Googlebot\nAllow: /Docs/\nSitemap: https://Example.com/sitemap.xml\n");
    expect(robots.directives).toEqual({
      userAgents: ["Googlebot"],
      disallows: [],
      allows: ["/Docs/"],
      sitemaps: ["https://Example.com/sitemap.xml"],
    });
    expect(robots.issues).toEqual([]);
  });

  it("counts sitemap URLs", () => {
    expect(parseSitemap("<urlset><url><LOC> https://a.test/ </LOC></url></urlset>").urls).toEqual(["https://a.test/"]);
    expect(parseSitemap("<urlset></urlset>").issues).toEqual([{ severity: "high", message: "Sitemap contains no URLs" }]);
  });
});

describe("analyzePageIssues", () => {
  it("flags title and description length bounds", () => {
    const short = parsePage(`<title>Too short</title><meta name="description" content="${"d".repeat(161)}">`, "a");
    const issues = analyzePageIssues(short).filter((i) => i.category === "meta");
    expect(issues.map((i) => [i.severity, i.message])).toEqual([
      ["medium", "Title too short (9 characters)"],
      ["low", "Meta description may be truncated (161 characters)"],
    ]);

    const long = parsePage(`<title>${"t".repeat(61)}</title><meta name="description" content="short">`, "a");
    expect(analyzePageIssues(long, new Set(["meta"])).map((i) => i.message)).toEqual([
      "Title may be truncated (61 characters)",
      "Meta description short (5 characters)",
    ]);
  });

  it("tolerates up to 10% of images without alt", () => {
    const imgs = Array.from({ length: 10 }, (_, i) => `<img src="${i}.png" alt="x">`).join("") + '<img src="z.png">';
    const page = parsePage(imgs, "a");
    expect(analyzePageIssues(page, new Set(["accessibility"]))).toEqual([]);
  });
});

describe("calculateSeoScore", () => {
  it("deducts crawl file issues and averaged page weights", () => {
    const robots = parseRobotsTxt("Disallow: /\n");
    const sitemap = parseSitemap("");
    // robots: critical -20; sitemap: high -5; pages: (5 + 0.5) / 2 = 2.75 -> 2
    const score = calculateSeoScore(
      [
        { severity: "critical", category: "meta", message: "", recommendation: "" },
        { severity: "low", category: "social", message: "", recommendation: "" },
      ],
      2,
      robots,
      sitemap,
    );
    expect(score).toBe(73);
  });

  it("caps the page deduction at 50 and never goes below 0", () => {
    const issues = Array.from({ length: 40 }, () => ({
      severity: "critical" as const,
      category: "meta" as const,
      message: "",
      recommendation: "",
    }));
    expect(calculateSeoScore(issues, 1, null, null)).toBe(50);
  });

  it("maps scores to exit codes", () => {
    expect([49, 50, 69, 70, 100].map(seoExitCode)).toEqual([2, 1, 1, 0, 0]);
  });
});

describe("resolveSeoChecks", () => {
  it("expands aliases and reports unknown names", () => {
    const warnings: Warning[] = [];
    expect([...resolveSeoChecks(["structure", "Meta", "speed"], warnings)]).toEqual(["content", "linking", "meta"]);
    expect(warnings).toHaveLength(1);
    expect(resolveSeoChecks(undefined).size).toBe(8);
  });
});

describe("auditSite", () => {
  it("audits the fixture site", () => {
    const result = auditSite(SITE, { now: NOW });

    expect(result.pages.map((p) => [p.file, p.issuesCount])).toEqual([
      ["blog/post.html", 10],
      ["index.html", 0],
    ]);
    expect(result.robotsTxt?.directives.disallows).toEqual(["/private/"]);
    expect(result.robotsTxt?.issues).toEqual([]);
    expect(result.sitemap?.urlCount).toBe(2);
    expect(result.summary).toEqual({
      pagesAudited: 2,
      totalIssues: 10,
      criticalIssues: 1,
      highIssues: 2,
      mediumIssues: 4,
      lowIssues: 3,
      seoScore: 92,
    });
    expect(result.issuesByCategory.indexation?.map((i) => i.message)).toEqual([
      "Missing canonical tag",
      "Page has noindex directive",
    ]);
    expect(result.recommendations).toEqual([
      "URGENT: Fix 1 critical issues immediately",
      "Many pages have meta tag issues - prioritize title and description optimization",
      "Content structure issues common - review heading hierarchy site-wide",
      "Add missing alt text to images for accessibility and SEO",
      "Review indexation directives - ensure important pages are indexable",
    ]);
    expect(seoExitCode(result.summary.seoScore)).toBe(0);
  });

  it("limits page checks to the selected categories", () => {
    const result = auditSite(SITE, { now: NOW, checks: ["meta"] });
    expect(result.robotsTxt).toBeNull();
    expect(result.sitemap).toBeNull();
    expect(result.summary.totalIssues).toBe(2);
    expect(result.summary.seoScore).toBe(96);
  });

  it("respects the file limit", () => {
    const result = auditSite(SITE, { now: NOW, maxFiles: 1 });
    expect(result.pages.map((p) => p.file)).toEqual(["blog/post.html"]);
  });

  it("throws for a missing path", () => {
    expect(() => auditSite(join(SITE, "nope"))).toThrow(InputNotFoundError);
  });

  describe("without crawl files", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "insight-kit-seo-"));
      writeFileSync(join(dir, "page.html"), "<html></html>");
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("deducts for missing robots.txt and sitemap.xml", () => {
      const result = auditSite(dir, { now: NOW });
      expect(result.summary).toEqual({
        pagesAudited: 1,
        totalIssues: 9,
        criticalIssues: 1,
        highIssues: 4,
        mediumIssues: 1,
        lowIssues: 3,
        seoScore: 52,
      });
      expect(result.recommendations).toEqual([
        "URGENT: Fix 1 critical issues immediately",
        "Create robots.txt file with sitemap reference",
        "Create XML sitemap and submit to search engines",
        "Many pages have meta tag issues - prioritize title and description optimization",
        "Content structure issues common - review heading hierarchy site-wide",
        "Review indexation directives - ensure important pages are indexable",
        "Moderate SEO score - address high-priority issues for quick wins",
      ]);
      expect(seoExitCode(result.summary.seoScore)).toBe(1);
    });

    it("renders crawl issues in CSV under crawlability", () => {
      const csv = formatSeoCsv(auditSite(dir, { now: NOW })).split("\n");
      expect(csv[0]).toBe("file,severity,category,message,recommendation");
      expect(csv[1]).toBe('page.html,critical,meta,Missing title tag,"Add a unique, descriptive title tag (30-60 characters)"');
      expect(csv.slice(-3)).toEqual([
        "robots.txt,high,crawlability,robots.txt file not found,",
        "sitemap.xml,high,crawlability,sitemap.xml file not found,",
        "",
      ]);
    });
  });
});

describe("formatSeoText", () => {
  it("renders summary, crawl files, categories and recommendations", () => {
    const lines = formatSeoText(auditSite(SITE, { now: NOW })).split("\n");
    expect(lines.slice(0, 15)).toEqual([
      "=".repeat(60),
      "TECHNICAL SEO AUDIT REPORT",
      "=".repeat(60),
      "",
      "SUMMARY",
      "-".repeat(40),
      "SEO Score: 92/100",
      "Pages Audited: 2",
      "Total Issues: 10",
      "  Critical: 1",
      "  High: 2",
      "  Medium: 4",
      "  Low: 3",
      "Audit Date: 2025-06-01",
      "",
    ]);
    expect(lines).toContain("Status: Found");
    expect(lines).toContain("Sitemaps: https://example.com/sitemap.xml");
    expect(lines).toContain("URLs: 2");
    expect(lines).toContain("META (2 issues)");
    expect(lines).toContain("  [CRITICAL] Missing title tag");
    expect(lines).toContain("    File: blog/post.html");
    expect(lines).toContain("1. URGENT: Fix 1 critical issues immediately");
  });
});
