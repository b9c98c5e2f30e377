// src/seo/html-parser.ts — Extract SEO signals from an HTML document with cheerio

import { load as loadCheerio } from "cheerio";
import { HEADING_TAGS, type HeadingTag, type ImageInfo, type PageData } from "./types.js";

export interface ParseOptions {
  /** Hosts whose absolute links count as internal (e.g. "example.com"). */
  internalHosts?: readonly string[];
}

const SKIPPED_HREF_PREFIXES = ["#", "javascript:", "mailto:", "tel:"];

/** Length in code points, so an emoji counts once. */
function charLength(text: string): number {
  return [...text].length;
}

function normalizeHost(host: string): string {
  return host.toLowerCase().replace(/^www\./, "");
}

/**
 * Absolute links (http(s):// or //) are external unless their host is listed as
 * internal; relative links are internal.
 */
export function isExternalLink(href: string, internalHosts: readonly string[]): boolean {
  if (!/^(https?:)?\/\//i.test(href)) return false;
  let host: string;
  try {
    host = new URL(href, "http://localhost").hostname;
  } catch {
    return true;
  }
  const internal = internalHosts.map(normalizeHost);
  return !internal.includes(normalizeHost(host));
}

function emptyHeadings<T>(make: () => T): Record<HeadingTag, T> {
  return { h1: make(), h2: make(), h3: make(), h4: make(), h5: make(), h6: make() };
}

export function parsePage(html: string, file: string, options: ParseOptions = {}): PageData {
  const $ = loadCheerio(html);
  const internalHosts = options.internalHosts ?? [];

  const title = $("title").first().text().trim();

  let metaDescription = "";
  let metaRobots = "";
  let ogTags = false;
  let twitterCards = false;
  $("meta").each((_, el) => {
    const name = ($(el).attr("name") ?? "").toLowerCase();
    const property = ($(el).attr("property") ?? "").toLowerCase();
    const content = $(el).attr("content") ?? "";
    if (name === "description") metaDescription = content;
    else if (name === "robots") metaRobots = content;
    else if (property.startsWith("og:")) ogTags = true;
    else if (name.startsWith("twitter:")) twitterCards = true;
  });

  let canonical = "";
  let stylesheets = 0;
  $("link").each((_, el) => {
    const rel = ($(el).attr("rel") ?? "").toLowerCase().split(/\s+/);
    if (rel.includes("stylesheet")) stylesheets++;
    else if (rel.includes("canonical") && !canonical) canonical = $(el).attr("href") ?? "";
  });

  const headingTexts = emptyHeadings<string[]>(() => []);
  for (const tag of HEADING_TAGS) {
    $(tag).each((_, el) => {
      const text = $(el).text().trim();
      if (text) headingTexts[tag].push(text);
    });
  }
  const headings = emptyHeadings(() => 0);
  for (const tag of HEADING_TAGS) headings[tag] = headingTexts[tag].length;

  const internal: string[] = [];
  const external: string[] = [];
  $("a[href]").each((_, el) => {
    const href = ($(el).attr("href") ?? "").trim();
    if (!href || SKIPPED_HREF_PREFIXES.some((p) => href.toLowerCase().startsWith(p))) return;
    (isExternalLink(href, internalHosts) ? external : internal).push(href);
  });

  const images: ImageInfo[] = [];
  $("img").each((_, el) => {
    const alt = $(el).attr("alt");
    images.push({ src: $(el).attr("src") ?? "", alt: alt ?? "", hasAlt: alt !== undefined });
  });

  let scripts = 0;
  let structuredData = false;
  $("script").each((_, el) => {
    if ($(el).attr("src") !== undefined) scripts++;
    const type = ($(el).attr("type") ?? "").toLowerCase();
    if (type.includes("application/ld+json") || $(el).text().includes('"@context"')) {
      structuredData = true;
    }
  });

  return {
    file,
    fileSizeBytes: Buffer.byteLength(html, "utf-8"),
    title,
    titleLength: charLength(title),
    metaDescription,
    metaDescriptionLength: charLength(metaDescription),
    metaRobots,
    canonical,
    headings,
    headingTexts,
    links: {
      internalCount: internal.length,
      externalCount: external.length,
      internal: internal.slice(0, 20),
      external: external.slice(0, 20),
    },
    images: {
      total: images.length,
      withoutAlt: images.filter((img) => !img.hasAlt).length,
      details: images.slice(0, 10),
    },
    resources: { scripts, stylesheets },
    structuredData,
    ogTags,
    twitterCards,
  };
}
