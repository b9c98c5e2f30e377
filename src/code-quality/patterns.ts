// src/code-quality/patterns.ts — Regex pattern catalog
// Catalog entries live in data/quality-patterns.json; each carries its own regex flags.

import { z } from "zod";
import { loadDataFile } from "../data.js";
import { errorMessage } from "../errors.js";
import type { Warning } from "../types.js";
import { SOURCE_LANGUAGES, type QualityFinding, type QualityPattern, type SourceLanguage } from "./types.js";

const PatternSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  regex: z.string().min(1),
  flags: z.string().regex(/^[imsu]*$/).default(""),
  scope: z.enum(["line", "content"]).default("line"),
  severity: z.enum(["CRITICAL", "HIGH", "MEDIUM", "LOW"]),
  languages: z.array(z.union([z.enum(SOURCE_LANGUAGES), z.literal("all")])).min(1),
  category: z.enum(["security", "anti-pattern", "code-smell", "style", "complexity"]),
  message: z.string(),
  suggestion: z.string(),
});

const CatalogSchema = z.array(PatternSchema);

/**
 * Load and compile the catalog. A pattern whose regex does not compile is
 * reported and left out.
 */
export function loadQualityPatterns(warnings: Warning[] = []): QualityPattern[] {
  const patterns: QualityPattern[] = [];
  for (const entry of loadDataFile("quality-patterns.json", CatalogSchema)) {
    const { flags, regex, ...rest } = entry;
    // Content patterns are scanned with matchAll, which needs the g flag.
    const effectiveFlags = entry.scope === "content" ? flags + "g" : flags;
    try {
      patterns.push({ ...rest, regex: new RegExp(regex, effectiveFlags) });
    } catch (err: unknown) {
      warnings.push({
        level: "warn",
        module: "code-quality",
        message: `Invalid regex for ${entry.id}: ${errorMessage(err)}`,
      });
    }
  }
  return patterns;
}

export function appliesTo(pattern: QualityPattern, language: SourceLanguage): boolean {
  return pattern.languages.some((l) => l === "all" || l === language);
}

/** Trimmed source line, at most `max` characters. */
export function lineExcerpt(line: string, max = 100): string {
  return line.trim().slice(0, max);
}

/**
 * Run the patterns over one file. Line patterns report every matching line;
 * content patterns report the line each match starts on.
 */
export function matchPatterns(
  patterns: readonly QualityPattern[],
  content: string,
  lines: readonly string[],
  file: string,
): QualityFinding[] {
  const findings: QualityFinding[] = [];

  const finding = (pattern: QualityPattern, lineIndex: number): QualityFinding => ({
    file,
    line: lineIndex + 1,
    severity: pattern.severity,
    category: pattern.category,
    patternId: pattern.id,
    message: pattern.message,
    suggestion: pattern.suggestion,
    lineContent: lineExcerpt(lines[lineIndex] ?? ""),
  });

  for (const pattern of patterns) {
    if (pattern.scope === "content") {
      for (const match of content.matchAll(pattern.regex)) {
        const start = match.index ?? 0;
        const lineIndex = content.slice(0, start).split("\n").length - 1;
        findings.push(finding(pattern, lineIndex));
      }
      continue;
    }
    lines.forEach((line, index) => {
      if (pattern.regex.test(line)) findings.push(finding(pattern, index));
    });
  }

  return findings;
}
