// src/code-quality/checker.ts — Code quality analysis
//
// Pipeline per file: pattern catalog → syntax-aware checks → line checks.
// Findings below the severity floor are dropped before scoring.

import { readFileSync } from "node:fs";
import { extname, resolve } from "node:path";
import { discoverFiles, displayPath } from "../file-discovery.js";
import { ValidationError, errorMessage } from "../errors.js";
import { vlog } from "../output.js";
import { SEVERITY_RANK, type SeverityName, type Warning } from "../types.js";
import { analyzeScriptAst, detectMutableDefaults } from "./ast-checks.js";
import { detectDeepNesting, detectLongLines } from "./line-checks.js";
import { appliesTo, loadQualityPatterns, matchPatterns } from "./patterns.js";
import {
  LANGUAGE_EXTENSIONS,
  SOURCE_LANGUAGES,
  type CodeQualityReport,
  type QualityFinding,
  type QualityPattern,
  type QualityScore,
  type SourceLanguage,
} from "./types.js";

export interface CodeQualityOptions {
  /** "auto" or "all" scan every known language; otherwise only this one. */
  language?: string;
  minSeverity?: SeverityName;
  maxLineLength?: number;
  maxNestingDepth?: number;
  exclude?: string[];
  now?: Date;
  verbose?: boolean;
}

const SCORE_PENALTY = { critical: 20, high: 10, medium: 3, low: 1 } as const;

/** Recommendations are capped at this many entries. */
const MAX_RECOMMENDATIONS = 5;

/** A pattern firing at least this often earns a bulk-fix recommendation. */
const BULK_FIX_THRESHOLD = 3;

/** Resolve `--language`; undefined means every language. */
export function resolveLanguageFilter(language: string | undefined): SourceLanguage | undefined {
  const value = (language ?? "auto").toLowerCase();
  if (value === "auto" || value === "all") return undefined;
  const match = SOURCE_LANGUAGES.find((l) => l === value);
  if (match === undefined) {
    throw new ValidationError(
      `Unknown language "${language}". Expected one of: auto, all, ${SOURCE_LANGUAGES.join(", ")}`,
    );
  }
  return match;
}

function extensionsFor(language: SourceLanguage | undefined): Set<string> {
  const extensions = new Set<string>();
  for (const [ext, lang] of LANGUAGE_EXTENSIONS) {
    if (language === undefined || lang === language) extensions.add(ext);
  }
  return extensions;
}

export interface FileCheckSettings {
  patterns: readonly QualityPattern[];
  maxLineLength: number;
  maxNestingDepth: number;
}

/** Every check for one file's content, unfiltered and unsorted. */
export function checkSource(
  content: string,
  file: string,
  language: SourceLanguage,
  settings: FileCheckSettings,
): QualityFinding[] {
  const lines = content.split(/\r?\n/);
  const patterns = settings.patterns.filter((p) => appliesTo(p, language));
  const findings = matchPatterns(patterns, content, lines, file);

  if (language === "typescript" || language === "javascript") {
    findings.push(...analyzeScriptAst(content, file, lines));
  } else if (language === "python") {
    findings.push(...detectMutableDefaults(content, file));
  }

  findings.push(...detectLongLines(lines, file, settings.maxLineLength));
  findings.push(...detectDeepNesting(lines, file, settings.maxNestingDepth));
  return findings;
}

export function calculateQualityScore(findings: readonly QualityFinding[]): QualityScore {
  const breakdown = { critical: 0, high: 0, medium: 0, low: 0 };
  for (const f of findings) {
    switch (f.severity) {
      case "CRITICAL":
        breakdown.critical++;
        break;
      case "HIGH":
        breakdown.high++;
        break;
      case "MEDIUM":
        breakdown.medium++;
        break;
      case "LOW":
        breakdown.low++;
        break;
    }
  }

  const penalty =
    breakdown.critical * SCORE_PENALTY.critical +
    breakdown.high * SCORE_PENALTY.high +
    breakdown.medium * SCORE_PENALTY.medium +
    breakdown.low * SCORE_PENALTY.low;
  const score = Math.max(0, Math.min(100, 100 - penalty));
  return { score, grade: gradeFor(score), breakdown };
}

export function gradeFor(score: number): QualityScore["grade"] {
  if (score >= 90) return "A";
  if (score >= 80) return "B";
  if (score >= 70) return "C";
  if (score >= 60) return "D";
  return "F";
}

/**
 * Critical and high counts first, then patterns that fired often enough to
 * fix in bulk (most frequent first), capped at five.
 */
export function qualityRecommendations(findings: readonly QualityFinding[], quality: QualityScore): string[] {
  const recommendations: string[] = [];
  const { critical, high } = quality.breakdown;

  if (critical > 0) {
    recommendations.push(`URGENT: Fix ${critical} critical security issue(s) before merging`);
  }
  if (high > 0) {
    recommendations.push(`Address ${high} high-severity issue(s) before merging`);
  }

  const counts = new Map<string, number>();
  for (const f of findings) counts.set(f.patternId, (counts.get(f.patternId) ?? 0) + 1);
  const frequent = [...counts.entries()].filter(([, n]) => n >= BULK_FIX_THRESHOLD).sort((a, b) => b[1] - a[1]);
  for (const [patternId, count] of frequent) {
    recommendations.push(`Found ${count} instances of ${patternId} - consider a bulk fix`);
  }

  if (recommendations.length === 0 && quality.score >= 90) {
    recommendations.push("Code quality is excellent! No critical issues found.");
  }
  return recommendations.slice(0, MAX_RECOMMENDATIONS);
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/** Worst severity first, then file path, then line number. */
export function sortFindings(findings: readonly QualityFinding[]): QualityFinding[] {
  return [...findings].sort(
    (a, b) =>
      SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] || compareText(a.file, b.file) || a.line - b.line,
  );
}

/**
 * Scan a file or directory for anti-patterns and code smells and grade the result.
 */
export function checkCodeQuality(
  target: string,
  options: CodeQualityOptions = {},
  warnings: Warning[] = [],
): CodeQualityReport {
  const verbose = options.verbose ?? false;
  const language = resolveLanguageFilter(options.language);
  const floor = SEVERITY_RANK[options.minSeverity ?? "LOW"];

  const { root, files } = discoverFiles(
    target,
    { extensions: extensionsFor(language), exclude: options.exclude },
    warnings,
  );
  vlog(verbose, `Found ${files.length} source files under ${root}`);

  const settings: FileCheckSettings = {
    patterns: loadQualityPatterns(warnings).filter((p) => SEVERITY_RANK[p.severity] >= floor),
    maxLineLength: options.maxLineLength ?? 120,
    maxNestingDepth: options.maxNestingDepth ?? 4,
  };

  const collected: QualityFinding[] = [];
  let filesAnalyzed = 0;
  for (const file of files) {
    const fileLanguage = LANGUAGE_EXTENSIONS.get(extname(file).toLowerCase());
    if (fileLanguage === undefined) continue;

    let content: string;
    try {
      content = readFileSync(file, "utf-8");
    } catch (err: unknown) {
      warnings.push({ level: "warn", module: "code-quality", message: `Could not read ${file}: ${errorMessage(err)}`, file });
      continue;
    }

    vlog(verbose, `Scanning ${displayPath(root, file)}`);
    const found = checkSource(content, displayPath(root, file), fileLanguage, settings);
    collected.push(...found.filter((f) => SEVERITY_RANK[f.severity] >= floor));
    filesAnalyzed++;
  }

  const qualityScore = calculateQualityScore(collected);
  return {
    target: resolve(target),
    analyzedAt: (options.now ?? new Date()).toISOString(),
    filesAnalyzed,
    qualityScore,
    findings: sortFindings(collected),
    recommendations: qualityRecommendations(collected, qualityScore),
  };
}

/** 1 when any critical finding was reported, else 0. */
export function qualityExitCode(report: CodeQualityReport): number {
  return report.qualityScore.breakdown.critical > 0 ? 1 : 0;
}
