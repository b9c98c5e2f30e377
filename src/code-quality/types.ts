// src/code-quality/types.ts — Code quality checker types

import type { SeverityName } from "../types.js";

export const SOURCE_LANGUAGES = [
  "python",
  "javascript",
  "typescript",
  "go",
  "java",
  "ruby",
  "rust",
  "cpp",
  "c",
] as const;
export type SourceLanguage = (typeof SOURCE_LANGUAGES)[number];

export const LANGUAGE_EXTENSIONS: ReadonlyMap<string, SourceLanguage> = new Map([
  [".py", "python"],
  [".js", "javascript"],
  [".jsx", "javascript"],
  [".ts", "typescript"],
  [".tsx", "typescript"],
  [".go", "go"],
  [".java", "java"],
  [".rb", "ruby"],
  [".rs", "rust"],
  [".cpp", "cpp"],
  [".hpp", "cpp"],
  [".c", "c"],
  [".h", "c"],
]);

/** Severities a finding can carry; INFO exists only as a `--min-severity` floor. */
export type FindingSeverity = Exclude<SeverityName, "INFO">;

export type FindingCategory =
  | "security"
  | "anti-pattern"
  | "code-smell"
  | "style"
  | "complexity";

/** A catalog entry from data/quality-patterns.json, with its regex compiled. */
export interface QualityPattern {
  id: string;
  name: string;
  regex: RegExp;
  /** "line" patterns run per line; "content" patterns run over the whole file. */
  scope: "line" | "content";
  severity: FindingSeverity;
  /** Languages the pattern applies to, or "all". */
  languages: readonly (SourceLanguage | "all")[];
  category: FindingCategory;
  message: string;
  suggestion: string;
}

export interface QualityFinding {
  file: string;
  line: number;
  severity: FindingSeverity;
  category: FindingCategory;
  patternId: string;
  message: string;
  suggestion: string;
  /** The offending line, trimmed and cut to 100 characters. */
  lineContent: string;
}

export interface QualityScore {
  score: number;
  grade: "A" | "B" | "C" | "D" | "F";
  breakdown: {
    critical: number;
    high: number;
    medium: number;
    low: number;
  };
}

export interface CodeQualityReport {
  target: string;
  analyzedAt: string;
  filesAnalyzed: number;
  qualityScore: QualityScore;
  /** Sorted by severity (worst first), then file, then line. */
  findings: QualityFinding[];
  recommendations: string[];
}
