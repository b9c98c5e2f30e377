// src/types.ts — Shared types for every insight-kit tool
// Tool-specific shapes live next to their tool (keywords/types.ts, seo/types.ts, ...).

export const TOOLKIT_VERSION = "1.0.0";

// ─── Warnings (passed to all modules) ───────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Severity ───────────────────────────────────────────────────────────────

/** Lowercase severities used by the report-style tools (SEO, RACI). */
export type IssueSeverity = "critical" | "high" | "medium" | "low";

export const ISSUE_SEVERITIES: readonly IssueSeverity[] = ["critical", "high", "medium", "low"];

/** Uppercase severities used by the scanners, ranked so that higher is worse. */
export type SeverityName = "CRITICAL" | "HIGH" | "MEDIUM" | "LOW" | "INFO";

export const SEVERITY_RANK: Record<SeverityName, number> = {
  CRITICAL: 4,
  HIGH: 3,
  MEDIUM: 2,
  LOW: 1,
  INFO: 0,
};

export function isSeverityName(value: string): value is SeverityName {
  return Object.hasOwn(SEVERITY_RANK, value);
}

// ─── CLI ────────────────────────────────────────────────────────────────────

export type ToolName =
  | "keywords"
  | "seo-audit"
  | "code-quality"
  | "security-audit"
  | "raci"
  | "okr";

export const TOOL_NAMES: readonly ToolName[] = [
  "keywords",
  "seo-audit",
  "code-quality",
  "security-audit",
  "raci",
  "okr",
];

export function isToolName(value: string): value is ToolName {
  return TOOL_NAMES.some((name) => name === value);
}

/** Directories never descended into when scanning a source tree. */
export const DEFAULT_SKIP_DIRS = [
  "node_modules",
  "__pycache__",
  ".git",
  ".svn",
  ".hg",
  "venv",
  "env",
  ".venv",
  ".env",
  "dist",
  "build",
  ".tox",
  ".pytest_cache",
  ".mypy_cache",
  "coverage",
  "vendor",
  "third_party",
  ".idea",
  ".vscode",
] as const;
