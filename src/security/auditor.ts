// src/security/auditor.ts — Line-by-line security audit of a source tree

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { discoverFiles, displayPath } from "../file-discovery.js";
import { errorMessage } from "../errors.js";
import { vlog } from "../output.js";
import type { Warning } from "../types.js";
import { checkLine, loadSecurityChecks } from "./checks.js";
import type {
  SecurityAuditResult,
  SecurityCategory,
  SecurityFinding,
  SecuritySummary,
} from "./types.js";

export interface SecurityAuditOptions {
  exclude?: string[];
  now?: Date;
  verbose?: boolean;
}

export const CODE_EXTENSIONS: ReadonlySet<string> = new Set([
  ".py", ".js", ".ts", ".tsx", ".jsx", ".java", ".rb", ".php", ".go",
  ".cs", ".c", ".cpp", ".h", ".hpp", ".rs", ".swift", ".kt",
]);

const DEDUCTION = { critical: 25, high: 10, medium: 3, low: 1 } as const;

/** Bytes inspected for a NUL when deciding whether a file is binary. */
const BINARY_SNIFF_BYTES = 512;

/**
 * 100 · 0.9^(deduction per file), floored; 0 when no file was audited.
 */
export function calculateSecurityScore(summary: Omit<SecuritySummary, "auditScore">, filesAudited: number): number {
  if (filesAudited === 0) return 0;
  const deduction =
    summary.critical * DEDUCTION.critical +
    summary.high * DEDUCTION.high +
    summary.medium * DEDUCTION.medium +
    summary.low * DEDUCTION.low;
  return Math.max(0, Math.floor(100 * 0.9 ** (deduction / filesAudited)));
}

export function securityRecommendations(findings: readonly SecurityFinding[]): string[] {
  const recommendations: string[] = [];
  const critical = findings.filter((f) => f.severity === "CRITICAL");
  const high = findings.filter((f) => f.severity === "HIGH");

  if (critical.length > 0) {
    recommendations.push(`CRITICAL: ${critical.length} critical security issues found. Address these immediately.`);
    const byCheck = new Map<string, number>();
    for (const f of critical) byCheck.set(f.name, (byCheck.get(f.name) ?? 0) + 1);
    for (const [name, count] of [...byCheck].slice(0, 3)) {
      recommendations.push(`  - ${name}: ${count} instance(s)`);
    }
  }
  if (high.length > 0) {
    recommendations.push(`HIGH: ${high.length} high-severity issues require prompt attention.`);
  }
  if (recommendations.length === 0) {
    recommendations.push("Good security posture. Continue regular security audits.");
  }
  return recommendations;
}

function emptyCategoryCounts(): Record<SecurityCategory, number> {
  return {
    Authentication: 0,
    Authorization: 0,
    "Input Validation": 0,
    Encryption: 0,
    "Session Management": 0,
    "Security Headers": 0,
    "Error Handling": 0,
    "Logging & Monitoring": 0,
  };
}

/** Line count as an editor shows it: a trailing newline does not start a new line. */
function splitLines(content: string): string[] {
  if (content === "") return [];
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * Audit a file or directory. Binary files (a NUL in the first 512 bytes)
 * are skipped without counting.
 */
export function auditSecurity(
  target: string,
  options: SecurityAuditOptions = {},
  warnings: Warning[] = [],
): SecurityAuditResult {
  const verbose = options.verbose ?? false;
  const checks = loadSecurityChecks(warnings);
  const { root, files } = discoverFiles(target, { extensions: CODE_EXTENSIONS, exclude: options.exclude }, warnings);
  vlog(verbose, `Auditing ${files.length} files under ${root} with ${checks.length} checks`);

  const findings: SecurityFinding[] = [];
  let filesAudited = 0;
  let linesAudited = 0;

  for (const file of files) {
    let buffer: Buffer;
    try {
      buffer = readFileSync(file);
    } catch (err: unknown) {
      warnings.push({ level: "warn", module: "security-audit", message: `Error auditing ${file}: ${errorMessage(err)}`, file });
      continue;
    }
    if (buffer.subarray(0, BINARY_SNIFF_BYTES).includes(0)) {
      vlog(verbose, `Skipping binary file ${file}`);
      continue;
    }

    const rel = displayPath(root, file);
    const lines = splitLines(buffer.toString("utf-8"));
    filesAudited++;
    linesAudited += lines.length;
    lines.forEach((line, index) => findings.push(...checkLine(checks, line, rel, index + 1)));

    if (filesAudited % 50 === 0) vlog(verbose, `Audited ${filesAudited} files...`);
  }

  const counts: Omit<SecuritySummary, "auditScore"> = {
    totalFindings: findings.length,
    critical: 0,
    high: 0,
    medium: 0,
    low: 0,
    info: 0,
  };
  const byCategory = emptyCategoryCounts();
  for (const f of findings) {
    switch (f.severity) {
      case "CRITICAL":
        counts.critical++;
        break;
      case "HIGH":
        counts.high++;
        break;
      case "MEDIUM":
        counts.medium++;
        break;
      case "LOW":
        counts.low++;
        break;
      case "INFO":
        counts.info++;
        break;
    }
    byCategory[f.category]++;
  }

  return {
    timestamp: (options.now ?? new Date()).toISOString(),
    target: resolve(target),
    auditStats: { filesAudited, linesAudited, checksPerformed: checks.length },
    summary: { auditScore: calculateSecurityScore(counts, filesAudited), ...counts },
    byCategory,
    findings,
    recommendations: securityRecommendations(findings),
  };
}

/** 2 with any critical finding, 1 with any high finding, else 0. */
export function securityExitCode(result: SecurityAuditResult): number {
  if (result.summary.critical > 0) return 2;
  if (result.summary.high > 0) return 1;
  return 0;
}
