// src/security/checks.ts — Security check catalog

import { z } from "zod";
import { loadDataFile } from "../data.js";
import { errorMessage } from "../errors.js";
import type { Warning } from "../types.js";
import { FINDING_TYPES, SECURITY_CATEGORIES, type SecurityCheck, type SecurityFinding } from "./types.js";

const CheckSchema = z.object({
  id: z.string().min(1),
  category: z.enum(SECURITY_CATEGORIES),
  name: z.string().min(1),
  description: z.string(),
  /** Regex flags for every pattern of the check; case-insensitive unless set. */
  flags: z.string().regex(/^[imsu]*$/).default("i"),
  patterns: z.array(z.string().min(1)).min(1),
  severity: z.enum(["CRITICAL", "HIGH", "MEDIUM", "LOW", "INFO"]),
  findingType: z.enum(FINDING_TYPES),
  recommendation: z.string(),
  cwe: z.string().optional(),
  owasp: z.string().optional(),
});

const CatalogSchema = z.array(CheckSchema);

/**
 * Load and compile the catalog. Patterns that fail to compile are reported
 * and dropped; a check left with no patterns is dropped with them.
 */
export function loadSecurityChecks(warnings: Warning[] = []): SecurityCheck[] {
  const checks: SecurityCheck[] = [];
  for (const entry of loadDataFile("security-checks.json", CatalogSchema)) {
    const { flags, patterns, ...rest } = entry;
    const compiled: RegExp[] = [];
    for (const source of patterns) {
      try {
        compiled.push(new RegExp(source, flags));
      } catch (err: unknown) {
        warnings.push({
          level: "warn",
          module: "security-audit",
          message: `Invalid pattern in ${entry.id}: ${errorMessage(err)}`,
        });
      }
    }
    if (compiled.length > 0) checks.push({ ...rest, patterns: compiled });
  }
  return checks;
}

/** One finding per check whose patterns match the line; the first matching pattern wins. */
export function checkLine(
  checks: readonly SecurityCheck[],
  line: string,
  file: string,
  lineNumber: number,
): SecurityFinding[] {
  const findings: SecurityFinding[] = [];
  for (const check of checks) {
    if (!check.patterns.some((p) => p.test(line))) continue;
    findings.push({
      checkId: check.id,
      category: check.category,
      name: check.name,
      severity: check.severity,
      type: check.findingType,
      file,
      line: lineNumber,
      content: line.trim().slice(0, 150),
      description: check.description,
      recommendation: check.recommendation,
      ...(check.cwe !== undefined && { cwe: check.cwe }),
      ...(check.owasp !== undefined && { owasp: check.owasp }),
    });
  }
  return findings;
}
