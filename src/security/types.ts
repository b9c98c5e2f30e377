// src/security/types.ts — Security auditor types

import type { SeverityName } from "../types.js";

export const SECURITY_CATEGORIES = [
  "Authentication",
  "Authorization",
  "Input Validation",
  "Encryption",
  "Session Management",
  "Security Headers",
  "Error Handling",
  "Logging & Monitoring",
] as const;
export type SecurityCategory = (typeof SECURITY_CATEGORIES)[number];

export const FINDING_TYPES = ["vulnerability", "weakness", "best_practice", "missing_control"] as const;
export type FindingType = (typeof FINDING_TYPES)[number];

/** A catalog entry from data/security-checks.json with its patterns compiled. */
export interface SecurityCheck {
  id: string;
  category: SecurityCategory;
  name: string;
  description: string;
  patterns: RegExp[];
  severity: SeverityName;
  findingType: FindingType;
  recommendation: string;
  cwe?: string;
  owasp?: string;
}

export interface SecurityFinding {
  checkId: string;
  category: SecurityCategory;
  name: string;
  severity: SeverityName;
  type: FindingType;
  file: string;
  line: number;
  /** The matching line, trimmed and cut to 150 characters. */
  content: string;
  description: string;
  recommendation: string;
  cwe?: string;
  owasp?: string;
}

export interface SecuritySummary {
  auditScore: number;
  totalFindings: number;
  critical: number;
  high: number;
  medium: number;
  low: number;
  info: number;
}

export interface SecurityAuditResult {
  timestamp: string;
  target: string;
  auditStats: {
    filesAudited: number;
    linesAudited: number;
    checksPerformed: number;
  };
  summary: SecuritySummary;
  /** Every category, including those without findings. */
  byCategory: Record<SecurityCategory, number>;
  findings: SecurityFinding[];
  recommendations: string[];
}
