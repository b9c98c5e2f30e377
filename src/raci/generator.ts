// src/raci/generator.ts — RACI assignment, rule enforcement and validation

import { z } from "zod";
import { loadDataFile } from "../data.js";
import { ValidationError } from "../errors.js";
import { vlog } from "../output.js";
import type { Warning } from "../types.js";
import {
  RACI_EXIT,
  type Activity,
  type ProcessDocument,
  type RaciAssignments,
  type RaciCode,
  type RaciEntry,
  type RaciIssue,
  type RaciMatrix,
  type RaciTemplate,
  type RoleStats,
} from "./types.js";

const WordLists = z.object({
  A: z.array(z.string()),
  R: z.array(z.string()),
  C: z.array(z.string()),
  I: z.array(z.string()),
});

const RaciKeywordsSchema = z.object({
  /** Role-name fragments that mark a role's usual RACI code. */
  roleKeywords: WordLists,
  /** Activity verbs that suggest a RACI code. */
  actionVerbs: WordLists,
});

export type RaciKeywords = z.infer<typeof RaciKeywordsSchema>;

export function loadRaciKeywords(): RaciKeywords {
  return loadDataFile("raci-keywords.json", RaciKeywordsSchema);
}

// Role keywords are tried managerial first; verbs are tried doer first.
const ROLE_ORDER: readonly RaciCode[] = ["A", "R", "C", "I"];
const VERB_ORDER: readonly RaciCode[] = ["R", "A", "C", "I"];

function containsAny(text: string, fragments: readonly string[]): boolean {
  return fragments.some((fragment) => text.includes(fragment));
}

export function isManagerial(role: string, keywords: RaciKeywords = loadRaciKeywords()): boolean {
  return containsAny(role.toLowerCase(), keywords.roleKeywords.A);
}

/**
 * Guess a role's code for an activity from the role's name, then from the
 * activity's verbs. Matching is substring-based on lowercase text.
 */
export function inferRaciCode(role: string, activityText: string, keywords: RaciKeywords = loadRaciKeywords()): RaciCode {
  const roleLower = role.toLowerCase();
  const text = activityText.toLowerCase();
  const { roleKeywords, actionVerbs } = keywords;

  for (const kind of ROLE_ORDER) {
    if (!containsAny(roleLower, roleKeywords[kind])) continue;
    switch (kind) {
      case "A":
        return containsAny(text, actionVerbs.A) ? "A" : "C";
      case "R":
        return containsAny(text, actionVerbs.R) ? "R" : "I";
      case "C":
        return containsAny(text, actionVerbs.C) ? "C" : "I";
      case "I":
        return "I";
    }
  }

  // No role keyword matched, so the role is not managerial and approval verbs
  // cannot make it accountable.
  for (const kind of VERB_ORDER) {
    if (!containsAny(text, actionVerbs[kind])) continue;
    if (kind === "R" || kind === "C") return kind;
  }
  return "I";
}

/**
 * Make an activity's assignments follow the RACI rules, in place:
 * exactly one A, and at least one R unless the A does the work.
 */
export function enforceRaciRules(assignments: RaciAssignments, keywords: RaciKeywords = loadRaciKeywords()): RaciAssignments {
  const accountable = Object.keys(assignments).filter((role) => assignments[role] === "A");

  if (accountable.length === 0) {
    const manager = Object.keys(assignments)
      .sort()
      .find((role) => isManagerial(role, keywords));
    const promoted = manager ?? Object.keys(assignments).find((role) => assignments[role] === "R");
    if (promoted !== undefined) assignments[promoted] = "A";
  } else {
    for (const role of accountable.slice(1)) assignments[role] = "C";
  }

  const codes = Object.values(assignments);
  if (!codes.includes("R") && !codes.includes("A")) {
    const [first] = Object.keys(assignments);
    if (first !== undefined) assignments[first] = "R";
  }
  return assignments;
}

export function summarizeRoles(matrix: readonly RaciEntry[], roles: readonly string[]): Record<string, RoleStats> {
  const summary: Record<string, RoleStats> = {};
  for (const role of roles) summary[role] = { R: 0, A: 0, C: 0, I: 0, total: 0 };
  for (const entry of matrix) {
    for (const [role, code] of Object.entries(entry.roles)) {
      const stats = summary[role];
      if (stats === undefined) continue;
      stats[code]++;
      stats.total++;
    }
  }
  return summary;
}

function assignActivity(
  activity: Activity,
  roles: readonly string[],
  template: RaciTemplate | undefined,
  keywords: RaciKeywords,
  warnings: Warning[],
): RaciEntry {
  const known = new Set(roles);
  const assignments: RaciAssignments = {};

  for (const [role, code] of Object.entries(template?.assignments[activity.id] ?? {})) {
    if (known.has(role)) {
      assignments[role] = code;
    } else {
      warnings.push({
        level: "warn",
        module: "raci",
        message: `Template assigns unknown role "${role}" on ${activity.id}; ignored`,
      });
    }
  }

  const text = `${activity.name} ${activity.description}`;
  for (const role of roles) {
    if (assignments[role] !== undefined) continue;
    const preset = activity.presets?.[role];
    if (preset !== undefined) {
      assignments[role] = preset;
    } else if (activity.role === role) {
      assignments[role] = "R";
    } else {
      assignments[role] = inferRaciCode(role, text, keywords);
    }
  }

  return {
    activityId: activity.id,
    activity: activity.name,
    description: activity.description,
    roles: enforceRaciRules(assignments, keywords),
  };
}

export interface GenerateRaciOptions {
  template?: RaciTemplate;
  now?: Date;
  verbose?: boolean;
}

/**
 * Build the matrix for a process. Template roles replace the process roles
 * when the template lists any. Validation issues are filled in afterwards.
 */
export function generateRaci(
  doc: ProcessDocument,
  options: GenerateRaciOptions = {},
  warnings: Warning[] = [],
): RaciMatrix {
  const verbose = options.verbose ?? false;
  const keywords = loadRaciKeywords();
  const roles = options.template?.roles ?? doc.roles;

  if (roles.length === 0) {
    throw new ValidationError("No roles found in process data or template", RACI_EXIT.validation);
  }
  if (doc.activities.length === 0) {
    throw new ValidationError("No activities found in process data", RACI_EXIT.validation);
  }

  vlog(verbose, `Generating RACI matrix: ${doc.activities.length} activities × ${roles.length} roles`);
  const raciMatrix = doc.activities.map((activity) =>
    assignActivity(activity, roles, options.template, keywords, warnings),
  );

  const result: RaciMatrix = {
    processName: doc.processName,
    processDescription: doc.processDescription,
    generatedAt: (options.now ?? new Date()).toISOString(),
    roles: [...roles],
    raciMatrix,
    roleSummary: summarizeRoles(raciMatrix, roles),
    validationIssues: [],
  };
  if (doc.processId !== undefined) result.processId = doc.processId;
  result.validationIssues = validateRaci(result);
  return result;
}

function share(count: number, total: number): string {
  return ((count / total) * 100).toFixed(0);
}

/**
 * Check a matrix against RACI practice. Issues are ordered by rule:
 * accountability, responsibility, role load, then informed-only activities.
 */
export function validateRaci(result: Pick<RaciMatrix, "raciMatrix" | "roleSummary">): RaciIssue[] {
  const issues: RaciIssue[] = [];
  const { raciMatrix, roleSummary } = result;

  for (const entry of raciMatrix) {
    const accountable = Object.values(entry.roles).filter((code) => code === "A").length;
    if (accountable === 0) {
      issues.push({
        severity: "critical",
        activity: entry.activity,
        issue: "No Accountable role assigned",
        recommendation: "Assign exactly one Accountable role",
      });
    } else if (accountable > 1) {
      issues.push({
        severity: "critical",
        activity: entry.activity,
        issue: `Multiple Accountable roles (${accountable})`,
        recommendation: "Keep only one Accountable role per activity",
      });
    }
  }

  for (const entry of raciMatrix) {
    if (!Object.values(entry.roles).includes("R")) {
      issues.push({
        severity: "high",
        activity: entry.activity,
        issue: "No Responsible role assigned",
        recommendation: "Assign at least one Responsible role",
      });
    }
  }

  const total = raciMatrix.length;
  for (const [role, stats] of Object.entries(roleSummary)) {
    if (stats.A > total * 0.5) {
      issues.push({
        severity: "medium",
        role,
        issue: `Role is Accountable for ${stats.A} activities (${share(stats.A, total)}%)`,
        recommendation: "Consider distributing accountability across more roles",
      });
    }
    if (stats.R > total * 0.7) {
      issues.push({
        severity: "medium",
        role,
        issue: `Role is Responsible for ${stats.R} activities (${share(stats.R, total)}%)`,
        recommendation: "Consider distributing work across more roles",
      });
    }
    if (stats.C > total * 0.6) {
      issues.push({
        severity: "low",
        role,
        issue: `Role is Consulted on ${stats.C} activities (${share(stats.C, total)}%)`,
        recommendation: "Reduce consultation to critical activities only",
      });
    }
    if (stats.total === 0) {
      issues.push({
        severity: "low",
        role,
        issue: "Role has no RACI assignments",
        recommendation: "Remove unused role or assign responsibilities",
      });
    }
  }

  for (const entry of raciMatrix) {
    const codes = Object.values(entry.roles);
    if (codes.length > 0 && codes.every((code) => code === "I")) {
      issues.push({
        severity: "high",
        activity: entry.activity,
        issue: "Activity has only Informed roles",
        recommendation: "Assign Responsible and Accountable roles",
      });
    }
  }

  return issues;
}

export function countIssues(issues: readonly RaciIssue[]): Record<RaciIssue["severity"], number> {
  const counts = { critical: 0, high: 0, medium: 0, low: 0 };
  for (const issue of issues) counts[issue.severity]++;
  return counts;
}

/** One stderr line: "3 validation issues found: 1 critical, 2 high". */
export function describeIssues(issues: readonly RaciIssue[]): string {
  if (issues.length === 0) return "No validation issues found";
  const parts = Object.entries(countIssues(issues))
    .filter(([, n]) => n > 0)
    .map(([severity, n]) => `${n} ${severity}`);
  return `${issues.length} validation issues found: ${parts.join(", ")}`;
}

export function raciExitCode(result: RaciMatrix): number {
  return countIssues(result.validationIssues).critical > 0 ? RACI_EXIT.validation : RACI_EXIT.success;
}
