// src/raci/types.ts — RACI matrix shapes

import type { IssueSeverity } from "../types.js";

export const RACI_EXIT = {
  success: 0,
  validation: 1,
  parse: 2,
  generation: 3,
} as const;

export const RACI_CODES = ["R", "A", "C", "I"] as const;
export type RaciCode = (typeof RACI_CODES)[number];

export function isRaciCode(value: string): value is RaciCode {
  return RACI_CODES.some((code) => code === value);
}

/** role → code, in the order assignments were made. */
export type RaciAssignments = Record<string, RaciCode>;

export interface Activity {
  id: string;
  name: string;
  description: string;
  sequence: number;
  /** Primary role: Responsible unless a template says otherwise. */
  role?: string;
  /** Codes given in the input itself (role columns of a CSV process). */
  presets?: RaciAssignments;
  inputs?: string[];
  outputs?: string[];
  decisions?: string[];
}

/** A process document after loading, whatever its source format. */
export interface ProcessDocument {
  processName: string;
  processDescription: string;
  processId?: string;
  /** Roles named by the document: declared, step and RACI-entry roles. */
  roles: string[];
  activities: Activity[];
}

export interface RaciTemplate {
  /** When present, replaces the roles derived from the process. */
  roles?: string[];
  /** activity id → assignments */
  assignments: Record<string, RaciAssignments>;
}

export interface RaciEntry {
  activityId: string;
  activity: string;
  description: string;
  roles: RaciAssignments;
}

export interface RoleStats {
  R: number;
  A: number;
  C: number;
  I: number;
  total: number;
}

export interface RaciIssue {
  severity: IssueSeverity;
  /** Activity the issue is about; absent for role-level issues. */
  activity?: string;
  role?: string;
  issue: string;
  recommendation: string;
}

export interface RaciMatrix {
  processName: string;
  processDescription: string;
  processId?: string;
  generatedAt: string;
  roles: string[];
  raciMatrix: RaciEntry[];
  roleSummary: Record<string, RoleStats>;
  validationIssues: RaciIssue[];
}
