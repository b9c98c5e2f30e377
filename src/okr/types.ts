// src/okr/types.ts — OKR cascade shapes

export const OKR_STRATEGIES = ["growth", "retention", "revenue", "innovation", "operational"] as const;
export type OkrStrategy = (typeof OKR_STRATEGIES)[number];

export function isOkrStrategy(value: string): value is OkrStrategy {
  return OKR_STRATEGIES.some((s) => s === value);
}

export type KeyResultUnit = "%" | "$" | "days" | "points" | "count";

/** Placeholder values for key-result templates: `{current}`, `{target}`, ... */
export type OkrMetrics = Record<string, string | number | boolean>;

export interface KeyResult {
  id: string;
  title: string;
  /** Id of the key result one level up. */
  contributesTo?: string;
  current: number;
  target: number;
  unit: KeyResultUnit;
  status: "not_started";
}

export interface Objective {
  id: string;
  title: string;
  parentObjective?: string;
  keyResults: KeyResult[];
  owner: string;
  status: "draft";
}

export interface CompanyOkrs {
  level: "Company";
  quarter: string;
  strategy: OkrStrategy;
  objectives: Objective[];
}

export interface ProductOkrs {
  level: "Product";
  quarter: string;
  parent: "Company";
  objectives: Objective[];
}

export interface TeamOkrs {
  level: "Team";
  team: string;
  quarter: string;
  parent: "Product";
  objectives: Objective[];
}

export interface OkrCascade {
  company: CompanyOkrs;
  product: ProductOkrs;
  /** Teams with at least one relevant objective, in configured order. */
  teams: TeamOkrs[];
}

export interface AlignmentScores {
  verticalAlignment: number;
  horizontalAlignment: number;
  coverage: number;
  balance: number;
  overall: number;
}

export interface OkrReport {
  metadata: {
    tool: string;
    version: string;
    quarter: string;
    strategy: OkrStrategy;
    teams: string[];
    generatedAt: string;
  };
  okrs: OkrCascade;
  alignment: AlignmentScores;
}
