// src/okr/cascade.ts — Company → product → team OKR cascade

import { vlog } from "../output.js";
import type { Warning } from "../types.js";
import { loadOkrTemplates, type OkrTemplates } from "./templates.js";
import {
  isOkrStrategy,
  type CompanyOkrs,
  type KeyResult,
  type KeyResultUnit,
  type Objective,
  type OkrCascade,
  type OkrMetrics,
  type OkrStrategy,
  type ProductOkrs,
  type TeamOkrs,
} from "./types.js";

const COMPANY_OBJECTIVES = 3;
const KEY_RESULTS_PER_OBJECTIVE = 3;
const TEAM_KEY_RESULTS = 2;
/** Share of a company target the product organisation takes on. */
const PRODUCT_SHARE = 0.3;

const DEFAULT_CURRENT = 0;
const DEFAULT_TARGET = 100;

/** Unknown strategies fall back to growth. */
export function resolveStrategy(name: string, warnings: Warning[] = []): OkrStrategy {
  const lower = name.toLowerCase();
  if (isOkrStrategy(lower)) return lower;
  warnings.push({ level: "warn", module: "okr", message: `Unknown strategy '${name}', defaulting to 'growth'` });
  return "growth";
}

/** "Q2 2025" for any date in April–June 2025 (UTC). */
export function currentQuarter(now: Date): string {
  return `Q${Math.floor(now.getUTCMonth() / 3) + 1} ${now.getUTCFullYear()}`;
}

export function fillMetrics(template: string, metrics: OkrMetrics): string {
  let result = template;
  for (const [key, value] of Object.entries(metrics)) {
    result = result.replaceAll(`{${key}}`, String(value));
  }
  return result;
}

export function extractUnit(template: string): KeyResultUnit {
  if (template.includes("%")) return "%";
  if (template.includes("$")) return "$";
  const lower = template.toLowerCase();
  if (lower.includes("days")) return "days";
  if (lower.includes("score")) return "points";
  return "count";
}

function roundTarget(value: number): number {
  return Math.round(value * 100) / 100;
}

/** The numeric suffix of an id: "CO-2" → "2", "CO-2-KR3" → "3". */
function idNumber(id: string, separator: string): string {
  return id.slice(id.lastIndexOf(separator) + separator.length);
}

// ─── Company ────────────────────────────────────────────────────────────────

export function generateCompanyOkrs(
  strategy: OkrStrategy,
  metrics: OkrMetrics,
  now: Date,
  templates: OkrTemplates = loadOkrTemplates(),
): CompanyOkrs {
  const template = templates.strategies[strategy];
  const current = typeof metrics.current === "number" ? metrics.current : DEFAULT_CURRENT;
  const target = typeof metrics.target === "number" ? metrics.target : DEFAULT_TARGET;

  const objectives = template.objectives.slice(0, COMPANY_OBJECTIVES).map((title, i): Objective => {
    const id = `CO-${i + 1}`;
    const keyResults = template.keyResults.slice(0, KEY_RESULTS_PER_OBJECTIVE).map(
      (krTemplate, j): KeyResult => ({
        id: `${id}-KR${j + 1}`,
        title: fillMetrics(krTemplate, metrics),
        current,
        target,
        unit: extractUnit(krTemplate),
        status: "not_started",
      }),
    );
    return { id, title, keyResults, owner: "CEO", status: "draft" };
  });

  return { level: "Company", quarter: currentQuarter(now), strategy, objectives };
}

// ─── Product ────────────────────────────────────────────────────────────────

export function translateToProduct(objective: string, templates: OkrTemplates = loadOkrTemplates()): string {
  for (const [phrase, replacement] of templates.productTranslations) {
    if (objective.includes(phrase)) return objective.replace(phrase, replacement);
  }
  return `Product: ${objective}`;
}

export function translateKrToProduct(keyResult: string, templates: OkrTemplates = loadOkrTemplates()): string {
  for (const [term, replacement] of templates.productTerms) {
    if (keyResult.includes(term)) return keyResult.replaceAll(term, replacement);
  }
  return keyResult;
}

export function cascadeToProduct(company: CompanyOkrs, templates: OkrTemplates = loadOkrTemplates()): ProductOkrs {
  const objectives = company.objectives.map((parent): Objective => {
    const id = `PO-${idNumber(parent.id, "-")}`;
    return {
      id,
      title: translateToProduct(parent.title, templates),
      parentObjective: parent.id,
      keyResults: parent.keyResults.map((kr): KeyResult => ({
        id: `${id}-KR${idNumber(kr.id, "KR")}`,
        title: translateKrToProduct(kr.title, templates),
        contributesTo: kr.id,
        current: kr.current,
        target: roundTarget(kr.target * PRODUCT_SHARE),
        unit: kr.unit,
        status: "not_started",
      })),
      owner: "Head of Product",
      status: "draft",
    };
  });
  return { level: "Product", quarter: company.quarter, parent: "Company", objectives };
}

// ─── Teams ──────────────────────────────────────────────────────────────────

/**
 * A team takes an objective whose title mentions one of its keywords. Teams
 * missing from the relevance table match on their own name.
 */
export function isRelevantForTeam(objective: string, team: string, templates: OkrTemplates = loadOkrTemplates()): boolean {
  if (templates.alwaysRelevantTeams.includes(team)) return true;
  const keywords = Object.hasOwn(templates.teamRelevance, team)
    ? templates.teamRelevance[team]
    : [team.toLowerCase()];
  const lower = objective.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword));
}

export function translateToTeam(objective: string, team: string, templates: OkrTemplates = loadOkrTemplates()): string {
  const focus = Object.hasOwn(templates.teamFocus, team) ? templates.teamFocus[team] : "delivery";
  return `${objective} through ${focus}`;
}

/** "Platform" → "PLA" */
export function teamPrefix(team: string): string {
  return team.slice(0, 3).toUpperCase();
}

export function cascadeToTeams(
  product: ProductOkrs,
  teams: readonly string[],
  templates: OkrTemplates = loadOkrTemplates(),
): TeamOkrs[] {
  const result: TeamOkrs[] = [];
  for (const team of teams) {
    const prefix = teamPrefix(team);
    const objectives = product.objectives
      .filter((parent) => isRelevantForTeam(parent.title, team, templates))
      .map((parent): Objective => {
        const id = `${prefix}-${idNumber(parent.id, "-")}`;
        return {
          id,
          title: translateToTeam(parent.title, team, templates),
          parentObjective: parent.id,
          keyResults: parent.keyResults.slice(0, TEAM_KEY_RESULTS).map((kr): KeyResult => ({
            id: `${id}-KR${idNumber(kr.id, "KR")}`,
            title: `[${team}] ${kr.title}`,
            contributesTo: kr.id,
            current: kr.current,
            target: roundTarget(kr.target / teams.length),
            unit: kr.unit,
            status: "not_started",
          })),
          owner: `${team} PM`,
          status: "draft",
        };
      });

    if (objectives.length > 0) {
      result.push({ level: "Team", team, quarter: product.quarter, parent: "Product", objectives });
    }
  }
  return result;
}

// ─── Pipeline ───────────────────────────────────────────────────────────────

export interface CascadeOptions {
  teams: readonly string[];
  now?: Date;
  verbose?: boolean;
}

export function cascadeOkrs(strategy: OkrStrategy, metrics: OkrMetrics, options: CascadeOptions): OkrCascade {
  const verbose = options.verbose ?? false;
  const templates = loadOkrTemplates();

  vlog(verbose, `Generating OKRs for ${strategy} strategy`);
  const company = generateCompanyOkrs(strategy, metrics, options.now ?? new Date(), templates);
  const product = cascadeToProduct(company, templates);
  const teams = cascadeToTeams(product, options.teams, templates);

  vlog(verbose, `Generated ${company.objectives.length} company objectives`);
  vlog(verbose, `Generated ${product.objectives.length} product objectives`);
  vlog(verbose, `Generated OKRs for ${teams.length} teams`);
  return { company, product, teams };
}
