// src/okr/format.ts — OKR dashboard, JSON and CSV renderers

import { toCsv, type CsvCell } from "../csv.js";
import { toJson } from "../output.js";
import { TOOLKIT_VERSION } from "../types.js";
import type { AlignmentScores, Objective, OkrCascade, OkrReport } from "./types.js";

export const OKR_FORMATS = ["text", "json", "csv"] as const;
export type OkrFormat = (typeof OKR_FORMATS)[number];

const RULE = "=".repeat(60);
const SUBRULE = "-".repeat(40);

const SCORE_LABELS: readonly [keyof AlignmentScores, string][] = [
  ["verticalAlignment", "Vertical Alignment"],
  ["horizontalAlignment", "Horizontal Alignment"],
  ["coverage", "Coverage"],
  ["balance", "Balance"],
  ["overall", "Overall"],
];

export function buildOkrReport(
  cascade: OkrCascade,
  alignment: AlignmentScores,
  teams: readonly string[],
  now: Date = new Date(),
): OkrReport {
  return {
    metadata: {
      tool: "insight-kit okr",
      version: TOOLKIT_VERSION,
      quarter: cascade.company.quarter,
      strategy: cascade.company.strategy,
      teams: [...teams],
      generatedAt: now.toISOString(),
    },
    okrs: cascade,
    alignment,
  };
}

function objectiveLines(objective: Objective, indent: string): string[] {
  const lines = [`${indent}${objective.id}: ${objective.title}`];
  for (const kr of objective.keyResults) lines.push(`${indent}   └─ ${kr.id}: ${kr.title}`);
  return lines;
}

export function formatOkrText(report: OkrReport): string {
  const { company, product, teams } = report.okrs;
  const out: string[] = [RULE, "OKR CASCADE DASHBOARD", `Quarter: ${report.metadata.quarter}`];
  out.push(`Strategy: ${report.metadata.strategy}`, RULE);

  out.push("", "COMPANY OKRS", "");
  for (const objective of company.objectives) out.push(...objectiveLines(objective, ""));

  out.push("", "PRODUCT OKRS", "");
  for (const objective of product.objectives) {
    const [heading, ...krs] = objectiveLines(objective, "");
    out.push(heading, `   ↳ Supports: ${objective.parentObjective ?? "N/A"}`, ...krs);
  }

  out.push("", "TEAM OKRS");
  for (const team of teams) {
    out.push("", `${team.team} Team:`);
    for (const objective of team.objectives) out.push(...objectiveLines(objective, "  "));
  }

  out.push("", "ALIGNMENT MATRIX", "Company → Product → Teams", SUBRULE);
  for (const c of company.objectives) {
    out.push("", c.id);
    for (const p of product.objectives.filter((o) => o.parentObjective === c.id)) {
      out.push(`  ├─ ${p.id}`);
      for (const team of teams) {
        for (const t of team.objectives.filter((o) => o.parentObjective === p.id)) {
          out.push(`    └─ ${t.id} (${team.team})`);
        }
      }
    }
  }

  out.push("", "ALIGNMENT SCORES", SUBRULE);
  for (const [key, label] of SCORE_LABELS) out.push(`${label}: ${report.alignment[key]}%`);
  return out.join("\n");
}

/** One row per key result at every level. */
export function formatOkrCsv(report: OkrReport): string {
  const rows: CsvCell[][] = [["level", "id", "title", "parent_id", "current", "target", "unit", "status"]];
  const addRows = (level: string, objectives: readonly Objective[]): void => {
    for (const objective of objectives) {
      for (const kr of objective.keyResults) {
        rows.push([level, kr.id, kr.title, objective.id, kr.current, kr.target, kr.unit, kr.status]);
      }
    }
  };

  addRows("Company", report.okrs.company.objectives);
  addRows("Product", report.okrs.product.objectives);
  for (const team of report.okrs.teams) addRows(team.team, team.objectives);
  return toCsv(rows);
}

export function formatOkrReport(report: OkrReport, format: OkrFormat): string {
  switch (format) {
    case "json":
      return toJson(report);
    case "csv":
      return formatOkrCsv(report);
    case "text":
      return formatOkrText(report);
  }
}
