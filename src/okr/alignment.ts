// src/okr/alignment.ts — Alignment scores for an OKR cascade

import type { AlignmentScores, OkrCascade } from "./types.js";

const WEIGHTS = { vertical: 0.4, horizontal: 0.2, coverage: 0.2, balance: 0.2 } as const;

/** Points per parent objective shared by the teams, capped at 100. */
const SHARED_PARENT_POINTS = 25;

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * - vertical: share of product and team objectives that name a parent
 * - horizontal: 25 per distinct product objective the teams pick up (two or more teams)
 * - coverage: product key results per company key result
 * - balance: 100 − 10 · variance of objectives per team
 */
export function calculateAlignment(cascade: OkrCascade): AlignmentScores {
  const { company, product, teams } = cascade;

  const cascaded = [...product.objectives, ...teams.flatMap((t) => t.objectives)];
  const aligned = cascaded.filter((o) => o.parentObjective !== undefined).length;
  const verticalAlignment = cascaded.length > 0 ? round1((aligned / cascaded.length) * 100) : 0;

  let horizontalAlignment = 0;
  if (teams.length > 1) {
    const shared = new Set<string>();
    for (const team of teams) {
      for (const objective of team.objectives) {
        if (objective.parentObjective) shared.add(objective.parentObjective);
      }
    }
    horizontalAlignment = Math.min(100, shared.size * SHARED_PARENT_POINTS);
  }

  const companyKrs = company.objectives.reduce((n, o) => n + o.keyResults.length, 0);
  const productKrs = product.objectives.reduce((n, o) => n + o.keyResults.length, 0);
  const coverage = companyKrs > 0 ? round1((productKrs / companyKrs) * 100) : 0;

  let balance = 0;
  if (teams.length > 0) {
    const counts = teams.map((t) => t.objectives.length);
    const mean = counts.reduce((a, b) => a + b, 0) / counts.length;
    const variance = counts.reduce((sum, x) => sum + (x - mean) ** 2, 0) / counts.length;
    balance = round1(Math.max(0, 100 - variance * 10));
  }

  const overall = round1(
    verticalAlignment * WEIGHTS.vertical +
      horizontalAlignment * WEIGHTS.horizontal +
      coverage * WEIGHTS.coverage +
      balance * WEIGHTS.balance,
  );

  return { verticalAlignment, horizontalAlignment, coverage, balance, overall };
}
