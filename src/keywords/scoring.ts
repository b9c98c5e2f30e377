// src/keywords/scoring.ts — Priority scoring for keywords and clusters

import type { ClusterIntent, KeywordCluster } from "./types.js";

export interface PriorityInput {
  volume: number;
  competition: number;
  intent: ClusterIntent;
}

const INTENT_SCORES: Record<ClusterIntent, number> = {
  transactional: 100,
  commercial: 80,
  informational: 50,
  navigational: 30,
  mixed: 50,
};

export function volumeScore(volume: number): number {
  if (volume > 10000) return 100;
  if (volume > 5000) return 80;
  if (volume > 1000) return 60;
  if (volume > 500) return 40;
  if (volume > 100) return 20;
  return 10;
}

/**
 * 0.4 × volume step + 0.3 × inverted competition + 0.3 × intent value,
 * rounded to one decimal.
 */
export function calculatePriorityScore(input: PriorityInput): number {
  const competitionScore = (1 - input.competition) * 100;
  const priority =
    volumeScore(input.volume) * 0.4 + competitionScore * 0.3 + INTENT_SCORES[input.intent] * 0.3;
  return Math.round(priority * 10) / 10;
}

/**
 * Score every cluster (total volume, mean competition, primary intent) and each
 * of its keywords, then order clusters by priority.
 */
export function scoreClusters(clusters: readonly KeywordCluster[]): KeywordCluster[] {
  const scored = clusters.map((cluster) => ({
    ...cluster,
    priorityScore: calculatePriorityScore({
      volume: cluster.totalVolume,
      competition: cluster.avgCompetition,
      intent: cluster.primaryIntent,
    }),
    keywords: cluster.keywords.map((kw) => ({
      ...kw,
      priorityScore: calculatePriorityScore(kw),
    })),
  }));
  return scored.sort((a, b) => b.priorityScore - a.priorityScore);
}
