// src/keywords/researcher.ts — Keyword analysis pipeline
// classify → cluster → score → content gaps → portfolio recommendations

import { vlog } from "../output.js";
import type { Warning } from "../types.js";
import { clusterKeywords, type ClusterOptions } from "./clustering.js";
import { identifyContentGaps } from "./content-gaps.js";
import { classifyIntent } from "./intent.js";
import { scoreClusters } from "./scoring.js";
import {
  UNCLUSTERED_ID,
  type KeywordAnalysis,
  type KeywordRecord,
  type SearchIntent,
} from "./types.js";

export interface AnalyzeOptions extends ClusterOptions {
  /** Group keywords into clusters (default true). */
  cluster?: boolean;
  /** Add priority scores and order clusters by them. */
  score?: boolean;
  /** Existing content titles; enables the content gap analysis. */
  existingContent?: readonly string[];
  /** Analysis timestamp; defaults to now. */
  now?: Date;
  verbose?: boolean;
}

/**
 * Run the full keyword analysis over an already-loaded keyword list.
 */
export function analyzeKeywords(
  keywords: readonly KeywordRecord[],
  options: AnalyzeOptions = {},
  warnings: Warning[] = [],
): KeywordAnalysis {
  const totalVolume = keywords.reduce((sum, kw) => sum + kw.volume, 0);
  const avgCompetition =
    keywords.length > 0 ? keywords.reduce((sum, kw) => sum + kw.competition, 0) / keywords.length : 0;

  const intentDistribution: Partial<Record<SearchIntent, number>> = {};
  for (const kw of keywords) {
    const intent = classifyIntent(kw.keyword);
    intentDistribution[intent] = (intentDistribution[intent] ?? 0) + 1;
  }

  const analysis: KeywordAnalysis = {
    summary: {
      totalKeywords: keywords.length,
      totalVolume,
      avgCompetition,
      clusterCount: null,
      analysisDate: (options.now ?? new Date()).toISOString(),
    },
    intentDistribution,
    clusters: [],
    contentGaps: [],
    recommendations: [],
  };

  if (options.cluster !== false) {
    vlog(options.verbose ?? false, `Clustering ${keywords.length} keywords (${options.strategy ?? "greedy"})`);
    let clusters = clusterKeywords(keywords, options);
    if (options.score) clusters = scoreClusters(clusters);

    analysis.clusters = clusters;
    analysis.summary.clusterCount = clusters.filter((c) => c.clusterId !== UNCLUSTERED_ID).length;
    vlog(options.verbose ?? false, `Created ${analysis.summary.clusterCount} clusters`);

    if (options.existingContent !== undefined) {
      if (!options.score) {
        warnings.push({
          level: "info",
          module: "keywords",
          message: "Content gaps are ordered by priority; run with --score to rank them",
        });
      }
      analysis.contentGaps = identifyContentGaps(clusters, options.existingContent);
    }
  }

  analysis.recommendations = portfolioRecommendations(analysis);
  return analysis;
}

/**
 * Strategy notes from total volume, cluster count, intent mix and competition.
 */
export function portfolioRecommendations(analysis: KeywordAnalysis): string[] {
  const recommendations: string[] = [];
  const { totalVolume, avgCompetition } = analysis.summary;

  if (totalVolume > 50000) {
    recommendations.push("High-volume keyword portfolio - focus on competitive differentiation");
  } else if (totalVolume < 5000) {
    recommendations.push("Consider expanding keyword research for more opportunities");
  }

  const clusterCount = analysis.summary.clusterCount ?? 0;
  if (clusterCount > 10) {
    recommendations.push(`Large topic coverage (${clusterCount} clusters) - prioritize top 3-5 for initial focus`);
  } else if (clusterCount < 3) {
    recommendations.push("Limited topic clusters - expand keyword research to find more topic areas");
  }

  const transactional = analysis.intentDistribution.transactional ?? 0;
  const informational = analysis.intentDistribution.informational ?? 0;
  if (transactional < informational * 0.2) {
    recommendations.push("Low transactional keywords - add more bottom-of-funnel terms");
  }

  if (avgCompetition > 0.7) {
    recommendations.push("High competition portfolio - identify long-tail opportunities");
  } else if (avgCompetition < 0.3) {
    recommendations.push("Low competition keywords - potential quick wins available");
  }

  return recommendations;
}
