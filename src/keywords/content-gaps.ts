// src/keywords/content-gaps.ts — Compare clusters with existing content titles

import { UNCLUSTERED_ID, type ClusterIntent, type ContentGap, type KeywordCluster } from "./types.js";

const CONTENT_TYPES: Record<ClusterIntent, string[]> = {
  informational: ["How-to guide", "Tutorial", "FAQ page", "Glossary"],
  commercial: ["Comparison article", "Review roundup", "Buying guide", "Best-of list"],
  transactional: ["Product page", "Landing page", "Pricing page", "Sales page"],
  navigational: ["About page", "Contact page", "Documentation", "Help center"],
  mixed: ["Blog post", "Resource page", "Case study"],
};

export function suggestContentTypes(intent: ClusterIntent): string[] {
  return [...CONTENT_TYPES[intent]];
}

export function gapRecommendation(hasPillar: boolean, coverage: number): string {
  if (!hasPillar) return "Create pillar content for this topic cluster";
  if (coverage < 0.3) return "Expand cluster with supporting content pieces";
  if (coverage < 0.7) return "Fill remaining content gaps in cluster";
  return "Optimize existing content for better rankings";
}

/**
 * For each real cluster: is the pillar keyword already covered by a title,
 * and what share of its keywords appear in some title (case-insensitive).
 * Sorted by cluster priority, unscored clusters last.
 */
export function identifyContentGaps(
  clusters: readonly KeywordCluster[],
  existingTitles: readonly string[],
): ContentGap[] {
  const existing = existingTitles.map((t) => t.toLowerCase());
  const covers = (phrase: string): boolean => {
    const needle = phrase.toLowerCase();
    return existing.some((title) => title.includes(needle));
  };

  const gaps: ContentGap[] = [];
  for (const cluster of clusters) {
    if (cluster.clusterId === UNCLUSTERED_ID) continue;

    const hasPillar = cluster.pillarKeyword !== null && covers(cluster.pillarKeyword);
    const covered = cluster.keywords.filter((kw) => covers(kw.keyword)).length;
    const coverage = cluster.keywordCount > 0 ? covered / cluster.keywordCount : 0;

    gaps.push({
      clusterName: cluster.name,
      pillarKeyword: cluster.pillarKeyword,
      hasPillarContent: hasPillar,
      keywordCoverage: Math.round(coverage * 1000) / 10,
      totalOpportunityVolume: cluster.totalVolume,
      priorityScore: cluster.priorityScore ?? null,
      recommendation: gapRecommendation(hasPillar, coverage),
      suggestedContentTypes: suggestContentTypes(cluster.primaryIntent),
    });
  }

  return gaps.sort((a, b) => (b.priorityScore ?? -1) - (a.priorityScore ?? -1));
}
