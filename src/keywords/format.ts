// src/keywords/format.ts — Keyword analysis renderers (text, JSON, CSV)

import { toCsv } from "../csv.js";
import { thousands, titleCase, toJson } from "../output.js";
import { UNCLUSTERED_ID, type KeywordAnalysis } from "./types.js";

export const KEYWORD_FORMATS = ["text", "json", "csv"] as const;
export type KeywordFormat = (typeof KEYWORD_FORMATS)[number];

const RULE = "=".repeat(60);
const SUBRULE = "-".repeat(40);

export function formatKeywordText(analysis: KeywordAnalysis): string {
  const out: string[] = [];
  const { summary } = analysis;

  out.push(RULE, "KEYWORD RESEARCH ANALYSIS", RULE, "");

  out.push("SUMMARY", SUBRULE);
  out.push(`Total Keywords: ${summary.totalKeywords}`);
  out.push(`Total Search Volume: ${thousands(summary.totalVolume)}`);
  out.push(`Average Competition: ${summary.avgCompetition.toFixed(2)}`);
  out.push(`Topic Clusters: ${summary.clusterCount ?? "N/A"}`);
  out.push(`Analysis Date: ${summary.analysisDate.slice(0, 10)}`);
  out.push("");

  out.push("SEARCH INTENT DISTRIBUTION", SUBRULE);
  for (const [intent, count] of Object.entries(analysis.intentDistribution)) {
    const pct = summary.totalKeywords > 0 ? (count / summary.totalKeywords) * 100 : 0;
    out.push(`  ${titleCase(intent)}: ${count} (${pct.toFixed(1)}%)`);
  }
  out.push("");

  if (analysis.clusters.length > 0) {
    out.push("TOP TOPIC CLUSTERS", SUBRULE);
    analysis.clusters.slice(0, 10).forEach((cluster, i) => {
      if (cluster.clusterId === UNCLUSTERED_ID) return;
      out.push("", `${i + 1}. ${cluster.name}`);
      out.push(`   Pillar: ${cluster.pillarKeyword ?? "-"}`);
      out.push(`   Keywords: ${cluster.keywordCount} | Volume: ${thousands(cluster.totalVolume)}`);
      out.push(`   Intent: ${cluster.primaryIntent} | Priority: ${cluster.priorityScore ?? "N/A"}`);
      const top = cluster.keywords.slice(0, 3);
      if (top.length > 0) {
        out.push("   Top Keywords:");
        for (const kw of top) out.push(`     - ${kw.keyword} (vol: ${kw.volume})`);
      }
    });
    out.push("");
  }

  if (analysis.contentGaps.length > 0) {
    out.push("CONTENT GAP ANALYSIS", SUBRULE);
    for (const gap of analysis.contentGaps.slice(0, 5)) {
      out.push("", `  ${gap.clusterName}`);
      out.push(`    Coverage: ${gap.keywordCoverage}%`);
      out.push(`    Recommendation: ${gap.recommendation}`);
    }
    out.push("");
  }

  if (analysis.recommendations.length > 0) {
    out.push("STRATEGIC RECOMMENDATIONS", SUBRULE);
    for (const rec of analysis.recommendations) out.push(`  * ${rec}`);
    out.push("");
  }

  return out.join("\n");
}

export function formatKeywordCsv(analysis: KeywordAnalysis): string {
  return toCsv([
    [
      "cluster_id",
      "cluster_name",
      "pillar_keyword",
      "keyword_count",
      "total_volume",
      "avg_competition",
      "primary_intent",
      "priority_score",
    ],
    ...analysis.clusters.map((c) => [
      c.clusterId,
      c.name,
      c.pillarKeyword ?? "",
      c.keywordCount,
      c.totalVolume,
      c.avgCompetition.toFixed(2),
      c.primaryIntent,
      c.priorityScore ?? "",
    ]),
  ]);
}

export function formatKeywordReport(analysis: KeywordAnalysis, format: KeywordFormat): string {
  switch (format) {
    case "json":
      return toJson(analysis);
    case "csv":
      return formatKeywordCsv(analysis);
    case "text":
      return formatKeywordText(analysis);
  }
}
