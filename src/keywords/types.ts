// src/keywords/types.ts — Keyword research types

export const CLUSTER_STRATEGIES = ["greedy", "components"] as const;
export type ClusterStrategy = (typeof CLUSTER_STRATEGIES)[number];

/** Evaluation order matters: ties between groups go to the earlier one. */
export const SEARCH_INTENTS = ["informational", "navigational", "transactional", "commercial"] as const;
export type SearchIntent = (typeof SEARCH_INTENTS)[number];

/** A cluster's intent; the catch-all cluster is "mixed". */
export type ClusterIntent = SearchIntent | "mixed";

export interface KeywordRecord {
  keyword: string;
  /** Monthly search volume, non-negative integer. */
  volume: number;
  /** 0 (none) to 1 (saturated). */
  competition: number;
  cpc: number;
}

export interface ClusterKeyword {
  keyword: string;
  volume: number;
  competition: number;
  intent: SearchIntent;
  priorityScore?: number;
}

export const UNCLUSTERED_ID = -1;

export interface KeywordCluster {
  clusterId: number;
  name: string;
  pillarKeyword: string | null;
  pillarVolume: number;
  totalVolume: number;
  avgVolume: number;
  keywordCount: number;
  avgCompetition: number;
  primaryIntent: ClusterIntent;
  coreTerms: string[];
  /** Sorted by volume, highest first. */
  keywords: ClusterKeyword[];
  priorityScore?: number;
}

export interface ContentGap {
  clusterName: string;
  pillarKeyword: string | null;
  hasPillarContent: boolean;
  /** Percentage of the cluster's keywords found in existing titles, one decimal. */
  keywordCoverage: number;
  totalOpportunityVolume: number;
  priorityScore: number | null;
  recommendation: string;
  suggestedContentTypes: string[];
}

export interface KeywordSummary {
  totalKeywords: number;
  totalVolume: number;
  avgCompetition: number;
  /** Real clusters only; null when clustering was skipped. */
  clusterCount: number | null;
  analysisDate: string;
}

export interface KeywordAnalysis {
  summary: KeywordSummary;
  intentDistribution: Partial<Record<SearchIntent, number>>;
  clusters: KeywordCluster[];
  contentGaps: ContentGap[];
  recommendations: string[];
}
