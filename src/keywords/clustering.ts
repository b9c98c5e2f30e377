// src/keywords/clustering.ts — Topic clustering by core-term overlap
//
// Two phases:
//   1. assignment: greedy (input order, running term union) or connected components
//   2. dissolution of clusters below the minimum size into the catch-all
// Greedy assignment is order-dependent: a keyword joins the first kept cluster whose
// growing union crosses the threshold. An undersized greedy cluster releases its
// members at once, so later seeds can still absorb them.

import { classifyIntent } from "./intent.js";
import { clusterName, extractCoreTerms, jaccardSimilarity } from "./terms.js";
import {
  UNCLUSTERED_ID,
  type ClusterIntent,
  type ClusterKeyword,
  type ClusterStrategy,
  type KeywordCluster,
  type KeywordRecord,
  type SearchIntent,
} from "./types.js";

export interface ClusterOptions {
  similarityThreshold?: number;
  minClusterSize?: number;
  strategy?: ClusterStrategy;
}

export interface TermedKeyword extends KeywordRecord {
  /** Position in the input list. */
  index: number;
  terms: Set<string>;
  intent: SearchIntent;
}

/** A cluster before summarisation: member indices in input order plus the term union. */
export interface RawCluster {
  clusterId: number;
  members: number[];
  terms: Set<string>;
}

export interface Partition {
  clusters: RawCluster[];
  /** Indices of keywords in the catch-all, ascending. */
  unclustered: number[];
}

export function prepareKeywords(keywords: readonly KeywordRecord[]): TermedKeyword[] {
  return keywords.map((kw, index) => ({
    ...kw,
    index,
    terms: extractCoreTerms(kw.keyword),
    intent: classifyIntent(kw.keyword),
  }));
}

// ─── Phase 1: assignment ────────────────────────────────────────────────────

/**
 * Seed a cluster with each still-unassigned keyword in input order, then make one
 * pass over the remaining unassigned keywords, absorbing every keyword whose
 * similarity to the running union is at least `threshold`. A cluster below
 * `minClusterSize` is dropped and its members become unassigned again. Ids count
 * kept clusters only.
 */
export function assignGreedy(
  keywords: readonly TermedKeyword[],
  threshold: number,
  minClusterSize = 1,
): RawCluster[] {
  const assigned = new Array<boolean>(keywords.length).fill(false);
  const clusters: RawCluster[] = [];

  for (const seed of keywords) {
    if (assigned[seed.index]) continue;

    const members = [seed.index];
    const terms = new Set(seed.terms);
    assigned[seed.index] = true;

    for (const candidate of keywords) {
      if (assigned[candidate.index]) continue;
      if (jaccardSimilarity(terms, candidate.terms) >= threshold) {
        members.push(candidate.index);
        assigned[candidate.index] = true;
        for (const term of candidate.terms) terms.add(term);
      }
    }

    if (members.length < minClusterSize) {
      for (const i of members) assigned[i] = false;
      continue;
    }
    clusters.push({ clusterId: clusters.length, members, terms });
  }

  return clusters;
}

/**
 * Connected components of the graph linking every pair of keywords whose term
 * sets reach `threshold`. Independent of input order.
 */
export function assignComponents(keywords: readonly TermedKeyword[], threshold: number): RawCluster[] {
  const parent = keywords.map((kw) => kw.index);

  const find = (i: number): number => {
    while (parent[i] !== i) {
      parent[i] = parent[parent[i]];
      i = parent[i];
    }
    return i;
  };

  for (let i = 0; i < keywords.length; i++) {
    for (let j = i + 1; j < keywords.length; j++) {
      if (jaccardSimilarity(keywords[i].terms, keywords[j].terms) >= threshold) {
        const a = find(i);
        const b = find(j);
        // Smaller index becomes the root, so ids follow first appearance.
        if (a !== b) parent[Math.max(a, b)] = Math.min(a, b);
      }
    }
  }

  const byRoot = new Map<number, RawCluster>();
  const clusters: RawCluster[] = [];
  for (const kw of keywords) {
    const root = find(kw.index);
    let cluster = byRoot.get(root);
    if (!cluster) {
      cluster = { clusterId: clusters.length, members: [], terms: new Set() };
      byRoot.set(root, cluster);
      clusters.push(cluster);
    }
    cluster.members.push(kw.index);
    for (const term of kw.terms) cluster.terms.add(term);
  }
  return clusters;
}

// ─── Phase 2: dissolution ───────────────────────────────────────────────────

/**
 * Move every cluster with fewer than `minClusterSize` members into the catch-all.
 * Surviving clusters keep their ids. Applying it twice changes nothing.
 */
export function dissolveSmallClusters(partition: Partition, minClusterSize: number): Partition {
  const kept: RawCluster[] = [];
  const unclustered = [...partition.unclustered];
  for (const cluster of partition.clusters) {
    if (cluster.members.length >= minClusterSize) {
      kept.push(cluster);
    } else {
      unclustered.push(...cluster.members);
    }
  }
  return { clusters: kept, unclustered: unclustered.sort((a, b) => a - b) };
}

// ─── Summaries ──────────────────────────────────────────────────────────────

function toClusterKeyword(kw: TermedKeyword): ClusterKeyword {
  return {
    keyword: kw.keyword,
    volume: kw.volume,
    competition: kw.competition,
    intent: kw.intent,
  };
}

function byVolumeDesc(members: readonly TermedKeyword[]): ClusterKeyword[] {
  return [...members].sort((a, b) => b.volume - a.volume).map(toClusterKeyword);
}

/** Plurality vote; ties go to the intent seen first in member order. */
export function primaryIntent(members: readonly { intent: SearchIntent }[]): SearchIntent {
  const counts = new Map<SearchIntent, number>();
  for (const m of members) counts.set(m.intent, (counts.get(m.intent) ?? 0) + 1);
  let best: SearchIntent = "informational";
  let bestCount = 0;
  for (const [intent, count] of counts) {
    if (count > bestCount) {
      best = intent;
      bestCount = count;
    }
  }
  return best;
}

function sumVolume(members: readonly TermedKeyword[]): number {
  return members.reduce((sum, kw) => sum + kw.volume, 0);
}

function meanCompetition(members: readonly TermedKeyword[]): number {
  if (members.length === 0) return 0;
  return members.reduce((sum, kw) => sum + kw.competition, 0) / members.length;
}

function summarizeCluster(raw: RawCluster, keywords: readonly TermedKeyword[]): KeywordCluster {
  const members = raw.members.map((i) => keywords[i]);
  // First member wins ties: strict comparison only.
  const pillar = members.reduce((best, kw) => (kw.volume > best.volume ? kw : best), members[0]);
  const totalVolume = sumVolume(members);
  const intent: ClusterIntent = primaryIntent(members);

  return {
    clusterId: raw.clusterId,
    name: clusterName(raw.terms),
    pillarKeyword: pillar.keyword,
    pillarVolume: pillar.volume,
    totalVolume,
    avgVolume: totalVolume / members.length,
    keywordCount: members.length,
    avgCompetition: meanCompetition(members),
    primaryIntent: intent,
    coreTerms: [...raw.terms].slice(0, 10),
    keywords: byVolumeDesc(members),
  };
}

function summarizeUnclustered(indices: readonly number[], keywords: readonly TermedKeyword[]): KeywordCluster {
  const members = indices.map((i) => keywords[i]);
  const totalVolume = sumVolume(members);
  return {
    clusterId: UNCLUSTERED_ID,
    name: "Unclustered",
    pillarKeyword: null,
    pillarVolume: 0,
    totalVolume,
    avgVolume: members.length > 0 ? totalVolume / members.length : 0,
    keywordCount: members.length,
    avgCompetition: meanCompetition(members),
    primaryIntent: "mixed",
    coreTerms: [],
    keywords: byVolumeDesc(members),
  };
}

function unassigned(keywords: readonly TermedKeyword[], clusters: readonly RawCluster[]): number[] {
  const placed = new Set(clusters.flatMap((c) => c.members));
  return keywords.filter((kw) => !placed.has(kw.index)).map((kw) => kw.index);
}

/**
 * Group keywords into topic clusters. Every keyword ends up in exactly one
 * cluster; those in clusters below `minClusterSize` land in the catch-all
 * (id -1). Result is sorted by total volume, highest first.
 */
export function clusterKeywords(
  keywords: readonly KeywordRecord[],
  options: ClusterOptions = {},
): KeywordCluster[] {
  const threshold = options.similarityThreshold ?? 0.3;
  const minClusterSize = options.minClusterSize ?? 2;
  const termed = prepareKeywords(keywords);

  const assigned =
    options.strategy === "components"
      ? assignComponents(termed, threshold)
      : assignGreedy(termed, threshold, minClusterSize);
  const partition = dissolveSmallClusters(
    { clusters: assigned, unclustered: unassigned(termed, assigned) },
    minClusterSize,
  );

  // Ids run 0..n-1 over the clusters that survived.
  const clusters = partition.clusters.map((raw, clusterId) => summarizeCluster({ ...raw, clusterId }, termed));
  if (partition.unclustered.length > 0) {
    clusters.push(summarizeUnclustered(partition.unclustered, termed));
  }

  return clusters.sort((a, b) => b.totalVolume - a.totalVolume);
}
