// src/keywords/terms.ts — Core-term extraction and Jaccard similarity

import { z } from "zod";
import { loadDataFile } from "../data.js";

const StopWordsSchema = z.array(z.string().min(1));

let stopWords: ReadonlySet<string> | undefined;

function getStopWords(): ReadonlySet<string> {
  stopWords ??= new Set(loadDataFile("stop-words.json", StopWordsSchema));
  return stopWords;
}

/** Terms of this length or shorter never count toward similarity. */
const MIN_TERM_LENGTH = 3;

/**
 * Lowercased `[a-z]+` tokens minus stop words, longer than two characters.
 * The set keeps first-occurrence order.
 */
export function extractCoreTerms(keyword: string): Set<string> {
  const stop = getStopWords();
  const terms = new Set<string>();
  for (const match of keyword.toLowerCase().matchAll(/\b[a-z]+\b/g)) {
    const word = match[0];
    if (word.length >= MIN_TERM_LENGTH && !stop.has(word)) terms.add(word);
  }
  return terms;
}

/** |A ∩ B| / |A ∪ B|; 0 when either side is empty. */
export function jaccardSimilarity(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let intersection = 0;
  for (const term of a) {
    if (b.has(term)) intersection++;
  }
  const union = a.size + b.size - intersection;
  return intersection / union;
}

/** Up to three of the longest terms, title-cased; "General" when there are none. */
export function clusterName(terms: Iterable<string>): string {
  const sorted = [...terms].sort((x, y) => y.length - x.length).slice(0, 3);
  if (sorted.length === 0) return "General";
  return sorted.map((t) => t.charAt(0).toUpperCase() + t.slice(1)).join(" ");
}
