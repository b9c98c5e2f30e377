// src/keywords/intent.ts — Search intent classification

import { z } from "zod";
import { loadDataFile } from "../data.js";
import { SEARCH_INTENTS, type SearchIntent } from "./types.js";

const IntentPatternsSchema = z.object({
  informational: z.array(z.string().min(1)),
  navigational: z.array(z.string().min(1)),
  transactional: z.array(z.string().min(1)),
  commercial: z.array(z.string().min(1)),
});

let compiled: ReadonlyArray<[SearchIntent, RegExp[]]> | undefined;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function getIntentPatterns(): ReadonlyArray<[SearchIntent, RegExp[]]> {
  if (compiled === undefined) {
    const table = loadDataFile("intent-patterns.json", IntentPatternsSchema);
    compiled = SEARCH_INTENTS.map((intent): [SearchIntent, RegExp[]] => [
      intent,
      table[intent].map((word) => new RegExp(`\\b${escapeRegExp(word)}\\b`)),
    ]);
  }
  return compiled;
}

/**
 * Count pattern hits per intent group; most hits wins, ties go to the
 * earlier group, no hits at all means informational.
 */
export function classifyIntent(keyword: string): SearchIntent {
  const lower = keyword.toLowerCase();
  let best: SearchIntent = "informational";
  let bestHits = 0;
  for (const [intent, patterns] of getIntentPatterns()) {
    const hits = patterns.filter((p) => p.test(lower)).length;
    if (hits > bestHits) {
      best = intent;
      bestHits = hits;
    }
  }
  return best;
}
