// src/okr/templates.ts — OKR templates, translation tables and metrics loading

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import { formatZodIssues, loadDataFile } from "../data.js";
import { InputNotFoundError, InputParseError, errorMessage } from "../errors.js";
import type { OkrMetrics } from "./types.js";

const StrategyTemplateSchema = z.object({
  objectives: z.array(z.string()).min(1),
  keyResults: z.array(z.string()).min(1),
});

const Pair = z.tuple([z.string(), z.string()]);

const MetricValue = z.union([z.string(), z.number(), z.boolean()]);

const MetricsSchema = z
  .object({ current: z.number().optional(), target: z.number().optional() })
  .catchall(MetricValue);

const OkrTemplatesSchema = z.object({
  strategies: z.object({
    growth: StrategyTemplateSchema,
    retention: StrategyTemplateSchema,
    revenue: StrategyTemplateSchema,
    innovation: StrategyTemplateSchema,
    operational: StrategyTemplateSchema,
  }),
  /** Company-objective phrase → product phrase; the first contained phrase wins. */
  productTranslations: z.array(Pair),
  /** Key-result term → product term; the first contained term wins. */
  productTerms: z.array(Pair),
  teamFocus: z.record(z.string()),
  teamRelevance: z.record(z.array(z.string())),
  alwaysRelevantTeams: z.array(z.string()),
  defaultMetrics: MetricsSchema,
});

export type OkrTemplates = z.infer<typeof OkrTemplatesSchema>;

export function loadOkrTemplates(): OkrTemplates {
  return loadDataFile("okr-templates.json", OkrTemplatesSchema);
}

export function parseMetrics(raw: unknown, source = "metrics"): OkrMetrics {
  const parsed = MetricsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InputParseError(source, formatZodIssues(parsed.error));
  }
  const metrics: OkrMetrics = {};
  for (const [key, value] of Object.entries(parsed.data)) {
    if (value !== undefined) metrics[key] = value;
  }
  return metrics;
}

/**
 * Read a metrics JSON object. `current` and `target` must be numbers when
 * present; other keys may be any scalar.
 */
export function loadMetrics(filePath: string): OkrMetrics {
  const absPath = resolve(filePath);
  if (!existsSync(absPath)) throw new InputNotFoundError(filePath, "Metrics file");

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(absPath, "utf-8"));
  } catch (err: unknown) {
    throw new InputParseError(filePath, `Invalid JSON: ${errorMessage(err)}`);
  }
  return parseMetrics(raw, filePath);
}

export function defaultMetrics(): OkrMetrics {
  return parseMetrics(loadOkrTemplates().defaultMetrics, "okr-templates.json");
}
