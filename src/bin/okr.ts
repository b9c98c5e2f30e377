// insight-kit okr — company → product → team OKR cascade with alignment scoring

import type { ParsedArgs, ResolvedConfig } from "../config.js";
import { emitReport, pickFormat, vlog } from "../output.js";
import { calculateAlignment } from "../okr/alignment.js";
import { cascadeOkrs, resolveStrategy } from "../okr/cascade.js";
import { OKR_FORMATS, buildOkrReport, formatOkrReport } from "../okr/format.js";
import { defaultMetrics, loadMetrics } from "../okr/templates.js";
import type { Warning } from "../types.js";

/** Exit code when the report cannot be written. */
const WRITE_FAILED = 4;

export function runOkr(args: ParsedArgs, config: ResolvedConfig, warnings: Warning[]): number {
  const strategy = resolveStrategy(args.positionals[0] ?? "growth", warnings);
  const format = pickFormat(args.output, OKR_FORMATS, "text");

  const metrics = args.metrics ? loadMetrics(args.metrics) : defaultMetrics();
  vlog(config.verbose, args.metrics ? `Loaded metrics from: ${args.metrics}` : "Using default sample metrics");

  const now = new Date();
  const cascade = cascadeOkrs(strategy, metrics, { teams: config.okr.teams, now, verbose: config.verbose });
  const report = buildOkrReport(cascade, calculateAlignment(cascade), config.okr.teams, now);

  emitReport(formatOkrReport(report, format), args.file, WRITE_FAILED);
  return 0;
}
