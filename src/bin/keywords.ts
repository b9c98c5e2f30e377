// insight-kit keywords — keyword research, clustering and content mapping

import type { ParsedArgs, ResolvedConfig } from "../config.js";
import { ValidationError } from "../errors.js";
import { analyzeKeywords } from "../keywords/researcher.js";
import { loadContentTitles, loadKeywords } from "../keywords/loader.js";
import { KEYWORD_FORMATS, formatKeywordReport } from "../keywords/format.js";
import { emitReport, pickFormat, vlog } from "../output.js";
import type { Warning } from "../types.js";

export function runKeywords(args: ParsedArgs, config: ResolvedConfig, warnings: Warning[]): number {
  const input = args.input ?? args.positionals[0];
  if (!input) throw new ValidationError("keywords: an input CSV file is required");
  const format = pickFormat(args.output, KEYWORD_FORMATS, "text");

  const keywords = loadKeywords(input, warnings);
  vlog(config.verbose, `Loaded ${keywords.length} keywords from ${input}`);

  const existingContent = args.contentFile ? loadContentTitles(args.contentFile, warnings) : undefined;
  if (existingContent) vlog(config.verbose, `Loaded ${existingContent.length} existing content items`);

  const analysis = analyzeKeywords(
    keywords,
    {
      cluster: args.cluster,
      score: args.score,
      existingContent,
      similarityThreshold: config.keywords.similarityThreshold,
      minClusterSize: config.keywords.minClusterSize,
      strategy: config.keywords.strategy,
      verbose: config.verbose,
    },
    warnings,
  );

  emitReport(formatKeywordReport(analysis, format), args.file);
  return 0;
}
