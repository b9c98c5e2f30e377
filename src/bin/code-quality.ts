// insight-kit code-quality — regex and AST code-smell checker with a letter grade

import type { ParsedArgs, ResolvedConfig } from "../config.js";
import { ValidationError } from "../errors.js";
import { checkCodeQuality, qualityExitCode } from "../code-quality/checker.js";
import { QUALITY_FORMATS, formatQualityReport } from "../code-quality/format.js";
import { emitReport, pickFormat } from "../output.js";
import type { Warning } from "../types.js";

export function runCodeQuality(args: ParsedArgs, config: ResolvedConfig, warnings: Warning[]): number {
  const target = args.input ?? args.positionals[0];
  if (!target) throw new ValidationError("code-quality: a file or directory to analyze is required");
  const format = pickFormat(args.output, QUALITY_FORMATS, "text");

  const report = checkCodeQuality(
    target,
    {
      language: args.language,
      minSeverity: config.codeQuality.minSeverity,
      maxLineLength: config.codeQuality.maxLineLength,
      maxNestingDepth: config.codeQuality.maxNestingDepth,
      exclude: config.codeQuality.exclude,
      verbose: config.verbose,
    },
    warnings,
  );

  emitReport(formatQualityReport(report, format), args.file);
  return qualityExitCode(report);
}
