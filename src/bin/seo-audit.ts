// insight-kit seo-audit — technical SEO audit of an exported site

import type { ParsedArgs, ResolvedConfig } from "../config.js";
import { ValidationError } from "../errors.js";
import { emitReport, pickFormat } from "../output.js";
import { auditSite, seoExitCode } from "../seo/auditor.js";
import { SEO_FORMATS, formatSeoReport } from "../seo/format.js";
import type { Warning } from "../types.js";

export function runSeoAudit(args: ParsedArgs, config: ResolvedConfig, warnings: Warning[]): number {
  const sitePath = args.input ?? args.positionals[0];
  if (!sitePath) throw new ValidationError("seo-audit: a site directory is required");
  const format = pickFormat(args.output, SEO_FORMATS, "text");

  const result = auditSite(
    sitePath,
    {
      checks: args.checks?.split(","),
      maxFiles: config.seoAudit.maxFiles,
      internalHosts: config.seoAudit.internalHosts,
      verbose: config.verbose,
    },
    warnings,
  );

  emitReport(formatSeoReport(result, format), args.file);
  return seoExitCode(result.summary.seoScore);
}
