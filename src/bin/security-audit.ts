// insight-kit security-audit — pattern-based security review with CWE/OWASP mapping

import type { ParsedArgs, ResolvedConfig } from "../config.js";
import { ValidationError } from "../errors.js";
import { emitReport, pickFormat } from "../output.js";
import { auditSecurity, securityExitCode } from "../security/auditor.js";
import { SECURITY_FORMATS, formatSecurityReport } from "../security/format.js";
import type { Warning } from "../types.js";

export function runSecurityAudit(args: ParsedArgs, config: ResolvedConfig, warnings: Warning[]): number {
  const target = args.input ?? args.positionals[0];
  if (!target) throw new ValidationError("security-audit: a file or directory to audit is required");
  const format = pickFormat(args.output, SECURITY_FORMATS, "text");

  const result = auditSecurity(
    target,
    { exclude: config.securityAudit.exclude, verbose: config.verbose },
    warnings,
  );

  emitReport(formatSecurityReport(result, format), args.file);
  return securityExitCode(result);
}
