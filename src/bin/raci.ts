// insight-kit raci — RACI matrix generation and validation from process documents

import type { ParsedArgs, ResolvedConfig } from "../config.js";
import { ToolkitError, ValidationError, errorMessage } from "../errors.js";
import { emitReport, pickFormat, vlog } from "../output.js";
import { loadProcess, loadTemplate } from "../raci/loader.js";
import { describeIssues, generateRaci, raciExitCode } from "../raci/generator.js";
import { RACI_FORMATS, formatRaciReport, formatRaciValidation } from "../raci/format.js";
import { RACI_EXIT, type RaciMatrix, type RaciTemplate } from "../raci/types.js";
import type { Warning } from "../types.js";

export function runRaci(args: ParsedArgs, config: ResolvedConfig, warnings: Warning[]): number {
  const input = args.input ?? args.positionals[0];
  if (!input) throw new ValidationError("raci: a process file (JSON, CSV or Markdown) is required", RACI_EXIT.validation);
  const format = pickFormat(args.output, RACI_FORMATS, "markdown");

  vlog(config.verbose, `Loading input: ${input}`);
  const doc = loadProcess(input, warnings);

  let template: RaciTemplate | undefined;
  if (config.raci.template) {
    vlog(config.verbose, `Loading template: ${config.raci.template}`);
    template = loadTemplate(config.raci.template, warnings);
  }

  let result: RaciMatrix;
  try {
    result = generateRaci(doc, { template, verbose: config.verbose }, warnings);
  } catch (err: unknown) {
    if (err instanceof ToolkitError) throw err;
    throw new ToolkitError(`RACI generation failed: ${errorMessage(err)}`, RACI_EXIT.generation);
  }

  if (!config.quiet) process.stderr.write(`${describeIssues(result.validationIssues)}\n`);

  const report = args.validateOnly ? formatRaciValidation(result, format) : formatRaciReport(result, format);
  emitReport(report, args.file);
  return raciExitCode(result);
}
