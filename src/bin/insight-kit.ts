#!/usr/bin/env node
// CLI entry point for insight-kit

import { parseCliArgs, resolveConfig, type ParsedArgs, type ResolvedConfig } from "../config.js";
import { ToolkitError, ValidationError, errorMessage } from "../errors.js";
import { printWarnings } from "../output.js";
import { TOOL_NAMES, TOOLKIT_VERSION, isToolName, type ToolName, type Warning } from "../types.js";

type Runner = (args: ParsedArgs, config: ResolvedConfig, warnings: Warning[]) => number;

const HELP_TEXT = `
insight-kit v${TOOLKIT_VERSION}

Usage:
  insight-kit keywords <keywords.csv>       Cluster keywords by intent and shared terms
  insight-kit seo-audit <site-dir>          Audit a directory of exported HTML pages
  insight-kit code-quality <path>           Lint source files for code smells
  insight-kit security-audit <path>         Scan source files for security weaknesses
  insight-kit raci <process-file>           Build and validate a RACI matrix
  insight-kit okr [strategy]                Cascade OKRs from company to teams

Common options:
  --input, -i          Input path (instead of the positional argument)
  --output, -o         Output format: text, json, csv (raci: markdown, json, csv, html)
  --file, -f           Write the report to this path instead of stdout
  --config, -c         Path to config file (default: insight-kit.config.json)
  --exclude            Glob of files to skip (repeatable; code-quality, security-audit)
  --quiet, -q          Suppress warnings
  --verbose, -v        Print progress and error stacks
  --version            Print the version
  --help, -h           Show this help text

keywords:
  --no-cluster         Classify intent only, no clustering
  --score, -s          Add priority scores to clusters
  --threshold          Jaccard similarity threshold, 0..1 (default: 0.3)
  --min-cluster-size   Clusters smaller than this are dissolved (default: 2)
  --strategy           Clustering strategy: greedy, components (default: greedy)
  --content-file       Existing content titles (one per line) for gap analysis

seo-audit:
  --max-files          Maximum number of HTML pages to audit (default: 100)
  --checks             Comma-separated categories to check (default: all)

code-quality:
  --language           Only check files of this language
  --min-severity       Lowest severity to report: CRITICAL, HIGH, MEDIUM, LOW, INFO

raci:
  --template, -t       Template with fixed assignments (JSON or CSV)
  --validate-only      Print only the validation report

okr:
  strategy             growth, retention, revenue, innovation, operational (default: growth)
  --metrics            Metrics JSON with current/target values
  --teams              Comma-separated team names (default: Growth,Platform,Mobile,Data)

Examples:
  insight-kit keywords keywords.csv --score -o json
  insight-kit seo-audit ./public --checks meta,headings
  insight-kit security-audit ./src --exclude "**/*.test.ts" -f audit.csv -o csv
  insight-kit raci process.json -o html -f raci.html
  insight-kit okr retention --metrics metrics.json --teams Growth,Platform
`.trim();

async function loadRunner(tool: ToolName): Promise<Runner> {
  switch (tool) {
    case "keywords":
      return (await import("./keywords.js")).runKeywords;
    case "seo-audit":
      return (await import("./seo-audit.js")).runSeoAudit;
    case "code-quality":
      return (await import("./code-quality.js")).runCodeQuality;
    case "security-audit":
      return (await import("./security-audit.js")).runSecurityAudit;
    case "raci":
      return (await import("./raci.js")).runRaci;
    case "okr":
      return (await import("./okr.js")).runOkr;
  }
}

function reportError(err: unknown, verbose: boolean): number {
  if (err instanceof ToolkitError) {
    process.stderr.write(`Error: ${err.message}\n`);
    if (verbose && err.stack) process.stderr.write(`${err.stack}\n`);
    return err.exitCode;
  }
  process.stderr.write(`Fatal error: ${errorMessage(err)}\n`);
  if (verbose && err instanceof Error && err.stack) process.stderr.write(`${err.stack}\n`);
  return 1;
}

async function main(argv: string[]): Promise<number> {
  const warnings: Warning[] = [];
  let verbose = argv.includes("--verbose") || argv.includes("-v");
  let quiet = false;

  try {
    const args = await parseCliArgs(argv);
    verbose = args.verbose;
    quiet = args.quiet;

    if (args.version) {
      process.stdout.write(`insight-kit ${TOOLKIT_VERSION}\n`);
      return 0;
    }
    if (args.help) {
      process.stdout.write(HELP_TEXT + "\n");
      return 0;
    }
    if (!args.tool) {
      process.stderr.write(HELP_TEXT + "\n");
      return 1;
    }
    if (!isToolName(args.tool)) {
      throw new ValidationError(`Unknown tool "${args.tool}". Expected one of: ${TOOL_NAMES.join(", ")}`);
    }

    const config = resolveConfig(args, warnings);
    const run = await loadRunner(args.tool);
    const code = run(args, config, warnings);
    printWarnings(warnings, quiet);
    return code;
  } catch (err: unknown) {
    printWarnings(warnings, quiet);
    return reportError(err, verbose);
  }
}

process.on("SIGINT", () => {
  process.stderr.write("\nOperation cancelled by user\n");
  process.exit(130);
});

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`Fatal error: ${errorMessage(err)}\n`);
    process.exit(1);
  },
);
