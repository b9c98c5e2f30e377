// src/config.ts — Config Resolver
// Layering: built-in defaults ← insight-kit.config.json (or package.json "insightKit") ← CLI flags.

import { existsSync, readFileSync } from "node:fs";
import { resolve, join } from "node:path";
import { z } from "zod";
import { formatZodIssues } from "./data.js";
import { ValidationError, errorMessage } from "./errors.js";
import { isSeverityName, type SeverityName, type Warning } from "./types.js";
import { CLUSTER_STRATEGIES, type ClusterStrategy } from "./keywords/types.js";

export interface ParsedArgs {
  /** First positional: the tool to run. */
  tool?: string;
  /** Remaining positionals. */
  positionals: string[];
  input?: string;
  /** Output format (text, json, csv, markdown, html). */
  output?: string;
  /** Write the report to this path instead of stdout. */
  file?: string;
  config?: string;
  quiet: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
  exclude: string[];
  // keywords
  cluster: boolean;
  score: boolean;
  threshold?: number;
  minClusterSize?: number;
  strategy?: string;
  contentFile?: string;
  // seo-audit
  maxFiles?: number;
  checks?: string;
  // code-quality
  language?: string;
  minSeverity?: string;
  // raci
  template?: string;
  validateOnly: boolean;
  // okr
  metrics?: string;
  teams?: string;
}

export interface ResolvedConfig {
  verbose: boolean;
  quiet: boolean;
  keywords: {
    similarityThreshold: number;
    minClusterSize: number;
    strategy: ClusterStrategy;
  };
  seoAudit: {
    maxFiles: number;
    internalHosts: string[];
  };
  codeQuality: {
    maxLineLength: number;
    maxNestingDepth: number;
    minSeverity: SeverityName;
    exclude: string[];
  };
  securityAudit: {
    exclude: string[];
  };
  raci: {
    template?: string;
  };
  okr: {
    teams: string[];
  };
}

export const DEFAULT_TEAMS = ["Growth", "Platform", "Mobile", "Data"];

const DEFAULTS: ResolvedConfig = {
  verbose: false,
  quiet: false,
  keywords: {
    similarityThreshold: 0.3,
    minClusterSize: 2,
    strategy: "greedy",
  },
  seoAudit: {
    maxFiles: 100,
    internalHosts: [],
  },
  codeQuality: {
    maxLineLength: 120,
    maxNestingDepth: 4,
    minSeverity: "INFO",
    exclude: [],
  },
  securityAudit: {
    exclude: [],
  },
  raci: {},
  okr: {
    teams: DEFAULT_TEAMS,
  },
};

const SeveritySchema = z.enum(["CRITICAL", "HIGH", "MEDIUM", "LOW", "INFO"]);

export const ConfigFileSchema = z
  .object({
    keywords: z
      .object({
        similarityThreshold: z.number().min(0).max(1),
        minClusterSize: z.number().int().min(1),
        strategy: z.enum(CLUSTER_STRATEGIES),
      })
      .partial(),
    seoAudit: z
      .object({
        maxFiles: z.number().int().positive(),
        internalHosts: z.array(z.string()),
      })
      .partial(),
    codeQuality: z
      .object({
        maxLineLength: z.number().int().positive(),
        maxNestingDepth: z.number().int().positive(),
        minSeverity: SeveritySchema,
        exclude: z.array(z.string()),
      })
      .partial(),
    securityAudit: z.object({ exclude: z.array(z.string()) }).partial(),
    raci: z.object({ template: z.string() }).partial(),
    okr: z.object({ teams: z.array(z.string().min(1)).min(1) }).partial(),
  })
  .partial();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Resolve config from CLI args, config file, and defaults.
 */
export function resolveConfig(
  args: ParsedArgs,
  warnings: Warning[] = [],
  cwd: string = process.cwd(),
): ResolvedConfig {
  const file = loadConfigFile(args.config, warnings, cwd) ?? {};

  const strategy = args.strategy ?? file.keywords?.strategy ?? DEFAULTS.keywords.strategy;
  if (!isClusterStrategy(strategy)) {
    throw new ValidationError(
      `Unknown clustering strategy "${strategy}". Expected one of: ${CLUSTER_STRATEGIES.join(", ")}`,
    );
  }

  const minSeverity = args.minSeverity?.toUpperCase() ?? file.codeQuality?.minSeverity ?? DEFAULTS.codeQuality.minSeverity;
  if (!isSeverityName(minSeverity)) {
    throw new ValidationError(
      `Unknown severity "${args.minSeverity}". Expected one of: CRITICAL, HIGH, MEDIUM, LOW, INFO`,
    );
  }

  const threshold = args.threshold ?? file.keywords?.similarityThreshold ?? DEFAULTS.keywords.similarityThreshold;
  if (threshold < 0 || threshold > 1) {
    throw new ValidationError(`Similarity threshold must be between 0 and 1, got ${threshold}`);
  }

  const minClusterSize = args.minClusterSize ?? file.keywords?.minClusterSize ?? DEFAULTS.keywords.minClusterSize;
  if (minClusterSize < 1) {
    throw new ValidationError(`Minimum cluster size must be at least 1, got ${minClusterSize}`);
  }

  const teams = args.teams !== undefined ? splitList(args.teams) : file.okr?.teams ?? DEFAULTS.okr.teams;
  if (teams.length === 0) {
    throw new ValidationError("At least one team name is required");
  }

  return {
    verbose: args.verbose,
    quiet: args.quiet,
    keywords: {
      similarityThreshold: threshold,
      minClusterSize,
      strategy,
    },
    seoAudit: {
      maxFiles: args.maxFiles ?? file.seoAudit?.maxFiles ?? DEFAULTS.seoAudit.maxFiles,
      internalHosts: file.seoAudit?.internalHosts ?? DEFAULTS.seoAudit.internalHosts,
    },
    codeQuality: {
      maxLineLength: file.codeQuality?.maxLineLength ?? DEFAULTS.codeQuality.maxLineLength,
      maxNestingDepth: file.codeQuality?.maxNestingDepth ?? DEFAULTS.codeQuality.maxNestingDepth,
      minSeverity,
      exclude: [...(file.codeQuality?.exclude ?? DEFAULTS.codeQuality.exclude), ...args.exclude],
    },
    securityAudit: {
      exclude: [...(file.securityAudit?.exclude ?? DEFAULTS.securityAudit.exclude), ...args.exclude],
    },
    raci: {
      template: args.template ?? file.raci?.template,
    },
    okr: { teams },
  };
}

function isClusterStrategy(value: string): value is ClusterStrategy {
  return CLUSTER_STRATEGIES.some((s) => s === value);
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function loadConfigFile(
  configPath: string | undefined,
  warnings: Warning[],
  cwd: string,
): ConfigFile | null {
  // Explicit config path
  if (configPath) {
    const absPath = resolve(cwd, configPath);
    if (!existsSync(absPath)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file not found: ${configPath}`,
      });
      return null;
    }
    return parseConfigFile(absPath, readJson(absPath, warnings), warnings);
  }

  // insight-kit.config.json
  const jsonConfig = join(cwd, "insight-kit.config.json");
  if (existsSync(jsonConfig)) {
    return parseConfigFile(jsonConfig, readJson(jsonConfig, warnings), warnings);
  }

  // insightKit key in package.json
  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    const pkg = PackageJsonSchema.safeParse(readJson(pkgJson, warnings));
    if (pkg.success && pkg.data.insightKit !== undefined) {
      return parseConfigFile(pkgJson, pkg.data.insightKit, warnings);
    }
  }

  return null;
}

const PackageJsonSchema = z.object({ insightKit: z.unknown() }).passthrough();

function readJson(filePath: string, warnings: Warning[]): unknown {
  try {
    return JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err: unknown) {
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${errorMessage(err)}`,
    });
    return undefined;
  }
}

function parseConfigFile(
  filePath: string,
  raw: unknown,
  warnings: Warning[],
): ConfigFile | null {
  if (raw === undefined) return null;
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    warnings.push({
      level: "warn",
      module: "config",
      message: `Invalid config file ${filePath}: ${formatZodIssues(parsed.error)}`,
    });
    return null;
  }
  return parsed.data;
}

/**
 * Parse CLI args using mri.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri(argv, {
    alias: {
      i: "input",
      o: "output",
      f: "file",
      c: "config",
      q: "quiet",
      v: "verbose",
      h: "help",
      s: "score",
      t: "template",
    },
    boolean: ["quiet", "verbose", "help", "version", "score", "validate-only"],
    string: [
      "input",
      "output",
      "file",
      "config",
      "exclude",
      "threshold",
      "min-cluster-size",
      "strategy",
      "content-file",
      "max-files",
      "checks",
      "language",
      "min-severity",
      "template",
      "metrics",
      "teams",
    ],
  });

  // Clustering is on unless --no-cluster is given.
  if (args.cluster !== undefined && args.cluster !== false) {
    throw new ValidationError("Unknown option --cluster: clustering is on by default, use --no-cluster to turn it off");
  }

  const positionals = args._.map(String);
  const [tool, ...rest] = positionals;

  return {
    tool,
    positionals: rest,
    input: optionalString(args.input),
    output: optionalString(args.output),
    file: optionalString(args.file),
    config: optionalString(args.config),
    quiet: args.quiet === true,
    verbose: args.verbose === true,
    help: args.help === true,
    version: args.version === true,
    exclude: stringList(args.exclude),
    cluster: args.cluster !== false,
    score: args.score === true,
    threshold: optionalNumber(args.threshold, "--threshold"),
    minClusterSize: optionalInteger(args["min-cluster-size"], "--min-cluster-size"),
    strategy: optionalString(args.strategy),
    contentFile: optionalString(args["content-file"]),
    maxFiles: optionalInteger(args["max-files"], "--max-files"),
    checks: optionalString(args.checks),
    language: optionalString(args.language),
    minSeverity: optionalString(args["min-severity"]),
    template: optionalString(args.template),
    validateOnly: args["validate-only"] === true,
    metrics: optionalString(args.metrics),
    teams: optionalString(args.teams),
  };
}

// ─── mri value narrowing ────────────────────────────────────────────────────

function optionalString(value: unknown): string | undefined {
  if (Array.isArray(value)) return optionalString(value[value.length - 1]);
  if (typeof value === "string" && value !== "") return value;
  return undefined;
}

function stringList(value: unknown): string[] {
  if (Array.isArray(value)) return value.flatMap(stringList);
  const single = optionalString(value);
  return single === undefined ? [] : [single];
}

function optionalNumber(value: unknown, flag: string): number | undefined {
  const text = optionalString(value);
  if (text === undefined) return undefined;
  const n = Number(text);
  if (!Number.isFinite(n)) {
    throw new ValidationError(`${flag} expects a number, got "${text}"`);
  }
  return n;
}

function optionalInteger(value: unknown, flag: string): number | undefined {
  const n = optionalNumber(value, flag);
  if (n !== undefined && !Number.isInteger(n)) {
    throw new ValidationError(`${flag} expects an integer, got "${n}"`);
  }
  return n;
}
