// src/index.ts — Library API
// Every tool is usable without the CLI: analysis functions return plain data,
// formatters turn that data into text, JSON or CSV.

export type {
  Warning,
  IssueSeverity,
  SeverityName,
  ToolName,
} from "./types.js";
export { TOOLKIT_VERSION, TOOL_NAMES, SEVERITY_RANK } from "./types.js";

export {
  ToolkitError,
  InputNotFoundError,
  InputParseError,
  ValidationError,
  OutputWriteError,
  UnsupportedFormatError,
} from "./errors.js";

export type { ParsedArgs, ResolvedConfig, ConfigFile } from "./config.js";
export { resolveConfig, parseCliArgs, DEFAULT_TEAMS } from "./config.js";
export { parseCsv, parseCsvTable, toCsv } from "./csv.js";
export type { CsvCell, CsvTable } from "./csv.js";

// ─── keywords ───────────────────────────────────────────────────────────────

export type {
  KeywordRecord,
  KeywordCluster,
  KeywordAnalysis,
  ContentGap,
  SearchIntent,
  ClusterStrategy,
} from "./keywords/types.js";
export { analyzeKeywords, portfolioRecommendations, type AnalyzeOptions } from "./keywords/researcher.js";
export { clusterKeywords, type ClusterOptions } from "./keywords/clustering.js";
export { classifyIntent } from "./keywords/intent.js";
export { extractCoreTerms, jaccardSimilarity } from "./keywords/terms.js";
export { calculatePriorityScore, scoreClusters } from "./keywords/scoring.js";
export { identifyContentGaps } from "./keywords/content-gaps.js";
export { loadKeywords, parseKeywordList } from "./keywords/loader.js";
export { KEYWORD_FORMATS, formatKeywordReport, type KeywordFormat } from "./keywords/format.js";

// ─── seo-audit ──────────────────────────────────────────────────────────────

export type { PageData, SeoIssue, SeoAuditResult, SeoCategory } from "./seo/types.js";
export { auditSite, calculateSeoScore, seoExitCode, type SeoAuditOptions } from "./seo/auditor.js";
export { parsePage } from "./seo/html-parser.js";
export { analyzePageIssues } from "./seo/page-issues.js";
export { parseRobotsTxt, parseSitemap } from "./seo/crawl-files.js";
export { SEO_FORMATS, formatSeoReport, type SeoFormat } from "./seo/format.js";

// ─── code-quality ───────────────────────────────────────────────────────────

export type { QualityFinding, QualityScore, CodeQualityReport, SourceLanguage } from "./code-quality/types.js";
export {
  checkCodeQuality,
  checkSource,
  calculateQualityScore,
  qualityExitCode,
  type CodeQualityOptions,
} from "./code-quality/checker.js";
export { QUALITY_FORMATS, formatQualityReport, type QualityFormat } from "./code-quality/format.js";

// ─── security-audit ─────────────────────────────────────────────────────────

export type { SecurityCheck, SecurityFinding, SecurityAuditResult } from "./security/types.js";
export {
  auditSecurity,
  calculateSecurityScore,
  securityExitCode,
  type SecurityAuditOptions,
} from "./security/auditor.js";
export { loadSecurityChecks, checkLine } from "./security/checks.js";
export { SECURITY_FORMATS, formatSecurityReport, type SecurityFormat } from "./security/format.js";

// ─── raci ───────────────────────────────────────────────────────────────────

export type { ProcessDocument, RaciTemplate, RaciMatrix, RaciIssue, RaciCode } from "./raci/types.js";
export {
  generateRaci,
  validateRaci,
  inferRaciCode,
  enforceRaciRules,
  raciExitCode,
  type GenerateRaciOptions,
} from "./raci/generator.js";
export { loadProcess, loadTemplate, parseProcessJson, parseProcessCsv, parseProcessMarkdown } from "./raci/loader.js";
export { RACI_FORMATS, formatRaciReport, formatRaciValidation, type RaciFormat } from "./raci/format.js";

// ─── okr ────────────────────────────────────────────────────────────────────

export type { OkrStrategy, OkrMetrics, OkrCascade, OkrReport, AlignmentScores } from "./okr/types.js";
export { cascadeOkrs, resolveStrategy, type CascadeOptions } from "./okr/cascade.js";
export { calculateAlignment } from "./okr/alignment.js";
export { loadMetrics, parseMetrics, defaultMetrics } from "./okr/templates.js";
export { OKR_FORMATS, buildOkrReport, formatOkrReport, type OkrFormat } from "./okr/format.js";
