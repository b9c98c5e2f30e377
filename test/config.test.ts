import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DEFAULT_TEAMS, parseCliArgs, resolveConfig } from "../src/config.js";
import { ValidationError } from "../src/errors.js";
import type { Warning } from "../src/types.js";

describe("parseCliArgs", () => {
  it("splits the tool from its positionals and reads flags", async () => {
    const args = await parseCliArgs([
      "keywords",
      "kw.csv",
      "--score",
      "-o",
      "json",
      "--threshold",
      "0.5",
      "--exclude",
      "gen/**",
      "--exclude",
      "tmp/**",
    ]);
    expect(args.tool).toBe("keywords");
    expect(args.positionals).toEqual(["kw.csv"]);
    expect(args.score).toBe(true);
    expect(args.cluster).toBe(true);
    expect(args.output).toBe("json");
    expect(args.threshold).toBe(0.5);
    expect(args.exclude).toEqual(["gen/**", "tmp/**"]);
  });

  it("reads negated and hyphenated flags", async () => {
    const args = await parseCliArgs(["raci", "p.json", "--no-cluster", "--validate-only", "--min-cluster-size", "3"]);
    expect(args.cluster).toBe(false);
    expect(args.validateOnly).toBe(true);
    expect(args.minClusterSize).toBe(3);
  });

  it("rejects --cluster instead of reading the next argument as its value", async () => {
    const message = "Unknown option --cluster: clustering is on by default, use --no-cluster to turn it off";
    await expect(parseCliArgs(["keywords", "--cluster", "kw.csv"])).rejects.toThrow(message);
    await expect(parseCliArgs(["keywords", "kw.csv", "--cluster"])).rejects.toThrow(message);
  });

  it("rejects non-numeric and fractional counts", async () => {
    await expect(parseCliArgs(["keywords", "--threshold", "high"])).rejects.toThrow(ValidationError);
    await expect(parseCliArgs(["seo-audit", "--max-files", "2.5"])).rejects.toThrow(
      '--max-files expects an integer, got "2.5"',
    );
  });
});

describe("resolveConfig", () => {
  let cwd: string;

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), "insight-kit-config-"));
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
  });

  async function resolveFor(argv: string[], warnings: Warning[] = []) {
    return resolveConfig(await parseCliArgs(argv), warnings, cwd);
  }

  it("uses built-in defaults without a config file", async () => {
    const config = await resolveFor(["okr"]);
    expect(config.keywords).toEqual({ similarityThreshold: 0.3, minClusterSize: 2, strategy: "greedy" });
    expect(config.seoAudit).toEqual({ maxFiles: 100, internalHosts: [] });
    expect(config.codeQuality).toEqual({ maxLineLength: 120, maxNestingDepth: 4, minSeverity: "INFO", exclude: [] });
    expect(config.okr.teams).toEqual(DEFAULT_TEAMS);
    expect(config.raci.template).toBeUndefined();
  });

  it("layers insight-kit.config.json under CLI flags", async () => {
    writeFileSync(
      join(cwd, "insight-kit.config.json"),
      JSON.stringify({
        keywords: { similarityThreshold: 0.6, strategy: "components" },
        codeQuality: { exclude: ["gen/**"], maxLineLength: 100 },
        okr: { teams: ["Core", "Web"] },
      }),
    );

    const fromFile = await resolveFor(["keywords", "--exclude", "tmp/**"]);
    expect(fromFile.keywords).toEqual({ similarityThreshold: 0.6, minClusterSize: 2, strategy: "components" });
    expect(fromFile.codeQuality.exclude).toEqual(["gen/**", "tmp/**"]);
    expect(fromFile.codeQuality.maxLineLength).toBe(100);
    expect(fromFile.okr.teams).toEqual(["Core", "Web"]);

    const overridden = await resolveFor(["keywords", "--threshold", "0.2", "--teams", " A, ,B"]);
    expect(overridden.keywords.similarityThreshold).toBe(0.2);
    expect(overridden.okr.teams).toEqual(["A", "B"]);
  });

  it("reads the insightKit key of package.json", async () => {
    writeFileSync(join(cwd, "package.json"), JSON.stringify({ name: "site", insightKit: { seoAudit: { maxFiles: 5 } } }));
    const config = await resolveFor(["seo-audit"]);
    expect(config.seoAudit.maxFiles).toBe(5);
  });

  it("warns and falls back to defaults for an invalid config file", async () => {
    writeFileSync(join(cwd, "insight-kit.config.json"), JSON.stringify({ keywords: { strategy: "random" } }));
    const warnings: Warning[] = [];
    const config = await resolveFor(["keywords"], warnings);
    expect(config.keywords.strategy).toBe("greedy");
    expect(warnings).toHaveLength(1);
    expect(warnings[0].message).toContain("keywords.strategy");
  });

  it("warns when an explicit config file is missing", async () => {
    const warnings: Warning[] = [];
    await resolveFor(["okr", "--config", "nope.json"], warnings);
    expect(warnings).toEqual([{ level: "warn", module: "config", message: "Config file not found: nope.json" }]);
  });

  it("normalises and validates severities, strategies and teams", async () => {
    expect((await resolveFor(["code-quality", "--min-severity", "high"])).codeQuality.minSeverity).toBe("HIGH");
    await expect(resolveFor(["code-quality", "--min-severity", "loud"])).rejects.toThrow(ValidationError);
    await expect(resolveFor(["keywords", "--strategy", "kmeans"])).rejects.toThrow(
      'Unknown clustering strategy "kmeans". Expected one of: greedy, components',
    );
    await expect(resolveFor(["keywords", "--threshold", "1.5"])).rejects.toThrow(
      "Similarity threshold must be between 0 and 1, got 1.5",
    );
    await expect(resolveFor(["okr", "--teams", ","])).rejects.toThrow("At least one team name is required");
  });
});
