import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { OutputWriteError, UnsupportedFormatError } from "../src/errors.js";
import { emitReport, pickFormat, printWarnings, thousands, titleCase, toJson, vlog } from "../src/output.js";

describe("formatting helpers", () => {
  it("picks a supported format case-insensitively", () => {
    const formats = ["text", "json"] as const;
    expect(pickFormat(undefined, formats, "text")).toBe("text");
    expect(pickFormat("JSON", formats, "text")).toBe("json");
    expect(() => pickFormat("xml", formats, "text")).toThrow(UnsupportedFormatError);
  });

  it("adds thousands separators", () => {
    expect(thousands(999)).toBe("999");
    expect(thousands(1234567)).toBe("1,234,567");
    expect(thousands(-9876.4)).toBe("-9,876");
  });

  it("title-cases words", () => {
    expect(titleCase("informational")).toBe("Informational");
    expect(titleCase("security-audit")).toBe("Security-Audit");
    expect(titleCase("HIGH risk")).toBe("High Risk");
  });

  it("pretty-prints JSON with two spaces", () => {
    expect(toJson({ a: 1 })).toBe('{\n  "a": 1\n}');
  });
});

describe("stderr diagnostics", () => {
  let stderr: MockInstance<typeof process.stderr.write>;

  beforeEach(() => {
    stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    stderr.mockRestore();
  });

  it("logs only when verbose", () => {
    vlog(false, "hidden");
    vlog(true, "Loaded 3 keywords");
    expect(stderr.mock.calls).toEqual([["[INFO] Loaded 3 keywords\n"]]);
  });

  it("prints warnings unless quiet", () => {
    const warnings = [{ level: "warn" as const, module: "config", message: "Config file not found: x.json" }];
    printWarnings(warnings, true);
    expect(stderr).not.toHaveBeenCalled();
    printWarnings(warnings, false);
    expect(stderr.mock.calls).toEqual([["[warn] config: Config file not found: x.json\n"]]);
  });
});

describe("emitReport", () => {
  let dir: string;
  let stdout: MockInstance<typeof process.stdout.write>;
  let stderr: MockInstance<typeof process.stderr.write>;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "insight-kit-output-"));
    stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    stdout.mockRestore();
    stderr.mockRestore();
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes to stdout with one trailing newline", () => {
    emitReport("report", undefined);
    emitReport("done\n", undefined);
    expect(stdout.mock.calls).toEqual([["report\n"], ["done\n"]]);
  });

  it("creates parent directories for --file", () => {
    const file = join(dir, "nested", "out.txt");
    emitReport("hello", file);
    expect(readFileSync(file, "utf-8")).toBe("hello\n");
    expect(stdout).not.toHaveBeenCalled();
    expect(stderr.mock.calls).toEqual([[`Output saved to: ${file}\n`]]);
  });

  it("wraps write failures with the caller's exit code", () => {
    const blocker = join(dir, "blocker");
    writeFileSync(blocker, "");
    let caught: unknown;
    try {
      emitReport("hello", join(blocker, "out.txt"), 4);
    } catch (err: unknown) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(OutputWriteError);
    expect(caught).toMatchObject({ exitCode: 4 });
  });
});
