import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { discoverFiles, displayPath } from "../src/file-discovery.js";
import { InputNotFoundError } from "../src/errors.js";
import type { Warning } from "../src/types.js";

const EXTENSIONS: ReadonlySet<string> = new Set([".ts", ".py"]);

describe("discoverFiles", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "insight-kit-discovery-"));
    mkdirSync(join(dir, "src"));
    mkdirSync(join(dir, "node_modules"));
    writeFileSync(join(dir, "a.ts"), "export const a = 1;\n");
    writeFileSync(join(dir, "b.py"), "b = 2\n");
    writeFileSync(join(dir, "notes.md"), "# notes\n");
    writeFileSync(join(dir, "src", "c.ts"), "export const c = 3;\n");
    writeFileSync(join(dir, "src", "c.test.ts"), "// test\n");
    writeFileSync(join(dir, "node_modules", "x.ts"), "// vendored\n");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function relative(files: string[]): string[] {
    return files.map((f) => displayPath(dir, f));
  }

  it("walks the tree, skipping vendored directories and other extensions", () => {
    const { root, files } = discoverFiles(dir, { extensions: EXTENSIONS });
    expect(root).toBe(dir);
    expect(relative(files)).toEqual(["a.ts", "b.py", "src/c.test.ts", "src/c.ts"]);
  });

  it("applies exclude globs relative to the root", () => {
    const { files } = discoverFiles(dir, { extensions: EXTENSIONS, exclude: ["**/*.test.ts"] });
    expect(relative(files)).toEqual(["a.ts", "b.py", "src/c.ts"]);
  });

  it("caps the file count after sorting", () => {
    const { files } = discoverFiles(dir, { extensions: EXTENSIONS, maxFiles: 2 });
    expect(relative(files)).toEqual(["a.ts", "b.py"]);
  });

  it("honours a custom skip list", () => {
    const { files } = discoverFiles(dir, { extensions: EXTENSIONS, skipDirs: ["src"] });
    expect(relative(files)).toEqual(["a.ts", "b.py", "node_modules/x.ts"]);
  });

  it("accepts a single matching file", () => {
    const { root, files } = discoverFiles(join(dir, "a.ts"), { extensions: EXTENSIONS });
    expect(root).toBe(dir);
    expect(files).toEqual([join(dir, "a.ts")]);
  });

  it("warns about a single file with another extension", () => {
    const warnings: Warning[] = [];
    const target = join(dir, "notes.md");
    const { files } = discoverFiles(target, { extensions: EXTENSIONS }, warnings);
    expect(files).toEqual([]);
    expect(warnings).toEqual([
      {
        level: "warn",
        module: "file-discovery",
        message: `File ${target} is not a recognized source file`,
        file: target,
      },
    ]);
  });

  it("throws for a missing target", () => {
    expect(() => discoverFiles(join(dir, "missing"), { extensions: EXTENSIONS })).toThrow(InputNotFoundError);
  });
});

describe("displayPath", () => {
  it("uses forward slashes relative to the root", () => {
    expect(displayPath("/repo", "/repo/src/app.ts")).toBe("src/app.ts");
  });

  it("keeps the file itself when it is the root", () => {
    expect(displayPath("/repo/app.ts", "/repo/app.ts")).toBe("/repo/app.ts");
  });
});
