// src/file-discovery.ts — Source tree discovery for the scanners
// Directory walk with skip-list, symlink boundary and cycle checks, picomatch excludes.

import { readdirSync, statSync, realpathSync, type Dirent, type Stats } from "node:fs";
import { resolve, relative, extname, join } from "node:path";
import picomatch from "picomatch";
import { DEFAULT_SKIP_DIRS, type Warning } from "./types.js";
import { InputNotFoundError, errorMessage } from "./errors.js";

export interface DiscoveryOptions {
  /** Lowercase extensions including the dot, e.g. ".ts". */
  extensions: ReadonlySet<string>;
  /** picomatch globs matched against paths relative to the root. */
  exclude?: string[];
  /** Directory names never descended into. */
  skipDirs?: readonly string[];
  /** Stop after this many files (after sorting). */
  maxFiles?: number;
}

export interface DiscoveredFiles {
  /** Absolute directory the relative paths are computed from. */
  root: string;
  files: string[];
}

interface WalkState {
  root: string;
  extensions: ReadonlySet<string>;
  skipDirs: readonly string[];
  /** Directory inodes already entered; guards against symlink loops. */
  visited: Set<number>;
  found: string[];
  warnings: Warning[];
}

/**
 * Discover files with a matching extension under `target`.
 * A file target is returned as-is when its extension matches.
 */
export function discoverFiles(
  target: string,
  options: DiscoveryOptions,
  warnings: Warning[] = [],
): DiscoveredFiles {
  const absTarget = resolve(target);
  const stat = statOrNull(absTarget);
  if (stat === null) throw new InputNotFoundError(absTarget, "Target path");

  if (stat.isFile()) {
    const root = resolve(absTarget, "..");
    if (hasExtension(absTarget, options.extensions)) return { root, files: [absTarget] };
    warnings.push({
      level: "warn",
      module: "file-discovery",
      message: `File ${absTarget} is not a recognized source file`,
      file: absTarget,
    });
    return { root, files: [] };
  }

  const state: WalkState = {
    root: absTarget,
    extensions: options.extensions,
    skipDirs: options.skipDirs ?? DEFAULT_SKIP_DIRS,
    visited: new Set([stat.ino]),
    found: [],
    warnings,
  };
  walk(state, absTarget);

  const kept = applyExcludes(state.found, absTarget, options.exclude ?? []).sort();
  return {
    root: absTarget,
    files: options.maxFiles !== undefined ? kept.slice(0, options.maxFiles) : kept,
  };
}

function statOrNull(path: string): Stats | null {
  try {
    return statSync(path);
  } catch {
    return null;
  }
}

function hasExtension(path: string, extensions: ReadonlySet<string>): boolean {
  return extensions.has(extname(path).toLowerCase());
}

function warn(state: WalkState, level: Warning["level"], message: string, file: string): void {
  state.warnings.push({ level, module: "file-discovery", message, file });
}

function walk(state: WalkState, dir: string): void {
  let entries: Dirent[];
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (err: unknown) {
    warn(state, "warn", `Cannot read directory: ${errorMessage(err)}`, dir);
    return;
  }

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (!state.skipDirs.includes(entry.name)) walk(state, fullPath);
    } else if (entry.isSymbolicLink()) {
      followSymlink(state, fullPath, entry.name);
    } else if (entry.isFile() && hasExtension(entry.name, state.extensions)) {
      state.found.push(fullPath);
    }
  }
}

/** Links are followed only while they stay inside the root. */
function followSymlink(state: WalkState, linkPath: string, name: string): void {
  let realPath: string;
  let stat: Stats;
  try {
    realPath = realpathSync(linkPath);
    stat = statSync(realPath);
  } catch (err: unknown) {
    warn(state, "warn", `Cannot resolve symlink: ${errorMessage(err)}`, linkPath);
    return;
  }

  const shown = relative(state.root, linkPath);
  if (!realPath.startsWith(state.root)) {
    warn(state, "info", `Symlink ${shown} points outside the scanned directory, skipped`, linkPath);
    return;
  }

  if (stat.isDirectory()) {
    if (state.visited.has(stat.ino)) {
      warn(state, "info", `Symlink cycle detected at ${shown}, skipped`, linkPath);
      return;
    }
    state.visited.add(stat.ino);
    if (!state.skipDirs.includes(name)) walk(state, linkPath);
  } else if (stat.isFile() && hasExtension(name, state.extensions)) {
    state.found.push(linkPath);
  }
}

function applyExcludes(files: string[], root: string, patterns: string[]): string[] {
  if (patterns.length === 0) return files;
  const isExcluded = picomatch(patterns, { dot: true });
  return files.filter((f) => !isExcluded(relative(root, f)));
}

/** Path relative to the discovery root, forward slashes on every platform. */
export function displayPath(root: string, file: string): string {
  const rel = relative(root, file);
  return (rel === "" ? file : rel).split("\\").join("/");
}
