// src/output.ts — Report emission and stderr diagnostics

import { writeFileSync, mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { OutputWriteError, UnsupportedFormatError, errorMessage } from "./errors.js";
import type { Warning } from "./types.js";

export function vlog(verbose: boolean, msg: string): void {
  if (verbose) process.stderr.write(`[INFO] ${msg}\n`);
}

export function printWarnings(warnings: readonly Warning[], quiet: boolean): void {
  if (quiet) return;
  for (const w of warnings) {
    process.stderr.write(`[${w.level}] ${w.module}: ${w.message}\n`);
  }
}

/** Auto-create the output directory before writing. */
export function writeFileSafe(filePath: string, content: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
}

/**
 * Send a rendered report to `file` when given, else to stdout.
 * A failed write surfaces as OutputWriteError carrying `writeExitCode`.
 */
export function emitReport(report: string, file: string | undefined, writeExitCode = 1): void {
  const text = report.endsWith("\n") ? report : report + "\n";
  if (!file) {
    process.stdout.write(text);
    return;
  }
  const outputPath = resolve(file);
  try {
    writeFileSafe(outputPath, text);
  } catch (err: unknown) {
    throw new OutputWriteError(outputPath, errorMessage(err), writeExitCode);
  }
  process.stderr.write(`Output saved to: ${file}\n`);
}

/** Narrow a `--output` value to one of a tool's formats. */
export function pickFormat<F extends string>(
  requested: string | undefined,
  supported: readonly F[],
  fallback: F,
): F {
  if (requested === undefined) return fallback;
  const match = supported.find((f) => f === requested.toLowerCase());
  if (match === undefined) throw new UnsupportedFormatError(requested, supported);
  return match;
}

export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/** Integer with comma thousands separators: 12345 → "12,345". */
export function thousands(n: number): string {
  const sign = n < 0 ? "-" : "";
  return sign + String(Math.abs(Math.round(n))).replace(/\B(?=(\d{3})+(?!\d))/g, ",");
}

/** "informational" → "Informational", "security-audit" → "Security-Audit". */
export function titleCase(text: string): string {
  return text.replace(/[A-Za-z]+/g, (w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase());
}
