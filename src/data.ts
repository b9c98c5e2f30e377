// src/data.ts — Rule-table loader
// Rule tables (stop words, pattern catalogs, templates) ship as JSON under data/
// and are validated against a zod schema the first time a tool asks for them.

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { z } from "zod";
import { InputParseError, errorMessage } from "./errors.js";

// src/data.ts and dist/data.js both sit one level below the package root.
const DATA_DIR = new URL("../data/", import.meta.url);

const cache = new Map<string, unknown>();

/** Absolute path of a bundled data file. */
export function dataFilePath(name: string): string {
  return fileURLToPath(new URL(name, DATA_DIR));
}

/**
 * Read and validate a bundled JSON data file. Results are cached per file name,
 * so every schema must be used with exactly one file.
 */
export function loadDataFile<S extends z.ZodTypeAny>(name: string, schema: S): z.output<S> {
  const path = dataFilePath(name);
  let raw: unknown = cache.get(path);
  if (raw === undefined) {
    try {
      raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (err: unknown) {
      throw new InputParseError(path, errorMessage(err));
    }
    cache.set(path, raw);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new InputParseError(path, formatZodIssues(parsed.error));
  }
  return parsed.data;
}

/** One line per issue: `path.to.field: message`. */
export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}
