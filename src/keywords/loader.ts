// src/keywords/loader.ts — Keyword list loading (CSV with header, or one keyword per line)

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parseCsv } from "../csv.js";
import { InputNotFoundError, InputParseError, ValidationError, errorMessage } from "../errors.js";
import type { Warning } from "../types.js";
import type { KeywordRecord } from "./types.js";

const COLUMN_ALIASES = {
  keyword: ["keyword"],
  volume: ["volume", "search_volume"],
  competition: ["competition"],
  cpc: ["cpc"],
} as const;

type Column = keyof typeof COLUMN_ALIASES;

const DEFAULT_COMPETITION = 0.5;

function columnIndex(header: readonly string[], column: Column): number {
  const lower = header.map((h) => h.toLowerCase());
  const aliases: readonly string[] = COLUMN_ALIASES[column];
  return lower.findIndex((h) => aliases.includes(h));
}

function parseNumber(text: string | undefined): number | undefined {
  if (text === undefined || text.trim() === "") return undefined;
  const n = Number(text);
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Parse keyword file content. The first row is a header when one of its cells
 * is "keyword" (any case); otherwise every non-blank line is a keyword.
 */
export function parseKeywordList(content: string, warnings: Warning[] = [], source = "input"): KeywordRecord[] {
  const rows = parseCsv(content);
  if (rows.length === 0) return [];

  const header = rows[0];
  const keywordCol = columnIndex(header, "keyword");

  if (keywordCol === -1) {
    const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
    return text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .map((keyword) => ({ keyword, volume: 0, competition: DEFAULT_COMPETITION, cpc: 0 }));
  }

  const volumeCol = columnIndex(header, "volume");
  const competitionCol = columnIndex(header, "competition");
  const cpcCol = columnIndex(header, "cpc");

  const records: KeywordRecord[] = [];
  rows.slice(1).forEach((cells, i) => {
    const keyword = (cells[keywordCol] ?? "").trim();
    if (!keyword) return;
    const row = i + 1;

    const rawVolume = volumeCol === -1 ? undefined : parseNumber(cells[volumeCol]);
    let volume = rawVolume === undefined ? 0 : Math.round(rawVolume);
    if (volume < 0) {
      warnings.push({ level: "warn", module: "keywords", message: `${source} row ${row}: negative volume for "${keyword}" treated as 0` });
      volume = 0;
    }

    const rawCompetition = competitionCol === -1 ? undefined : parseNumber(cells[competitionCol]);
    let competition = rawCompetition ?? DEFAULT_COMPETITION;
    if (competition < 0 || competition > 1) {
      warnings.push({ level: "warn", module: "keywords", message: `${source} row ${row}: competition ${competition} for "${keyword}" clamped to [0, 1]` });
      competition = Math.min(1, Math.max(0, competition));
    }

    const cpc = (cpcCol === -1 ? undefined : parseNumber(cells[cpcCol])) ?? 0;
    records.push({ keyword, volume, competition, cpc });
  });

  return records;
}

/**
 * Read and parse a keyword file. An empty result is an error.
 */
export function loadKeywords(filePath: string, warnings: Warning[] = []): KeywordRecord[] {
  const absPath = resolve(filePath);
  if (!existsSync(absPath)) throw new InputNotFoundError(filePath);

  let content: string;
  try {
    content = readFileSync(absPath, "utf-8");
  } catch (err: unknown) {
    throw new InputParseError(filePath, errorMessage(err));
  }

  const keywords = parseKeywordList(content, warnings, filePath);
  if (keywords.length === 0) {
    throw new ValidationError("No keywords found in input file");
  }
  return keywords;
}

/** Existing content titles, one per non-blank line. */
export function loadContentTitles(filePath: string, warnings: Warning[] = []): string[] | undefined {
  const absPath = resolve(filePath);
  if (!existsSync(absPath)) {
    warnings.push({ level: "warn", module: "keywords", message: `Content file not found: ${filePath}`, file: filePath });
    return undefined;
  }
  return readFileSync(absPath, "utf-8")
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
