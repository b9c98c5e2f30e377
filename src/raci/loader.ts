// src/raci/loader.ts — Process document and template loading
// Processes come as JSON (steps or activities), CSV (one activity per row) or
// Markdown (numbered or bulleted list). Templates come as JSON or CSV.

import { existsSync, readFileSync } from "node:fs";
import { basename, extname, resolve } from "node:path";
import { z } from "zod";
import { parseCsvTable } from "../csv.js";
import { formatZodIssues } from "../data.js";
import {
  InputNotFoundError,
  InputParseError,
  UnsupportedFormatError,
  ValidationError,
  errorMessage,
} from "../errors.js";
import { titleCase } from "../output.js";
import type { Warning } from "../types.js";
import {
  RACI_EXIT,
  isRaciCode,
  type Activity,
  type ProcessDocument,
  type RaciAssignments,
  type RaciTemplate,
} from "./types.js";

export const PROCESS_EXTENSIONS = [".json", ".csv", ".md", ".markdown", ".txt"] as const;
export const TEMPLATE_EXTENSIONS = [".json", ".csv"] as const;

// ─── JSON ───────────────────────────────────────────────────────────────────

const Identifier = z.union([z.string(), z.number()]).transform(String);

const StepSchema = z.object({
  id: Identifier.optional(),
  name: z.string().optional(),
  description: z.string().optional(),
  sequence: z.number().optional(),
  role: z.string().optional(),
  decisions: z.array(z.string()).optional(),
  inputs: z.array(z.string()).optional(),
  outputs: z.array(z.string()).optional(),
});

type Step = z.infer<typeof StepSchema>;

const ProcessFileSchema = z.object({
  process_name: z.string().optional(),
  process_description: z.string().optional(),
  process_id: Identifier.optional(),
  roles: z.array(z.string()).optional(),
  steps: z.array(StepSchema).optional(),
  activities: z.array(StepSchema).optional(),
  raci: z.array(z.object({ roles: z.record(z.string()).optional() })).optional(),
});

function toActivity(step: Step, index: number): Activity {
  const activity: Activity = {
    id: step.id ?? `activity_${index + 1}`,
    name: step.name ?? step.description ?? "Unnamed Activity",
    description: step.description ?? "",
    sequence: step.sequence ?? index + 1,
    decisions: step.decisions ?? [],
  };
  if (step.role !== undefined) activity.role = step.role;
  if (step.inputs !== undefined) activity.inputs = step.inputs;
  if (step.outputs !== undefined) activity.outputs = step.outputs;
  return activity;
}

function sortedUnique(values: Iterable<string>): string[] {
  return [...new Set(values)].filter((v) => v.length > 0).sort();
}

/**
 * Normalize a parsed process JSON document. `steps` wins over `activities`
 * when both are present.
 */
export function parseProcessJson(raw: unknown, source = "input"): ProcessDocument {
  const parsed = ProcessFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid process file ${source}: ${formatZodIssues(parsed.error)}`, RACI_EXIT.validation);
  }
  const data = parsed.data;
  const activities = (data.steps ?? data.activities ?? []).map(toActivity);

  const roles: string[] = [...(data.roles ?? [])];
  for (const activity of activities) {
    if (activity.role !== undefined) roles.push(activity.role);
  }
  for (const entry of data.raci ?? []) {
    roles.push(...Object.keys(entry.roles ?? {}));
  }

  const doc: ProcessDocument = {
    processName: data.process_name ?? "Untitled Process",
    processDescription: data.process_description ?? "",
    roles: sortedUnique(roles),
    activities,
  };
  if (data.process_id !== undefined) doc.processId = data.process_id;
  return doc;
}

// ─── CSV ────────────────────────────────────────────────────────────────────

const RESERVED_COLUMNS = ["activity", "name", "description", "role", "sequence"] as const;

function findColumn(header: readonly string[], name: string): string | undefined {
  return header.find((column) => column.toLowerCase() === name);
}

function readCode(cell: string | undefined): string {
  return (cell ?? "").trim().toUpperCase();
}

/**
 * One activity per row. Columns other than activity/name/description/role/sequence
 * are roles; an R, A, C or I in such a column presets that assignment.
 */
export function parseProcessCsv(
  content: string,
  processName: string,
  warnings: Warning[] = [],
): ProcessDocument {
  const { header, records } = parseCsvTable(content);
  const activityCol = findColumn(header, "activity");
  const nameCol = findColumn(header, "name");
  const descriptionCol = findColumn(header, "description");
  const roleCol = findColumn(header, "role");
  const reserved: readonly string[] = RESERVED_COLUMNS;
  const roleColumns = header.filter((column) => column !== "" && !reserved.includes(column.toLowerCase()));

  const roles: string[] = [...roleColumns];
  const activities = records.map((record, index): Activity => {
    const sequence = index + 1;
    const titleCol = activityCol ?? nameCol;
    const activity: Activity = {
      id: `activity_${sequence}`,
      name: (titleCol !== undefined ? record[titleCol] : "") || `Activity ${sequence}`,
      description: descriptionCol !== undefined ? record[descriptionCol] : "",
      sequence,
    };

    const role = roleCol !== undefined ? record[roleCol] : "";
    if (role) {
      activity.role = role;
      roles.push(role);
    }

    const presets: RaciAssignments = {};
    for (const column of roleColumns) {
      const code = readCode(record[column]);
      if (code === "") continue;
      if (isRaciCode(code)) {
        presets[column] = code;
      } else {
        warnings.push({
          level: "warn",
          module: "raci",
          message: `Row ${sequence}: unknown RACI code "${record[column]}" for ${column} ignored`,
        });
      }
    }
    if (Object.keys(presets).length > 0) activity.presets = presets;
    return activity;
  });

  return { processName, processDescription: "", roles: sortedUnique(roles), activities };
}

// ─── Markdown ───────────────────────────────────────────────────────────────

const HEADING = /^#\s+(.+)$/m;
const NUMBERED_ITEM = /^\s*\d+\.\s+(.+)$/gm;
const BULLET_ITEM = /^\s*[-*]\s+(.+)$/gm;

/**
 * The first `#` heading names the process; numbered items are the activities,
 * or bullet items when there are no numbered ones.
 */
export function parseProcessMarkdown(content: string, fallbackName: string): ProcessDocument {
  const heading = HEADING.exec(content);
  const processName = heading ? heading[1].trim() : fallbackName;

  let items = [...content.matchAll(NUMBERED_ITEM)].map((m) => m[1].trim());
  if (items.length === 0) items = [...content.matchAll(BULLET_ITEM)].map((m) => m[1].trim());

  const activities = items.map((text, index): Activity => ({
    id: `activity_${index + 1}`,
    name: text,
    description: text,
    sequence: index + 1,
  }));
  return { processName, processDescription: "", roles: [], activities };
}

// ─── Files ──────────────────────────────────────────────────────────────────

function readText(filePath: string, what: string): string {
  const absPath = resolve(filePath);
  if (!existsSync(absPath)) throw new InputNotFoundError(filePath, what, RACI_EXIT.parse);
  try {
    return readFileSync(absPath, "utf-8");
  } catch (err: unknown) {
    throw new InputParseError(filePath, errorMessage(err), RACI_EXIT.parse);
  }
}

function parseJsonText(content: string, filePath: string): unknown {
  try {
    return JSON.parse(content);
  } catch (err: unknown) {
    throw new InputParseError(filePath, `Invalid JSON: ${errorMessage(err)}`, RACI_EXIT.parse);
  }
}

/** "hr_onboarding-flow.csv" → "Hr Onboarding Flow" */
function nameFromFile(filePath: string): string {
  const stem = basename(filePath, extname(filePath));
  return titleCase(stem.replace(/[_-]/g, " "));
}

export function loadProcess(filePath: string, warnings: Warning[] = []): ProcessDocument {
  const ext = extname(filePath).toLowerCase();
  if (!PROCESS_EXTENSIONS.some((e) => e === ext)) {
    throw new UnsupportedFormatError(ext || basename(filePath), PROCESS_EXTENSIONS, RACI_EXIT.parse);
  }
  const content = readText(filePath, "Input file");

  switch (ext) {
    case ".json":
      return parseProcessJson(parseJsonText(content, filePath), filePath);
    case ".csv":
      return parseProcessCsv(content, nameFromFile(filePath), warnings);
    default:
      return parseProcessMarkdown(content, basename(filePath, extname(filePath)));
  }
}

// ─── Templates ──────────────────────────────────────────────────────────────

const TemplateFileSchema = z.object({
  roles: z.array(z.string()).optional(),
  assignments: z.record(z.record(z.string())).optional(),
});

function toAssignments(
  raw: Record<string, string>,
  activityId: string,
  warnings: Warning[],
): RaciAssignments {
  const assignments: RaciAssignments = {};
  for (const [role, value] of Object.entries(raw)) {
    const code = readCode(value);
    if (code === "") continue;
    if (isRaciCode(code)) {
      assignments[role] = code;
    } else {
      warnings.push({
        level: "warn",
        module: "raci",
        message: `Template: unknown RACI code "${value}" for ${role} on ${activityId} ignored`,
      });
    }
  }
  return assignments;
}

export function parseTemplateJson(raw: unknown, source = "template", warnings: Warning[] = []): RaciTemplate {
  const parsed = TemplateFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid template ${source}: ${formatZodIssues(parsed.error)}`, RACI_EXIT.validation);
  }
  const assignments: Record<string, RaciAssignments> = {};
  for (const [activityId, roles] of Object.entries(parsed.data.assignments ?? {})) {
    assignments[activityId] = toAssignments(roles, activityId, warnings);
  }
  const template: RaciTemplate = { assignments };
  if (parsed.data.roles !== undefined) template.roles = parsed.data.roles;
  return template;
}

/** The `activity` column holds activity ids; every other column is a role. */
export function parseTemplateCsv(content: string, source = "template", warnings: Warning[] = []): RaciTemplate {
  const { header, records } = parseCsvTable(content);
  const activityCol = findColumn(header, "activity");
  if (activityCol === undefined) {
    throw new InputParseError(source, 'template CSV needs an "activity" column', RACI_EXIT.parse);
  }
  const roles = header.filter((column) => column !== activityCol && column !== "");

  const assignments: Record<string, RaciAssignments> = {};
  for (const record of records) {
    const activityId = record[activityCol];
    if (!activityId) continue;
    const raw: Record<string, string> = {};
    for (const role of roles) raw[role] = record[role];
    assignments[activityId] = toAssignments(raw, activityId, warnings);
  }
  return { roles, assignments };
}

export function loadTemplate(filePath: string, warnings: Warning[] = []): RaciTemplate {
  const ext = extname(filePath).toLowerCase();
  if (!TEMPLATE_EXTENSIONS.some((e) => e === ext)) {
    throw new UnsupportedFormatError(ext || basename(filePath), TEMPLATE_EXTENSIONS, RACI_EXIT.parse);
  }
  const content = readText(filePath, "Template file");
  return ext === ".json"
    ? parseTemplateJson(parseJsonText(content, filePath), filePath, warnings)
    : parseTemplateCsv(content, filePath, warnings);
}
