import { describe, it, expect } from "vitest";
import { resolve, dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { InputNotFoundError, UnsupportedFormatError, ValidationError } from "../src/errors.js";
import {
  loadProcess,
  loadTemplate,
  parseProcessJson,
  parseProcessMarkdown,
  parseTemplateJson,
} from "../src/raci/loader.js";
import {
  describeIssues,
  enforceRaciRules,
  generateRaci,
  inferRaciCode,
  raciExitCode,
  summarizeRoles,
  validateRaci,
} from "../src/raci/generator.js";
import {
  escapeHtml,
  formatRaciCsv,
  formatRaciHtml,
  formatRaciMarkdown,
  formatRaciValidation,
} from "../src/raci/format.js";
import type { RaciEntry } from "../src/raci/types.js";
import type { Warning } from "../src/types.js";

const FIXTURES = resolve(dirname(fileURLToPath(import.meta.url)), "fixtures", "raci");
const NOW = new Date("2025-06-01T09:30:00Z");

describe("inferRaciCode", () => {
  it("makes managerial roles accountable for approvals, consulted otherwise", () => {
    expect(inferRaciCode("Project Director", "Approve budget")).toBe("A");
    expect(inferRaciCode("Project Director", "Write docs")).toBe("C");
  });

  it("uses the advisory verbs for advisory roles", () => {
    expect(inferRaciCode("QA Reviewer", "review release")).toBe("C");
    expect(inferRaciCode("QA Reviewer", "ship release")).toBe("I");
  });

  it("falls back to activity verbs for unrecognised roles", () => {
    expect(inferRaciCode("Legal", "draft terms")).toBe("R");
    expect(inferRaciCode("Legal", "evaluate vendor")).toBe("C");
    expect(inferRaciCode("Legal", "approve terms")).toBe("I");
  });
});

describe("enforceRaciRules", () => {
  it("keeps the first accountable role and demotes the rest", () => {
    expect(enforceRaciRules({ Dev: "A", Lead: "A", QA: "R" })).toEqual({ Dev: "A", Lead: "C", QA: "R" });
  });

  it("promotes the first responsible role when no role is managerial", () => {
    expect(enforceRaciRules({ Analyst: "R", Dev: "I" })).toEqual({ Analyst: "A", Dev: "I" });
  });

  it("promotes a managerial role in name order", () => {
    expect(enforceRaciRules({ "Team Lead": "C", Director: "I", Dev: "R" })).toEqual({
      "Team Lead": "C",
      Director: "A",
      Dev: "R",
    });
  });

  it("makes the first role responsible when nobody works or answers", () => {
    expect(enforceRaciRules({ Writer: "C", Editor: "I" })).toEqual({ Writer: "R", Editor: "I" });
  });
});

describe("validateRaci", () => {
  it("flags an activity with only informed roles", () => {
    const raciMatrix: RaciEntry[] = [
      { activityId: "a1", activity: "Kickoff", description: "", roles: { X: "I", Y: "I" } },
    ];
    const issues = validateRaci({ raciMatrix, roleSummary: summarizeRoles(raciMatrix, ["X", "Y", "Z"]) });
    expect(issues.map((i) => [i.severity, i.activity ?? i.role, i.issue])).toEqual([
      ["critical", "Kickoff", "No Accountable role assigned"],
      ["high", "Kickoff", "No Responsible role assigned"],
      ["low", "Z", "Role has no RACI assignments"],
      ["high", "Kickoff", "Activity has only Informed roles"],
    ]);
  });

  it("summarises issue counts", () => {
    expect(describeIssues([])).toBe("No validation issues found");
  });
});

describe("loadProcess", () => {
  it("reads a JSON process with steps and RACI entries", () => {
    const doc = loadProcess(join(FIXTURES, "onboarding.json"));
    expect(doc.processName).toBe("Customer Onboarding");
    expect(doc.processId).toBe("42");
    expect(doc.roles).toEqual(["Account Manager", "Finance Team", "Support Engineer"]);
    expect(doc.activities.map((a) => a.id)).toEqual(["s1", "activity_2", "s3"]);
    expect(doc.activities[0]).toEqual({
      id: "s1",
      name: "Draft welcome plan",
      description: "",
      sequence: 1,
      decisions: [],
      role: "Support Engineer",
      outputs: ["plan"],
    });
  });

  it("reads a CSV process, turning extra columns into roles", () => {
    const doc = loadProcess(join(FIXTURES, "vendor_review-flow.csv"));
    expect(doc.processName).toBe("Vendor Review Flow");
    expect(doc.roles).toEqual(["Buyer", "Legal", "Procurement Lead"]);
    expect(doc.activities[0].role).toBe("Buyer");
    expect(doc.activities[1].presets).toEqual({ "Procurement Lead": "A", Legal: "R" });
  });

  it("reads numbered Markdown items before bullets", () => {
    const doc = loadProcess(join(FIXTURES, "release.md"));
    expect(doc.processName).toBe("Release Process");
    expect(doc.activities.map((a) => a.name)).toEqual(["Build release candidate", "Review changelog"]);
  });

  it("falls back to bullets and the file name", () => {
    const doc = parseProcessMarkdown("Intro\n\n* Plan sprint\n- Run demo\n", "sprint");
    expect(doc.processName).toBe("sprint");
    expect(doc.activities.map((a) => a.name)).toEqual(["Plan sprint", "Run demo"]);
  });

  it("uses steps over activities and defaults names", () => {
    const doc = parseProcessJson({ steps: [{ description: "Collect data" }], activities: [{ name: "Ignored" }] });
    expect(doc.processName).toBe("Untitled Process");
    expect(doc.activities.map((a) => a.name)).toEqual(["Collect data"]);
  });

  it("exits with the parse code for missing or unsupported files", () => {
    expect(() => loadProcess(join(FIXTURES, "missing.json"))).toThrow(InputNotFoundError);
    try {
      loadProcess(join(FIXTURES, "process.xml"));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnsupportedFormatError);
      expect(err).toHaveProperty("exitCode", 2);
    }
  });
});

describe("templates", () => {
  it("drops unknown codes with a warning", () => {
    const warnings: Warning[] = [];
    const template = parseTemplateJson({ assignments: { s1: { Owner: "a", Analyst: "X" } } }, "t.json", warnings);
    expect(template).toEqual({ assignments: { s1: { Owner: "A" } } });
    expect(warnings).toHaveLength(1);
  });
});

describe("generateRaci", () => {
  it("builds the onboarding matrix", () => {
    const result = generateRaci(loadProcess(join(FIXTURES, "onboarding.json")), { now: NOW });

    expect(result.processId).toBe("42");
    expect(result.roles).toEqual(["Account Manager", "Finance Team", "Support Engineer"]);
    expect(result.raciMatrix.map((e) => e.roles)).toEqual([
      { "Account Manager": "A", "Finance Team": "I", "Support Engineer": "R" },
      { "Account Manager": "A", "Finance Team": "I", "Support Engineer": "I" },
      { "Account Manager": "A", "Finance Team": "I", "Support Engineer": "I" },
    ]);
    expect(result.roleSummary["Support Engineer"]).toEqual({ R: 1, A: 0, C: 0, I: 2, total: 3 });
    expect(result.validationIssues.map((i) => [i.severity, i.activity ?? i.role, i.issue])).toEqual([
      ["high", "Approve contract", "No Responsible role assigned"],
      ["high", "Notify finance team", "No Responsible role assigned"],
      ["medium", "Account Manager", "Role is Accountable for 3 activities (100%)"],
    ]);
    expect(describeIssues(result.validationIssues)).toBe("3 validation issues found: 2 high, 1 medium");
    expect(raciExitCode(result)).toBe(0);
  });

  it("applies CSV presets before inference", () => {
    const result = generateRaci(loadProcess(join(FIXTURES, "vendor_review-flow.csv")), { now: NOW });
    expect(result.raciMatrix.map((e) => e.roles)).toEqual([
      { Buyer: "R", Legal: "I", "Procurement Lead": "A" },
      { Buyer: "I", Legal: "R", "Procurement Lead": "A" },
    ]);
    expect(result.validationIssues).toHaveLength(1);
  });

  it("lets a template replace the roles and fix assignments", () => {
    const template = loadTemplate(join(FIXTURES, "template.csv"));
    expect(template).toEqual({ roles: ["Owner", "Analyst"], assignments: { s1: { Owner: "A", Analyst: "R" } } });

    const result = generateRaci(loadProcess(join(FIXTURES, "onboarding.json")), { template, now: NOW });
    expect(formatRaciCsv(result)).toBe(
      "Activity,Owner,Analyst\nDraft welcome plan,A,R\nApprove contract,A,I\nNotify finance team,A,I\n",
    );
  });

  it("needs roles and activities", () => {
    const doc = loadProcess(join(FIXTURES, "release.md"));
    expect(() => generateRaci(doc)).toThrow(ValidationError);
    expect(() => generateRaci({ ...doc, roles: ["Owner"], activities: [] })).toThrow("No activities found in process data");
  });

  it("flags a critical issue when nobody can be made accountable", () => {
    const doc = parseProcessMarkdown("1. Kickoff\n", "kickoff");
    const result = generateRaci({ ...doc, roles: ["Writer", "Editor"] }, { now: NOW });
    expect(result.raciMatrix[0].roles).toEqual({ Writer: "R", Editor: "I" });
    expect(result.validationIssues[0].issue).toBe("No Accountable role assigned");
    expect(raciExitCode(result)).toBe(1);
  });
});

describe("RACI formats", () => {
  const result = generateRaci(loadProcess(join(FIXTURES, "onboarding.json")), { now: NOW });

  it("renders the Markdown table", () => {
    const lines = formatRaciMarkdown(result).split("\n");
    expect(lines.slice(0, 5)).toEqual([
      "# RACI Matrix: Customer Onboarding",
      "",
      "**Description:** Bring a new customer live",
      "",
      "**Generated:** 2025-06-01T09:30:00.000Z",
    ]);
    const table = lines.indexOf("## RACI Matrix");
    expect(lines.slice(table + 2, table + 7)).toEqual([
      "| Activity | Account Manager | Finance Team | Support Engineer |",
      "|---|---|---|---|",
      "| Draft welcome plan | A | I | R |",
      "| Approve contract | A | I | I |",
      "| Notify finance team | A | I | I |",
    ]);
    expect(lines).toContain("| Support Engineer | 1 | 0 | 0 | 2 | 3 |");
    expect(lines).toContain("### High Priority");
    expect(lines).toContain("- **Account Manager**: Role is Accountable for 3 activities (100%)");
  });

  it("escapes names in HTML", () => {
    expect(escapeHtml(`<b>"R&D"</b>`)).toBe("&lt;b&gt;&quot;R&amp;D&quot;&lt;/b&gt;");
    const html = formatRaciHtml({ ...result, processName: "Q&A <Ops>" });
    expect(html).toContain("<title>RACI Matrix: Q&amp;A &lt;Ops&gt;</title>");
    expect(html).toContain("<td class='R'>R</td>");
  });

  it("reports only issues when validating", () => {
    const csv = formatRaciValidation(result, "csv").split("\n");
    expect(csv[0]).toBe("severity,subject,issue,recommendation");
    expect(csv[1]).toBe("high,Approve contract,No Responsible role assigned,Assign at least one Responsible role");
    expect(formatRaciValidation(result, "markdown").split("\n").slice(0, 4)).toEqual([
      "# RACI Validation: Customer Onboarding",
      "",
      "**Activities:** 3  ",
      "**Roles:** 3",
    ]);
  });
});
