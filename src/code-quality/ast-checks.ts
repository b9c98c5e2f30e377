// src/code-quality/ast-checks.ts — Syntax-aware checks
// TypeScript/JavaScript go through the TypeScript compiler's parser; Python
// function signatures are scanned directly.

import { extname } from "node:path";
import ts from "typescript";
import { lineExcerpt } from "./patterns.js";
import type { QualityFinding } from "./types.js";

/** Functions with more parameters than this are reported (TS-008). */
export const MAX_PARAMETERS = 5;

function scriptKindFor(file: string): ts.ScriptKind {
  switch (extname(file).toLowerCase()) {
    case ".tsx":
      return ts.ScriptKind.TSX;
    case ".jsx":
      return ts.ScriptKind.JSX;
    case ".js":
      return ts.ScriptKind.JS;
    default:
      return ts.ScriptKind.TS;
  }
}

type FunctionWithBody =
  | ts.FunctionDeclaration
  | ts.FunctionExpression
  | ts.ArrowFunction
  | ts.MethodDeclaration
  | ts.ConstructorDeclaration;

function isFunctionWithBody(node: ts.Node): node is FunctionWithBody {
  return (
    ts.isFunctionDeclaration(node) ||
    ts.isFunctionExpression(node) ||
    ts.isArrowFunction(node) ||
    ts.isMethodDeclaration(node) ||
    ts.isConstructorDeclaration(node)
  );
}

function functionName(node: FunctionWithBody, sourceFile: ts.SourceFile): string {
  if (ts.isConstructorDeclaration(node)) return "constructor";
  if (node.name) return node.name.getText(sourceFile);
  const parent = node.parent;
  if ((ts.isVariableDeclaration(parent) || ts.isPropertyAssignment(parent)) && ts.isIdentifier(parent.name)) {
    return parent.name.text;
  }
  return "<anonymous>";
}

/** A catch block with no statements and no comments. */
function isEmptyCatch(clause: ts.CatchClause, sourceFile: ts.SourceFile): boolean {
  const block = clause.block;
  if (block.statements.length > 0) return false;
  const inner = sourceFile.text.slice(block.getStart(sourceFile) + 1, block.getEnd() - 1);
  return inner.trim() === "";
}

/**
 * Empty catch blocks (TS-003) and long parameter lists (TS-008) in a
 * TypeScript or JavaScript file. Files that fail to parse still yield
 * whatever the parser recovered.
 */
export function analyzeScriptAst(content: string, file: string, lines: readonly string[]): QualityFinding[] {
  const sourceFile = ts.createSourceFile(file, content, ts.ScriptTarget.Latest, true, scriptKindFor(file));
  const findings: QualityFinding[] = [];

  const lineOf = (node: ts.Node): number =>
    sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile)).line;

  function visit(node: ts.Node): void {
    if (ts.isCatchClause(node) && isEmptyCatch(node, sourceFile)) {
      const line = lineOf(node);
      findings.push({
        file,
        line: line + 1,
        severity: "HIGH",
        category: "anti-pattern",
        patternId: "TS-003",
        message: "Empty catch block silently swallows errors",
        suggestion: "Log the error or handle it appropriately",
        lineContent: lineExcerpt(lines[line] ?? ""),
      });
    } else if (isFunctionWithBody(node) && node.parameters.length > MAX_PARAMETERS) {
      const line = lineOf(node);
      const name = functionName(node, sourceFile);
      findings.push({
        file,
        line: line + 1,
        severity: "MEDIUM",
        category: "complexity",
        patternId: "TS-008",
        message: `Function '${name}' has ${node.parameters.length} parameters (max ${MAX_PARAMETERS})`,
        suggestion: "Group related parameters into an options object",
        lineContent: lineExcerpt(lines[line] ?? ""),
      });
    }
    ts.forEachChild(node, visit);
  }

  visit(sourceFile);
  return findings;
}

// ─── Python ─────────────────────────────────────────────────────────────────

const PY_DEF = /^[ \t]*(?:async[ \t]+)?def[ \t]+(\w+)[ \t]*\(/gm;

/** Text between the `(` at `open` and its matching `)`, or the rest of the file. */
function balancedParams(content: string, open: number): string {
  let depth = 0;
  for (let i = open; i < content.length; i++) {
    const char = content[i];
    if (char === "(" || char === "[" || char === "{") depth++;
    else if (char === ")" || char === "]" || char === "}") {
      depth--;
      if (depth === 0) return content.slice(open + 1, i);
    }
  }
  return content.slice(open + 1);
}

/** A parameter default written as a list, dict or set literal (`=[`, `={`). */
const MUTABLE_DEFAULT = /=\s*[[{]/;

/** Python functions with a mutable default argument (PY-001). */
export function detectMutableDefaults(content: string, file: string): QualityFinding[] {
  const findings: QualityFinding[] = [];
  for (const match of content.matchAll(PY_DEF)) {
    const name = match[1];
    const start = match.index ?? 0;
    const open = start + match[0].length - 1;
    if (!MUTABLE_DEFAULT.test(balancedParams(content, open))) continue;
    findings.push({
      file,
      line: content.slice(0, start).split("\n").length,
      severity: "HIGH",
      category: "anti-pattern",
      patternId: "PY-001",
      message: `Mutable default argument in function '${name}'`,
      suggestion: "Use None as default and initialize inside function",
      lineContent: `def ${name}(...)`,
    });
  }
  return findings;
}
