// src/parser.ts
import * as fs from "fs/promises";
import { ParseDiagnostic, parse } from "./syntax/parser";
import { ScopeTree, buildScopeTree, collectIndexDeclarations } from "./scopeBuilder";
import { collectGlobalOccurrences } from "./globalReferences";
import { Declaration, IndexedOccurrence } from "./types";

export interface Analysis {
  /** Absent when the text does not parse. */
  scopes?: ScopeTree;
  errors: ParseDiagnostic[];
}

export interface FileAnalysis extends Analysis {
  text: string;
  declarations: Declaration[];
  occurrences: IndexedOccurrence[];
}

/** Parses `text` and, when it parses cleanly, builds its scope tree. */
export function analyzeSource(text: string): Analysis {
  const { program, errors } = parse(text);
  if (!program) return { errors };
  return { scopes: buildScopeTree(program), errors };
}

/**
 * Reads and analyzes a file from disk, extracting what the workspace index
 * stores for it. Read errors propagate to the caller.
 */
export async function analyzeFile(filePath: string): Promise<FileAnalysis> {
  const text = await fs.readFile(filePath, "utf8");
  const analysis = analyzeSource(text);
  if (!analysis.scopes) {
    return { ...analysis, text, declarations: [], occurrences: [] };
  }
  return {
    ...analysis,
    text,
    declarations: collectIndexDeclarations(analysis.scopes),
    occurrences: collectGlobalOccurrences(analysis.scopes),
  };
}

// --- Raw text scan ---

const ROUTINE_PATTERN =
  /^[ \t]*(?:class[ \t]+)?(function|procedure|constructor|destructor|method)[ \t]+([A-Za-z_]\w*)(?:\.([A-Za-z_]\w*))?/gim;
const TYPE_PATTERN = /^[ \t]*([A-Za-z_]\w*)[ \t]*=[ \t]*(class|record)\b/gim;

function lineAndColumn(text: string, offset: number): { line: number; column: number } {
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < offset; i++) {
    if (text.charCodeAt(i) === 10) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: offset - lineStart + 1 };
}

function rawDeclaration(
  text: string,
  name: string,
  nameOffset: number,
  kind: Declaration["kind"],
  detail: string,
  containerName?: string,
): Declaration {
  const start = lineAndColumn(text, nameOffset);
  const range = { start, end: { line: start.line, column: start.column + name.length } };
  return { name, kind, range, selectionRange: range, containerName, detail };
}

/**
 * Line-based declaration scan for files that do not parse. Only routine
 * headers and class/record types are recognised.
 */
export function scanDeclarationsInText(text: string): Declaration[] {
  const declarations: Declaration[] = [];

  for (const match of text.matchAll(ROUTINE_PATTERN)) {
    const [whole, keyword, first, second] = match;
    const index = match.index ?? 0;
    const routine = keyword.toLowerCase();
    const name = second ?? first;
    const nameOffset = index + whole.length - name.length;
    const kind = second || (routine !== "function" && routine !== "procedure") ? "method" : "function";
    declarations.push(rawDeclaration(text, name, nameOffset, kind, whole.trim(), second ? first : undefined));
  }

  for (const match of text.matchAll(TYPE_PATTERN)) {
    const [whole, name, keyword] = match;
    const index = match.index ?? 0;
    const nameOffset = index + whole.indexOf(name);
    const kind = keyword.toLowerCase() === "class" ? "class" : "record";
    declarations.push(rawDeclaration(text, name, nameOffset, kind, `${kind} ${name}`));
  }

  return declarations.sort(
    (a, b) => a.range.start.line - b.range.start.line || a.range.start.column - b.range.start.column,
  );
}
