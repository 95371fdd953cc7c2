import { Position as LspPosition } from 'vscode-languageserver';
import { analyzeSource } from '../src/parser';
import { ScopeTree } from '../src/scopeBuilder';
import { Declaration, DeclarationKind, Position } from '../src/types';

/** 1-based position of the `nth` occurrence of `needle` in `text`. */
export function positionOf(text: string, needle: string, nth = 0): Position {
  let offset = -1;
  for (let i = 0; i <= nth; i++) {
    offset = text.indexOf(needle, offset + 1);
    if (offset < 0) throw new Error(`'${needle}' #${nth} not found`);
  }
  const before = text.slice(0, offset);
  return { line: before.split('\n').length, column: offset - before.lastIndexOf('\n') };
}

export function lspPositionOf(text: string, needle: string, nth = 0): LspPosition {
  const { line, column } = positionOf(text, needle, nth);
  return { line: line - 1, character: column - 1 };
}

export function scopesOf(text: string): ScopeTree {
  const { scopes, errors } = analyzeSource(text);
  if (!scopes) throw new Error(`Source does not parse: ${errors.map((e) => e.message).join('; ')}`);
  return scopes;
}

export function declaration(name: string, line: number, kind: DeclarationKind = 'function'): Declaration {
  const range = { start: { line, column: 1 }, end: { line, column: 1 + name.length } };
  return { name, kind, range, selectionRange: range, detail: name };
}

export function src(lines: string[]): string {
  return lines.join('\n') + '\n';
}
