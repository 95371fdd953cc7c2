// src/utils.ts
import { URI } from 'vscode-uri';
import {
  Range as LspRange,
  Position as LspPosition,
  Location as LspLocation,
  SymbolKind,
} from 'vscode-languageserver';
import { DeclarationKind, Location, Position, Range } from './types';

// --- Position Model ---

/**
 * Converts an internal 1-based position to an LSP 0-based position.
 * Columns are UTF-16 code units on both sides, so only the base changes.
 */
export function toLspPosition(position: Position): LspPosition {
  return LspPosition.create(Math.max(0, position.line - 1), Math.max(0, position.column - 1));
}

export function toLspRange(range: Range): LspRange {
  return LspRange.create(toLspPosition(range.start), toLspPosition(range.end));
}

export function toLspLocation(location: Location): LspLocation {
  return LspLocation.create(location.uri, toLspRange(location.range));
}

export function fromLspPosition(position: LspPosition): Position {
  return { line: position.line + 1, column: position.character + 1 };
}

export function comparePositions(a: Position, b: Position): number {
  return a.line !== b.line ? a.line - b.line : a.column - b.column;
}

/**
 * True when `position` lies inside `range`. The end is inclusive so a cursor
 * placed right after an identifier still hits it.
 */
export function rangeContains(range: Range, position: Position): boolean {
  return comparePositions(range.start, position) <= 0 && comparePositions(position, range.end) <= 0;
}

export function rangesEqual(a: Range, b: Range): boolean {
  return comparePositions(a.start, b.start) === 0 && comparePositions(a.end, b.end) === 0;
}

// --- Location ordering ---

/** Orders by URI, then start line, then start column. */
export function compareLocations(a: Location, b: Location): number {
  if (a.uri !== b.uri) return a.uri < b.uri ? -1 : 1;
  return comparePositions(a.range.start, b.range.start);
}

export function sortLocations(locations: Location[]): Location[] {
  return [...locations].sort(compareLocations);
}

export function locationKey(location: Location): string {
  const { start, end } = location.range;
  return `${location.uri}#${start.line}:${start.column}-${end.line}:${end.column}`;
}

export function dedupeLocations(locations: Location[]): Location[] {
  const seen = new Set<string>();
  return locations.filter((location) => {
    const key = locationKey(location);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

// --- Filesystem & URI Helpers ---

/**
 * Converts a file URI to an absolute system path.
 * @returns The path, or undefined for non-file URIs.
 */
export function uriToPath(uri: string): string | undefined {
  if (!uri.startsWith('file:')) {
    console.warn(`[Utils] Cannot convert non-file URI to path: ${uri}`);
    return undefined;
  }
  return URI.parse(uri).fsPath;
}

export function pathToUri(filePath: string): string {
  return URI.file(filePath).toString();
}

/** Directory part of a URI, used to rank same-directory results first. */
export function uriDirectory(uri: string): string {
  const slash = uri.lastIndexOf('/');
  return slash < 0 ? '' : uri.slice(0, slash);
}

// --- Symbol kinds ---

export function toSymbolKind(kind: DeclarationKind): SymbolKind {
  switch (kind) {
    case 'variable':
    case 'parameter':
      return SymbolKind.Variable;
    case 'function':
      return SymbolKind.Function;
    case 'method':
      return SymbolKind.Method;
    case 'field':
      return SymbolKind.Field;
    case 'property':
      return SymbolKind.Property;
    case 'constant':
      return SymbolKind.Constant;
    case 'class':
      return SymbolKind.Class;
    case 'record':
      return SymbolKind.Struct;
    case 'enum':
      return SymbolKind.Enum;
    case 'enumMember':
      return SymbolKind.EnumMember;
    case 'type':
      return SymbolKind.TypeParameter;
  }
}

// --- LSP Progress Notification ---

export type ProgressKind = 'begin' | 'report' | 'end';

export interface ProgressValue {
  kind: ProgressKind;
  title?: string;
  message?: string;
  percentage?: number;
}

/** Destination for `$/progress` notifications; the server wires it to the connection. */
export type ProgressSink = (token: string, value: ProgressValue) => void;

/**
 * Sends a progress notification through `sink`.
 * @param delayMs - Optional delay before sending.
 */
export function setProgress(
  sink: ProgressSink,
  token: string,
  kind: ProgressKind,
  message = '',
  percentage?: number,
  delayMs?: number,
): void {
  const value: ProgressValue =
    kind === 'begin' ? { kind, title: message, percentage } : kind === 'report' ? { kind, message, percentage } : { kind, message };
  const send = () => sink(token, value);

  if (delayMs && delayMs > 0) {
    setTimeout(send, delayMs);
  } else {
    send();
  }
}

export interface ProgressChannel {
  send: ProgressSink;
  /** Resolves once every notification queued so far has been handed to the client. */
  settled(): Promise<void>;
}

/**
 * Orders progress traffic for the client: each `begin` first asks the client
 * to create the token, and the notifications for a token are sent only after
 * that request succeeds.
 */
export function createProgressChannel(
  create: (token: string) => Promise<void>,
  notify: (token: string, value: ProgressValue) => Promise<void>,
): ProgressChannel {
  const created = new Map<string, Promise<boolean>>();
  let tail: Promise<void> = Promise.resolve();

  const send: ProgressSink = (token, value) => {
    if (value.kind === 'begin') {
      created.set(
        token,
        create(token).then(
          () => true,
          (error: unknown) => {
            console.warn(`[Progress] Client refused progress token ${token}: ${String(error)}`);
            return false;
          },
        ),
      );
    }
    const ready = created.get(token) ?? Promise.resolve(false);
    if (value.kind === 'end') created.delete(token);
    tail = tail
      .then(() => ready)
      .then((ok) => (ok ? notify(token, value) : undefined))
      .catch((error: unknown) => console.error(`[Progress] Failed to report progress: ${String(error)}`));
  };

  return { send, settled: () => tail };
}

// --- Tracing ---

export type TraceLevel = 'off' | 'messages' | 'verbose';

/**
 * Line to log for a request under the given trace level: nothing when off,
 * the message alone for `messages`, the message and its detail for `verbose`.
 */
export function traceLine(level: TraceLevel, message: string, detail?: string): string | undefined {
  if (level === 'off') return undefined;
  return level === 'verbose' && detail ? `${message} ${detail}` : message;
}
