// src/rename.ts
import {
  OptionalVersionedTextDocumentIdentifier,
  TextDocumentEdit,
  TextEdit,
  WorkspaceEdit,
} from 'vscode-languageserver';
import builtins from './data/builtins.json';
import keywords from './data/keywords.json';
import { Location, Range, RenameError, RenameErrorCode, Result, fail, ok } from './types';
import { comparePositions, sortLocations, toLspRange } from './utils';

const RESERVED_NAMES: ReadonlySet<string> = new Set(
  [...keywords.reserved, ...keywords.directives, ...builtins.types, ...builtins.functions].map((name) =>
    name.toLowerCase(),
  ),
);

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function renameError(code: RenameErrorCode, message: string): RenameError {
  return { code, message };
}

/** Keywords, directives, built-in types and built-in functions, matched case-insensitively. */
export function isReservedName(name: string): boolean {
  return RESERVED_NAMES.has(name.toLowerCase());
}

export function canRename(name: string): Result<string> {
  if (isReservedName(name)) {
    return fail(renameError('ReservedName', `'${name}' is a reserved word or built-in and cannot be renamed`));
  }
  return ok(name);
}

export function validateNewName(newName: string): Result<string> {
  if (newName.length === 0) {
    return fail(renameError('InvalidName', 'New name must not be empty'));
  }
  if (!IDENTIFIER.test(newName)) {
    return fail(renameError('InvalidName', `'${newName}' is not a valid identifier`));
  }
  if (isReservedName(newName)) {
    return fail(renameError('InvalidName', `'${newName}' is a reserved word or built-in`));
  }
  return ok(newName);
}

export interface RenameEdit {
  range: Range;
  newText: string;
}

export interface RenameTransaction {
  /** Per-file edits in document order, never overlapping. */
  edits: Map<string, RenameEdit[]>;
  /** Open document version per file, `null` for files that are not open. */
  documentVersions: Map<string, number | null>;
}

/**
 * Groups `locations` by file into one edit per occurrence, stamping each file
 * with its current document version.
 */
export function buildRenameTransaction(
  locations: Location[],
  newName: string,
  versionOf: (uri: string) => number | null,
): Result<RenameTransaction> {
  if (locations.length === 0) {
    return fail(renameError('NoReferences', 'No references found to rename'));
  }

  const edits = new Map<string, RenameEdit[]>();
  const documentVersions = new Map<string, number | null>();

  for (const location of sortLocations(locations)) {
    let fileEdits = edits.get(location.uri);
    if (!fileEdits) {
      fileEdits = [];
      edits.set(location.uri, fileEdits);
      documentVersions.set(location.uri, versionOf(location.uri));
    }
    const previous = fileEdits[fileEdits.length - 1];
    if (previous && comparePositions(location.range.start, previous.range.end) < 0) continue;
    fileEdits.push({ range: location.range, newText: newName });
  }

  return ok({ edits, documentVersions });
}

export function toWorkspaceEdit(transaction: RenameTransaction): WorkspaceEdit {
  const documentChanges: TextDocumentEdit[] = [];
  for (const [uri, edits] of transaction.edits) {
    const version = transaction.documentVersions.get(uri) ?? null;
    documentChanges.push(
      TextDocumentEdit.create(
        OptionalVersionedTextDocumentIdentifier.create(uri, version),
        edits.map((edit) => TextEdit.replace(toLspRange(edit.range), edit.newText)),
      ),
    );
  }
  return { documentChanges };
}
