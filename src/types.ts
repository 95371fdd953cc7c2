// --- Internal Index Types ---

export interface Position { // 1-based internal position
  line: number;
  column: number;
}

export interface Range { // 1-based internal range, end column exclusive
  start: Position;
  end: Position;
}

export interface Location { // Internal location keyed by document URI
  uri: string;
  range: Range;
}

export type DeclarationKind =
  | 'variable'
  | 'parameter'
  | 'function'
  | 'method'
  | 'field'
  | 'property'
  | 'constant'
  | 'class'
  | 'record'
  | 'enum'
  | 'enumMember'
  | 'type';

export interface Declaration {
  name: string;
  kind: DeclarationKind;
  range: Range;          // whole declaring construct
  selectionRange: Range; // the name token
  containerName?: string;
  detail: string;
}

export interface IndexEntry {
  name: string;
  declaration: Declaration;
  uri: string;
}

/** Where a resolved name lives, which decides how its references are searched. */
export type SymbolScope = 'local' | 'parameter' | 'global' | 'member';

/** A name occurrence kept in the workspace index for files that are not open. */
export interface IndexedOccurrence {
  name: string;
  range: Range;
  scope: 'global' | 'member';
}

export interface DeclarationLocation {
  uri: string;
  declaration: Declaration;
}

// --- Errors ---

export type RenameErrorCode =
  | 'NotASymbol'
  | 'DocumentNotFound'
  | 'NoAST'
  | 'ReservedName'
  | 'InvalidName'
  | 'NoReferences';

export interface RenameError {
  code: RenameErrorCode;
  message: string;
}

export type Result<T, E = RenameError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
