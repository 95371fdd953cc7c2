// src/symbolResolver.ts
import { GLOBAL_SCOPE, ScopeTree, SymbolReference, findMembersByName, lookup } from './scopeBuilder';
import { SymbolIndex } from './symbolIndex';
import { Declaration, DeclarationLocation, IndexEntry, Position, Range, SymbolScope } from './types';
import { comparePositions, rangeContains, uriDirectory } from './utils';

export interface ResolvedSymbol {
  name: string;
  /** Range of the occurrence under the cursor. */
  range: Range;
  scope: SymbolScope;
  /** Declaring scope, set for local and parameter symbols. */
  scopeId?: number;
  declarations: DeclarationLocation[];
  /** The cursor is on the declaration's own name token. */
  onDeclaration: boolean;
}

export interface Classification {
  scope: SymbolScope;
  scopeId?: number;
}

function isMemberDeclaration(declaration: Declaration): boolean {
  return declaration.kind === 'field' || declaration.kind === 'property' || declaration.kind === 'method'
    ? declaration.containerName !== undefined
    : false;
}

/**
 * Finds the occurrence covering `position`. A position exactly at an
 * occurrence's end only counts when no occurrence starts there.
 */
export function findOccurrenceAt(tree: ScopeTree, position: Position): SymbolReference | undefined {
  let touching: SymbolReference | undefined;
  for (const reference of tree.references) {
    if (!rangeContains(reference.range, position)) continue;
    if (comparePositions(position, reference.range.end) < 0) return reference;
    touching = touching ?? reference;
  }
  return touching;
}

/** Decides which reference search an occurrence belongs to. */
export function classifyOccurrence(tree: ScopeTree, occurrence: SymbolReference): Classification {
  if (occurrence.member) return { scope: 'member' };

  if (occurrence.declaration) {
    if (tree.scopes[occurrence.scope].kind === 'Global') return { scope: 'global' };
    const scope = occurrence.declaration.kind === 'parameter' ? 'parameter' : 'local';
    return { scope, scopeId: occurrence.scope };
  }

  const binding = lookup(tree, occurrence.scope, occurrence.name, occurrence.range.start);
  if (!binding) return { scope: 'global' };
  if (binding.source === 'member') return { scope: 'member' };
  if (binding.scopeId === GLOBAL_SCOPE) return { scope: 'global' };
  const scope = binding.declaration.kind === 'parameter' ? 'parameter' : 'local';
  return { scope, scopeId: binding.scopeId };
}

/** Orders index matches with files beside `uri` first, then by URI and position. */
export function rankByProximity(uri: string, entries: IndexEntry[]): IndexEntry[] {
  const directory = uriDirectory(uri);
  return [...entries].sort((a, b) => {
    const aNear = uriDirectory(a.uri) === directory ? 0 : 1;
    const bNear = uriDirectory(b.uri) === directory ? 0 : 1;
    if (aNear !== bNear) return aNear - bNear;
    if (a.uri !== b.uri) return a.uri < b.uri ? -1 : 1;
    return comparePositions(a.declaration.selectionRange.start, b.declaration.selectionRange.start);
  });
}

function fromIndex(uri: string, entries: IndexEntry[]): DeclarationLocation[] {
  return rankByProximity(uri, entries).map((entry) => ({ uri: entry.uri, declaration: entry.declaration }));
}

/**
 * Resolves the identifier at `position` to its declarations.
 *
 * A declaration's own name resolves to itself. Other names walk the scope
 * chain outward (nearest wins); names that stay unresolved fall back to the
 * workspace index, which may return several matches.
 */
export function resolveSymbol(
  uri: string,
  tree: ScopeTree,
  position: Position,
  index?: SymbolIndex,
): ResolvedSymbol | undefined {
  const occurrence = findOccurrenceAt(tree, position);
  if (!occurrence) return undefined;

  const { name, range } = occurrence;
  const classification = classifyOccurrence(tree, occurrence);

  if (occurrence.declaration) {
    return { name, range, ...classification, declarations: [{ uri, declaration: occurrence.declaration }], onDeclaration: true };
  }

  if (occurrence.member) {
    const local = findMembersByName(tree, name).map((declaration) => ({ uri, declaration }));
    const declarations =
      local.length > 0 || !index ? local : fromIndex(uri, index.findByName(name).filter((entry) => isMemberDeclaration(entry.declaration)));
    return { name, range, scope: 'member', declarations, onDeclaration: false };
  }

  const binding = lookup(tree, occurrence.scope, name, range.start);
  if (binding) {
    return { name, range, ...classification, declarations: [{ uri, declaration: binding.declaration }], onDeclaration: false };
  }

  if (!index) return { name, range, scope: 'global', declarations: [], onDeclaration: false };
  const matches = index.findByName(name);
  const nonMembers = matches.filter((entry) => !isMemberDeclaration(entry.declaration));
  return {
    name,
    range,
    scope: 'global',
    declarations: fromIndex(uri, nonMembers.length > 0 ? nonMembers : matches),
    onDeclaration: false,
  };
}
