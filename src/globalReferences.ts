// src/globalReferences.ts
import { ScopeTree } from './scopeBuilder';
import { SymbolIndex } from './symbolIndex';
import { classifyOccurrence } from './symbolResolver';
import { IndexedOccurrence, Location } from './types';
import { dedupeLocations, rangesEqual, sortLocations } from './utils';

export interface OpenDocument {
  uri: string;
  /** Absent when the document's last parse failed. */
  scopes?: ScopeTree;
}

/**
 * Occurrences in a file that are not bound to a local or parameter. These are
 * what the workspace index keeps for cross-file reference search.
 */
export function collectGlobalOccurrences(tree: ScopeTree): IndexedOccurrence[] {
  const occurrences: IndexedOccurrence[] = [];
  for (const reference of tree.references) {
    const { scope } = classifyOccurrence(tree, reference);
    if (scope === 'global' || scope === 'member') {
      occurrences.push({ name: reference.name, range: reference.range, scope });
    }
  }
  return occurrences;
}

/**
 * Every global or member occurrence of `name` across the workspace. Open
 * documents are scanned live; indexed files that are not open (or whose open
 * buffer does not parse) are served from the index.
 */
export function findGlobalReferences(
  name: string,
  scope: IndexedOccurrence['scope'],
  documents: Iterable<OpenDocument>,
  index: SymbolIndex,
): Location[] {
  const scanned = new Set<string>();
  const locations: Location[] = [];

  for (const document of documents) {
    const tree = document.scopes;
    if (!tree) continue;
    scanned.add(document.uri);
    for (const reference of tree.references) {
      if (reference.name !== name) continue;
      if (classifyOccurrence(tree, reference).scope !== scope) continue;
      locations.push({ uri: document.uri, range: reference.range });
    }
  }

  locations.push(...index.findOccurrences(name, scope, scanned));
  return sortLocations(dedupeLocations(locations));
}

/**
 * Applies the declaration-inclusion policy: with `include` the declaration is
 * put first (inserted or moved), without it it is removed. The result is then
 * re-sorted by URI and position.
 */
export function applyDeclarationPolicy(
  locations: Location[],
  declaration: Location | undefined,
  include: boolean,
): Location[] {
  if (!declaration) return sortLocations(locations);
  const isDeclaration = (location: Location) =>
    location.uri === declaration.uri && rangesEqual(location.range, declaration.range);

  const others = locations.filter((location) => !isDeclaration(location));
  return sortLocations(include ? [declaration, ...others] : others);
}
