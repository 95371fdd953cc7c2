// src/localReferences.ts
import { ScopeTree, isWithinScope, lookup } from './scopeBuilder';
import { Range } from './types';

/**
 * Occurrences of `name` bound to the declaration in `scopeId`, searched only
 * inside that scope's subtree. Nested scopes that redeclare `name` keep their
 * own occurrences.
 */
export function findLocalReferences(tree: ScopeTree, scopeId: number, name: string): Range[] {
  return tree.references
    .filter((reference) => {
      if (reference.member || reference.name !== name) return false;
      if (!isWithinScope(tree, reference.scope, scopeId)) return false;
      if (reference.declaration) return reference.scope === scopeId;
      const binding = lookup(tree, reference.scope, name, reference.range.start);
      return binding?.source === 'scope' && binding.scopeId === scopeId;
    })
    .map((reference) => reference.range);
}
