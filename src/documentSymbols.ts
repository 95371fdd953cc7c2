// src/documentSymbols.ts
import { DocumentSymbol } from 'vscode-languageserver';
import { GLOBAL_SCOPE, ScopeTree } from './scopeBuilder';
import { Declaration } from './types';
import { comparePositions, toLspRange, toSymbolKind } from './utils';

function byPosition(a: Declaration, b: Declaration): number {
  return comparePositions(a.selectionRange.start, b.selectionRange.start);
}

function toDocumentSymbol(declaration: Declaration, children: DocumentSymbol[]): DocumentSymbol {
  return DocumentSymbol.create(
    declaration.name,
    declaration.detail,
    toSymbolKind(declaration.kind),
    toLspRange(declaration.range),
    toLspRange(declaration.selectionRange),
    children.length > 0 ? children : undefined,
  );
}

/**
 * Outline of a document: global declarations and method implementations,
 * with class/record members, enum values and routine locals nested.
 */
export function buildDocumentSymbols(tree: ScopeTree): DocumentSymbol[] {
  const globals = [...tree.scopes[GLOBAL_SCOPE].declarations.values()];

  const childrenOf = (declaration: Declaration): DocumentSymbol[] => {
    switch (declaration.kind) {
      case 'class':
      case 'record': {
        const info = tree.classes.get(declaration.name);
        if (!info || info.declaration !== declaration) return [];
        return [...info.members.values()].sort(byPosition).map((member) => toDocumentSymbol(member, []));
      }
      case 'enum':
        return globals
          .filter((other) => other.kind === 'enumMember' && other.containerName === declaration.name)
          .sort(byPosition)
          .map((member) => toDocumentSymbol(member, []));
      case 'function':
      case 'method': {
        const scopeId = tree.functionScopes.get(declaration);
        if (scopeId === undefined) return [];
        return [...tree.scopes[scopeId].declarations.values()]
          .filter((local) => local.kind !== 'parameter')
          .sort(byPosition)
          .map((local) => toDocumentSymbol(local, childrenOf(local)));
      }
      default:
        return [];
    }
  };

  const implementations: Declaration[] = [];
  for (const [declaration, scopeId] of tree.functionScopes) {
    const scope = tree.scopes[scopeId];
    if (scope.ownerClass !== undefined && scope.parent === GLOBAL_SCOPE) implementations.push(declaration);
  }
  const topLevel = [...globals.filter((declaration) => declaration.kind !== 'enumMember'), ...implementations];

  return topLevel.sort(byPosition).map((declaration) => toDocumentSymbol(declaration, childrenOf(declaration)));
}
