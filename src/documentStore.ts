// src/documentStore.ts
import { ParseDiagnostic } from './syntax/parser';
import { analyzeSource } from './parser';
import { ScopeTree } from './scopeBuilder';

export interface DocumentSnapshot {
  uri: string;
  version: number;
  /** Absent when the text does not parse. */
  scopes?: ScopeTree;
  diagnostics: ParseDiagnostic[];
}

/**
 * Open documents keyed by URI. `set` parses and builds the scope tree before
 * swapping the snapshot in, so readers always see one consistent version.
 */
export class DocumentStore {
  private documents = new Map<string, DocumentSnapshot>();

  get(uri: string): DocumentSnapshot | undefined {
    return this.documents.get(uri);
  }

  set(uri: string, text: string, version: number): DocumentSnapshot {
    const { scopes, errors } = analyzeSource(text);
    const snapshot: DocumentSnapshot = { uri, version, scopes, diagnostics: errors };
    this.documents.set(uri, snapshot);
    return snapshot;
  }

  delete(uri: string): boolean {
    return this.documents.delete(uri);
  }

  has(uri: string): boolean {
    return this.documents.has(uri);
  }

  list(): DocumentSnapshot[] {
    return [...this.documents.values()];
  }
}
