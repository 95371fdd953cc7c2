// src/symbolIndex.ts
import { Declaration, IndexEntry, IndexedOccurrence, Location } from './types';
import { compareLocations, comparePositions } from './utils';

interface FileContribution {
  /** Exact set of names this file last contributed. */
  names: Set<string>;
  entries: IndexEntry[];
  occurrences: Map<string, IndexedOccurrence[]>;
}

export function compareEntries(a: IndexEntry, b: IndexEntry): number {
  const aName = a.name.toLowerCase();
  const bName = b.name.toLowerCase();
  if (aName !== bName) return aName < bName ? -1 : 1;
  if (a.uri !== b.uri) return a.uri < b.uri ? -1 : 1;
  return comparePositions(a.declaration.selectionRange.start, b.declaration.selectionRange.start);
}

/**
 * Workspace-wide table of declarations keyed by name.
 *
 * Each file's contribution is replaced as a whole: the new entries are built
 * before any shared map is touched, and the remove/add pair runs without
 * yielding, so a reader on the event loop sees either the old or the new set
 * for a file, never a mix.
 */
export class SymbolIndex {
  private symbols = new Map<string, IndexEntry[]>();
  private occurrences = new Map<string, Map<string, IndexedOccurrence[]>>();
  private files = new Map<string, FileContribution>();

  indexFile(uri: string, declarations: Declaration[], occurrences: IndexedOccurrence[] = []): void {
    const entries = declarations.map((declaration) => ({ name: declaration.name, declaration, uri }));
    const byName = new Map<string, IndexedOccurrence[]>();
    for (const occurrence of occurrences) {
      const list = byName.get(occurrence.name);
      if (list) list.push(occurrence);
      else byName.set(occurrence.name, [occurrence]);
    }
    const contribution: FileContribution = {
      names: new Set(entries.map((entry) => entry.name)),
      entries,
      occurrences: byName,
    };

    this.removeFile(uri);

    for (const entry of entries) {
      const existing = this.symbols.get(entry.name);
      if (existing) existing.push(entry);
      else this.symbols.set(entry.name, [entry]);
    }
    for (const [name, list] of byName) {
      let perFile = this.occurrences.get(name);
      if (!perFile) {
        perFile = new Map();
        this.occurrences.set(name, perFile);
      }
      perFile.set(uri, list);
    }
    this.files.set(uri, contribution);
  }

  /** @returns whether the file had any contribution. */
  removeFile(uri: string): boolean {
    const contribution = this.files.get(uri);
    if (!contribution) return false;

    for (const name of contribution.names) {
      const remaining = (this.symbols.get(name) ?? []).filter((entry) => entry.uri !== uri);
      if (remaining.length === 0) this.symbols.delete(name);
      else this.symbols.set(name, remaining);
    }
    for (const name of contribution.occurrences.keys()) {
      const perFile = this.occurrences.get(name);
      if (!perFile) continue;
      perFile.delete(uri);
      if (perFile.size === 0) this.occurrences.delete(name);
    }
    this.files.delete(uri);
    return true;
  }

  /** Drops every file whose URI starts with `prefix`; used when a workspace folder goes away. */
  removeFilesUnder(prefix: string): string[] {
    const folder = prefix.endsWith('/') ? prefix : `${prefix}/`;
    const removed = [...this.files.keys()].filter((uri) => uri.startsWith(folder));
    removed.forEach((uri) => this.removeFile(uri));
    if (removed.length > 0) {
      console.log(`[SymbolIndex] Removed ${removed.length} files under ${prefix}`);
    }
    return removed;
  }

  /**
   * Case-insensitive substring search over declaration names. An empty query
   * matches everything; `limit <= 0` means no limit.
   */
  search(query: string, limit: number): IndexEntry[] {
    const needle = query.toLowerCase();
    const results: IndexEntry[] = [];
    for (const [name, entries] of this.symbols) {
      if (needle === '' || name.toLowerCase().includes(needle)) results.push(...entries);
    }
    results.sort(compareEntries);
    return limit > 0 ? results.slice(0, limit) : results;
  }

  /** Exact, case-sensitive lookup. */
  findByName(name: string): IndexEntry[] {
    return [...(this.symbols.get(name) ?? [])].sort(compareEntries);
  }

  /** Indexed occurrences of `name` with the given classification, skipping `excludeUris`. */
  findOccurrences(name: string, scope: IndexedOccurrence['scope'], excludeUris: ReadonlySet<string> = new Set()): Location[] {
    const perFile = this.occurrences.get(name);
    if (!perFile) return [];
    const locations: Location[] = [];
    for (const [uri, list] of perFile) {
      if (excludeUris.has(uri)) continue;
      for (const occurrence of list) {
        if (occurrence.scope === scope) locations.push({ uri, range: occurrence.range });
      }
    }
    return locations.sort(compareLocations);
  }

  getFileEntries(uri: string): IndexEntry[] {
    return [...(this.files.get(uri)?.entries ?? [])];
  }

  hasFile(uri: string): boolean {
    return this.files.has(uri);
  }

  indexedFiles(): string[] {
    return [...this.files.keys()];
  }

  get fileCount(): number {
    return this.files.size;
  }

  get entryCount(): number {
    let count = 0;
    for (const entries of this.symbols.values()) count += entries.length;
    return count;
  }

  isEmpty(): boolean {
    return this.symbols.size === 0;
  }
}
