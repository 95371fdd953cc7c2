// src/languageService.ts
import { DocumentSymbol, Position as LspPosition } from 'vscode-languageserver';
import { DwsIndexerSettings, defaultSettings, resolveSettings } from './config';
import { DocumentSnapshot, DocumentStore } from './documentStore';
import { buildDocumentSymbols } from './documentSymbols';
import { applyDeclarationPolicy, findGlobalReferences } from './globalReferences';
import { IndexerService } from './indexerService';
import { findLocalReferences } from './localReferences';
import { RenameTransaction, buildRenameTransaction, canRename, renameError, validateNewName } from './rename';
import { ScopeTree } from './scopeBuilder';
import { ParseDiagnostic } from './syntax/parser';
import { SymbolIndex } from './symbolIndex';
import { ResolvedSymbol, resolveSymbol } from './symbolResolver';
import { DeclarationKind, Location, Range, Result, fail, ok } from './types';
import { ProgressSink, fromLspPosition } from './utils';

export interface WorkspaceSymbolResult {
  name: string;
  kind: DeclarationKind;
  location: Location;
  containerName?: string;
}

export interface HoverResult {
  /** Markdown. */
  contents: string;
  range: Range;
}

export interface PrepareRenameResult {
  range: Range;
  placeholder: string;
}

export interface LanguageServiceOptions {
  progress?: ProgressSink;
  settings?: Partial<DwsIndexerSettings>;
}

interface ResolvedTarget {
  tree: ScopeTree;
  symbol: ResolvedSymbol;
}

/**
 * Context for every query: open documents, the workspace index and the disk
 * indexer. The request-dispatch layer owns one instance and passes it around.
 */
export class LanguageService {
  readonly documents = new DocumentStore();
  readonly index = new SymbolIndex();
  readonly indexer: IndexerService;
  private settings: DwsIndexerSettings;
  private folders: string[] = [];

  constructor(options: LanguageServiceOptions = {}) {
    this.settings = { ...defaultSettings, ...options.settings };
    this.indexer = new IndexerService(this.index, {
      settings: () => this.settings,
      isOpen: (uri) => this.documents.has(uri),
      progress: options.progress,
    });
  }

  // --- Configuration & workspace ---

  getSettings(): DwsIndexerSettings {
    return this.settings;
  }

  /** @returns whether the set of indexed file extensions changed. */
  updateSettings(raw: unknown): boolean {
    const previous = this.settings.fileExtensions;
    this.settings = resolveSettings(raw);
    const next = this.settings.fileExtensions;
    return previous.length !== next.length || previous.some((ext, i) => ext !== next[i]);
  }

  get workspaceFolders(): readonly string[] {
    return this.folders;
  }

  /** Registers folders and indexes the new ones in the background. */
  addWorkspaceFolders(uris: string[]): Promise<void> {
    const added = uris.filter((uri) => !this.folders.includes(uri));
    this.folders.push(...added);
    if (added.length === 0) return Promise.resolve();
    return this.indexer.indexWorkspace(added);
  }

  /**
   * Drops indexed files that no longer match the configured extensions and
   * scans every workspace folder again.
   */
  reindexWorkspace(): Promise<void> {
    this.indexer.pruneNonSourceFiles();
    if (this.folders.length === 0) return Promise.resolve();
    return this.indexer.indexWorkspace([...this.folders]);
  }

  removeWorkspaceFolders(uris: string[]): void {
    this.folders = this.folders.filter((uri) => !uris.includes(uri));
    uris.forEach((uri) => this.indexer.removeFolder(uri));
  }

  isInWorkspace(uri: string): boolean {
    return this.folders.some((folder) => uri.startsWith(folder.endsWith('/') ? folder : `${folder}/`));
  }

  // --- Documents ---

  /** Stores the new text and, when it parses, refreshes the file's index contribution. */
  openDocument(uri: string, text: string, version: number): DocumentSnapshot {
    const snapshot = this.documents.set(uri, text, version);
    if (snapshot.scopes) this.indexer.indexDocument(uri, snapshot.scopes);
    return snapshot;
  }

  updateDocument(uri: string, text: string, version: number): DocumentSnapshot {
    return this.openDocument(uri, text, version);
  }

  /**
   * Forgets the buffer and its index entries, then re-indexes the file from
   * disk when it belongs to a workspace folder.
   */
  async closeDocument(uri: string): Promise<void> {
    this.documents.delete(uri);
    this.index.removeFile(uri);
    if (this.isInWorkspace(uri)) {
      await this.indexer.handleFileChanged(uri);
    }
  }

  diagnostics(uri: string): ParseDiagnostic[] {
    const snapshot = this.documents.get(uri);
    return snapshot ? snapshot.diagnostics.slice(0, this.settings.maxProblems) : [];
  }

  // --- Queries ---

  private resolveTarget(uri: string, position: LspPosition): Result<ResolvedTarget> {
    const snapshot = this.documents.get(uri);
    if (!snapshot) return fail(renameError('DocumentNotFound', `Document not found: ${uri}`));
    if (!snapshot.scopes) return fail(renameError('NoAST', 'Document has syntax errors'));

    const symbol = resolveSymbol(uri, snapshot.scopes, fromLspPosition(position), this.index);
    if (!symbol) return fail(renameError('NotASymbol', 'No symbol at this position'));
    return ok({ tree: snapshot.scopes, symbol });
  }

  resolveDefinition(uri: string, position: LspPosition): Location[] {
    const target = this.resolveTarget(uri, position);
    if (!target.ok) return [];
    return target.value.symbol.declarations.map(({ uri: declarationUri, declaration }) => ({
      uri: declarationUri,
      range: declaration.selectionRange,
    }));
  }

  /** Declaration detail of the symbol under the cursor, or undefined when nothing is known about it. */
  hover(uri: string, position: LspPosition): HoverResult | undefined {
    const target = this.resolveTarget(uri, position);
    if (!target.ok) return undefined;
    const { symbol } = target.value;
    const first = symbol.declarations[0];
    if (!first) return undefined;

    const { declaration } = first;
    const parts = ['```dwscript\n' + declaration.detail + '\n```'];
    if (declaration.containerName) parts.push(`in \`${declaration.containerName}\``);
    if (first.uri !== uri) parts.push(`from ${first.uri.slice(first.uri.lastIndexOf('/') + 1)}`);
    if (symbol.declarations.length > 1) parts.push(`${symbol.declarations.length - 1} more declarations`);
    return { contents: parts.join('\n\n'), range: symbol.range };
  }

  private collectReferences(uri: string, { tree, symbol }: ResolvedTarget, includeDeclaration: boolean): Location[] {
    let locations: Location[];
    if ((symbol.scope === 'local' || symbol.scope === 'parameter') && symbol.scopeId !== undefined) {
      locations = findLocalReferences(tree, symbol.scopeId, symbol.name).map((range) => ({ uri, range }));
    } else {
      const scope = symbol.scope === 'member' ? 'member' : 'global';
      locations = findGlobalReferences(symbol.name, scope, this.documents.list(), this.index);
    }

    const first = symbol.declarations[0];
    const declaration = first ? { uri: first.uri, range: first.declaration.selectionRange } : undefined;
    return applyDeclarationPolicy(locations, declaration, includeDeclaration);
  }

  findReferences(uri: string, position: LspPosition, includeDeclaration: boolean): Location[] {
    const target = this.resolveTarget(uri, position);
    if (!target.ok) return [];
    return this.collectReferences(uri, target.value, includeDeclaration);
  }

  prepareRename(uri: string, position: LspPosition): Result<PrepareRenameResult> {
    const target = this.resolveTarget(uri, position);
    if (!target.ok) return target;
    const { symbol } = target.value;
    const allowed = canRename(symbol.name);
    if (!allowed.ok) return allowed;
    return ok({ range: symbol.range, placeholder: symbol.name });
  }

  rename(uri: string, position: LspPosition, newName: string): Result<RenameTransaction> {
    const target = this.resolveTarget(uri, position);
    if (!target.ok) return target;
    const allowed = canRename(target.value.symbol.name);
    if (!allowed.ok) return allowed;
    const valid = validateNewName(newName);
    if (!valid.ok) return valid;

    const locations = this.collectReferences(uri, target.value, true);
    return buildRenameTransaction(locations, newName, (fileUri) => this.documents.get(fileUri)?.version ?? null);
  }

  /**
   * Index search once the index has entries; before that, a bounded scan of
   * the workspace folders on disk.
   */
  async searchWorkspaceSymbols(query: string, limit = this.settings.maxWorkspaceSymbols): Promise<WorkspaceSymbolResult[]> {
    const entries =
      this.index.isEmpty() && this.folders.length > 0
        ? await this.indexer.fallbackSearch(this.folders, query, limit)
        : this.index.search(query, limit);

    return entries.map(({ name, uri, declaration }) => ({
      name,
      kind: declaration.kind,
      location: { uri, range: declaration.selectionRange },
      containerName: declaration.containerName,
    }));
  }

  documentSymbols(uri: string): DocumentSymbol[] {
    const scopes = this.documents.get(uri)?.scopes;
    return scopes ? buildDocumentSymbols(scopes) : [];
  }
}
