// src/indexerService.ts
import * as path from "path";
import glob from "fast-glob";
import { FileAnalysis, analyzeFile, scanDeclarationsInText } from "./parser";
import { DwsIndexerSettings, IGNORED_DIRECTORIES } from "./config";
import { ScopeTree, collectIndexDeclarations } from "./scopeBuilder";
import { collectGlobalOccurrences } from "./globalReferences";
import { SymbolIndex, compareEntries } from "./symbolIndex";
import { IndexEntry } from "./types";
import { ProgressSink, pathToUri, setProgress, uriToPath } from "./utils";

export interface IndexerOptions {
  settings: () => DwsIndexerSettings;
  /** Open buffers are authoritative; disk reads never overwrite them. */
  isOpen: (uri: string) => boolean;
  progress?: ProgressSink;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Feeds the workspace index from disk: the background scan of workspace
 * folders, watched-file events and the fallback scan used before the index
 * has any entries.
 */
export class IndexerService {
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly index: SymbolIndex,
    private readonly options: IndexerOptions,
  ) {}

  /**
   * Scans and indexes every source file under the given folders. Runs are
   * queued so a folder added mid-scan is indexed after the current run.
   */
  indexWorkspace(folderUris: string[]): Promise<void> {
    const run = this.queue.then(() => this.runFullIndex(folderUris));
    this.queue = run.catch((error: unknown) => {
      console.error(`[IndexerService] Error during indexing: ${errorMessage(error)}`);
    });
    return run;
  }

  private async runFullIndex(folderUris: string[]): Promise<void> {
    const folders = folderUris.map((uri) => uriToPath(uri)).filter((p): p is string => p !== undefined);
    if (folders.length === 0) {
      console.warn("[IndexerService] No file-system workspace folders to index.");
      return;
    }

    const startTime = Date.now();
    const progressToken = "dws-indexing";
    const sink = this.options.progress;
    let indexed = 0;

    const files = await this.discoverFiles(folders, this.options.settings().maxIndexFiles);
    if (files.length === 0) {
      console.log("[IndexerService] No source files found to index.");
      return;
    }
    console.log(`[IndexerService] Found ${files.length} files to index...`);
    if (sink) setProgress(sink, progressToken, "begin", "Indexing workspace", 0);

    try {
      let currentFile = 0;
      for (const file of files) {
        currentFile++;
        if (sink) {
          const percentage = Math.floor((currentFile / files.length) * 100);
          setProgress(sink, progressToken, "report", `Indexing ${currentFile}/${files.length}`, percentage);
        }
        if (await this.indexFile(file)) indexed++;
      }
    } finally {
      if (sink) setProgress(sink, progressToken, "end", "Indexing complete.");
    }

    const duration = Date.now() - startTime;
    console.log(
      `[IndexerService] Indexed ${indexed} files in ${duration}ms (${this.index.entryCount} symbols across ${this.index.fileCount} files).`,
    );
  }

  /** Source files under `folders`, sorted, capped at `maxFiles`. */
  async discoverFiles(folders: string[], maxFiles: number): Promise<string[]> {
    const settings = this.options.settings();
    const patterns = settings.fileExtensions.map((ext) => `**/*${ext}`);
    const files: string[] = [];

    for (const folder of folders) {
      try {
        const found = await glob(patterns, {
          cwd: folder,
          ignore: IGNORED_DIRECTORIES.map((dir) => `**/${dir}/**`),
          absolute: true,
          onlyFiles: true,
          dot: false,
          deep: settings.maxIndexDepth,
          caseSensitiveMatch: false,
          suppressErrors: true,
        });
        files.push(...found.sort());
      } catch (error) {
        console.error(`[IndexerService] Error finding files in ${folder}: ${errorMessage(error)}`);
      }
      if (files.length >= maxFiles) break;
    }

    if (files.length > maxFiles) {
      console.warn(`[IndexerService] File limit reached, indexing the first ${maxFiles} of ${files.length} files.`);
    }
    return files.slice(0, maxFiles).map((file) => path.normalize(file));
  }

  /**
   * Parses a file from disk and replaces its index contribution. Files that
   * are open, unreadable or do not parse keep their current entries.
   * @returns whether the index was updated.
   */
  async indexFile(filePath: string): Promise<boolean> {
    const uri = pathToUri(filePath);
    if (this.options.isOpen(uri)) return false;

    let analysis: FileAnalysis;
    try {
      analysis = await analyzeFile(filePath);
    } catch (error) {
      console.error(`[IndexerService] Failed to read ${filePath}: ${errorMessage(error)}`);
      return false;
    }
    if (!analysis.scopes) {
      console.warn(`[IndexerService] Skipping ${filePath}: ${analysis.errors[0]?.message ?? "parse failed"}`);
      return false;
    }
    // The document may have been opened while the file was being read.
    if (this.options.isOpen(uri)) return false;

    this.index.indexFile(uri, analysis.declarations, analysis.occurrences);
    return true;
  }

  /** Replaces the index contribution of an open document from its scope tree. */
  indexDocument(uri: string, tree: ScopeTree): void {
    this.index.indexFile(uri, collectIndexDeclarations(tree), collectGlobalOccurrences(tree));
  }

  isSourceFile(filePath: string): boolean {
    const lower = filePath.toLowerCase();
    return this.options.settings().fileExtensions.some((ext) => lower.endsWith(ext.toLowerCase()));
  }

  /** Created or changed on disk. */
  async handleFileChanged(uri: string): Promise<boolean> {
    const filePath = uriToPath(uri);
    if (!filePath || !this.isSourceFile(filePath)) return false;
    return this.indexFile(filePath);
  }

  handleFileDeleted(uri: string): boolean {
    return this.index.removeFile(uri);
  }

  /** Removes indexed files that are not open and no longer have a source extension. */
  pruneNonSourceFiles(): string[] {
    const removed = this.index.indexedFiles().filter((uri) => {
      if (this.options.isOpen(uri)) return false;
      const filePath = uriToPath(uri);
      return filePath === undefined || !this.isSourceFile(filePath);
    });
    removed.forEach((uri) => this.index.removeFile(uri));
    if (removed.length > 0) {
      console.log(`[IndexerService] Removed ${removed.length} files that no longer match the file extensions.`);
    }
    return removed;
  }

  removeFolder(folderUri: string): string[] {
    return this.index.removeFilesUnder(folderUri);
  }

  /**
   * Best-effort symbol search straight from disk, used while the index is
   * still empty. Files that fail to parse are scanned line by line.
   */
  async fallbackSearch(folderUris: string[], query: string, limit: number): Promise<IndexEntry[]> {
    console.warn(`[IndexerService] Symbol index not ready, using fallback search for '${query}'`);
    const folders = folderUris.map((uri) => uriToPath(uri)).filter((p): p is string => p !== undefined);
    const files = await this.discoverFiles(folders, this.options.settings().fallbackMaxFiles);
    const needle = query.toLowerCase();
    const results: IndexEntry[] = [];

    for (const file of files) {
      let analysis: FileAnalysis;
      try {
        analysis = await analyzeFile(file);
      } catch (error) {
        console.warn(`[IndexerService] Fallback search skipped ${file}: ${errorMessage(error)}`);
        continue;
      }
      const uri = pathToUri(file);
      const declarations = analysis.scopes ? analysis.declarations : scanDeclarationsInText(analysis.text);
      for (const declaration of declarations) {
        if (needle === "" || declaration.name.toLowerCase().includes(needle)) {
          results.push({ name: declaration.name, declaration, uri });
        }
      }
    }

    results.sort(compareEntries);
    console.log(`[IndexerService] Fallback search found ${results.length} results from ${files.length} files`);
    return limit > 0 ? results.slice(0, limit) : results;
  }
}
