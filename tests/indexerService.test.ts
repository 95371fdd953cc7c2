import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { defaultSettings } from '../src/config';
import { IndexerService } from '../src/indexerService';
import { LanguageService } from '../src/languageService';
import { SymbolIndex } from '../src/symbolIndex';
import { ProgressValue, pathToUri } from '../src/utils';

function write(root: string, relative: string, text: string): void {
  const file = path.join(root, relative);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, text);
}

describe('IndexerService', () => {
  let root: string;

  beforeAll(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'dws-indexer-'));
    write(root, 'main.dws', 'procedure Main;\nbegin\n  Helper;\nend;\n');
    write(root, 'lib/util.pas', 'procedure Helper;\nbegin\nend;\n');
    write(root, 'broken.dws', 'procedure Broken(;\n');
    write(root, 'node_modules/pkg/skip.dws', 'procedure Skipped;\nbegin\nend;\n');
    write(root, '.hidden/h.dws', 'procedure Hidden;\nbegin\nend;\n');
    write(root, 'notes.txt', 'procedure NotSource;\n');
  });

  afterAll(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function createIndexer(index: SymbolIndex, open: Set<string> = new Set()): IndexerService {
    return new IndexerService(index, { settings: () => defaultSettings, isOpen: (uri) => open.has(uri) });
  }

  test('discovers source files and skips ignored and hidden directories', async () => {
    const files = await createIndexer(new SymbolIndex()).discoverFiles([root], 100);
    expect(files.map((file) => path.relative(root, file).split(path.sep).join('/'))).toEqual([
      'broken.dws',
      'lib/util.pas',
      'main.dws',
    ]);
  });

  test('caps discovery at the file limit', async () => {
    expect(await createIndexer(new SymbolIndex()).discoverFiles([root], 1)).toHaveLength(1);
  });

  test('indexes every parsable file and reports progress', async () => {
    const index = new SymbolIndex();
    const events: ProgressValue[] = [];
    const indexer = new IndexerService(index, {
      settings: () => defaultSettings,
      isOpen: () => false,
      progress: (_token, value) => events.push(value),
    });

    await indexer.indexWorkspace([pathToUri(root)]);

    expect(index.fileCount).toBe(2);
    expect(index.findByName('Helper').map((entry) => entry.uri)).toEqual([pathToUri(path.join(root, 'lib', 'util.pas'))]);
    expect(index.findOccurrences('Helper', 'global').map((l) => l.uri)).toEqual([
      pathToUri(path.join(root, 'lib', 'util.pas')),
      pathToUri(path.join(root, 'main.dws')),
    ]);
    expect(index.findByName('Skipped')).toEqual([]);
    expect(events.map((event) => event.kind)).toEqual(['begin', 'report', 'report', 'report', 'end']);
    expect(events[3]).toEqual({ kind: 'report', message: 'Indexing 3/3', percentage: 100 });
  });

  test('never overwrites an open document from disk', async () => {
    const index = new SymbolIndex();
    const mainUri = pathToUri(path.join(root, 'main.dws'));
    const indexer = createIndexer(index, new Set([mainUri]));

    expect(await indexer.indexFile(path.join(root, 'main.dws'))).toBe(false);
    expect(index.hasFile(mainUri)).toBe(false);
  });

  test('a missing file leaves the index unchanged', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const index = new SymbolIndex();
    expect(await createIndexer(index).indexFile(path.join(root, 'gone.dws'))).toBe(false);
    expect(index.isEmpty()).toBe(true);
  });

  test('ignores change events for files with other extensions', async () => {
    const index = new SymbolIndex();
    expect(await createIndexer(index).handleFileChanged(pathToUri(path.join(root, 'notes.txt')))).toBe(false);
    expect(index.isEmpty()).toBe(true);
  });

  test('fallback search scans unparsable files line by line', async () => {
    const results = await createIndexer(new SymbolIndex()).fallbackSearch([pathToUri(root)], 'broken', 10);

    expect(results).toHaveLength(1);
    expect(results[0].uri).toBe(pathToUri(path.join(root, 'broken.dws')));
    expect(results[0].declaration.selectionRange.start).toEqual({ line: 1, column: 11 });
  });

  test('workspace search falls back to disk before the index has entries', async () => {
    const service = new LanguageService();
    const folder = pathToUri(root);
    const indexing = service.addWorkspaceFolders([folder]);
    // The scan has not reached the index yet when the query arrives.
    const early = await service.searchWorkspaceSymbols('Main');
    await indexing;

    expect(early.map((symbol) => symbol.name)).toEqual(['Main']);
    expect(service.index.fileCount).toBe(2);
  });

  test('closing a workspace document restores its on-disk entries', async () => {
    const service = new LanguageService();
    await service.addWorkspaceFolders([pathToUri(root)]);
    const mainUri = pathToUri(path.join(root, 'main.dws'));

    service.openDocument(mainUri, 'procedure Renamed;\nbegin\nend;\n', 1);
    expect(service.index.getFileEntries(mainUri).map((entry) => entry.name)).toEqual(['Renamed']);

    await service.closeDocument(mainUri);
    expect(service.index.getFileEntries(mainUri).map((entry) => entry.name)).toEqual(['Main']);
  });

  test('a change of file extensions prunes and re-indexes the workspace', async () => {
    const service = new LanguageService();
    await service.addWorkspaceFolders([pathToUri(root)]);
    expect(service.index.fileCount).toBe(2);

    expect(service.updateSettings({ fileExtensions: ['.pas'] })).toBe(true);
    await service.reindexWorkspace();

    expect(service.index.indexedFiles()).toEqual([pathToUri(path.join(root, 'lib/util.pas'))]);
  });

  test('removing a folder drops its files from the index', async () => {
    const service = new LanguageService();
    const folder = pathToUri(root);
    await service.addWorkspaceFolders([folder]);

    service.removeWorkspaceFolders([folder]);
    expect(service.index.isEmpty()).toBe(true);
    expect(service.workspaceFolders).toEqual([]);
  });
});
