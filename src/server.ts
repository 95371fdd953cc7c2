#!/usr/bin/env node

import {
  createConnection,
  ProposedFeatures,
  InitializeParams,
  DidChangeConfigurationNotification,
  DidChangeWatchedFilesNotification,
  Disposable,
  Hover,
  MarkupKind,
  TextDocumentSyncKind,
  WorkDoneProgressCreateRequest,
  InitializeResult,
  Location as LspLocation,
  Diagnostic,
  DiagnosticSeverity,
  FileChangeType,
  ResponseError,
  ErrorCodes,
  SymbolInformation,
  TextDocuments,
} from "vscode-languageserver/node";
import { TextDocument } from "vscode-languageserver-textdocument";

import { CONFIG_SECTION } from "./config";
import { LanguageService } from "./languageService";
import { toWorkspaceEdit } from "./rename";
import { RenameError } from "./types";
import { ProgressSink, createProgressChannel, toLspLocation, toLspRange, toSymbolKind, traceLine } from "./utils";

const connection = createConnection(ProposedFeatures.all);
const documents: TextDocuments<TextDocument> = new TextDocuments(TextDocument);

let hasConfigurationCapability = false;
let hasWorkspaceFolderCapability = false;
let hasProgressCapability = false;
let hasWatchedFilesCapability = false;
let initialFolders: string[] = [];
let watcherRegistration: Disposable | undefined;

const progress = createProgressChannel(
  (token) => connection.sendRequest(WorkDoneProgressCreateRequest.type, { token }),
  (token, value) => connection.sendNotification("$/progress", { token, value }),
);

const sendProgress: ProgressSink = (token, value) => {
  if (hasProgressCapability) progress.send(token, value);
};

const service = new LanguageService({ progress: sendProgress });

function trace(message: string, detail?: string): void {
  const line = traceLine(service.getSettings().trace, message, detail);
  if (line) console.log(`[Server] ${line}`);
}

function toResponseError(error: RenameError): ResponseError<void> {
  return new ResponseError(ErrorCodes.InvalidRequest, error.message);
}

function publishDiagnostics(uri: string): void {
  const diagnostics: Diagnostic[] = service.diagnostics(uri).map((problem) => ({
    range: toLspRange(problem.range),
    message: problem.message,
    severity: DiagnosticSeverity.Error,
    source: "dwscript",
  }));
  void connection.sendDiagnostics({ uri, diagnostics });
}

/**
 * Handles the LSP initialize request: records client capabilities and the
 * workspace folders, and advertises the server's providers.
 */
connection.onInitialize((params: InitializeParams) => {
  const capabilities = params.capabilities;

  hasConfigurationCapability = !!capabilities.workspace?.configuration;
  hasWorkspaceFolderCapability = !!capabilities.workspace?.workspaceFolders;
  hasProgressCapability = !!capabilities.window?.workDoneProgress;
  hasWatchedFilesCapability = !!capabilities.workspace?.didChangeWatchedFiles?.dynamicRegistration;

  if (params.workspaceFolders && params.workspaceFolders.length > 0) {
    initialFolders = params.workspaceFolders.map((folder) => folder.uri);
    console.log(`[Server] Using workspace folders: ${initialFolders.join(", ")}`);
  } else if (params.rootUri) {
    initialFolders = [params.rootUri];
    console.log(`[Server] Using legacy rootUri: ${params.rootUri}`);
  } else {
    console.warn("[Server] No workspace root provided by client. Workspace indexing disabled.");
  }

  if (params.initializationOptions) {
    service.updateSettings(params.initializationOptions);
  }

  const result: InitializeResult = {
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Incremental,
      definitionProvider: true,
      referencesProvider: true,
      renameProvider: { prepareProvider: true },
      hoverProvider: true,
      workspaceSymbolProvider: true,
      documentSymbolProvider: true,
    },
  };

  if (hasWorkspaceFolderCapability) {
    result.capabilities.workspace = {
      workspaceFolders: {
        supported: true,
        changeNotifications: true,
      },
    };
  }
  console.log("[Server] onInitialize complete.");
  return result;
});

async function registerFileWatcher(): Promise<void> {
  if (!hasWatchedFilesCapability) return;
  watcherRegistration?.dispose();
  const globPattern = `**/*{${service.getSettings().fileExtensions.join(",")}}`;
  watcherRegistration = await connection.client.register(DidChangeWatchedFilesNotification.type, {
    watchers: [{ globPattern }],
  });
}

/** Applies new settings; a change of file extensions re-registers the watcher and re-indexes. */
function applySettings(raw: unknown): void {
  if (!service.updateSettings(raw)) return;
  console.log(`[Server] File extensions changed to ${service.getSettings().fileExtensions.join(", ")}`);
  registerFileWatcher().catch((error: unknown) =>
    console.error(`[Server] Could not register file watcher: ${String(error)}`),
  );
  service
    .reindexWorkspace()
    .catch((error: unknown) => console.error(`[Server] Error re-indexing workspace: ${String(error)}`));
}

async function loadConfiguration(): Promise<void> {
  if (!hasConfigurationCapability) return;
  const settings: unknown = await connection.workspace.getConfiguration(CONFIG_SECTION);
  applySettings(settings);
}

/**
 * Registers for configuration, folder and file-watch notifications, then
 * starts the background workspace index.
 */
connection.onInitialized(() => {
  if (hasConfigurationCapability) {
    void connection.client.register(DidChangeConfigurationNotification.type, { section: CONFIG_SECTION });
  }
  registerFileWatcher().catch((error: unknown) =>
    console.error(`[Server] Could not register file watcher: ${String(error)}`),
  );
  if (hasWorkspaceFolderCapability) {
    connection.workspace.onDidChangeWorkspaceFolders((event) => {
      const removed = event.removed.map((folder) => folder.uri);
      const added = event.added.map((folder) => folder.uri);
      console.log(`[Server] Workspace folders changed: +${added.length} -${removed.length}`);
      service.removeWorkspaceFolders(removed);
      service
        .addWorkspaceFolders(added)
        .catch((error: unknown) => console.error(`[Server] Error indexing added folders: ${String(error)}`));
    });
  }

  const initStartTime = Date.now();
  loadConfiguration()
    .catch((error: unknown) => console.error(`[Server] Could not load configuration: ${String(error)}`))
    .then(() => service.addWorkspaceFolders(initialFolders))
    .then(() => {
      console.log(`[Server] Workspace indexed in ${Date.now() - initStartTime}ms.`);
    })
    .catch((error: unknown) => {
      console.error(`[Server] Error during initial indexing: ${String(error)}`);
    });
  console.log("[Server] DWScript language server initialized.");
});

connection.onDidChangeConfiguration((change) => {
  if (hasConfigurationCapability) {
    loadConfiguration().catch((error: unknown) =>
      console.error(`[Server] Could not load configuration: ${String(error)}`),
    );
  } else {
    const settings: unknown = change.settings;
    applySettings(settings && typeof settings === "object" && CONFIG_SECTION in settings ? settings[CONFIG_SECTION] : undefined);
  }
  documents.all().forEach((document) => publishDiagnostics(document.uri));
});

// --- Requests ---

connection.onDefinition((params): LspLocation[] | null => {
  trace("definition", `${params.textDocument.uri} ${params.position.line}:${params.position.character}`);
  const results = service.resolveDefinition(params.textDocument.uri, params.position);
  return results.length > 0 ? results.map(toLspLocation) : null;
});

connection.onReferences((params): LspLocation[] => {
  trace("references", `${params.textDocument.uri} ${params.position.line}:${params.position.character}`);
  const results = service.findReferences(params.textDocument.uri, params.position, params.context.includeDeclaration);
  trace("references", `found ${results.length}`);
  return results.map(toLspLocation);
});

connection.onHover((params): Hover | null => {
  trace("hover", `${params.textDocument.uri} ${params.position.line}:${params.position.character}`);
  const result = service.hover(params.textDocument.uri, params.position);
  if (!result) return null;
  return { contents: { kind: MarkupKind.Markdown, value: result.contents }, range: toLspRange(result.range) };
});

connection.onPrepareRename((params) => {
  trace("prepareRename", `${params.textDocument.uri} ${params.position.line}:${params.position.character}`);
  const result = service.prepareRename(params.textDocument.uri, params.position);
  if (!result.ok) return toResponseError(result.error);
  return { range: toLspRange(result.value.range), placeholder: result.value.placeholder };
});

connection.onRenameRequest((params) => {
  trace("rename", `${params.textDocument.uri} -> ${params.newName}`);
  const result = service.rename(params.textDocument.uri, params.position, params.newName);
  if (!result.ok) return toResponseError(result.error);
  console.log(`[Server] Renaming to '${params.newName}' across ${result.value.edits.size} files.`);
  return toWorkspaceEdit(result.value);
});

connection.onWorkspaceSymbol(async (params): Promise<SymbolInformation[]> => {
  trace("workspaceSymbol", `'${params.query}'`);
  const results = await service.searchWorkspaceSymbols(params.query);
  return results.map((symbol) =>
    SymbolInformation.create(
      symbol.name,
      toSymbolKind(symbol.kind),
      toLspRange(symbol.location.range),
      symbol.location.uri,
      symbol.containerName,
    ),
  );
});

connection.onDocumentSymbol((params) => service.documentSymbols(params.textDocument.uri));

// --- Document Synchronization ---

documents.onDidOpen((event) => {
  service.openDocument(event.document.uri, event.document.getText(), event.document.version);
  publishDiagnostics(event.document.uri);
});

documents.onDidChangeContent((event) => {
  service.updateDocument(event.document.uri, event.document.getText(), event.document.version);
  publishDiagnostics(event.document.uri);
});

documents.onDidClose((event) => {
  const uri = event.document.uri;
  void connection.sendDiagnostics({ uri, diagnostics: [] });
  service
    .closeDocument(uri)
    .catch((error: unknown) => console.error(`[Server] Error re-indexing closed document ${uri}: ${String(error)}`));
});

connection.onDidChangeWatchedFiles((params) => {
  for (const change of params.changes) {
    if (change.type === FileChangeType.Deleted) {
      service.indexer.handleFileDeleted(change.uri);
      continue;
    }
    if (service.documents.has(change.uri)) continue;
    service.indexer
      .handleFileChanged(change.uri)
      .catch((error: unknown) => console.error(`[Server] Error re-indexing ${change.uri}: ${String(error)}`));
  }
});

documents.listen(connection);
connection.listen();
console.log("[Server] DWScript language server connection listener started.");
