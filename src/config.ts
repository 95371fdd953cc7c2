export interface DwsIndexerSettings {
  maxProblems: number;
  maxWorkspaceSymbols: number;
  maxIndexFiles: number;
  maxIndexDepth: number;
  fallbackMaxFiles: number;
  fileExtensions: string[];
  trace: 'off' | 'messages' | 'verbose';
}

export const defaultSettings: DwsIndexerSettings = {
  maxProblems: 100,
  maxWorkspaceSymbols: 500,
  maxIndexFiles: 10000,
  maxIndexDepth: 10,
  fallbackMaxFiles: 50,
  fileExtensions: ['.dws', '.pas', '.inc'],
  trace: 'off',
};

export const CONFIG_SECTION = 'dwsIndexer';

/** Directory names skipped by every workspace scan, in addition to hidden ones. */
export const IGNORED_DIRECTORIES: readonly string[] = [
  'node_modules',
  'vendor',
  'bin',
  'obj',
  'dist',
  'build',
  'out',
  '__pycache__',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function positiveInt(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : fallback;
}

/**
 * Merges a client-supplied settings object over the defaults, ignoring
 * fields with the wrong shape.
 */
export function resolveSettings(raw: unknown): DwsIndexerSettings {
  if (!isRecord(raw)) return { ...defaultSettings };

  const extensions = Array.isArray(raw.fileExtensions)
    ? raw.fileExtensions.filter((ext): ext is string => typeof ext === 'string' && ext.startsWith('.'))
    : [];
  const trace = raw.trace === 'messages' || raw.trace === 'verbose' || raw.trace === 'off' ? raw.trace : defaultSettings.trace;

  return {
    maxProblems: positiveInt(raw.maxProblems, defaultSettings.maxProblems),
    maxWorkspaceSymbols: positiveInt(raw.maxWorkspaceSymbols, defaultSettings.maxWorkspaceSymbols),
    maxIndexFiles: positiveInt(raw.maxIndexFiles, defaultSettings.maxIndexFiles),
    maxIndexDepth: positiveInt(raw.maxIndexDepth, defaultSettings.maxIndexDepth),
    fallbackMaxFiles: positiveInt(raw.fallbackMaxFiles, defaultSettings.fallbackMaxFiles),
    fileExtensions: extensions.length > 0 ? extensions : [...defaultSettings.fileExtensions],
    trace,
  };
}
