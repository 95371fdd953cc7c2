import { defaultSettings, resolveSettings } from '../src/config';
import { toLspPosition, toLspRange, uriToPath } from '../src/utils';

describe('Settings', () => {
  test('falls back to defaults for anything that is not an object', () => {
    expect(resolveSettings(undefined)).toEqual(defaultSettings);
    expect(resolveSettings([1, 2])).toEqual(defaultSettings);
  });

  test('keeps well-formed fields and drops the rest', () => {
    expect(
      resolveSettings({ maxWorkspaceSymbols: 20, maxIndexFiles: -1, fileExtensions: ['.dws', 'pas', 3], trace: 'verbose' }),
    ).toEqual({ ...defaultSettings, maxWorkspaceSymbols: 20, fileExtensions: ['.dws'], trace: 'verbose' });
  });
});

describe('Position conversion', () => {
  test('shifts 1-based positions to 0-based', () => {
    expect(toLspRange({ start: { line: 3, column: 5 }, end: { line: 3, column: 12 } })).toEqual({
      start: { line: 2, character: 4 },
      end: { line: 2, character: 11 },
    });
  });

  test('clamps positions before the start of the document', () => {
    expect(toLspPosition({ line: 0, column: 0 })).toEqual({ line: 0, character: 0 });
  });

  test('only file URIs map to paths', () => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(uriToPath('untitled:Untitled-1')).toBeUndefined();
    expect(uriToPath('file:///ws/a.dws')).toBe('/ws/a.dws');
  });
});
