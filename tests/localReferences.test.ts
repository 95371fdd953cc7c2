import { collectGlobalOccurrences } from '../src/globalReferences';
import { findLocalReferences } from '../src/localReferences';
import { resolveSymbol } from '../src/symbolResolver';
import { positionOf, scopesOf, src } from './helpers';

const URI = 'file:///ws/main.dws';

describe('Local reference finder', () => {
  test('same-named locals in sibling functions stay separate', () => {
    const source = src([
      'procedure A;',
      'var x: Integer;',
      'begin',
      '  x := 1;',
      '  PrintLn(x);',
      'end;',
      '',
      'procedure B;',
      'var x: Integer;',
      'begin',
      '  x := 2;',
      'end;',
    ]);
    const tree = scopesOf(source);
    const inA = resolveSymbol(URI, tree, positionOf(source, 'x := 1'));
    const inB = resolveSymbol(URI, tree, positionOf(source, 'x := 2'));
    if (inA?.scopeId === undefined || inB?.scopeId === undefined) throw new Error('expected local symbols');

    expect(findLocalReferences(tree, inA.scopeId, 'x').map((r) => r.start.line)).toEqual([2, 4, 5]);
    expect(findLocalReferences(tree, inB.scopeId, 'x').map((r) => r.start.line)).toEqual([9, 11]);
  });

  test('occurrences bound to a nested redeclaration are excluded', () => {
    const source = src([
      'procedure Outer;',
      'var x: Integer;',
      'begin',
      '  x := 1;',
      '  for var x := 1 to 2 do',
      '    PrintLn(x);',
      '  PrintLn(x);',
      'end;',
    ]);
    const tree = scopesOf(source);
    const outer = resolveSymbol(URI, tree, positionOf(source, 'x := 1'));
    const loop = resolveSymbol(URI, tree, positionOf(source, 'x);'));
    if (outer?.scopeId === undefined || loop?.scopeId === undefined) throw new Error('expected local symbols');

    expect(findLocalReferences(tree, outer.scopeId, 'x').map((r) => r.start.line)).toEqual([2, 4, 7]);
    expect(findLocalReferences(tree, loop.scopeId, 'x').map((r) => r.start.line)).toEqual([5, 6]);
  });

  test('parameters are searched within their routine', () => {
    const source = src([
      'function Inc(value: Integer): Integer;',
      'begin',
      '  Result := value + 1;',
      'end;',
      '',
      'var value := 5;',
    ]);
    const tree = scopesOf(source);
    const param = resolveSymbol(URI, tree, positionOf(source, 'value + 1'));
    if (param?.scopeId === undefined) throw new Error('expected a parameter');

    expect(param.scope).toBe('parameter');
    expect(findLocalReferences(tree, param.scopeId, 'value')).toEqual([
      { start: { line: 1, column: 14 }, end: { line: 1, column: 19 } },
      { start: { line: 3, column: 13 }, end: { line: 3, column: 18 } },
    ]);
  });

  test('a use before an inline declaration belongs to the outer variable', () => {
    const source = src([
      'var x: Integer;',
      '',
      'procedure P;',
      'begin',
      '  x := 1;',
      '  var x := 2;',
      '  PrintLn(x);',
      'end;',
    ]);
    const tree = scopesOf(source);
    const early = resolveSymbol(URI, tree, positionOf(source, 'x := 1'));
    const late = resolveSymbol(URI, tree, positionOf(source, 'x);'));
    if (late?.scopeId === undefined) throw new Error('expected a local symbol');

    expect(early?.scope).toBe('global');
    expect(early?.declarations[0].declaration.selectionRange.start).toEqual({ line: 1, column: 5 });
    expect(findLocalReferences(tree, late.scopeId, 'x').map((r) => r.start.line)).toEqual([6, 7]);
    expect(
      collectGlobalOccurrences(tree)
        .filter((o) => o.name === 'x')
        .map((o) => o.range.start.line),
    ).toEqual([1, 5]);
  });
});
