import { GLOBAL_SCOPE, collectIndexDeclarations, findMember, lookup } from '../src/scopeBuilder';
import { positionOf, scopesOf, src } from './helpers';

const SHADOWING = src([
  'var x: Integer;',
  '',
  'procedure Test;',
  'var x: String;',
  'begin',
  "  x := 'a';",
  '  begin',
  '    var x := 3;',
  '    PrintLn(x);',
  '  end;',
  'end;',
  '',
  'x := 1;',
]);

describe('Scope tree builder', () => {
  test('nests Global, Function and Block scopes', () => {
    const tree = scopesOf(SHADOWING);

    expect(tree.scopes.map((s) => s.kind)).toEqual(['Global', 'Function', 'Block']);
    expect(tree.scopes[1].parent).toBe(GLOBAL_SCOPE);
    expect(tree.scopes[2].parent).toBe(1);
    expect(tree.scopes[0].children).toEqual([1]);
    expect([...tree.scopes[0].declarations.keys()]).toEqual(['x', 'Test']);
    expect(tree.scopes[1].declarations.get('x')?.detail).toBe('var x: String');
    expect(tree.scopes[2].declarations.get('x')?.selectionRange.start).toEqual({ line: 8, column: 9 });
  });

  test('tags each occurrence with its innermost scope', () => {
    const tree = scopesOf(SHADOWING);
    const xs = tree.references.filter((r) => r.name === 'x').map((r) => [r.range.start.line, r.scope, r.declaration !== undefined]);

    expect(xs).toEqual([
      [1, 0, true],
      [4, 1, true],
      [6, 1, false],
      [8, 2, true],
      [9, 2, false],
      [13, 0, false],
    ]);
  });

  test('inner declarations shadow outer ones without removing them', () => {
    const tree = scopesOf(SHADOWING);

    expect(lookup(tree, 2, 'x')).toMatchObject({ source: 'scope', scopeId: 2 });
    expect(lookup(tree, 1, 'x')).toMatchObject({ source: 'scope', scopeId: 1 });
    expect(lookup(tree, 0, 'x')).toMatchObject({ source: 'scope', scopeId: 0 });
    expect(lookup(tree, 2, 'Missing')).toBeUndefined();
  });

  test('a repeated declaration in one scope replaces the earlier one', () => {
    const tree = scopesOf(src(['var a: Integer;', 'var a: String;']));
    expect(tree.scopes[0].declarations.get('a')?.selectionRange.start.line).toBe(2);
  });

  test('method implementations see class and ancestor members', () => {
    const source = src([
      'type',
      '  TBase = class',
      '    FId: Integer;',
      '  end;',
      '  TChild = class(TBase)',
      '    procedure Show;',
      '  end;',
      '',
      'procedure TChild.Show;',
      'begin',
      '  PrintLn(FId);',
      'end;',
    ]);
    const tree = scopesOf(source);
    const use = tree.references.find((r) => r.name === 'FId' && r.declaration === undefined);

    expect(findMember(tree, 'TChild', 'FId')?.className).toBe('TBase');
    expect(use && lookup(tree, use.scope, 'FId')).toMatchObject({ source: 'member', className: 'TBase' });
    expect(tree.scopes[1].ownerClass).toBe('TChild');
  });

  test('collects global declarations and members for the index', () => {
    const source = src([
      'type',
      '  TPoint = record',
      '    X: Integer;',
      '  end;',
      '',
      'function Make: TPoint;',
      'var p: TPoint;',
      'begin',
      '  Result := p;',
      'end;',
    ]);
    const declarations = collectIndexDeclarations(scopesOf(source));

    expect(declarations.map((d) => [d.name, d.kind, d.containerName])).toEqual([
      ['TPoint', 'record', undefined],
      ['X', 'field', 'TPoint'],
      ['Make', 'function', undefined],
    ]);
    expect(positionOf(source, 'Make')).toEqual(declarations[2].selectionRange.start);
  });

  test('lookup from a position skips locals declared further down', () => {
    const source = src(['var x: Integer;', '', 'procedure P;', 'begin', '  x := 1;', '  var x := 2;', 'end;']);
    const tree = scopesOf(source);

    expect(lookup(tree, 1, 'x', { line: 5, column: 3 })).toMatchObject({ source: 'scope', scopeId: 0 });
    expect(lookup(tree, 1, 'x', { line: 7, column: 1 })).toMatchObject({ source: 'scope', scopeId: 1 });
  });

  test('lambda parameters live in their own Function scope', () => {
    const source = src(['var x := 1;', 'var f := lambda(x: Integer) => x + 1;', 'PrintLn(x);']);
    const tree = scopesOf(source);
    const xs = tree.references.filter((r) => r.name === 'x').map((r) => [r.range.start.line, r.scope, r.declaration !== undefined]);

    expect(tree.scopes.map((s) => s.kind)).toEqual(['Global', 'Function']);
    expect(xs).toEqual([
      [1, 0, true],
      [2, 1, true],
      [2, 1, false],
      [3, 0, false],
    ]);
  });

  test('case and with bodies are walked', () => {
    const source = src([
      'procedure P(n: Integer);',
      'begin',
      '  case n of',
      '    1: PrintLn(n);',
      '  else',
      '    var m := n;',
      '  end;',
      '  with Origin do PrintLn(n);',
      'end;',
    ]);
    const tree = scopesOf(source);

    expect(tree.scopes.map((s) => s.kind)).toEqual(['Global', 'Function', 'Block']);
    expect(tree.scopes[2].declarations.has('m')).toBe(true);
    expect(tree.references.filter((r) => r.name === 'n')).toHaveLength(5);
    expect(tree.references.some((r) => r.name === 'Origin' && r.scope === 1)).toBe(true);
  });
});
