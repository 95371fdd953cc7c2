import { isReservedWord, tokenize } from '../src/syntax/lexer';
import { parse } from '../src/syntax/parser';
import { src } from './helpers';

describe('Lexer', () => {
  test('produces keywords, operators, numbers and strings with 1-based positions', () => {
    const tokens = tokenize("Begin x := $FF; // note\n'it''s'");
    expect(tokens.map((t) => [t.type, t.text, t.line, t.col])).toEqual([
      ['keyword', 'Begin', 1, 1],
      ['identifier', 'x', 1, 7],
      ['op', ':=', 1, 9],
      ['number', '$FF', 1, 12],
      ['semicolon', ';', 1, 15],
      ['string', "'it''s'", 2, 1],
      ['eof', '', 2, 8],
    ]);
    expect(tokens[0].value).toBe('begin');
  });

  test('skips brace and paren-star comments', () => {
    expect(tokenize('a { skip } (* skip *) b').map((t) => t.text)).toEqual(['a', 'b', '']);
  });

  test('matches reserved words case-insensitively', () => {
    expect(isReservedWord('BEGIN')).toBe(true);
    expect(isReservedWord('PrintLn')).toBe(false);
  });
});

describe('Parser', () => {
  test('parses a program with types, routines and a main block', () => {
    const source = src([
      'program Demo;',
      '',
      'type',
      '  TShape = class(TObject)',
      '    FName: String;',
      '    function Area: Float; virtual;',
      '    property Name: String read FName write FName;',
      '  end;',
      '  TColor = (Red, Green);',
      '',
      'const Pi2 = 6.28;',
      '',
      'function Double(x: Integer): Integer;',
      'begin',
      '  Result := x * 2;',
      'end;',
      '',
      'var total: Integer;',
      '',
      'begin',
      '  for var i := 1 to 3 do',
      '    total += Double(i);',
      '  if total > 10 then',
      "    PrintLn('big')",
      '  else',
      "    PrintLn('small');",
      'end.',
    ]);
    const { program, errors } = parse(source);

    expect(errors).toEqual([]);
    expect(program?.statements.map((s) => s.kind)).toEqual([
      'ClassDecl',
      'EnumDecl',
      'ConstDecl',
      'FunctionDecl',
      'VarDecl',
      'Block',
    ]);

    const shape = program?.statements[0];
    if (shape?.kind !== 'ClassDecl') throw new Error('expected class');
    expect(shape.parent?.name).toBe('TObject');
    expect(shape.fields.map((f) => f.name.name)).toEqual(['FName']);
    expect(shape.methods[0].name.name).toBe('Area');
    expect(shape.methods[0].directives).toEqual(['virtual']);
    expect(shape.methods[0].body).toBeUndefined();
    expect(shape.properties[0].readSpec?.name).toBe('FName');
    expect(shape.properties[0].writeSpec?.name).toBe('FName');

    const color = program?.statements[1];
    if (color?.kind !== 'EnumDecl') throw new Error('expected enum');
    expect(color.members.map((m) => m.name.name)).toEqual(['Red', 'Green']);

    const double = program?.statements[3];
    if (double?.kind !== 'FunctionDecl') throw new Error('expected function');
    expect(double.params[0].name.name).toBe('x');
    expect(double.returnType?.name.name).toBe('Integer');
    expect(double.body?.statements).toHaveLength(1);
    expect(double.pos).toEqual({ line: 13, column: 1 });
    expect(double.end).toEqual({ line: 16, column: 4 });

    const main = program?.statements[5];
    if (main?.kind !== 'Block') throw new Error('expected block');
    const [loop, branch] = main.statements;
    if (loop.kind !== 'For') throw new Error('expected for');
    expect(loop.declaresVariable).toBe(true);
    expect(loop.direction).toBe('to');
    expect(branch.kind).toBe('If');
  });

  test('parses a unit with interface and implementation sections', () => {
    const source = src([
      'unit Shapes;',
      '',
      'interface',
      '',
      'function Area(w, h: Float): Float;',
      '',
      'implementation',
      '',
      'function Area(w, h: Float): Float;',
      'begin',
      '  Result := w * h;',
      'end;',
      '',
      'end.',
    ]);
    const { program, errors } = parse(source);

    expect(errors).toEqual([]);
    const routines = program?.statements ?? [];
    expect(routines.map((s) => s.kind)).toEqual(['FunctionDecl', 'FunctionDecl']);
    const [header, implementation] = routines;
    if (header.kind !== 'FunctionDecl' || implementation.kind !== 'FunctionDecl') throw new Error('expected functions');
    expect(header.body).toBeUndefined();
    expect(implementation.body).toBeDefined();
    expect(implementation.params.map((p) => p.name.name)).toEqual(['w', 'h']);
  });

  test('parses loops, exception handlers and exits', () => {
    const source = src([
      'procedure Run(list: array of Integer);',
      'var n: Integer;',
      'begin',
      '  n := 0;',
      '  repeat',
      '    n := n + 1;',
      '  until n >= 3;',
      '  while n > 0 do n -= 1;',
      '  try',
      '    list[0] := Length(list);',
      '  except',
      '    on E: Exception do PrintLn(E.Message);',
      '  end;',
      '  exit;',
      'end;',
    ]);
    const { program, errors } = parse(source);

    expect(errors).toEqual([]);
    const run = program?.statements[0];
    if (run?.kind !== 'FunctionDecl') throw new Error('expected procedure');
    expect(run.params[0].type?.isArray).toBe(true);
    expect(run.locals.map((s) => s.kind)).toEqual(['VarDecl']);
    expect(run.body?.statements.map((s) => s.kind)).toEqual(['Assignment', 'Repeat', 'While', 'Try', 'Jump']);

    const handler = run.body?.statements[3];
    if (handler?.kind !== 'Try') throw new Error('expected try');
    expect(handler.handler).toBe('except');
    expect(handler.handlerStatements.map((s) => s.kind)).toEqual(['Block']);
  });

  test('reports a syntax error without a program', () => {
    expect(parse('var x: ;')).toEqual({
      errors: [
        {
          message: "Expected identifier but found ';'",
          range: { start: { line: 1, column: 8 }, end: { line: 1, column: 9 } },
        },
      ],
    });
  });

  test('reports an unexpected character', () => {
    const { program, errors } = parse('x := 1 # 2;');
    expect(program).toBeUndefined();
    expect(errors).toEqual([
      {
        message: "Unexpected character '#'",
        range: { start: { line: 1, column: 8 }, end: { line: 1, column: 9 } },
      },
    ]);
  });

  test('parses case statements with lists, ranges and else', () => {
    const source = src([
      'procedure Grade(n: Integer);',
      'begin',
      '  case n of',
      "    1, 2: PrintLn('low');",
      "    3..5: PrintLn('mid');",
      '  else',
      "    PrintLn('high');",
      '  end;',
      'end;',
    ]);
    const { program, errors } = parse(source);

    expect(errors).toEqual([]);
    const grade = program?.statements[0];
    if (grade?.kind !== 'FunctionDecl') throw new Error('expected procedure');
    const statement = grade.body?.statements[0];
    if (statement?.kind !== 'Case') throw new Error('expected case');
    expect(statement.branches.map((b) => b.values.length)).toEqual([2, 1]);
    expect(statement.branches[1].values[0]).toMatchObject({ kind: 'Binary', operator: '..' });
    expect(statement.elseStatements?.map((s) => s.kind)).toEqual(['ExpressionStatement']);
  });

  test('parses with statements', () => {
    const { program, errors } = parse(src(['with Shape, Pen do', '  Draw;']));

    expect(errors).toEqual([]);
    const statement = program?.statements[0];
    if (statement?.kind !== 'With') throw new Error('expected with');
    expect(statement.objects.map((o) => o.kind)).toEqual(['Identifier', 'Identifier']);
    expect(statement.body.kind).toBe('ExpressionStatement');
  });

  test('parses class var, const and class property members', () => {
    const source = src([
      'type',
      '  TCounter = class',
      '    class var Count: Integer;',
      '    const Limit = 10;',
      '    class property Total: Integer read Count;',
      '  end;',
    ]);
    const { program, errors } = parse(source);

    expect(errors).toEqual([]);
    const counter = program?.statements[0];
    if (counter?.kind !== 'ClassDecl') throw new Error('expected class');
    expect(counter.fields.map((f) => f.name.name)).toEqual(['Count', 'Limit']);
    expect(counter.properties.map((p) => p.name.name)).toEqual(['Total']);
  });

  test('parses lambdas and anonymous functions', () => {
    const source = src([
      'var twice := lambda(x: Integer): Integer => x * 2;',
      'var show := lambda(s: String) begin PrintLn(s); end;',
      'var add := function(a, b: Integer): Integer begin Result := a + b; end;',
    ]);
    const { program, errors } = parse(source);

    expect(errors).toEqual([]);
    const lambdas = (program?.statements ?? []).map((statement) =>
      statement.kind === 'VarDecl' && statement.init?.kind === 'Lambda' ? statement.init : undefined,
    );
    expect(lambdas.map((l) => l?.params.map((p) => p.name.name))).toEqual([['x'], ['s'], ['a', 'b']]);
    expect(lambdas.map((l) => l?.body.kind)).toEqual(['Binary', 'Block', 'Block']);
    expect(lambdas[0]?.returnType?.name.name).toBe('Integer');
  });
});
