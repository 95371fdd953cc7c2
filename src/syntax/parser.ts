import { Position, Range } from '../types';
import {
  ArrayLiteral,
  Block,
  Case,
  CaseBranch,
  ClassDecl,
  ConstDecl,
  EnumDecl,
  EnumMember,
  Expression,
  FieldDecl,
  For,
  FunctionDecl,
  Identifier,
  Jump,
  Lambda,
  Param,
  Program,
  PropertyDecl,
  RecordDecl,
  RoutineKind,
  Statement,
  Try,
  TypeAlias,
  TypeRef,
  UsesClause,
  VarDecl,
  With,
} from './ast';
import { Token, TokenType, tokenize } from './lexer';

export interface ParseDiagnostic {
  message: string;
  range: Range;
}

export interface ParseResult {
  /** Absent when the source has a syntax error. */
  program?: Program;
  errors: ParseDiagnostic[];
}

export class ParseError extends Error {
  constructor(message: string, readonly range: Range) {
    super(message);
    this.name = 'ParseError';
  }
}

const ROUTINE_KEYWORDS: ReadonlySet<string> = new Set(['function', 'procedure', 'constructor', 'destructor', 'method']);
const ROUTINE_DIRECTIVES: ReadonlySet<string> = new Set([
  'forward', 'overload', 'override', 'virtual', 'abstract', 'static', 'external',
  'reintroduce', 'inline', 'deprecated', 'final', 'empty', 'default',
]);
const BODYLESS_DIRECTIVES: ReadonlySet<string> = new Set(['forward', 'external', 'abstract']);
const VISIBILITY_WORDS: ReadonlySet<string> = new Set(['private', 'protected', 'public', 'published']);
const SECTION_WORDS: ReadonlySet<string> = new Set(['initialization', 'finalization']);
const HANDLER_WORDS: ReadonlySet<string> = new Set(['on']);
const DEFAULT_WORDS: ReadonlySet<string> = new Set(['default']);
const LAZY_WORDS: ReadonlySet<string> = new Set(['lazy']);
const LAMBDA_WORDS: ReadonlySet<string> = new Set(['lambda']);
const ASSIGN_OPERATORS: ReadonlySet<string> = new Set([':=', '+=', '-=', '*=', '/=']);
const RELATIONAL_OPERATORS: ReadonlySet<string> = new Set(['=', '<>', '<', '<=', '>', '>=']);

type Terminator = () => boolean;

function toRoutineKind(value: string): RoutineKind {
  switch (value) {
    case 'function':
    case 'procedure':
    case 'constructor':
    case 'destructor':
    case 'method':
      return value;
    default:
      throw new Error(`Not a routine keyword: ${value}`);
  }
}

function toJumpKeyword(value: string): Jump['keyword'] {
  switch (value) {
    case 'exit':
    case 'break':
    case 'continue':
    case 'raise':
      return value;
    default:
      throw new Error(`Not a jump keyword: ${value}`);
  }
}

interface ParsedItem {
  statements: Statement[];
  /** Plain statements must be followed by ';' unless the list ends. */
  needsSeparator: boolean;
}

class Parser {
  private index = 0;
  private previous: Token;
  private inInterfaceSection = false;

  constructor(private readonly tokens: Token[]) {
    this.previous = tokens[0];
  }

  parseProgram(): Program {
    const start = this.position(this.peek());

    if (this.isKeyword('program') || this.isKeyword('unit')) {
      this.next();
      this.identifier();
      this.expect('semicolon', "';'");
    }

    const statements = this.parseItems(
      () => this.isType('eof') || this.isType('dot') || (this.isKeyword('end') && this.isType('dot', 1)),
      true,
    );

    if (this.isKeyword('end')) this.next();
    if (this.isType('dot')) this.next();

    return { kind: 'Program', statements, pos: start, end: this.position(this.tokens[this.tokens.length - 1]) };
  }

  // --- Token helpers ---

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.index + offset, this.tokens.length - 1)];
  }

  private next(): Token {
    const token = this.peek();
    if (token.type === 'error') {
      throw new ParseError(`Unexpected character '${token.text}'`, this.tokenRange(token));
    }
    if (this.index < this.tokens.length - 1) this.index++;
    this.previous = token;
    return token;
  }

  private isType(type: TokenType, offset = 0): boolean {
    return this.peek(offset).type === type;
  }

  private isKeyword(value: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.type === 'keyword' && token.value === value;
  }

  private isOp(text: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.type === 'op' && token.text === text;
  }

  private isWord(words: ReadonlySet<string>, offset = 0): boolean {
    const token = this.peek(offset);
    return token.type === 'identifier' && words.has(token.text.toLowerCase());
  }

  private isRoutineStart(): boolean {
    const token = this.peek();
    if (token.type !== 'keyword') return false;
    if (ROUTINE_KEYWORDS.has(token.value)) return true;
    return token.value === 'class' && this.peek(1).type === 'keyword' && ROUTINE_KEYWORDS.has(this.peek(1).value);
  }

  private expect(type: TokenType, description: string): Token {
    if (!this.isType(type)) this.fail(`Expected ${description}`);
    return this.next();
  }

  private expectKeyword(value: string): Token {
    if (!this.isKeyword(value)) this.fail(`Expected '${value}'`);
    return this.next();
  }

  private expectOp(text: string): Token {
    if (!this.isOp(text)) this.fail(`Expected '${text}'`);
    return this.next();
  }

  private fail(message: string): never {
    const token = this.peek();
    if (token.type === 'error') {
      throw new ParseError(`Unexpected character '${token.text}'`, this.tokenRange(token));
    }
    const found = token.type === 'eof' ? 'end of file' : `'${token.text}'`;
    throw new ParseError(`${message} but found ${found}`, this.tokenRange(token));
  }

  private position(token: Token): Position {
    return { line: token.line, column: token.col };
  }

  private tokenEnd(token: Token): Position {
    return { line: token.line, column: token.col + token.text.length };
  }

  private tokenRange(token: Token): Range {
    return { start: this.position(token), end: this.tokenEnd(token) };
  }

  private lastEnd(): Position {
    return this.tokenEnd(this.previous);
  }

  private identifier(): Identifier {
    if (!this.isType('identifier')) this.fail('Expected identifier');
    return this.identifierFrom(this.next());
  }

  /** Member names after '.' may collide with reserved words (`.Class`, `.Create`). */
  private memberName(): Identifier {
    if (!this.isType('identifier') && !this.isType('keyword')) this.fail('Expected member name');
    return this.identifierFrom(this.next());
  }

  private identifierFrom(token: Token): Identifier {
    return { kind: 'Identifier', name: token.text, pos: this.position(token), end: this.tokenEnd(token) };
  }

  private identifierList(): Identifier[] {
    const names = [this.identifier()];
    while (this.isType('comma')) {
      this.next();
      names.push(this.identifier());
    }
    return names;
  }

  // --- Item lists ---

  private parseItems(atEnd: Terminator, sectionMode: boolean): Statement[] {
    const statements: Statement[] = [];
    for (;;) {
      while (this.isType('semicolon')) this.next();
      if (atEnd()) break;

      const item = this.parseItem(sectionMode);
      statements.push(...item.statements);
      if (!item.needsSeparator) continue;

      if (this.isType('semicolon')) {
        this.next();
        continue;
      }
      if (atEnd()) break;
      this.fail("Expected ';'");
    }
    return statements;
  }

  private parseItem(sectionMode: boolean): ParsedItem {
    if (sectionMode) {
      if (this.isKeyword('interface')) {
        this.next();
        this.inInterfaceSection = true;
        return { statements: [], needsSeparator: false };
      }
      if (this.isKeyword('implementation')) {
        this.next();
        this.inInterfaceSection = false;
        return { statements: [], needsSeparator: false };
      }
      if (this.isWord(SECTION_WORDS) && !this.isOp(':=', 1)) {
        this.next();
        return { statements: [], needsSeparator: false };
      }
    }

    if (this.isKeyword('uses')) return { statements: [this.parseUses()], needsSeparator: false };
    if (this.isKeyword('type')) return { statements: this.parseTypeSection(), needsSeparator: false };
    if (this.isRoutineStart()) return { statements: [this.parseRoutine(false)], needsSeparator: false };

    if (this.isKeyword('var')) {
      if (sectionMode) return { statements: this.parseVarSection(), needsSeparator: false };
      this.next();
      return { statements: [this.parseVarDecl()], needsSeparator: true };
    }
    if (this.isKeyword('const')) {
      if (sectionMode) return { statements: this.parseConstSection(), needsSeparator: false };
      this.next();
      return { statements: [this.parseConstDecl()], needsSeparator: true };
    }

    return { statements: [this.parseStatement()], needsSeparator: true };
  }

  // --- Declarations ---

  private parseUses(): UsesClause {
    const start = this.position(this.expectKeyword('uses'));
    const units = this.identifierList();
    const end = this.lastEnd();
    this.expect('semicolon', "';'");
    return { kind: 'UsesClause', units, pos: start, end };
  }

  private startsVarDecl(): boolean {
    return this.isType('identifier') && (this.isType('comma', 1) || this.isType('colon', 1));
  }

  private parseVarSection(): VarDecl[] {
    this.expectKeyword('var');
    const decls: VarDecl[] = [];
    do {
      decls.push(this.parseVarDecl());
      this.expect('semicolon', "';'");
    } while (this.startsVarDecl());
    return decls;
  }

  /** `a, b: T`, `x := expr` or `x: T = expr`; the leading `var` is already consumed. */
  private parseVarDecl(): VarDecl {
    const names = this.identifierList();
    let type: TypeRef | undefined;
    let init: Expression | undefined;
    if (this.isType('colon')) {
      this.next();
      type = this.parseTypeRef();
    }
    if (this.isOp(':=') || this.isOp('=')) {
      this.next();
      init = this.parseExpression();
    }
    if (!type && !init) this.fail("Expected ':' or ':='");
    return { kind: 'VarDecl', names, type, init, pos: names[0].pos, end: this.lastEnd() };
  }

  private parseConstSection(): ConstDecl[] {
    this.expectKeyword('const');
    const decls: ConstDecl[] = [];
    do {
      decls.push(this.parseConstDecl());
      this.expect('semicolon', "';'");
    } while (this.isType('identifier') && (this.isOp('=', 1) || this.isType('colon', 1)));
    return decls;
  }

  private parseConstDecl(): ConstDecl {
    const name = this.identifier();
    let type: TypeRef | undefined;
    if (this.isType('colon')) {
      this.next();
      type = this.parseTypeRef();
    }
    if (this.isOp(':=')) this.next();
    else this.expectOp('=');
    const value = this.parseExpression();
    return { kind: 'ConstDecl', name, type, value, pos: name.pos, end: this.lastEnd() };
  }

  private parseTypeRef(): TypeRef {
    const start = this.position(this.peek());
    if (this.isKeyword('array') || this.isKeyword('set')) {
      this.next();
      if (this.isType('lbracket')) {
        this.next();
        this.parseExpression();
        this.expect('range', "'..'");
        this.parseExpression();
        this.expect('rbracket', "']'");
      }
      this.expectKeyword('of');
      const element = this.parseTypeRef();
      return { kind: 'TypeRef', name: element.name, isArray: true, pos: start, end: element.end };
    }
    const name = this.identifier();
    return { kind: 'TypeRef', name, isArray: false, pos: start, end: name.end };
  }

  private parseTypeSection(): Statement[] {
    this.expectKeyword('type');
    const decls: Statement[] = [];
    do {
      decls.push(this.parseTypeDecl());
    } while (this.isType('identifier') && this.isOp('=', 1));
    return decls;
  }

  private parseTypeDecl(): ClassDecl | RecordDecl | EnumDecl | TypeAlias {
    const name = this.identifier();
    this.expectOp('=');

    if (this.isKeyword('class')) {
      this.next();
      if (this.isKeyword('of')) {
        this.next();
        const target = this.parseTypeRef();
        const end = this.lastEnd();
        this.expect('semicolon', "';'");
        return { kind: 'TypeAlias', name, target, pos: name.pos, end };
      }
      let parent: Identifier | undefined;
      if (this.isType('lparen')) {
        this.next();
        parent = this.identifier();
        while (this.isType('comma')) {
          this.next();
          this.identifier();
        }
        this.expect('rparen', "')'");
      }
      if (this.isType('semicolon')) {
        const end = this.lastEnd();
        this.next();
        return { kind: 'ClassDecl', name, parent, fields: [], methods: [], properties: [], pos: name.pos, end };
      }
      const members = this.parseMembers();
      const end = this.tokenEnd(this.expectKeyword('end'));
      this.expect('semicolon', "';'");
      return { kind: 'ClassDecl', name, parent, ...members, pos: name.pos, end };
    }

    if (this.isKeyword('record')) {
      this.next();
      const members = this.parseMembers();
      const end = this.tokenEnd(this.expectKeyword('end'));
      this.expect('semicolon', "';'");
      return { kind: 'RecordDecl', name, ...members, pos: name.pos, end };
    }

    if (this.isType('lparen') || (this.isType('identifier') && this.peek().text.toLowerCase() === 'enum' && this.isType('lparen', 1))) {
      if (this.isType('identifier')) this.next();
      const members = this.parseEnumMembers();
      const end = this.lastEnd();
      this.expect('semicolon', "';'");
      return { kind: 'EnumDecl', name, members, pos: name.pos, end };
    }

    const target = this.parseTypeRef();
    const end = this.lastEnd();
    this.expect('semicolon', "';'");
    return { kind: 'TypeAlias', name, target, pos: name.pos, end };
  }

  private parseEnumMembers(): EnumMember[] {
    this.expect('lparen', "'('");
    const members: EnumMember[] = [];
    do {
      if (this.isType('comma')) this.next();
      const name = this.identifier();
      let value: Expression | undefined;
      if (this.isOp('=')) {
        this.next();
        value = this.parseExpression();
      }
      members.push({ kind: 'EnumMember', name, value, pos: name.pos, end: this.lastEnd() });
    } while (this.isType('comma'));
    this.expect('rparen', "')'");
    return members;
  }

  private parseMembers(): { fields: FieldDecl[]; methods: FunctionDecl[]; properties: PropertyDecl[] } {
    const fields: FieldDecl[] = [];
    const methods: FunctionDecl[] = [];
    const properties: PropertyDecl[] = [];

    while (!this.isKeyword('end')) {
      if (this.isType('eof')) this.fail("Expected 'end'");
      if (this.isType('semicolon')) {
        this.next();
      } else if (this.isWord(VISIBILITY_WORDS) && !this.isType('colon', 1) && !this.isType('comma', 1)) {
        this.next();
      } else if (this.isKeyword('class') && (this.isKeyword('var', 1) || this.isKeyword('property', 1))) {
        this.next();
      } else if (this.isKeyword('var')) {
        this.next();
      } else if (this.isKeyword('const')) {
        this.next();
        const constant = this.parseConstDecl();
        fields.push({ kind: 'FieldDecl', name: constant.name, type: constant.type, pos: constant.pos, end: constant.end });
        this.expect('semicolon', "';'");
      } else if (this.isRoutineStart()) {
        methods.push(this.parseRoutine(true));
      } else if (this.isKeyword('property')) {
        properties.push(this.parseProperty());
      } else if (this.isType('identifier')) {
        const names = this.identifierList();
        this.expect('colon', "':'");
        const type = this.parseTypeRef();
        for (const name of names) {
          fields.push({ kind: 'FieldDecl', name, type, pos: name.pos, end: type.end });
        }
        this.expect('semicolon', "';'");
      } else {
        this.fail('Expected member declaration');
      }
    }
    return { fields, methods, properties };
  }

  private parseProperty(): PropertyDecl {
    const start = this.position(this.expectKeyword('property'));
    const name = this.identifier();
    if (this.isType('lbracket')) {
      this.next();
      while (!this.isType('rbracket')) {
        if (this.isType('eof')) this.fail("Expected ']'");
        this.next();
      }
      this.next();
    }
    let type: TypeRef | undefined;
    if (this.isType('colon')) {
      this.next();
      type = this.parseTypeRef();
    }

    let readSpec: Identifier | undefined;
    let writeSpec: Identifier | undefined;
    while (this.isType('identifier')) {
      const word = this.next().text.toLowerCase();
      if (word === 'read') readSpec = this.identifier();
      else if (word === 'write') writeSpec = this.identifier();
      else if (word === 'default' && !this.isType('semicolon')) this.parseExpression();
    }
    const end = this.lastEnd();
    this.expect('semicolon', "';'");
    if (this.isWord(DEFAULT_WORDS) && this.isType('semicolon', 1)) {
      this.next();
      this.next();
    }
    return { kind: 'PropertyDecl', name, type, readSpec, writeSpec, pos: start, end };
  }

  private parseRoutine(inClassBody: boolean): FunctionDecl {
    const start = this.position(this.peek());
    let isClassMethod = false;
    if (this.isKeyword('class')) {
      this.next();
      isClassMethod = true;
    }
    const routine = toRoutineKind(this.next().value);

    let name = this.identifier();
    let className: Identifier | undefined;
    if (this.isType('dot')) {
      this.next();
      className = name;
      name = this.identifier();
    }

    const params = this.isType('lparen') ? this.parseParams() : [];
    let returnType: TypeRef | undefined;
    if (this.isType('colon')) {
      this.next();
      returnType = this.parseTypeRef();
    }
    let end = this.lastEnd();
    this.expect('semicolon', "';'");

    const directives: string[] = [];
    while (this.isWord(ROUTINE_DIRECTIVES)) {
      directives.push(this.next().text.toLowerCase());
      while (!this.isType('semicolon')) {
        if (this.isType('eof')) this.fail("Expected ';'");
        this.next();
      }
      end = this.lastEnd();
      this.next();
    }

    const hasBody = !inClassBody && !this.inInterfaceSection && !directives.some((d) => BODYLESS_DIRECTIVES.has(d));
    let locals: Statement[] = [];
    let body: Block | undefined;
    if (hasBody) {
      locals = this.parseLocalSections();
      body = this.parseBlock();
      end = body.end;
      this.expect('semicolon', "';'");
    }

    return {
      kind: 'FunctionDecl',
      routine,
      name,
      className,
      isClassMethod,
      params,
      returnType,
      directives,
      locals,
      body,
      pos: start,
      end,
    };
  }

  private parseLocalSections(): Statement[] {
    const locals: Statement[] = [];
    for (;;) {
      if (this.isKeyword('var')) locals.push(...this.parseVarSection());
      else if (this.isKeyword('const')) locals.push(...this.parseConstSection());
      else if (this.isKeyword('type')) locals.push(...this.parseTypeSection());
      else if (this.isRoutineStart()) locals.push(this.parseRoutine(false));
      else return locals;
    }
  }

  private parseParams(): Param[] {
    this.expect('lparen', "'('");
    const params: Param[] = [];
    while (!this.isType('rparen')) {
      let modifier: Param['modifier'];
      if (this.isKeyword('var') || this.isKeyword('const')) {
        modifier = this.next().value === 'var' ? 'var' : 'const';
      } else if (this.isWord(LAZY_WORDS) && this.isType('identifier', 1)) {
        this.next();
        modifier = 'lazy';
      }
      const names = this.identifierList();
      let type: TypeRef | undefined;
      let defaultValue: Expression | undefined;
      if (this.isType('colon')) {
        this.next();
        type = this.parseTypeRef();
      }
      if (this.isOp('=')) {
        this.next();
        defaultValue = this.parseExpression();
      }
      const end = this.lastEnd();
      for (const name of names) {
        params.push({ kind: 'Param', name, type, modifier, defaultValue, pos: name.pos, end });
      }
      if (!this.isType('semicolon')) break;
      this.next();
    }
    this.expect('rparen', "')'");
    return params;
  }

  // --- Statements ---

  private parseBlock(): Block {
    const start = this.position(this.expectKeyword('begin'));
    const statements = this.parseItems(() => this.isKeyword('end'), false);
    const end = this.tokenEnd(this.expectKeyword('end'));
    return { kind: 'Block', statements, pos: start, end };
  }

  /** Branch and loop bodies may be empty (`if x then ;`). */
  private parseBody(): Statement {
    if (this.isType('semicolon') || this.isKeyword('else') || this.isKeyword('end') || this.isKeyword('until')) {
      const at = this.position(this.peek());
      return { kind: 'Block', statements: [], pos: at, end: at };
    }
    return this.parseStatement();
  }

  private parseStatement(): Statement {
    const token = this.peek();
    const start = this.position(token);

    if (token.type === 'keyword') {
      switch (token.value) {
        case 'begin':
          return this.parseBlock();
        case 'if': {
          this.next();
          const condition = this.parseExpression();
          this.expectKeyword('then');
          const then = this.parseBody();
          let otherwise: Statement | undefined;
          if (this.isKeyword('else')) {
            this.next();
            otherwise = this.parseBody();
          }
          return { kind: 'If', condition, then, else: otherwise, pos: start, end: this.lastEnd() };
        }
        case 'while': {
          this.next();
          const condition = this.parseExpression();
          this.expectKeyword('do');
          const body = this.parseBody();
          return { kind: 'While', condition, body, pos: start, end: this.lastEnd() };
        }
        case 'repeat': {
          this.next();
          const statements = this.parseItems(() => this.isKeyword('until'), false);
          this.expectKeyword('until');
          const condition = this.parseExpression();
          return { kind: 'Repeat', statements, condition, pos: start, end: this.lastEnd() };
        }
        case 'for':
          return this.parseFor();
        case 'case':
          return this.parseCase();
        case 'with':
          return this.parseWith();
        case 'try':
          return this.parseTry();
        case 'exit':
        case 'break':
        case 'continue':
        case 'raise':
          return this.parseJump();
        default:
          break;
      }
    }

    if (this.isWord(HANDLER_WORDS) && this.isType('identifier', 1) && this.isType('colon', 2)) {
      return this.parseExceptionHandler();
    }

    const target = this.parseExpression();
    const operator = this.peek();
    if (operator.type === 'op' && ASSIGN_OPERATORS.has(operator.text)) {
      this.next();
      const value = this.parseExpression();
      return { kind: 'Assignment', operator: operator.text, target, value, pos: start, end: this.lastEnd() };
    }
    return { kind: 'ExpressionStatement', expression: target, pos: start, end: target.end };
  }

  /** `on E: EType do stmt` becomes a block declaring `E` around the handler body. */
  private parseExceptionHandler(): Block {
    const start = this.position(this.next());
    const name = this.identifier();
    this.expect('colon', "':'");
    const type = this.parseTypeRef();
    this.expectKeyword('do');
    const body = this.parseBody();
    const variable: VarDecl = { kind: 'VarDecl', names: [name], type, pos: name.pos, end: type.end };
    return { kind: 'Block', statements: [variable, body], pos: start, end: this.lastEnd() };
  }

  private parseFor(): For {
    const start = this.position(this.expectKeyword('for'));
    const declaresVariable = this.isKeyword('var');
    if (declaresVariable) this.next();
    const variable = this.identifier();

    let direction: For['direction'] = 'in';
    let stop: Expression | undefined;
    let first: Expression;
    if (this.isOp(':=')) {
      this.next();
      first = this.parseExpression();
      if (this.isKeyword('to')) direction = 'to';
      else if (this.isKeyword('downto')) direction = 'downto';
      else this.fail("Expected 'to' or 'downto'");
      this.next();
      stop = this.parseExpression();
    } else {
      this.expectKeyword('in');
      first = this.parseExpression();
    }
    this.expectKeyword('do');
    const body = this.parseBody();
    return { kind: 'For', variable, declaresVariable, direction, start: first, stop, body, pos: start, end: this.lastEnd() };
  }

  private parseCase(): Case {
    const start = this.position(this.expectKeyword('case'));
    const selector = this.parseExpression();
    this.expectKeyword('of');

    const branches: CaseBranch[] = [];
    let elseStatements: Statement[] | undefined;
    for (;;) {
      while (this.isType('semicolon')) this.next();
      if (this.isKeyword('end')) break;
      if (this.isKeyword('else')) {
        this.next();
        elseStatements = this.parseItems(() => this.isKeyword('end'), false);
        break;
      }
      const branchStart = this.position(this.peek());
      const values = [this.parseCaseValue()];
      while (this.isType('comma')) {
        this.next();
        values.push(this.parseCaseValue());
      }
      this.expect('colon', "':'");
      const body = this.parseBody();
      branches.push({ kind: 'CaseBranch', values, body, pos: branchStart, end: this.lastEnd() });
      if (!this.isType('semicolon') && !this.isKeyword('end') && !this.isKeyword('else')) this.fail("Expected ';'");
    }
    const end = this.tokenEnd(this.expectKeyword('end'));
    return { kind: 'Case', selector, branches, elseStatements, pos: start, end };
  }

  /** A case label: a value or a `low..high` range. */
  private parseCaseValue(): Expression {
    const low = this.parseExpression();
    if (!this.isType('range')) return low;
    this.next();
    const high = this.parseExpression();
    return { kind: 'Binary', operator: '..', left: low, right: high, pos: low.pos, end: high.end };
  }

  private parseWith(): With {
    const start = this.position(this.expectKeyword('with'));
    const objects = [this.parseExpression()];
    while (this.isType('comma')) {
      this.next();
      objects.push(this.parseExpression());
    }
    this.expectKeyword('do');
    const body = this.parseBody();
    return { kind: 'With', objects, body, pos: start, end: this.lastEnd() };
  }

  private parseTry(): Try {
    const start = this.position(this.expectKeyword('try'));
    const statements = this.parseItems(() => this.isKeyword('except') || this.isKeyword('finally'), false);
    if (!this.isKeyword('except') && !this.isKeyword('finally')) this.fail("Expected 'except' or 'finally'");
    const handler = this.next().value === 'except' ? 'except' : 'finally';
    const handlerStatements = this.parseItems(() => this.isKeyword('end'), false);
    const end = this.tokenEnd(this.expectKeyword('end'));
    return { kind: 'Try', statements, handler, handlerStatements, pos: start, end };
  }

  private parseJump(): Jump {
    const token = this.next();
    const keyword = toJumpKeyword(token.value);
    let value: Expression | undefined;
    if (keyword === 'exit' && this.isType('lparen')) {
      this.next();
      if (!this.isType('rparen')) value = this.parseExpression();
      this.expect('rparen', "')'");
    } else if (keyword === 'raise' && !this.isType('semicolon') && !this.isKeyword('end')) {
      value = this.parseExpression();
    }
    return { kind: 'Jump', keyword, value, pos: this.position(token), end: this.lastEnd() };
  }

  // --- Expressions ---

  private parseExpression(): Expression {
    let left = this.parseAdditive();
    while (
      (this.peek().type === 'op' && RELATIONAL_OPERATORS.has(this.peek().text)) ||
      this.isKeyword('in') ||
      this.isKeyword('is')
    ) {
      const operator = this.next().value;
      const right = this.parseAdditive();
      left = { kind: 'Binary', operator, left, right, pos: left.pos, end: right.end };
    }
    return left;
  }

  private parseAdditive(): Expression {
    let left = this.parseMultiplicative();
    while (this.isOp('+') || this.isOp('-') || this.isKeyword('or') || this.isKeyword('xor')) {
      const operator = this.next().value;
      const right = this.parseMultiplicative();
      left = { kind: 'Binary', operator, left, right, pos: left.pos, end: right.end };
    }
    return left;
  }

  private parseMultiplicative(): Expression {
    let left = this.parseUnary();
    while (
      this.isOp('*') ||
      this.isOp('/') ||
      ['div', 'mod', 'and', 'shl', 'shr', 'as'].some((keyword) => this.isKeyword(keyword))
    ) {
      const operator = this.next().value;
      const right = this.parseUnary();
      left = { kind: 'Binary', operator, left, right, pos: left.pos, end: right.end };
    }
    return left;
  }

  private parseUnary(): Expression {
    if (this.isKeyword('not') || this.isOp('-') || this.isOp('+') || this.isOp('@')) {
      const token = this.next();
      const operand = this.parseUnary();
      return { kind: 'Unary', operator: token.value, operand, pos: this.position(token), end: operand.end };
    }
    return this.parsePostfix();
  }

  private parsePostfix(): Expression {
    let expression = this.parsePrimary();
    for (;;) {
      if (this.isType('lparen')) {
        this.next();
        const args = this.parseArguments('rparen', "')'");
        expression = { kind: 'Call', callee: expression, args, pos: expression.pos, end: this.lastEnd() };
      } else if (this.isType('dot')) {
        this.next();
        const member = this.memberName();
        expression = { kind: 'Member', object: expression, member, pos: expression.pos, end: member.end };
      } else if (this.isType('lbracket')) {
        this.next();
        const indexes = this.parseArguments('rbracket', "']'");
        expression = { kind: 'Index', object: expression, indexes, pos: expression.pos, end: this.lastEnd() };
      } else {
        return expression;
      }
    }
  }

  /** The leading `lambda`, `function` or `procedure` token is still unread. */
  private parseLambda(): Lambda {
    const start = this.position(this.next());
    const params = this.isType('lparen') ? this.parseParams() : [];
    let returnType: TypeRef | undefined;
    if (this.isType('colon')) {
      this.next();
      returnType = this.parseTypeRef();
    }
    if (this.isOp('=>')) {
      this.next();
      const expression = this.parseExpression();
      return { kind: 'Lambda', params, returnType, body: expression, pos: start, end: expression.end };
    }
    const body = this.parseBlock();
    return { kind: 'Lambda', params, returnType, body, pos: start, end: body.end };
  }

  private parseArguments(close: TokenType, description: string): Expression[] {
    const args: Expression[] = [];
    while (!this.isType(close)) {
      args.push(this.parseExpression());
      if (!this.isType('comma')) break;
      this.next();
    }
    this.expect(close, description);
    return args;
  }

  private parsePrimary(): Expression {
    const token = this.peek();
    const start = this.position(token);

    switch (token.type) {
      case 'identifier':
        if (this.isWord(LAMBDA_WORDS) && (this.isType('lparen', 1) || this.isOp('=>', 1))) return this.parseLambda();
        return this.identifier();
      case 'number':
      case 'string':
        this.next();
        return { kind: 'Literal', literal: token.type, text: token.text, pos: start, end: this.tokenEnd(token) };
      case 'lparen': {
        this.next();
        const inner = this.parseExpression();
        this.expect('rparen', "')'");
        return inner;
      }
      case 'lbracket': {
        this.next();
        const elements = this.parseArguments('rbracket', "']'");
        const literal: ArrayLiteral = { kind: 'ArrayLiteral', elements, pos: start, end: this.lastEnd() };
        return literal;
      }
      case 'keyword':
        if (token.value === 'true' || token.value === 'false') {
          this.next();
          return { kind: 'Literal', literal: 'boolean', text: token.text, pos: start, end: this.tokenEnd(token) };
        }
        if (token.value === 'nil') {
          this.next();
          return { kind: 'Literal', literal: 'nil', text: token.text, pos: start, end: this.tokenEnd(token) };
        }
        if ((token.value === 'function' || token.value === 'procedure') && (this.isType('lparen', 1) || this.isKeyword('begin', 1))) {
          return this.parseLambda();
        }
        if (token.value === 'inherited') {
          this.next();
          const self: Expression = { kind: 'Literal', literal: 'inherited', text: token.text, pos: start, end: this.tokenEnd(token) };
          if (!this.isType('identifier')) return self;
          const member = this.identifier();
          return { kind: 'Member', object: self, member, pos: start, end: member.end };
        }
        break;
      default:
        break;
    }
    return this.fail('Expected expression');
  }
}

/**
 * Parses a DWScript document. A syntax error yields no program and a single diagnostic.
 */
export function parse(source: string): ParseResult {
  const parser = new Parser(tokenize(source));
  try {
    return { program: parser.parseProgram(), errors: [] };
  } catch (error) {
    if (error instanceof ParseError) {
      return { errors: [{ message: error.message, range: error.range }] };
    }
    throw error;
  }
}
