import { Position, Range } from '../types';

/**
 * Syntax tree for the supported DWScript subset.
 *
 * Every node carries 1-based `pos`/`end` positions; `end` points one column past
 * the last character of the node. Node variants form a closed union so that the
 * scope builder and resolver can switch over `kind` exhaustively.
 */

interface BaseNode {
  pos: Position;
  end: Position;
}

export interface Identifier extends BaseNode {
  kind: 'Identifier';
  name: string;
}

export interface TypeRef extends BaseNode {
  kind: 'TypeRef';
  name: Identifier;
  isArray: boolean;
}

// --- Expressions ---

export interface Literal extends BaseNode {
  kind: 'Literal';
  literal: 'number' | 'string' | 'boolean' | 'nil' | 'inherited';
  text: string;
}

export interface ArrayLiteral extends BaseNode {
  kind: 'ArrayLiteral';
  elements: Expression[];
}

export interface Binary extends BaseNode {
  kind: 'Binary';
  operator: string;
  left: Expression;
  right: Expression;
}

export interface Unary extends BaseNode {
  kind: 'Unary';
  operator: string;
  operand: Expression;
}

export interface Call extends BaseNode {
  kind: 'Call';
  callee: Expression;
  args: Expression[];
}

export interface Member extends BaseNode {
  kind: 'Member';
  object: Expression;
  member: Identifier;
}

export interface Index extends BaseNode {
  kind: 'Index';
  object: Expression;
  indexes: Expression[];
}

/** `lambda (x) => expr`, `lambda (x) begin ... end` or an anonymous `function (x) begin ... end`. */
export interface Lambda extends BaseNode {
  kind: 'Lambda';
  params: Param[];
  returnType?: TypeRef;
  body: Block | Expression;
}

export type Expression = Identifier | Literal | ArrayLiteral | Binary | Unary | Call | Member | Index | Lambda;

// --- Declarations ---

export interface VarDecl extends BaseNode {
  kind: 'VarDecl';
  names: Identifier[];
  type?: TypeRef;
  init?: Expression;
}

export interface ConstDecl extends BaseNode {
  kind: 'ConstDecl';
  name: Identifier;
  type?: TypeRef;
  value: Expression;
}

export interface Param extends BaseNode {
  kind: 'Param';
  name: Identifier;
  type?: TypeRef;
  modifier?: 'var' | 'const' | 'lazy';
  defaultValue?: Expression;
}

export type RoutineKind = 'function' | 'procedure' | 'constructor' | 'destructor' | 'method';

export interface FunctionDecl extends BaseNode {
  kind: 'FunctionDecl';
  routine: RoutineKind;
  name: Identifier;
  /** Set for method implementations written as `TClass.Name`. */
  className?: Identifier;
  isClassMethod: boolean;
  params: Param[];
  returnType?: TypeRef;
  directives: string[];
  /** Local var/const/type sections and nested routines. */
  locals: Statement[];
  /** Absent for forward declarations and class-body method headers. */
  body?: Block;
}

export interface FieldDecl extends BaseNode {
  kind: 'FieldDecl';
  name: Identifier;
  type?: TypeRef;
}

export interface PropertyDecl extends BaseNode {
  kind: 'PropertyDecl';
  name: Identifier;
  type?: TypeRef;
  readSpec?: Identifier;
  writeSpec?: Identifier;
}

export interface ClassDecl extends BaseNode {
  kind: 'ClassDecl';
  name: Identifier;
  parent?: Identifier;
  fields: FieldDecl[];
  methods: FunctionDecl[];
  properties: PropertyDecl[];
}

export interface RecordDecl extends BaseNode {
  kind: 'RecordDecl';
  name: Identifier;
  fields: FieldDecl[];
  methods: FunctionDecl[];
  properties: PropertyDecl[];
}

export interface EnumMember extends BaseNode {
  kind: 'EnumMember';
  name: Identifier;
  value?: Expression;
}

export interface EnumDecl extends BaseNode {
  kind: 'EnumDecl';
  name: Identifier;
  members: EnumMember[];
}

export interface TypeAlias extends BaseNode {
  kind: 'TypeAlias';
  name: Identifier;
  target: TypeRef;
}

export interface UsesClause extends BaseNode {
  kind: 'UsesClause';
  units: Identifier[];
}

// --- Statements ---

export interface Block extends BaseNode {
  kind: 'Block';
  statements: Statement[];
}

export interface Assignment extends BaseNode {
  kind: 'Assignment';
  operator: string;
  target: Expression;
  value: Expression;
}

export interface ExpressionStatement extends BaseNode {
  kind: 'ExpressionStatement';
  expression: Expression;
}

export interface If extends BaseNode {
  kind: 'If';
  condition: Expression;
  then: Statement;
  else?: Statement;
}

export interface While extends BaseNode {
  kind: 'While';
  condition: Expression;
  body: Statement;
}

export interface Repeat extends BaseNode {
  kind: 'Repeat';
  statements: Statement[];
  condition: Expression;
}

export interface For extends BaseNode {
  kind: 'For';
  variable: Identifier;
  /** `for var i := ...` declares the loop variable in the loop's own scope. */
  declaresVariable: boolean;
  /** `to`/`downto` ranges have both bounds; `for x in list` only has `start`. */
  direction: 'to' | 'downto' | 'in';
  start: Expression;
  stop?: Expression;
  body: Statement;
}

export interface Try extends BaseNode {
  kind: 'Try';
  statements: Statement[];
  handler: 'except' | 'finally';
  handlerStatements: Statement[];
}

export interface CaseBranch extends BaseNode {
  kind: 'CaseBranch';
  /** Single values or `low..high` ranges, the latter as a `..` Binary. */
  values: Expression[];
  body: Statement;
}

export interface Case extends BaseNode {
  kind: 'Case';
  selector: Expression;
  branches: CaseBranch[];
  elseStatements?: Statement[];
}

export interface With extends BaseNode {
  kind: 'With';
  objects: Expression[];
  body: Statement;
}

export interface Jump extends BaseNode {
  kind: 'Jump';
  keyword: 'exit' | 'break' | 'continue' | 'raise';
  value?: Expression;
}

export type Declaration =
  | VarDecl
  | ConstDecl
  | FunctionDecl
  | ClassDecl
  | RecordDecl
  | EnumDecl
  | TypeAlias
  | UsesClause;

export type Statement =
  | Declaration
  | Block
  | Assignment
  | ExpressionStatement
  | If
  | While
  | Repeat
  | For
  | Case
  | With
  | Try
  | Jump;

export interface Program extends BaseNode {
  kind: 'Program';
  statements: Statement[];
}

export type Node =
  | Program
  | Statement
  | Expression
  | TypeRef
  | Param
  | FieldDecl
  | PropertyDecl
  | EnumMember
  | CaseBranch;

export function nodeRange(node: Node): Range {
  return { start: node.pos, end: node.end };
}

/**
 * Calls `visit` for each direct child of `node`, in source order.
 */
export function forEachChild(node: Node, visit: (child: Node) => void): void {
  const each = (children: readonly Node[]) => children.forEach(visit);
  const maybe = (child: Node | undefined) => {
    if (child) visit(child);
  };

  switch (node.kind) {
    case 'Program':
    case 'Block':
      each(node.statements);
      return;
    case 'Identifier':
    case 'Literal':
      return;
    case 'TypeRef':
      visit(node.name);
      return;
    case 'ArrayLiteral':
      each(node.elements);
      return;
    case 'Binary':
      visit(node.left);
      visit(node.right);
      return;
    case 'Unary':
      visit(node.operand);
      return;
    case 'Call':
      visit(node.callee);
      each(node.args);
      return;
    case 'Member':
      visit(node.object);
      visit(node.member);
      return;
    case 'Index':
      visit(node.object);
      each(node.indexes);
      return;
    case 'Lambda':
      each(node.params);
      maybe(node.returnType);
      visit(node.body);
      return;
    case 'VarDecl':
      each(node.names);
      maybe(node.type);
      maybe(node.init);
      return;
    case 'ConstDecl':
      visit(node.name);
      maybe(node.type);
      visit(node.value);
      return;
    case 'Param':
      visit(node.name);
      maybe(node.type);
      maybe(node.defaultValue);
      return;
    case 'FunctionDecl':
      maybe(node.className);
      visit(node.name);
      each(node.params);
      maybe(node.returnType);
      each(node.locals);
      maybe(node.body);
      return;
    case 'FieldDecl':
      visit(node.name);
      maybe(node.type);
      return;
    case 'PropertyDecl':
      visit(node.name);
      maybe(node.type);
      maybe(node.readSpec);
      maybe(node.writeSpec);
      return;
    case 'ClassDecl':
      visit(node.name);
      maybe(node.parent);
      each(node.fields);
      each(node.methods);
      each(node.properties);
      return;
    case 'RecordDecl':
      visit(node.name);
      each(node.fields);
      each(node.methods);
      each(node.properties);
      return;
    case 'EnumMember':
      visit(node.name);
      maybe(node.value);
      return;
    case 'EnumDecl':
      visit(node.name);
      each(node.members);
      return;
    case 'TypeAlias':
      visit(node.name);
      visit(node.target);
      return;
    case 'UsesClause':
      each(node.units);
      return;
    case 'Assignment':
      visit(node.target);
      visit(node.value);
      return;
    case 'ExpressionStatement':
      visit(node.expression);
      return;
    case 'If':
      visit(node.condition);
      visit(node.then);
      maybe(node.else);
      return;
    case 'While':
      visit(node.condition);
      visit(node.body);
      return;
    case 'Repeat':
      each(node.statements);
      visit(node.condition);
      return;
    case 'For':
      visit(node.variable);
      visit(node.start);
      maybe(node.stop);
      visit(node.body);
      return;
    case 'Case':
      visit(node.selector);
      each(node.branches);
      each(node.elseStatements ?? []);
      return;
    case 'CaseBranch':
      each(node.values);
      visit(node.body);
      return;
    case 'With':
      each(node.objects);
      visit(node.body);
      return;
    case 'Try':
      each(node.statements);
      each(node.handlerStatements);
      return;
    case 'Jump':
      maybe(node.value);
      return;
    default:
      assertNever(node);
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected syntax node: ${JSON.stringify(value)}`);
}
