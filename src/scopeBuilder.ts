// src/scopeBuilder.ts
import {
  ClassDecl,
  Expression,
  FunctionDecl,
  Identifier,
  Lambda,
  Param,
  Program,
  RecordDecl,
  Statement,
  TypeRef,
  assertNever,
  forEachChild,
  nodeRange,
} from './syntax/ast';
import { Declaration, DeclarationKind, Position, Range } from './types';
import { comparePositions } from './utils';

export type ScopeKind = 'Global' | 'Function' | 'Block';

/**
 * A lexical scope. Scopes live in the `ScopeTree.scopes` arena and refer to
 * each other by index, so a tree is dropped in one step on re-parse.
 */
export interface Scope {
  id: number;
  kind: ScopeKind;
  range: Range;
  parent?: number;
  children: number[];
  /** Later declarations of a name replace earlier ones in the same scope. */
  declarations: Map<string, Declaration>;
  /** Class whose members are visible inside a `TClass.Method` implementation. */
  ownerClass?: string;
}

/** An identifier occurrence recorded during the scope walk. */
export interface SymbolReference {
  name: string;
  range: Range;
  /** Innermost scope at the occurrence; for a declaring token, the scope it declares into. */
  scope: number;
  /** Present when this occurrence is the name token of a declaration. */
  declaration?: Declaration;
  /** Member accesses (`obj.Name`) and names declared inside a class or record. */
  member: boolean;
}

export interface ClassInfo {
  name: string;
  parent?: string;
  declaration: Declaration;
  members: Map<string, Declaration>;
}

export interface ScopeTree {
  /** `scopes[0]` is the Global scope. */
  scopes: Scope[];
  /** Occurrences in source order. */
  references: SymbolReference[];
  classes: Map<string, ClassInfo>;
  /** Function scope opened by each routine declaration, for nested document symbols. */
  functionScopes: Map<Declaration, number>;
}

export type Binding =
  | { source: 'scope'; scopeId: number; declaration: Declaration }
  | { source: 'member'; className: string; declaration: Declaration };

export const GLOBAL_SCOPE = 0;

function typeText(type: TypeRef | undefined): string {
  if (!type) return '';
  return type.isArray ? `array of ${type.name.name}` : type.name.name;
}

function paramsText(params: Param[]): string {
  if (params.length === 0) return '';
  const parts = params.map((param) => {
    const prefix = param.modifier ? `${param.modifier} ` : '';
    const type = param.type ? `: ${typeText(param.type)}` : '';
    return `${prefix}${param.name.name}${type}`;
  });
  return `(${parts.join('; ')})`;
}

function routineDetail(fn: FunctionDecl): string {
  const owner = fn.className ? `${fn.className.name}.` : '';
  const prefix = fn.isClassMethod ? 'class ' : '';
  const result = fn.returnType ? `: ${typeText(fn.returnType)}` : '';
  return `${prefix}${fn.routine} ${owner}${fn.name.name}${paramsText(fn.params)}${result}`;
}

class ScopeTreeBuilder {
  private readonly scopes: Scope[] = [];
  private readonly references: SymbolReference[] = [];
  private readonly classes = new Map<string, ClassInfo>();
  private readonly functionScopes = new Map<Declaration, number>();
  private current = GLOBAL_SCOPE;
  /** Name of the routine being walked, used as `containerName` for its locals. */
  private container: string | undefined;

  build(program: Program): ScopeTree {
    this.pushScope('Global', nodeRange(program));
    program.statements.forEach((statement) => this.visitStatement(statement));
    this.references.sort((a, b) => comparePositions(a.range.start, b.range.start));
    return {
      scopes: this.scopes,
      references: this.references,
      classes: this.classes,
      functionScopes: this.functionScopes,
    };
  }

  // --- Scope stack ---

  private pushScope(kind: ScopeKind, range: Range, ownerClass?: string): number {
    const id = this.scopes.length;
    const parent = id === 0 ? undefined : this.current;
    this.scopes.push({ id, kind, range, parent, children: [], declarations: new Map(), ownerClass });
    if (parent !== undefined) this.scopes[parent].children.push(id);
    this.current = id;
    return id;
  }

  private popScope(): void {
    const parent = this.scopes[this.current].parent;
    if (parent !== undefined) this.current = parent;
  }

  private withBlock(range: Range, visit: () => void): void {
    this.pushScope('Block', range);
    visit();
    this.popScope();
  }

  private declare(
    name: Identifier,
    kind: DeclarationKind,
    range: Range,
    detail: string,
    containerName = this.container,
  ): Declaration {
    const declaration: Declaration = {
      name: name.name,
      kind,
      range,
      selectionRange: nodeRange(name),
      containerName,
      detail,
    };
    this.scopes[this.current].declarations.set(name.name, declaration);
    this.references.push({ name: name.name, range: declaration.selectionRange, scope: this.current, declaration, member: false });
    return declaration;
  }

  private reference(name: Identifier, member = false): void {
    this.references.push({ name: name.name, range: nodeRange(name), scope: this.current, member });
  }

  // --- Statements ---

  private visitStatements(statements: Statement[]): void {
    statements.forEach((statement) => this.visitStatement(statement));
  }

  private visitStatement(statement: Statement): void {
    switch (statement.kind) {
      case 'VarDecl': {
        this.visitType(statement.type);
        this.visitOptional(statement.init);
        const type = statement.type ? `: ${typeText(statement.type)}` : '';
        for (const name of statement.names) {
          this.declare(name, 'variable', nodeRange(statement), `var ${name.name}${type}`);
        }
        return;
      }
      case 'ConstDecl': {
        this.visitType(statement.type);
        this.visitExpression(statement.value);
        const type = statement.type ? `: ${typeText(statement.type)}` : '';
        this.declare(statement.name, 'constant', nodeRange(statement), `const ${statement.name.name}${type}`);
        return;
      }
      case 'FunctionDecl':
        this.visitFunction(statement);
        return;
      case 'ClassDecl':
      case 'RecordDecl':
        this.visitClassLike(statement);
        return;
      case 'EnumDecl': {
        const enumName = statement.name.name;
        this.declare(statement.name, 'enum', nodeRange(statement), `enum ${enumName}`);
        for (const member of statement.members) {
          this.visitOptional(member.value);
          this.declare(member.name, 'enumMember', nodeRange(member), `${enumName}.${member.name.name}`, enumName);
        }
        return;
      }
      case 'TypeAlias':
        this.visitType(statement.target);
        this.declare(statement.name, 'type', nodeRange(statement), `type ${statement.name.name} = ${typeText(statement.target)}`);
        return;
      case 'UsesClause':
        return;
      case 'Block':
        this.withBlock(nodeRange(statement), () => this.visitStatements(statement.statements));
        return;
      case 'Repeat':
        this.withBlock(nodeRange(statement), () => {
          this.visitStatements(statement.statements);
          this.visitExpression(statement.condition);
        });
        return;
      case 'Try':
        this.withBlock(spanOf(statement.statements, nodeRange(statement)), () => this.visitStatements(statement.statements));
        this.withBlock(spanOf(statement.handlerStatements, nodeRange(statement)), () =>
          this.visitStatements(statement.handlerStatements),
        );
        return;
      case 'For':
        if (statement.declaresVariable) {
          this.withBlock(nodeRange(statement), () => {
            this.visitExpression(statement.start);
            this.visitOptional(statement.stop);
            this.declare(statement.variable, 'variable', nodeRange(statement), `var ${statement.variable.name}`);
            this.visitStatement(statement.body);
          });
        } else {
          this.reference(statement.variable);
          this.visitExpression(statement.start);
          this.visitOptional(statement.stop);
          this.visitStatement(statement.body);
        }
        return;
      case 'Case':
        this.visitExpression(statement.selector);
        for (const branch of statement.branches) {
          branch.values.forEach((value) => this.visitExpression(value));
          this.visitStatement(branch.body);
        }
        if (statement.elseStatements) {
          const elseStatements = statement.elseStatements;
          this.withBlock(spanOf(elseStatements, nodeRange(statement)), () => this.visitStatements(elseStatements));
        }
        return;
      case 'With':
        statement.objects.forEach((object) => this.visitExpression(object));
        this.visitStatement(statement.body);
        return;
      case 'If':
        this.visitExpression(statement.condition);
        this.visitStatement(statement.then);
        if (statement.else) this.visitStatement(statement.else);
        return;
      case 'While':
        this.visitExpression(statement.condition);
        this.visitStatement(statement.body);
        return;
      case 'Assignment':
        this.visitExpression(statement.target);
        this.visitExpression(statement.value);
        return;
      case 'ExpressionStatement':
        this.visitExpression(statement.expression);
        return;
      case 'Jump':
        this.visitOptional(statement.value);
        return;
      default:
        assertNever(statement);
    }
  }

  private visitFunction(fn: FunctionDecl): void {
    const range = nodeRange(fn);
    const detail = routineDetail(fn);
    let declaration: Declaration;

    if (fn.className) {
      // `TClass.Method` implementation: the class name is a reference, the method name a member.
      this.reference(fn.className);
      declaration = {
        name: fn.name.name,
        kind: 'method',
        range,
        selectionRange: nodeRange(fn.name),
        containerName: fn.className.name,
        detail,
      };
      this.references.push({ name: fn.name.name, range: declaration.selectionRange, scope: this.current, declaration, member: true });
    } else {
      const kind = fn.routine === 'function' || fn.routine === 'procedure' ? 'function' : 'method';
      declaration = this.declare(fn.name, kind, range, detail);
    }

    fn.params.forEach((param) => {
      this.visitType(param.type);
      this.visitOptional(param.defaultValue);
    });
    this.visitType(fn.returnType);

    const outerContainer = this.container;
    const scopeId = this.pushScope('Function', range, fn.className?.name);
    this.functionScopes.set(declaration, scopeId);
    this.container = fn.className ? `${fn.className.name}.${fn.name.name}` : fn.name.name;

    for (const param of fn.params) {
      const type = param.type ? `: ${typeText(param.type)}` : '';
      this.declare(param.name, 'parameter', nodeRange(param), `${param.modifier ? `${param.modifier} ` : ''}${param.name.name}${type}`);
    }
    this.visitStatements(fn.locals);
    // Top-level body statements live directly in the Function scope.
    if (fn.body) this.visitStatements(fn.body.statements);

    this.container = outerContainer;
    this.popScope();
  }

  /** Lambdas open a Function scope holding their parameters. */
  private visitLambda(lambda: Lambda): void {
    lambda.params.forEach((param) => {
      this.visitType(param.type);
      this.visitOptional(param.defaultValue);
    });
    this.visitType(lambda.returnType);

    this.pushScope('Function', nodeRange(lambda));
    for (const param of lambda.params) {
      const type = param.type ? `: ${typeText(param.type)}` : '';
      this.declare(param.name, 'parameter', nodeRange(param), `${param.name.name}${type}`);
    }
    const body = lambda.body;
    if (body.kind === 'Block') this.visitStatements(body.statements);
    else this.visitExpression(body);
    this.popScope();
  }

  private visitClassLike(decl: ClassDecl | RecordDecl): void {
    const isClass = decl.kind === 'ClassDecl';
    const className = decl.name.name;
    const parent = isClass ? decl.parent : undefined;
    const detail = isClass ? `class ${className}${parent ? `(${parent.name})` : ''}` : `record ${className}`;
    const declaration = this.declare(decl.name, isClass ? 'class' : 'record', nodeRange(decl), detail);
    if (parent) this.reference(parent);

    const members = new Map<string, Declaration>();
    const addMember = (name: Identifier, kind: DeclarationKind, range: Range, memberDetail: string) => {
      const member: Declaration = {
        name: name.name,
        kind,
        range,
        selectionRange: nodeRange(name),
        containerName: className,
        detail: memberDetail,
      };
      members.set(name.name, member);
      this.references.push({ name: name.name, range: member.selectionRange, scope: this.current, declaration: member, member: true });
    };

    for (const field of decl.fields) {
      this.visitType(field.type);
      addMember(field.name, 'field', nodeRange(field), `${field.name.name}: ${typeText(field.type)}`);
    }
    for (const method of decl.methods) {
      method.params.forEach((param) => {
        this.visitType(param.type);
        this.visitOptional(param.defaultValue);
      });
      this.visitType(method.returnType);
      addMember(method.name, 'method', nodeRange(method), routineDetail(method));
    }
    for (const property of decl.properties) {
      this.visitType(property.type);
      if (property.readSpec) this.reference(property.readSpec, true);
      if (property.writeSpec) this.reference(property.writeSpec, true);
      const type = property.type ? `: ${typeText(property.type)}` : '';
      addMember(property.name, 'property', nodeRange(property), `property ${property.name.name}${type}`);
    }

    this.classes.set(className, { name: className, parent: parent?.name, declaration, members });
  }

  // --- Expressions ---

  private visitType(type: TypeRef | undefined): void {
    if (type) this.reference(type.name);
  }

  private visitOptional(expression: Expression | undefined): void {
    if (expression) this.visitExpression(expression);
  }

  private visitExpression(expression: Expression): void {
    switch (expression.kind) {
      case 'Identifier':
        this.reference(expression);
        return;
      case 'Member':
        this.visitExpression(expression.object);
        this.reference(expression.member, true);
        return;
      case 'Lambda':
        this.visitLambda(expression);
        return;
      default:
        forEachChild(expression, (child) => {
          switch (child.kind) {
            case 'Identifier':
            case 'Literal':
            case 'ArrayLiteral':
            case 'Binary':
            case 'Unary':
            case 'Call':
            case 'Member':
            case 'Index':
            case 'Lambda':
              this.visitExpression(child);
              return;
            default:
              return;
          }
        });
    }
  }
}

function spanOf(statements: Statement[], fallback: Range): Range {
  if (statements.length === 0) return fallback;
  return { start: statements[0].pos, end: statements[statements.length - 1].end };
}

/**
 * Walks `program` once, building the scope arena and recording every
 * identifier occurrence with its innermost scope.
 */
export function buildScopeTree(program: Program): ScopeTree {
  return new ScopeTreeBuilder().build(program);
}

/**
 * Finds `name` as a member of `className` or one of its ancestors declared
 * in the same file.
 */
export function findMember(
  tree: ScopeTree,
  className: string,
  name: string,
): { className: string; declaration: Declaration } | undefined {
  const visited = new Set<string>();
  let info = tree.classes.get(className);
  while (info && !visited.has(info.name)) {
    visited.add(info.name);
    const declaration = info.members.get(name);
    if (declaration) return { className: info.name, declaration };
    info = info.parent ? tree.classes.get(info.parent) : undefined;
  }
  return undefined;
}

/**
 * Variables and constants of a routine or block bind only after their
 * declaration; a use earlier in the body belongs to an outer declaration.
 */
function declaredAfter(scope: Scope, declaration: Declaration, at: Position | undefined): boolean {
  if (!at || scope.kind === 'Global') return false;
  if (declaration.kind !== 'variable' && declaration.kind !== 'constant') return false;
  return comparePositions(declaration.selectionRange.start, at) > 0;
}

/**
 * Resolves `name` from `fromScope` outward. Inside a method implementation the
 * owning class's members are consulted after the method's own scopes. With
 * `at`, local variables declared after that position are skipped.
 */
export function lookup(tree: ScopeTree, fromScope: number, name: string, at?: Position): Binding | undefined {
  let current: number | undefined = fromScope;
  while (current !== undefined) {
    const scope: Scope = tree.scopes[current];
    const declaration = scope.declarations.get(name);
    if (declaration && !declaredAfter(scope, declaration, at)) return { source: 'scope', scopeId: current, declaration };
    if (scope.ownerClass) {
      const member = findMember(tree, scope.ownerClass, name);
      if (member) return { source: 'member', ...member };
    }
    current = scope.parent;
  }
  return undefined;
}

/** Every class or record member named `name` in the file. */
export function findMembersByName(tree: ScopeTree, name: string): Declaration[] {
  const found: Declaration[] = [];
  for (const info of tree.classes.values()) {
    const declaration = info.members.get(name);
    if (declaration) found.push(declaration);
  }
  return found;
}

/** True when `scopeId` is `ancestorId` or nested inside it. */
export function isWithinScope(tree: ScopeTree, scopeId: number, ancestorId: number): boolean {
  let current: number | undefined = scopeId;
  while (current !== undefined) {
    if (current === ancestorId) return true;
    current = tree.scopes[current].parent;
  }
  return false;
}

/**
 * Declarations a file contributes to the workspace index: everything in the
 * Global scope plus class and record members.
 */
export function collectIndexDeclarations(tree: ScopeTree): Declaration[] {
  const declarations = [...tree.scopes[GLOBAL_SCOPE].declarations.values()];
  for (const info of tree.classes.values()) {
    declarations.push(...info.members.values());
  }
  return declarations.sort((a, b) => comparePositions(a.selectionRange.start, b.selectionRange.start));
}
