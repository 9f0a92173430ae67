/**
 * AST node types for the shading language.
 *
 * Expression-holding fields that the folding pass rewrites are mutable;
 * everything else is fixed once the parser builds the node.
 */

import { NoPos, type Position } from "../token/token.js";

/**
 * Storage type of a declared name or an expression result.
 */
export type TypeKind = "f32" | "vec3";

const typeKinds: ReadonlySet<string> = new Set<TypeKind>(["f32", "vec3"]);

/**
 * Check whether a type name denotes a known type kind.
 */
export function isTypeKind(name: string): name is TypeKind {
  return typeKinds.has(name);
}

/**
 * Base interface for all AST nodes.
 */
export interface Node {
  /** Start position in source */
  pos(): Position;
  /** String representation */
  toString(): string;
}

/**
 * Expression nodes produce a value.
 */
export interface Expr extends Node {
  _exprBrand: void;
}

/**
 * Statement nodes perform an action.
 */
export interface Stmt extends Node {
  _stmtBrand: void;
}

// ============================================================================
// Literal Expressions
// ============================================================================

/**
 * Integer literal. Parsed, but not lowered by the code generator.
 */
export class IntLit implements Expr {
  _exprBrand!: void;

  constructor(
    public readonly position: Position,
    public readonly literal: string,
    public readonly value: number
  ) {}

  pos(): Position {
    return this.position;
  }
  toString(): string {
    return this.literal;
  }
}

/**
 * Decimal (floating-point) literal.
 */
export class FloatLit implements Expr {
  _exprBrand!: void;

  constructor(
    public readonly position: Position,
    public readonly literal: string,
    public readonly value: number
  ) {}

  pos(): Position {
    return this.position;
  }
  toString(): string {
    return this.literal;
  }
}

// ============================================================================
// Identifier
// ============================================================================

/**
 * Identifier (symbol reference, or a name in a declaration).
 */
export class Ident implements Expr {
  _exprBrand!: void;

  constructor(
    public readonly position: Position,
    public readonly name: string
  ) {}

  pos(): Position {
    return this.position;
  }
  toString(): string {
    return this.name;
  }
}

// ============================================================================
// Operator Expressions
// ============================================================================

/**
 * Prefix operator expression (unary).
 */
export class PrefixExpr implements Expr {
  _exprBrand!: void;

  constructor(
    public readonly opPos: Position,
    public readonly op: string,
    public right: Expr
  ) {}

  pos(): Position {
    return this.opPos;
  }
  toString(): string {
    return `(${this.op}${this.right.toString()})`;
  }
}

/**
 * Infix operator expression (binary).
 */
export class InfixExpr implements Expr {
  _exprBrand!: void;

  constructor(
    public left: Expr,
    public readonly opPos: Position,
    public readonly op: string,
    public right: Expr
  ) {}

  pos(): Position {
    return this.left.pos();
  }
  toString(): string {
    return `(${this.left.toString()} ${this.op} ${this.right.toString()})`;
  }
}

/**
 * Function call by name.
 */
export class CallExpr implements Expr {
  _exprBrand!: void;

  constructor(
    public readonly callee: Ident,
    public readonly lparen: Position,
    public readonly args: Expr[]
  ) {}

  pos(): Position {
    return this.callee.pos();
  }
  toString(): string {
    return `${this.callee.toString()}(${this.args.map((a) => a.toString()).join(", ")})`;
  }
}

// ============================================================================
// Statements
// ============================================================================

/**
 * Assignment statement (x = value).
 */
export class AssignStmt implements Stmt {
  _stmtBrand!: void;

  constructor(
    public readonly target: Ident,
    public readonly opPos: Position,
    public value: Expr
  ) {}

  pos(): Position {
    return this.target.pos();
  }
  toString(): string {
    return `${this.target.toString()} = ${this.value.toString()};`;
  }
}

/**
 * Return statement.
 */
export class ReturnStmt implements Stmt {
  _stmtBrand!: void;

  constructor(
    public readonly returnPos: Position,
    public value: Expr
  ) {}

  pos(): Position {
    return this.returnPos;
  }
  toString(): string {
    return `return ${this.value.toString()};`;
  }
}

// ============================================================================
// Declarations
// ============================================================================

/**
 * Global parameter declaration (`in name: type;` or `out name: type;`).
 */
export class ParamDecl implements Node {
  constructor(
    public readonly keywordPos: Position,
    public readonly direction: "in" | "out",
    public readonly name: Ident,
    public readonly type: TypeKind
  ) {}

  pos(): Position {
    return this.keywordPos;
  }
  toString(): string {
    return `${this.direction} ${this.name.name}: ${this.type};`;
  }
}

/**
 * Function parameter (`name: type`).
 */
export class FuncParam implements Node {
  constructor(
    public readonly name: Ident,
    public readonly type: TypeKind
  ) {}

  pos(): Position {
    return this.name.pos();
  }
  toString(): string {
    return `${this.name.name}: ${this.type}`;
  }
}

/**
 * Function declaration.
 */
export class FuncDecl implements Node {
  constructor(
    public readonly fnPos: Position,
    public readonly name: Ident,
    public readonly params: FuncParam[],
    public readonly returnType: TypeKind,
    public readonly body: Stmt[]
  ) {}

  pos(): Position {
    return this.fnPos;
  }
  toString(): string {
    const params = this.params.map((p) => p.toString()).join(", ");
    const body = this.body.map((s) => `  ${s.toString()}\n`).join("");
    return `fn ${this.name.name}(${params}): ${this.returnType} {\n${body}}`;
  }
}

/**
 * Root node: a whole shader program.
 */
export class Program implements Node {
  constructor(
    public readonly inParameters: ParamDecl[],
    public readonly outParameters: ParamDecl[],
    public readonly functions: FuncDecl[]
  ) {}

  pos(): Position {
    const first = this.inParameters[0] ?? this.outParameters[0] ?? this.functions[0];
    return first ? first.pos() : NoPos;
  }
  toString(): string {
    return [
      ...this.inParameters.map((p) => p.toString()),
      ...this.outParameters.map((p) => p.toString()),
      ...this.functions.map((f) => f.toString()),
    ].join("\n");
  }
}
