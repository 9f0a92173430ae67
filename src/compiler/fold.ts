/**
 * Constant folding over function bodies.
 *
 * Rewrites the tree in place: operators whose operands are literals of the
 * same kind are replaced by a literal holding the result. Decimal folds use
 * single-precision arithmetic, integer folds wrap to 32 bits.
 */

import * as ast from "../ast/nodes.js";
import { Position, describePosition } from "../token/token.js";

/**
 * A constant subexpression that cannot be reduced safely.
 */
export class FoldingError extends Error {
  constructor(
    message: string,
    public readonly position: Position
  ) {
    super(`${message} at ${describePosition(position)}`);
    this.name = "FoldingError";
  }
}

/**
 * Fold every function body of a program.
 */
export function fold(program: ast.Program): void {
  for (const func of program.functions) {
    for (const stmt of func.body) {
      if (stmt instanceof ast.AssignStmt || stmt instanceof ast.ReturnStmt) {
        stmt.value = foldExpr(stmt.value);
      }
    }
  }
}

/**
 * Fold an expression tree, returning the (possibly replaced) root.
 */
export function foldExpr(expr: ast.Expr): ast.Expr {
  if (expr instanceof ast.InfixExpr) {
    expr.left = foldExpr(expr.left);
    expr.right = foldExpr(expr.right);
    return foldInfix(expr);
  }
  if (expr instanceof ast.PrefixExpr) {
    expr.right = foldExpr(expr.right);
    return foldPrefix(expr);
  }
  if (expr instanceof ast.CallExpr) {
    for (let i = 0; i < expr.args.length; i++) {
      expr.args[i] = foldExpr(expr.args[i]);
    }
  }
  return expr;
}

function foldInfix(expr: ast.InfixExpr): ast.Expr {
  const { left, right } = expr;
  if (left instanceof ast.FloatLit && right instanceof ast.FloatLit) {
    const value = floatOp(expr, Math.fround(left.value), Math.fround(right.value));
    return value === null ? expr : floatLit(left.position, value);
  }
  if (left instanceof ast.IntLit && right instanceof ast.IntLit) {
    const value = intOp(expr, left.value | 0, right.value | 0);
    return value === null ? expr : new ast.IntLit(left.position, String(value), value);
  }
  return expr;
}

function foldPrefix(expr: ast.PrefixExpr): ast.Expr {
  if (expr.op !== "-") {
    return expr;
  }
  const { right } = expr;
  if (right instanceof ast.FloatLit) {
    return floatLit(expr.opPos, -Math.fround(right.value));
  }
  if (right instanceof ast.IntLit) {
    const value = -right.value | 0;
    return new ast.IntLit(expr.opPos, String(value), value);
  }
  return expr;
}

function floatOp(expr: ast.InfixExpr, a: number, b: number): number | null {
  let result: number;
  switch (expr.op) {
    case "+":
      result = a + b;
      break;
    case "-":
      result = a - b;
      break;
    case "*":
      result = a * b;
      break;
    case "/":
      if (b === 0) {
        throw new FoldingError("division by zero in constant expression", expr.opPos);
      }
      result = a / b;
      break;
    default:
      return null;
  }
  result = Math.fround(result);
  if (!Number.isFinite(result)) {
    throw new FoldingError("constant expression overflows f32", expr.opPos);
  }
  return result;
}

function intOp(expr: ast.InfixExpr, a: number, b: number): number | null {
  switch (expr.op) {
    case "+":
      return (a + b) | 0;
    case "-":
      return (a - b) | 0;
    case "*":
      return Math.imul(a, b);
    case "/":
      if (b === 0) {
        throw new FoldingError("division by zero in constant expression", expr.opPos);
      }
      return (a / b) | 0;
    default:
      return null;
  }
}

function floatLit(position: Position, value: number): ast.FloatLit {
  const literal = Number.isInteger(value) ? value.toFixed(1) : String(value);
  return new ast.FloatLit(position, literal, value);
}
