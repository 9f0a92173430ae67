import { describe, it, expect } from "vitest";
import { parse } from "../parser/parser.js";
import * as ast from "../ast/nodes.js";
import { fold, FoldingError } from "./fold.js";

function folded(expr: string, decls: string = ""): ast.Expr {
  const program = parse(`${decls}fn f() { return ${expr}; }`);
  fold(program);
  const stmt = program.functions[0].body[0];
  if (!(stmt instanceof ast.ReturnStmt)) {
    throw new Error("expected a return statement");
  }
  return stmt.value;
}

describe("fold", () => {
  it("should fold float arithmetic", () => {
    const expr = folded("1.5 + 2.5");
    expect(expr).toBeInstanceOf(ast.FloatLit);
    expect(expr.toString()).toBe("4.0");
  });

  it("should fold nested constant subtrees", () => {
    expect(folded("(1.0 + 2.0) * a", "in a: f32;\n").toString()).toBe("(3.0 * a)");
    expect(folded("a * (2.0 / 4.0)", "in a: f32;\n").toString()).toBe("(a * 0.5)");
  });

  it("should round float results to single precision", () => {
    const expr = folded("0.1 + 0.2");
    expect(expr).toBeInstanceOf(ast.FloatLit);
    expect(expr instanceof ast.FloatLit && expr.value).toBe(Math.fround(0.3));
  });

  it("should fold negated literals", () => {
    expect(folded("-2.5").toString()).toBe("-2.5");
    expect(folded("-(1.0 + 1.0)").toString()).toBe("-2.0");
  });

  it("should leave logical not alone", () => {
    expect(folded("!1.0").toString()).toBe("(!1.0)");
  });

  it("should fold integers with 32-bit wrapping", () => {
    expect(folded("7 / 2").toString()).toBe("3");
    expect(folded("2147483647 + 1").toString()).toBe("-2147483648");
    expect(folded("-3 * 4").toString()).toBe("-12");
  });

  it("should not mix integer and float literals", () => {
    expect(folded("1 + 2.0").toString()).toBe("(1 + 2.0)");
  });

  it("should fold call arguments", () => {
    expect(folded("dot(n, Vec3(1.0 + 1.0, 0.0, 0.0))", "in n: vec3;\n").toString()).toBe(
      "dot(n, Vec3(2.0, 0.0, 0.0))"
    );
  });

  it("should fold assignments", () => {
    const program = parse("fn f() { x = 2.0 * 2.0; }");
    fold(program);
    expect(program.functions[0].body[0].toString()).toBe("x = 4.0;");
  });

  it("should reject division by zero", () => {
    expect(() => folded("1.0 / 0.0")).toThrow(FoldingError);
    expect(() => folded("1.0 / 0.0")).toThrow("division by zero in constant expression at line 1, column 21");
    expect(() => folded("4 / 0")).toThrow("division by zero in constant expression");
  });

  it("should reject results that overflow f32", () => {
    expect(() => folded("3.0e38 * 10.0")).toThrow("constant expression overflows f32");
  });
});
