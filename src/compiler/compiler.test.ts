/**
 * Compiler tests.
 */

import { describe, it, expect } from "vitest";
import { parse } from "../parser/parser.js";
import { Compiler, CompilerError, codegen, compileSource } from "./compiler.js";
import { Op, opName } from "../bytecode/opcode.js";
import { decodeInstructions } from "../bytecode/word.js";
import { CompiledProgram } from "../bytecode/code.js";

const ONE = 0x3f800000;
const MINUS_ONE = 0xbf800000;

function word(op: Op, imm: number = 0): number {
  return (op | (imm << 16)) >>> 0;
}

function instructionNames(program: CompiledProgram): string[] {
  return decodeInstructions(program.instructions).map((instr) => opName(instr.op));
}

function compileError(source: string, compiler: Compiler = new Compiler()): CompilerError {
  try {
    compiler.compile(parse(source));
  } catch (err) {
    if (err instanceof CompilerError) {
      return err;
    }
    throw err;
  }
  throw new Error("expected compilation to fail");
}

describe("Compiler", () => {
  describe("static section", () => {
    it("should lay out in-parameters before out-parameters", () => {
      const program = compileSource("in a: f32;\nout c: vec3;\nin b: f32;");
      expect(program.globals.get("a")?.offset).toBe(0);
      expect(program.globals.get("b")?.offset).toBe(4);
      expect(program.globals.get("c")?.offset).toBe(8);
      expect(program.globals.get("c")?.type).toBe("vec3");
      expect(program.globals.get("a")?.storage).toBe("static");
    });

    it("should size the static section and stack", () => {
      const program = compileSource("in a: f32;\nin b: f32;\nout c: vec3;");
      expect(program.staticSectionSize).toBe(12);
      expect(program.minStackSize).toBe(1036);
    });

    it("should compile an empty program", () => {
      const program = compileSource("");
      expect(program.instructions).toEqual([]);
      expect(program.staticSectionSize).toBe(0);
      expect(program.minStackSize).toBe(1024);
    });
  });

  describe("assignments", () => {
    it("should allocate locals in order with explicit stores", () => {
      const program = compileSource("fn main() { x = 3.5; y = x; }");
      expect(program.instructions).toEqual([
        word(Op.ConstF32),
        0x40600000,
        word(Op.StoreLocal, 0),
        word(Op.LoadLocal, 0),
        word(Op.StoreLocal, 4),
        word(Op.Void),
        word(Op.Ret, 8),
      ]);
      const locals = program.functions.get("main")?.locals;
      expect(locals?.get("x")?.offset).toBe(0);
      expect(locals?.get("y")?.offset).toBe(4);
    });

    it("should store to out-parameters", () => {
      const program = compileSource("out o: f32;\nfn main() { o = 1.0; }");
      expect(program.instructions).toEqual([word(Op.ConstF32), ONE, word(Op.StoreGlobal, 0), word(Op.Void), word(Op.Ret, 0)]);
    });

    it("should store to function parameters before globals", () => {
      const program = compileSource("out x: f32;\nfn f(x: f32) { x = 1.0; }");
      expect(program.instructions).toEqual([word(Op.ConstF32), ONE, word(Op.StoreLocal, 0), word(Op.Void), word(Op.Ret, 4)]);
    });
  });

  describe("returns", () => {
    it("should load operands left to right", () => {
      const program = compileSource("in a: f32;\nin b: f32;\nfn f() { return a - b; }");
      expect(program.instructions).toEqual([
        word(Op.LoadGlobal, 0),
        word(Op.LoadGlobal, 4),
        word(Op.SubF32),
        word(Op.Ret, 0),
      ]);
    });

    it("should return the frame size at the point of return", () => {
      const program = compileSource("fn f() { return 1.0; x = 2.0; }");
      expect(program.instructions).toEqual([
        word(Op.ConstF32),
        ONE,
        word(Op.Ret, 0),
        word(Op.ConstF32),
        0x40000000,
        word(Op.StoreLocal, 0),
      ]);
    });

    it("should round-trip float literals through the stream", () => {
      const [constant] = decodeInstructions(compileSource("fn f() { return 3.5; }").instructions);
      expect(constant.op).toBe(Op.ConstF32);
      if (constant.op !== Op.ConstF32) return;
      expect(constant.bits).toBe(0x40600000);
      expect(constant.value).toBe(3.5);
    });

    it("should add an implicit return", () => {
      const program = compileSource("fn f() { }");
      expect(instructionNames(program)).toEqual(["Void", "Ret"]);
    });
  });

  describe("expressions", () => {
    it("should lower negation to a multiply by -1", () => {
      const program = compileSource("in a: f32;\nfn f() { return -a; }");
      expect(program.instructions).toEqual([
        word(Op.LoadGlobal, 0),
        word(Op.ConstF32),
        MINUS_ONE,
        word(Op.MulF32),
        word(Op.Ret, 0),
      ]);
    });

    it("should negate vectors through the native overload", () => {
      const program = compileSource("in v: vec3;\nfn f(): vec3 { return -v; }");
      expect(program.instructions).toEqual([
        word(Op.LoadGlobal, 0),
        word(Op.ConstF32),
        MINUS_ONE,
        word(Op.CallNative, 1),
        word(Op.Ret, 0),
      ]);
    });

    it("should reject integer literals", () => {
      const err = compileError("fn f() { return 2; }");
      expect(err.kind).toBe("UnsupportedExpression");
      expect(err.message).toBe("integer literal not supported: 2 at line 1, column 17");
    });

    it("should reject logical not", () => {
      const err = compileError("fn f() { return !1.0; }");
      expect(err.kind).toBe("UnsupportedExpression");
      expect(err.message).toBe("unknown prefix operator: ! at line 1, column 17");
    });

    it("should reject operators without an overload", () => {
      const err = compileError("in a: vec3;\nfn f(): vec3 { return a - a; }");
      expect(err.kind).toBe("UnsupportedExpression");
      expect(err.message).toBe("no operator - for (vec3, vec3) at line 2, column 25");
    });
  });

  describe("symbol errors", () => {
    it("should name the unresolved symbol", () => {
      const compiler = new Compiler();
      const err = compileError("fn f() { x = 1.0; y = z; }", compiler);
      expect(err).toBeInstanceOf(CompilerError);
      expect(err.kind).toBe("UnresolvedSymbol");
      expect(err.symbol).toBe("z");
      expect(err.message).toBe("undefined variable: z at line 1, column 23");
    });

    it("should keep only the words of completed statements", () => {
      const compiler = new Compiler();
      compileError("fn f() { x = 1.0; y = 1.0 + z; }", compiler);
      expect(compiler.emitted()).toEqual([word(Op.ConstF32), ONE, word(Op.StoreLocal, 0)]);
    });

    it("should report unknown functions", () => {
      const err = compileError("fn f() { return g(); }");
      expect(err.kind).toBe("UnresolvedFunction");
      expect(err.symbol).toBe("g");
      expect(err.message).toBe("undefined function: g at line 1, column 17");
    });
  });

  describe("types", () => {
    it("should check returns against the declared type", () => {
      const err = compileError("fn v(): vec3 { return Vec3(1.0, 1.0, 1.0); }\nfn main() { return v() * 2.0; }");
      expect(err.kind).toBe("TypeMismatch");
      expect(err.symbol).toBe("main");
      expect(err.message).toBe("main returns f32, got vec3 at line 2, column 20");
    });

    it("should default the return type to f32", () => {
      const err = compileError("fn v() { return Vec3(1.0, 1.0, 1.0); }");
      expect(err.kind).toBe("TypeMismatch");
      expect(err.message).toBe("v returns f32, got vec3 at line 1, column 17");
    });

    it("should check stores into globals", () => {
      const err = compileError("in n: vec3;\nout o: f32;\nfn main() { o = n; }");
      expect(err.kind).toBe("TypeMismatch");
      expect(err.symbol).toBe("o");
      expect(err.message).toBe("cannot assign vec3 to o of type f32 at line 3, column 13");
    });

    it("should keep the type of a local across assignments", () => {
      const compiler = new Compiler();
      const err = compileError("fn main() { x = 1.0; x = Vec3(1.0, 1.0, 1.0); }", compiler);
      expect(err.kind).toBe("TypeMismatch");
      expect(err.message).toBe("cannot assign vec3 to x of type f32 at line 1, column 22");
      expect(compiler.emitted()).toEqual([word(Op.ConstF32), ONE, word(Op.StoreLocal, 0)]);
    });

    it("should keep the type of a parameter", () => {
      const err = compileError("fn f(x: f32) { x = Vec3(1.0, 1.0, 1.0); }");
      expect(err.kind).toBe("TypeMismatch");
      expect(err.message).toBe("cannot assign vec3 to x of type f32 at line 1, column 16");
    });

    it("should accept stores of the slot's type", () => {
      const program = compileSource("in n: vec3;\nout o: vec3;\nfn main() { o = n; }");
      expect(program.instructions).toEqual([
        word(Op.LoadGlobal, 0),
        word(Op.StoreGlobal, 4),
        word(Op.Void),
        word(Op.Ret, 0),
      ]);
    });
  });

  describe("encoding limits", () => {
    const locals = Array.from({ length: 16384 }, (_, i) => `v${i} = 1.0;`).join(" ");

    it("should report a frame offset that does not fit at the statement", () => {
      const err = compileError(`fn f() {\n${locals}\nlast = 1.0;\n}`);
      expect(err.kind).toBe("ImmediateOverflow");
      expect(err.message).toBe("immediate out of range for StoreLocal: 65536 at line 3, column 1");
    });

    it("should report an implicit return that does not fit at the function", () => {
      const err = compileError(`fn f() {\n${locals}\n}`);
      expect(err.kind).toBe("ImmediateOverflow");
      expect(err.message).toBe("immediate out of range for Ret: 65536 at line 1, column 4");
    });
  });

  describe("calls", () => {
    it("should patch forward calls", () => {
      const program = compileSource("fn main() { return helper(); }\nfn helper() { return 1.0; }");
      expect(program.functionAddress("main")).toBe(0);
      expect(program.functionAddress("helper")).toBe(2);
      expect(program.instructions).toEqual([word(Op.Call, 2), word(Op.Ret, 0), word(Op.ConstF32), ONE, word(Op.Ret, 0)]);
    });

    it("should call backward and recursive functions directly", () => {
      const program = compileSource("fn f(x: f32) { return f(x); }");
      expect(program.instructions).toEqual([word(Op.LoadLocal, 0), word(Op.Call, 0), word(Op.Ret, 4)]);
    });

    it("should check argument counts", () => {
      const err = compileError("fn g(v: vec3) { return 1.0; }\nfn f() { return g(); }");
      expect(err.kind).toBe("ArgumentMismatch");
      expect(err.symbol).toBe("g");
      expect(err.message).toBe("g expects 1 argument(s), got 0 at line 2, column 17");
    });

    it("should check argument types", () => {
      const err = compileError("fn g(v: vec3) { return 1.0; }\nfn f() { return g(1.0); }");
      expect(err.kind).toBe("ArgumentMismatch");
      expect(err.message).toBe("argument 1 of g must be vec3, got f32 at line 2, column 19");
    });

    it("should call native builtins by handle", () => {
      const program = compileSource("in n: vec3;\nout o: vec3;\nfn main() { o = normalize(n); }");
      expect(program.instructions).toEqual([
        word(Op.LoadGlobal, 0),
        word(Op.CallNative, 4),
        word(Op.StoreGlobal, 4),
        word(Op.Void),
        word(Op.Ret, 0),
      ]);
      expect(program.natives[4].name).toBe("normalize");
    });

    it("should construct vectors from their components", () => {
      const program = compileSource("fn f(): vec3 { return Vec3(1.0, 2.0, 1.0); }");
      expect(instructionNames(program)).toEqual(["ConstF32", "ConstF32", "ConstF32", "CallNative", "Ret"]);
      expect(program.instructions[6]).toBe(word(Op.CallNative, 3));
    });

    it("should reject builtin calls without a matching overload", () => {
      const err = compileError("in n: vec3;\nfn f() { return dot(n); }");
      expect(err.kind).toBe("ArgumentMismatch");
      expect(err.message).toBe("no overload of dot for (vec3) at line 2, column 17");
    });
  });

  describe("folding", () => {
    it("should fold constants by default", () => {
      const program = compileSource("fn f() { return 2.0 * 3.0; }");
      expect(program.instructions).toEqual([word(Op.ConstF32), 0x40c00000, word(Op.Ret, 0)]);
    });

    it("should leave constants alone when folding is off", () => {
      const program = codegen(parse("fn f() { return 2.0 * 3.0; }"));
      expect(program.instructions).toEqual([
        word(Op.ConstF32),
        0x40000000,
        word(Op.ConstF32),
        0x40400000,
        word(Op.MulF32),
        word(Op.Ret, 0),
      ]);
    });
  });

  describe("sessions", () => {
    it("should number functions per session", () => {
      const source = "fn a() { }\nfn b() { }";
      for (let i = 0; i < 2; i++) {
        const program = compileSource(source);
        expect(program.functions.get("a")?.id).toBe("fn.0");
        expect(program.functions.get("b")?.id).toBe("fn.1");
      }
    });

    it("should compile a single program per instance", () => {
      const compiler = new Compiler();
      compiler.compile(parse("fn a() { }"));
      expect(() => compiler.compile(parse("fn a() { }"))).toThrow("a Compiler instance compiles a single program");
    });

    it("should seal function frames once compiled", () => {
      const program = compileSource("fn main() { x = 1.0; }");
      const main = program.functions.get("main");
      expect(main?.isSealed()).toBe(true);
      expect(() => main?.allocateLocal("z", "f32")).toThrow("frame of main is sealed");
      expect(main?.frameSize()).toBe(4);
      expect([...(main?.locals.keys() ?? [])]).toEqual(["x"]);
    });

    it("should return a frozen program", () => {
      const program = compileSource("fn a() { }");
      expect(Object.isFrozen(program)).toBe(true);
      expect(Object.isFrozen(program.instructions)).toBe(true);
      expect(program.functionAddress("missing")).toBeUndefined();
    });

    it("should serialize words in host byte order", () => {
      const program = compileSource("fn a() { }");
      const bytes = program.toBytes();
      expect(bytes.byteLength).toBe(8);
      expect([...new Uint32Array(bytes.buffer)]).toEqual([word(Op.Void), word(Op.Ret, 0)]);
    });
  });
});
