/**
 * Bytecode compiler for the shading language.
 *
 * Pass 1: Collect function signatures for forward and recursive calls
 * Pass 2: Generate each function's code in declaration order
 *
 * Calling convention: arguments are evaluated left to right, each leaving
 * one value on the evaluation stack; `Call` / `CallNative` then binds them
 * to the callee's parameter slots (frame offsets 0, 4, ...).
 */

import * as ast from "../ast/nodes.js";
import { Position, describePosition } from "../token/token.js";
import { Op, MAX_IMMEDIATE } from "../bytecode/opcode.js";
import { CompiledProgram, ProgramBuilder } from "../bytecode/code.js";
import { BytecodeError } from "../bytecode/word.js";
import { BuiltinRegistry, createBuiltins } from "../builtins/builtins.js";
import { parse } from "../parser/parser.js";
import { fold } from "./fold.js";
import { FuncMeta, FuncParamInfo, GlobalTable, resolveSymbol } from "./symbol-table.js";

/**
 * Kinds of code generation failure.
 */
export type CompilerErrorKind =
  | "UnresolvedSymbol"
  | "UnresolvedFunction"
  | "UnsupportedExpression"
  | "ArgumentMismatch"
  | "TypeMismatch"
  | "ImmediateOverflow";

/**
 * Compilation error.
 */
export class CompilerError extends Error {
  constructor(
    public readonly kind: CompilerErrorKind,
    message: string,
    public readonly position: Position,
    /** Offending identifier, when there is one. */
    public readonly symbol?: string
  ) {
    super(`${message} at ${describePosition(position)}`);
    this.name = "CompilerError";
  }
}

/**
 * Compiler configuration.
 */
export interface CompilerConfig {
  /** Builtin operators and functions (defaults to `createBuiltins()`). */
  builtins?: BuiltinRegistry;
  /** Run constant folding before code generation (default true). */
  fold?: boolean;
  /** Source filename, for parse errors. */
  filename?: string;
}

/**
 * Signature of a user function, known before its code exists.
 */
interface FuncSignature {
  decl: ast.FuncDecl;
  params: FuncParamInfo[];
  /** Set once generation of the function starts. */
  meta: FuncMeta | null;
  /** `Call` words waiting for this function's address. */
  pendingCalls: number[];
}

/**
 * Placeholder immediate for calls to functions not yet generated.
 */
const PLACEHOLDER = MAX_IMMEDIATE;

/**
 * A compilation session. Owns its tables and its id sequence; compiles
 * exactly one program.
 */
export class Compiler {
  private code: ProgramBuilder = new ProgramBuilder();
  private builtins: BuiltinRegistry;
  private runFold: boolean;
  private globals: GlobalTable = new GlobalTable();
  private signatures: Map<string, FuncSignature> = new Map();
  private functions: Map<string, FuncMeta> = new Map();
  private funcIndex: number = 0;
  private used: boolean = false;

  constructor(config: CompilerConfig = {}) {
    this.builtins = config.builtins ?? createBuiltins();
    this.runFold = config.fold ?? true;
  }

  /**
   * Fold and generate code for a program.
   */
  compile(program: ast.Program): CompiledProgram {
    if (this.used) {
      throw new Error("a Compiler instance compiles a single program");
    }
    this.used = true;

    if (this.runFold) {
      fold(program);
    }

    this.globals = GlobalTable.fromProgram(program);
    this.collectSignatures(program);

    for (const decl of program.functions) {
      this.compileFunction(decl);
    }

    return new CompiledProgram(
      this.code.snapshot(),
      this.globals.entries(),
      this.functions,
      this.builtins.nativeTable(),
      this.globals.staticSectionSize()
    );
  }

  /**
   * Words emitted so far, including after a failed compile.
   */
  emitted(): number[] {
    return this.code.snapshot();
  }

  private nextFuncId(): string {
    return `fn.${this.funcIndex++}`;
  }

  // ===========================================================================
  // Pass 1: Collect Function Signatures
  // ===========================================================================

  private collectSignatures(program: ast.Program): void {
    for (const decl of program.functions) {
      this.signatures.set(decl.name.name, {
        decl,
        params: decl.params.map((p) => ({ name: p.name.name, type: p.type })),
        meta: null,
        pendingCalls: [],
      });
    }
  }

  // ===========================================================================
  // Function Compilation
  // ===========================================================================

  private compileFunction(decl: ast.FuncDecl): void {
    const signature = this.requireSignature(decl.name);
    const func = new FuncMeta(
      this.nextFuncId(),
      decl.name.name,
      this.code.offset(),
      signature.params,
      decl.returnType
    );
    signature.meta = func;
    this.functions.set(func.name, func);

    this.withPosition(decl.name.position, () => {
      for (const offset of signature.pendingCalls) {
        this.code.patchImmediate(offset, func.address);
      }
    });
    signature.pendingCalls = [];

    let hasReturn = false;
    for (const stmt of decl.body) {
      const mark = this.code.offset();
      try {
        if (stmt instanceof ast.ReturnStmt) {
          hasReturn = true;
        }
        this.withPosition(stmt.pos(), () => this.compileStatement(stmt, func));
      } catch (err) {
        this.code.truncate(mark);
        throw err;
      }
    }

    if (!hasReturn) {
      this.withPosition(decl.name.position, () => {
        this.code.emit(Op.Void);
        this.code.emit(Op.Ret, func.frameSize());
      });
    }
    func.seal();
  }

  /**
   * Run an emitting step, reporting encoding limits at `pos`.
   */
  private withPosition(pos: Position, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      if (err instanceof BytecodeError) {
        throw new CompilerError("ImmediateOverflow", err.message, pos);
      }
      throw err;
    }
  }

  private requireSignature(name: ast.Ident): FuncSignature {
    const signature = this.signatures.get(name.name);
    if (!signature) {
      throw new CompilerError("UnresolvedFunction", `undefined function: ${name.name}`, name.position, name.name);
    }
    return signature;
  }

  // ===========================================================================
  // Statement Compilation
  // ===========================================================================

  private compileStatement(stmt: ast.Stmt, func: FuncMeta): void {
    if (stmt instanceof ast.AssignStmt) {
      this.compileAssignStmt(stmt, func);
    } else if (stmt instanceof ast.ReturnStmt) {
      const type = this.compileExpr(stmt.value, func);
      if (type !== func.returnType) {
        throw new CompilerError(
          "TypeMismatch",
          `${func.name} returns ${func.returnType}, got ${type}`,
          stmt.value.pos(),
          func.name
        );
      }
      this.code.emit(Op.Ret, func.frameSize());
    } else {
      throw new CompilerError(
        "UnsupportedExpression",
        `unknown statement type: ${stmt.constructor.name}`,
        stmt.pos()
      );
    }
  }

  private compileAssignStmt(stmt: ast.AssignStmt, func: FuncMeta): void {
    const type = this.compileExpr(stmt.value, func);
    const name = stmt.target.name;

    const existing = func.lookupLocal(name) ?? this.globals.lookup(name);
    if (existing) {
      if (existing.type !== type) {
        throw new CompilerError(
          "TypeMismatch",
          `cannot assign ${type} to ${name} of type ${existing.type}`,
          stmt.target.position,
          name
        );
      }
      this.code.emit(existing.storage === "local" ? Op.StoreLocal : Op.StoreGlobal, existing.offset);
      return;
    }

    const symbol = func.allocateLocal(name, type);
    this.code.emit(Op.StoreLocal, symbol.offset);
  }

  // ===========================================================================
  // Expression Compilation
  // ===========================================================================

  /**
   * Lower an expression and return its static type.
   */
  private compileExpr(expr: ast.Expr, func: FuncMeta): ast.TypeKind {
    if (expr instanceof ast.InfixExpr) {
      return this.compileInfixExpr(expr, func);
    } else if (expr instanceof ast.PrefixExpr) {
      return this.compilePrefixExpr(expr, func);
    } else if (expr instanceof ast.CallExpr) {
      return this.compileCallExpr(expr, func);
    } else if (expr instanceof ast.FloatLit) {
      this.code.emitFloat(expr.value);
      return "f32";
    } else if (expr instanceof ast.Ident) {
      return this.compileIdent(expr, func);
    } else if (expr instanceof ast.IntLit) {
      throw new CompilerError(
        "UnsupportedExpression",
        `integer literal not supported: ${expr.literal}`,
        expr.position
      );
    }
    throw new CompilerError(
      "UnsupportedExpression",
      `unknown expression type: ${expr.constructor.name}`,
      expr.pos()
    );
  }

  private compileIdent(expr: ast.Ident, func: FuncMeta): ast.TypeKind {
    const symbol = resolveSymbol(expr.name, func, this.globals);
    if (!symbol) {
      throw new CompilerError("UnresolvedSymbol", `undefined variable: ${expr.name}`, expr.position, expr.name);
    }
    this.code.emit(symbol.storage === "local" ? Op.LoadLocal : Op.LoadGlobal, symbol.offset);
    return symbol.type;
  }

  private compileInfixExpr(expr: ast.InfixExpr, func: FuncMeta): ast.TypeKind {
    const left = this.compileExpr(expr.left, func);
    const right = this.compileExpr(expr.right, func);
    return this.emitOperator(expr.op, left, right, expr.opPos);
  }

  private compilePrefixExpr(expr: ast.PrefixExpr, func: FuncMeta): ast.TypeKind {
    if (expr.op !== "-") {
      throw new CompilerError("UnsupportedExpression", `unknown prefix operator: ${expr.op}`, expr.opPos);
    }
    const operand = this.compileExpr(expr.right, func);
    this.code.emitFloat(-1.0);
    return this.emitOperator("*", operand, "f32", expr.opPos);
  }

  private emitOperator(op: string, left: ast.TypeKind, right: ast.TypeKind, pos: Position): ast.TypeKind {
    const target = this.builtins.resolve(op, [left, right]);
    if (!target) {
      throw new CompilerError("UnsupportedExpression", `no operator ${op} for (${left}, ${right})`, pos);
    }
    if (target.kind === "opcode") {
      this.code.emit(target.op);
    } else {
      this.code.emit(Op.CallNative, target.handle);
    }
    return target.returnType;
  }

  private compileCallExpr(expr: ast.CallExpr, func: FuncMeta): ast.TypeKind {
    const name = expr.callee.name;
    const signature = this.signatures.get(name);

    if (!signature && !this.builtins.has(name)) {
      throw new CompilerError("UnresolvedFunction", `undefined function: ${name}`, expr.callee.position, name);
    }

    const argTypes = expr.args.map((arg) => this.compileExpr(arg, func));

    if (signature) {
      this.checkArguments(expr, signature.params.map((p) => p.type), argTypes);
      if (signature.meta) {
        this.code.emit(Op.Call, signature.meta.address);
      } else {
        signature.pendingCalls.push(this.code.emit(Op.Call, PLACEHOLDER));
      }
      return signature.decl.returnType;
    }

    const target = this.builtins.resolve(name, argTypes);
    if (!target) {
      throw new CompilerError(
        "ArgumentMismatch",
        `no overload of ${name} for (${argTypes.join(", ")})`,
        expr.callee.position,
        name
      );
    }
    if (target.kind === "opcode") {
      this.code.emit(target.op);
    } else {
      this.code.emit(Op.CallNative, target.handle);
    }
    return target.returnType;
  }

  private checkArguments(expr: ast.CallExpr, expected: ast.TypeKind[], actual: ast.TypeKind[]): void {
    const name = expr.callee.name;
    if (expected.length !== actual.length) {
      throw new CompilerError(
        "ArgumentMismatch",
        `${name} expects ${expected.length} argument(s), got ${actual.length}`,
        expr.callee.position,
        name
      );
    }
    for (let i = 0; i < expected.length; i++) {
      if (expected[i] !== actual[i]) {
        throw new CompilerError(
          "ArgumentMismatch",
          `argument ${i + 1} of ${name} must be ${expected[i]}, got ${actual[i]}`,
          expr.args[i].pos(),
          name
        );
      }
    }
  }
}

/**
 * Compile a parsed program: fold, then generate code.
 */
export function compile(program: ast.Program, config?: CompilerConfig): CompiledProgram {
  return new Compiler(config).compile(program);
}

/**
 * Generate code without folding.
 */
export function codegen(program: ast.Program, config?: CompilerConfig): CompiledProgram {
  return new Compiler({ ...config, fold: false }).compile(program);
}

/**
 * Parse and compile source code.
 */
export function compileSource(source: string, config?: CompilerConfig): CompiledProgram {
  const program = parse(source, config?.filename);
  return compile(program, config);
}
