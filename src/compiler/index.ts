/**
 * Compiler module exports.
 */

export {
  Compiler,
  CompilerError,
  type CompilerErrorKind,
  type CompilerConfig,
  compile,
  codegen,
  compileSource,
} from "./compiler.js";

export { fold, foldExpr, FoldingError } from "./fold.js";

export {
  SLOT_SIZE,
  GlobalTable,
  FuncMeta,
  resolveSymbol,
  type SymbolMeta,
  type Storage,
  type FuncParamInfo,
} from "./symbol-table.js";
