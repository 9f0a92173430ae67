/**
 * shadelang - compiler from a small shading language to VM bytecode.
 *
 * @packageDocumentation
 */

// Token exports
export {
  type Token,
  TokenKind,
  type Position,
  newToken,
  newPosition,
  NoPos,
  lineNumber,
  columnNumber,
  describePosition,
  lookupIdentifier,
} from "./token/token.js";

// Lexer exports
export { Lexer, LexerError, tokenize, lineText } from "./lexer/lexer.js";

// AST exports
export * from "./ast/nodes.js";

// Parser exports
export { Parser, ParserError, parse } from "./parser/parser.js";
export { Precedence, getPrecedence } from "./parser/precedence.js";

// Bytecode exports
export * from "./bytecode/index.js";

// Compiler exports
export * from "./compiler/index.js";

// Builtins exports
export * from "./builtins/index.js";

// Runner exports
export { compileFile, formatError } from "./runner.js";
