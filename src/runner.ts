/**
 * Compile shader files and render compiler errors for people.
 */

import * as fs from "fs";
import * as path from "path";
import { LexerError, lineText } from "./lexer/lexer.js";
import { ParserError, parse } from "./parser/parser.js";
import { Compiler, CompilerConfig, CompilerError } from "./compiler/compiler.js";
import { FoldingError } from "./compiler/fold.js";
import { CompiledProgram } from "./bytecode/code.js";
import { Position, columnNumber, lineNumber } from "./token/token.js";

/**
 * Result of compiling a file: the program plus the source it came from.
 */
export interface CompiledFile {
  filename: string;
  source: string;
  program: CompiledProgram;
}

/**
 * Read and compile a shader file.
 */
export function compileFile(filepath: string, config: CompilerConfig = {}): CompiledFile {
  const resolved = path.resolve(filepath);

  if (!fs.existsSync(resolved)) {
    throw new Error(`File not found: ${filepath}`);
  }

  const source = fs.readFileSync(resolved, "utf-8");
  const filename = config.filename ?? filepath;
  const ast = parse(source, filename);
  const program = new Compiler({ ...config, filename }).compile(ast);
  return { filename, source, program };
}

function positionOf(err: unknown): Position | null {
  if (
    err instanceof LexerError ||
    err instanceof ParserError ||
    err instanceof FoldingError ||
    err instanceof CompilerError
  ) {
    return err.position;
  }
  return null;
}

/**
 * Render an error as `file:line:col: error: message`, followed by the
 * offending source line and a caret when the error has a position.
 */
export function formatError(err: unknown, source?: string): string {
  const message = err instanceof Error ? err.message : String(err);
  const pos = positionOf(err);
  if (!pos) {
    return `error: ${message}`;
  }

  const header = `${pos.file || "<input>"}:${lineNumber(pos)}:${columnNumber(pos)}: error: ${message}`;
  if (source === undefined) {
    return header;
  }
  const line = lineText(source, pos);
  return `${header}\n  ${line}\n  ${" ".repeat(pos.column)}^`;
}
