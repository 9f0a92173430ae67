/**
 * Token types for the shading language lexer.
 */
export enum TokenKind {
  // Literals
  INT = "INT",
  FLOAT = "FLOAT",
  IDENT = "IDENT",

  // Operators
  PLUS = "+",
  MINUS = "-",
  ASTERISK = "*",
  SLASH = "/",
  BANG = "!",
  ASSIGN = "=",

  // Punctuation
  LPAREN = "(",
  RPAREN = ")",
  LBRACE = "{",
  RBRACE = "}",
  COMMA = ",",
  SEMICOLON = ";",
  COLON = ":",

  // Keywords
  IN = "in",
  OUT = "out",
  FN = "fn",
  RETURN = "return",

  // Special
  EOF = "EOF",
  ILLEGAL = "ILLEGAL",
}

const keywords: Map<string, TokenKind> = new Map([
  ["in", TokenKind.IN],
  ["out", TokenKind.OUT],
  ["fn", TokenKind.FN],
  ["return", TokenKind.RETURN],
]);

/**
 * Look up an identifier to see if it's a keyword.
 */
export function lookupIdentifier(ident: string): TokenKind {
  return keywords.get(ident) ?? TokenKind.IDENT;
}

/**
 * Position in source code.
 */
export interface Position {
  /** Character offset within the file */
  char: number;
  /** Character offset of the start of the current line */
  lineStart: number;
  /** 0-indexed line number */
  line: number;
  /** 0-indexed column number */
  column: number;
  /** Filename */
  file: string;
}

export function newPosition(
  char: number,
  lineStart: number,
  line: number,
  column: number,
  file: string
): Position {
  return { char, lineStart, line, column, file };
}

/**
 * The zero value Position, used for nodes built outside the parser.
 */
export const NoPos: Position = {
  char: 0,
  lineStart: 0,
  line: 0,
  column: 0,
  file: "",
};

/**
 * Returns the 1-indexed line number.
 */
export function lineNumber(p: Position): number {
  return p.line + 1;
}

/**
 * Returns the 1-indexed column number.
 */
export function columnNumber(p: Position): number {
  return p.column + 1;
}

/**
 * Format a position as `line L, column C` for error messages.
 */
export function describePosition(p: Position): string {
  return `line ${lineNumber(p)}, column ${columnNumber(p)}`;
}

/**
 * A token produced by the lexer.
 */
export interface Token {
  kind: TokenKind;
  literal: string;
  start: Position;
}

export function newToken(kind: TokenKind, literal: string, start: Position): Token {
  return { kind, literal, start };
}
