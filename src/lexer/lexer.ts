import {
  Token,
  TokenKind,
  Position,
  newPosition,
  newToken,
  lookupIdentifier,
  describePosition,
} from "../token/token.js";

/**
 * Lexer error with position information.
 */
export class LexerError extends Error {
  constructor(
    message: string,
    public readonly position: Position
  ) {
    super(`${message} at ${describePosition(position)}`);
    this.name = "LexerError";
  }
}

const singleCharTokens: Map<string, TokenKind> = new Map([
  ["+", TokenKind.PLUS],
  ["-", TokenKind.MINUS],
  ["*", TokenKind.ASTERISK],
  ["/", TokenKind.SLASH],
  ["!", TokenKind.BANG],
  ["=", TokenKind.ASSIGN],
  ["(", TokenKind.LPAREN],
  [")", TokenKind.RPAREN],
  ["{", TokenKind.LBRACE],
  ["}", TokenKind.RBRACE],
  [",", TokenKind.COMMA],
  [";", TokenKind.SEMICOLON],
  [":", TokenKind.COLON],
]);

/**
 * Lexer tokenizes shader source code.
 *
 * Newlines are insignificant: statements and declarations end with `;`.
 */
export class Lexer {
  private input: string;
  private characters: string[];
  private position: number = -1;
  private nextPosition: number = 0;
  private ch: string = "";
  private line: number = 0;
  private column: number = -1;
  private lineStart: number = 0;
  private file: string;
  private tokenStartPosition: Position;

  constructor(input: string, file: string = "<stdin>") {
    this.input = input;
    this.characters = [...input];
    this.file = file;
    this.tokenStartPosition = this.currentPosition();
    this.readChar();
  }

  private currentPosition(): Position {
    return newPosition(this.position, this.lineStart, this.line, this.column, this.file);
  }

  private readChar(): void {
    if (this.ch === "\n") {
      this.line++;
      this.column = -1;
      this.lineStart = this.nextPosition;
    }
    if (this.nextPosition >= this.characters.length) {
      this.ch = "\0";
    } else {
      this.ch = this.characters[this.nextPosition];
    }
    this.position = this.nextPosition;
    this.nextPosition++;
    this.column++;
  }

  private peekChar(): string {
    if (this.nextPosition >= this.characters.length) {
      return "\0";
    }
    return this.characters[this.nextPosition];
  }

  private skipWhitespace(): void {
    while (this.ch === " " || this.ch === "\t" || this.ch === "\n" || this.ch === "\r") {
      this.readChar();
    }
  }

  /**
   * Skip whitespace and comments ahead of the next token.
   */
  private skipTrivia(): void {
    this.skipWhitespace();
    while (this.ch === "/") {
      if (this.peekChar() === "/") {
        while ((this.ch as string) !== "\n" && (this.ch as string) !== "\0") {
          this.readChar();
        }
      } else if (this.peekChar() === "*") {
        const start = this.currentPosition();
        this.readChar(); // consume /
        this.readChar(); // consume *
        while (!((this.ch as string) === "*" && this.peekChar() === "/")) {
          if ((this.ch as string) === "\0") {
            throw new LexerError("Unterminated block comment", start);
          }
          this.readChar();
        }
        this.readChar(); // consume *
        this.readChar(); // consume /
      } else {
        return;
      }
      this.skipWhitespace();
    }
  }

  private makeToken(kind: TokenKind, literal: string): Token {
    return newToken(kind, literal, this.tokenStartPosition);
  }

  /**
   * Get the next token.
   */
  nextToken(): Token {
    this.skipTrivia();
    this.tokenStartPosition = this.currentPosition();

    if (this.ch === "\0") {
      return this.makeToken(TokenKind.EOF, "");
    }

    if (isDigit(this.ch)) {
      return this.readNumber();
    }

    if (isLetter(this.ch)) {
      return this.readIdentifier();
    }

    const ch = this.ch;
    this.readChar();
    const kind = singleCharTokens.get(ch);
    if (kind !== undefined) {
      return this.makeToken(kind, ch);
    }
    return this.makeToken(TokenKind.ILLEGAL, ch);
  }

  private readIdentifier(): Token {
    const start = this.position;
    while (isLetter(this.ch) || isDigit(this.ch)) {
      this.readChar();
    }
    const literal = this.characters.slice(start, this.position).join("");
    return this.makeToken(lookupIdentifier(literal), literal);
  }

  /**
   * Read a decimal number literal. A fraction or exponent makes it a float.
   */
  private readNumber(): Token {
    const start = this.position;
    while (isDigit(this.ch)) {
      this.readChar();
    }

    let isFloat = false;

    if (this.ch === "." && isDigit(this.peekChar())) {
      isFloat = true;
      this.readChar(); // consume .
      while (isDigit(this.ch)) {
        this.readChar();
      }
    }

    if (this.ch === "e" || this.ch === "E") {
      isFloat = true;
      this.readChar(); // consume e/E
      if ((this.ch as string) === "+" || (this.ch as string) === "-") {
        this.readChar();
      }
      if (!isDigit(this.ch)) {
        throw new LexerError("Missing exponent digits", this.currentPosition());
      }
      while (isDigit(this.ch)) {
        this.readChar();
      }
    }

    const literal = this.characters.slice(start, this.position).join("");
    if (isLetter(this.ch)) {
      throw new LexerError(`Invalid number literal: ${literal}${this.ch}`, this.currentPosition());
    }
    return this.makeToken(isFloat ? TokenKind.FLOAT : TokenKind.INT, literal);
  }

  /**
   * Get the line text for a given position.
   */
  getLineText(pos: Position): string {
    return lineText(this.input, pos);
  }
}

/**
 * Extract the full source line a position points into.
 */
export function lineText(input: string, pos: Position): string {
  // Positions count code points, like the lexer.
  const characters = [...input];
  let end = pos.lineStart;
  while (end < characters.length && characters[end] !== "\n" && characters[end] !== "\r") {
    end++;
  }
  return characters.slice(pos.lineStart, end).join("");
}

function isLetter(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_";
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

/**
 * Tokenize an input string into an array of tokens.
 */
export function tokenize(input: string, file?: string): Token[] {
  const lexer = new Lexer(input, file);
  const tokens: Token[] = [];
  let tok: Token;
  do {
    tok = lexer.nextToken();
    tokens.push(tok);
  } while (tok.kind !== TokenKind.EOF);
  return tokens;
}
