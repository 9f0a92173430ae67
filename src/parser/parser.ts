/**
 * Pratt parser for the shading language.
 */

import { Lexer } from "../lexer/lexer.js";
import { Token, TokenKind, Position, describePosition } from "../token/token.js";
import { Precedence, getPrecedence } from "./precedence.js";
import * as ast from "../ast/nodes.js";

/**
 * Parser error with position information.
 */
export class ParserError extends Error {
  constructor(
    message: string,
    public readonly position: Position
  ) {
    super(`${message} at ${describePosition(position)}`);
    this.name = "ParserError";
  }
}

type PrefixParseFn = () => ast.Expr | null;
type InfixParseFn = (left: ast.Expr) => ast.Expr | null;

/**
 * Pratt parser for shader source code.
 *
 * Errors are collected while parsing continues at the next statement or
 * declaration; `parse()` throws the first one.
 */
export class Parser {
  private lexer: Lexer;
  private curToken: Token;
  private peekToken: Token;
  private errors: ParserError[] = [];
  private maxDepth = 500;
  private depth = 0;

  private prefixParseFns: Map<TokenKind, PrefixParseFn> = new Map();
  private infixParseFns: Map<TokenKind, InfixParseFn> = new Map();

  constructor(lexer: Lexer) {
    this.lexer = lexer;
    this.curToken = this.lexer.nextToken();
    this.peekToken = this.lexer.nextToken();

    this.registerPrefix(TokenKind.IDENT, () => this.parseIdent());
    this.registerPrefix(TokenKind.INT, () => this.parseInt());
    this.registerPrefix(TokenKind.FLOAT, () => this.parseFloat());
    this.registerPrefix(TokenKind.MINUS, () => this.parsePrefix());
    this.registerPrefix(TokenKind.BANG, () => this.parsePrefix());
    this.registerPrefix(TokenKind.LPAREN, () => this.parseGrouped());

    this.registerInfix(TokenKind.PLUS, (left) => this.parseInfix(left));
    this.registerInfix(TokenKind.MINUS, (left) => this.parseInfix(left));
    this.registerInfix(TokenKind.ASTERISK, (left) => this.parseInfix(left));
    this.registerInfix(TokenKind.SLASH, (left) => this.parseInfix(left));
    this.registerInfix(TokenKind.LPAREN, (left) => this.parseCall(left));
  }

  private registerPrefix(kind: TokenKind, fn: PrefixParseFn): void {
    this.prefixParseFns.set(kind, fn);
  }

  private registerInfix(kind: TokenKind, fn: InfixParseFn): void {
    this.infixParseFns.set(kind, fn);
  }

  private nextToken(): void {
    this.curToken = this.peekToken;
    this.peekToken = this.lexer.nextToken();
  }

  private curTokenIs(kind: TokenKind): boolean {
    return this.curToken.kind === kind;
  }

  private peekTokenIs(kind: TokenKind): boolean {
    return this.peekToken.kind === kind;
  }

  private error(message: string, position: Position): null {
    this.errors.push(new ParserError(message, position));
    return null;
  }

  /**
   * Check that the current token has the given kind, recording an error if not.
   */
  private expectCur(kind: TokenKind): boolean {
    if (this.curTokenIs(kind)) {
      return true;
    }
    this.error(`expected '${kind}', got ${describeToken(this.curToken)}`, this.curToken.start);
    return false;
  }

  private curPrecedence(): Precedence {
    return getPrecedence(this.curToken.kind);
  }

  /**
   * Skip to the start of the next top-level declaration.
   */
  private synchronizeDecl(): void {
    while (
      !this.curTokenIs(TokenKind.EOF) &&
      !this.curTokenIs(TokenKind.IN) &&
      !this.curTokenIs(TokenKind.OUT) &&
      !this.curTokenIs(TokenKind.FN)
    ) {
      this.nextToken();
    }
  }

  /**
   * Skip past the end of the current statement, stopping at a closing brace.
   */
  private synchronizeStmt(): void {
    while (!this.curTokenIs(TokenKind.EOF) && !this.curTokenIs(TokenKind.RBRACE)) {
      if (this.curTokenIs(TokenKind.SEMICOLON)) {
        this.nextToken();
        return;
      }
      this.nextToken();
    }
  }

  /**
   * Parse the entire program.
   */
  parse(): ast.Program {
    const inParameters: ast.ParamDecl[] = [];
    const outParameters: ast.ParamDecl[] = [];
    const functions: ast.FuncDecl[] = [];
    const globalNames = new Set<string>();
    const functionNames = new Set<string>();

    while (!this.curTokenIs(TokenKind.EOF)) {
      switch (this.curToken.kind) {
        case TokenKind.IN:
        case TokenKind.OUT: {
          const decl = this.parseParamDecl();
          if (!decl) {
            this.synchronizeDecl();
            break;
          }
          if (globalNames.has(decl.name.name)) {
            this.error(`duplicate parameter: ${decl.name.name}`, decl.name.position);
          }
          globalNames.add(decl.name.name);
          (decl.direction === "in" ? inParameters : outParameters).push(decl);
          break;
        }
        case TokenKind.FN: {
          const func = this.parseFunc();
          if (!func) {
            this.synchronizeDecl();
            break;
          }
          if (functionNames.has(func.name.name)) {
            this.error(`duplicate function: ${func.name.name}`, func.name.position);
          }
          functionNames.add(func.name.name);
          functions.push(func);
          break;
        }
        default:
          this.error(`expected declaration, got ${describeToken(this.curToken)}`, this.curToken.start);
          this.nextToken();
          this.synchronizeDecl();
      }
    }

    if (this.errors.length > 0) {
      throw this.errors[0];
    }

    return new ast.Program(inParameters, outParameters, functions);
  }

  /**
   * Get all parse errors.
   */
  getErrors(): ParserError[] {
    return this.errors;
  }

  // =========================================================================
  // Declaration Parsing
  // =========================================================================

  private parseParamDecl(): ast.ParamDecl | null {
    const keywordPos = this.curToken.start;
    const direction = this.curTokenIs(TokenKind.IN) ? "in" : "out";
    this.nextToken(); // consume 'in' / 'out'

    if (!this.expectCur(TokenKind.IDENT)) return null;
    const name = new ast.Ident(this.curToken.start, this.curToken.literal);
    this.nextToken();

    if (!this.expectCur(TokenKind.COLON)) return null;
    this.nextToken(); // consume ':'

    const type = this.parseType();
    if (!type) return null;

    if (!this.expectCur(TokenKind.SEMICOLON)) return null;
    this.nextToken(); // consume ';'

    return new ast.ParamDecl(keywordPos, direction, name, type);
  }

  private parseType(): ast.TypeKind | null {
    if (!this.curTokenIs(TokenKind.IDENT)) {
      return this.error(`expected type, got ${describeToken(this.curToken)}`, this.curToken.start);
    }
    const literal = this.curToken.literal;
    if (!ast.isTypeKind(literal)) {
      return this.error(`unknown type: ${literal}`, this.curToken.start);
    }
    this.nextToken();
    return literal;
  }

  private parseFunc(): ast.FuncDecl | null {
    const fnPos = this.curToken.start;
    this.nextToken(); // consume 'fn'

    if (!this.expectCur(TokenKind.IDENT)) return null;
    const name = new ast.Ident(this.curToken.start, this.curToken.literal);
    this.nextToken();

    if (!this.expectCur(TokenKind.LPAREN)) return null;
    this.nextToken(); // consume '('

    const params: ast.FuncParam[] = [];
    const paramNames = new Set<string>();
    while (!this.curTokenIs(TokenKind.RPAREN) && !this.curTokenIs(TokenKind.EOF)) {
      if (!this.expectCur(TokenKind.IDENT)) return null;
      const paramName = new ast.Ident(this.curToken.start, this.curToken.literal);
      this.nextToken();

      if (!this.expectCur(TokenKind.COLON)) return null;
      this.nextToken(); // consume ':'

      const type = this.parseType();
      if (!type) return null;

      if (paramNames.has(paramName.name)) {
        this.error(`duplicate parameter: ${paramName.name}`, paramName.position);
      }
      paramNames.add(paramName.name);
      params.push(new ast.FuncParam(paramName, type));

      if (!this.curTokenIs(TokenKind.COMMA)) break;
      this.nextToken(); // consume ','
    }

    if (!this.expectCur(TokenKind.RPAREN)) return null;
    this.nextToken(); // consume ')'

    let returnType: ast.TypeKind = "f32";
    if (this.curTokenIs(TokenKind.COLON)) {
      this.nextToken(); // consume ':'
      const type = this.parseType();
      if (!type) return null;
      returnType = type;
    }

    if (!this.expectCur(TokenKind.LBRACE)) return null;
    this.nextToken(); // consume '{'

    const body: ast.Stmt[] = [];
    while (!this.curTokenIs(TokenKind.RBRACE) && !this.curTokenIs(TokenKind.EOF)) {
      const stmt = this.parseStatement();
      if (stmt) {
        body.push(stmt);
      } else {
        this.synchronizeStmt();
      }
    }

    if (!this.expectCur(TokenKind.RBRACE)) return null;
    this.nextToken(); // consume '}'

    return new ast.FuncDecl(fnPos, name, params, returnType, body);
  }

  // =========================================================================
  // Statement Parsing
  // =========================================================================

  private parseStatement(): ast.Stmt | null {
    if (this.curTokenIs(TokenKind.RETURN)) {
      return this.parseReturn();
    }
    if (this.curTokenIs(TokenKind.IDENT) && this.peekTokenIs(TokenKind.ASSIGN)) {
      return this.parseAssignment();
    }
    return this.error(`expected statement, got ${describeToken(this.curToken)}`, this.curToken.start);
  }

  private parseReturn(): ast.ReturnStmt | null {
    const returnPos = this.curToken.start;
    this.nextToken(); // consume 'return'

    const value = this.parseExpression(Precedence.LOWEST);
    if (!value) return null;

    if (!this.expectCur(TokenKind.SEMICOLON)) return null;
    this.nextToken(); // consume ';'

    return new ast.ReturnStmt(returnPos, value);
  }

  private parseAssignment(): ast.AssignStmt | null {
    const target = new ast.Ident(this.curToken.start, this.curToken.literal);
    this.nextToken();
    const opPos = this.curToken.start;
    this.nextToken(); // consume '='

    const value = this.parseExpression(Precedence.LOWEST);
    if (!value) return null;

    if (!this.expectCur(TokenKind.SEMICOLON)) return null;
    this.nextToken(); // consume ';'

    return new ast.AssignStmt(target, opPos, value);
  }

  // =========================================================================
  // Expression Parsing
  // =========================================================================

  private parseExpression(precedence: Precedence): ast.Expr | null {
    this.depth++;
    if (this.depth > this.maxDepth) {
      this.depth--;
      return this.error("maximum expression depth exceeded", this.curToken.start);
    }

    const prefixFn = this.prefixParseFns.get(this.curToken.kind);
    if (!prefixFn) {
      this.depth--;
      return this.error(`unexpected token ${describeToken(this.curToken)}`, this.curToken.start);
    }

    let left = prefixFn();
    while (left && precedence < this.curPrecedence()) {
      const infixFn = this.infixParseFns.get(this.curToken.kind);
      if (!infixFn) {
        break;
      }
      left = infixFn(left);
    }

    this.depth--;
    return left;
  }

  private parseIdent(): ast.Ident {
    const ident = new ast.Ident(this.curToken.start, this.curToken.literal);
    this.nextToken();
    return ident;
  }

  private parseInt(): ast.IntLit | null {
    const literal = this.curToken.literal;
    const value = Number(literal);
    if (!Number.isSafeInteger(value)) {
      return this.error(`integer literal out of range: ${literal}`, this.curToken.start);
    }
    const node = new ast.IntLit(this.curToken.start, literal, value);
    this.nextToken();
    return node;
  }

  private parseFloat(): ast.FloatLit {
    const literal = this.curToken.literal;
    const node = new ast.FloatLit(this.curToken.start, literal, parseFloat(literal));
    this.nextToken();
    return node;
  }

  private parsePrefix(): ast.PrefixExpr | null {
    const opPos = this.curToken.start;
    const op = this.curToken.literal;
    this.nextToken();

    const right = this.parseExpression(Precedence.PREFIX);
    if (!right) return null;
    return new ast.PrefixExpr(opPos, op, right);
  }

  private parseInfix(left: ast.Expr): ast.InfixExpr | null {
    const opPos = this.curToken.start;
    const op = this.curToken.literal;
    const precedence = this.curPrecedence();
    this.nextToken();

    const right = this.parseExpression(precedence);
    if (!right) return null;
    return new ast.InfixExpr(left, opPos, op, right);
  }

  private parseGrouped(): ast.Expr | null {
    this.nextToken(); // consume '('
    const expr = this.parseExpression(Precedence.LOWEST);
    if (!expr) return null;
    if (!this.expectCur(TokenKind.RPAREN)) return null;
    this.nextToken(); // consume ')'
    return expr;
  }

  private parseCall(callee: ast.Expr): ast.CallExpr | null {
    if (!(callee instanceof ast.Ident)) {
      return this.error("call target must be a function name", callee.pos());
    }
    const lparen = this.curToken.start;
    this.nextToken(); // consume '('

    const args: ast.Expr[] = [];
    while (!this.curTokenIs(TokenKind.RPAREN) && !this.curTokenIs(TokenKind.EOF)) {
      const arg = this.parseExpression(Precedence.LOWEST);
      if (!arg) return null;
      args.push(arg);
      if (!this.curTokenIs(TokenKind.COMMA)) break;
      this.nextToken(); // consume ','
    }

    if (!this.expectCur(TokenKind.RPAREN)) return null;
    this.nextToken(); // consume ')'

    return new ast.CallExpr(callee, lparen, args);
  }
}

function describeToken(tok: Token): string {
  return tok.kind === TokenKind.EOF ? "end of input" : `'${tok.literal}'`;
}

/**
 * Parse source code into an AST.
 */
export function parse(source: string, filename?: string): ast.Program {
  const lexer = new Lexer(source, filename);
  const parser = new Parser(lexer);
  return parser.parse();
}
