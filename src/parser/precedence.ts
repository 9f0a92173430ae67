/**
 * Operator precedence levels for Pratt parsing.
 * Higher numbers = higher precedence (binds tighter).
 */

import { TokenKind } from "../token/token.js";

export enum Precedence {
  LOWEST = 1,
  SUM = 2, // + -
  PRODUCT = 3, // * /
  PREFIX = 4, // -X !X
  CALL = 5, // fn()
}

/**
 * Get the precedence for a token type.
 */
export function getPrecedence(kind: TokenKind): Precedence {
  switch (kind) {
    case TokenKind.PLUS:
    case TokenKind.MINUS:
      return Precedence.SUM;
    case TokenKind.SLASH:
    case TokenKind.ASTERISK:
      return Precedence.PRODUCT;
    case TokenKind.LPAREN:
      return Precedence.CALL;
    default:
      return Precedence.LOWEST;
  }
}
