/**
 * Operator precedence levels for Pratt parsing.
 * Higher numbers = higher precedence (binds tighter).
 */

import { TokenKind } from "../token/token.js";

export enum Precedence {
  LOWEST = 1,
  EQUALS = 2, // == !=
  LESSGREATER = 3, // > <
  SUM = 4, // + -
  PRODUCT = 5, // * /
  PREFIX = 6, // -X !X
  CALL = 7, // fn() - reserved, no call syntax yet
}

/**
 * Get the infix precedence for a token type.
 */
export function getPrecedence(kind: TokenKind): Precedence {
  switch (kind) {
    case TokenKind.EQ:
    case TokenKind.NOT_EQ:
      return Precedence.EQUALS;
    case TokenKind.LT:
    case TokenKind.GT:
      return Precedence.LESSGREATER;
    case TokenKind.PLUS:
    case TokenKind.MINUS:
      return Precedence.SUM;
    case TokenKind.SLASH:
    case TokenKind.ASTERISK:
      return Precedence.PRODUCT;
    default:
      return Precedence.LOWEST;
  }
}
