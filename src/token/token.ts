/**
 * Token types for the Kestrel lexer.
 */
export enum TokenKind {
  // Special
  EOF = "EOF",
  ILLEGAL = "ILLEGAL",

  // Literals
  IDENT = "IDENT",
  INT = "INT",

  // Operators
  ASSIGN = "=",
  PLUS = "+",
  MINUS = "-",
  BANG = "!",
  ASTERISK = "*",
  SLASH = "/",

  // Comparison
  EQ = "==",
  NOT_EQ = "!=",
  LT = "<",
  GT = ">",

  // Punctuation
  COMMA = ",",
  SEMICOLON = ";",
  LPAREN = "(",
  RPAREN = ")",
  LBRACE = "{",
  RBRACE = "}",

  // Keywords
  FUNCTION = "fn",
  LET = "let",
  TRUE = "true",
  FALSE = "false",
  IF = "if",
  ELSE = "else",
  RETURN = "return",
}

/**
 * Keywords map for identifier lookup.
 */
const keywords: Map<string, TokenKind> = new Map([
  ["fn", TokenKind.FUNCTION],
  ["let", TokenKind.LET],
  ["true", TokenKind.TRUE],
  ["false", TokenKind.FALSE],
  ["if", TokenKind.IF],
  ["else", TokenKind.ELSE],
  ["return", TokenKind.RETURN],
]);

/**
 * Look up an identifier to see if it's a keyword.
 */
export function lookupIdentifier(ident: string): TokenKind {
  return keywords.get(ident) ?? TokenKind.IDENT;
}

/**
 * A token produced by the lexer.
 */
export interface Token {
  readonly kind: TokenKind;
  readonly literal: string;
}

/**
 * A token together with where it was found. Only diagnostics look at the
 * location; parsing decisions are made on `kind` alone.
 */
export interface LocalizedToken extends Token {
  /** 0-indexed line number */
  readonly line: number;
  /** 0-indexed column of the token's first character */
  readonly column: number;
  /** Full text of the source line, without its terminator */
  readonly lineText: string;
}

/**
 * Create a new Token.
 */
export function newToken(kind: TokenKind, literal: string): Token {
  return Object.freeze({ kind, literal });
}

/**
 * Attach source location to a token.
 */
export function localize(
  token: Token,
  line: number,
  column: number,
  lineText: string
): LocalizedToken {
  return Object.freeze({ kind: token.kind, literal: token.literal, line, column, lineText });
}

/**
 * Returns the 1-indexed line number.
 */
export function lineNumber(tok: LocalizedToken): number {
  return tok.line + 1;
}

/**
 * Returns the 1-indexed column number.
 */
export function columnNumber(tok: LocalizedToken): number {
  return tok.column + 1;
}
