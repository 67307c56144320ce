/**
 * Pratt parser for Kestrel.
 */

import { Lexer } from "../lexer/lexer.js";
import { LocalizedToken, TokenKind, lineNumber, columnNumber } from "../token/token.js";
import { Precedence, getPrecedence } from "./precedence.js";
import * as ast from "../ast/nodes.js";

/** Integer literals must fit a signed integer of this width. */
const INT64_BITS = 64;

/**
 * Parser error with position information.
 */
export class ParserError extends Error {
  constructor(
    message: string,
    public readonly token: LocalizedToken
  ) {
    super(message);
    this.name = "ParserError";
  }

  /**
   * Render the error with its location and a caret under the offending token.
   */
  format(): string {
    const where = `${lineNumber(this.token)}:${columnNumber(this.token)}`;
    const caret = " ".repeat(this.token.column) + "^";
    return `${where}: ${this.message}\n${this.token.lineText}\n${caret}`;
  }
}

/**
 * Raised by {@link parseOrThrow} when a parse pass recorded diagnostics.
 */
export class ParseProgramError extends Error {
  constructor(public readonly errors: readonly string[]) {
    super(errors.join("\n"));
    this.name = "ParseProgramError";
  }
}

type PrefixParseFn = () => ast.Expression | null;
type InfixParseFn = (left: ast.Expression) => ast.Expression | null;

/**
 * Pratt parser for Kestrel source code.
 *
 * A parser is single-use: construct it over a fresh lexer, call
 * `parseProgram()` once, then read `getErrors()`.
 */
export class Parser {
  private lexer: Lexer;
  private curToken: LocalizedToken;
  private errors: ParserError[] = [];
  private maxDepth = 500;
  private depth = 0;

  private prefixParseFns: Map<TokenKind, PrefixParseFn> = new Map();
  private infixParseFns: Map<TokenKind, InfixParseFn> = new Map();

  constructor(lexer: Lexer) {
    this.lexer = lexer;
    this.curToken = this.lexer.nextLocalized();

    // Register prefix parse functions
    this.registerPrefix(TokenKind.IDENT, () => this.parseIdentifier());
    this.registerPrefix(TokenKind.INT, () => this.parseInteger());
    this.registerPrefix(TokenKind.TRUE, () => this.parseBoolean());
    this.registerPrefix(TokenKind.FALSE, () => this.parseBoolean());
    this.registerPrefix(TokenKind.BANG, () => this.parsePrefix());
    this.registerPrefix(TokenKind.MINUS, () => this.parsePrefix());
    this.registerPrefix(TokenKind.LPAREN, () => this.parseGrouped());
    this.registerPrefix(TokenKind.IF, () => this.parseIf());
    this.registerPrefix(TokenKind.FUNCTION, () => this.parseFunction());

    // Register infix parse functions
    this.registerInfix(TokenKind.PLUS, (left) => this.parseInfix(left));
    this.registerInfix(TokenKind.MINUS, (left) => this.parseInfix(left));
    this.registerInfix(TokenKind.ASTERISK, (left) => this.parseInfix(left));
    this.registerInfix(TokenKind.SLASH, (left) => this.parseInfix(left));
    this.registerInfix(TokenKind.EQ, (left) => this.parseInfix(left));
    this.registerInfix(TokenKind.NOT_EQ, (left) => this.parseInfix(left));
    this.registerInfix(TokenKind.LT, (left) => this.parseInfix(left));
    this.registerInfix(TokenKind.GT, (left) => this.parseInfix(left));
  }

  private registerPrefix(kind: TokenKind, fn: PrefixParseFn): void {
    this.prefixParseFns.set(kind, fn);
  }

  private registerInfix(kind: TokenKind, fn: InfixParseFn): void {
    this.infixParseFns.set(kind, fn);
  }

  private nextToken(): void {
    this.curToken = this.lexer.nextLocalized();
  }

  private curTokenIs(kind: TokenKind): boolean {
    return this.curToken.kind === kind;
  }

  /**
   * Consume the current token if it has the given kind, otherwise record
   * a diagnostic and leave it in place.
   */
  private expect(kind: TokenKind): boolean {
    if (this.curTokenIs(kind)) {
      this.nextToken();
      return true;
    }
    this.expectError(kind);
    return false;
  }

  private expectError(kind: TokenKind): void {
    this.errors.push(
      new ParserError(
        `expected next token to be ${kind}, got ${this.curToken.kind} instead`,
        this.curToken
      )
    );
  }

  private noPrefixParseFnError(kind: TokenKind): void {
    this.errors.push(
      new ParserError(`no prefix parse function for ${kind} found`, this.curToken)
    );
  }

  private curPrecedence(): Precedence {
    return getPrecedence(this.curToken.kind);
  }

  private skipSemicolon(): void {
    if (this.curTokenIs(TokenKind.SEMICOLON)) {
      this.nextToken();
    }
  }

  /**
   * Parse the entire program.
   */
  parseProgram(): ast.Program {
    const statements: ast.Statement[] = [];

    while (!this.curTokenIs(TokenKind.EOF)) {
      const stmt = this.parseStatement();
      if (stmt) {
        statements.push(stmt);
      } else {
        // Error recovery: step over the offending token
        this.nextToken();
      }
    }

    return new ast.Program(statements);
  }

  /**
   * Get all parse errors, in the order they were recorded.
   */
  getErrors(): ParserError[] {
    return this.errors;
  }

  // =========================================================================
  // Statement Parsing
  // =========================================================================

  private parseStatement(): ast.Statement | null {
    switch (this.curToken.kind) {
      case TokenKind.LET:
        return this.parseLet();
      case TokenKind.RETURN:
        return this.parseReturn();
      default:
        return this.parseExpressionStatement();
    }
  }

  private parseLet(): ast.LetStatement | null {
    const letToken = this.curToken;
    this.nextToken(); // consume 'let'

    if (!this.curTokenIs(TokenKind.IDENT)) {
      this.expectError(TokenKind.IDENT);
      return null;
    }
    const name = new ast.Identifier(this.curToken, this.curToken.literal);
    this.nextToken();

    if (!this.expect(TokenKind.ASSIGN)) return null;

    const value = this.parseExpression(Precedence.LOWEST);
    if (!value) return null;
    this.skipSemicolon();

    return new ast.LetStatement(letToken, name, value);
  }

  private parseReturn(): ast.ReturnStatement | null {
    const returnToken = this.curToken;
    this.nextToken(); // consume 'return'

    const value = this.parseExpression(Precedence.LOWEST);
    if (!value) return null;
    this.skipSemicolon();

    return new ast.ReturnStatement(returnToken, value);
  }

  private parseExpressionStatement(): ast.ExpressionStatement | null {
    const token = this.curToken;
    const expr = this.parseExpression(Precedence.LOWEST);
    if (!expr) return null;
    this.skipSemicolon();

    return new ast.ExpressionStatement(token, expr);
  }

  // =========================================================================
  // Expression Parsing
  // =========================================================================

  private parseExpression(precedence: Precedence): ast.Expression | null {
    const entryDepth = this.depth;
    try {
      if (!this.enterDepth()) return null;

      const prefixFn = this.prefixParseFns.get(this.curToken.kind);
      if (!prefixFn) {
        this.noPrefixParseFnError(this.curToken.kind);
        return null;
      }

      let left = prefixFn();
      if (!left) return null;

      while (precedence < this.curPrecedence()) {
        const infixFn = this.infixParseFns.get(this.curToken.kind);
        if (!infixFn) {
          break;
        }

        // Each fold nests the tree built so far one level deeper on the left.
        if (!this.enterDepth()) return null;
        left = infixFn(left);
        if (!left) return null;
      }

      return left;
    } finally {
      this.depth = entryDepth;
    }
  }

  private enterDepth(): boolean {
    this.depth++;
    if (this.depth > this.maxDepth) {
      this.errors.push(new ParserError("maximum expression depth exceeded", this.curToken));
      return false;
    }
    return true;
  }

  // =========================================================================
  // Literal Parsing
  // =========================================================================

  private parseIdentifier(): ast.Identifier {
    const node = new ast.Identifier(this.curToken, this.curToken.literal);
    this.nextToken();
    return node;
  }

  private parseInteger(): ast.IntegerLiteral | null {
    const token = this.curToken;
    const value = BigInt(token.literal);
    if (BigInt.asIntN(INT64_BITS, value) !== value) {
      this.errors.push(new ParserError(`could not parse ${token.literal} as integer`, token));
      return null;
    }
    this.nextToken();
    return new ast.IntegerLiteral(token, value);
  }

  private parseBoolean(): ast.BooleanLiteral {
    const node = new ast.BooleanLiteral(this.curToken, this.curTokenIs(TokenKind.TRUE));
    this.nextToken();
    return node;
  }

  // =========================================================================
  // Operator Parsing
  // =========================================================================

  private parsePrefix(): ast.PrefixExpression | null {
    const token = this.curToken;
    this.nextToken();

    const right = this.parseExpression(Precedence.PREFIX);
    if (!right) return null;

    return new ast.PrefixExpression(token, token.literal, right);
  }

  private parseInfix(left: ast.Expression): ast.InfixExpression | null {
    const token = this.curToken;
    const precedence = this.curPrecedence();
    this.nextToken();

    const right = this.parseExpression(precedence);
    if (!right) return null;

    return new ast.InfixExpression(token, left, token.literal, right);
  }

  private parseGrouped(): ast.Expression | null {
    this.nextToken(); // consume '('

    const expr = this.parseExpression(Precedence.LOWEST);
    if (!expr) return null;

    if (!this.expect(TokenKind.RPAREN)) return null;
    return expr;
  }

  // =========================================================================
  // Function Parsing
  // =========================================================================

  private parseFunction(): ast.FunctionLiteral | null {
    const fnToken = this.curToken;
    this.nextToken(); // consume 'fn'

    if (!this.expect(TokenKind.LPAREN)) return null;

    const params = this.parseParameters();
    if (!params) return null;

    const body = this.parseBlock();
    if (!body) return null;

    return new ast.FunctionLiteral(fnToken, params, body);
  }

  private parseParameters(): ast.Identifier[] | null {
    const params: ast.Identifier[] = [];

    if (this.curTokenIs(TokenKind.RPAREN)) {
      this.nextToken(); // consume ')'
      return params;
    }

    for (;;) {
      if (!this.curTokenIs(TokenKind.IDENT)) {
        this.expectError(TokenKind.IDENT);
        return null;
      }
      params.push(new ast.Identifier(this.curToken, this.curToken.literal));
      this.nextToken();

      if (!this.curTokenIs(TokenKind.COMMA)) break;
      this.nextToken(); // consume ','
    }

    if (!this.expect(TokenKind.RPAREN)) return null;
    return params;
  }

  // =========================================================================
  // Block Parsing
  // =========================================================================

  private parseBlock(): ast.BlockStatement | null {
    const lbrace = this.curToken;
    if (!this.expect(TokenKind.LBRACE)) return null;

    const statements: ast.Statement[] = [];
    while (!this.curTokenIs(TokenKind.RBRACE) && !this.curTokenIs(TokenKind.EOF)) {
      const stmt = this.parseStatement();
      if (stmt) {
        statements.push(stmt);
      } else if (!this.curTokenIs(TokenKind.RBRACE)) {
        this.nextToken();
      }
    }

    if (!this.expect(TokenKind.RBRACE)) return null;

    return new ast.BlockStatement(lbrace, statements);
  }

  // =========================================================================
  // Control Flow
  // =========================================================================

  private parseIf(): ast.IfExpression | null {
    const ifToken = this.curToken;
    this.nextToken(); // consume 'if'

    if (!this.expect(TokenKind.LPAREN)) return null;

    const condition = this.parseExpression(Precedence.LOWEST);
    if (!condition) return null;

    if (!this.expect(TokenKind.RPAREN)) return null;

    const consequence = this.parseBlock();
    if (!consequence) return null;

    let alternative: ast.BlockStatement | null = null;
    if (this.curTokenIs(TokenKind.ELSE)) {
      this.nextToken(); // consume 'else'
      alternative = this.parseBlock();
      if (!alternative) return null;
    }

    return new ast.IfExpression(ifToken, condition, consequence, alternative);
  }
}

/**
 * Outcome of a parse pass: the program plus every diagnostic recorded.
 */
export interface ParseResult {
  program: ast.Program;
  errors: string[];
}

/**
 * Parse source code. A non-empty `errors` list means the parse failed.
 */
export function parse(input: string): ParseResult {
  const parser = new Parser(new Lexer(input));
  const program = parser.parseProgram();
  return { program, errors: parser.getErrors().map((e) => e.message) };
}

/**
 * Parse source code, throwing {@link ParseProgramError} if anything went wrong.
 */
export function parseOrThrow(input: string): ast.Program {
  const { program, errors } = parse(input);
  if (errors.length > 0) {
    throw new ParseProgramError(errors);
  }
  return program;
}
