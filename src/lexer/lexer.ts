import {
  Token,
  TokenKind,
  LocalizedToken,
  newToken,
  localize,
  lookupIdentifier,
} from "../token/token.js";

/** Sentinel returned for the character past the end of input. */
const EOF_CHAR = "\0";

/**
 * Single-character tokens that need no lookahead.
 */
const singleCharTokens: Map<string, TokenKind> = new Map([
  ["+", TokenKind.PLUS],
  ["-", TokenKind.MINUS],
  ["*", TokenKind.ASTERISK],
  ["/", TokenKind.SLASH],
  ["<", TokenKind.LT],
  [">", TokenKind.GT],
  ["(", TokenKind.LPAREN],
  [")", TokenKind.RPAREN],
  ["{", TokenKind.LBRACE],
  ["}", TokenKind.RBRACE],
  [",", TokenKind.COMMA],
  [";", TokenKind.SEMICOLON],
]);

/**
 * Lexer tokenizes Kestrel source code, one token per call.
 *
 * The lexer never throws: characters it does not recognise come back as
 * ILLEGAL tokens and scanning carries on after them. Once the input is
 * exhausted every further call returns EOF.
 */
export class Lexer {
  private characters: string[];
  private lines: string[];
  private position: number = -1;
  private nextPosition: number = 0;
  private ch: string = "";
  private line: number = 0;
  private column: number = -1;

  constructor(input: string) {
    this.characters = [...input]; // Handle Unicode properly
    this.lines = input.split(/\r?\n/);
    this.readChar();
  }

  /**
   * Read the next character.
   */
  private readChar(): void {
    if (this.atEnd()) {
      return;
    }
    if (this.ch === "\n") {
      this.line++;
      this.column = -1;
    }
    this.position = this.nextPosition;
    this.nextPosition++;
    this.column++;
    this.ch = this.atEnd() ? EOF_CHAR : this.characters[this.position];
  }

  /**
   * Peek at the next character without consuming it.
   */
  private peekChar(): string {
    if (this.nextPosition >= this.characters.length) {
      return EOF_CHAR;
    }
    return this.characters[this.nextPosition];
  }

  private atEnd(): boolean {
    return this.position >= this.characters.length;
  }

  /**
   * Skip whitespace, including newlines, form feeds and Unicode spaces.
   */
  private skipWhitespace(): void {
    while (!this.atEnd() && isWhitespace(this.ch)) {
      this.readChar();
    }
  }

  /**
   * Get the next token.
   */
  nextToken(): Token {
    this.skipWhitespace();

    // EOF
    if (this.atEnd()) {
      return newToken(TokenKind.EOF, "");
    }

    // Numbers
    if (isDigit(this.ch)) {
      return this.readNumber();
    }

    // Identifiers and keywords
    if (isLetter(this.ch)) {
      return this.readIdentifier();
    }

    // Operators and punctuation
    const tok = this.readOperator();
    if (tok) {
      return tok;
    }

    // Unknown character
    const ch = this.ch;
    this.readChar();
    return newToken(TokenKind.ILLEGAL, ch);
  }

  /**
   * Get the next token along with the line and column it starts at.
   */
  nextLocalized(): LocalizedToken {
    this.skipWhitespace();

    const line = this.line;
    const column = this.column;
    const lineText = line < this.lines.length ? this.lines[line] : "";

    return localize(this.nextToken(), line, column, lineText);
  }

  /**
   * Read an identifier or keyword.
   */
  private readIdentifier(): Token {
    const start = this.position;
    while (isLetter(this.ch)) {
      this.readChar();
    }
    const literal = this.characters.slice(start, this.position).join("");
    return newToken(lookupIdentifier(literal), literal);
  }

  /**
   * Read a decimal integer literal. The sign is a separate prefix token.
   */
  private readNumber(): Token {
    const start = this.position;
    while (isDigit(this.ch)) {
      this.readChar();
    }
    const literal = this.characters.slice(start, this.position).join("");
    return newToken(TokenKind.INT, literal);
  }

  /**
   * Read an operator or punctuation token.
   */
  private readOperator(): Token | null {
    const ch = this.ch;
    const next = this.peekChar();

    // Two-character operators
    switch (ch) {
      case "=":
        this.readChar();
        if (next === "=") {
          this.readChar();
          return newToken(TokenKind.EQ, "==");
        }
        return newToken(TokenKind.ASSIGN, "=");
      case "!":
        this.readChar();
        if (next === "=") {
          this.readChar();
          return newToken(TokenKind.NOT_EQ, "!=");
        }
        return newToken(TokenKind.BANG, "!");
    }

    const kind = singleCharTokens.get(ch);
    if (kind !== undefined) {
      this.readChar();
      return newToken(kind, ch);
    }

    return null;
  }
}

function isWhitespace(ch: string): boolean {
  return /^\s$/u.test(ch);
}

/**
 * Check if a character is a letter (for identifiers).
 */
function isLetter(ch: string): boolean {
  return ch === "_" || /^\p{L}$/u.test(ch);
}

/**
 * Check if a character is a digit.
 */
function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

/**
 * Lazily tokenize an input string. The sequence ends with a single EOF token.
 */
export function* tokenize(input: string): Generator<Token, void, undefined> {
  const lexer = new Lexer(input);
  let tok: Token;
  do {
    tok = lexer.nextToken();
    yield tok;
  } while (tok.kind !== TokenKind.EOF);
}
