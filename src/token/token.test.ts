import { describe, it, expect } from "vitest";
import {
  TokenKind,
  lookupIdentifier,
  newToken,
  localize,
  lineNumber,
  columnNumber,
} from "./token.js";

describe("Token", () => {
  describe("lookupIdentifier", () => {
    it("should map every keyword to its kind", () => {
      expect(lookupIdentifier("fn")).toBe(TokenKind.FUNCTION);
      expect(lookupIdentifier("let")).toBe(TokenKind.LET);
      expect(lookupIdentifier("true")).toBe(TokenKind.TRUE);
      expect(lookupIdentifier("false")).toBe(TokenKind.FALSE);
      expect(lookupIdentifier("if")).toBe(TokenKind.IF);
      expect(lookupIdentifier("else")).toBe(TokenKind.ELSE);
      expect(lookupIdentifier("return")).toBe(TokenKind.RETURN);
    });

    it("should treat anything else as an identifier", () => {
      expect(lookupIdentifier("foo")).toBe(TokenKind.IDENT);
      expect(lookupIdentifier("Let")).toBe(TokenKind.IDENT);
      expect(lookupIdentifier("function")).toBe(TokenKind.IDENT);
    });
  });

  describe("localize", () => {
    it("should keep kind and literal and add the location", () => {
      const tok = localize(newToken(TokenKind.IDENT, "x"), 2, 4, "let x = 1;");
      expect(tok).toEqual({ kind: TokenKind.IDENT, literal: "x", line: 2, column: 4, lineText: "let x = 1;" });
      expect(lineNumber(tok)).toBe(3);
      expect(columnNumber(tok)).toBe(5);
    });

    it("should produce frozen tokens", () => {
      expect(Object.isFrozen(newToken(TokenKind.PLUS, "+"))).toBe(true);
      expect(Object.isFrozen(localize(newToken(TokenKind.PLUS, "+"), 0, 0, "+"))).toBe(true);
    });
  });
});
