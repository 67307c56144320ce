import { describe, it, expect } from "vitest";
import * as ast from "./nodes.js";
import { TokenKind, newToken } from "../token/token.js";

function ident(name: string): ast.Identifier {
  return new ast.Identifier(newToken(TokenKind.IDENT, name), name);
}

function int(value: number): ast.IntegerLiteral {
  return new ast.IntegerLiteral(newToken(TokenKind.INT, String(value)), BigInt(value));
}

function block(...exprs: ast.Expression[]): ast.BlockStatement {
  return new ast.BlockStatement(
    newToken(TokenKind.LBRACE, "{"),
    exprs.map((e) => new ast.ExpressionStatement(newToken(TokenKind.IDENT, e.tokenLiteral()), e))
  );
}

describe("AST rendering", () => {
  it("should render let statements", () => {
    const program = new ast.Program([
      new ast.LetStatement(newToken(TokenKind.LET, "let"), ident("myVar"), ident("anotherVar")),
    ]);
    expect(program.toString()).toBe("let myVar = anotherVar;");
    expect(program.tokenLiteral()).toBe("let");
  });

  it("should render return statements", () => {
    const stmt = new ast.ReturnStatement(newToken(TokenKind.RETURN, "return"), int(5));
    expect(stmt.toString()).toBe("return 5;");
    expect(stmt.tokenLiteral()).toBe("return");
  });

  it("should parenthesize prefix and infix expressions", () => {
    const neg = new ast.PrefixExpression(newToken(TokenKind.MINUS, "-"), "-", ident("a"));
    const mul = new ast.InfixExpression(newToken(TokenKind.ASTERISK, "*"), neg, "*", ident("b"));
    expect(mul.toString()).toBe("((-a) * b)");
  });

  it("should render if expressions with and without else", () => {
    const cond = new ast.InfixExpression(newToken(TokenKind.LT, "<"), ident("x"), "<", ident("y"));
    const ifToken = newToken(TokenKind.IF, "if");
    expect(new ast.IfExpression(ifToken, cond, block(ident("x")), null).toString()).toBe(
      "if (x < y) {\nx\n}"
    );
    expect(new ast.IfExpression(ifToken, cond, block(ident("x")), block(ident("y"))).toString()).toBe(
      "if (x < y) {\nx\n} else {\ny\n}"
    );
  });

  it("should render each block statement on its own line", () => {
    expect(block(ident("a"), int(1), ident("b")).toString()).toBe("a\n1\nb");
    expect(block().toString()).toBe("");
  });

  it("should render function literals", () => {
    const fn = new ast.FunctionLiteral(newToken(TokenKind.FUNCTION, "fn"), [ident("x"), ident("y")], block());
    expect(fn.toString()).toBe("fn(x, y) {\n\n}");
  });

  it("should render an empty program as an empty string", () => {
    const program = new ast.Program([]);
    expect(program.toString()).toBe("");
    expect(program.tokenLiteral()).toBe("");
  });
});

describe("AST immutability", () => {
  it("should copy and freeze statement lists", () => {
    const statements: ast.Statement[] = [
      new ast.ExpressionStatement(newToken(TokenKind.INT, "1"), int(1)),
    ];
    const program = new ast.Program(statements);
    statements.push(new ast.ExpressionStatement(newToken(TokenKind.INT, "2"), int(2)));

    expect(program.statements).toHaveLength(1);
    expect(Object.isFrozen(program.statements)).toBe(true);
  });

  it("should copy and freeze parameter lists", () => {
    const params = [ident("x")];
    const fn = new ast.FunctionLiteral(newToken(TokenKind.FUNCTION, "fn"), params, block());
    params.push(ident("y"));

    expect(fn.parameters.map((p) => p.name)).toEqual(["x"]);
    expect(Object.isFrozen(fn.parameters)).toBe(true);
  });

  it("should keep duplicate parameter names", () => {
    const fn = new ast.FunctionLiteral(newToken(TokenKind.FUNCTION, "fn"), [ident("x"), ident("x")], block());
    expect(fn.toString()).toBe("fn(x, x) {\n\n}");
  });
});
