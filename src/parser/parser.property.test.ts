/**
 * Property tests: generated programs survive a render/reparse cycle.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { parse } from "./parser.js";
import { Lexer } from "../lexer/lexer.js";
import { TokenKind } from "../token/token.js";
import * as ast from "../ast/nodes.js";

const identifier = fc.constantFrom("a", "b", "x", "y", "foo", "bar_baz", "ñu");
const integer = fc.integer({ min: 0, max: 1000 }).map(String);
const boolean = fc.constantFrom("true", "false");

const { expr: expression } = fc.letrec<{
  expr: string;
  block: string;
}>((tie) => ({
  expr: fc.oneof(
    { maxDepth: 4, depthSize: "small" },
    fc.oneof(identifier, integer, boolean),
    fc.tuple(fc.constantFrom("!", "-"), tie("expr")).map(([op, e]) => `${op}${e}`),
    fc
      .tuple(tie("expr"), fc.constantFrom("+", "-", "*", "/", "<", ">", "==", "!="), tie("expr"))
      .map(([l, op, r]) => `${l} ${op} ${r}`),
    tie("expr").map((e) => `(${e})`),
    fc
      .tuple(tie("expr"), tie("block"), fc.option(tie("block"), { nil: null }))
      .map(([c, then, otherwise]) =>
        otherwise === null ? `if (${c}) { ${then} }` : `if (${c}) { ${then} } else { ${otherwise} }`
      ),
    fc
      .tuple(fc.uniqueArray(identifier, { maxLength: 3 }), tie("block"))
      .map(([params, body]) => `fn(${params.join(", ")}) { ${body} }`)
  ),

  block: fc.array(tie("expr"), { maxLength: 2 }).map((exprs) => exprs.join("; ")),
}));

describe("Parser properties", () => {
  it("should reparse its own rendering to the same rendering", () => {
    fc.assert(
      fc.property(expression, (source) => {
        const first = parse(source);
        expect(first.errors).toEqual([]);

        const rendered = first.program.toString();
        const second = parse(rendered);
        expect(second.errors).toEqual([]);
        expect(second.program.toString()).toBe(rendered);
      })
    );
  });

  it("should parse let statements of any identifier and integer", () => {
    fc.assert(
      fc.property(identifier, integer, (name, value) => {
        const { program, errors } = parse(`let ${name} = ${value};`);
        expect(errors).toEqual([]);
        expect(program.statements).toHaveLength(1);

        const stmt = program.statements[0];
        expect(stmt).toBeInstanceOf(ast.LetStatement);
        expect(stmt.tokenLiteral()).toBe("let");
        expect(program.toString()).toBe(`let ${name} = ${value};`);
      })
    );
  });

  it("should keep returning EOF once the input is exhausted", () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 20 }), fc.integer({ min: 1, max: 5 }), (input, extra) => {
        const lexer = new Lexer(input);
        let guard = input.length + 1;
        while (lexer.nextToken().kind !== TokenKind.EOF) {
          guard--;
          expect(guard).toBeGreaterThan(0);
        }
        for (let i = 0; i < extra; i++) {
          expect(lexer.nextToken()).toEqual({ kind: TokenKind.EOF, literal: "" });
        }
      })
    );
  });
});
