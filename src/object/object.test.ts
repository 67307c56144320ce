import { describe, it, expect } from "vitest";
import {
  ObjectType,
  KestrelInteger,
  KestrelFunction,
  KestrelBoolean,
  NULL,
  TRUE,
  FALSE,
  toBoolean,
  isTruthy,
  isInteger,
} from "./object.js";
import { parseOrThrow } from "../parser/parser.js";
import * as ast from "../ast/nodes.js";
import { expectInstance, onlyExpression } from "../test-utils/assertions.js";

function functionLiteral(source: string): ast.FunctionLiteral {
  return expectInstance(onlyExpression(parseOrThrow(source)), ast.FunctionLiteral);
}

describe("Objects", () => {
  describe("inspect", () => {
    it("should render each value", () => {
      expect(NULL.inspect()).toBe("null");
      expect(TRUE.inspect()).toBe("true");
      expect(FALSE.inspect()).toBe("false");
      expect(new KestrelInteger(-12n).inspect()).toBe("-12");
      expect(new KestrelFunction(functionLiteral("fn(a) { a }")).inspect()).toBe("fn(a) {\na\n}");
    });
  });

  describe("type", () => {
    it("should report the type name", () => {
      expect(NULL.type).toBe(ObjectType.Null);
      expect(TRUE.type).toBe("BOOLEAN");
      expect(new KestrelInteger(1n).type).toBe("INTEGER");
      expect(new KestrelFunction(functionLiteral("fn() {}")).type).toBe("FUNCTION");
    });
  });

  describe("booleans", () => {
    it("should map to the shared singletons", () => {
      expect(toBoolean(true)).toBe(TRUE);
      expect(toBoolean(false)).toBe(FALSE);
      expect(TRUE).toBeInstanceOf(KestrelBoolean);
      expect(TRUE.value).toBe(true);
      expect(FALSE.value).toBe(false);
    });

    it("should expose the singletons on the class", () => {
      expect(KestrelBoolean.TRUE).toBe(TRUE);
      expect(KestrelBoolean.FALSE).toBe(FALSE);
      expect(toBoolean(1 < 2)).toBe(KestrelBoolean.TRUE);
    });

    it("should be frozen", () => {
      expect(Object.isFrozen(TRUE)).toBe(true);
      expect(Object.isFrozen(FALSE)).toBe(true);
      expect(Object.isFrozen(NULL)).toBe(true);
    });
  });

  describe("isTruthy", () => {
    it("should treat only false and null as falsy", () => {
      expect(isTruthy(FALSE)).toBe(false);
      expect(isTruthy(NULL)).toBe(false);
      expect(isTruthy(TRUE)).toBe(true);
      expect(isTruthy(new KestrelInteger(0n))).toBe(true);
      expect(isTruthy(new KestrelInteger(-1n))).toBe(true);
      expect(isTruthy(new KestrelFunction(functionLiteral("fn() {}")))).toBe(true);
    });
  });

  describe("isInteger", () => {
    it("should narrow integers only", () => {
      expect(isInteger(new KestrelInteger(3n))).toBe(true);
      expect(isInteger(TRUE)).toBe(false);
      expect(isInteger(NULL)).toBe(false);
    });
  });

  describe("functions", () => {
    it("should expose the literal's parameters and body", () => {
      const literal = functionLiteral("fn(x, y) { x; y }");
      const fn = new KestrelFunction(literal);
      expect(fn.parameters.map((p) => p.name)).toEqual(["x", "y"]);
      expect(fn.body).toBe(literal.body);
      expect(Object.isFrozen(fn)).toBe(true);
    });
  });
});
