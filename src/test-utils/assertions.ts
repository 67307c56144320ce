/**
 * Narrowing helpers shared by the test suites.
 */

import { expect } from "vitest";
import * as ast from "../ast/nodes.js";

/**
 * Assert that a value is an instance of `ctor` and return it narrowed.
 */
export function expectInstance<T>(value: unknown, ctor: new (...args: never[]) => T): T {
  expect(value).toBeInstanceOf(ctor);
  if (!(value instanceof ctor)) {
    throw new Error(`expected instance of ${ctor.name}`);
  }
  return value;
}

/**
 * Return the expression of the program's only statement.
 */
export function onlyExpression(program: ast.Program): ast.Expression {
  expect(program.statements).toHaveLength(1);
  return expectInstance(program.statements[0], ast.ExpressionStatement).expression;
}
