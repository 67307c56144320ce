/**
 * Tree-walking evaluator for Kestrel programs.
 */

import * as ast from "../ast/nodes.js";
import {
  KestrelObject,
  KestrelInteger,
  KestrelFunction,
  NULL,
  TRUE,
  FALSE,
  toBoolean,
  isTruthy,
  isInteger,
} from "../object/object.js";

const INT64_BITS = 64;

export type EvaluationErrorCode =
  | "type-mismatch"
  | "unknown-operator"
  | "division-by-zero"
  | "unknown-identifier"
  | "unsupported-node";

/**
 * Runtime error raised while evaluating a program.
 */
export class EvaluationError extends Error {
  constructor(
    public readonly code: EvaluationErrorCode,
    message: string
  ) {
    super(message);
    this.name = "EvaluationError";
  }
}

/**
 * Wraps the value of a `return` while it unwinds through enclosing blocks.
 */
export class ReturnSignal {
  constructor(public readonly value: KestrelObject) {}
}

type Completion = KestrelObject | ReturnSignal;

/**
 * Evaluate a program and return its value.
 */
export function evaluate(program: ast.Program): KestrelObject {
  let result: KestrelObject = NULL;

  for (const stmt of program.statements) {
    const completion = evalStatement(stmt);
    if (completion instanceof ReturnSignal) {
      return completion.value;
    }
    result = completion;
  }

  return result;
}

// =========================================================================
// Statements
// =========================================================================

function evalStatement(stmt: ast.Statement): Completion {
  switch (stmt.kind) {
    case "ExpressionStatement":
      return evalExpression(stmt.expression);
    case "ReturnStatement": {
      const value = evalExpression(stmt.value);
      if (value instanceof ReturnSignal) return value;
      return new ReturnSignal(value);
    }
    case "LetStatement": {
      // No bindings yet: the value is still evaluated so its errors surface.
      const value = evalExpression(stmt.value);
      if (value instanceof ReturnSignal) return value;
      return NULL;
    }
    case "BlockStatement":
      return evalBlock(stmt);
    default:
      return unsupported(stmt);
  }
}

/**
 * Evaluate a block. A return signal stops the block and is handed up
 * unchanged so that every enclosing block stops too.
 */
function evalBlock(block: ast.BlockStatement): Completion {
  let result: Completion = NULL;

  for (const stmt of block.statements) {
    result = evalStatement(stmt);
    if (result instanceof ReturnSignal) {
      return result;
    }
  }

  return result;
}

// =========================================================================
// Expressions
// =========================================================================

function evalExpression(expr: ast.Expression): Completion {
  switch (expr.kind) {
    case "IntegerLiteral":
      return new KestrelInteger(expr.value);
    case "BooleanLiteral":
      return toBoolean(expr.value);
    case "Identifier":
      throw new EvaluationError("unknown-identifier", `identifier not found: ${expr.name}`);
    case "PrefixExpression": {
      const right = evalExpression(expr.right);
      if (right instanceof ReturnSignal) return right;
      return evalPrefix(expr.operator, right);
    }
    case "InfixExpression": {
      const left = evalExpression(expr.left);
      if (left instanceof ReturnSignal) return left;
      const right = evalExpression(expr.right);
      if (right instanceof ReturnSignal) return right;
      return evalInfix(expr.operator, left, right);
    }
    case "IfExpression":
      return evalIf(expr);
    case "FunctionLiteral":
      return new KestrelFunction(expr);
    default:
      return unsupported(expr);
  }
}

function evalIf(expr: ast.IfExpression): Completion {
  const condition = evalExpression(expr.condition);
  if (condition instanceof ReturnSignal) return condition;

  if (isTruthy(condition)) {
    return evalBlock(expr.consequence);
  }
  if (expr.alternative) {
    return evalBlock(expr.alternative);
  }
  return NULL;
}

function evalPrefix(operator: string, right: KestrelObject): KestrelObject {
  switch (operator) {
    case "!":
      return toBoolean(!isTruthy(right));
    case "-":
      if (!isInteger(right)) {
        throw new EvaluationError("unknown-operator", `unknown operator: -${right.type}`);
      }
      return new KestrelInteger(BigInt.asIntN(INT64_BITS, -right.value));
    default:
      throw new EvaluationError("unknown-operator", `unknown operator: ${operator}${right.type}`);
  }
}

function evalInfix(operator: string, left: KestrelObject, right: KestrelObject): KestrelObject {
  if (isInteger(left) && isInteger(right)) {
    return evalIntegerInfix(operator, left.value, right.value);
  }
  switch (operator) {
    // Booleans and null are singletons, so identity is value equality.
    case "==":
      return toBoolean(left === right);
    case "!=":
      return toBoolean(left !== right);
  }
  if (left.type !== right.type) {
    throw new EvaluationError(
      "type-mismatch",
      `type mismatch: ${left.type} ${operator} ${right.type}`
    );
  }
  throw new EvaluationError(
    "unknown-operator",
    `unknown operator: ${left.type} ${operator} ${right.type}`
  );
}

function evalIntegerInfix(operator: string, left: bigint, right: bigint): KestrelObject {
  switch (operator) {
    case "+":
      return new KestrelInteger(BigInt.asIntN(INT64_BITS, left + right));
    case "-":
      return new KestrelInteger(BigInt.asIntN(INT64_BITS, left - right));
    case "*":
      return new KestrelInteger(BigInt.asIntN(INT64_BITS, left * right));
    case "/":
      if (right === 0n) {
        throw new EvaluationError("division-by-zero", "division by zero");
      }
      // bigint division truncates toward zero
      return new KestrelInteger(BigInt.asIntN(INT64_BITS, left / right));
    case "<":
      return left < right ? TRUE : FALSE;
    case ">":
      return left > right ? TRUE : FALSE;
    case "==":
      return toBoolean(left === right);
    case "!=":
      return toBoolean(left !== right);
    default:
      throw new EvaluationError(
        "unknown-operator",
        `unknown operator: INTEGER ${operator} INTEGER`
      );
  }
}

function unsupported(node: never): never {
  // Only reachable if the AST unions and the switches above drift apart.
  const raw: { kind?: unknown } = node;
  throw new EvaluationError("unsupported-node", `cannot evaluate node: ${String(raw.kind)}`);
}
