/**
 * AST node types for the Kestrel parser.
 *
 * Every node keeps the token it starts with and renders to a canonical
 * source form through `toString()`. Parser tests compare against that
 * rendering, so the formats below are load-bearing.
 */

import type { Token } from "../token/token.js";

/**
 * Base interface for all AST nodes.
 */
export interface Node {
  /** Discriminant used for exhaustive matching */
  readonly kind: string;
  /** Literal text of the node's leading token */
  tokenLiteral(): string;
  /** Canonical source rendering */
  toString(): string;
}

// ============================================================================
// Expressions
// ============================================================================

/**
 * Identifier (variable reference or parameter name).
 */
export class Identifier implements Node {
  readonly kind = "Identifier";

  constructor(
    public readonly token: Token,
    public readonly name: string
  ) {}

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return this.name;
  }
}

/**
 * Integer literal. The value is a signed 64-bit integer.
 */
export class IntegerLiteral implements Node {
  readonly kind = "IntegerLiteral";

  constructor(
    public readonly token: Token,
    public readonly value: bigint
  ) {}

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return this.token.literal;
  }
}

/**
 * Boolean literal.
 */
export class BooleanLiteral implements Node {
  readonly kind = "BooleanLiteral";

  constructor(
    public readonly token: Token,
    public readonly value: boolean
  ) {}

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return this.token.literal;
  }
}

/**
 * Prefix operator expression (unary).
 */
export class PrefixExpression implements Node {
  readonly kind = "PrefixExpression";

  constructor(
    public readonly token: Token,
    public readonly operator: string,
    public readonly right: Expression
  ) {}

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return `(${this.operator}${this.right.toString()})`;
  }
}

/**
 * Infix operator expression (binary).
 */
export class InfixExpression implements Node {
  readonly kind = "InfixExpression";

  constructor(
    public readonly token: Token,
    public readonly left: Expression,
    public readonly operator: string,
    public readonly right: Expression
  ) {}

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return `(${this.left.toString()} ${this.operator} ${this.right.toString()})`;
  }
}

/**
 * If expression. `alternative` is null when there is no else clause.
 */
export class IfExpression implements Node {
  readonly kind = "IfExpression";

  constructor(
    public readonly token: Token,
    public readonly condition: Expression,
    public readonly consequence: BlockStatement,
    public readonly alternative: BlockStatement | null
  ) {}

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    let s = `if (${this.condition.toString()}) {\n${this.consequence.toString()}\n}`;
    if (this.alternative) s += ` else {\n${this.alternative.toString()}\n}`;
    return s;
  }
}

/**
 * Function literal. Parameters keep declaration order; duplicates are
 * not rejected here.
 */
export class FunctionLiteral implements Node {
  readonly kind = "FunctionLiteral";
  public readonly parameters: readonly Identifier[];

  constructor(
    public readonly token: Token,
    parameters: Identifier[],
    public readonly body: BlockStatement
  ) {
    this.parameters = Object.freeze([...parameters]);
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    const params = this.parameters.map((p) => p.toString()).join(", ");
    return `fn(${params}) {\n${this.body.toString()}\n}`;
  }
}

export type Expression =
  | Identifier
  | IntegerLiteral
  | BooleanLiteral
  | PrefixExpression
  | InfixExpression
  | IfExpression
  | FunctionLiteral;

// ============================================================================
// Statements
// ============================================================================

/**
 * Variable declaration (let x = value;).
 */
export class LetStatement implements Node {
  readonly kind = "LetStatement";

  constructor(
    public readonly token: Token,
    public readonly name: Identifier,
    public readonly value: Expression
  ) {}

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return `let ${this.name.toString()} = ${this.value.toString()};`;
  }
}

/**
 * Return statement.
 */
export class ReturnStatement implements Node {
  readonly kind = "ReturnStatement";

  constructor(
    public readonly token: Token,
    public readonly value: Expression
  ) {}

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return `return ${this.value.toString()};`;
  }
}

/**
 * Expression statement (an expression used as a statement).
 */
export class ExpressionStatement implements Node {
  readonly kind = "ExpressionStatement";

  constructor(
    public readonly token: Token,
    public readonly expression: Expression
  ) {}

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return this.expression.toString();
  }
}

/**
 * Block of statements between braces.
 */
export class BlockStatement implements Node {
  readonly kind = "BlockStatement";
  public readonly statements: readonly Statement[];

  constructor(
    public readonly token: Token,
    statements: Statement[]
  ) {
    this.statements = Object.freeze([...statements]);
  }

  tokenLiteral(): string {
    return this.token.literal;
  }
  toString(): string {
    return this.statements.map((s) => s.toString()).join("\n");
  }
}

export type Statement =
  | LetStatement
  | ReturnStatement
  | ExpressionStatement
  | BlockStatement;

// ============================================================================
// Program
// ============================================================================

/**
 * Root of a parsed source text.
 */
export class Program implements Node {
  readonly kind = "Program";
  public readonly statements: readonly Statement[];

  constructor(statements: Statement[]) {
    this.statements = Object.freeze([...statements]);
  }

  tokenLiteral(): string {
    if (this.statements.length > 0) return this.statements[0].tokenLiteral();
    return "";
  }
  toString(): string {
    return this.statements.map((s) => s.toString()).join("\n");
  }
}
