/**
 * Kestrel object system - runtime values produced by the evaluator.
 */

import type { BlockStatement, FunctionLiteral, Identifier } from "../ast/nodes.js";

/**
 * Object type enumeration.
 */
export enum ObjectType {
  Integer = "INTEGER",
  Boolean = "BOOLEAN",
  Null = "NULL",
  Function = "FUNCTION",
}

/**
 * Base interface for all Kestrel objects.
 */
export interface KestrelObject {
  /** Object type identifier. */
  readonly type: ObjectType;
  /** String representation for display. */
  inspect(): string;
}

/**
 * Null singleton - represents absence of value.
 */
export class KestrelNull implements KestrelObject {
  readonly type = ObjectType.Null;

  inspect(): string {
    return "null";
  }
}

/** The singleton null value. */
export const NULL = Object.freeze(new KestrelNull());

/**
 * Boolean value. Only the TRUE and FALSE singletons exist, so booleans
 * compare by identity.
 */
export class KestrelBoolean implements KestrelObject {
  static readonly TRUE: KestrelBoolean = Object.freeze(new KestrelBoolean(true));
  static readonly FALSE: KestrelBoolean = Object.freeze(new KestrelBoolean(false));

  readonly type = ObjectType.Boolean;

  private constructor(public readonly value: boolean) {}

  inspect(): string {
    return this.value ? "true" : "false";
  }
}

/** Singleton true value. */
export const TRUE = KestrelBoolean.TRUE;
/** Singleton false value. */
export const FALSE = KestrelBoolean.FALSE;

/** Get boolean singleton. */
export function toBoolean(value: boolean): KestrelBoolean {
  return value ? TRUE : FALSE;
}

/**
 * Signed 64-bit integer value.
 */
export class KestrelInteger implements KestrelObject {
  readonly type = ObjectType.Integer;

  constructor(public readonly value: bigint) {
    Object.freeze(this);
  }

  inspect(): string {
    return this.value.toString();
  }
}

/**
 * Function value. It can be held and compared but not yet applied.
 */
export class KestrelFunction implements KestrelObject {
  readonly type = ObjectType.Function;

  constructor(public readonly literal: FunctionLiteral) {
    Object.freeze(this);
  }

  get parameters(): readonly Identifier[] {
    return this.literal.parameters;
  }

  get body(): BlockStatement {
    return this.literal.body;
  }

  inspect(): string {
    return this.literal.toString();
  }
}

/**
 * Truthiness: everything except FALSE and NULL, zero included.
 */
export function isTruthy(obj: KestrelObject): boolean {
  return obj !== FALSE && obj !== NULL;
}

export function isInteger(obj: KestrelObject): obj is KestrelInteger {
  return obj instanceof KestrelInteger;
}
