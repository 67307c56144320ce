/**
 * Kestrel - a small C-like expression language: lexer, Pratt parser and
 * tree-walking evaluator.
 *
 * @packageDocumentation
 */

// Token exports
export {
  TokenKind,
  newToken,
  localize,
  lineNumber,
  columnNumber,
  lookupIdentifier,
} from "./token/token.js";
export type { Token, LocalizedToken } from "./token/token.js";

// Lexer exports
export { Lexer, tokenize } from "./lexer/lexer.js";

// AST exports
export * from "./ast/nodes.js";

// Parser exports
export { Parser, ParserError, ParseProgramError, parse, parseOrThrow } from "./parser/parser.js";
export type { ParseResult } from "./parser/parser.js";
export { Precedence, getPrecedence } from "./parser/precedence.js";

// Object exports
export * from "./object/index.js";

// Evaluator exports
export { evaluate, EvaluationError, ReturnSignal } from "./evaluator/evaluator.js";
export type { EvaluationErrorCode } from "./evaluator/evaluator.js";

// Runner exports
export { runFile, runCode } from "./runner.js";

// REPL export
export { startRepl } from "./repl.js";
export type { ReplMode, ReplOptions } from "./repl.js";
