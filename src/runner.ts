/**
 * Kestrel Runner - Execute Kestrel source from strings and files.
 */

import * as fs from "fs";
import * as path from "path";
import { parseOrThrow, ParseProgramError } from "./parser/parser.js";
import { evaluate, EvaluationError } from "./evaluator/evaluator.js";
import type { Program } from "./ast/nodes.js";
import type { KestrelObject } from "./object/object.js";

/**
 * Run a Kestrel script file.
 */
export function runFile(filepath: string): KestrelObject {
  const resolved = path.resolve(filepath);

  if (!fs.existsSync(resolved)) {
    throw new Error(`File not found: ${filepath}`);
  }

  const code = fs.readFileSync(resolved, "utf-8");
  return runCode(code, resolved);
}

/**
 * Parse and evaluate Kestrel code, returning the program's value.
 */
export function runCode(code: string, filename: string = "<input>"): KestrelObject {
  const program = parseFile(code, filename);

  try {
    return evaluate(program);
  } catch (err) {
    if (err instanceof EvaluationError) {
      throw new EvaluationError(err.code, `Runtime error in ${filename}: ${err.message}`);
    }
    throw err;
  }
}

function parseFile(code: string, filename: string): Program {
  try {
    return parseOrThrow(code);
  } catch (err) {
    if (err instanceof ParseProgramError) {
      throw new ParseProgramError(err.errors.map((e) => `Parse error in ${filename}: ${e}`));
    }
    throw err;
  }
}
