/**
 * Kestrel REPL - Read-Eval-Print Loop for interactive scripting.
 */

import * as readline from "readline";
import { tokenize } from "./lexer/lexer.js";
import { parse } from "./parser/parser.js";
import { evaluate } from "./evaluator/evaluator.js";
import { Token, TokenKind } from "./token/token.js";

const PROMPT = ">> ";
const CONTINUE_PROMPT = "... ";

/**
 * What the REPL does with each complete input.
 * - `eval`: evaluate and print the value
 * - `parse`: print the canonical rendering of the parsed program
 * - `tokens`: print the token stream
 */
export type ReplMode = "eval" | "parse" | "tokens";

export interface ReplOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Print `>> ` before each input. */
  prompt?: boolean;
  mode?: ReplMode;
}

/**
 * Start the interactive REPL. Resolves once the input stream closes or
 * the user types `exit`.
 */
export function startRepl(options: ReplOptions = {}): Promise<void> {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const showPrompt = options.prompt ?? true;
  const mode = options.mode ?? "eval";

  const rl = readline.createInterface({ input, terminal: false });

  let buffer = "";
  let inMultiline = false;

  const prompt = (): void => {
    if (showPrompt) {
      output.write(inMultiline ? CONTINUE_PROMPT : PROMPT);
    }
  };

  rl.on("line", (line) => {
    const trimmed = line.trim();

    // Handle exit commands
    if (!inMultiline && (trimmed === "exit" || trimmed === "quit")) {
      rl.close();
      return;
    }

    // Accumulate input
    buffer += (buffer ? "\n" : "") + line;

    if (isComplete(buffer)) {
      if (buffer.trim()) {
        output.write(respond(buffer, mode) + "\n\n");
      }
      buffer = "";
      inMultiline = false;
    } else {
      inMultiline = true;
    }

    prompt();
  });

  prompt();

  return new Promise((resolve) => {
    rl.on("close", () => resolve());
  });
}

/**
 * Check if the input has balanced braces and parentheses.
 */
export function isComplete(input: string): boolean {
  let braces = 0;
  let parens = 0;

  for (const c of input) {
    switch (c) {
      case "{":
        braces++;
        break;
      case "}":
        braces--;
        break;
      case "(":
        parens++;
        break;
      case ")":
        parens--;
        break;
    }
  }

  return braces <= 0 && parens <= 0;
}

/**
 * Produce the REPL's response to one complete input. Parse diagnostics
 * are printed instead of the result, never alongside it.
 */
export function respond(source: string, mode: ReplMode): string {
  if (mode === "tokens") {
    return Array.from(tokenize(source))
      .filter((tok) => tok.kind !== TokenKind.EOF)
      .map(formatToken)
      .join("\n");
  }

  const { program, errors } = parse(source);
  if (errors.length > 0) {
    return errors.join("\n");
  }

  if (mode === "parse") {
    return program.toString();
  }

  try {
    return evaluate(program).inspect();
  } catch (err) {
    return `Error: ${err instanceof Error ? err.message : String(err)}`;
  }
}

/**
 * Format a token for display: fixed tokens show their text, the rest
 * show their kind followed by the text they matched.
 */
export function formatToken(tok: Token): string {
  if (tok.kind === tok.literal) {
    return tok.literal;
  }
  return `${tok.kind} ${tok.literal}`;
}
