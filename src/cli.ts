#!/usr/bin/env node
/**
 * Kestrel CLI - Command-line interface for the Kestrel language.
 */

import { startRepl, respond } from "./repl.js";
import type { ReplMode } from "./repl.js";
import { runFile } from "./runner.js";
import * as fs from "fs";

const VERSION = "0.1.0";

function printUsage(): void {
  console.log(`
Kestrel v${VERSION} - A small C-like expression language

Usage:
  kestrel [options] [file]

Options:
  -h, --help         Show this help message
  -v, --version      Show version
  -e, --eval         Evaluate code from command line
  -p, --parse        Print the parsed program instead of evaluating it
  -t, --tokens       Print the token stream instead of evaluating
  -i, --interactive  Start REPL after running file

Examples:
  kestrel                     Start interactive REPL
  kestrel script.kes          Run a script file
  kestrel -e "2 * (5 + 10)"   Evaluate code
  kestrel -p -e "-a * b"      Show how an expression parses
`);
}

function printVersion(): void {
  console.log(`Kestrel ${VERSION}`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  let evalCode: string | null = null;
  let interactive = false;
  let mode: ReplMode = "eval";
  let file: string | null = null;

  // Parse arguments
  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      printUsage();
      process.exit(0);
    } else if (arg === "-v" || arg === "--version") {
      printVersion();
      process.exit(0);
    } else if (arg === "-e" || arg === "--eval") {
      i++;
      if (i >= args.length) {
        console.error("Error: -e requires an argument");
        process.exit(1);
      }
      evalCode = args[i];
    } else if (arg === "-p" || arg === "--parse") {
      mode = "parse";
    } else if (arg === "-t" || arg === "--tokens") {
      mode = "tokens";
    } else if (arg === "-i" || arg === "--interactive") {
      interactive = true;
    } else if (arg.startsWith("-")) {
      console.error(`Error: Unknown option: ${arg}`);
      printUsage();
      process.exit(1);
    } else {
      file = arg;
      break;
    }
    i++;
  }

  const repl = (): Promise<void> =>
    startRepl({ input: process.stdin, output: process.stdout, prompt: Boolean(process.stdin.isTTY), mode });

  try {
    if (evalCode !== null) {
      console.log(respond(evalCode, mode));
      if (interactive) {
        await repl();
      }
    } else if (file !== null) {
      if (mode === "eval") {
        console.log(runFile(file).inspect());
      } else {
        console.log(respond(fs.readFileSync(file, "utf-8"), mode));
      }
      if (interactive) {
        await repl();
      }
    } else {
      await repl();
    }
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : err}`);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
