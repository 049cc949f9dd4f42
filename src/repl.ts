#!/usr/bin/env tsx
/**
 * REPL - Read-Eval-Print Loop for the combinator calculus.
 *
 * With a script file argument, each line of the file is run as REPL input
 * and the process exits afterwards.
 */

import * as fs from "fs";
import * as path from "path";
import * as readline from "readline";
import { pathToFileURL } from "url";
import { ConfigError, USAGE, defaultOptions, parseArgs } from "./config";
import type { CliOptions, InterpOptions } from "./config";
import { Interp } from "./interp";
import { highlightCode } from "./parser";

// ============================================================================
// Output
// ============================================================================

const CODE_LINE = /^(⟨|⟶ |⇓ |= |\{fn )/;

/**
 * Colour the lines that show configurations or definitions; messages are
 * printed as they are.
 */
export function renderLine(line: string, options: InterpOptions): string {
  return options.color && CODE_LINE.test(line) ? highlightCode(line) : line;
}

function print(interp: Interp, lines: string[]): void {
  for (const line of lines) {
    console.log(renderLine(line, interp.options));
  }
}

// ============================================================================
// Script Mode
// ============================================================================

export function runScript(interp: Interp, source: string): string[] {
  const output: string[] = [];
  for (const line of source.split(/\r?\n/)) {
    if (interp.isDone) break;
    output.push(...interp.execute(line));
  }
  return output;
}

// ============================================================================
// Main
// ============================================================================

function startRepl(interp: Interp): void {
  console.log("Concatenative combinator calculus");
  console.log("Type :help for available commands, :quit to exit\n");

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "> ",
  });

  rl.prompt();

  rl.on("line", (line: string) => {
    print(interp, interp.execute(line));
    if (interp.isDone) {
      rl.close();
      return;
    }
    rl.prompt();
  });

  rl.on("close", () => {
    console.log("\nGoodbye!");
  });
}

export function main(argv: readonly string[]): number {
  let options: CliOptions;
  try {
    options = parseArgs(argv, { ...defaultOptions, color: process.stdout.isTTY === true });
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(`Error: ${e.message}`);
      console.error(USAGE);
      return 1;
    }
    throw e;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const interp = new Interp(options.interp);

  if (options.scriptFile !== null) {
    const scriptPath = path.resolve(options.scriptFile);
    let source: string;
    try {
      source = fs.readFileSync(scriptPath, "utf-8");
    } catch {
      console.error(`Error: Cannot read file: ${scriptPath}`);
      return 1;
    }
    print(interp, runScript(interp, source));
    return 0;
  }

  startRepl(interp);
  return 0;
}

// Run if executed directly
if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
  process.exitCode = main(process.argv.slice(2));
}
