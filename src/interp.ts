/**
 * Interactive session: definitions, a persistent value stack, and the
 * `:command` set of the REPL.
 *
 * `execute` takes one line of input and returns the lines to print, so the
 * session can be driven by the terminal REPL, a script file, or tests alike.
 */

import { checkAssertion } from "./assertion";
import { compressStack } from "./compress";
import { ConfigError, defaultOptions, parseBoolean, parseDropMode, parseMaxSteps } from "./config";
import type { InterpOptions } from "./config";
import { Context } from "./context";
import { EvalError } from "./errors";
import { configuration } from "./evaluate";
import type { Configuration, ReduceOptions, ReductionOutcome } from "./evaluate";
import type { Expr, ValueStack } from "./expr";
import { configToString, defToString, formatError } from "./format";
import { ParseError, parseAssertion, parseExpr, parseProgram } from "./parser";
import { loadPrelude } from "./prelude";
import { trace } from "./trace";

// ============================================================================
// Commands
// ============================================================================

interface Command {
  usage: string;
  description: string;
  handler: (args: string) => string[];
}

// ============================================================================
// Interp
// ============================================================================

export class Interp {
  readonly options: InterpOptions;
  private ctx: Context;
  private stack: ValueStack = [];
  private quit = false;

  private readonly commands: Record<string, Command> = {
    trace: {
      usage: ":trace <expr>",
      description: "trace the evaluation of <expr>",
      handler: (args) => this.traceExpr(args),
    },
    assert: {
      usage: ":assert <claim>",
      description: "check a claim ⟨…⟩ e ⟶ ⟨…⟩ e or ⟨…⟩ e ⇓ ⟨…⟩",
      handler: (args) => this.assertClaim(args),
    },
    show: {
      usage: ":show <sym>",
      description: "show the definition of <sym>",
      handler: (args) => this.show(args),
    },
    list: {
      usage: ":list",
      description: "list the defined symbols",
      handler: () => this.list(),
    },
    drop: {
      usage: ":drop [<sym>]",
      description: "drop the value stack, or a definition (see :set drop-mode)",
      handler: (args) => this.drop(args),
    },
    clear: {
      usage: ":clear",
      description: "clear all definitions",
      handler: () => {
        this.ctx.definitions.clear();
        return ["Definitions cleared."];
      },
    },
    reset: {
      usage: ":reset",
      description: "reset the interpreter",
      handler: () => {
        this.ctx = this.freshContext();
        this.stack = [];
        return ["Reset."];
      },
    },
    set: {
      usage: ":set [<option> <value>]",
      description: "show or change max-steps, drop-mode and compress",
      handler: (args) => this.set(args),
    },
    help: {
      usage: ":help",
      description: "display this list of commands",
      handler: () => this.help(),
    },
    quit: {
      usage: ":quit",
      description: "leave the interpreter",
      handler: () => {
        this.quit = true;
        return [];
      },
    },
  };

  constructor(options: Partial<InterpOptions> = {}) {
    this.options = { ...defaultOptions, ...options };
    this.ctx = this.freshContext();
  }

  get context(): Context {
    return this.ctx;
  }

  get valueStack(): ValueStack {
    return this.stack;
  }

  /** True once `:quit` has run. */
  get isDone(): boolean {
    return this.quit;
  }

  /**
   * Run one line of input and return the output lines.
   */
  execute(input: string): string[] {
    const line = input.trim();
    if (line === "") return [];

    try {
      if (line.startsWith(":")) {
        const match = /^:(\S+)\s*([\s\S]*)$/.exec(line);
        const name = match?.[1] ?? "";
        const command = Object.hasOwn(this.commands, name) ? this.commands[name] : undefined;
        if (command === undefined) {
          return [`Unknown command :${name}. Type :help for a list of commands.`];
        }
        return command.handler(match?.[2] ?? "");
      }
      return this.evaluate(line);
    } catch (e) {
      if (e instanceof ParseError || e instanceof ConfigError || e instanceof EvalError) {
        return [formatError(e, this.ctx.symbols)];
      }
      throw e;
    }
  }

  // ==========================================================================
  // Evaluation
  // ==========================================================================

  private evaluate(source: string): string[] {
    const lines: string[] = [];

    for (const item of parseProgram(source, this.ctx.symbols)) {
      if (item.tag === "def") {
        const name = this.ctx.name(item.def.name);
        const previous = this.ctx.define(item.def);
        lines.push(previous === undefined ? `Defined \`${name}\`.` : `Redefined \`${name}\`.`);
        continue;
      }

      const initial = configuration(this.stack, item.expr);
      lines.push(this.render(initial));
      const outcome = this.ctx.evaluator().reduce(initial, this.reduceOptions());
      this.stack = this.compress(outcome.config.stack) ?? outcome.config.stack;
      lines.push(`⇓ ${this.render(configuration(this.stack, outcome.config.expr))}`);
      if (outcome.tag !== "normal") {
        lines.push(formatError(outcome.error, this.ctx.symbols));
        break;
      }
    }

    return lines;
  }

  private traceExpr(source: string): string[] {
    const expr: Expr = parseExpr(source, this.ctx.symbols);
    const lines: string[] = [];
    const entries = trace(this.ctx.evaluator(), configuration(this.stack, expr), this.reduceOptions()).entries();

    let outcome: ReductionOutcome;
    for (;;) {
      const next = entries.next();
      if (next.done) {
        outcome = next.value;
        break;
      }
      const { index, config } = next.value;
      if (index === 0) {
        lines.push(this.render(config));
        continue;
      }
      lines.push(`⟶ ${this.render(config)}`);
      const compressed = this.compress(config.stack);
      if (compressed !== undefined) {
        lines.push(`= ${this.render(configuration(compressed, config.expr))}`);
      }
    }

    this.stack = this.compress(outcome.config.stack) ?? outcome.config.stack;
    if (outcome.tag !== "normal") {
      lines.push(formatError(outcome.error, this.ctx.symbols));
    }
    return lines;
  }

  private assertClaim(source: string): string[] {
    const assertion = parseAssertion(source, this.ctx.symbols);
    const result = checkAssertion(this.ctx.evaluator(), assertion, this.reduceOptions());
    if (result.pass) {
      return ["Pass."];
    }
    return [`Fail: ${formatError(result.error, this.ctx.symbols)}`, `Actual: ${this.render(result.actual)}`];
  }

  // ==========================================================================
  // Definitions
  // ==========================================================================

  private show(args: string): string[] {
    const name = args.trim();
    const sym = this.ctx.symbols.lookup(name);
    if (sym !== undefined && this.ctx.intrinsics.has(sym)) {
      return [`\`${name}\` is an intrinsic.`];
    }
    const body = sym === undefined ? undefined : this.ctx.definitions.lookup(sym);
    if (sym === undefined || body === undefined) {
      return ["Not defined."];
    }
    return [defToString({ name: sym, body }, this.ctx.symbols)];
  }

  private list(): string[] {
    const names = this.ctx.definitions.all().map((def) => this.ctx.name(def.name));
    names.sort();
    return [names.join(" ")];
  }

  private drop(args: string): string[] {
    const name = args.trim();

    if (this.options.dropMode === "stack") {
      if (name !== "") {
        return ["`:drop` takes no argument when drop-mode is stack."];
      }
      this.stack = [];
      return ["Values dropped."];
    }

    if (name === "") {
      const removed = this.ctx.definitions.removeLast();
      return removed === undefined ? ["No definitions to drop."] : [`Dropped \`${this.ctx.name(removed.name)}\`.`];
    }
    const sym = this.ctx.symbols.lookup(name);
    const removed = sym === undefined ? undefined : this.ctx.definitions.remove(sym);
    return removed === undefined ? ["Not defined."] : [`Dropped \`${name}\`.`];
  }

  // ==========================================================================
  // Settings and Help
  // ==========================================================================

  private set(args: string): string[] {
    const [option = "", value = ""] = args.trim().split(/\s+/);

    if (option === "") {
      return [
        `max-steps ${this.options.maxSteps ?? "none"}`,
        `drop-mode ${this.options.dropMode}`,
        `compress ${this.options.compress ? "on" : "off"}`,
      ];
    }
    if (value === "") {
      throw new ConfigError(`:set ${option} requires a value`);
    }

    switch (option) {
      case "max-steps":
        this.options.maxSteps = parseMaxSteps(value);
        break;
      case "drop-mode":
        this.options.dropMode = parseDropMode(value);
        break;
      case "compress":
        this.options.compress = parseBoolean(value);
        break;
      default:
        throw new ConfigError(`Unknown setting '${option}'`);
    }
    return [`${option} set to ${value}.`];
  }

  private help(): string[] {
    const rows: [string, string][] = [
      ["<expr>", "evaluate <expr>"],
      ["{fn <sym> = <expr>}", "define <sym> as <expr>"],
      ...Object.values(this.commands).map((c): [string, string] => [c.usage, c.description]),
    ];
    return ["Commands available:", "", ...rows.map(([usage, description]) => `   ${usage.padEnd(25)}${description}`)];
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private freshContext(): Context {
    const ctx = new Context();
    if (this.options.prelude) {
      loadPrelude(ctx);
    }
    return ctx;
  }

  private reduceOptions(): ReduceOptions {
    return { maxSteps: this.options.maxSteps };
  }

  private compress(stack: ValueStack): ValueStack | undefined {
    return this.options.compress ? compressStack(stack, this.ctx.definitions.all()) : undefined;
  }

  private render(config: Configuration): string {
    return configToString(config, this.ctx.symbols);
  }
}
