/**
 * Interpreter configuration and command-line parsing.
 */

// ============================================================================
// Options
// ============================================================================

/**
 * What `:drop` removes: the session's value stack, or a definition
 * (the most recent one, or the one named in the argument).
 */
export type DropMode = "stack" | "definition";

export interface InterpOptions {
  /** Step bound for evaluation, tracing and assertions; `null` = unbounded. */
  maxSteps: number | null;
  dropMode: DropMode;
  /** Fold stack quotations that equal a definition body into `[name]`. */
  compress: boolean;
  /** Load the built-in definitions on start and on `:reset`. */
  prelude: boolean;
  /** Highlight echoed input with ANSI colours. */
  color: boolean;
}

export const defaultOptions: InterpOptions = {
  maxSteps: 100_000,
  dropMode: "stack",
  compress: true,
  prelude: true,
  color: false,
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function parseDropMode(value: string): DropMode {
  if (value === "stack" || value === "definition") return value;
  throw new ConfigError(`Invalid drop mode '${value}' (expected stack or definition)`);
}

export function parseMaxSteps(value: string): number | null {
  if (value === "none" || value === "unbounded") return null;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new ConfigError(`Invalid step limit '${value}' (expected a non-negative integer or 'none')`);
  }
  return n;
}

export function parseBoolean(value: string): boolean {
  switch (value.toLowerCase()) {
    case "on":
    case "true":
    case "yes":
      return true;
    case "off":
    case "false":
    case "no":
      return false;
    default:
      throw new ConfigError(`Invalid switch '${value}' (expected on or off)`);
  }
}

// ============================================================================
// Command Line
// ============================================================================

export interface CliOptions {
  /** Script to run line by line instead of reading from the terminal. */
  scriptFile: string | null;
  help: boolean;
  interp: InterpOptions;
}

export const USAGE = `
Concatenative combinator calculus interpreter

Usage:
  concat [script-file] [options]

Options:
  --max-steps <n>          Abort a reduction after n steps (default ${defaultOptions.maxSteps})
  --unbounded              Never abort a reduction
  --drop-mode <mode>       What :drop removes: stack (default) or definition
  --no-compress            Show stack quotations exactly as reduced
  --no-prelude             Start without the built-in definitions
  --no-color               Disable syntax highlighting
  -h, --help               Show this help
`;

export function parseArgs(args: readonly string[], base: InterpOptions = defaultOptions): CliOptions {
  const options: CliOptions = {
    scriptFile: null,
    help: false,
    interp: { ...base },
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      options.help = true;
    } else if (arg === "--max-steps" || arg === "--drop-mode") {
      i++;
      if (i >= args.length) {
        throw new ConfigError(`${arg} requires a value`);
      }
      if (arg === "--max-steps") {
        options.interp.maxSteps = parseMaxSteps(args[i]);
      } else {
        options.interp.dropMode = parseDropMode(args[i]);
      }
    } else if (arg === "--unbounded") {
      options.interp.maxSteps = null;
    } else if (arg === "--no-compress") {
      options.interp.compress = false;
    } else if (arg === "--no-prelude") {
      options.interp.prelude = false;
    } else if (arg === "--no-color") {
      options.interp.color = false;
    } else if (arg.startsWith("-")) {
      throw new ConfigError(`Unknown option: ${arg}`);
    } else {
      if (options.scriptFile !== null) {
        throw new ConfigError("Multiple script files not supported");
      }
      options.scriptFile = arg;
    }
    i++;
  }

  return options;
}
