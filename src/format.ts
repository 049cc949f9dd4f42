/**
 * Pretty printing of expressions, stacks, configurations and errors.
 * Output parses back to the same structure.
 */

import type { FnDef } from "./definitions";
import {
  MalformedAssertionError,
  StackUnderflowError,
  StepLimitExceededError,
  TypeMismatchError,
  UnboundCallError,
} from "./errors";
import type { Configuration } from "./evaluate";
import type { Expr, ValueStack } from "./expr";
import { ParseError } from "./parser";
import type { SymbolTable } from "./symbols";

export function exprToString(expr: Expr, symbols: SymbolTable): string {
  switch (expr.tag) {
    case "call":
      return symbols.resolve(expr.symbol);
    case "intrinsic":
      return expr.kind;
    case "quote":
      return `[${exprToString(expr.body, symbols)}]`;
    case "compose":
      return expr.exprs.map((e) => exprToString(e, symbols)).join(" ");
  }
}

export function stackToString(stack: ValueStack, symbols: SymbolTable): string {
  return `⟨${stack.map((v) => exprToString(v, symbols)).join(" ")}⟩`;
}

export function configToString(config: Configuration, symbols: SymbolTable): string {
  const expr = exprToString(config.expr, symbols);
  const stack = stackToString(config.stack, symbols);
  return expr === "" ? stack : `${stack} ${expr}`;
}

export function defToString(def: FnDef, symbols: SymbolTable): string {
  const body = exprToString(def.body, symbols);
  return body === "" ? `{fn ${symbols.resolve(def.name)} =}` : `{fn ${symbols.resolve(def.name)} = ${body}}`;
}

/**
 * Render an error for display, with symbols shown by name.
 */
export function formatError(error: unknown, symbols: SymbolTable): string {
  if (error instanceof StackUnderflowError) {
    return `Stack underflow: \`${error.intrinsic}\` needs ${error.expected} value(s), found ${error.available}.`;
  }
  if (error instanceof UnboundCallError) {
    return `Undefined function \`${symbols.resolve(error.symbol)}\`.`;
  }
  if (error instanceof TypeMismatchError) {
    return `Type mismatch: \`${error.intrinsic}\` expected a ${error.expected}, got ${error.got}.`;
  }
  if (error instanceof MalformedAssertionError) {
    return `Malformed assertion (${error.reason}): ${error.message}.`;
  }
  if (error instanceof StepLimitExceededError) {
    return `Step limit of ${error.limit} exceeded.`;
  }
  if (error instanceof ParseError) {
    return `Parse error: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return `Unknown error: ${String(error)}`;
}
