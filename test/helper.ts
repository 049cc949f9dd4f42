/**
 * Shared helpers for building sessions and configurations from source text.
 */

import {
  Context,
  configToString,
  configuration,
  isValue,
  items,
  loadDefinitions,
  loadPrelude,
  parseExpr,
} from "../src/index";
import type { Configuration, Value } from "../src/index";

export function session(options: { prelude?: boolean; defs?: string } = {}): Context {
  const ctx = new Context();
  if (options.prelude === true) loadPrelude(ctx);
  if (options.defs !== undefined) loadDefinitions(ctx, options.defs);
  return ctx;
}

/**
 * Parse space-separated stack values, bottom first: `"[a] b"`.
 */
export function stackOf(ctx: Context, source: string): Value[] {
  return items(parseExpr(source, ctx.symbols)).map((e) => {
    if (!isValue(e)) throw new Error(`Not a stack value: ${source}`);
    return e;
  });
}

export function configOf(ctx: Context, stack: string, expr: string): Configuration {
  return configuration(stackOf(ctx, stack), parseExpr(expr, ctx.symbols));
}

export function show(ctx: Context, config: Configuration): string {
  return configToString(config, ctx.symbols);
}
