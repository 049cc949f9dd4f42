/**
 * Built-in definitions, read from `prelude.concat` beside this module.
 */

import * as fs from "fs";
import type { Context } from "./context";
import type { FnDef } from "./definitions";
import { parseProgram } from "./parser";

export const PRELUDE_SOURCE = fs.readFileSync(new URL("./prelude.concat", import.meta.url), "utf-8");

/**
 * Parse definition-only source and store every definition in `ctx`.
 * Returns the definitions in source order.
 */
export function loadDefinitions(ctx: Context, source: string): FnDef[] {
  const defs: FnDef[] = [];
  for (const item of parseProgram(source, ctx.symbols)) {
    if (item.tag !== "def") {
      throw new Error("Only definitions may appear in a definitions file");
    }
    ctx.define(item.def);
    defs.push(item.def);
  }
  return defs;
}

export function loadPrelude(ctx: Context): FnDef[] {
  return loadDefinitions(ctx, PRELUDE_SOURCE);
}
