/**
 * Stack compression: fold quotations back into the names that define them.
 *
 * After `{fn true = drop}`, a stack value `[drop]` is shown as `[true]`.
 * Only top-level stack values are considered; when several definitions
 * share a body the earliest one wins.
 */

import type { FnDef } from "./definitions";
import { call, exprEquals, quote } from "./expr";
import type { Value, ValueStack } from "./expr";

/**
 * Returns the compressed stack, or `undefined` when nothing changed.
 */
export function compressStack(stack: ValueStack, definitions: readonly FnDef[]): ValueStack | undefined {
  let changed = false;
  const compressed = stack.map((value): Value => {
    if (value.tag !== "quote") return value;
    const body = value.body;
    if (body.tag === "call") return value;
    const match = definitions.find((def) => exprEquals(def.body, body));
    if (match === undefined) return value;
    changed = true;
    return quote(call(match.name));
  });
  return changed ? compressed : undefined;
}
