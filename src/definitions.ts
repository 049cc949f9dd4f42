/**
 * Definition store - maps symbols to the expressions they expand to.
 */

import type { Expr } from "./expr";
import type { Sym } from "./symbols";

// ============================================================================
// Function Definitions
// ============================================================================

export interface FnDef {
  readonly name: Sym;
  readonly body: Expr;
}

export const fnDef = (name: Sym, body: Expr): FnDef => ({ name, body });

// ============================================================================
// Store
// ============================================================================

/**
 * Mutable, session-wide table of definitions.
 *
 * Iteration order is definition order: redefining a name moves it to the
 * end, so `removeLast` always undoes the most recent write.
 * The evaluator never reads the store directly; it works on a `snapshot()`.
 */
export class DefinitionStore {
  private fns: Map<Sym, Expr> = new Map();

  /**
   * Bind `def.name` to `def.body`. Returns the replaced definition, if any.
   */
  define(def: FnDef): FnDef | undefined {
    const previous = this.fns.get(def.name);
    this.fns.delete(def.name);
    this.fns.set(def.name, def.body);
    return previous === undefined ? undefined : fnDef(def.name, previous);
  }

  lookup(name: Sym): Expr | undefined {
    return this.fns.get(name);
  }

  has(name: Sym): boolean {
    return this.fns.has(name);
  }

  remove(name: Sym): FnDef | undefined {
    const body = this.fns.get(name);
    if (body === undefined) return undefined;
    this.fns.delete(name);
    return fnDef(name, body);
  }

  /**
   * Remove the most recently written definition.
   */
  removeLast(): FnDef | undefined {
    let last: Sym | undefined;
    for (const name of this.fns.keys()) {
      last = name;
    }
    return last === undefined ? undefined : this.remove(last);
  }

  clear(): void {
    this.fns.clear();
  }

  all(): FnDef[] {
    return [...this.fns].map(([name, body]) => fnDef(name, body));
  }

  get size(): number {
    return this.fns.size;
  }

  /**
   * A frozen copy for one reduction. Later writes to the store are not
   * visible through it.
   */
  snapshot(): ReadonlyMap<Sym, Expr> {
    return new Map(this.fns);
  }
}
