/**
 * Session context - the symbol table and definition store one interpreter
 * session owns, plus the symbols reserved for intrinsics.
 */

import { DefinitionStore } from "./definitions";
import type { FnDef } from "./definitions";
import { Evaluator } from "./evaluate";
import { INTRINSICS } from "./expr";
import type { IntrinsicKind } from "./expr";
import { SymbolTable } from "./symbols";
import type { Sym } from "./symbols";

export class Context {
  readonly symbols = new SymbolTable();
  readonly definitions = new DefinitionStore();
  readonly intrinsics: ReadonlyMap<Sym, IntrinsicKind>;

  constructor() {
    this.intrinsics = new Map(INTRINSICS.map((kind) => [this.symbols.intern(kind), kind]));
  }

  /**
   * An evaluator over the definitions as they stand now.
   */
  evaluator(): Evaluator {
    return new Evaluator({ intrinsics: this.intrinsics, definitions: this.definitions.snapshot() });
  }

  define(def: FnDef): FnDef | undefined {
    return this.definitions.define(def);
  }

  name(sym: Sym): string {
    return this.symbols.resolve(sym);
  }
}
