/**
 * Symbol table - interns identifier text as compact symbols.
 *
 * One table belongs to one session. It only grows; a session reset
 * replaces it with a fresh table.
 */

// ============================================================================
// Symbols
// ============================================================================

/**
 * An interned identifier.
 *
 * Symbols are compared by identity: the table hands out exactly one
 * `Sym` per distinct text, so `a === b` holds iff both came from the same
 * text in the same table. Ordering follows interning order.
 */
export class Sym {
  constructor(public readonly id: number) {}

  toString(): string {
    return `#${this.id}`;
  }
}

export function compareSyms(a: Sym, b: Sym): number {
  return a.id - b.id;
}

// ============================================================================
// Symbol Table
// ============================================================================

export class SymbolTable {
  private byText: Map<string, Sym> = new Map();
  private texts: string[] = [];

  /**
   * Return the symbol for `text`, creating it on first use.
   */
  intern(text: string): Sym {
    const existing = this.byText.get(text);
    if (existing !== undefined) {
      return existing;
    }
    const sym = new Sym(this.texts.length);
    this.texts.push(text);
    this.byText.set(text, sym);
    return sym;
  }

  /**
   * Look up a symbol without interning.
   */
  lookup(text: string): Sym | undefined {
    return this.byText.get(text);
  }

  /**
   * The text a symbol was interned from.
   * Throws for symbols that belong to another table.
   */
  resolve(sym: Sym): string {
    const text = this.texts[sym.id];
    if (text === undefined || this.byText.get(text) !== sym) {
      throw new Error(`Symbol ${sym.toString()} does not belong to this table`);
    }
    return text;
  }

  has(sym: Sym): boolean {
    const text = this.texts[sym.id];
    return text !== undefined && this.byText.get(text) === sym;
  }

  get size(): number {
    return this.texts.length;
  }

  names(): readonly string[] {
    return this.texts;
  }
}
