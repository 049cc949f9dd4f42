/**
 * Tests for symbol interning.
 */
import { describe, it, expect } from "vitest";

import { SymbolTable, compareSyms } from "../src/index";

describe("SymbolTable", () => {
  it("interns equal text to the same symbol", () => {
    const symbols = new SymbolTable();
    const a = symbols.intern("foo");
    const b = symbols.intern("foo");
    expect(a).toBe(b);
    expect(symbols.size).toBe(1);
  });

  it("gives distinct text distinct symbols", () => {
    const symbols = new SymbolTable();
    const a = symbols.intern("foo");
    const b = symbols.intern("bar");
    expect(a).not.toBe(b);
    expect(symbols.resolve(a)).toBe("foo");
    expect(symbols.resolve(b)).toBe("bar");
  });

  it("orders symbols by interning order", () => {
    const symbols = new SymbolTable();
    const z = symbols.intern("z");
    const a = symbols.intern("a");
    expect(compareSyms(z, a)).toBeLessThan(0);
    expect([a, z].sort(compareSyms)).toEqual([z, a]);
  });

  it("looks up without interning", () => {
    const symbols = new SymbolTable();
    expect(symbols.lookup("x")).toBeUndefined();
    expect(symbols.size).toBe(0);
    const x = symbols.intern("x");
    expect(symbols.lookup("x")).toBe(x);
  });

  it("rejects symbols from another table", () => {
    const first = new SymbolTable();
    const second = new SymbolTable();
    const sym = first.intern("x");
    second.intern("x");
    expect(second.has(sym)).toBe(false);
    expect(() => second.resolve(sym)).toThrow("does not belong");
  });

  it("lists names in interning order", () => {
    const symbols = new SymbolTable();
    symbols.intern("b");
    symbols.intern("a");
    symbols.intern("b");
    expect(symbols.names()).toEqual(["b", "a"]);
  });
});
