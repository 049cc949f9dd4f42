/**
 * Tests for the definition store.
 */
import { describe, it, expect } from "vitest";

import { DefinitionStore, SymbolTable, call, fnDef, intrinsic } from "../src/index";

describe("DefinitionStore", () => {
  const symbols = new SymbolTable();
  const foo = symbols.intern("foo");
  const bar = symbols.intern("bar");
  const e1 = call(symbols.intern("e1"));
  const e2 = call(symbols.intern("e2"));

  it("defines and looks up", () => {
    const store = new DefinitionStore();
    expect(store.lookup(foo)).toBeUndefined();
    expect(store.define(fnDef(foo, e1))).toBeUndefined();
    expect(store.lookup(foo)).toBe(e1);
    expect(store.has(foo)).toBe(true);
  });

  it("returns the replaced definition on redefinition", () => {
    const store = new DefinitionStore();
    store.define(fnDef(foo, e1));
    expect(store.define(fnDef(foo, e2))).toEqual(fnDef(foo, e1));
    expect(store.lookup(foo)).toBe(e2);
    expect(store.size).toBe(1);
  });

  it("lists definitions in definition order, moving redefinitions last", () => {
    const store = new DefinitionStore();
    store.define(fnDef(foo, e1));
    store.define(fnDef(bar, e2));
    store.define(fnDef(foo, e2));
    expect(store.all()).toEqual([fnDef(bar, e2), fnDef(foo, e2)]);
  });

  it("removes the last definition", () => {
    const store = new DefinitionStore();
    store.define(fnDef(foo, e1));
    store.define(fnDef(bar, e2));
    expect(store.removeLast()).toEqual(fnDef(bar, e2));
    expect(store.removeLast()).toEqual(fnDef(foo, e1));
    expect(store.removeLast()).toBeUndefined();
  });

  it("removes a named definition", () => {
    const store = new DefinitionStore();
    store.define(fnDef(foo, e1));
    expect(store.remove(bar)).toBeUndefined();
    expect(store.remove(foo)).toEqual(fnDef(foo, e1));
    expect(store.has(foo)).toBe(false);
  });

  it("clears everything", () => {
    const store = new DefinitionStore();
    store.define(fnDef(foo, e1));
    store.define(fnDef(bar, intrinsic("drop")));
    store.clear();
    expect(store.size).toBe(0);
    expect(store.all()).toEqual([]);
  });

  it("snapshots are unaffected by later writes", () => {
    const store = new DefinitionStore();
    store.define(fnDef(foo, e1));
    const snapshot = store.snapshot();
    store.define(fnDef(foo, e2));
    store.define(fnDef(bar, e1));
    expect(snapshot.get(foo)).toBe(e1);
    expect(snapshot.has(bar)).toBe(false);
  });
});
