import { describe, it, expect } from "vitest";

import { compressStack, configuration, empty } from "../src/index";
import { session, show, stackOf } from "./helper";

describe("compressStack", () => {
  it("folds a quotation into the name defining its body", () => {
    const ctx = session({ defs: "{fn false = swap drop}" });
    const result = compressStack(stackOf(ctx, "[a] [swap drop]"), ctx.definitions.all());
    expect(result).toBeDefined();
    expect(show(ctx, configuration(result ?? [], empty))).toBe("⟨[a] [false]⟩");
  });

  it("prefers the earliest definition", () => {
    const ctx = session({ defs: "{fn t = drop} {fn u = drop}" });
    const result = compressStack(stackOf(ctx, "[drop]"), ctx.definitions.all());
    expect(show(ctx, configuration(result ?? [], empty))).toBe("⟨[t]⟩");
  });

  it("matches an empty definition", () => {
    const ctx = session({ defs: "{fn nop =}" });
    const result = compressStack(stackOf(ctx, "[]"), ctx.definitions.all());
    expect(show(ctx, configuration(result ?? [], empty))).toBe("⟨[nop]⟩");
  });

  it("returns undefined when nothing matches", () => {
    const ctx = session({ defs: "{fn t = drop}" });
    expect(compressStack(stackOf(ctx, "[clone] x"), ctx.definitions.all())).toBeUndefined();
  });

  it("leaves single-name quotations alone", () => {
    const ctx = session({ defs: "{fn alias = x}" });
    expect(compressStack(stackOf(ctx, "[x]"), ctx.definitions.all())).toBeUndefined();
  });

  it("only looks at top-level values", () => {
    const ctx = session({ defs: "{fn t = drop}" });
    expect(compressStack(stackOf(ctx, "[[drop]]"), ctx.definitions.all())).toBeUndefined();
  });
});
