import { describe, it, expect } from "vitest";

import { configEquals, trace } from "../src/index";
import type { TraceEntry } from "../src/index";
import { configOf, session, show } from "./helper";

describe("Trace", () => {
  it("records every configuration from the initial one", () => {
    const ctx = session();
    const { entries, outcome } = trace(ctx.evaluator(), configOf(ctx, "", "[a] clone")).collect();
    expect(entries.map((e) => e.index)).toEqual([0, 1, 2]);
    expect(entries.map((e) => show(ctx, e.config))).toEqual(["⟨⟩ [a] clone", "⟨[a]⟩ clone", "⟨[a] [a]⟩"]);
    expect(outcome.tag).toBe("normal");
    expect(outcome.steps).toBe(2);
  });

  it("holds only the initial entry for a terminal configuration", () => {
    const ctx = session();
    const { entries, outcome } = trace(ctx.evaluator(), configOf(ctx, "[a]", "")).collect();
    expect(entries).toHaveLength(1);
    expect(outcome.steps).toBe(0);
  });

  it("ends with the configuration the error occurred in", () => {
    const ctx = session();
    const { entries, outcome } = trace(ctx.evaluator(), configOf(ctx, "", "[a] drop drop")).collect();
    expect(entries.map((e) => show(ctx, e.config))).toEqual(["⟨⟩ [a] drop drop", "⟨[a]⟩ drop drop", "⟨⟩ drop"]);
    expect(outcome.tag).toBe("failed");
    expect(show(ctx, outcome.config)).toBe("⟨⟩ drop");
  });

  it("agrees with big-step reduction", () => {
    const ctx = session({ prelude: true });
    const initial = configOf(ctx, "[v1] [v2] [v3]", "rotate3");
    const { entries } = trace(ctx.evaluator(), initial).collect();
    const last = entries[entries.length - 1];
    const reduced = ctx.evaluator().reduce(initial);
    expect(configEquals(last.config, reduced.config)).toBe(true);
    expect(last.index).toBe(reduced.steps);
  });

  it("is bounded by the step limit", () => {
    const ctx = session();
    const { entries, outcome } = trace(ctx.evaluator(), configOf(ctx, "", "[clone apply] clone apply"), {
      maxSteps: 3,
    }).collect();
    expect(entries).toHaveLength(4);
    expect(outcome.tag).toBe("limitExceeded");
  });

  it("can be consumed lazily from a diverging program", () => {
    const ctx = session();
    const seen: TraceEntry[] = [];
    for (const entry of trace(ctx.evaluator(), configOf(ctx, "", "[clone apply] clone apply"))) {
      seen.push(entry);
      if (seen.length === 6) break;
    }
    expect(seen.map((e) => show(ctx, e.config))).toEqual([
      "⟨⟩ [clone apply] clone apply",
      "⟨[clone apply]⟩ clone apply",
      "⟨[clone apply] [clone apply]⟩ apply",
      "⟨[clone apply]⟩ clone apply",
      "⟨[clone apply] [clone apply]⟩ apply",
      "⟨[clone apply]⟩ clone apply",
    ]);
  });

  it("restarts from the beginning on each iteration", () => {
    const ctx = session();
    const t = trace(ctx.evaluator(), configOf(ctx, "[x] [y]", "swap clone"));
    const first = [...t].map((e) => show(ctx, e.config));
    const second = [...t].map((e) => show(ctx, e.config));
    expect(first).toEqual(["⟨[x] [y]⟩ swap clone", "⟨[y] [x]⟩ clone", "⟨[y] [x] [x]⟩"]);
    expect(second).toEqual(first);
  });
});
