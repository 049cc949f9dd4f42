import { describe, it, expect } from "vitest";

import {
  ConfigError,
  defaultOptions,
  parseArgs,
  parseBoolean,
  parseDropMode,
  parseMaxSteps,
} from "../src/config";

describe("parseArgs", () => {
  it("uses the defaults with no arguments", () => {
    expect(parseArgs([])).toEqual({ scriptFile: null, help: false, interp: defaultOptions });
  });

  it("reads every option", () => {
    const options = parseArgs([
      "--max-steps",
      "50",
      "--drop-mode",
      "definition",
      "--no-compress",
      "--no-prelude",
      "--no-color",
      "demo.concat",
    ]);
    expect(options).toEqual({
      scriptFile: "demo.concat",
      help: false,
      interp: { maxSteps: 50, dropMode: "definition", compress: false, prelude: false, color: false },
    });
  });

  it("does not modify the base options", () => {
    const base = { ...defaultOptions, color: true };
    const options = parseArgs(["--no-color"], base);
    expect(options.interp.color).toBe(false);
    expect(base.color).toBe(true);
  });

  it("removes the step bound", () => {
    expect(parseArgs(["--unbounded"]).interp.maxSteps).toBeNull();
    expect(parseArgs(["--max-steps", "none"]).interp.maxSteps).toBeNull();
  });

  it("recognises help", () => {
    expect(parseArgs(["-h"]).help).toBe(true);
    expect(parseArgs(["--help"]).help).toBe(true);
  });

  it("rejects bad input", () => {
    expect(() => parseArgs(["--max-steps"])).toThrow("--max-steps requires a value");
    expect(() => parseArgs(["--wat"])).toThrow("Unknown option: --wat");
    expect(() => parseArgs(["a.concat", "b.concat"])).toThrow("Multiple script files not supported");
    expect(() => parseArgs(["--drop-mode", "all"])).toThrow(ConfigError);
  });
});

describe("Option values", () => {
  it("parses step limits", () => {
    expect(parseMaxSteps("0")).toBe(0);
    expect(parseMaxSteps("250")).toBe(250);
    expect(parseMaxSteps("unbounded")).toBeNull();
    expect(() => parseMaxSteps("-1")).toThrow(ConfigError);
    expect(() => parseMaxSteps("1.5")).toThrow(ConfigError);
  });

  it("parses switches", () => {
    expect(parseBoolean("on")).toBe(true);
    expect(parseBoolean("YES")).toBe(true);
    expect(parseBoolean("off")).toBe(false);
    expect(() => parseBoolean("maybe")).toThrow("Invalid switch 'maybe' (expected on or off)");
  });

  it("parses drop modes", () => {
    expect(parseDropMode("stack")).toBe("stack");
    expect(parseDropMode("definition")).toBe("definition");
    expect(() => parseDropMode("values")).toThrow(ConfigError);
  });
});
