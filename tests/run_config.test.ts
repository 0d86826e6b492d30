import { describe, it, expect } from "vitest";
import { z } from "zod";
import {
  parseCoherenceMode,
  parseConfig,
  parseNumberList,
  parseNumberSeries,
  resolveAlpha,
  resolveSeed,
} from "../src/shared/run_config.js";
import { ConfigError } from "../src/shared/errors.js";

describe("parseCoherenceMode", () => {
  it("defaults to corr", () => {
    expect(parseCoherenceMode()).toBe("corr");
  });

  it("prefers the CLI argument over the environment", () => {
    expect(parseCoherenceMode("corr", "causal")).toBe("corr");
    expect(parseCoherenceMode(undefined, " CAUSAL ")).toBe("causal");
  });

  it("throws ConfigError for unknown modes", () => {
    expect(() => parseCoherenceMode("granger")).toThrow(ConfigError);
  });
});

describe("parseNumberList", () => {
  it("parses an exact number of values", () => {
    expect(parseNumberList("0.3, 0.4,0.3", 3, "weights")).toEqual([0.3, 0.4, 0.3]);
  });

  it("rejects the wrong arity, blanks and non-finite values", () => {
    expect(() => parseNumberList("1,2", 3, "weights")).toThrow(
      'weights must be 3 comma-separated numbers, got "1,2"'
    );
    expect(() => parseNumberList("1,,2", 3, "weights")).toThrow(ConfigError);
    expect(() => parseNumberList("1,Infinity,2", 3, "weights")).toThrow(ConfigError);
  });
});

describe("parseNumberSeries", () => {
  it("accepts any non-empty list", () => {
    expect(parseNumberSeries("0.25", "thresholds")).toEqual([0.25]);
    expect(parseNumberSeries("0.25,0.5,0.7", "thresholds")).toEqual([0.25, 0.5, 0.7]);
  });

  it("rejects an empty string", () => {
    expect(() => parseNumberSeries("", "thresholds")).toThrow(ConfigError);
  });
});

describe("resolveAlpha", () => {
  it("falls back to 0.05", () => {
    expect(resolveAlpha()).toBe(0.05);
    expect(resolveAlpha(" ")).toBe(0.05);
  });

  it("reads the CLI value before the environment", () => {
    expect(resolveAlpha("0.01", "0.1")).toBe(0.01);
    expect(resolveAlpha(undefined, "0.1")).toBe(0.1);
  });

  it("requires 0 < alpha < 1", () => {
    expect(() => resolveAlpha("1")).toThrow(ConfigError);
    expect(() => resolveAlpha("0")).toThrow(ConfigError);
    expect(() => resolveAlpha("abc")).toThrow(ConfigError);
  });
});

describe("resolveSeed", () => {
  it("treats absence as 0", () => {
    expect(resolveSeed()).toBe(0);
    expect(resolveSeed("")).toBe(0);
  });

  it("parses non-negative integers", () => {
    expect(resolveSeed("42")).toBe(42);
    expect(resolveSeed(undefined, "7")).toBe(7);
  });

  it("rejects negative and fractional seeds", () => {
    expect(() => resolveSeed("-1")).toThrow(ConfigError);
    expect(() => resolveSeed("1.5")).toThrow(ConfigError);
  });

  it("accepts the full 32-bit range and nothing beyond it", () => {
    expect(resolveSeed("4294967295")).toBe(4294967295);
    expect(() => resolveSeed("4294967296")).toThrow(ConfigError);
    expect(() => resolveSeed(undefined, "99999999999")).toThrow(
      'seed must be an integer in [0, 4294967295], got "99999999999"'
    );
  });
});

describe("parseConfig", () => {
  const schema = z.object({ runs: z.coerce.number().int().default(10) }).strict();

  it("returns parsed data with defaults applied", () => {
    expect(parseConfig(schema, {}, "flags")).toEqual({ runs: 10 });
    expect(parseConfig(schema, { runs: "3" }, "flags")).toEqual({ runs: 3 });
  });

  it("wraps validation failures in ConfigError", () => {
    expect(() => parseConfig(schema, { runs: "x" }, "flags")).toThrow(ConfigError);
    expect(() => parseConfig(schema, { other: 1 }, "flags")).toThrow(/^invalid flags: /);
  });
});
