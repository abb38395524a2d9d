import { parseMetricName, parseSeed } from "./config";
import { describe, expect, it } from "vitest";

describe("parseSeed", () => {
  it("should accept 0 as a seed", () => {
    expect(parseSeed("0")).toBe(0);
    expect(parseSeed("7")).toBe(7);
  });

  it("should ignore missing and non-integer values", () => {
    expect(parseSeed(undefined)).toBeUndefined();
    expect(parseSeed("  ")).toBeUndefined();
    expect(parseSeed("abc")).toBeUndefined();
    expect(parseSeed("1.5")).toBeUndefined();
  });
});

describe("parseMetricName", () => {
  it("should normalize known metric names", () => {
    expect(parseMetricName(" Faithfulness ")).toBe("faithfulness");
    expect(parseMetricName("bleu")).toBeUndefined();
  });
});
