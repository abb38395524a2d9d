import type { Passage } from "../types";
import { mergeRoundRobin, reciprocalRankFusion } from "./merge";
import { describe, expect, it } from "vitest";

const p = (id: string): Passage => ({ id, text: `text ${id}`, recordIds: [id] });
const ids = (passages: Passage[]) => passages.map(passage => passage.id);

describe("mergeRoundRobin", () => {
  it("should interleave by rank and keep the first occurrence of each id", () => {
    const merged = mergeRoundRobin([[p("a"), p("b")], [p("b"), p("c")], [p("d")]], 10);
    expect(ids(merged)).toEqual(["a", "b", "d", "c"]);
  });

  it("should stop at the limit", () => {
    const merged = mergeRoundRobin([[p("a"), p("b")], [p("b"), p("c")], [p("d")]], 3);
    expect(ids(merged)).toEqual(["a", "b", "d"]);
  });

  it("should return an empty list for no input", () => {
    expect(mergeRoundRobin([], 5)).toEqual([]);
    expect(mergeRoundRobin([[], []], 5)).toEqual([]);
  });
});

describe("reciprocalRankFusion", () => {
  it("should rank passages found by several lists first", () => {
    const fused = reciprocalRankFusion([[p("a"), p("b")], [p("b"), p("c")]], [0.5, 0.5], 10);

    expect(ids(fused)).toEqual(["b", "a", "c"]);
    expect(fused[0].score).toBeCloseTo(0.5 / 61 + 0.5 / 62, 12);
    expect(fused[1].score).toBeCloseTo(0.5 / 61, 12);
  });

  it("should break ties by the earlier list", () => {
    const fused = reciprocalRankFusion([[p("a")], [p("b")]], [0.5, 0.5], 10);
    expect(ids(fused)).toEqual(["a", "b"]);
  });

  it("should apply the weights", () => {
    const fused = reciprocalRankFusion([[p("a")], [p("b")]], [0.2, 0.8], 10);
    expect(ids(fused)).toEqual(["b", "a"]);
  });

  it("should truncate to the limit", () => {
    const fused = reciprocalRankFusion([[p("a"), p("b"), p("c")]], [1], 2);
    expect(ids(fused)).toEqual(["a", "b"]);
  });
});
