import type { Passage } from "../types";
import { Bm25Index, createBm25Strategy, tokenize } from "./bm25";
import { describe, expect, it } from "vitest";

const passage = (id: string, text: string): Passage => ({ id, text, recordIds: [id] });

const PASSAGES = [
  passage("p1", "CSV export writes the dates in the wrong format"),
  passage("p2", "Dashboard is slow to load"),
  passage("p3", "PDF export cuts off the last column"),
];

describe("tokenize", () => {
  it("should lowercase, split on non-alphanumerics and drop stop words", () => {
    expect(tokenize("The Dashboard, is SLOW!")).toEqual(["dashboard", "slow"]);
  });
});

describe("Bm25Index", () => {
  it("should rank passages matching more query terms first and drop non-matching ones", () => {
    const index = new Bm25Index(PASSAGES);
    const results = index.search("csv export", 10);

    expect(results.map(r => r.id)).toEqual(["p1", "p3"]);
    expect(results[0].score).toBeGreaterThan(results[1].score ?? 0);
  });

  it("should respect k", () => {
    const index = new Bm25Index(PASSAGES);
    expect(index.search("export", 1).map(r => r.id)).toHaveLength(1);
  });

  it("should keep corpus order for equal scores", () => {
    const index = new Bm25Index([passage("a", "slow export"), passage("b", "slow export")]);
    expect(index.search("export", 10).map(r => r.id)).toEqual(["a", "b"]);
  });

  it("should return nothing for a query of stop words", () => {
    const index = new Bm25Index(PASSAGES);
    expect(index.search("the and of", 10)).toEqual([]);
  });
});

describe("createBm25Strategy", () => {
  it("should return an empty result over an empty corpus", async () => {
    const strategy = createBm25Strategy([], { topK: 5 });
    expect(await strategy.retrieve("export")).toEqual([]);
  });

  it("should be named bm25 and truncate to topK", async () => {
    const strategy = createBm25Strategy(PASSAGES, { topK: 1 });
    expect(strategy.name).toBe("bm25");
    expect((await strategy.retrieve("csv export")).map(r => r.id)).toEqual(["p1"]);
  });
});
