import { FakeEmbedder } from "~~/test-utils/fakes";
import { RetrievalUnavailable } from "./errors";
import type { Passage } from "./types";
import { UsageMeter } from "./usage";
import { ServiceEmbedding, VectorIndex, cosineSimilarity } from "./vectorIndex";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const passage = (id: string, text: string): Passage => ({ id, text, recordIds: [id] });

describe("cosineSimilarity", () => {
  it("should score identical, orthogonal and zero vectors", () => {
    expect(cosineSimilarity([1, 2], [1, 2])).toBeCloseTo(1, 12);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });
});

describe("ServiceEmbedding", () => {
  it("should embed through the injected model", async () => {
    const embedder = new FakeEmbedder();
    const embedding = new ServiceEmbedding(embedder);

    expect(await embedding.getTextEmbedding("csv export")).toEqual(embedder.embedText("csv export"));
    expect(embedder.calls).toBe(1);
  });
});

describe("VectorIndex", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should return the closest passage first", async () => {
    const embedder = new FakeEmbedder();
    const index = await VectorIndex.build(
      [passage("a", "dashboard slow"), passage("b", "export csv"), passage("c", "login sso")],
      embedder,
    );

    const results = await index.search("csv export", 2);

    expect(results).toHaveLength(2);
    expect(results[0].id).toBe("b");
    expect(results[0].score).toBeCloseTo(1, 12);
  });

  it("should answer an empty index without calling the embedder", async () => {
    const embedder = new FakeEmbedder();
    const index = await VectorIndex.build([], embedder);

    expect(await index.search("anything", 5)).toEqual([]);
    expect(embedder.calls).toBe(0);
  });

  it("should return nothing for a blank query", async () => {
    const embedder = new FakeEmbedder();
    const index = await VectorIndex.build([passage("a", "dashboard slow")], embedder);

    expect(await index.search("   ", 5)).toEqual([]);
    expect(embedder.calls).toBe(1);
  });

  it("should skip passages with blank text", async () => {
    const index = await VectorIndex.build([passage("a", "dashboard slow"), passage("b", "  ")], new FakeEmbedder());
    expect(index.size).toBe(1);
  });

  it("should surface embedding failures as RetrievalUnavailable", async () => {
    const embedder = new FakeEmbedder();
    const index = await VectorIndex.build([passage("a", "dashboard slow")], embedder);
    embedder.failWith = new Error("rate limited");

    await expect(index.search("dashboard", 1)).rejects.toBeInstanceOf(RetrievalUnavailable);
    await expect(index.search("dashboard", 1)).rejects.toThrow("Query embedding failed: rate limited");
  });

  it("should record the query embedding on the meter", async () => {
    const index = await VectorIndex.build([passage("a", "dashboard slow")], new FakeEmbedder());
    const meter = new UsageMeter();

    await index.search("dashboard", 1, meter);

    expect(meter.callCount).toBe(1);
  });

  it("should rank every stored passage by similarity", async () => {
    const index = await VectorIndex.build(
      [passage("a", "login sso"), passage("b", "export csv dates"), passage("c", "csv export")],
      new FakeEmbedder(),
    );

    const results = await index.search("csv export", 3);

    expect(results.map(r => r.id)).toEqual(["c", "b", "a"]);
    expect(results[2].score).toBe(0);
  });
});
