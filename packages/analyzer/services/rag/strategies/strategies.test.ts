import { FakeEmbedder, FakeReranker, ScriptedChatModel, makeRecord, makeServices } from "~~/test-utils/fakes";
import { ConfigurationError, RetrievalUnavailable } from "../errors";
import { STRATEGY_NAMES, type Passage, type RetrievalStrategy } from "../types";
import { UsageMeter } from "../usage";
import { VectorIndex } from "../vectorIndex";
import { createEnsembleStrategy } from "./ensemble";
import { StrategyFactory } from "./factory";
import { createMultiQueryStrategy, parseParaphrases } from "./multiQuery";
import { createParentDocumentStrategy } from "./parentDocument";
import { createRerankStrategy } from "./rerank";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const passage = (id: string, text: string): Passage => ({ id, text, recordIds: [id] });

const fixed = (name: string, ids: string[]): RetrievalStrategy => ({
  name,
  retrieve: async () => ids.map(id => passage(id, id)),
});

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("empty corpus", () => {
  it("should return an empty result from every strategy without calling a model", async () => {
    const chat = new ScriptedChatModel([]);
    const embedder = new FakeEmbedder();
    const reranker = new FakeReranker();
    const factory = new StrategyFactory({
      records: [],
      services: makeServices({ chat, embedder, reranker }),
      topK: 5,
    });

    for (const name of STRATEGY_NAMES) {
      const strategy = await factory.build(name);
      expect(await strategy.retrieve("what do users dislike?")).toEqual([]);
    }
    expect(chat.prompts).toHaveLength(0);
    expect(embedder.calls).toBe(0);
    expect(reranker.calls).toBe(0);
  });
});

describe("parseParaphrases", () => {
  it("should strip numbering and bullets and drop blanks and repeats", () => {
    const text = "1. First version\n2) Second version\n\n- third version\n* First version\nOriginal question";
    expect(parseParaphrases(text, "original question", 3)).toEqual([
      "First version",
      "Second version",
      "third version",
    ]);
  });

  it("should stop at the limit", () => {
    expect(parseParaphrases("a\nb\nc\nd", "q", 2)).toEqual(["a", "b"]);
  });
});

describe("multi_query", () => {
  it("should search with the original query and each paraphrase", async () => {
    const embedder = new FakeEmbedder();
    const index = await VectorIndex.build(
      [passage("a", "dashboard slow"), passage("b", "export csv"), passage("c", "login sso")],
      embedder,
    );
    const chat = new ScriptedChatModel([{ when: "different versions", reply: "login sso problems\nexport csv" }]);
    const strategy = createMultiQueryStrategy(index, chat, { topK: 2 });
    const meter = new UsageMeter();

    const results = await strategy.retrieve("dashboard slow", { meter });

    // Round-robin over the three rank-1 hits, truncated to K
    expect(results.map(r => r.id)).toEqual(["a", "c"]);
    expect(chat.prompts).toHaveLength(1);
    // 1 build batch + 3 query embeddings
    expect(embedder.calls).toBe(4);
    // 1 completion + 3 query embeddings
    expect(meter.callCount).toBe(4);
  });

  it("should surface paraphrase failures as RetrievalUnavailable", async () => {
    const index = await VectorIndex.build([passage("a", "dashboard slow")], new FakeEmbedder());
    const chat = new ScriptedChatModel([{ when: "different versions", reply: new Error("quota exceeded") }]);
    const strategy = createMultiQueryStrategy(index, chat, { topK: 2 });

    await expect(strategy.retrieve("dashboard")).rejects.toBeInstanceOf(RetrievalUnavailable);
  });
});

describe("parent_document", () => {
  it("should return parent blocks for matching child chunks", async () => {
    const records = [makeRecord("r1", "dashboard is slow"), makeRecord("r2", "csv export is broken")];
    const strategy = await createParentDocumentStrategy(records, new FakeEmbedder(), { topK: 1 });

    const results = await strategy.retrieve("csv export broken");

    expect(results).toHaveLength(1);
    expect(results[0].id).toBe("r2#p0");
    expect(results[0].text).toBe("csv export is broken");
    expect(results[0].recordIds).toEqual(["r2"]);
  });
});

describe("rerank", () => {
  it("should reorder vector candidates by reranker relevance and truncate to K", async () => {
    const index = await VectorIndex.build(
      [passage("a", "dashboard slow"), passage("b", "export csv dates"), passage("c", "export pdf")],
      new FakeEmbedder(),
    );
    const reranker = new FakeReranker();
    const strategy = createRerankStrategy(index, reranker, { topK: 2, candidateK: 3 });
    const meter = new UsageMeter();

    const results = await strategy.retrieve("export csv", { meter });

    expect(results.map(r => [r.id, r.score])).toEqual([
      ["b", 2],
      ["c", 1],
    ]);
    expect(reranker.calls).toBe(1);
    // query embedding + rerank search
    expect(meter.callCount).toBe(2);
  });

  it("should surface reranker failures as RetrievalUnavailable", async () => {
    const index = await VectorIndex.build([passage("a", "dashboard slow")], new FakeEmbedder());
    const reranker = new FakeReranker();
    reranker.failWith = new Error("service unavailable");
    const strategy = createRerankStrategy(index, reranker, { topK: 2, candidateK: 3 });

    await expect(strategy.retrieve("dashboard")).rejects.toThrow("Reranking failed: service unavailable");
  });
});

describe("ensemble", () => {
  it("should fuse member rankings", async () => {
    const strategy = createEnsembleStrategy(
      [
        { strategy: fixed("keyword", ["a", "b"]), weight: 0.5 },
        { strategy: fixed("vector", ["b", "c"]), weight: 0.5 },
      ],
      { topK: 2 },
    );

    expect((await strategy.retrieve("q")).map(r => r.id)).toEqual(["b", "a"]);
  });

  it("should need at least two members", () => {
    expect(() => createEnsembleStrategy([{ strategy: fixed("one", []), weight: 1 }], { topK: 2 })).toThrow();
  });
});

describe("StrategyFactory", () => {
  const records = [makeRecord("r1", "dashboard is slow"), makeRecord("r2", "csv export is broken")];

  it("should embed the shared passage index once", async () => {
    const embedder = new FakeEmbedder();
    const factory = new StrategyFactory({ records, services: makeServices({ embedder }), topK: 2 });

    await factory.build("naive");
    await factory.build("ensemble");

    expect(embedder.calls).toBe(1);
  });

  it("should refuse to build rerank without a reranker", async () => {
    const factory = new StrategyFactory({ records, services: makeServices(), topK: 2 });

    await expect(factory.build("rerank")).rejects.toBeInstanceOf(ConfigurationError);
    await expect(factory.build("rerank")).rejects.toThrow(
      "COHERE_API_KEY environment variable is required for rerank retriever",
    );
  });

  it("should report strategies that cannot be built as unavailable slots", async () => {
    const factory = new StrategyFactory({ records, services: makeServices(), topK: 2 });

    const slots = await factory.buildSlots(["naive", "rerank", "hybrid"]);

    expect(slots.map(slot => [slot.name, slot.status])).toEqual([
      ["naive", "ready"],
      ["rerank", "unavailable"],
      ["hybrid", "unavailable"],
    ]);
    expect(slots[2]).toEqual({ name: "hybrid", status: "unavailable", error: "Unknown retrieval strategy: hybrid" });
  });
});
