// Vector Index - passages embedded into a LlamaIndex SimpleVectorStore
//
// Embeddings go through the injected EmbeddingModel so every call is metered; the
// store keeps the vectors and answers top-K similarity queries.
import { RetrievalUnavailable, errorMessage } from "./errors";
import type { EmbeddingModel } from "./providers";
import type { Passage } from "./types";
import type { UsageMeter } from "./usage";
import { BaseEmbedding, Settings, SimpleVectorStore, TextNode, VectorStoreQueryMode } from "llamaindex";

const EMBED_BATCH_SIZE = 100;

function norm(vector: number[]): number {
  let sum = 0;
  for (const v of vector) sum += v * v;
  return Math.sqrt(sum);
}

/** Cosine similarity; 0 when either vector is all zeros. */
export function cosineSimilarity(a: number[], b: number[]): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  for (let i = 0; i < length; i++) dot += a[i] * b[i];
  const denominator = norm(a) * norm(b);
  return denominator === 0 ? 0 : dot / denominator;
}

/**
 * LlamaIndex embedding backed by one of our EmbeddingModel services.
 */
export class ServiceEmbedding extends BaseEmbedding {
  constructor(private readonly embedder: EmbeddingModel) {
    super();
  }

  async getTextEmbedding(text: string): Promise<number[]> {
    const { vectors } = await this.embedder.embed([text]);
    const [vector] = vectors;
    if (!vector) {
      throw new Error(`${this.embedder.model} returned no vector`);
    }
    return vector;
  }
}

export class VectorIndex {
  private constructor(
    private readonly store: SimpleVectorStore,
    private readonly passages: Map<string, Passage>,
    private readonly embedder: EmbeddingModel,
  ) {}

  /**
   * Embed passages in batches and add them to a fresh in-memory store.
   * Passages with blank text are skipped (the embeddings API rejects them).
   */
  static async build(passages: Passage[], embedder: EmbeddingModel): Promise<VectorIndex> {
    const valid = passages.filter(p => p.text.trim().length > 0);
    if (valid.length < passages.length) {
      console.warn(`Skipped ${passages.length - valid.length} passages with empty content`);
    }

    const store = Settings.withEmbedModel(new ServiceEmbedding(embedder), () => new SimpleVectorStore());
    const byId = new Map<string, Passage>();

    for (let i = 0; i < valid.length; i += EMBED_BATCH_SIZE) {
      const batch = valid.slice(i, i + EMBED_BATCH_SIZE);
      const { vectors } = await embedder.embed(batch.map(p => p.text));
      if (vectors.length !== batch.length) {
        throw new RetrievalUnavailable(`Embedding service returned ${vectors.length} vectors for ${batch.length} texts`);
      }

      const nodes = batch.map((passage, k) => new TextNode({ id_: passage.id, text: passage.text, embedding: vectors[k] }));
      await store.add(nodes);
      for (const passage of batch) byId.set(passage.id, passage);
    }

    return new VectorIndex(store, byId, embedder);
  }

  get size(): number {
    return this.passages.size;
  }

  /**
   * Embed the query and search. An empty index answers without calling the embedder.
   */
  async search(query: string, k: number, meter?: UsageMeter): Promise<Passage[]> {
    if (this.passages.size === 0 || k <= 0 || !query.trim()) return [];

    let vector: number[] | undefined;
    try {
      const batch = await this.embedder.embed([query]);
      meter?.recordEmbedding(this.embedder.model, batch);
      vector = batch.vectors[0];
    } catch (error) {
      throw new RetrievalUnavailable(`Query embedding failed: ${errorMessage(error)}`, { cause: error });
    }
    if (!vector) {
      throw new RetrievalUnavailable("Embedding service returned no vector for the query");
    }

    const result = await this.store.query({
      queryEmbedding: vector,
      similarityTopK: k,
      mode: VectorStoreQueryMode.DEFAULT,
    });

    const hits: Passage[] = [];
    result.ids.forEach((id, i) => {
      const passage = this.passages.get(id);
      if (!passage) return;
      const score = result.similarities[i];
      hits.push({ ...passage, recordIds: [...passage.recordIds], score: Number.isFinite(score) ? score : 0 });
    });
    return hits;
  }
}
