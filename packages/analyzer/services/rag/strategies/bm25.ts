// Keyword retrieval - Okapi BM25 over the flat passages, no embeddings
import type { Passage, RetrievalStrategy } from "../types";

const STOP_WORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "by", "do", "does", "for", "from", "has", "have", "how",
  "i", "in", "is", "it", "its", "of", "on", "or", "that", "the", "this", "to", "was", "what", "when",
  "which", "who", "with",
]);

export type Bm25StrategyConfig = {
  topK: number;
  k1?: number;
  b?: number;
};

export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(/[a-z0-9]+/g) ?? []).filter(token => !STOP_WORDS.has(token));
}

type DocumentStats = {
  passage: Passage;
  termFrequencies: Map<string, number>;
  length: number;
};

export class Bm25Index {
  private readonly docs: DocumentStats[];
  private readonly documentFrequency = new Map<string, number>();
  private readonly avgLength: number;

  constructor(
    passages: Passage[],
    private readonly k1 = 1.5,
    private readonly b = 0.75,
  ) {
    this.docs = passages.map(passage => {
      const tokens = tokenize(passage.text);
      const termFrequencies = new Map<string, number>();
      for (const token of tokens) {
        termFrequencies.set(token, (termFrequencies.get(token) ?? 0) + 1);
      }
      for (const term of termFrequencies.keys()) {
        this.documentFrequency.set(term, (this.documentFrequency.get(term) ?? 0) + 1);
      }
      return { passage, termFrequencies, length: tokens.length };
    });

    const totalLength = this.docs.reduce((sum, doc) => sum + doc.length, 0);
    this.avgLength = this.docs.length > 0 ? totalLength / this.docs.length : 0;
  }

  private idf(term: string): number {
    const df = this.documentFrequency.get(term) ?? 0;
    const n = this.docs.length;
    return Math.log(1 + (n - df + 0.5) / (df + 0.5));
  }

  /**
   * Passages with a positive score, best first. Equal scores keep corpus order.
   */
  search(query: string, k: number): Passage[] {
    const terms = [...new Set(tokenize(query))];
    if (terms.length === 0 || this.docs.length === 0 || k <= 0) return [];

    const scored: { passage: Passage; score: number }[] = [];
    for (const doc of this.docs) {
      let score = 0;
      for (const term of terms) {
        const tf = doc.termFrequencies.get(term);
        if (!tf) continue;
        const lengthNorm = this.avgLength > 0 ? doc.length / this.avgLength : 0;
        score += (this.idf(term) * (tf * (this.k1 + 1))) / (tf + this.k1 * (1 - this.b + this.b * lengthNorm));
      }
      if (score > 0) scored.push({ passage: doc.passage, score });
    }

    return scored
      .sort((a, b) => b.score - a.score)
      .slice(0, k)
      .map(({ passage, score }) => ({ ...passage, recordIds: [...passage.recordIds], score }));
  }
}

export function createBm25Strategy(passages: Passage[], config: Bm25StrategyConfig): RetrievalStrategy {
  const index = new Bm25Index(passages, config.k1, config.b);

  return {
    name: "bm25",
    retrieve: async query => index.search(query, config.topK),
  };
}
