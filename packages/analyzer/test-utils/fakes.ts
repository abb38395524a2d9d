// In-process stand-ins for the model providers
import type { FeedbackRecord } from "~~/services/corpus/types";
import type {
  ChatModel,
  Completion,
  EmbeddingBatch,
  EmbeddingModel,
  ModelServices,
  RerankHit,
  Reranker,
} from "~~/services/rag/providers";

const DIMENSIONS = 64;

function words(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

function hashToken(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash % DIMENSIONS;
}

/** Bag-of-words vectors: texts sharing words are close, deterministic across runs. */
export class FakeEmbedder implements EmbeddingModel {
  readonly model: string;
  calls = 0;
  failWith?: Error;

  constructor(model = "fake-embedding") {
    this.model = model;
  }

  embedText(text: string): number[] {
    const vector = new Array<number>(DIMENSIONS).fill(0);
    for (const token of words(text)) vector[hashToken(token)] += 1;
    return vector;
  }

  async embed(texts: string[]): Promise<EmbeddingBatch> {
    this.calls++;
    if (this.failWith) throw this.failWith;
    return {
      vectors: texts.map(text => this.embedText(text)),
      tokens: texts.reduce((sum, text) => sum + words(text).length, 0),
    };
  }
}

export type ScriptRule = {
  /** Substring of the prompt, or a predicate over it */
  when: string | ((prompt: string) => boolean);
  reply: string | Error | ((prompt: string) => string);
};

/** Chat model answering from a script; the first matching rule wins. */
export class ScriptedChatModel implements ChatModel {
  readonly model: string;
  readonly prompts: string[] = [];

  constructor(
    private readonly rules: ScriptRule[],
    model = "fake-chat",
  ) {
    this.model = model;
  }

  async complete(prompt: string): Promise<Completion> {
    this.prompts.push(prompt);
    const rule = this.rules.find(r => (typeof r.when === "string" ? prompt.includes(r.when) : r.when(prompt)));
    if (!rule) throw new Error(`no scripted reply for prompt: ${prompt.slice(0, 60)}`);
    if (rule.reply instanceof Error) throw rule.reply;

    const text = typeof rule.reply === "function" ? rule.reply(prompt) : rule.reply;
    return { text, inputTokens: words(prompt).length, outputTokens: words(text).length };
  }
}

/** Scores each document by how many query words it contains. */
export class FakeReranker implements Reranker {
  readonly model = "fake-rerank";
  calls = 0;
  failWith?: Error;

  async rerank(query: string, documents: string[], topN: number): Promise<RerankHit[]> {
    this.calls++;
    if (this.failWith) throw this.failWith;
    const queryWords = new Set(words(query));
    return documents
      .map((doc, index) => ({ index, relevanceScore: words(doc).filter(w => queryWords.has(w)).length }))
      .sort((a, b) => b.relevanceScore - a.relevanceScore)
      .slice(0, topN);
  }
}

export function makeRecord(id: string, text: string, overrides: Partial<FeedbackRecord> = {}): FeedbackRecord {
  return {
    id,
    source: "Support Ticket",
    date: "2024-05-01",
    userId: "U-1",
    text,
    sentiment: "Neutral",
    ...overrides,
  };
}

export function makeServices(overrides: Partial<ModelServices> = {}): ModelServices {
  return {
    chat: new ScriptedChatModel([]),
    judge: new ScriptedChatModel([]),
    embedder: new FakeEmbedder(),
    ...overrides,
  };
}

/** Judge replies that score every metric as perfect. */
export function perfectJudgeRules(): ScriptRule[] {
  return [
    {
      when: "atomic statements",
      reply: JSON.stringify({ statements: [{ statement: "s", supported: true }] }),
    },
    {
      when: "Write 3 questions",
      reply: JSON.stringify({ questions: ["same question"], noncommittal: false }),
    },
    {
      when: "one verdict per passage",
      reply: prompt => {
        const passages = prompt.split("CONTEXT:")[1]?.match(/^\[\d+\]/gm) ?? [];
        return JSON.stringify({ verdicts: passages.map(() => true) });
      },
    },
    {
      when: "individual claims",
      reply: JSON.stringify({ claims: [{ claim: "c", attributed: true }] }),
    },
  ];
}
