// Model Providers - chat, embedding and rerank services behind narrow interfaces
//
// Retrieval strategies, the synthesizer and the scorers only see these interfaces, so
// evaluation runs can swap in recorded or fake services. Every call reports its token
// usage; pricing happens in the UsageMeter.
import { RAG_CONFIG } from "./config";
import { CallTimeoutError } from "./errors";
import { countTokens } from "./tokens";
import { OpenAI, OpenAIEmbedding } from "@llamaindex/openai";
import { CohereClient } from "cohere-ai";

export type Completion = {
  text: string;
  inputTokens: number;
  outputTokens: number;
};

export interface ChatModel {
  readonly model: string;
  complete(prompt: string): Promise<Completion>;
}

export type EmbeddingBatch = {
  vectors: number[][];
  tokens: number;
};

export interface EmbeddingModel {
  readonly model: string;
  embed(texts: string[]): Promise<EmbeddingBatch>;
}

export type RerankHit = {
  /** Position of the document in the list passed to rerank() */
  index: number;
  relevanceScore: number;
};

export interface Reranker {
  readonly model: string;
  rerank(query: string, documents: string[], topN: number): Promise<RerankHit[]>;
}

/** The external services one evaluation run depends on. */
export type ModelServices = {
  /** Answers questions and paraphrases queries */
  chat: ChatModel;
  /** Grades answers and writes golden examples */
  judge: ChatModel;
  embedder: EmbeddingModel;
  reranker?: Reranker;
};

export class OpenAIChatModel implements ChatModel {
  readonly model: string;
  private readonly llm: OpenAI;

  constructor(options: { model?: string; temperature?: number; apiKey?: string } = {}) {
    this.model = options.model ?? RAG_CONFIG.chatModel;
    this.llm = new OpenAI({
      model: this.model,
      apiKey: options.apiKey ?? process.env.OPENAI_API_KEY,
      temperature: options.temperature ?? 0,
    });
  }

  async complete(prompt: string): Promise<Completion> {
    const response = await this.llm.complete({ prompt });
    return {
      text: response.text,
      inputTokens: countTokens(prompt, this.model),
      outputTokens: countTokens(response.text, this.model),
    };
  }
}

export class OpenAIEmbeddingModel implements EmbeddingModel {
  readonly model: string;
  private readonly embedModel: OpenAIEmbedding;

  constructor(options: { model?: string; apiKey?: string } = {}) {
    this.model = options.model ?? RAG_CONFIG.embeddingModel;
    this.embedModel = new OpenAIEmbedding({
      model: this.model,
      apiKey: options.apiKey ?? process.env.OPENAI_API_KEY,
      dimensions: RAG_CONFIG.embeddingDimensions,
    });
  }

  async embed(texts: string[]): Promise<EmbeddingBatch> {
    if (texts.length === 0) return { vectors: [], tokens: 0 };

    const vectors = await this.embedModel.getTextEmbeddingsBatch(texts);
    const tokens = texts.reduce((sum, text) => sum + countTokens(text, this.model), 0);
    return { vectors, tokens };
  }
}

export class CohereReranker implements Reranker {
  readonly model: string;
  private readonly client: CohereClient;

  constructor(apiKey: string, model: string = RAG_CONFIG.rerankModel) {
    this.model = model;
    this.client = new CohereClient({ token: apiKey });
  }

  async rerank(query: string, documents: string[], topN: number): Promise<RerankHit[]> {
    if (documents.length === 0) return [];

    const response = await this.client.rerank({ model: this.model, query, documents, topN });
    return response.results.map(result => ({ index: result.index, relevanceScore: result.relevanceScore }));
  }
}

/**
 * Race a call against a timer. The timer is always cleared, so a finished run
 * leaves nothing scheduled on the event loop.
 */
export async function withTimeout<T>(label: string, timeoutMs: number, run: () => Promise<T>): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return run();

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new CallTimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([run(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Wrap every service so each external call carries its own timeout.
 */
export function withCallTimeouts(services: ModelServices, timeoutMs: number): ModelServices {
  const { chat, judge, embedder, reranker } = services;

  return {
    chat: {
      model: chat.model,
      complete: prompt => withTimeout(`${chat.model} completion`, timeoutMs, () => chat.complete(prompt)),
    },
    judge: {
      model: judge.model,
      complete: prompt => withTimeout(`${judge.model} judge completion`, timeoutMs, () => judge.complete(prompt)),
    },
    embedder: {
      model: embedder.model,
      embed: texts => withTimeout(`${embedder.model} embedding`, timeoutMs, () => embedder.embed(texts)),
    },
    reranker: reranker && {
      model: reranker.model,
      rerank: (query, documents, topN) =>
        withTimeout(`${reranker.model} rerank`, timeoutMs, () => reranker.rerank(query, documents, topN)),
    },
  };
}

/**
 * Production services: OpenAI through llamaindex, Cohere when a key is present.
 */
export function createOpenAIServices(env: NodeJS.ProcessEnv = process.env): ModelServices {
  return {
    chat: new OpenAIChatModel({ apiKey: env.OPENAI_API_KEY }),
    judge: new OpenAIChatModel({ apiKey: env.OPENAI_API_KEY }),
    embedder: new OpenAIEmbeddingModel({ apiKey: env.OPENAI_API_KEY }),
    reranker: env.COHERE_API_KEY ? new CohereReranker(env.COHERE_API_KEY) : undefined,
  };
}
