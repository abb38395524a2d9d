// RAG Configuration

// Environment variable defaults
export const RAG_CONFIG = {
  // OpenAI models
  embeddingModel: process.env.OPENAI_EMBEDDING_MODEL || "text-embedding-3-small",
  chatModel: process.env.OPENAI_CHAT_MODEL || "gpt-4o-mini",

  // Embedding dimensions for text-embedding-3-small
  embeddingDimensions: 1536,

  // Cohere reranking
  rerankModel: process.env.COHERE_RERANK_MODEL || "rerank-english-v3.0",
  rerankCandidateK: 20,

  // Query defaults
  defaultTopK: Number(process.env.RAG_TOP_K) || 10,
  maxTopK: 50,

  // Per external call (ms)
  timeoutMs: Number(process.env.EVAL_CALL_TIMEOUT_MS) || 60000,

  // Chunk settings (tokens)
  chunkSize: Number(process.env.RAG_CHUNK_SIZE) || 512,
  chunkOverlap: Number(process.env.RAG_CHUNK_OVERLAP) || 50,

  // Parent-document hierarchy (tokens)
  parentChunkSize: 512,
  childChunkSize: 128,
  childChunkOverlap: 20,

  // Web search
  maxWebResults: 3,

  // Corpus
  csvPath: process.env.FEEDBACK_CSV_PATH || "data/feedback_corpus.csv",
} as const;

export type ModelPrice = {
  /** USD per million input tokens */
  input: number;
  /** USD per million output tokens */
  output: number;
};

// Published list prices; models missing here are priced at zero
export const MODEL_PRICING: Record<string, ModelPrice> = {
  "gpt-4o-mini": { input: 0.15, output: 0.6 },
  "gpt-4o": { input: 2.5, output: 10 },
  "gpt-4.1-mini": { input: 0.4, output: 1.6 },
  "gpt-3.5-turbo-0125": { input: 0.5, output: 1.5 },
  "text-embedding-3-small": { input: 0.02, output: 0 },
  "text-embedding-3-large": { input: 0.13, output: 0 },
};

/** USD per rerank search (one query, up to 100 documents) */
export const RERANK_COST_PER_SEARCH = 0.002;

// Validate required environment variables
export function validateRagConfig(env: NodeJS.ProcessEnv = process.env): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!env.OPENAI_API_KEY) {
    errors.push("OPENAI_API_KEY is required");
  }

  if (RAG_CONFIG.chunkOverlap >= RAG_CONFIG.chunkSize) {
    errors.push("RAG_CHUNK_OVERLAP must be smaller than RAG_CHUNK_SIZE");
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
