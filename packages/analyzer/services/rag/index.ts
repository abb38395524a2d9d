// RAG Service - Main exports

export { APOLOGY_ANSWER, AnalyzeRequestSchema, createFeedbackAnalyzer, parseRoute } from "./analyzer";
export type { FeedbackAnalyzer, FeedbackAnalyzerDeps } from "./analyzer";
export { RAG_CONFIG, validateRagConfig } from "./config";
export {
  AnalyzerError,
  CallTimeoutError,
  ConfigurationError,
  CorpusLoadError,
  GenerationError,
  RetrievalUnavailable,
  ScoringError,
  errorMessage,
} from "./errors";
export { buildParentChildPassages, chunkRecords, recordPassage } from "./indexing";
export {
  CohereReranker,
  OpenAIChatModel,
  OpenAIEmbeddingModel,
  createOpenAIServices,
  withCallTimeouts,
  withTimeout,
} from "./providers";
export type { ChatModel, Completion, EmbeddingModel, ModelServices, Reranker } from "./providers";
export { StrategyFactory } from "./strategies";
export { synthesizeAnswer } from "./synthesizer";
export { cleanupEncoders, countTokens } from "./tokens";
export { STRATEGY_NAMES } from "./types";
export type { AnalyzeOutput, Passage, RetrievalStrategy, StrategyName, StrategySlot } from "./types";
export { UsageMeter } from "./usage";
export { VectorIndex } from "./vectorIndex";
export { getDatasetInfo, loadFeedbackCorpus, parseFeedbackCsv } from "../corpus/loader";
export type { DatasetInfo, FeedbackRecord } from "../corpus/types";
export { TavilySearchClient, createWebSearchClient } from "../web/tavily";
export type { WebSearchClient } from "../web/tavily";
