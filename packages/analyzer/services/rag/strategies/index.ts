// Retrieval strategies - Main exports

export { Bm25Index, createBm25Strategy, tokenize } from "./bm25";
export { createEnsembleStrategy } from "./ensemble";
export type { EnsembleMember } from "./ensemble";
export { StrategyFactory, isStrategyName } from "./factory";
export type { StrategyFactoryDeps } from "./factory";
export { mergeRoundRobin, reciprocalRankFusion } from "./merge";
export { createMultiQueryStrategy, parseParaphrases } from "./multiQuery";
export { createNaiveStrategy } from "./naive";
export { createParentDocumentStrategy } from "./parentDocument";
export { createRerankStrategy } from "./rerank";
