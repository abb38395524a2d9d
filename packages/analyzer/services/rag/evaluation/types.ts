// Evaluation Pipeline Types
import type { Passage } from "../types";

export const METRIC_NAMES = ["context_recall", "faithfulness", "answer_relevancy", "context_precision"] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

export type MetricValues = Record<MetricName, number | null>;

export type GoldenExample = {
  id: string;
  question: string;
  referenceAnswer: string;
  /** Every passage's recordIds exist in the corpus the example was generated from */
  referenceContext: Passage[];
};

export type GoldenDataset = {
  seed: number;
  corpusFingerprint: string;
  requestedSize: number;
  examples: GoldenExample[];
  /** requestedSize - examples.length */
  shortfall: number;
};

export type GoldenGenerationOptions = {
  size: number;
  seed: number;
  recordsPerExample?: number;
  /** Raw samples attempted per requested example */
  maxAttemptsFactor?: number;
};

export type ScoredRun = {
  strategy: string;
  exampleId: string;
  question: string;
  repeat: number;
  answer: string;
  latencySeconds: number;
  costUsd: number;
  faithfulness: number | null;
  answerRelevancy: number | null;
  contextPrecision: number | null;
  contextRecall: number | null;
  retrievedPassageIds: string[];
  /** Retrieval or synthesis failure; metrics are all null when set */
  error?: string;
  /** Per-metric scoring failures */
  scoringErrors: Partial<Record<MetricName, string>>;
  /** Judge and scoring-embedding spend; counts against the budget, not the strategy */
  judgeCostUsd: number;
};

export type StrategyAggregate = {
  strategy: string;
  numQuestions: number;
  numRuns: number;
  successCount: number;
  failureCount: number;
  failureRate: number;
  /** Means over successful runs */
  metrics: MetricValues;
  /** Sample standard deviation over successful runs; null below two values */
  spread: MetricValues;
  avgLatencySeconds: number | null;
  totalCostUsd: number;
  avgCostUsd: number | null;
  /** Set when the strategy could not be built */
  error?: string;
};

export type EvalRunOptions = {
  topK: number;
  concurrency: number;
  /** Per external call; 0 disables */
  timeoutMs: number;
  budgetUsd?: number;
  priorityMetric: MetricName;
  repeats: number;
};

export type EvaluationRun = {
  runs: ScoredRun[];
  aggregates: StrategyAggregate[];
  /** Strategy names, best first */
  ranking: string[];
  corpusFingerprint: string;
  goldenSize: number;
  startedAt: string;
  durationMs: number;
  options: EvalRunOptions;
  budgetExceeded: boolean;
  /** Pipeline plus judge spend across all runs */
  spentUsd: number;
  gitCommit?: string;
};
