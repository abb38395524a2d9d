// Evaluation Pipeline - Main exports

export { EVAL_CONFIG, parseMetricName, parseSeed } from "./config";
export {
  assertGoldenTraceable,
  generateGoldenDataset,
  obtainGoldenDataset,
  loadGoldenDataset,
  mulberry32,
  saveGoldenDataset,
  seededShuffle,
} from "./goldenDataset";
export { mapWithConcurrency } from "./pool";
export { buildComparisonReport, printReport, renderMarkdownReport, saveReport } from "./report";
export type { ComparisonReport, ReportMeta } from "./report";
export { BUDGET_EXCEEDED, aggregateRuns, rankAggregates, runEvaluation } from "./runner";
export type { EvaluationInputs } from "./runner";
export {
  averagePrecision,
  scoreAnswerRelevancy,
  scoreContextPrecision,
  scoreContextRecall,
  scoreFaithfulness,
  scoreRun,
} from "./scorers";
export { METRIC_NAMES } from "./types";
export type {
  EvalRunOptions,
  EvaluationRun,
  GoldenDataset,
  GoldenExample,
  MetricName,
  ScoredRun,
  StrategyAggregate,
} from "./types";
