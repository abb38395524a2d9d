// Evaluation Pipeline Configuration
import { METRIC_NAMES, type MetricName } from "./types";

export function parseMetricName(value: string | undefined): MetricName | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  return METRIC_NAMES.find(metric => metric === normalized);
}

/** Integer seed; 0 is a valid seed, anything non-integer is ignored. */
export function parseSeed(value: string | undefined): number | undefined {
  if (value === undefined || !value.trim()) return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : undefined;
}

function optionalNumber(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

export const EVAL_CONFIG = {
  /** Number of golden question/answer pairs */
  goldenSize: Number(process.env.EVAL_GOLDEN_SIZE) || 12,

  /** Seed for golden dataset sampling */
  seed: parseSeed(process.env.EVAL_SEED) ?? 42,

  /** Max concurrent work items (keep low to avoid rate limits) */
  maxConcurrency: Number(process.env.EVAL_CONCURRENCY) || 2,

  /** Timeout per external call in milliseconds */
  callTimeoutMs: Number(process.env.EVAL_CALL_TIMEOUT_MS) || 60000,

  /** Metric that orders the ranking */
  priorityMetric: parseMetricName(process.env.EVAL_PRIORITY_METRIC) ?? "answer_relevancy",

  /** Stop starting new work once this much has been spent (USD); unset means no ceiling */
  budgetUsd: optionalNumber(process.env.EVAL_BUDGET_USD),

  /** Runs per (strategy, question) pair */
  repeats: Number(process.env.EVAL_REPEATS) || 1,

  /** Feedback records used as reference context per golden example */
  recordsPerExample: 2,
} as const;
