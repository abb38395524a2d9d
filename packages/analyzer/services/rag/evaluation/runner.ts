// Evaluation Runner - Orchestrates the retrieval strategy comparison
//
// For each (strategy, golden example, repeat) work item, on a bounded pool:
// 1. Retrieve passages with the strategy
// 2. Synthesize an answer from them
// 3. Score the answer with the four judge metrics
// Runs are then aggregated per strategy and ranked.
import type { FeedbackRecord } from "../../corpus/types";
import { errorMessage } from "../errors";
import { type ModelServices, withCallTimeouts } from "../providers";
import { synthesizeAnswer } from "../synthesizer";
import type { Passage, RetrievalStrategy, StrategySlot } from "../types";
import { UsageMeter } from "../usage";
import { assertGoldenTraceable } from "./goldenDataset";
import { mapWithConcurrency } from "./pool";
import { type ScorerDeps, scoreRun } from "./scorers";
import {
  type EvalRunOptions,
  type EvaluationRun,
  type GoldenDataset,
  type GoldenExample,
  METRIC_NAMES,
  type MetricName,
  type MetricValues,
  type ScoredRun,
  type StrategyAggregate,
} from "./types";
import { execSync } from "child_process";

export const BUDGET_EXCEEDED = "budget exceeded";

export type EvaluationInputs = {
  slots: StrategySlot[];
  golden: GoldenDataset;
  /** Corpus the golden examples must trace back to */
  records: readonly FeedbackRecord[];
  services: ModelServices;
  options: EvalRunOptions;
  /** Millisecond clock for latency and run timing */
  now?: () => number;
};

type WorkItem = {
  /** Slot name; runs are reported under it */
  name: string;
  strategy: RetrievalStrategy;
  example: GoldenExample;
  repeat: number;
};

const METRIC_FIELDS = {
  context_recall: "contextRecall",
  faithfulness: "faithfulness",
  answer_relevancy: "answerRelevancy",
  context_precision: "contextPrecision",
} as const satisfies Record<MetricName, keyof ScoredRun>;

export function runMetric(run: ScoredRun, metric: MetricName): number | null {
  return run[METRIC_FIELDS[metric]];
}

function emptyMetrics(): MetricValues {
  return { context_recall: null, faithfulness: null, answer_relevancy: null, context_precision: null };
}

function failedRun(item: WorkItem, error: string, latencySeconds: number, costUsd: number): ScoredRun {
  return {
    strategy: item.name,
    exampleId: item.example.id,
    question: item.example.question,
    repeat: item.repeat,
    answer: "",
    latencySeconds,
    costUsd,
    faithfulness: null,
    answerRelevancy: null,
    contextPrecision: null,
    contextRecall: null,
    retrievedPassageIds: [],
    error,
    scoringErrors: {},
    judgeCostUsd: 0,
  };
}

/**
 * Judge and embedder that price every call on `meter`, so grading counts against
 * the budget without being charged to the strategy.
 */
function meteredScorerDeps(services: ModelServices, meter: UsageMeter): ScorerDeps {
  const { judge, embedder } = services;
  return {
    judge: {
      model: judge.model,
      complete: async prompt => {
        const completion = await judge.complete(prompt);
        meter.recordCompletion(judge.model, completion);
        return completion;
      },
    },
    embedder: {
      model: embedder.model,
      embed: async texts => {
        const batch = await embedder.embed(texts);
        meter.recordEmbedding(embedder.model, batch);
        return batch;
      },
    },
  };
}

/**
 * Evaluate a single work item through all pipeline stages. Never throws: pipeline
 * failures become a failed run, scoring failures null out single metrics.
 */
async function evaluateWorkItem(item: WorkItem, services: ModelServices, now: () => number): Promise<ScoredRun> {
  const { strategy, example } = item;
  const meter = new UsageMeter();
  const start = now();

  let passages: Passage[];
  let answer: string;
  try {
    passages = await strategy.retrieve(example.question, { meter });
    ({ answer } = await synthesizeAnswer(example.question, passages, services.chat, meter));
  } catch (error) {
    return failedRun(item, errorMessage(error), (now() - start) / 1000, meter.totalUsd);
  }
  const latencySeconds = (now() - start) / 1000;

  const judgeMeter = new UsageMeter();
  const scores = await scoreRun(
    { question: example.question, answer, passages, reference: example },
    meteredScorerDeps(services, judgeMeter),
  );

  return {
    strategy: item.name,
    exampleId: example.id,
    question: example.question,
    repeat: item.repeat,
    answer,
    latencySeconds,
    costUsd: meter.totalUsd,
    faithfulness: scores.values.faithfulness,
    answerRelevancy: scores.values.answer_relevancy,
    contextPrecision: scores.values.context_precision,
    contextRecall: scores.values.context_recall,
    retrievedPassageIds: passages.map(passage => passage.id),
    scoringErrors: scores.errors,
    judgeCostUsd: judgeMeter.totalUsd,
  };
}

export function isSuccessfulRun(run: ScoredRun): boolean {
  return !run.error && Object.keys(run.scoringErrors).length === 0;
}

function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Sample standard deviation (n - 1); null below two values. */
export function sampleStdDev(values: number[]): number | null {
  if (values.length < 2) return null;
  const avg = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance = values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/**
 * Sort runs by strategy slot order, then example order, then repeat.
 */
export function sortRuns(runs: ScoredRun[], strategyOrder: string[], exampleOrder: string[]): ScoredRun[] {
  const strategyRank = new Map(strategyOrder.map((name, i) => [name, i]));
  const exampleRank = new Map(exampleOrder.map((id, i) => [id, i]));
  const rankOf = (map: Map<string, number>, key: string) => map.get(key) ?? Number.MAX_SAFE_INTEGER;

  return [...runs].sort(
    (a, b) =>
      rankOf(strategyRank, a.strategy) - rankOf(strategyRank, b.strategy) ||
      rankOf(exampleRank, a.exampleId) - rankOf(exampleRank, b.exampleId) ||
      a.repeat - b.repeat,
  );
}

/**
 * Per-strategy aggregates, one per slot in slot order. Pure: the same runs always
 * give the same aggregates.
 */
export function aggregateRuns(
  slots: Pick<StrategySlot, "name">[],
  runs: ScoredRun[],
  buildErrors: Map<string, string> = new Map(),
): StrategyAggregate[] {
  return slots.map(slot => {
    const buildError = buildErrors.get(slot.name);
    const strategyRuns = runs.filter(run => run.strategy === slot.name);

    if (buildError !== undefined) {
      return {
        strategy: slot.name,
        numQuestions: 0,
        numRuns: 0,
        successCount: 0,
        failureCount: 0,
        failureRate: 1,
        metrics: emptyMetrics(),
        spread: emptyMetrics(),
        avgLatencySeconds: null,
        totalCostUsd: 0,
        avgCostUsd: null,
        error: buildError,
      };
    }

    const successful = strategyRuns.filter(isSuccessfulRun);
    const completed = strategyRuns.filter(run => !run.error);
    const metrics = emptyMetrics();
    const spread = emptyMetrics();

    for (const metric of METRIC_NAMES) {
      const values = successful
        .map(run => runMetric(run, metric))
        .filter((value): value is number => value !== null);
      metrics[metric] = mean(values);
      spread[metric] = sampleStdDev(values);
    }

    const numRuns = strategyRuns.length;
    const failureCount = numRuns - successful.length;
    const totalCostUsd = strategyRuns.reduce((sum, run) => sum + run.costUsd, 0);

    return {
      strategy: slot.name,
      numQuestions: new Set(strategyRuns.map(run => run.exampleId)).size,
      numRuns,
      successCount: successful.length,
      failureCount,
      failureRate: numRuns > 0 ? failureCount / numRuns : 0,
      metrics,
      spread,
      avgLatencySeconds: mean(completed.map(run => run.latencySeconds)),
      totalCostUsd,
      avgCostUsd: numRuns > 0 ? totalCostUsd / numRuns : null,
    };
  });
}

function compareNullableAsc(a: number | null, b: number | null): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a - b;
}

/**
 * Strategy names best first: priority metric descending, then lower average
 * latency, then lower total cost. A null priority metric ranks last; remaining ties
 * keep input order.
 */
export function rankAggregates(aggregates: StrategyAggregate[], priorityMetric: MetricName): string[] {
  return aggregates
    .map((aggregate, index) => ({ aggregate, index }))
    .sort((a, b) => {
      const pa = a.aggregate.metrics[priorityMetric];
      const pb = b.aggregate.metrics[priorityMetric];
      if (pa === null || pb === null) {
        if (pa !== pb) return pa === null ? 1 : -1;
      } else if (pa !== pb) {
        return pb - pa;
      }
      return (
        compareNullableAsc(a.aggregate.avgLatencySeconds, b.aggregate.avgLatencySeconds) ||
        a.aggregate.totalCostUsd - b.aggregate.totalCostUsd ||
        a.index - b.index
      );
    })
    .map(({ aggregate }) => aggregate.strategy);
}

function getGitCommit(): string | undefined {
  try {
    return execSync("git rev-parse --short HEAD", { encoding: "utf-8", stdio: ["ignore", "pipe", "ignore"] }).trim();
  } catch {
    // Not in a git repo or git not available
    return undefined;
  }
}

/**
 * Run the full strategy comparison.
 */
export async function runEvaluation(inputs: EvaluationInputs): Promise<EvaluationRun> {
  const { slots, golden, records, options } = inputs;
  const now = inputs.now ?? Date.now;
  const startTime = now();

  assertGoldenTraceable(golden.examples, records);

  const services = withCallTimeouts(inputs.services, options.timeoutMs);
  const buildErrors = new Map<string, string>();
  const items: WorkItem[] = [];

  for (const slot of slots) {
    if (slot.status === "unavailable") {
      buildErrors.set(slot.name, slot.error);
      continue;
    }
    for (const example of golden.examples) {
      for (let repeat = 0; repeat < Math.max(1, options.repeats); repeat++) {
        items.push({ name: slot.name, strategy: slot.strategy, example, repeat });
      }
    }
  }

  console.log(
    `\nRunning ${items.length} work items (${slots.length} strategies × ${golden.examples.length} questions × ${Math.max(1, options.repeats)} repeats)...`,
  );
  console.log(`  Concurrency: ${options.concurrency} | Call timeout: ${options.timeoutMs}ms`);
  if (options.budgetUsd !== undefined) console.log(`  Budget: $${options.budgetUsd.toFixed(2)}`);
  for (const [name, error] of buildErrors) {
    console.log(`  Skipping ${name}: ${error}`);
  }
  console.log("");

  let spentUsd = 0;
  let budgetExceeded = false;
  let done = 0;

  const runs = await mapWithConcurrency(items, options.concurrency, async item => {
    let run: ScoredRun;
    if (options.budgetUsd !== undefined && spentUsd >= options.budgetUsd) {
      budgetExceeded = true;
      run = failedRun(item, BUDGET_EXCEEDED, 0, 0);
    } else {
      run = await evaluateWorkItem(item, services, now);
      spentUsd += run.costUsd + run.judgeCostUsd;
    }

    done++;
    const status = run.error
      ? `ERROR: ${run.error}`
      : Object.keys(run.scoringErrors).length > 0
        ? `PARTIAL (${Object.keys(run.scoringErrors).join(", ")} failed)`
        : `OK (${run.latencySeconds.toFixed(2)}s)`;
    console.log(`[${done}/${items.length}] ${run.strategy} ${run.exampleId}: ${run.question.slice(0, 60)}... ${status}`);
    return run;
  });

  const sorted = sortRuns(
    runs,
    slots.map(slot => slot.name),
    golden.examples.map(example => example.id),
  );
  const aggregates = aggregateRuns(slots, sorted, buildErrors);

  if (budgetExceeded) {
    console.warn(`⚠️  Budget of $${options.budgetUsd?.toFixed(2)} reached; remaining work items were not run`);
  }

  return {
    runs: sorted,
    aggregates,
    ranking: rankAggregates(aggregates, options.priorityMetric),
    corpusFingerprint: golden.corpusFingerprint,
    goldenSize: golden.examples.length,
    startedAt: new Date(startTime).toISOString(),
    durationMs: now() - startTime,
    options,
    budgetExceeded,
    spentUsd,
    gitCommit: getGitCommit(),
  };
}
