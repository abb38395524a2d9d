// Report Formatting - comparison table, Markdown artifact, console output and JSON export
import { rankAggregates } from "./runner";
import { METRIC_NAMES, type EvaluationRun, type MetricName, type StrategyAggregate } from "./types";
import { mkdir, writeFile } from "fs/promises";
import { join } from "path";

export const REPORT_COLUMNS = [
  "retriever",
  ...METRIC_NAMES,
  "avg_latency_s",
  "total_cost_usd",
  "num_questions",
  "error",
] as const;

export type ReportColumn = (typeof REPORT_COLUMNS)[number];

export type ReportRow = Record<ReportColumn, string>;

export type RankingEntry = {
  rank: number;
  strategy: string;
  priorityValue: string;
  avgLatencySeconds: string;
  totalCostUsd: string;
};

export type FailureEntry = {
  strategy: string;
  failureRate: string;
  error: string;
};

export type ComparisonReport = {
  columns: readonly ReportColumn[];
  rows: ReportRow[];
  priorityMetric: MetricName;
  ranking: RankingEntry[];
  /** Top of the ranking; null when no strategy has a value for the priority metric */
  recommendation: string | null;
  fastest: string | null;
  cheapest: string | null;
  failures: FailureEntry[];
};

export type ReportMeta = {
  generatedAt: string;
  corpusFingerprint: string;
  goldenSize: number;
  repeats: number;
  topK: number;
  chatModel: string;
  embeddingModel: string;
  gitCommit?: string;
  budgetExceeded?: boolean;
};

export function formatFixed(value: number | null, digits: number): string {
  return value === null ? "n/a" : value.toFixed(digits);
}

/** Error column: filled only when the strategy produced no successful run. */
export function describeError(aggregate: StrategyAggregate): string {
  if (aggregate.error) return aggregate.error;
  if (aggregate.numRuns > 0 && aggregate.successCount === 0) return `All ${aggregate.numRuns} runs failed`;
  return "";
}

function describeFailure(aggregate: StrategyAggregate): string {
  return aggregate.error ?? `${aggregate.failureCount}/${aggregate.numRuns} runs failed`;
}

function pickMin(aggregates: StrategyAggregate[], value: (a: StrategyAggregate) => number | null): string | null {
  let best: { strategy: string; value: number } | null = null;
  for (const aggregate of aggregates) {
    const v = value(aggregate);
    if (v === null) continue;
    if (!best || v < best.value) best = { strategy: aggregate.strategy, value: v };
  }
  return best ? best.strategy : null;
}

/**
 * Build the comparison report. Pure: identical aggregates give identical output.
 */
export function buildComparisonReport(
  aggregates: StrategyAggregate[],
  options: { priorityMetric: MetricName },
): ComparisonReport {
  const { priorityMetric } = options;

  const rows = aggregates.map(aggregate => ({
    retriever: aggregate.strategy,
    context_recall: formatFixed(aggregate.metrics.context_recall, 4),
    faithfulness: formatFixed(aggregate.metrics.faithfulness, 4),
    answer_relevancy: formatFixed(aggregate.metrics.answer_relevancy, 4),
    context_precision: formatFixed(aggregate.metrics.context_precision, 4),
    avg_latency_s: formatFixed(aggregate.avgLatencySeconds, 2),
    total_cost_usd: formatFixed(aggregate.totalCostUsd, 4),
    num_questions: String(aggregate.numQuestions),
    error: describeError(aggregate),
  }));

  const byName = new Map(aggregates.map(aggregate => [aggregate.strategy, aggregate]));
  const ranking: RankingEntry[] = [];
  rankAggregates(aggregates, priorityMetric).forEach((strategy, i) => {
    const aggregate = byName.get(strategy);
    if (!aggregate) return;
    ranking.push({
      rank: i + 1,
      strategy,
      priorityValue: formatFixed(aggregate.metrics[priorityMetric], 4),
      avgLatencySeconds: formatFixed(aggregate.avgLatencySeconds, 2),
      totalCostUsd: formatFixed(aggregate.totalCostUsd, 4),
    });
  });

  const top = ranking.length > 0 ? byName.get(ranking[0].strategy) : undefined;
  const withRuns = aggregates.filter(aggregate => aggregate.numRuns > 0);

  return {
    columns: REPORT_COLUMNS,
    rows,
    priorityMetric,
    ranking,
    recommendation: top && top.metrics[priorityMetric] !== null ? top.strategy : null,
    fastest: pickMin(withRuns, aggregate => aggregate.avgLatencySeconds),
    cheapest: pickMin(withRuns, aggregate => aggregate.totalCostUsd),
    failures: aggregates
      .filter(aggregate => aggregate.error || aggregate.failureCount > 0)
      .map(aggregate => ({
        strategy: aggregate.strategy,
        failureRate: formatFixed(aggregate.failureRate, 2),
        error: describeFailure(aggregate),
      })),
  };
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

function markdownTable(headers: readonly string[], rows: string[][]): string[] {
  return [
    `| ${headers.join(" | ")} |`,
    `| ${headers.map(() => "---").join(" | ")} |`,
    ...rows.map(row => `| ${row.map(escapeCell).join(" | ")} |`),
  ];
}

/**
 * Render the persisted Markdown report.
 */
export function renderMarkdownReport(report: ComparisonReport, meta: ReportMeta): string {
  const lines: string[] = ["# Retrieval Strategy Evaluation", "", "## Results", ""];

  lines.push(
    ...markdownTable(
      report.columns,
      report.rows.map(row => report.columns.map(column => row[column])),
    ),
  );

  lines.push("", "## Ranking", "");
  lines.push(
    ...markdownTable(
      ["rank", "retriever", report.priorityMetric, "avg_latency_s", "total_cost_usd"],
      report.ranking.map(entry => [
        String(entry.rank),
        entry.strategy,
        entry.priorityValue,
        entry.avgLatencySeconds,
        entry.totalCostUsd,
      ]),
    ),
  );

  lines.push("", "## Highlights", "");
  lines.push(
    report.recommendation
      ? `- Recommended: **${report.recommendation}** (highest ${report.priorityMetric})`
      : "- Recommended: none (no strategy produced a successful run)",
  );
  lines.push(`- Fastest: ${report.fastest ?? "n/a"}`);
  lines.push(`- Cheapest: ${report.cheapest ?? "n/a"}`);

  lines.push("", "## Failures", "");
  if (report.failures.length === 0) {
    lines.push("None.");
  } else {
    lines.push(
      ...markdownTable(
        ["retriever", "failure_rate", "error"],
        report.failures.map(failure => [failure.strategy, failure.failureRate, failure.error]),
      ),
    );
  }

  lines.push("", "## Run metadata", "");
  lines.push(`- Generated: ${meta.generatedAt}`);
  if (meta.gitCommit) lines.push(`- Git commit: ${meta.gitCommit}`);
  lines.push(`- Corpus fingerprint: ${meta.corpusFingerprint}`);
  lines.push(`- Golden questions: ${meta.goldenSize}`);
  lines.push(`- Repeats: ${meta.repeats}`);
  lines.push(`- Top-K: ${meta.topK}`);
  lines.push(`- Chat model: ${meta.chatModel}`);
  lines.push(`- Embedding model: ${meta.embeddingModel}`);
  if (meta.budgetExceeded) lines.push("- Budget exceeded: remaining work items were not run");

  return lines.join("\n") + "\n";
}

/**
 * Print the comparison to the console.
 */
export function printReport(report: ComparisonReport, meta: ReportMeta): void {
  console.log("");
  console.log("=".repeat(60));
  console.log("  Retrieval Strategy Evaluation Report");
  console.log("=".repeat(60));
  console.log("");

  console.log(`  Timestamp:    ${meta.generatedAt}`);
  if (meta.gitCommit) console.log(`  Git commit:   ${meta.gitCommit}`);
  console.log(`  Chat model:   ${meta.chatModel}`);
  console.log(`  Embed model:  ${meta.embeddingModel}`);
  console.log(`  Top-K:        ${meta.topK}`);
  console.log(`  Questions:    ${meta.goldenSize} x ${meta.repeats} repeat(s)`);
  console.log(`  Corpus:       ${meta.corpusFingerprint}`);
  console.log("");

  console.log("-".repeat(60));
  console.log("  RESULTS");
  console.log("-".repeat(60));
  for (const row of report.rows) {
    console.log("");
    console.log(`  ${row.retriever}${row.error ? `  [${row.error}]` : ""}`);
    console.log(
      `    recall=${row.context_recall}  faithfulness=${row.faithfulness}  relevancy=${row.answer_relevancy}  precision=${row.context_precision}`,
    );
    console.log(`    latency=${row.avg_latency_s}s  cost=$${row.total_cost_usd}  questions=${row.num_questions}`);
  }

  console.log("");
  console.log("-".repeat(60));
  console.log(`  RANKING (by ${report.priorityMetric})`);
  console.log("-".repeat(60));
  for (const entry of report.ranking) {
    console.log(`  ${entry.rank}. ${entry.strategy.padEnd(16)} ${entry.priorityValue}  ${entry.avgLatencySeconds}s`);
  }

  console.log("");
  if (report.recommendation) {
    console.log(`  Recommended default: ${report.recommendation}`);
  } else {
    console.log("  No strategy produced a successful run");
  }
  if (meta.budgetExceeded) console.log("  ⚠️  Budget exceeded; results are partial");

  console.log("");
  console.log("=".repeat(60));
}

/**
 * Save the Markdown report and a JSON export of the full run.
 */
export async function saveReport(
  run: EvaluationRun,
  report: ComparisonReport,
  meta: ReportMeta,
  outputDir: string,
  baseName: string,
): Promise<{ markdownPath: string; jsonPath: string }> {
  await mkdir(outputDir, { recursive: true });

  const markdownPath = join(outputDir, `${baseName}.md`);
  const jsonPath = join(outputDir, `${baseName}.json`);

  await writeFile(markdownPath, renderMarkdownReport(report, meta), "utf-8");
  await writeFile(jsonPath, JSON.stringify({ meta, report, run }, null, 2), "utf-8");

  console.log(`\nReport saved to: ${markdownPath}`);
  console.log(`Run data saved to: ${jsonPath}`);
  return { markdownPath, jsonPath };
}
