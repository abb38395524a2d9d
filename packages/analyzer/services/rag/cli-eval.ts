/**
 * CLI script for comparing retrieval strategies.
 *
 * Reports are always saved to evaluation-reports/ directory (Markdown + JSON).
 *
 * Usage:
 *   npm run rag:eval                                  # All strategies, settings from env
 *   npm run rag:eval -- --strategies naive,bm25       # Subset of strategies
 *   npm run rag:eval -- --size 20 --seed 7            # Golden dataset size and seed
 *   npm run rag:eval -- --regenerate                  # Ignore the cached golden dataset
 *   npm run rag:eval -- --repeats 3                   # Repeat every question to surface variance
 *   npm run rag:eval -- --budget 0.50                 # Stop after $0.50 (pipeline and judge calls)
 *   npm run rag:eval -- --priority faithfulness       # Metric that orders the ranking
 *   npm run rag:eval -- --output baseline             # Save as evaluation-reports/baseline.{md,json}
 */
import "./loadEnv";
import { loadFeedbackCorpus } from "../corpus/loader";
import { RAG_CONFIG, validateRagConfig } from "./config";
import {
  EVAL_CONFIG,
  buildComparisonReport,
  obtainGoldenDataset,
  parseMetricName,
  parseSeed,
  printReport,
  runEvaluation,
  saveReport,
} from "./evaluation";
import type { EvalRunOptions, ReportMeta } from "./evaluation";
import { goldenCachePath, REPORTS_DIR, resolveCorpusPath } from "./paths";
import { createOpenAIServices, withCallTimeouts } from "./providers";
import { StrategyFactory } from "./strategies";
import { cleanupEncoders } from "./tokens";
import { STRATEGY_NAMES } from "./types";

type CliOptions = EvalRunOptions & {
  strategies: string[];
  size: number;
  seed: number;
  regenerate: boolean;
  outputName: string;
};

function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    strategies: [...STRATEGY_NAMES],
    size: EVAL_CONFIG.goldenSize,
    seed: EVAL_CONFIG.seed,
    regenerate: false,
    outputName: `eval-${new Date().toISOString().replace(/[:.]/g, "-")}`,
    topK: RAG_CONFIG.defaultTopK,
    concurrency: EVAL_CONFIG.maxConcurrency,
    timeoutMs: EVAL_CONFIG.callTimeoutMs,
    budgetUsd: EVAL_CONFIG.budgetUsd,
    priorityMetric: EVAL_CONFIG.priorityMetric,
    repeats: EVAL_CONFIG.repeats,
  };

  for (let i = 0; i < argv.length; i++) {
    switch (argv[i]) {
      case "--strategies":
        options.strategies = (argv[++i] ?? "")
          .split(",")
          .map(s => s.trim())
          .filter(Boolean);
        break;
      case "--size":
        options.size = Number(argv[++i]) || options.size;
        break;
      case "--seed":
        options.seed = parseSeed(argv[++i]) ?? options.seed;
        break;
      case "--regenerate":
        options.regenerate = true;
        break;
      case "--top-k":
        options.topK = Math.min(Number(argv[++i]) || options.topK, RAG_CONFIG.maxTopK);
        break;
      case "--concurrency":
        options.concurrency = Number(argv[++i]) || options.concurrency;
        break;
      case "--timeout-ms":
        options.timeoutMs = Number(argv[++i]) || options.timeoutMs;
        break;
      case "--budget":
        options.budgetUsd = Number(argv[++i]) || undefined;
        break;
      case "--priority": {
        const value = argv[++i];
        const metric = parseMetricName(value);
        if (!metric) {
          console.warn(`Unknown metric "${value}", keeping ${options.priorityMetric}`);
        } else {
          options.priorityMetric = metric;
        }
        break;
      }
      case "--repeats":
        options.repeats = Number(argv[++i]) || options.repeats;
        break;
      case "--output":
        options.outputName = (argv[++i] ?? options.outputName).replace(/\.(md|json)$/, "");
        break;
    }
  }

  return options;
}

async function main() {
  const options = parseArgs(process.argv.slice(2));

  console.log("=".repeat(60));
  console.log("  Retrieval Strategy Evaluation");
  console.log("=".repeat(60));

  const configValidation = validateRagConfig();
  if (!configValidation.valid) {
    console.error(`Configuration errors: ${configValidation.errors.join(", ")}`);
    process.exit(1);
  }

  try {
    const { records } = await loadFeedbackCorpus(resolveCorpusPath(RAG_CONFIG.csvPath));

    const baseServices = createOpenAIServices();
    const services = withCallTimeouts(baseServices, options.timeoutMs);

    const golden = await obtainGoldenDataset(records, services.judge, {
      size: options.size,
      seed: options.seed,
      cachePath: goldenCachePath(options.seed, options.size),
      regenerate: options.regenerate,
    });

    console.log(`\nBuilding ${options.strategies.length} retrievers...`);
    const factory = new StrategyFactory({ records, services, topK: options.topK });
    const slots = await factory.buildSlots(options.strategies);

    const run = await runEvaluation({ slots, golden, records, services: baseServices, options });

    const report = buildComparisonReport(run.aggregates, { priorityMetric: options.priorityMetric });
    const meta: ReportMeta = {
      generatedAt: run.startedAt,
      corpusFingerprint: run.corpusFingerprint,
      goldenSize: run.goldenSize,
      repeats: options.repeats,
      topK: options.topK,
      chatModel: baseServices.chat.model,
      embeddingModel: baseServices.embedder.model,
      gitCommit: run.gitCommit,
      budgetExceeded: run.budgetExceeded,
    };

    printReport(report, meta);
    await saveReport(run, report, meta, REPORTS_DIR, options.outputName);

    const failedRuns = run.runs.filter(r => r.error).length;
    if (failedRuns > 0) {
      console.log(`\n⚠️  ${failedRuns} of ${run.runs.length} runs had errors`);
    }
  } catch (error) {
    console.error("Fatal error during evaluation:", error);
    process.exitCode = 1;
  } finally {
    cleanupEncoders();
  }
}

main().catch(error => {
  console.error("Unexpected error:", error);
  process.exit(1);
});
