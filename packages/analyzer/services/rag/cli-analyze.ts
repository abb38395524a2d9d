/**
 * CLI script for asking the feedback analyzer one question.
 *
 * Usage:
 *   npm run rag:analyze -- "What do users say about the export feature?"
 *   npm run rag:analyze -- --strategy ensemble "Top complaints this month?"
 *   npm run rag:analyze -- --info             # Dataset info only
 */
import "./loadEnv";
import { getDatasetInfo, loadFeedbackCorpus } from "../corpus/loader";
import { createWebSearchClient } from "../web/tavily";
import { createFeedbackAnalyzer } from "./analyzer";
import { RAG_CONFIG, validateRagConfig } from "./config";
import { resolveCorpusPath } from "./paths";
import { createOpenAIServices, withCallTimeouts } from "./providers";
import { StrategyFactory, isStrategyName } from "./strategies";
import { cleanupEncoders } from "./tokens";

async function main() {
  const args = process.argv.slice(2);
  const csvPath = resolveCorpusPath(RAG_CONFIG.csvPath);

  let strategyName = "naive";
  let infoOnly = false;
  const words: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--strategy") strategyName = args[++i] ?? strategyName;
    else if (args[i] === "--info") infoOnly = true;
    else words.push(args[i]);
  }

  if (infoOnly) {
    console.log(JSON.stringify(await getDatasetInfo(csvPath), null, 2));
    return;
  }

  const configValidation = validateRagConfig();
  if (!configValidation.valid) {
    console.error(`Configuration errors: ${configValidation.errors.join(", ")}`);
    process.exit(1);
  }
  if (!isStrategyName(strategyName)) {
    console.error(`Unknown retrieval strategy: ${strategyName}`);
    process.exit(1);
  }

  try {
    const { records } = await loadFeedbackCorpus(csvPath);
    const services = withCallTimeouts(createOpenAIServices(), RAG_CONFIG.timeoutMs);
    const strategy = await new StrategyFactory({ records, services }).build(strategyName);

    const analyzer = createFeedbackAnalyzer({
      records,
      strategy,
      chat: services.chat,
      webSearch: createWebSearchClient(),
      csvPath,
    });

    const output = await analyzer.analyze(words.join(" "));

    console.log("");
    console.log("=".repeat(60));
    console.log(`Tool: ${output.tool}`);
    console.log("=".repeat(60));
    console.log(output.answer);

    if (output.sources && output.sources.length > 0) {
      console.log("");
      console.log("Sources:");
      for (const source of output.sources) {
        if (source.kind === "web") {
          console.log(`  - ${source.title || source.url} (${source.url})`);
        } else {
          console.log(`  - [${source.recordIds.join(", ")}] ${source.source ?? ""} ${source.date ?? ""}`.trimEnd());
        }
      }
    }
  } catch (error) {
    console.error("Fatal error:", error);
    process.exitCode = 1;
  } finally {
    cleanupEncoders();
  }
}

main().catch(error => {
  console.error("Unexpected error:", error);
  process.exit(1);
});
