/**
 * CLI script for generating and caching a golden dataset.
 *
 * Usage:
 *   npm run rag:golden                      # Size and seed from env
 *   npm run rag:golden -- --size 20 --seed 7
 *   npm run rag:golden -- --force           # Regenerate even when a matching cache exists
 */
import "./loadEnv";
import { loadFeedbackCorpus } from "../corpus/loader";
import { RAG_CONFIG, validateRagConfig } from "./config";
import { EVAL_CONFIG, obtainGoldenDataset, parseSeed } from "./evaluation";
import { goldenCachePath, resolveCorpusPath } from "./paths";
import { createOpenAIServices, withCallTimeouts } from "./providers";
import { cleanupEncoders } from "./tokens";

async function main() {
  const args = process.argv.slice(2);
  const sizeIdx = args.indexOf("--size");
  const seedIdx = args.indexOf("--seed");
  const size = (sizeIdx !== -1 && Number(args[sizeIdx + 1])) || EVAL_CONFIG.goldenSize;
  const seed = (seedIdx !== -1 ? parseSeed(args[seedIdx + 1]) : undefined) ?? EVAL_CONFIG.seed;
  const force = args.includes("--force");

  console.log("=".repeat(50));
  console.log("Golden Dataset CLI");
  console.log("=".repeat(50));
  console.log("");

  const configValidation = validateRagConfig();
  if (!configValidation.valid) {
    console.error(`Configuration errors: ${configValidation.errors.join(", ")}`);
    process.exit(1);
  }

  try {
    const { records } = await loadFeedbackCorpus(resolveCorpusPath(RAG_CONFIG.csvPath));
    const services = withCallTimeouts(createOpenAIServices(), EVAL_CONFIG.callTimeoutMs);

    const dataset = await obtainGoldenDataset(records, services.judge, {
      size,
      seed,
      cachePath: goldenCachePath(seed, size),
      regenerate: force,
    });

    console.log("");
    console.log("=".repeat(50));
    console.log(`✅ ${dataset.examples.length} golden examples ready`);
    if (dataset.shortfall > 0) {
      console.log(`  ⚠️  ${dataset.shortfall} fewer than requested`);
    }
    for (const example of dataset.examples) {
      console.log(`  - ${example.id}: ${example.question}`);
    }
  } catch (error) {
    console.error("Fatal error during golden dataset generation:", error);
    process.exitCode = 1;
  } finally {
    cleanupEncoders();
  }
}

main().catch(error => {
  console.error("Unexpected error:", error);
  process.exit(1);
});
