// Golden Dataset Generator - seeded question/answer pairs drawn from the corpus
//
// Sampling is deterministic for a fixed (corpus, seed, size): records are shuffled with
// a seeded PRNG and sample i uses the i-th shuffled record plus its successors as
// reference context. One chat call per sample writes the question and reference answer.
import { computeCorpusFingerprint } from "../../corpus/loader";
import type { FeedbackRecord } from "../../corpus/types";
import { GenerationError, errorMessage } from "../errors";
import { recordPassage } from "../indexing";
import type { ChatModel } from "../providers";
import { EVAL_CONFIG } from "./config";
import { parseJudgeOutput } from "./judgeJson";
import type { GoldenDataset, GoldenExample, GoldenGenerationOptions } from "./types";
import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { z } from "zod";

const GoldenPairSchema = z.object({
  question: z.string().trim().min(1),
  answer: z.string().trim().min(1),
});

const PassageSchema = z.object({
  id: z.string(),
  text: z.string(),
  recordIds: z.array(z.string()),
  parentId: z.string().optional(),
  score: z.number().optional(),
});

const GoldenDatasetSchema = z.object({
  seed: z.number(),
  corpusFingerprint: z.string(),
  requestedSize: z.number().int().nonnegative(),
  examples: z.array(
    z.object({
      id: z.string(),
      question: z.string(),
      referenceAnswer: z.string(),
      referenceContext: z.array(PassageSchema),
    }),
  ),
  shortfall: z.number().int().nonnegative(),
});

/** mulberry32: small seeded PRNG returning floats in [0, 1). */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Fisher-Yates over a copy. */
export function seededShuffle<T>(items: readonly T[], seed: number): T[] {
  const random = mulberry32(seed);
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

function buildGoldenPrompt(records: FeedbackRecord[]): string {
  const context = records
    .map((record, i) => `[${i + 1}] (${record.source}, ${record.date}, ${record.sentiment}) ${record.text}`)
    .join("\n");

  return `You are building a test set for a question-answering system over customer feedback.

Read the feedback entries below and write ONE question a product manager might ask that these entries answer, together with the correct answer based only on the entries.

Feedback:
${context}

Respond with JSON only: {"question": "...", "answer": "..."}`;
}

function formatExampleId(n: number): string {
  return `golden-${String(n).padStart(3, "0")}`;
}

/**
 * Generate a golden dataset. Invalid samples (bad JSON, blank fields, repeated
 * questions, failed calls) are skipped; up to `size * maxAttemptsFactor` samples are tried.
 * Throws GenerationError only when the corpus is empty or nothing valid was produced.
 */
export async function generateGoldenDataset(
  records: readonly FeedbackRecord[],
  chat: ChatModel,
  options: GoldenGenerationOptions,
): Promise<GoldenDataset> {
  if (records.length === 0) {
    throw new GenerationError("Cannot generate golden examples from an empty corpus");
  }

  const size = Math.max(0, Math.floor(options.size));
  const corpusFingerprint = computeCorpusFingerprint(records);
  const shuffled = seededShuffle(records, options.seed);
  const perExample = Math.min(options.recordsPerExample ?? EVAL_CONFIG.recordsPerExample, shuffled.length);
  const maxAttempts = size * (options.maxAttemptsFactor ?? 3);

  const examples: GoldenExample[] = [];
  const seenQuestions = new Set<string>();

  for (let attempt = 0; attempt < maxAttempts && examples.length < size; attempt++) {
    const sample: FeedbackRecord[] = [];
    for (let j = 0; j < perExample; j++) {
      sample.push(shuffled[(attempt + j) % shuffled.length]);
    }

    let pair: z.infer<typeof GoldenPairSchema>;
    try {
      const completion = await chat.complete(buildGoldenPrompt(sample));
      pair = parseJudgeOutput(GoldenPairSchema, completion.text);
    } catch (error) {
      console.warn(`  Sample ${attempt + 1} skipped: ${errorMessage(error)}`);
      continue;
    }

    const key = pair.question.toLowerCase();
    if (seenQuestions.has(key)) {
      console.warn(`  Sample ${attempt + 1} skipped: duplicate question`);
      continue;
    }
    seenQuestions.add(key);

    examples.push({
      id: formatExampleId(examples.length + 1),
      question: pair.question,
      referenceAnswer: pair.answer,
      referenceContext: sample.map(recordPassage),
    });
  }

  if (size > 0 && examples.length === 0) {
    throw new GenerationError(`No valid golden examples produced after ${maxAttempts} attempts`);
  }

  const shortfall = size - examples.length;
  if (shortfall > 0) {
    console.warn(`⚠️  Golden dataset shortfall: produced ${examples.length} of ${size} requested examples`);
  }

  return { seed: options.seed, corpusFingerprint, requestedSize: size, examples, shortfall };
}

/**
 * Abort when a golden example cites records that are not in the corpus.
 */
export function assertGoldenTraceable(examples: GoldenExample[], records: readonly FeedbackRecord[]): void {
  const ids = new Set(records.map(record => record.id));
  const broken = examples.filter(example =>
    example.referenceContext.some(passage => passage.recordIds.some(id => !ids.has(id))),
  );

  if (broken.length > 0) {
    throw new GenerationError(
      `Golden examples reference records missing from the corpus: ${broken.map(e => e.id).join(", ")}`,
    );
  }
}

export async function saveGoldenDataset(dataset: GoldenDataset, outputPath: string): Promise<void> {
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, JSON.stringify(dataset, null, 2), "utf-8");
  console.log(`Golden dataset saved to: ${outputPath}`);
}

/**
 * Load a cached dataset. Returns null when there is no usable cache: the file is
 * missing or malformed, or was generated from another corpus, seed or size.
 */
export async function loadGoldenDataset(
  inputPath: string,
  expected: { corpusFingerprint: string; seed: number; size: number },
): Promise<GoldenDataset | null> {
  let raw: string;
  try {
    raw = await readFile(inputPath, "utf-8");
  } catch (error) {
    console.log(`No cached golden dataset at ${inputPath} (${errorMessage(error)})`);
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    console.warn(`Ignoring cached golden dataset: ${errorMessage(error)}`);
    return null;
  }

  const validation = GoldenDatasetSchema.safeParse(parsed);
  if (!validation.success) {
    console.warn(`Ignoring cached golden dataset: ${validation.error.issues[0].message}`);
    return null;
  }

  const dataset = validation.data;
  if (
    dataset.corpusFingerprint !== expected.corpusFingerprint ||
    dataset.seed !== expected.seed ||
    dataset.requestedSize !== expected.size
  ) {
    console.warn("Ignoring cached golden dataset: generated from a different corpus, seed or size");
    return null;
  }

  return dataset;
}

/**
 * Reuse the cached dataset when it matches the corpus, seed and size; otherwise
 * generate a new one and cache it.
 */
export async function obtainGoldenDataset(
  records: readonly FeedbackRecord[],
  chat: ChatModel,
  options: GoldenGenerationOptions & { cachePath: string; regenerate?: boolean },
): Promise<GoldenDataset> {
  if (!options.regenerate) {
    const cached = await loadGoldenDataset(options.cachePath, {
      corpusFingerprint: computeCorpusFingerprint(records),
      seed: options.seed,
      size: options.size,
    });
    if (cached) {
      console.log(`Using cached golden dataset (${cached.examples.length} examples): ${options.cachePath}`);
      return cached;
    }
  }

  console.log(`Generating ${options.size} golden examples (seed ${options.seed})...`);
  const dataset = await generateGoldenDataset(records, chat, options);
  await saveGoldenDataset(dataset, options.cachePath);
  return dataset;
}
