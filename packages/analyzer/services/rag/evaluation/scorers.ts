// Metric Scorers - LLM-as-judge quality metrics for one (question, answer, passages) triple
//
// Each scorer makes one judge call (answer relevancy also embeds) and returns a value
// in [0, 1]. Empty retrieval scores 0 on every metric without calling the judge.
// Any judge failure, including malformed output, is a ScoringError.
import { ScoringError, errorMessage } from "../errors";
import type { ChatModel, EmbeddingModel } from "../providers";
import type { Passage } from "../types";
import { cosineSimilarity } from "../vectorIndex";
import { parseJudgeOutput } from "./judgeJson";
import { type GoldenExample, METRIC_NAMES, type MetricName, type MetricValues } from "./types";
import { z } from "zod";

export type ScoringInput = {
  question: string;
  answer: string;
  passages: Passage[];
  reference: Pick<GoldenExample, "referenceAnswer" | "referenceContext">;
};

export type ScorerDeps = {
  judge: ChatModel;
  embedder: EmbeddingModel;
};

export type RunScores = {
  values: MetricValues;
  errors: Partial<Record<MetricName, string>>;
};

const FaithfulnessSchema = z.object({
  statements: z.array(z.object({ statement: z.string(), supported: z.boolean() })),
});

const RelevancySchema = z.object({
  questions: z.array(z.string()),
  noncommittal: z.boolean(),
});

const PrecisionSchema = z.object({
  verdicts: z.array(z.boolean()),
});

const RecallSchema = z.object({
  claims: z.array(z.object({ claim: z.string(), attributed: z.boolean() })),
});

export function clampScore(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Average precision of a ranked relevance list: Σₖ precision@k · vₖ / relevant.
 */
export function averagePrecision(verdicts: boolean[]): number {
  let relevant = 0;
  let sum = 0;
  verdicts.forEach((isRelevant, i) => {
    if (!isRelevant) return;
    relevant++;
    sum += relevant / (i + 1);
  });
  return relevant === 0 ? 0 : sum / relevant;
}

function numbered(passages: Passage[]): string {
  return passages.map((passage, i) => `[${i + 1}] ${passage.text}`).join("\n\n");
}

async function askJudge<T extends z.ZodTypeAny>(
  metric: MetricName,
  judge: ChatModel,
  prompt: string,
  schema: T,
): Promise<z.infer<T>> {
  try {
    const completion = await judge.complete(prompt);
    return parseJudgeOutput(schema, completion.text);
  } catch (error) {
    throw new ScoringError(`${metric} judge failed: ${errorMessage(error)}`, { cause: error });
  }
}

export async function scoreFaithfulness(input: ScoringInput, deps: ScorerDeps): Promise<number> {
  if (input.passages.length === 0) return 0;

  const prompt = `Split the ANSWER into short atomic statements. For each statement decide whether it is supported by the CONTEXT.

CONTEXT:
${numbered(input.passages)}

QUESTION: ${input.question}

ANSWER: ${input.answer}

Respond with JSON only: {"statements": [{"statement": "...", "supported": true}]}`;

  const { statements } = await askJudge("faithfulness", deps.judge, prompt, FaithfulnessSchema);
  if (statements.length === 0) return 0;
  return clampScore(statements.filter(s => s.supported).length / statements.length);
}

export async function scoreAnswerRelevancy(input: ScoringInput, deps: ScorerDeps): Promise<number> {
  if (input.passages.length === 0) return 0;

  const prompt = `Write 3 questions that the ANSWER below would be a good answer to. Also decide whether the answer is noncommittal (evasive, vague or "I don't know").

ANSWER: ${input.answer}

Respond with JSON only: {"questions": ["...", "...", "..."], "noncommittal": false}`;

  const { questions, noncommittal } = await askJudge("answer_relevancy", deps.judge, prompt, RelevancySchema);
  const generated = questions.map(q => q.trim()).filter(q => q.length > 0);
  if (noncommittal || generated.length === 0) return 0;

  let vectors: number[][];
  try {
    ({ vectors } = await deps.embedder.embed([input.question, ...generated]));
  } catch (error) {
    throw new ScoringError(`answer_relevancy embedding failed: ${errorMessage(error)}`, { cause: error });
  }
  if (vectors.length !== generated.length + 1) {
    throw new ScoringError(`answer_relevancy expected ${generated.length + 1} embeddings, got ${vectors.length}`);
  }

  const [questionVector, ...generatedVectors] = vectors;
  const total = generatedVectors.reduce((sum, vector) => sum + cosineSimilarity(questionVector, vector), 0);
  return clampScore(total / generatedVectors.length);
}

export async function scoreContextPrecision(input: ScoringInput, deps: ScorerDeps): Promise<number> {
  if (input.passages.length === 0) return 0;

  const prompt = `For each numbered CONTEXT passage, decide whether it is useful for arriving at the REFERENCE ANSWER to the QUESTION.

QUESTION: ${input.question}

REFERENCE ANSWER: ${input.reference.referenceAnswer}

CONTEXT:
${numbered(input.passages)}

Respond with JSON only, one verdict per passage in order: {"verdicts": [true, false, ...]}`;

  const { verdicts } = await askJudge("context_precision", deps.judge, prompt, PrecisionSchema);
  if (verdicts.length !== input.passages.length) {
    throw new ScoringError(
      `context_precision expected ${input.passages.length} verdicts, got ${verdicts.length}`,
    );
  }
  return clampScore(averagePrecision(verdicts));
}

export async function scoreContextRecall(input: ScoringInput, deps: ScorerDeps): Promise<number> {
  if (input.passages.length === 0) return 0;

  const reference =
    input.reference.referenceContext.length > 0
      ? input.reference.referenceContext.map(passage => passage.text).join("\n")
      : input.reference.referenceAnswer;

  const prompt = `Split the REFERENCE into individual claims. For each claim decide whether it can be attributed to the retrieved CONTEXT.

REFERENCE:
${reference}

CONTEXT:
${numbered(input.passages)}

Respond with JSON only: {"claims": [{"claim": "...", "attributed": true}]}`;

  const { claims } = await askJudge("context_recall", deps.judge, prompt, RecallSchema);
  if (claims.length === 0) return 0;
  return clampScore(claims.filter(c => c.attributed).length / claims.length);
}

const SCORERS: Record<MetricName, (input: ScoringInput, deps: ScorerDeps) => Promise<number>> = {
  context_recall: scoreContextRecall,
  faithfulness: scoreFaithfulness,
  answer_relevancy: scoreAnswerRelevancy,
  context_precision: scoreContextPrecision,
};

/**
 * Run all four scorers. A failing scorer leaves its metric null and records the
 * message; the others still count.
 */
export async function scoreRun(input: ScoringInput, deps: ScorerDeps): Promise<RunScores> {
  const settled = await Promise.allSettled(METRIC_NAMES.map(metric => SCORERS[metric](input, deps)));

  const values: MetricValues = {
    context_recall: null,
    faithfulness: null,
    answer_relevancy: null,
    context_precision: null,
  };
  const errors: RunScores["errors"] = {};

  settled.forEach((outcome, i) => {
    const metric = METRIC_NAMES[i];
    if (outcome.status === "fulfilled") {
      values[metric] = outcome.value;
    } else {
      errors[metric] = errorMessage(outcome.reason);
    }
  });

  return { values, errors };
}
