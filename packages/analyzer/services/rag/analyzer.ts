// Feedback Analyzer - answer a question from the feedback corpus or the web
import { getDatasetInfo } from "../corpus/loader";
import type { DatasetInfo, FeedbackRecord } from "../corpus/types";
import type { WebResult, WebSearchClient } from "../web/tavily";
import { errorMessage } from "./errors";
import type { ChatModel } from "./providers";
import { synthesizeAnswer } from "./synthesizer";
import type { AnalyzeOutput, AnswerSource, Passage, RetrievalStrategy } from "./types";
import { z } from "zod";

export const APOLOGY_ANSWER = "I apologize, but I couldn't generate a response. Please try again.";

const SNIPPET_LENGTH = 200;

export const AnalyzeRequestSchema = z.object({
  query: z.string().trim().min(1, "query must not be empty").max(1000),
});

export type AnalyzeRoute = "feedback" | "web";

export type FeedbackAnalyzerDeps = {
  records: readonly FeedbackRecord[];
  strategy: RetrievalStrategy;
  chat: ChatModel;
  /** Without a client every question is answered from feedback */
  webSearch?: WebSearchClient;
  csvPath: string;
};

export interface FeedbackAnalyzer {
  analyze(query: string): Promise<AnalyzeOutput>;
  datasetInfo(): Promise<DatasetInfo>;
}

function buildRoutingPrompt(query: string): string {
  return `You route questions for a customer feedback analysis assistant.

Answer "feedback" if the question is about what customers said: complaints, feature requests, bugs, sentiment or trends in the feedback database.
Answer "web" if it needs outside information such as competitors, industry news or public documentation.

Reply with exactly one word: feedback or web.

Question: ${query}`;
}

export function parseRoute(text: string): AnalyzeRoute {
  return /\bweb\b/i.test(text) && !/\bfeedback\b/i.test(text) ? "web" : "feedback";
}

function snippet(text: string): string {
  return text.slice(0, SNIPPET_LENGTH) + (text.length > SNIPPET_LENGTH ? "..." : "");
}

function feedbackSources(passages: Passage[], recordsById: Map<string, FeedbackRecord>): AnswerSource[] {
  return passages.map((passage): AnswerSource => {
    const record = recordsById.get(passage.recordIds[0] ?? "");
    return {
      kind: "feedback",
      recordIds: [...passage.recordIds],
      source: record?.source,
      date: record?.date,
      snippet: snippet(passage.text),
    };
  });
}

function webPassages(results: WebResult[]): Passage[] {
  return results.map(result => ({
    id: result.url,
    text: result.title ? `${result.title}\n${result.content}` : result.content,
    recordIds: [],
  }));
}

export function createFeedbackAnalyzer(deps: FeedbackAnalyzerDeps): FeedbackAnalyzer {
  const recordsById = new Map(deps.records.map(record => [record.id, record]));

  async function route(query: string): Promise<AnalyzeRoute> {
    if (!deps.webSearch) return "feedback";
    const completion = await deps.chat.complete(buildRoutingPrompt(query));
    return parseRoute(completion.text);
  }

  return {
    /**
     * Throws a ZodError for a blank or oversized query. Provider failures are
     * logged and answered with an apology.
     */
    async analyze(rawQuery) {
      const { query } = AnalyzeRequestSchema.parse({ query: rawQuery });

      try {
        const destination = await route(query);

        if (destination === "web" && deps.webSearch) {
          const results = await deps.webSearch.search(query);
          const { answer } = await synthesizeAnswer(query, webPassages(results), deps.chat, undefined, "web");
          return {
            answer,
            sources: results.map((result): AnswerSource => ({
              kind: "web",
              url: result.url,
              title: result.title,
              snippet: snippet(result.content),
            })),
            tool: "web_search",
          };
        }

        const passages = await deps.strategy.retrieve(query);
        const { answer } = await synthesizeAnswer(query, passages, deps.chat);
        return { answer, sources: feedbackSources(passages, recordsById), tool: "feedback_search" };
      } catch (error) {
        console.error("Error during analysis:", errorMessage(error));
        return { answer: APOLOGY_ANSWER, tool: "none" };
      }
    },

    datasetInfo() {
      return getDatasetInfo(deps.csvPath);
    },
  };
}
