// Web search through the Tavily REST API
import { RAG_CONFIG } from "../rag/config";
import { errorMessage } from "../rag/errors";
import { z } from "zod";

const TAVILY_SEARCH_URL = "https://api.tavily.com/search";
const MAX_RETRIES = 3;
const RETRY_DELAY_MS = 1000;

export type WebResult = {
  title: string;
  url: string;
  content: string;
};

export interface WebSearchClient {
  search(query: string): Promise<WebResult[]>;
}

const TavilyResponseSchema = z.object({
  results: z.array(
    z.object({
      title: z.string().default(""),
      url: z.string(),
      content: z.string().default(""),
    }),
  ),
});

type TavilyClientOptions = {
  maxResults?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  /** Per attempt; the request is aborted when it runs out */
  timeoutMs?: number;
};

/**
 * Sleep for a specified number of milliseconds
 */
export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export class TavilySearchClient implements WebSearchClient {
  private readonly maxResults: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly timeoutMs: number;

  constructor(
    private readonly apiKey: string,
    options: TavilyClientOptions = {},
  ) {
    this.maxResults = options.maxResults ?? RAG_CONFIG.maxWebResults;
    this.maxRetries = options.maxRetries ?? MAX_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? RETRY_DELAY_MS;
    this.timeoutMs = options.timeoutMs ?? RAG_CONFIG.timeoutMs;
  }

  /**
   * Search the web. Retries with exponential backoff.
   */
  async search(query: string): Promise<WebResult[]> {
    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      const signal = AbortSignal.timeout(this.timeoutMs);
      try {
        const response = await fetch(TAVILY_SEARCH_URL, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Authorization: `Bearer ${this.apiKey}`,
          },
          body: JSON.stringify({ query, max_results: this.maxResults, search_depth: "basic" }),
          signal,
        });

        if (!response.ok) {
          throw new Error(`HTTP ${response.status}`);
        }

        const parsed = TavilyResponseSchema.parse(await response.json());
        return parsed.results.slice(0, this.maxResults);
      } catch (error) {
        const isLastAttempt = attempt === this.maxRetries;
        const message = signal.aborted ? `timed out after ${this.timeoutMs}ms` : errorMessage(error);
        console.error(`Web search attempt ${attempt}/${this.maxRetries} failed:`, message);

        if (isLastAttempt) {
          throw new Error(`Web search failed after ${this.maxRetries} attempts: ${message}`, {
            cause: error,
          });
        }

        // Exponential backoff
        const delay = this.retryDelayMs * Math.pow(2, attempt - 1);
        await sleep(delay);
      }
    }

    throw new Error("Unexpected error in web search");
  }
}

export function createWebSearchClient(env: NodeJS.ProcessEnv = process.env): WebSearchClient | undefined {
  return env.TAVILY_API_KEY ? new TavilySearchClient(env.TAVILY_API_KEY) : undefined;
}
