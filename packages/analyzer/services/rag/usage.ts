// Usage Meter - prices the external calls made for one work item
import { MODEL_PRICING, type ModelPrice, RERANK_COST_PER_SEARCH } from "./config";
import type { Completion, EmbeddingBatch } from "./providers";

export class UsageMeter {
  private costUsd = 0;
  private calls = 0;

  constructor(
    private readonly pricing: Record<string, ModelPrice> = MODEL_PRICING,
    private readonly rerankCostPerSearch: number = RERANK_COST_PER_SEARCH,
  ) {}

  recordCompletion(model: string, completion: Completion): void {
    const price = this.pricing[model];
    this.calls++;
    if (!price) return;
    this.costUsd += (completion.inputTokens * price.input + completion.outputTokens * price.output) / 1_000_000;
  }

  recordEmbedding(model: string, batch: EmbeddingBatch): void {
    const price = this.pricing[model];
    this.calls++;
    if (!price) return;
    this.costUsd += (batch.tokens * price.input) / 1_000_000;
  }

  recordRerank(): void {
    this.calls++;
    this.costUsd += this.rerankCostPerSearch;
  }

  get totalUsd(): number {
    return this.costUsd;
  }

  get callCount(): number {
    return this.calls;
  }
}
