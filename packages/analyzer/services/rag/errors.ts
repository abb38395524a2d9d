// Error taxonomy shared by retrieval, generation, scoring and the evaluation harness

export type AnalyzerErrorCode =
  | "RETRIEVAL_UNAVAILABLE"
  | "GENERATION_ERROR"
  | "SCORING_ERROR"
  | "CONFIGURATION_ERROR"
  | "CALL_TIMEOUT"
  | "CORPUS_LOAD_ERROR";

export class AnalyzerError extends Error {
  readonly code: AnalyzerErrorCode;

  constructor(code: AnalyzerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** An external dependency of a retrieval strategy (embeddings, paraphraser, reranker) failed. */
export class RetrievalUnavailable extends AnalyzerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("RETRIEVAL_UNAVAILABLE", message, options);
  }
}

/** The golden dataset could not be produced or does not match the active corpus. */
export class GenerationError extends AnalyzerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("GENERATION_ERROR", message, options);
  }
}

export class ScoringError extends AnalyzerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SCORING_ERROR", message, options);
  }
}

/** A required credential or setting is missing for one strategy or service. */
export class ConfigurationError extends AnalyzerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIGURATION_ERROR", message, options);
  }
}

export class CallTimeoutError extends AnalyzerError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super("CALL_TIMEOUT", `${label} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class CorpusLoadError extends AnalyzerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CORPUS_LOAD_ERROR", message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
