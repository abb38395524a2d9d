import { type Tiktoken, type TiktokenEncoding, get_encoding } from "tiktoken";

const MODEL_ENCODINGS: Record<string, TiktokenEncoding> = {
  "gpt-4o": "o200k_base",
  "gpt-4o-mini": "o200k_base",
  "gpt-4.1-mini": "o200k_base",
  "gpt-3.5-turbo-0125": "cl100k_base",
  "text-embedding-3-small": "cl100k_base",
  "text-embedding-3-large": "cl100k_base",
};

const encoders = new Map<TiktokenEncoding, Tiktoken>();

function getEncoder(model: string): Tiktoken {
  const encoding = MODEL_ENCODINGS[model] ?? "cl100k_base";
  let encoder = encoders.get(encoding);
  if (!encoder) {
    encoder = get_encoding(encoding);
    encoders.set(encoding, encoder);
  }
  return encoder;
}

/**
 * Count the tokens a model sees for a text.
 * Used to price calls whose provider response does not carry usage.
 */
export function countTokens(text: string, model: string): number {
  if (!text) return 0;
  return getEncoder(model).encode(text).length;
}

/**
 * Free every cached encoder.
 * Call this when a CLI run is done with token estimation.
 */
export function cleanupEncoders(): void {
  for (const encoder of encoders.values()) {
    encoder.free();
  }
  encoders.clear();
}
