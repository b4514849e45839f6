export type ModelPrice = {
  input_price_per_1M: number;
  output_price_per_1M: number;
};

// USD per 1M tokens. Used for routing and logging only.
export const MODEL_PRICING: Record<string, ModelPrice> = {
  "gpt-4o-mini": { input_price_per_1M: 0.15, output_price_per_1M: 0.6 },
  "gpt-4o": { input_price_per_1M: 2.5, output_price_per_1M: 10.0 },
  "gpt-4-turbo": { input_price_per_1M: 10.0, output_price_per_1M: 30.0 },
  "anthropic/claude-3.5-sonnet": { input_price_per_1M: 3.0, output_price_per_1M: 15.0 },
  "anthropic/claude-3-haiku": { input_price_per_1M: 0.25, output_price_per_1M: 1.25 },
  "google/gemini-2.0-flash-001": { input_price_per_1M: 0.1, output_price_per_1M: 0.4 },
  "llama3.1": { input_price_per_1M: 0, output_price_per_1M: 0 }
};

export const DEFAULT_PRICE: ModelPrice = { input_price_per_1M: 0.1, output_price_per_1M: 0.4 };

export function priceOf(model: string, table: Record<string, ModelPrice> = MODEL_PRICING): ModelPrice {
  return table[model] ?? DEFAULT_PRICE;
}

export function estimateCost(
  model: string,
  inputTokens: number,
  outputTokens: number,
  table: Record<string, ModelPrice> = MODEL_PRICING
): number {
  const p = priceOf(model, table);
  return (inputTokens / 1_000_000) * p.input_price_per_1M + (outputTokens / 1_000_000) * p.output_price_per_1M;
}

/**
 * Relative cost used by the "auto" policy: price of 1M tokens in plus 1M out.
 */
export function costRank(model: string, table: Record<string, ModelPrice> = MODEL_PRICING): number {
  const p = priceOf(model, table);
  return p.input_price_per_1M + p.output_price_per_1M;
}
