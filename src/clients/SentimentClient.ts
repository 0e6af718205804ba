export type SentimentLabel = "Positive" | "Negative" | "Neutral";

export interface SentimentPrediction {
  label: SentimentLabel;
  confidence: number;
}

/**
 * A pre-trained sentiment classifier. Implementations are synchronous and keep
 * no per-call state; model internals stay behind this contract.
 */
export interface ISentimentClient {
  predict(text: string): SentimentPrediction;
}
