import { ISentimentClient, SentimentLabel, SentimentPrediction } from "./SentimentClient";
import { SentimentPredictionError } from "../business/errors/SentimentPredictionError";
import { SENTIMENT_STOP_WORDS, Tokenizer, countTerms } from "../utils/tokenizer";

export type LinearVectorizerArtifact = {
  vocabulary: ReadonlyMap<string, number>;
  idf: number[];
  ngramMax: 1 | 2;
  stopWords: boolean;
  sublinearTf: boolean;
};

export type LinearModelArtifact = {
  labels: SentimentLabel[];
  coef: number[][];
  intercept: number[];
};

const sigmoid = (x: number) => 1 / (1 + Math.exp(-x));

const softmax = (scores: number[]): number[] => {
  const max = Math.max(...scores);
  const exps = scores.map((s) => Math.exp(s - max));
  const total = exps.reduce((sum, value) => sum + value, 0);
  return exps.map((value) => value / total);
};

/**
 * Linear classifier over L2-normalised TF-IDF features, as exported from a
 * logistic regression. One coefficient row means a binary model.
 */
export class LinearSentimentClient implements ISentimentClient {
  private readonly tokenizer: Tokenizer;

  constructor(
    private readonly vectorizer: LinearVectorizerArtifact,
    private readonly model: LinearModelArtifact
  ) {
    this.tokenizer = new Tokenizer({
      stopWords: vectorizer.stopWords ? SENTIMENT_STOP_WORDS : null,
      ngramMax: vectorizer.ngramMax,
    });
  }

  predict(text: string): SentimentPrediction {
    if (typeof text !== "string" || text.trim().length === 0) {
      throw new SentimentPredictionError("Review text is required for sentiment prediction.");
    }

    const features = this.vectorize(text);
    const scores = this.model.coef.map((row, k) => {
      let score = this.model.intercept[k];
      for (const [column, value] of features) score += row[column] * value;
      return score;
    });

    const probabilities =
      scores.length === 1 ? [1 - sigmoid(scores[0]), sigmoid(scores[0])] : softmax(scores);

    let best = 0;
    for (let i = 1; i < probabilities.length; i++) {
      if (probabilities[i] > probabilities[best]) best = i;
    }

    const confidence = probabilities[best];
    if (!Number.isFinite(confidence)) {
      throw new SentimentPredictionError("Sentiment model produced a non-numeric score.");
    }
    return { label: this.model.labels[best], confidence };
  }

  private vectorize(text: string): Map<number, number> {
    const features = new Map<number, number>();
    for (const [term, count] of countTerms(this.tokenizer.tokenize(text))) {
      const column = this.vectorizer.vocabulary.get(term);
      if (column === undefined) continue;
      const tf = this.vectorizer.sublinearTf ? 1 + Math.log(count) : count;
      features.set(column, tf * this.vectorizer.idf[column]);
    }

    let sumOfSquares = 0;
    for (const value of features.values()) sumOfSquares += value * value;
    const norm = Math.sqrt(sumOfSquares);
    if (norm > 0) {
      for (const [column, value] of features) features.set(column, value / norm);
    }
    return features;
  }
}
