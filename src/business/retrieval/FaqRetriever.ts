import { Corpus } from "../models/FaqEntryModel";
import { FaqSuggestion, QueryResultModel } from "../models/QueryResultModel";
import { InvalidThresholdError } from "../errors/InvalidThresholdError";
import { cosineSimilarity } from "../../utils/vectorSimilarity";
import { VectorIndex } from "./VectorIndex";

export const DEFAULT_FALLBACK_ANSWER = "I don't know the answer to that yet.";

export type AnswerOptions = {
    fallbackAnswer?: string;
    /** How many runner-up questions to attach to the result. */
    suggestionCount?: number;
};

/** Similarity of the query to every indexed question, in corpus order. */
export const rankQuery = (query: string, index: VectorIndex): number[] => {
    const queryVector = index.embed(query);
    return index.vectors.map((vector) => cosineSimilarity(queryVector, vector));
};

/**
 * Finds the stored question closest to `query`.
 *
 * The first entry wins a tie. A best score strictly below `threshold`, or a
 * score of 0 (no shared vocabulary), yields the fallback answer. Thresholds
 * outside [0, 1] are rejected.
 */
export const answerQuery = (
    query: string,
    index: VectorIndex,
    corpus: Corpus,
    threshold: number,
    options: AnswerOptions = {}
): QueryResultModel => {
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
        throw new InvalidThresholdError(threshold);
    }
    if (index.size !== corpus.length) {
        throw new Error(`Vector index covers ${index.size} entries but the corpus has ${corpus.length}.`);
    }

    const fallbackAnswer = options.fallbackAnswer ?? DEFAULT_FALLBACK_ANSWER;
    if (index.isEmpty) {
        return new QueryResultModel(null, null, 0, fallbackAnswer, "empty_index");
    }

    const scores = rankQuery(query, index);
    let best = 0;
    for (let i = 1; i < scores.length; i++) {
        if (scores[i] > scores[best]) best = i;
    }

    const score = scores[best];
    const suggestions = pickSuggestions(scores, corpus, best, options.suggestionCount ?? 0);

    if (score === 0 || score < threshold) {
        return new QueryResultModel(null, null, score, fallbackAnswer, "no_match", suggestions);
    }

    const entry = corpus[best];
    return new QueryResultModel(entry, best, score, entry.answer, "matched", suggestions);
};

const pickSuggestions = (
    scores: number[],
    corpus: Corpus,
    exclude: number,
    count: number
): FaqSuggestion[] => {
    if (count <= 0) return [];

    return scores
        .map((score, index) => ({ index, score }))
        .filter((candidate) => candidate.index !== exclude && candidate.score > 0)
        .sort((a, b) => b.score - a.score || a.index - b.index)
        .slice(0, count)
        .map(({ index, score }) => ({ index, question: corpus[index].question, score }));
};
