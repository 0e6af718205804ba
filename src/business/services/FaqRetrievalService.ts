import { inject, injectable } from "tsyringe";
import config from "../../config/config";
import { IFaqRepository } from "../../data/interfaces/IFaqRepository";
import { Corpus } from "../models/FaqEntryModel";
import { QueryResultModel } from "../models/QueryResultModel";
import { InvalidThresholdError } from "../errors/InvalidThresholdError";
import { VectorIndex } from "../retrieval/VectorIndex";
import { answerQuery } from "../retrieval/FaqRetriever";
import { ENGLISH_STOP_WORDS, Tokenizer } from "../../utils/tokenizer";

type FaqSnapshot = {
    corpus: Corpus;
    index: VectorIndex;
};

export type FaqIndexStats = {
    indexSize: number;
    vocabularySize: number;
    sampleQuestions: string[];
};

const SAMPLE_QUESTION_COUNT = 8;

@injectable()
export class FaqRetrievalService {
    private snapshot: Promise<FaqSnapshot> | null = null;
    private readonly cache = new Map<string, QueryResultModel>();

    constructor(
        @inject("IFaqRepository") private readonly repository: IFaqRepository
    ) {}

    /** Loads the corpus and builds the index if that has not happened yet. */
    public async warmUp(): Promise<FaqIndexStats> {
        return this.getStats();
    }

    public async ask(query: string, threshold: number = config.faqMatchThreshold): Promise<QueryResultModel> {
        if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
            throw new InvalidThresholdError(threshold);
        }

        const { corpus, index } = await this.getSnapshot();
        const cacheKey = `${threshold}\u0000${query}`;
        const cached = this.cache.get(cacheKey);
        if (cached) {
            return cached;
        }

        const result = answerQuery(query, index, corpus, threshold, {
            fallbackAnswer: config.faqFallbackAnswer,
            suggestionCount: config.faqSuggestionCount,
        });
        this.remember(cacheKey, result);
        return result;
    }

    public async getStats(): Promise<FaqIndexStats> {
        const { corpus, index } = await this.getSnapshot();
        return {
            indexSize: index.size,
            vocabularySize: index.vocabularySize,
            sampleQuestions: corpus.slice(0, SAMPLE_QUESTION_COUNT).map((entry) => entry.question),
        };
    }

    private getSnapshot(): Promise<FaqSnapshot> {
        if (!this.snapshot) {
            // A failed load is not memoized so the next request retries it.
            this.snapshot = this.buildSnapshot().catch((error: unknown) => {
                this.snapshot = null;
                throw error;
            });
        }
        return this.snapshot;
    }

    private async buildSnapshot(): Promise<FaqSnapshot> {
        const corpus = await this.repository.load(config.faqPath);
        const tokenizer = new Tokenizer({
            stopWords: config.faqRemoveStopWords ? ENGLISH_STOP_WORDS : null,
            ngramMax: config.faqNgramMax,
        });
        const index = VectorIndex.build(corpus, tokenizer);

        if (index.isEmpty) {
            console.warn(
                `[FaqRetrievalService] EmptyCorpusWarning: ${config.faqPath} has no entries; every question gets the fallback answer.`
            );
        } else {
            console.log(
                `[FaqRetrievalService] Indexed ${index.size} FAQ entries (${index.vocabularySize} terms) from ${config.faqPath}`
            );
        }

        return { corpus, index };
    }

    private remember(key: string, result: QueryResultModel): void {
        const limit = config.faqQueryCacheSize;
        if (limit <= 0) return;

        if (this.cache.size >= limit) {
            const oldest = this.cache.keys().next();
            if (!oldest.done) this.cache.delete(oldest.value);
        }
        this.cache.set(key, result);
    }
}
