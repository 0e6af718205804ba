import { Corpus } from "../models/FaqEntryModel";
import { Tokenizer, countTerms } from "../../utils/tokenizer";
import { WeightedVector, l2Norm } from "../../utils/vectorSimilarity";

/**
 * TF-IDF index over the questions of a corpus snapshot.
 *
 * Term frequency is the raw count; inverse document frequency is smoothed as
 * `ln((1 + N) / (1 + df)) + 1`, so a term present in every question still
 * carries weight. The index never changes after `build`; a new corpus needs a
 * new index.
 */
export class VectorIndex {
    private constructor(
        public readonly tokenizer: Tokenizer,
        public readonly idf: ReadonlyMap<string, number>,
        public readonly vectors: ReadonlyArray<WeightedVector>
    ) {}

    public static build(corpus: Corpus, tokenizer: Tokenizer = new Tokenizer()): VectorIndex {
        const documentCount = corpus.length;
        const termCounts = corpus.map((entry) => countTerms(tokenizer.tokenize(entry.question)));

        const documentFrequency = new Map<string, number>();
        for (const counts of termCounts) {
            for (const term of counts.keys()) {
                documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
            }
        }

        const idf = new Map<string, number>();
        for (const [term, df] of documentFrequency) {
            idf.set(term, Math.log((1 + documentCount) / (1 + df)) + 1);
        }

        const vectors = Object.freeze(termCounts.map((counts) => weigh(counts, idf)));
        return new VectorIndex(tokenizer, idf, vectors);
    }

    public get size(): number {
        return this.vectors.length;
    }

    public get vocabularySize(): number {
        return this.idf.size;
    }

    public get isEmpty(): boolean {
        return this.vectors.length === 0;
    }

    /** Projects free text into the index space. Terms outside the vocabulary are dropped. */
    public embed(text: string): WeightedVector {
        return weigh(countTerms(this.tokenizer.tokenize(text)), this.idf);
    }
}

const weigh = (counts: ReadonlyMap<string, number>, idf: ReadonlyMap<string, number>): WeightedVector => {
    const weights = new Map<string, number>();
    for (const [term, count] of counts) {
        const termIdf = idf.get(term);
        if (termIdf !== undefined) weights.set(term, count * termIdf);
    }
    return { weights, norm: l2Norm(weights) };
};
