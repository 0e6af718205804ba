import englishStopWords from "../business/resources/stopwords-en.json";

export const ENGLISH_STOP_WORDS: ReadonlySet<string> = new Set(englishStopWords);

export const NEGATION_WORDS: ReadonlySet<string> = new Set(["no", "nor", "not", "never", "nothing", "none"]);

/** The English list without negations, which flip the polarity of a review. */
export const SENTIMENT_STOP_WORDS: ReadonlySet<string> = new Set(
    englishStopWords.filter((word) => !NEGATION_WORDS.has(word))
);

export type TokenizerOptions = {
    /** Words dropped before counting. `null` keeps every token; omitted uses the English list. */
    stopWords?: Iterable<string> | null;
    /** 2 appends adjacent-token bigrams after the unigrams. */
    ngramMax?: 1 | 2;
};

// Anything that is not a letter or digit separates tokens.
const TOKEN_SEPARATOR = /[^\p{L}\p{N}]+/u;

export class Tokenizer {
    public readonly ngramMax: 1 | 2;
    private readonly stopWords: ReadonlySet<string>;

    constructor(options: TokenizerOptions = {}) {
        const stopWords = options.stopWords === undefined ? ENGLISH_STOP_WORDS : options.stopWords;
        this.stopWords = new Set(Array.from(stopWords ?? [], (word) => word.toLowerCase()));
        this.ngramMax = options.ngramMax ?? 1;
    }

    public tokenize(text: string): string[] {
        const unigrams = text
            .toLowerCase()
            .split(TOKEN_SEPARATOR)
            .filter((token) => token.length > 0 && !this.stopWords.has(token));

        if (this.ngramMax === 1) {
            return unigrams;
        }

        const bigrams: string[] = [];
        for (let i = 0; i < unigrams.length - 1; i++) {
            bigrams.push(`${unigrams[i]} ${unigrams[i + 1]}`);
        }
        return [...unigrams, ...bigrams];
    }
}

export const countTerms = (tokens: string[]): Map<string, number> => {
    const counts = new Map<string, number>();
    for (const token of tokens) {
        counts.set(token, (counts.get(token) ?? 0) + 1);
    }
    return counts;
};
