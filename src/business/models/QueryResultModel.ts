import { FaqEntryModel } from "./FaqEntryModel";

export type QueryStatus = "matched" | "no_match" | "empty_index";

export type FaqSuggestion = {
    index: number;
    question: string;
    score: number;
};

export class QueryResultModel {
    constructor(
        public readonly matchedEntry: FaqEntryModel | null,
        public readonly matchedIndex: number | null,
        public readonly score: number,
        public readonly answer: string,
        public readonly status: QueryStatus,
        public readonly suggestions: ReadonlyArray<FaqSuggestion> = []
    ) {}

    public get found(): boolean {
        return this.matchedEntry !== null;
    }

    toJSON() {
        return {
            found: this.found,
            status: this.status,
            score: this.score,
            answer: this.answer,
            question: this.matchedEntry?.question ?? null,
            matchedIndex: this.matchedIndex,
            suggestions: this.suggestions.map((s) => ({ ...s })),
        };
    }
}
