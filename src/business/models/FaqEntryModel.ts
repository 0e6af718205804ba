export class FaqEntryModel {
    constructor(
        public readonly question: string,
        public readonly answer: string
    ) {
        Object.freeze(this);
    }

    toJSON() {
        return {
            question: this.question,
            answer: this.answer,
        };
    }
}

/** Ordered, read-only FAQ knowledge base. Position only matters for tie-breaks. */
export type Corpus = ReadonlyArray<FaqEntryModel>;
