import { Corpus } from "../../business/models/FaqEntryModel";

export interface IFaqRepository {
    /** Reads the whole corpus from `source`. Rejects with a ParseError; never returns a partial corpus. */
    load(source: string): Promise<Corpus>;
}
