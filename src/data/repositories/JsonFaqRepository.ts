import { promises as fs } from "fs";
import path from "path";
import { injectable } from "tsyringe";
import { z } from "zod";
import { Corpus, FaqEntryModel } from "../../business/models/FaqEntryModel";
import { ParseError } from "../../business/errors/ParseError";
import { IFaqRepository } from "../interfaces/IFaqRepository";

const faqRecordSchema = z.object({
    question: z
        .string({ required_error: "question is required.", invalid_type_error: "question must be a string." })
        .trim()
        .min(1, "question must not be empty."),
    answer: z
        .string({ required_error: "answer is required.", invalid_type_error: "answer must be a string." })
        .trim()
        .min(1, "answer must not be empty."),
    alts: z.array(z.string().trim().min(1, "alternate question must not be empty.")).optional(),
    alternates: z.array(z.string().trim().min(1, "alternate question must not be empty.")).optional(),
});

type FaqRecord = z.infer<typeof faqRecordSchema>;

const faqCorpusSchema = z.array(faqRecordSchema, {
    invalid_type_error: "FAQ source must be a JSON array of question/answer records.",
});

const formatIssue = (issue: z.ZodIssue): string =>
    issue.path.length > 0 ? `[${issue.path.join(".")}] ${issue.message}` : issue.message;

const describe = (error: unknown): string => (error instanceof Error ? error.message : String(error));

@injectable()
export class JsonFaqRepository implements IFaqRepository {
    public async load(source: string): Promise<Corpus> {
        const resolved = path.resolve(process.cwd(), source);

        let raw: string;
        try {
            raw = await fs.readFile(resolved, "utf8");
        } catch (error) {
            throw new ParseError(source, [`Unable to read FAQ source: ${describe(error)}`]);
        }

        let parsed: unknown;
        try {
            // Editors on Windows like to prepend a byte-order mark.
            parsed = JSON.parse(raw.replace(/^\uFEFF/, ""));
        } catch (error) {
            throw new ParseError(source, [`FAQ source is not valid JSON: ${describe(error)}`]);
        }

        const result = faqCorpusSchema.safeParse(parsed);
        if (!result.success) {
            throw new ParseError(source, result.error.issues.map(formatIssue));
        }

        return Object.freeze(expandRecords(result.data));
    }
}

/**
 * One entry per question, alternates right after their primary question.
 * Repeated question/answer pairs keep their first position.
 */
const expandRecords = (records: FaqRecord[]): FaqEntryModel[] => {
    const seen = new Set<string>();
    const entries: FaqEntryModel[] = [];

    for (const record of records) {
        const questions = [record.question, ...(record.alts ?? []), ...(record.alternates ?? [])];
        for (const question of questions) {
            const key = `${question}\u0000${record.answer}`;
            if (seen.has(key)) continue;
            seen.add(key);
            entries.push(new FaqEntryModel(question, record.answer));
        }
    }
    return entries;
};
