import { promises as fs } from "fs";
import path from "path";
import { injectable } from "tsyringe";
import { z } from "zod";
import { ISentimentClient, SentimentLabel } from "../../clients/SentimentClient";
import {
    LinearModelArtifact,
    LinearSentimentClient,
    LinearVectorizerArtifact,
} from "../../clients/LinearSentimentClient";
import { SentimentModelUnavailableError } from "../errors/SentimentModelUnavailableError";

const vectorizerSchema = z.object({
    vocabulary: z.record(z.number().int().nonnegative()),
    idf: z.array(z.number().finite()),
    ngramMax: z.union([z.literal(1), z.literal(2)]).default(1),
    stopWords: z.boolean().default(true),
    sublinearTf: z.boolean().default(false),
});

const modelSchema = z.object({
    classes: z.array(z.union([z.string(), z.number()])).min(2),
    coef: z.array(z.array(z.number().finite())).min(1),
    intercept: z.array(z.number().finite()).min(1),
});

// Numeric class ids follow the 0/1/2 convention the review models were trained with.
const LABELS = new Map<string, SentimentLabel>([
    ["0", "Negative"],
    ["1", "Neutral"],
    ["2", "Positive"],
    ["negative", "Negative"],
    ["neutral", "Neutral"],
    ["positive", "Positive"],
]);

export const toSentimentLabel = (raw: string | number): SentimentLabel | null => {
    return LABELS.get(String(raw).trim().toLowerCase()) ?? null;
};

const readJson = async (artifactPath: string): Promise<unknown> => {
    let raw: string;
    try {
        raw = await fs.readFile(path.resolve(process.cwd(), artifactPath), "utf8");
    } catch (error) {
        throw new SentimentModelUnavailableError(artifactPath, error instanceof Error ? error.message : String(error));
    }

    try {
        return JSON.parse(raw);
    } catch {
        throw new SentimentModelUnavailableError(artifactPath, "artifact is not valid JSON");
    }
};

const firstIssue = (error: z.ZodError): string => {
    const issue = error.issues[0];
    if (!issue) return "artifact has an unexpected shape";
    return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
};

@injectable()
export class SentimentModelLoader {
    /**
     * Reads the classifier and its vectorizer and checks that they fit together.
     */
    public async load(modelPath: string, vectorizerPath: string): Promise<ISentimentClient> {
        const [rawModel, rawVectorizer] = await Promise.all([readJson(modelPath), readJson(vectorizerPath)]);

        const parsedVectorizer = vectorizerSchema.safeParse(rawVectorizer);
        if (!parsedVectorizer.success) {
            throw new SentimentModelUnavailableError(vectorizerPath, firstIssue(parsedVectorizer.error));
        }
        const parsedModel = modelSchema.safeParse(rawModel);
        if (!parsedModel.success) {
            throw new SentimentModelUnavailableError(modelPath, firstIssue(parsedModel.error));
        }

        const vectorizer = parsedVectorizer.data;
        const model = parsedModel.data;
        const width = vectorizer.idf.length;

        const outOfRange = Object.entries(vectorizer.vocabulary).find(([, column]) => column >= width);
        if (outOfRange) {
            throw new SentimentModelUnavailableError(
                vectorizerPath,
                `vocabulary term "${outOfRange[0]}" points past the idf table`
            );
        }

        const binary = model.coef.length === 1;
        if (binary ? model.classes.length !== 2 : model.coef.length !== model.classes.length) {
            throw new SentimentModelUnavailableError(modelPath, "coefficient rows do not match the class list");
        }
        if (model.intercept.length !== model.coef.length) {
            throw new SentimentModelUnavailableError(modelPath, "expected one intercept per coefficient row");
        }
        if (model.coef.some((row) => row.length !== width)) {
            throw new SentimentModelUnavailableError(modelPath, `every coefficient row must have ${width} columns`);
        }

        const labels: SentimentLabel[] = [];
        for (const raw of model.classes) {
            const label = toSentimentLabel(raw);
            if (!label) {
                throw new SentimentModelUnavailableError(modelPath, `unknown class label "${raw}"`);
            }
            labels.push(label);
        }

        const vectorizerArtifact: LinearVectorizerArtifact = {
            vocabulary: new Map(Object.entries(vectorizer.vocabulary)),
            idf: vectorizer.idf,
            ngramMax: vectorizer.ngramMax,
            stopWords: vectorizer.stopWords,
            sublinearTf: vectorizer.sublinearTf,
        };
        const modelArtifact: LinearModelArtifact = {
            labels,
            coef: model.coef,
            intercept: model.intercept,
        };

        console.log(
            `[SentimentModelLoader] Loaded ${labels.length}-class model with ${width} features from ${modelPath}`
        );
        return new LinearSentimentClient(vectorizerArtifact, modelArtifact);
    }
}
