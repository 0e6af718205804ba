import { injectable } from "tsyringe";
import config from "../../config/config";
import { ISentimentClient, SentimentPrediction } from "../../clients/SentimentClient";
import { SentimentModelLoader } from "./SentimentModelLoader";

@injectable()
export class SentimentService {
    private client: Promise<ISentimentClient> | null = null;

    constructor(private readonly loader: SentimentModelLoader) {}

    public async predict(text: string): Promise<SentimentPrediction> {
        const client = await this.getClient();
        return client.predict(text);
    }

    private getClient(): Promise<ISentimentClient> {
        if (!this.client) {
            this.client = this.loader
                .load(config.sentimentModelPath, config.sentimentVectorizerPath)
                .catch((error: unknown) => {
                    this.client = null;
                    console.error("[SentimentService] Failed to load sentiment model", error);
                    throw error;
                });
        }
        return this.client;
    }
}
