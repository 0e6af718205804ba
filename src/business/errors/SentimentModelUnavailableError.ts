export class SentimentModelUnavailableError extends Error {
    public readonly code = "SENTIMENT_MODEL_UNAVAILABLE";
    public readonly artifactPath: string;

    constructor(artifactPath: string, reason: string) {
        super(`Sentiment model artifact ${artifactPath} is unavailable: ${reason}`);
        this.name = "SentimentModelUnavailableError";
        this.artifactPath = artifactPath;
    }
}
