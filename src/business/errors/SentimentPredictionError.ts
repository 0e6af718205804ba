export class SentimentPredictionError extends Error {
    public readonly code = "SENTIMENT_PREDICTION_FAILED";

    constructor(message = "Sentiment prediction failed.") {
        super(message);
        this.name = "SentimentPredictionError";
    }
}
