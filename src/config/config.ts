// src/config/config.ts

import dotenv from "dotenv";
dotenv.config();

interface Config {
    port: number;
    nodeEnv: string;

    // CORS
    allowedOrigins: string[];

    // FAQ retrieval
    faqPath: string;
    faqMatchThreshold: number;
    faqSuggestionCount: number;
    faqQueryCacheSize: number;
    faqRemoveStopWords: boolean;
    faqNgramMax: 1 | 2;
    faqFallbackAnswer: string;

    // Sentiment model artifacts
    sentimentModelPath: string;
    sentimentVectorizerPath: string;

    // Restaurant actions
    positiveActionThreshold: number;
    negativeActionThreshold: number;
    refundPercent: number;
    couponDaysValid: number;
}

const parseNumber = (value: string | undefined, fallback: number): number => {
    if (value === undefined || value.trim() === "") return fallback;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : Number.NaN;
};

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
    if (value === undefined || value.trim() === "") return fallback;
    return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
};

const parseList = (value: string | undefined, fallback: string[]): string[] => {
    if (!value) return fallback;
    return value
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
};

const ngramMax = parseNumber(process.env.FAQ_NGRAM_MAX, 1);

const config: Config = {
    port: parseNumber(process.env.PORT, 3002),
    nodeEnv: process.env.NODE_ENV || "development",

    allowedOrigins: parseList(process.env.ALLOWED_ORIGINS, ["http://localhost:3000", "http://localhost:3001"]),

    faqPath: process.env.FAQ_PATH || "data/hotel_faq.json",
    faqMatchThreshold: parseNumber(process.env.FAQ_MATCH_THRESHOLD, 0.2),
    faqSuggestionCount: parseNumber(process.env.FAQ_SUGGESTION_COUNT, 3),
    faqQueryCacheSize: parseNumber(process.env.FAQ_QUERY_CACHE_SIZE, 0),
    faqRemoveStopWords: parseBoolean(process.env.FAQ_REMOVE_STOP_WORDS, true),
    faqNgramMax: ngramMax === 2 ? 2 : 1,
    faqFallbackAnswer:
        process.env.FAQ_FALLBACK_ANSWER ||
        "I don't know the answer to that yet. Please ask the front desk.",

    sentimentModelPath: process.env.SENTIMENT_MODEL_PATH || "models/sentiment_model.json",
    sentimentVectorizerPath: process.env.SENTIMENT_VECTORIZER_PATH || "models/vectorizer.json",

    positiveActionThreshold: parseNumber(process.env.POSITIVE_ACTION_THRESHOLD, 0.7),
    negativeActionThreshold: parseNumber(process.env.NEGATIVE_ACTION_THRESHOLD, 0.7),
    refundPercent: parseNumber(process.env.REFUND_PERCENT, 15),
    couponDaysValid: parseNumber(process.env.COUPON_DAYS_VALID, 30),
};

const inUnitRange = (value: number) => value >= 0 && value <= 1;
const isNonNegativeInteger = (value: number) => Number.isInteger(value) && value >= 0;

// Validate critical values
if (!Number.isInteger(config.port) || config.port <= 0) throw new Error("❌ Invalid PORT in .env");
if (ngramMax !== 1 && ngramMax !== 2) throw new Error("❌ FAQ_NGRAM_MAX must be 1 or 2");
if (!inUnitRange(config.faqMatchThreshold)) throw new Error("❌ FAQ_MATCH_THRESHOLD must be between 0 and 1");
if (!isNonNegativeInteger(config.faqSuggestionCount)) throw new Error("❌ Invalid FAQ_SUGGESTION_COUNT in .env");
if (!isNonNegativeInteger(config.faqQueryCacheSize)) throw new Error("❌ Invalid FAQ_QUERY_CACHE_SIZE in .env");
if (!inUnitRange(config.positiveActionThreshold)) throw new Error("❌ POSITIVE_ACTION_THRESHOLD must be between 0 and 1");
if (!inUnitRange(config.negativeActionThreshold)) throw new Error("❌ NEGATIVE_ACTION_THRESHOLD must be between 0 and 1");
if (!(config.refundPercent > 0 && config.refundPercent <= 100)) throw new Error("❌ REFUND_PERCENT must be in (0, 100]");
if (!Number.isInteger(config.couponDaysValid) || config.couponDaysValid <= 0) throw new Error("❌ Invalid COUPON_DAYS_VALID in .env");

export default config;
