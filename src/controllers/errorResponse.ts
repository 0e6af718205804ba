import { Response } from "express";
import { ZodError } from "zod";
import { ParseError } from "../business/errors/ParseError";
import { InvalidThresholdError } from "../business/errors/InvalidThresholdError";
import { InvalidRefundRequestError } from "../business/errors/InvalidRefundRequestError";
import { SentimentModelUnavailableError } from "../business/errors/SentimentModelUnavailableError";
import { SentimentPredictionError } from "../business/errors/SentimentPredictionError";

export const sendValidationError = (res: Response, error: ZodError) => {
    const issue = error.issues[0];
    res.status(400).json({ message: issue?.message ?? "Invalid request body." });
};

/**
 * Maps domain errors onto HTTP responses. Anything unrecognised is logged and
 * reported as a 500 with `fallbackMessage`.
 */
export const sendError = (res: Response, error: unknown, context: string, fallbackMessage: string) => {
    if (error instanceof InvalidThresholdError || error instanceof InvalidRefundRequestError) {
        res.status(error.statusCode).json({ message: error.message });
        return;
    }
    if (error instanceof ParseError) {
        console.error(`[${context}] FAQ corpus unavailable`, error.issues);
        res.status(503).json({ code: error.code, message: error.message, issues: error.issues });
        return;
    }
    if (error instanceof SentimentModelUnavailableError) {
        console.error(`[${context}] sentiment model unavailable`, error.message);
        res.status(503).json({ code: error.code, message: error.message });
        return;
    }
    if (error instanceof SentimentPredictionError) {
        res.status(422).json({ code: error.code, message: error.message });
        return;
    }

    console.error(`[${context}] error`, error);
    res.status(500).json({ message: fallbackMessage });
};
