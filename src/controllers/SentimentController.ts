import { Request, Response } from "express";
import { container } from "tsyringe";
import { z } from "zod";
import { SentimentService } from "../business/services/SentimentService";
import { sendError, sendValidationError } from "./errorResponse";

const predictSchema = z.object({
    text: z.string({ required_error: "text is required." }).trim().min(1, "text is required."),
});

export class SentimentController {
    private get service(): SentimentService {
        return container.resolve(SentimentService);
    }

    public async predict(req: Request, res: Response) {
        const parsed = predictSchema.safeParse(req.body ?? {});
        if (!parsed.success) {
            sendValidationError(res, parsed.error);
            return;
        }

        try {
            const prediction = await this.service.predict(parsed.data.text);
            res.json(prediction);
        } catch (error) {
            sendError(res, error, "SentimentController", "Failed to classify the review.");
        }
    }
}
