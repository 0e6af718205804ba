import { Request, Response } from "express";
import { container } from "tsyringe";
import { z } from "zod";
import { FaqRetrievalService } from "../business/services/FaqRetrievalService";
import { sendError, sendValidationError } from "./errorResponse";

const askSchema = z.object({
    query: z.string({ required_error: "query is required." }).trim().min(1, "query is required."),
    threshold: z.number().min(0, "threshold must be between 0 and 1.").max(1, "threshold must be between 0 and 1.").optional(),
});

export class FaqController {
    private get service(): FaqRetrievalService {
        return container.resolve(FaqRetrievalService);
    }

    public async ask(req: Request, res: Response) {
        const parsed = askSchema.safeParse(req.body ?? {});
        if (!parsed.success) {
            sendValidationError(res, parsed.error);
            return;
        }

        try {
            const result = await this.service.ask(parsed.data.query, parsed.data.threshold);
            res.json(result.toJSON());
        } catch (error) {
            sendError(res, error, "FaqController", "Failed to answer the question.");
        }
    }

    public async stats(_req: Request, res: Response) {
        try {
            res.json(await this.service.getStats());
        } catch (error) {
            sendError(res, error, "FaqController", "Failed to read FAQ index statistics.");
        }
    }
}
