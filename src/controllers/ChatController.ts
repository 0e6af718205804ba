import { Request, Response } from "express";
import { container } from "tsyringe";
import { z } from "zod";
import { ChatService } from "../business/services/ChatService";
import { sendError, sendValidationError } from "./errorResponse";

const chatSchema = z.object({
    message: z.string({ required_error: "message is required." }).trim().min(1, "message is required."),
    mode: z.enum(["auto", "faq", "review"]).default("auto"),
    threshold: z.number().min(0, "threshold must be between 0 and 1.").max(1, "threshold must be between 0 and 1.").optional(),
});

export class ChatController {
    private get service(): ChatService {
        return container.resolve(ChatService);
    }

    public async message(req: Request, res: Response) {
        const parsed = chatSchema.safeParse(req.body ?? {});
        if (!parsed.success) {
            sendValidationError(res, parsed.error);
            return;
        }

        try {
            const { message, mode, threshold } = parsed.data;
            const reply = await this.service.handle(message, mode, threshold);
            if (reply.intent === "FAQ") {
                res.json({ intent: reply.intent, ...reply.result.toJSON() });
                return;
            }
            res.json({
                intent: reply.intent,
                prediction: reply.prediction,
                action: reply.action,
                message: reply.message,
                coupon: reply.coupon ? reply.coupon.toJSON() : null,
            });
        } catch (error) {
            sendError(res, error, "ChatController", "Failed to handle the chat message.");
        }
    }
}
