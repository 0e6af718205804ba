import { Request, Response } from "express";
import { container } from "tsyringe";
import { z } from "zod";
import { RefundService } from "../business/services/RefundService";
import { sendError, sendValidationError } from "./errorResponse";

const refundSchema = z.object({
    orderId: z.string({ required_error: "orderId is required." }).trim().min(1, "orderId is required."),
    amount: z.number({ required_error: "amount is required.", invalid_type_error: "amount must be a number." }),
});

export class ReviewController {
    private get refunds(): RefundService {
        return container.resolve(RefundService);
    }

    public async refund(req: Request, res: Response) {
        const parsed = refundSchema.safeParse(req.body ?? {});
        if (!parsed.success) {
            sendValidationError(res, parsed.error);
            return;
        }

        try {
            const refund = this.refunds.calculate(parsed.data.amount);
            console.log(`[ReviewController] Refund of ${refund.refundAmount} computed for order ${parsed.data.orderId}`);
            res.json({ orderId: parsed.data.orderId, ...refund.toJSON() });
        } catch (error) {
            sendError(res, error, "ReviewController", "Failed to compute the refund.");
        }
    }
}
