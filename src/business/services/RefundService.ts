import { injectable } from "tsyringe";
import config from "../../config/config";
import { RefundModel } from "../models/RefundModel";
import { InvalidRefundRequestError } from "../errors/InvalidRefundRequestError";

@injectable()
export class RefundService {
    /** Refund for an order amount, rounded to cents. */
    public calculate(amount: number, percent: number = config.refundPercent): RefundModel {
        if (!Number.isFinite(amount) || amount <= 0) {
            throw new InvalidRefundRequestError();
        }
        if (!Number.isFinite(percent) || percent <= 0 || percent > 100) {
            throw new InvalidRefundRequestError("Refund percent must be greater than 0 and at most 100.");
        }

        const refundAmount = Math.round(amount * percent) / 100;
        return new RefundModel(amount, percent, refundAmount);
    }
}
