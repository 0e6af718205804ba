import { injectable } from "tsyringe";
import config from "../../config/config";
import { SentimentPrediction } from "../../clients/SentimentClient";

export type RestaurantAction = "COUPON_FREE" | "REFUND" | "NONE";

export type ActionDecision = {
    action: RestaurantAction;
    message: string;
};

@injectable()
export class RestaurantActionPolicy {
    public decide(prediction: SentimentPrediction): ActionDecision {
        const { label, confidence } = prediction;
        const shown = confidence.toFixed(2);

        if (label === "Negative" && confidence >= config.negativeActionThreshold) {
            return {
                action: "REFUND",
                message: `Negative (${shown}). We're sorry about your meal and would like to offer a ${config.refundPercent}% refund.`,
            };
        }
        if (label === "Positive" && confidence >= config.positiveActionThreshold) {
            return {
                action: "COUPON_FREE",
                message: `Positive (${shown}). Thanks for the kind words! Enjoy a free meal on us.`,
            };
        }
        return {
            action: "NONE",
            message: `${label} (${shown}). Thank you for your feedback.`,
        };
    }
}
