import { injectable } from "tsyringe";
import { SentimentPrediction } from "../../clients/SentimentClient";
import { CouponModel } from "../models/CouponModel";
import { QueryResultModel } from "../models/QueryResultModel";
import { CouponService } from "./CouponService";
import { FaqRetrievalService } from "./FaqRetrievalService";
import { Intent, IntentDetector } from "./IntentDetector";
import { RestaurantAction, RestaurantActionPolicy } from "./RestaurantActionPolicy";
import { SentimentService } from "./SentimentService";

export type ChatMode = "auto" | "faq" | "review";

export type ChatReply =
    | { intent: "FAQ"; result: QueryResultModel }
    | {
          intent: "REVIEW";
          prediction: SentimentPrediction;
          action: RestaurantAction;
          message: string;
          coupon: CouponModel | null;
      };

@injectable()
export class ChatService {
    constructor(
        private readonly faqService: FaqRetrievalService,
        private readonly sentimentService: SentimentService,
        private readonly intentDetector: IntentDetector,
        private readonly policy: RestaurantActionPolicy,
        private readonly couponService: CouponService
    ) {}

    public async handle(message: string, mode: ChatMode = "auto", threshold?: number): Promise<ChatReply> {
        const intent = this.resolveIntent(message, mode);

        if (intent === "FAQ") {
            const result = await this.faqService.ask(message, threshold);
            return { intent, result };
        }

        const prediction = await this.sentimentService.predict(message);
        const decision = this.policy.decide(prediction);
        const coupon = decision.action === "COUPON_FREE" ? this.couponService.createFreeCoupon() : null;
        if (coupon) {
            console.log(`[ChatService] Issued free meal coupon ${coupon.code} (expires ${coupon.expires})`);
        }

        return {
            intent,
            prediction,
            action: decision.action,
            message: decision.message,
            coupon,
        };
    }

    private resolveIntent(message: string, mode: ChatMode): Intent {
        if (mode === "faq") return "FAQ";
        if (mode === "review") return "REVIEW";
        return this.intentDetector.detect(message);
    }
}
